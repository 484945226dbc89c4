/**
 * src/engine/factory.ts
 * Wire an engine from configuration.
 *
 * Providers are looked up by name in the registries below and built in the
 * configured priority order. One whose backend is not configured (no API key,
 * no browser endpoint, no index) is left out with a warning.
 */

import type { SupabaseClient } from "@supabase/supabase-js";

import { timeoutFor, type AppConfig, type PlateProviderName, type PriceProviderName } from "../config.js";
import { RemoteBrowserSession, type BrowserSession } from "../backends/browser.js";
import { createCompletionBackend, type CompletionBackend } from "../backends/completion.js";
import { HttpPageFetcher, type PageFetcher } from "../backends/page-fetcher.js";
import { createSupabase } from "../backends/supabase.js";
import { AiValuationProvider } from "../market/providers/ai-valuation.js";
import { ListingCardsProvider } from "../market/providers/listing-cards.js";
import { PagePriceProvider } from "../market/providers/page-prices.js";
import { MarketPriceResolver, type PriceProvider } from "../market/resolver.js";
import { PRICE_SITES } from "../market/sites.js";
import { InMemoryPlateIndex, SupabasePlateIndex, type PlateIndex } from "../plate/plate-index.js";
import { AiSearchPlateProvider } from "../plate/providers/ai-search.js";
import { BrowserFormPlateProvider } from "../plate/providers/browser-form.js";
import { IndexedPlateProvider } from "../plate/providers/indexed.js";
import { PlateResolver, type PlateProvider } from "../plate/resolver.js";
import { PLATE_SITES } from "../plate/sites.js";
import { QuotaGate } from "../quota/gate.js";
import { MemoryCounterStore, SupabaseCounterStore, type CounterStore } from "../quota/stores.js";
import { createLogger, type Logger } from "../server/logger.js";
import { ValuationEngine } from "./valuation-engine.js";

/** Everything a provider may need, each absent when not configured. */
export interface Backends {
  completion?: CompletionBackend;
  browser?: BrowserSession;
  plateIndex?: PlateIndex;
  fetcher: PageFetcher;
}

type Requirement = "completion" | "browser" | "plateIndex";

interface ProviderFactory<P> {
  requires?: Requirement;
  create(backends: Backends, config: AppConfig): P | undefined;
}

const PLATE_PROVIDERS: Record<PlateProviderName, ProviderFactory<PlateProvider>> = {
  index: {
    requires: "plateIndex",
    create: (b) => b.plateIndex && new IndexedPlateProvider(b.plateIndex),
  },
  "ai-search": {
    requires: "completion",
    create: (b) => b.completion && new AiSearchPlateProvider(b.completion),
  },
  patentechile: {
    requires: "browser",
    create: (b) => b.browser && new BrowserFormPlateProvider(b.browser, PLATE_SITES.patentechile),
  },
  volanteomaleta: {
    requires: "browser",
    create: (b) => b.browser && new BrowserFormPlateProvider(b.browser, PLATE_SITES.volanteomaleta),
  },
};

const bandOf = (config: AppConfig) => ({ min: config.market.priceMin, max: config.market.priceMax });

const PRICE_PROVIDERS: Record<PriceProviderName, ProviderFactory<PriceProvider>> = {
  "ai-valuation": {
    requires: "completion",
    create: (b, config) =>
      b.completion &&
      new AiValuationProvider(b.completion, {
        region: config.market.region,
        sourceDomains: config.market.sourceDomains,
      }),
  },
  autofact: {
    create: (b, config) => new PagePriceProvider(b.fetcher, PRICE_SITES.autofact, bandOf(config)),
  },
  "autofact-simple": {
    create: (b, config) => new PagePriceProvider(b.fetcher, PRICE_SITES["autofact-simple"], bandOf(config)),
  },
  mercadolibre: {
    create: (b) => new ListingCardsProvider(b.fetcher, PRICE_SITES.mercadolibre),
  },
  chileautos: {
    create: (b, config) => new PagePriceProvider(b.fetcher, PRICE_SITES.chileautos, bandOf(config)),
  },
};

function instantiate<N extends string, P>(
  kind: string,
  names: readonly N[],
  registry: Record<N, ProviderFactory<P>>,
  backends: Backends,
  config: AppConfig,
  log: Logger,
): P[] {
  const out: P[] = [];
  for (const name of names) {
    const provider = registry[name].create(backends, config);
    if (provider === undefined) {
      log.warn(`Skipping ${kind} provider: backend not configured`, { provider: name, requires: registry[name].requires });
      continue;
    }
    out.push(provider);
  }
  return out;
}

export interface EngineOverrides {
  completion?: CompletionBackend;
  browser?: BrowserSession;
  fetcher?: PageFetcher;
  supabase?: SupabaseClient;
  plateIndex?: PlateIndex;
  counterStore?: CounterStore;
  now?: () => Date;
  logger?: Logger;
}

/** Overrides replace the backend the config would have produced, including an absent one. */
export async function createEngine(config: AppConfig, overrides: EngineOverrides = {}): Promise<ValuationEngine> {
  const log = overrides.logger ?? createLogger("engine");
  const has = (key: keyof EngineOverrides) => Object.prototype.hasOwnProperty.call(overrides, key);

  const supabase = has("supabase") ? overrides.supabase : createSupabase(config.supabase);
  const completion = has("completion") ? overrides.completion : createCompletionBackend(config.ai);
  const browser = has("browser")
    ? overrides.browser
    : config.browser.wsEndpoint
      ? new RemoteBrowserSession(config.browser.wsEndpoint)
      : undefined;

  let plateIndex: PlateIndex | undefined;
  if (has("plateIndex")) {
    plateIndex = overrides.plateIndex;
  } else if (config.plateIndex.file) {
    const index = await InMemoryPlateIndex.fromFile(config.plateIndex.file);
    log.info("Loaded plate index", { file: config.plateIndex.file, plates: index.size });
    plateIndex = index;
  } else if (supabase) {
    plateIndex = new SupabasePlateIndex(supabase);
  }

  let fetcher: PageFetcher;
  if (overrides.fetcher) {
    fetcher = overrides.fetcher;
  } else if (config.pageFetcher === "browser" && browser) {
    fetcher = browser;
  } else {
    if (config.pageFetcher === "browser") log.warn("PAGE_FETCHER=browser without BROWSER_WS_ENDPOINT, using plain HTTP");
    fetcher = new HttpPageFetcher();
  }

  const backends: Backends = { completion, browser, plateIndex, fetcher };
  const plateProviders = instantiate("plate", config.providers.plate, PLATE_PROVIDERS, backends, config, log);
  const priceProviders = instantiate("price", config.providers.price, PRICE_PROVIDERS, backends, config, log);

  const timeouts = (names: readonly string[]) =>
    Object.fromEntries(names.map((name) => [name, timeoutFor(config, name)]));

  const counterStore = overrides.counterStore ?? (supabase ? new SupabaseCounterStore(supabase) : new MemoryCounterStore());

  log.info("Engine ready", {
    plateProviders: plateProviders.map((p) => p.name),
    priceProviders: priceProviders.map((p) => p.name),
    quotaStore: counterStore.name,
  });

  return new ValuationEngine({
    plates: new PlateResolver(plateProviders, {
      timeoutMs: config.providers.timeoutMs,
      timeouts: timeouts(plateProviders.map((p) => p.name)),
    }),
    market: new MarketPriceResolver(priceProviders, {
      timeoutMs: config.providers.timeoutMs,
      timeouts: timeouts(priceProviders.map((p) => p.name)),
      band: bandOf(config),
      yearTolerance: config.market.yearTolerance,
      depreciation: config.depreciation,
    }),
    quota: new QuotaGate(counterStore, {
      limit: config.quota.dailyLimit,
      timeZone: config.quota.timeZone,
      now: overrides.now,
    }),
    pricing: config.pricing,
    logger: log,
    resources: browser ? [browser] : [],
  });
}
