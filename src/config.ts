/**
 * src/config.ts
 * Environment -> validated, defaulted configuration.
 *
 * Every knob has a default in src/schema/config.schema.json; the environment
 * only overrides. Entry points load `.env` through `dotenv/config` before
 * calling loadConfig().
 */

import { ConfigError } from "./errors.js";
import { describeErrors, validateConfig } from "./schema/index.js";
import type { PricingRules } from "./pricing/formula.js";
import type { DepreciationParams } from "./market/depreciation.js";

export const PLATE_PROVIDER_NAMES = ["index", "ai-search", "patentechile", "volanteomaleta"] as const;
export const PRICE_PROVIDER_NAMES = ["ai-valuation", "autofact", "autofact-simple", "mercadolibre", "chileautos"] as const;

export type PlateProviderName = (typeof PLATE_PROVIDER_NAMES)[number];
export type PriceProviderName = (typeof PRICE_PROVIDER_NAMES)[number];

export interface AppConfig {
  server: {
    port: number;
    apiPrefix: string;
    rateLimitPerMinute: number;
  };
  providers: {
    /** Priority order; the first entry is tried first. */
    plate: PlateProviderName[];
    price: PriceProviderName[];
    timeoutMs: number;
    /** Per-provider overrides of timeoutMs. */
    timeouts: Record<string, number>;
  };
  market: {
    priceMin: number;
    priceMax: number;
    yearTolerance: number;
    region: string;
    /** Substrings a citation URI must contain to be kept. */
    sourceDomains: string[];
  };
  depreciation: DepreciationParams;
  pricing: PricingRules;
  quota: {
    dailyLimit: number;
    timeZone: string;
  };
  plateIndex: {
    file?: string;
  };
  ai: {
    apiKey?: string;
    baseUrl: string;
    model: string;
  };
  browser: {
    wsEndpoint?: string;
  };
  pageFetcher: "http" | "browser";
  supabase: {
    url?: string;
    key?: string;
  };
}

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function list(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/** "ai-valuation=45000,autofact=10000" -> { "ai-valuation": "45000", autofact: "10000" } */
function pairs(value: string | undefined): Record<string, string> | undefined {
  const entries = list(value);
  if (!entries) return undefined;
  const out: Record<string, string> = {};
  for (const entry of entries) {
    const [name, ms] = entry.split("=").map((s) => s.trim());
    if (!name || !ms) throw new ConfigError(`PROVIDER_TIMEOUTS: expected name=ms, got "${entry}"`);
    out[name] = ms;
  }
  return out;
}

function defined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, v]) => v !== undefined));
}

export function loadConfig(env: Env = process.env): AppConfig {
  const get = (key: string) => read(env, key);

  const raw: Record<string, unknown> = {
    server: defined({
      port: get("PORT"),
      apiPrefix: get("API_PREFIX"),
      rateLimitPerMinute: get("RATE_LIMIT_PER_MINUTE"),
    }),
    providers: defined({
      plate: list(get("PLATE_PROVIDERS")),
      price: list(get("PRICE_PROVIDERS")),
      timeoutMs: get("PROVIDER_TIMEOUT_MS"),
      timeouts: pairs(get("PROVIDER_TIMEOUTS")),
    }),
    market: defined({
      priceMin: get("PRICE_MIN"),
      priceMax: get("PRICE_MAX"),
      yearTolerance: get("YEAR_TOLERANCE"),
      region: get("MARKET_REGION"),
      sourceDomains: list(get("MARKET_SOURCE_DOMAINS")),
    }),
    depreciation: defined({
      basePrice: get("DEPRECIATION_BASE_PRICE"),
      decayRate: get("DEPRECIATION_DECAY_RATE"),
      floorPrice: get("DEPRECIATION_FLOOR_PRICE"),
    }),
    pricing: defined({
      purchaseMultiplier: get("PURCHASE_MULTIPLIER"),
      roundingStep: get("OFFER_ROUNDING_STEP"),
      consignmentThreshold: get("CONSIGNMENT_THRESHOLD"),
      commissionRate: get("COMMISSION_RATE"),
      commissionTaxRate: get("COMMISSION_TAX_RATE"),
      fixedFee: get("CONSIGNMENT_FIXED_FEE"),
    }),
    quota: defined({
      dailyLimit: get("DAILY_QUOTA_LIMIT"),
      timeZone: get("QUOTA_TIMEZONE"),
    }),
    plateIndex: defined({ file: get("PLATE_INDEX_FILE") }),
    ai: defined({
      apiKey: get("AI_API_KEY"),
      baseUrl: get("AI_BASE_URL"),
      model: get("AI_MODEL"),
    }),
    browser: defined({ wsEndpoint: get("BROWSER_WS_ENDPOINT") }),
    supabase: defined({
      url: get("SUPABASE_URL"),
      key: get("SUPABASE_KEY"),
    }),
  };
  const fetcher = get("PAGE_FETCHER");
  if (fetcher) raw.pageFetcher = fetcher;

  if (!validateConfig(raw)) {
    throw new ConfigError(`Invalid configuration: ${describeErrors(validateConfig.errors)}`);
  }
  if (raw.market.priceMin > raw.market.priceMax) {
    throw new ConfigError("Invalid configuration: PRICE_MIN is above PRICE_MAX");
  }
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: raw.quota.timeZone });
  } catch {
    throw new ConfigError(`Invalid configuration: QUOTA_TIMEZONE "${raw.quota.timeZone}" is not a known time zone`);
  }
  return raw;
}

export function timeoutFor(config: AppConfig, provider: string): number {
  return config.providers.timeouts[provider] ?? config.providers.timeoutMs;
}
