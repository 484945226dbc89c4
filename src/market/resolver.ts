/**
 * src/market/resolver.ts
 * Vehicle -> market price estimate.
 *
 * Providers are asked in priority order and the first one with a plausible
 * price settles the estimate; later providers are not consulted. A provider
 * that throws, times out or returns garbage counts as "no prices". When no
 * provider has anything, the depreciation model answers.
 */

import { errorMessage, toFailure } from "../errors.js";
import { DEFAULT_PRICE_BAND, isPlausible } from "../extract/money.js";
import { createLogger, type Logger } from "../server/logger.js";
import { abortReason, withTimeout } from "../utils/timeout.js";
import type { ResolverTimeouts } from "../plate/resolver.js";
import type {
  PriceBand,
  PriceCandidate,
  PriceEstimate,
  PriceObservation,
  PriceQuery,
} from "../types/valuation.js";
import { DEFAULT_DEPRECIATION, depreciationEstimate, parseYear, type DepreciationParams } from "./depreciation.js";

export interface PriceProvider {
  readonly name: string;
  /** Candidates carry a model year and are filtered by distance to the queried year. */
  readonly yearTagged: boolean;
  collect(query: PriceQuery, signal: AbortSignal): Promise<PriceObservation>;
}

export interface MarketPriceResolverOptions extends ResolverTimeouts {
  band?: PriceBand;
  yearTolerance?: number;
  depreciation?: DepreciationParams;
  currentYear?: () => number;
  logger?: Logger;
}

export class MarketPriceResolver {
  private readonly band: PriceBand;
  private readonly yearTolerance: number;
  private readonly depreciation: DepreciationParams;
  private readonly currentYear: () => number;
  private readonly log: Logger;

  constructor(
    private readonly providers: readonly PriceProvider[],
    private readonly opts: MarketPriceResolverOptions,
  ) {
    this.band = opts.band ?? DEFAULT_PRICE_BAND;
    this.yearTolerance = opts.yearTolerance ?? 2;
    this.depreciation = opts.depreciation ?? DEFAULT_DEPRECIATION;
    this.currentYear = opts.currentYear ?? (() => new Date().getFullYear());
    this.log = opts.logger ?? createLogger("market");
  }

  get providerNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  /** Resolves to an estimate in every case except caller cancellation, which rejects. */
  async resolve(query: PriceQuery, signal?: AbortSignal): Promise<PriceEstimate> {
    const vehicleYear = parseYear(query.year);
    const label = `${query.make} ${query.model} ${query.year}`;

    for (const provider of this.providers) {
      if (signal?.aborted) throw abortReason(signal);

      const timeoutMs = this.opts.timeouts?.[provider.name] ?? this.opts.timeoutMs;
      let observation: PriceObservation;
      try {
        observation = await withTimeout((s) => provider.collect(query, s), timeoutMs, signal);
      } catch (err) {
        if (signal?.aborted) throw abortReason(signal);
        this.log.warn("Price provider failed", { vehicle: label, ...toFailure(provider.name, err) });
        continue;
      }

      let estimate: PriceEstimate | undefined;
      try {
        estimate = this.aggregate(provider, observation, vehicleYear);
      } catch (err) {
        this.log.warn("Price provider returned unusable data", { vehicle: label, source: provider.name, error: errorMessage(err) });
        continue;
      }
      if (estimate) {
        this.log.info("Market price resolved", {
          vehicle: label,
          source: provider.name,
          averagePrice: estimate.averagePrice,
          listings: estimate.numListings,
        });
        return estimate;
      }
      this.log.info("No plausible prices", { vehicle: label, source: provider.name });
    }

    const fallback = depreciationEstimate(query.year, this.depreciation, this.currentYear());
    this.log.info("Using depreciation estimate", { vehicle: label, averagePrice: fallback.averagePrice });
    return fallback;
  }

  /** Plausible, year-compatible, distinct amounts in first-seen order. */
  filterCandidates(provider: PriceProvider, candidates: readonly PriceCandidate[], vehicleYear?: number): number[] {
    const seen = new Set<number>();
    for (const c of candidates) {
      if (!isPlausible(c.amount, this.band)) continue;
      if (provider.yearTagged && vehicleYear !== undefined) {
        if (c.year === undefined || Math.abs(c.year - vehicleYear) > this.yearTolerance) continue;
      }
      seen.add(c.amount);
    }
    return [...seen];
  }

  private aggregate(
    provider: PriceProvider,
    observation: PriceObservation,
    vehicleYear: number | undefined,
  ): PriceEstimate | undefined {
    const amounts = this.filterCandidates(provider, observation.candidates, vehicleYear);
    const reported = observation.reported;

    let averagePrice: number;
    let minPrice: number;
    let maxPrice: number;

    if (reported && isPlausible(reported.averagePrice, this.band)) {
      averagePrice = reported.averagePrice;
      const low = reported.minPrice ?? (amounts.length ? Math.min(...amounts) : averagePrice);
      const high = reported.maxPrice ?? (amounts.length ? Math.max(...amounts) : averagePrice);
      minPrice = Math.min(low, averagePrice);
      maxPrice = Math.max(high, averagePrice);
    } else if (amounts.length > 0) {
      averagePrice = Math.trunc(amounts.reduce((sum, a) => sum + a, 0) / amounts.length);
      minPrice = Math.min(...amounts);
      maxPrice = Math.max(...amounts);
    } else {
      return undefined;
    }

    const estimate: PriceEstimate = {
      averagePrice,
      minPrice,
      maxPrice,
      numListings: amounts.length,
      sourceName: provider.name,
      estimated: false,
    };
    if (observation.sources?.length) estimate.sources = observation.sources;
    if (observation.listings?.length) estimate.listings = observation.listings;
    if (observation.analysis) estimate.analysis = observation.analysis;
    if (observation.confidence !== undefined) estimate.confidence = observation.confidence;
    return estimate;
  }
}
