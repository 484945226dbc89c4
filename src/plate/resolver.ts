/**
 * src/plate/resolver.ts
 * Plate -> vehicle record through an ordered list of providers.
 *
 * Providers are tried strictly in order, each once, each under its own
 * timeout. The first found record wins as-is; records are never merged.
 * A total failure is a `found: false` record, never a rejection.
 */

import { toFailure } from "../errors.js";
import { createLogger, type Logger } from "../server/logger.js";
import { abortReason, withTimeout } from "../utils/timeout.js";
import type { ProviderFailure, VehicleRecord } from "../types/valuation.js";
import { isValidPlate, normalizePlate } from "./plate.js";

export interface PlateProvider {
  readonly name: string;
  /**
   * Resolve an already normalized plate. Either return a record (found or
   * not) or throw: NotFoundError for a definitive miss, anything else for a
   * fault.
   */
  lookup(plate: string, signal: AbortSignal): Promise<VehicleRecord>;
}

export interface ResolverTimeouts {
  timeoutMs: number;
  /** Per-provider overrides, keyed by provider name. */
  timeouts?: Record<string, number>;
}

export interface PlateResolverOptions extends ResolverTimeouts {
  logger?: Logger;
}

export class PlateResolver {
  private readonly log: Logger;

  constructor(
    private readonly providers: readonly PlateProvider[],
    private readonly opts: PlateResolverOptions,
  ) {
    this.log = opts.logger ?? createLogger("plate");
  }

  get providerNames(): string[] {
    return this.providers.map((p) => p.name);
  }

  async resolve(rawPlate: string, signal?: AbortSignal): Promise<VehicleRecord> {
    const plate = normalizePlate(rawPlate);
    if (!isValidPlate(plate)) {
      return {
        plate,
        found: false,
        errorCode: "invalid_input",
        errorReason: `Invalid plate "${rawPlate}": expected 4 to 8 letters or digits`,
      };
    }
    if (this.providers.length === 0) {
      return { plate, found: false, errorCode: "provider_unavailable", errorReason: "No plate provider configured" };
    }

    const failures: ProviderFailure[] = [];

    for (const provider of this.providers) {
      if (signal?.aborted) {
        failures.push(toFailure(provider.name, abortReason(signal)));
        break;
      }

      const timeoutMs = this.opts.timeouts?.[provider.name] ?? this.opts.timeoutMs;
      try {
        const record = await withTimeout((s) => provider.lookup(plate, s), timeoutMs, signal);
        if (record.found) {
          this.log.info("Plate resolved", { plate, source: provider.name });
          return { ...record, plate, sourceName: provider.name };
        }
        failures.push({
          source: provider.name,
          code: record.errorCode ?? "not_found",
          reason: record.errorReason ?? "not found",
        });
      } catch (err) {
        const failure = toFailure(provider.name, err);
        failures.push(failure);
        if (signal?.aborted) break;
        this.log.warn("Plate provider failed", { plate, ...failure });
      }
    }

    const last = failures[failures.length - 1];
    this.log.info("Plate not resolved", { plate, attempts: failures.length, code: last.code });
    return { plate, found: false, errorCode: last.code, errorReason: last.reason, failures };
  }
}
