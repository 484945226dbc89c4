/**
 * src/engine/valuation-engine.ts
 * Plate lookup and priced valuation behind one object.
 *
 * Both entry points resolve to a structured result; nothing here rejects.
 */

import { QuotaExceededError, ValuationError, errorMessage, isAbortError } from "../errors.js";
import { computeOffer, DEFAULT_PRICING_RULES, type PricingDetails, type PricingRules } from "../pricing/formula.js";
import { createLogger, type Logger } from "../server/logger.js";
import type { MarketPriceResolver } from "../market/resolver.js";
import type { PlateResolver } from "../plate/resolver.js";
import type { QuotaAdmission, QuotaGate } from "../quota/gate.js";
import type { ErrorCode, Offer, PriceEstimate, PriceQuery, VehicleRecord } from "../types/valuation.js";

export interface ValuationRequest {
  make?: string;
  model?: string;
  year?: string | number;
  trim?: string;
  mileage?: string | number;
  region?: string;
  /** Looked up first when make, model or year are missing. */
  plate?: string;
}

export type ValuationOutcome =
  | {
      success: true;
      vehicle: PriceQuery;
      plate?: VehicleRecord;
      estimate: PriceEstimate;
      offer: Offer;
      details: PricingDetails;
      quota: QuotaAdmission;
    }
  | {
      success: false;
      code: ErrorCode;
      error: string;
      plate?: VehicleRecord;
      estimate?: PriceEstimate;
    };

export interface ValuationEngineDeps {
  plates: PlateResolver;
  market: MarketPriceResolver;
  quota: QuotaGate;
  pricing?: PricingRules;
  logger?: Logger;
  /** Released by close(): browser sessions and the like. */
  resources?: Array<{ close(): Promise<void> }>;
}

type Failure = Extract<ValuationOutcome, { success: false }>;

const fail = (code: ErrorCode, error: string, extra: Partial<Failure> = {}): Failure => ({
  ...extra,
  success: false,
  code,
  error,
});

function text(value: string | number | undefined): string | undefined {
  if (value === undefined) return undefined;
  const s = String(value).trim();
  return s ? s : undefined;
}

/** Fields as given, or an error message. Missing fields are allowed here; the caller checks completeness. */
function readRequest(req: ValuationRequest): { fields: Partial<PriceQuery> } | { error: string } {
  const fields: Partial<PriceQuery> = {
    make: text(req.make),
    model: text(req.model),
    year: text(req.year),
    trim: text(req.trim),
    region: text(req.region),
  };

  if (fields.year !== undefined && !/^\d{4}$/.test(fields.year)) {
    return { error: `year must be a four-digit number, got "${fields.year}"` };
  }

  const mileage = text(req.mileage);
  if (mileage !== undefined) {
    const km = Number(mileage.replace(/[.,\s]/g, ""));
    if (!Number.isFinite(km) || km < 0) return { error: `mileage must be a non-negative number, got "${mileage}"` };
    fields.mileage = km;
  }
  return { fields };
}

export class ValuationEngine {
  private readonly log: Logger;
  private readonly pricing: PricingRules;

  constructor(private readonly deps: ValuationEngineDeps) {
    this.log = deps.logger ?? createLogger("engine");
    this.pricing = deps.pricing ?? DEFAULT_PRICING_RULES;
  }

  async resolvePlate(plate: string, signal?: AbortSignal): Promise<VehicleRecord> {
    try {
      return await this.deps.plates.resolve(plate, signal);
    } catch (err) {
      this.log.error("Plate resolution failed unexpectedly", { plate, error: err });
      return { plate, found: false, errorCode: "provider_unavailable", errorReason: errorMessage(err) };
    }
  }

  async resolveValuation(req: ValuationRequest, signal?: AbortSignal): Promise<ValuationOutcome> {
    const read = readRequest(req);
    if ("error" in read) return fail("invalid_input", read.error);
    const given = read.fields;

    const plate = text(req.plate);
    const complete = Boolean(given.make && given.model && given.year);
    if (!complete && !plate) {
      return fail("invalid_input", "Missing required parameters: make, model, year");
    }

    let quota: QuotaAdmission;
    try {
      quota = await this.deps.quota.checkAndAdmit();
    } catch (err) {
      if (err instanceof QuotaExceededError) return fail("quota_exceeded", err.message);
      this.log.error("Quota check failed unexpectedly", { error: err });
      return fail("infrastructure_degraded", errorMessage(err));
    }

    let record: VehicleRecord | undefined;
    if (!complete && plate) {
      record = await this.resolvePlate(plate, signal);
      if (!record.found) {
        return fail(record.errorCode ?? "not_found", record.errorReason ?? "Vehicle not found", { plate: record });
      }
    }

    const vehicle: PriceQuery = {
      make: given.make ?? record?.make ?? "",
      model: given.model ?? record?.model ?? "",
      year: given.year ?? record?.year ?? "",
      trim: given.trim,
      mileage: given.mileage,
      region: given.region,
    };
    if (!vehicle.make || !vehicle.model || !/^\d{4}$/.test(vehicle.year)) {
      return fail("invalid_input", "The plate record lacks make, model or year", { plate: record });
    }

    let estimate: PriceEstimate;
    try {
      estimate = await this.deps.market.resolve(vehicle, signal);
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) return fail("cancelled", errorMessage(err), { plate: record });
      if (err instanceof ValuationError) return fail(err.code, err.message, { plate: record });
      this.log.error("Market price resolution failed unexpectedly", { error: err });
      return fail("provider_unavailable", errorMessage(err), { plate: record });
    }

    const priced = computeOffer(estimate.averagePrice, this.pricing);
    if (!priced.success) {
      return fail("provider_unavailable", "Could not determine a market price", { plate: record, estimate });
    }

    return {
      success: true,
      vehicle,
      ...(record ? { plate: record } : {}),
      estimate,
      offer: priced.offer,
      details: priced.details,
      quota,
    };
  }

  async close(): Promise<void> {
    await Promise.all((this.deps.resources ?? []).map((r) => r.close()));
  }
}
