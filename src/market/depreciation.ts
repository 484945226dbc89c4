import type { PriceEstimate } from "../types/valuation.js";

export interface DepreciationParams {
  basePrice: number;
  /** Value kept per year of age (0.88 = 12% a year). */
  decayRate: number;
  floorPrice: number;
}

export const DEFAULT_DEPRECIATION: DepreciationParams = {
  basePrice: 8_000_000,
  decayRate: 0.88,
  floorPrice: 1_500_000,
};

export const DEPRECIATION_SOURCE = "depreciation-model";

export function parseYear(year: string | number | undefined): number | undefined {
  if (typeof year === "number") return Number.isInteger(year) ? year : undefined;
  const trimmed = (year ?? "").trim();
  return /^\d{4}$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/**
 * max(floor, base * decay^age), rounded to whole currency units. Future
 * model years count as new; an unknown year gets the floor.
 */
export function depreciatedPrice(
  year: string | number | undefined,
  params: DepreciationParams = DEFAULT_DEPRECIATION,
  currentYear: number = new Date().getFullYear(),
): number {
  const vehicleYear = parseYear(year);
  if (vehicleYear === undefined) return Math.round(params.floorPrice);
  const age = Math.max(0, currentYear - vehicleYear);
  return Math.round(Math.max(params.floorPrice, params.basePrice * params.decayRate ** age));
}

export function depreciationEstimate(
  year: string | number | undefined,
  params: DepreciationParams = DEFAULT_DEPRECIATION,
  currentYear?: number,
): PriceEstimate {
  const price = depreciatedPrice(year, params, currentYear);
  return {
    averagePrice: price,
    minPrice: price,
    maxPrice: price,
    numListings: 0,
    sourceName: DEPRECIATION_SOURCE,
    estimated: true,
  };
}
