/**
 * src/pricing/formula.ts
 * Market price -> immediate purchase offer and consignment liquidation.
 *
 * Pure and deterministic: same price and rules, same numbers. Invalid input
 * comes back as `{ success: false }`, this module never throws.
 */

import type { ConsignmentTier, Offer } from "../types/valuation.js";

export interface PricingRules {
  /** Share of the market price offered for an immediate purchase. */
  purchaseMultiplier: number;
  /** Immediate offers are rounded to a multiple of this. */
  roundingStep: number;
  /** Prices strictly above this pay a commission, the rest a fixed fee. */
  consignmentThreshold: number;
  commissionRate: number;
  /** VAT charged on top of the commission. */
  commissionTaxRate: number;
  fixedFee: number;
}

export const DEFAULT_PRICING_RULES: PricingRules = {
  purchaseMultiplier: 0.52,
  roundingStep: 100_000,
  consignmentThreshold: 8_000_000,
  commissionRate: 0.045,
  commissionTaxRate: 0.19,
  fixedFee: 428_400,
};

export interface PricingDetails {
  purchaseMultiplier: number;
  consignmentThreshold: number;
  /** Commission including tax, only for PERCENTAGE_BASED. */
  commissionRate: number | null;
  /** Only for FIXED_FEE. */
  fixedFee: number | null;
}

export type PricingResult =
  | { success: true; offer: Offer; details: PricingDetails }
  | { success: false; error: string };

const PARTS = 100_000;

/** Round to the nearest multiple of `step`, halves away from zero. */
export function roundToNearest(value: number, step: number): number {
  if (step <= 0) return value;
  return Math.sign(value) * Math.round(Math.abs(value) / step) * step;
}

/**
 * Commission with tax, in parts per 100,000 (4.5% + 19% VAT -> 5355).
 * Working in whole parts keeps `floor(price * retention)` free of binary
 * fraction drift.
 */
export function commissionParts(rules: PricingRules): number {
  return Math.round(rules.commissionRate * (1 + rules.commissionTaxRate) * PARTS);
}

export function consignmentTier(marketPrice: number, rules: PricingRules = DEFAULT_PRICING_RULES): ConsignmentTier {
  return marketPrice > rules.consignmentThreshold ? "PERCENTAGE_BASED" : "FIXED_FEE";
}

export function immediateOffer(marketPrice: number, rules: PricingRules = DEFAULT_PRICING_RULES): number {
  return roundToNearest(marketPrice * rules.purchaseMultiplier, rules.roundingStep);
}

export function consignmentLiquidation(marketPrice: number, rules: PricingRules = DEFAULT_PRICING_RULES): number {
  if (consignmentTier(marketPrice, rules) === "PERCENTAGE_BASED") {
    const retained = PARTS - commissionParts(rules);
    return Math.floor((marketPrice * retained) / PARTS);
  }
  return Math.max(0, Math.floor(marketPrice - rules.fixedFee));
}

function isValidPrice(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

export function computeOffer(
  marketPrice: number | null | undefined,
  rules: PricingRules = DEFAULT_PRICING_RULES,
): PricingResult {
  if (!isValidPrice(marketPrice)) {
    return { success: false, error: "Invalid market price" };
  }

  const tier = consignmentTier(marketPrice, rules);
  return {
    success: true,
    offer: {
      marketPrice: Math.trunc(marketPrice),
      immediateOffer: immediateOffer(marketPrice, rules),
      consignmentLiquidation: consignmentLiquidation(marketPrice, rules),
      consignmentTier: tier,
    },
    details: {
      purchaseMultiplier: rules.purchaseMultiplier,
      consignmentThreshold: rules.consignmentThreshold,
      commissionRate: tier === "PERCENTAGE_BASED" ? commissionParts(rules) / PARTS : null,
      fixedFee: tier === "FIXED_FEE" ? rules.fixedFee : null,
    },
  };
}
