/**
 * src/extract/money.ts
 * Pull locally formatted currency amounts ("$12.490.000") out of free text.
 *
 * Numbers outside the plausibility band are dropped without complaint: on a
 * listing page they are phone numbers, ids, mileages or monthly instalments.
 */

import type { PriceBand } from "../types/valuation.js";

export const DEFAULT_PRICE_BAND: PriceBand = { min: 1_500_000, max: 100_000_000 };

export interface AmountOptions {
  band?: PriceBand;
  /** Thousands separator used by the market (es-CL writes 1.200.000). */
  groupSeparator?: "." | "," | " ";
  symbol?: string;
  /** When false, bare grouped numbers count too. */
  requireSymbol?: boolean;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function amountPattern(opts: AmountOptions): RegExp {
  const sep = escapeRegExp(opts.groupSeparator ?? ".");
  const symbol = escapeRegExp(opts.symbol ?? "$");
  const groups = `(\\d{1,3}(?:${sep}\\d{3})+)(?!\\d)`;
  return opts.requireSymbol === false
    ? new RegExp(`(?<![\\d.,])${groups}`, "g")
    : new RegExp(`${symbol}\\s*${groups}`, "g");
}

export function isPlausible(amount: number, band: PriceBand = DEFAULT_PRICE_BAND): boolean {
  return Number.isInteger(amount) && amount >= band.min && amount <= band.max;
}

/** Distinct plausible amounts, in the order they first appear. */
export function extractAmounts(text: string, opts: AmountOptions = {}): number[] {
  const band = opts.band ?? DEFAULT_PRICE_BAND;
  const seen = new Set<number>();
  for (const m of (text || "").matchAll(amountPattern(opts))) {
    const amount = Number.parseInt(m[1].replace(/\D/g, ""), 10);
    if (isPlausible(amount, band)) seen.add(amount);
  }
  return [...seen];
}

/**
 * A single amount from a value an AI reply put in a JSON field: either a
 * number or a string such as "$15.000.000", "15,000,000 CLP" or "15000000".
 * The band is not applied here.
 */
export function parseAmount(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? Math.round(value) : undefined;
  }
  if (typeof value !== "string") return undefined;
  const m = value.match(/\d[\d.,\s]*/);
  if (!m) return undefined;
  // a trailing ",dd" / ".dd" is a decimal part, everything else is grouping
  const token = m[0].trim().replace(/[.,]\d{1,2}$/, "");
  const digits = token.replace(/\D/g, "");
  if (!digits) return undefined;
  const amount = Number.parseInt(digits, 10);
  return amount > 0 ? amount : undefined;
}
