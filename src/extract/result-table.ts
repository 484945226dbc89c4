/**
 * src/extract/result-table.ts
 * Read a two-column label/value results table (plate lookup sites) into
 * vehicle fields.
 */

import * as cheerio from "cheerio";
import type { VehicleFields } from "../types/valuation.js";

type FieldName = keyof VehicleFields;

// Order matters: the first matching field claims the row.
const LABELS: Array<[FieldName, string[]]> = [
  ["make", ["marca"]],
  ["model", ["modelo"]],
  ["year", ["año"]],
  ["ownerId", ["rut"]],
  ["ownerName", ["nombre", "propietario"]],
];

export interface ResultTableOptions {
  /** CSS selector of the table; the first table on the page by default. */
  tableSelector?: string;
  /**
   * Take the year only inside the section whose header contains
   * `vehicleSectionKeyword`. Some sites repeat "Año" in a payment history
   * section further down.
   */
  sectionAware?: boolean;
  vehicleSectionKeyword?: string;
}

function cleanText(text: string): string {
  return text.replace(/\u00a0/g, " ").replace(/\s+/g, " ").trim();
}

function matchLabel(label: string): FieldName | undefined {
  for (const [field, keywords] of LABELS) {
    if (keywords.some((k) => label.includes(k))) return field;
  }
  return undefined;
}

export function extractYear(value: string): string | undefined {
  return value.match(/\b(?:19|20)\d{2}\b/)?.[0];
}

export function parseResultTable(html: string, opts: ResultTableOptions = {}): Partial<VehicleFields> {
  const $ = cheerio.load(html || "");
  const table = $(opts.tableSelector ?? "table").first();
  const out: Partial<VehicleFields> = {};
  if (!table.length) return out;

  const sectionKeyword = (opts.vehicleSectionKeyword ?? "vehicular").toLowerCase();
  let inVehicleSection = false;

  table.find("tr").each((_, row) => {
    const cells = $(row).children("td");

    if (cells.length === 1 && cells.first().attr("colspan") !== undefined) {
      inVehicleSection = cleanText(cells.first().text()).toLowerCase().includes(sectionKeyword);
      return;
    }
    if (cells.length < 2) return;

    const label = cleanText(cells.eq(0).text()).toLowerCase();
    const value = cleanText(cells.eq(1).text());
    const field = matchLabel(label);
    if (!field || !value || out[field] !== undefined) return;

    if (field === "year") {
      if (opts.sectionAware && !inVehicleSection) return;
      const year = extractYear(value);
      if (year) out.year = year;
      return;
    }
    out[field] = value;
  });

  return out;
}
