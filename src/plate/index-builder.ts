/**
 * src/plate/index-builder.ts
 * Build a plate index from registry exports.
 *
 * Exports are semicolon separated with the columns
 *   COD_PRT;PPU;COD_VEHICULO;COD_COMBUSTIBLE;COD_SERVICIO;MARCA;MODELO;ANO_FABRICACION
 * and carry their period in the file name (SGPRT_RB_oct-2025.csv). Files are
 * read oldest first so a plate seen again in a newer export takes the newer row.
 */

import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { createLogger } from "../server/logger.js";
import type { PlateIndexEntry, PlateIndexFile } from "./plate-index.js";
import { isValidPlate, normalizePlate } from "./plate.js";

const log = createLogger("index-builder");

const MONTHS: Record<string, number> = {
  ene: 1, feb: 2, mar: 3, abr: 4, may: 5, jun: 6,
  jul: 7, ago: 8, sep: 9, oct: 10, nov: 11, dic: 12,
};

const COL = { plate: 1, make: 5, model: 6, year: 7 } as const;

/** yyyymm from a "mmm-yyyy" tag in the file name; 0 when there is none (sorts first). */
export function periodKey(fileName: string): number {
  const m = path
    .basename(fileName)
    .toLowerCase()
    .match(/[_-](ene|feb|mar|abr|may|jun|jul|ago|sep|oct|nov|dic)[_-](\d{4})/);
  if (!m) return 0;
  return Number.parseInt(m[2], 10) * 100 + MONTHS[m[1]];
}

export function orderByPeriod(files: readonly string[]): string[] {
  return [...files].sort((a, b) => periodKey(a) - periodKey(b) || a.localeCompare(b));
}

function unquote(cell: string): string {
  const t = cell.trim();
  return t.length >= 2 && t.startsWith('"') && t.endsWith('"') ? t.slice(1, -1).replace(/""/g, '"').trim() : t;
}

/** One export row -> [plate, entry], or undefined for headers and unusable rows. */
export function parseRow(line: string): [string, PlateIndexEntry] | undefined {
  const cells = line.split(";").map(unquote);
  if (cells.length < 8) return undefined;

  const plate = normalizePlate(cells[COL.plate]);
  if (!isValidPlate(plate)) return undefined;

  const entry: PlateIndexEntry = {};
  if (cells[COL.make]) entry.make = cells[COL.make];
  if (cells[COL.model]) entry.model = cells[COL.model];
  const year = Number.parseInt(cells[COL.year], 10);
  if (year >= 1900 && year <= 2100) entry.year = String(year);
  return [plate, entry];
}

export interface BuildStats {
  files: number;
  rows: number;
  skipped: number;
  plates: number;
}

export async function buildPlateIndex(
  files: readonly string[],
  opts: { now?: () => Date } = {},
): Promise<{ index: PlateIndexFile; stats: BuildStats }> {
  const ordered = orderByPeriod(files);
  const entries = new Map<string, PlateIndexEntry>();
  const stats: BuildStats = { files: ordered.length, rows: 0, skipped: 0, plates: 0 };

  for (const file of ordered) {
    let rows = 0;
    const lines = readline.createInterface({ input: fs.createReadStream(file, "utf8"), crlfDelay: Infinity });
    for await (const line of lines) {
      if (!line.trim()) continue;
      const parsed = parseRow(line);
      if (!parsed) {
        stats.skipped++;
        continue;
      }
      entries.set(parsed[0], parsed[1]);
      rows++;
    }
    stats.rows += rows;
    log.info("Export loaded", { file: path.basename(file), rows, period: periodKey(file) });
  }

  stats.plates = entries.size;
  const builtAt = (opts.now ?? (() => new Date()))().toISOString();
  return {
    index: {
      builtAt,
      sources: ordered.map((f) => path.basename(f)),
      entries: Object.fromEntries(entries),
    },
    stats,
  };
}
