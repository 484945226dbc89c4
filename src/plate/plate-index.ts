/**
 * src/plate/plate-index.ts
 * Exact-match plate lookups against a prebuilt index.
 *
 * An index is built once (see index-builder.ts) and only read afterwards.
 * Loading is explicit: construct it at startup and hand it to the provider.
 */

import fs from "node:fs/promises";
import type { SupabaseClient } from "@supabase/supabase-js";
import { InfrastructureDegradedError } from "../errors.js";
import { describeErrors, validatePlateIndexFile } from "../schema/index.js";

export interface PlateIndexEntry {
  make?: string;
  model?: string;
  year?: string;
}

export interface PlateIndexFile {
  builtAt: string;
  sources?: string[];
  entries: Record<string, PlateIndexEntry>;
}

export interface PlateIndex {
  readonly name: string;
  get(plate: string, signal?: AbortSignal): Promise<PlateIndexEntry | undefined>;
}

export class InMemoryPlateIndex implements PlateIndex {
  readonly name = "memory";
  private readonly entries: ReadonlyMap<string, Readonly<PlateIndexEntry>>;

  constructor(entries: Record<string, PlateIndexEntry> | Map<string, PlateIndexEntry>) {
    const pairs = entries instanceof Map ? [...entries] : Object.entries(entries);
    this.entries = new Map(pairs.map(([plate, entry]) => [plate, Object.freeze({ ...entry })]));
  }

  static async fromFile(file: string): Promise<InMemoryPlateIndex> {
    const json: unknown = JSON.parse(await fs.readFile(file, "utf8"));
    if (!validatePlateIndexFile(json)) {
      throw new Error(`${file} is not a plate index: ${describeErrors(validatePlateIndexFile.errors)}`);
    }
    return new InMemoryPlateIndex(json.entries);
  }

  get size(): number {
    return this.entries.size;
  }

  async get(plate: string): Promise<PlateIndexEntry | undefined> {
    return this.entries.get(plate);
  }
}

/** The `vehicles` table, keyed by `plate`. */
export class SupabasePlateIndex implements PlateIndex {
  readonly name = "supabase";

  constructor(private readonly client: SupabaseClient, private readonly table = "vehicles") {}

  async get(plate: string, signal?: AbortSignal): Promise<PlateIndexEntry | undefined> {
    let query = this.client.from(this.table).select("make, model, year").eq("plate", plate);
    if (signal) query = query.abortSignal(signal);
    const { data, error } = await query.maybeSingle();

    if (error) throw new InfrastructureDegradedError(`vehicle lookup failed: ${error.message}`, { cause: error });
    const row: unknown = data;
    if (!row || typeof row !== "object") return undefined;

    const entry: PlateIndexEntry = {};
    if ("make" in row && typeof row.make === "string") entry.make = row.make;
    if ("model" in row && typeof row.model === "string") entry.model = row.model;
    if ("year" in row && (typeof row.year === "number" || typeof row.year === "string")) entry.year = String(row.year);
    return entry;
  }
}
