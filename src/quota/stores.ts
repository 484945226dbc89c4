/**
 * src/quota/stores.ts
 * Per-day usage counters behind the quota gate.
 */

import NodeCache from "node-cache";
import type { SupabaseClient } from "@supabase/supabase-js";
import { InfrastructureDegradedError } from "../errors.js";

export interface CounterStore {
  readonly name: string;
  /** Count recorded for `day`, or undefined when the day has no row yet. */
  get(day: string): Promise<number | undefined>;
  create(day: string, count: number): Promise<void>;
  set(day: string, count: number): Promise<void>;
}

const TWO_DAYS_S = 2 * 24 * 60 * 60;

/** Process-local counters; used when no shared store is configured. */
export class MemoryCounterStore implements CounterStore {
  readonly name = "memory";
  private readonly cache = new NodeCache({ stdTTL: TWO_DAYS_S, useClones: false });

  async get(day: string): Promise<number | undefined> {
    return this.cache.get<number>(day);
  }

  async create(day: string, count: number): Promise<void> {
    this.cache.set(day, count);
  }

  async set(day: string, count: number): Promise<void> {
    this.cache.set(day, count);
  }
}

/** Rows of `api_usage(date, count)`, one per day. */
export class SupabaseCounterStore implements CounterStore {
  readonly name = "supabase";

  constructor(private readonly client: SupabaseClient, private readonly table = "api_usage") {}

  async get(day: string): Promise<number | undefined> {
    const { data, error } = await this.client
      .from(this.table)
      .select("count")
      .eq("date", day)
      .maybeSingle();

    if (error) throw new InfrastructureDegradedError(`usage lookup failed: ${error.message}`, { cause: error });
    const row: unknown = data;
    if (!row || typeof row !== "object" || !("count" in row)) return undefined;
    return typeof row.count === "number" ? row.count : Number(row.count) || 0;
  }

  async create(day: string, count: number): Promise<void> {
    const { error } = await this.client.from(this.table).insert({ date: day, count });
    if (error) throw new InfrastructureDegradedError(`usage insert failed: ${error.message}`, { cause: error });
  }

  async set(day: string, count: number): Promise<void> {
    const { error } = await this.client.from(this.table).update({ count }).eq("date", day);
    if (error) throw new InfrastructureDegradedError(`usage update failed: ${error.message}`, { cause: error });
  }
}
