/**
 * src/quota/gate.ts
 * Daily ceiling on priced valuations.
 *
 * Fails closed when the ceiling is reached and open when the counter store
 * is unreachable. Read-then-write without a transaction, so two concurrent
 * requests can both pass at the boundary: a soft limit.
 */

import { QuotaExceededError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../server/logger.js";
import type { CounterStore } from "./stores.js";

export interface QuotaAdmission {
  day: string;
  /** Count after this admission; undefined when the store could not be read. */
  count?: number;
  limit: number;
  /** The store failed and the request was let through anyway. */
  degraded: boolean;
}

export interface QuotaGateOptions {
  limit: number;
  timeZone?: string;
  now?: () => Date;
  logger?: Logger;
}

/** Calendar day `YYYY-MM-DD` of `date` in `timeZone`. */
export function dayKey(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
  return `${get("year")}-${get("month")}-${get("day")}`;
}

export class QuotaGate {
  private readonly limit: number;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly store: CounterStore, opts: QuotaGateOptions) {
    this.limit = opts.limit;
    this.timeZone = opts.timeZone ?? "America/Santiago";
    this.now = opts.now ?? (() => new Date());
    this.log = opts.logger ?? createLogger("quota");
  }

  today(): string {
    return dayKey(this.now(), this.timeZone);
  }

  /** Count one valuation against today's ceiling. Throws QuotaExceededError at the limit. */
  async checkAndAdmit(): Promise<QuotaAdmission> {
    const day = this.today();

    let current: number | undefined;
    try {
      current = await this.store.get(day);
    } catch (err) {
      return this.degraded(day, err);
    }

    const count = current ?? 0;
    if (count >= this.limit) {
      this.log.warn("Daily limit reached", { day, count, limit: this.limit });
      throw new QuotaExceededError(this.limit);
    }

    try {
      if (current === undefined) {
        this.log.info("Starting daily usage counter", { day, store: this.store.name });
        await this.store.create(day, 1);
      } else {
        await this.store.set(day, count + 1);
      }
    } catch (err) {
      return this.degraded(day, err);
    }

    this.log.debug("Daily usage", { day, count: count + 1, limit: this.limit });
    return { day, count: count + 1, limit: this.limit, degraded: false };
  }

  private degraded(day: string, err: unknown): QuotaAdmission {
    this.log.warn("Quota store unavailable, admitting request", {
      day,
      store: this.store.name,
      error: errorMessage(err),
    });
    return { day, limit: this.limit, degraded: true };
  }
}
