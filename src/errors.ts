import type { ErrorCode } from "./types/valuation.js";

export class ValuationError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The provider answered definitively: nothing registered under this key. */
export class NotFoundError extends ValuationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("not_found", message, options);
  }
}

/** Network failure, timeout or a reply we could not parse. Triggers the next provider. */
export class ProviderUnavailableError extends ValuationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("provider_unavailable", message, options);
  }
}

export class ProviderTimeoutError extends ProviderUnavailableError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class InvalidInputError extends ValuationError {
  constructor(message: string) {
    super("invalid_input", message);
  }
}

export class QuotaExceededError extends ValuationError {
  readonly limit: number;

  constructor(limit: number) {
    super("quota_exceeded", `Daily valuation limit of ${limit} reached. Try again tomorrow.`);
    this.limit = limit;
  }
}

export class InfrastructureDegradedError extends ValuationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("infrastructure_degraded", message, options);
  }
}

export class CancelledError extends ValuationError {
  constructor(message = "request cancelled") {
    super("cancelled", message);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Map anything a provider threw onto the taxonomy; unknown faults count as unavailability. */
export function toFailure(source: string, error: unknown): { source: string; code: ErrorCode; reason: string } {
  if (error instanceof ValuationError) {
    return { source, code: error.code, reason: error.message };
  }
  if (isAbortError(error)) {
    return { source, code: "cancelled", reason: errorMessage(error) };
  }
  return { source, code: "provider_unavailable", reason: errorMessage(error) };
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}
