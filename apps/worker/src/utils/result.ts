export type ErrorKind =
  | "upstream"
  | "ambiguous_resolution"
  | "threshold_miss"
  | "malformed_market"
  | "store_unavailable";

export class EngineError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
    this.kind = kind;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: EngineError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(kind: ErrorKind, message: string, cause?: unknown): Result<T> {
  return { ok: false, error: new EngineError(kind, message, cause === undefined ? undefined : { cause }) };
}

export function toEngineError(kind: ErrorKind, error: unknown, message?: string): EngineError {
  if (error instanceof EngineError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new EngineError(kind, message ? `${message}: ${detail}` : detail, { cause: error });
}

/** Only a store that cannot be read or written at all fails the whole run. */
export function isFatal(error: EngineError): boolean {
  return error.kind === "store_unavailable";
}

export const STORE_OUTAGE_MIN_FAILURES = 3;

/**
 * A pass escalates to `store_unavailable` only when writes kept failing and
 * none went through. A single bad row stays a per-record failure.
 */
export function isStoreOutage(failed: number, succeeded: number): boolean {
  return failed >= STORE_OUTAGE_MIN_FAILURES && succeeded === 0;
}
