/**
 * Error taxonomy and result values.
 *
 * Core operations never throw for runtime conditions: they return a
 * Result. Only caller contract violations (asserts) throw.
 */

export type ErrorCode =
  | "OutOfMemory"
  | "NotFound"
  | "Unsupported"
  | "InvalidArgument"
  | "Busy"
  | "Io"
  | "Driver";

export class MixerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MixerError";
    this.code = code;
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: MixerError };

export const OK: Result<void> = { ok: true, value: undefined };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(code: ErrorCode, message: string, cause?: unknown): Result<never> {
  return {
    ok: false,
    error: new MixerError(code, message, cause === undefined ? undefined : { cause }),
  };
}

/** Wrap an existing error (e.g. one returned by a callback) as a failed result. */
export function failWith(error: MixerError): Result<never> {
  return { ok: false, error };
}

/**
 * Convert an exception raised by user code (a comparator, an imported
 * backend module) into an error value. RangeError is what the runtime
 * raises when an array cannot grow, so it maps to OutOfMemory.
 */
export function errorFromException(err: unknown, context: string): MixerError {
  if (err instanceof MixerError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  const code: ErrorCode = err instanceof RangeError ? "OutOfMemory" : "InvalidArgument";
  return new MixerError(code, `${context}: ${msg}`, { cause: err });
}

/**
 * Unwrap a result for the tool layer, which reports failures by throwing.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
