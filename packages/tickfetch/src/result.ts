/**
 * tickfetch/result
 *
 * Core Result primitives used by every operation that can fail.
 * Failures travel as values; only contract violations throw.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { ok: true; value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E, C = unknown> = { ok: false; error: E; cause?: C };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

/**
 * A Promise that resolves to a Result.
 */
export type AsyncResult<T, E = unknown, C = unknown> = Promise<Result<T, E, C>>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E, C = unknown>(
  error: E,
  options?: { cause?: C }
): Err<E, C> => {
  const result: Err<E, C> = { ok: false, error };
  if (options?.cause !== undefined) result.cause = options.cause;
  return result;
};

// =============================================================================
// Type Guards
// =============================================================================

export const isOk = <T, E, C>(r: Result<T, E, C>): r is Ok<T> => r.ok;

export const isErr = <T, E, C>(r: Result<T, E, C>): r is Err<E, C> => !r.ok;

// =============================================================================
// Unwrap Utilities
// =============================================================================

/**
 * Error thrown when `unwrap()` is called on an error Result.
 */
export class UnwrapError<E = unknown, C = unknown> extends Error {
  constructor(
    public readonly error: E,
    public readonly cause?: C
  ) {
    super(`Unwrap called on an error result: ${describe(error)}`);
    this.name = "UnwrapError";
  }
}

function describe(error: unknown): string {
  if (typeof error === "object" && error !== null && "_tag" in error) {
    return String(error._tag);
  }
  return String(error);
}

/**
 * Unwraps a Result, throwing an `UnwrapError` if it's a failure.
 *
 * @remarks When to use: only at boundaries (setup code, tests) where a
 * failure should halt the caller.
 *
 * @example
 * ```typescript
 * const scheduler = unwrap(AsyncScheduler.create(engine));
 * ```
 */
export const unwrap = <T, E, C>(r: Result<T, E, C>): T => {
  if (r.ok) return r.value;
  throw new UnwrapError<E, C>(r.error, r.cause);
};
