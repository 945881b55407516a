/**
 * iso-period/core
 *
 * Result primitives shared by every parsing entry point.
 * Parsing never throws for bad input: it returns a `Result` whose error side is a
 * tagged error value the caller can branch on.
 *
 * This module provides:
 * 1. `Result` type with `ok` / `err` constructors
 * 2. Type guards (`isOk`, `isErr`)
 * 3. Transformers for composing parse steps (`map`, `mapError`, `andThen`, `match`)
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful computation or a failed one.
 * Use this type to represent the outcome of an operation that might fail,
 * instead of throwing exceptions.
 *
 * @template T - The type of the success value
 * @template E - The type of the error value (defaults to unknown)
 */
export type Result<T, E = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 *
 * @example
 * ```typescript
 * function months(text: string): Result<bigint, "NOT_A_NUMBER"> {
 *   return /^\d+$/.test(text) ? ok(BigInt(text)) : err("NOT_A_NUMBER");
 * }
 * ```
 */
export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

/**
 * Creates a failed Result.
 *
 * @example
 * ```typescript
 * const r = err(new MissingPeriodMarkerError({ input: "1Y" }));
 * ```
 */
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a Result is successful, narrowing it so `r.value` is accessible.
 *
 * @example
 * ```typescript
 * const r = parse("P1Y");
 * if (isOk(r)) {
 *   console.log(r.value.years); // 1n
 * }
 * ```
 */
export const isOk = <T, E>(r: Result<T, E>): r is { ok: true; value: T } => r.ok;

/**
 * Checks if a Result is a failure, narrowing it so `r.error` is accessible.
 */
export const isErr = <T, E>(r: Result<T, E>): r is { ok: false; error: E } => !r.ok;

// =============================================================================
// Transformers
// =============================================================================

/**
 * Transforms the success value of a Result. Errors pass through unchanged.
 *
 * @example
 * ```typescript
 * const text = map(parse("P24M"), Period.format);
 * // text: { ok: true, value: "P2Y" }
 * ```
 */
export function map<T, U, E>(r: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return r.ok ? ok(fn(r.value)) : r;
}

/**
 * Transforms the error value of a Result. Success values pass through unchanged.
 *
 * @example
 * ```typescript
 * const tagOnly = mapError(parse("P"), (e) => e._tag);
 * // tagOnly: { ok: false, error: "NoFieldsMatchedError" }
 * ```
 */
export function mapError<T, E, F>(r: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return r.ok ? r : err(fn(r.error));
}

/**
 * Pattern matches on a Result, calling the appropriate handler.
 * Both handlers must return the same type.
 *
 * @example
 * ```typescript
 * const message = match(parse(input), {
 *   ok: (period) => `Parsed ${Period.format(period)}`,
 *   err: (error) => `Rejected: ${error.message}`,
 * });
 * ```
 */
export function match<T, E, R>(
  r: Result<T, E>,
  handlers: { ok: (value: T) => R; err: (error: E) => R }
): R {
  return r.ok ? handlers.ok(r.value) : handlers.err(r.error);
}

/**
 * Chains Results together (flatMap). If the first Result failed, `fn` never runs.
 *
 * The error union of the output is the union of both inputs' error types.
 *
 * @example
 * ```typescript
 * const positive = andThen(parse(input), (period) =>
 *   Period.isNegative(period) ? err("NEGATIVE" as const) : ok(period)
 * );
 * // positive.error: PeriodParseError | "NEGATIVE"
 * ```
 */
export function andThen<T, U, E, F>(
  r: Result<T, E>,
  fn: (value: T) => Result<U, F>
): Result<U, E | F> {
  return r.ok ? fn(r.value) : r;
}
