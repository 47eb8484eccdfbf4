/**
 * Simplified Result Pattern
 * Basic discriminated union for error handling without complex monadic utilities
 */

/**
 * Result type - simple discriminated union. The error defaults to a message
 * string; typed failures (see render-errors) pass their own union.
 */
export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result
 */
export const Success = <T, E = string>(value: T): Result<T, E> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <T, E = string>(error: E): Result<T, E> => ({ ok: false, error });
