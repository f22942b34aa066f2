/**
 * Result Pattern
 * Discriminated union for operations whose failure is an expected outcome
 */

/**
 * Result type - `error` defaults to a plain message
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

/**
 * Type guard to check if result is a failure
 */
export const isFail = <T, E>(result: Result<T, E>): result is { ok: false; error: E } =>
  !result.ok;
