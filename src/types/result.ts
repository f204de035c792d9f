/**
 * Result Type for Functional Error Handling
 *
 * The lexer and parser report expected failures (bad query syntax) as
 * values rather than exceptions; callers decide whether to throw.
 *
 * @module
 */

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Extracts the value from a Result, throwing the contained error if it's Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}
