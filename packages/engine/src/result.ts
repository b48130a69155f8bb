/**
 * Result Type - Functional error handling
 *
 * Engine operations never throw for rule violations. They return either
 * { ok: true, value } or { ok: false, error } and leave state untouched on
 * failure.
 */

/**
 * Result type for operations that can fail.
 */
export type Result<T, E = string> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

/**
 * Create a successful result containing a value.
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

/**
 * Create a failed result containing an error.
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/**
 * Map over a successful result's value.
 * If the result is an error, returns the error unchanged.
 */
export function mapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  if (result.ok) {
    return ok(fn(result.value))
  }
  return result
}
