/**
 * Result Type for Type-Safe Error Handling
 *
 * The expression parsers report failure as a value instead of throwing, so
 * callers see every failure path at the call site.
 *
 * @example
 * ```typescript
 * const parsed = parseOrderBy('price=desc', ['name', 'price'])
 * if (isOk(parsed)) {
 *   console.log(parsed.value.direction) // 'desc'
 * } else {
 *   console.log(parsed.error.message)
 * }
 * ```
 */

// =============================================================================
// Core Result Type
// =============================================================================

/**
 * A discriminated union representing either a successful result (Ok) or a failure (Err).
 *
 * @typeParam T - The type of the success value
 * @typeParam E - The type of the error (defaults to Error)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing the given value.
 */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing the given error.
 */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error })

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a Result is in the Ok (success) state.
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok === true
}

/**
 * Type guard to check if a Result is in the Err (failure) state.
 */
export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return result.ok === false
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Extracts the value from a Result, throwing the contained error if it is an Err.
 *
 * @example
 * ```typescript
 * unwrap(Ok(42)) // 42
 * unwrap(Err(new Error('fail'))) // throws Error('fail')
 * ```
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value
  }
  throw result.error
}

/**
 * Chains Result-returning functions, short-circuiting on the first Err.
 *
 * @example
 * ```typescript
 * andThen(splitAssignment('price=desc', 'direction'), ({ column, value }) => toSortSpec(column, value))
 * ```
 */
export function andThen<T, U, E>(result: Result<T, E>, fn: (value: T) => Result<U, E>): Result<U, E> {
  if (isOk(result)) {
    return fn(result.value)
  }
  return result
}
