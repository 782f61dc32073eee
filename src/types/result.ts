/**
 * Result Type for Functional Error Handling
 *
 * Provides a type-safe way to handle expected failure cases without exceptions.
 *
 * @module
 */

// =============================================================================
// Result Type Definition
// =============================================================================

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing a value
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// =============================================================================
// Wrapping
// =============================================================================

/**
 * Runs a function, capturing a throw as an Err mapped through `errorMapper`
 */
export function tryCatch<T, E>(fn: () => T, errorMapper: (error: unknown) => E): Result<T, E> {
  try {
    return ok(fn());
  } catch (error) {
    return err(errorMapper(error));
  }
}

// =============================================================================
// Collection Utilities
// =============================================================================

/**
 * Partitions an array of Results into Ok values and Err values
 */
export function partition<T, E>(results: Result<T, E>[]): { oks: T[]; errs: E[] } {
  const oks: T[] = [];
  const errs: E[] = [];
  for (const result of results) {
    if (result.ok) {
      oks.push(result.value);
    } else {
      errs.push(result.error);
    }
  }
  return { oks, errs };
}
