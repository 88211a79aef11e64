// pattern: Functional Core

/**
 * Outcome of a core operation. Failures are values, so callers have to
 * handle the error branch before they can reach the value.
 */
export type OperationResult<T, E extends Error> =
  | { success: true; value: T }
  | { success: false; error: E };

export function succeed<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<E extends Error>(error: E): { success: false; error: E } {
  return { success: false, error };
}
