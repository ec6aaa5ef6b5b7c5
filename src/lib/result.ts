// Outcome of an operation that can fail with a typed error.
// Mirrors zod's safeParse shape so callers narrow on `success` everywhere.
export type Result<T, E extends Error = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function fail<E extends Error>(error: E): Result<never, E> {
  return { success: false, error };
}
