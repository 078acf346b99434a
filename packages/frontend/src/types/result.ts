/**
 * Outcome of an operation that can fail without throwing. Loaders return
 * one so the CLI can choose between reporting and falling back.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E = never>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T = never, E = unknown>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

/**
 * Transform the value of a successful result; failures pass through.
 */
export const map = <T, U, E>(
  result: Result<T, E>,
  transform: (value: T) => U
): Result<U, E> =>
  result.ok ? { ok: true, value: transform(result.value) } : result;

/**
 * The value, or a fallback computed from the error.
 */
export const unwrapOrElse = <T, E>(
  result: Result<T, E>,
  fallback: (error: E) => T
): T => (result.ok ? result.value : fallback(result.error));
