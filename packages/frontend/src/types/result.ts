/**
 * Result type for functional error handling
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T =>
  result.ok ? result.value : defaultValue;

/**
 * Run a computation that may throw, capturing the thrown value as an error.
 * Used at boundaries where one failing unit of work must not stop the rest.
 */
export const tryCatch = <T, E>(
  fn: () => T,
  onThrow: (thrown: unknown) => E
): Result<T, E> => {
  try {
    return ok(fn());
  } catch (thrown) {
    return error(onThrow(thrown));
  }
};
