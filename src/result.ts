/**
 * Result type for functional error handling
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
});

export const error = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => (result.ok ? fn(result.value) : result);

/**
 * Applies `fn` to each item in order, stopping at the first failure.
 */
export const mapAll = <T, U, E>(
  items: readonly T[],
  fn: (item: T, index: number) => Result<U, E>
): Result<U[], E> => {
  const values: U[] = [];
  for (let i = 0; i < items.length; i++) {
    const result = fn(items[i], i);
    if (!result.ok) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
};
