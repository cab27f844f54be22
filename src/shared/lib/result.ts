/**
 * Outcome of an operation that reports failure as a value instead of throwing.
 * Store operations that touch the disk resolve to a Result and never reject.
 */
export type Result<T, E extends Error = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Run a throwing function and capture its outcome.
 * `mapError` turns whatever was thrown into the caller's error type.
 */
export function tryCatchSync<T, E extends Error>(
  fn: () => T,
  mapError: (caught: unknown) => E,
): Result<T, E> {
  try {
    return ok(fn());
  } catch (caught) {
    return err(mapError(caught));
  }
}

/** Async counterpart of tryCatchSync. The returned promise never rejects. */
export async function tryCatch<T, E extends Error>(
  fn: () => Promise<T>,
  mapError: (caught: unknown) => E,
): Promise<Result<T, E>> {
  try {
    return ok(await fn());
  } catch (caught) {
    return err(mapError(caught));
  }
}

/** Unwrap a Result, throwing its error. Meant for CLI and test boundaries. */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
