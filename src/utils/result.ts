/**
 * Minimal result type used across formgate.
 * Success and failure are discriminated by `isOk` / `isErr`.
 */
export type Result<T, E = unknown> =
  | { isOk: true; value: T; isErr: false; error: null }
  | { isOk: false; value: null; isErr: true; error: E };

export function Ok<T>(value: T): Result<T, never> {
  return { isOk: true, value, isErr: false, error: null };
}

export function Err<E>(error: E): Result<never, E> {
  return { isOk: false, value: null, isErr: true, error };
}

/**
 * Runs an async operation and captures a rejection as an Err instead of throwing.
 *
 * @example
 * const result = await safeTry(() => storage.cleanup(file));
 * if (result.isErr) { ... }
 */
export async function safeTry<T>(
  fn: () => T | Promise<T>
): Promise<Result<T, unknown>> {
  try {
    return Ok(await fn());
  } catch (error) {
    return Err(error);
  }
}
