/**
 * Result type for fallible operations. Modules return `Result` instead of
 * throwing; only top-level entry points and tests unwrap.
 *
 *   const parsed = loadAppConfig(process.env);
 *   if (!parsed.ok) {
 *     logger.error(parsed.error.message, parsed.error.context);
 *     return;
 *   }
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function mapResult<T, U, E>(result: Result<T, E>, mapper: (value: T) => U): Result<U, E> {
  if (!result.ok) {
    return result;
  }
  return ok(mapper(result.value));
}
