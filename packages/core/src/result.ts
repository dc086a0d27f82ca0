/**
 * Result and Option
 *
 * Expected failures (a malformed model, a schema violation) travel as
 * values; exceptions are kept for the fatal ones.
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * Unwrap a result, throwing the error if there is one
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

export function map<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Chain Result-returning steps; the first error short-circuits
 */
export function flatMap<T, U, E, F = E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, F>
): Result<U, E | F> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Value that may be absent
 */
export type Option<T> = T | null;

export function isSome<T>(option: Option<T>): option is T {
  return option !== null;
}

export function optionToResult<T, E>(option: Option<T>, error: E): Result<T, E> {
  return isSome(option) ? ok(option) : err(error);
}
