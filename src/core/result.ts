/**
 * Expected failures travel as values: a rejected price row comes back from
 * validation as `Err`, and a budget denial leaves the gate the same way.
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

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/** The value, or the error thrown. For startup paths and tests. */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (isOk(result)) return result.value;
  throw result.error;
}
