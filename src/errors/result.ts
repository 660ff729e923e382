/**
 * Per-stage result type.
 *
 * Stages return a Result instead of throwing for expected failures. Only
 * the orchestrator turns an Err into the ERROR outcome; intermediate layers
 * pass errors through untouched.
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
