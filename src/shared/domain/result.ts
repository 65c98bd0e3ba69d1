/**
 * Result type using discriminated union for explicit error handling.
 * Expected failures travel as values; only programming errors are thrown.
 */
export type Result<T, E> = Success<T> | Failure<E>;

export interface Success<T> {
  readonly success: true;
  readonly value: T;
}

export interface Failure<E> {
  readonly success: false;
  readonly error: E;
}

export function ok<T>(value: T): Success<T> {
  return { success: true, value };
}

export function fail<E>(error: E): Failure<E> {
  return { success: false, error };
}

/** Success with no payload */
export const DONE: Success<void> = { success: true, value: undefined };
