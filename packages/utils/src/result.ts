/**
 * Result type for operations whose failure is a value rather than a throw
 */

export type Result<T, E = Error> = Success<T> | Failure<E>;

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Create a success result
 */
export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

/**
 * Create a failure result
 */
export function failure<E>(error: E): Failure<E> {
  return { ok: false, error };
}

/**
 * Try to execute a function and return a Result
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return success(fn());
  } catch (error) {
    return failure(error instanceof Error ? error : new Error(String(error)));
  }
}

/**
 * Try to execute an async function and return a Result
 */
export async function tryCatchAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return success(await fn());
  } catch (error) {
    return failure(error instanceof Error ? error : new Error(String(error)));
  }
}
