/**
 * Result type for plugins that report why they failed
 *
 * A plugin that cannot fail declares `Infallible` (`never`) as its error
 * type. `Err<never>` has no inhabitants, so `intoOk` unwraps such a result
 * without a failure branch at the call site.
 */

import { unreachable } from '../dev/invariant';

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = never> = Ok<T> | Err<E>;

/** Error type of a computation that cannot fail. */
export type Infallible = never;

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
 * Unwrap a result whose error type is uninhabited.
 *
 * @example
 * ```ts
 * const size: number = intoOk(host.get(ByteSize));
 * ```
 */
export function intoOk<T>(result: Result<T, Infallible>): T {
  if (result.ok) return result.value;
  return unreachable(result.error, 'Infallible result carried an error');
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

export function mapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}
