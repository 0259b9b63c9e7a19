/**
 * Result<T, E> type for functional error handling without exceptions.
 *
 * A Result is either:
 * - Ok: contains a success value of type T
 * - Err: contains an error value of type E
 *
 * By convention E describes a failure (usually an Error subclass), but nothing here depends on
 * that: the error is an opaque payload.
 *
 * Result has no `unwrap`. The only imperative way out is through the Maybe returned by
 * `ok()` or `err()`, e.g. `result.ok().unwrap()`.
 *
 * @example
 * ```typescript
 * function inverse(n: number): Result<number, RangeError> {
 *   if (n === 0) {
 *     return Err(new RangeError('Division by zero'));
 *   }
 *   return Ok(1 / n);
 * }
 * ```
 */

import { Maybe } from './maybe';
import { ValueObject } from './value';

/**
 * Branch handlers for `Result.match`.
 */
export interface ResultMatcher<T, E, U> {
  readonly ifOk: (value: T) => U;
  readonly ifErr: (error: E) => U;
}

/**
 * Operations available on every Result variant.
 */
export interface ResultOps<T, E> extends ValueObject {
  /**
   * `true` for Ok, `false` for Err.
   */
  readonly isOk: boolean;

  /**
   * The success value as a Maybe: Some for Ok, Empty for Err.
   */
  ok(): Maybe<T>;

  /**
   * The error as a Maybe: Empty for Ok, Some for Err.
   */
  err(): Maybe<E>;

  /**
   * Transform the success value. An Err passes through and `fn` is not called.
   */
  mapOk<U>(fn: (value: T) => U): Result<U, E>;

  /**
   * Transform the error. An Ok passes through and `fn` is not called.
   */
  mapErr<F>(fn: (error: E) => F): Result<T, F>;

  /**
   * Chain a computation that can itself fail. An Err passes through and `fn` is not called.
   */
  flatMap<U, F = E>(fn: (value: T) => Result<U, F>): Result<U, E | F>;

  /**
   * Call exactly one of the handlers and return what it returns.
   */
  match<U>(matcher: ResultMatcher<T, E, U>): U;

  /**
   * `Ok(<repr of value>)` or `Err(<repr of error>)`.
   */
  toString(): string;
}

/**
 * Success variant of Result<T, E>
 */
export interface Ok<T, E = never> extends ResultOps<T, E> {
  readonly kind: 'ok';
  readonly isOk: true;
  readonly value: T;
}

/**
 * Error variant of Result<T, E>
 */
export interface Err<T = never, E = Error> extends ResultOps<T, E> {
  readonly kind: 'err';
  readonly isOk: false;
  readonly error: E;
}

/**
 * Result type - either Ok<T, E> or Err<T, E>
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;
