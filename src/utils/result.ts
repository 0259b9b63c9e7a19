/**
 * Constructors and helpers for working with Result<T, E> types.
 *
 * @module result
 */

import { inspect, InspectOptionsStylized } from 'node:util';
import { Maybe } from '../types/maybe';
import {
  Result,
  ResultMatcher,
  Ok as OkType,
  Err as ErrType,
} from '../types/result';
import { equals } from './equality';
import { hash } from './hash';
import { Empty, Some } from './maybe';
import { nestedOptions, renderVariant } from './repr';

export type Ok<T, E = never> = OkType<T, E>;
export type Err<T = never, E = Error> = ErrType<T, E>;

class OkValue<T, E = never> implements OkType<T, E> {
  readonly kind = 'ok';
  readonly isOk = true;

  constructor(readonly value: T) {}

  ok(): Maybe<T> {
    return Some(this.value);
  }

  err(): Maybe<E> {
    return Empty();
  }

  mapOk<U>(fn: (value: T) => U): Result<U, E> {
    return new OkValue<U, E>(fn(this.value));
  }

  mapErr<F>(_fn: (error: E) => F): Result<T, F> {
    return new OkValue<T, F>(this.value);
  }

  flatMap<U, F = E>(fn: (value: T) => Result<U, F>): Result<U, E | F> {
    return fn(this.value);
  }

  match<U>(matcher: ResultMatcher<T, E, U>): U {
    return matcher.ifOk(this.value);
  }

  equals(other: unknown): boolean {
    return other instanceof OkValue && equals(this.value, other.value);
  }

  hashCode(): number {
    return hash(this.value);
  }

  toString(): string {
    return renderVariant(this, 'Ok', this.value);
  }

  [inspect.custom](depth: number, options: InspectOptionsStylized): string {
    if (depth < 0) return options.stylize('[Ok]', 'special');
    return renderVariant(this, 'Ok', this.value, nestedOptions(depth, options));
  }
}

class ErrValue<T, E> implements ErrType<T, E> {
  readonly kind = 'err';
  readonly isOk = false;

  constructor(readonly error: E) {}

  ok(): Maybe<T> {
    return Empty();
  }

  err(): Maybe<E> {
    return Some(this.error);
  }

  mapOk<U>(_fn: (value: T) => U): Result<U, E> {
    return new ErrValue<U, E>(this.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return new ErrValue<T, F>(fn(this.error));
  }

  flatMap<U, F = E>(_fn: (value: T) => Result<U, F>): Result<U, E | F> {
    return new ErrValue<U, E | F>(this.error);
  }

  match<U>(matcher: ResultMatcher<T, E, U>): U {
    return matcher.ifErr(this.error);
  }

  equals(other: unknown): boolean {
    return other instanceof ErrValue && equals(this.error, other.error);
  }

  hashCode(): number {
    return hash(this.error);
  }

  toString(): string {
    return renderVariant(this, 'Err', this.error);
  }

  [inspect.custom](depth: number, options: InspectOptionsStylized): string {
    if (depth < 0) return options.stylize('[Err]', 'special');
    return renderVariant(this, 'Err', this.error, nestedOptions(depth, options));
  }
}

/**
 * Create a successful Result containing a value.
 *
 * @param value - The success value
 * @returns Ok<T, E>
 *
 * @example
 * ```typescript
 * const result = Ok(42);
 * result.ok().unwrap(); // 42
 * ```
 */
export function Ok<T, E = never>(value: T): Ok<T, E> {
  return new OkValue<T, E>(value);
}

/**
 * Create a failed Result containing an error.
 *
 * @param error - The error value
 * @returns Err<T, E>
 *
 * @example
 * ```typescript
 * const result = Err(new RangeError('Division by zero'));
 * result.err().unwrap().message; // "Division by zero"
 * ```
 */
export function Err<T = never, E = Error>(error: E): Err<T, E> {
  return new ErrValue<T, E>(error);
}

/**
 * Type guard for Ok. Unlike the `isOk` property, it narrows a `Result` variable so `.value`
 * can be read directly.
 *
 * @example
 * ```typescript
 * const port = parseWith(z.coerce.number())('8080');
 * if (isOk(port)) port.value; // 8080
 * ```
 */
export function isOk<T, E>(result: Result<T, E>): result is OkType<T, E> {
  return result.kind === 'ok';
}

/**
 * Type guard for Err, the counterpart of `isOk`.
 *
 * @example
 * ```typescript
 * const result: Result<number, RangeError> = Err(new RangeError('too big'));
 * if (isErr(result)) result.error.message; // 'too big'
 * ```
 */
export function isErr<T, E>(result: Result<T, E>): result is ErrType<T, E> {
  return result.kind === 'err';
}

/**
 * Run a function that may throw and capture the outcome as a Result.
 * Non-Error throwables are wrapped in an Error.
 *
 * @example
 * ```typescript
 * tryCatch(() => JSON.parse('{"a":1}')); // Ok({ a: 1 })
 * tryCatch(() => JSON.parse('{'));       // Err(SyntaxError(...))
 * ```
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return new OkValue<T, Error>(fn());
  } catch (error) {
    return new ErrValue<T, Error>(
      error instanceof Error ? error : new Error(String(error))
    );
  }
}
