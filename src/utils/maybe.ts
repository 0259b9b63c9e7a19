/**
 * Constructors and helpers for Maybe<T>.
 *
 * `Some` and `Empty` are exported both as factory functions and as the variant types, so
 * `const m: Some<number> = Some(1)` reads the same way on both sides.
 *
 * @module maybe
 */

import { inspect, InspectOptionsStylized } from 'node:util';
import { EmptyUnwrapError } from '../errors';
import {
  Maybe,
  MaybeMatcher,
  Some as SomeType,
  Empty as EmptyType,
} from '../types/maybe';
import { equals } from './equality';
import { hash } from './hash';
import { nestedOptions, renderVariant } from './repr';

export type Some<T> = SomeType<T>;
export type Empty<T = never> = EmptyType<T>;

class SomeValue<T> implements SomeType<T> {
  readonly kind = 'some';

  constructor(readonly value: T) {}

  unwrap(): T {
    return this.value;
  }

  map<U>(fn: (value: T) => U): Maybe<U> {
    return new SomeValue(fn(this.value));
  }

  flatMap<U>(fn: (value: T) => Maybe<U>): Maybe<U> {
    return fn(this.value);
  }

  match<U>(matcher: MaybeMatcher<T, U>): U {
    return matcher.ifSome(this.value);
  }

  equals(other: unknown): boolean {
    return other instanceof SomeValue && equals(this.value, other.value);
  }

  hashCode(): number {
    return hash(this.value);
  }

  toString(): string {
    return renderVariant(this, 'Some', this.value);
  }

  [inspect.custom](depth: number, options: InspectOptionsStylized): string {
    if (depth < 0) return options.stylize('[Some]', 'special');
    return renderVariant(this, 'Some', this.value, nestedOptions(depth, options));
  }
}

class EmptyValue<T = never> implements EmptyType<T> {
  readonly kind = 'empty';

  unwrap(): never {
    throw new EmptyUnwrapError();
  }

  map<U>(_fn: (value: T) => U): Maybe<U> {
    return new EmptyValue<U>();
  }

  flatMap<U>(_fn: (value: T) => Maybe<U>): Maybe<U> {
    return new EmptyValue<U>();
  }

  match<U>(matcher: MaybeMatcher<T, U>): U {
    return matcher.ifEmpty();
  }

  equals(other: unknown): boolean {
    return other instanceof EmptyValue;
  }

  hashCode(): number {
    return 0;
  }

  toString(): string {
    return 'Empty()';
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

/**
 * Create a Maybe containing a value.
 *
 * @param value - The value to contain
 * @returns Some<T>
 *
 * @example
 * ```typescript
 * Some(42).map((n) => n + 1); // Some(43)
 * ```
 */
export function Some<T>(value: T): Some<T> {
  return new SomeValue(value);
}

/**
 * Create an empty Maybe. The type parameter is inferred from context, so an `Empty()` fits
 * any Maybe<T>.
 *
 * @example
 * ```typescript
 * const missing: Maybe<number> = Empty();
 * missing.map((n) => n + 1); // Empty()
 * ```
 */
export function Empty<T = never>(): Empty<T> {
  return new EmptyValue<T>();
}

/**
 * Type guard to check if a Maybe is Some.
 */
export function isSome<T>(maybe: Maybe<T>): maybe is SomeType<T> {
  return maybe.kind === 'some';
}

/**
 * Type guard to check if a Maybe is Empty.
 */
export function isEmpty<T>(maybe: Maybe<T>): maybe is EmptyType<T> {
  return maybe.kind === 'empty';
}

/**
 * Lift a nullable value into a Maybe: null and undefined become Empty, anything else Some.
 *
 * @example
 * ```typescript
 * fromNullable(new Map([['cat', 6]]).get('dog')); // Empty()
 * fromNullable(0);                                 // Some(0)
 * ```
 */
export function fromNullable<T>(value: T | null | undefined): Maybe<NonNullable<T>> {
  if (value === null || value === undefined) {
    return new EmptyValue<NonNullable<T>>();
  }
  return new SomeValue<NonNullable<T>>(value);
}
