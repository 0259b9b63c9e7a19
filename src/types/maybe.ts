/**
 * Maybe<T> type for values that may or may not be present.
 *
 * A Maybe is either:
 * - Some: contains a value of type T
 * - Empty: contains nothing
 *
 * All interaction goes through the combinators every variant implements. `unwrap` is the
 * single escape hatch into exception-based handling.
 *
 * @example
 * ```typescript
 * function lookup(key: string, table: Map<string, number>): Maybe<number> {
 *   return table.has(key) ? Some(table.get(key)) : Empty();
 * }
 *
 * lookup('cat', animals).map(String); // Some('6')
 * ```
 */

import { ValueObject } from './value';

/**
 * Branch handlers for `Maybe.match`.
 */
export interface MaybeMatcher<T, U> {
  readonly ifSome: (value: T) => U;
  readonly ifEmpty: () => U;
}

/**
 * Operations available on every Maybe variant.
 */
export interface MaybeOps<T> extends ValueObject {
  /**
   * Return the contained value.
   *
   * @throws EmptyUnwrapError if this is an Empty
   */
  unwrap(): T;

  /**
   * Apply `fn` to the contained value and wrap the result in a Some.
   * Empty yields Empty without calling `fn`.
   */
  map<U>(fn: (value: T) => U): Maybe<U>;

  /**
   * Apply `fn` to the contained value and return its Maybe unchanged.
   * Empty yields Empty without calling `fn`.
   */
  flatMap<U>(fn: (value: T) => Maybe<U>): Maybe<U>;

  /**
   * Call exactly one of the handlers and return what it returns.
   */
  match<U>(matcher: MaybeMatcher<T, U>): U;

  /**
   * `Some(<repr of value>)` or `Empty()`.
   */
  toString(): string;
}

/**
 * Present variant of Maybe<T>
 */
export interface Some<T> extends MaybeOps<T> {
  readonly kind: 'some';
  readonly value: T;
}

/**
 * Absent variant of Maybe<T>
 */
export interface Empty<T = never> extends MaybeOps<T> {
  readonly kind: 'empty';
}

/**
 * Maybe type - either Some<T> or Empty<T>
 */
export type Maybe<T> = Some<T> | Empty<T>;
