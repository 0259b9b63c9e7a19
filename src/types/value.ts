/**
 * Value-semantics protocols shared by all variants.
 *
 * Payloads that implement these take part in structural equality and hashing; everything
 * else falls back to `===` and the built-in hashing rules in `utils/hash`.
 *
 * @module value
 */

/**
 * A value that defines its own equality.
 *
 * Implementations must be reflexive and symmetric, and must return `false` (never throw)
 * for unrelated values.
 */
export interface Equatable {
  equals(other: unknown): boolean;
}

/**
 * A value that defines its own hash.
 *
 * Two values that are `equals` must return the same `hashCode()`.
 */
export interface Hashable {
  hashCode(): number;
}

/**
 * Both protocols together. Every Maybe and Result variant is a `ValueObject`.
 */
export interface ValueObject extends Equatable, Hashable {}
