/**
 * Payload equality used by every variant's `equals`.
 *
 * @module equality
 */

import { Equatable } from '../types/value';

/**
 * Type guard for values that define their own `equals`.
 */
export function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'equals' in value &&
    typeof value.equals === 'function'
  );
}

/**
 * Compare two payloads.
 *
 * Equatable values decide for themselves, which is how nested variants compare structurally.
 * Anything else uses `===`, so `0` equals `-0` and `NaN` equals nothing.
 *
 * @example
 * ```typescript
 * equals(1, 1);                   // true
 * equals(Some(1), Some(1));       // true
 * equals([1], [1]);               // false, arrays compare by reference
 * ```
 */
export function equals(a: unknown, b: unknown): boolean {
  if (isEquatable(a)) {
    return a.equals(b);
  }
  return a === b;
}
