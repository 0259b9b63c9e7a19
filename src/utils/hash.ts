/**
 * Hashing for variant payloads.
 *
 * JavaScript has no hashing protocol of its own, so this module defines one:
 * - null and undefined hash to 0, booleans to 1 or 0
 * - strings, numbers, bigints and symbols hash their string form
 * - objects with a `hashCode()` method use it
 * - arrays, plain objects, Map, Set and typed arrays are mutable containers and are unhashable
 * - any other object or function hashes by identity
 *
 * Values that are `equals` (see utils/equality) always hash the same.
 *
 * @module hash
 */

import { UnhashableError } from '../errors';
import { Hashable } from '../types/value';
import { equals } from './equality';

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

/**
 * Type guard for values that define their own `hashCode`.
 */
export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'hashCode' in value &&
    typeof value.hashCode === 'function'
  );
}

/**
 * Hash a value.
 *
 * @throws UnhashableError for mutable containers
 *
 * @example
 * ```typescript
 * hash('a') === hash('a');  // true
 * hash(0) === hash(-0);     // true
 * hash([1, 2]);             // throws UnhashableError: unhashable type: 'Array'
 * ```
 */
export function hash(value: unknown): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') return hashString(value);
  if (typeof value === 'function') return identityHash(value);
  if (typeof value === 'object') {
    if (isHashable(value)) return value.hashCode();
    if (isMutableContainer(value)) throw new UnhashableError(typeName(value));
    return identityHash(value);
  }
  // Numbers, bigints and symbols. String(-0) is '0', so 0 and -0 collide as they must.
  return hashString(String(value));
}

/**
 * 31-multiplier string hash, truncated to a signed 32-bit integer.
 */
export function hashString(text: string): number {
  let h = 0;
  for (let i = 0; i < text.length; i++) {
    h = (Math.imul(31, h) + text.charCodeAt(i)) | 0;
  }
  return h;
}

function identityHash(value: object): number {
  const existing = identities.get(value);
  if (existing !== undefined) return existing;

  const id = nextIdentity++;
  identities.set(value, id);
  return id;
}

function isMutableContainer(value: object): boolean {
  if (Array.isArray(value)) return true;
  if (value instanceof Map || value instanceof Set) return true;
  if (ArrayBuffer.isView(value)) return true;

  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function typeName(value: object): string {
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null) return 'Object';
  return value.constructor.name || 'Object';
}

/**
 * A set that buckets members by `hash` and compares them with `equals`.
 *
 * Unlike the built-in `Set`, two structurally equal variants count as one member, and adding an
 * unhashable value throws. Membership follows `equals`, so `NaN`, which is not equal to itself,
 * is a new member each time it is added, as is `Some(NaN)`.
 *
 * @example
 * ```typescript
 * const seen = new HashSet([Some(1), Some(1), Empty()]);
 * seen.size;              // 2
 * seen.add(Some([1]));    // throws UnhashableError
 * ```
 */
export class HashSet<T> implements Iterable<T> {
  private readonly buckets = new Map<number, T[]>();
  private count = 0;

  constructor(values: Iterable<T> = []) {
    for (const value of values) {
      this.add(value);
    }
  }

  get size(): number {
    return this.count;
  }

  add(value: T): this {
    const key = hash(value);
    const bucket = this.buckets.get(key);

    if (bucket === undefined) {
      this.buckets.set(key, [value]);
      this.count++;
    } else if (!bucket.some((member) => equals(member, value))) {
      bucket.push(value);
      this.count++;
    }
    return this;
  }

  has(value: T): boolean {
    const bucket = this.buckets.get(hash(value));
    return bucket !== undefined && bucket.some((member) => equals(member, value));
  }

  delete(value: T): boolean {
    const key = hash(value);
    const bucket = this.buckets.get(key);
    if (bucket === undefined) return false;

    const index = bucket.findIndex((member) => equals(member, value));
    if (index === -1) return false;

    bucket.splice(index, 1);
    if (bucket.length === 0) this.buckets.delete(key);
    this.count--;
    return true;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const bucket of this.buckets.values()) {
      yield* bucket;
    }
  }
}
