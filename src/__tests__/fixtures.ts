/**
 * Sample payloads shared by the variant test suites.
 */

export class Sample {
  constructor(readonly label = 'sample') {}
}

export const PRIMITIVES: readonly unknown[] = [
  null,
  undefined,
  true,
  false,
  -1,
  0,
  1,
  -1.5,
  0.5,
  'a',
  'z',
  '@',
];

export const ERRORS: readonly Error[] = [
  new Error('boom'),
  new TypeError(),
  new RangeError('out of range'),
];

export const COLLECTIONS: readonly unknown[] = [
  [],
  [1, ['a', [true]]],
  {},
  { a: { b: 1 } },
  new Map([['a', 1]]),
  new Set([1, 2]),
];

export const UNHASHABLE: readonly unknown[] = [[], {}, new Map(), new Set()];

export const VALUES: readonly unknown[] = [
  ...PRIMITIVES,
  ...ERRORS,
  ...COLLECTIONS,
  new Sample(),
];
