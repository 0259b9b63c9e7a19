/**
 * Unit tests for payload rendering and its configuration.
 */

import { ZodError } from 'zod';
import { DEFAULT_REPR_CONFIG } from '../../config';
import { Empty, Some } from '../maybe';
import { repr } from '../repr';
import { Ok } from '../result';

class QuotaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QuotaError';
  }
}

describe('repr', () => {
  it.each<[unknown, string]>([
    ['a', "'a'"],
    [1, '1'],
    [1.5, '1.5'],
    [-1, '-1'],
    [true, 'true'],
    [null, 'null'],
    [undefined, 'undefined'],
    [[1, 'a'], "[ 1, 'a' ]"],
    [{ a: 1 }, '{ a: 1 }'],
  ])('should render %p as %s', (value, expected) => {
    expect(repr(value)).toBe(expected);
  });

  it('should render variants through their own toString', () => {
    expect(repr(Some(Some(1)))).toBe('Some(Some(1))');
    expect(repr(Empty())).toBe('Empty()');
  });

  it('should render errors as constructor calls', () => {
    expect(repr(new RangeError('bad'))).toBe("RangeError('bad')");
    expect(repr(new TypeError())).toBe('TypeError()');
    expect(repr(new QuotaError('over'))).toBe("QuotaError('over')");
  });

  it('should keep nested structures on one line', () => {
    expect(repr({ a: { b: [1, 2] } })).toBe('{ a: { b: [ 1, 2 ] } }');
  });

  describe('config', () => {
    it('should apply the documented defaults', () => {
      expect(DEFAULT_REPR_CONFIG).toEqual({
        depth: null,
        maxArrayLength: null,
        maxStringLength: null,
      });
    });

    it('should limit depth', () => {
      expect(repr({ a: { b: 1 } }, { depth: 0 })).toBe('{ a: [Object] }');
    });

    it('should truncate long arrays', () => {
      expect(repr([1, 2, 3], { maxArrayLength: 2 })).toBe(
        '[ 1, 2, ... 1 more item ]'
      );
    });

    it('should apply to the payload of a variant', () => {
      expect(repr(Some([1, 2, 3]), { maxArrayLength: 1 })).toBe(
        'Some([ 1, ... 2 more items ])'
      );
    });

    it('should apply to variants nested in other values', () => {
      expect(repr([Some([1, 2, 3])], { maxArrayLength: 1 })).toBe(
        '[ Some([ 1, ... 2 more items ]) ]'
      );
    });

    it('should count a variant as one level of depth', () => {
      expect(repr(Ok({ a: { b: 1 } }), { depth: 1 })).toBe('Ok({ a: [Object] })');
    });

    it('should reject invalid settings', () => {
      expect(() => repr(1, { depth: -1 })).toThrow(ZodError);
      expect(() => repr(1, { maxArrayLength: 1.5 })).toThrow(ZodError);
    });
  });
});
