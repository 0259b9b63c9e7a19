/**
 * Unit tests for the zod adapter.
 */

import { z, ZodError } from 'zod';
import { ValidationError } from '../../errors';
import { Ok } from '../../utils/result';
import { fromSafeParse, parseWith, toValidationError } from '../zod';

const UserSchema = z.object({
  name: z.string().min(1),
  age: z.number().int(),
});

describe('zod adapter', () => {
  describe('fromSafeParse', () => {
    it('should map a successful parse to Ok', () => {
      expect(fromSafeParse(z.number().safeParse(3)).equals(Ok(3))).toBe(true);
    });

    it('should map a failed parse to Err with the ZodError', () => {
      const result = fromSafeParse(z.number().safeParse('3'));
      expect(result.isOk).toBe(false);
      expect(result.err().unwrap()).toBeInstanceOf(ZodError);
    });
  });

  describe('toValidationError', () => {
    it('should join issues as path: message', () => {
      const parsed = UserSchema.safeParse({});
      expect(parsed.success).toBe(false);
      if (parsed.success) return;

      const error = toValidationError(parsed.error);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.message).toBe('name: Required, age: Required');
      expect(error.issues).toEqual([
        { path: 'name', message: 'Required' },
        { path: 'age', message: 'Required' },
      ]);
    });
  });

  describe('parseWith', () => {
    const parseUser = parseWith(UserSchema);

    it('should return the parsed value in Ok', () => {
      const result = parseUser({ name: 'ada', age: 36 });
      expect(result.ok().unwrap()).toEqual({ name: 'ada', age: 36 });
    });

    it('should return a ValidationError in Err', () => {
      const result = parseUser({ name: '', age: 36 });
      const error = result.err().unwrap();

      expect(error.message).toBe(
        'name: String must contain at least 1 character(s)'
      );
    });

    it('should compose with flatMap', () => {
      const parsePort = parseWith(z.string().regex(/^\d+$/));
      const toPort = (text: string) => Ok(Number.parseInt(text, 10));

      expect(parsePort('8080').flatMap(toPort).equals(Ok(8080))).toBe(true);
      expect(parsePort('http').flatMap(toPort).isOk).toBe(false);
    });

    it('should report root-level issues with an empty path', () => {
      const result = parseWith(z.number())('x');
      expect(result.err().unwrap().message).toBe(
        ': Expected number, received string'
      );
    });
  });
});
