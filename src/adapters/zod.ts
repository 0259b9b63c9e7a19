/**
 * Adapter from zod validation into Result.
 *
 * zod's `safeParse` already returns a tagged success/failure object; these helpers turn it
 * into a Result so validation composes with `flatMap` and `mapErr` like any other step.
 *
 * @module adapters/zod
 */

import type { SafeParseReturnType, ZodError, ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../errors';
import { Result } from '../types/result';
import { Err, Ok } from '../utils/result';

/**
 * Convert a `safeParse` outcome into a Result, keeping zod's own error.
 *
 * @example
 * ```typescript
 * fromSafeParse(z.number().safeParse(3));   // Ok(3)
 * fromSafeParse(z.number().safeParse('3')); // Err(ZodError(...))
 * ```
 */
export function fromSafeParse<I, O>(
  parsed: SafeParseReturnType<I, O>
): Result<O, ZodError<I>> {
  return parsed.success ? Ok(parsed.data) : Err(parsed.error);
}

/**
 * Flatten a ZodError into a ValidationError whose message lists every issue as
 * `path: message`, comma separated.
 */
export function toValidationError<I>(error: ZodError<I>): ValidationError {
  const issues = error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const message = issues
    .map((issue) => `${issue.path}: ${issue.message}`)
    .join(', ');
  return new ValidationError(message, issues);
}

/**
 * Build a parser that validates unknown input against `schema`.
 *
 * @example
 * ```typescript
 * const parseUser = parseWith(z.object({ name: z.string().min(1) }));
 *
 * parseUser({ name: 'ada' });  // Ok({ name: 'ada' })
 * parseUser({ name: '' });     // Err(ValidationError('name: String must contain at least 1 character(s)'))
 * ```
 */
export function parseWith<O, I = O>(
  schema: ZodType<O, ZodTypeDef, I>
): (input: unknown) => Result<O, ValidationError> {
  return (input) =>
    fromSafeParse(schema.safeParse(input)).mapErr((error) =>
      toValidationError(error)
    );
}
