/**
 * Error types thrown by variant-kit.
 *
 * Only two operations in the library ever throw: `unwrap()` on an empty Maybe, and hashing a
 * payload that cannot be hashed. Everything else reports failure as data.
 *
 * @module errors
 */

/**
 * Thrown by `unwrap()` when called on an `Empty`.
 *
 * @example
 * ```typescript
 * try {
 *   Empty().unwrap();
 * } catch (e) {
 *   if (e instanceof EmptyUnwrapError) {
 *     console.error(e.code); // "EMPTY_UNWRAP"
 *   }
 * }
 * ```
 */
export class EmptyUnwrapError extends Error {
  public readonly code = 'EMPTY_UNWRAP';

  constructor(message = 'No such value.') {
    super(message);
    this.name = 'EmptyUnwrapError';
  }
}

/**
 * Thrown when hashing a mutable container (array, plain object, Map, Set, typed array),
 * directly or as the payload of a variant.
 */
export class UnhashableError extends TypeError {
  public readonly code = 'UNHASHABLE';

  constructor(public readonly typeName: string) {
    super(`unhashable type: '${typeName}'`);
    this.name = 'UnhashableError';
  }
}

/**
 * Error payload produced by the zod adapter when input fails schema validation.
 */
export class ValidationError extends Error {
  public readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly issues: readonly ValidationIssue[]
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * A single failed check, flattened from the schema library's issue format.
 */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}
