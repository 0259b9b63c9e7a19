export type { Maybe, MaybeMatcher, MaybeOps } from './types/maybe';
export type { Result, ResultMatcher, ResultOps } from './types/result';
export type { Equatable, Hashable, ValueObject } from './types/value';

export { Some, Empty, isSome, isEmpty, fromNullable } from './utils/maybe';
export { Ok, Err, isOk, isErr, tryCatch } from './utils/result';

export { equals, isEquatable } from './utils/equality';
export { hash, hashString, isHashable, HashSet } from './utils/hash';
export { repr } from './utils/repr';

export type { ReprConfig } from './config';
export { ReprConfigSchema, DEFAULT_REPR_CONFIG } from './config';

export { EmptyUnwrapError, UnhashableError, ValidationError } from './errors';
export type { ValidationIssue } from './errors';

export { fromSafeParse, parseWith, toValidationError } from './adapters/zod';
