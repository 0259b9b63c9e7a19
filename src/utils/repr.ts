/**
 * Diagnostic rendering of variant payloads.
 *
 * The output is meant for test assertions and debugging, not for parsing.
 *
 * @module repr
 */

import { inspect, InspectOptions, InspectOptionsStylized } from 'node:util';
import { DEFAULT_REPR_CONFIG, ReprConfig, ReprConfigSchema } from '../config';

// Variants whose payload is being rendered right now.
const rendering = new Set<object>();

function toInspectOptions(config: ReprConfig): InspectOptions {
  return {
    depth: config.depth,
    maxArrayLength: config.maxArrayLength,
    maxStringLength: config.maxStringLength,
    breakLength: Infinity,
  };
}

const DEFAULT_INSPECT_OPTIONS = toInspectOptions(DEFAULT_REPR_CONFIG);

/**
 * Render a value for a variant's `toString()`.
 *
 * The config applies to the whole value, including payloads of nested variants.
 *
 * @example
 * ```typescript
 * repr('a');                                      // "'a'"
 * repr(1.5);                                      // "1.5"
 * repr(Some(Some(1)));                            // "Some(Some(1))"
 * repr(new RangeError('bad'));                    // "RangeError('bad')"
 * repr(Some([1, 2, 3]), { maxArrayLength: 1 });   // "Some([ 1, ... 2 more items ])"
 * ```
 */
export function repr(value: unknown, config?: Partial<ReprConfig>): string {
  const options =
    config === undefined
      ? DEFAULT_INSPECT_OPTIONS
      : toInspectOptions(ReprConfigSchema.parse(config));
  return render(value, options);
}

function render(value: unknown, options: InspectOptions): string {
  if (value instanceof Error) {
    const message = value.message === '' ? '' : inspect(value.message, options);
    return `${value.name}(${message})`;
  }
  return inspect(value, options);
}

/**
 * Render `name(payload)` for a variant.
 *
 * A variant met again while its own payload is still being rendered prints as `name(...)`, so
 * payloads that contain their own variant terminate.
 */
export function renderVariant(
  variant: object,
  name: string,
  payload: unknown,
  options: InspectOptions = DEFAULT_INSPECT_OPTIONS
): string {
  if (rendering.has(variant)) return `${name}(...)`;

  rendering.add(variant);
  try {
    return `${name}(${render(payload, options)})`;
  } finally {
    rendering.delete(variant);
  }
}

/**
 * Options for a payload rendered from inside an `inspect.custom` hook: the caller's settings,
 * one level deeper.
 */
export function nestedOptions(
  depth: number,
  options: InspectOptionsStylized
): InspectOptions {
  return {
    ...options,
    depth: options.depth === null ? null : depth - 1,
  };
}
