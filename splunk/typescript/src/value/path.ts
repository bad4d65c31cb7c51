/**
 * Read helpers over content trees
 * @module splunk-client/value/path
 */

import type { ValueConverter } from '../converters/types.js';
import { isMap, type ContentValue, type PlainValue } from './value.js';

/**
 * Follows `keys` through nested maps
 *
 * @returns the value found, or `undefined` when a key is absent or a step
 * lands on something other than a map
 */
export function getPath(value: ContentValue | undefined, ...keys: readonly string[]): ContentValue | undefined {
  let current = value;
  for (const key of keys) {
    if (!isMap(current)) {
      return undefined;
    }
    current = current.entries.get(key);
  }
  return current;
}

/**
 * Text of the scalar at `keys`, or `undefined`
 */
export function getScalar(value: ContentValue | undefined, ...keys: readonly string[]): string | undefined {
  const found = getPath(value, ...keys);
  return found?.kind === 'scalar' ? found.value : undefined;
}

/**
 * Scalar at `keys` run through a converter; the dotted key path names the
 * field in conversion errors
 */
export function convertPath<T>(
  value: ContentValue | undefined,
  converter: ValueConverter<T>,
  ...keys: readonly string[]
): T | undefined {
  const text = getScalar(value, ...keys);
  return text === undefined ? undefined : converter.convert(text, keys.join('.'));
}

/**
 * Renders a content tree as plain JSON data
 */
export function toPlainValue(value: ContentValue): PlainValue {
  if (value === null) {
    return null;
  }

  switch (value.kind) {
    case 'scalar':
      return value.value;
    case 'list':
      return value.items.map(toPlainValue);
    case 'map': {
      const result: { [key: string]: PlainValue } = {};
      for (const [key, entry] of value.entries) {
        result[key] = toPlainValue(entry);
      }
      return result;
    }
  }
}
