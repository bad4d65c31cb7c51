/**
 * Content key normalization
 * @module splunk-client/atom/key-names
 */

import { FormatError } from '../errors/index.js';

const SEPARATORS = new Set(['_', '.', '-']);

/**
 * Folds a wire key segment into the name it is stored under
 *
 * A leading run of underscores is kept and the character after it keeps its
 * case; any other first character is upper-cased. Each later run of `_`,
 * `.` or `-` is dropped and the character following it upper-cased.
 *
 * @example
 * ```typescript
 * normalizeKeyName('check_for_updates'); // 'CheckForUpdates'
 * normalizeKeyName('__private'); // '__private'
 * ```
 */
export function normalizeKeyName(name: string): string {
  let index = 0;
  let result = '';

  while (index < name.length && name[index] === '_') {
    result += '_';
    index++;
  }

  let upper = result.length === 0;

  for (; index < name.length; index++) {
    const ch = name.charAt(index);
    if (SEPARATORS.has(ch)) {
      upper = true;
      continue;
    }
    result += upper ? ch.toUpperCase() : ch;
    upper = false;
  }

  return result;
}

/**
 * Splits a content key on `:` and `.` into normalized path segments
 *
 * @throws FormatError when a segment normalizes to nothing
 */
export function splitKeyPath(key: string): string[] {
  return key.split(/[:.]/).map((segment) => {
    const normalized = normalizeKeyName(segment);
    if (normalized.length === 0) {
      throw FormatError.invalidKeyName(key);
    }
    return normalized;
  });
}
