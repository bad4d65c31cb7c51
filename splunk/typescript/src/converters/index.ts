/**
 * Typed converters for wire text
 * @module splunk-client/converters
 */

import { dateTimeConverter } from './date-time.js';
import {
  booleanConverter,
  floatConverter,
  int16Converter,
  int32Converter,
  int64Converter,
  int8Converter,
  stringConverter,
  uint16Converter,
  uint32Converter,
  uint64Converter,
  uint8Converter,
} from './primitives.js';
import { uriConverter } from './uri.js';
import { versionConverter } from './version.js';

export type { ValueConverter } from './types.js';
export {
  booleanConverter,
  floatConverter,
  int16Converter,
  int32Converter,
  int64Converter,
  int8Converter,
  stringConverter,
  uint16Converter,
  uint32Converter,
  uint64Converter,
  uint8Converter,
} from './primitives.js';
export { dateTimeConverter, MIN_TIMESTAMP } from './date-time.js';
export { uriConverter } from './uri.js';
export { Version, versionConverter } from './version.js';
export {
  EnumConverter,
  enumMembers,
  type EnumAliases,
  type EnumMember,
  type EnumObject,
  type EnumValue,
} from './enum.js';

/**
 * Built-in converters keyed by type identifier
 */
export const converters = Object.freeze({
  string: stringConverter,
  int8: int8Converter,
  int16: int16Converter,
  int32: int32Converter,
  uint8: uint8Converter,
  uint16: uint16Converter,
  uint32: uint32Converter,
  int64: int64Converter,
  uint64: uint64Converter,
  float: floatConverter,
  boolean: booleanConverter,
  dateTime: dateTimeConverter,
  uri: uriConverter,
  version: versionConverter,
});

export type ConverterType = keyof typeof converters;

export function converterFor<K extends ConverterType>(type: K): (typeof converters)[K] {
  return converters[type];
}
