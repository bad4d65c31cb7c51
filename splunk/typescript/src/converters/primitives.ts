/**
 * String, numeric and boolean converters
 * @module splunk-client/converters/primitives
 */

import { FormatError } from '../errors/index.js';
import type { ValueConverter } from './types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export const stringConverter: ValueConverter<string> = {
  typeName: 'string',
  convert: (text) => text,
};

function integerConverter(typeName: string, min: number, max: number): ValueConverter<number> {
  return {
    typeName,
    convert(text, field) {
      const trimmed = text.trim();
      if (!INTEGER_PATTERN.test(trimmed)) {
        throw FormatError.conversionFailed(typeName, text, field);
      }
      const value = Number(trimmed);
      if (value < min || value > max) {
        throw FormatError.conversionFailed(typeName, text, field);
      }
      return value;
    },
  };
}

function bigIntegerConverter(typeName: string, min: bigint, max: bigint): ValueConverter<bigint> {
  return {
    typeName,
    convert(text, field) {
      const trimmed = text.trim();
      if (!INTEGER_PATTERN.test(trimmed)) {
        throw FormatError.conversionFailed(typeName, text, field);
      }
      const value = BigInt(trimmed.startsWith('+') ? trimmed.slice(1) : trimmed);
      if (value < min || value > max) {
        throw FormatError.conversionFailed(typeName, text, field);
      }
      return value;
    },
  };
}

export const int8Converter = integerConverter('int8', -0x80, 0x7f);
export const int16Converter = integerConverter('int16', -0x8000, 0x7fff);
export const int32Converter = integerConverter('int32', -0x80000000, 0x7fffffff);
export const uint8Converter = integerConverter('uint8', 0, 0xff);
export const uint16Converter = integerConverter('uint16', 0, 0xffff);
export const uint32Converter = integerConverter('uint32', 0, 0xffffffff);

export const int64Converter = bigIntegerConverter(
  'int64',
  -(2n ** 63n),
  2n ** 63n - 1n
);
export const uint64Converter = bigIntegerConverter('uint64', 0n, 2n ** 64n - 1n);

export const floatConverter: ValueConverter<number> = {
  typeName: 'float',
  convert(text, field) {
    const trimmed = text.trim();
    if (FLOAT_PATTERN.test(trimmed)) {
      return Number(trimmed);
    }
    switch (trimmed.toLowerCase()) {
      case 'nan':
        return Number.NaN;
      case 'inf':
      case 'infinity':
      case '+infinity':
        return Number.POSITIVE_INFINITY;
      case '-inf':
      case '-infinity':
        return Number.NEGATIVE_INFINITY;
      default:
        throw FormatError.conversionFailed('float', text, field);
    }
  },
};

/**
 * Accepts `0`/`1` and `true`/`false` in any case
 */
export const booleanConverter: ValueConverter<boolean> = {
  typeName: 'boolean',
  convert(text, field) {
    switch (text.trim().toLowerCase()) {
      case '0':
      case 'false':
        return false;
      case '1':
      case 'true':
        return true;
      default:
        throw FormatError.conversionFailed('boolean', text, field);
    }
  },
};
