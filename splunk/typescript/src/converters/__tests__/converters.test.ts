/**
 * Tests for wire text converters
 */

import { FormatError } from '../../errors/index.js';
import {
  booleanConverter,
  converterFor,
  dateTimeConverter,
  EnumConverter,
  floatConverter,
  int32Converter,
  int64Converter,
  int8Converter,
  MIN_TIMESTAMP,
  uint16Converter,
  uriConverter,
  Version,
  versionConverter,
} from '../index.js';

enum Color {
  Red = 'red',
  DarkBlue = 'dark_blue',
}

enum Level {
  Low,
  High,
}

describe('integer converters', () => {
  it('should parse trimmed integers with a sign', () => {
    expect(int32Converter.convert(' 42 ')).toBe(42);
    expect(int32Converter.convert('-7')).toBe(-7);
    expect(int32Converter.convert('+7')).toBe(7);
  });

  it('should enforce the range of the type', () => {
    expect(int8Converter.convert('127')).toBe(127);
    expect(() => int8Converter.convert('128')).toThrow(FormatError);
    expect(() => uint16Converter.convert('-1', 'port')).toThrow("Cannot convert '-1' to uint16 (port)");
  });

  it('should reject fractions and words', () => {
    expect(() => int32Converter.convert('1.5')).toThrow(FormatError);
    expect(() => int32Converter.convert('abc')).toThrow(FormatError);
    expect(() => int32Converter.convert('')).toThrow(FormatError);
  });

  it('should read 64-bit values as bigint', () => {
    expect(int64Converter.convert('9223372036854775807')).toBe(9223372036854775807n);
    expect(() => int64Converter.convert('9223372036854775808')).toThrow(FormatError);
  });
});

describe('floatConverter', () => {
  it('should parse decimals and exponents', () => {
    expect(floatConverter.convert('0.25')).toBe(0.25);
    expect(floatConverter.convert('1e3')).toBe(1000);
    expect(floatConverter.convert('.5')).toBe(0.5);
  });

  it('should read special values', () => {
    expect(floatConverter.convert('NaN')).toBeNaN();
    expect(floatConverter.convert('inf')).toBe(Number.POSITIVE_INFINITY);
    expect(floatConverter.convert('-Infinity')).toBe(Number.NEGATIVE_INFINITY);
  });

  it('should reject other text', () => {
    expect(() => floatConverter.convert('1.2.3')).toThrow(FormatError);
  });
});

describe('booleanConverter', () => {
  it.each([
    ['0', false],
    ['1', true],
    ['true', true],
    [' FALSE ', false],
    ['True', true],
  ])('should convert %j', (text, expected) => {
    expect(booleanConverter.convert(text)).toBe(expected);
  });

  it('should reject other words', () => {
    expect(() => booleanConverter.convert('yes', 'visible')).toThrow("Cannot convert 'yes' to boolean (visible)");
  });
});

describe('dateTimeConverter', () => {
  it('should read offsets', () => {
    expect(dateTimeConverter.convert('2014-03-18T14:42:58-07:00').toISOString()).toBe('2014-03-18T21:42:58.000Z');
    expect(dateTimeConverter.convert('2014-03-18T14:42:58+0100').toISOString()).toBe('2014-03-18T13:42:58.000Z');
    expect(dateTimeConverter.convert('2014-03-18T14:42:58Z').toISOString()).toBe('2014-03-18T14:42:58.000Z');
  });

  it('should read timestamps without an offset as UTC', () => {
    expect(dateTimeConverter.convert('2014-03-18 14:42:58').toISOString()).toBe('2014-03-18T14:42:58.000Z');
    expect(dateTimeConverter.convert('2014-03-18T14:42').toISOString()).toBe('2014-03-18T14:42:00.000Z');
  });

  it('should keep milliseconds of long fractions', () => {
    expect(dateTimeConverter.convert('2014-03-18T14:42:58.123456789Z').toISOString()).toBe(
      '2014-03-18T14:42:58.123Z'
    );
  });

  it('should read epoch seconds', () => {
    expect(dateTimeConverter.convert('1395176578.5').getTime()).toBe(1395176578500);
  });

  it('should reject impossible dates', () => {
    expect(() => dateTimeConverter.convert('2014-02-30T00:00:00Z')).toThrow(FormatError);
    expect(() => dateTimeConverter.convert('yesterday')).toThrow(FormatError);
  });

  it('should place the minimum timestamp at year one', () => {
    expect(MIN_TIMESTAMP.toISOString()).toBe('0001-01-01T00:00:00.000Z');
  });
});

describe('uriConverter', () => {
  it('should accept absolute and relative references', () => {
    expect(uriConverter.convert('https://localhost:8089/services/apps/local')).toBe(
      'https://localhost:8089/services/apps/local'
    );
    expect(uriConverter.convert(' /servicesNS/nobody/search/apps/local/search ')).toBe(
      '/servicesNS/nobody/search/apps/local/search'
    );
  });

  it('should reject empty text and embedded spaces', () => {
    expect(() => uriConverter.convert('  ')).toThrow(FormatError);
    expect(() => uriConverter.convert('/a b')).toThrow(FormatError);
  });
});

describe('versionConverter', () => {
  it('should parse two to four components', () => {
    expect(versionConverter.convert('6.1').toString()).toBe('6.1');
    const version = versionConverter.convert('6.0.3.182037');
    expect(version.major).toBe(6);
    expect(version.revision).toBe(182037);
  });

  it('should order versions', () => {
    expect(new Version(6, 1).compareTo(new Version(6, 1, 0))).toBe(-1);
    expect(new Version(6, 2).compareTo(new Version(6, 1, 9))).toBe(1);
    expect(new Version(6, 1, 2).equals(versionConverter.convert('6.1.2'))).toBe(true);
  });

  it('should reject other shapes', () => {
    expect(() => versionConverter.convert('6')).toThrow(FormatError);
    expect(() => versionConverter.convert('6.x')).toThrow(FormatError);
  });
});

describe('EnumConverter', () => {
  const colors = EnumConverter.create('Color', Color, { DarkBlue: 'navy' });

  it('should match the wire name exactly', () => {
    expect(colors.convert('red')).toBe(Color.Red);
    expect(colors.convert('navy')).toBe(Color.DarkBlue);
  });

  it('should match member names and values ignoring case', () => {
    expect(colors.convert('RED')).toBe(Color.Red);
    expect(colors.convert('darkblue')).toBe(Color.DarkBlue);
    expect(colors.convert('Dark_Blue')).toBe(Color.DarkBlue);
  });

  it('should report unmapped text with the enum type and field', () => {
    expect(() => colors.convert('green', 'color')).toThrow("Color.color: 'green' is not a recognized value");
  });

  it('should skip the reverse mapping of numeric enums', () => {
    const levels = EnumConverter.create('Level', Level);
    expect(levels.members.map((m) => m.wireName)).toEqual(['Low', 'High']);
    expect(levels.convert('high')).toBe(Level.High);
    expect(levels.wireNameOf(Level.Low)).toBe('Low');
  });
});

describe('converterFor', () => {
  it('should look up converters by type identifier', () => {
    expect(converterFor('int32')).toBe(int32Converter);
    expect(converterFor('boolean').convert('1')).toBe(true);
  });
});
