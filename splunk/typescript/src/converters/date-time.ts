/**
 * Timestamp converter
 * @module splunk-client/converters/date-time
 */

import { FormatError } from '../errors/index.js';
import type { ValueConverter } from './types.js';

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const EPOCH_PATTERN = /^\d+(?:\.\d+)?$/;

/**
 * 0001-01-01T00:00:00Z, the value of timestamps a document leaves out
 */
export const MIN_TIMESTAMP: Date = new Date(-62135596800000);

/**
 * Converts ISO-8601 timestamps and epoch seconds to `Date`
 *
 * Timestamps without an offset, as found in feeds, are read as UTC.
 */
export const dateTimeConverter: ValueConverter<Date> = {
  typeName: 'dateTime',
  convert(text, field) {
    const trimmed = text.trim();

    if (EPOCH_PATTERN.test(trimmed)) {
      return new Date(Math.round(Number(trimmed) * 1000));
    }

    const match = ISO_PATTERN.exec(trimmed);
    if (!match) {
      throw FormatError.conversionFailed('dateTime', text, field);
    }

    const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = '', zone] = match;
    const fields = {
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour),
      minute: Number(minute),
      second: Number(second),
      millisecond: Number(fraction.padEnd(3, '0').slice(0, 3)),
    };

    const date = new Date(0);
    date.setUTCFullYear(fields.year, fields.month - 1, fields.day);
    date.setUTCHours(fields.hour, fields.minute, fields.second, fields.millisecond);

    if (
      date.getUTCFullYear() !== fields.year ||
      date.getUTCMonth() !== fields.month - 1 ||
      date.getUTCDate() !== fields.day ||
      date.getUTCHours() !== fields.hour ||
      date.getUTCMinutes() !== fields.minute ||
      date.getUTCSeconds() !== fields.second
    ) {
      throw FormatError.conversionFailed('dateTime', text, field);
    }

    return new Date(date.getTime() - offsetMinutes(zone) * 60_000);
  },
};

function offsetMinutes(zone: string | undefined): number {
  if (zone === undefined || zone.toUpperCase() === 'Z') {
    return 0;
  }
  const digits = zone.slice(1).replace(':', '');
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2));
  return zone.startsWith('-') ? -minutes : minutes;
}
