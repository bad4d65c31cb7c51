/**
 * URI reference converter
 * @module splunk-client/converters/uri
 */

import { FormatError } from '../errors/index.js';
import type { ValueConverter } from './types.js';

/**
 * Accepts absolute URIs and relative references such as the
 * `/servicesNS/nobody/search/...` links of a feed; returns the trimmed text
 */
export const uriConverter: ValueConverter<string> = {
  typeName: 'uri',
  convert(text, field) {
    const trimmed = text.trim();

    if (trimmed.length === 0 || /\s/.test(trimmed)) {
      throw FormatError.conversionFailed('uri', text, field);
    }

    if (/^[a-z][a-z0-9+.-]*:/i.test(trimmed) && !isAbsoluteUrl(trimmed)) {
      throw FormatError.conversionFailed('uri', text, field);
    }

    return trimmed;
  },
};

function isAbsoluteUrl(text: string): boolean {
  try {
    new URL(text);
    return true;
  } catch {
    return false;
  }
}
