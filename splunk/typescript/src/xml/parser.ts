/**
 * Whole-document XML parsing for small response bodies
 * @module splunk-client/xml/parser
 */

import { XMLParser } from 'fast-xml-parser';
import { FormatError } from '../errors/index.js';

/**
 * Parser options for `<response>` bodies
 */
const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  allowBooleanAttributes: true,
};

export type XmlNode = { readonly [key: string]: unknown };

export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

/**
 * Parses and validates an XML string
 *
 * @throws FormatError for malformed documents
 */
export function parseXml(xml: string): XmlNode {
  const parser = createXmlParser();
  let parsed: unknown;
  try {
    parsed = parser.parse(xml, true);
  } catch (error) {
    throw FormatError.malformedDocument(error instanceof Error ? error.message : String(error));
  }
  if (!isXmlNode(parsed)) {
    throw FormatError.malformedDocument('no document element');
  }
  return parsed;
}

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Child element of a parsed node, if it is itself an element or text
 */
export function childOf(node: unknown, name: string): unknown {
  return isXmlNode(node) ? node[name] : undefined;
}

/**
 * Text of a parsed element: a bare string, or the `#text` of an element
 * carrying attributes
 */
export function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') {
    return node;
  }
  const text = childOf(node, '#text');
  if (typeof text === 'string') {
    return text;
  }
  return isXmlNode(node) ? '' : undefined;
}

export function attributeOf(node: unknown, name: string): string | undefined {
  const value = childOf(node, `@_${name}`);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Repeated elements parse to an array, single ones to a value
 */
export function normalizeArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}
