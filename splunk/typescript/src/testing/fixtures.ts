/**
 * Test configuration and document builders
 * @module splunk-client/testing/fixtures
 */

import { normalizeConfig, type NormalizedSplunkConfig, type SplunkConfig } from '../config/index.js';

/**
 * Content of a test entry; nested records become `s:dict`, arrays `s:list`
 */
export type TestContent = { readonly [key: string]: TestContentValue };
export type TestContentValue = string | null | readonly TestContentValue[] | TestContent;

export interface TestEntryOptions {
  id?: string;
  author?: string;
  updated?: string;
  links?: Readonly<Record<string, string>>;
  content?: TestContent;
}

export interface TestFeedOptions {
  title?: string;
  totalResults?: number;
  messages?: readonly { type: string; text: string }[];
}

export interface TestResultsOptions {
  preview?: boolean;
  fieldNames?: readonly string[];
}

/**
 * Create a test configuration with placeholder credentials
 */
export function createTestConfig(overrides: SplunkConfig = {}): NormalizedSplunkConfig {
  return normalizeConfig({
    host: 'splunk.test',
    username: 'admin',
    password: 'test-secret',
    logLevel: 'off',
    ...overrides,
  });
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * `<entry>` markup with its content as `s:dict`
 *
 * @example
 * ```typescript
 * createTestEntry('main', { content: { totalEventCount: '42' } });
 * ```
 */
export function createTestEntry(title: string, options: TestEntryOptions = {}): string {
  const links = Object.entries(options.links ?? {})
    .map(([rel, href]) => `<link href="${escapeXml(href)}" rel="${escapeXml(rel)}"/>`)
    .join('');

  return [
    '<entry>',
    `<title>${escapeXml(title)}</title>`,
    options.id === undefined ? '' : `<id>${escapeXml(options.id)}</id>`,
    `<updated>${options.updated ?? '2014-03-18T14:42:58-07:00'}</updated>`,
    links,
    options.author === undefined ? '' : `<author><name>${escapeXml(options.author)}</name></author>`,
    options.content === undefined ? '' : `<content type="text/xml">${dictionary(options.content)}</content>`,
    '</entry>',
  ].join('');
}

/**
 * `<feed>` markup around entries made by {@link createTestEntry}
 */
export function createTestFeed(entries: readonly string[], options: TestFeedOptions = {}): string {
  const messages =
    options.messages === undefined
      ? ''
      : `<s:messages>${options.messages
          .map((m) => `<s:msg type="${escapeXml(m.type)}">${escapeXml(m.text)}</s:msg>`)
          .join('')}</s:messages>`;

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom" xmlns:s="http://dev.splunk.com/ns/rest" xmlns:opensearch="http://a9.com/-/spec/opensearch/1.1/">',
    `<title>${escapeXml(options.title ?? 'feed')}</title>`,
    `<opensearch:totalResults>${options.totalResults ?? entries.length}</opensearch:totalResults>`,
    messages,
    ...entries,
    '</feed>',
  ].join('\n');
}

/**
 * `<results>` markup; each row lists its fields in order, an array giving a
 * multi-valued field
 */
export function createTestResults(
  rows: readonly Readonly<Record<string, string | readonly string[]>>[],
  options: TestResultsOptions = {}
): string {
  const fieldNames = options.fieldNames ?? [...new Set(rows.flatMap((row) => Object.keys(row)))];
  const fieldOrder = fieldNames.map((name) => `<field>${escapeXml(name)}</field>`).join('');

  const results = rows.map((row, offset) => {
    const fields = Object.entries(row).map(([name, value]) => {
      const values = typeof value === 'string' ? [value] : value;
      const markup = values.map((v) => `<value><text>${escapeXml(v)}</text></value>`).join('');
      return `<field k="${escapeXml(name)}">${markup}</field>`;
    });
    return `<result offset="${offset}">${fields.join('')}</result>`;
  });

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<results preview="${options.preview ? 1 : 0}">`,
    `<meta><fieldOrder>${fieldOrder}</fieldOrder></meta>`,
    ...results,
    '</results>',
  ].join('\n');
}

function dictionary(content: TestContent): string {
  const keys = Object.entries(content).map(
    ([name, value]) => `<s:key name="${escapeXml(name)}">${contentValue(value)}</s:key>`
  );
  return `<s:dict>${keys.join('')}</s:dict>`;
}

function contentValue(value: TestContentValue): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return escapeXml(value);
  }
  if (isContentList(value)) {
    return `<s:list>${value.map((item) => `<s:item>${contentValue(item)}</s:item>`).join('')}</s:list>`;
  }
  return dictionary(value);
}

function isContentList(value: readonly TestContentValue[] | TestContent): value is readonly TestContentValue[] {
  return Array.isArray(value);
}
