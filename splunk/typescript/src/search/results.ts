/**
 * Streaming reader for `<results>` documents
 * @module splunk-client/search/results
 */

import { messageTypeConverter, type Message } from '../atom/index.js';
import { booleanConverter, int32Converter } from '../converters/index.js';
import { FormatError } from '../errors/index.js';
import { MarkupReader } from '../xml/index.js';

export type FieldValue = string | readonly string[];

/**
 * One `<result>` record; a field with several values holds them in order
 */
export class SearchResult {
  private readonly fields: ReadonlyMap<string, FieldValue>;

  constructor(
    fields: Iterable<readonly [string, FieldValue]>,
    readonly offset?: number
  ) {
    this.fields = new Map(fields);
    Object.freeze(this);
  }

  get fieldNames(): readonly string[] {
    return [...this.fields.keys()];
  }

  get(name: string): FieldValue | undefined {
    return this.fields.get(name);
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  toJSON(): Record<string, FieldValue> {
    return Object.fromEntries(this.fields);
  }

  toString(): string {
    return [...this.fields].map(([name, value]) => `${name}=${String(value)}`).join(', ');
  }
}

export interface SearchResultMetadata {
  /**
   * False for a preview of a search still running
   */
  readonly isFinal: boolean;

  readonly fieldNames: readonly string[];
  readonly messages: readonly Message[];
}

const MISSING_METADATA: SearchResultMetadata = Object.freeze({
  isFinal: true,
  fieldNames: Object.freeze([]),
  messages: Object.freeze([]),
});

/**
 * Results of a search, read as they arrive
 *
 * `open` reads the header; iterating yields the records. The stream can be
 * iterated once. Leaving the loop early, or calling `close`, cancels the
 * underlying response.
 *
 * @example
 * ```typescript
 * const stream = await client.jobs.getResults(sid);
 * for await (const result of stream) {
 *   console.log(result.get('_raw'));
 * }
 * ```
 */
export class SearchResultStream implements AsyncIterable<SearchResult> {
  private consumed = false;

  private constructor(
    private readonly reader: MarkupReader,
    readonly metadata: SearchResultMetadata
  ) {}

  static async open(reader: MarkupReader): Promise<SearchResultStream> {
    try {
      return new SearchResultStream(reader, await readMetadata(reader));
    } catch (error) {
      await reader.close();
      throw error;
    }
  }

  static async parse(text: string): Promise<SearchResultStream> {
    return SearchResultStream.open(MarkupReader.fromString(text));
  }

  get isFinal(): boolean {
    return this.metadata.isFinal;
  }

  get fieldNames(): readonly string[] {
    return this.metadata.fieldNames;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<SearchResult> {
    if (this.consumed) {
      throw FormatError.malformedDocument('search results can be read once');
    }
    this.consumed = true;

    const reader = this.reader;
    try {
      while (reader.nodeKind === 'element' && reader.name === 'result') {
        yield await readResult(reader);
      }
      if (reader.nodeKind === 'end-element') {
        await reader.readEndElementSequence('results');
      }
    } finally {
      await reader.close();
    }
  }

  /**
   * Reads every remaining record
   */
  async toArray(): Promise<SearchResult[]> {
    const results: SearchResult[] = [];
    for await (const result of this) {
      results.push(result);
    }
    return results;
  }

  async close(): Promise<void> {
    this.consumed = true;
    await this.reader.close();
  }
}

/**
 * `<results preview=".."><meta><fieldOrder>...</fieldOrder></meta>` and an
 * optional `<messages>` block
 */
async function readMetadata(reader: MarkupReader): Promise<SearchResultMetadata> {
  if (!(await reader.advanceToDocumentElement('results'))) {
    return MISSING_METADATA;
  }

  const preview = booleanConverter.convert(reader.requireAttribute('preview'), 'preview');
  const fieldNames: string[] = [];
  const messages: Message[] = [];

  if (reader.isEmptyElement) {
    await reader.read();
    return Object.freeze({ isFinal: !preview, fieldNames, messages });
  }

  await reader.read();

  if (reader.nodeKind === 'element' && reader.name === 'meta') {
    await reader.read();
    reader.ensureMarkup('element', 'fieldOrder');
    const emptyOrder = reader.isEmptyElement;

    await reader.readEachDescendant('field', async (r) => {
      await r.read();
      fieldNames.push(await r.readContentAsString());
    });

    await reader.readEndElementSequence(...(emptyOrder ? ['meta'] : ['fieldOrder', 'meta']));
  }

  if (reader.nodeKind === 'element' && reader.name === 'messages') {
    const emptyMessages = reader.isEmptyElement;

    await reader.readEachDescendant('msg', async (r) => {
      const type = messageTypeConverter.convert(r.requireAttribute('type'), 'type');
      const text = await r.readElementContentAsString();
      messages.push(Object.freeze({ type, text }));
    });

    if (!emptyMessages) {
      await reader.readEndElementSequence('messages');
    }
  }

  return Object.freeze({ isFinal: !preview, fieldNames: Object.freeze(fieldNames), messages: Object.freeze(messages) });
}

async function readResult(reader: MarkupReader): Promise<SearchResult> {
  const offsetText = reader.getAttribute('offset');
  const offset = offsetText === undefined ? undefined : int32Converter.convert(offsetText, 'offset');
  const fields: [string, FieldValue][] = [];
  const empty = reader.isEmptyElement;

  await reader.readEachDescendant('field', async (r) => {
    const name = r.requireAttribute('k');
    const values = await readFieldValues(r);
    fields.push([name, values.length === 1 ? values[0] ?? '' : Object.freeze(values)]);
  });

  if (!empty) {
    await reader.readEndElementSequence('result');
  }

  return new SearchResult(fields, offset);
}

/**
 * `<value><text>..</text></value>` per value, or a single `<v>` holding
 * raw text with highlighting markup
 */
async function readFieldValues(reader: MarkupReader): Promise<string[]> {
  const values: string[] = [];

  if (reader.isEmptyElement) {
    await reader.read();
    return values;
  }

  await reader.read();

  while (reader.nodeKind === 'element') {
    switch (reader.name) {
      case 'value':
        values.push(await readValue(reader));
        break;
      case 'v':
        values.push(await readAllText(reader));
        break;
      default:
        await reader.skip();
    }
  }

  await reader.readEndElementSequence('field');
  return values;
}

async function readValue(reader: MarkupReader): Promise<string> {
  let text = '';

  if (reader.isEmptyElement) {
    await reader.read();
    return text;
  }

  await reader.read();

  while (reader.nodeKind === 'element') {
    if (reader.name === 'text') {
      text = await reader.readElementContentAsString();
    } else {
      await reader.skip();
    }
  }

  await reader.readEndElementSequence('value');
  return text;
}

/**
 * Concatenated text of an element and its descendants
 */
async function readAllText(reader: MarkupReader): Promise<string> {
  const name = reader.name;
  const depth = reader.depth;

  if (reader.isEmptyElement) {
    await reader.read();
    return '';
  }

  let text = '';
  await reader.read();

  while (!(reader.nodeKind === 'end-element' && reader.depth === depth)) {
    if (reader.nodeKind === 'text') {
      text += reader.value;
    }
    if (!(await reader.read())) {
      throw FormatError.malformedDocument(`document ends inside <${name}>`);
    }
  }

  await reader.read();
  return text;
}
