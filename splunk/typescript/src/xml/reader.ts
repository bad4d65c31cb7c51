/**
 * Forward-only markup reader with the navigation helpers used by the
 * feed and search-result parsers
 * @module splunk-client/xml/reader
 */

import { FormatError } from '../errors/index.js';
import { stringConverter, type ValueConverter } from '../converters/index.js';
import { MarkupTokenizer, type MarkupNode, type MarkupNodeKind } from './tokenizer.js';

const NO_NODE: MarkupNode = Object.freeze({
  kind: 'none',
  name: '',
  depth: 0,
  isEmptyElement: false,
  value: '',
  attributes: Object.freeze({}),
});

type Chunk = string | Uint8Array;

/**
 * Reads one document node by node
 *
 * Every read may wait for the source to produce more bytes. A reader
 * belongs to a single parse: its methods must not be called concurrently.
 */
export class MarkupReader {
  private readonly tokenizer = new MarkupTokenizer();
  private readonly decoder = new TextDecoder('utf-8');
  private node: MarkupNode = NO_NODE;
  private position = 0;
  private exhausted = false;
  private closed = false;

  private constructor(private readonly source: AsyncIterator<Chunk>) {}

  static fromString(text: string): MarkupReader {
    return MarkupReader.fromChunks([text]);
  }

  static fromChunks(chunks: AsyncIterable<Chunk> | Iterable<Chunk>): MarkupReader {
    if (isAsyncIterable(chunks)) {
      return new MarkupReader(chunks[Symbol.asyncIterator]());
    }
    const iterator = chunks[Symbol.iterator]();
    return new MarkupReader({
      next: async () => iterator.next(),
      return: async () => iterator.return?.() ?? { done: true, value: undefined },
    });
  }

  /**
   * Reads a response body; closing the reader cancels the stream
   */
  static fromStream(stream: ReadableStream<Uint8Array>): MarkupReader {
    const reader = stream.getReader();
    return new MarkupReader({
      next: async (): Promise<IteratorResult<Chunk>> => {
        const { done, value } = await reader.read();
        return done ? { done: true, value: undefined } : { done: false, value };
      },
      return: async (): Promise<IteratorResult<Chunk>> => {
        await reader.cancel();
        reader.releaseLock();
        return { done: true, value: undefined };
      },
    });
  }

  get nodeKind(): MarkupNodeKind {
    return this.node.kind;
  }

  get name(): string {
    return this.node.name;
  }

  get depth(): number {
    return this.node.depth;
  }

  get isEmptyElement(): boolean {
    return this.node.isEmptyElement;
  }

  get value(): string {
    return this.node.value;
  }

  /**
   * True once the last node has been read
   */
  get isEOF(): boolean {
    return this.exhausted && this.node.kind === 'none';
  }

  getAttribute(name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(this.node.attributes, name)
      ? this.node.attributes[name]
      : undefined;
  }

  /**
   * Moves to the next node
   *
   * @returns false at the end of the document
   */
  async read(): Promise<boolean> {
    if (this.closed) {
      throw FormatError.malformedDocument('read after the reader was closed');
    }

    this.position++;

    for (;;) {
      const next = this.tokenizer.take();
      if (next) {
        this.node = next;
        return true;
      }
      if (this.tokenizer.isEnded) {
        this.node = NO_NODE;
        this.exhausted = true;
        return false;
      }
      await this.pull();
    }
  }

  /**
   * Skips the prologue and stops on the root element
   *
   * @returns false for an empty document
   */
  async advanceToDocumentElement(expectedName?: string): Promise<boolean> {
    if (this.node.kind === 'none' && !(await this.read())) {
      return false;
    }
    this.ensureMarkup('element', ...(expectedName === undefined ? [] : [expectedName]));
    return true;
  }

  requireAttribute(name: string): string {
    const value = this.getAttribute(name);
    if (value === undefined) {
      throw FormatError.missingAttribute(name, this.node.name);
    }
    return value;
  }

  /**
   * Converts the text of the current element and moves past its end tag
   */
  async readElementContent<T>(converter: ValueConverter<T>): Promise<T> {
    this.ensureMarkup('element');
    const name = this.node.name;
    let text = '';

    if (this.node.isEmptyElement) {
      await this.read();
    } else {
      await this.read();
      text = await this.readContentAsString();
      this.ensureMarkup('end-element', name);
      await this.read();
    }

    return converter.convert(text, name);
  }

  async readElementContentAsString(): Promise<string> {
    return this.readElementContent(stringConverter);
  }

  /**
   * Text at the cursor, moving past it; empty when the cursor is not on text
   */
  async readContentAsString(): Promise<string> {
    if (this.node.kind !== 'text') {
      return '';
    }
    const text = this.node.value;
    await this.read();
    return text;
  }

  /**
   * Fails unless the current node has the given kind and one of `names`
   */
  ensureMarkup(kind: MarkupNodeKind, ...names: readonly string[]): void {
    if (this.node.kind === kind && (names.length === 0 || names.includes(this.node.name))) {
      return;
    }
    throw FormatError.unexpectedMarkup(describeExpected(kind, names), this.describeCurrent());
  }

  /**
   * Calls `action` for each consecutive child element named `name` of the
   * current element
   *
   * An element the action leaves unfinished is skipped to its end. Stops on
   * the first node that is not such an element, normally the parent's end
   * tag.
   */
  async readEachDescendant(name: string, action: (reader: MarkupReader) => Promise<void>): Promise<void> {
    this.ensureMarkup('element');

    if (this.node.isEmptyElement) {
      await this.read();
      return;
    }

    await this.read();

    while (this.at('element', name)) {
      const depth = this.node.depth;
      const position = this.position;

      await action(this);

      if (this.position === position) {
        await this.skip();
        continue;
      }

      while (!this.isEOF && this.node.depth > depth) {
        await this.read();
      }
      if (this.at('end-element') && this.node.depth === depth) {
        await this.read();
      }
    }
  }

  /**
   * Consumes a run of end tags
   */
  async readEndElementSequence(...names: readonly string[]): Promise<void> {
    for (const name of names) {
      this.ensureMarkup('end-element', name);
      await this.read();
    }
  }

  /**
   * Moves past the current element and its subtree, or past the current
   * node when it is not an element
   */
  async skip(): Promise<void> {
    if (this.node.kind !== 'element' || this.node.isEmptyElement) {
      await this.read();
      return;
    }

    const depth = this.node.depth;
    while (await this.read()) {
      if (this.at('end-element') && this.node.depth === depth) {
        await this.read();
        return;
      }
    }
  }

  /**
   * Abandons the document and releases the source
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.node = NO_NODE;
    if (!this.exhausted) {
      await this.source.return?.();
    }
  }

  private at(kind: MarkupNodeKind, name?: string): boolean {
    return this.node.kind === kind && (name === undefined || this.node.name === name);
  }

  private async pull(): Promise<void> {
    const { done, value } = await this.source.next();
    if (done) {
      const tail = this.decoder.decode();
      if (tail) {
        this.tokenizer.write(tail);
      }
      this.tokenizer.end();
      return;
    }
    this.tokenizer.write(typeof value === 'string' ? value : this.decoder.decode(value, { stream: true }));
  }

  private describeCurrent(): string {
    switch (this.node.kind) {
      case 'none':
        return 'end of document';
      case 'element':
        return `<${this.node.name}>`;
      case 'end-element':
        return `</${this.node.name}>`;
      case 'text':
        return `text '${truncate(this.node.value)}'`;
    }
  }
}

function isAsyncIterable(chunks: AsyncIterable<Chunk> | Iterable<Chunk>): chunks is AsyncIterable<Chunk> {
  return Symbol.asyncIterator in chunks;
}

function describeExpected(kind: MarkupNodeKind, names: readonly string[]): string {
  const list = names.length === 0 ? ['*'] : names;
  switch (kind) {
    case 'none':
      return 'end of document';
    case 'element':
      return list.map((n) => `<${n}>`).join(' or ');
    case 'end-element':
      return list.map((n) => `</${n}>`).join(' or ');
    case 'text':
      return 'text';
  }
}

function truncate(text: string): string {
  return text.length > 40 ? `${text.slice(0, 37)}...` : text;
}
