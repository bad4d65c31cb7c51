/**
 * Pull-able markup nodes over the htmlparser2 push parser
 * @module splunk-client/xml/tokenizer
 */

import { Parser } from 'htmlparser2';
import { FormatError } from '../errors/index.js';

export type MarkupNodeKind = 'none' | 'element' | 'end-element' | 'text';

export interface MarkupNode {
  readonly kind: MarkupNodeKind;

  /**
   * Qualified element name (`s:key`), empty for text
   */
  readonly name: string;

  /**
   * Number of enclosing elements
   */
  readonly depth: number;

  /**
   * True for a self-closing element, which has no end-element node
   */
  readonly isEmptyElement: boolean;

  /**
   * Decoded text of a text node
   */
  readonly value: string;

  readonly attributes: Readonly<Record<string, string>>;
}

interface PendingNode {
  kind: Exclude<MarkupNodeKind, 'none'>;
  name: string;
  depth: number;
  isEmptyElement: boolean;
  value: string;
  attributes: Readonly<Record<string, string>>;
  preserveSpace: boolean;
}

const NO_ATTRIBUTES: Readonly<Record<string, string>> = Object.freeze({});

/**
 * Turns pushed text into a sequence of element, end-element and text nodes
 *
 * Comments, processing instructions and whitespace-only text are dropped,
 * CDATA sections read as text and adjacent text merges into one node.
 * Whitespace-only text inside an `xml:space="preserve"` element is kept. The
 * newest node stays pending until the next event (or the end of input)
 * shows it complete: a self-closing element is only known to be empty once
 * its implied close tag arrives.
 *
 * htmlparser2 repairs bad nesting silently, so every event's source position
 * is checked against the previous one: an end tag it swallowed leaves a gap,
 * and an end tag it implied (other than for `<x/>`) is a mismatch. Both fail
 * the document.
 */
export class MarkupTokenizer {
  private readonly parser: Parser;
  private readonly ready: MarkupNode[] = [];
  private readonly preserveSpace: boolean[] = [];
  private pending: PendingNode | undefined;
  private depth = 0;
  private lastEnd = -1;
  private openStart = -1;
  private ending = false;
  private ended = false;
  private failure: Error | undefined;

  constructor() {
    this.parser = new Parser(
      {
        onopentag: (name, attribs) => {
          this.checkContiguous();
          this.flush();
          this.openStart = this.parser.startIndex;
          this.pending = {
            kind: 'element',
            name,
            depth: this.depth,
            isEmptyElement: false,
            value: '',
            attributes: Object.keys(attribs).length > 0 ? Object.freeze({ ...attribs }) : NO_ATTRIBUTES,
            preserveSpace: false,
          };
          this.preserveSpace.push(spaceHandling(attribs['xml:space'], this.isPreservingSpace));
          this.depth++;
          this.lastEnd = this.parser.endIndex;
        },
        onclosetag: (name, isImplied) => {
          this.depth--;
          this.preserveSpace.pop();
          if (this.ending) {
            this.failure ??= FormatError.malformedDocument(`document ends inside <${name}>`);
            return;
          }
          const open = this.pending;
          if (
            isImplied &&
            open?.kind === 'element' &&
            open.name === name &&
            open.depth === this.depth &&
            this.parser.startIndex === this.openStart
          ) {
            open.isEmptyElement = true;
            return;
          }
          if (isImplied) {
            this.failure ??= FormatError.malformedDocument(`mismatched end tag, <${name}> is still open`);
          }
          this.checkContiguous();
          this.flush();
          this.pending = {
            kind: 'end-element',
            name,
            depth: this.depth,
            isEmptyElement: false,
            value: '',
            attributes: NO_ATTRIBUTES,
            preserveSpace: false,
          };
          this.lastEnd = this.parser.endIndex;
        },
        ontext: (text) => {
          this.checkContiguous();
          this.lastEnd = this.parser.endIndex;
          if (this.pending?.kind === 'text') {
            this.pending.value += text;
            return;
          }
          this.flush();
          this.pending = {
            kind: 'text',
            name: '',
            depth: this.depth,
            isEmptyElement: false,
            value: text,
            attributes: NO_ATTRIBUTES,
            preserveSpace: this.isPreservingSpace,
          };
        },
        oncomment: () => {
          this.checkContiguous();
          this.lastEnd = this.parser.endIndex;
        },
        onprocessinginstruction: () => {
          this.checkContiguous();
          this.lastEnd = this.parser.endIndex;
        },
        onerror: (error) => {
          this.failure ??= FormatError.malformedDocument(error.message);
        },
      },
      { xmlMode: true, decodeEntities: true, recognizeCDATA: true }
    );
  }

  /**
   * Feeds the next piece of the document
   */
  write(chunk: string): void {
    if (this.ended) {
      throw FormatError.malformedDocument('write after end of input');
    }
    this.parser.write(chunk);
  }

  /**
   * Signals the end of input, releasing the last pending node
   */
  end(): void {
    if (this.ended) {
      return;
    }
    this.ending = true;
    this.parser.end();
    this.ending = false;
    this.ended = true;
    this.checkContiguous();
    this.flush();
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Next complete node, or `undefined` when more input is needed (or the
   * input is exhausted)
   */
  take(): MarkupNode | undefined {
    if (this.failure) {
      throw this.failure;
    }
    return this.ready.shift();
  }

  private get isPreservingSpace(): boolean {
    return this.preserveSpace[this.preserveSpace.length - 1] ?? false;
  }

  /**
   * The parser's current start position must follow the last reported event
   */
  private checkContiguous(): void {
    if (this.parser.startIndex !== this.lastEnd + 1) {
      this.failure ??= FormatError.malformedDocument('unexpected end tag');
    }
  }

  private flush(): void {
    const node = this.pending;
    this.pending = undefined;
    if (!node || (node.kind === 'text' && !node.preserveSpace && node.value.trim().length === 0)) {
      return;
    }
    this.ready.push(
      Object.freeze({
        kind: node.kind,
        name: node.name,
        depth: node.depth,
        isEmptyElement: node.isEmptyElement,
        value: node.value,
        attributes: node.attributes,
      })
    );
  }
}

function spaceHandling(value: string | undefined, inherited: boolean): boolean {
  if (value === 'preserve') {
    return true;
  }
  if (value === 'default') {
    return false;
  }
  return inherited;
}
