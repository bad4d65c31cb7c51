/**
 * Atom entries: one resource snapshot
 * @module splunk-client/atom/entry
 */

import { FormatError } from '../errors/index.js';
import { dateTimeConverter, MIN_TIMESTAMP, stringConverter, uriConverter } from '../converters/index.js';
import type { ContentValue } from '../value/index.js';
import { MarkupReader } from '../xml/index.js';
import { readContentValue, type ContentReadOptions } from './content.js';

const NO_LINKS: ReadonlyMap<string, string> = new Map();

export interface AtomEntryInit {
  readonly title?: string;
  readonly id?: string;
  readonly author?: string;
  readonly published?: Date;
  readonly updated?: Date;
  readonly links?: ReadonlyMap<string, string>;
  readonly content?: ContentValue;
}

export class AtomEntry {
  readonly title: string | undefined;
  readonly id: string | undefined;
  readonly author: string | undefined;
  readonly published: Date;
  readonly updated: Date;

  /**
   * Link targets keyed by relation (`alternate`, `list`, `edit`, ...)
   */
  readonly links: ReadonlyMap<string, string>;

  /**
   * Parsed `<content>`, `null` when the entry has none
   */
  readonly content: ContentValue;

  constructor(init: AtomEntryInit = {}) {
    this.title = init.title;
    this.id = init.id;
    this.author = init.author;
    this.published = init.published ?? MIN_TIMESTAMP;
    this.updated = init.updated ?? MIN_TIMESTAMP;
    this.links = init.links ?? NO_LINKS;
    this.content = init.content ?? null;
    Object.freeze(this);
  }

  /**
   * Reads an `<entry>` element, leaving the reader past its end tag
   */
  static async read(reader: MarkupReader, options?: ContentReadOptions): Promise<AtomEntry> {
    if (!(await reader.advanceToDocumentElement('entry'))) {
      throw FormatError.emptyDocument('entry');
    }

    let title: string | undefined;
    let id: string | undefined;
    let author: string | undefined;
    let published: Date | undefined;
    let updated: Date | undefined;
    let links: Map<string, string> | undefined;
    let content: ContentValue = null;

    await reader.read();

    while (reader.nodeKind === 'element') {
      switch (reader.name) {
        case 'title':
          title = await reader.readElementContent(stringConverter);
          break;
        case 'id':
          id = await reader.readElementContent(uriConverter);
          break;
        case 'author':
          author = await readAuthor(reader);
          break;
        case 'published':
          published = await reader.readElementContent(dateTimeConverter);
          break;
        case 'updated':
          updated = await reader.readElementContent(dateTimeConverter);
          break;
        case 'link': {
          const [rel, href] = readLink(reader);
          links ??= new Map();
          links.set(rel, href);
          await reader.skip();
          break;
        }
        case 'content':
          content = await readContentValue(reader, 0, options);
          break;
        default:
          throw FormatError.unexpectedElement(reader.name, 'entry');
      }
    }

    reader.ensureMarkup('end-element', 'entry');
    await reader.read();

    return new AtomEntry({ title, id, author, published, updated, links, content });
  }

  static async parse(text: string, options?: ContentReadOptions): Promise<AtomEntry> {
    const reader = MarkupReader.fromString(text);
    try {
      return await AtomEntry.read(reader, options);
    } finally {
      await reader.close();
    }
  }

  toString(): string {
    return `AtomEntry(title=${this.title}, author=${this.author}, id=${this.id}, published=${this.published.toISOString()}, updated=${this.updated.toISOString()})`;
  }
}

/**
 * `<author><name>...</name></author>`
 */
export async function readAuthor(reader: MarkupReader): Promise<string> {
  await reader.read();
  reader.ensureMarkup('element', 'name');
  const name = await reader.readElementContent(stringConverter);
  reader.ensureMarkup('end-element', 'author');
  await reader.read();
  return name;
}

/**
 * Relation and target of the `<link>` under the cursor
 */
export function readLink(reader: MarkupReader): [rel: string, href: string] {
  const href = reader.requireAttribute('href');
  const rel = reader.requireAttribute('rel');
  return [rel, uriConverter.convert(href, 'href')];
}
