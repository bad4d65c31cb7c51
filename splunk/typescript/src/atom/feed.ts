/**
 * Atom feeds: a collection of entries with paging and server messages
 * @module splunk-client/atom/feed
 */

import { FormatError } from '../errors/index.js';
import {
  dateTimeConverter,
  int32Converter,
  MIN_TIMESTAMP,
  stringConverter,
  uriConverter,
  versionConverter,
  type Version,
} from '../converters/index.js';
import { MarkupReader } from '../xml/index.js';
import type { ContentReadOptions } from './content.js';
import { AtomEntry, readAuthor, readLink } from './entry.js';
import { messageTypeConverter, type Message } from './message.js';
import { Pagination } from './pagination.js';

const NO_LINKS: ReadonlyMap<string, string> = new Map();

const PAGINATION_FIELDS = {
  'opensearch:itemsPerPage': 'itemsPerPage',
  'opensearch:startIndex': 'startIndex',
  'opensearch:totalResults': 'totalResults',
} as const;

export interface AtomFeedInit {
  readonly title?: string;
  readonly id?: string;
  readonly author?: string;
  readonly generatorVersion?: Version;
  readonly updated?: Date;
  readonly pagination?: Pagination;
  readonly messages?: readonly Message[];
  readonly links?: ReadonlyMap<string, string>;
  readonly entries?: readonly AtomEntry[];
}

export class AtomFeed {
  readonly title: string | undefined;
  readonly id: string | undefined;
  readonly author: string | undefined;
  readonly generatorVersion: Version | undefined;
  readonly updated: Date;
  readonly pagination: Pagination;

  /**
   * `undefined` when the feed carries no `<s:messages>` block
   */
  readonly messages: readonly Message[] | undefined;

  readonly links: ReadonlyMap<string, string>;
  readonly entries: readonly AtomEntry[];

  constructor(init: AtomFeedInit = {}) {
    this.title = init.title;
    this.id = init.id;
    this.author = init.author;
    this.generatorVersion = init.generatorVersion;
    this.updated = init.updated ?? MIN_TIMESTAMP;
    this.pagination = init.pagination ?? Pagination.none;
    this.messages = init.messages && Object.freeze([...init.messages]);
    this.links = init.links ?? NO_LINKS;
    this.entries = Object.freeze([...(init.entries ?? [])]);
    Object.freeze(this);
  }

  /**
   * Reads a `<feed>` document, leaving the reader past its end tag
   */
  static async read(reader: MarkupReader, options?: ContentReadOptions): Promise<AtomFeed> {
    if (!(await reader.advanceToDocumentElement('feed'))) {
      throw FormatError.emptyDocument('feed');
    }

    let title: string | undefined;
    let id: string | undefined;
    let author: string | undefined;
    let generatorVersion: Version | undefined;
    let updated: Date | undefined;
    let pagination = Pagination.none;
    let messages: Message[] | undefined;
    let links: Map<string, string> | undefined;
    const entries: AtomEntry[] = [];

    await reader.read();

    while (reader.nodeKind === 'element') {
      const name = reader.name;

      switch (name) {
        case 'title':
          title = await reader.readElementContent(stringConverter);
          break;
        case 'id':
          id = await reader.readElementContent(uriConverter);
          break;
        case 'author':
          author = await readAuthor(reader);
          break;
        case 'generator':
          generatorVersion = versionConverter.convert(reader.requireAttribute('version'), 'generator');
          await reader.skip();
          break;
        case 'updated':
          updated = await reader.readElementContent(dateTimeConverter);
          break;
        case 'entry':
          entries.push(await AtomEntry.read(reader, options));
          break;
        case 'link': {
          const [rel, href] = readLink(reader);
          links ??= new Map();
          links.set(rel, href);
          await reader.skip();
          break;
        }
        case 's:messages':
          messages ??= [];
          messages.push(...(await readMessages(reader)));
          break;
        case 'opensearch:itemsPerPage':
        case 'opensearch:startIndex':
        case 'opensearch:totalResults':
          pagination = pagination.with(PAGINATION_FIELDS[name], await reader.readElementContent(int32Converter));
          break;
        default:
          throw FormatError.unexpectedElement(name, 'feed');
      }
    }

    reader.ensureMarkup('end-element', 'feed');
    await reader.read();

    return new AtomFeed({
      title,
      id,
      author,
      generatorVersion,
      updated,
      pagination,
      messages,
      links,
      entries,
    });
  }

  static async parse(text: string, options?: ContentReadOptions): Promise<AtomFeed> {
    const reader = MarkupReader.fromString(text);
    try {
      return await AtomFeed.read(reader, options);
    } finally {
      await reader.close();
    }
  }

  toString(): string {
    return `AtomFeed(title=${this.title}, author=${this.author}, id=${this.id}, updated=${this.updated.toISOString()})`;
  }
}

/**
 * `<s:messages>` with its `<s:msg type="...">` children
 */
async function readMessages(reader: MarkupReader): Promise<Message[]> {
  const messages: Message[] = [];

  if (reader.isEmptyElement) {
    await reader.read();
    return messages;
  }

  await reader.read();

  while (reader.nodeKind === 'element' && reader.name === 's:msg') {
    const type = messageTypeConverter.convert(reader.requireAttribute('type'), 'type');
    const text = await reader.readElementContent(stringConverter);
    messages.push(Object.freeze({ type, text }));
  }

  reader.ensureMarkup('end-element', 's:messages');
  await reader.read();
  return messages;
}
