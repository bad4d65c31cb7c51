/**
 * Typed views over Atom entries
 * @module splunk-client/resources/entity
 */

import type { AtomEntry, AtomFeed } from '../atom/index.js';
import {
  booleanConverter,
  dateTimeConverter,
  floatConverter,
  int32Converter,
  int64Converter,
  stringConverter,
  type ValueConverter,
} from '../converters/index.js';
import { convertPath, getPath, toPlainValue, type ContentValue, type PlainValue } from '../value/index.js';

/**
 * A resource snapshot; content getters read normalized keys
 * (`check_for_updates` as `CheckForUpdates`, `eai:acl` as `Eai.Acl`)
 */
export class Entity {
  constructor(readonly entry: AtomEntry) {}

  get name(): string {
    return this.entry.title ?? '';
  }

  get id(): string | undefined {
    return this.entry.id;
  }

  get author(): string | undefined {
    return this.entry.author;
  }

  get updated(): Date {
    return this.entry.updated;
  }

  get links(): ReadonlyMap<string, string> {
    return this.entry.links;
  }

  get content(): ContentValue {
    return this.entry.content;
  }

  /**
   * Owner, app and sharing from the entity's access control list
   */
  get eai(): { owner?: string; app?: string; sharing?: string } {
    return {
      owner: this.string('Eai', 'Acl', 'Owner'),
      app: this.string('Eai', 'Acl', 'App'),
      sharing: this.string('Eai', 'Acl', 'Sharing'),
    };
  }

  get disabled(): boolean {
    return this.boolean('Disabled') ?? false;
  }

  /**
   * Raw content value at a key path
   */
  get(...keys: readonly string[]): ContentValue | undefined {
    return getPath(this.entry.content, ...keys);
  }

  toJSON(): { name: string; id?: string; content: PlainValue } {
    return { name: this.name, id: this.id, content: toPlainValue(this.entry.content) };
  }

  protected value<T>(converter: ValueConverter<T>, ...keys: readonly string[]): T | undefined {
    return convertPath(this.entry.content, converter, ...keys);
  }

  protected string(...keys: readonly string[]): string | undefined {
    return this.value(stringConverter, ...keys);
  }

  protected boolean(...keys: readonly string[]): boolean | undefined {
    return this.value(booleanConverter, ...keys);
  }

  protected int32(...keys: readonly string[]): number | undefined {
    return this.value(int32Converter, ...keys);
  }

  protected int64(...keys: readonly string[]): bigint | undefined {
    return this.value(int64Converter, ...keys);
  }

  protected float(...keys: readonly string[]): number | undefined {
    return this.value(floatConverter, ...keys);
  }

  protected dateTime(...keys: readonly string[]): Date | undefined {
    return this.value(dateTimeConverter, ...keys);
  }
}

/**
 * One page of a collection with the feed it came from (paging, messages)
 */
export interface EntityList<T extends Entity> {
  readonly items: readonly T[];
  readonly feed: AtomFeed;
}
