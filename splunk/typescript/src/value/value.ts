/**
 * Dynamically typed content tree for parsed entry content
 * @module splunk-client/value/value
 */

import { FormatError } from '../errors/index.js';

/**
 * Text leaf
 */
export interface ScalarValue {
  readonly kind: 'scalar';
  readonly value: string;
}

/**
 * Ordered sequence of values
 */
export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly ContentValue[];
}

/**
 * String-keyed values in insertion order
 */
export interface MapValue {
  readonly kind: 'map';
  readonly entries: ReadonlyMap<string, ContentValue>;
}

export type DynamicValue = ScalarValue | ListValue | MapValue;

/**
 * Content of an element; `null` stands for an empty element
 */
export type ContentValue = DynamicValue | null;

/**
 * JSON-friendly rendering of a content tree
 */
export type PlainValue = string | null | PlainValue[] | { [key: string]: PlainValue };

export function scalar(value: string): ScalarValue {
  return Object.freeze({ kind: 'scalar', value });
}

export function list(items: Iterable<ContentValue>): ListValue {
  return Object.freeze({ kind: 'list', items: Object.freeze([...items]) });
}

export function map(entries: Iterable<readonly [string, ContentValue]>): MapValue {
  const builder = new DynamicMapBuilder();
  for (const [key, value] of entries) {
    builder.insert(key, value);
  }
  return builder.build();
}

export function isScalar(value: ContentValue | undefined): value is ScalarValue {
  return value !== undefined && value !== null && value.kind === 'scalar';
}

export function isList(value: ContentValue | undefined): value is ListValue {
  return value !== undefined && value !== null && value.kind === 'list';
}

export function isMap(value: ContentValue | undefined): value is MapValue {
  return value !== undefined && value !== null && value.kind === 'map';
}

type Slot = ContentValue | DynamicMapBuilder;

/**
 * Mutable map under construction
 *
 * Only the parse that owns a builder writes to it; `build()` hands out the
 * frozen result.
 */
export class DynamicMapBuilder {
  private readonly slots = new Map<string, Slot>();

  /**
   * Nested map stored under `key`, created when absent
   */
  child(key: string): DynamicMapBuilder {
    const existing = this.slots.get(key);

    if (existing === undefined) {
      const created = new DynamicMapBuilder();
      this.slots.set(key, created);
      return created;
    }

    if (existing instanceof DynamicMapBuilder) {
      return existing;
    }

    if (isMap(existing)) {
      const reopened = DynamicMapBuilder.from(existing);
      this.slots.set(key, reopened);
      return reopened;
    }

    throw FormatError.keyCollision(key);
  }

  /**
   * Adds `value` under `key`; two maps under one key merge recursively
   */
  insert(key: string, value: ContentValue): this {
    const existing = this.slots.get(key);

    if (existing === undefined) {
      this.slots.set(key, value);
      return this;
    }

    if (!isMap(value)) {
      throw FormatError.keyCollision(key);
    }

    const target = existing instanceof DynamicMapBuilder || isMap(existing) ? this.child(key) : undefined;
    if (!target) {
      throw FormatError.keyCollision(key);
    }

    for (const [childKey, childValue] of value.entries) {
      target.insert(childKey, childValue);
    }
    return this;
  }

  has(key: string): boolean {
    return this.slots.has(key);
  }

  get size(): number {
    return this.slots.size;
  }

  build(): MapValue {
    const entries = new Map<string, ContentValue>();
    for (const [key, slot] of this.slots) {
      entries.set(key, slot instanceof DynamicMapBuilder ? slot.build() : slot);
    }
    return Object.freeze({ kind: 'map', entries: new FrozenMap(entries) });
  }

  static from(value: MapValue): DynamicMapBuilder {
    const builder = new DynamicMapBuilder();
    for (const [key, entry] of value.entries) {
      builder.slots.set(key, entry);
    }
    return builder;
  }
}

/**
 * Read-only view over a Map
 */
class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  constructor(private readonly inner: Map<K, V>) {
    Object.freeze(this);
  }

  get size(): number {
    return this.inner.size;
  }

  get(key: K): V | undefined {
    return this.inner.get(key);
  }

  has(key: K): boolean {
    return this.inner.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.inner.forEach((value, key) => callback.call(thisArg, value, key, this));
  }

  entries(): IterableIterator<[K, V]> {
    return this.inner.entries();
  }

  keys(): IterableIterator<K> {
    return this.inner.keys();
  }

  values(): IterableIterator<V> {
    return this.inner.values();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.inner[Symbol.iterator]();
  }
}
