/**
 * Recursive reading of `s:dict` / `s:list` content
 * @module splunk-client/atom/content
 */

import { FormatError } from '../errors/index.js';
import { DynamicMapBuilder, list, scalar, type ContentValue, type ListValue, type MapValue } from '../value/index.js';
import type { MarkupReader } from '../xml/index.js';
import { DEFAULT_KEY_REWRITES } from './key-rewrites.js';
import { splitKeyPath } from './key-names.js';

export interface ContentReadOptions {
  /**
   * Renames applied to top-level content keys before splitting
   *
   * @default DEFAULT_KEY_REWRITES
   */
  readonly keyRewrites?: ReadonlyMap<string, string>;
}

/**
 * Reads the element under the cursor as a content value and moves past it
 *
 * - empty element: `null`
 * - `s:dict` child: a map
 * - `s:list` child: a list
 * - otherwise: the element text
 */
export async function readContentValue(
  reader: MarkupReader,
  level = 0,
  options: ContentReadOptions = {}
): Promise<ContentValue> {
  reader.ensureMarkup('element');

  if (reader.isEmptyElement) {
    await reader.read();
    return null;
  }

  const name = reader.name;
  let value: ContentValue;

  await reader.read();

  switch (reader.nodeKind) {
    case 'element':
      switch (reader.name) {
        case 's:dict':
          value = await readDictionary(reader, level, options);
          break;
        case 's:list':
          value = await readList(reader, level, options);
          break;
        default:
          throw FormatError.unexpectedElement(reader.name, name);
      }
      break;
    case 'end-element':
      value = null;
      break;
    default:
      value = scalar(await reader.readContentAsString());
      break;
  }

  reader.ensureMarkup('end-element', name);
  await reader.read();
  return value;
}

async function readDictionary(
  reader: MarkupReader,
  level: number,
  options: ContentReadOptions
): Promise<MapValue> {
  const root = new DynamicMapBuilder();

  if (reader.isEmptyElement) {
    await reader.read();
    return root.build();
  }

  const rewrites = options.keyRewrites ?? DEFAULT_KEY_REWRITES;
  await reader.read();

  while (reader.nodeKind === 'element' && reader.name === 's:key') {
    let key = reader.requireAttribute('name');
    if (level === 0) {
      key = rewrites.get(key) ?? key;
    }

    const path = splitKeyPath(key);
    const leaf = path.pop() ?? key;
    let target = root;
    for (const segment of path) {
      target = target.child(segment);
    }

    target.insert(leaf, await readContentValue(reader, level + 1, options));
  }

  reader.ensureMarkup('end-element', 's:dict');
  await reader.read();
  return root.build();
}

async function readList(reader: MarkupReader, level: number, options: ContentReadOptions): Promise<ListValue> {
  const items: ContentValue[] = [];

  if (reader.isEmptyElement) {
    await reader.read();
    return list(items);
  }

  await reader.read();

  while (reader.nodeKind === 'element' && reader.name === 's:item') {
    items.push(await readContentValue(reader, level + 1, options));
  }

  reader.ensureMarkup('end-element', 's:list');
  await reader.read();
  return list(items);
}
