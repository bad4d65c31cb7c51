/**
 * Atom feed and entry parsing
 * @module splunk-client/atom
 */

export { AtomEntry, type AtomEntryInit } from './entry.js';
export { AtomFeed, type AtomFeedInit } from './feed.js';
export { readContentValue, type ContentReadOptions } from './content.js';
export { normalizeKeyName, splitKeyPath } from './key-names.js';
export { DEFAULT_KEY_REWRITES } from './key-rewrites.js';
export { MessageType, messageTypeConverter, type Message } from './message.js';
export { Pagination } from './pagination.js';
