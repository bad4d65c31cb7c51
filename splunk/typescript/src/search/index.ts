/**
 * Search results
 * @module splunk-client/search
 */

export {
  SearchResult,
  SearchResultStream,
  type FieldValue,
  type SearchResultMetadata,
} from './results.js';
