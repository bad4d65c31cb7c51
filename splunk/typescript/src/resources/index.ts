/**
 * Resource entities and services
 * @module splunk-client/resources
 */

export {
  ApplicationCreationArgs,
  CollectionArgs,
  ExecutionMode,
  JobArgs,
  SavedSearchDispatchArgs,
  SearchEventArgs,
  SearchResultArgs,
  ServerMessageArgs,
  ServerMessageSeverity,
  SortDirection,
  SortMode,
  TruncationMode,
} from './args.js';
export { Entity, type EntityList } from './entity.js';
export { Application, ApplicationsService } from './applications.js';
export { Index, IndexesService } from './indexes.js';
export { SavedSearch, SavedSearchesService } from './saved-searches.js';
export { DispatchState, Job, JobsService } from './jobs.js';
export { ServerMessage, ServerMessagesService } from './server-messages.js';
