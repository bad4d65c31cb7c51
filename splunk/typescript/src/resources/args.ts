/**
 * Parameter holders for the resource endpoints
 * @module splunk-client/resources/args
 */

import { ArgTypes, defineArgs, parameter } from '../args/index.js';

export enum SortDirection {
  Ascending = 'asc',
  Descending = 'desc',
}

export enum SortMode {
  Automatic = 'auto',
  Alphabetic = 'alpha',
  AlphabeticCaseSensitive = 'alpha_case',
  Numeric = 'num',
}

export enum TruncationMode {
  Abstract = 'abstract',
  Truncate = 'truncate',
}

export enum ExecutionMode {
  Normal = 'normal',
  Blocking = 'blocking',
  OneShot = 'oneshot',
}

export enum ServerMessageSeverity {
  Information = 'info',
  Warning = 'warn',
  Error = 'error',
}

const sortDirection = ArgTypes.enumeration('SortDirection', SortDirection);
const sortMode = ArgTypes.enumeration('SortMode', SortMode);
const truncationMode = ArgTypes.enumeration('TruncationMode', TruncationMode);
const executionMode = ArgTypes.enumeration('ExecutionMode', ExecutionMode);
const severity = ArgTypes.enumeration('ServerMessageSeverity', ServerMessageSeverity);
const fieldList = ArgTypes.list(ArgTypes.string);

/**
 * Paging, filtering and sorting of a collection GET
 */
export interface CollectionArgs {
  count?: number;
  offset?: number;
  search?: string;
  sortDirection?: SortDirection;
  sortKey?: string;
  sortMode?: SortMode;
}

export const CollectionArgs = defineArgs<CollectionArgs>('CollectionArgs', {
  count: parameter(ArgTypes.integer, { name: 'count', order: 0, defaultValue: 30 }),
  offset: parameter(ArgTypes.integer, { name: 'offset', order: 0, defaultValue: 0 }),
  search: parameter(ArgTypes.string, { name: 'search', order: 0 }),
  sortDirection: parameter(sortDirection, { name: 'sort_dir', order: 0, defaultValue: SortDirection.Ascending }),
  sortKey: parameter(ArgTypes.string, { name: 'sort_key', order: 0, defaultValue: 'name' }),
  sortMode: parameter(sortMode, { name: 'sort_mode', order: 0, defaultValue: SortMode.Automatic }),
});

export interface ApplicationCreationArgs {
  name?: string;
  author?: string;
  description?: string;
  label?: string;
  template?: string;
  visible?: boolean;
}

export const ApplicationCreationArgs = defineArgs<ApplicationCreationArgs>('ApplicationCreationArgs', {
  name: parameter(ArgTypes.string, { name: 'name', order: 0, required: true }),
  author: parameter(ArgTypes.string, { name: 'author', order: 1 }),
  description: parameter(ArgTypes.string, { name: 'description', order: 1 }),
  label: parameter(ArgTypes.string, { name: 'label', order: 1 }),
  template: parameter(ArgTypes.string, { name: 'template', order: 1 }),
  visible: parameter(ArgTypes.boolean, { name: 'visible', order: 1, defaultValue: true }),
});

/**
 * Event retrieval from a search job
 */
export interface SearchEventArgs {
  count?: number;
  fieldList?: readonly string[];
  latestTime?: string;
  maxLines?: number;
  offset?: number;
  outputTimeFormat?: string;
  search?: string;
  segmentation?: string;
  timeFormat?: string;
  truncationMode?: TruncationMode;
}

export const SearchEventArgs = defineArgs<SearchEventArgs>('SearchEventArgs', {
  count: parameter(ArgTypes.integer, { name: 'count', order: 0, defaultValue: 100 }),
  fieldList: parameter(fieldList, { name: 'f', order: 0 }),
  latestTime: parameter(ArgTypes.string, { name: 'latest_time', order: 0 }),
  maxLines: parameter(ArgTypes.integer, { name: 'max_lines', order: 0, defaultValue: 0 }),
  offset: parameter(ArgTypes.integer, { name: 'offset', order: 0, defaultValue: 0 }),
  outputTimeFormat: parameter(ArgTypes.string, { name: 'output_time_format', order: 0 }),
  search: parameter(ArgTypes.string, { name: 'search', order: 0 }),
  segmentation: parameter(ArgTypes.string, { name: 'segmentation', order: 0, defaultValue: 'raw' }),
  timeFormat: parameter(ArgTypes.string, { name: 'time_format', order: 0, defaultValue: '%m/%d/%Y:%H:%M:%S' }),
  truncationMode: parameter(truncationMode, {
    name: 'truncation_mode',
    order: 0,
    defaultValue: TruncationMode.Abstract,
  }),
});

/**
 * Result retrieval from a search job
 */
export interface SearchResultArgs {
  count?: number;
  fieldList?: readonly string[];
  offset?: number;
  search?: string;
}

export const SearchResultArgs = defineArgs<SearchResultArgs>('SearchResultArgs', {
  count: parameter(ArgTypes.integer, { name: 'count', order: 0, defaultValue: 100 }),
  fieldList: parameter(fieldList, { name: 'f', order: 0 }),
  offset: parameter(ArgTypes.integer, { name: 'offset', order: 0, defaultValue: 0 }),
  search: parameter(ArgTypes.string, { name: 'search', order: 0 }),
});

/**
 * Creation of a search job; `search` comes first on the wire
 */
export interface JobArgs {
  search?: string;
  earliestTime?: string;
  executionMode?: ExecutionMode;
  id?: string;
  latestTime?: string;
  maxCount?: number;
  requiredFieldList?: readonly string[];
}

export const JobArgs = defineArgs<JobArgs>('JobArgs', {
  search: parameter(ArgTypes.string, { name: 'search', order: 0, required: true }),
  earliestTime: parameter(ArgTypes.string, { name: 'earliest_time', order: 1 }),
  executionMode: parameter(executionMode, { name: 'exec_mode', order: 1, defaultValue: ExecutionMode.Normal }),
  id: parameter(ArgTypes.string, { name: 'id', order: 1 }),
  latestTime: parameter(ArgTypes.string, { name: 'latest_time', order: 1 }),
  maxCount: parameter(ArgTypes.integer, { name: 'max_count', order: 1, defaultValue: 10000 }),
  requiredFieldList: parameter(fieldList, { name: 'rf', order: 1 }),
});

export interface SavedSearchDispatchArgs {
  dispatchNow?: string;
  earliestTime?: string;
  latestTime?: string;
  forceDispatch?: boolean;
  triggerActions?: boolean;
}

export const SavedSearchDispatchArgs = defineArgs<SavedSearchDispatchArgs>('SavedSearchDispatchArgs', {
  dispatchNow: parameter(ArgTypes.string, { name: 'dispatch.now', order: 0 }),
  earliestTime: parameter(ArgTypes.string, { name: 'dispatch.earliest_time', order: 0 }),
  latestTime: parameter(ArgTypes.string, { name: 'dispatch.latest_time', order: 0 }),
  forceDispatch: parameter(ArgTypes.boolean, { name: 'force_dispatch', order: 0, defaultValue: false }),
  triggerActions: parameter(ArgTypes.boolean, { name: 'trigger_actions', order: 0, defaultValue: false }),
});

export interface ServerMessageArgs {
  severity?: ServerMessageSeverity;
  text?: string;
}

export const ServerMessageArgs = defineArgs<ServerMessageArgs>('ServerMessageArgs', {
  severity: parameter(severity, { name: 'severity', order: 0, required: true }),
  text: parameter(ArgTypes.string, { name: 'value', order: 0, required: true }),
});
