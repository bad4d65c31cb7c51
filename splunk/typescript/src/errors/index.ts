/**
 * Error system for the Splunk REST client
 * @module splunk-client/errors
 */

// Base error class
export { SplunkError, type SplunkErrorParams, type ResponseMessage } from './error.js';

// Error categories
export {
  AuthError,
  ConfigError,
  FormatError,
  NetworkError,
  PermissionError,
  RequestError,
  ResourceNotFoundError,
  SerializationError,
  ServerError,
} from './categories.js';

// Error mapping utilities
export { mapHttpStatusToError, isRetryableError, isSplunkError, wrapError } from './mapping.js';
