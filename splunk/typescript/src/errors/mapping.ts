/**
 * Error mapping utilities for the Splunk REST client
 * @module splunk-client/errors/mapping
 */

import { SplunkError, type ResponseMessage } from './error.js';
import {
  AuthError,
  NetworkError,
  PermissionError,
  RequestError,
  ResourceNotFoundError,
  ServerError,
} from './categories.js';

const RETRYABLE_NODE_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
  'ECONNABORTED',
]);

/**
 * Maps an HTTP error status and the server's `<messages>` to a SplunkError
 *
 * The first message of severity ERROR or FATAL (or failing that, the first
 * message) becomes the error message.
 */
export function mapHttpStatusToError(
  status: number,
  messages: readonly ResponseMessage[] = []
): SplunkError {
  const primary =
    messages.find((m) => m.type === 'ERROR' || m.type === 'FATAL') ?? messages[0];
  const message = primary?.text || getDefaultMessageForStatus(status);
  const params = { message, status, messages };

  switch (status) {
    case 400:
      return new RequestError({ ...params, code: 'BAD_REQUEST' });
    case 401:
      return new AuthError({ ...params, code: 'UNAUTHORIZED' });
    case 403:
      return new PermissionError({ ...params, code: 'FORBIDDEN' });
    case 404:
      return new ResourceNotFoundError({ ...params, code: 'NOT_FOUND' });
    case 409:
      return new RequestError({ ...params, code: 'CONFLICT' });
    case 500:
      return new ServerError({ ...params, code: 'INTERNAL_ERROR' });
    case 502:
      return new ServerError({ ...params, code: 'BAD_GATEWAY' });
    case 503:
      return new ServerError({ ...params, code: 'SERVICE_UNAVAILABLE' });
    case 504:
      return new ServerError({ ...params, code: 'GATEWAY_TIMEOUT' });
    default:
      if (status >= 500 && status < 600) {
        return new ServerError({ ...params, code: 'SERVER_ERROR' });
      }
      if (status >= 400 && status < 500) {
        return new RequestError({ ...params, code: 'CLIENT_ERROR' });
      }
      return new SplunkError({
        ...params,
        type: 'unknown_error',
        isRetryable: false,
      });
  }
}

/**
 * Checks if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (isSplunkError(error)) {
    return error.isRetryable;
  }

  const code = nodeErrorCode(error);
  return code !== undefined && RETRYABLE_NODE_CODES.has(code);
}

/**
 * Type guard to check if an error is a SplunkError
 */
export function isSplunkError(error: unknown): error is SplunkError {
  return error instanceof SplunkError;
}

/**
 * Wraps an unknown error in a SplunkError
 */
export function wrapError(error: unknown): SplunkError {
  if (isSplunkError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const code = nodeErrorCode(error);
    if (code) {
      return new NetworkError({
        message: error.message,
        code,
        isRetryable: RETRYABLE_NODE_CODES.has(code),
      });
    }

    return new SplunkError({
      type: 'unknown_error',
      message: error.message,
      isRetryable: false,
      details: {
        name: error.name,
        stack: error.stack,
      },
    });
  }

  return new SplunkError({
    type: 'unknown_error',
    message: String(error),
    isRetryable: false,
  });
}

function nodeErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function getDefaultMessageForStatus(status: number): string {
  switch (status) {
    case 400:
      return 'Bad Request';
    case 401:
      return 'Unauthorized';
    case 403:
      return 'Forbidden';
    case 404:
      return 'Not Found';
    case 409:
      return 'Conflict';
    case 500:
      return 'Internal Server Error';
    case 502:
      return 'Bad Gateway';
    case 503:
      return 'Service Unavailable';
    case 504:
      return 'Gateway Timeout';
    default:
      return `HTTP Error ${status}`;
  }
}
