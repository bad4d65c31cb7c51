/**
 * Specific error categories for the Splunk REST client
 * @module splunk-client/errors/categories
 */

import { SplunkError, type SplunkErrorParams } from './error.js';

type CategoryParams = Omit<SplunkErrorParams, 'type' | 'isRetryable'> & {
  readonly isRetryable?: boolean;
};

/**
 * Malformed or unexpected response markup
 *
 * Always fatal to the document being read.
 */
export class FormatError extends SplunkError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'format_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'FormatError';
    Object.setPrototypeOf(this, FormatError.prototype);
  }

  /**
   * The reader is not positioned on the markup the caller expects
   */
  static unexpectedMarkup(expected: string, actual: string): FormatError {
    return new FormatError({
      message: `Expected ${expected}, but found ${actual}`,
      code: 'UNEXPECTED_MARKUP',
      details: { expected, actual },
    });
  }

  /**
   * An element the document grammar does not allow at this point
   */
  static unexpectedElement(name: string, parent: string): FormatError {
    return new FormatError({
      message: `Unexpected start tag <${name}> in <${parent}>`,
      code: 'UNEXPECTED_ELEMENT',
      details: { name, parent },
    });
  }

  /**
   * A required attribute is absent
   */
  static missingAttribute(attribute: string, element: string): FormatError {
    return new FormatError({
      message: `Missing required attribute '${attribute}' on <${element}>`,
      code: 'MISSING_ATTRIBUTE',
      details: { attribute, element },
    });
  }

  /**
   * Text that cannot be converted to the target type
   */
  static conversionFailed(typeName: string, text: string, field?: string): FormatError {
    const target = field ? `${typeName} (${field})` : typeName;
    return new FormatError({
      message: `Cannot convert '${text}' to ${target}`,
      code: 'CONVERSION_FAILED',
      details: { typeName, text, field },
    });
  }

  /**
   * Text that names no member of an enumeration
   */
  static unmappedEnum(enumName: string, text: string, field?: string): FormatError {
    const target = field ? `${enumName}.${field}` : enumName;
    return new FormatError({
      message: `${target}: '${text}' is not a recognized value`,
      code: 'UNMAPPED_ENUM',
      details: { enumName, text, field },
    });
  }

  /**
   * A content key that collides with an existing non-dictionary value
   */
  static keyCollision(key: string): FormatError {
    return new FormatError({
      message: `Content key '${key}' collides with an existing value`,
      code: 'KEY_COLLISION',
      details: { key },
    });
  }

  /**
   * A content key with an empty path segment
   */
  static invalidKeyName(key: string): FormatError {
    return new FormatError({
      message: `Invalid content key name: '${key}'`,
      code: 'INVALID_KEY_NAME',
      details: { key },
    });
  }

  /**
   * A document with no root element
   */
  static emptyDocument(expected: string): FormatError {
    return new FormatError({
      message: `Expected a <${expected}> document, but the response is empty`,
      code: 'EMPTY_DOCUMENT',
      details: { expected },
    });
  }

  /**
   * A document the XML parser rejects
   */
  static malformedDocument(reason: string): FormatError {
    return new FormatError({
      message: `Malformed XML document: ${reason}`,
      code: 'MALFORMED_DOCUMENT',
    });
  }
}

/**
 * Client configuration and parameter-holder declaration errors
 */
export class ConfigError extends SplunkError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'config_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  static invalidConfig(issues: readonly string[]): ConfigError {
    return new ConfigError({
      message: `Invalid configuration: ${issues.join(', ')}`,
      code: 'INVALID_CONFIG',
      details: { issues },
    });
  }

  static missingCredentials(): ConfigError {
    return new ConfigError({
      message: 'A username and password or a token is required to authenticate',
      code: 'MISSING_CREDENTIALS',
    });
  }

  /**
   * A parameter declared without a wire name
   */
  static missingParameterName(holder: string, field: string): ConfigError {
    return new ConfigError({
      message: `${holder}.${field}: parameter declares no wire name`,
      code: 'MISSING_PARAMETER_NAME',
      details: { holder, field },
    });
  }

  /**
   * A parameter declared without an integral ordering key
   */
  static missingParameterOrder(holder: string, field: string): ConfigError {
    return new ConfigError({
      message: `${holder}.${field}: parameter declares no ordering key`,
      code: 'MISSING_PARAMETER_ORDER',
      details: { holder, field },
    });
  }

  /**
   * Two parameters sharing the same (order, name) pair
   */
  static duplicateParameter(holder: string, order: number, name: string): ConfigError {
    return new ConfigError({
      message: `${holder}: parameter (${order}, ${name}) is declared more than once`,
      code: 'DUPLICATE_PARAMETER',
      details: { holder, order, name },
    });
  }

  /**
   * A parameter type the formatter resolution does not support
   */
  static unsupportedParameterType(holder: string, field: string, typeName: string): ConfigError {
    return new ConfigError({
      message: `${holder}.${field}: parameter type ${typeName} is not supported`,
      code: 'UNSUPPORTED_PARAMETER_TYPE',
      details: { holder, field, typeName },
    });
  }
}

/**
 * Errors raised while turning a parameter holder into arguments
 */
export class SerializationError extends SplunkError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'serialization_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'SerializationError';
    Object.setPrototypeOf(this, SerializationError.prototype);
  }

  static missingRequiredParameter(name: string, holder?: string): SerializationError {
    return new SerializationError({
      message: `Missing value for required parameter ${name}`,
      code: 'MISSING_REQUIRED_PARAMETER',
      details: { name, holder },
    });
  }

  static invalidValue(holder: string, field: string, value: unknown, typeName: string): SerializationError {
    return new SerializationError({
      message: `${holder}.${field}: ${String(value)} is not a valid ${typeName}`,
      code: 'INVALID_PARAMETER_VALUE',
      details: { holder, field, typeName },
    });
  }
}

/**
 * Authentication failures (401)
 */
export class AuthError extends SplunkError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'auth_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'AuthError';
    Object.setPrototypeOf(this, AuthError.prototype);
  }

  static notLoggedIn(): AuthError {
    return new AuthError({
      message: 'The client has no session key or token; call login() first',
      code: 'NOT_LOGGED_IN',
    });
  }
}

/**
 * Insufficient capabilities for the requested resource (403)
 */
export class PermissionError extends SplunkError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'permission_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'PermissionError';
    Object.setPrototypeOf(this, PermissionError.prototype);
  }
}

/**
 * The resource does not exist (404)
 */
export class ResourceNotFoundError extends SplunkError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'not_found_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ResourceNotFoundError';
    Object.setPrototypeOf(this, ResourceNotFoundError.prototype);
  }
}

/**
 * The server rejected the request (400, 409 and other 4xx)
 */
export class RequestError extends SplunkError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'request_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'RequestError';
    Object.setPrototypeOf(this, RequestError.prototype);
  }
}

/**
 * Server-side failures (5xx)
 */
export class ServerError extends SplunkError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'server_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'ServerError';
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}

/**
 * Connection, timeout and cancellation failures
 */
export class NetworkError extends SplunkError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'network_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static connectionFailed(message?: string): NetworkError {
    return new NetworkError({
      message: message ?? 'Failed to establish connection to the server',
      code: 'CONNECTION_FAILED',
    });
  }

  static timeout(timeoutMs: number): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'REQUEST_TIMEOUT',
      details: { timeoutMs },
    });
  }

  static aborted(): NetworkError {
    return new NetworkError({
      message: 'Request was aborted by the caller',
      code: 'REQUEST_ABORTED',
      isRetryable: false,
    });
  }
}
