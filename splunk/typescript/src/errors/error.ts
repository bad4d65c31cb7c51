/**
 * Base error class for the Splunk REST client
 * @module splunk-client/errors/error
 */

/**
 * A message returned by the server alongside an error response
 */
export interface ResponseMessage {
  /**
   * Message severity as sent on the wire (e.g. `ERROR`, `WARN`)
   */
  readonly type: string;

  /**
   * Message text
   */
  readonly text: string;
}

/**
 * Parameters for creating a SplunkError
 */
export interface SplunkErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether repeating the request could succeed
   */
  readonly isRetryable: boolean;

  /**
   * Messages the server attached to the response
   */
  readonly messages?: readonly ResponseMessage[];

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;
}

/**
 * Base error class for every failure raised by the client
 *
 * Carries:
 * - an error type for programmatic handling
 * - the HTTP status and a short error code
 * - the server messages of a failed request
 * - structured details for diagnostics
 */
export class SplunkError extends Error {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether repeating the request could succeed
   */
  readonly isRetryable: boolean;

  /**
   * Messages the server attached to the response
   */
  readonly messages: readonly ResponseMessage[];

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  constructor(params: SplunkErrorParams) {
    super(params.message);

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, SplunkError.prototype);

    this.name = 'SplunkError';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.messages = params.messages ?? [];
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SplunkError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      isRetryable: this.isRetryable,
      messages: this.messages,
      details: this.details,
      stack: this.stack,
    };
  }

  toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    return parts.join(' ');
  }
}
