/**
 * Fetch-based HTTP transport
 * @module splunk-client/transport/fetch-transport
 */

import type { HttpRequest, HttpResponse, HttpTransport, StreamingHttpResponse } from './types.js';
import { NetworkError, isSplunkError } from '../errors/index.js';

export interface FetchTransportOptions {
  /** Request timeout in milliseconds, up to the response headers */
  timeout: number;

  /** Fetch implementation; the global `fetch` by default */
  fetch?: typeof globalThis.fetch;
}

/**
 * Uses the Fetch API for both buffered and streaming responses
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;

  constructor(options: FetchTransportOptions) {
    this.options = options;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const response = await this.execute(request);
    try {
      const body = new Uint8Array(await response.arrayBuffer());
      return {
        status: response.status,
        headers: this.convertHeaders(response.headers),
        body,
      };
    } catch (error) {
      throw this.handleError(error, request, false);
    }
  }

  async sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse> {
    const response = await this.execute(request);

    if (!response.body) {
      throw NetworkError.connectionFailed('Response body stream is null');
    }

    return {
      status: response.status,
      headers: this.convertHeaders(response.headers),
      body: response.body,
    };
  }

  /**
   * Closes the transport (no-op for fetch-based transport)
   */
  async close(): Promise<void> {}

  private async execute(request: HttpRequest): Promise<Response> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeout);

    const onAbort = (): void => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    }
    request.signal?.addEventListener('abort', onAbort, { once: true });

    const fetchImpl = this.options.fetch ?? globalThis.fetch;

    try {
      return await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
    } catch (error) {
      throw this.handleError(error, request, timedOut);
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }

  private convertHeaders(headers: Headers): Record<string, string> {
    const result: Record<string, string> = {};
    headers.forEach((value, key) => {
      result[key] = value;
    });
    return result;
  }

  private handleError(error: unknown, request: HttpRequest, timedOut: boolean): Error {
    if (isSplunkError(error)) {
      return error;
    }

    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.name === 'TimeoutError') {
        if (timedOut) {
          return NetworkError.timeout(this.options.timeout);
        }
        if (request.signal?.aborted) {
          return NetworkError.aborted();
        }
      }

      const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
      return NetworkError.connectionFailed(`${request.method} ${request.url} failed: ${error.message}${cause}`);
    }

    return NetworkError.connectionFailed(String(error));
  }
}

export function createFetchTransport(timeout: number = 60000): HttpTransport {
  return new FetchTransport({ timeout });
}
