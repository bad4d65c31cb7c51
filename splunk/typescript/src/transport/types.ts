/**
 * HTTP transport abstractions for the Splunk REST client
 * @module splunk-client/transport/types
 */

export interface HttpRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;

  /**
   * Cancels the request when aborted
   */
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

export interface StreamingHttpResponse {
  status: number;
  headers: Record<string, string>;
  body: ReadableStream<Uint8Array>;
}

/**
 * Sends requests; error statuses are returned, not thrown, so the caller
 * can read the server's messages from the body
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;

  sendStreaming(request: HttpRequest): Promise<StreamingHttpResponse>;

  close(): Promise<void>;
}

/**
 * Case-insensitive header lookup
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

export function isSuccessResponse(response: HttpResponse | StreamingHttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

export function getContentType(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'content-type');
}

/**
 * Decodes a buffered body as UTF-8
 */
export function bodyText(response: HttpResponse): string {
  return new TextDecoder('utf-8').decode(response.body);
}

/**
 * Reads a streaming body to the end
 */
export async function readStreamText(stream: ReadableStream<Uint8Array>): Promise<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder('utf-8');
  let text = '';
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }
    return text + decoder.decode();
  } finally {
    reader.releaseLock();
  }
}
