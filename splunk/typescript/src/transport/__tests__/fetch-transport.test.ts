/**
 * Tests for the fetch-based transport
 */

import { NetworkError } from '../../errors/index.js';
import { bodyText, FetchTransport, getHeader, isSuccessResponse, readStreamText, type HttpRequest } from '../index.js';

const APPS_URL = 'https://localhost:8089/services/apps/local';

function request(overrides: Partial<HttpRequest> = {}): HttpRequest {
  return { method: 'GET', url: APPS_URL, headers: { accept: 'text/xml' }, ...overrides };
}

/**
 * Never settles until its signal aborts
 */
const hangingFetch: typeof globalThis.fetch = (_input, init) =>
  new Promise((_resolve, reject) => {
    const signal = init?.signal;
    const fail = (): void => reject(new DOMException('This operation was aborted', 'AbortError'));
    if (signal?.aborted) {
      fail();
      return;
    }
    signal?.addEventListener('abort', fail, { once: true });
  });

describe('FetchTransport', () => {
  it('should pass the request through and buffer the body', async () => {
    const seen: { url: string; init: RequestInit | undefined }[] = [];
    const transport = new FetchTransport({
      timeout: 1000,
      fetch: async (input, init) => {
        seen.push({ url: String(input), init });
        return new Response('<response><sid>1395.7</sid></response>', {
          status: 201,
          headers: { 'Content-Type': 'text/xml; charset=UTF-8' },
        });
      },
    });

    const response = await transport.send(
      request({
        method: 'POST',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        body: 'search=search+index%3Dmain',
      })
    );

    expect(seen).toHaveLength(1);
    expect(seen[0]?.url).toBe(APPS_URL);
    expect(seen[0]?.init?.method).toBe('POST');
    expect(seen[0]?.init?.body).toBe('search=search+index%3Dmain');
    expect(response.status).toBe(201);
    expect(response.headers).toEqual({ 'content-type': 'text/xml; charset=UTF-8' });
    expect(bodyText(response)).toBe('<response><sid>1395.7</sid></response>');
    expect(isSuccessResponse(response)).toBe(true);
  });

  it('should return error statuses instead of throwing', async () => {
    const transport = new FetchTransport({
      timeout: 1000,
      fetch: async () => new Response('<response/>', { status: 404 }),
    });

    const response = await transport.send(request());
    expect(response.status).toBe(404);
    expect(isSuccessResponse(response)).toBe(false);
  });

  it('should stream the body', async () => {
    const transport = new FetchTransport({
      timeout: 1000,
      fetch: async () => new Response('<results preview="0"/>'),
    });

    const response = await transport.sendStreaming(request());
    expect(await readStreamText(response.body)).toBe('<results preview="0"/>');
  });

  it('should fail with a timeout when the server does not answer', async () => {
    const transport = new FetchTransport({ timeout: 20, fetch: hangingFetch });

    const error = await transport.send(request()).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ code: 'REQUEST_TIMEOUT', message: 'Request timed out after 20ms' });
  });

  it('should stop when the caller aborts', async () => {
    const transport = new FetchTransport({ timeout: 1000, fetch: hangingFetch });
    const controller = new AbortController();

    const pending = transport.send(request({ signal: controller.signal }));
    controller.abort();

    await expect(pending).rejects.toThrow('Request was aborted by the caller');
  });

  it('should not start a request whose signal is already aborted', async () => {
    const transport = new FetchTransport({ timeout: 1000, fetch: hangingFetch });
    const controller = new AbortController();
    controller.abort();

    await expect(transport.send(request({ signal: controller.signal }))).rejects.toMatchObject({
      code: 'REQUEST_ABORTED',
      isRetryable: false,
    });
  });

  it('should describe connection failures with their cause', async () => {
    const transport = new FetchTransport({
      timeout: 1000,
      fetch: async () => {
        throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:8089') });
      },
    });

    await expect(transport.send(request())).rejects.toThrow(
      `GET ${APPS_URL} failed: fetch failed: connect ECONNREFUSED 127.0.0.1:8089`
    );
  });
});

describe('getHeader', () => {
  it('should ignore case', () => {
    expect(getHeader({ 'Content-Type': 'text/xml' }, 'content-type')).toBe('text/xml');
    expect(getHeader({}, 'content-type')).toBeUndefined();
  });
});
