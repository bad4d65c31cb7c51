/**
 * Request context: URL building, authentication and error mapping
 * @module splunk-client/client/context
 */

import { toSearchParams, type Argument } from '../args/index.js';
import { AtomEntry, AtomFeed, type ContentReadOptions } from '../atom/index.js';
import { baseUrlOf, type NormalizedSplunkConfig } from '../config/index.js';
import { AuthError, FormatError, mapHttpStatusToError, type SplunkError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import {
  bodyText,
  isSuccessResponse,
  readStreamText,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type StreamingHttpResponse,
} from '../transport/index.js';
import { MarkupReader, parseResponseDocument, type ResponseDocument } from '../xml/index.js';
import { Namespace, type ResourceName } from './namespace.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface RequestOptions {
  /**
   * Defaults to the namespace of the configuration
   */
  namespace?: Namespace;

  /**
   * Sent in the query string for GET and DELETE, as a form body for POST
   */
  args?: readonly Iterable<Argument>[];

  signal?: AbortSignal;

  /**
   * Send without credentials; only the login request does
   */
  anonymous?: boolean;
}

export interface FeedOptions extends RequestOptions {
  content?: ContentReadOptions;
}

/**
 * Shared by every service of one client
 */
export class Context {
  readonly baseUrl: string;
  readonly namespace: Namespace;

  private session: string | undefined;

  constructor(
    readonly config: NormalizedSplunkConfig,
    private readonly transport: HttpTransport,
    readonly logger: Logger
  ) {
    this.baseUrl = baseUrlOf(config);
    const { owner, app } = config.namespace;
    this.namespace = owner === undefined && app === undefined ? Namespace.default : new Namespace(owner, app);
  }

  get sessionKey(): string | undefined {
    return this.session;
  }

  set sessionKey(value: string | undefined) {
    this.session = value;
  }

  /**
   * True when requests carry credentials
   */
  get isAuthenticated(): boolean {
    return this.config.token !== undefined || this.session !== undefined;
  }

  url(resource: ResourceName, namespace: Namespace = this.namespace, query?: URLSearchParams): string {
    const encoded = query?.toString() ?? '';
    const search = encoded.length > 0 ? `?${encoded}` : '';
    return `${this.baseUrl}${namespace.toPath()}${resource.toPath()}${search}`;
  }

  /**
   * Sends a request and buffers the reply
   *
   * @throws SplunkError mapped from the status and the `<messages>` of an
   * error reply
   */
  async send(method: HttpMethod, resource: ResourceName, options: RequestOptions = {}): Promise<HttpResponse> {
    const request = this.createRequest(method, resource, options);
    const response = await this.transport.send(request);

    if (!isSuccessResponse(response)) {
      throw this.responseError(request, response.status, bodyText(response));
    }
    return response;
  }

  /**
   * Sends a request and hands back the reply body unread
   */
  async sendStreaming(
    method: HttpMethod,
    resource: ResourceName,
    options: RequestOptions = {}
  ): Promise<StreamingHttpResponse> {
    const request = this.createRequest(method, resource, options);
    const response = await this.transport.sendStreaming(request);

    if (!isSuccessResponse(response)) {
      throw this.responseError(request, response.status, await readStreamText(response.body));
    }
    return response;
  }

  /**
   * Sends a request and reads the `<response>` document it returns
   */
  async sendForResponse(
    method: HttpMethod,
    resource: ResourceName,
    options: RequestOptions = {}
  ): Promise<ResponseDocument> {
    const response = await this.send(method, resource, options);
    return parseResponseDocument(bodyText(response));
  }

  /**
   * GETs a feed, parsing it as it streams in
   */
  async getFeed(resource: ResourceName, options: FeedOptions = {}): Promise<AtomFeed> {
    const response = await this.sendStreaming('GET', resource, options);
    const reader = MarkupReader.fromStream(response.body);
    try {
      return await AtomFeed.read(reader, options.content);
    } finally {
      await reader.close();
    }
  }

  /**
   * GETs a single entity; the server wraps it in a one-entry feed
   */
  async getEntry(resource: ResourceName, options: FeedOptions = {}): Promise<AtomEntry> {
    const feed = await this.getFeed(resource, options);
    const [entry] = feed.entries;
    if (feed.entries.length !== 1 || entry === undefined) {
      throw FormatError.malformedDocument(
        `expected one entry for ${resource.toString()}, found ${feed.entries.length}`
      );
    }
    return entry;
  }

  /**
   * POSTs and reads the entity the server echoes back; an empty reply
   * yields a bare entry titled `name`
   */
  async postForEntry(resource: ResourceName, name: string, options: FeedOptions = {}): Promise<AtomEntry> {
    const response = await this.sendStreaming('POST', resource, options);
    const reader = MarkupReader.fromStream(response.body);
    try {
      const feed = await AtomFeed.read(reader, options.content);
      const [entry] = feed.entries;
      return entry ?? new AtomEntry({ title: name });
    } finally {
      await reader.close();
    }
  }

  private createRequest(method: HttpMethod, resource: ResourceName, options: RequestOptions): HttpRequest {
    const params = toSearchParams(...(options.args ?? []));
    const headers: Record<string, string> = {
      'user-agent': this.config.userAgent,
      accept: 'application/atom+xml, text/xml',
    };

    if (!options.anonymous) {
      headers['authorization'] = this.authorization();
    }

    const request: HttpRequest =
      method === 'POST'
        ? {
            method,
            url: this.url(resource, options.namespace),
            headers: { ...headers, 'content-type': 'application/x-www-form-urlencoded' },
            body: params.toString(),
            signal: options.signal,
          }
        : {
            method,
            url: this.url(resource, options.namespace, params),
            headers,
            signal: options.signal,
          };

    this.logger.debug('Sending request', { method, url: request.url });
    return request;
  }

  private authorization(): string {
    if (this.config.token !== undefined) {
      return `Bearer ${this.config.token}`;
    }
    if (this.session !== undefined) {
      return `Splunk ${this.session}`;
    }
    throw AuthError.notLoggedIn();
  }

  private responseError(request: HttpRequest, status: number, text: string): SplunkError {
    const error = mapHttpStatusToError(status, readMessages(text));
    this.logger.warn('Request failed', {
      method: request.method,
      url: request.url,
      status,
      code: error.code,
      message: error.message,
    });
    return error;
  }
}

/**
 * Messages of an error reply; a body that is not a `<response>` document
 * has none
 */
function readMessages(text: string): ResponseDocument['messages'] {
  try {
    return parseResponseDocument(text).messages;
  } catch (error) {
    if (error instanceof FormatError) {
      return [];
    }
    throw error;
  }
}
