/**
 * Splunk REST client
 * @module splunk-client/client/client
 */

import { Argument } from '../args/index.js';
import type { AtomFeed } from '../atom/index.js';
import type { NormalizedSplunkConfig } from '../config/index.js';
import { ConfigError, FormatError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import {
  ApplicationsService,
  IndexesService,
  JobsService,
  SavedSearchesService,
  ServerMessagesService,
} from '../resources/index.js';
import type { HttpTransport } from '../transport/index.js';
import { Context, type FeedOptions } from './context.js';
import { Namespace, ResourceName } from './namespace.js';

/**
 * Entry point to a Splunk server's management port
 *
 * Holds the session key from `login()` for later requests; a client
 * configured with a token needs no login.
 */
export class SplunkClient {
  readonly applications: ApplicationsService;
  readonly indexes: IndexesService;
  readonly savedSearches: SavedSearchesService;
  readonly jobs: JobsService;
  readonly serverMessages: ServerMessagesService;

  private readonly context: Context;
  private closed = false;

  constructor(
    config: NormalizedSplunkConfig,
    private readonly transport: HttpTransport,
    private readonly logger: Logger
  ) {
    this.context = new Context(config, transport, logger);
    this.applications = new ApplicationsService(this.context);
    this.indexes = new IndexesService(this.context);
    this.savedSearches = new SavedSearchesService(this.context);
    this.jobs = new JobsService(this.context);
    this.serverMessages = new ServerMessagesService(this.context);
  }

  get config(): NormalizedSplunkConfig {
    return this.context.config;
  }

  get namespace(): Namespace {
    return this.context.namespace;
  }

  get sessionKey(): string | undefined {
    return this.context.sessionKey;
  }

  get isAuthenticated(): boolean {
    return this.context.isAuthenticated;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Opens a session; credentials default to those of the configuration
   *
   * @throws ConfigError when no credentials are available
   * @throws AuthError when the server rejects them
   */
  async login(username?: string, password?: string): Promise<void> {
    const user = username ?? this.config.username;
    const secret = password ?? this.config.password;
    if (user === undefined || secret === undefined) {
      throw ConfigError.missingCredentials();
    }

    const response = await this.context.sendForResponse('POST', ResourceName.authLogin, {
      namespace: Namespace.default,
      args: [[new Argument('username', user), new Argument('password', secret)]],
      anonymous: true,
    });

    if (response.sessionKey === undefined) {
      throw FormatError.malformedDocument('login response has no <sessionKey>');
    }

    this.context.sessionKey = response.sessionKey;
    this.logger.info('Logged in', { username: user, host: this.config.host });
  }

  /**
   * Forgets the session key
   */
  async logout(): Promise<void> {
    if (this.context.sessionKey !== undefined) {
      this.context.sessionKey = undefined;
      this.logger.info('Logged out', { host: this.config.host });
    }
  }

  /**
   * GETs any feed below a namespace, the client's own by default
   *
   * @example
   * ```typescript
   * const feed = await client.getFeed(new ResourceName('authorization', 'roles'), {
   *   args: [CollectionArgs.enumerate({ count: 0 })],
   * });
   * ```
   */
  async getFeed(resource: ResourceName, options: FeedOptions = {}): Promise<AtomFeed> {
    return this.context.getFeed(resource, options);
  }

  /**
   * Ends the session and releases the transport
   *
   * @throws Error when the client is already closed
   */
  async close(): Promise<void> {
    if (this.closed) {
      throw new Error('Client is already closed');
    }
    this.closed = true;
    await this.logout();
    await this.transport.close();
  }
}
