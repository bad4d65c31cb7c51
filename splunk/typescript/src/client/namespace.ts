/**
 * Namespaces and resource paths
 * @module splunk-client/client/namespace
 */

import { ConfigError } from '../errors/index.js';

/**
 * Matches every user or every app
 */
export const WILDCARD = '-';

/**
 * User and app context of a request
 *
 * The default namespace maps to `/services/`; any other namespace to
 * `/servicesNS/{owner}/{app}/`, with a missing part read as the wildcard.
 */
export class Namespace {
  static readonly default = new Namespace();

  static readonly all = new Namespace(WILDCARD, WILDCARD);

  readonly owner: string | undefined;
  readonly app: string | undefined;

  constructor(owner?: string, app?: string) {
    if (owner !== undefined && owner.trim().length === 0) {
      throw ConfigError.invalidConfig(['namespace.owner: must not be empty']);
    }
    if (app !== undefined && app.trim().length === 0) {
      throw ConfigError.invalidConfig(['namespace.app: must not be empty']);
    }
    this.owner = owner;
    this.app = app;
    Object.freeze(this);
  }

  get isDefault(): boolean {
    return this.owner === undefined && this.app === undefined;
  }

  get isWildcard(): boolean {
    return this.owner === WILDCARD && this.app === WILDCARD;
  }

  /**
   * Path prefix, always ending in `/`
   */
  toPath(): string {
    if (this.isDefault) {
      return '/services/';
    }
    return `/servicesNS/${encodeURIComponent(this.owner ?? WILDCARD)}/${encodeURIComponent(this.app ?? WILDCARD)}/`;
  }

  equals(other: Namespace): boolean {
    return this.owner === other.owner && this.app === other.app;
  }

  toString(): string {
    return this.toPath();
  }
}

/**
 * Resource path below a namespace, held as unencoded segments
 *
 * @example
 * ```typescript
 * new ResourceName('saved', 'searches', 'Errors in the last hour').toPath();
 * // 'saved/searches/Errors%20in%20the%20last%20hour'
 * ```
 */
export class ResourceName {
  static readonly appsLocal = new ResourceName('apps', 'local');
  static readonly authLogin = new ResourceName('auth', 'login');
  static readonly dataIndexes = new ResourceName('data', 'indexes');
  static readonly messages = new ResourceName('messages');
  static readonly savedSearches = new ResourceName('saved', 'searches');
  static readonly searchJobs = new ResourceName('search', 'jobs');

  readonly segments: readonly string[];

  constructor(...segments: readonly string[]) {
    if (segments.length === 0 || segments.some((s) => s.length === 0)) {
      throw ConfigError.invalidConfig([`resource name: empty segment in '${segments.join('/')}'`]);
    }
    this.segments = Object.freeze([...segments]);
    Object.freeze(this);
  }

  /**
   * Last segment, the entity name for an entity path
   */
  get title(): string {
    return this.segments[this.segments.length - 1] ?? '';
  }

  /**
   * This path extended by further segments
   */
  child(...segments: readonly string[]): ResourceName {
    return new ResourceName(...this.segments, ...segments);
  }

  toPath(): string {
    return this.segments.map(encodeURIComponent).join('/');
  }

  toString(): string {
    return this.segments.join('/');
  }
}
