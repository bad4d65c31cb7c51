/**
 * Configuration types for the Splunk REST client
 * @module splunk-client/config/types
 */

import type { LogLevel } from '../observability/index.js';

export type Scheme = 'http' | 'https';

/**
 * Default user and app for namespaced resource paths
 */
export interface NamespaceConfig {
  readonly owner?: string;
  readonly app?: string;
}

/**
 * Client configuration as supplied by the caller
 */
export interface SplunkConfig {
  /**
   * Management port scheme
   * @default 'https'
   */
  readonly scheme?: Scheme;

  /**
   * @default 'localhost'
   */
  readonly host?: string;

  /**
   * Management port
   * @default 8089
   */
  readonly port?: number;

  /**
   * Credentials for `login()`
   */
  readonly username?: string;
  readonly password?: string;

  /**
   * Authentication token sent as `Bearer`; login is then unnecessary
   */
  readonly token?: string;

  readonly namespace?: NamespaceConfig;

  /**
   * Request timeout in milliseconds
   * @default 60000
   */
  readonly timeout?: number;

  readonly userAgent?: string;

  /**
   * @default 'info'
   */
  readonly logLevel?: LogLevel;
}

/**
 * Configuration with every default applied
 */
export interface NormalizedSplunkConfig {
  readonly scheme: Scheme;
  readonly host: string;
  readonly port: number;
  readonly username?: string;
  readonly password?: string;
  readonly token?: string;
  readonly namespace: NamespaceConfig;
  readonly timeout: number;
  readonly userAgent: string;
  readonly logLevel: LogLevel;
}
