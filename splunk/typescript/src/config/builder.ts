/**
 * Fluent configuration builder for the Splunk REST client
 * @module splunk-client/config/builder
 */

import { ConfigError } from '../errors/index.js';
import type { LogLevel } from '../observability/index.js';
import type { NormalizedSplunkConfig, Scheme, SplunkConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * @example
 * ```typescript
 * const config = new SplunkConfigBuilder()
 *   .baseUrl('https://splunk.example.com:8089')
 *   .credentials('admin', 'changeme')
 *   .namespace('nobody', 'search')
 *   .build();
 * ```
 */
export class SplunkConfigBuilder {
  private config: SplunkConfig = {};

  /**
   * Sets scheme, host and port from a URL
   */
  baseUrl(value: string): this {
    let url: URL;
    try {
      url = new URL(value);
    } catch {
      throw ConfigError.invalidConfig([`baseUrl: invalid URL '${value}'`]);
    }
    const scheme = url.protocol.slice(0, -1);
    if (scheme !== 'http' && scheme !== 'https') {
      throw ConfigError.invalidConfig([`baseUrl: unsupported scheme '${scheme}'`]);
    }
    this.config = {
      ...this.config,
      scheme,
      host: url.hostname,
      port: url.port ? Number(url.port) : this.config.port,
    };
    return this;
  }

  scheme(value: Scheme): this {
    this.config = { ...this.config, scheme: value };
    return this;
  }

  host(value: string): this {
    this.config = { ...this.config, host: value };
    return this;
  }

  port(value: number): this {
    this.config = { ...this.config, port: value };
    return this;
  }

  credentials(username: string, password: string): this {
    this.config = { ...this.config, username, password };
    return this;
  }

  token(value: string): this {
    this.config = { ...this.config, token: value };
    return this;
  }

  namespace(owner?: string, app?: string): this {
    this.config = { ...this.config, namespace: { owner, app } };
    return this;
  }

  /**
   * Sets the request timeout in milliseconds
   */
  timeout(value: number): this {
    this.config = { ...this.config, timeout: value };
    return this;
  }

  userAgent(value: string): this {
    this.config = { ...this.config, userAgent: value };
    return this;
  }

  logLevel(value: LogLevel): this {
    this.config = { ...this.config, logLevel: value };
    return this;
  }

  /**
   * Applies defaults and validates
   *
   * @throws {ConfigError} when the configuration is invalid
   */
  build(): NormalizedSplunkConfig {
    return normalizeConfig(this.config);
  }
}
