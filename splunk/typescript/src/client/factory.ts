/**
 * Factory functions for creating Splunk clients
 * @module splunk-client/client/factory
 */

import { createConfigFromEnv, normalizeConfig, type SplunkConfig } from '../config/index.js';
import { createLogger, type Logger } from '../observability/index.js';
import { createFetchTransport, type HttpTransport } from '../transport/index.js';
import { SplunkClient } from './client.js';

export interface ClientOptions {
  /**
   * Defaults to a fetch transport with the configured timeout
   */
  transport?: HttpTransport;

  /**
   * Defaults to a console logger at the configured level
   */
  logger?: Logger;
}

/**
 * Creates a client from a configuration object
 *
 * @throws {ConfigError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({ host: 'splunk.example.com', username: 'admin', password: 'changeme' });
 * try {
 *   await client.login();
 *   const { items } = await client.applications.list({ count: 10 });
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export function createClient(config: SplunkConfig = {}, options: ClientOptions = {}): SplunkClient {
  const normalized = normalizeConfig(config);
  const transport = options.transport ?? createFetchTransport(normalized.timeout);
  const logger = options.logger ?? createLogger({ level: normalized.logLevel });
  return new SplunkClient(normalized, transport, logger);
}

/**
 * Creates a client from `SPLUNK_*` environment variables
 *
 * @throws {ConfigError} If a variable holds an invalid value
 */
export function createClientFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  options: ClientOptions = {}
): SplunkClient {
  return createClient(createConfigFromEnv(env), options);
}
