/**
 * Configuration for the Splunk REST client
 * @module splunk-client/config
 */

export type { NamespaceConfig, NormalizedSplunkConfig, Scheme, SplunkConfig } from './types.js';
export {
  DEFAULT_HOST,
  DEFAULT_LOG_LEVEL,
  DEFAULT_PORT,
  DEFAULT_SCHEME,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
} from './defaults.js';
export { baseUrlOf, normalizeConfig, validateConfig } from './validation.js';
export { SplunkConfigBuilder } from './builder.js';
export { createConfigFromEnv } from './env.js';
