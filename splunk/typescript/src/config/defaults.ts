/**
 * Default configuration values for the Splunk REST client
 * @module splunk-client/config/defaults
 */

import type { LogLevel } from '../observability/index.js';
import type { Scheme } from './types.js';

export const DEFAULT_SCHEME: Scheme = 'https';

export const DEFAULT_HOST = 'localhost';

/**
 * Default management port
 */
export const DEFAULT_PORT = 8089;

/**
 * Default request timeout in milliseconds (1 minute)
 */
export const DEFAULT_TIMEOUT = 60000;

export const DEFAULT_USER_AGENT = 'splunk-client/0.1.0';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
