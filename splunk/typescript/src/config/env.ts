/**
 * Environment variable configuration loading for the Splunk REST client
 * @module splunk-client/config/env
 */

import { ConfigError } from '../errors/index.js';
import { LOG_LEVELS, type LogLevel } from '../observability/index.js';
import type { NormalizedSplunkConfig, Scheme } from './types.js';
import { normalizeConfig } from './validation.js';

const ENV_VARS = {
  SCHEME: 'SPLUNK_SCHEME',
  HOST: 'SPLUNK_HOST',
  PORT: 'SPLUNK_PORT',
  USERNAME: 'SPLUNK_USERNAME',
  PASSWORD: 'SPLUNK_PASSWORD',
  TOKEN: 'SPLUNK_TOKEN',
  OWNER: 'SPLUNK_OWNER',
  APP: 'SPLUNK_APP',
  TIMEOUT_MS: 'SPLUNK_TIMEOUT_MS',
  LOG_LEVEL: 'SPLUNK_LOG_LEVEL',
} as const;

type Env = Readonly<Record<string, string | undefined>>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function parseIntEnv(env: Env, name: string): number | undefined {
  const value = readEnv(env, name);
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value)) {
    throw ConfigError.invalidConfig([`${name} must be a valid integer, got: ${value}`]);
  }
  return Number(value);
}

function parseScheme(env: Env): Scheme | undefined {
  const value = readEnv(env, ENV_VARS.SCHEME)?.toLowerCase();
  if (value === undefined || value === 'http' || value === 'https') {
    return value;
  }
  throw ConfigError.invalidConfig([`${ENV_VARS.SCHEME} must be http or https, got: ${value}`]);
}

function parseLogLevel(env: Env): LogLevel | undefined {
  const value = readEnv(env, ENV_VARS.LOG_LEVEL)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  const level = LOG_LEVELS.find((l) => l === value);
  if (!level) {
    throw ConfigError.invalidConfig([`${ENV_VARS.LOG_LEVEL} must be one of ${LOG_LEVELS.join(', ')}, got: ${value}`]);
  }
  return level;
}

/**
 * Creates configuration from environment variables.
 *
 * Environment variables (all optional):
 * - SPLUNK_SCHEME, SPLUNK_HOST, SPLUNK_PORT: management port address
 * - SPLUNK_USERNAME, SPLUNK_PASSWORD: login credentials
 * - SPLUNK_TOKEN: authentication token
 * - SPLUNK_OWNER, SPLUNK_APP: default namespace
 * - SPLUNK_TIMEOUT_MS: request timeout in milliseconds
 * - SPLUNK_LOG_LEVEL: trace, debug, info, warn, error or off
 *
 * @throws {ConfigError} If a variable holds an invalid value
 */
export function createConfigFromEnv(env: Env = process.env): NormalizedSplunkConfig {
  return normalizeConfig({
    scheme: parseScheme(env),
    host: readEnv(env, ENV_VARS.HOST),
    port: parseIntEnv(env, ENV_VARS.PORT),
    username: readEnv(env, ENV_VARS.USERNAME),
    password: env[ENV_VARS.PASSWORD] || undefined,
    token: readEnv(env, ENV_VARS.TOKEN),
    namespace: {
      owner: readEnv(env, ENV_VARS.OWNER),
      app: readEnv(env, ENV_VARS.APP),
    },
    timeout: parseIntEnv(env, ENV_VARS.TIMEOUT_MS),
    logLevel: parseLogLevel(env),
  });
}
