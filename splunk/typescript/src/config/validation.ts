/**
 * Configuration validation and normalization for the Splunk REST client
 * @module splunk-client/config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { NormalizedSplunkConfig, SplunkConfig } from './types.js';
import {
  DEFAULT_HOST,
  DEFAULT_LOG_LEVEL,
  DEFAULT_PORT,
  DEFAULT_SCHEME,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
} from './defaults.js';

/**
 * Zod schema for normalized configuration.
 */
const configSchema = z
  .object({
    scheme: z.enum(['http', 'https']),
    host: z
      .string()
      .min(1)
      .regex(/^[^\s/:?#]+$|^\[[0-9a-fA-F:.]+\]$/, 'must be a host name or address'),
    port: z.number().int().min(1).max(65535),
    username: z.string().min(1).optional(),
    password: z.string().optional(),
    token: z.string().min(1).optional(),
    namespace: z.object({
      owner: z.string().min(1).optional(),
      app: z.string().min(1).optional(),
    }),
    timeout: z.number().int().positive(),
    userAgent: z.string().min(1),
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'off']),
  })
  .refine((config) => config.password === undefined || config.username !== undefined, {
    message: 'password requires a username',
    path: ['username'],
  });

/**
 * Validates normalized configuration.
 *
 * @throws {ConfigError} listing every issue found
 */
export function validateConfig(config: NormalizedSplunkConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw ConfigError.invalidConfig(issues);
  }
}

/**
 * Applies defaults and validates.
 */
export function normalizeConfig(config: SplunkConfig = {}): NormalizedSplunkConfig {
  const normalized: NormalizedSplunkConfig = {
    scheme: config.scheme ?? DEFAULT_SCHEME,
    host: config.host ?? DEFAULT_HOST,
    port: config.port ?? DEFAULT_PORT,
    username: config.username,
    password: config.password,
    token: config.token,
    namespace: { ...config.namespace },
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    logLevel: config.logLevel ?? DEFAULT_LOG_LEVEL,
  };

  validateConfig(normalized);
  return normalized;
}

/**
 * Base URL of the management port, e.g. `https://localhost:8089`
 */
export function baseUrlOf(config: NormalizedSplunkConfig): string {
  return `${config.scheme}://${config.host}:${config.port}`;
}
