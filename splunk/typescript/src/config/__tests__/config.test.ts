/**
 * Tests for configuration loading and validation
 */

import { ConfigError } from '../../errors/index.js';
import {
  baseUrlOf,
  createConfigFromEnv,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  normalizeConfig,
  SplunkConfigBuilder,
} from '../index.js';

describe('normalizeConfig', () => {
  it('should apply defaults', () => {
    const config = normalizeConfig();

    expect(config).toEqual({
      scheme: 'https',
      host: 'localhost',
      port: DEFAULT_PORT,
      namespace: {},
      timeout: DEFAULT_TIMEOUT,
      userAgent: DEFAULT_USER_AGENT,
      logLevel: 'info',
    });
    expect(baseUrlOf(config)).toBe('https://localhost:8089');
  });

  it('should keep supplied values', () => {
    const config = normalizeConfig({
      scheme: 'http',
      host: 'splunk.internal',
      port: 18089,
      token: 'test-token',
      namespace: { owner: 'admin', app: 'search' },
    });

    expect(baseUrlOf(config)).toBe('http://splunk.internal:18089');
    expect(config.token).toBe('test-token');
    expect(config.namespace).toEqual({ owner: 'admin', app: 'search' });
  });

  it('should accept bracketed IPv6 hosts', () => {
    expect(normalizeConfig({ host: '[::1]' }).host).toBe('[::1]');
  });

  it('should reject ports out of range', () => {
    expect(() => normalizeConfig({ port: 0 })).toThrow(ConfigError);
    expect(() => normalizeConfig({ port: 70000 })).toThrow(/port/);
  });

  it('should reject hosts with a path or scheme', () => {
    expect(() => normalizeConfig({ host: 'https://splunk' })).toThrow(/host: must be a host name or address/);
  });

  it('should reject an empty namespace component', () => {
    expect(() => normalizeConfig({ namespace: { owner: '' } })).toThrow(/namespace\.owner/);
  });

  it('should require a username alongside a password', () => {
    expect(() => normalizeConfig({ password: 'test-secret' })).toThrow(
      'Invalid configuration: username: password requires a username'
    );
  });

  it('should report every issue at once', () => {
    try {
      normalizeConfig({ port: -1, timeout: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(String(error instanceof Error ? error.message : error)).toMatch(/port: .*, timeout: /);
    }
  });
});

describe('SplunkConfigBuilder', () => {
  it('should build a configuration', () => {
    const config = new SplunkConfigBuilder()
      .baseUrl('http://10.0.0.5:8000')
      .credentials('admin', 'test-secret')
      .namespace('nobody', 'search')
      .timeout(5000)
      .logLevel('debug')
      .build();

    expect(baseUrlOf(config)).toBe('http://10.0.0.5:8000');
    expect(config.username).toBe('admin');
    expect(config.password).toBe('test-secret');
    expect(config.namespace).toEqual({ owner: 'nobody', app: 'search' });
    expect(config.timeout).toBe(5000);
    expect(config.logLevel).toBe('debug');
  });

  it('should keep the port when the URL has none', () => {
    const config = new SplunkConfigBuilder().port(9089).baseUrl('https://splunk.example.com').build();
    expect(baseUrlOf(config)).toBe('https://splunk.example.com:9089');
  });

  it('should reject other URL schemes', () => {
    expect(() => new SplunkConfigBuilder().baseUrl('ftp://splunk')).toThrow("baseUrl: unsupported scheme 'ftp'");
    expect(() => new SplunkConfigBuilder().baseUrl('not a url')).toThrow(ConfigError);
  });
});

describe('createConfigFromEnv', () => {
  it('should read every variable', () => {
    const config = createConfigFromEnv({
      SPLUNK_SCHEME: 'HTTP',
      SPLUNK_HOST: ' splunk.internal ',
      SPLUNK_PORT: '9089',
      SPLUNK_USERNAME: 'admin',
      SPLUNK_PASSWORD: 'test-secret',
      SPLUNK_OWNER: 'admin',
      SPLUNK_APP: 'search',
      SPLUNK_TIMEOUT_MS: '2500',
      SPLUNK_LOG_LEVEL: 'DEBUG',
    });

    expect(baseUrlOf(config)).toBe('http://splunk.internal:9089');
    expect(config.username).toBe('admin');
    expect(config.password).toBe('test-secret');
    expect(config.namespace).toEqual({ owner: 'admin', app: 'search' });
    expect(config.timeout).toBe(2500);
    expect(config.logLevel).toBe('debug');
  });

  it('should fall back to defaults for blank variables', () => {
    const config = createConfigFromEnv({ SPLUNK_HOST: '  ', SPLUNK_TOKEN: 'test-token' });

    expect(config.host).toBe('localhost');
    expect(config.token).toBe('test-token');
    expect(config.namespace).toEqual({});
  });

  it('should reject invalid values', () => {
    expect(() => createConfigFromEnv({ SPLUNK_PORT: 'abc' })).toThrow(
      'Invalid configuration: SPLUNK_PORT must be a valid integer, got: abc'
    );
    expect(() => createConfigFromEnv({ SPLUNK_SCHEME: 'ftp' })).toThrow(
      'Invalid configuration: SPLUNK_SCHEME must be http or https, got: ftp'
    );
    expect(() => createConfigFromEnv({ SPLUNK_LOG_LEVEL: 'loud' })).toThrow(/SPLUNK_LOG_LEVEL must be one of/);
  });
});
