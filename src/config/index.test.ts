/**
 * Tests for configuration
 */

import { describe, it, expect } from 'vitest';
import {
  resolveConfig,
  loadConfigFromEnv,
  DEFAULT_CONFIG,
  DEFAULT_USER_AGENT,
} from './index.js';
import { ConfigurationError } from '../error/index.js';

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig().userAgent).toBe(DEFAULT_USER_AGENT);
    expect(resolveConfig().logLevel).toBe('info');
  });

  it('should keep provided values', () => {
    expect(resolveConfig({ userAgent: 'nightly-sync/2.0', logLevel: 'debug', timeoutMs: 30000 })).toEqual({
      userAgent: 'nightly-sync/2.0',
      logLevel: 'debug',
      timeoutMs: 30000,
    });
  });

  it('should freeze the result', () => {
    expect(Object.isFrozen(resolveConfig())).toBe(true);
  });

  it('should reject an unknown log level', () => {
    expect(() => resolveConfig({ logLevel: 'verbose' })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ logLevel: 'verbose' })).toThrow(
      'Invalid configuration: logLevel: Log level must be one of: error, warn, info, debug, trace'
    );
  });

  it('should reject a non-positive timeout', () => {
    expect(() => resolveConfig({ timeoutMs: 0 })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ timeoutMs: 1.5 })).toThrow(ConfigurationError);
  });

  it('should reject an empty user agent', () => {
    expect(() => resolveConfig({ userAgent: '' })).toThrow(ConfigurationError);
  });
});

describe('loadConfigFromEnv', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual(DEFAULT_CONFIG);
  });

  it('should read every variable', () => {
    const config = loadConfigFromEnv({
      AWS_REQUEST_CORE_USER_AGENT: 'nightly-sync/2.0',
      AWS_REQUEST_CORE_LOG_LEVEL: 'DEBUG',
      AWS_REQUEST_CORE_TIMEOUT_MS: '5000',
    });

    expect(config).toEqual({ userAgent: 'nightly-sync/2.0', logLevel: 'debug', timeoutMs: 5000 });
  });

  it('should reject a non-numeric timeout', () => {
    expect(() => loadConfigFromEnv({ AWS_REQUEST_CORE_TIMEOUT_MS: 'soon' })).toThrow(
      'Invalid configuration: AWS_REQUEST_CORE_TIMEOUT_MS: soon'
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfigFromEnv({ AWS_REQUEST_CORE_LOG_LEVEL: 'loud' })).toThrow(
      ConfigurationError
    );
  });
});
