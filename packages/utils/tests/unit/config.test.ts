/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_WINDMILL_ENDPOINT,
  getLoggingConfig,
  getWindmillConfig,
  resolveLoggingConfig,
} from '../../src/config/index.js';
import { ConfigurationError } from '../../src/errors.js';

describe('getWindmillConfig', () => {
  it('should prefer explicit values over the environment', () => {
    const config = getWindmillConfig(
      { apiKey: 'key', endpoint: 'endpoint' },
      { WINDMILLAI_API_KEY: 'env-key', WINDMILLAI_ENDPOINT: 'https://env.example.com' }
    );

    expect(config).toEqual({ apiKey: 'key', endpoint: 'endpoint' });
  });

  it('should read the environment when no values are given', () => {
    const config = getWindmillConfig(
      {},
      { WINDMILLAI_API_KEY: 'env-key', WINDMILLAI_ENDPOINT: 'https://env.example.com' }
    );

    expect(config).toEqual({ apiKey: 'env-key', endpoint: 'https://env.example.com' });
  });

  it('should fall back to the public endpoint and no key', () => {
    const config = getWindmillConfig({}, {});

    expect(config.apiKey).toBeUndefined();
    expect(config.endpoint).toBe(DEFAULT_WINDMILL_ENDPOINT);
    expect(DEFAULT_WINDMILL_ENDPOINT).toBe('https://www.windmillai.com');
  });

  it('should treat empty environment values as unset', () => {
    const config = getWindmillConfig({}, { WINDMILLAI_API_KEY: '', WINDMILLAI_ENDPOINT: '  ' });

    expect(config.apiKey).toBeUndefined();
    expect(config.endpoint).toBe(DEFAULT_WINDMILL_ENDPOINT);
  });

  it('should keep an explicitly absent key without reading the environment', () => {
    const config = getWindmillConfig({ apiKey: undefined }, { WINDMILLAI_API_KEY: 'env-key' });

    expect(config.apiKey).toBeUndefined();
  });

  it('should not read the environment when both values are given', () => {
    const env = new Proxy<Record<string, string | undefined>>(
      {},
      {
        get(_target, name) {
          throw new Error(`environment read: ${String(name)}`);
        },
      }
    );

    expect(getWindmillConfig({ apiKey: 'key', endpoint: 'endpoint' }, env)).toEqual({
      apiKey: 'key',
      endpoint: 'endpoint',
    });
  });

  it('should resolve each field independently', () => {
    const config = getWindmillConfig(
      { endpoint: 'http://localhost:8080' },
      { WINDMILLAI_API_KEY: 'env-key', WINDMILLAI_ENDPOINT: 'https://env.example.com' }
    );

    expect(config).toEqual({ apiKey: 'env-key', endpoint: 'http://localhost:8080' });
  });
});

describe('getLoggingConfig', () => {
  it('should default to info with console output', () => {
    expect(getLoggingConfig({})).toEqual({ level: 'info', console: true });
  });

  it('should read LOG_LEVEL and LOG_CONSOLE', () => {
    expect(getLoggingConfig({ LOG_LEVEL: 'debug', LOG_CONSOLE: 'false' })).toEqual({
      level: 'debug',
      console: false,
    });
  });

  it('should throw ConfigurationError for an unknown level', () => {
    expect(() => getLoggingConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
    expect(() => getLoggingConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      "Invalid LOG_LEVEL 'verbose': expected one of error, warn, info, debug, trace"
    );
  });
});

describe('resolveLoggingConfig', () => {
  it('should match levels case-insensitively', () => {
    expect(resolveLoggingConfig({ LOG_LEVEL: 'WARN' })).toEqual({ level: 'warn', console: true });
    expect(resolveLoggingConfig({ LOG_LEVEL: ' Debug ' })).toEqual({ level: 'debug', console: true });
  });

  it('should fall back to info and report an unknown level', () => {
    expect(resolveLoggingConfig({ LOG_LEVEL: 'silly', LOG_CONSOLE: 'false' })).toEqual({
      level: 'info',
      console: false,
      rejectedLevel: 'silly',
    });
  });

  it('should accept upper-case levels in the strict loader too', () => {
    expect(getLoggingConfig({ LOG_LEVEL: 'TRACE' })).toEqual({ level: 'trace', console: true });
  });
});
