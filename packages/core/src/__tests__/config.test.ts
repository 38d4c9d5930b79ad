/**
 * @summary Tests for configuration defaults, resolution and env loading.
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  configFromEnv,
  parseCommaSeparated,
  resolveConfig,
} from '../config.js';
import { ConfigurationError } from '../types/errors.js';
import { DEFAULT_FIELDS, FIELDS, LANGS, SERVICE_FIELDS } from '../constants.js';

describe('DEFAULT_CONFIG', () => {
  it('holds the documented service settings', () => {
    expect(DEFAULT_CONFIG).toEqual({
      baseUrl: 'http://ip-api.com/',
      proUrl: 'https://pro.ip-api.com/',
      jsonEndpoint: 'json',
      batchEndpoint: 'batch',
      batchSize: 100,
      jsonRateLimit: 45,
      batchRateLimit: 15,
      retryAttempts: 3,
      retryDelayMs: 1000,
      ttlHoldMs: 3000,
      timeoutMs: 30000,
      https: false,
    });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
  });
});

describe('resolveConfig', () => {
  it('returns the defaults for no overrides', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('layers overrides over the defaults', () => {
    const config = resolveConfig({ batchSize: 10 });

    expect(config.batchSize).toBe(10);
    expect(config.retryAttempts).toBe(3);
  });

  it('drops keys that are not service settings', () => {
    const overrides = { ttlHoldMs: 0, lang: 'de' };
    const config = resolveConfig(overrides);

    expect(config.ttlHoldMs).toBe(0);
    expect('lang' in config).toBe(false);
  });

  it('does not share state between resolutions', () => {
    const first = resolveConfig({ batchSize: 5 });
    const second = resolveConfig();

    expect(first.batchSize).toBe(5);
    expect(second.batchSize).toBe(100);
  });

  it.each([
    [{ batchSize: 0 }, 'batchSize'],
    [{ batchSize: 2.5 }, 'batchSize'],
    [{ retryAttempts: 0 }, 'retryAttempts'],
    [{ retryDelayMs: -1 }, 'retryDelayMs'],
    [{ ttlHoldMs: Number.NaN }, 'ttlHoldMs'],
    [{ timeoutMs: 0 }, 'timeoutMs'],
    [{ baseUrl: 'ip-api.com' }, 'baseUrl'],
    [{ proUrl: 'ftp://pro.ip-api.com/' }, 'proUrl'],
    [{ jsonEndpoint: ' ' }, 'jsonEndpoint'],
  ])('rejects %o', (overrides, option) => {
    try {
      resolveConfig(overrides);
      expect.unreachable('resolveConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.option).toBe(option);
      }
    }
  });
});

describe('configFromEnv', () => {
  it('returns nothing for an empty environment', () => {
    expect(configFromEnv({})).toEqual({});
  });

  it('reads every recognised variable', () => {
    const config = configFromEnv({
      IPGEO_KEY: 'test-secret',
      IPGEO_LANG: 'de',
      IPGEO_FIELDS: 'country, city,,lat',
      IPGEO_HTTPS: 'yes',
      IPGEO_BATCH_SIZE: '50',
      IPGEO_RETRY_ATTEMPTS: '5',
      IPGEO_RETRY_DELAY_MS: '250',
      IPGEO_TIMEOUT_MS: '10000',
      IPGEO_DEBUG: '1',
    });

    expect(config).toEqual({
      key: 'test-secret',
      lang: 'de',
      fields: ['country', 'city', 'lat'],
      https: true,
      debug: true,
      batchSize: 50,
      retryAttempts: 5,
      retryDelayMs: 250,
      timeoutMs: 10000,
    });
  });

  it('leaves out blank variables', () => {
    expect(configFromEnv({ IPGEO_KEY: '  ', IPGEO_HTTPS: '' })).toEqual({});
  });

  it('rejects malformed values', () => {
    expect(() => configFromEnv({ IPGEO_HTTPS: 'maybe' })).toThrow(ConfigurationError);
    expect(() => configFromEnv({ IPGEO_BATCH_SIZE: 'many' })).toThrow(
      'Invalid IPGEO_BATCH_SIZE: many (must be a number)'
    );
  });
});

describe('parseCommaSeparated', () => {
  it('splits and trims, dropping blanks', () => {
    expect(parseCommaSeparated(' a ,b,, c')).toEqual(['a', 'b', 'c']);
    expect(parseCommaSeparated('')).toEqual([]);
  });
});

describe('constants', () => {
  it('includes the service fields in the default fields', () => {
    for (const field of SERVICE_FIELDS) {
      expect(DEFAULT_FIELDS).toContain(field);
    }
  });

  it('documents the requestable fields and languages', () => {
    expect(FIELDS.has('country')).toBe(true);
    expect(FIELDS.has('hosting')).toBe(true);
    expect(FIELDS.size).toBe(22);
    expect(LANGS.has('pt-BR')).toBe(true);
    expect(LANGS.size).toBe(8);
  });
});
