/**
 * Tests for config/index.ts
 *
 * Tests cover:
 * - Defaults for optional keys
 * - Numeric coercion from strings
 * - ConfigurationError listing invalid keys
 * - Caching and reset
 * - Password masking
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { loadConfig, resetConfig, toSafeConfig } from '../../src/config';
import { ConfigurationError } from '../../src/errors';

const baseEnv = {
  BRAIN_USERNAME: 'researcher@example.test',
  BRAIN_PASSWORD: 'test-secret',
};

describe('loadConfig', () => {
  beforeEach(() => {
    resetConfig();
  });

  it('applies defaults', () => {
    const config = loadConfig({ ...baseEnv });

    expect(config.BRAIN_BASE_URL).toBe('https://api.worldquantbrain.com');
    expect(config.BRAIN_MAX_RETRIES).toBe(3);
    expect(config.BRAIN_RETRY_DELAY_MS).toBe(5000);
    expect(config.BRAIN_TIMEOUT_MS).toBe(30000);
    expect(config.OUTPUT_DIR).toBe('./output');
    expect(config.MAX_CONCURRENT_SIMULATIONS).toBe(5);
    expect(config.MAX_CONCURRENT_SUBMISSIONS).toBe(3);
    expect(config.LOG_CONSOLE).toBe(true);
  });

  it('coerces numeric strings', () => {
    const config = loadConfig({
      ...baseEnv,
      BRAIN_MAX_RETRIES: '5',
      MAX_CONCURRENT_SIMULATIONS: '8',
      LOG_CONSOLE: 'false',
    });

    expect(config.BRAIN_MAX_RETRIES).toBe(5);
    expect(config.MAX_CONCURRENT_SIMULATIONS).toBe(8);
    expect(config.LOG_CONSOLE).toBe(false);
  });

  it('throws ConfigurationError naming missing credentials', () => {
    expect(() => loadConfig({ BRAIN_USERNAME: 'researcher@example.test' })).toThrow(
      ConfigurationError
    );
    resetConfig();
    expect(() => loadConfig({ BRAIN_USERNAME: 'researcher@example.test' })).toThrow(
      /BRAIN_PASSWORD: Required/
    );
  });

  it('rejects a zero worker budget', () => {
    expect(() => loadConfig({ ...baseEnv, MAX_CONCURRENT_SIMULATIONS: '0' })).toThrow(
      /MAX_CONCURRENT_SIMULATIONS/
    );
  });

  it('caches the first successful load until reset', () => {
    const first = loadConfig({ ...baseEnv, OUTPUT_DIR: '/tmp/first' });
    const second = loadConfig({ ...baseEnv, OUTPUT_DIR: '/tmp/second' });
    expect(second).toBe(first);

    resetConfig();
    expect(loadConfig({ ...baseEnv, OUTPUT_DIR: '/tmp/second' }).OUTPUT_DIR).toBe('/tmp/second');
  });
});

describe('toSafeConfig', () => {
  it('masks the password', () => {
    resetConfig();
    const safe = toSafeConfig(loadConfig({ ...baseEnv }));
    expect(safe.BRAIN_PASSWORD).toBe('***');
    expect(safe.BRAIN_USERNAME).toBe('researcher@example.test');
  });
});
