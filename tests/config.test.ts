/**
 * Config Tests — session config and FLATDOC_* environment
 */

import { describe, it, expect } from 'vitest';
import { configFromEnv, parseConfig } from '../src/config.js';

describe('parseConfig', () => {
  it('accepts a full config', () => {
    const config = { uri: 'sqlite::memory:', label: 'app', pool: 'low', logging: 'verbose', slowQueryMs: 50 };
    expect(parseConfig(config)).toEqual(config);
  });

  it('rejects an unknown pool preset', () => {
    expect(() => parseConfig({ uri: 'sqlite::memory:', pool: 'huge' })).toThrowError(/Invalid FlatDoc config: pool:/);
  });

  it('rejects a missing uri', () => {
    expect(() => parseConfig({})).toThrowError(/Invalid FlatDoc config: uri: Required/);
  });
});

describe('configFromEnv', () => {
  it('requires FLATDOC_URI', () => {
    expect(() => configFromEnv({})).toThrowError(/Invalid environment: FLATDOC_URI: Required/);
  });

  it('reads only the variables that are set', () => {
    expect(configFromEnv({ FLATDOC_URI: 'sqlite:app.db', HOME: '/root' })).toEqual({ uri: 'sqlite:app.db' });
  });

  it('maps every variable', () => {
    expect(
      configFromEnv({
        FLATDOC_URI: 'postgres://localhost/app',
        FLATDOC_LABEL: 'worker',
        FLATDOC_POOL: 'high',
        FLATDOC_LOGGING: 'false',
        FLATDOC_SLOW_QUERY_MS: '250',
      }),
    ).toEqual({ uri: 'postgres://localhost/app', label: 'worker', pool: 'high', logging: false, slowQueryMs: 250 });
  });

  it('maps verbose logging', () => {
    expect(configFromEnv({ FLATDOC_URI: 'sqlite::memory:', FLATDOC_LOGGING: 'verbose' }).logging).toBe('verbose');
    expect(configFromEnv({ FLATDOC_URI: 'sqlite::memory:', FLATDOC_LOGGING: 'true' }).logging).toBe(true);
  });

  it('rejects a non-numeric slow query threshold', () => {
    expect(() => configFromEnv({ FLATDOC_URI: 'sqlite::memory:', FLATDOC_SLOW_QUERY_MS: 'soon' })).toThrowError(
      /FLATDOC_SLOW_QUERY_MS: must be a whole number of milliseconds/,
    );
  });
});
