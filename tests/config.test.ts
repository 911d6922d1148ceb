import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigurationError, describeFault, MissingDataError } from '../src/errors.js';
import { resolveLogLevel } from '../src/utils/logger.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      badDomainsPath: 'data/bad_domains.csv',
      concurrency: 8,
      postalTolerance: 'either',
      port: 3000,
      origins: [],
      logLevel: 'info',
      debugApi: false,
      rateLimit: { max: 120, windowMs: 60_000 },
      maxBatch: 500,
    });
  });

  it('reads overrides and treats blanks as unset', () => {
    const config = loadConfig({
      CONCURRENCY: '16',
      ORIGINS: 'http://a.test, http://b.test,',
      DEBUG_API: '1',
      POSTAL_TOLERANCE: 'none',
      PORT: ' ',
    });
    expect(config.concurrency).toBe(16);
    expect(config.origins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.debugApi).toBe(true);
    expect(config.postalTolerance).toBe('none');
    expect(config.port).toBe(3000);
    expect(loadConfig({ DEBUG_API: '0' }).debugApi).toBe(false);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ CONCURRENCY: 'zero' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ POSTAL_TOLERANCE: 'sometimes' })).toThrow(/^Invalid configuration: POSTAL_TOLERANCE:/);
    expect(() => loadConfig({ CONCURRENCY: '0' })).toThrow(/CONCURRENCY/);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid configuration: LOG_LEVEL:/);
  });
});

describe('resolveLogLevel', () => {
  it('keeps a level pino knows', () => {
    expect(resolveLogLevel('warn')).toBe('warn');
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
  });

  it('falls back to info for anything else', () => {
    expect(resolveLogLevel('loud')).toBe('info');
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
  });
});

describe('errors', () => {
  it('carries a kind and a class name', () => {
    const err = new MissingDataError('parent record P-1 was not supplied');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('MissingDataError');
    expect(err.kind).toBe('missing-data');
    expect(describeFault(err)).toBe('missing-data: parent record P-1 was not supplied');
    expect(describeFault(new Error('boom'))).toBe('boom');
  });
});
