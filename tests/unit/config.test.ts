import { describe, it, expect } from 'vitest';
import { loadConfig, requireDatabaseUrl } from '../../src/config.js';
import { ConfigError } from '../../src/errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: 'info',
      PG_POOL_MAX: 4,
      PG_STATEMENT_TIMEOUT_MS: 30_000,
      REGION_QUERY_PARALLEL: false,
    });
  });

  it('coerces numbers and flags', () => {
    const config = loadConfig({
      DATABASE_URL: 'postgres://localhost/regions',
      LOG_LEVEL: 'debug',
      PG_POOL_MAX: '8',
      PG_STATEMENT_TIMEOUT_MS: '0',
      REGION_QUERY_PARALLEL: 'true',
    });
    expect(config).toEqual({
      DATABASE_URL: 'postgres://localhost/regions',
      LOG_LEVEL: 'debug',
      PG_POOL_MAX: 8,
      PG_STATEMENT_TIMEOUT_MS: 0,
      REGION_QUERY_PARALLEL: true,
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/root' }).LOG_LEVEL).toBe('info');
  });

  it('lists every invalid variable', () => {
    const err = (() => {
      try {
        loadConfig({ LOG_LEVEL: 'loud', PG_POOL_MAX: '0' });
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(err).toBeInstanceOf(ConfigError);
    const issues = err instanceof ConfigError ? err.issues : [];
    expect(issues.map((issue) => issue.split(':')[0])).toEqual(['LOG_LEVEL', 'PG_POOL_MAX']);
  });

  it('rejects a negative statement timeout', () => {
    expect(() => loadConfig({ PG_STATEMENT_TIMEOUT_MS: '-1' })).toThrow(ConfigError);
  });
});

describe('requireDatabaseUrl', () => {
  it('returns the configured URL', () => {
    expect(requireDatabaseUrl(loadConfig({ DATABASE_URL: 'postgres://db/x' }))).toBe('postgres://db/x');
  });

  it('throws ConfigError when unset', () => {
    expect(() => requireDatabaseUrl(loadConfig({}))).toThrow(
      'Invalid configuration: DATABASE_URL: required to reach the point store',
    );
  });
});
