import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults for the in-memory store', () => {
    expect(loadConfig({ USER_STORE: 'memory' })).toEqual({
      env: 'development',
      port: 3000,
      serviceName: 'user-service',
      logLevel: 'info',
      userStore: 'memory',
      databaseUrl: undefined,
      dbPoolMax: 20,
      rateLimit: { windowMs: 60000, max: 300 },
    });
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      DATABASE_URL: 'postgres://localhost:5432/users',
      PORT: '8080',
      DB_POOL_MAX: '5',
      RATE_LIMIT_MAX: '10',
    });

    expect(config.port).toBe(8080);
    expect(config.dbPoolMax).toBe(5);
    expect(config.rateLimit.max).toBe(10);
    expect(config.userStore).toBe('postgres');
  });

  it('silences logs under test unless LOG_LEVEL is set', () => {
    expect(loadConfig({ NODE_ENV: 'test', USER_STORE: 'memory' }).logLevel).toBe('silent');
    expect(
      loadConfig({ NODE_ENV: 'test', USER_STORE: 'memory', LOG_LEVEL: 'debug' }).logLevel
    ).toBe('debug');
  });

  it('requires DATABASE_URL for the postgres store', () => {
    expect(() => loadConfig({})).toThrow('Invalid configuration: DATABASE_URL');
  });

  it('names invalid variables without echoing their values', () => {
    expect(() =>
      loadConfig({ DATABASE_URL: 'postgres://localhost/users', PORT: 'not-a-port' })
    ).toThrow('Invalid configuration: PORT');
  });
});
