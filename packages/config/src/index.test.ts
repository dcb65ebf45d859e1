import { describe, expect, it } from 'vitest';
import { loadEnv, loadMigrationEnv } from './index.js';

const base = {
  JWT_SECRET: 'test-secret',
  DATABASE_URL_API: 'postgres://api@localhost/fm',
  DATABASE_URL_WORKER: 'postgres://worker@localhost/fm',
  REDIS_URL: 'redis://localhost:6379'
};

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv(base);

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      API_PORT: 3000,
      DISABLE_QUEUE: false,
      BUSINESS_TIMEZONE: 'UTC',
      WORK_ORDER_NUMBER_PREFIX: 'WO',
      AUTO_SCHEDULE_TENANT_IDS: [],
      AUTO_SCHEDULE_INTERVAL_MINUTES: 15
    });
  });

  it('parses lists, flags and numbers', () => {
    const env = loadEnv({
      ...base,
      API_PORT: '8080',
      DISABLE_QUEUE: '1',
      BUSINESS_TIMEZONE: 'Europe/London',
      AUTO_SCHEDULE_TENANT_IDS: '11111111-1111-1111-1111-111111111111, 22222222-2222-2222-2222-222222222222'
    });

    expect(env.API_PORT).toBe(8080);
    expect(env.DISABLE_QUEUE).toBe(true);
    expect(env.BUSINESS_TIMEZONE).toBe('Europe/London');
    expect(env.AUTO_SCHEDULE_TENANT_IDS).toEqual([
      '11111111-1111-1111-1111-111111111111',
      '22222222-2222-2222-2222-222222222222'
    ]);
  });

  it('rejects unknown time zones and malformed prefixes', () => {
    expect(() => loadEnv({ ...base, BUSINESS_TIMEZONE: 'Nowhere/Special' })).toThrow();
    expect(() => loadEnv({ ...base, WORK_ORDER_NUMBER_PREFIX: 'wo-' })).toThrow();
    expect(() => loadEnv({ ...base, AUTO_SCHEDULE_TENANT_IDS: 'not-a-uuid' })).toThrow();
  });

  it('requires secrets and connection strings', () => {
    expect(() => loadEnv({ ...base, JWT_SECRET: undefined })).toThrow();
    expect(() => loadEnv({ ...base, REDIS_URL: undefined })).toThrow();
  });
});

describe('loadMigrationEnv', () => {
  it('needs only the owner connection string', () => {
    expect(loadMigrationEnv({ DATABASE_URL_ROOT: 'postgres://owner@localhost/fm', LOG_LEVEL: 'warn' })).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'warn',
      DATABASE_URL_ROOT: 'postgres://owner@localhost/fm'
    });
  });

  it('rejects a missing owner connection string', () => {
    expect(() => loadMigrationEnv({ ...base })).toThrow();
  });
});
