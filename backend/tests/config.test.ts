import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.env).toBe('development');
    expect(config.apiPort).toBe(8080);
    expect(config.jwtSecret).toBeUndefined();
    expect(config.staging).toEqual({
      host: 'localhost',
      port: 5432,
      user: 'etl',
      password: 'etlpass',
      database: 'staging',
      max: 10,
    });
    expect(config.destination.database).toBe('warehouse');
    expect(config.kaggle).toEqual({
      apiBase: 'https://www.kaggle.com/api/v1',
      username: undefined,
      key: undefined,
      configDir: path.join(os.homedir(), '.kaggle'),
    });
    expect(config.datasetId).toBe('ayushparwal2026/online-ecommerce');
    expect(config.downloadDir).toBe(path.join(process.cwd(), 'data', 'online-ecommerce'));
    expect(config.scheduler).toEqual({ retries: 1, retryDelayMs: 300000, intervalMinutes: 0 });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      API_PORT: '9090',
      JWT_SECRET: 'test-secret',
      STAGING_DB_PORT: '5433',
      DESTINATION_DB_HOST: 'warehouse.internal',
      KAGGLE_USERNAME: 'test-user',
      KAGGLE_KEY: 'test-key',
      ETL_DOWNLOAD_DIR: '/tmp/orders',
      ETL_TASK_RETRIES: '0',
      ETL_SCHEDULE_INTERVAL_MINUTES: '1440',
    });

    expect(config.env).toBe('production');
    expect(config.apiPort).toBe(9090);
    expect(config.jwtSecret).toBe('test-secret');
    expect(config.staging.port).toBe(5433);
    expect(config.destination.host).toBe('warehouse.internal');
    expect(config.kaggle.username).toBe('test-user');
    expect(config.kaggle.key).toBe('test-key');
    expect(config.downloadDir).toBe(path.resolve('/tmp/orders'));
    expect(config.scheduler).toEqual({ retries: 0, retryDelayMs: 300000, intervalMinutes: 1440 });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ API_PORT: '', JWT_SECRET: '' })).toMatchObject({ apiPort: 8080, jwtSecret: undefined });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ API_PORT: 'eighty' })).toThrow(/^invalid configuration: API_PORT: /);
    expect(() => loadConfig({ ETL_TASK_RETRIES: '-1' })).toThrow(/ETL_TASK_RETRIES/);
  });

  it('caps the schedule interval at what a timer can hold', () => {
    expect(loadConfig({ ETL_SCHEDULE_INTERVAL_MINUTES: '35791' }).scheduler.intervalMinutes).toBe(35791);
    expect(() => loadConfig({ ETL_SCHEDULE_INTERVAL_MINUTES: '43200' })).toThrow(
      /ETL_SCHEDULE_INTERVAL_MINUTES/
    );
  });
});
