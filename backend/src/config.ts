import 'dotenv/config';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { MAX_INTERVAL_MINUTES } from './scheduler/interval-schedule.js';

const port = z.coerce.number().int().min(1).max(65535);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: port.default(8080),
  JWT_SECRET: z.string().min(1).optional(),

  STAGING_DB_HOST: z.string().min(1).default('localhost'),
  STAGING_DB_PORT: port.default(5432),
  STAGING_DB_USER: z.string().min(1).default('etl'),
  STAGING_DB_PASSWORD: z.string().default('etlpass'),
  STAGING_DB_NAME: z.string().min(1).default('staging'),

  DESTINATION_DB_HOST: z.string().min(1).default('localhost'),
  DESTINATION_DB_PORT: port.default(5432),
  DESTINATION_DB_USER: z.string().min(1).default('etl'),
  DESTINATION_DB_PASSWORD: z.string().default('etlpass'),
  DESTINATION_DB_NAME: z.string().min(1).default('warehouse'),

  DB_POOL_MAX: z.coerce.number().int().positive().default(10),

  KAGGLE_API_BASE: z.string().url().default('https://www.kaggle.com/api/v1'),
  KAGGLE_USERNAME: z.string().min(1).optional(),
  KAGGLE_KEY: z.string().min(1).optional(),
  KAGGLE_CONFIG_DIR: z.string().min(1).optional(),

  ETL_DATASET_ID: z.string().min(1).default('ayushparwal2026/online-ecommerce'),
  ETL_DOWNLOAD_DIR: z.string().min(1).optional(),
  ETL_TASK_RETRIES: z.coerce.number().int().min(0).default(1),
  ETL_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5 * 60 * 1000),
  // setInterval holds at most 2^31-1 ms
  ETL_SCHEDULE_INTERVAL_MINUTES: z.coerce.number().min(0).max(MAX_INTERVAL_MINUTES).default(0),
});

export type DatabaseConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  max: number;
};

export type KaggleSettings = {
  apiBase: string;
  username?: string;
  key?: string;
  configDir: string;
};

export type SchedulerSettings = {
  retries: number;
  retryDelayMs: number;
  intervalMinutes: number;
};

export type AppConfig = {
  env: 'development' | 'production' | 'test';
  apiPort: number;
  jwtSecret?: string;
  staging: DatabaseConfig;
  destination: DatabaseConfig;
  kaggle: KaggleSettings;
  datasetId: string;
  downloadDir: string;
  scheduler: SchedulerSettings;
};

/**
 * Validate the environment into a typed configuration. Empty strings are
 * treated as unset so that blank lines in `.env` fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`invalid configuration: ${issues.join('; ')}`);
  }
  const values = parsed.data;

  return {
    env: values.NODE_ENV,
    apiPort: values.API_PORT,
    jwtSecret: values.JWT_SECRET,
    staging: {
      host: values.STAGING_DB_HOST,
      port: values.STAGING_DB_PORT,
      user: values.STAGING_DB_USER,
      password: values.STAGING_DB_PASSWORD,
      database: values.STAGING_DB_NAME,
      max: values.DB_POOL_MAX,
    },
    destination: {
      host: values.DESTINATION_DB_HOST,
      port: values.DESTINATION_DB_PORT,
      user: values.DESTINATION_DB_USER,
      password: values.DESTINATION_DB_PASSWORD,
      database: values.DESTINATION_DB_NAME,
      max: values.DB_POOL_MAX,
    },
    kaggle: {
      apiBase: values.KAGGLE_API_BASE,
      username: values.KAGGLE_USERNAME,
      key: values.KAGGLE_KEY,
      configDir: path.resolve(values.KAGGLE_CONFIG_DIR ?? path.join(os.homedir(), '.kaggle')),
    },
    datasetId: values.ETL_DATASET_ID,
    downloadDir: path.resolve(values.ETL_DOWNLOAD_DIR ?? path.join(process.cwd(), 'data', 'online-ecommerce')),
    scheduler: {
      retries: values.ETL_TASK_RETRIES,
      retryDelayMs: values.ETL_RETRY_DELAY_MS,
      intervalMinutes: values.ETL_SCHEDULE_INTERVAL_MINUTES,
    },
  };
}
