/**
 * Server configuration, read once from the environment and validated with zod.
 */

import { z } from 'zod';
import type { LogLevel } from './logger';

export const DEFAULT_DATASET_URL =
  'https://raw.githubusercontent.com/Ahmed3280/Dashboard/refs/heads/main/KaggleV2-May-2016.csv';

// Unset and empty variables both fall back to the default.
function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  DATASET_URL: optionalEnv(z.string().url().default(DEFAULT_DATASET_URL)),
  HOST: optionalEnv(z.string().min(1).default('127.0.0.1')),
  PORT: optionalEnv(z.coerce.number().int().min(1).max(65535).default(8050)),
  DEBUG: optionalEnv(booleanFlag),
  LOG_LEVEL: optionalEnv(z.enum(['debug', 'info', 'warn', 'error']).optional()),
  ENABLE_SENTRY: optionalEnv(booleanFlag),
  SENTRY_DSN: optionalEnv(z.string().url().optional()),
});

export type AppConfig = {
  datasetUrl: string;
  host: string;
  port: number;
  debug: boolean;
  logLevel: LogLevel;
  sentry: {
    enabled: boolean;
    dsn: string | null;
  };
};

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    datasetUrl: parsed.DATASET_URL,
    host: parsed.HOST,
    port: parsed.PORT,
    debug: parsed.DEBUG,
    logLevel: parsed.LOG_LEVEL ?? (parsed.DEBUG ? 'debug' : 'info'),
    sentry: {
      enabled: parsed.ENABLE_SENTRY && Boolean(parsed.SENTRY_DSN),
      dsn: parsed.SENTRY_DSN ?? null,
    },
  };
}

let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    config = parseConfig(process.env);
  }
  return config;
}
