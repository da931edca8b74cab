import dotenv from 'dotenv';
import { z } from 'zod';

const isTestRuntime =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

if (!isTestRuntime) {
  dotenv.config();
}

const testDefaults: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'info',
  WORKER_REGISTRY_PATH: 'config/workers.json',
  WORKER_INDEX_TIMEOUT_MS: '50',
  WORKER_INDEX_SPECIALIST_TOP_K: '4',
  WORKER_INDEX_CATALOG_TOP_K: '100',
  WORKER_INDEX_WRITE_RETRIES: '0',
  WORKER_EXECUTION_MAX_PARALLEL: '2',
  WORKER_EXECUTION_TIMEOUT_MS: '50',
  AGGREGATION_MIN_QUALITY: '0.75',
  AGGREGATION_MAX_REEVALUATION_CYCLES: '3',
};

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Worker registry reference data
  WORKER_REGISTRY_PATH: z.string().trim().min(1).default('config/workers.json'),

  // Embedding index (external)
  WORKER_INDEX_TIMEOUT_MS: z.coerce.number().int().min(1).max(60000).default(2000),
  WORKER_INDEX_SPECIALIST_TOP_K: z.coerce.number().int().min(1).max(20).default(4),
  // The catalog is a similarity query for "*" with a large topK, not a real listing.
  WORKER_INDEX_CATALOG_TOP_K: z.coerce.number().int().min(1).max(1000).default(100),
  WORKER_INDEX_WRITE_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

  // Worker execution boundary
  WORKER_EXECUTION_MAX_PARALLEL: z.coerce.number().int().min(1).max(16).default(4),
  WORKER_EXECUTION_TIMEOUT_MS: z.coerce.number().int().min(1).max(300000).default(30000),

  // Aggregation
  AGGREGATION_MIN_QUALITY: z.coerce.number().min(0).max(1).default(0.75),
  AGGREGATION_MAX_REEVALUATION_CYCLES: z.coerce.number().int().min(0).max(10).default(3),
});

const mergedEnv = {
  ...(isTestRuntime ? testDefaults : {}),
  ...process.env,
};

const parsed = envSchema.safeParse(mergedEnv);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.format());
  process.exit(1);
}

export const config = {
  ...parsed.data,
  isDev: parsed.data.NODE_ENV === 'development',
  isProd: parsed.data.NODE_ENV === 'production',
};

export type AppConfig = typeof config;
