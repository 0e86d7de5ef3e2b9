/**
 * Environment configuration
 *
 * Parsed once from process.env with zod. Invalid values stop the process at
 * boot with the full list of problems.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  MONGO_URL: z.string().url().default('mongodb://localhost:27017/fuel_hedging'),
  STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CYCLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SERIES_LIMIT: z.coerce.number().int().min(2).max(1000).default(100),

  COLLECTION_CRON: z.string().default('*/5 * * * *'),
  COLLECTION_CRON_ENABLED: booleanFlag.default('false'),

  HTTPS_PROXY: z.string().url().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // Treat empty strings as unset so `FOO=` in a .env file falls back to the default
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ''),
  );

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`[CONFIG_FATAL] Invalid environment: ${issues}`);
  }
  return result.data;
}

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (!cachedEnv) {
    cachedEnv = parseEnv();
  }
  return cachedEnv;
}
