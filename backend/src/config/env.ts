/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if the environment is invalid.
 * Provides typed access to all config values.
 */
import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  // ── Server ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  ALLOWED_ORIGINS: z.string().default('*'),

  // ── Store ──
  DB_DRIVER: z.enum(['pglite', 'pg']).default('pglite'),
  PGLITE_DATA_DIR: z.string().min(1).default('./data/fleet'),
  DATABASE_URL: z.string().url().startsWith('postgres').optional().describe('PostgreSQL connection string'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  DB_SSL: booleanFlag,

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
}).superRefine((val, ctx) => {
  if (val.DB_DRIVER === 'pg' && !val.DATABASE_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DATABASE_URL'],
      message: 'DATABASE_URL is required when DB_DRIVER=pg',
    });
  }
  if (val.DB_POOL_MIN > val.DB_POOL_MAX) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['DB_POOL_MIN'],
      message: 'DB_POOL_MIN must not exceed DB_POOL_MAX',
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Environment validation failed:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse and validate an environment record.
 * Empty strings count as unset so `FOO=` in .env falls back to the default.
 */
export function loadEnv(source: NodeJS.ProcessEnv): Env {
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== '') raw[key] = value;
  }

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  return result.data;
}

export const env = loadEnv(process.env);
