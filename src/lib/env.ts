/**
 * Centralized environment validation using Zod
 * Validates required and optional server variables once, on first use
 * Fails fast when critical variables are missing
 */

import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

// `KEY=` in an env file arrives as ""; treat it like an unset variable
const blankAsAbsent = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const serverEnvSchema = z.object({
  // Database (REQUIRED)
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DATABASE_POOL_MAX: z.preprocess(
    blankAsAbsent,
    z.coerce
      .number()
      .int('DATABASE_POOL_MAX must be an integer')
      .min(1, 'DATABASE_POOL_MAX must be at least 1')
      .max(100, 'DATABASE_POOL_MAX must be at most 100')
      .default(10)
  ),
  DATABASE_STATEMENT_TIMEOUT_MS: z.preprocess(
    blankAsAbsent,
    z.coerce
      .number()
      .int('DATABASE_STATEMENT_TIMEOUT_MS must be an integer')
      .min(100, 'DATABASE_STATEMENT_TIMEOUT_MS must be at least 100')
      .default(5000)
  ),

  // Session tokens are issued elsewhere; we only verify them (REQUIRED)
  NEXTAUTH_SECRET: z.string().min(32, 'NEXTAUTH_SECRET must be at least 32 characters'),

  // Error Tracking (optional but recommended for production)
  SENTRY_DSN: z.preprocess(blankAsAbsent, z.string().url().optional()),

  LOG_LEVEL: z.preprocess(blankAsAbsent, z.enum(LOG_LEVELS).optional()),

  NODE_ENV: z.preprocess(
    blankAsAbsent,
    z.enum(['development', 'production', 'test']).default('development')
  ),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;

export type EnvResult =
  | { success: true; env: ServerEnv }
  | { success: false; errors: string[] };

/**
 * Validate an environment record without side effects
 */
export function parseServerEnv(source: NodeJS.ProcessEnv): EnvResult {
  const result = serverEnvSchema.safeParse(source);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  return { success: true, env: result.data };
}

/**
 * Validates server environment variables
 * Throws when configuration is unusable; the caller decides when that happens
 */
export function loadServerEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  const result = parseServerEnv(source);

  if (!result.success) {
    const details = result.errors.map((error) => `  - ${error}`).join('\n');
    console.error('Environment validation failed:\n' + details);
    throw new Error('Invalid environment configuration. Check logs for details.');
  }

  return result.env;
}

let cachedEnv: ServerEnv | undefined;

/**
 * Validated environment for the running process (memoized)
 */
export function serverEnv(): ServerEnv {
  if (!cachedEnv) {
    cachedEnv = loadServerEnv();
  }
  return cachedEnv;
}
