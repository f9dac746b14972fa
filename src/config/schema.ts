/**
 * Zod schemas for validating the process environment.
 * Every setting the platform reads from env is declared here.
 */
import { z } from 'zod';

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

// ─── Environment ────────────────────────────────────────────────

/**
 * Schema for the raw environment.
 * Numeric values arrive as strings and are coerced.
 */
export const platformEnvSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL cannot be empty'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  SCHEDULER_TICK_MS: z.coerce
    .number()
    .int()
    .min(100, 'Scheduler tick must be at least 100ms')
    .max(60_000, 'Scheduler tick cannot exceed 60s')
    .default(10_000),
  TELEGRAM_BOT_TOKEN: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  REPORT_MODEL: z.string().min(1).default('gpt-4o-mini'),
  APP_URL: z.string().url('APP_URL must be a valid URL').default('http://localhost:8000'),
});

export type PlatformEnv = z.infer<typeof platformEnvSchema>;
