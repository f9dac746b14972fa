/**
 * Configuration loader — validates the environment with Zod and maps it
 * onto the structured `PlatformConfig` the rest of the code consumes.
 */
import { PlatformError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import type { PlatformEnv } from './schema.js';
import { platformEnvSchema } from './schema.js';

// ─── Types ──────────────────────────────────────────────────────

export interface PlatformConfig {
  environment: PlatformEnv['NODE_ENV'];
  logLevel: PlatformEnv['LOG_LEVEL'];
  server: {
    host: string;
    port: number;
  };
  database: {
    url: string;
  };
  scheduler: {
    tickIntervalMs: number;
  };
  telegram: {
    /** Absent when notification delivery should stay disabled. */
    botToken?: string;
  };
  reports: {
    /** Absent when report generation should stay disabled. */
    openaiApiKey?: string;
    model: string;
  };
  appUrl: string;
}

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends PlatformError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 500,
      context,
      isOperational: false,
    });
    this.name = 'ConfigError';
  }
}

// ─── Loader ─────────────────────────────────────────────────────

/**
 * Validate an environment map and build the platform configuration.
 *
 * @param env - Defaults to `process.env`; tests pass a literal map.
 */
export function loadPlatformConfig(
  env: Record<string, string | undefined> = process.env,
): Result<PlatformConfig, ConfigError> {
  const validation = platformEnvSchema.safeParse(env);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Environment validation failed', { issues }));
  }

  const parsed = validation.data;

  return ok({
    environment: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    server: { host: parsed.HOST, port: parsed.PORT },
    database: { url: parsed.DATABASE_URL },
    scheduler: { tickIntervalMs: parsed.SCHEDULER_TICK_MS },
    telegram: { botToken: parsed.TELEGRAM_BOT_TOKEN },
    reports: { openaiApiKey: parsed.OPENAI_API_KEY, model: parsed.REPORT_MODEL },
    appUrl: parsed.APP_URL,
  });
}
