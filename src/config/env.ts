/**
 * Environment Configuration with Zod Validation
 *
 * Validates all environment variables on startup and provides
 * a type-safe configuration object.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigurationError } from '../core/errors.js';

// Load .env file
dotenv.config();

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Boolean flag parsed from "true"/"false" (z.coerce.boolean treats "false" as true).
 */
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(val => val === 'true' || val === '1');

const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // Settings file and overrides
  SETTINGS_PATH: z.string().min(1).default('./config/orchestrator.json'),
  SYSTEM_ID: z.string().min(1).optional(),
  CREDENTIALS_PATH: z.string().min(1).optional(),
  CYCLE_INTERVAL_SECONDS: z.coerce.number().int().positive().optional(),
  ENABLE_LIVE_TRADING: booleanFlag.optional(),

  // Database (state store); falls back to the in-memory store when unset
  DATABASE_URL: z.string().url('DATABASE_URL must be a valid PostgreSQL URL').optional(),
  DATABASE_POOL_MIN: z.coerce.number().int().min(0).default(0),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(4),

  // Logging
  LOG_DIR: z.string().default('./data/logs'),
  LOG_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  LOG_TO_CONSOLE: booleanFlag.default('true'),
  LOG_TO_FILE: booleanFlag.default('false'),
});

// =============================================================================
// VALIDATION & EXPORT
// =============================================================================

export type EnvConfig = z.infer<typeof envSchema>;

let cachedConfig: EnvConfig | null = null;

/**
 * Validates and returns the environment configuration.
 * Caches the result for subsequent calls.
 *
 * @throws {ConfigurationError} If any environment variable is invalid
 */
export function getEnvConfig(): EnvConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Environment validation failed:\n  - ${issues.join('\n  - ')}`, {
      issues,
    });
  }

  if (result.data.DATABASE_POOL_MIN > result.data.DATABASE_POOL_MAX) {
    throw new ConfigurationError('DATABASE_POOL_MIN must not exceed DATABASE_POOL_MAX', {
      min: result.data.DATABASE_POOL_MIN,
      max: result.data.DATABASE_POOL_MAX,
    });
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/**
 * Resets the cached configuration.
 * Useful for testing or when environment variables change.
 */
export function resetEnvConfig(): void {
  cachedConfig = null;
}

/**
 * Gets a sanitized version of the config for logging.
 */
export function getSanitizedConfig(): Record<string, unknown> {
  const config = getEnvConfig();
  return {
    ...config,
    DATABASE_URL: config.DATABASE_URL?.replace(/:[^:@/]+@/, ':****@'),
  };
}
