/**
 * Application configuration, parsed from environment variables.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';

const DEV_ADMIN_KEY = 'dev-admin-key';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  MAX_UPLOAD_MB: z.coerce.number().positive().max(500).default(20),
  MAX_FILES_PER_REQUEST: z.coerce.number().int().min(1).max(100).default(10),
  TRIAL_DAYS: z.coerce.number().int().min(0).default(30),
  USERS_FILE: z.string().min(1).default('users.json'),
  ADMIN_KEY: z.string().min(8, 'ADMIN_KEY must be at least 8 characters').optional(),
  ADMIN_SESSION_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  PAYPAL_CLIENT_ID: z.string().optional(),
  PAYPAL_CLIENT_SECRET: z.string().optional(),
  PAYPAL_ENVIRONMENT: z.enum(['sandbox', 'live']).default('sandbox'),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:8000'),
  CORS_ORIGINS: z.string().default('*'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  /** Per-file upload limit in bytes */
  maxUploadBytes: number;
  maxFilesPerRequest: number;
  trialDays: number;
  usersFile: string;
  adminKey: string;
  /** True when ADMIN_KEY was not set and the development key is in use */
  usingDefaultAdminKey: boolean;
  adminSessionTtlMs: number;
  paypal: {
    clientId?: string;
    clientSecret?: string;
    environment: 'sandbox' | 'live';
  };
  publicBaseUrl: string;
  corsOrigins: string | string[];
  logLevel: LogLevel;
}

/**
 * Parse configuration from an environment map.
 *
 * @throws ConfigError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env);
 * app.listen(config.port);
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;

  if (!data.ADMIN_KEY && data.NODE_ENV === 'production') {
    throw new ConfigError('Invalid configuration: ADMIN_KEY is required in production', [
      'ADMIN_KEY: Required in production',
    ]);
  }

  const origins = data.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean);

  return {
    env: data.NODE_ENV,
    port: data.PORT,
    maxUploadBytes: Math.floor(data.MAX_UPLOAD_MB * 1024 * 1024),
    maxFilesPerRequest: data.MAX_FILES_PER_REQUEST,
    trialDays: data.TRIAL_DAYS,
    usersFile: data.USERS_FILE,
    adminKey: data.ADMIN_KEY ?? DEV_ADMIN_KEY,
    usingDefaultAdminKey: data.ADMIN_KEY === undefined,
    adminSessionTtlMs: data.ADMIN_SESSION_TTL_MS,
    paypal: {
      clientId: data.PAYPAL_CLIENT_ID,
      clientSecret: data.PAYPAL_CLIENT_SECRET,
      environment: data.PAYPAL_ENVIRONMENT,
    },
    publicBaseUrl: data.PUBLIC_BASE_URL.replace(/\/+$/, ''),
    corsOrigins: origins.length > 1 ? origins : (origins[0] ?? '*'),
    logLevel: data.LOG_LEVEL,
  };
}
