import { randomBytes } from 'crypto';
import { z } from 'zod';
import { ValidationError } from '../errors.js';

const ENVIRONMENTS = ['development', 'testing', 'staging', 'production'] as const;
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true'));

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).default('file:./data/orgchart'),
  SECRET_KEY: z.string().min(1).optional(),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CORS_ORIGINS: z.string().optional(),
  CSRF_PROTECTION: booleanFlag(true),
  SECURE_COOKIES: booleanFlag(false),
  ENVIRONMENT: z.enum(ENVIRONMENTS).default('development'),
  APP_VERSION: z.string().min(1).default('1.0.0'),
});

export type Environment = (typeof ENVIRONMENTS)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  databaseUrl: string;
  secretKey: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  corsOrigins: string[];
  csrfProtection: boolean;
  secureCookies: boolean;
  environment: Environment;
  version: string;
}

let cachedConfig: AppConfig | undefined;

/**
 * Read and validate the process environment.
 * Throws ValidationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => ({
      variable: issue.path.map(String).join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid configuration: ${invalid.map((i) => i.variable).join(', ')}`,
      { invalid },
    );
  }

  const values = parsed.data;

  if (values.ENVIRONMENT === 'production') {
    if (!values.SECRET_KEY || values.SECRET_KEY.length < 32) {
      throw new ValidationError('SECRET_KEY must be at least 32 characters in production');
    }
  }

  return {
    databaseUrl: values.DATABASE_URL,
    // Outside production a missing key only invalidates CSRF tokens across restarts
    secretKey: values.SECRET_KEY ?? randomBytes(32).toString('base64url'),
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    corsOrigins: values.CORS_ORIGINS
      ? values.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
      : [],
    csrfProtection: values.CSRF_PROTECTION,
    secureCookies: values.SECURE_COOKIES,
    environment: values.ENVIRONMENT,
    version: values.APP_VERSION,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetConfigCache(): void {
  cachedConfig = undefined;
}
