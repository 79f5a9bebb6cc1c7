/**
 * Application Settings
 *
 * Reads the environment (after dotenv has loaded `.env`) into a typed Settings object.
 * Boolean flags follow the `.env` convention: only "true" (any case) is true.
 */

import 'dotenv/config';
import { z } from 'zod';

// ============================================================================
// Schema
// ============================================================================

/**
 * Variables that must be present for the service to start.
 */
export const REQUIRED_ENV_VARS = ['OPENAI_API_KEY', 'DATABASE_URL', 'SECRET_KEY'] as const;

export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'WARN', 'ERROR', 'CRITICAL'] as const;

const envFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value.trim().toLowerCase() === 'true'));

const envInt = (defaultValue: number, min: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? String(defaultValue) : value.trim()))
    .pipe(z.coerce.number().int().min(min));

const requiredString = z
  .string({ required_error: 'is required' })
  .trim()
  .min(1, 'is required');

const SettingsSchema = z.object({
  OPENAI_API_KEY: requiredString,
  OPENAI_MODEL: z.string().trim().min(1).default('gpt-4'),
  OPENAI_BASE_URL: z.string().url().optional(),
  DATABASE_URL: requiredString,
  REDIS_URL: z.string().trim().min(1).default('redis://localhost:6379'),
  SECRET_KEY: requiredString,
  ALGORITHM: z.enum(SIGNING_ALGORITHMS).default('HS256'),
  ACCESS_TOKEN_EXPIRE_MINUTES: envInt(30, 1),
  DEBUG: envFlag(true),
  LOG_LEVEL: z
    .string()
    .default('INFO')
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(LOG_LEVELS)),
  LOG_FORMAT: z.enum(['json', 'text']).default('text'),
  MAX_WORKERS: envInt(4, 1),
  DEFAULT_CONTENT_TYPE: z.string().trim().min(1).default('article'),
  MAX_CONTENT_LENGTH: envInt(5000, 1),
  CONTENT_REVIEW_ENABLED: envFlag(true),
  CACHE_TTL_SECONDS: envInt(3600, 0),
  PORT: envInt(8000, 0),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
});

// ============================================================================
// Types
// ============================================================================

export interface Settings {
  readonly openaiApiKey: string;
  readonly openaiModel: string;
  readonly openaiBaseUrl?: string;
  readonly databaseUrl: string;
  readonly redisUrl: string;
  readonly secretKey: string;
  readonly algorithm: SigningAlgorithm;
  readonly accessTokenExpireMinutes: number;
  readonly debug: boolean;
  readonly logLevel: string;
  readonly logFormat: 'json' | 'text';
  readonly maxWorkers: number;
  readonly defaultContentType: string;
  /** Upper bound, in words, for requested and submitted content */
  readonly maxContentLength: number;
  readonly contentReviewEnabled: boolean;
  /** 0 disables the research cache */
  readonly cacheTtlSeconds: number;
  readonly port: number;
  readonly host: string;
}

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Thrown when the environment cannot be turned into Settings.
 */
export class SettingsError extends Error {
  constructor(readonly problems: readonly string[]) {
    super(`Invalid environment configuration: ${problems.join('; ')}`);
    this.name = 'SettingsError';
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Treats blank values as unset so that defaults apply to `KEY=` lines in `.env`.
 */
function withoutBlankValues(env: Environment): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Parses the environment into Settings.
 *
 * @throws SettingsError listing every missing or invalid variable
 */
export function loadSettings(env: Environment = process.env): Settings {
  const parsed = SettingsSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'} ${issue.message}`)
    );
  }

  const v = parsed.data;
  return {
    openaiApiKey: v.OPENAI_API_KEY,
    openaiModel: v.OPENAI_MODEL,
    openaiBaseUrl: v.OPENAI_BASE_URL,
    databaseUrl: v.DATABASE_URL,
    redisUrl: v.REDIS_URL,
    secretKey: v.SECRET_KEY,
    algorithm: v.ALGORITHM,
    accessTokenExpireMinutes: v.ACCESS_TOKEN_EXPIRE_MINUTES,
    debug: v.DEBUG,
    logLevel: v.LOG_LEVEL,
    logFormat: v.LOG_FORMAT,
    maxWorkers: v.MAX_WORKERS,
    defaultContentType: v.DEFAULT_CONTENT_TYPE,
    maxContentLength: v.MAX_CONTENT_LENGTH,
    contentReviewEnabled: v.CONTENT_REVIEW_ENABLED,
    cacheTtlSeconds: v.CACHE_TTL_SECONDS,
    port: v.PORT,
    host: v.HOST,
  };
}

/**
 * Reports which required variables are missing or blank. Never throws.
 */
export function validateEnvironment(env: Environment = process.env): {
  valid: boolean;
  missing: string[];
} {
  const missing = REQUIRED_ENV_VARS.filter((name) => !env[name] || env[name]?.trim() === '');
  return { valid: missing.length === 0, missing };
}

let cachedSettings: Settings | undefined;

/**
 * Settings for the current process, parsed once on first use.
 */
export function getSettings(): Settings {
  if (!cachedSettings) {
    cachedSettings = loadSettings();
  }
  return cachedSettings;
}

/**
 * Clears the cached settings so the next getSettings() re-reads the environment.
 */
export function resetSettings(): void {
  cachedSettings = undefined;
}
