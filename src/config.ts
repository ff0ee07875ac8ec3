/**
 * Application Configuration
 *
 * Parsed once from the environment at process start. The resulting object is
 * frozen and handed to each factory; nothing below reads process.env.
 */

import { z } from 'zod';
import type { LogLevel } from '@/utils/logger';

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((val) => (val === undefined ? fallback : val === 'true' || val === '1'));

const csvList = z
  .string()
  .optional()
  .transform((val) =>
    (val ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
  DB_AUTO_MIGRATE: booleanFlag(true),

  SESSION_SECRET: z.string().min(16, 'SESSION_SECRET must be at least 16 characters'),
  SESSION_TTL_DAYS: z.coerce.number().positive().default(7),
  SESSION_CLEANUP_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(60),
  ENCRYPTION_KEY: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, 'ENCRYPTION_KEY must be 32 bytes (64 hex chars)')
    .optional()
    .or(z.literal('').transform(() => undefined)),

  FRONTEND_URL: z.string().url().default('http://localhost:3000'),
  CORS_ORIGIN: csvList,

  GEMINI_API_KEY: z.string().min(1, 'GEMINI_API_KEY is required'),
  GEMINI_BASE_URL: z.string().url().default('https://generativelanguage.googleapis.com/v1beta'),
  GEMINI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-004'),
  GEMINI_GENERATION_MODEL: z.string().min(1).default('gemini-2.0-flash'),

  QDRANT_URL: z.string().url(),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION: z.string().min(1).default('textbook_content'),
  SEARCH_LIMIT: z.coerce.number().int().min(1).max(50).default(3),

  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
  PROVIDER_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(250),

  SUPPORTED_LANGUAGES: csvList,
  ASSISTANT_SUBJECT: z.string().min(1).default('Physical AI & Humanoid Robotics textbook'),

  RATE_LIMIT_ENABLED: booleanFlag(true),
  PASSWORD_MEMORY_COST: z.coerce.number().int().min(1024).default(19_456),
  PASSWORD_TIME_COST: z.coerce.number().int().min(1).default(2),
});

export interface ProviderCallConfig {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  logLevel: LogLevel;
  /** Error messages of 500s are passed through in development and test */
  verboseErrors: boolean;
  database: {
    url: string;
    poolSize: number;
    autoMigrate: boolean;
  };
  session: {
    secret: string;
    ttlMs: number;
    cleanupIntervalMs: number;
    cookieName: string;
    secureCookie: boolean;
  };
  encryptionKey?: string;
  cors: {
    origins: string[];
  };
  gemini: {
    apiKey: string;
    baseUrl: string;
    embeddingModel: string;
    generationModel: string;
  };
  qdrant: {
    url: string;
    apiKey?: string;
    collection: string;
  };
  assistant: {
    searchLimit: number;
    /** Empty means any language code is passed through */
    supportedLanguages: string[];
    subject: string;
  };
  providerCalls: ProviderCallConfig;
  rateLimit: {
    enabled: boolean;
  };
  passwordHashing: {
    memoryCost: number;
    timeCost: number;
  };
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the immutable application config from an environment map
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const origins = [...new Set([e.FRONTEND_URL, ...e.CORS_ORIGIN])];

  const config: AppConfig = {
    env: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === 'production' ? 'info' : 'debug'),
    verboseErrors: e.NODE_ENV !== 'production',
    database: {
      url: e.DATABASE_URL,
      poolSize: e.DB_POOL_SIZE,
      autoMigrate: e.DB_AUTO_MIGRATE,
    },
    session: {
      secret: e.SESSION_SECRET,
      ttlMs: e.SESSION_TTL_DAYS * DAY_MS,
      cleanupIntervalMs: e.SESSION_CLEANUP_INTERVAL_MINUTES * 60 * 1000,
      cookieName: 'session_token',
      secureCookie: e.NODE_ENV === 'production',
    },
    encryptionKey: e.ENCRYPTION_KEY,
    cors: { origins },
    gemini: {
      apiKey: e.GEMINI_API_KEY,
      baseUrl: e.GEMINI_BASE_URL.replace(/\/+$/, ''),
      embeddingModel: e.GEMINI_EMBEDDING_MODEL,
      generationModel: e.GEMINI_GENERATION_MODEL,
    },
    qdrant: {
      url: e.QDRANT_URL.replace(/\/+$/, ''),
      apiKey: e.QDRANT_API_KEY || undefined,
      collection: e.QDRANT_COLLECTION,
    },
    assistant: {
      searchLimit: e.SEARCH_LIMIT,
      supportedLanguages: e.SUPPORTED_LANGUAGES,
      subject: e.ASSISTANT_SUBJECT,
    },
    providerCalls: {
      timeoutMs: e.PROVIDER_TIMEOUT_MS,
      maxRetries: e.PROVIDER_MAX_RETRIES,
      retryDelayMs: e.PROVIDER_RETRY_DELAY_MS,
    },
    rateLimit: { enabled: e.RATE_LIMIT_ENABLED },
    passwordHashing: {
      memoryCost: e.PASSWORD_MEMORY_COST,
      timeCost: e.PASSWORD_TIME_COST,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
