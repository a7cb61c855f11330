import { z } from 'zod';

const providerSchema = z.enum(['openai', 'hashing']);

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: logLevelSchema.default('info'),
  CACHE_DIR: z.string().min(1).default('.cache'),
  CACHE_EXPIRY_HOURS: z.coerce.number().positive().default(24),
  DEFAULT_RESULT_LIMIT: z.coerce.number().int().positive().default(5),
  MAX_RESULT_LIMIT: z.coerce.number().int().positive().default(50),
  MIN_RELEVANCE_SCORE: z.coerce.number().min(0).max(1).default(0.3),
  EMBEDDING_PROVIDER: providerSchema.default('openai'),
  EMBEDDING_FALLBACK_PROVIDER: providerSchema.optional(),
  EMBEDDING_MODEL: z.string().trim().min(1, 'EMBEDDING_MODEL must not be empty').default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  REQUEST_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  RETRY_DELAY_MS: z.coerce.number().nonnegative().default(1000),
  RATE_LIMIT_CALLS: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_PERIOD_SECONDS: z.coerce.number().positive().default(60),
});

export type ServerEnv = z.infer<typeof envSchema>;

/**
 * Raised when the process cannot start with the environment it was given.
 * Never caught inside the engine.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Lazy-loaded environment configuration - doesn't throw at import time
let cachedEnv: ServerEnv | null = null;

export function loadServerEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  if (cachedEnv && source === process.env) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigurationError('Missing/invalid env: ' + JSON.stringify(result.error.format()));
  }

  const env = result.data;
  const usesOpenAI = env.EMBEDDING_PROVIDER === 'openai' || env.EMBEDDING_FALLBACK_PROVIDER === 'openai';
  if (usesOpenAI && !env.OPENAI_API_KEY) {
    throw new ConfigurationError(
      'OPENAI_API_KEY is required when EMBEDDING_PROVIDER or EMBEDDING_FALLBACK_PROVIDER is "openai"'
    );
  }

  if (source === process.env) {
    cachedEnv = env;
  }
  return env;
}

export function resetServerEnv(): void {
  cachedEnv = null;
}
