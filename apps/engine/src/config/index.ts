import { loadServerEnv, resetServerEnv } from './env.js';
import { logger } from '../utils/logger.js';
import type { EmbedderProvider } from '../embeddings/types.js';

export interface Config {
  cache: {
    dir: string;
    expiryHours: number;
  };
  search: {
    defaultResultLimit: number;
    maxResultLimit: number;
    minRelevanceScore: number;
  };
  embedding: {
    provider: EmbedderProvider;
    fallbackProvider?: EmbedderProvider;
    modelIdentifier: string;
    dimensions: number;
  };
  openai?: {
    apiKey: string;
    baseUrl?: string;
  };
  requests: {
    maxRetries: number;
    retryDelayMs: number;
    rateLimitCalls: number;
    rateLimitPeriodSeconds: number;
  };
  nodeEnv: 'development' | 'production' | 'test';
}

// Lazy-loaded configuration - doesn't evaluate env at import time
let cachedConfig: Config | null = null;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  if (cachedConfig && source === process.env) {
    return cachedConfig;
  }

  const env = loadServerEnv(source);

  const config: Config = {
    cache: {
      dir: env.CACHE_DIR,
      expiryHours: env.CACHE_EXPIRY_HOURS,
    },
    search: {
      defaultResultLimit: env.DEFAULT_RESULT_LIMIT,
      maxResultLimit: env.MAX_RESULT_LIMIT,
      minRelevanceScore: env.MIN_RELEVANCE_SCORE,
    },
    embedding: {
      provider: env.EMBEDDING_PROVIDER,
      fallbackProvider: env.EMBEDDING_FALLBACK_PROVIDER,
      modelIdentifier: env.EMBEDDING_MODEL,
      dimensions: env.EMBEDDING_DIMENSIONS,
    },
    openai: env.OPENAI_API_KEY ? {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
    } : undefined,
    requests: {
      maxRetries: env.REQUEST_MAX_RETRIES,
      retryDelayMs: env.RETRY_DELAY_MS,
      rateLimitCalls: env.RATE_LIMIT_CALLS,
      rateLimitPeriodSeconds: env.RATE_LIMIT_PERIOD_SECONDS,
    },
    nodeEnv: env.NODE_ENV,
  };

  logger.info({
    cache: config.cache,
    search: config.search,
    embedding: config.embedding,
    nodeEnv: config.nodeEnv,
    hasOpenAIKey: !!config.openai?.apiKey,
  }, 'Configuration loaded');

  if (source === process.env) {
    cachedConfig = config;
  }
  return config;
}

export function resetConfig(): void {
  cachedConfig = null;
  resetServerEnv();
}

export { loadServerEnv as env, ConfigurationError } from './env.js';
export { logger } from '../utils/logger.js';
