/**
 * Embedding subsystem: pluggable providers, fallback service, vector math
 * and the persistent embedding cache.
 */

export * from './types.js';

export { OpenAIEmbedder } from './providers/openai.js';
export { HashingEmbedder, fnv1a } from './providers/hashing.js';

export { EmbeddingService } from './service.js';
export type { ProviderStatus } from './service.js';

export {
  EmbeddingCache,
  FileCacheStorage,
  MemoryCacheStorage,
  CACHE_KEY_PREFIX_LENGTH
} from './cache.js';
export type { CacheStorage, EmbeddingCacheEntry, EmbeddingCacheOptions } from './cache.js';

export {
  VectorUtilities,
  vectorUtils,
  cosineSimilarity,
  relevance,
  euclideanDistance,
  dotProduct,
  normalize,
  magnitude
} from './utils.js';
