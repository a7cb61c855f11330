import type { Config } from '../config/index.js';
import { EmbeddingCache, FileCacheStorage, type CacheStorage } from '../embeddings/cache.js';
import { EmbeddingService } from '../embeddings/service.js';
import type { Embedder } from '../embeddings/types.js';
import { ResilientLyricsSource, type LyricsSource } from '../songs/lyrics-source.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { AdvancedSearch } from './advanced-search.js';
import { SongComparator } from './comparator.js';
import { MoodClassifier } from './matchers/mood.js';
import { SemanticMatcher } from './matchers/semantic.js';
import { LyricsSearchPipeline } from './pipeline.js';
import { VerseSearcher } from './verse-search.js';

export interface LyricsEngine {
  config: Config;
  embedder: Embedder;
  cache: EmbeddingCache;
  matcher: SemanticMatcher;
  moodClassifier: MoodClassifier;
  advancedSearch: AdvancedSearch;
  comparator: SongComparator;
  verseSearcher: VerseSearcher;
  /** Pipeline over `source`, rate limited and retried per the config */
  createSearchPipeline(source: LyricsSource): LyricsSearchPipeline;
}

export interface LyricsEngineOverrides {
  embedder?: Embedder;
  cacheStorage?: CacheStorage;
  sleep?: (ms: number) => Promise<void>;
}

export function createEmbeddingService(config: Config): EmbeddingService {
  const { embedding } = config;
  const service = new EmbeddingService({
    primaryProvider: embedding.provider,
    fallbackProvider: embedding.fallbackProvider,
    openai: config.openai && {
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model: embedding.modelIdentifier,
      dimensions: embedding.dimensions,
      maxRetries: config.requests.maxRetries,
      retryDelayMs: config.requests.retryDelayMs
    },
    hashing: {
      model: 'hashing-bow',
      dimensions: embedding.dimensions
    }
  });
  service.initialize();
  return service;
}

/**
 * Wires one embedder, one cache and one matcher into every component
 */
export function createLyricsEngine(config: Config, overrides: LyricsEngineOverrides = {}): LyricsEngine {
  const embedder = overrides.embedder ?? createEmbeddingService(config);
  const cache = new EmbeddingCache({
    storage: overrides.cacheStorage ?? FileCacheStorage.inDirectory(config.cache.dir),
    expiryHours: config.cache.expiryHours
  });
  const matcher = new SemanticMatcher({
    embedder,
    cache,
    defaultResultLimit: config.search.defaultResultLimit,
    minRelevanceScore: config.search.minRelevanceScore
  });
  const moodClassifier = new MoodClassifier();
  const advancedSearch = new AdvancedSearch(moodClassifier);
  const rateLimiter = new RateLimiter({
    maxCalls: config.requests.rateLimitCalls,
    periodMs: config.requests.rateLimitPeriodSeconds * 1000
  }, overrides.sleep);

  return {
    config,
    embedder,
    cache,
    matcher,
    moodClassifier,
    advancedSearch,
    comparator: new SongComparator({ matcher, moodClassifier }),
    verseSearcher: new VerseSearcher(matcher),
    createSearchPipeline(source: LyricsSource): LyricsSearchPipeline {
      return new LyricsSearchPipeline({
        source: new ResilientLyricsSource(source, {
          maxRetries: config.requests.maxRetries,
          baseDelayMs: config.requests.retryDelayMs,
          rateLimiter,
          sleep: overrides.sleep
        }),
        matcher,
        maxResultLimit: config.search.maxResultLimit,
        moodClassifier,
        advancedSearch
      });
    }
  };
}
