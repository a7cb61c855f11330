/**
 * Lyrics matching engine
 *
 * Finds songs whose lyrics relate to free text, and compares, classifies
 * and searches lyrics line by line with the same embedding primitives.
 */

export { loadConfig, resetConfig, ConfigurationError, logger } from './config/index.js';
export type { Config } from './config/index.js';

export * from './embeddings/index.js';

export { Song } from './songs/song.js';
export {
  CatalogLyricsSource,
  ResilientLyricsSource,
  collectSongsWithLyrics,
  searchByTerms
} from './songs/lyrics-source.js';
export type { LyricsSource, ResilientLyricsSourceOptions } from './songs/lyrics-source.js';

export {
  SongRecordSchema,
  CatalogSchema,
  SearchFiltersSchema,
  SearchRequestSchema,
  createSearchRequestSchema
} from './schemas/search.js';
export type {
  SongRecord,
  SongRecordInput,
  SearchFilters,
  SearchFiltersInput,
  SearchRequest,
  SearchRequestInput
} from './schemas/search.js';

export { loadLexicon, MoodPresetSchema } from './services/lexicon-service.js';
export type { Lexicon, MoodPreset } from './services/lexicon-service.js';

export { chunkText, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './engine/chunker.js';
export { SemanticMatcher, countOccurrences, serializeMatchResult } from './engine/matchers/semantic.js';
export type { MatchResult, SimilarityScore, ThemeScore, SemanticMatcherOptions } from './engine/matchers/semantic.js';
export { MoodClassifier, NEUTRAL_MOOD, presetKeywords } from './engine/matchers/mood.js';
export type { MoodAnalysis } from './engine/matchers/mood.js';
export { AdvancedSearch, matchesFilters } from './engine/advanced-search.js';
export type { MoodSuggestion } from './engine/advanced-search.js';
export { SongComparator, ComparisonError, getSimilarityLevel } from './engine/comparator.js';
export type {
  SongComparisonResult,
  MultiComparisonResult,
  ThemeMatch,
  VersePair,
  MoodComparison,
  SongPairScore,
  SimilarityLevel,
  SongComparatorOptions
} from './engine/comparator.js';
export { VerseSearcher, detectSection, fuzzyScore, getContext } from './engine/verse-search.js';
export type {
  MatchType,
  Verse,
  VerseMatch,
  VerseSearchOptions,
  VerseSearchResult,
  VerseStatistics,
  RhymingVerse
} from './engine/verse-search.js';
export { LyricsSearchPipeline } from './engine/pipeline.js';
export type { SearchOutcome, LyricsSearchPipelineOptions } from './engine/pipeline.js';
export { formatSearchReport } from './engine/report.js';
export type { SearchReportContext } from './engine/report.js';
export { createLyricsEngine, createEmbeddingService } from './engine/factory.js';
export type { LyricsEngine, LyricsEngineOverrides } from './engine/factory.js';

export { withRetry } from './utils/retry.js';
export type { RetryOptions } from './utils/retry.js';
export { RateLimiter } from './utils/rate-limiter.js';
export type { RateLimitConfig, RateLimitResult } from './utils/rate-limiter.js';
export { sequenceRatio } from './utils/sequence-ratio.js';
export { truncateText, cleanLyrics, formatDuration } from './utils/text.js';
