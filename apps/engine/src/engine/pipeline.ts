/**
 * Search pipeline
 *
 * text → search terms → (mood enhancement) → candidates from the lyrics
 * source → semantic ranking → filters
 */

import { logger } from '../config/index.js';
import { createSearchRequestSchema, type SearchRequestInput } from '../schemas/search.js';
import { searchByTerms, type LyricsSource } from '../songs/lyrics-source.js';
import { formatDuration } from '../utils/text.js';
import { AdvancedSearch } from './advanced-search.js';
import { MoodClassifier } from './matchers/mood.js';
import type { MatchResult, SemanticMatcher } from './matchers/semantic.js';

const MAX_SEARCH_TERMS = 5;

export interface SearchOutcome {
  /** Text the songs were ranked against, mood keywords included */
  query: string;
  terms: string[];
  moodId?: string;
  candidates: number;
  results: MatchResult[];
}

export interface LyricsSearchPipelineOptions {
  source: LyricsSource;
  matcher: SemanticMatcher;
  maxResultLimit: number;
  moodClassifier?: MoodClassifier;
  advancedSearch?: AdvancedSearch;
}

export class LyricsSearchPipeline {
  private source: LyricsSource;
  private matcher: SemanticMatcher;
  private moodClassifier: MoodClassifier;
  private advancedSearch: AdvancedSearch;
  private requestSchema: ReturnType<typeof createSearchRequestSchema>;

  constructor(options: LyricsSearchPipelineOptions) {
    this.source = options.source;
    this.matcher = options.matcher;
    this.moodClassifier = options.moodClassifier ?? new MoodClassifier();
    this.advancedSearch = options.advancedSearch ?? new AdvancedSearch(this.moodClassifier);
    this.requestSchema = createSearchRequestSchema(options.maxResultLimit);
  }

  /**
   * Throws a ZodError for an invalid request
   */
  async search(input: SearchRequestInput): Promise<SearchOutcome> {
    const startTime = Date.now();
    const request = this.requestSchema.parse(input);
    const limit = request.limit ?? this.matcher.defaultResultLimit;
    const minScore = request.minScore ?? this.matcher.minRelevanceScore;

    const terms = [...await this.matcher.extractSearchTerms(request.text), ...request.extraTerms];

    const moodId = request.filters?.mood
      ?? (request.autoMood ? this.moodClassifier.suggestMoodFromQuery(request.text) : undefined);
    const query = moodId ? this.advancedSearch.enhanceQueryWithMood(request.text, moodId) : request.text;

    const songs = await searchByTerms(this.source, terms.slice(0, MAX_SEARCH_TERMS), limit * 2);

    let results = await this.matcher.findSimilarSongs(query, songs, songs.length, minScore);
    if (request.filters) {
      results = this.advancedSearch.filterResults(results, request.filters);
    }
    results = results.slice(0, limit);

    logger.info({
      terms: terms.length,
      moodId,
      candidates: songs.length,
      results: results.length,
      duration: formatDuration(Date.now() - startTime)
    }, 'Search complete');

    return { query, terms, moodId, candidates: songs.length, results };
  }
}
