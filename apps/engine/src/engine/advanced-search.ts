/**
 * Advanced search helpers: mood-enhanced queries and result filters
 */

import { logger } from '../config/index.js';
import { SearchFiltersSchema, type SearchFiltersInput } from '../schemas/search.js';
import type { Song } from '../songs/song.js';
import { MoodClassifier } from './matchers/mood.js';
import type { MatchResult } from './matchers/semantic.js';
import type { MoodPreset } from '../services/lexicon-service.js';

export interface MoodSuggestion {
  moodId: string;
  preset: MoodPreset;
  score: number;
}

/**
 * Whether a song with this score passes the filters. A release date with
 * no readable year passes the year range.
 */
export function matchesFilters(song: Song, score: number, filtersInput: SearchFiltersInput): boolean {
  const filters = SearchFiltersSchema.parse(filtersInput);

  if (filters.minScore !== undefined && score < filters.minScore) {
    return false;
  }

  const artist = song.artist.toLowerCase();
  if (filters.excludeArtists.some(excluded => artist.includes(excluded.toLowerCase()))) {
    return false;
  }

  const year = song.releaseYear;
  if (year !== undefined) {
    if (filters.yearFrom !== undefined && year < filters.yearFrom) {
      return false;
    }
    if (filters.yearTo !== undefined && year > filters.yearTo) {
      return false;
    }
  }

  return true;
}

export class AdvancedSearch {
  constructor(private moodClassifier: MoodClassifier = new MoodClassifier()) {}

  /**
   * Append two Italian keywords and one English keyword of the mood.
   * Without a mood id, the mood suggested by the query itself is used.
   */
  enhanceQueryWithMood(query: string, moodId?: string): string {
    const mood = moodId ?? this.moodClassifier.suggestMoodFromQuery(query);
    if (!mood) {
      return query;
    }

    const preset = this.moodClassifier.getPreset(mood);
    if (!preset) {
      logger.warn({ moodId: mood }, 'Unknown mood, query left unchanged');
      return query;
    }

    const extraTerms = [...preset.keywordsIt.slice(0, 2), ...preset.keywordsEn.slice(0, 1)];
    return `${query} ${extraTerms.join(' ')}`;
  }

  filterResults(results: MatchResult[], filters: SearchFiltersInput): MatchResult[] {
    const filtered = results.filter(result => matchesFilters(result.song, result.score, filters));
    logger.info({ before: results.length, after: filtered.length }, 'Results filtered');
    return filtered;
  }

  /**
   * Up to three moods the query leans towards, strongest first
   */
  getMoodSuggestions(query: string): MoodSuggestion[] {
    const analysis = this.moodClassifier.analyze(query);
    const suggestions: MoodSuggestion[] = [];

    for (const { moodId, score } of this.moodClassifier.rankMoods(analysis).slice(0, 3)) {
      const preset = this.moodClassifier.getPreset(moodId);
      if (preset) {
        suggestions.push({ moodId, preset, score });
      }
    }
    return suggestions;
  }

  getSearchQuery(moodId: string): string {
    return this.moodClassifier.getSearchQuery(moodId);
  }

  listPresets(): MoodPreset[] {
    return this.moodClassifier.listPresets();
  }
}
