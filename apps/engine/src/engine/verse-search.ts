/**
 * Verse Search
 *
 * Line-level search across songs in exact, fuzzy or semantic mode, with
 * section detection from bracketed headers and a few per-song analytics.
 */

import { ConfigurationError, logger } from '../config/index.js';
import { relevance } from '../embeddings/utils.js';
import type { Song } from '../songs/song.js';
import { sequenceRatio } from '../utils/sequence-ratio.js';
import { lettersOnly } from '../utils/text.js';
import type { SemanticMatcher } from './matchers/semantic.js';

export type MatchType = 'exact' | 'fuzzy' | 'semantic';

export interface VerseMatch {
  song: Song;
  matchedLine: string;
  /** 1-based index into the raw lyrics lines */
  lineNumber: number;
  section: string;
  score: number;
  matchType: MatchType;
  contextBefore: string[];
  contextAfter: string[];
}

export interface VerseSearchResult {
  query: string;
  matches: VerseMatch[];
  totalSongsSearched: number;
  mode: MatchType;
}

export interface VerseSearchOptions {
  mode?: MatchType;
  minSimilarity?: number;
  limit?: number;
  contextLines?: number;
}

export interface Verse {
  lineNumber: number;
  text: string;
  section: string;
}

export interface RhymingVerse {
  song: Song;
  line: string;
}

export interface VerseStatistics {
  totalVerses: number;
  averageLength: number;
  maxLength: number;
  minLength: number;
  averageWords: number;
  sections: Record<string, number>;
  repeatedVerses: number;
  uniqueVerses: number;
}

const SECTION_PATTERNS: ReadonlyArray<readonly [RegExp, string]> = [
  [/^\[(?:verse|strofa)\s*\d*\]/i, 'Verse'],
  [/^\[(?:chorus|ritornello|rit\.?)\]/i, 'Chorus'],
  [/^\[(?:pre-chorus|pre-ritornello)\]/i, 'Pre-Chorus'],
  [/^\[(?:bridge|ponte)\]/i, 'Bridge'],
  [/^\[(?:outro|finale)\]/i, 'Outro'],
  [/^\[intro\]/i, 'Intro'],
  [/^\[hook\]/i, 'Hook']
];

const RHYME_SUFFIX_LENGTH = 3;

/**
 * Section label for a header line, undefined for content
 */
export function detectSection(line: string): string | undefined {
  const trimmed = line.trim();
  for (const [pattern, label] of SECTION_PATTERNS) {
    if (pattern.test(trimmed)) {
      return label;
    }
  }
  return undefined;
}

function isContent(line: string): boolean {
  return line.trim() !== '' && detectSection(line) === undefined;
}

/**
 * Scores every candidate line of one song against the query
 */
interface LineScorer {
  score(query: string, lines: string[]): Promise<number[]>;
}

const exactScorer: LineScorer = {
  async score(query, lines) {
    const needle = query.toLowerCase();
    return lines.map(line => (line.toLowerCase().includes(needle) ? 1 : 0));
  }
};

export function fuzzyScore(query: string, line: string): number {
  const queryLower = query.toLowerCase();
  const lineLower = line.toLowerCase();
  const ratio = sequenceRatio(queryLower, lineLower);

  const queryWords = new Set(queryLower.split(/\s+/).filter(Boolean));
  if (queryWords.size === 0) {
    return ratio;
  }
  const lineWords = new Set(lineLower.split(/\s+/).filter(Boolean));
  const common = [...queryWords].filter(word => lineWords.has(word)).length;

  return (ratio + common / queryWords.size) / 2;
}

const fuzzyScorer: LineScorer = {
  async score(query, lines) {
    return lines.map(line => fuzzyScore(query, line));
  }
};

function semanticScorer(matcher: SemanticMatcher): LineScorer {
  return {
    async score(query, lines) {
      const queryEmbedding = await matcher.getEmbedding(query);
      const lineEmbeddings = await matcher.getEmbeddings(lines);
      return lineEmbeddings.map(embedding => relevance(queryEmbedding, embedding));
    }
  };
}

export class VerseSearcher {
  private scorers: Record<MatchType, LineScorer>;

  constructor(matcher: SemanticMatcher) {
    this.scorers = {
      exact: exactScorer,
      fuzzy: fuzzyScorer,
      semantic: semanticScorer(matcher)
    };
  }

  async searchVerse(query: string, songs: Song[], options: VerseSearchOptions = {}): Promise<VerseSearchResult> {
    const { mode = 'semantic', minSimilarity = 0.5, limit = 20, contextLines = 2 } = options;
    logger.info({ query: query.substring(0, 50), songs: songs.length, mode }, 'Verse search');

    const matches: VerseMatch[] = [];
    for (const song of songs) {
      if (!song.lyrics) {
        continue;
      }
      try {
        matches.push(...await this.searchInSong(query, song, mode, minSimilarity, contextLines));
      } catch (error) {
        if (error instanceof ConfigurationError) {
          throw error;
        }
        logger.warn({ error, songId: song.id, title: song.title }, 'Verse search failed for song, skipping');
      }
    }

    matches.sort((a, b) => b.score - a.score);

    return {
      query,
      matches: matches.slice(0, limit),
      totalSongsSearched: songs.length,
      mode
    };
  }

  /**
   * One search per query, keyed by the query text
   */
  async searchMultipleVerses(
    queries: string[],
    songs: Song[],
    options: Omit<VerseSearchOptions, 'limit' | 'contextLines'> = {}
  ): Promise<Map<string, VerseSearchResult>> {
    const results = new Map<string, VerseSearchResult>();
    for (const query of queries) {
      results.set(query, await this.searchVerse(query, songs, options));
    }
    return results;
  }

  async findSimilarVerses(verse: string, songs: Song[], topK: number = 10): Promise<VerseMatch[]> {
    const result = await this.searchVerse(verse, songs, { mode: 'semantic', minSimilarity: 0.3, limit: topK });
    return result.matches;
  }

  extractAllVerses(song: Song): Verse[] {
    const verses: Verse[] = [];
    let section = '';

    song.lyrics.split('\n').forEach((line, index) => {
      const text = line.trim();
      if (!text) {
        return;
      }
      const header = detectSection(text);
      if (header !== undefined) {
        section = header;
        return;
      }
      verses.push({ lineNumber: index + 1, text, section });
    });

    return verses;
  }

  /**
   * Lower-cased trimmed lines that occur more than once, with their counts
   */
  findRepeatedVerses(song: Song): Map<string, number> {
    const counts = new Map<string, number>();
    for (const line of song.lyrics.split('\n')) {
      if (isContent(line)) {
        const normalized = line.trim().toLowerCase();
        counts.set(normalized, (counts.get(normalized) ?? 0) + 1);
      }
    }
    return new Map([...counts].filter(([, count]) => count > 1));
  }

  /**
   * Groups lines across songs by the last three letters of their final word.
   * Not phonetic: only the spelling of the ending counts.
   */
  findRhymingVerses(songs: Song[], minGroupSize: number = 2): Map<string, RhymingVerse[]> {
    const endings = new Map<string, RhymingVerse[]>();

    for (const song of songs) {
      for (const rawLine of song.lyrics.split('\n')) {
        if (!isContent(rawLine)) {
          continue;
        }
        const line = rawLine.trim();
        const words = line.split(/\s+/);
        const lastWord = lettersOnly(words[words.length - 1]);
        if (lastWord.length < RHYME_SUFFIX_LENGTH) {
          continue;
        }

        const ending = lastWord.slice(-RHYME_SUFFIX_LENGTH);
        const group = endings.get(ending) ?? [];
        group.push({ song, line });
        endings.set(ending, group);
      }
    }

    return new Map([...endings].filter(([, group]) => group.length >= minGroupSize));
  }

  getVerseStatistics(song: Song): VerseStatistics {
    const verses = this.extractAllVerses(song);
    if (verses.length === 0) {
      return {
        totalVerses: 0,
        averageLength: 0,
        maxLength: 0,
        minLength: 0,
        averageWords: 0,
        sections: {},
        repeatedVerses: 0,
        uniqueVerses: 0
      };
    }

    const lengths = verses.map(verse => verse.text.length);
    const wordCounts = verses.map(verse => verse.text.split(/\s+/).length);
    const sections: Record<string, number> = {};
    for (const verse of verses) {
      sections[verse.section] = (sections[verse.section] ?? 0) + 1;
    }
    const repeated = this.findRepeatedVerses(song);
    const extraOccurrences = [...repeated.values()].reduce((sum, count) => sum + count - 1, 0);

    return {
      totalVerses: verses.length,
      averageLength: lengths.reduce((sum, length) => sum + length, 0) / lengths.length,
      maxLength: Math.max(...lengths),
      minLength: Math.min(...lengths),
      averageWords: wordCounts.reduce((sum, count) => sum + count, 0) / wordCounts.length,
      sections,
      repeatedVerses: repeated.size,
      uniqueVerses: verses.length - extraOccurrences
    };
  }

  private async searchInSong(
    query: string,
    song: Song,
    mode: MatchType,
    minSimilarity: number,
    contextLines: number
  ): Promise<VerseMatch[]> {
    const lines = song.lyrics.split('\n');
    const verses = this.extractAllVerses(song);
    const scores = await this.scorerFor(mode).score(query, verses.map(verse => verse.text));
    const matches: VerseMatch[] = [];

    verses.forEach((verse, index) => {
      const score = scores[index];
      if (score < minSimilarity) {
        return;
      }
      const lineIndex = verse.lineNumber - 1;
      matches.push({
        song,
        matchedLine: verse.text,
        lineNumber: verse.lineNumber,
        section: verse.section,
        score,
        matchType: mode,
        contextBefore: lines.slice(Math.max(0, lineIndex - contextLines), lineIndex).filter(isContent).map(line => line.trim()),
        contextAfter: lines.slice(lineIndex + 1, lineIndex + 1 + contextLines).filter(isContent).map(line => line.trim())
      });
    });

    return matches;
  }

  private scorerFor(mode: MatchType): LineScorer {
    switch (mode) {
      case 'exact':
      case 'fuzzy':
      case 'semantic':
        return this.scorers[mode];
      default: {
        const unknown: never = mode;
        throw new Error(`Unknown verse match mode: ${String(unknown)}`);
      }
    }
  }
}

/**
 * The matched line marked with an arrow between its context lines
 */
export function getContext(match: VerseMatch, lines: number = 2): string {
  const before = lines > 0 ? match.contextBefore.slice(-lines) : [];
  return [
    ...before.map(line => `  ${line}`),
    `→ ${match.matchedLine}`,
    ...match.contextAfter.slice(0, lines).map(line => `  ${line}`)
  ].join('\n');
}
