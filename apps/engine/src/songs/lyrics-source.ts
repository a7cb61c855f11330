/**
 * Lyrics sources
 *
 * The engine never talks to a lyrics provider directly. Anything that can
 * search songs by term and fill in their lyrics plugs in here.
 */

import { readFile } from 'fs/promises';
import { logger } from '../config/index.js';
import { CatalogSchema } from '../schemas/search.js';
import type { RateLimiter } from '../utils/rate-limiter.js';
import { withRetry } from '../utils/retry.js';
import { Song } from './song.js';

export interface LyricsSource {
  /** Songs matching a search term. Lyrics may still be empty. */
  search(term: string, limit: number): Promise<Song[]>;
  /** The song with its lyrics filled in, or with empty lyrics if none exist */
  fetchLyrics(song: Song): Promise<Song>;
}

/**
 * Up to `limit` songs with lyrics for one query. Twice as many candidates
 * are searched because some will have no lyrics. A failed search yields no
 * songs and a failed lyrics fetch skips that song.
 */
export async function collectSongsWithLyrics(source: LyricsSource, query: string, limit: number): Promise<Song[]> {
  let candidates: Song[];
  try {
    candidates = await source.search(query, limit * 2);
  } catch (error) {
    logger.warn({ error, query }, 'Lyrics search failed');
    return [];
  }

  const songs: Song[] = [];
  for (const candidate of candidates) {
    if (songs.length >= limit) {
      break;
    }

    let song = candidate;
    if (!song.hasLyrics) {
      try {
        song = await source.fetchLyrics(candidate);
      } catch (error) {
        logger.warn({ error, songId: candidate.id, title: candidate.title }, 'Lyrics fetch failed, skipping song');
        continue;
      }
    }

    if (song.hasLyrics) {
      songs.push(song);
    }
  }

  logger.debug({ query, found: songs.length, candidates: candidates.length }, 'Collected songs with lyrics');
  return songs;
}

/**
 * Songs found for any of the terms, first occurrence of each id kept
 */
export async function searchByTerms(source: LyricsSource, terms: string[], limitPerTerm: number): Promise<Song[]> {
  const seen = new Set<string>();
  const songs: Song[] = [];

  for (const term of terms) {
    for (const song of await collectSongsWithLyrics(source, term, limitPerTerm)) {
      if (!seen.has(song.id)) {
        seen.add(song.id);
        songs.push(song);
      }
    }
  }

  return songs;
}

const CATALOG_MIN_WORD_LENGTH = 3;

/**
 * Local catalog of songs. A song matches when any word of the term longer
 * than three characters appears, ignoring case, in its title, artist or
 * lyrics. Songs matching more words come first.
 */
export class CatalogLyricsSource implements LyricsSource {
  private songs: Song[];

  constructor(songs: Song[]) {
    this.songs = [...songs];
  }

  static fromRecords(records: unknown): CatalogLyricsSource {
    return new CatalogLyricsSource(CatalogSchema.parse(records).map(record => new Song(record)));
  }

  static async fromFile(filePath: string): Promise<CatalogLyricsSource> {
    const raw = await readFile(filePath, 'utf-8');
    const source = CatalogLyricsSource.fromRecords(JSON.parse(raw));
    logger.info({ filePath, songs: source.size }, 'Catalog loaded');
    return source;
  }

  get size(): number {
    return this.songs.length;
  }

  async search(term: string, limit: number): Promise<Song[]> {
    const words = term.toLowerCase().split(/\s+/).filter(word => word.length > CATALOG_MIN_WORD_LENGTH);

    return this.songs
      .map(song => {
        const haystack = `${song.title}\n${song.artist}\n${song.lyrics}`.toLowerCase();
        return { song, hits: words.filter(word => haystack.includes(word)).length };
      })
      .filter(candidate => candidate.hits > 0)
      .sort((a, b) => b.hits - a.hits)
      .slice(0, limit)
      .map(candidate => candidate.song);
  }

  async fetchLyrics(song: Song): Promise<Song> {
    const stored = this.songs.find(candidate => candidate.id === song.id);
    return stored?.hasLyrics ? song.withLyrics(stored.lyrics) : song;
  }
}

export interface ResilientLyricsSourceOptions {
  maxRetries: number;
  baseDelayMs: number;
  rateLimiter: RateLimiter;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

const RATE_LIMIT_KEY = 'lyrics-source';

/**
 * Wraps a source so every call waits for the rate limiter and failed calls
 * are retried with exponential backoff
 */
export class ResilientLyricsSource implements LyricsSource {
  constructor(private inner: LyricsSource, private options: ResilientLyricsSourceOptions) {}

  async search(term: string, limit: number): Promise<Song[]> {
    return this.call(`search "${term}"`, () => this.inner.search(term, limit));
  }

  async fetchLyrics(song: Song): Promise<Song> {
    return this.call(`lyrics ${song.id}`, () => this.inner.fetchLyrics(song));
  }

  private async call<T>(label: string, operation: () => Promise<T>): Promise<T> {
    const { maxRetries, baseDelayMs, rateLimiter, isRetryable, sleep } = this.options;
    return withRetry(async () => {
      await rateLimiter.acquire(RATE_LIMIT_KEY);
      return operation();
    }, { maxRetries, baseDelayMs, isRetryable, label, sleep });
  }
}
