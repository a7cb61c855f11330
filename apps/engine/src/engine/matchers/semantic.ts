/**
 * Semantic Matcher
 *
 * Ranks songs against free text by embedding similarity. Long lyrics are
 * chunked and the best-scoring chunk decides both the score and the excerpt
 * shown to the user. One instance owns the embedder and the embedding cache
 * and is shared by every component that needs similarity scores.
 */

import { logger, ConfigurationError } from '../../config/index.js';
import { EmbeddingCache } from '../../embeddings/cache.js';
import type { Embedder, EmbeddingVector } from '../../embeddings/types.js';
import { cosineSimilarity, relevance } from '../../embeddings/utils.js';
import { loadLexicon, type Lexicon } from '../../services/lexicon-service.js';
import type { Song } from '../../songs/song.js';
import { truncateText } from '../../utils/text.js';
import { chunkText, DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from '../chunker.js';

export interface MatchResult {
  song: Song;
  score: number;
  relevantExcerpt: string;
  matchedSentences: string[];
}

export interface SimilarityScore {
  score: number;
  excerpt: string;
}

export interface ThemeScore {
  theme: string;
  score: number;
}

export interface SemanticMatcherOptions {
  embedder: Embedder;
  cache?: EmbeddingCache;
  defaultResultLimit: number;
  minRelevanceScore: number;
  chunkSize?: number;
  chunkOverlap?: number;
  excerptLength?: number;
  lexicon?: Lexicon;
}

const SHORT_QUERY_WORDS = 10;
const KEY_PHRASE_MIN_LENGTH = 10;
const SEARCH_KEYWORD_MIN_LENGTH = 4;
const MAX_SEARCH_KEYWORDS = 5;
// Theme scores are normalized per this many words of lyrics
const THEME_WORDS_PER_UNIT = 50;

export class SemanticMatcher {
  readonly defaultResultLimit: number;
  readonly minRelevanceScore: number;
  private embedder: Embedder;
  private cache?: EmbeddingCache;
  private chunkSize: number;
  private chunkOverlap: number;
  private excerptLength: number;
  private lexicon: Lexicon;

  constructor(options: SemanticMatcherOptions) {
    this.embedder = options.embedder;
    this.cache = options.cache;
    this.defaultResultLimit = options.defaultResultLimit;
    this.minRelevanceScore = options.minRelevanceScore;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
    this.excerptLength = options.excerptLength ?? 200;
    this.lexicon = options.lexicon ?? loadLexicon();
  }

  /**
   * Embedding for one text, served from the cache when present
   */
  async getEmbedding(text: string): Promise<EmbeddingVector> {
    const cached = await this.cache?.get(text);
    if (cached) {
      return cached;
    }

    const embedding = await this.embedder.embedSingle(text);
    await this.cache?.set(text, embedding);
    return embedding;
  }

  /**
   * Embeddings for many texts, in input order. Cache misses go to the
   * embedder in one batch. Texts that share a cache key share the vector
   * of the first of them, as they would when embedded one by one.
   */
  async getEmbeddings(texts: string[]): Promise<EmbeddingVector[]> {
    const vectors = new Map<string, EmbeddingVector>();
    const missing = new Map<string, string>();

    for (const text of texts) {
      const key = this.keyFor(text);
      if (vectors.has(key) || missing.has(key)) {
        continue;
      }
      const cached = await this.cache?.get(text);
      if (cached) {
        vectors.set(key, cached);
      } else {
        missing.set(key, text);
      }
    }

    if (missing.size > 0) {
      const missingTexts = [...missing.values()];
      const embedded = await this.embedder.embed(missingTexts);
      if (embedded.length !== missingTexts.length) {
        throw new Error(`Embedder returned ${embedded.length} vectors for ${missingTexts.length} texts`);
      }

      let index = 0;
      for (const [key, text] of missing) {
        const vector = embedded[index++];
        vectors.set(key, vector);
        await this.cache?.set(text, vector);
      }
    }

    return texts.map(text => {
      const vector = vectors.get(this.keyFor(text));
      if (!vector) {
        throw new Error('Embedding missing after batch');
      }
      return vector;
    });
  }

  /**
   * Best chunk similarity between a query and a text, with its excerpt.
   * Negative similarities never beat the initial score of 0.
   */
  async computeSimilarity(query: string, text: string): Promise<SimilarityScore> {
    if (!text) {
      return { score: 0, excerpt: '' };
    }

    const queryEmbedding = await this.getEmbedding(query);
    const chunks = chunkText(text, this.chunkSize, this.chunkOverlap);
    const chunkEmbeddings = await this.getEmbeddings(chunks);

    let bestScore = 0;
    let bestChunk = '';

    chunks.forEach((chunk, index) => {
      const similarity = cosineSimilarity(queryEmbedding, chunkEmbeddings[index]);
      if (similarity > bestScore) {
        bestScore = similarity;
        bestChunk = chunk;
      }
    });

    return { score: bestScore, excerpt: truncateText(bestChunk, this.excerptLength) };
  }

  /**
   * Songs ranked by similarity to the query. Songs without lyrics are
   * skipped, and so is any song whose scoring fails.
   */
  async findSimilarSongs(
    query: string,
    songs: Song[],
    limit: number = this.defaultResultLimit,
    minScore: number = this.minRelevanceScore
  ): Promise<MatchResult[]> {
    logger.info({ query: query.substring(0, 50), candidates: songs.length }, 'Semantic matching');

    const results: MatchResult[] = [];

    for (const song of songs) {
      if (!song.lyrics) {
        logger.debug({ songId: song.id, title: song.title }, 'Skipping song without lyrics');
        continue;
      }

      let similarity: SimilarityScore;
      try {
        similarity = await this.computeSimilarity(query, song.cleanedLyrics);
      } catch (error) {
        if (error instanceof ConfigurationError) {
          throw error;
        }
        logger.warn({ error, songId: song.id, title: song.title }, 'Similarity failed for song, skipping');
        continue;
      }

      if (similarity.score >= minScore) {
        results.push({
          song,
          score: similarity.score,
          relevantExcerpt: similarity.excerpt,
          matchedSentences: []
        });
      }
    }

    // Array.prototype.sort is stable: ties keep input order
    results.sort((a, b) => b.score - a.score);

    logger.info({ matches: results.length, minScore }, 'Semantic matching complete');
    return results.slice(0, limit);
  }

  /**
   * Ranks songs against several queries at once. A song's score is the mean
   * over the queries it produced a result for; queries where it did not
   * appear do not count as zero.
   */
  async findBestMatchesMultiQuery(
    queries: string[],
    songs: Song[],
    limit: number = this.defaultResultLimit
  ): Promise<MatchResult[]> {
    const observed = new Map<string, { result: MatchResult; scores: number[]; matched: string[] }>();

    for (const query of queries) {
      const results = await this.findSimilarSongs(query, songs, songs.length, 0);

      for (const result of results) {
        let entry = observed.get(result.song.id);
        if (!entry) {
          entry = { result, scores: [], matched: [] };
          observed.set(result.song.id, entry);
        }
        entry.scores.push(result.score);
        if (result.score >= this.minRelevanceScore) {
          entry.matched.push(query);
        }
      }
    }

    const finalResults: MatchResult[] = [];
    for (const { result, scores, matched } of observed.values()) {
      const averageScore = scores.reduce((sum, score) => sum + score, 0) / scores.length;
      if (averageScore >= this.minRelevanceScore) {
        finalResults.push({ ...result, score: averageScore, matchedSentences: matched });
      }
    }

    finalResults.sort((a, b) => b.score - a.score);
    return finalResults.slice(0, limit);
  }

  /**
   * The `topK` sentences closest in meaning to the whole text, best first.
   * With `topK` or fewer candidate sentences, all are returned in text order.
   */
  async extractKeyPhrases(text: string, topK: number = 5): Promise<string[]> {
    const sentences = text
      .split(/[.!?]+/)
      .map(sentence => sentence.trim())
      .filter(sentence => sentence.length > KEY_PHRASE_MIN_LENGTH);

    if (sentences.length <= topK) {
      return sentences;
    }

    const textEmbedding = await this.getEmbedding(text);
    const sentenceEmbeddings = await this.getEmbeddings(sentences);

    return sentences
      .map((sentence, index) => ({
        sentence,
        score: cosineSimilarity(textEmbedding, sentenceEmbeddings[index])
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map(scored => scored.sentence);
  }

  /**
   * Whole-text similarity without chunking, floored at 0
   */
  async textSimilarity(textA: string, textB: string): Promise<number> {
    const [embeddingA, embeddingB] = await this.getEmbeddings([textA, textB]);
    return relevance(embeddingA, embeddingB);
  }

  /**
   * Search terms for a user text: short text is used whole, long text
   * yields its key phrases followed by up to five long words.
   */
  async extractSearchTerms(text: string): Promise<string[]> {
    const words = text.split(/\s+/).filter(Boolean);
    if (words.length <= SHORT_QUERY_WORDS) {
      return [text];
    }

    const keyPhrases = await this.extractKeyPhrases(text, 5);
    const keywords = words
      .filter(word => word.length > SEARCH_KEYWORD_MIN_LENGTH && !this.lexicon.searchTermStopwords.has(word.toLowerCase()))
      .slice(0, MAX_SEARCH_KEYWORDS);

    return [...keyPhrases, ...keywords];
  }

  /**
   * Keyword theme scores, highest first. Only themes with at least one
   * keyword occurrence are listed.
   */
  analyzeThemes(lyrics: string): ThemeScore[] {
    const lower = lyrics.toLowerCase();
    const wordUnits = lyrics.split(/\s+/).filter(Boolean).length / THEME_WORDS_PER_UNIT;
    const themes: ThemeScore[] = [];

    for (const [theme, keywords] of Object.entries(this.lexicon.themeKeywords)) {
      const count = keywords.reduce((sum, keyword) => sum + countOccurrences(lower, keyword), 0);
      if (count > 0) {
        themes.push({ theme, score: Math.min(1, count / wordUnits) });
      }
    }

    return themes.sort((a, b) => b.score - a.score);
  }

  async clearCache(): Promise<void> {
    await this.cache?.clear();
    logger.info('Embedding cache cleared');
  }

  private keyFor(text: string): string {
    return this.cache ? EmbeddingCache.keyFor(text) : text;
  }
}

/**
 * Non-overlapping occurrences of `needle` in `haystack`
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) {
    return 0;
  }
  let count = 0;
  let position = haystack.indexOf(needle);
  while (position !== -1) {
    count++;
    position = haystack.indexOf(needle, position + needle.length);
  }
  return count;
}

export function serializeMatchResult(result: MatchResult) {
  return {
    song: result.song.toJSON(),
    score: Math.round(result.score * 10000) / 10000,
    relevantExcerpt: result.relevantExcerpt,
    matchedSentences: result.matchedSentences
  };
}
