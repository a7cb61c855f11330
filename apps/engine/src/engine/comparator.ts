/**
 * Song Comparator
 *
 * Compares songs on several axes: whole-lyrics embedding similarity,
 * best-matching verse pairs, shared moods, vocabulary overlap and simple
 * surface differences. Reuses the shared matcher and its embedding cache.
 */

import { ConfigurationError, logger } from '../config/index.js';
import { relevance } from '../embeddings/utils.js';
import { loadLexicon } from '../services/lexicon-service.js';
import type { Song } from '../songs/song.js';
import { lettersOnly } from '../utils/text.js';
import { MoodClassifier, type MoodAnalysis } from './matchers/mood.js';
import type { SemanticMatcher } from './matchers/semantic.js';

export class ComparisonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ComparisonError';
  }
}

export interface ThemeMatch {
  theme: string;
  keywords: string[];
  songsInvolved: string[];
  strength: number;
}

export interface VersePair {
  verseA: string;
  verseB: string;
  score: number;
}

export interface MoodComparison {
  songAPrimaryMood: string;
  songBPrimaryMood: string;
  moodsMatch: boolean;
  songAConfidence: number;
  songBConfidence: number;
  songATopMoods: Array<{ moodId: string; score: number }>;
  songBTopMoods: Array<{ moodId: string; score: number }>;
}

export interface SongComparisonResult {
  songA: Song;
  songB: Song;
  semanticSimilarity: number;
  verseSimilarities: VersePair[];
  commonThemes: ThemeMatch[];
  moodComparison: MoodComparison;
  vocabularyOverlap: number;
  sharedKeywords: string[];
  differences: string[];
}

export interface SongPairScore {
  songA: string;
  songB: string;
  score: number;
}

export interface MultiComparisonResult {
  songs: Song[];
  similarityMatrix: number[][];
  commonThemes: ThemeMatch[];
  mostSimilarPair: SongPairScore;
  mostDifferentPair: SongPairScore;
  averageSimilarity: number;
}

export type SimilarityLevel =
  | 'very similar'
  | 'similar'
  | 'moderately similar'
  | 'slightly similar'
  | 'very different';

export function getSimilarityLevel(score: number): SimilarityLevel {
  if (score >= 0.8) return 'very similar';
  if (score >= 0.6) return 'similar';
  if (score >= 0.4) return 'moderately similar';
  if (score >= 0.2) return 'slightly similar';
  return 'very different';
}

export interface SongComparatorOptions {
  matcher: SemanticMatcher;
  moodClassifier?: MoodClassifier;
  stopwords?: ReadonlySet<string>;
}

const VERSE_MIN_LENGTH = 10;
const MAX_VERSES_PER_SONG = 30;
const VERSE_PAIR_THRESHOLD = 0.3;
const TOP_VERSE_PAIRS = 5;
const VOCABULARY_MIN_LENGTH = 2;
const MAX_SHARED_KEYWORDS = 15;
const LENGTH_RATIO_LIMIT = 2;

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export class SongComparator {
  private matcher: SemanticMatcher;
  private moodClassifier: MoodClassifier;
  private stopwords: ReadonlySet<string>;

  constructor(options: SongComparatorOptions) {
    this.matcher = options.matcher;
    this.moodClassifier = options.moodClassifier ?? new MoodClassifier();
    this.stopwords = options.stopwords ?? loadLexicon().vocabularyStopwords;
  }

  async compare(songA: Song, songB: Song): Promise<SongComparisonResult> {
    logger.info({ songA: songA.title, songB: songB.title }, 'Comparing songs');

    const moodA = this.moodClassifier.analyze(songA.lyrics);
    const moodB = this.moodClassifier.analyze(songB.lyrics);
    const moodComparison = this.compareMoods(moodA, moodB);
    const { overlap, sharedKeywords } = this.analyzeVocabularyOverlap(songA, songB);

    return {
      songA,
      songB,
      semanticSimilarity: await this.semanticSimilarity(songA, songB),
      verseSimilarities: await this.compareVerses(songA, songB),
      commonThemes: this.findCommonThemes([songA, songB], [moodA, moodB], 'intersect'),
      moodComparison,
      vocabularyOverlap: overlap,
      sharedKeywords,
      differences: this.identifyDifferences(songA, songB, moodComparison)
    };
  }

  async compareMultiple(songs: Song[]): Promise<MultiComparisonResult> {
    if (songs.length < 2) {
      throw new ComparisonError('At least 2 songs are required for comparison');
    }

    const n = songs.length;
    const matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    const pairs: SongPairScore[] = [];

    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        const score = await this.pairSimilarity(songs[i], songs[j]);
        matrix[i][j] = score;
        matrix[j][i] = score;
        pairs.push({ songA: songs[i].title, songB: songs[j].title, score });
      }
    }

    // First pair wins ties in both directions
    let mostSimilarPair = pairs[0];
    let mostDifferentPair = pairs[0];
    for (const pair of pairs) {
      if (pair.score > mostSimilarPair.score) mostSimilarPair = pair;
      if (pair.score < mostDifferentPair.score) mostDifferentPair = pair;
    }

    const moods = songs.map(song => this.moodClassifier.analyze(song.lyrics));

    return {
      songs,
      similarityMatrix: matrix,
      commonThemes: this.findCommonThemes(songs, moods, 'union'),
      mostSimilarPair,
      mostDifferentPair,
      averageSimilarity: pairs.reduce((sum, pair) => sum + pair.score, 0) / pairs.length
    };
  }

  getSimilaritySummary(result: SongComparisonResult): string {
    const { songA, songB, moodComparison } = result;
    const lines = [
      `Comparison: "${songA.title}" vs "${songB.title}"`,
      `Artists: ${songA.artist} vs ${songB.artist}`,
      '',
      `Semantic similarity: ${percent(result.semanticSimilarity)} (${getSimilarityLevel(result.semanticSimilarity)})`,
      `Vocabulary overlap: ${percent(result.vocabularyOverlap)}`,
      ''
    ];

    if (result.commonThemes.length > 0) {
      lines.push('Common themes:');
      for (const theme of result.commonThemes.slice(0, 3)) {
        lines.push(`  - ${theme.theme}: ${theme.keywords.slice(0, 5).join(', ')}`);
      }
      lines.push('');
    }

    if (moodComparison.moodsMatch) {
      lines.push(`Mood: both songs are ${moodComparison.songAPrimaryMood}`);
    } else {
      lines.push(`Mood: "${songA.title}" is ${moodComparison.songAPrimaryMood}, "${songB.title}" is ${moodComparison.songBPrimaryMood}`);
    }
    lines.push('');

    const [bestPair] = result.verseSimilarities;
    if (bestPair) {
      lines.push('Most similar verses:');
      lines.push(`  "${bestPair.verseA.slice(0, 60)}..."`);
      lines.push(`  "${bestPair.verseB.slice(0, 60)}..."`);
      lines.push(`  (similarity: ${percent(bestPair.score)})`);
      lines.push('');
    }

    if (result.sharedKeywords.length > 0) {
      lines.push(`Shared keywords: ${result.sharedKeywords.slice(0, 10).join(', ')}`);
    }

    if (result.differences.length > 0) {
      lines.push('');
      lines.push('Differences:');
      for (const difference of result.differences) {
        lines.push(`  - ${difference}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Unchunked whole-lyrics similarity; 0 when either song has no lyrics
   */
  private async semanticSimilarity(songA: Song, songB: Song): Promise<number> {
    if (!songA.lyrics || !songB.lyrics) {
      return 0;
    }
    return this.matcher.textSimilarity(songA.lyrics, songB.lyrics);
  }

  /**
   * Matrix entry for one pair; a pair that cannot be embedded scores 0
   */
  private async pairSimilarity(songA: Song, songB: Song): Promise<number> {
    try {
      return await this.semanticSimilarity(songA, songB);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      logger.warn({ error, songA: songA.title, songB: songB.title }, 'Similarity failed for pair, scoring 0');
      return 0;
    }
  }

  private async compareVerses(songA: Song, songB: Song): Promise<VersePair[]> {
    const versesA = this.comparableVerses(songA);
    const versesB = this.comparableVerses(songB);
    if (versesA.length === 0 || versesB.length === 0) {
      return [];
    }

    const embeddingsA = await this.matcher.getEmbeddings(versesA);
    const embeddingsB = await this.matcher.getEmbeddings(versesB);
    const pairs: VersePair[] = [];

    versesA.forEach((verseA, i) => {
      versesB.forEach((verseB, j) => {
        const score = relevance(embeddingsA[i], embeddingsB[j]);
        if (score > VERSE_PAIR_THRESHOLD) {
          pairs.push({ verseA, verseB, score });
        }
      });
    });

    return pairs.sort((a, b) => b.score - a.score).slice(0, TOP_VERSE_PAIRS);
  }

  private comparableVerses(song: Song): string[] {
    return song.lyrics
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > VERSE_MIN_LENGTH)
      .slice(0, MAX_VERSES_PER_SONG);
  }

  /**
   * Moods every song scored on. Two songs keep only the keywords both
   * contain and drop the mood if none are shared; more songs pool the
   * keywords of all of them.
   */
  private findCommonThemes(songs: Song[], moods: MoodAnalysis[], keywordMode: 'intersect' | 'union'): ThemeMatch[] {
    const themes: ThemeMatch[] = [];

    for (const preset of this.moodClassifier.listPresets()) {
      if (!moods.every(mood => preset.id in mood.moodScores)) {
        continue;
      }

      const keywordLists = moods.map(mood => mood.keywordsFound[preset.id] ?? []);
      const keywords = keywordMode === 'intersect'
        ? keywordLists.reduce((shared, list) => shared.filter(keyword => list.includes(keyword)))
        : [...new Set(keywordLists.flat())];

      if (keywords.length === 0) {
        continue;
      }

      themes.push({
        theme: preset.name,
        keywords,
        songsInvolved: songs.map(song => song.title),
        strength: moods.reduce((sum, mood) => sum + mood.moodScores[preset.id], 0) / moods.length
      });
    }

    return themes.sort((a, b) => b.strength - a.strength);
  }

  private compareMoods(moodA: MoodAnalysis, moodB: MoodAnalysis): MoodComparison {
    return {
      songAPrimaryMood: moodA.primaryMood,
      songBPrimaryMood: moodB.primaryMood,
      moodsMatch: moodA.primaryMood === moodB.primaryMood,
      songAConfidence: moodA.confidence,
      songBConfidence: moodB.confidence,
      songATopMoods: this.moodClassifier.rankMoods(moodA).slice(0, 3),
      songBTopMoods: this.moodClassifier.rankMoods(moodB).slice(0, 3)
    };
  }

  /**
   * Jaccard overlap of meaningful words, plus the shared words ranked by
   * how often they occur across both lyrics
   */
  private analyzeVocabularyOverlap(songA: Song, songB: Song): { overlap: number; sharedKeywords: string[] } {
    const wordsA = this.meaningfulWords(songA.lyrics);
    const wordsB = this.meaningfulWords(songB.lyrics);
    if (wordsA.size === 0 || wordsB.size === 0) {
      return { overlap: 0, sharedKeywords: [] };
    }

    const shared = new Set([...wordsA].filter(word => wordsB.has(word)));
    const union = new Set([...wordsA, ...wordsB]);

    const counts = new Map<string, number>();
    for (const token of `${songA.lyrics} ${songB.lyrics}`.split(/\s+/)) {
      const word = lettersOnly(token);
      if (shared.has(word)) {
        counts.set(word, (counts.get(word) ?? 0) + 1);
      }
    }

    const sharedKeywords = [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, MAX_SHARED_KEYWORDS)
      .map(([word]) => word);

    return { overlap: shared.size / union.size, sharedKeywords };
  }

  private meaningfulWords(text: string): Set<string> {
    const words = new Set<string>();
    for (const token of text.split(/\s+/)) {
      const word = lettersOnly(token);
      if (word.length > VOCABULARY_MIN_LENGTH && !this.stopwords.has(word)) {
        words.add(word);
      }
    }
    return words;
  }

  private identifyDifferences(songA: Song, songB: Song, moods: MoodComparison): string[] {
    const differences: string[] = [];

    if (!moods.moodsMatch) {
      differences.push(`Different mood: "${songA.title}" is ${moods.songAPrimaryMood}, "${songB.title}" is ${moods.songBPrimaryMood}`);
    }

    const lengthA = songA.lyrics.length;
    const lengthB = songB.lyrics.length;
    if (lengthA > 0 && lengthB > 0 && Math.max(lengthA, lengthB) / Math.min(lengthA, lengthB) > LENGTH_RATIO_LIMIT) {
      const longer = lengthA > lengthB ? songA.title : songB.title;
      differences.push(`"${longer}" has considerably longer lyrics`);
    }

    if (songA.artist.toLowerCase() !== songB.artist.toLowerCase()) {
      differences.push(`Different artists: ${songA.artist} vs ${songB.artist}`);
    }

    return differences;
  }
}
