/**
 * Mood Classifier
 *
 * Keyword-driven mood tagging over a fixed table of presets. Independent
 * of embeddings: a mood scores by how many of its keywords appear in the
 * text, capped at five.
 */

import { logger } from '../../config/index.js';
import { loadLexicon, type MoodPreset } from '../../services/lexicon-service.js';

export const NEUTRAL_MOOD = 'neutral';

// Keyword hits at which a mood scores 1.0
const FULL_SCORE_HITS = 5;
// Minimum confidence for a mood to be suggested for a query
const SUGGESTION_THRESHOLD = 0.2;

export interface MoodAnalysis {
  primaryMood: string;
  moodScores: Record<string, number>;     // only moods with at least one hit
  keywordsFound: Record<string, string[]>;
  confidence: number;
}

export function presetKeywords(preset: MoodPreset): string[] {
  return [...preset.keywordsIt, ...preset.keywordsEn];
}

export class MoodClassifier {
  private presets: MoodPreset[];

  constructor(presets: MoodPreset[] = loadLexicon().moodPresets) {
    this.presets = presets;
  }

  /**
   * Score every preset against the text. Ties for the primary mood go to
   * the preset listed first.
   */
  analyze(text: string): MoodAnalysis {
    const lower = text.toLowerCase();
    const moodScores: Record<string, number> = {};
    const keywordsFound: Record<string, string[]> = {};

    let primaryMood = NEUTRAL_MOOD;
    let confidence = 0;

    for (const preset of this.presets) {
      const found = presetKeywords(preset).filter(keyword => lower.includes(keyword.toLowerCase()));
      if (found.length === 0) {
        continue;
      }

      const score = Math.min(1, found.length / FULL_SCORE_HITS);
      moodScores[preset.id] = score;
      keywordsFound[preset.id] = found;

      if (score > confidence) {
        primaryMood = preset.id;
        confidence = score;
      }
    }

    logger.debug({ primaryMood, confidence }, 'Mood analysis completed');

    return { primaryMood, moodScores, keywordsFound, confidence };
  }

  getPreset(moodId: string): MoodPreset | undefined {
    return this.presets.find(preset => preset.id === moodId);
  }

  listPresets(): MoodPreset[] {
    return [...this.presets];
  }

  /**
   * Three Italian and two English keywords of the mood, or "" if unknown
   */
  getSearchQuery(moodId: string): string {
    const preset = this.getPreset(moodId);
    if (!preset) {
      return '';
    }
    return [...preset.keywordsIt.slice(0, 3), ...preset.keywordsEn.slice(0, 2)].join(' ');
  }

  suggestMoodFromQuery(query: string): string | undefined {
    const analysis = this.analyze(query);
    return analysis.confidence > SUGGESTION_THRESHOLD ? analysis.primaryMood : undefined;
  }

  /**
   * Mood ids sorted by score, highest first; ties keep preset order
   */
  rankMoods(analysis: MoodAnalysis): Array<{ moodId: string; score: number }> {
    return this.presets
      .filter(preset => preset.id in analysis.moodScores)
      .map(preset => ({ moodId: preset.id, score: analysis.moodScores[preset.id] }))
      .sort((a, b) => b.score - a.score);
  }
}
