/**
 * Lexicon Service
 *
 * Loads the static word lists the engine scores with: mood presets,
 * stopwords and theme keywords. Files live in the package's data/
 * directory and are read once, on first use.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const DATA_DIR = join(__dirname, '../../data');

export const MoodPresetSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  emoji: z.string(),
  description: z.string(),
  keywordsIt: z.array(z.string().min(1)),
  keywordsEn: z.array(z.string().min(1)),
  searchTerms: z.array(z.string()),
  color: z.string().regex(/^#[0-9a-f]{6}$/i).default('#6366f1'),
});

export type MoodPreset = z.infer<typeof MoodPresetSchema>;

const StopwordsSchema = z.object({
  vocabulary: z.object({
    it: z.array(z.string()),
    en: z.array(z.string()),
  }),
  searchTerms: z.array(z.string()),
});

const ThemesSchema = z.record(z.array(z.string().min(1)));

export interface Lexicon {
  moodPresets: MoodPreset[];
  vocabularyStopwords: ReadonlySet<string>;
  searchTermStopwords: ReadonlySet<string>;
  themeKeywords: Record<string, string[]>;
}

let cachedLexicon: Lexicon | null = null;

function readJson<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw = readFileSync(join(DATA_DIR, fileName), 'utf-8');
  return schema.parse(JSON.parse(raw));
}

/**
 * Preset order in the file is the tie-break order for mood analysis
 */
export function loadLexicon(): Lexicon {
  if (cachedLexicon) {
    return cachedLexicon;
  }

  const moodPresets = readJson('mood-presets.json', z.array(MoodPresetSchema).min(1));
  const stopwords = readJson('stopwords.json', StopwordsSchema);
  const themeKeywords = readJson('themes.json', ThemesSchema);

  cachedLexicon = {
    moodPresets,
    vocabularyStopwords: new Set([...stopwords.vocabulary.it, ...stopwords.vocabulary.en]),
    searchTermStopwords: new Set(stopwords.searchTerms),
    themeKeywords,
  };
  return cachedLexicon;
}
