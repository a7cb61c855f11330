import { formatDuration, truncateText } from '../utils/text.js';
import type { SearchOutcome } from './pipeline.js';

export interface SearchReportContext {
  /** Display label of the applied mood, e.g. "😢 Sad" */
  moodLabel?: string;
  catalogSize: number;
  durationMs: number;
}

const RULE = '='.repeat(60);

/**
 * Plain-text lines describing a pipeline run, one ranked song per block
 */
export function formatSearchReport(outcome: SearchOutcome, context: SearchReportContext): string[] {
  const lines = [RULE, `Query: ${truncateText(outcome.query, 80)}`];
  if (outcome.moodId) {
    lines.push(`Mood: ${context.moodLabel ?? outcome.moodId}`);
  }
  lines.push(`Candidates: ${outcome.candidates} from ${context.catalogSize} catalog songs`, RULE);

  if (outcome.results.length === 0) {
    lines.push('No matching songs');
  }
  outcome.results.forEach((result, index) => {
    lines.push(
      '',
      `${index + 1}. ${result.song.title} - ${result.song.artist} (${(result.score * 100).toFixed(1)}%)`,
      `   "${truncateText(result.relevantExcerpt, 120)}"`
    );
  });

  lines.push('', `Done in ${formatDuration(context.durationMs)}`);
  return lines;
}
