/**
 * Text helpers shared by the matcher, comparator and verse searcher.
 */

/**
 * Shorten text to at most `maxLength` characters plus an ellipsis.
 * Cuts back to the last space when that space lies past 70% of the limit.
 */
export function truncateText(text: string, maxLength: number = 200): string {
  if (text.length <= maxLength) {
    return text;
  }

  let truncated = text.slice(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');

  if (lastSpace > maxLength * 0.7) {
    truncated = truncated.slice(0, lastSpace);
  }

  return truncated.trimEnd() + '...';
}

/**
 * Strip section annotations such as `[Chorus]` and repeat markers such as
 * `(x2)`, then collapse all whitespace to single spaces.
 */
export function cleanLyrics(text: string): string {
  return text
    .replace(/\[.*?\]/g, '')
    .replace(/\(x?\d+x?\)/g, '')
    .replace(/\n+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function formatDuration(milliseconds: number): string {
  const totalSeconds = Math.floor(milliseconds / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

/**
 * Lower-cased letter runs of a token, used for rhyme endings and vocabulary.
 * Any Unicode letter counts.
 */
export function lettersOnly(token: string): string {
  return token.toLowerCase().replace(/[^\p{L}]/gu, '');
}
