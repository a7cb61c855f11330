/**
 * Splits long text into overlapping windows for embedding.
 *
 * A window is cut back to the last sentence delimiter inside it, as long as
 * the cut still lies in the second half of the window. Consecutive chunks
 * share `overlap` characters of the source text.
 */

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 100;

// Tried in order; the first one found past the half-way mark wins
const SENTENCE_DELIMITERS = ['. ', '! ', '? ', '\n'] as const;

export function chunkText(
  text: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP
): string[] {
  if (chunkSize <= 0 || overlap < 0 || overlap >= chunkSize) {
    throw new RangeError(`Invalid chunking window: size ${chunkSize}, overlap ${overlap}`);
  }

  if (text.length <= chunkSize) {
    return [text];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + chunkSize;

    if (end < text.length) {
      const window = text.slice(start, end);
      for (const delimiter of SENTENCE_DELIMITERS) {
        const lastDelimiter = window.lastIndexOf(delimiter);
        const cut = start + lastDelimiter + delimiter.length;
        if (lastDelimiter > chunkSize * 0.5 && cut - overlap > start) {
          end = cut;
          break;
        }
      }
    }

    chunks.push(text.slice(start, end).trim());

    if (end >= text.length) {
      break;
    }
    start = end - overlap;
  }

  return chunks;
}
