/**
 * Ratcliff/Obershelp similarity between two strings.
 * Used by the verse searcher's fuzzy mode.
 */

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const char = b[j];
    const list = positions.get(char);
    if (list) {
      list.push(j);
    } else {
      positions.set(char, [j]);
    }
  }
  return positions;
}

/**
 * Longest common block within a[aLo:aHi] and b[bLo:bHi].
 * Ties resolve to the block starting earliest in `a`, then earliest in `b`.
 */
function findLongestMatch(
  a: string,
  bPositions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  let runLengths = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const nextRunLengths = new Map<number, number>();
    for (const j of bPositions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const size = (runLengths.get(j - 1) ?? 0) + 1;
      nextRunLengths.set(j, size);
      if (size > best.size) {
        best = { aStart: i - size + 1, bStart: j - size + 1, size };
      }
    }
    runLengths = nextRunLengths;
  }

  return best;
}

/**
 * Total number of characters in the matching blocks of `a` and `b`.
 */
export function countMatchingCharacters(a: string, b: string): number {
  const bPositions = indexPositions(b);
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const block = findLongestMatch(a, bPositions, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    matched += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      pending.push([aLo, block.aStart, bLo, block.bStart]);
    }
    if (block.aStart + block.size < aHi && block.bStart + block.size < bHi) {
      pending.push([block.aStart + block.size, aHi, block.bStart + block.size, bHi]);
    }
  }

  return matched;
}

/**
 * Similarity ratio in [0, 1]: `2 * M / (|a| + |b|)`, where M is the number
 * of matching characters. Two empty strings are identical.
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1.0;
  }
  return (2 * countMatchingCharacters(a, b)) / total;
}
