import { describe, it, expect } from 'vitest';
import { HashingEmbedder, fnv1a } from '../providers/hashing.js';
import { cosineSimilarity, magnitude } from '../utils.js';

describe('HashingEmbedder', () => {
  it('hashes with 32-bit FNV-1a', () => {
    expect(fnv1a('')).toBe(0x811c9dc5);
    expect(fnv1a('a')).toBe(0xe40c292c);
  });

  it('tokenizes into lower-cased letter runs above the minimum length', () => {
    const embedder = new HashingEmbedder();
    expect(embedder.tokenize('Hello, wörld! a I am')).toEqual(['hello', 'wörld', 'am']);
  });

  it('produces unit vectors of the configured size', async () => {
    const embedder = new HashingEmbedder({ dimensions: 64 });
    const vector = await embedder.embedSingle('tears falling down');

    expect(vector).toHaveLength(64);
    expect(magnitude(vector)).toBeCloseTo(1, 10);
    expect(embedder.getDimensions()).toBe(64);
    expect(embedder.getModel()).toBe('hashing-bow');
  });

  it('is deterministic', async () => {
    const embedder = new HashingEmbedder();
    const [first, second] = await embedder.embed(['broken heart', 'broken heart']);
    expect(first).toEqual(second);
  });

  it('returns a zero vector for text without words', async () => {
    const embedder = new HashingEmbedder({ dimensions: 8 });
    expect(await embedder.embedSingle('1 2 3 !')).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('scores texts with shared words above unrelated texts', async () => {
    const embedder = new HashingEmbedder();
    const [query, related, unrelated] = await embedder.embed([
      'broken heart and tears',
      'tears on a broken road',
      'sunshine over the mountains'
    ]);

    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });

  it('is always available', async () => {
    expect(await new HashingEmbedder().isAvailable()).toBe(true);
  });
});
