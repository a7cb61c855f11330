import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { EmbeddingCache, FileCacheStorage, MemoryCacheStorage } from '../cache.js';

const HOUR = 60 * 60 * 1000;

describe('EmbeddingCache', () => {
  let storage: MemoryCacheStorage;
  let cache: EmbeddingCache;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    storage = new MemoryCacheStorage();
    cache = new EmbeddingCache({ storage, expiryHours: 24 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('Expiry', () => {
    it('returns a stored vector, then purges it once expired', async () => {
      await cache.set('k', [1, 2, 3]);
      expect(await cache.get('k')).toEqual([1, 2, 3]);

      vi.setSystemTime(new Date(Date.now() + 25 * HOUR));

      expect(await cache.get('k')).toBeUndefined();
      expect(await cache.size()).toBe(0);
      expect(storage.contents).toBe('{}');
    });

    it('keeps an entry right up to the expiry boundary', async () => {
      await cache.set('k', [0.5]);
      vi.setSystemTime(new Date(Date.now() + 24 * HOUR));

      expect(await cache.get('k')).toEqual([0.5]);
    });

    it('cleanupExpired removes only stale entries and reports the count', async () => {
      await cache.set('old one', [1]);
      vi.setSystemTime(new Date(Date.now() + 20 * HOUR));
      await cache.set('new one', [2]);
      vi.setSystemTime(new Date(Date.now() + 5 * HOUR));

      expect(await cache.cleanupExpired()).toBe(1);
      expect(await cache.size()).toBe(1);
      expect(await cache.get('new one')).toEqual([2]);
    });
  });

  describe('Keys', () => {
    it('shares one entry between texts with the same first 100 characters', async () => {
      const prefix = 'x'.repeat(100);
      await cache.set(`${prefix} first ending`, [1, 1]);

      expect(await cache.get(`${prefix} another ending`)).toEqual([1, 1]);
    });

    it('hashes the prefix with md5', () => {
      expect(EmbeddingCache.keyFor('')).toBe('d41d8cd98f00b204e9800998ecf8427e');
      expect(EmbeddingCache.keyFor('x'.repeat(150))).toBe(EmbeddingCache.keyFor('x'.repeat(100)));
    });

    it('counts the prefix in characters rather than UTF-16 units', () => {
      const lead = 'a'.repeat(99);
      expect(EmbeddingCache.keyFor(`${lead}🎵`)).not.toBe(EmbeddingCache.keyFor(`${lead}🎶`));
      expect(EmbeddingCache.keyFor(`${lead}🎵 tail`)).toBe(EmbeddingCache.keyFor(`${lead}🎵`));
    });
  });

  it('returns copies so callers cannot mutate cached vectors', async () => {
    await cache.set('k', [1, 2]);
    const first = await cache.get('k');
    first?.push(99);

    expect(await cache.get('k')).toEqual([1, 2]);
  });

  it('clear empties the cache and the store', async () => {
    await cache.set('a', [1]);
    await cache.set('b', [2]);
    await cache.clear();

    expect(await cache.size()).toBe(0);
    expect(storage.contents).toBe('{}');
  });

  it('serializes concurrent writers', async () => {
    const texts = Array.from({ length: 10 }, (_, i) => `text number ${i}`);
    await Promise.all(texts.map((text, i) => cache.set(text, [i])));

    expect(await cache.size()).toBe(10);
    expect(await cache.get('text number 7')).toEqual([7]);
  });

  describe('Corrupt state', () => {
    it('starts empty when the stored JSON is malformed', async () => {
      const corrupt = new EmbeddingCache({
        storage: new MemoryCacheStorage('{"abc": {"data": "nope"}}'),
        expiryHours: 24
      });

      expect(await corrupt.size()).toBe(0);
    });

    it('starts empty when the store is not JSON at all', async () => {
      const corrupt = new EmbeddingCache({
        storage: new MemoryCacheStorage('not json {'),
        expiryHours: 24
      });

      expect(await corrupt.get('k')).toBeUndefined();
      await corrupt.set('k', [4]);
      expect(await corrupt.get('k')).toEqual([4]);
    });
  });
});

describe('FileCacheStorage', () => {
  let dir: string;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    dir = await mkdtemp(join(tmpdir(), 'embedding-cache-'));
  });

  afterEach(async () => {
    vi.useRealTimers();
    await rm(dir, { recursive: true, force: true });
  });

  it('persists entries across cache instances', async () => {
    const storage = FileCacheStorage.inDirectory(join(dir, 'nested'));
    await new EmbeddingCache({ storage, expiryHours: 24 }).set('persisted', [0.25, 0.75]);

    const reopened = new EmbeddingCache({ storage, expiryHours: 24 });
    expect(await reopened.get('persisted')).toEqual([0.25, 0.75]);
    expect(storage.filePath).toBe(join(dir, 'nested', 'embeddings_cache.json'));
  });

  it('reads a missing file as an empty cache', async () => {
    const storage = new FileCacheStorage(join(dir, 'missing.json'));
    expect(await storage.read()).toBeUndefined();
  });

  it('recovers from a corrupt file and overwrites it', async () => {
    const filePath = join(dir, 'embeddings_cache.json');
    await writeFile(filePath, '{{{', 'utf-8');
    const cache = new EmbeddingCache({ storage: new FileCacheStorage(filePath), expiryHours: 1 });

    expect(await cache.size()).toBe(0);
    await cache.set('fresh', [1]);

    const saved: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    expect(saved).toEqual({
      [EmbeddingCache.keyFor('fresh')]: { data: [1], timestamp: '2026-03-01T12:00:00.000Z' }
    });
  });
});
