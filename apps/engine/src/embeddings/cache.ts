/**
 * Embedding Cache
 *
 * Memoizes embeddings keyed by an md5 hash of the first 100 characters of
 * the text. Two texts sharing that prefix share one entry. Entries older
 * than `expiryHours` are treated as absent and removed on lookup.
 * Every operation runs under one exclusive lock.
 */

import { createHash } from 'crypto';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { z } from 'zod';
import { logger } from '../config/index.js';
import { ExclusiveLock } from '../utils/lock.js';
import type { EmbeddingVector } from './types.js';

export const CACHE_KEY_PREFIX_LENGTH = 100;

const cacheEntrySchema = z.object({
  data: z.array(z.number()),
  timestamp: z.string().datetime({ offset: true }),
});

const cacheFileSchema = z.record(cacheEntrySchema);

export type EmbeddingCacheEntry = z.infer<typeof cacheEntrySchema>;
type CacheContents = Record<string, EmbeddingCacheEntry>;

/**
 * Where cache contents live between processes
 */
export interface CacheStorage {
  read(): Promise<string | undefined>;
  write(contents: string): Promise<void>;
}

export class FileCacheStorage implements CacheStorage {
  constructor(readonly filePath: string) {}

  static inDirectory(cacheDir: string, fileName: string = 'embeddings_cache.json'): FileCacheStorage {
    return new FileCacheStorage(join(cacheDir, fileName));
  }

  async read(): Promise<string | undefined> {
    try {
      return await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  async write(contents: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, contents, 'utf-8');
  }
}

export class MemoryCacheStorage implements CacheStorage {
  constructor(public contents?: string) {}

  async read(): Promise<string | undefined> {
    return this.contents;
  }

  async write(contents: string): Promise<void> {
    this.contents = contents;
  }
}

export interface EmbeddingCacheOptions {
  storage: CacheStorage;
  expiryHours: number;
}

export class EmbeddingCache {
  private entries: CacheContents = {};
  private loaded = false;
  private lock = new ExclusiveLock();
  private storage: CacheStorage;
  private expiryMs: number;

  constructor(options: EmbeddingCacheOptions) {
    this.storage = options.storage;
    this.expiryMs = options.expiryHours * 60 * 60 * 1000;
  }

  // Prefix counted in code points so a surrogate pair is never split
  static keyFor(text: string): string {
    const prefix = Array.from(text).slice(0, CACHE_KEY_PREFIX_LENGTH).join('');
    return createHash('md5').update(prefix).digest('hex');
  }

  async get(text: string): Promise<EmbeddingVector | undefined> {
    return this.lock.runExclusive(async () => {
      await this.ensureLoaded();
      const key = EmbeddingCache.keyFor(text);
      const entry = this.entries[key];

      if (!entry) {
        return undefined;
      }

      if (this.isExpired(entry)) {
        delete this.entries[key];
        await this.persist();
        return undefined;
      }

      return entry.data.slice();
    });
  }

  async set(text: string, vector: EmbeddingVector): Promise<void> {
    await this.lock.runExclusive(async () => {
      await this.ensureLoaded();
      this.entries[EmbeddingCache.keyFor(text)] = {
        data: vector.slice(),
        timestamp: new Date().toISOString(),
      };
      await this.persist();
    });
  }

  async clear(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.entries = {};
      this.loaded = true;
      await this.persist();
    });
  }

  /**
   * Remove every expired entry now, returning how many were removed
   */
  async cleanupExpired(): Promise<number> {
    return this.lock.runExclusive(async () => {
      await this.ensureLoaded();
      const expiredKeys = Object.keys(this.entries).filter(key => this.isExpired(this.entries[key]));

      for (const key of expiredKeys) {
        delete this.entries[key];
      }
      if (expiredKeys.length > 0) {
        await this.persist();
      }

      logger.debug({ removed: expiredKeys.length }, 'Expired embeddings removed');
      return expiredKeys.length;
    });
  }

  async size(): Promise<number> {
    return this.lock.runExclusive(async () => {
      await this.ensureLoaded();
      return Object.keys(this.entries).length;
    });
  }

  private isExpired(entry: EmbeddingCacheEntry): boolean {
    return Date.now() - Date.parse(entry.timestamp) > this.expiryMs;
  }

  /**
   * Unreadable or malformed contents start an empty cache
   */
  private async ensureLoaded(): Promise<void> {
    if (this.loaded) {
      return;
    }
    this.loaded = true;

    let raw: string | undefined;
    try {
      raw = await this.storage.read();
    } catch (error) {
      logger.warn({ error }, 'Embedding cache unreadable, starting empty');
      return;
    }
    if (raw === undefined) {
      return;
    }

    try {
      const parsed = cacheFileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        this.entries = parsed.data;
      } else {
        logger.warn({ issues: parsed.error.issues.length }, 'Embedding cache malformed, starting empty');
      }
    } catch (error) {
      logger.warn({ error }, 'Embedding cache is not valid JSON, starting empty');
    }
  }

  private async persist(): Promise<void> {
    try {
      await this.storage.write(JSON.stringify(this.entries));
    } catch (error) {
      logger.warn({ error }, 'Unable to save embedding cache');
    }
  }
}
