/**
 * Hashing Embedder
 *
 * Deterministic bag-of-words vectors built with the hashing trick: each
 * lower-cased word is hashed (FNV-1a, 32 bit) to one dimension and counted.
 * Texts that share words point in similar directions. Needs no model or
 * network access, so it serves offline runs and tests.
 */

import { logger } from '../../config/index.js';
import { normalize } from '../utils.js';
import type { Embedder, EmbeddingVector, HashingEmbedderConfig } from '../types.js';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function fnv1a(text: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class HashingEmbedder implements Embedder {
  private config: Required<HashingEmbedderConfig>;

  constructor(config?: Partial<HashingEmbedderConfig>) {
    this.config = {
      model: 'hashing-bow',
      dimensions: 384,
      batchSize: 256,
      minTokenLength: 2,
      ...config
    };

    logger.debug({
      model: this.config.model,
      dimensions: this.config.dimensions
    }, 'Hashing embedder initialized');
  }

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    return texts.map(text => this.vectorize(text));
  }

  async embedSingle(text: string): Promise<EmbeddingVector> {
    return this.vectorize(text);
  }

  getModel(): string {
    return this.config.model;
  }

  getDimensions(): number {
    return this.config.dimensions;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  tokenize(text: string): string[] {
    return (text.toLowerCase().match(/\p{L}+/gu) ?? [])
      .filter(token => token.length >= this.config.minTokenLength);
  }

  private vectorize(text: string): EmbeddingVector {
    const vector = new Array<number>(this.config.dimensions).fill(0);
    for (const token of this.tokenize(text)) {
      vector[fnv1a(token) % this.config.dimensions] += 1;
    }
    return normalize(vector);
  }
}
