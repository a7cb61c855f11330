import type { Embedder, EmbeddingVector } from '../../embeddings/types.js';
import { EmbeddingError } from '../../embeddings/types.js';
import { Song } from '../../songs/song.js';

/**
 * Test embedder with one axis per vocabulary word. Every batch is recorded,
 * and texts listed in `failOnce` make the next batch containing them fail.
 */
export class KeywordEmbedder implements Embedder {
  readonly calls: string[][] = [];
  readonly failOnce = new Set<string>();

  constructor(private vocabulary: string[]) {}

  async embed(texts: string[]): Promise<EmbeddingVector[]> {
    this.calls.push(texts);
    for (const text of texts) {
      if (this.failOnce.delete(text)) {
        throw new EmbeddingError(`Refusing to embed "${text}"`, 'hashing');
      }
    }
    return texts.map(text => this.vectorize(text));
  }

  async embedSingle(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.embed([text]);
    return vector;
  }

  getModel(): string {
    return 'keyword-test';
  }

  getDimensions(): number {
    return this.vocabulary.length;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  private vectorize(text: string): EmbeddingVector {
    const vector = new Array<number>(this.vocabulary.length).fill(0);
    for (const token of text.toLowerCase().match(/\p{L}+/gu) ?? []) {
      const axis = this.vocabulary.indexOf(token);
      if (axis >= 0) {
        vector[axis] += 1;
      }
    }
    return vector;
  }
}

export function makeSong(id: string, lyrics: string, overrides: { title?: string; artist?: string; releaseDate?: string } = {}): Song {
  return new Song({
    id,
    title: overrides.title ?? `Song ${id}`,
    artist: overrides.artist ?? 'Test Artist',
    lyrics,
    releaseDate: overrides.releaseDate
  });
}
