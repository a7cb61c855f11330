import type { EmbeddingVector } from './types.js';

/**
 * Vector math for embedding comparison
 */
export class VectorUtilities {

  /**
   * Cosine similarity in [-1, 1]. Zero-magnitude vectors score 0, and a
   * vector compared with itself scores exactly 1.
   */
  cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
    if (a.length !== b.length) {
      throw new Error('Vectors must have the same dimensions');
    }

    const squaredA = this.dotProduct(a, a);
    const squaredB = this.dotProduct(b, b);

    if (squaredA === 0 || squaredB === 0) {
      return 0;
    }

    // One square root over the product keeps dot(v, v) / sqrt(|v|^4) at 1
    const similarity = this.dotProduct(a, b) / Math.sqrt(squaredA * squaredB);
    return Math.min(1, Math.max(-1, similarity));
  }

  /**
   * Cosine similarity floored at 0, the form surfaced to rankings
   */
  relevance(a: EmbeddingVector, b: EmbeddingVector): number {
    return Math.max(0, this.cosineSimilarity(a, b));
  }

  dotProduct(a: EmbeddingVector, b: EmbeddingVector): number {
    if (a.length !== b.length) {
      throw new Error('Vectors must have the same dimensions');
    }

    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      sum += a[i] * b[i];
    }
    return sum;
  }

  euclideanDistance(a: EmbeddingVector, b: EmbeddingVector): number {
    if (a.length !== b.length) {
      throw new Error('Vectors must have the same dimensions');
    }

    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      const diff = a[i] - b[i];
      sum += diff * diff;
    }
    return Math.sqrt(sum);
  }

  magnitude(vector: EmbeddingVector): number {
    let sum = 0;
    for (const component of vector) {
      sum += component * component;
    }
    return Math.sqrt(sum);
  }

  /**
   * Scale to unit length; a zero vector comes back as a copy
   */
  normalize(vector: EmbeddingVector): EmbeddingVector {
    const mag = this.magnitude(vector);
    if (mag === 0) {
      return vector.slice();
    }
    return vector.map(component => component / mag);
  }
}

export const vectorUtils = new VectorUtilities();

export const cosineSimilarity = (a: EmbeddingVector, b: EmbeddingVector): number => vectorUtils.cosineSimilarity(a, b);
export const relevance = (a: EmbeddingVector, b: EmbeddingVector): number => vectorUtils.relevance(a, b);
export const dotProduct = (a: EmbeddingVector, b: EmbeddingVector): number => vectorUtils.dotProduct(a, b);
export const euclideanDistance = (a: EmbeddingVector, b: EmbeddingVector): number => vectorUtils.euclideanDistance(a, b);
export const magnitude = (vector: EmbeddingVector): number => vectorUtils.magnitude(vector);
export const normalize = (vector: EmbeddingVector): EmbeddingVector => vectorUtils.normalize(vector);
