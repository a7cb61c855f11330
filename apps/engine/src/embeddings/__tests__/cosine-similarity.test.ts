import { describe, it, expect } from 'vitest';
import { cosineSimilarity, relevance, normalize, magnitude, euclideanDistance, VectorUtilities } from '../utils.js';

describe('Cosine Similarity - Vector Comparison', () => {
  const utils = new VectorUtilities();

  describe('Basic Mathematical Properties', () => {
    it('should return 1.0 for a vector against itself', () => {
      const vector = [0.5, 0.3, 0.8, 0.1];
      expect(cosineSimilarity(vector, vector)).toBeCloseTo(1.0, 10);
    });

    it('should return exactly 1 for non-unit vectors against themselves', () => {
      for (let k = 1; k <= 500; k++) {
        const vector = [Math.sin(k), Math.cos(3 * k), Math.sin(k * k) * 7, Math.cos(k) + 2];
        expect(cosineSimilarity(vector, vector)).toBe(1);
      }
    });

    it('should stay within [-1, 1]', () => {
      for (let k = 1; k <= 500; k++) {
        const vector = [Math.cos(k) * 1e3, Math.sin(2 * k), 1 / k];
        const scaled = vector.map(component => component * 3.7);
        const negated = vector.map(component => -component);
        expect(cosineSimilarity(vector, scaled)).toBeLessThanOrEqual(1);
        expect(cosineSimilarity(vector, negated)).toBe(-1);
      }
    });

    it('should return -1.0 for a vector against its negation', () => {
      const vector = [0.2, -0.7, 0.3, 0.9];
      const negated = vector.map(component => -component);
      expect(cosineSimilarity(vector, negated)).toBeCloseTo(-1.0, 10);
    });

    it('should return 0.0 for orthogonal vectors', () => {
      expect(cosineSimilarity([1, 0, 0, 0], [0, 1, 0, 0])).toBeCloseTo(0.0, 10);
    });

    it('should be commutative', () => {
      const vectorA = [0.2, 0.7, 0.3, 0.9];
      const vectorB = [0.8, 0.1, 0.6, 0.4];
      expect(cosineSimilarity(vectorA, vectorB)).toBeCloseTo(cosineSimilarity(vectorB, vectorA), 10);
    });

    it('should ignore magnitude', () => {
      expect(cosineSimilarity([3, 4], [6, 8])).toBeCloseTo(1.0, 10);
    });

    it('should match cos(60°) for unit vectors at 60 degrees', () => {
      expect(cosineSimilarity([1, 0], [0.5, Math.sqrt(3) / 2])).toBeCloseTo(0.5, 10);
    });
  });

  describe('Zero vectors', () => {
    it('should return 0 when one vector is zero', () => {
      expect(cosineSimilarity([0, 0, 0, 0], [1, 2, 3, 4])).toBe(0);
    });

    it('should return 0 when both vectors are zero', () => {
      expect(cosineSimilarity([0, 0, 0], [0, 0, 0])).toBe(0);
    });
  });

  describe('Dimension Validation', () => {
    it('should throw error for mismatched dimensions', () => {
      expect(() => cosineSimilarity([1, 2, 3], [1, 2, 3, 4]))
        .toThrow('Vectors must have the same dimensions');
    });

    it('should handle high-dimensional vectors', () => {
      const vector = Array.from({ length: 1000 }, (_, i) => Math.sin(i));
      expect(utils.cosineSimilarity(vector, vector)).toBeCloseTo(1.0, 10);
    });
  });

  describe('Relevance floor', () => {
    it('should floor negative similarity at 0', () => {
      expect(relevance([1, 0], [-1, 0])).toBe(0);
    });

    it('should keep positive similarity unchanged', () => {
      expect(relevance([1, 0], [1, 0])).toBeCloseTo(1.0, 10);
    });
  });

  describe('Euclidean distance', () => {
    it('should measure straight-line distance', () => {
      expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
      expect(euclideanDistance([1, 2, 3], [1, 2, 3])).toBe(0);
    });

    it('should throw error for mismatched dimensions', () => {
      expect(() => euclideanDistance([1], [1, 2])).toThrow('Vectors must have the same dimensions');
    });
  });

  describe('Normalization', () => {
    it('should scale to unit length', () => {
      expect(normalize([3, 4])).toEqual([0.6, 0.8]);
      expect(magnitude(normalize([1, 2, 2]))).toBeCloseTo(1.0, 10);
    });

    it('should return a copy of a zero vector', () => {
      const zero = [0, 0];
      const result = normalize(zero);
      expect(result).toEqual([0, 0]);
      expect(result).not.toBe(zero);
    });
  });
});
