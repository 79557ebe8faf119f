import type { EmbeddingVector } from '../types/embeddings.js';

/**
 * Cosine similarity in [-1, 1]. Zero vectors compare as 0 rather than NaN.
 *
 * @throws Error if either vector is empty or the lengths differ
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length === 0 || b.length === 0) {
    throw new Error('Vectors must not be empty');
  }
  if (a.length !== b.length) {
    throw new Error(`Vectors must have same length: got ${a.length} and ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  return magnitude === 0 ? 0 : dot / magnitude;
}

/**
 * Element-wise mean of equal-length vectors, L2-normalised.
 * Used to build per-intent centroids.
 *
 * @throws Error if `vectors` is empty or the lengths differ
 */
export function centroid(vectors: EmbeddingVector[]): EmbeddingVector {
  if (vectors.length === 0) {
    throw new Error('Cannot compute the centroid of no vectors');
  }
  const dim = vectors[0].length;
  const sum = new Array<number>(dim).fill(0);
  for (const vector of vectors) {
    if (vector.length !== dim) {
      throw new Error(`Vectors must have same length: got ${dim} and ${vector.length}`);
    }
    for (let i = 0; i < dim; i++) {
      sum[i] += vector[i];
    }
  }
  return l2Normalize(sum.map((v) => v / vectors.length));
}

export function l2Normalize(vector: EmbeddingVector): EmbeddingVector {
  const norm = Math.sqrt(vector.reduce((acc, v) => acc + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}
