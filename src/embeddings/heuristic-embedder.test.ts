import { describe, it, expect, beforeEach } from 'vitest';
import { HeuristicEmbedder } from './heuristic-embedder.js';
import { cosineSimilarity } from './cosine-similarity.js';

function magnitude(vector: number[]): number {
  return Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
}

describe('HeuristicEmbedder', () => {
  let embedder: HeuristicEmbedder;

  beforeEach(() => {
    embedder = new HeuristicEmbedder();
  });

  it('is deterministic across calls and instances', () => {
    const text = 'show pending orders for today';
    expect(embedder.embed(text)).toEqual(embedder.embed(text));
    expect(new HeuristicEmbedder().embed(text)).toEqual(embedder.embed(text));
  });

  it('uses the requested dimension', () => {
    expect(embedder.embed('sales report')).toHaveLength(384);
    expect(new HeuristicEmbedder(64).embed('sales report')).toHaveLength(64);
  });

  it('produces L2-normalised vectors', () => {
    expect(magnitude(embedder.embed('monthly revenue by product category'))).toBeCloseTo(1, 5);
  });

  it('returns a zero vector when no token survives filtering', () => {
    expect(embedder.embed('').every((v) => v === 0)).toBe(true);
    expect(embedder.embed('  \t ').every((v) => v === 0)).toBe(true);
    expect(embedder.embed('a to be').every((v) => v === 0)).toBe(true);
  });

  it('scores reordered text as similar and unrelated text as dissimilar', () => {
    const a = embedder.embed('top customers by revenue');
    const b = embedder.embed('revenue by top customers');
    const c = embedder.embed('italian pasta cooking recipes');

    expect(cosineSimilarity(a, b)).toBeGreaterThan(0.5);
    expect(cosineSimilarity(a, c)).toBeLessThan(0.3);
  });

  it('matches inflected forms through stemming', () => {
    expect(embedder.embed('orders')).toEqual(embedder.embed('order'));
  });

  it('tracks the IDF corpus', () => {
    embedder.addDocument('pending orders today');
    embedder.addDocument('orders shipped');

    expect(embedder.getDocumentCount()).toBe(2);
    expect(embedder.getVocabularySize()).toBe(4);

    embedder.reset();
    expect(embedder.getDocumentCount()).toBe(0);
    expect(embedder.getVocabularySize()).toBe(0);
  });

  it('embeds batches element-wise', () => {
    const batch = embedder.embedBatch(['sales report', 'order status']);
    expect(batch).toEqual([embedder.embed('sales report'), embedder.embed('order status')]);
  });
});
