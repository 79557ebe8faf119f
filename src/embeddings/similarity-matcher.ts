/**
 * Embedding similarity layer.
 *
 * Each intent is represented by the centroid of its description and example
 * embeddings. Queries are ranked by cosine similarity to the centroids.
 * The centroid index is immutable: a taxonomy change builds a new index and
 * swaps it in, so a query in flight keeps the index it started with.
 */

import type { EmbeddingProvider, EmbeddingVector } from '../types/embeddings.js';
import type { Taxonomy } from '../taxonomy/taxonomy.js';
import type { Normalizer } from '../normalization/normalizer.js';
import { centroid, cosineSimilarity } from './cosine-similarity.js';

// ============================================================================
// Types
// ============================================================================

export interface SimilarityMatcherOptions {
  /** Similarity below which the generic fallback intent is forced (default: 0.7) */
  minSimilarity?: number;
  /** Multiplier applied to the similarity of a forced fallback (default: 0.5) */
  fallbackConfidenceFactor?: number;
}

export interface RankedSimilarity {
  label: string;
  similarity: number;
}

export type SimilarityResult =
  | { status: 'unavailable'; reason: string }
  | {
      status: 'ok';
      intent: string;
      /** Best raw cosine similarity */
      similarity: number;
      confidence: number;
      ranked: RankedSimilarity[];
      /** True when `intent` was forced to the fallback intent */
      belowThreshold: boolean;
    };

interface CentroidIndex {
  readonly fallbackIntent: string;
  readonly centroids: ReadonlyMap<string, EmbeddingVector>;
}

// ============================================================================
// SimilarityMatcher
// ============================================================================

/**
 * @example
 * ```ts
 * const matcher = new SimilarityMatcher(EmbeddingService.getInstance());
 * await matcher.initialize(taxonomy, normalize);
 * const result = await matcher.match('who bought the most last quarter');
 * // => { status: 'ok', intent: 'customer_inquiry', similarity: 0.78, ... }
 * ```
 */
export class SimilarityMatcher {
  private index: CentroidIndex | null = null;
  private generation = 0;

  constructor(private readonly provider: EmbeddingProvider) {}

  isReady(): boolean {
    return this.index !== null;
  }

  get labels(): string[] {
    return this.index ? [...this.index.centroids.keys()] : [];
  }

  /**
   * Build and install a centroid index for `taxonomy`. When two rebuilds
   * overlap, the one started last wins.
   */
  async initialize(taxonomy: Taxonomy, normalize: Normalizer): Promise<void> {
    const generation = ++this.generation;

    const entries: Array<{ label: string; text: string }> = [];
    for (const intent of taxonomy.intents) {
      for (const text of [intent.description, ...intent.examples]) {
        const normalized = normalize(text);
        if (normalized) entries.push({ label: intent.label, text: normalized });
      }
    }

    const texts = entries.map((e) => e.text);
    this.provider.setCorpus(texts);
    const results = await this.provider.embedBatch(texts);

    const grouped = new Map<string, EmbeddingVector[]>();
    entries.forEach((entry, i) => {
      const vectors = grouped.get(entry.label) ?? [];
      vectors.push(results[i].embedding);
      grouped.set(entry.label, vectors);
    });

    const centroids = new Map<string, EmbeddingVector>();
    for (const [label, vectors] of grouped) {
      centroids.set(label, centroid(vectors));
    }

    if (generation === this.generation) {
      this.index = Object.freeze({ fallbackIntent: taxonomy.fallbackIntent, centroids });
    }
  }

  async match(normalized: string, options: SimilarityMatcherOptions = {}): Promise<SimilarityResult> {
    const index = this.index;
    if (!index) {
      return { status: 'unavailable', reason: 'similarity index not built' };
    }
    if (!normalized) {
      return { status: 'unavailable', reason: 'empty query' };
    }

    const minSimilarity = options.minSimilarity ?? 0.7;
    const factor = options.fallbackConfidenceFactor ?? 0.5;

    const { embedding } = await this.provider.embed(normalized);
    if (embedding.every((v) => v === 0)) {
      return { status: 'unavailable', reason: 'query produced an empty embedding' };
    }

    const ranked: RankedSimilarity[] = [];
    for (const [label, vector] of index.centroids) {
      ranked.push({ label, similarity: cosineSimilarity(embedding, vector) });
    }
    ranked.sort((a, b) => b.similarity - a.similarity);

    const best = ranked[0];
    if (!best) {
      return { status: 'unavailable', reason: 'similarity index is empty' };
    }

    const similarity = clamp(best.similarity);
    if (similarity < minSimilarity) {
      return {
        status: 'ok',
        intent: index.fallbackIntent,
        similarity,
        confidence: similarity * factor,
        ranked,
        belowThreshold: true,
      };
    }

    return {
      status: 'ok',
      intent: best.label,
      similarity,
      confidence: similarity,
      ranked,
      belowThreshold: false,
    };
  }
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}
