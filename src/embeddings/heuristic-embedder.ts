/**
 * Hashed TF-IDF embedder behind the similarity layer.
 *
 * Stemmed tokens are feature-hashed into a fixed number of signed buckets
 * and weighted by term frequency, times inverse document frequency once a
 * corpus has been added. Output is L2-normalised and deterministic.
 */

import natural from 'natural';
import type { EmbeddingVector } from '../types/embeddings.js';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/** 32-bit FNV-1a hash. */
function fnv1a(text: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class HeuristicEmbedder {
  private documentFrequency = new Map<string, number>();
  private documentCount = 0;

  constructor(private readonly dimension: number = 384) {}

  /**
   * Words of three or more characters, lower-cased and stemmed.
   */
  private tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter((word) => word.length > 2)
      .map((word) => natural.PorterStemmer.stem(word));
  }

  /** Add a document to the IDF corpus. */
  addDocument(text: string): void {
    const unique = new Set(this.tokenize(text));
    for (const token of unique) {
      this.documentFrequency.set(token, (this.documentFrequency.get(token) ?? 0) + 1);
    }
    this.documentCount++;
  }

  getDocumentCount(): number {
    return this.documentCount;
  }

  getVocabularySize(): number {
    return this.documentFrequency.size;
  }

  reset(): void {
    this.documentFrequency.clear();
    this.documentCount = 0;
  }

  embed(text: string): EmbeddingVector {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = this.tokenize(text);
    if (tokens.length === 0) {
      return vector;
    }

    const termFrequency = new Map<string, number>();
    for (const token of tokens) {
      termFrequency.set(token, (termFrequency.get(token) ?? 0) + 1);
    }

    for (const [token, count] of termFrequency) {
      const hash = fnv1a(token);
      const bucket = hash % this.dimension;
      const sign = (hash & 0x80000000) === 0 ? 1 : -1;
      vector[bucket] += sign * (count / tokens.length) * this.idf(token);
    }

    const norm = Math.sqrt(vector.reduce((acc, v) => acc + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }

  embedBatch(texts: string[]): EmbeddingVector[] {
    return texts.map((text) => this.embed(text));
  }

  /** Smoothed IDF; 1 for every token until a corpus exists. */
  private idf(token: string): number {
    if (this.documentCount === 0) {
      return 1;
    }
    const df = this.documentFrequency.get(token) ?? 0;
    return Math.log((this.documentCount + 1) / (df + 1)) + 1;
  }
}
