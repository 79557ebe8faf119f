/**
 * Type definitions for the embedding layer.
 *
 * Embeddings are hashed TF-IDF vectors compared by cosine similarity.
 */

/**
 * Embedding vector, L2-normalised. Plain number array so it serializes to JSON.
 */
export type EmbeddingVector = number[];

export interface EmbeddingServiceConfig {
  /** Vector length (default: 384) */
  dimensions?: number;
}

export interface EmbeddingResult {
  embedding: EmbeddingVector;
}

/**
 * What the similarity matcher needs from an embedder. EmbeddingService
 * implements it; tests substitute a fake.
 */
export interface EmbeddingProvider {
  /** Replace the corpus term weights are computed from. */
  setCorpus(texts: string[]): void;
  embed(text: string): Promise<EmbeddingResult>;
  embedBatch(texts: string[]): Promise<EmbeddingResult[]>;
}
