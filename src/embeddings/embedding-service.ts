/**
 * Embedding service over the HeuristicEmbedder.
 *
 * Term weights come from the corpus set by the similarity index (intent
 * descriptions and examples), so a rebuild after a taxonomy change also
 * refreshes the weights.
 */

import type {
  EmbeddingProvider,
  EmbeddingResult,
  EmbeddingServiceConfig,
} from '../types/embeddings.js';
import { HeuristicEmbedder } from './heuristic-embedder.js';

const DEFAULT_DIMENSIONS = 384;

export interface EmbeddingServiceStatus {
  dimensions: number;
  corpusDocuments: number;
  vocabularySize: number;
}

/**
 * Use `getInstance()` for the shared instance or `createFresh()` in tests.
 */
export class EmbeddingService implements EmbeddingProvider {
  private static instance: EmbeddingService | null = null;

  private readonly embedder: HeuristicEmbedder;
  private readonly dimensions: number;

  private constructor(config: EmbeddingServiceConfig = {}) {
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.embedder = new HeuristicEmbedder(this.dimensions);
  }

  static getInstance(config?: EmbeddingServiceConfig): EmbeddingService {
    if (!EmbeddingService.instance) {
      EmbeddingService.instance = new EmbeddingService(config);
    }
    return EmbeddingService.instance;
  }

  static createFresh(config?: EmbeddingServiceConfig): EmbeddingService {
    return new EmbeddingService(config);
  }

  static resetInstance(): void {
    EmbeddingService.instance = null;
  }

  setCorpus(texts: string[]): void {
    this.embedder.reset();
    for (const text of texts) {
      this.embedder.addDocument(text);
    }
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return { embedding: this.embedder.embed(text) };
  }

  /** Embed several texts; results keep the input order. */
  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    return this.embedder.embedBatch(texts).map((embedding) => ({ embedding }));
  }

  getStatus(): EmbeddingServiceStatus {
    return {
      dimensions: this.dimensions,
      corpusDocuments: this.embedder.getDocumentCount(),
      vocabularySize: this.embedder.getVocabularySize(),
    };
  }
}
