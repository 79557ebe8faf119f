/**
 * Embedding infrastructure for the similarity layer.
 */

export { cosineSimilarity, centroid, l2Normalize } from './cosine-similarity.js';
export { HeuristicEmbedder } from './heuristic-embedder.js';
export { EmbeddingService, type EmbeddingServiceStatus } from './embedding-service.js';
export {
  SimilarityMatcher,
  type SimilarityResult,
  type SimilarityMatcherOptions,
} from './similarity-matcher.js';

export type {
  EmbeddingVector,
  EmbeddingServiceConfig,
  EmbeddingProvider,
  EmbeddingResult,
} from '../types/embeddings.js';
