/**
 * Threshold decisions for the router. Pure functions of a score and the
 * thresholds in effect for the request.
 */

import type { RouterConfig } from '../config/schema.js';

type Thresholds = RouterConfig['thresholds'];

export type FastModelDecision = 'ACCEPT' | 'DISAMBIGUATE' | 'EMBEDDING';
export type EmbeddingDecision = 'ACCEPT' | 'DISAMBIGUATE' | 'LLM_FALLBACK';

/**
 * - confidence >= tHigh: accept
 * - tMid <= confidence < tHigh: ask the user
 * - below tMid: try the embedding layer
 */
export function decideFastModel(confidence: number, thresholds: Thresholds): FastModelDecision {
  if (confidence >= thresholds.tHigh) return 'ACCEPT';
  if (confidence >= thresholds.tMid) return 'DISAMBIGUATE';
  return 'EMBEDDING';
}

/**
 * Same banding over raw similarity, with the embedding thresholds.
 */
export function decideEmbedding(similarity: number, thresholds: Thresholds): EmbeddingDecision {
  if (similarity >= thresholds.embeddingAccept) return 'ACCEPT';
  if (similarity >= thresholds.embeddingMinSimilarity) return 'DISAMBIGUATE';
  return 'LLM_FALLBACK';
}

/** Whether an accepted result is confident enough to learn from. */
export function isConfirmed(confidence: number, thresholds: Thresholds): boolean {
  return confidence >= thresholds.confirmedBand;
}
