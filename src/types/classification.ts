/**
 * Type definitions for classification requests, results and responses.
 */

import { z } from 'zod';

// ============================================================================
// Method
// ============================================================================

/**
 * How a result was produced.
 *
 * `user-resolved` marks the answer to a disambiguation prompt.
 */
export const ClassificationMethodSchema = z.enum([
  'cache',
  'pattern',
  'fast-model',
  'embedding',
  'llm',
  'user-resolved',
]);

export type ClassificationMethod = z.infer<typeof ClassificationMethodSchema>;

// ============================================================================
// Request / Result
// ============================================================================

export interface ClassificationRequest {
  /** Raw user text */
  text: string;
  /** Tenant or shop scope; results are cached per tenant */
  tenant?: string;
}

/** Immutable classification result. */
export interface ClassificationResult {
  readonly intent: string;
  readonly confidence: number;
  readonly method: ClassificationMethod;
  /** For cache hits, the method that originally produced the result */
  readonly source?: ClassificationMethod;
  readonly latencyMs: number;
  readonly timestamp: string;
  /** Model version active when the result was computed */
  readonly modelVersion: string | null;
  readonly lowCertainty: boolean;
  /** True when the label is not (yet) part of the taxonomy */
  readonly novel: boolean;
}

// ============================================================================
// Response (external interface)
// ============================================================================

export interface DisambiguationOption {
  /** 1-based option id, as a string ("1", "2", ...) */
  id: string;
  label: string;
  description: string;
  confidence: number;
}

export interface ClassifyResponse extends ClassificationResult {
  needsClarification: boolean;
  options?: DisambiguationOption[];
  sessionId?: string;
  question?: string;
}

export interface ResolveRequest {
  sessionId: string;
  /** Selected option id; omitted when the user did not answer */
  optionId?: string;
}
