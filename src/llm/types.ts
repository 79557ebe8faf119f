import type { Taxonomy } from '../taxonomy/taxonomy.js';

/** Answer from the large-model fallback. */
export interface LlmClassification {
  /** snake_case intent label; may be outside the taxonomy */
  label: string;
  /** True when `label` is not part of the taxonomy */
  novel: boolean;
  confidence: number;
  reasoning: string;
}

/**
 * Large-model intent classifier. Implementations return null rather than
 * throw when unconfigured, on API or parse errors, and when aborted.
 */
export interface LlmIntentClassifier {
  isAvailable(): boolean;
  classify(
    normalized: string,
    taxonomy: Taxonomy,
    signal?: AbortSignal,
  ): Promise<LlmClassification | null>;
}
