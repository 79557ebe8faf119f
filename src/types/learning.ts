/**
 * Type definitions for the online-learning loop: training examples,
 * model parameters and persisted model versions.
 */

import { z } from 'zod';

// ============================================================================
// Training Examples
// ============================================================================

/**
 * Where a training example came from.
 *
 * - user-confirmed: a result accepted at or above the confirmed band
 * - disambiguation-selected: a user picked an option from a prompt
 * - llm-inferred: the large-model fallback named the intent
 */
export const ProvenanceSchema = z.enum([
  'user-confirmed',
  'disambiguation-selected',
  'llm-inferred',
]);

export type Provenance = z.infer<typeof ProvenanceSchema>;

export const TrainingExampleSchema = z.object({
  text: z.string().min(1),
  label: z.string().min(1),
  provenance: ProvenanceSchema,
  timestamp: z.string(),
});

export type TrainingExample = z.infer<typeof TrainingExampleSchema>;

/** Minimal labelled text used by the trainer and evaluator */
export const LabelledTextSchema = z.object({
  text: z.string().min(1),
  label: z.string().min(1),
});

export type LabelledText = z.infer<typeof LabelledTextSchema>;

// ============================================================================
// Model Parameters
// ============================================================================

function isSerializedClassifier(value: string): boolean {
  try {
    const parsed: unknown = JSON.parse(value);
    return typeof parsed === 'object' && parsed !== null && 'classifier' in parsed && 'features' in parsed;
  } catch {
    return false;
  }
}

/**
 * A trained natural.BayesClassifier, stored as its JSON serialization.
 */
export const BayesParametersSchema = z.object({
  smoothing: z.number().positive(),
  classifier: z.string().refine(isSerializedClassifier, 'not a serialized Bayes classifier'),
});

export type BayesParameters = z.infer<typeof BayesParametersSchema>;

// ============================================================================
// Model Version
// ============================================================================

export const ModelVersionSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
  /** Label mapping: every label the model can predict */
  labels: z.array(z.string().min(1)).min(1),
  parameters: BayesParametersSchema,
  /** Holdout accuracy at publish time; null for bootstrap models */
  validationScore: z.number().min(0).max(1).nullable(),
  predecessorId: z.string().nullable(),
  /** Learned examples accumulated across versions (taxonomy utterances excluded) */
  trainingSet: z.array(LabelledTextSchema),
});

export type ModelVersion = z.infer<typeof ModelVersionSchema>;

/** Listing entry for the registry; omits parameters and training data */
export interface ModelVersionSummary {
  id: string;
  createdAt: string;
  labels: string[];
  validationScore: number | null;
  predecessorId: string | null;
  trainingSetSize: number;
  active: boolean;
}
