/**
 * Model versions: immutable, serializable snapshots of trained parameters.
 */

import { randomBytes } from 'crypto';
import {
  ModelVersionSchema,
  type LabelledText,
  type ModelVersion,
} from '../types/learning.js';
import { trainBayesClassifier } from './bayes-classifier.js';

export interface TrainModelOptions {
  /** Additive smoothing (default: 1) */
  alpha?: number;
  validationScore?: number | null;
  predecessorId?: string | null;
  /** Learned examples carried into the next version's training data */
  trainingSet?: LabelledText[];
  now?: Date;
}

/**
 * Version ids sort by creation time: `nb-20260301T120000123-a1b2`.
 */
export function createVersionId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:.Z]/g, '');
  return `nb-${stamp}-${randomBytes(2).toString('hex')}`;
}

/**
 * Recursively freeze a plain data structure.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Train a new frozen model version over `labels`.
 */
export function trainModel(
  examples: LabelledText[],
  labels: string[],
  options: TrainModelOptions = {},
): ModelVersion {
  const now = options.now ?? new Date();
  const smoothing = options.alpha ?? 1;
  const parameters = { smoothing, classifier: trainBayesClassifier(examples, labels, smoothing) };

  return deepFreeze({
    id: createVersionId(now),
    createdAt: now.toISOString(),
    labels: [...labels],
    parameters,
    validationScore: options.validationScore ?? null,
    predecessorId: options.predecessorId ?? null,
    trainingSet: (options.trainingSet ?? []).map((e) => ({ text: e.text, label: e.label })),
  });
}

/**
 * Validate a deserialized model version and freeze it.
 *
 * @throws {ZodError} When the document does not describe a model version
 */
export function parseModelVersion(raw: unknown): ModelVersion {
  return deepFreeze(ModelVersionSchema.parse(raw));
}
