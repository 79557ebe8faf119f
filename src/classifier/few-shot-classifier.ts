/**
 * Few-shot classifier layer.
 *
 * Scores normalized text against the model snapshot it is given (or the
 * handle's current one). "Unavailable" is reported separately from a
 * low-confidence ranking so the router can tell them apart.
 */

import { rankLabels, type RankedLabel } from './bayes-classifier.js';
import type { CompiledModel, ModelHandle } from './model-handle.js';

export type FewShotResult =
  | { status: 'unavailable'; reason: string }
  | { status: 'ok'; ranked: RankedLabel[]; modelVersion: string };

export interface FewShotClassifyOptions {
  /** Restrict (and re-normalise) the ranking to these labels */
  allowedLabels?: ReadonlySet<string>;
  /** Snapshot to score with; defaults to the handle's current model */
  model?: CompiledModel | null;
}

export class FewShotClassifier {
  constructor(private readonly handle: ModelHandle) {}

  /** Whether a model is currently published. */
  get isReady(): boolean {
    return this.handle.current() !== null;
  }

  /**
   * @example
   * ```ts
   * const result = classifier.classify('show pending orders');
   * // => { status: 'ok', ranked: [{ label: 'order_inquiry', confidence: 0.91 }, ...], modelVersion: 'nb-...' }
   * ```
   */
  classify(text: string, options: FewShotClassifyOptions = {}): FewShotResult {
    const model = options.model === undefined ? this.handle.current() : options.model;
    if (!model) {
      return {
        status: 'unavailable',
        reason: this.handle.unavailableReason ?? 'no model available',
      };
    }

    const labels = options.allowedLabels
      ? new Set(model.version.labels.filter((label) => options.allowedLabels?.has(label)))
      : model.labels;

    const ranked = labels.size > 0 ? rankLabels(model.classifier, text, labels) : [];
    if (ranked.length === 0) {
      return { status: 'unavailable', reason: 'model knows none of the allowed labels' };
    }

    return { status: 'ok', ranked, modelVersion: model.version.id };
  }
}
