/**
 * Held-out evaluation of a model: accuracy, top-3 accuracy, per-class
 * accuracy and a confusion matrix (actual -> predicted -> count).
 */

import type { LabelledText } from '../types/learning.js';
import { rankLabels } from './bayes-classifier.js';
import type { CompiledModel } from './model-handle.js';

export interface EvaluationReport {
  total: number;
  accuracy: number;
  top3Accuracy: number;
  perClass: Record<string, { accuracy: number; support: number }>;
  confusion: Record<string, Record<string, number>>;
}

export type ModelEvaluator = (model: CompiledModel, examples: LabelledText[]) => EvaluationReport;

export const evaluateModel: ModelEvaluator = (model, examples) => {
  const confusion: Record<string, Record<string, number>> = Object.create(null);
  const counts = new Map<string, { correct: number; total: number }>();
  let correct = 0;
  let correctTop3 = 0;

  for (const example of examples) {
    const ranked = rankLabels(model.classifier, example.text, model.labels);
    const predicted = ranked[0]?.label ?? '';

    const row: Record<string, number> = confusion[example.label] ?? Object.create(null);
    row[predicted] = (row[predicted] ?? 0) + 1;
    confusion[example.label] = row;

    const classCounts = counts.get(example.label) ?? { correct: 0, total: 0 };
    classCounts.total++;
    if (predicted === example.label) {
      correct++;
      classCounts.correct++;
    }
    counts.set(example.label, classCounts);

    if (ranked.slice(0, 3).some((r) => r.label === example.label)) {
      correctTop3++;
    }
  }

  const perClass: EvaluationReport['perClass'] = Object.create(null);
  for (const [label, c] of counts) {
    perClass[label] = { accuracy: c.total ? c.correct / c.total : 0, support: c.total };
  }

  const total = examples.length;
  return {
    total,
    accuracy: total ? correct / total : 0,
    top3Accuracy: total ? correctTop3 / total : 0,
    perClass,
    confusion,
  };
};
