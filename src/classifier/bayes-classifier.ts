/**
 * Wrapper around natural.BayesClassifier for the few-shot layer.
 *
 * Documents are added as pre-tokenized arrays so training and scoring
 * share the stopword list and stemming in `tokenize`. A trained
 * classifier is persisted as its JSON serialization and restored with
 * `natural.BayesClassifier.restore`.
 */

import natural from 'natural';
import type { LabelledText } from '../types/learning.js';
import { tokenize } from './tokenizer.js';

export interface RankedLabel {
  label: string;
  confidence: number;
}

/**
 * Train on the examples whose label is in `labels` and serialize the result.
 * Examples that tokenize to nothing are skipped.
 *
 * @param smoothing - Additive smoothing passed to natural (default: 1)
 * @throws {Error} When no example carries a known label
 */
export function trainBayesClassifier(
  examples: LabelledText[],
  labels: string[],
  smoothing = 1,
): string {
  const known = new Set(labels);
  const classifier = new natural.BayesClassifier(undefined, smoothing);
  let documents = 0;

  for (const example of examples) {
    if (!known.has(example.label)) continue;
    const tokens = tokenize(example.text);
    if (tokens.length === 0) continue;
    classifier.addDocument(tokens, example.label);
    documents++;
  }

  if (documents === 0) {
    throw new Error('No training examples with a known label');
  }

  classifier.train();
  return JSON.stringify(classifier);
}

/**
 * @throws {SyntaxError} When `serialized` is not JSON
 */
export function restoreBayesClassifier(serialized: string): natural.BayesClassifier {
  return natural.BayesClassifier.restore(JSON.parse(serialized));
}

/**
 * Rank `allowedLabels` for `text`. Confidences are the classifier's values
 * re-normalized over the allowed labels (summing to ~1.0), sorted
 * descending. Labels the classifier never saw a document for are absent.
 *
 * @example
 * ```ts
 * rankLabels(classifier, 'show pending orders', new Set(['order_inquiry', 'sales_inquiry']));
 * // => [{ label: 'order_inquiry', confidence: 0.83 }, { label: 'sales_inquiry', confidence: 0.17 }]
 * ```
 */
export function rankLabels(
  classifier: natural.BayesClassifier,
  text: string,
  allowedLabels: ReadonlySet<string>,
): RankedLabel[] {
  const raw = classifier.getClassifications(tokenize(text)) as Array<{
    label: string;
    value: number;
  }>;

  const filtered = raw.filter((r) => allowedLabels.has(r.label));
  if (filtered.length === 0) {
    return [];
  }

  const sum = filtered.reduce((acc, r) => acc + r.value, 0);
  const normalized = filtered.map((r) => ({
    label: r.label,
    confidence: sum > 0 ? r.value / sum : 0,
  }));

  normalized.sort((a, b) => b.confidence - a.confidence);
  return normalized;
}
