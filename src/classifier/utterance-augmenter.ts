/**
 * Training utterance generation from intent definitions.
 *
 * Produces the canonical examples plus phrases derived from the
 * description, the label and verb-synonym variations, so an intent with
 * only a handful of examples still has enough text to train on.
 */

import type { IntentDefinition } from '../types/intent.js';

/**
 * Verb synonym mappings for generating training variations.
 */
const VERB_SYNONYMS: Record<string, string[]> = {
  show: ['display', 'list'],
  list: ['show', 'display'],
  get: ['fetch', 'pull'],
  check: ['verify', 'review'],
  analyze: ['examine', 'break down'],
  find: ['look up', 'search'],
  compare: ['contrast', 'benchmark'],
  track: ['monitor', 'follow'],
};

/** Label suffixes that name the kind of request rather than its subject. */
const LABEL_SUFFIXES = new Set(['inquiry', 'request', 'question']);

/** Upper bound on generated (non-example) utterances per intent. */
const MAX_GENERATED = 6;

/**
 * Generate training utterances for an intent: every canonical example,
 * then up to six generated phrases. Lowercased, trimmed and de-duplicated.
 *
 * @example
 * ```ts
 * augmentUtterances({ label: 'order_inquiry', description: 'Questions about orders', examples: ['show orders'], action: null });
 * // => ['show orders', 'questions about orders', 'order', 'show order', 'order details', 'display orders', 'list orders']
 * ```
 */
export function augmentUtterances(intent: IntentDefinition): string[] {
  const generated: string[] = [
    intent.description,
    ...generateLabelPhrases(intent.label),
    ...intent.examples.flatMap(generateSynonymVariations),
  ];

  const seen = new Set<string>();
  const examples = dedupe(intent.examples, seen);
  const extra = dedupe(generated, seen).slice(0, MAX_GENERATED);
  return [...examples, ...extra];
}

function dedupe(utterances: string[], seen: Set<string>): string[] {
  const out: string[] = [];
  for (const raw of utterances) {
    const u = raw.toLowerCase().trim();
    if (u.length === 0 || seen.has(u)) continue;
    seen.add(u);
    out.push(u);
  }
  return out;
}

/**
 * Subject phrases from a request-style label:
 *   "order_inquiry" -> "order", "show order", "order details"
 * Labels without a request suffix ("greeting") yield nothing.
 */
function generateLabelPhrases(label: string): string[] {
  const parts = label.split('_');
  const last = parts[parts.length - 1];
  if (parts.length < 2 || last === undefined || !LABEL_SUFFIXES.has(last)) {
    return [];
  }
  const subject = parts.slice(0, -1).join(' ');
  return [subject, `show ${subject}`, `${subject} details`];
}

/**
 * Replace the first known verb of an example with its synonyms.
 */
function generateSynonymVariations(example: string): string[] {
  const lower = example.toLowerCase();
  for (const [verb, synonyms] of Object.entries(VERB_SYNONYMS)) {
    const regex = new RegExp(`\\b${verb}\\b`);
    if (regex.test(lower)) {
      return synonyms.map((synonym) => lower.replace(regex, synonym));
    }
  }
  return [];
}
