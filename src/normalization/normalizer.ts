/**
 * Query normalization.
 *
 * Every layer keys on the normalized form: the cache hashes it, patterns
 * match against it and the classifiers tokenize it. Normalization is pure
 * and never throws.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

// ============================================================================
// Abbreviations
// ============================================================================

const AbbreviationMapSchema = z.record(z.string().min(1), z.string().min(1));

export type AbbreviationMap = ReadonlyMap<string, string>;

/** Location of the bundled abbreviation table. */
export const DEFAULT_ABBREVIATIONS_PATH = new URL('../../data/abbreviations.json', import.meta.url);

/**
 * Load an abbreviation table (token -> expansion) from JSON.
 * Keys are lower-cased so lookups match normalized tokens.
 */
export function loadAbbreviations(path: string | URL = DEFAULT_ABBREVIATIONS_PATH): AbbreviationMap {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const parsed = AbbreviationMapSchema.parse(raw);
  const map = new Map<string, string>();
  for (const [key, value] of Object.entries(parsed)) {
    map.set(key.toLowerCase(), value.toLowerCase());
  }
  return map;
}

// ============================================================================
// Normalizer
// ============================================================================

const APOSTROPHES = /['’`]/g;
const PUNCTUATION = /[^\p{L}\p{N}\s]+/gu;

export type Normalizer = (raw: unknown) => string;

/**
 * Build a normalizer bound to an abbreviation table.
 *
 * @example
 * ```ts
 * const normalize = createNormalizer(new Map([['inv', 'inventory'], ['pls', 'please']]));
 * normalize('  Show me the INV. levels, pls!! ');
 * // => 'show me the inventory levels please'
 * ```
 */
export function createNormalizer(abbreviations: AbbreviationMap = new Map()): Normalizer {
  return (raw: unknown): string => {
    if (typeof raw !== 'string') {
      return '';
    }

    const tokens = raw
      .toLowerCase()
      .replace(APOSTROPHES, '')
      .replace(PUNCTUATION, ' ')
      .split(/\s+/)
      .filter((token) => token.length > 0);

    return tokens
      .map((token) => abbreviations.get(token) ?? token)
      .join(' ');
  };
}

let defaultNormalizer: Normalizer | null = null;

/**
 * Normalize with the bundled abbreviation table (loaded lazily, once).
 */
export function normalize(raw: unknown): string {
  if (!defaultNormalizer) {
    defaultNormalizer = createNormalizer(loadAbbreviations());
  }
  return defaultNormalizer(raw);
}
