/**
 * The intent taxonomy: a frozen set of intent definitions plus the generic
 * fallback label. Changing the taxonomy produces a new instance.
 */

import { readFileSync } from 'fs';
import { readFile } from 'fs/promises';
import {
  IntentDefinitionSchema,
  TaxonomyFileSchema,
  type IntentDefinition,
} from '../types/intent.js';
import { writeJsonAtomic } from '../storage/atomic-write.js';

export const DEFAULT_TAXONOMY_PATH = new URL('../../data/taxonomy.json', import.meta.url);

export class TaxonomyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaxonomyError';
  }
}

export class Taxonomy {
  private readonly byLabel: ReadonlyMap<string, IntentDefinition>;

  private constructor(
    readonly intents: readonly IntentDefinition[],
    readonly fallbackIntent: string,
  ) {
    this.byLabel = new Map(intents.map((intent) => [intent.label, intent]));
  }

  /**
   * Build a taxonomy. The fallback intent is added with a generic
   * description when the list does not define it.
   *
   * @throws {TaxonomyError} On duplicate labels or fewer than two intents
   */
  static from(intents: IntentDefinition[], fallbackIntent = 'general_inquiry'): Taxonomy {
    const seen = new Set<string>();
    for (const intent of intents) {
      if (seen.has(intent.label)) {
        throw new TaxonomyError(`Duplicate intent label: ${intent.label}`);
      }
      seen.add(intent.label);
    }

    const all = seen.has(fallbackIntent)
      ? intents
      : [
          ...intents,
          {
            label: fallbackIntent,
            description: 'General question that fits no specific intent',
            examples: [],
            action: null,
          },
        ];

    if (all.length < 2) {
      throw new TaxonomyError('A taxonomy needs at least two intents');
    }

    const frozen = all.map((intent) => {
      const examples = [...intent.examples];
      Object.freeze(examples);
      return Object.freeze({ ...intent, examples });
    });
    return new Taxonomy(Object.freeze(frozen), fallbackIntent);
  }

  get labels(): string[] {
    return this.intents.map((intent) => intent.label);
  }

  get size(): number {
    return this.intents.length;
  }

  has(label: string): boolean {
    return this.byLabel.has(label);
  }

  get(label: string): IntentDefinition | undefined {
    return this.byLabel.get(label);
  }

  /** Description for display; falls back to the label itself. */
  describe(label: string): string {
    return this.byLabel.get(label)?.description ?? label;
  }

  /**
   * Return a taxonomy with `intent` added, or merged into an existing
   * definition (examples are unioned, description and action replaced).
   */
  withIntent(intent: IntentDefinition): Taxonomy {
    const validated = IntentDefinitionSchema.parse(intent);
    const existing = this.byLabel.get(validated.label);
    const merged: IntentDefinition = existing
      ? {
          ...validated,
          examples: [...new Set([...existing.examples, ...validated.examples])],
        }
      : validated;

    const intents = existing
      ? this.intents.map((i) => (i.label === merged.label ? merged : i))
      : [...this.intents, merged];
    return Taxonomy.from(intents, this.fallbackIntent);
  }
}

/**
 * Load the taxonomy from JSON.
 *
 * @throws {TaxonomyError} When the file does not hold a valid taxonomy
 */
export function loadTaxonomy(path: string | URL = DEFAULT_TAXONOMY_PATH): Taxonomy {
  return parseTaxonomy(readFileSync(path, 'utf-8'), String(path));
}

/**
 * Read a taxonomy saved by `saveTaxonomy`. Returns null when the file
 * does not exist.
 *
 * @throws {TaxonomyError} When the file does not hold a valid taxonomy
 */
export async function readSavedTaxonomy(path: string): Promise<Taxonomy | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw err;
  }
  return parseTaxonomy(content, path);
}

/** Persist a taxonomy in the same format as data/taxonomy.json. */
export async function saveTaxonomy(path: string, taxonomy: Taxonomy): Promise<void> {
  await writeJsonAtomic(path, {
    fallbackIntent: taxonomy.fallbackIntent,
    intents: taxonomy.intents,
  });
}

function parseTaxonomy(content: string, source: string): Taxonomy {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new TaxonomyError(`Invalid JSON in taxonomy file: ${source}`);
  }
  const result = TaxonomyFileSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new TaxonomyError(`Invalid taxonomy in ${source}:\n${errors.join('\n')}`);
  }
  return Taxonomy.from(result.data.intents, result.data.fallbackIntent);
}
