import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  Taxonomy,
  TaxonomyError,
  loadTaxonomy,
  readSavedTaxonomy,
  saveTaxonomy,
} from './taxonomy.js';
import type { IntentDefinition } from '../types/intent.js';

const INTENTS: IntentDefinition[] = [
  { label: 'order_inquiry', description: 'Order questions', examples: ['order status'], action: 'orders' },
  { label: 'greeting', description: 'Greetings', examples: ['hello'], action: null },
];

describe('Taxonomy', () => {
  it('adds the fallback intent when missing', () => {
    const taxonomy = Taxonomy.from(INTENTS);

    expect(taxonomy.labels).toEqual(['order_inquiry', 'greeting', 'general_inquiry']);
    expect(taxonomy.fallbackIntent).toBe('general_inquiry');
    expect(taxonomy.has('general_inquiry')).toBe(true);
  });

  it('rejects duplicate labels', () => {
    expect(() => Taxonomy.from([...INTENTS, INTENTS[0]])).toThrow(TaxonomyError);
  });

  it('rejects a taxonomy with fewer than two intents', () => {
    expect(() => Taxonomy.from([], 'general_inquiry')).toThrow('at least two intents');
  });

  it('freezes intent definitions', () => {
    const taxonomy = Taxonomy.from(INTENTS);
    const intent = taxonomy.get('greeting');

    expect(Object.isFrozen(intent)).toBe(true);
    expect(Object.isFrozen(intent?.examples)).toBe(true);
  });

  it('describes unknown labels by their name', () => {
    const taxonomy = Taxonomy.from(INTENTS);
    expect(taxonomy.describe('greeting')).toBe('Greetings');
    expect(taxonomy.describe('refund_request')).toBe('refund_request');
  });

  it('withIntent adds a new intent without changing the original', () => {
    const taxonomy = Taxonomy.from(INTENTS);
    const next = taxonomy.withIntent({
      label: 'refund_request',
      description: 'Refunds',
      examples: ['refund my order'],
      action: null,
    });

    expect(next.has('refund_request')).toBe(true);
    expect(taxonomy.has('refund_request')).toBe(false);
  });

  it('withIntent merges examples into an existing intent', () => {
    const next = Taxonomy.from(INTENTS).withIntent({
      label: 'greeting',
      description: 'Salutations',
      examples: ['hello', 'howdy'],
      action: null,
    });

    expect(next.get('greeting')?.examples).toEqual(['hello', 'howdy']);
    expect(next.describe('greeting')).toBe('Salutations');
  });
});

describe('loadTaxonomy', () => {
  it('loads the bundled taxonomy', () => {
    const taxonomy = loadTaxonomy();

    expect(taxonomy.fallbackIntent).toBe('general_inquiry');
    expect(taxonomy.has('inventory_inquiry')).toBe(true);
    expect(taxonomy.has('greeting')).toBe(true);
  });
});

describe('saved taxonomies', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taxonomy-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null when nothing was saved', async () => {
    expect(await readSavedTaxonomy(join(dir, 'taxonomy.json'))).toBeNull();
  });

  it('reads back a saved taxonomy', async () => {
    const path = join(dir, 'taxonomy.json');
    const taxonomy = Taxonomy.from(INTENTS).withIntent({
      label: 'refund_request',
      description: 'Refunds',
      examples: ['i want my money back'],
      action: null,
    });

    await saveTaxonomy(path, taxonomy);
    const loaded = await readSavedTaxonomy(path);

    expect(loaded?.labels).toEqual(['order_inquiry', 'greeting', 'general_inquiry', 'refund_request']);
    expect(loaded?.get('refund_request')?.examples).toEqual(['i want my money back']);
  });

  it('rejects a corrupt file', async () => {
    const path = join(dir, 'taxonomy.json');
    await writeFile(path, '{ not json', 'utf-8');

    await expect(readSavedTaxonomy(path)).rejects.toThrow(TaxonomyError);
  });
});
