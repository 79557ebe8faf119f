/**
 * Labels the large-model fallback named outside the taxonomy, held for
 * review until promoted. Discovered labels are never matched by the fast
 * layers.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { TrainingExampleSchema, type TrainingExample } from '../types/learning.js';
import { writeJsonAtomic } from '../storage/atomic-write.js';
import type { Logger } from '../config/logger.js';

/** Examples kept per discovered label */
const MAX_EXAMPLES = 20;

export const DiscoveredIntentSchema = z.object({
  label: z.string().min(1),
  firstSeen: z.string(),
  lastSeen: z.string(),
  count: z.number().int().nonnegative(),
  examples: z.array(TrainingExampleSchema),
});

export type DiscoveredIntent = z.infer<typeof DiscoveredIntentSchema>;

const DiscoveredFileSchema = z.object({
  version: z.literal(1),
  intents: z.array(DiscoveredIntentSchema),
});

export interface DiscoveredIntentSummary extends DiscoveredIntent {
  /** count has reached the review threshold */
  ready: boolean;
}

export class DiscoveredIntents {
  private entries = new Map<string, DiscoveredIntent>();
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string | undefined,
    private minExamples: number = 3,
    private readonly logger: Logger = console,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  /** Count one sighting of a novel label. Synchronous; persisted behind. */
  record(example: TrainingExample): DiscoveredIntent {
    const existing = this.entries.get(example.label);
    const examples = existing ? existing.examples : [];
    const next: DiscoveredIntent = {
      label: example.label,
      firstSeen: existing?.firstSeen ?? example.timestamp,
      lastSeen: example.timestamp,
      count: (existing?.count ?? 0) + 1,
      examples: examples.some((e) => e.text === example.text)
        ? examples
        : [...examples, example].slice(-MAX_EXAMPLES),
    };
    this.entries.set(example.label, next);
    this.persist();
    return next;
  }

  get(label: string): DiscoveredIntent | undefined {
    return this.entries.get(label);
  }

  /** Every discovered label, most frequent first. */
  list(): DiscoveredIntentSummary[] {
    return [...this.entries.values()]
      .map((entry) => ({ ...entry, ready: entry.count >= this.minExamples }))
      .sort((a, b) => b.count - a.count || a.label.localeCompare(b.label));
  }

  /** Remove a label, returning its record, e.g. once it is promoted. */
  take(label: string): DiscoveredIntent | undefined {
    const entry = this.entries.get(label);
    if (entry) {
      this.entries.delete(label);
      this.persist();
    }
    return entry;
  }

  configure(options: { minExamples?: number }): void {
    if (options.minExamples !== undefined) this.minExamples = options.minExamples;
  }

  async load(): Promise<void> {
    if (!this.filePath) return;

    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return;
      }
      throw err;
    }

    let parsed: z.SafeParseReturnType<unknown, z.infer<typeof DiscoveredFileSchema>>;
    try {
      parsed = DiscoveredFileSchema.safeParse(JSON.parse(content));
    } catch {
      this.logger.warn(`[discovered] Ignoring corrupt discovered intents file: ${this.filePath}`);
      return;
    }
    if (!parsed.success) {
      this.logger.warn(`[discovered] Ignoring invalid discovered intents file: ${this.filePath}`);
      return;
    }

    this.entries = new Map(parsed.data.intents.map((entry) => [entry.label, entry]));
  }

  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private persist(): void {
    const filePath = this.filePath;
    if (!filePath) return;

    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await writeJsonAtomic(filePath, { version: 1, intents: [...this.entries.values()] });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`[discovered] Failed to persist discovered intents: ${message}`);
      }
    });
  }
}
