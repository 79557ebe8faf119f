/**
 * Learning buffer: a bounded, de-duplicated queue of training examples
 * waiting for the next retrain.
 *
 * Mutations are synchronous so the engine can append inside its commit
 * step; persistence runs behind them on a serialized write queue.
 */

import { EventEmitter } from 'events';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import { TrainingExampleSchema, type TrainingExample } from '../types/learning.js';
import { writeJsonAtomic } from '../storage/atomic-write.js';
import type { Logger } from '../config/logger.js';

const BufferFileSchema = z.object({
  version: z.literal(1),
  examples: z.array(TrainingExampleSchema),
});

export interface LearningBufferOptions {
  /** JSON file backing the buffer; omit for an in-memory buffer */
  filePath?: string;
  /** Size at which `threshold` is emitted (default: 50) */
  threshold?: number;
  /** Maximum examples held; oldest dropped first (default: 1000) */
  capacity?: number;
  logger?: Logger;
}

function exampleKey(example: Pick<TrainingExample, 'text' | 'label'>): string {
  return `${example.label}\u0000${example.text}`;
}

/**
 * Events:
 * - `threshold` (size: number): the buffer reached the retrain threshold.
 *   Emitted once per fill; `drain()` re-arms it.
 */
export class LearningBuffer extends EventEmitter {
  private examples: TrainingExample[] = [];
  private keys = new Set<string>();
  private armed = true;
  private threshold: number;
  private capacity: number;
  private readonly filePath: string | undefined;
  private readonly logger: Logger;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: LearningBufferOptions = {}) {
    super();
    this.filePath = options.filePath;
    this.threshold = options.threshold ?? 50;
    this.capacity = options.capacity ?? 1000;
    this.logger = options.logger ?? console;
  }

  get size(): number {
    return this.examples.length;
  }

  get retrainThreshold(): number {
    return this.threshold;
  }

  isAtThreshold(): boolean {
    return this.examples.length >= this.threshold;
  }

  /**
   * Add an example. Returns false when the same (text, label) pair is
   * already buffered.
   */
  append(example: TrainingExample): boolean {
    const key = exampleKey(example);
    if (this.keys.has(key)) {
      return false;
    }

    this.examples.push(example);
    this.keys.add(key);
    this.enforceCapacity();
    this.persist();

    if (this.armed && this.isAtThreshold()) {
      this.armed = false;
      this.emit('threshold', this.examples.length);
    }
    return true;
  }

  snapshot(): readonly TrainingExample[] {
    return [...this.examples];
  }

  /** Remove and return every buffered example, oldest first. */
  drain(): TrainingExample[] {
    const drained = this.examples;
    this.examples = [];
    this.keys.clear();
    this.armed = true;
    this.persist();
    return drained;
  }

  /**
   * Put examples back at the front, e.g. after a failed retrain.
   * Pairs appended since the drain keep their newer copy.
   */
  restore(examples: readonly TrainingExample[]): void {
    const restored = examples.filter((e) => !this.keys.has(exampleKey(e)));
    for (const example of restored) {
      this.keys.add(exampleKey(example));
    }
    this.examples = [...restored, ...this.examples];
    this.enforceCapacity();
    this.persist();
  }

  configure(options: { threshold?: number; capacity?: number }): void {
    if (options.threshold !== undefined) this.threshold = options.threshold;
    if (options.capacity !== undefined) {
      this.capacity = options.capacity;
      if (this.enforceCapacity()) this.persist();
    }
  }

  /**
   * Load persisted examples, replacing the in-memory contents.
   * A missing file leaves the buffer empty; a corrupt one is logged and ignored.
   */
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

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      this.logger.warn(`[buffer] Ignoring corrupt learning buffer: ${this.filePath}`);
      return;
    }
    const parsed = BufferFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`[buffer] Ignoring invalid learning buffer: ${this.filePath}`);
      return;
    }

    this.examples = [];
    this.keys.clear();
    for (const example of parsed.data.examples) {
      const key = exampleKey(example);
      if (this.keys.has(key)) continue;
      this.keys.add(key);
      this.examples.push(example);
    }
    this.enforceCapacity();
  }

  /** Resolves once every queued write has reached disk. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  /** Drop the oldest examples beyond capacity; true when any were dropped. */
  private enforceCapacity(): boolean {
    const overflow = this.examples.length - this.capacity;
    if (overflow <= 0) return false;

    for (const dropped of this.examples.splice(0, overflow)) {
      this.keys.delete(exampleKey(dropped));
    }
    return true;
  }

  private persist(): void {
    const filePath = this.filePath;
    if (!filePath) return;

    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await writeJsonAtomic(filePath, { version: 1, examples: this.examples });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`[buffer] Failed to persist learning buffer: ${message}`);
      }
    });
  }
}
