/**
 * Background trainer: turns the learning buffer into new model versions
 * off the request path.
 *
 * A run drains the buffer, merges it with the active version's training
 * set and the taxonomy's augmented utterances, trains a candidate on a
 * deterministic split, and publishes that candidate only if its holdout
 * accuracy passes the gate. Automatic runs are spaced at least
 * `minRetrainIntervalMs` apart. Failed runs put the examples back and back
 * off; repeated failures pause automatic retraining until a manual run
 * succeeds or `resume()` is called.
 */

import { EventEmitter } from 'events';
import { createHash } from 'crypto';
import type { LabelledText, ModelVersion, TrainingExample } from '../types/learning.js';
import type { RouterConfig } from '../config/schema.js';
import type { Logger } from '../config/logger.js';
import type { Normalizer } from '../normalization/normalizer.js';
import type { Taxonomy } from '../taxonomy/taxonomy.js';
import type { ModelHandle } from '../classifier/model-handle.js';
import { compileModel } from '../classifier/model-handle.js';
import { deepFreeze, trainModel } from '../classifier/model-version.js';
import { evaluateModel, type ModelEvaluator } from '../classifier/evaluation.js';
import { augmentUtterances } from '../classifier/utterance-augmenter.js';
import type { LearningBuffer } from './learning-buffer.js';
import type { ModelRegistry } from './model-registry.js';

// ============================================================================
// Types
// ============================================================================

type LearningConfig = RouterConfig['learning'];

export type TrainerState = 'idle' | 'training' | 'paused';
export type TrainingTrigger = 'threshold' | 'manual' | 'retry';

export type TrainingRunResult =
  | { status: 'published'; version: ModelVersion; validationScore: number }
  | { status: 'rejected'; reason: string; validationScore: number | null };

export interface TrainerStats {
  sessions: number;
  successes: number;
  failures: number;
  consecutiveFailures: number;
  paused: boolean;
  lastRunAt: string | null;
  lastError: string | null;
  /** Earliest time an automatic run may start after a failure */
  retryAt: string | null;
}

export interface BackgroundTrainerOptions {
  buffer: LearningBuffer;
  registry: ModelRegistry;
  handle: ModelHandle;
  /** Read at the start of every run so promotions are picked up */
  getTaxonomy: () => Taxonomy;
  getConfig: () => LearningConfig;
  normalize: Normalizer;
  evaluate?: ModelEvaluator;
  logger?: Logger;
  now?: () => number;
}

// ============================================================================
// Training data
// ============================================================================

/**
 * Augmented utterances for every intent, normalized the same way queries are.
 */
export function taxonomyUtterances(taxonomy: Taxonomy, normalize: Normalizer): LabelledText[] {
  const out: LabelledText[] = [];
  for (const intent of taxonomy.intents) {
    for (const utterance of augmentUtterances(intent)) {
      const text = normalize(utterance);
      if (text) out.push({ text, label: intent.label });
    }
  }
  return out;
}

/**
 * Union of learned examples keyed on (text, label); later entries win.
 */
export function mergeLearned(
  previous: readonly LabelledText[],
  incoming: readonly TrainingExample[],
): LabelledText[] {
  const merged = new Map<string, LabelledText>();
  for (const example of [...previous, ...incoming]) {
    merged.set(`${example.label}\u0000${example.text}`, { text: example.text, label: example.label });
  }
  return [...merged.values()];
}

/**
 * Deterministic holdout split: an example lands in the holdout when the
 * hash of its (label, text) pair falls below `ratio`. A different `salt`
 * (the predecessor version id) gives a different split, so an example held
 * out of one version is trained on by a later one.
 */
export function splitHoldout(
  examples: readonly LabelledText[],
  ratio: number,
  salt = '',
): { train: LabelledText[]; holdout: LabelledText[] } {
  const train: LabelledText[] = [];
  const holdout: LabelledText[] = [];
  for (const example of examples) {
    const key = `${example.label}\u0000${example.text}`;
    const digest = createHash('sha256')
      .update(salt ? `${salt}\u0000${key}` : key)
      .digest();
    const bucket = digest.readUInt32BE(0) / 0x1_0000_0000;
    (bucket < ratio ? holdout : train).push(example);
  }
  return { train, holdout };
}

// ============================================================================
// BackgroundTrainer
// ============================================================================

/**
 * Events:
 * - `start` (trigger: TrainingTrigger)
 * - `published` (version: ModelVersion)
 * - `failed` (reason: string, consecutiveFailures: number)
 * - `paused` (consecutiveFailures: number): automatic retraining stopped
 */
export class BackgroundTrainer extends EventEmitter {
  private readonly evaluate: ModelEvaluator;
  private readonly logger: Logger;
  private readonly now: () => number;

  private inFlight: Promise<TrainingRunResult> | null = null;
  private pending: NodeJS.Immediate | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private started = false;

  private readonly stats: TrainerStats = {
    sessions: 0,
    successes: 0,
    failures: 0,
    consecutiveFailures: 0,
    paused: false,
    lastRunAt: null,
    lastError: null,
    retryAt: null,
  };

  private readonly onThreshold = (): void => {
    this.schedule('threshold');
  };

  constructor(private readonly options: BackgroundTrainerOptions) {
    super();
    this.evaluate = options.evaluate ?? evaluateModel;
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
  }

  get state(): TrainerState {
    if (this.inFlight) return 'training';
    return this.stats.paused ? 'paused' : 'idle';
  }

  getStats(): TrainerStats {
    return { ...this.stats };
  }

  /** Listen to the buffer; a buffer already at threshold schedules a run. */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.options.buffer.on('threshold', this.onThreshold);
    if (this.options.buffer.isAtThreshold()) {
      this.schedule('threshold');
    }
  }

  stop(): void {
    this.started = false;
    this.options.buffer.off('threshold', this.onThreshold);
    if (this.pending) clearImmediate(this.pending);
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.pending = null;
    this.retryTimer = null;
  }

  /** Resolves when no run is in flight. */
  async idle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Train immediately, even while paused. Joins the run in flight if
   * there is one.
   */
  retrainNow(): Promise<TrainingRunResult> {
    return this.inFlight ?? this.startRun('manual');
  }

  /** Clear the pause and failure count; retrain if the buffer is full. */
  resume(): void {
    this.stats.paused = false;
    this.stats.consecutiveFailures = 0;
    this.stats.retryAt = null;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    this.logger.info('[trainer] Automatic retraining resumed');
    this.schedule('threshold');
  }

  // ==========================================================================
  // Scheduling
  // ==========================================================================

  private schedule(trigger: TrainingTrigger): void {
    if (!this.started || this.pending || this.inFlight) return;
    if (this.stats.paused) {
      this.logger.debug('[trainer] Buffer at threshold but retraining is paused');
      return;
    }

    const retryAt = this.stats.retryAt ? Date.parse(this.stats.retryAt) : 0;
    const lastRunAt = this.stats.lastRunAt ? Date.parse(this.stats.lastRunAt) : null;
    const intervalEnd =
      lastRunAt === null ? 0 : lastRunAt + this.options.getConfig().minRetrainIntervalMs;
    const wait = Math.max(retryAt, intervalEnd) - this.now();
    if (wait > 0) {
      this.armRetry(wait);
      return;
    }

    // Defer so the request that filled the buffer finishes its commit first
    this.pending = setImmediate(() => {
      this.pending = null;
      if (this.inFlight || this.stats.paused || !this.options.buffer.isAtThreshold()) return;
      this.startRun(trigger).catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`[trainer] Unexpected training error: ${message}`);
      });
    });
  }

  private armRetry(delayMs: number): void {
    if (this.retryTimer) return;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.schedule('retry');
    }, delayMs);
    this.retryTimer.unref();
  }

  private startRun(trigger: TrainingTrigger): Promise<TrainingRunResult> {
    const run = this.run(trigger).finally(() => {
      this.inFlight = null;
      // Appends during the run may have refilled the buffer
      if (this.started && this.options.buffer.isAtThreshold()) {
        this.schedule('threshold');
      }
    });
    this.inFlight = run;
    return run;
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  private async run(trigger: TrainingTrigger): Promise<TrainingRunResult> {
    const { buffer, registry, handle } = this.options;
    const config = this.options.getConfig();

    this.stats.sessions++;
    this.stats.lastRunAt = new Date(this.now()).toISOString();
    this.emit('start', trigger);

    const drained = buffer.drain();
    this.logger.info(`[trainer] Training run started (${trigger}, ${drained.length} new examples)`);

    let validationScore: number | null = null;
    try {
      const taxonomy = this.options.getTaxonomy();
      const active = handle.current()?.version ?? null;
      const learned = mergeLearned(active?.trainingSet ?? [], drained).filter((e) =>
        taxonomy.has(e.label),
      );
      const all = [...taxonomyUtterances(taxonomy, this.options.normalize), ...learned];

      const { train, holdout } = splitHoldout(all, config.holdoutRatio, active?.id);
      const candidate = trainModel(train, taxonomy.labels, {
        alpha: config.alpha,
        predecessorId: active?.id ?? null,
        trainingSet: learned,
      });
      const report = this.evaluate(compileModel(candidate), holdout.length > 0 ? holdout : train);
      validationScore = report.accuracy;

      if (report.accuracy < config.minValidationAccuracy) {
        return this.fail(
          drained,
          `validation accuracy ${report.accuracy.toFixed(3)} below ${config.minValidationAccuracy}`,
          validationScore,
        );
      }

      const version = deepFreeze({ ...candidate, validationScore: report.accuracy });
      await registry.save(version);
      await registry.activate(version.id);
      handle.publish(version);

      this.stats.successes++;
      this.stats.consecutiveFailures = 0;
      this.stats.paused = false;
      this.stats.retryAt = null;
      this.stats.lastError = null;
      this.logger.info(
        `[trainer] Published ${version.id} (validation accuracy ${report.accuracy.toFixed(3)})`,
      );
      this.emit('published', version);

      await this.collectGarbage(config.keepVersions);
      return { status: 'published', version, validationScore: report.accuracy };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return this.fail(drained, message, validationScore);
    }
  }

  private fail(
    drained: TrainingExample[],
    reason: string,
    validationScore: number | null,
  ): TrainingRunResult {
    const config = this.options.getConfig();
    this.options.buffer.restore(drained);

    this.stats.failures++;
    this.stats.consecutiveFailures++;
    this.stats.lastError = reason;
    this.stats.retryAt = new Date(this.now() + config.retryBackoffMs).toISOString();
    this.logger.warn(`[trainer] Training run rejected: ${reason}`);
    this.emit('failed', reason, this.stats.consecutiveFailures);

    if (!this.stats.paused && this.stats.consecutiveFailures >= config.maxConsecutiveFailures) {
      this.stats.paused = true;
      this.logger.error(
        `[trainer] Automatic retraining paused after ${this.stats.consecutiveFailures} consecutive failures`,
      );
      this.emit('paused', this.stats.consecutiveFailures);
    } else if (!this.stats.paused && this.started) {
      this.armRetry(config.retryBackoffMs);
    }

    return { status: 'rejected', reason, validationScore };
  }

  private async collectGarbage(keep: number): Promise<void> {
    try {
      await this.options.registry.garbageCollect(keep);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`[trainer] Model garbage collection failed: ${message}`);
    }
  }
}
