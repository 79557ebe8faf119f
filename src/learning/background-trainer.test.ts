import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  BackgroundTrainer,
  mergeLearned,
  splitHoldout,
  taxonomyUtterances,
} from './background-trainer.js';
import { LearningBuffer } from './learning-buffer.js';
import { ModelRegistry } from './model-registry.js';
import { ModelHandle, type CompiledModel } from '../classifier/model-handle.js';
import type { EvaluationReport, ModelEvaluator } from '../classifier/evaluation.js';
import { Taxonomy } from '../taxonomy/taxonomy.js';
import { createNormalizer } from '../normalization/normalizer.js';
import { DEFAULT_ROUTER_CONFIG } from '../config/schema.js';
import { silentLogger } from '../config/logger.js';
import type { ModelVersion, TrainingExample } from '../types/learning.js';

const taxonomy = Taxonomy.from([
  {
    label: 'sales_inquiry',
    description: 'Questions about sales and revenue',
    examples: ['show sales this month', 'what was revenue last week'],
    action: null,
  },
  {
    label: 'greeting',
    description: 'Saying hello',
    examples: ['hello', 'good morning'],
    action: null,
  },
]);

function example(text: string, label = 'sales_inquiry'): TrainingExample {
  return { text, label, provenance: 'user-confirmed', timestamp: '2026-03-01T00:00:00.000Z' };
}

function report(accuracy: number): EvaluationReport {
  return { total: 10, accuracy, top3Accuracy: accuracy, perClass: {}, confusion: {} };
}

const passing: ModelEvaluator = () => report(1);
const failing: ModelEvaluator = () => report(0.2);

describe('training data helpers', () => {
  it('normalizes augmented taxonomy utterances', () => {
    const utterances = taxonomyUtterances(taxonomy, createNormalizer());

    expect(utterances).toContainEqual({ text: 'show sales this month', label: 'sales_inquiry' });
    expect(utterances).toContainEqual({ text: 'good morning', label: 'greeting' });
    expect(utterances.every((u) => u.text === u.text.toLowerCase())).toBe(true);
  });

  it('merges learned examples without duplicates', () => {
    const merged = mergeLearned(
      [{ text: 'sales today', label: 'sales_inquiry' }],
      [example('sales today'), example('hi', 'greeting')],
    );

    expect(merged).toEqual([
      { text: 'sales today', label: 'sales_inquiry' },
      { text: 'hi', label: 'greeting' },
    ]);
  });

  it('splits deterministically', () => {
    const examples = Array.from({ length: 200 }, (_, i) => ({ text: `query ${i}`, label: 'sales_inquiry' }));

    const first = splitHoldout(examples, 0.2);
    const second = splitHoldout(examples, 0.2);

    expect(second).toEqual(first);
    expect(first.train.length + first.holdout.length).toBe(200);
    expect(first.holdout.length).toBeGreaterThan(10);
    expect(first.holdout.length).toBeLessThan(80);
  });

  it('splits differently for a different salt', () => {
    const examples = Array.from({ length: 200 }, (_, i) => ({ text: `query ${i}`, label: 'sales_inquiry' }));

    const unsalted = splitHoldout(examples, 0.2);

    expect(splitHoldout(examples, 0.2, 'nb-1')).toEqual(splitHoldout(examples, 0.2, 'nb-1'));
    expect(splitHoldout(examples, 0.2, 'nb-1').holdout).not.toEqual(unsalted.holdout);
  });
});

describe('BackgroundTrainer', () => {
  let testDir: string;
  let buffer: LearningBuffer;
  let registry: ModelRegistry;
  let handle: ModelHandle;
  let config = { ...DEFAULT_ROUTER_CONFIG.learning };

  function createTrainer(
    evaluate: ModelEvaluator = passing,
    now: () => number = Date.now,
  ): BackgroundTrainer {
    return new BackgroundTrainer({
      buffer,
      registry,
      handle,
      getTaxonomy: () => taxonomy,
      getConfig: () => config,
      normalize: createNormalizer(),
      evaluate,
      logger: silentLogger,
      now,
    });
  }

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'trainer-test-'));
    config = {
      ...DEFAULT_ROUTER_CONFIG.learning,
      bufferThreshold: 3,
      maxConsecutiveFailures: 2,
      minRetrainIntervalMs: 0,
    };
    buffer = new LearningBuffer({ threshold: 3 });
    registry = new ModelRegistry(testDir, silentLogger);
    handle = new ModelHandle();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('publishes, persists and activates a new version on retrainNow', async () => {
    const trainer = createTrainer();
    buffer.append(example('monthly revenue numbers'));

    const result = await trainer.retrainNow();

    expect(result.status).toBe('published');
    if (result.status !== 'published') return;
    expect(handle.versionId).toBe(result.version.id);
    expect(await registry.getActiveId()).toBe(result.version.id);
    expect(result.version.trainingSet).toEqual([
      { text: 'monthly revenue numbers', label: 'sales_inquiry' },
    ]);
    expect(result.version.validationScore).toBe(1);
    expect(buffer.size).toBe(0);
    expect(trainer.getStats()).toMatchObject({ sessions: 1, successes: 1, failures: 0 });
  });

  it('publishes exactly the model it evaluated', async () => {
    let evaluated: CompiledModel | undefined;
    const trainer = createTrainer((model, examples) => {
      evaluated = model;
      return passing(model, examples);
    });
    buffer.append(example('monthly revenue numbers'));

    const result = await trainer.retrainNow();

    expect(result.status).toBe('published');
    if (result.status !== 'published') return;
    expect(result.version.id).toBe(evaluated?.version.id);
    expect(result.version.parameters).toEqual(evaluated?.version.parameters);
    expect(evaluated?.version.trainingSet).toEqual(result.version.trainingSet);
    expect(Object.isFrozen(result.version)).toBe(true);
  });

  it('chains predecessors and carries learned examples forward', async () => {
    const trainer = createTrainer();
    buffer.append(example('monthly revenue numbers'));
    const first = await trainer.retrainNow();
    buffer.append(example('hey', 'greeting'));

    const second = await trainer.retrainNow();

    expect(second.status === 'published' && second.version.predecessorId).toBe(
      first.status === 'published' ? first.version.id : undefined,
    );
    expect(second.status === 'published' && second.version.trainingSet).toHaveLength(2);
  });

  it('never trains on labels outside the taxonomy', async () => {
    const trainer = createTrainer();
    buffer.append(example('i want a refund', 'refund_request'));

    const result = await trainer.retrainNow();

    expect(result.status === 'published' && result.version.trainingSet).toEqual([]);
    expect(result.status === 'published' && result.version.labels).toEqual(taxonomy.labels);
  });

  it('keeps the active model and the buffer when validation fails', async () => {
    const trainer = createTrainer(failing);
    buffer.append(example('monthly revenue numbers'));

    const result = await trainer.retrainNow();

    expect(result).toEqual({
      status: 'rejected',
      reason: 'validation accuracy 0.200 below 0.7',
      validationScore: 0.2,
    });
    expect(handle.current()).toBeNull();
    expect(buffer.snapshot().map((e) => e.text)).toEqual(['monthly revenue numbers']);
    expect(trainer.getStats()).toMatchObject({ failures: 1, consecutiveFailures: 1, paused: false });
    expect(trainer.getStats().retryAt).not.toBeNull();
  });

  it('restores the buffer when persisting fails', async () => {
    const trainer = createTrainer();
    vi.spyOn(registry, 'save').mockRejectedValue(new Error('disk full'));
    buffer.append(example('monthly revenue numbers'));

    const result = await trainer.retrainNow();

    expect(result).toEqual({ status: 'rejected', reason: 'disk full', validationScore: 1 });
    expect(buffer.size).toBe(1);
    expect(handle.current()).toBeNull();
  });

  it('pauses after consecutive failures and a manual success clears it', async () => {
    let evaluate: ModelEvaluator = failing;
    const trainer = createTrainer((model, examples) => evaluate(model, examples));
    const onPaused = vi.fn();
    trainer.on('paused', onPaused);

    await trainer.retrainNow();
    await trainer.retrainNow();

    expect(onPaused).toHaveBeenCalledWith(2);
    expect(trainer.state).toBe('paused');

    evaluate = passing;
    const result = await trainer.retrainNow();

    expect(result.status).toBe('published');
    expect(trainer.getStats()).toMatchObject({ paused: false, consecutiveFailures: 0 });
    expect(trainer.state).toBe('idle');
  });

  it('resume clears the pause', async () => {
    const trainer = createTrainer(failing);
    await trainer.retrainNow();
    await trainer.retrainNow();
    expect(trainer.state).toBe('paused');

    trainer.resume();

    expect(trainer.getStats()).toMatchObject({ paused: false, consecutiveFailures: 0, retryAt: null });
  });

  it('runs exactly once when the buffer reaches its threshold', async () => {
    const evaluate = vi.fn(passing);
    const trainer = createTrainer(evaluate);
    trainer.start();
    const published = new Promise((resolve) => trainer.once('published', resolve));

    buffer.append(example('revenue by region'));
    buffer.append(example('sales pipeline'));
    buffer.append(example('quarterly sales'));
    buffer.append(example('sales by rep'));
    await published;
    await trainer.idle();
    trainer.stop();

    expect(evaluate).toHaveBeenCalledTimes(1);
    expect(trainer.getStats().sessions).toBe(1);
    expect(buffer.size).toBe(0);
    expect(handle.current()?.version.trainingSet).toHaveLength(4);
  });

  it('does not start automatic runs while paused', async () => {
    const evaluate = vi.fn(failing);
    const trainer = createTrainer(evaluate);
    await trainer.retrainNow();
    await trainer.retrainNow();
    trainer.start();

    buffer.append(example('revenue by region'));
    buffer.append(example('sales pipeline'));
    buffer.append(example('quarterly sales'));
    await new Promise((resolve) => setImmediate(resolve));
    trainer.stop();

    expect(evaluate).toHaveBeenCalledTimes(2);
  });

  it('starts another run when the buffer refills during a run', async () => {
    const trainer = createTrainer();
    const save = registry.save.bind(registry);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    vi.spyOn(registry, 'save').mockImplementationOnce(async (version: ModelVersion) => {
      await gate;
      await save(version);
    });
    let publishedCount = 0;
    const secondPublished = new Promise<void>((resolve) => {
      trainer.on('published', () => {
        if (++publishedCount === 2) resolve();
      });
    });
    trainer.start();

    buffer.append(example('revenue by region'));
    buffer.append(example('sales pipeline'));
    buffer.append(example('quarterly sales'));
    await vi.waitFor(() => expect(trainer.state).toBe('training'));

    buffer.append(example('sales by rep'));
    buffer.append(example('weekly revenue'));
    buffer.append(example('sales forecast'));
    release();
    await secondPublished;
    await trainer.idle();
    trainer.stop();

    expect(trainer.getStats().sessions).toBe(2);
    expect(buffer.size).toBe(0);
    expect(handle.current()?.version.trainingSet).toHaveLength(6);
  });

  it('waits out the minimum interval between automatic runs', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    try {
      config = { ...config, minRetrainIntervalMs: 60_000 };
      let now = Date.parse('2026-03-01T00:00:00.000Z');
      const trainer = createTrainer(passing, () => now);
      buffer.append(example('monthly revenue numbers'));
      await trainer.retrainNow();
      trainer.start();

      buffer.append(example('revenue by region'));
      buffer.append(example('sales pipeline'));
      buffer.append(example('quarterly sales'));
      await new Promise((resolve) => setImmediate(resolve));

      expect(trainer.getStats().sessions).toBe(1);
      expect(buffer.size).toBe(3);

      now += 60_000;
      const published = new Promise((resolve) => trainer.once('published', resolve));
      vi.advanceTimersByTime(60_000);
      await published;
      await trainer.idle();
      trainer.stop();

      expect(trainer.getStats().sessions).toBe(2);
      expect(buffer.size).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it('does not delay manual runs by the minimum interval', async () => {
    config = { ...config, minRetrainIntervalMs: 60_000 };
    const trainer = createTrainer();
    await trainer.retrainNow();

    const second = await trainer.retrainNow();

    expect(second.status).toBe('published');
    expect(trainer.getStats().sessions).toBe(2);
  });
});
