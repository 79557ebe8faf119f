import { describe, it, expect, vi } from 'vitest';
import { IntentRouter, type RouterEnvironment } from './intent-router.js';
import { ClassificationAbortedError } from './errors.js';
import { ResultCache } from '../cache/result-cache.js';
import { FewShotClassifier, type FewShotResult } from '../classifier/few-shot-classifier.js';
import { ModelHandle } from '../classifier/model-handle.js';
import { SimilarityMatcher, type SimilarityResult } from '../embeddings/similarity-matcher.js';
import { RateLimiter } from '../llm/rate-limiter.js';
import { PatternMatcher } from '../patterns/pattern-matcher.js';
import { Taxonomy } from '../taxonomy/taxonomy.js';
import { mergeRouterConfig } from '../config/reader.js';
import { DEFAULT_ROUTER_CONFIG, type RouterConfigPatch } from '../config/schema.js';
import { silentLogger } from '../config/logger.js';
import type { ClassificationResult } from '../types/classification.js';
import type { LlmClassification, LlmIntentClassifier } from '../llm/types.js';

// ============================================================================
// Fixtures
// ============================================================================

const taxonomy = Taxonomy.from([
  { label: 'greeting', description: 'Greetings', examples: ['hello'], action: null },
  { label: 'sales_inquiry', description: 'Sales', examples: ['sales report'], action: null },
  { label: 'analytics_inquiry', description: 'Analytics', examples: ['trends'], action: null },
]);

function fast(...ranked: Array<[string, number]>): FewShotResult {
  return {
    status: 'ok',
    ranked: ranked.map(([label, confidence]) => ({ label, confidence })),
    modelVersion: 'nb-test',
  };
}

function similar(intent: string, similarity: number, belowThreshold = false): SimilarityResult {
  return {
    status: 'ok',
    intent: belowThreshold ? 'general_inquiry' : intent,
    similarity,
    confidence: belowThreshold ? similarity * 0.5 : similarity,
    ranked: [
      { label: intent, similarity },
      { label: 'analytics_inquiry', similarity: similarity - 0.1 },
    ],
    belowThreshold,
  };
}

function setup(patch: RouterConfigPatch = {}, llmAnswer: LlmClassification | null = null) {
  const cache = new ResultCache<ClassificationResult>();
  const fewShot = new FewShotClassifier(new ModelHandle());
  const similarity = new SimilarityMatcher({
    embed: vi.fn(),
    embedBatch: vi.fn(),
    setCorpus: vi.fn(),
  });
  const llm = {
    isAvailable: vi.fn(() => true),
    classify: vi.fn<LlmIntentClassifier['classify']>().mockResolvedValue(llmAnswer),
  };
  const rateLimiter = new RateLimiter({ maxCalls: 10 });
  const logger = { ...silentLogger, error: vi.fn() };

  const router = new IntentRouter({
    cache,
    fewShot,
    similarity,
    llm,
    rateLimiter,
    logger,
    now: () => 5_000,
  });

  const env: RouterEnvironment = {
    taxonomy,
    patterns: new PatternMatcher([{ intent: 'greeting', kind: 'literal', pattern: 'hello' }]),
    model: null,
    config: mergeRouterConfig(DEFAULT_ROUTER_CONFIG, patch),
  };

  const classifySpy = vi.spyOn(fewShot, 'classify');
  const matchSpy = vi.spyOn(similarity, 'match');

  return { router, env, cache, classifySpy, matchSpy, llm, rateLimiter, logger };
}

function request(normalized: string, signal?: AbortSignal) {
  return { normalized, cacheKey: `key:${normalized}`, startedAt: 4_990, signal };
}

// ============================================================================
// Tests
// ============================================================================

describe('IntentRouter', () => {
  it('accepts a pattern match with a training example', async () => {
    const { router, env, classifySpy } = setup();

    const outcome = await router.route(request('hello'), env);

    expect(outcome.kind).toBe('accept');
    if (outcome.kind !== 'accept') return;
    expect(outcome.result).toMatchObject({
      intent: 'greeting',
      confidence: 0.95,
      method: 'pattern',
      latencyMs: 10,
      lowCertainty: false,
    });
    expect(outcome.trainingExample).toMatchObject({
      text: 'hello',
      label: 'greeting',
      provenance: 'user-confirmed',
    });
    expect(outcome.cacheable).toBe(false);
    expect(outcome.trace).toEqual(['CACHE_CHECK', 'PATTERN_CHECK', 'ACCEPT']);
    expect(classifySpy).not.toHaveBeenCalled();
    expect(Object.isFrozen(outcome.result)).toBe(true);
  });

  it('serves cache hits unchanged, marked as cache', async () => {
    const { router, env, cache } = setup();
    const stored: ClassificationResult = {
      intent: 'sales_inquiry',
      confidence: 0.91,
      method: 'fast-model',
      latencyMs: 3,
      timestamp: '2026-01-01T00:00:00.000Z',
      modelVersion: 'nb-old',
      lowCertainty: false,
      novel: false,
    };
    cache.put('key:sales numbers', stored);

    const outcome = await router.route(request('sales numbers'), env);

    expect(outcome).toMatchObject({
      kind: 'accept',
      result: {
        intent: 'sales_inquiry',
        confidence: 0.91,
        method: 'cache',
        source: 'fast-model',
        modelVersion: 'nb-old',
        timestamp: '2026-01-01T00:00:00.000Z',
      },
      trainingExample: null,
      cacheable: false,
      trace: ['CACHE_CHECK', 'ACCEPT'],
    });
  });

  it('skips the cache when the layer is disabled', async () => {
    const { router, env, cache } = setup({ layers: { cache: false } });
    cache.put('key:hello', {
      intent: 'sales_inquiry',
      confidence: 1,
      method: 'llm',
      latencyMs: 0,
      timestamp: '',
      modelVersion: null,
      lowCertainty: false,
      novel: false,
    });

    const outcome = await router.route(request('hello'), env);

    expect(outcome.kind === 'accept' && outcome.result.method).toBe('pattern');
  });

  it('accepts a fast-model result at or above tHigh', async () => {
    const { router, env, classifySpy } = setup();
    classifySpy.mockReturnValue(fast(['sales_inquiry', 0.92], ['greeting', 0.08]));

    const outcome = await router.route(request('sales numbers'), env);

    expect(outcome).toMatchObject({
      kind: 'accept',
      result: { intent: 'sales_inquiry', confidence: 0.92, method: 'fast-model' },
      trainingExample: { provenance: 'user-confirmed' },
    });
  });

  it('does not learn from accepts below the confirmed band', async () => {
    const { router, env, classifySpy } = setup();
    classifySpy.mockReturnValue(fast(['sales_inquiry', 0.85], ['greeting', 0.15]));

    const outcome = await router.route(request('sales numbers'), env);

    expect(outcome.kind === 'accept' && outcome.trainingExample).toBeNull();
  });

  it('disambiguates a fast-model result in [tMid, tHigh)', async () => {
    const { router, env, classifySpy, matchSpy } = setup();
    classifySpy.mockReturnValue(
      fast(['sales_inquiry', 0.65], ['analytics_inquiry', 0.25], ['greeting', 0.06], ['general_inquiry', 0.04]),
    );

    const outcome = await router.route(request('show me the numbers'), env);

    expect(outcome).toEqual({
      kind: 'disambiguate',
      candidates: [
        { label: 'sales_inquiry', confidence: 0.65 },
        { label: 'analytics_inquiry', confidence: 0.25 },
        { label: 'greeting', confidence: 0.06 },
      ],
      layer: 'fast-model',
      modelVersion: null,
      trace: ['CACHE_CHECK', 'PATTERN_CHECK', 'FAST_MODEL', 'DISAMBIGUATE'],
    });
    expect(matchSpy).not.toHaveBeenCalled();
  });

  it('falls through to embeddings below tMid and accepts a strong match', async () => {
    const { router, env, classifySpy, matchSpy } = setup();
    classifySpy.mockReturnValue(fast(['sales_inquiry', 0.4], ['greeting', 0.6 - 0.4]));
    matchSpy.mockResolvedValue(similar('analytics_inquiry', 0.88));

    const outcome = await router.route(request('how are we trending'), env);

    expect(outcome).toMatchObject({
      kind: 'accept',
      result: { intent: 'analytics_inquiry', confidence: 0.88, method: 'embedding' },
      trainingExample: null,
      trace: ['CACHE_CHECK', 'PATTERN_CHECK', 'FAST_MODEL', 'EMBEDDING', 'ACCEPT'],
    });
    expect(matchSpy).toHaveBeenCalledWith('how are we trending', {
      minSimilarity: 0.7,
      fallbackConfidenceFactor: 0.5,
    });
  });

  it('goes to embeddings when the fast model is unavailable', async () => {
    const { router, env, matchSpy } = setup();
    matchSpy.mockResolvedValue(similar('sales_inquiry', 0.9));

    const outcome = await router.route(request('revenue'), env);

    expect(outcome).toMatchObject({
      kind: 'accept',
      result: { method: 'embedding' },
      trainingExample: { provenance: 'user-confirmed' },
    });
  });

  it('disambiguates an intermediate embedding similarity', async () => {
    const { router, env, matchSpy } = setup();
    matchSpy.mockResolvedValue(similar('sales_inquiry', 0.75));

    const outcome = await router.route(request('numbers please'), env);

    expect(outcome.kind).toBe('disambiguate');
    if (outcome.kind !== 'disambiguate') return;
    expect(outcome.layer).toBe('embedding');
    expect(outcome.candidates[0]).toEqual({ label: 'sales_inquiry', confidence: 0.75 });
    expect(outcome.candidates[1].label).toBe('analytics_inquiry');
    expect(outcome.candidates[1].confidence).toBeCloseTo(0.65);
  });

  it('accepts an out-of-taxonomy LLM answer as novel and learns from it', async () => {
    const { router, env, matchSpy, llm } = setup(
      {},
      { label: 'refund_request', novel: true, confidence: 0.7, reasoning: 'asks for money back' },
    );
    matchSpy.mockResolvedValue(similar('sales_inquiry', 0.4, true));

    const outcome = await router.route(request('i want my money back'), env);

    expect(outcome).toMatchObject({
      kind: 'accept',
      result: {
        intent: 'refund_request',
        confidence: 0.7,
        method: 'llm',
        lowCertainty: true,
        novel: true,
      },
      trainingExample: { label: 'refund_request', provenance: 'llm-inferred' },
      cacheable: true,
      substituted: false,
      trace: ['CACHE_CHECK', 'PATTERN_CHECK', 'FAST_MODEL', 'EMBEDDING', 'LLM_FALLBACK', 'ACCEPT'],
    });
    expect(llm.classify).toHaveBeenCalledWith('i want my money back', taxonomy, undefined);
  });

  it('substitutes the best computed result when the LLM returns nothing', async () => {
    const { router, env, classifySpy, matchSpy } = setup();
    classifySpy.mockReturnValue(fast(['sales_inquiry', 0.4], ['greeting', 0.2]));
    matchSpy.mockResolvedValue(similar('analytics_inquiry', 0.6, true));

    const outcome = await router.route(request('hmm'), env);

    expect(outcome).toMatchObject({
      kind: 'accept',
      result: { intent: 'sales_inquiry', confidence: 0.4, method: 'fast-model', lowCertainty: true },
      trainingExample: null,
      cacheable: false,
      substituted: true,
    });
  });

  it('prefers the embedding result when it is more confident', async () => {
    const { router, env, classifySpy, matchSpy } = setup({ layers: { llm: false } });
    classifySpy.mockReturnValue(fast(['sales_inquiry', 0.2], ['greeting', 0.1]));
    matchSpy.mockResolvedValue(similar('analytics_inquiry', 0.6, true));

    const outcome = await router.route(request('hmm'), env);

    expect(outcome).toMatchObject({
      result: { intent: 'general_inquiry', confidence: 0.3, method: 'embedding', lowCertainty: true },
    });
  });

  it('returns the generic fallback when every layer is disabled', async () => {
    const { router, env } = setup({
      layers: { cache: false, patterns: false, fastModel: false, embedding: false, llm: false },
    });

    const outcome = await router.route(request('hello'), env);

    expect(outcome).toMatchObject({
      kind: 'accept',
      result: { intent: 'general_inquiry', confidence: 0, method: 'embedding', lowCertainty: true },
      trace: ['CACHE_CHECK', 'PATTERN_CHECK', 'FAST_MODEL', 'EMBEDDING', 'LLM_FALLBACK', 'ACCEPT'],
    });
  });

  it('substitutes without calling the LLM when rate-limited', async () => {
    const { router, env, llm, rateLimiter } = setup();
    rateLimiter.configure({ maxCalls: 1 });
    rateLimiter.tryAcquire();

    const outcome = await router.route(request('hmm'), env);

    expect(llm.classify).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({
      kind: 'accept',
      result: { intent: 'general_inquiry', method: 'embedding', confidence: 0, lowCertainty: true },
      substituted: true,
    });
  });

  it('skips an unconfigured LLM', async () => {
    const { router, env, llm } = setup();
    llm.isAvailable.mockReturnValue(false);

    await router.route(request('hmm'), env);

    expect(llm.classify).not.toHaveBeenCalled();
  });

  it('treats a throwing layer as unavailable and logs it', async () => {
    const { router, env, classifySpy, matchSpy, logger } = setup();
    classifySpy.mockImplementation(() => {
      throw new Error('corrupt parameters');
    });
    matchSpy.mockResolvedValue(similar('sales_inquiry', 0.9));

    const outcome = await router.route(request('revenue'), env);

    expect(outcome.kind === 'accept' && outcome.result.method).toBe('embedding');
    expect(logger.error).toHaveBeenCalledWith('[router] fast-model layer failed: corrupt parameters');
  });

  it('rejects with ClassificationAbortedError when aborted mid-flight', async () => {
    const { router, env, matchSpy } = setup();
    const controller = new AbortController();
    matchSpy.mockImplementation(async () => {
      controller.abort();
      return similar('sales_inquiry', 0.9);
    });

    await expect(router.route(request('revenue', controller.signal), env)).rejects.toBeInstanceOf(
      ClassificationAbortedError,
    );
  });

  it('returns the generic fallback for an empty query', async () => {
    const { router, env } = setup();

    const outcome = await router.route(request(''), env);

    expect(outcome).toMatchObject({
      result: { intent: 'general_inquiry', method: 'embedding', confidence: 0, lowCertainty: true },
      cacheable: false,
      trace: ['ACCEPT'],
    });
  });
});
