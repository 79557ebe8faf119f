/**
 * Confidence router: the per-request state machine.
 *
 *   CACHE_CHECK -> PATTERN_CHECK -> FAST_MODEL -> { ACCEPT | DISAMBIGUATE | EMBEDDING }
 *   EMBEDDING -> { ACCEPT | DISAMBIGUATE | LLM_FALLBACK }
 *   LLM_FALLBACK -> ACCEPT
 *
 * The router reads shared state (cache, model snapshot, rate limiter) but
 * writes none of the results: it returns an outcome and the engine commits
 * it in one synchronous step, so an aborted request leaves nothing behind.
 */

import type { ClassificationMethod, ClassificationResult } from '../types/classification.js';
import type { TrainingExample } from '../types/learning.js';
import type { RouterConfig } from '../config/schema.js';
import type { Logger } from '../config/logger.js';
import type { Taxonomy } from '../taxonomy/taxonomy.js';
import type { PatternMatcher } from '../patterns/pattern-matcher.js';
import type { ResultCache } from '../cache/result-cache.js';
import type { FewShotClassifier, FewShotResult } from '../classifier/few-shot-classifier.js';
import type { CompiledModel } from '../classifier/model-handle.js';
import type { SimilarityMatcher, SimilarityResult } from '../embeddings/similarity-matcher.js';
import type { LlmClassification, LlmIntentClassifier } from '../llm/types.js';
import type { RateLimiter } from '../llm/rate-limiter.js';
import type { Candidate } from './disambiguation-sessions.js';
import { decideEmbedding, decideFastModel, isConfirmed } from './confidence-policy.js';
import { throwIfAborted } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export type RouterState =
  | 'CACHE_CHECK'
  | 'PATTERN_CHECK'
  | 'FAST_MODEL'
  | 'EMBEDDING'
  | 'LLM_FALLBACK'
  | 'ACCEPT'
  | 'DISAMBIGUATE';

type RoutingState = Exclude<RouterState, 'ACCEPT' | 'DISAMBIGUATE'>;

/** Everything a request reads, captured once when it starts. */
export interface RouterEnvironment {
  readonly taxonomy: Taxonomy;
  readonly patterns: PatternMatcher;
  readonly model: CompiledModel | null;
  readonly config: RouterConfig;
}

export interface RouterDependencies {
  cache: ResultCache<ClassificationResult>;
  fewShot: FewShotClassifier;
  similarity: SimilarityMatcher | null;
  llm: LlmIntentClassifier | null;
  rateLimiter: RateLimiter;
  logger: Logger;
  now?: () => number;
}

export interface RouteRequest {
  normalized: string;
  cacheKey: string;
  startedAt: number;
  signal?: AbortSignal;
}

export interface AcceptOutcome {
  kind: 'accept';
  result: ClassificationResult;
  /** Example to append to the learning buffer, if any */
  trainingExample: TrainingExample | null;
  /** Whether the result may be written to the cache */
  cacheable: boolean;
  /** True when the LLM was unusable and a lower-layer result stands in */
  substituted: boolean;
  trace: RouterState[];
}

export interface DisambiguateOutcome {
  kind: 'disambiguate';
  candidates: Candidate[];
  layer: 'fast-model' | 'embedding';
  modelVersion: string | null;
  trace: RouterState[];
}

export type RouterOutcome = AcceptOutcome | DisambiguateOutcome;

interface ResultFields {
  intent: string;
  confidence: number;
  method: ClassificationMethod;
  modelVersion: string | null;
  lowCertainty?: boolean;
  novel?: boolean;
  source?: ClassificationMethod;
  timestamp?: string;
}

// ============================================================================
// IntentRouter
// ============================================================================

export class IntentRouter {
  private readonly now: () => number;

  constructor(private readonly deps: RouterDependencies) {
    this.now = deps.now ?? Date.now;
  }

  async route(request: RouteRequest, env: RouterEnvironment): Promise<RouterOutcome> {
    const { normalized, signal } = request;
    const { config, taxonomy } = env;
    const modelVersion = env.model?.version.id ?? null;
    const trace: RouterState[] = [];

    throwIfAborted(signal);

    if (!normalized) {
      return this.accept(request, env, trace, fallbackResult(taxonomy, modelVersion), {
        substituted: true,
      });
    }

    let fastModel: FewShotResult | null = null;
    let embedding: SimilarityResult | null = null;
    let state: RoutingState = 'CACHE_CHECK';

    for (;;) {
      trace.push(state);

      switch (state) {
        case 'CACHE_CHECK': {
          const cached = config.layers.cache ? this.deps.cache.get(request.cacheKey) : undefined;
          if (cached) {
            return this.accept(request, env, trace, {
              ...cached,
              method: 'cache',
              source: cached.source ?? cached.method,
            }, { cacheable: false });
          }
          state = 'PATTERN_CHECK';
          break;
        }

        case 'PATTERN_CHECK': {
          const match = config.layers.patterns ? env.patterns.match(normalized) : null;
          if (match) {
            return this.accept(request, env, trace, {
              intent: match.intent,
              confidence: match.confidence,
              method: 'pattern',
              modelVersion,
            }, { learn: 'user-confirmed', cacheable: false });
          }
          state = 'FAST_MODEL';
          break;
        }

        case 'FAST_MODEL': {
          if (!config.layers.fastModel) {
            state = 'EMBEDDING';
            break;
          }
          fastModel = this.runFastModel(normalized, env);
          const top = fastModel.status === 'ok' ? fastModel.ranked[0] : undefined;
          if (fastModel.status !== 'ok' || !top) {
            state = 'EMBEDDING';
            break;
          }

          const decision = decideFastModel(top.confidence, config.thresholds);
          if (decision === 'ACCEPT') {
            return this.accept(request, env, trace, {
              intent: top.label,
              confidence: top.confidence,
              method: 'fast-model',
              modelVersion,
            }, { learn: 'user-confirmed' });
          }
          if (decision === 'DISAMBIGUATE') {
            trace.push('DISAMBIGUATE');
            return {
              kind: 'disambiguate',
              candidates: fastModel.ranked.slice(0, config.disambiguation.maxOptions),
              layer: 'fast-model',
              modelVersion,
              trace,
            };
          }
          state = 'EMBEDDING';
          break;
        }

        case 'EMBEDDING': {
          if (!config.layers.embedding || !this.deps.similarity) {
            state = 'LLM_FALLBACK';
            break;
          }
          embedding = await this.runEmbedding(normalized, config);
          throwIfAborted(signal);
          if (embedding.status !== 'ok' || embedding.belowThreshold) {
            state = 'LLM_FALLBACK';
            break;
          }

          const decision = decideEmbedding(embedding.similarity, config.thresholds);
          if (decision === 'ACCEPT') {
            return this.accept(request, env, trace, {
              intent: embedding.intent,
              confidence: embedding.confidence,
              method: 'embedding',
              modelVersion,
            }, { learn: 'user-confirmed' });
          }
          if (decision === 'DISAMBIGUATE') {
            trace.push('DISAMBIGUATE');
            return {
              kind: 'disambiguate',
              candidates: embedding.ranked
                .slice(0, config.disambiguation.maxOptions)
                .map((r) => ({ label: r.label, confidence: clamp(r.similarity) })),
              layer: 'embedding',
              modelVersion,
              trace,
            };
          }
          state = 'LLM_FALLBACK';
          break;
        }

        case 'LLM_FALLBACK': {
          const answer = await this.runLlm(normalized, env, signal);
          throwIfAborted(signal);
          if (answer) {
            return this.accept(request, env, trace, {
              intent: answer.label,
              confidence: answer.confidence,
              method: 'llm',
              modelVersion,
              lowCertainty: true,
              novel: answer.novel,
            }, { learn: 'llm-inferred' });
          }
          return this.accept(
            request,
            env,
            trace,
            this.substitute(taxonomy, fastModel, embedding, modelVersion),
            { substituted: true },
          );
        }
      }
    }
  }

  // ==========================================================================
  // Layers
  // ==========================================================================

  private runFastModel(normalized: string, env: RouterEnvironment): FewShotResult {
    try {
      return this.deps.fewShot.classify(normalized, {
        model: env.model,
        allowedLabels: new Set(env.taxonomy.labels),
      });
    } catch (err: unknown) {
      return { status: 'unavailable', reason: this.layerFailed('fast-model', err) };
    }
  }

  private async runEmbedding(normalized: string, config: RouterConfig): Promise<SimilarityResult> {
    try {
      const matcher = this.deps.similarity;
      if (!matcher) return { status: 'unavailable', reason: 'no similarity matcher' };
      return await matcher.match(normalized, {
        minSimilarity: config.thresholds.embeddingMinSimilarity,
        fallbackConfidenceFactor: config.thresholds.fallbackConfidenceFactor,
      });
    } catch (err: unknown) {
      return { status: 'unavailable', reason: this.layerFailed('embedding', err) };
    }
  }

  private async runLlm(
    normalized: string,
    env: RouterEnvironment,
    signal?: AbortSignal,
  ): Promise<LlmClassification | null> {
    const llm = this.deps.llm;
    if (!env.config.layers.llm || !llm || !llm.isAvailable()) {
      return null;
    }
    if (!this.deps.rateLimiter.tryAcquire()) {
      this.deps.logger.debug('[router] LLM rate limit reached, substituting best result');
      return null;
    }
    try {
      return await llm.classify(normalized, env.taxonomy, signal);
    } catch (err: unknown) {
      this.layerFailed('llm', err);
      return null;
    }
  }

  private layerFailed(layer: string, err: unknown): string {
    const message = err instanceof Error ? err.message : String(err);
    this.deps.logger.error(`[router] ${layer} layer failed: ${message}`);
    return message;
  }

  // ==========================================================================
  // Results
  // ==========================================================================

  /**
   * Highest-confidence result already computed, flagged low-certainty;
   * the generic fallback intent when nothing was computed.
   */
  private substitute(
    taxonomy: Taxonomy,
    fastModel: FewShotResult | null,
    embedding: SimilarityResult | null,
    modelVersion: string | null,
  ): ResultFields {
    const candidates: ResultFields[] = [];

    const top = fastModel?.status === 'ok' ? fastModel.ranked[0] : undefined;
    if (top) {
      candidates.push({ intent: top.label, confidence: top.confidence, method: 'fast-model', modelVersion });
    }
    if (embedding?.status === 'ok') {
      candidates.push({
        intent: embedding.intent,
        confidence: embedding.confidence,
        method: 'embedding',
        modelVersion,
      });
    }

    const best = candidates.reduce<ResultFields | null>(
      (acc, c) => (acc === null || c.confidence > acc.confidence ? c : acc),
      null,
    );
    if (best) {
      return { ...best, lowCertainty: true };
    }
    return fallbackResult(taxonomy, modelVersion);
  }

  private accept(
    request: RouteRequest,
    env: RouterEnvironment,
    trace: RouterState[],
    fields: ResultFields,
    options: {
      learn?: TrainingExample['provenance'];
      cacheable?: boolean;
      substituted?: boolean;
    },
  ): AcceptOutcome {
    trace.push('ACCEPT');
    const result = this.buildResult(request, fields);
    const substituted = options.substituted ?? false;

    // LLM answers are always learned from; other layers only inside the confirmed band
    const provenance = options.learn;
    const trainingExample: TrainingExample | null =
      provenance && (provenance === 'llm-inferred' || isConfirmed(result.confidence, env.config.thresholds))
        ? { text: request.normalized, label: result.intent, provenance, timestamp: result.timestamp }
        : null;

    return {
      kind: 'accept',
      result,
      trainingExample,
      cacheable: options.cacheable ?? !substituted,
      substituted,
      trace,
    };
  }

  private buildResult(request: RouteRequest, fields: ResultFields): ClassificationResult {
    const result: ClassificationResult = {
      intent: fields.intent,
      confidence: clamp(fields.confidence),
      method: fields.method,
      latencyMs: Math.max(0, this.now() - request.startedAt),
      timestamp: fields.timestamp ?? new Date(this.now()).toISOString(),
      modelVersion: fields.modelVersion,
      lowCertainty: fields.lowCertainty ?? false,
      novel: fields.novel ?? false,
      ...(fields.source ? { source: fields.source } : {}),
    };
    return Object.freeze(result);
  }
}

/**
 * The generic fallback intent at confidence 0, reported the way the
 * embedding layer reports a forced fallback.
 */
function fallbackResult(taxonomy: Taxonomy, modelVersion: string | null): ResultFields {
  return {
    intent: taxonomy.fallbackIntent,
    confidence: 0,
    method: 'embedding',
    modelVersion,
    lowCertainty: true,
  };
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}
