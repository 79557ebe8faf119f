/**
 * IntentEngine: the facade callers use.
 *
 * Wires the layers to the confidence router, owns the shared state
 * (cache, sessions, learning buffer, model handle) and commits each
 * request's writes in one synchronous step after the router returns.
 *
 * @example
 * ```ts
 * const engine = new IntentEngine({ config: { dataDir: '.intent-cascade' } });
 * await engine.init();
 *
 * const response = await engine.classify({ text: 'Show me sales for this month' });
 * if (response.needsClarification && response.sessionId) {
 *   await engine.resolve({ sessionId: response.sessionId, optionId: '1' });
 * }
 * await engine.close();
 * ```
 */

import { join } from 'path';
import type {
  ClassificationRequest,
  ClassificationResult,
  ClassifyResponse,
  DisambiguationOption,
  ResolveRequest,
} from './types/classification.js';
import type { TrainingExample, ModelVersionSummary } from './types/learning.js';
import { IntentLabelSchema, type IntentDefinition } from './types/intent.js';
import type { EmbeddingProvider } from './types/embeddings.js';
import type { RouterConfig, RouterConfigPatch } from './config/schema.js';
import { DEFAULT_ROUTER_CONFIG } from './config/schema.js';
import { mergeRouterConfig } from './config/reader.js';
import type { Logger } from './config/logger.js';
import {
  createNormalizer,
  loadAbbreviations,
  type AbbreviationMap,
  type Normalizer,
} from './normalization/normalizer.js';
import { ResultCache, cacheKey } from './cache/result-cache.js';
import {
  PatternMatcher,
  PatternRuleSchema,
  loadPatternRules,
  type PatternRule,
} from './patterns/pattern-matcher.js';
import { Taxonomy, loadTaxonomy, readSavedTaxonomy, saveTaxonomy } from './taxonomy/taxonomy.js';
import { ModelHandle } from './classifier/model-handle.js';
import { FewShotClassifier } from './classifier/few-shot-classifier.js';
import { trainModel } from './classifier/model-version.js';
import type { ModelEvaluator } from './classifier/evaluation.js';
import { EmbeddingService } from './embeddings/embedding-service.js';
import { SimilarityMatcher } from './embeddings/similarity-matcher.js';
import type { LlmIntentClassifier } from './llm/types.js';
import { RateLimiter } from './llm/rate-limiter.js';
import { AnthropicIntentClassifier } from './llm/anthropic-classifier.js';
import {
  IntentRouter,
  type AcceptOutcome,
  type DisambiguateOutcome,
  type RouterEnvironment,
  type RouterState,
} from './router/intent-router.js';
import { DisambiguationSessionStore, type Candidate } from './router/disambiguation-sessions.js';
import { InvalidSelectionError, SessionNotFoundError, throwIfAborted } from './router/errors.js';
import { LearningBuffer } from './learning/learning-buffer.js';
import { ModelLoadError, ModelRegistry } from './learning/model-registry.js';
import {
  BackgroundTrainer,
  taxonomyUtterances,
  type TrainingRunResult,
} from './learning/background-trainer.js';
import { DiscoveredIntents, type DiscoveredIntentSummary } from './learning/discovered-intents.js';
import { MetricsRecorder, type MetricsSnapshot } from './metrics/metrics-recorder.js';
import { ClassificationLogger } from './audit/classification-logger.js';

// ============================================================================
// Types
// ============================================================================

export interface IntentEngineOptions {
  /** Overrides applied on top of the defaults */
  config?: RouterConfigPatch;
  /** Defaults to data/taxonomy.json */
  taxonomy?: Taxonomy;
  /** Defaults to data/patterns.json */
  patterns?: PatternRule[];
  /** Defaults to data/abbreviations.json */
  abbreviations?: AbbreviationMap;
  /** Embedding provider; null disables the embedding layer */
  embeddings?: EmbeddingProvider | null;
  /** Large-model classifier; null disables the fallback */
  llm?: LlmIntentClassifier | null;
  evaluate?: ModelEvaluator;
  logger?: Logger;
  now?: () => number;
}

export interface ClassifyOptions {
  signal?: AbortSignal;
}

export interface EngineHealth {
  fewShot: 'ready' | 'unavailable';
  embedding: 'ready' | 'unavailable' | 'disabled';
  llm: 'available' | 'unconfigured' | 'disabled';
  trainer: 'idle' | 'training' | 'paused';
}

const CLARIFICATION_QUESTION = 'Which of these did you mean?';

// ============================================================================
// IntentEngine
// ============================================================================

export class IntentEngine {
  private config: RouterConfig;
  private taxonomy: Taxonomy;
  private patterns: PatternMatcher;
  private readonly normalize: Normalizer;
  private readonly logger: Logger;
  private readonly now: () => number;

  private readonly cache: ResultCache<ClassificationResult>;
  private readonly handle = new ModelHandle();
  private readonly similarity: SimilarityMatcher | null;
  private readonly llm: LlmIntentClassifier | null;
  private readonly rateLimiter: RateLimiter;
  private readonly router: IntentRouter;
  private readonly sessions: DisambiguationSessionStore;
  private readonly buffer: LearningBuffer;
  private readonly registry: ModelRegistry;
  private readonly trainer: BackgroundTrainer;
  private readonly discovered: DiscoveredIntents;
  private readonly metrics: MetricsRecorder;
  private audit: ClassificationLogger | null;

  private readonly taxonomyPath: string;
  private readonly taxonomyGiven: boolean;
  private initPromise: Promise<void> | null = null;

  constructor(options: IntentEngineOptions = {}) {
    this.config = mergeRouterConfig(DEFAULT_ROUTER_CONFIG, options.config ?? {});
    this.logger = options.logger ?? console;
    this.now = options.now ?? Date.now;
    const { dataDir } = this.config;

    this.taxonomy = options.taxonomy ?? loadTaxonomy();
    this.taxonomyGiven = options.taxonomy !== undefined;
    this.taxonomyPath = join(dataDir, 'taxonomy.json');
    this.normalize = createNormalizer(options.abbreviations ?? loadAbbreviations());
    this.patterns = new PatternMatcher(
      options.patterns ?? loadPatternRules(),
      this.config.thresholds.patternConfidence,
    );

    this.cache = new ResultCache({ ...this.config.cache, now: this.now });
    const embeddings =
      options.embeddings === undefined
        ? EmbeddingService.createFresh({ dimensions: this.config.embedding.dimensions })
        : options.embeddings;
    this.similarity = embeddings ? new SimilarityMatcher(embeddings) : null;
    this.llm =
      options.llm === undefined
        ? new AnthropicIntentClassifier({
            model: this.config.llm.model,
            maxTokens: this.config.llm.maxTokens,
            defaultConfidence: this.config.llm.defaultConfidence,
            logger: this.logger,
          })
        : options.llm;
    this.rateLimiter = new RateLimiter(this.config.llm, this.now);

    this.router = new IntentRouter({
      cache: this.cache,
      fewShot: new FewShotClassifier(this.handle),
      similarity: this.similarity,
      llm: this.llm,
      rateLimiter: this.rateLimiter,
      logger: this.logger,
      now: this.now,
    });

    this.sessions = new DisambiguationSessionStore({
      timeoutMs: this.config.disambiguation.timeoutMs,
      now: this.now,
    });
    this.buffer = new LearningBuffer({
      filePath: join(dataDir, 'learning-buffer.json'),
      threshold: this.config.learning.bufferThreshold,
      capacity: this.config.learning.bufferCapacity,
      logger: this.logger,
    });
    this.registry = new ModelRegistry(dataDir, this.logger);
    this.trainer = new BackgroundTrainer({
      buffer: this.buffer,
      registry: this.registry,
      handle: this.handle,
      getTaxonomy: () => this.taxonomy,
      getConfig: () => this.config.learning,
      normalize: this.normalize,
      evaluate: options.evaluate,
      logger: this.logger,
      now: this.now,
    });
    this.discovered = new DiscoveredIntents(
      join(dataDir, 'discovered-intents.json'),
      this.config.learning.minExamplesForNewIntent,
      this.logger,
    );
    this.metrics = new MetricsRecorder(this.config.metrics, this.logger);
    this.audit = this.config.audit.enabled ? new ClassificationLogger(dataDir) : null;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Load persisted state, the active model and the similarity index, then
   * start the trainer and the session sweeper. Safe to call repeatedly.
   */
  async init(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.doInit();
    }
    await this.initPromise;
  }

  private async doInit(): Promise<void> {
    if (!this.taxonomyGiven) {
      // Promoted intents live in the data directory copy
      this.taxonomy = (await readSavedTaxonomy(this.taxonomyPath)) ?? this.taxonomy;
    }
    await this.buffer.load();
    await this.discovered.load();
    await this.loadActiveModel();
    await this.buildSimilarityIndex();

    if (this.config.learning.autoRetrain) {
      this.trainer.start();
    }
    this.sessions.startSweeper(this.config.disambiguation.sweepIntervalMs, (removed) => {
      this.metrics.recordExpired(removed.length);
    });
    this.logger.info(
      `[engine] Ready (${this.taxonomy.size} intents, model ${this.handle.versionId ?? 'unavailable'})`,
    );
  }

  /** Stop background work and flush everything persisted. */
  async close(): Promise<void> {
    this.trainer.stop();
    this.sessions.stopSweeper();
    await this.trainer.idle();
    await this.buffer.flush();
    await this.discovered.flush();
    await this.audit?.flush();
    this.initPromise = null;
  }

  private async loadActiveModel(): Promise<void> {
    try {
      const active = await this.registry.loadActive();
      if (active) {
        this.handle.publish(active);
        return;
      }
    } catch (err) {
      if (err instanceof ModelLoadError) {
        this.logger.error(`[engine] ${err.message}; few-shot layer unavailable`);
        this.handle.markUnavailable(err.message);
        return;
      }
      throw err;
    }

    // First start: train on the taxonomy alone
    const version = trainModel(taxonomyUtterances(this.taxonomy, this.normalize), this.taxonomy.labels, {
      alpha: this.config.learning.alpha,
    });
    await this.registry.save(version);
    await this.registry.activate(version.id);
    this.handle.publish(version);
    this.logger.info(`[engine] Bootstrapped model ${version.id} from the taxonomy`);
  }

  private async buildSimilarityIndex(): Promise<void> {
    if (!this.similarity) return;
    try {
      await this.similarity.initialize(this.taxonomy, this.normalize);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`[engine] Similarity index build failed: ${message}`);
    }
  }

  // ==========================================================================
  // Classify / Resolve
  // ==========================================================================

  async classify(request: ClassificationRequest, options: ClassifyOptions = {}): Promise<ClassifyResponse> {
    await this.init();
    const { signal } = options;
    const startedAt = this.now();

    const normalized = this.normalize(request.text);
    const key = cacheKey(normalized, request.tenant);
    const env: RouterEnvironment = {
      taxonomy: this.taxonomy,
      patterns: this.patterns,
      model: this.handle.current(),
      config: this.config,
    };

    const outcome = await this.router.route({ normalized, cacheKey: key, startedAt, signal }, env);
    throwIfAborted(signal);

    // Commit: every shared write for this request happens below, synchronously
    return outcome.kind === 'accept'
      ? this.commitAccept(outcome, normalized, key, request.tenant)
      : this.commitDisambiguation(outcome, normalized, key, request.tenant, startedAt, env.taxonomy);
  }

  /**
   * Finish a request suspended at DISAMBIGUATE.
   *
   * @throws {SessionNotFoundError} Unknown or already resolved session
   * @throws {InvalidSelectionError} Option id not offered in the session
   */
  async resolve(request: ResolveRequest): Promise<ClassifyResponse> {
    const startedAt = this.now();
    const found = this.sessions.get(request.sessionId);
    if (!found) {
      throw new SessionNotFoundError(request.sessionId);
    }
    const { session, expired } = found;

    if (request.optionId === undefined || expired) {
      this.sessions.close(session.id);
      const top = session.candidates[0] ?? session.options[0];
      const result = this.freezeResult({
        intent: top.label,
        confidence: top.confidence,
        method: session.layer,
        latencyMs: this.now() - startedAt,
        timestamp: new Date(this.now()).toISOString(),
        modelVersion: session.modelVersion,
        lowCertainty: true,
        novel: false,
      });
      this.metrics.recordResolution(true);
      this.logAudit('resolve', session.normalized, session.tenant, result, []);
      return { ...result, needsClarification: false };
    }

    const option = session.options.find((o) => o.id === request.optionId);
    if (!option) {
      throw new InvalidSelectionError(
        session.id,
        request.optionId,
        session.options.map((o) => o.id),
      );
    }

    this.sessions.close(session.id);
    const result = this.freezeResult({
      intent: option.label,
      confidence: 1,
      method: 'user-resolved',
      latencyMs: this.now() - startedAt,
      timestamp: new Date(this.now()).toISOString(),
      modelVersion: session.modelVersion,
      lowCertainty: false,
      novel: false,
    });

    if (this.config.layers.cache) {
      this.cache.put(session.cacheKey, result);
    }
    this.learn({
      text: session.normalized,
      label: option.label,
      provenance: 'disambiguation-selected',
      timestamp: result.timestamp,
    });
    this.metrics.recordResolution(false);
    this.logAudit('resolve', session.normalized, session.tenant, result, []);

    return { ...result, needsClarification: false };
  }

  private commitAccept(
    outcome: AcceptOutcome,
    normalized: string,
    key: string,
    tenant: string | undefined,
  ): ClassifyResponse {
    const { result } = outcome;

    if (outcome.cacheable && this.config.layers.cache) {
      this.cache.put(key, result);
    }
    if (outcome.trainingExample) {
      this.learn(outcome.trainingExample);
    }
    this.metrics.recordResult(result, outcome.substituted);
    this.logAudit('classify', normalized, tenant, result, outcome.trace);

    return { ...result, needsClarification: false };
  }

  private commitDisambiguation(
    outcome: DisambiguateOutcome,
    normalized: string,
    key: string,
    tenant: string | undefined,
    startedAt: number,
    taxonomy: Taxonomy,
  ): ClassifyResponse {
    const options = this.buildOptions(outcome.candidates, taxonomy);
    const session = this.sessions.open({
      normalized,
      cacheKey: key,
      tenant,
      candidates: outcome.candidates,
      options,
      layer: outcome.layer,
      modelVersion: outcome.modelVersion,
    });

    const top = options[0];
    const result = this.freezeResult({
      intent: top.label,
      confidence: top.confidence,
      method: outcome.layer,
      latencyMs: Math.max(0, this.now() - startedAt),
      timestamp: new Date(this.now()).toISOString(),
      modelVersion: outcome.modelVersion,
      lowCertainty: true,
      novel: false,
    });
    this.metrics.recordPrompt(result.latencyMs);
    this.logAudit('classify', normalized, tenant, result, outcome.trace, session.id);

    return {
      ...result,
      needsClarification: true,
      options,
      sessionId: session.id,
      question: CLARIFICATION_QUESTION,
    };
  }

  /**
   * Options "1".."n" from the ranked candidates, padded to two with the
   * generic fallback intent.
   */
  private buildOptions(candidates: readonly Candidate[], taxonomy: Taxonomy): DisambiguationOption[] {
    const picked = candidates.slice(0, this.config.disambiguation.maxOptions);
    for (const label of [taxonomy.fallbackIntent, ...taxonomy.labels]) {
      if (picked.length >= 2) break;
      if (!picked.some((c) => c.label === label)) {
        picked.push({ label, confidence: 0 });
      }
    }

    return picked.map((candidate, index) => ({
      id: String(index + 1),
      label: candidate.label,
      description: taxonomy.describe(candidate.label),
      confidence: candidate.confidence,
    }));
  }

  /** Known labels go to the buffer; novel ones wait in discovered intents. */
  private learn(example: TrainingExample): void {
    if (this.taxonomy.has(example.label)) {
      this.buffer.append(example);
    } else {
      this.discovered.record(example);
    }
  }

  private freezeResult(result: ClassificationResult): ClassificationResult {
    return Object.freeze(result);
  }

  private logAudit(
    event: 'classify' | 'resolve',
    normalized: string,
    tenant: string | undefined,
    result: ClassificationResult,
    trace: RouterState[],
    sessionId: string | null = null,
  ): void {
    this.audit?.log({
      timestamp: result.timestamp,
      event,
      input: normalized,
      tenant: tenant ?? null,
      intent: result.intent,
      confidence: result.confidence,
      method: result.method,
      source: result.source ?? null,
      lowCertainty: result.lowCertainty,
      novel: result.novel,
      modelVersion: result.modelVersion,
      latencyMs: result.latencyMs,
      needsClarification: sessionId !== null,
      sessionId,
      trace,
    });
  }

  // ==========================================================================
  // Control surface
  // ==========================================================================

  getConfig(): RouterConfig {
    return this.config;
  }

  /**
   * Apply a validated partial config. Thresholds and layer flags take
   * effect from the next request.
   *
   * @throws {RouterConfigError} When the merged config is invalid
   */
  updateConfig(patch: RouterConfigPatch): RouterConfig {
    const next = mergeRouterConfig(this.config, patch);
    const previous = this.config;
    this.config = next;

    this.cache.configure(next.cache);
    this.rateLimiter.configure(next.llm);
    this.sessions.configure({ timeoutMs: next.disambiguation.timeoutMs });
    this.buffer.configure({
      threshold: next.learning.bufferThreshold,
      capacity: next.learning.bufferCapacity,
    });
    this.discovered.configure({ minExamples: next.learning.minExamplesForNewIntent });
    this.metrics.configure(next.metrics);

    if (next.thresholds.patternConfidence !== previous.thresholds.patternConfidence) {
      this.patterns = this.patterns.withConfidence(next.thresholds.patternConfidence);
    }
    if (next.audit.enabled !== previous.audit.enabled) {
      this.audit = next.audit.enabled ? new ClassificationLogger(next.dataDir) : null;
    }
    if (this.initPromise && next.learning.autoRetrain !== previous.learning.autoRetrain) {
      if (next.learning.autoRetrain) {
        this.trainer.start();
      } else {
        this.trainer.stop();
      }
    }
    if (next.dataDir !== previous.dataDir) {
      this.logger.warn('[engine] dataDir changes take effect on the next start');
    }

    return next;
  }

  /**
   * Append a pattern rule.
   *
   * @throws {ZodError} When the rule is malformed
   * @throws {PatternRuleError} When a regex rule does not compile
   */
  addPattern(rule: PatternRule): void {
    this.patterns = this.patterns.withRule(PatternRuleSchema.parse(rule));
  }

  async retrainNow(): Promise<TrainingRunResult> {
    await this.init();
    return this.trainer.retrainNow();
  }

  resumeTraining(): void {
    this.trainer.resume();
  }

  /**
   * Activate and serve an older version.
   *
   * @throws {ModelLoadError} When the version is missing or corrupt
   */
  async rollback(versionId: string): Promise<ModelVersionSummary> {
    await this.init();
    const version = await this.registry.activate(versionId);
    this.handle.publish(version);
    this.logger.info(`[engine] Rolled back to model ${version.id}`);

    return {
      id: version.id,
      createdAt: version.createdAt,
      labels: [...version.labels],
      validationScore: version.validationScore,
      predecessorId: version.predecessorId,
      trainingSetSize: version.trainingSet.length,
      active: true,
    };
  }

  async listModelVersions(): Promise<ModelVersionSummary[]> {
    return this.registry.list();
  }

  /**
   * Add an intent to the taxonomy. A discovered label brings its examples
   * into the learning buffer; the next retrain teaches it to the model.
   *
   * @throws {ZodError} When the label is not snake_case
   */
  async promoteIntent(label: string, description: string, action: string | null = null): Promise<IntentDefinition> {
    await this.init();
    const validLabel = IntentLabelSchema.parse(label);
    const entry = this.discovered.get(validLabel);

    this.taxonomy = this.taxonomy.withIntent({
      label: validLabel,
      description,
      examples: entry ? entry.examples.map((e) => e.text) : [],
      action,
    });
    this.discovered.take(validLabel);
    for (const example of entry?.examples ?? []) {
      this.buffer.append(example);
    }
    await saveTaxonomy(this.taxonomyPath, this.taxonomy);

    await this.buildSimilarityIndex();
    this.logger.info(
      `[engine] Promoted intent ${validLabel} (${entry?.examples.length ?? 0} examples queued)`,
    );

    const promoted = this.taxonomy.get(validLabel);
    if (!promoted) {
      throw new Error(`Intent ${validLabel} missing after promotion`);
    }
    return promoted;
  }

  listDiscoveredIntents(): DiscoveredIntentSummary[] {
    return this.discovered.list();
  }

  getTaxonomy(): Taxonomy {
    return this.taxonomy;
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.snapshot(this.trainer.getStats(), this.handle.versionId);
  }

  health(): EngineHealth {
    const { layers } = this.config;
    let embedding: EngineHealth['embedding'] = 'disabled';
    if (layers.embedding && this.similarity) {
      embedding = this.similarity.isReady() ? 'ready' : 'unavailable';
    }
    let llm: EngineHealth['llm'] = 'disabled';
    if (layers.llm && this.llm) {
      llm = this.llm.isAvailable() ? 'available' : 'unconfigured';
    }

    return {
      fewShot: this.handle.current() ? 'ready' : 'unavailable',
      embedding,
      llm,
      trainer: this.trainer.state,
    };
  }
}
