/**
 * Zod schema for the router configuration.
 *
 * Every field has a `.default()` so that `RouterConfigSchema.parse({})`
 * returns a complete config. Partial files (or no file at all) are valid.
 *
 * @module config/schema
 */

import { z } from 'zod';

// ============================================================================
// Thresholds
// ============================================================================

const ThresholdsSchema = z.object({
  /** Fast-model confidence at or above which a result is accepted */
  tHigh: z.number().min(0).max(1).default(0.8),
  /** Fast-model confidence at or above which the user is asked to disambiguate */
  tMid: z.number().min(0).max(1).default(0.5),
  /** Embedding similarity at or above which a result is accepted */
  embeddingAccept: z.number().min(0).max(1).default(0.85),
  /** Embedding similarity below which the generic fallback intent is forced */
  embeddingMinSimilarity: z.number().min(0).max(1).default(0.7),
  /** Accepted results at or above this confidence become training examples */
  confirmedBand: z.number().min(0).max(1).default(0.9),
  patternConfidence: z.number().min(0).max(1).default(0.95),
  fallbackConfidenceFactor: z.number().min(0).max(1).default(0.5),
});

// ============================================================================
// Layers
// ============================================================================

const LayersSchema = z.object({
  cache: z.boolean().default(true),
  patterns: z.boolean().default(true),
  fastModel: z.boolean().default(true),
  embedding: z.boolean().default(true),
  llm: z.boolean().default(true),
});

// ============================================================================
// Cache
// ============================================================================

const CacheSchema = z.object({
  ttlMs: z.number().int().positive().default(60 * 60 * 1000),
  maxEntries: z.number().int().positive().default(1000),
});

// ============================================================================
// Learning
// ============================================================================

const LearningSchema = z.object({
  /** Buffer size that triggers an automatic retrain */
  bufferThreshold: z.number().int().positive().default(50),
  bufferCapacity: z.number().int().positive().default(1000),
  minValidationAccuracy: z.number().min(0).max(1).default(0.7),
  /** Fraction of examples held out for validation */
  holdoutRatio: z.number().min(0).max(0.5).default(0.2),
  maxConsecutiveFailures: z.number().int().positive().default(3),
  retryBackoffMs: z.number().int().nonnegative().default(5 * 60 * 1000),
  /** Minimum time between the starts of automatic runs */
  minRetrainIntervalMs: z.number().int().nonnegative().default(60 * 1000),
  keepVersions: z.number().int().positive().default(5),
  minExamplesForNewIntent: z.number().int().positive().default(3),
  /** Additive smoothing for the Bayes classifier */
  alpha: z.number().positive().default(1),
  autoRetrain: z.boolean().default(true),
});

// ============================================================================
// LLM
// ============================================================================

const LlmSchema = z.object({
  model: z.string().min(1).default('claude-3-5-haiku-latest'),
  maxTokens: z.number().int().positive().default(256),
  maxCalls: z.number().int().positive().default(30),
  windowMs: z.number().int().positive().default(60 * 1000),
  defaultConfidence: z.number().min(0).max(1).default(0.7),
});

// ============================================================================
// Disambiguation, Embedding, Metrics, Audit
// ============================================================================

const DisambiguationSchema = z.object({
  maxOptions: z.number().int().min(2).default(3),
  timeoutMs: z.number().int().positive().default(5 * 60 * 1000),
  sweepIntervalMs: z.number().int().positive().default(30 * 1000),
});

const EmbeddingSchema = z.object({
  /** Length of the hashed TF-IDF vectors */
  dimensions: z.number().int().min(16).default(384),
});

const MetricsSchema = z.object({
  latencyWindow: z.number().int().positive().default(1000),
  fallbackRateAlert: z.number().min(0).max(1).default(0.3),
  minRequestsForAlert: z.number().int().nonnegative().default(20),
});

const AuditSchema = z.object({
  enabled: z.boolean().default(false),
});

// ============================================================================
// Router Config
// ============================================================================

export const RouterConfigSchema = z
  .object({
    /** Directory for models, buffer, discovered intents and logs */
    dataDir: z.string().min(1).default('.intent-cascade'),
    thresholds: ThresholdsSchema.default({}),
    layers: LayersSchema.default({}),
    cache: CacheSchema.default({}),
    learning: LearningSchema.default({}),
    llm: LlmSchema.default({}),
    disambiguation: DisambiguationSchema.default({}),
    embedding: EmbeddingSchema.default({}),
    metrics: MetricsSchema.default({}),
    audit: AuditSchema.default({}),
  })
  .superRefine((config, ctx) => {
    if (config.thresholds.tHigh <= config.thresholds.tMid) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['thresholds', 'tHigh'],
        message: 'tHigh must be greater than tMid',
      });
    }
    if (config.thresholds.embeddingAccept <= config.thresholds.embeddingMinSimilarity) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['thresholds', 'embeddingAccept'],
        message: 'embeddingAccept must be greater than embeddingMinSimilarity',
      });
    }
  });

export type RouterConfig = z.infer<typeof RouterConfigSchema>;

/** Recursive partial accepted by `updateConfig` */
export type RouterConfigPatch = {
  [K in keyof RouterConfig]?: RouterConfig[K] extends object
    ? Partial<RouterConfig[K]>
    : RouterConfig[K];
};

/** Fully populated default configuration. */
export const DEFAULT_ROUTER_CONFIG: RouterConfig = RouterConfigSchema.parse({});
