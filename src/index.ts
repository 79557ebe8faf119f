// Engine facade
export {
  IntentEngine,
  type IntentEngineOptions,
  type ClassifyOptions,
  type EngineHealth,
} from './engine.js';

// Types
export type {
  ClassificationMethod,
  ClassificationRequest,
  ClassificationResult,
  ClassifyResponse,
  DisambiguationOption,
  ResolveRequest,
} from './types/classification.js';
export { ClassificationMethodSchema } from './types/classification.js';

export type { IntentDefinition, TaxonomyFile } from './types/intent.js';
export {
  IntentLabelSchema,
  IntentDefinitionSchema,
  TaxonomyFileSchema,
} from './types/intent.js';

// Configuration
export {
  RouterConfigSchema,
  DEFAULT_ROUTER_CONFIG,
  readRouterConfig,
  parseRouterConfig,
  mergeRouterConfig,
  RouterConfigError,
  DEFAULT_CONFIG_PATH,
  silentLogger,
  type RouterConfig,
  type RouterConfigPatch,
  type Logger,
} from './config/index.js';

// Layers
export * from './normalization/index.js';
export * from './cache/index.js';
export * from './patterns/index.js';
export * from './taxonomy/index.js';
export * from './classifier/index.js';
export * from './embeddings/index.js';
export * from './llm/index.js';
export * from './router/index.js';

// Learning, metrics and audit
export * from './learning/index.js';
export * from './metrics/index.js';
export * from './audit/index.js';
