// Learning module exports

// Buffer
export { LearningBuffer, type LearningBufferOptions } from './learning-buffer.js';

// Model versions on disk
export { ModelRegistry, ModelLoadError } from './model-registry.js';

// Retraining
export {
  BackgroundTrainer,
  taxonomyUtterances,
  mergeLearned,
  splitHoldout,
} from './background-trainer.js';
export type {
  BackgroundTrainerOptions,
  TrainerState,
  TrainerStats,
  TrainingRunResult,
  TrainingTrigger,
} from './background-trainer.js';

// Novel labels pending review
export { DiscoveredIntents } from './discovered-intents.js';
export type { DiscoveredIntent, DiscoveredIntentSummary } from './discovered-intents.js';

// Re-export types for convenience
export type {
  TrainingExample,
  Provenance,
  LabelledText,
  ModelVersion,
  ModelVersionSummary,
} from '../types/learning.js';
