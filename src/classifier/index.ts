export { tokenize } from './tokenizer.js';
export {
  trainBayesClassifier,
  restoreBayesClassifier,
  rankLabels,
  type RankedLabel,
} from './bayes-classifier.js';
export {
  trainModel,
  parseModelVersion,
  createVersionId,
  deepFreeze,
  type TrainModelOptions,
} from './model-version.js';
export { ModelHandle, compileModel, type CompiledModel } from './model-handle.js';
export {
  FewShotClassifier,
  type FewShotResult,
  type FewShotClassifyOptions,
} from './few-shot-classifier.js';
export { evaluateModel, type EvaluationReport, type ModelEvaluator } from './evaluation.js';
export { augmentUtterances } from './utterance-augmenter.js';
