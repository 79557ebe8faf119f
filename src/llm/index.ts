export { RateLimiter } from './rate-limiter.js';
export {
  AnthropicIntentClassifier,
  toSnakeCase,
  buildPrompt,
  type AnthropicIntentClassifierOptions,
} from './anthropic-classifier.js';
export type { LlmClassification, LlmIntentClassifier } from './types.js';
