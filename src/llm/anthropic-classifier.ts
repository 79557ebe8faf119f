/**
 * Large-model fallback classifier using the Anthropic API.
 *
 * Asks the model to pick an intent from the taxonomy, or to name a new
 * snake_case intent when nothing fits. Returns null when no API key is
 * configured and on any error (including abort); the router then
 * substitutes the best lower-layer result.
 */

import { z } from 'zod';
import type { Taxonomy } from '../taxonomy/taxonomy.js';
import type { Logger } from '../config/logger.js';
import type { LlmClassification, LlmIntentClassifier } from './types.js';

/**
 * JSON structure expected from the model.
 */
const LlmResponseSchema = z.object({
  intent: z.string().min(1),
  confidence: z.number().min(0).max(1).optional(),
  reasoning: z.string().optional(),
});

export interface AnthropicIntentClassifierOptions {
  /** Defaults to ANTHROPIC_API_KEY */
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  /** Confidence reported when the model does not give one (default: 0.7) */
  defaultConfidence?: number;
  logger?: Logger;
}

/**
 * Coerce free text to a snake_case label, or null if nothing usable remains.
 *
 * @example
 * ```ts
 * toSnakeCase('Refund Request'); // => 'refund_request'
 * toSnakeCase('shipping-ETA');   // => 'shipping_eta'
 * ```
 */
export function toSnakeCase(raw: string): string | null {
  const label = raw
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return /^[a-z][a-z0-9_]*$/.test(label) ? label : null;
}

/** Pull the JSON object out of a reply that may be wrapped in a code fence. */
function extractJson(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  return (fenced?.[1] ?? text).trim();
}

export function buildPrompt(normalized: string, taxonomy: Taxonomy): string {
  const intents = taxonomy.intents
    .map((intent) => `- ${intent.label}: ${intent.description}`)
    .join('\n');

  return `Classify the user query into one business intent.

Known intents:
${intents}

Query: "${normalized}"

Pick the known intent that fits best. If none fits, invent a short new snake_case intent name.
Respond in JSON format only, no markdown:
{
  "intent": "<intent label>",
  "confidence": <0-1 number>,
  "reasoning": "<one sentence>"
}`;
}

export class AnthropicIntentClassifier implements LlmIntentClassifier {
  private readonly apiKey: string | undefined;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly defaultConfidence: number;
  private readonly logger: Logger;

  constructor(options: AnthropicIntentClassifierOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    this.model = options.model ?? 'claude-3-5-haiku-latest';
    this.maxTokens = options.maxTokens ?? 256;
    this.defaultConfidence = options.defaultConfidence ?? 0.7;
    this.logger = options.logger ?? console;
  }

  isAvailable(): boolean {
    return !!this.apiKey;
  }

  async classify(
    normalized: string,
    taxonomy: Taxonomy,
    signal?: AbortSignal,
  ): Promise<LlmClassification | null> {
    if (!this.apiKey || signal?.aborted) {
      return null;
    }

    try {
      const { default: Anthropic } = await import('@anthropic-ai/sdk');
      const client = new Anthropic({ apiKey: this.apiKey });

      const response = await client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          messages: [{ role: 'user', content: buildPrompt(normalized, taxonomy) }],
        },
        { signal },
      );

      const textContent = response.content.find((block) => block.type === 'text');
      if (!textContent || textContent.type !== 'text') {
        return null;
      }

      const parsed = LlmResponseSchema.safeParse(JSON.parse(extractJson(textContent.text)));
      if (!parsed.success) {
        this.logger.warn('[llm] Unexpected response shape, ignoring answer');
        return null;
      }

      const label = toSnakeCase(parsed.data.intent);
      if (!label) {
        return null;
      }

      return {
        label,
        novel: !taxonomy.has(label),
        confidence: parsed.data.confidence ?? this.defaultConfidence,
        reasoning: parsed.data.reasoning ?? '',
      };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`[llm] Fallback classification failed: ${message}`);
      return null;
    }
  }
}
