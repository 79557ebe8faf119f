/**
 * Deterministic rule layer.
 *
 * Rules run in order against the normalized query; the first match wins
 * and returns a fixed high confidence without consulting any model.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { IntentLabelSchema } from '../types/intent.js';

// ============================================================================
// Rules
// ============================================================================

export const PatternRuleSchema = z.object({
  intent: IntentLabelSchema,
  /**
   * - literal: the whole normalized query equals the pattern
   * - substring: the normalized query contains the pattern
   * - regex: the pattern (a JavaScript regular expression) matches
   */
  kind: z.enum(['literal', 'substring', 'regex']),
  pattern: z.string().min(1),
});

export type PatternRule = z.infer<typeof PatternRuleSchema>;

export interface PatternMatch {
  intent: string;
  confidence: number;
  rule: PatternRule;
}

/** Error thrown when a rule list cannot be compiled. */
export class PatternRuleError extends Error {
  constructor(
    message: string,
    public readonly rule?: PatternRule,
  ) {
    super(message);
    this.name = 'PatternRuleError';
  }
}

export const DEFAULT_PATTERNS_PATH = new URL('../../data/patterns.json', import.meta.url);

/**
 * Load and validate a rule list from JSON.
 *
 * @throws {PatternRuleError} When the file does not hold a valid rule list
 */
export function loadPatternRules(path: string | URL = DEFAULT_PATTERNS_PATH): PatternRule[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const result = z.array(PatternRuleSchema).safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new PatternRuleError(
      `Invalid pattern rules in ${String(path)}: ${first?.path.join('.')}: ${first?.message}`,
    );
  }
  return result.data;
}

// ============================================================================
// Matcher
// ============================================================================

interface CompiledRule {
  rule: PatternRule;
  test: (normalized: string) => boolean;
}

function compile(rule: PatternRule): CompiledRule {
  const parsed = PatternRuleSchema.safeParse(rule);
  if (!parsed.success) {
    throw new PatternRuleError(`Invalid pattern rule: ${parsed.error.issues[0]?.message}`, rule);
  }

  switch (rule.kind) {
    case 'literal':
      return { rule, test: (normalized) => normalized === rule.pattern };
    case 'substring':
      return { rule, test: (normalized) => normalized.includes(rule.pattern) };
    case 'regex': {
      let regex: RegExp;
      try {
        regex = new RegExp(rule.pattern);
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        throw new PatternRuleError(`Invalid regex for ${rule.intent}: ${message}`, rule);
      }
      return { rule, test: (normalized) => regex.test(normalized) };
    }
  }
}

/**
 * Immutable ordered rule matcher. `withRule` returns a new matcher so a
 * request already holding the old one is unaffected.
 *
 * @example
 * ```ts
 * const matcher = new PatternMatcher(loadPatternRules());
 * matcher.match('hello');
 * // => { intent: 'greeting', confidence: 0.95, rule: {...} }
 * ```
 */
export class PatternMatcher {
  private readonly compiled: readonly CompiledRule[];

  constructor(
    rules: PatternRule[],
    private readonly confidence: number = 0.95,
  ) {
    this.compiled = rules.map(compile);
  }

  get rules(): PatternRule[] {
    return this.compiled.map((c) => c.rule);
  }

  match(normalized: string): PatternMatch | null {
    if (!normalized) {
      return null;
    }
    for (const { rule, test } of this.compiled) {
      if (test(normalized)) {
        return { intent: rule.intent, confidence: this.confidence, rule };
      }
    }
    return null;
  }

  /** Return a matcher with `rule` appended. */
  withRule(rule: PatternRule): PatternMatcher {
    return new PatternMatcher([...this.rules, rule], this.confidence);
  }

  /** Return a matcher with the same rules and a different confidence. */
  withConfidence(confidence: number): PatternMatcher {
    return new PatternMatcher(this.rules, confidence);
  }
}
