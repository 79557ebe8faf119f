export {
  PatternMatcher,
  PatternRuleSchema,
  PatternRuleError,
  loadPatternRules,
  DEFAULT_PATTERNS_PATH,
  type PatternRule,
  type PatternMatch,
} from './pattern-matcher.js';
