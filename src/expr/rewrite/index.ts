/**
 * Rewrite module
 *
 * Structural matching, positional substitution and the ordered
 * single-pass optimizer.
 */

// Pattern matching
export {
  matchPattern,
  flattenExpressions,
  flattenIdentifiers,
  instantiatePattern
} from './Pattern.js';

// Rewrite rules
export {
  rule,
  addZeroLeft,
  addZeroRight,
  defaultRules
} from './Rules.js';
export type { Rule } from './Rules.js';

// Optimization
export {
  applyRule,
  applyRuleAt,
  optimize,
  optimizeWithStats
} from './Rewriter.js';
export type {
  OptimizeOptions,
  OptimizeStats,
  OptimizeResult,
  RuleApplication
} from './Rewriter.js';
