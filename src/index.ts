/**
 * expr-rewriter - Pattern-based rewriting of arithmetic expression trees
 *
 * Trees are built from numeric constants and binary additions. Rules are
 * pairs of trees with wildcard placeholders, applied in a fixed order.
 */

// Expression model
export {
  num,
  any,
  add,
  clone,
  freezeExpression,
  isWildcard,
  replaceLeft,
  replaceRight,
  ANY_NUMBER,
  NO_ID
} from './expr/AST.js';
export type {
  Expression,
  NumericConstant,
  BinaryAddition,
  NumericValue,
  AnyNumber,
  Identifier
} from './expr/AST.js';

// Evaluation
export { evaluate } from './expr/Evaluate.js';

// Utilities
export { serializeExpression, collectWildcards, countNodes } from './expr/ExpressionUtils.js';
export { ExpressionTransformer } from './expr/ExpressionTransformer.js';

// Errors
export { InvariantError, RuleError } from './expr/Errors.js';

// Matching, rules and optimization
export * from './expr/rewrite/index.js';

// Driver scenarios
export { builtinScenarios, runScenario, formatScenarioResult } from './scenarios.js';
export type { Scenario, ScenarioResult } from './scenarios.js';
