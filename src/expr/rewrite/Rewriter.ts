/**
 * Rewrite Engine for Expression Optimization
 *
 * Applies each rule exactly once, in order, as a single top-down pass over
 * the current tree. There is no fixpoint iteration: a rewrite opportunity
 * created by one rule is only picked up by a rule that runs after it.
 */

import { Expression, BinaryAddition, clone } from '../AST.js';
import { InvariantError } from '../Errors.js';
import { ExpressionTransformer } from '../ExpressionTransformer.js';
import { countNodes, serializeExpression } from '../ExpressionUtils.js';
import { Rule, defaultRules } from './Rules.js';
import {
  matchPattern,
  flattenExpressions,
  flattenIdentifiers,
  instantiatePattern
} from './Pattern.js';

/**
 * Options for optimization
 */
export interface OptimizeOptions {
  rules?: readonly Rule[];   // Default: defaultRules
  verbose?: boolean;         // Log each pass
}

/**
 * Statistics from an optimization run
 */
export interface OptimizeStats {
  rulesApplied: number;
  rewrites: number;
  rewritesByRule: Record<string, number>;
}

export interface OptimizeResult {
  expression: Expression;
  stats: OptimizeStats;
}

/**
 * Result of one pass of one rule
 */
export interface RuleApplication {
  expression: Expression;
  rewrites: number;
}

/**
 * Replace the subtree at `position` with the rule's instantiated template.
 * `position` must already match `rule.lhs`.
 */
export function applyRuleAt(rule: Rule, position: Expression): Expression {
  const expressions = flattenExpressions(position);
  const identifiers = flattenIdentifiers(rule.lhs);

  if (expressions.length !== identifiers.length) {
    throw new InvariantError(
      'matched subtree and input pattern differ in shape',
      'applyRuleAt',
      `rule '${rule.name}'`
    );
  }

  return instantiatePattern(rule.rhs, expressions, identifiers);
}

/**
 * One pass of a rule: outermost match wins, and a replaced region is not
 * visited again
 */
class RulePass extends ExpressionTransformer {
  rewrites = 0;

  constructor(private readonly rule: Rule) {
    super();
  }

  protected visitAddition(node: BinaryAddition): Expression {
    if (matchPattern(this.rule.lhs, node)) {
      this.rewrites++;
      return applyRuleAt(this.rule, node);
    }
    return super.visitAddition(node);
  }
}

/**
 * Apply a single rule once over the whole tree
 */
export function applyRule(root: Expression, rule: Rule): RuleApplication {
  const pass = new RulePass(rule);
  const expression = pass.transform(root);
  return { expression, rewrites: pass.rewrites };
}

/**
 * Optimize an expression, reporting how many rewrites each rule performed.
 * The input tree is never modified.
 */
export function optimizeWithStats(root: Expression, options: OptimizeOptions = {}): OptimizeResult {
  const {
    rules = defaultRules,
    verbose = false
  } = options;

  const stats: OptimizeStats = {
    rulesApplied: 0,
    rewrites: 0,
    rewritesByRule: {}
  };

  let current = clone(root);

  for (const rule of rules) {
    const { expression, rewrites } = applyRule(current, rule);
    current = expression;

    stats.rulesApplied++;
    stats.rewrites += rewrites;
    stats.rewritesByRule[rule.name] = (stats.rewritesByRule[rule.name] ?? 0) + rewrites;

    if (verbose) {
      console.log(`[optimize] ${rule.name}: ${rewrites} rewrite(s) -> ${serializeExpression(current)}`);
    }
  }

  if (verbose) {
    console.log(`[optimize] Done: ${stats.rewrites} rewrite(s), ${countNodes(root)} -> ${countNodes(current)} nodes`);
  }

  return { expression: current, stats };
}

/**
 * Optimize an expression with the given rules (the built-in rules by default)
 */
export function optimize(root: Expression, options: OptimizeOptions = {}): Expression {
  return optimizeWithStats(root, options).expression;
}
