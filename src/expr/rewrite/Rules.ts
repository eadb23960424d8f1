/**
 * Rewrite Rules for Expression Optimization
 *
 * Rules are plain data: an input pattern and an output template, both
 * expression trees. The optimizer applies them in list order, one pass each.
 */

import { Expression, NO_ID, num, any, add, clone, freezeExpression } from '../AST.js';
import { RuleError } from '../Errors.js';
import { collectWildcards } from '../ExpressionUtils.js';
import { flattenExpressions } from './Pattern.js';

/**
 * A rewrite rule: wherever LHS matches, replace it with RHS
 */
export interface Rule {
  readonly name: string;
  readonly lhs: Expression;
  readonly rhs: Expression;
}

/**
 * Create a rule from a pattern and a template.
 *
 * Both trees are copied and the copies frozen: the caller's trees may be
 * reused or mutated afterwards, and the rule itself never changes. Throws
 * RuleError when the rule cannot be instantiated unambiguously.
 */
export function rule(name: string, lhs: Expression, rhs: Expression): Rule {
  validateRule(name, lhs, rhs);
  return Object.freeze({
    name,
    lhs: freezeExpression(clone(lhs)),
    rhs: freezeExpression(clone(rhs))
  });
}

function validateRule(name: string, lhs: Expression, rhs: Expression): void {
  // Numeric leaves are copied, never rewritten
  if (lhs.kind !== 'addition') {
    throw new RuleError('input pattern must be an addition', name);
  }

  const bindings = new Map<string, Expression>();
  for (const node of flattenExpressions(lhs)) {
    if (node.id === NO_ID) continue;
    if (bindings.has(node.id)) {
      throw new RuleError('binding name used more than once in input pattern', name, node.id);
    }
    bindings.set(node.id, node);
  }

  for (const placeholder of collectWildcards(rhs)) {
    if (placeholder.id === NO_ID) {
      throw new RuleError('output template contains an unbound wildcard', name);
    }
    const bound = bindings.get(placeholder.id);
    if (bound === undefined) {
      throw new RuleError('output template refers to a name the input pattern does not bind', name, placeholder.id);
    }
    if (bound.kind !== 'numeric') {
      throw new RuleError('binding must name a numeric leaf of the input pattern', name, placeholder.id);
    }
  }
}

// =============================================================================
// BUILT-IN RULES
// =============================================================================

/**
 * 0 + x → x
 */
export const addZeroLeft: Rule = rule(
  'add-0-l',
  add(num(0), any('right')),
  any('right')
);

/**
 * x + 0 → x
 */
export const addZeroRight: Rule = rule(
  'add-0-r',
  add(any('left'), num(0)),
  any('left')
);

/**
 * Built-in rules, in application order
 */
export const defaultRules: readonly Rule[] = Object.freeze([addZeroLeft, addZeroRight]);
