/**
 * Test helper utilities shared by the expression and rewrite specs
 */

import * as fc from 'fast-check';
import { Expression, BinaryAddition, num, add } from '../src/expr/AST.js';
import { serializeExpression } from '../src/expr/ExpressionUtils.js';
import { flattenExpressions } from '../src/expr/rewrite/Pattern.js';

/**
 * Narrow an expression to an addition, failing the test otherwise
 */
export function expectAddition(expr: Expression): BinaryAddition {
  if (expr.kind !== 'addition') {
    throw new Error(`Expected an addition, got ${serializeExpression(expr)}`);
  }
  return expr;
}

/**
 * Sum of every concrete leaf, computed without the evaluator
 */
export function sumLeaves(expr: Expression): number {
  let total = 0;
  for (const node of flattenExpressions(expr)) {
    if (node.kind === 'numeric' && node.value !== 'any') {
      total += node.value;
    }
  }
  return total;
}

/**
 * Concrete leaves, biased towards zero so the built-in rules fire often
 */
export const concreteLeaf: fc.Arbitrary<Expression> = fc
  .oneof(fc.constant(0), fc.nat({ max: 1000 }))
  .map(value => num(value));

/**
 * Concrete trees (no wildcards) of bounded depth
 *
 * @example
 * fc.assert(fc.property(concreteTree(), tree => evaluate(tree) >= 0));
 */
export function concreteTree(maxDepth: number = 5): fc.Arbitrary<Expression> {
  const { tree } = fc.letrec<{ tree: Expression; node: Expression }>(tie => ({
    tree: fc.oneof({ maxDepth }, concreteLeaf, tie('node')),
    node: fc.tuple(tie('tree'), tie('tree')).map(([left, right]) => add(left, right))
  }));
  return tree;
}

/**
 * Concrete trees whose root is an addition
 */
export function concreteAddition(maxDepth: number = 4): fc.Arbitrary<BinaryAddition> {
  return fc
    .tuple(concreteTree(maxDepth), concreteTree(maxDepth))
    .map(([left, right]) => add(left, right));
}
