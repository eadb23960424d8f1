/**
 * Zero elimination walkthrough
 *
 * Builds a few trees, optimizes them with the built-in rules and with a
 * custom rule list, and prints each step.
 */

import {
  num,
  any,
  add,
  rule,
  evaluate,
  optimizeWithStats,
  serializeExpression,
  defaultRules
} from '../src/index.js';

const trees = [
  add(num(0), num(1)),
  add(add(num(0), num(5)), num(0)),
  add(num(0), add(num(5), num(0))),
  add(num(2), num(3))
];

console.log('Rules:');
for (const r of defaultRules) {
  console.log(`  ${r.name}: ${serializeExpression(r.lhs)} => ${serializeExpression(r.rhs)}`);
}

for (const tree of trees) {
  const { expression, stats } = optimizeWithStats(tree);
  console.log(
    `${serializeExpression(tree)} = ${evaluate(tree)}  ->  ` +
    `${serializeExpression(expression)} = ${evaluate(expression)}  (${stats.rewrites} rewrite(s))`
  );
}

// Swapping the operands of a left-zero addition keeps the zero around
const swapZero = rule('swap-zero', add(num(0, 'zero'), any('x')), add(any('x'), any('zero')));
const swapped = optimizeWithStats(add(num(0), num(9)), { rules: [swapZero], verbose: true });
console.log(serializeExpression(swapped.expression));
