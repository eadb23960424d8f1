import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { num, any, add, clone, replaceLeft } from '../../src/expr/AST.js';
import { evaluate } from '../../src/expr/Evaluate.js';
import { serializeExpression, countNodes } from '../../src/expr/ExpressionUtils.js';
import { matchPattern } from '../../src/expr/rewrite/Pattern.js';
import { optimize, optimizeWithStats } from '../../src/expr/rewrite/Rewriter.js';
import { concreteTree, concreteAddition, sumLeaves, expectAddition } from '../helpers.js';

describe('Property Tests - Evaluation', () => {
  it('should equal the sum of all leaves', () => {
    fc.assert(
      fc.property(concreteTree(), tree => {
        expect(evaluate(tree)).toBe(sumLeaves(tree));
      })
    );
  });
});

describe('Property Tests - Optimization', () => {
  it('should preserve the value of every concrete tree', () => {
    fc.assert(
      fc.property(concreteTree(), tree => {
        expect(evaluate(optimize(tree))).toBe(evaluate(tree));
      })
    );
  });

  it('should never modify its input', () => {
    fc.assert(
      fc.property(concreteTree(), tree => {
        const before = serializeExpression(tree);
        optimize(tree);
        expect(serializeExpression(tree)).toBe(before);
      })
    );
  });

  it('should remove two nodes per rewrite', () => {
    fc.assert(
      fc.property(concreteTree(), tree => {
        const { expression, stats } = optimizeWithStats(tree);
        // Each zero elimination removes an addition and a leaf
        expect(countNodes(expression)).toBe(countNodes(tree) - 2 * stats.rewrites);
      })
    );
  });

  it('should reduce 0 + N to N', () => {
    fc.assert(
      fc.property(fc.nat({ max: 1_000_000 }), n => {
        expect(optimize(add(num(0), num(n)))).toEqual(num(n));
      })
    );
  });

  it('should reduce N + 0 to N', () => {
    fc.assert(
      fc.property(fc.nat({ max: 1_000_000 }), n => {
        expect(optimize(add(num(n), num(0)))).toEqual(num(n));
      })
    );
  });

  it('should leave N + M alone when neither is zero', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 1_000_000 }), fc.integer({ min: 1, max: 1_000_000 }), (n, m) => {
        const output = optimize(add(num(n), num(m)));
        expect(output).toEqual(add(num(n), num(m)));
        expect(evaluate(output)).toBe(n + m);
      })
    );
  });
});

describe('Property Tests - Matching', () => {
  it('should match a wildcard against any number in either position', () => {
    fc.assert(
      fc.property(fc.nat({ max: 1_000_000 }), k => {
        expect(matchPattern(any(), num(k))).toBe(true);
        expect(matchPattern(num(k), any())).toBe(true);
        expect(matchPattern(num(k), num(k))).toBe(true);
      })
    );
  });

  it('should not match different concrete numbers', () => {
    fc.assert(
      fc.property(fc.nat({ max: 1000 }), fc.nat({ max: 1000 }), (k, j) => {
        fc.pre(k !== j);
        expect(matchPattern(num(k), num(j))).toBe(false);
      })
    );
  });

  it('should match every tree against itself', () => {
    fc.assert(
      fc.property(concreteTree(), tree => {
        expect(matchPattern(tree, clone(tree))).toBe(true);
      })
    );
  });
});

describe('Property Tests - Clone', () => {
  it('should keep the original intact when the copy changes', () => {
    fc.assert(
      fc.property(concreteAddition(), fc.nat({ max: 1000 }), (tree, replacement) => {
        const value = evaluate(tree);
        const copy = expectAddition(clone(tree));

        replaceLeft(copy, num(replacement));

        expect(evaluate(tree)).toBe(value);
        expect(evaluate(copy)).toBe(replacement + evaluate(copy.right));
      })
    );
  });
});
