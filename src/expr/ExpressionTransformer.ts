/**
 * ExpressionTransformer - Abstract base class for tree rewriting passes
 *
 * Provides the default top-down traversal: every node is rebuilt into a
 * fresh tree, so a pass never shares nodes with its input. Subclasses
 * override a visit method to replace whole subtrees.
 *
 * Usage:
 *   class MyPass extends ExpressionTransformer {
 *     protected visitAddition(node: BinaryAddition): Expression {
 *       if (shouldReplace(node)) return replacement(node);
 *       return super.visitAddition(node);
 *     }
 *   }
 */

import { Expression, NumericConstant, BinaryAddition, add, clone } from './AST.js';

export abstract class ExpressionTransformer {
  /**
   * Main entry point for transforming an expression
   */
  transform(expr: Expression): Expression {
    switch (expr.kind) {
      case 'numeric':
        return this.visitNumeric(expr);
      case 'addition':
        return this.visitAddition(expr);
    }
  }

  /**
   * Visit a numeric constant
   * Default: verbatim copy
   */
  protected visitNumeric(node: NumericConstant): Expression {
    return clone(node);
  }

  /**
   * Visit a binary addition
   * Default: transform left then right, reassemble under the same binding name
   */
  protected visitAddition(node: BinaryAddition): Expression {
    const left = this.transform(node.left);
    const right = this.transform(node.right);
    return add(left, right, node.id);
  }
}
