/**
 * Shared utility functions for expression inspection
 */

import { Expression, NumericConstant, ANY_NUMBER, isWildcard } from './AST.js';

/**
 * Serialize an expression as an S-expression.
 *
 * Concrete numbers print as their value, wildcards as `?name` (or a bare `?`
 * when unbound), additions as `(+ left right)`.
 */
export function serializeExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'numeric':
      return expr.value === ANY_NUMBER ? `?${expr.id}` : `${expr.value}`;

    case 'addition':
      return `(+ ${serializeExpression(expr.left)} ${serializeExpression(expr.right)})`;
  }
}

/**
 * Collect the wildcard leaves of an expression, left to right
 */
export function collectWildcards(expr: Expression): NumericConstant[] {
  switch (expr.kind) {
    case 'numeric':
      return isWildcard(expr) ? [expr] : [];

    case 'addition':
      return [...collectWildcards(expr.left), ...collectWildcards(expr.right)];
  }
}

/**
 * Count the nodes in an expression
 */
export function countNodes(expr: Expression): number {
  switch (expr.kind) {
    case 'numeric':
      return 1;

    case 'addition':
      return 1 + countNodes(expr.left) + countNodes(expr.right);
  }
}
