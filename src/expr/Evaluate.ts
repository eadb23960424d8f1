/**
 * Evaluation of concrete expression trees
 */

import { Expression, ANY_NUMBER } from './AST.js';
import { InvariantError } from './Errors.js';

/**
 * Evaluate an expression to its numeric result.
 *
 * The tree must be fully concrete. A wildcard means a pattern is being used
 * as data, which is a programming error rather than a recoverable failure.
 */
export function evaluate(expr: Expression): number {
  switch (expr.kind) {
    case 'numeric':
      if (expr.value === ANY_NUMBER) {
        const binding = expr.id ? `?${expr.id}` : '?';
        throw new InvariantError('cannot evaluate a wildcard', 'evaluate', binding);
      }
      return expr.value;

    case 'addition':
      return evaluate(expr.left) + evaluate(expr.right);
  }
}
