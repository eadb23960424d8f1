/**
 * Pattern Matching and Substitution for Rewrite Rules
 *
 * Patterns are ordinary expression trees whose numeric leaves may be
 * wildcards. Binding names on pattern nodes tie positions in a rule's input
 * pattern to positions in its output template.
 *
 * Binding is positional: the matched subtree and the input pattern are both
 * flattened in post-order, and because a successful match guarantees the two
 * trees have the same shape, index i of one sequence names the node at index
 * i of the other. This relies on binding names being unique within a pattern,
 * which `rule()` checks.
 */

import {
  Expression,
  Identifier,
  NumericConstant,
  ANY_NUMBER,
  NO_ID,
  num,
  any,
  add,
  isWildcard
} from '../AST.js';
import { InvariantError } from '../Errors.js';

/**
 * Decide whether `pattern` structurally matches `query`.
 *
 * Addition is not matched commutatively, and binding names play no part in
 * the decision.
 */
export function matchPattern(pattern: Expression, query: Expression): boolean {
  switch (pattern.kind) {
    case 'numeric':
      return query.kind === 'numeric' && matchNumeric(pattern, query);

    case 'addition':
      return query.kind === 'addition'
        && matchPattern(pattern.left, query.left)
        && matchPattern(pattern.right, query.right);
  }
}

function matchNumeric(pattern: NumericConstant, query: NumericConstant): boolean {
  // A wildcard on either side matches a literal or another wildcard
  if (isWildcard(pattern) || isWildcard(query)) {
    return true;
  }
  return pattern.value === query.value;
}

/**
 * Flatten an expression into its nodes, post-order (left, right, self)
 */
export function flattenExpressions(root: Expression): Expression[] {
  const expressions: Expression[] = [];
  flattenExpressionsTo(root, expressions);
  return expressions;
}

function flattenExpressionsTo(root: Expression, expressions: Expression[]): void {
  switch (root.kind) {
    case 'addition':
      flattenExpressionsTo(root.left, expressions);
      flattenExpressionsTo(root.right, expressions);
      expressions.push(root);
      break;

    case 'numeric':
      expressions.push(root);
      break;
  }
}

/**
 * Flatten the binding names of an expression, in the same post-order as
 * `flattenExpressions`
 */
export function flattenIdentifiers(root: Expression): Identifier[] {
  return flattenExpressions(root).map(node => node.id);
}

/**
 * Instantiate an output template against a flattened match.
 *
 * `expressions` is the flattened matched subtree and `identifiers` the
 * flattened binding names of the input pattern that matched it. The result
 * is a fresh tree sharing no nodes with the template or the match.
 */
export function instantiatePattern(
  template: Expression,
  expressions: readonly Expression[],
  identifiers: readonly Identifier[]
): Expression {
  switch (template.kind) {
    case 'addition': {
      const left = instantiatePattern(template.left, expressions, identifiers);
      const right = instantiatePattern(template.right, expressions, identifiers);
      return add(left, right);
    }

    case 'numeric': {
      if (template.value !== ANY_NUMBER) {
        return num(template.value);
      }
      const bound = lookupBinding(template.id, expressions, identifiers);
      return bound.value === ANY_NUMBER ? any() : num(bound.value);
    }
  }
}

function lookupBinding(
  id: Identifier,
  expressions: readonly Expression[],
  identifiers: readonly Identifier[]
): NumericConstant {
  if (id === NO_ID) {
    throw new InvariantError('wildcard in template has no binding name', 'instantiate');
  }

  const index = identifiers.indexOf(id);
  if (index === -1) {
    throw new InvariantError('binding name not found in input pattern', 'instantiate', `?${id}`);
  }

  const bound = expressions[index];
  if (bound === undefined || bound.kind !== 'numeric') {
    throw new InvariantError('binding does not refer to a numeric constant', 'instantiate', `?${id}`);
  }
  return bound;
}
