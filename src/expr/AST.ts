/**
 * Expression trees for the rewriter
 *
 * A tree is built from numeric constants and binary additions. Every node
 * owns its children outright: there is no sharing between trees and no
 * parent pointer, so a subtree may be handed to a new parent only after it
 * has been cloned or detached.
 */

import { InvariantError } from './Errors.js';

/**
 * Binding name attached to a node. The empty string means "unbound".
 */
export type Identifier = string;

export const NO_ID: Identifier = '';

/**
 * Placeholder value that matches any number. Only meaningful inside rule
 * patterns and templates.
 */
export type AnyNumber = 'any';

export const ANY_NUMBER: AnyNumber = 'any';

export type NumericValue = number | AnyNumber;

/**
 * Expression types
 */
export type Expression = NumericConstant | BinaryAddition;

/**
 * Numeric constant, concrete or wildcard
 */
export interface NumericConstant {
  readonly kind: 'numeric';
  readonly value: NumericValue;
  readonly id: Identifier;
}

/**
 * Binary addition (e.g. 1 + 2)
 */
export interface BinaryAddition {
  readonly kind: 'addition';
  left: Expression;
  right: Expression;
  readonly id: Identifier;
}

/**
 * Create a concrete numeric constant. Values are unsigned integers.
 */
export function num(value: number, id: Identifier = NO_ID): NumericConstant {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvariantError(
      'numeric constants must be unsigned integers',
      'num',
      `got ${value}`
    );
  }
  return { kind: 'numeric', value, id };
}

/**
 * Create a wildcard numeric constant ("any number")
 */
export function any(id: Identifier = NO_ID): NumericConstant {
  return { kind: 'numeric', value: ANY_NUMBER, id };
}

export function add(left: Expression, right: Expression, id: Identifier = NO_ID): BinaryAddition {
  return { kind: 'addition', left, right, id };
}

export function isWildcard(node: NumericConstant): boolean {
  return node.value === ANY_NUMBER;
}

/**
 * Replace the left subtree of `node` with `left`.
 */
export function replaceLeft(node: BinaryAddition, left: Expression): void {
  node.left = left;
}

/**
 * Replace the right subtree of `node` with `right`.
 */
export function replaceRight(node: BinaryAddition, right: Expression): void {
  node.right = right;
}

/**
 * Freeze an expression and every node below it. Replacing a child of a
 * frozen addition throws.
 */
export function freezeExpression(expr: Expression): Expression {
  if (expr.kind === 'addition') {
    freezeExpression(expr.left);
    freezeExpression(expr.right);
  }
  Object.freeze(expr);
  return expr;
}

/**
 * Deep copy of an expression. The copy shares no nodes with the original.
 */
export function clone(expr: Expression): Expression {
  switch (expr.kind) {
    case 'numeric':
      return { kind: 'numeric', value: expr.value, id: expr.id };

    case 'addition':
      return {
        kind: 'addition',
        left: clone(expr.left),
        right: clone(expr.right),
        id: expr.id
      };
  }
}
