/**
 * Node builders used inside derivative and Jacobian rules.
 * Each builds the node and folds it to a constant when it can.
 */

import type { ExpressionNode, Operand } from './ExpressionNode.js';
import { BinaryOperatorNode, type BinaryOperatorKind } from './BinaryOperators.js';
import { UnaryOperatorNode, type UnaryOperatorKind } from './UnaryOperators.js';
import { simplifyIfConstant } from './Simplify.js';

function build(operator: BinaryOperatorKind, left: Operand, right: Operand): ExpressionNode {
  return simplifyIfConstant(new BinaryOperatorNode(operator, left, right), false);
}

function buildUnary(operator: UnaryOperatorKind, child: Operand): ExpressionNode {
  return simplifyIfConstant(new UnaryOperatorNode(operator, child), false);
}

export const add = (left: Operand, right: Operand): ExpressionNode => build('+', left, right);
export const subtract = (left: Operand, right: Operand): ExpressionNode => build('-', left, right);
export const multiply = (left: Operand, right: Operand): ExpressionNode => build('*', left, right);
export const matmul = (left: Operand, right: Operand): ExpressionNode => build('@', left, right);
export const divide = (left: Operand, right: Operand): ExpressionNode => build('/', left, right);
export const power = (left: Operand, right: Operand): ExpressionNode => build('**', left, right);
export const modulo = (left: Operand, right: Operand): ExpressionNode => build('%', left, right);
export const lessEqual = (left: Operand, right: Operand): ExpressionNode => build('<=', left, right);
export const less = (left: Operand, right: Operand): ExpressionNode => build('<', left, right);

// a >= b is b <= a, a > b is b < a
export const greaterEqual = (left: Operand, right: Operand): ExpressionNode => build('<=', right, left);
export const greater = (left: Operand, right: Operand): ExpressionNode => build('<', right, left);

export const negate = (child: Operand): ExpressionNode => buildUnary('negate', child);
export const floor = (child: Operand): ExpressionNode => buildUnary('floor', child);
export const log = (child: Operand): ExpressionNode => buildUnary('log', child);
export const exp = (child: Operand): ExpressionNode => buildUnary('exp', child);
export const tanh = (child: Operand): ExpressionNode => buildUnary('tanh', child);
