/**
 * Small predicates shared by the simplifier and the factories
 */

import { toNode, type EvaluationContext, type ExpressionNode } from './ExpressionNode.js';
import { EvaluationError } from './Errors.js';
import { allZero, type Numeric } from '../numeric/Backend.js';

/**
 * Evaluate, treating "value not available" as undefined. Every other error
 * propagates.
 */
export function evaluateIgnoringErrors(node: ExpressionNode, context: EvaluationContext = {}): Numeric | undefined {
  try {
    return node.evaluate(context);
  } catch (error) {
    if (error instanceof EvaluationError) return undefined;
    throw error;
  }
}

function constantValue(node: ExpressionNode): Numeric | undefined {
  return node.isConstant() ? evaluateIgnoringErrors(node) : undefined;
}

function isScalar(node: ExpressionNode, x: number): boolean {
  const value = constantValue(node);
  return typeof value === 'number' && value === x;
}

export function isScalarZero(node: ExpressionNode): boolean {
  return isScalar(node, 0);
}

export function isScalarOne(node: ExpressionNode): boolean {
  return isScalar(node, 1);
}

/**
 * Constant matrix (dense or sparse) whose entries are all zero
 */
export function isMatrixZero(node: ExpressionNode): boolean {
  const value = constantValue(node);
  return value !== undefined && typeof value !== 'number' && allZero(value);
}

/**
 * Normalise both operands of a factory call
 */
export function preprocess(left: unknown, right: unknown, operation: string): [ExpressionNode, ExpressionNode] {
  return [toNode(left, operation), toNode(right, operation)];
}
