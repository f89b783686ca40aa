/**
 * Test helper utilities to reduce boilerplate in test files
 */

import type { ExpressionNode, EvaluationContext } from '../src/expression/ExpressionNode.js';
import type { InputParameterNode } from '../src/expression/Leaves.js';
import { GradientChecker, type GradCheckResult } from '../src/expression/GradientChecker.js';
import { toRows, type Numeric } from '../src/numeric/Backend.js';

/**
 * Dense row arrays of a value, for toEqual assertions
 */
export function toArray(value: Numeric): number[][] {
  return toRows(value);
}

/**
 * Evaluate a node that must produce a plain number
 */
export function evaluateScalar(node: ExpressionNode, context: EvaluationContext = {}): number {
  const value = node.evaluate(context);
  if (typeof value !== 'number') {
    throw new Error(`Expected a number from '${node.toString()}'`);
  }
  return value;
}

/**
 * Check d(expression)/d(variable) against finite differences
 *
 * @example
 * const x = new InputParameterNode('x');
 * const result = checkDerivative(new BinaryOperatorNode('*', x, x), x, [1, 2, 3]);
 * expect(result.passed).toBe(true);
 */
export function checkDerivative(
  expression: ExpressionNode,
  variable: InputParameterNode,
  points: readonly number[],
  inputs: Readonly<Record<string, number>> = {}
): GradCheckResult {
  return new GradientChecker().check(expression, variable, points, inputs);
}
