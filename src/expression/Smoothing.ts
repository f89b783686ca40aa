/**
 * Minimum, maximum and Heaviside factories with optional smooth
 * approximations, selected by SmoothingSettings
 */

import type { ExpressionNode, Operand } from './ExpressionNode.js';
import { BinaryOperatorNode } from './BinaryOperators.js';
import { add, divide, exp, log, multiply, subtract, tanh } from './Algebra.js';
import { simplifyIfConstant } from './Simplify.js';
import { preprocess } from './ExpressionUtils.js';
import { resolveSettings, type SmoothingSettings } from './Settings.js';

/**
 * Smooth minimum: log(exp(-k l) + exp(-k r)) / -k
 */
export function softminus(left: Operand, right: Operand, k: number): ExpressionNode {
  return divide(log(add(exp(multiply(-k, left)), exp(multiply(-k, right)))), -k);
}

/**
 * Smooth maximum: log(exp(k l) + exp(k r)) / k
 */
export function softplus(left: Operand, right: Operand, k: number): ExpressionNode {
  return divide(log(add(exp(multiply(k, left)), exp(multiply(k, right)))), k);
}

/**
 * Smooth step from 0 (left well above right) to 1 (left well below right)
 */
export function sigmoid(left: Operand, right: Operand, k: number): ExpressionNode {
  return divide(add(1, tanh(multiply(k, subtract(right, left)))), 2);
}

export function minimum(left: Operand, right: Operand, settings: Partial<SmoothingSettings> = {}): ExpressionNode {
  const k = resolveSettings(settings).minSmoothing;
  const [l, r] = preprocess(left, right, 'minimum');
  const node =
    k === 'exact' || (l.isConstant() && r.isConstant())
      ? new BinaryOperatorNode('minimum', l, r)
      : softminus(l, r, k);
  return simplifyIfConstant(node, false);
}

export function maximum(left: Operand, right: Operand, settings: Partial<SmoothingSettings> = {}): ExpressionNode {
  const k = resolveSettings(settings).maxSmoothing;
  const [l, r] = preprocess(left, right, 'maximum');
  const node =
    k === 'exact' || (l.isConstant() && r.isConstant())
      ? new BinaryOperatorNode('maximum', l, r)
      : softplus(l, r, k);
  return simplifyIfConstant(node, false);
}

export interface HeavisideOptions {
  /** left <= right when set, left < right otherwise */
  equal?: boolean;
  settings?: Partial<SmoothingSettings>;
}

/**
 * Step function of left - right
 */
export function heaviside(left: Operand, right: Operand, options: HeavisideOptions = {}): ExpressionNode {
  const { equal = true, settings = {} } = options;
  const k = resolveSettings(settings).heavisideSmoothing;
  if (k !== 'exact') return sigmoid(left, right, k);
  return simplifyIfConstant(new BinaryOperatorNode(equal ? '<=' : '<', left, right), false);
}
