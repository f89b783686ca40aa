/**
 * Factories that may short-circuit to a simpler node instead of allocating
 * the operator node
 */

import type { ExpressionNode, Operand } from './ExpressionNode.js';
import { BinaryOperatorNode } from './BinaryOperators.js';
import { PrimaryBroadcastNode, zerosLike } from './Broadcasts.js';
import { SpatialOperatorNode } from './SpatialOperators.js';
import { DomainError } from './Errors.js';
import { domainsEqual } from './Domains.js';
import { matmul } from './Algebra.js';
import { simplifyIfConstant } from './Simplify.js';
import { isMatrixZero, isScalarOne, isScalarZero, preprocess } from './ExpressionUtils.js';

/**
 * Inner product, skipping the node for zero and one operands
 */
export function inner(left: Operand, right: Operand): ExpressionNode {
  const [l, r] = preprocess(left, right, 'inner product');

  if (isScalarZero(l)) return zerosLike(r);
  if (isScalarZero(r)) return zerosLike(l);
  if (isMatrixZero(l) || isMatrixZero(r)) return zerosLike(new BinaryOperatorNode('inner product', l, r));
  if (isScalarOne(l)) return r;
  if (isScalarOne(r)) return l;
  return simplifyIfConstant(new BinaryOperatorNode('inner product', l, r), false);
}

const CURRENT_COLLECTOR = ['current collector'];

/**
 * Source term `right` weighted by `left` on the current collector:
 * mass(right) @ left, or boundary mass(right) @ left
 */
export function source(left: Operand, right: ExpressionNode, boundary = false): ExpressionNode {
  const l = typeof left === 'number' ? new PrimaryBroadcastNode(left, CURRENT_COLLECTOR) : left;

  if (!domainsEqual(l.domain, CURRENT_COLLECTOR) || !domainsEqual(right.domain, CURRENT_COLLECTOR)) {
    throw new DomainError("'source' is only implemented on the 'current collector' domain", l.domain, right.domain);
  }

  const mass = new SpatialOperatorNode(boundary ? 'boundary mass' : 'mass', right);
  return matmul(mass, l);
}
