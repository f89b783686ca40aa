/**
 * Symbolic Jacobian with respect to a state vector
 */

import type { ExpressionNode } from './ExpressionNode.js';
import type { StateVectorNode } from './Leaves.js';
import { BinaryOperatorNode } from './BinaryOperators.js';
import { UnaryOperatorNode } from './UnaryOperators.js';

export interface JacobianOptions {
  /** Log the root expression and the size of the result */
  verbose?: boolean;
}

/**
 * Recursive Jacobian pass. Each node's Jacobian is built once per pass, so
 * shared subtrees share their Jacobian as well.
 */
export class Jacobian {
  private readonly memo = new Map<number, ExpressionNode>();

  constructor(private readonly variable: StateVectorNode) {}

  jac(node: ExpressionNode): ExpressionNode {
    const known = this.memo.get(node.id);
    if (known !== undefined) return known;

    const result = this.jacNode(node);
    this.memo.set(node.id, result);
    return result;
  }

  private jacNode(node: ExpressionNode): ExpressionNode {
    if (node instanceof BinaryOperatorNode) {
      return node.binaryJac(this.jac(node.left), this.jac(node.right));
    }
    if (node instanceof UnaryOperatorNode) {
      return node.unaryJac(this.jac(node.child));
    }
    return node.jacobianOf(this.variable);
  }
}

export function jacobian(node: ExpressionNode, y: StateVectorNode, options: JacobianOptions = {}): ExpressionNode {
  const { verbose = false } = options;
  const result = new Jacobian(y).jac(node);
  if (verbose) {
    console.log(`[jacobian] d(${node.toString()})/d${y.name}: ${Array.from(result.preOrder()).length} nodes`);
  }
  return result;
}
