/**
 * Domain broadcasting and zero-filled look-alikes
 */

import { ExpressionNode, ScalarNode, toNode, type Operand } from './ExpressionNode.js';
import { EvaluationError } from './Errors.js';
import { evaluateForShapeUsingDomain, type AuxiliaryDomains, type Domain } from './Domains.js';
import { MatrixNode, VectorNode } from './Leaves.js';
import { isSparse, shapeOf, zeros, type Numeric } from '../numeric/Backend.js';

function broadcastAuxiliaryDomains(child: ExpressionNode): AuxiliaryDomains {
  const auxiliaryDomains: Record<string, Domain> = {};
  if (child.domain.length > 0) auxiliaryDomains.secondary = child.domain;
  const tertiary = child.auxiliaryDomains.secondary;
  if (tertiary !== undefined && tertiary.length > 0) auxiliaryDomains.tertiary = tertiary;
  return auxiliaryDomains;
}

/**
 * Replicates its child over a new primary domain. The child's own domain
 * moves to the secondary role.
 */
export class PrimaryBroadcastNode extends ExpressionNode {
  readonly type = 'PrimaryBroadcast' as const;
  readonly child: ExpressionNode;

  constructor(child: Operand, broadcastDomain: Domain | string) {
    const node = toNode(child, 'broadcast');
    const domain = typeof broadcastDomain === 'string' ? [broadcastDomain] : broadcastDomain;
    super('broadcast', [node], domain, broadcastAuxiliaryDomains(node));
    this.child = node;
  }

  evaluate(): Numeric {
    throw new EvaluationError('broadcast must be discretised before evaluation', this.name);
  }

  evaluateForShape(): Numeric {
    return evaluateForShapeUsingDomain(this.domain, this.auxiliaryDomains);
  }

  isConstant(): boolean {
    return this.child.isConstant();
  }

  protected derivative(variable: ExpressionNode): ExpressionNode {
    return new PrimaryBroadcastNode(this.child.diff(variable), this.domain);
  }

  withChild(child: ExpressionNode): PrimaryBroadcastNode {
    return new PrimaryBroadcastNode(child, this.domain);
  }

  newCopy(): PrimaryBroadcastNode {
    const copy = this.withChild(this.child.newCopy());
    copy.copyDomains(this);
    return copy;
  }

  toString(): string {
    return `broadcast(${this.child.toString()})`;
  }
}

/**
 * Zero with the shape and domains of `node`
 */
export function zerosLike(node: ExpressionNode): ExpressionNode {
  const shape = node.evaluateForShape();
  if (typeof shape === 'number') return new ScalarNode(0);

  const [rows, cols] = shapeOf(shape);
  const options = { domain: node.domain, auxiliaryDomains: node.auxiliaryDomains };
  if (cols === 1) return new VectorNode(new Array<number>(rows).fill(0), options);
  return new MatrixNode(zeros(rows, cols, isSparse(shape)), options);
}
