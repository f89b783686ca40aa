/**
 * Spatial operators kept symbolic until discretisation
 */

import { ExpressionNode, toNode, type Operand } from './ExpressionNode.js';
import { EvaluationError } from './Errors.js';
import { math, shapeOf, toNumeric, type Numeric } from '../numeric/Backend.js';

export type SpatialOperatorKind = 'grad' | 'mass' | 'boundary mass';

export class SpatialOperatorNode extends ExpressionNode {
  readonly type = 'SpatialOperator' as const;
  readonly kind: SpatialOperatorKind;
  readonly child: ExpressionNode;

  constructor(kind: SpatialOperatorKind, child: Operand) {
    const node = toNode(child, kind);
    super(kind, [node], node.domain, node.auxiliaryDomains);
    this.kind = kind;
    this.child = node;
  }

  evaluate(): Numeric {
    throw new EvaluationError(`${this.kind} must be discretised before evaluation`, this.name);
  }

  evaluateForShape(): Numeric {
    const childShape = this.child.evaluateForShape();
    if (this.kind === 'grad') return childShape;
    // mass matrices are square in the child's size
    const [rows] = shapeOf(childShape);
    return toNumeric(math.identity(rows, rows, 'sparse'));
  }

  evaluatesOnEdges(): boolean {
    return this.kind === 'grad';
  }

  withChild(child: ExpressionNode): SpatialOperatorNode {
    return new SpatialOperatorNode(this.kind, child);
  }

  newCopy(): SpatialOperatorNode {
    const copy = this.withChild(this.child.newCopy());
    copy.copyDomains(this);
    return copy;
  }

  toString(): string {
    return `${this.kind}(${this.child.toString()})`;
  }
}
