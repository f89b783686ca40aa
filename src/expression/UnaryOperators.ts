/**
 * Single-child operators used by derivative rules and smoothing
 */

import {
  ExpressionNode,
  ScalarNode,
  toNode,
  type EvaluationContext,
  type Evaluated,
  type KnownEvaluations,
  type Operand
} from './ExpressionNode.js';
import { divide, multiply, negate, power, subtract } from './Algebra.js';
import { simplifyIfConstant } from './Simplify.js';
import { mapElements, negate as negateValue, type Numeric } from '../numeric/Backend.js';

export type UnaryOperatorKind = 'negate' | 'floor' | 'log' | 'exp' | 'tanh';

interface UnaryOperatorRule {
  evaluate(value: Numeric): Numeric;
  /** d(node)/dv given the child's derivative */
  diff(node: UnaryOperatorNode, childDiff: ExpressionNode): ExpressionNode;
  /** Jacobian given the child's Jacobian */
  jac(node: UnaryOperatorNode, childJac: ExpressionNode): ExpressionNode;
}

// 1 - tanh(u)^2
const tanhSlope = (node: UnaryOperatorNode): ExpressionNode => subtract(1, power(node, 2));

const RULES: { readonly [K in UnaryOperatorKind]: UnaryOperatorRule } = {
  negate: {
    evaluate: negateValue,
    diff: (_, d) => negate(d),
    jac: (_, j) => negate(j)
  },
  floor: {
    evaluate: value => mapElements(value, Math.floor),
    diff: () => new ScalarNode(0),
    jac: () => new ScalarNode(0)
  },
  log: {
    evaluate: value => mapElements(value, Math.log),
    diff: (node, d) => divide(d, node.child),
    jac: (node, j) => divide(j, node.child)
  },
  exp: {
    evaluate: value => mapElements(value, Math.exp),
    diff: (node, d) => multiply(node, d),
    jac: (node, j) => multiply(node, j)
  },
  tanh: {
    evaluate: value => mapElements(value, Math.tanh),
    diff: (node, d) => multiply(tanhSlope(node), d),
    jac: (node, j) => multiply(tanhSlope(node), j)
  }
};

export class UnaryOperatorNode extends ExpressionNode {
  readonly type = 'UnaryOperator' as const;
  readonly operator: UnaryOperatorKind;
  readonly child: ExpressionNode;

  constructor(operator: UnaryOperatorKind, child: Operand) {
    const node = toNode(child, operator);
    super(operator, [node], node.domain, node.auxiliaryDomains);
    this.operator = operator;
    this.child = node;
  }

  evaluate(context: EvaluationContext = {}): Numeric {
    return RULES[this.operator].evaluate(this.child.evaluate(context));
  }

  evaluateMemoized(context: EvaluationContext, knownEvals: KnownEvaluations): Evaluated {
    const known = knownEvals.get(this.id);
    if (known !== undefined) return { value: known, knownEvals };

    const { value: childValue } = this.child.evaluateMemoized(context, knownEvals);
    const value = RULES[this.operator].evaluate(childValue);
    knownEvals.set(this.id, value);
    return { value, knownEvals };
  }

  evaluateForShape(): Numeric {
    return RULES[this.operator].evaluate(this.child.evaluateForShape());
  }

  isConstant(): boolean {
    return this.child.isConstant();
  }

  protected derivative(variable: ExpressionNode): ExpressionNode {
    return RULES[this.operator].diff(this, this.child.diff(variable));
  }

  unaryJac(childJac: ExpressionNode): ExpressionNode {
    return RULES[this.operator].jac(this, childJac);
  }

  unaryNewCopy(child: ExpressionNode): UnaryOperatorNode {
    return new UnaryOperatorNode(this.operator, child);
  }

  newCopy(): UnaryOperatorNode {
    const copy = this.unaryNewCopy(this.child.newCopy());
    copy.copyDomains(this);
    return copy;
  }

  unarySimplify(child: ExpressionNode): ExpressionNode {
    return simplifyIfConstant(this.unaryNewCopy(child), false);
  }

  precedence(): number {
    return this.operator === 'negate' ? 2.5 : Infinity;
  }

  toString(): string {
    if (this.operator !== 'negate') return `${this.operator}(${this.child.toString()})`;
    const inner = this.child.toString();
    return this.child.precedence() <= this.precedence() ? `-(${inner})` : `-${inner}`;
  }
}
