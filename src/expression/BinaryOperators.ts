/**
 * Two-child operator nodes.
 *
 * Every operator kind is one entry of the RULES table: how it evaluates, how
 * it differentiates, how its Jacobian is built from its children's Jacobians,
 * how it simplifies and how it prints. The table is keyed by the closed union
 * BinaryOperatorKind, so adding a kind without its rules does not compile.
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
import { UnsupportedOperationError } from './Errors.js';
import { combineAuxiliaryDomains, combineDomains, domainsEqual } from './Domains.js';
import { PrimaryBroadcastNode } from './Broadcasts.js';
import { ArrayNode, MatrixNode } from './Leaves.js';
import { UnaryOperatorNode } from './UnaryOperators.js';
import {
  add,
  divide,
  floor,
  greater,
  greaterEqual,
  less,
  lessEqual,
  log,
  matmul,
  multiply,
  negate,
  power,
  subtract
} from './Algebra.js';
import {
  simplifyAdditionSubtraction,
  simplifyIfConstant,
  simplifyMultiplicationDivision
} from './Simplify.js';
import * as numeric from '../numeric/Backend.js';
import type { Numeric } from '../numeric/Backend.js';

export type BinaryOperatorKind =
  | '+'
  | '-'
  | '*'
  | '@'
  | '/'
  | '**'
  | '%'
  | 'minimum'
  | 'maximum'
  | '<='
  | '<'
  | 'inner product';

type DerivativeRule = (node: BinaryOperatorNode, variable: ExpressionNode) => ExpressionNode;

interface BinaryOperatorRule {
  precedence: number;
  notation: 'infix' | 'call';
  symbol: string;
  evaluate(left: Numeric, right: Numeric): Numeric;
  diff: DerivativeRule | 'zero' | 'unsupported';
  jac(node: BinaryOperatorNode, leftJac: ExpressionNode, rightJac: ExpressionNode): ExpressionNode;
  simplify(node: BinaryOperatorNode, left: ExpressionNode, right: ExpressionNode): ExpressionNode;
}

/**
 * Which sides of a node evaluate to constant numbers
 */
function constness(node: BinaryOperatorNode): { left: boolean; right: boolean } {
  return {
    left: node.left.evaluatesToConstantNumber(),
    right: node.right.evaluatesToConstantNumber()
  };
}

const productDiff: DerivativeRule = ({ left, right }, v) =>
  add(multiply(left.diff(v), right), multiply(left, right.diff(v)));

function productJac(node: BinaryOperatorNode, leftJac: ExpressionNode, rightJac: ExpressionNode): ExpressionNode {
  const { left, right } = node;
  const constant = constness(node);
  if (constant.left && constant.right) return new ScalarNode(0);
  if (constant.left) return multiply(left, rightJac);
  if (constant.right) return multiply(right, leftJac);
  return add(multiply(right, leftJac), multiply(left, rightJac));
}

const foldConstants = (node: BinaryOperatorNode, left: ExpressionNode, right: ExpressionNode): ExpressionNode =>
  simplifyIfConstant(node.binaryNewCopy(left, right), false);

const combineSums = (node: BinaryOperatorNode, left: ExpressionNode, right: ExpressionNode): ExpressionNode =>
  simplifyAdditionSubtraction(node.operator, left, right);

const combineProducts = (node: BinaryOperatorNode, left: ExpressionNode, right: ExpressionNode): ExpressionNode =>
  simplifyMultiplicationDivision(node.operator, left, right);

const heavisideJac = (): ExpressionNode => new ScalarNode(0);

const RULES: { readonly [K in BinaryOperatorKind]: BinaryOperatorRule } = {
  '+': {
    precedence: 1,
    notation: 'infix',
    symbol: '+',
    evaluate: numeric.add,
    diff: ({ left, right }, v) => add(left.diff(v), right.diff(v)),
    jac: (_, lj, rj) => add(lj, rj),
    simplify: combineSums
  },
  '-': {
    precedence: 1,
    notation: 'infix',
    symbol: '-',
    evaluate: numeric.subtract,
    diff: ({ left, right }, v) => subtract(left.diff(v), right.diff(v)),
    jac: (_, lj, rj) => subtract(lj, rj),
    simplify: combineSums
  },
  '*': {
    precedence: 2,
    notation: 'infix',
    symbol: '*',
    evaluate: numeric.hadamard,
    diff: productDiff,
    jac: productJac,
    simplify: combineProducts
  },
  '@': {
    precedence: 2,
    notation: 'infix',
    symbol: '@',
    evaluate: numeric.matmul,
    diff: 'unsupported',
    jac: (node, _, rightJac) => {
      const { left } = node;
      const isArray =
        left instanceof ArrayNode ||
        (left instanceof UnaryOperatorNode && left.operator === 'negate' && left.child instanceof ArrayNode);
      if (!isArray) {
        throw new UnsupportedOperationError(
          `cannot take the Jacobian of '${node.toString()}'`,
          '@',
          'left operand must be a constant array or its negation'
        );
      }
      return matmul(new MatrixNode(numeric.toSparseMatrix(left.evaluate())), rightJac);
    },
    simplify: combineProducts
  },
  '/': {
    precedence: 2,
    notation: 'infix',
    symbol: '/',
    evaluate: numeric.divide,
    diff: ({ left, right }, v) =>
      divide(subtract(multiply(left.diff(v), right), multiply(left, right.diff(v))), power(right, 2)),
    jac: (node, lj, rj) => {
      const { left, right } = node;
      const constant = constness(node);
      if (constant.left && constant.right) return new ScalarNode(0);
      if (constant.left) return multiply(divide(negate(left), power(right, 2)), rj);
      if (constant.right) return divide(lj, right);
      return divide(subtract(multiply(right, lj), multiply(left, rj)), power(right, 2));
    },
    simplify: combineProducts
  },
  '**': {
    precedence: 3,
    notation: 'infix',
    symbol: '**',
    evaluate: numeric.power,
    diff: ({ left: base, right: exponent }, v) => {
      const baseTerm = multiply(multiply(exponent, power(base, subtract(exponent, 1))), base.diff(v));
      if (!exponent.contains(v)) return baseTerm;
      return add(baseTerm, multiply(multiply(power(base, exponent), log(base)), exponent.diff(v)));
    },
    jac: (node, lj, rj) => {
      const { left, right } = node;
      const constant = constness(node);
      if (constant.left && constant.right) return new ScalarNode(0);
      if (constant.right) return multiply(multiply(right, power(left, subtract(right, 1))), lj);
      if (constant.left) return multiply(multiply(power(left, right), log(left)), rj);
      return multiply(
        power(left, subtract(right, 1)),
        add(multiply(right, lj), multiply(multiply(left, log(left)), rj))
      );
    },
    simplify: foldConstants
  },
  '%': {
    precedence: 2,
    notation: 'infix',
    symbol: 'mod',
    evaluate: numeric.modulo,
    diff: ({ left, right }, v) => {
      const leftDiff = left.diff(v);
      if (!right.contains(v)) return leftDiff;
      return subtract(leftDiff, multiply(floor(divide(left, right)), right.diff(v)));
    },
    jac: (node, lj, rj) => {
      const { left, right } = node;
      const constant = constness(node);
      if (constant.left && constant.right) return new ScalarNode(0);
      if (constant.right) return lj;
      if (constant.left) return multiply(negate(rj), floor(divide(left, right)));
      return subtract(lj, multiply(rj, floor(divide(left, right))));
    },
    simplify: foldConstants
  },
  minimum: {
    precedence: Infinity,
    notation: 'call',
    symbol: 'minimum',
    evaluate: numeric.minimum,
    diff: ({ left, right }, v) =>
      add(multiply(lessEqual(left, right), left.diff(v)), multiply(greater(left, right), right.diff(v))),
    jac: ({ left, right }, lj, rj) =>
      add(multiply(lessEqual(left, right), lj), multiply(greater(left, right), rj)),
    simplify: foldConstants
  },
  maximum: {
    precedence: Infinity,
    notation: 'call',
    symbol: 'maximum',
    evaluate: numeric.maximum,
    diff: ({ left, right }, v) =>
      add(multiply(greaterEqual(left, right), left.diff(v)), multiply(less(left, right), right.diff(v))),
    jac: ({ left, right }, lj, rj) =>
      add(multiply(greaterEqual(left, right), lj), multiply(less(left, right), rj)),
    simplify: foldConstants
  },
  '<=': {
    precedence: 0,
    notation: 'infix',
    symbol: '<=',
    evaluate: numeric.lessEqual,
    diff: 'zero',
    jac: heavisideJac,
    simplify: foldConstants
  },
  '<': {
    precedence: 0,
    notation: 'infix',
    symbol: '<',
    evaluate: numeric.less,
    diff: 'zero',
    jac: heavisideJac,
    simplify: foldConstants
  },
  'inner product': {
    precedence: Infinity,
    notation: 'call',
    symbol: 'inner',
    evaluate: numeric.innerProduct,
    diff: productDiff,
    jac: productJac,
    simplify: combineProducts
  }
};

/**
 * Normalise operands and broadcast one side when its domain is the other
 * side's secondary domain
 */
function formatChildren(
  operator: BinaryOperatorKind,
  left: Operand,
  right: Operand
): [ExpressionNode, ExpressionNode] {
  let l = toNode(left, operator);
  let r = toNode(right, operator);

  if (l.domain.length > 0 && r.domain.length > 0 && !domainsEqual(l.domain, r.domain)) {
    const rightSecondary = r.auxiliaryDomains.secondary;
    const leftSecondary = l.auxiliaryDomains.secondary;
    if (rightSecondary !== undefined && domainsEqual(l.domain, rightSecondary)) {
      l = new PrimaryBroadcastNode(l, r.domain);
    } else if (leftSecondary !== undefined && domainsEqual(r.domain, leftSecondary)) {
      r = new PrimaryBroadcastNode(r, l.domain);
    }
  }
  return [l, r];
}

export class BinaryOperatorNode extends ExpressionNode {
  readonly type = 'BinaryOperator' as const;
  readonly operator: BinaryOperatorKind;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;

  constructor(operator: BinaryOperatorKind, left: Operand, right: Operand) {
    const children = formatChildren(operator, left, right);
    const [l, r] = children;
    super(operator, children, combineDomains(l.domain, r.domain), combineAuxiliaryDomains(children));
    this.operator = operator;
    this.left = l;
    this.right = r;
  }

  /**
   * Combine already evaluated children
   */
  binaryEvaluate(left: Numeric, right: Numeric): Numeric {
    return RULES[this.operator].evaluate(left, right);
  }

  evaluate(context: EvaluationContext = {}): Numeric {
    const left = this.left.evaluate(context);
    const right = this.right.evaluate(context);
    return this.binaryEvaluate(left, right);
  }

  /**
   * Evaluate each shared subexpression at most once per call
   */
  evaluateMemoized(context: EvaluationContext, knownEvals: KnownEvaluations): Evaluated {
    const known = knownEvals.get(this.id);
    if (known !== undefined) return { value: known, knownEvals };

    const { value: left } = this.left.evaluateMemoized(context, knownEvals);
    const { value: right } = this.right.evaluateMemoized(context, knownEvals);
    const value = this.binaryEvaluate(left, right);
    knownEvals.set(this.id, value);
    return { value, knownEvals };
  }

  evaluateForShape(): Numeric {
    return this.binaryEvaluate(this.left.evaluateForShape(), this.right.evaluateForShape());
  }

  isConstant(): boolean {
    return this.left.isConstant() && this.right.isConstant();
  }

  evaluatesOnEdges(dimension: string): boolean {
    if (this.operator === 'inner product') return false;
    return super.evaluatesOnEdges(dimension);
  }

  diff(variable: ExpressionNode): ExpressionNode {
    const rule = RULES[this.operator].diff;
    if (rule === 'unsupported') {
      throw new UnsupportedOperationError(
        'cannot differentiate matrix multiplication',
        this.operator,
        'take the Jacobian of the discretised expression instead'
      );
    }
    if (rule === 'zero') return new ScalarNode(0);
    return super.diff(variable);
  }

  protected derivative(variable: ExpressionNode): ExpressionNode {
    const rule = RULES[this.operator].diff;
    if (typeof rule !== 'function') return this.diff(variable);
    return rule(this, variable);
  }

  binaryJac(leftJac: ExpressionNode, rightJac: ExpressionNode): ExpressionNode {
    return RULES[this.operator].jac(this, leftJac, rightJac);
  }

  binaryNewCopy(left: ExpressionNode, right: ExpressionNode): BinaryOperatorNode {
    return new BinaryOperatorNode(this.operator, left, right);
  }

  /**
   * Copy with copied children. The copy keeps this node's domains even where
   * the copied children would combine to something else.
   */
  newCopy(): BinaryOperatorNode {
    const copy = this.binaryNewCopy(this.left.newCopy(), this.right.newCopy());
    copy.copyDomains(this);
    return copy;
  }

  binarySimplify(left: ExpressionNode, right: ExpressionNode): ExpressionNode {
    return RULES[this.operator].simplify(this, left, right);
  }

  precedence(): number {
    return RULES[this.operator].precedence;
  }

  toString(): string {
    const rule = RULES[this.operator];
    if (rule.notation === 'call') {
      return `${rule.symbol}(${this.left.toString()}, ${this.right.toString()})`;
    }
    return `${this.formatChild(this.left, 'left')} ${rule.symbol} ${this.formatChild(this.right, 'right')}`;
  }

  private formatChild(child: ExpressionNode, side: 'left' | 'right'): string {
    const text = child.toString();
    return this.needsParentheses(child, side) ? `(${text})` : text;
  }

  private needsParentheses(child: ExpressionNode, side: 'left' | 'right'): boolean {
    const own = this.precedence();
    const other = child.precedence();
    if (other !== own) return other < own;
    if (!(child instanceof BinaryOperatorNode)) return false;

    // ** associates to the right, everything else to the left
    if (this.operator === '**') return side === 'left';
    // comparisons do not chain
    if (own === 0) return true;
    if (side === 'left') return false;
    const associative =
      (this.operator === '+' && child.operator === '+') || (this.operator === '*' && child.operator === '*');
    return !associative;
  }
}
