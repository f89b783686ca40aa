/**
 * Simplification of expression trees.
 *
 * Passes never modify a node they did not create: shared subtrees are reused
 * as they are, and only freshly built nodes receive domain metadata.
 */

import { ScalarNode, peekNextId, type ExpressionNode } from './ExpressionNode.js';
import { BinaryOperatorNode, type BinaryOperatorKind } from './BinaryOperators.js';
import { UnaryOperatorNode } from './UnaryOperators.js';
import { PrimaryBroadcastNode, zerosLike } from './Broadcasts.js';
import { SpatialOperatorNode } from './SpatialOperators.js';
import { MatrixNode, VectorNode, type LeafOptions } from './Leaves.js';
import { evaluateIgnoringErrors, isMatrixZero, isScalarOne, isScalarZero } from './ExpressionUtils.js';
import { inner } from './Factories.js';
import { isSparse, shapeOf } from '../numeric/Backend.js';

/**
 * Replace a constant operator node by a leaf holding its value.
 * Scalars never carry domains; arrays keep them unless `clearDomains` is set.
 */
export function simplifyIfConstant(symbol: ExpressionNode, clearDomains = true): ExpressionNode {
  if (symbol.children.length === 0 || !symbol.isConstant()) return symbol;

  const value = evaluateIgnoringErrors(symbol);
  if (value === undefined) return symbol;
  if (typeof value === 'number') return new ScalarNode(value);

  const options: LeafOptions = clearDomains
    ? {}
    : { domain: symbol.domain, auxiliaryDomains: symbol.auxiliaryDomains };
  if (!isSparse(value) && shapeOf(value)[1] === 1) return new VectorNode(value, options);
  return new MatrixNode(value, options);
}

function constantNumber(node: ExpressionNode): number | undefined {
  if (!node.evaluatesToConstantNumber()) return undefined;
  const value = evaluateIgnoringErrors(node);
  return typeof value === 'number' ? value : undefined;
}

interface Term {
  node: ExpressionNode;
  sign: 1 | -1;
}

const flip = (sign: 1 | -1): 1 | -1 => (sign === 1 ? -1 : 1);

function collectTerms(node: ExpressionNode, sign: 1 | -1, terms: Term[]): number {
  if (node instanceof BinaryOperatorNode && (node.operator === '+' || node.operator === '-')) {
    const rightSign = node.operator === '-' ? flip(sign) : sign;
    return collectTerms(node.left, sign, terms) + collectTerms(node.right, rightSign, terms);
  }
  if (node instanceof UnaryOperatorNode && node.operator === 'negate') {
    return collectTerms(node.child, flip(sign), terms);
  }
  const value = constantNumber(node);
  if (value !== undefined) return sign * value;
  terms.push({ node, sign });
  return 0;
}

/**
 * Flatten a chain of additions and subtractions, summing its constant terms
 * into one trailing constant
 */
export function simplifyAdditionSubtraction(
  operator: BinaryOperatorKind,
  left: ExpressionNode,
  right: ExpressionNode
): ExpressionNode {
  const terms: Term[] = [];
  const constant = collectTerms(new BinaryOperatorNode(operator, left, right), 1, terms);

  let result: ExpressionNode | undefined;
  for (const { node, sign } of terms) {
    if (result === undefined) {
      result = sign === 1 ? node : new UnaryOperatorNode('negate', node);
    } else {
      result = new BinaryOperatorNode(sign === 1 ? '+' : '-', result, node);
    }
  }

  if (result === undefined) return new ScalarNode(constant);
  if (constant > 0) result = new BinaryOperatorNode('+', result, constant);
  if (constant < 0) result = new BinaryOperatorNode('-', result, -constant);
  // NaN constants are kept so they still poison the result
  if (Number.isNaN(constant)) result = new BinaryOperatorNode('+', result, constant);
  return simplifyIfConstant(result, false);
}

interface Factors {
  numerator: ExpressionNode[];
  denominator: ExpressionNode[];
}

function collectFactors(node: ExpressionNode, inverted: boolean, factors: Factors): number {
  if (node instanceof BinaryOperatorNode && (node.operator === '*' || node.operator === '/')) {
    const rightInverted = node.operator === '/' ? !inverted : inverted;
    return collectFactors(node.left, inverted, factors) * collectFactors(node.right, rightInverted, factors);
  }
  const value = constantNumber(node);
  // dividing by a constant zero stays visible in the tree
  if (value !== undefined && !(inverted && value === 0)) return inverted ? 1 / value : value;
  (inverted ? factors.denominator : factors.numerator).push(node);
  return 1;
}

/**
 * Zero and one rules, then flatten a chain of products and quotients with
 * the constant factors combined into a leading coefficient
 */
export function simplifyMultiplicationDivision(
  operator: BinaryOperatorKind,
  left: ExpressionNode,
  right: ExpressionNode
): ExpressionNode {
  // constant operands fold first, so 0 * NaN and 0 / 0 stay NaN
  if (left.isConstant() && right.isConstant()) {
    return simplifyIfConstant(new BinaryOperatorNode(operator, left, right), false);
  }
  if (operator === 'inner product') return inner(left, right);

  if (operator === '@') {
    const node = new BinaryOperatorNode('@', left, right);
    if (isMatrixZero(left) || isMatrixZero(right)) return zerosLike(node);
    return simplifyIfConstant(node, false);
  }

  const node = new BinaryOperatorNode(operator, left, right);
  const zeroRight = operator === '*' && (isScalarZero(right) || isMatrixZero(right));
  if (isScalarZero(left) || isMatrixZero(left) || zeroRight) return zerosLike(node);
  if (isScalarOne(right)) return left;
  if (operator === '*' && isScalarOne(left)) return right;

  const factors: Factors = { numerator: [], denominator: [] };
  const coefficient = collectFactors(node, false, factors);
  if (coefficient === 0) return zerosLike(node);

  let result: ExpressionNode | undefined = coefficient === 1 ? undefined : new ScalarNode(coefficient);
  for (const factor of factors.numerator) {
    result = result === undefined ? factor : new BinaryOperatorNode('*', result, factor);
  }
  if (result === undefined) result = new ScalarNode(1);
  for (const factor of factors.denominator) {
    result = new BinaryOperatorNode('/', result, factor);
  }
  return simplifyIfConstant(result, false);
}

export interface SimplificationOptions {
  /** Log each simplified root */
  verbose?: boolean;
}

/**
 * One simplification pass. Results are memoised by node id, so a subtree
 * shared by several parents is simplified once.
 */
export class Simplification {
  private readonly memo = new Map<number, ExpressionNode>();

  simplify(node: ExpressionNode): ExpressionNode {
    const known = this.memo.get(node.id);
    if (known !== undefined) return known;

    const result = this.simplifyNode(node);
    this.memo.set(node.id, result);
    return result;
  }

  private simplifyNode(node: ExpressionNode): ExpressionNode {
    if (node instanceof BinaryOperatorNode) {
      const left = this.simplify(node.left);
      const right = this.simplify(node.right);
      const watermark = peekNextId();
      return keepDomains(node, node.binarySimplify(left, right), watermark);
    }
    if (node instanceof UnaryOperatorNode) {
      const child = this.simplify(node.child);
      const watermark = peekNextId();
      return keepDomains(node, node.unarySimplify(child), watermark);
    }
    if (node instanceof PrimaryBroadcastNode || node instanceof SpatialOperatorNode) {
      const child = this.simplify(node.child);
      if (child === node.child) return node;
      const watermark = peekNextId();
      return keepDomains(node, node.withChild(child), watermark);
    }
    return node;
  }
}

/**
 * Give a node built by this pass the domains of the node it replaces
 */
function keepDomains(original: ExpressionNode, result: ExpressionNode, watermark: number): ExpressionNode {
  if (result.id >= watermark) result.copyDomains(original);
  return result;
}

export function simplify(node: ExpressionNode, options: SimplificationOptions = {}): ExpressionNode {
  const { verbose = false } = options;
  const result = new Simplification().simplify(node);
  if (verbose) {
    console.log(`[simplify] ${node.toString()} -> ${result.toString()}`);
  }
  return result;
}
