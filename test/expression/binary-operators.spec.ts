import { describe, it, expect, vi } from 'vitest';
import { BinaryOperatorNode, type BinaryOperatorKind } from '../../src/expression/BinaryOperators.js';
import { UnaryOperatorNode } from '../../src/expression/UnaryOperators.js';
import { SpatialOperatorNode } from '../../src/expression/SpatialOperators.js';
import { ScalarNode, toNode } from '../../src/expression/ExpressionNode.js';
import { MatrixNode, StateVectorNode, VariableNode } from '../../src/expression/Leaves.js';
import { TypeMismatchError } from '../../src/expression/Errors.js';
import { fromRows, isSparse } from '../../src/numeric/Backend.js';
import { evaluateScalar, toArray } from '../helpers.js';

describe('Binary Operators', () => {
  describe('construction', () => {
    it('should turn numbers into scalar nodes', () => {
      const node = new BinaryOperatorNode('+', 2, 3);
      expect(node.left).toBeInstanceOf(ScalarNode);
      expect(node.right).toBeInstanceOf(ScalarNode);
      expect(node.children).toEqual([node.left, node.right]);
      expect(node.operator).toBe('+');
      expect(node.name).toBe('+');
    });

    it('should reject operands that are not numbers or nodes', () => {
      expect(() => toNode('x', '+')).toThrow(TypeMismatchError);
      expect(() => toNode(null, '*')).toThrow("Type mismatch in '*': operands must be numbers or expression nodes (got null)");
    });

    it('should keep operand order', () => {
      const a = new VariableNode('a');
      const b = new VariableNode('b');
      const node = new BinaryOperatorNode('*', a, b);
      expect(node.left).toBe(a);
      expect(node.right).toBe(b);
    });
  });

  describe('evaluation', () => {
    const cases: [BinaryOperatorKind, number, number, number][] = [
      ['+', 2, 3, 5],
      ['-', 2, 3, -1],
      ['*', 2, 3, 6],
      ['/', 6, 3, 2],
      ['**', 2, 3, 8],
      ['%', -7, 3, 2],
      ['minimum', 3, 5, 3],
      ['maximum', 3, 5, 5],
      ['<=', 2, 2, 1],
      ['<', 2, 2, 0],
      ['inner product', 2, 3, 6]
    ];

    for (const [operator, left, right, expected] of cases) {
      it(`should evaluate ${left} ${operator} ${right}`, () => {
        expect(evaluateScalar(new BinaryOperatorNode(operator, left, right))).toBe(expected);
      });
    }

    it('should evaluate against the state vector', () => {
      const y = new StateVectorNode({ start: 0, stop: 3 });
      const node = new BinaryOperatorNode('*', y, 2);
      expect(toArray(node.evaluate({ y: [1, 2, 3] }))).toEqual([[2], [4], [6]]);
    });

    it('should divide by zero to signed infinity', () => {
      const y = new StateVectorNode({ start: 0, stop: 3 });
      const [[pos], [neg], [nan]] = toArray(new BinaryOperatorNode('/', y, 0).evaluate({ y: [1, -1, 0] }));
      expect(pos).toBe(Infinity);
      expect(neg).toBe(-Infinity);
      expect(nan).toBeNaN();
    });

    it('should treat equal operands as inside the closed step only', () => {
      expect(evaluateScalar(new BinaryOperatorNode('<=', 2, 2))).toBe(1);
      expect(evaluateScalar(new BinaryOperatorNode('<', 2, 2))).toBe(0);
    });

    it('should let NaN through comparisons and powers', () => {
      expect(evaluateScalar(new BinaryOperatorNode('**', -8, 1 / 3))).toBeNaN();
      expect(evaluateScalar(new BinaryOperatorNode('<', NaN, 1))).toBe(0);
    });
  });

  describe('sparse and dense operands', () => {
    const rows = [[1, 0], [0, 2]];
    const other = [[3, 4], [5, 6]];
    const expected = [[3, 0], [0, 12]];

    for (const operator of ['*', 'inner product'] as const) {
      it(`should give the same ${operator} for every storage combination`, () => {
        const dense = new BinaryOperatorNode(operator, new MatrixNode(rows), new MatrixNode(other));
        const sparseLeft = new BinaryOperatorNode(operator, new MatrixNode(fromRows(rows, true)), new MatrixNode(other));
        const sparseRight = new BinaryOperatorNode(operator, new MatrixNode(rows), new MatrixNode(fromRows(other, true)));

        expect(toArray(dense.evaluate())).toEqual(expected);
        expect(toArray(sparseLeft.evaluate())).toEqual(expected);
        expect(toArray(sparseRight.evaluate())).toEqual(expected);
      });
    }

    it('should keep multiplication by a sparse matrix sparse', () => {
      const node = new BinaryOperatorNode('*', new MatrixNode(fromRows(rows, true)), new MatrixNode(other));
      expect(isSparse(node.evaluate())).toBe(true);
    });
  });

  describe('memoised evaluation', () => {
    it('should match plain evaluation', () => {
      const y = new StateVectorNode({ start: 0, stop: 2 });
      const node = new BinaryOperatorNode('/', new BinaryOperatorNode('**', y, 2), new BinaryOperatorNode('+', y, 1));
      const context = { y: [1, 3] };

      const { value } = node.evaluateMemoized(context, new Map());
      expect(toArray(value)).toEqual(toArray(node.evaluate(context)));
    });

    it('should evaluate a shared subexpression once', () => {
      const y = new StateVectorNode({ start: 0, stop: 2 });
      const shared = new BinaryOperatorNode('*', y, 2);
      const root = new BinaryOperatorNode(
        '*',
        new BinaryOperatorNode('+', shared, 1),
        new BinaryOperatorNode('-', shared, 1)
      );
      const spy = vi.spyOn(shared, 'binaryEvaluate');

      const knownEvals = new Map();
      const result = root.evaluateMemoized({ y: [1, 2] }, knownEvals);

      expect(spy).toHaveBeenCalledTimes(1);
      expect(toArray(result.value)).toEqual([[3], [15]]);
      expect(result.knownEvals).toBe(knownEvals);
      expect(knownEvals.has(shared.id)).toBe(true);
      expect(knownEvals.has(root.id)).toBe(true);
    });

    it('should evaluate a shared subexpression per parent without a memo', () => {
      const y = new StateVectorNode({ start: 0, stop: 2 });
      const shared = new BinaryOperatorNode('*', y, 2);
      const root = new BinaryOperatorNode('+', new BinaryOperatorNode('+', shared, 1), shared);
      const spy = vi.spyOn(shared, 'binaryEvaluate');

      root.evaluate({ y: [1, 2] });
      expect(spy).toHaveBeenCalledTimes(2);
    });

    it('should reuse a value already in the memo', () => {
      const node = new BinaryOperatorNode('+', 1, 2);
      const knownEvals = new Map([[node.id, 42]]);
      expect(node.evaluateMemoized({}, knownEvals).value).toBe(42);
    });
  });

  describe('copy', () => {
    it('should evaluate like the original and keep its domains', () => {
      const y = new StateVectorNode(
        { start: 0, stop: 2 },
        { domain: ['negative electrode'], auxiliaryDomains: { secondary: ['current collector'] } }
      );
      const node = new BinaryOperatorNode('*', y, 3);
      const copy = node.newCopy();

      expect(copy).not.toBe(node);
      expect(copy.id).not.toBe(node.id);
      expect(copy.operator).toBe('*');
      expect(toArray(copy.evaluate({ y: [1, 2] }))).toEqual([[3], [6]]);
      expect(copy.domain).toEqual(['negative electrode']);
      expect(copy.auxiliaryDomains).toEqual({ secondary: ['current collector'] });
    });

    it('should copy leaves under the same identity', () => {
      const y = new StateVectorNode({ start: 0, stop: 2 });
      const copy = new BinaryOperatorNode('+', y, 1).newCopy();
      expect(copy.left).not.toBe(y);
      expect(copy.left.id).toBe(y.id);
    });
  });

  describe('node properties', () => {
    it('should be constant only when both sides are', () => {
      expect(new BinaryOperatorNode('+', 2, 3).isConstant()).toBe(true);
      expect(new BinaryOperatorNode('+', new StateVectorNode({ start: 0, stop: 1 }), 3).isConstant()).toBe(false);
    });

    it('should evaluate on edges when a child does, except for inner products', () => {
      const x = new VariableNode('x', { domain: ['negative electrode'] });
      const grad = new SpatialOperatorNode('grad', x);
      expect(new BinaryOperatorNode('+', grad, 1).evaluatesOnEdges('primary')).toBe(true);
      expect(new BinaryOperatorNode('+', x, 1).evaluatesOnEdges('primary')).toBe(false);
      expect(new BinaryOperatorNode('inner product', grad, grad).evaluatesOnEdges('primary')).toBe(false);
    });
  });

  describe('printing', () => {
    const a = new VariableNode('a');
    const b = new VariableNode('b');
    const c = new VariableNode('c');
    const op = (operator: BinaryOperatorKind, left: BinaryOperatorNode | VariableNode | number, right: BinaryOperatorNode | VariableNode | number) =>
      new BinaryOperatorNode(operator, left, right);

    it('should omit parentheses around tighter children', () => {
      expect(op('+', op('*', a, b), c).toString()).toBe('a * b + c');
    });

    it('should parenthesise looser children', () => {
      expect(op('*', op('+', a, b), c).toString()).toBe('(a + b) * c');
    });

    it('should respect left associativity', () => {
      expect(op('-', op('-', a, b), c).toString()).toBe('a - b - c');
      expect(op('-', a, op('-', b, c)).toString()).toBe('a - (b - c)');
      expect(op('/', a, op('*', b, c)).toString()).toBe('a / (b * c)');
      expect(op('+', a, op('+', b, c)).toString()).toBe('a + b + c');
      expect(op('*', a, op('*', b, c)).toString()).toBe('a * b * c');
    });

    it('should respect right associativity of powers', () => {
      expect(op('**', a, op('**', b, c)).toString()).toBe('a ** b ** c');
      expect(op('**', op('**', a, b), c).toString()).toBe('(a ** b) ** c');
    });

    it('should never chain comparisons', () => {
      expect(op('<=', a, op('<', b, c)).toString()).toBe('a <= (b < c)');
    });

    it('should print call-style operators', () => {
      expect(op('minimum', a, op('+', b, c)).toString()).toBe('minimum(a, b + c)');
      expect(op('maximum', a, 2).toString()).toBe('maximum(a, 2)');
      expect(op('inner product', a, b).toString()).toBe('inner(a, b)');
      expect(op('%', a, b).toString()).toBe('a mod b');
      expect(op('@', a, b).toString()).toBe('a @ b');
    });

    it('should handle negative scalars and negation', () => {
      expect(op('*', a, -3).toString()).toBe('a * -3');
      expect(op('**', -2, a).toString()).toBe('(-2) ** a');
      expect(new BinaryOperatorNode('+', new UnaryOperatorNode('negate', a), b).toString()).toBe('-a + b');
      expect(new UnaryOperatorNode('negate', op('+', a, b)).toString()).toBe('-(a + b)');
    });
  });
});
