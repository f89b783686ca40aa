import { describe, it, expect } from 'vitest';
import {
  InputParameterNode,
  MatrixNode,
  StateVectorDotNode,
  StateVectorNode,
  TimeNode,
  VariableNode,
  VectorNode
} from '../../src/expression/Leaves.js';
import { ScalarNode, toNode, type ExpressionNode } from '../../src/expression/ExpressionNode.js';
import { BinaryOperatorNode } from '../../src/expression/BinaryOperators.js';
import { UnaryOperatorNode } from '../../src/expression/UnaryOperators.js';
import { zerosLike } from '../../src/expression/Broadcasts.js';
import { evaluateIgnoringErrors } from '../../src/expression/ExpressionUtils.js';
import { EvaluationError, ShapeError, TypeMismatchError } from '../../src/expression/Errors.js';
import { isSparse, shapeOf } from '../../src/numeric/Backend.js';
import { evaluateScalar, toArray } from '../helpers.js';

describe('Leaves', () => {
  describe('StateVectorNode', () => {
    it('should pick the rows of every slice', () => {
      const y = new StateVectorNode([{ start: 0, stop: 2 }, { start: 4, stop: 5 }]);
      expect(y.name).toBe('y[0:2,4:5]');
      expect(y.size).toBe(3);
      expect(toArray(y.evaluate({ y: [10, 11, 12, 13, 14] }))).toEqual([[10], [11], [14]]);
    });

    it('should need a state vector', () => {
      const y = new StateVectorNode({ start: 0, stop: 3 });
      expect(() => y.evaluate()).toThrow(EvaluationError);
      expect(() => y.evaluate()).toThrow("Cannot evaluate 'y[0:3]': no state vector y provided");
    });

    it('should report a state vector that is too short', () => {
      const y = new StateVectorNode({ start: 0, stop: 3 });
      expect(() => y.evaluate({ y: [1, 2] })).toThrow('state vector has 2 entries, needs 3');
    });

    it('should reject empty or reversed slices', () => {
      expect(() => new StateVectorNode({ start: 3, stop: 1 })).toThrow('Invalid state vector slice 3:1');
      expect(() => new StateVectorNode({ start: 2, stop: 2 })).toThrow('Invalid state vector slice 2:2');
    });

    it('should select its rows from a larger state vector', () => {
      const part = new StateVectorNode({ start: 2, stop: 3 });
      const result = part.jacobianOf(new StateVectorNode({ start: 0, stop: 4 })).evaluate();
      expect(isSparse(result)).toBe(true);
      expect(toArray(result)).toEqual([[0, 0, 1, 0]]);
    });

    it('should have a NaN column as its shape', () => {
      const shape = new StateVectorNode({ start: 1, stop: 4 }).evaluateForShape();
      expect(shapeOf(shape)).toEqual([3, 1]);
      expect(toArray(shape).every(([v]) => Number.isNaN(v))).toBe(true);
    });
  });

  describe('StateVectorDotNode', () => {
    const yDot = new StateVectorDotNode({ start: 1, stop: 3 });

    it('should read rows of the time derivative', () => {
      expect(yDot.name).toBe('y_dot[1:3]');
      expect(toArray(yDot.evaluate({ y: [1, 2, 3], yDot: [5, 6, 7] }))).toEqual([[6], [7]]);
    });

    it('should need the time derivative even when y is given', () => {
      expect(() => yDot.evaluate({ y: [1, 2, 3] })).toThrow(
        "Cannot evaluate 'y_dot[1:3]': no state vector time derivative y_dot provided"
      );
    });

    it('should combine with state vector rows', () => {
      const y = new StateVectorNode({ start: 0, stop: 2 });
      const residual = new BinaryOperatorNode('-', yDot, y);
      expect(toArray(residual.evaluate({ y: [1, 2, 3], yDot: [5, 6, 7] }))).toEqual([[5], [5]]);
    });

    it('should have a zero Jacobian with respect to y', () => {
      const result = yDot.jacobianOf(new StateVectorNode({ start: 0, stop: 3 })).evaluate();
      expect(isSparse(result)).toBe(true);
      expect(toArray(result)).toEqual([[0, 0, 0], [0, 0, 0]]);
    });

    it('should keep its identity when copied', () => {
      const copy = yDot.newCopy();
      expect(copy).toBeInstanceOf(StateVectorDotNode);
      expect(copy.id).toBe(yDot.id);
      expect(copy.name).toBe('y_dot[1:3]');
    });
  });

  describe('scalar leaves', () => {
    it('should read time from the context', () => {
      const t = new TimeNode();
      expect(t.toString()).toBe('t');
      expect(evaluateScalar(t, { t: 2.5 })).toBe(2.5);
      expect(() => t.evaluate()).toThrow("Cannot evaluate 't': no time t provided");
    });

    it('should read inputs by name', () => {
      const a = new InputParameterNode('a');
      expect(evaluateScalar(a, { inputs: { a: 7 } })).toBe(7);
      expect(() => a.evaluate({ inputs: { b: 1 } })).toThrow("Cannot evaluate 'a': no input 'a' provided");
    });

    it('should refuse to evaluate an undiscretised variable', () => {
      const c = new VariableNode('c', { domain: ['separator'] });
      expect(() => c.evaluate()).toThrow(EvaluationError);
      expect(evaluateIgnoringErrors(c)).toBeUndefined();
      expect(shapeOf(c.evaluateForShape())).toEqual([4, 1]);
    });

    it('should name constants by their shape', () => {
      expect(new VectorNode([1, 2, 3]).name).toBe('Column vector of length 3');
      expect(new MatrixNode([[1, 2], [3, 4], [5, 6]]).name).toBe('Matrix of shape (3, 2)');
      expect(new ScalarNode(-2).name).toBe('-2');
    });
  });

  describe('copies', () => {
    it('should keep the identity of a copied leaf', () => {
      const a = new InputParameterNode('a');
      const copy = a.newCopy();
      expect(copy).not.toBe(a);
      expect(copy.id).toBe(a.id);
    });

    it('should let derivatives see through copied leaves', () => {
      const a = new InputParameterNode('a');
      const expr = new BinaryOperatorNode('*', a, 3).newCopy();
      expect(evaluateScalar(expr.diff(a), { inputs: { a: 1 } })).toBe(3);
    });

    it('should keep domains of copied operators', () => {
      const c = new VariableNode('c', { domain: ['separator'] });
      const copy = new UnaryOperatorNode('exp', c).newCopy();
      expect(copy.domain).toEqual(['separator']);
      expect(copy.toString()).toBe('exp(c)');
    });
  });

  describe('traversal', () => {
    it('should visit a shared subtree once', () => {
      const x = new InputParameterNode('x');
      let node: ExpressionNode = x;
      for (let i = 0; i < 40; i++) {
        node = new BinaryOperatorNode('+', node, node);
      }
      expect(Array.from(node.preOrder())).toHaveLength(41);
      expect(node.contains(x)).toBe(true);
      expect(node.contains(new InputParameterNode('x'))).toBe(false);
    });

    it('should list parents before children and left before right', () => {
      const a = new InputParameterNode('a');
      const b = new InputParameterNode('b');
      const root = new BinaryOperatorNode('*', new BinaryOperatorNode('+', a, b), a);
      expect(Array.from(root.preOrder()).map(n => n.toString())).toEqual(['(a + b) * a', 'a + b', 'a', 'b']);
    });
  });

  describe('operands', () => {
    it('should turn numbers into scalar nodes', () => {
      const node = toNode(4, '+');
      expect(node).toBeInstanceOf(ScalarNode);
      expect(node.evaluate()).toBe(4);
    });

    it('should reject anything else', () => {
      expect(() => toNode('4', '+')).toThrow(TypeMismatchError);
      expect(() => toNode(null, '+')).toThrow(
        "Type mismatch in '+': operands must be numbers or expression nodes (got null)"
      );
    });

    it('should only hide missing values when evaluating', () => {
      const node = new BinaryOperatorNode('+', new VectorNode([1, 2]), new VectorNode([1, 2, 3]));
      expect(() => evaluateIgnoringErrors(node)).toThrow(ShapeError);
    });
  });

  describe('unary operators', () => {
    const x = new InputParameterNode('x');

    it('should evaluate elementwise', () => {
      expect(evaluateScalar(new UnaryOperatorNode('exp', 0))).toBe(1);
      expect(toArray(new UnaryOperatorNode('floor', new VectorNode([1.5, -0.5])).evaluate())).toEqual([[1], [-1]]);
      expect(evaluateScalar(new UnaryOperatorNode('tanh', x), { inputs: { x: 0 } })).toBe(0);
    });

    it('should print negation with parentheses only where needed', () => {
      expect(new UnaryOperatorNode('negate', x).toString()).toBe('-x');
      expect(new UnaryOperatorNode('negate', new BinaryOperatorNode('+', x, 1)).toString()).toBe('-(x + 1)');
      expect(new UnaryOperatorNode('log', x).toString()).toBe('log(x)');
    });
  });

  describe('zerosLike', () => {
    it('should give a scalar zero for scalars', () => {
      const result = zerosLike(new ScalarNode(5));
      expect(result).toBeInstanceOf(ScalarNode);
      expect(result.evaluate()).toBe(0);
    });

    it('should give a zero vector with the domain of a variable', () => {
      const c = new VariableNode('c', { domain: ['separator'] });
      const result = zerosLike(c);
      expect(result).toBeInstanceOf(VectorNode);
      expect(result.domain).toEqual(['separator']);
      expect(toArray(result.evaluate())).toEqual([[0], [0], [0], [0]]);
    });

    it('should keep a sparse matrix sparse', () => {
      const y = new StateVectorNode({ start: 0, stop: 2 });
      const result = zerosLike(y.jacobianOf(y)).evaluate();
      expect(isSparse(result)).toBe(true);
      expect(toArray(result)).toEqual([[0, 0], [0, 0]]);
    });
  });
});
