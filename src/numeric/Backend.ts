/**
 * Numeric backend for expression evaluation.
 *
 * Values are either plain numbers or two-dimensional mathjs matrices (dense or
 * sparse storage). Vectors are n x 1 columns. Elementwise operations broadcast
 * a length-1 axis against any length and follow IEEE-754 semantics: NaN and
 * infinities flow through without raising.
 */

import { create, all } from 'mathjs';
import type { Matrix } from 'mathjs';
import { ShapeError, TypeMismatchError } from '../expression/Errors.js';

// epsilon 0: comparisons are exact instead of treating values within a relative 1e-12 as equal
export const math = create(all, { matrix: 'Matrix', predictable: true, epsilon: 0 });

export type Numeric = number | Matrix;

export type Shape = readonly [number, number];

type StorageFormat = 'dense' | 'sparse';

export function isSparse(value: Numeric): value is Matrix {
  return typeof value !== 'number' && value.storage() === 'sparse';
}

function toScalar(entry: unknown): number {
  if (typeof entry === 'number') return entry;
  if (typeof entry === 'boolean') return entry ? 1 : 0;
  throw new TypeMismatchError('matrix entries must be real numbers', 'evaluate', typeof entry);
}

/**
 * Read a matrix into plain row arrays. One-dimensional data becomes a column.
 */
export function toRows(value: Numeric): number[][] {
  if (typeof value === 'number') return [[value]];
  const data: unknown = value.toArray();
  if (!Array.isArray(data)) {
    throw new TypeMismatchError('matrix data must be an array', 'evaluate', typeof data);
  }
  return data.map((row: unknown) => (Array.isArray(row) ? row.map(toScalar) : [toScalar(row)]));
}

export function fromRows(rows: readonly (readonly number[])[], sparse = false): Matrix {
  const format: StorageFormat = sparse ? 'sparse' : 'dense';
  return math.matrix(rows.map(row => [...row]), format);
}

/**
 * Build an n x 1 column vector
 */
export function column(values: readonly number[], sparse = false): Matrix {
  return fromRows(values.map(v => [v]), sparse);
}

export function zeros(rows: number, cols: number, sparse = false): Matrix {
  return fromRows(Array.from({ length: rows }, () => new Array<number>(cols).fill(0)), sparse);
}

export function shapeOf(value: Numeric): Shape {
  if (typeof value === 'number') return [1, 1];
  const size = value.size();
  if (size.length === 1) return [size[0], 1];
  return [size[0], size[1]];
}

export function sameShape(left: Numeric, right: Numeric): boolean {
  const [lr, lc] = shapeOf(left);
  const [rr, rc] = shapeOf(right);
  return lr === rr && lc === rc;
}

export function toDense(value: Matrix): Matrix {
  return isSparse(value) ? fromRows(toRows(value)) : value;
}

export function toSparse(value: Numeric): Numeric {
  if (typeof value === 'number' || isSparse(value)) return value;
  return fromRows(toRows(value), true);
}

export function toSparseMatrix(value: Numeric): Matrix {
  if (typeof value === 'number') return fromRows([[value]], true);
  return isSparse(value) ? value : fromRows(toRows(value), true);
}

/**
 * Normalise whatever mathjs (or a caller) hands back into a Numeric value
 */
export function toNumeric(value: unknown): Numeric {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (math.isMatrix(value)) {
    return value.size().length === 1 ? fromRows(toRows(value), isSparse(value)) : value;
  }
  if (Array.isArray(value)) {
    return fromRows(value.map((row: unknown) => (Array.isArray(row) ? row.map(toScalar) : [toScalar(row)])));
  }
  throw new TypeMismatchError('expected a number or a matrix', 'evaluate', typeof value);
}

/**
 * Coerce a state vector argument (plain array, number or matrix) into a column
 */
export function toColumn(value: Numeric | readonly number[]): Matrix {
  if (typeof value === 'number') return column([value]);
  if (Array.isArray(value)) return column(value);
  if (typeof value === 'object' && math.isMatrix(value)) {
    return shapeOf(value)[1] === 1 ? toDense(value) : column(toRows(value).flat());
  }
  throw new TypeMismatchError('state must be a number, an array or a matrix', 'evaluate', typeof value);
}

function broadcastShape(left: Shape, right: Shape): Shape {
  const dim = (l: number, r: number): number => {
    if (l === r || r === 1) return l;
    if (l === 1) return r;
    throw new ShapeError('operands could not be broadcast together', left, right);
  };
  return [dim(left[0], right[0]), dim(left[1], right[1])];
}

/**
 * Operands ready for a mathjs elementwise function. Shapes that differ are
 * checked here and densified, since mathjs broadcasts dense storage only.
 */
function broadcastable(left: Numeric, right: Numeric): [Numeric, Numeric] {
  if (typeof left === 'number' || typeof right === 'number' || sameShape(left, right)) {
    return [left, right];
  }
  broadcastShape(shapeOf(left), shapeOf(right));
  return [toDense(left), toDense(right)];
}

/**
 * Dense copy of `value` broadcast to `shape`
 */
function stretch(value: Numeric, [rows, cols]: Shape): Matrix {
  const stretched = toNumeric(math.add(zeros(rows, cols), value));
  return typeof stretched === 'number' ? fromRows([[stretched]]) : toDense(stretched);
}

/**
 * Elementwise kernel with no mathjs counterpart
 */
function combine(left: Numeric, right: Numeric, fn: (a: number, b: number) => number): Numeric {
  if (typeof left === 'number' && typeof right === 'number') return fn(left, right);
  const shape = broadcastShape(shapeOf(left), shapeOf(right));
  const others = stretch(right, shape);
  return toNumeric(math.map(stretch(left, shape), (value: number, index: number[]) => fn(value, others.get(index))));
}

/**
 * Comparison results (booleans) as 0/1
 */
function indicator(value: unknown): Numeric {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (math.isMatrix(value)) return toNumeric(math.map(value, (v: unknown) => (v === true ? 1 : 0)));
  return toNumeric(value);
}

export function mapElements(value: Numeric, fn: (v: number) => number): Numeric {
  if (typeof value === 'number') return fn(value);
  return toNumeric(math.map(toDense(value), (v: number) => fn(v)));
}

export function add(left: Numeric, right: Numeric): Numeric {
  if (typeof left === 'number' && typeof right === 'number') return left + right;
  const [l, r] = broadcastable(left, right);
  return toNumeric(math.add(l, r));
}

export function subtract(left: Numeric, right: Numeric): Numeric {
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  const [l, r] = broadcastable(left, right);
  return toNumeric(math.subtract(l, r));
}

function elementwiseProduct(left: Numeric, right: Numeric): Numeric {
  const [l, r] = broadcastable(left, right);
  return toNumeric(math.dotMultiply(l, r));
}

/**
 * Elementwise (Hadamard) product. A sparse operand keeps the result sparse.
 */
export function hadamard(left: Numeric, right: Numeric): Numeric {
  const product = elementwiseProduct(left, right);
  return isSparse(left) || isSparse(right) ? toSparse(product) : product;
}

/**
 * Same product as hadamard, without forcing the storage format of the result
 */
export function innerProduct(left: Numeric, right: Numeric): Numeric {
  return elementwiseProduct(left, right);
}

/**
 * Elementwise quotient. Dividing by the exact scalar zero multiplies by
 * infinity so the sign of the numerator survives.
 */
export function divide(left: Numeric, right: Numeric): Numeric {
  if (isSparse(left)) {
    return toSparse(elementwiseProduct(left, toNumeric(math.dotDivide(1, right))));
  }
  if (typeof right === 'number' && right === 0) {
    return toNumeric(math.dotMultiply(left, Infinity));
  }
  const [l, r] = broadcastable(left, right);
  return toNumeric(math.dotDivide(l, r));
}

// Math.pow rather than math.dotPow, which takes the real odd root: dotPow(-8, 1/3) is -2, not NaN
export function power(left: Numeric, right: Numeric): Numeric {
  return combine(left, right, Math.pow);
}

/**
 * Floored remainder left - right * floor(left / right): the result takes the
 * sign of the divisor, and a zero divisor gives NaN
 */
export function modulo(left: Numeric, right: Numeric): Numeric {
  const [l, r] = broadcastable(left, right);
  const quotient = mapElements(toNumeric(math.dotDivide(l, r)), Math.floor);
  return subtract(left, elementwiseProduct(right, quotient));
}

export function minimum(left: Numeric, right: Numeric): Numeric {
  return combine(left, right, Math.min);
}

export function maximum(left: Numeric, right: Numeric): Numeric {
  return combine(left, right, Math.max);
}

export function lessEqual(left: Numeric, right: Numeric): Numeric {
  const [l, r] = broadcastable(left, right);
  return indicator(math.smallerEq(l, r));
}

export function less(left: Numeric, right: Numeric): Numeric {
  const [l, r] = broadcastable(left, right);
  return indicator(math.smaller(l, r));
}

/**
 * True matrix product. The result is sparse only when both operands are.
 */
export function matmul(left: Numeric, right: Numeric): Numeric {
  if (typeof left === 'number' || typeof right === 'number') {
    throw new ShapeError('matrix multiplication needs matrix operands', shapeOf(left), shapeOf(right));
  }
  const [, innerLeft] = shapeOf(left);
  const [innerRight] = shapeOf(right);
  if (innerLeft !== innerRight) {
    throw new ShapeError('inner dimensions do not agree', shapeOf(left), shapeOf(right));
  }
  const product = toNumeric(math.multiply(left, right));
  if (isSparse(left) && isSparse(right)) return toSparse(product);
  return typeof product === 'number' ? product : toDense(product);
}

export function negate(value: Numeric): Numeric {
  if (typeof value === 'number') return -value;
  return toNumeric(math.unaryMinus(value));
}

export function allZero(value: Numeric): boolean {
  return toRows(value).every(row => row.every(v => v === 0));
}
