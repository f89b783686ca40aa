/**
 * Leaf nodes: constants, state vector slices, variables, inputs and time
 */

import type { Matrix } from 'mathjs';
import { ExpressionNode, ScalarNode, missing, type EvaluationContext } from './ExpressionNode.js';
import { EvaluationError } from './Errors.js';
import { evaluateForShapeUsingDomain, type AuxiliaryDomains, type Domain } from './Domains.js';
import {
  column,
  fromRows,
  math,
  shapeOf,
  toColumn,
  toRows,
  zeros,
  type Numeric,
  type Shape
} from '../numeric/Backend.js';

export interface LeafOptions {
  name?: string;
  domain?: Domain;
  auxiliaryDomains?: AuxiliaryDomains;
}

function toMatrix(entries: Matrix | readonly (readonly number[])[]): Matrix {
  return math.isMatrix(entries) ? entries : fromRows(entries);
}

/**
 * Constant dense or sparse array
 */
export class ArrayNode extends ExpressionNode {
  readonly type = 'Array' as const;
  readonly entries: Matrix;

  constructor(entries: Matrix | readonly (readonly number[])[], options: LeafOptions = {}) {
    const matrix = toMatrix(entries);
    const [rows, cols] = shapeOf(matrix);
    const { name = `Array of shape (${rows}, ${cols})`, domain = [], auxiliaryDomains = {} } = options;
    super(name, [], domain, auxiliaryDomains);
    this.entries = matrix;
  }

  get shape(): Shape {
    return shapeOf(this.entries);
  }

  get size(): number {
    const [rows, cols] = this.shape;
    return rows * cols;
  }

  protected get leafOptions(): LeafOptions {
    return { name: this.name, domain: this.domain, auxiliaryDomains: this.auxiliaryDomains };
  }

  evaluate(): Numeric {
    return this.entries;
  }

  evaluateForShape(): Numeric {
    return this.entries;
  }

  isConstant(): boolean {
    return true;
  }

  jacobianOf(variable: StateVectorNode): ExpressionNode {
    return new MatrixNode(zeros(this.size, variable.size, true));
  }

  newCopy(): ArrayNode {
    const copy = new ArrayNode(this.entries, this.leafOptions);
    copy.adoptIdentity(this);
    return copy;
  }

  toString(): string {
    return this.name;
  }
}

export class MatrixNode extends ArrayNode {
  constructor(entries: Matrix | readonly (readonly number[])[], options: LeafOptions = {}) {
    const [rows, cols] = shapeOf(toMatrix(entries));
    super(entries, { name: `Matrix of shape (${rows}, ${cols})`, ...options });
  }

  newCopy(): MatrixNode {
    const copy = new MatrixNode(this.entries, this.leafOptions);
    copy.adoptIdentity(this);
    return copy;
  }
}

/**
 * Constant column vector
 */
export class VectorNode extends ArrayNode {
  constructor(entries: Matrix | readonly number[], options: LeafOptions = {}) {
    const matrix = math.isMatrix(entries) ? entries : column(entries);
    super(matrix, { name: `Column vector of length ${shapeOf(matrix)[0]}`, ...options });
  }

  newCopy(): VectorNode {
    const copy = new VectorNode(this.entries, this.leafOptions);
    copy.adoptIdentity(this);
    return copy;
  }
}

/**
 * Half-open range of state vector rows
 */
export interface StateSlice {
  start: number;
  stop: number;
}

function formatSlices(prefix: string, slices: readonly StateSlice[]): string {
  return `${prefix}[${slices.map(s => `${s.start}:${s.stop}`).join(',')}]`;
}

function toSliceList(slices: StateSlice | readonly StateSlice[]): readonly StateSlice[] {
  const list = 'start' in slices ? [slices] : slices;
  for (const { start, stop } of list) {
    if (!Number.isInteger(start) || !Number.isInteger(stop) || start < 0 || stop <= start) {
      throw new Error(`Invalid state vector slice ${start}:${stop}`);
    }
  }
  return list;
}

/**
 * Rows picked out of one of the solver's state vectors
 */
abstract class StateSliceNode extends ExpressionNode {
  readonly slices: readonly StateSlice[];

  protected constructor(prefix: string, slices: StateSlice | readonly StateSlice[], options: LeafOptions) {
    const list = toSliceList(slices);
    const { name = formatSlices(prefix, list), domain = [], auxiliaryDomains = {} } = options;
    super(name, [], domain, auxiliaryDomains);
    this.slices = list;
  }

  /** What the error names when the context lacks the vector */
  protected abstract readonly description: string;

  protected abstract stateFrom(context: EvaluationContext): Numeric | readonly number[] | undefined;

  indices(): number[] {
    const result: number[] = [];
    for (const { start, stop } of this.slices) {
      for (let i = start; i < stop; i++) result.push(i);
    }
    return result;
  }

  get size(): number {
    return this.indices().length;
  }

  protected get leafOptions(): LeafOptions {
    return { name: this.name, domain: this.domain, auxiliaryDomains: this.auxiliaryDomains };
  }

  evaluate(context: EvaluationContext = {}): Numeric {
    const state = this.stateFrom(context);
    if (state === undefined) return missing(this.description, this);
    const rows = toRows(toColumn(state));
    const indices = this.indices();
    const last = indices[indices.length - 1];
    if (last >= rows.length) {
      throw new EvaluationError(`state vector has ${rows.length} entries, needs ${last + 1}`, this.name);
    }
    return column(indices.map(i => rows[i][0]));
  }

  evaluateForShape(): Numeric {
    return column(new Array<number>(this.size).fill(NaN));
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Rows of the solver's state vector y
 */
export class StateVectorNode extends StateSliceNode {
  readonly type = 'StateVector' as const;
  protected readonly description = 'state vector y';

  constructor(slices: StateSlice | readonly StateSlice[], options: LeafOptions = {}) {
    super('y', slices, options);
  }

  protected stateFrom(context: EvaluationContext): Numeric | readonly number[] | undefined {
    return context.y;
  }

  /**
   * Sparse 0/1 matrix picking this slice's rows out of `variable`
   */
  jacobianOf(variable: StateVectorNode): ExpressionNode {
    const columns = variable.indices();
    const rows = this.indices().map(i => columns.map(j => (i === j ? 1 : 0)));
    return new MatrixNode(fromRows(rows, true));
  }

  newCopy(): StateVectorNode {
    const copy = new StateVectorNode(this.slices, this.leafOptions);
    copy.adoptIdentity(this);
    return copy;
  }
}

/**
 * Rows of the time derivative of the state vector, read from `context.yDot`
 */
export class StateVectorDotNode extends StateSliceNode {
  readonly type = 'StateVectorDot' as const;
  protected readonly description = 'state vector time derivative y_dot';

  constructor(slices: StateSlice | readonly StateSlice[], options: LeafOptions = {}) {
    super('y_dot', slices, options);
  }

  protected stateFrom(context: EvaluationContext): Numeric | readonly number[] | undefined {
    return context.yDot;
  }

  /**
   * y_dot is independent of y: a sparse zero matrix of size (this.size, variable.size)
   */
  jacobianOf(variable: StateVectorNode): ExpressionNode {
    return new MatrixNode(zeros(this.size, variable.size, true));
  }

  newCopy(): StateVectorDotNode {
    const copy = new StateVectorDotNode(this.slices, this.leafOptions);
    copy.adoptIdentity(this);
    return copy;
  }
}

/**
 * Model variable that has not been discretised yet
 */
export class VariableNode extends ExpressionNode {
  readonly type = 'Variable' as const;

  constructor(name: string, options: Omit<LeafOptions, 'name'> = {}) {
    const { domain = [], auxiliaryDomains = {} } = options;
    super(name, [], domain, auxiliaryDomains);
  }

  evaluate(): Numeric {
    throw new EvaluationError('variable must be discretised before evaluation', this.name);
  }

  evaluateForShape(): Numeric {
    return evaluateForShapeUsingDomain(this.domain, this.auxiliaryDomains);
  }

  newCopy(): VariableNode {
    const copy = new VariableNode(this.name, { domain: this.domain, auxiliaryDomains: this.auxiliaryDomains });
    copy.adoptIdentity(this);
    return copy;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Scalar supplied at evaluation time through `context.inputs`
 */
export class InputParameterNode extends ExpressionNode {
  readonly type = 'InputParameter' as const;

  constructor(name: string) {
    super(name);
  }

  evaluate(context: EvaluationContext = {}): Numeric {
    const value = context.inputs?.[this.name];
    if (value === undefined) return missing(`input '${this.name}'`, this);
    return value;
  }

  evaluateForShape(): Numeric {
    return NaN;
  }

  jacobianOf(): ExpressionNode {
    return new ScalarNode(0);
  }

  newCopy(): InputParameterNode {
    const copy = new InputParameterNode(this.name);
    copy.adoptIdentity(this);
    return copy;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Simulation time
 */
export class TimeNode extends ExpressionNode {
  readonly type = 'Time' as const;

  constructor() {
    super('t');
  }

  evaluate(context: EvaluationContext = {}): Numeric {
    if (context.t === undefined) return missing('time t', this);
    return context.t;
  }

  evaluateForShape(): Numeric {
    return 0;
  }

  jacobianOf(): ExpressionNode {
    return new ScalarNode(0);
  }

  newCopy(): TimeNode {
    const copy = new TimeNode();
    copy.adoptIdentity(this);
    return copy;
  }

  toString(): string {
    return this.name;
  }
}
