/**
 * Base class for every node of an expression tree.
 *
 * Nodes are immutable once built and may be shared between parents, so the
 * tree is really a DAG. Identity (`id`), not structure, is what memo tables
 * and variable-occurrence checks key on.
 */

import { EvaluationError, TypeMismatchError, UnsupportedOperationError } from './Errors.js';
import type { AuxiliaryDomains, Domain } from './Domains.js';
import type { Numeric } from '../numeric/Backend.js';
import type { StateVectorNode } from './Leaves.js';

/**
 * Everything a leaf may need to produce a value
 */
export interface EvaluationContext {
  t?: number;
  y?: Numeric | readonly number[];
  yDot?: Numeric | readonly number[];
  inputs?: Readonly<Record<string, number>>;
}

/**
 * Node id -> value, valid for a single evaluation call
 */
export type KnownEvaluations = Map<number, Numeric>;

export interface Evaluated {
  value: Numeric;
  knownEvals: KnownEvaluations;
}

/**
 * Anything an operator accepts as an operand before normalisation
 */
export type Operand = ExpressionNode | number;

let nextId = 1;

/**
 * Id the next constructed node will receive. Every node created afterwards has
 * an id at least this large.
 */
export function peekNextId(): number {
  return nextId;
}

export abstract class ExpressionNode {
  abstract readonly type: string;
  readonly name: string;
  readonly children: readonly ExpressionNode[];

  private _id: number;
  private _domain: Domain;
  private _auxiliaryDomains: AuxiliaryDomains;

  protected constructor(
    name: string,
    children: readonly ExpressionNode[] = [],
    domain: Domain = [],
    auxiliaryDomains: AuxiliaryDomains = {}
  ) {
    this._id = nextId++;
    this.name = name;
    this.children = children;
    this._domain = domain;
    this._auxiliaryDomains = auxiliaryDomains;
  }

  get id(): number {
    return this._id;
  }

  get domain(): Domain {
    return this._domain;
  }

  get auxiliaryDomains(): AuxiliaryDomains {
    return this._auxiliaryDomains;
  }

  /**
   * Overwrite this node's domain metadata with another node's.
   * Only for nodes a copy or simplification pass has just created.
   */
  copyDomains(source: ExpressionNode): void {
    this._domain = source.domain;
    this._auxiliaryDomains = source.auxiliaryDomains;
  }

  /**
   * Leaf copies keep the identity of the leaf they copy
   */
  protected adoptIdentity(source: ExpressionNode): void {
    this._id = source.id;
  }

  /**
   * Every distinct node below and including this one, parents before
   * children. A subtree shared by several parents is visited once.
   */
  *preOrder(): Generator<ExpressionNode> {
    const seen = new Set<number>();
    const stack: ExpressionNode[] = [this];
    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined || seen.has(node.id)) continue;
      seen.add(node.id);
      yield node;
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }

  contains(variable: ExpressionNode): boolean {
    for (const node of this.preOrder()) {
      if (node.id === variable.id) return true;
    }
    return false;
  }

  abstract evaluate(context?: EvaluationContext): Numeric;

  /**
   * Evaluate with a memo table shared across the whole call
   */
  evaluateMemoized(context: EvaluationContext, knownEvals: KnownEvaluations): Evaluated {
    return { value: this.evaluate(context), knownEvals };
  }

  /**
   * Value with the right shape (entries may be NaN), computable before discretisation
   */
  abstract evaluateForShape(): Numeric;

  abstract newCopy(): ExpressionNode;

  abstract toString(): string;

  /**
   * Binding strength when printed inside an operator; atoms never need parentheses
   */
  precedence(): number {
    return Infinity;
  }

  isConstant(): boolean {
    return false;
  }

  evaluatesToNumber(): boolean {
    return typeof this.evaluateForShape() === 'number';
  }

  evaluatesToConstantNumber(): boolean {
    return this.isConstant() && this.evaluatesToNumber();
  }

  /**
   * Whether the discretised value lives on cell edges rather than nodes
   */
  evaluatesOnEdges(dimension: string): boolean {
    return this.children.some(child => child.evaluatesOnEdges(dimension));
  }

  /**
   * Symbolic derivative with respect to `variable`
   */
  diff(variable: ExpressionNode): ExpressionNode {
    if (variable.id === this.id) return new ScalarNode(1);
    if (this.contains(variable)) return this.derivative(variable);
    return new ScalarNode(0);
  }

  /**
   * Derivative of a node that depends on `variable`
   */
  protected derivative(variable: ExpressionNode): ExpressionNode {
    throw new UnsupportedOperationError(
      `cannot differentiate with respect to '${variable.name}'`,
      `diff(${this.name})`
    );
  }

  /**
   * Jacobian of a leaf or opaque node. Operator nodes are handled by the
   * Jacobian pass, which combines their children's Jacobians.
   */
  jacobianOf(variable: StateVectorNode): ExpressionNode {
    throw new UnsupportedOperationError(
      `cannot take the Jacobian with respect to '${variable.name}'`,
      `jacobian(${this.name})`,
      'node must be discretised first'
    );
  }
}

export interface ScalarOptions {
  name?: string;
  domain?: Domain;
}

/**
 * Constant number
 */
export class ScalarNode extends ExpressionNode {
  readonly type = 'Scalar' as const;
  readonly value: number;

  constructor(value: number, options: ScalarOptions = {}) {
    const { name = String(value), domain = [] } = options;
    super(name, [], domain);
    this.value = value;
  }

  evaluate(): Numeric {
    return this.value;
  }

  evaluateForShape(): Numeric {
    return this.value;
  }

  isConstant(): boolean {
    return true;
  }

  jacobianOf(): ExpressionNode {
    return new ScalarNode(0);
  }

  precedence(): number {
    return this.value < 0 ? 2.5 : Infinity;
  }

  newCopy(): ScalarNode {
    const copy = new ScalarNode(this.value, { name: this.name, domain: this.domain });
    copy.adoptIdentity(this);
    return copy;
  }

  toString(): string {
    return String(this.value);
  }
}

/**
 * Normalise an operand: numbers become ScalarNodes, nodes pass through
 */
export function toNode(operand: unknown, operation: string): ExpressionNode {
  if (operand instanceof ExpressionNode) return operand;
  if (typeof operand === 'number') return new ScalarNode(operand);
  const operandType = operand === null ? 'null' : typeof operand;
  throw new TypeMismatchError('operands must be numbers or expression nodes', operation, operandType);
}

/**
 * Raised by leaves whose value is not available in the given context
 */
export function missing(what: string, node: ExpressionNode): never {
  throw new EvaluationError(`no ${what} provided`, node.name);
}
