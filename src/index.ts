/**
 * expression-operators - symbolic binary operators for simulation models
 *
 * Build expression trees from numbers, state vectors and operator nodes,
 * then evaluate, differentiate, take Jacobians, simplify and print them.
 */

// Nodes
export {
  ExpressionNode,
  ScalarNode,
  toNode,
  peekNextId,
  type EvaluationContext,
  type KnownEvaluations,
  type Evaluated,
  type Operand,
  type ScalarOptions
} from './expression/ExpressionNode.js';
export {
  ArrayNode,
  MatrixNode,
  VectorNode,
  StateVectorNode,
  StateVectorDotNode,
  VariableNode,
  InputParameterNode,
  TimeNode,
  type LeafOptions,
  type StateSlice
} from './expression/Leaves.js';
export { BinaryOperatorNode, type BinaryOperatorKind } from './expression/BinaryOperators.js';
export { UnaryOperatorNode, type UnaryOperatorKind } from './expression/UnaryOperators.js';
export { PrimaryBroadcastNode, zerosLike } from './expression/Broadcasts.js';
export { SpatialOperatorNode, type SpatialOperatorKind } from './expression/SpatialOperators.js';

// Builders and factories
export * from './expression/Algebra.js';
export {
  minimum,
  maximum,
  softminus,
  softplus,
  sigmoid,
  heaviside,
  type HeavisideOptions
} from './expression/Smoothing.js';
export { inner, source } from './expression/Factories.js';

// Passes
export {
  simplify,
  simplifyIfConstant,
  simplifyAdditionSubtraction,
  simplifyMultiplicationDivision,
  Simplification,
  type SimplificationOptions
} from './expression/Simplify.js';
export { jacobian, Jacobian, type JacobianOptions } from './expression/Jacobian.js';
export {
  GradientChecker,
  formatGradCheckResult,
  type GradCheckResult,
  type GradCheckError,
  type GradientCheckerOptions
} from './expression/GradientChecker.js';
export {
  evaluateIgnoringErrors,
  isScalarZero,
  isScalarOne,
  isMatrixZero,
  preprocess
} from './expression/ExpressionUtils.js';

// Domains and configuration
export {
  combineDomains,
  combineAuxiliaryDomains,
  domainsEqual,
  domainSize,
  evaluateForShapeUsingDomain,
  DOMAIN_SIZES,
  type Domain,
  type AuxiliaryDomains
} from './expression/Domains.js';
export {
  defaultSettings,
  resolveSettings,
  type Smoothing,
  type SmoothingSettings
} from './expression/Settings.js';

// Errors
export {
  TypeMismatchError,
  DomainError,
  UnsupportedOperationError,
  EvaluationError,
  ShapeError,
  SettingsError
} from './expression/Errors.js';

// Numeric values
export type { Numeric, Shape } from './numeric/Backend.js';
export { column, fromRows, toRows, toDense, toSparse, isSparse, shapeOf } from './numeric/Backend.js';
