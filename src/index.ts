/**
 * func-algebra - Composable real-valued functions of one variable
 *
 * Build expression trees from constants, the identity and composition
 * operators, then evaluate them at any real input.
 */

// Node catalogue
export {
  Constant,
  Identity,
  BinaryFunc,
  Sum,
  Product,
  UnaryFunc,
  Power,
  ExpWithBase,
  ExpNatural,
  LogWithBase,
  LogNatural,
  Sine,
  Cosine,
  Tangent,
  ArcSine,
  ArcCosine,
  ArcTangent,
  SquareRoot,
  CubeRoot,
  NthRoot
} from './func/AST.js';
export type {
  Evaluable,
  Func,
  FuncKind,
  FuncVisitor,
  BinaryNode,
  UnaryNode
} from './func/AST.js';

// Builders
export {
  constant,
  identity,
  sum,
  product,
  power,
  expWithBase,
  expNatural,
  logWithBase,
  logNatural,
  sin,
  cos,
  tan,
  asin,
  acos,
  atan,
  sqrt,
  cbrt,
  nthRoot,
  sumAll,
  productAll,
  sumOf,
  productOf,
  negate,
  polynomial
} from './func/Builders.js';

// Evaluation
export { evaluate, evaluateAt, sample } from './func/Evaluator.js';
export type { SampleOptions, SamplePoint } from './func/Evaluator.js';

// Checked evaluation layer
export {
  analyzeDomain,
  evaluateChecked,
  formatDomainWarnings
} from './func/Domain.js';
export type {
  DomainIssue,
  DomainIssueType,
  DomainAnalysisResult,
  DomainCheckOptions
} from './func/Domain.js';

// Structural helpers
export {
  children,
  parameters,
  nodeCount,
  depth,
  isConstantFunc,
  structurallyEqual
} from './func/ExpressionUtils.js';

// Errors
export { ConstructionError, DomainError } from './func/Errors.js';
