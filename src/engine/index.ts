export {
  combineTrees,
  constantTree,
  containsOp,
  countOp,
  findNodes,
  NodeArena,
  postorder,
  type ExprNode,
  type ExprTree,
  type NodeId,
  type TreeShape,
} from "./arena";
export { CoefficientExtractor, type CoefficientTarget } from "./coefficients";
export {
  CatalogueError,
  DivisionByZeroError,
  IncomputableLoopError,
  MalformedExpressionError,
  NonTerminalOperandError,
  UnresolvedTerminalError,
  UnsupportedPhiChainError,
} from "./engine-errors";
export {
  analyzeInvocation,
  type AccessOutcome,
  type EstimatorOptions,
  type IncomputableReason,
  type InvocationSummary,
} from "./estimator";
export { formatTree } from "./format";
export { ExpressionEvaluator, type BoundMode, type EvalMode } from "./interval";
export { LoopAccounting, type LoopIterations } from "./loops";
export { NaryEvaluator } from "./nary-eval";
export { NO_OVERRIDES, ValueResolver, type Overrides } from "./resolver";
export { buildBinaryTree, buildNaryTree, type BuildOptions } from "./tree-builder";
export {
  deferred,
  known,
  StagedArithmetic,
  type Emitter,
  type Value,
} from "./values";
