export * from "./engine";
export { DEFAULT_CONFIG, loadConfig, type EngineConfig } from "./config";
export { foldInt64, type ArithOp, type IntKind } from "./core/int64";
export { lookupToken, opFamily, type ExprOp, type OpFamily } from "./core/ops";
export {
  Catalogue,
  type AccessRecord,
  type AccessRow,
  type BuiltExpression,
  type CatalogueOptions,
  type CatalogueTables,
  type KernelCatalogue,
  type LoopRecord,
  type LoopRow,
  type PhiLoopRow,
} from "./runtime/catalogue";
export { SymbolicEmitter } from "./runtime/emitter";
export {
  constantDim,
  dim3,
  expressionDim,
  type ActualValue,
  type Dim3,
  type Dimension,
  type InvocationRecord,
} from "./runtime/invocation";
export {
  RecordingSink,
  type AccessFlag,
  type AccessKey,
  type AccessReport,
  type RuntimeSink,
  type SensitivityAxis,
} from "./runtime/sink";
