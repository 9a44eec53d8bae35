export { SourceSet, type SourceSetInit } from "./source-set/source-set.js";
export {
  createCompilationOptions,
  createEmitOptions,
  type CompilationOptions,
  type CompilationOptionsInput,
  type DebugInformationMode,
  type EmitOptions,
  type EmitOptionsInput,
  type ErrorPolicy,
  type OutputKind,
} from "./source-set/options.js";
export type {
  MetadataReference,
  ReferenceConstant,
  ReferenceMethod,
  ReferenceNamespace,
  ReferenceType,
} from "./source-set/references.js";
export type * from "./syntax/types.js";
export { isReturnTypeName, isValueTypeName, VALUE_TYPE_NAMES } from "./syntax/types.js";
export { getAllDiagnostics, getDiagnostics } from "./analysis/diagnostics-engine.js";
export {
  createAnalyzerConfig,
  type Analyzer,
  type AnalyzerConfig,
  type AnalyzerContext,
  type AnalyzerResult,
  type AnalyzerRunOutcome,
  type SeverityOverride,
  type UnitAnalyzerContext,
} from "./analysis/types.js";
export { emit, type EmitInput } from "./pipeline.js";
export type { ModuleResource } from "./module/finalizer.js";
export type {
  SerializationResult,
  SerializationStreams,
  WrittenStreams,
} from "./serializer/serialize-module.js";
export { MemoryOutputStream, type OutputStream } from "./serializer/streams.js";
export {
  createDiagnostic,
  DiagnosticEmitter,
  DiagnosticError,
  diagnosticFromCode,
  formatDiagnostic,
  hasErrors,
  sortDiagnostics,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticHint,
  type DiagnosticInput,
  type DiagnosticPhase,
  type DiagnosticSeverity,
  type SourceSpan,
} from "./diagnostics/index.js";
export { InvalidStateError } from "./errors.js";
export type {
  BoundDeclarationState,
  BoundImport,
  BoundLocal,
  BoundMethodBody,
  BoundUnit,
  ConstantSymbol,
  MethodSymbol,
  NameResolution,
  SymbolOrigin,
  TypeSymbol,
} from "./binding/types.js";
