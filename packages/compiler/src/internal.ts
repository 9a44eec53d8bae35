/**
 * Stage-level entry points for orchestration layers, benchmarks and tests.
 * Callers are responsible for invoking stages in order; out-of-order calls
 * throw `InvalidStateError`.
 */
export { bind, bindDeclarations } from "./binding/binder.js";
export type {
  BoundDeclarationState,
  BoundMethodBody,
  BoundUnit,
  MethodSymbol,
  TypeSymbol,
} from "./binding/types.js";
export { createModuleBuilder, type CreateModuleResult } from "./module/create-module.js";
export {
  ModuleBuilder,
  ENTRY_POINT_EXPORT,
  type ModulePhase,
} from "./module/module-builder.js";
export { compileMethods, type CompileMethodsResult } from "./codegen/method-compiler.js";
export { lowerMethod } from "./codegen/lower-method.js";
export type { LoweredMethod } from "./codegen/lowered-ir.js";
export {
  finalizeModule,
  RESOURCE_SECTION_PREFIX,
  type FinalizeModuleResult,
} from "./module/finalizer.js";
export { serializeModule } from "./serializer/serialize-module.js";
export {
  DEBUG_LINK_SECTION,
  DEBUG_SECTION,
  METADATA_SECTION,
  MODULE_ID_SECTION,
  validateImage,
  type DebugPayload,
  type MetadataTable,
} from "./serializer/payloads.js";
export { readCustomSections, type WasmCustomSection } from "./serializer/wasm-sections.js";
