import { encode } from "@msgpack/msgpack";
import binaryen from "binaryen";
import type { TypeSymbol } from "../binding/types.js";
import type { SourceSpan } from "../diagnostics/index.js";
import type { ModuleBuilder, ModuleIdentity } from "../module/module-builder.js";
import { createKilnModule, wasmParamsType, wasmReturnType } from "../module/wasm-types.js";
import type { ReturnTypeName, ValueTypeName, Visibility } from "../syntax/types.js";
import type { WasmCustomSection } from "./wasm-sections.js";

export const MODULE_ID_SECTION = "kiln.module_id";
export const METADATA_SECTION = "kiln.metadata";
export const DEBUG_SECTION = "kiln.debug";
export const DEBUG_LINK_SECTION = "kiln.debug_link";

const MSGPACK_OPTS = { ignoreUndefined: true } as const;

export type MetadataTable = {
  version: 1;
  moduleId: string;
  name: string;
  outputKind: string;
  entryPoint?: string;
  types: {
    name: string;
    namespace: string;
    visibility: Visibility;
    methods: {
      name: string;
      visibility: Visibility;
      parameters: { name: string; type: ValueTypeName }[];
      returnType: ReturnTypeName;
    }[];
    constants: {
      name: string;
      visibility: Visibility;
      type: ValueTypeName;
      value: number | boolean;
    }[];
  }[];
};

export type DebugPayload = {
  version: 1;
  moduleId: string;
  functions: {
    name: string;
    stub: boolean;
    locals: readonly string[];
    span?: SourceSpan;
  }[];
  coverage: readonly string[];
};

const isIncluded = (visibility: Visibility, includePrivateMembers: boolean): boolean =>
  includePrivateMembers || visibility !== "private";

export const buildMetadataTable = ({
  identity,
  types,
  includePrivateMembers,
}: {
  identity: ModuleIdentity;
  types: readonly TypeSymbol[];
  includePrivateMembers: boolean;
}): MetadataTable => ({
  version: 1,
  moduleId: identity.moduleId,
  name: identity.outputName,
  outputKind: identity.outputKind,
  entryPoint: identity.entryPoint,
  types: types
    .filter((type) => isIncluded(type.visibility, includePrivateMembers))
    .map((type) => ({
      name: type.name,
      namespace: type.namespace,
      visibility: type.visibility,
      methods: [...type.methods.values()]
        .filter((method) => isIncluded(method.visibility, includePrivateMembers))
        .map((method) => ({
          name: method.name,
          visibility: method.visibility,
          parameters: method.parameters.map((param) => ({ name: param.name, type: param.type })),
          returnType: method.returnType,
        })),
      constants: [...type.constants.values()]
        .filter((constant) => isIncluded(constant.visibility, includePrivateMembers))
        .map((constant) => ({
          name: constant.name,
          visibility: constant.visibility,
          type: constant.type,
          value: constant.value,
        })),
    })),
});

export const buildDebugPayload = (module: ModuleBuilder): DebugPayload => ({
  version: 1,
  moduleId: module.identity.moduleId,
  functions: module.functions.map((fn) => ({
    name: fn.qualifiedName,
    stub: fn.stub,
    locals: fn.localNames,
    span: fn.span,
  })),
  coverage: module.coverage,
});

export const encodePayload = (payload: MetadataTable | DebugPayload): Uint8Array =>
  encode(payload, MSGPACK_OPTS);

export const moduleIdSection = (identity: ModuleIdentity): WasmCustomSection => ({
  name: MODULE_ID_SECTION,
  data: new TextEncoder().encode(identity.moduleId),
});

/**
 * Code image of the metadata-only stream: every exported function of the
 * module as an `unreachable` stub with the same signature and export name.
 */
export const emitMetadataStubImage = (module: ModuleBuilder): Uint8Array => {
  const mod = createKilnModule();
  try {
    module.functions
      .filter((fn) => fn.exported)
      .forEach((fn) => {
        mod.addFunction(
          fn.qualifiedName,
          wasmParamsType(fn.parameters.map((param) => param.type)),
          wasmReturnType(fn.returnType),
          [],
          mod.unreachable()
        );
        mod.addFunctionExport(fn.qualifiedName, fn.qualifiedName);
      });
    return mod.emitBinary();
  } finally {
    mod.dispose();
  }
};

export const validateImage = (image: Uint8Array): boolean => {
  const mod = binaryen.readBinary(image);
  try {
    return mod.validate() !== 0;
  } finally {
    mod.dispose();
  }
};
