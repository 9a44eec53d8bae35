import binaryen from "binaryen";
import { InvalidStateError } from "../errors.js";
import type { SourceSpan } from "../diagnostics/index.js";
import type { MethodSymbol, TypeSymbol } from "../binding/types.js";
import type { OutputKind, EmitOptions } from "../source-set/options.js";
import type { ReturnTypeName, ValueTypeName, Visibility } from "../syntax/types.js";
import {
  createKilnModule,
  wasmParamsType,
  wasmReturnType,
  wasmValueType,
} from "./wasm-types.js";

export type ModulePhase = "open" | "finalized" | "serialized" | "disposed";

export type ModuleFunctionRecord = {
  qualifiedName: string;
  owner: string;
  visibility: Visibility;
  parameters: readonly { name: string; type: ValueTypeName }[];
  returnType: ReturnTypeName;
  exported: boolean;
  /** Body replaced by `unreachable` (metadata-only output or skipped method). */
  stub: boolean;
  localNames: readonly string[];
  span?: SourceSpan;
  coverageIndex?: number;
};

export type ModuleImportRecord = {
  qualifiedName: string;
  reference: string;
  parameters: readonly ValueTypeName[];
  returnType: ReturnTypeName;
};

export type ModuleCustomSection = {
  name: string;
  data: Uint8Array;
};

export type ModuleIdentity = {
  moduleId: string;
  /** Fingerprint of the source set the module was created from. */
  sourceFingerprint: string;
  outputName: string;
  outputKind: OutputKind;
  entryPoint?: string;
};

export type AddFunctionInput = {
  method: MethodSymbol;
  localTypes: readonly ValueTypeName[];
  localNames: readonly string[];
  body: binaryen.ExpressionRef;
  /** Exported under its qualified name. */
  exported: boolean;
  stub: boolean;
  coverageIndex?: number;
};

export const ENTRY_POINT_EXPORT = "main";

/**
 * Single-owner wrapper around the binaryen module being built. Content can
 * only be added while `open`; `seal` moves it to `finalized`, after which only
 * serialization and disposal are allowed.
 */
export class ModuleBuilder {
  readonly identity: ModuleIdentity;
  readonly options: EmitOptions;
  /** Source types in declaration order, used for the metadata section. */
  readonly types: readonly TypeSymbol[];
  #phase: ModulePhase = "open";
  #mod: binaryen.Module;
  #functions: ModuleFunctionRecord[] = [];
  #imports = new Map<string, ModuleImportRecord>();
  #sections: ModuleCustomSection[] = [];
  #coverage: string[] = [];
  #documentation?: string;

  constructor({
    identity,
    options,
    types,
  }: {
    identity: ModuleIdentity;
    options: EmitOptions;
    types: readonly TypeSymbol[];
  }) {
    this.identity = identity;
    this.options = options;
    this.types = types;
    this.#mod = createKilnModule();
  }

  get phase(): ModulePhase {
    return this.#phase;
  }

  /** Expression factory for lowering. Only usable while open. */
  get wasm(): binaryen.Module {
    this.#assertOpen("building expressions");
    return this.#mod;
  }

  get functions(): readonly ModuleFunctionRecord[] {
    return this.#functions;
  }

  get imports(): readonly ModuleImportRecord[] {
    return [...this.#imports.values()];
  }

  get customSections(): readonly ModuleCustomSection[] {
    return this.#sections;
  }

  get coverage(): readonly string[] {
    return this.#coverage;
  }

  get documentation(): string | undefined {
    return this.#documentation;
  }

  addFunction({
    method,
    localTypes,
    localNames,
    body,
    exported,
    stub,
    coverageIndex,
  }: AddFunctionInput): void {
    this.#assertOpen("adding a method body");
    this.#mod.addFunction(
      method.qualifiedName,
      wasmParamsType(method.parameters.map((param) => param.type)),
      wasmReturnType(method.returnType),
      localTypes.map(wasmValueType),
      body
    );
    if (exported) {
      this.#mod.addFunctionExport(method.qualifiedName, method.qualifiedName);
    }
    if (this.identity.entryPoint === method.qualifiedName) {
      this.#mod.addFunctionExport(method.qualifiedName, ENTRY_POINT_EXPORT);
    }
    this.#functions.push({
      qualifiedName: method.qualifiedName,
      owner: method.owner,
      visibility: method.visibility,
      parameters: method.parameters,
      returnType: method.returnType,
      exported,
      stub,
      localNames,
      span: method.span,
      coverageIndex,
    });
  }

  /**
   * Declares a function import for a method of a metadata reference. Calls
   * go through the import's internal name, which is the method's qualified
   * name.
   */
  ensureImport(method: MethodSymbol): string {
    this.#assertOpen("adding an import");
    if (method.origin.kind !== "reference") {
      throw new InvalidStateError("only reference methods can be imported", method.qualifiedName);
    }
    const existing = this.#imports.get(method.qualifiedName);
    if (existing) return existing.qualifiedName;
    const parameters = method.parameters.map((param) => param.type);
    this.#mod.addFunctionImport(
      method.qualifiedName,
      method.origin.reference,
      method.qualifiedName,
      wasmParamsType(parameters),
      wasmReturnType(method.returnType)
    );
    this.#imports.set(method.qualifiedName, {
      qualifiedName: method.qualifiedName,
      reference: method.origin.reference,
      parameters,
      returnType: method.returnType,
    });
    return method.qualifiedName;
  }

  /** Adds the mutable i32 global that records whether `qualifiedName` ran. */
  addCoverageSlot(qualifiedName: string): { index: number; global: string } {
    this.#assertOpen("adding coverage data");
    const index = this.#coverage.length;
    const global = `__coverage.${index}`;
    this.#mod.addGlobal(global, binaryen.i32, true, this.#mod.i32.const(0));
    this.#coverage.push(qualifiedName);
    return { index, global };
  }

  addCustomSection(section: ModuleCustomSection): void {
    this.#assertOpen("attaching a custom section");
    this.#sections.push({ name: section.name, data: section.data });
  }

  setDocumentation(text: string): void {
    this.#assertOpen("attaching documentation");
    this.#documentation = text;
  }

  seal(): void {
    this.#assertOpen("finalizing");
    this.#phase = "finalized";
  }

  /** Serializes the code part of the module. Custom sections are appended by the caller. */
  emitBinary(): Uint8Array {
    this.#assertSerializable();
    return this.#mod.emitBinary();
  }

  validate(): boolean {
    if (this.#phase === "disposed") {
      throw new InvalidStateError("module must not be disposed", this.#phase);
    }
    return this.#mod.validate() !== 0;
  }

  markSerialized(): void {
    this.#assertSerializable();
    this.#phase = "serialized";
  }

  dispose(): void {
    if (this.#phase === "disposed") return;
    this.#mod.dispose();
    this.#phase = "disposed";
  }

  #assertOpen(operation: string): void {
    if (this.#phase !== "open") {
      throw new InvalidStateError(`module must be open before ${operation}`, this.#phase);
    }
  }

  #assertSerializable(): void {
    if (this.#phase !== "finalized" && this.#phase !== "serialized") {
      throw new InvalidStateError("module must be finalized before serialization", this.#phase);
    }
  }
}
