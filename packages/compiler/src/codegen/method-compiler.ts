import { hasErrors, sortDiagnostics, type Diagnostic } from "../diagnostics/index.js";
import { InvalidStateError } from "../errors.js";
import type {
  BoundDeclarationState,
  BoundMethodBody,
  MethodSymbol,
} from "../binding/types.js";
import type { SourceSet } from "../source-set/source-set.js";
import type { EmitOptions } from "../source-set/options.js";
import { createModuleBuilder } from "../module/create-module.js";
import type { ModuleBuilder } from "../module/module-builder.js";
import { incrementCompilerPerfCounter } from "../perf.js";
import type { LoweredMethod } from "./lowered-ir.js";
import { lowerMethod } from "./lower-method.js";
import { emitMethodBody, emitStubBody } from "./wasm-emitter.js";

export type CompileMethodsResult = {
  success: boolean;
  /** Absent when options are invalid or binding failed under `fail-closed`. */
  module?: ModuleBuilder;
  diagnostics: readonly Diagnostic[];
};

type MethodPlan = {
  method: MethodSymbol;
  exported: boolean;
  /** Undefined for stubs. */
  lowered?: LoweredMethod;
};

/**
 * Lowers every source method into a fresh module. Each method is lowered on
 * its own and only then added to the module in declaration order; failures
 * are collected for all methods before returning.
 */
export const compileMethods = ({
  sourceSet,
  options,
}: {
  sourceSet: SourceSet;
  options: EmitOptions;
}): CompileMethodsResult => {
  if (!sourceSet.isDeclarationBindingComplete) {
    throw new InvalidStateError(
      "declaration binding must complete before compiling methods",
      "unbound"
    );
  }
  const declarations = sourceSet.declarations;
  const fileOrder = sourceSet.units.map((unit) => unit.path);

  const created = createModuleBuilder({ sourceSet, options });
  if (!created.module) {
    return {
      success: false,
      diagnostics: [...declarations.diagnostics, ...created.diagnostics],
    };
  }
  const module = created.module;

  if (options.errorPolicy === "fail-closed" && hasErrors(declarations.diagnostics)) {
    module.dispose();
    return { success: false, diagnostics: declarations.diagnostics };
  }

  const plans = declarations.methods
    .filter((method) => includeMethod(method, options))
    .map((method) => planMethod(method, declarations, options));

  plans.forEach((plan) => addToModule(module, plan, options));

  const loweringDiagnostics = plans.flatMap((plan) => plan.lowered?.diagnostics ?? []);
  const lowered = plans.filter((plan) => plan.lowered !== undefined);
  incrementCompilerPerfCounter("methods.compiled", lowered.length);
  incrementCompilerPerfCounter(
    "methods.failed",
    lowered.filter((plan) => hasErrors(plan.lowered?.diagnostics ?? [])).length
  );

  const diagnostics = sortDiagnostics(
    [...declarations.diagnostics, ...created.diagnostics, ...loweringDiagnostics],
    fileOrder
  );
  return { success: !hasErrors(diagnostics), module, diagnostics };
};

const includeMethod = (method: MethodSymbol, options: EmitOptions): boolean =>
  !options.emitMetadataOnly || options.includePrivateMembers || method.visibility !== "private";

const isPubliclyVisible = (method: MethodSymbol, declarations: BoundDeclarationState): boolean =>
  method.visibility === "public" &&
  declarations.types.get(method.owner)?.visibility === "public";

const hasBindingErrors = (method: MethodSymbol, body: BoundMethodBody | undefined): boolean =>
  !method.signatureValid || !body || hasErrors(body.diagnostics);

const planMethod = (
  method: MethodSymbol,
  declarations: BoundDeclarationState,
  options: EmitOptions
): MethodPlan => {
  const exported = isPubliclyVisible(method, declarations);
  if (options.emitMetadataOnly) return { method, exported };

  const body = declarations.bodies.get(method.qualifiedName);
  if (!body || hasBindingErrors(method, body)) return { method, exported };
  return { method, exported, lowered: lowerMethod(body) };
};

const addToModule = (module: ModuleBuilder, plan: MethodPlan, options: EmitOptions): void => {
  const { method, lowered } = plan;
  const parameterNames = method.parameters.map((param) => param.name);

  if (!lowered) {
    module.addFunction({
      method,
      localTypes: [],
      localNames: parameterNames,
      body: emitStubBody(module),
      exported: plan.exported,
      stub: true,
    });
    return;
  }

  const coverage = options.emitTestCoverageData
    ? module.addCoverageSlot(method.qualifiedName)
    : undefined;
  module.addFunction({
    method,
    localTypes: lowered.locals.map((local) => local.type),
    localNames: [...parameterNames, ...lowered.locals.map((local) => local.name)],
    body: emitMethodBody({ module, lowered, coverageGlobal: coverage?.global }),
    exported: plan.exported,
    stub: false,
    coverageIndex: coverage?.index,
  });
};
