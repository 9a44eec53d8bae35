import { DiagnosticEmitter, type Diagnostic, type SourceSpan } from "../diagnostics/index.js";
import { stableHash } from "../hash.js";
import type { SourceSet } from "../source-set/source-set.js";
import type { EmitOptions } from "../source-set/options.js";
import { ModuleBuilder } from "./module-builder.js";

const OPTIONS_SPAN: SourceSpan = { file: "<options>", start: 0, end: 0 };

const INVALID_OUTPUT_NAME = /[\\/\0]|^\.{1,2}$/;

export type CreateModuleResult = {
  module?: ModuleBuilder;
  diagnostics: readonly Diagnostic[];
};

export const resolveOutputName = (sourceSet: SourceSet, options: EmitOptions): string =>
  options.outputNameOverride ?? sourceSet.name;

/**
 * Validates emit options against the source set and opens a module for it.
 * The module id only depends on the source set fingerprint and the output
 * name, so identical inputs produce identical images.
 */
export const createModuleBuilder = ({
  sourceSet,
  options,
}: {
  sourceSet: SourceSet;
  options: EmitOptions;
}): CreateModuleResult => {
  const emitter = new DiagnosticEmitter();
  const outputName = resolveOutputName(sourceSet, options);

  if (outputName.trim().length === 0 || INVALID_OUTPUT_NAME.test(outputName)) {
    emitter.reportFromCode({
      code: "OP0001",
      params: { kind: "invalid-output-name", name: outputName },
      span: OPTIONS_SPAN,
    });
  }
  if (options.emitMetadataOnly && options.debugInformation === "embedded") {
    emitter.reportFromCode({
      code: "OP0002",
      params: { kind: "embedded-debug-metadata-only" },
      span: OPTIONS_SPAN,
    });
  }
  if (emitter.hasErrors) return { diagnostics: emitter.diagnostics };

  const declarations = sourceSet.declarations;
  const module = new ModuleBuilder({
    identity: {
      moduleId: stableHash({ fingerprint: declarations.fingerprint, outputName }),
      sourceFingerprint: declarations.fingerprint,
      outputName,
      outputKind: sourceSet.options.outputKind,
      entryPoint: declarations.entryPoint?.qualifiedName,
    },
    options,
    types: declarations.units.flatMap((unit) => unit.types),
  });
  return { module, diagnostics: emitter.diagnostics };
};
