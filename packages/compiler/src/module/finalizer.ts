import { DiagnosticEmitter, normalizeSpan, type Diagnostic } from "../diagnostics/index.js";
import { InvalidStateError } from "../errors.js";
import type { SourceSet } from "../source-set/source-set.js";
import type { EmitOptions } from "../source-set/options.js";
import { buildDocumentationModel, renderDocumentationJson } from "../docs/documentation.js";
import type { ModuleBuilder } from "./module-builder.js";

export type ModuleResource = {
  name: string;
  /** Strings are stored as UTF-8. */
  data: Uint8Array | string;
};

export type FinalizeModuleResult = {
  diagnostics: readonly Diagnostic[];
};

export const RESOURCE_SECTION_PREFIX = "kiln.resource.";

/**
 * Adds non-code content and seals the module. Steps run in a fixed order:
 * resources, documentation, unused import advisories, seal. A module can only
 * be finalized once, and only against the source set it was compiled from.
 */
export const finalizeModule = ({
  sourceSet,
  module,
  options = module.options,
  resources = [],
  documentation = false,
}: {
  sourceSet: SourceSet;
  module: ModuleBuilder;
  options?: EmitOptions;
  resources?: readonly ModuleResource[];
  documentation?: boolean;
}): FinalizeModuleResult => {
  if (module.phase !== "open") {
    throw new InvalidStateError("module must be open to finalize", module.phase);
  }
  if (sourceSet.fingerprint !== module.identity.sourceFingerprint) {
    throw new InvalidStateError(
      `module ${module.identity.outputName} must be finalized with the source set it was compiled from`
    );
  }
  const emitter = new DiagnosticEmitter();

  attachResources({ module, resources, emitter });
  if (documentation) {
    attachDocumentation({ module, options, emitter });
  }
  reportUnusedImports({ sourceSet, emitter });
  module.seal();

  return { diagnostics: emitter.diagnostics };
};

const attachResources = ({
  module,
  resources,
  emitter,
}: {
  module: ModuleBuilder;
  resources: readonly ModuleResource[];
  emitter: DiagnosticEmitter;
}): void => {
  const encoder = new TextEncoder();
  const seen = new Set<string>();
  resources.forEach((resource) => {
    if (seen.has(resource.name)) {
      emitter.reportFromCode({
        code: "MF0003",
        params: { kind: "duplicate-resource", name: resource.name },
        span: { file: `<resource:${resource.name}>`, start: 0, end: 0 },
      });
      return;
    }
    seen.add(resource.name);
    module.addCustomSection({
      name: `${RESOURCE_SECTION_PREFIX}${resource.name}`,
      data: typeof resource.data === "string" ? encoder.encode(resource.data) : resource.data,
    });
  });
};

const attachDocumentation = ({
  module,
  options,
  emitter,
}: {
  module: ModuleBuilder;
  options: EmitOptions;
  emitter: DiagnosticEmitter;
}): void => {
  module.types.forEach((type) => {
    if (type.visibility !== "public") return;
    const span = normalizeSpan(type.span);
    if (!type.doc) {
      emitter.reportFromCode({
        code: "MF0002",
        params: { kind: "missing-documentation", memberKind: "type", name: type.qualifiedName },
        span,
      });
    }
    type.methods.forEach((method) => {
      if (method.visibility !== "public" || method.doc) return;
      emitter.reportFromCode({
        code: "MF0002",
        params: {
          kind: "missing-documentation",
          memberKind: "method",
          name: method.qualifiedName,
        },
        span: normalizeSpan(method.span, span),
      });
    });
  });

  const model = buildDocumentationModel({
    moduleName: module.identity.outputName,
    types: module.types,
    includePrivateMembers: options.includePrivateMembers,
  });
  module.setDocumentation(renderDocumentationJson({ model }));
};

const reportUnusedImports = ({
  sourceSet,
  emitter,
}: {
  sourceSet: SourceSet;
  emitter: DiagnosticEmitter;
}): void => {
  sourceSet.declarations.units.forEach((unit) => {
    unit.imports
      .filter((entry) => entry.resolved && !entry.used)
      .forEach((entry) => {
        emitter.reportFromCode({
          code: "MF0001",
          params: { kind: "unused-import", namespace: entry.namespace },
          span: entry.span,
        });
      });
  });
};
