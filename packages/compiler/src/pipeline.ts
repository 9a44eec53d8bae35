import { bind } from "./binding/binder.js";
import { compileMethods } from "./codegen/method-compiler.js";
import { hasErrors } from "./diagnostics/index.js";
import { finalizeModule, type ModuleResource } from "./module/finalizer.js";
import { StageTimer } from "./perf.js";
import {
  serializeModule,
  type SerializationResult,
  type SerializationStreams,
} from "./serializer/serialize-module.js";
import { createEmitOptions, type EmitOptions, type EmitOptionsInput } from "./source-set/options.js";
import type { SourceSet } from "./source-set/source-set.js";

export type EmitInput = {
  sourceSet: SourceSet;
  streams: SerializationStreams;
  options?: EmitOptionsInput;
  resources?: readonly ModuleResource[];
  /** Generate documentation; defaults to whether a documentation stream is given. */
  documentation?: boolean;
};

const NOTHING_WRITTEN = {
  image: false,
  metadata: false,
  debug: false,
  documentation: false,
} as const;

/**
 * Runs bind, method compilation, finalization and serialization for one
 * source set. Under `fail-closed` nothing is written once an error is known;
 * under `emit-anyway` every stage runs and the errors are still reported.
 */
export const emit = ({
  sourceSet,
  streams,
  options: input,
  resources = [],
  documentation = streams.documentation !== undefined,
}: EmitInput): SerializationResult => {
  const options = createEmitOptions(input);
  const timer = new StageTimer(sourceSet.name);

  const result = runStages({ sourceSet, streams, options, resources, documentation, timer });

  timer.finish({
    outcome: result.success ? "completed" : "failed",
    diagnostics: result.diagnostics.length,
  });
  return result;
};

const runStages = ({
  sourceSet,
  streams,
  options,
  resources,
  documentation,
  timer,
}: {
  sourceSet: SourceSet;
  streams: SerializationStreams;
  options: EmitOptions;
  resources: readonly ModuleResource[];
  documentation: boolean;
  timer: StageTimer;
}): SerializationResult => {
  timer.time("bind", () => bind(sourceSet));
  const compiled = timer.time("compile-methods", () =>
    compileMethods({ sourceSet, options })
  );
  const { module } = compiled;
  if (!module) {
    return { success: false, diagnostics: compiled.diagnostics, written: { ...NOTHING_WRITTEN } };
  }

  try {
    if (!compiled.success && options.errorPolicy === "fail-closed") {
      return { success: false, diagnostics: compiled.diagnostics, written: { ...NOTHING_WRITTEN } };
    }
    const finalized = timer.time("finalize", () =>
      finalizeModule({ sourceSet, module, options, resources, documentation })
    );
    if (hasErrors(finalized.diagnostics) && options.errorPolicy === "fail-closed") {
      return {
        success: false,
        diagnostics: [...compiled.diagnostics, ...finalized.diagnostics],
        written: { ...NOTHING_WRITTEN },
      };
    }
    const serialized = timer.time("serialize", () =>
      serializeModule({ module, streams, options })
    );
    const diagnostics = [
      ...compiled.diagnostics,
      ...finalized.diagnostics,
      ...serialized.diagnostics,
    ];
    return { success: !hasErrors(diagnostics), diagnostics, written: serialized.written };
  } finally {
    module.dispose();
  }
};
