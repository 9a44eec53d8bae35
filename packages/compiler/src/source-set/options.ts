export type OutputKind = "library" | "executable";

export type DebugInformationMode = "none" | "embedded" | "separate";

export type ErrorPolicy = "fail-closed" | "emit-anyway";

export interface CompilationOptions {
  /** Partition binding, lowering and analyzer work into isolated units. */
  readonly concurrentBuild: boolean;
  readonly outputKind: OutputKind;
  /** Upper bound of in-flight analyzer tasks when `concurrentBuild` is set. */
  readonly maxDegreeOfParallelism: number;
  /** Qualified name of a parameterless method, required for executables. */
  readonly entryPoint?: string;
}

export interface EmitOptions {
  readonly includePrivateMembers: boolean;
  readonly debugInformation: DebugInformationMode;
  readonly emitMetadataOnly: boolean;
  readonly outputNameOverride?: string;
  readonly emitTestCoverageData: boolean;
  readonly errorPolicy: ErrorPolicy;
  /** Name recorded in the image when debug information is written separately. */
  readonly debugInformationPath?: string;
}

export type CompilationOptionsInput = Partial<CompilationOptions>;

export type EmitOptionsInput = Partial<EmitOptions>;

const DEFAULT_COMPILATION_OPTIONS: Required<Omit<CompilationOptions, "entryPoint">> = {
  concurrentBuild: true,
  outputKind: "library",
  maxDegreeOfParallelism: 4,
};

const DEFAULT_EMIT_OPTIONS: Required<
  Omit<EmitOptions, "outputNameOverride" | "debugInformationPath">
> = {
  includePrivateMembers: true,
  debugInformation: "none",
  emitMetadataOnly: false,
  emitTestCoverageData: false,
  errorPolicy: "fail-closed",
};

export const createCompilationOptions = (
  input: CompilationOptionsInput = {}
): CompilationOptions => {
  const merged: CompilationOptions = {
    ...DEFAULT_COMPILATION_OPTIONS,
    ...withoutUndefined(input),
  };
  if (!Number.isInteger(merged.maxDegreeOfParallelism) || merged.maxDegreeOfParallelism < 1) {
    throw new RangeError(
      `maxDegreeOfParallelism must be a positive integer, got ${merged.maxDegreeOfParallelism}`
    );
  }
  return Object.freeze(merged);
};

export const createEmitOptions = (input: EmitOptionsInput = {}): EmitOptions =>
  Object.freeze({ ...DEFAULT_EMIT_OPTIONS, ...withoutUndefined(input) });

/** Degree of parallelism that a stage should actually use. */
export const effectiveParallelism = (options: CompilationOptions): number =>
  options.concurrentBuild ? options.maxDegreeOfParallelism : 1;

const withoutUndefined = <T extends object>(input: T): Partial<T> => {
  const result: Partial<T> = {};
  (Object.keys(input) as (keyof T)[]).forEach((key) => {
    if (input[key] !== undefined) {
      result[key] = input[key];
    }
  });
  return result;
};
