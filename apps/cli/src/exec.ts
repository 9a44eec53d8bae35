import { CommanderError } from "commander";
import {
  DiagnosticError,
  emit,
  getAllDiagnostics,
  getDiagnostics,
  hasErrors,
  MemoryOutputStream,
  type Analyzer,
  type AnalyzerRunOutcome,
  type Diagnostic,
} from "@kiln/compiler";
import { createBuiltinAnalyzers } from "@kiln/analyzers";
import { parseCliArgs } from "./config/arg-parser.js";
import type { BuildConfig, CheckConfig, KilnConfig } from "./config/types.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { summarizeDiagnostics, writeOutputs, type BuildStreams } from "./output.js";
import { loadProject, ProjectError } from "./project.js";

export const EXIT_OK = 0;
export const EXIT_ERRORS = 1;
export const EXIT_CANCELLED = 2;

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

export type RunCliOptions = {
  io?: CliIo;
  /** Analyzers for `check`; the built-in set by default. */
  analyzers?: readonly Analyzer[];
};

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export const exec = () =>
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch(errorHandler);

/** Runs one CLI invocation and resolves to its exit code. */
export const runCli = async (
  argv: readonly string[],
  { io = consoleIo, analyzers }: RunCliOptions = {},
): Promise<number> => {
  const config = parseOrExitCode(argv);
  if (typeof config === "number") return config;

  try {
    return config.command === "build"
      ? await runBuild(config, io)
      : await runCheck(config, io, analyzers ?? createBuiltinAnalyzers());
  } catch (error) {
    if (error instanceof ProjectError) {
      io.stderr(error.message);
      return EXIT_ERRORS;
    }
    if (error instanceof DiagnosticError) {
      error.diagnostics.forEach((diagnostic) =>
        io.stderr(formatCliDiagnostic(diagnostic, { color: config.color })),
      );
      return EXIT_ERRORS;
    }
    throw error;
  }
};

/** Help, version and usage errors end the run with commander's exit code. */
const parseOrExitCode = (argv: readonly string[]): KilnConfig | number => {
  try {
    return parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
};

const report = ({
  diagnostics,
  io,
  root,
  color,
}: {
  diagnostics: readonly Diagnostic[];
  io: CliIo;
  root: string;
  color: boolean;
}): void => {
  diagnostics.forEach((diagnostic) => io.stderr(formatCliDiagnostic(diagnostic, { color, root })));
};

const runBuild = async (config: BuildConfig, io: CliIo): Promise<number> => {
  const project = await loadProject(config.project);
  const sourceSet = config.sequential
    ? project.sourceSet.withOptions({ concurrentBuild: false })
    : project.sourceSet;
  const name = config.outputName ?? sourceSet.name;

  const streams: BuildStreams = {
    image: new MemoryOutputStream(),
    metadata: config.reference ? new MemoryOutputStream() : undefined,
    debug: config.debug === "separate" ? new MemoryOutputStream() : undefined,
    documentation: config.docs ? new MemoryOutputStream() : undefined,
  };
  const result = emit({
    sourceSet,
    streams,
    resources: project.resources,
    options: {
      includePrivateMembers: config.includePrivate,
      debugInformation: config.debug,
      emitMetadataOnly: config.metadataOnly,
      outputNameOverride: config.outputName,
      emitTestCoverageData: config.coverage,
      errorPolicy: config.emitAnyway ? "emit-anyway" : "fail-closed",
      debugInformationPath: `${name}.kdbg`,
    },
  });

  report({ diagnostics: result.diagnostics, io, root: project.root, color: config.color });
  const files = await writeOutputs({
    outDir: config.outDir,
    name,
    streams,
    written: result.written,
  });
  files.forEach((file) => io.stdout(`wrote ${file.path} (${file.bytes} bytes)`));
  io.stdout(summarizeDiagnostics(result.diagnostics));

  return hasErrors(result.diagnostics) ? EXIT_ERRORS : EXIT_OK;
};

const runCheck = async (
  config: CheckConfig,
  io: CliIo,
  analyzers: readonly Analyzer[],
): Promise<number> => {
  const project = await loadProject(config.project);
  const sourceSet = config.sequential
    ? project.sourceSet.withOptions({ concurrentBuild: false })
    : project.sourceSet;

  const controller = new AbortController();
  const timer =
    config.timeoutMs === undefined
      ? undefined
      : setTimeout(() => controller.abort(), config.timeoutMs);

  let outcome: AnalyzerRunOutcome;
  try {
    outcome = config.analyzers
      ? await getAllDiagnostics({
          sourceSet,
          analyzers,
          config: project.analyzerConfig,
          signal: controller.signal,
        })
      : { status: "completed", diagnostics: getDiagnostics(sourceSet) };
  } finally {
    clearTimeout(timer);
  }

  if (outcome.status === "cancelled") {
    io.stderr(`check cancelled after ${config.timeoutMs ?? 0} ms`);
    return EXIT_CANCELLED;
  }

  report({ diagnostics: outcome.diagnostics, io, root: project.root, color: config.color });
  io.stdout(summarizeDiagnostics(outcome.diagnostics));
  return hasErrors(outcome.diagnostics) ? EXIT_ERRORS : EXIT_OK;
};

function errorHandler(error: unknown) {
  console.error(error);
  process.exit(1);
}
