import {
  diagnosticFromCode,
  type Diagnostic,
} from "../diagnostics/index.js";
import type { SourceSet } from "../source-set/source-set.js";
import { effectiveParallelism } from "../source-set/options.js";
import { incrementCompilerPerfCounter, StageTimer } from "../perf.js";
import { runTaskPool, type PoolTask } from "./task-pool.js";
import {
  createAnalyzerConfig,
  type Analyzer,
  type AnalyzerConfig,
  type AnalyzerContext,
  type AnalyzerRunOutcome,
} from "./types.js";

/** Binder diagnostics only. Binds the source set if it has not been bound. */
export const getDiagnostics = (sourceSet: SourceSet): readonly Diagnostic[] =>
  sourceSet.getDiagnostics();

type AnalyzerTask = {
  analyzer: Analyzer;
  run: PoolTask<readonly Diagnostic[]>;
};

export const getAllDiagnostics = async ({
  sourceSet,
  analyzers,
  config = createAnalyzerConfig(),
  signal = new AbortController().signal,
}: {
  sourceSet: SourceSet;
  analyzers: readonly Analyzer[];
  config?: AnalyzerConfig;
  signal?: AbortSignal;
}): Promise<AnalyzerRunOutcome> => {
  if (signal.aborted) return { status: "cancelled" };

  const timer = new StageTimer(sourceSet.name);
  const declarations = timer.time("bind", () => sourceSet.declarations);
  const context: AnalyzerContext = { declarations, config, signal };
  const tasks = analyzers.flatMap((analyzer) =>
    createAnalyzerTasks({ analyzer, sourceSet, context })
  );
  incrementCompilerPerfCounter("analyzers.tasks", tasks.length);

  const outcome = await timer.timeAsync("analyze", () =>
    runTaskPool({
      tasks: tasks.map((task) => task.run),
      concurrency: effectiveParallelism(sourceSet.options),
      signal,
    })
  );
  if (outcome.status === "cancelled") {
    timer.finish({ outcome: "cancelled", diagnostics: 0 });
    return outcome;
  }

  const analyzerDiagnostics = outcome.results.flatMap((result, index) => {
    const { analyzer } = tasks[index];
    if (result.ok) return [...result.value];
    return [analyzerFailure(analyzer, result.error)];
  });
  const diagnostics = [
    ...declarations.diagnostics,
    ...applySeverityOverrides(analyzerDiagnostics, config),
  ];
  timer.finish({ outcome: "completed", diagnostics: diagnostics.length });

  return { status: "completed", diagnostics };
};

const createAnalyzerTasks = ({
  analyzer,
  sourceSet,
  context,
}: {
  analyzer: Analyzer;
  sourceSet: SourceSet;
  context: AnalyzerContext;
}): AnalyzerTask[] => {
  const tasks: AnalyzerTask[] = [];
  const units = context.declarations.units;

  if (analyzer.analyzeDeclarations) {
    const analyzeDeclarations = analyzer.analyzeDeclarations.bind(analyzer);
    tasks.push({
      analyzer,
      run: async () => analyzeDeclarations(context),
    });
  }

  if (!analyzer.analyzeUnit) return tasks;
  const analyzeUnit = analyzer.analyzeUnit.bind(analyzer);
  const unitContext = (index: number) => ({
    ...context,
    unit: units[index],
    source: sourceSet.units[index],
  });

  if (analyzer.concurrentUnits) {
    units.forEach((_unit, index) => {
      tasks.push({
        analyzer,
        run: async () => analyzeUnit(unitContext(index)),
      });
    });
    return tasks;
  }

  tasks.push({
    analyzer,
    run: async (signal) => {
      const collected: Diagnostic[] = [];
      for (let index = 0; index < units.length; index += 1) {
        signal.throwIfAborted();
        try {
          collected.push(...(await analyzeUnit(unitContext(index))));
        } catch (error) {
          if (signal.aborted) throw error;
          // Units reported before the failure stay in the group.
          return [...collected, analyzerFailure(analyzer, error)];
        }
      }
      return collected;
    },
  });
  return tasks;
};

const analyzerFailure = (analyzer: Analyzer, error: unknown): Diagnostic =>
  diagnosticFromCode({
    code: "AN0001",
    params: {
      kind: "analyzer-exception",
      analyzerId: analyzer.id,
      message: error instanceof Error ? error.message : String(error),
    },
    span: { file: `<analyzer:${analyzer.id}>`, start: 0, end: 0 },
  });

const applySeverityOverrides = (
  diagnostics: readonly Diagnostic[],
  config: AnalyzerConfig
): Diagnostic[] =>
  diagnostics.flatMap((diagnostic) => {
    const override = config.severityOverrides[diagnostic.code];
    if (override === undefined) return [diagnostic];
    if (override === "none") return [];
    return [{ ...diagnostic, severity: override }];
  });
