export const COMPILER_PERF_ENV = "KILN_COMPILER_PERF";
export const COMPILER_PERF_PREFIX = "[kiln:compiler:perf]";

export type PipelineStage = "bind" | "analyze" | "compile-methods" | "finalize" | "serialize";

export type StageRunOutcome = "completed" | "failed" | "cancelled";

const STAGE_ORDER: readonly PipelineStage[] = [
  "bind",
  "analyze",
  "compile-methods",
  "finalize",
  "serialize",
];

export const isCompilerPerfEnabled = (): boolean => {
  const raw = process.env[COMPILER_PERF_ENV]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
};

const counters = new Map<string, number>();

export const incrementCompilerPerfCounter = (name: string, amount = 1): void => {
  if (amount === 0 || !isCompilerPerfEnabled()) return;
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

const roundMs = (value: number): number => Math.round(value * 1000) / 1000;

/**
 * Stage timings and counter deltas of one pipeline or analyzer run, logged as
 * a single JSON line by `finish`. Inert while `KILN_COMPILER_PERF` is unset.
 */
export class StageTimer {
  readonly #sourceSet: string;
  readonly #enabled: boolean;
  readonly #baseline: ReadonlyMap<string, number>;
  readonly #stagesMs = new Map<PipelineStage, number>();

  constructor(sourceSet: string) {
    this.#sourceSet = sourceSet;
    this.#enabled = isCompilerPerfEnabled();
    this.#baseline = this.#enabled ? new Map(counters) : new Map();
  }

  time<T>(stage: PipelineStage, run: () => T): T {
    if (!this.#enabled) return run();
    const start = performance.now();
    try {
      return run();
    } finally {
      this.#record(stage, start);
    }
  }

  async timeAsync<T>(stage: PipelineStage, run: () => Promise<T>): Promise<T> {
    if (!this.#enabled) return run();
    const start = performance.now();
    try {
      return await run();
    } finally {
      this.#record(stage, start);
    }
  }

  finish({ outcome, diagnostics }: { outcome: StageRunOutcome; diagnostics: number }): void {
    if (!this.#enabled) return;
    const stagesMs = STAGE_ORDER.flatMap((stage) => {
      const ms = this.#stagesMs.get(stage);
      return ms === undefined ? [] : [[stage, roundMs(ms)] as const];
    });
    const summary = {
      sourceSet: this.#sourceSet,
      outcome,
      diagnostics,
      stagesMs: Object.fromEntries(stagesMs),
      counters: this.#counterDelta(),
    };
    console.error(`${COMPILER_PERF_PREFIX} ${JSON.stringify(summary)}`);
  }

  #record(stage: PipelineStage, start: number): void {
    this.#stagesMs.set(stage, (this.#stagesMs.get(stage) ?? 0) + (performance.now() - start));
  }

  #counterDelta(): Record<string, number> {
    return Object.fromEntries(
      [...counters.entries()]
        .map(([name, value]) => [name, value - (this.#baseline.get(name) ?? 0)] as const)
        .filter(([, delta]) => delta !== 0)
        .sort(([left], [right]) => left.localeCompare(right))
    );
  }
}
