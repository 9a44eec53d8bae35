import { describe, expect, it } from "vitest";
import { createDiagnostic, type Diagnostic } from "../../diagnostics/index.js";
import { createSyntax } from "../../__tests__/support/syntax.js";
import { SourceSet } from "../../source-set/source-set.js";
import { getAllDiagnostics, getDiagnostics } from "../diagnostics-engine.js";
import { createAnalyzerConfig, type Analyzer } from "../types.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const note = (code: string, file: string, message: string): Diagnostic =>
  createDiagnostic({ code, message, severity: "warning", span: { file, start: 0, end: 1 } });

const createSet = (files: string[], options?: { concurrentBuild?: boolean; maxDegreeOfParallelism?: number }) =>
  SourceSet.create({
    name: "app",
    options,
    units: files.map((file, index) => {
      const s = createSyntax(file);
      return s.unit({
        namespace: "App",
        types: [
          s.type(`T${index}`, [
            s.method("run", {
              body: index === 0 ? [s.expr(s.ref("missing"))] : [],
            }),
          ]),
        ],
      });
    }),
  });

const messagesOf = (diagnostics: readonly Diagnostic[]) =>
  diagnostics.map((diagnostic) => `${diagnostic.code}:${diagnostic.message}`);

describe("getAllDiagnostics", () => {
  it("returns declaration diagnostics first, then analyzers in registration order", async () => {
    const set = createSet(["a.kiln", "b.kiln"]);
    const first: Analyzer = {
      id: "first",
      concurrentUnits: true,
      analyzeDeclarations: () => [note("KN1000", "<decl>", "first:declarations")],
      analyzeUnit: async ({ unit }) => {
        // Later units finish first.
        await sleep(unit.path === "a.kiln" ? 15 : 1);
        return [note("KN1000", unit.path, `first:${unit.path}`)];
      },
    };
    const second: Analyzer = {
      id: "second",
      analyzeUnit: ({ unit, source }) => [
        note("KN2000", unit.path, `second:${source.path}`),
      ],
    };

    const outcome = await getAllDiagnostics({ sourceSet: set, analyzers: [first, second] });

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(messagesOf(outcome.diagnostics)).toEqual([
      "BD0007:the name 'missing' does not exist in the current context",
      "KN1000:first:declarations",
      "KN1000:first:a.kiln",
      "KN1000:first:b.kiln",
      "KN2000:second:a.kiln",
      "KN2000:second:b.kiln",
    ]);
    expect(getDiagnostics(set)).toHaveLength(1);
  });

  it("turns an analyzer exception into a warning in that analyzer's group", async () => {
    const set = createSet(["a.kiln"]);
    const broken: Analyzer = {
      id: "broken",
      analyzeDeclarations: () => {
        throw new Error("boom");
      },
    };
    const healthy: Analyzer = {
      id: "healthy",
      analyzeDeclarations: () => [note("KN3000", "<decl>", "still runs")],
    };

    const outcome = await getAllDiagnostics({ sourceSet: set, analyzers: [broken, healthy] });

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(outcome.diagnostics.slice(1)).toMatchObject([
      {
        code: "AN0001",
        severity: "warning",
        message: "analyzer 'broken' threw an exception: boom",
        span: { file: "<analyzer:broken>", start: 0, end: 0 },
      },
      { code: "KN3000", message: "still runs" },
    ]);
  });

  it("keeps the units a sequential analyzer finished before it threw", async () => {
    const set = createSet(["a.kiln", "b.kiln", "c.kiln"]);
    const visited: string[] = [];
    const partial: Analyzer = {
      id: "partial",
      analyzeUnit: ({ unit }) => {
        visited.push(unit.path);
        if (unit.path === "b.kiln") throw new Error("bad unit");
        return [note("KN4000", unit.path, `seen:${unit.path}`)];
      },
    };

    const outcome = await getAllDiagnostics({ sourceSet: set, analyzers: [partial] });

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(messagesOf(outcome.diagnostics.slice(1))).toEqual([
      "KN4000:seen:a.kiln",
      "AN0001:analyzer 'partial' threw an exception: bad unit",
    ]);
    expect(visited).toEqual(["a.kiln", "b.kiln"]);
  });

  it("applies severity overrides to analyzer diagnostics only", async () => {
    const set = createSet(["a.kiln"]);
    const analyzer: Analyzer = {
      id: "styles",
      analyzeDeclarations: () => [
        note("KN1000", "<decl>", "promoted"),
        note("KN2000", "<decl>", "silenced"),
      ],
    };

    const outcome = await getAllDiagnostics({
      sourceSet: set,
      analyzers: [analyzer],
      config: createAnalyzerConfig({
        severityOverrides: { KN1000: "error", KN2000: "none", BD0007: "none" },
      }),
    });

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(outcome.diagnostics.map((d) => [d.code, d.severity])).toEqual([
      ["BD0007", "error"],
      ["KN1000", "error"],
    ]);
  });

  it("bounds in-flight analyzer tasks by the degree of parallelism", async () => {
    const measure = async (set: SourceSet) => {
      let inFlight = 0;
      let peak = 0;
      const analyzer: Analyzer = {
        id: "slow",
        concurrentUnits: true,
        analyzeUnit: async () => {
          inFlight += 1;
          peak = Math.max(peak, inFlight);
          await sleep(5);
          inFlight -= 1;
          return [];
        },
      };
      await getAllDiagnostics({ sourceSet: set, analyzers: [analyzer] });
      return peak;
    };
    const files = ["a.kiln", "b.kiln", "c.kiln", "d.kiln"];

    expect(await measure(createSet(files, { maxDegreeOfParallelism: 2 }))).toBe(2);
    expect(await measure(createSet(files, { concurrentBuild: false }))).toBe(1);
  });

  it("reports cancellation as an outcome and keeps the binding usable", async () => {
    const set = createSet(["a.kiln", "b.kiln", "c.kiln"], { concurrentBuild: false });
    const controller = new AbortController();
    const visited: string[] = [];
    const analyzer: Analyzer = {
      id: "cancelling",
      analyzeUnit: async ({ unit }) => {
        visited.push(unit.path);
        controller.abort();
        await sleep(1);
        return [];
      },
    };

    const outcome = await getAllDiagnostics({
      sourceSet: set,
      analyzers: [analyzer],
      signal: controller.signal,
    });

    expect(outcome).toEqual({ status: "cancelled" });
    expect(visited).toEqual(["a.kiln"]);
    expect(set.isDeclarationBindingComplete).toBe(true);
    expect(getDiagnostics(set).map((d) => d.code)).toEqual(["BD0007"]);
  });

  it("returns a cancelled outcome while an analyzer ignores the signal", async () => {
    const set = createSet(["a.kiln"]);
    const controller = new AbortController();
    const stuck: Analyzer = {
      id: "stuck",
      analyzeDeclarations: () => new Promise<never>(() => {}),
    };
    setTimeout(() => controller.abort(), 10);

    const outcome = await getAllDiagnostics({
      sourceSet: set,
      analyzers: [stuck],
      signal: controller.signal,
    });

    expect(outcome).toEqual({ status: "cancelled" });
  });
});
