import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { Diagnostic } from "@kiln/compiler";
import { describe, expect, it } from "vitest";
import { formatCliDiagnostic } from "../diagnostics.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturePath = resolve(__dirname, "fixtures/sample.kiln");
const fixtureSource = readFileSync(fixturePath, "utf8");

const undeclaredCount = (file: string): Diagnostic => {
  const start = fixtureSource.indexOf("count");
  return {
    code: "BD0007",
    message: "the name 'count' does not exist in the current context",
    severity: "error",
    phase: "binder",
    span: { file, start, end: start + "count".length },
  };
};

describe("formatCliDiagnostic", () => {
  it("renders the location and source snippet", () => {
    const formatted = formatCliDiagnostic(undeclaredCount(fixturePath), { color: false });

    expect(formatted.split("\n")).toEqual([
      `${fixturePath}:5:12 ERROR [binder] BD0007: the name 'count' does not exist in the current context`,
      "  |",
      "5 |     return count",
      "  |            ^^^^^ the name 'count' does not exist in the current context",
    ]);
  });

  it("resolves relative span files against the project root", () => {
    const formatted = formatCliDiagnostic(undeclaredCount("fixtures/sample.kiln"), {
      color: false,
      root: __dirname,
    });

    expect(formatted.split("\n")[0]).toBe(
      `${fixturePath}:5:12 ERROR [binder] BD0007: the name 'count' does not exist in the current context`
    );
  });

  it("falls back to offsets when the source file is missing", () => {
    const missing = resolve(__dirname, "does-not-exist.kiln");
    const diagnostic: Diagnostic = {
      code: "BD0001",
      message: "type App.Main is already declared",
      severity: "error",
      span: { file: missing, start: 3, end: 7 },
    };

    const formatted = formatCliDiagnostic(diagnostic, { color: false });

    expect(formatted).toBe(`${missing}:3-7 ERROR BD0001: type App.Main is already declared`);
  });

  it("keeps synthetic files as written and lists hints", () => {
    const diagnostic: Diagnostic = {
      code: "OP0002",
      message: "embedded debug information cannot be produced when emitting metadata only",
      severity: "error",
      phase: "options",
      span: { file: "<options>", start: 0, end: 0 },
      hints: [{ message: "Use debug mode 'separate' or 'none' for metadata-only output." }],
    };

    expect(formatCliDiagnostic(diagnostic, { color: false }).split("\n")).toEqual([
      "<options> ERROR [options] OP0002: embedded debug information cannot be produced when emitting metadata only",
      "hint: Use debug mode 'separate' or 'none' for metadata-only output.",
    ]);
  });

  it("prints analyzer failures under the analyzer that raised them", () => {
    const diagnostic: Diagnostic = {
      code: "AN0001",
      message: "analyzer 'naming' threw an exception: bad unit",
      severity: "warning",
      phase: "analyzer",
      span: { file: "<analyzer:naming>", start: 0, end: 0 },
    };

    expect(formatCliDiagnostic(diagnostic, { color: false, root: __dirname })).toBe(
      "<analyzer:naming> WARNING [analyzer] AN0001: analyzer 'naming' threw an exception: bad unit"
    );
  });

  it("colours the severity, code and pointer", () => {
    const lines = formatCliDiagnostic(undeclaredCount(fixturePath), { color: true }).split("\n");

    expect(lines[0]).toBe(
      `${fixturePath}:5:12 \u001B[1m\u001B[31mERROR\u001B[0m\u001B[0m [binder] \u001B[35mBD0007\u001B[0m: the name 'count' does not exist in the current context`
    );
    expect(lines[3]).toBe(
      `  |            \u001B[31m^^^^^\u001B[0m \u001B[2mthe name 'count' does not exist in the current context\u001B[0m`
    );
  });
});
