import { describe, expect, it } from "vitest";
import { InvalidStateError } from "../../errors.js";
import { createSyntax } from "../../__tests__/support/syntax.js";
import {
  createCompilationOptions,
  createEmitOptions,
  effectiveParallelism,
} from "../options.js";
import { SourceSet } from "../source-set.js";
import type { TypeDeclaration } from "../../syntax/types.js";

const sampleUnit = (file = "main.kiln") => {
  const s = createSyntax(file);
  return s.unit({
    namespace: "App",
    types: [
      s.type("Main", [
        s.method("answer", { returns: "i32", body: [s.ret(s.lit(42))] }),
      ]),
    ],
  });
};

describe("SourceSet", () => {
  it("rejects duplicate unit paths", () => {
    expect(() =>
      SourceSet.create({ name: "app", units: [sampleUnit(), sampleUnit()] })
    ).toThrow(InvalidStateError);
  });

  it("rejects an empty name", () => {
    expect(() => SourceSet.create({ name: " ", units: [] })).toThrow(
      "invalid pipeline state: a source set requires a non-empty name"
    );
  });

  it("binds once and reuses the result", () => {
    const set = SourceSet.create({ name: "app", units: [sampleUnit()] });
    expect(set.isDeclarationBindingComplete).toBe(false);

    const first = set.declarations;
    expect(set.isDeclarationBindingComplete).toBe(true);
    expect(set.declarations).toBe(first);
    expect(set.getDiagnostics()).toBe(first.diagnostics);
  });

  it("starts with a fresh binding cache after changing options", () => {
    const set = SourceSet.create({ name: "app", units: [sampleUnit()] });
    const bound = set.declarations;

    const sequential = set.withOptions({ concurrentBuild: false });
    expect(sequential).not.toBe(set);
    expect(sequential.isDeclarationBindingComplete).toBe(false);
    expect(sequential.options.concurrentBuild).toBe(false);
    expect(sequential.options.maxDegreeOfParallelism).toBe(4);
    expect(sequential.declarations).not.toBe(bound);
    expect(set.declarations).toBe(bound);
  });

  it("fingerprints content, not identity", () => {
    const left = SourceSet.create({ name: "app", units: [sampleUnit()] });
    const right = SourceSet.create({ name: "app", units: [sampleUnit()] });
    expect(left.fingerprint).toBe(right.fingerprint);
    expect(left.withOptions({ outputKind: "executable" }).fingerprint).not.toBe(
      left.fingerprint
    );
  });

  it("freezes its inputs", () => {
    const set = SourceSet.create({ name: "app", units: [sampleUnit()] });
    expect(Object.isFrozen(set.units)).toBe(true);
    expect(Object.isFrozen(set.units[0].types)).toBe(true);
    expect(Object.isFrozen(set.units[0].types[0].members[0])).toBe(true);
    expect(Object.isFrozen(set.references)).toBe(true);
    expect(Object.isFrozen(set.options)).toBe(true);
  });

  it("binds the units it was created with, not later edits to them", () => {
    const s = createSyntax("main.kiln");
    const types: TypeDeclaration[] = [s.type("A", [])];
    const set = SourceSet.create({ name: "app", units: [s.unit({ namespace: "App", types })] });
    const fingerprint = set.fingerprint;

    types.push(s.type("B", []));

    expect([...set.declarations.types.keys()]).toEqual(["App.A"]);
    expect(set.units[0].types.map((type) => type.name)).toEqual(["A"]);
    expect(set.fingerprint).toBe(fingerprint);
    expect(Object.isFrozen(types)).toBe(false);
  });
});

describe("option factories", () => {
  it("merges input over defaults and freezes the record", () => {
    const options = createCompilationOptions({ maxDegreeOfParallelism: 2 });
    expect(options).toEqual({
      concurrentBuild: true,
      outputKind: "library",
      maxDegreeOfParallelism: 2,
    });
    expect(Object.isFrozen(options)).toBe(true);
  });

  it("ignores explicitly undefined fields", () => {
    const options = createEmitOptions({ debugInformation: undefined, emitMetadataOnly: true });
    expect(options.debugInformation).toBe("none");
    expect(options.emitMetadataOnly).toBe(true);
    expect(options.errorPolicy).toBe("fail-closed");
    expect(Object.isFrozen(options)).toBe(true);
  });

  it("rejects a non-positive degree of parallelism", () => {
    expect(() => createCompilationOptions({ maxDegreeOfParallelism: 0 })).toThrow(RangeError);
  });

  it("runs one task at a time without a concurrent build", () => {
    expect(effectiveParallelism(createCompilationOptions({ concurrentBuild: false }))).toBe(1);
    expect(effectiveParallelism(createCompilationOptions({ maxDegreeOfParallelism: 3 }))).toBe(3);
  });
});
