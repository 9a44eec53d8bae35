import { describe, expect, it } from "vitest";
import { createSyntax } from "../../__tests__/support/syntax.js";
import type { MemberDeclaration } from "../../syntax/types.js";
import { SourceSet } from "../../source-set/source-set.js";
import { lowerMethod } from "../lower-method.js";

type Syntax = ReturnType<typeof createSyntax>;

const lowerFrom = (build: (s: Syntax) => MemberDeclaration[], name: string) => {
  const s = createSyntax("calc.kiln");
  const set = SourceSet.create({
    name: "calc",
    units: [s.unit({ namespace: "App", types: [s.type("Calc", build(s))] })],
  });
  expect(set.getDiagnostics()).toEqual([]);
  const body = set.declarations.bodies.get(`App.Calc.${name}`);
  if (!body) throw new Error(`no body for ${name}`);
  return lowerMethod(body);
};

const messages = (lowered: ReturnType<typeof lowerMethod>) =>
  lowered.diagnostics.map((d) => `${d.code}: ${d.message}`);

describe("method lowering", () => {
  it("lowers parameter arithmetic", () => {
    const lowered = lowerFrom(
      (s) => [
        s.method("add", {
          params: [
            ["a", "i32"],
            ["b", "i32"],
          ],
          returns: "i32",
          body: [s.ret(s.bin("+", s.ref("a"), s.ref("b")))],
        }),
      ],
      "add"
    );

    expect(lowered.diagnostics).toEqual([]);
    expect(lowered.body).toEqual([
      {
        kind: "return",
        value: {
          kind: "arithmetic",
          op: "add",
          type: "i32",
          left: { kind: "local.get", index: 0, type: "i32" },
          right: { kind: "local.get", index: 1, type: "i32" },
        },
      },
    ]);
  });

  it("places locals after parameters and types literals from context", () => {
    const lowered = lowerFrom(
      (s) => [
        s.method("grow", {
          params: [["seed", "i64"]],
          returns: "i64",
          body: [s.local("x", s.lit(5), "i64"), s.ret(s.bin("+", s.ref("x"), s.ref("seed")))],
        }),
      ],
      "grow"
    );

    expect(lowered.diagnostics).toEqual([]);
    expect(lowered.locals).toEqual([{ name: "x", index: 1, type: "i64" }]);
    expect(lowered.body).toEqual([
      { kind: "local.set", index: 1, value: { kind: "const", type: "i64", value: 5 } },
      {
        kind: "return",
        value: {
          kind: "arithmetic",
          op: "add",
          type: "i64",
          left: { kind: "local.get", index: 1, type: "i64" },
          right: { kind: "local.get", index: 0, type: "i64" },
        },
      },
    ]);
  });

  it("gives an untyped left literal the type of the right operand", () => {
    const lowered = lowerFrom(
      (s) => [
        s.method("scale", {
          params: [["x", "f64"]],
          returns: "f64",
          body: [s.ret(s.bin("*", s.lit(2), s.ref("x")))],
        }),
      ],
      "scale"
    );

    expect(lowered.diagnostics).toEqual([]);
    expect(lowered.body[0]).toEqual({
      kind: "return",
      value: {
        kind: "arithmetic",
        op: "mul",
        type: "f64",
        left: { kind: "const", type: "f64", value: 2 },
        right: { kind: "local.get", index: 0, type: "f64" },
      },
    });
  });

  it("infers i64 for integers outside the i32 range", () => {
    const lowered = lowerFrom(
      (s) => [
        s.method("big", {
          returns: "void",
          body: [s.local("n", s.lit(5_000_000_000))],
        }),
      ],
      "big"
    );

    expect(lowered.diagnostics).toEqual([]);
    expect(lowered.locals).toEqual([{ name: "n", index: 0, type: "i64" }]);
  });

  it("reports a missing return at the method and traps at the end", () => {
    const lowered = lowerFrom(
      (s) => [s.method("value", { returns: "i32", body: [], at: 100 })],
      "value"
    );

    expect(lowered.diagnostics).toMatchObject([
      {
        code: "LW0004",
        message: "not all code paths in App.Calc.value return a value",
        span: { file: "calc.kiln", start: 100, end: 105 },
      },
    ]);
    expect(lowered.body).toEqual([{ kind: "unreachable" }]);
  });

  it("treats an if with two returning branches as returning", () => {
    const lowered = lowerFrom(
      (s) => [
        s.method("sign", {
          params: [["n", "i32"]],
          returns: "i32",
          body: [
            s.when(s.bin("<", s.ref("n"), s.lit(0)), [s.ret(s.lit(0))], [s.ret(s.lit(1))]),
            s.ret(s.lit(2), 300),
          ],
        }),
      ],
      "sign"
    );

    expect(lowered.diagnostics).toMatchObject([
      {
        code: "LW0008",
        severity: "warning",
        message: "unreachable code detected",
        span: { start: 300, end: 305 },
      },
    ]);
    expect(lowered.body).toHaveLength(1);
    expect(lowered.body[0]).toMatchObject({
      kind: "if",
      condition: {
        kind: "compare",
        op: "lt",
        operandType: "i32",
        right: { kind: "const", type: "i32", value: 0 },
      },
    });
  });

  it("reports return type errors", () => {
    const build = (s: Syntax) => [
      s.method("flag", { returns: "i32", body: [s.ret(s.lit(true, undefined, 200))] }),
      s.method("log", { body: [s.ret(s.lit(1))] }),
      s.method("empty", { returns: "i32", body: [s.ret()] }),
    ];

    const flag = lowerFrom(build, "flag");
    expect(flag.diagnostics).toMatchObject([
      { code: "LW0001", span: { start: 200, end: 205 } },
    ]);
    expect(messages(flag)).toEqual([
      "LW0001: App.Calc.flag returns i32 but the expression has type bool",
    ]);
    expect(messages(lowerFrom(build, "log"))).toEqual([
      "LW0001: App.Calc.log returns void and cannot return a value",
    ]);
    expect(messages(lowerFrom(build, "empty"))).toEqual([
      "LW0001: App.Calc.empty must return a value of type i32",
    ]);
  });

  it("reports operator and condition type errors without cascading", () => {
    const lowered = lowerFrom(
      (s) => [
        s.method("mix", {
          returns: "i32",
          body: [
            s.when(s.lit(1), []),
            s.expr(s.bin("+", s.lit(true), s.lit(false))),
            s.ret(s.bin("+", s.lit(1), s.lit(true))),
          ],
        }),
      ],
      "mix"
    );

    expect(messages(lowered)).toEqual([
      "LW0006: condition must be bool, got i32",
      "LW0005: operator '+' cannot be applied to bool and bool",
      "LW0005: operator '+' cannot be applied to i32 and bool",
    ]);
  });

  it("rejects remainder on floating point operands", () => {
    const lowered = lowerFrom(
      (s) => [
        s.method("wrap", {
          params: [["x", "f64"]],
          returns: "f64",
          body: [s.ret(s.bin("%", s.ref("x"), s.lit(2)))],
        }),
      ],
      "wrap"
    );

    expect(messages(lowered)).toEqual([
      "LW0005: operator '%' cannot be applied to f64 and f64",
    ]);
  });

  it("checks local initializers", () => {
    const lowered = lowerFrom(
      (s) => [
        s.method("noop"),
        s.method("locals", {
          body: [
            s.local("big", s.lit(3_000_000_000), "i32"),
            s.local("ratio", s.lit(1.5), "i32"),
            s.local("nothing", s.call("noop")),
          ],
        }),
      ],
      "locals"
    );

    expect(messages(lowered)).toEqual([
      "LW0007: literal 3000000000 does not fit type i32",
      "LW0009: local 'ratio' is declared as i32 but initialized with f64",
      "LW0010: noop returns void and cannot be used as a value",
    ]);
    expect(lowered.locals.map((local) => local.type)).toEqual(["i32", "i32", "i32"]);
  });

  it("checks call arguments against the target signature", () => {
    const lowered = lowerFrom(
      (s) => [
        s.method("add", {
          params: [
            ["a", "i32"],
            ["b", "i32"],
          ],
          returns: "i32",
          body: [s.ret(s.bin("+", s.ref("a"), s.ref("b")))],
        }),
        s.method("run", {
          body: [
            s.expr(s.call("add", [s.lit(1)])),
            s.expr(s.call("add", [s.lit(1), s.lit(true)])),
            s.expr(s.call("add", [s.lit(1), s.lit(2)])),
          ],
        }),
      ],
      "run"
    );

    expect(messages(lowered)).toEqual([
      "LW0002: App.Calc.add expects 2 argument(s) but got 1",
      "LW0003: argument b of App.Calc.add expects i32, got bool",
    ]);
    expect(lowered.body[0]).toEqual({ kind: "drop", value: { kind: "unreachable" } });
    expect(lowered.body[2]).toMatchObject({
      kind: "drop",
      value: {
        kind: "call",
        target: { qualifiedName: "App.Calc.add" },
        arguments: [
          { kind: "const", type: "i32", value: 1 },
          { kind: "const", type: "i32", value: 2 },
        ],
      },
    });
  });
});
