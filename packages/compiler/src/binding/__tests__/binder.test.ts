import { describe, expect, it } from "vitest";
import { createSyntax } from "../../__tests__/support/syntax.js";
import { SourceSet } from "../../source-set/source-set.js";
import type { MetadataReference } from "../../source-set/references.js";
import { bind, bindDeclarations } from "../binder.js";

const coreReference: MetadataReference = {
  name: "core",
  namespaces: [
    {
      name: "Core",
      types: [
        {
          name: "Io",
          visibility: "public",
          methods: [
            {
              name: "print",
              visibility: "public",
              parameters: [{ name: "value", type: "i32" }],
              returnType: "void",
            },
            { name: "raw", visibility: "internal", parameters: [], returnType: "void" },
          ],
        },
      ],
    },
  ],
};

describe("declaration binding", () => {
  it("reports an undeclared identifier at its location", () => {
    const s = createSyntax("main.kiln");
    const unit = s.unit({
      namespace: "App",
      types: [
        s.type("Main", [
          s.method("run", { returns: "i32", body: [s.ret(s.ref("count", 40))] }),
        ]),
      ],
    });

    const diagnostics = SourceSet.create({ name: "app", units: [unit] }).getDiagnostics();

    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      code: "BD0007",
      severity: "error",
      message: "the name 'count' does not exist in the current context",
      span: { file: "main.kiln", start: 40, end: 45 },
    });
  });

  it("resolves types through imports and tracks which imports were used", () => {
    const math = createSyntax("math.kiln");
    const util = createSyntax("util.kiln");
    const main = createSyntax("main.kiln");
    const set = SourceSet.create({
      name: "app",
      units: [
        math.unit({
          namespace: "App.Math",
          types: [
            math.type("Calc", [
              math.method("add", {
                params: [["a", "i32"], ["b", "i32"]],
                returns: "i32",
                body: [math.ret(math.bin("+", math.ref("a"), math.ref("b")))],
              }),
            ]),
          ],
        }),
        util.unit({ namespace: "App.Util", types: [util.type("Helper", [])] }),
        main.unit({
          namespace: "App",
          imports: ["App.Math", "App.Util", "Missing"],
          types: [
            main.type("Main", [
              main.method("run", {
                returns: "i32",
                body: [main.ret(main.call("Calc.add", [main.lit(1), main.lit(2)]))],
              }),
            ]),
          ],
        }),
      ],
    });

    const state = bind(set);
    const imports = state.units[2]?.imports ?? [];
    expect(imports.map((entry) => [entry.namespace, entry.resolved, entry.used])).toEqual([
      ["App.Math", true, true],
      ["App.Util", true, false],
      ["Missing", false, false],
    ]);
    expect(state.diagnostics.map((d) => d.code)).toEqual(["BD0005"]);
    expect(state.diagnostics[0]?.message).toBe("namespace Missing could not be found");
    expect(state.bodies.get("App.Main.run")?.calls.size).toBe(1);
  });

  it("reports a type that is visible through more than one import", () => {
    const x = createSyntax("x.kiln");
    const y = createSyntax("y.kiln");
    const main = createSyntax("main.kiln");
    const vec = (s: ReturnType<typeof createSyntax>) =>
      s.type("Vec", [s.method("len", { returns: "i32", body: [s.ret(s.lit(0))] })]);

    const state = SourceSet.create({
      name: "app",
      units: [
        x.unit({ namespace: "X", types: [vec(x)] }),
        y.unit({ namespace: "Y", types: [vec(y)] }),
        main.unit({
          namespace: "App",
          imports: ["X", "Y"],
          types: [
            main.type("Main", [
              main.method("run", { body: [main.expr(main.call("Vec.len"))] }),
            ]),
          ],
        }),
      ],
    }).declarations;

    expect(state.diagnostics.map((d) => d.code)).toEqual(["BD0009"]);
    expect(state.diagnostics[0]?.message).toBe("'Vec' is ambiguous between X.Vec, Y.Vec");
  });

  it("enforces member visibility across types and references", () => {
    const s = createSyntax("main.kiln");
    const state = SourceSet.create({
      name: "app",
      references: [coreReference],
      units: [
        s.unit({
          namespace: "App",
          imports: ["Core"],
          types: [
            s.type("Vault", [s.method("secret", { visibility: "private" })]),
            s.type("Main", [
              s.method("run", {
                body: [
                  s.expr(s.call("Vault.secret", [], 100)),
                  s.expr(s.call("Io.print", [s.lit(1)], 110)),
                  s.expr(s.call("Io.raw", [], 120)),
                ],
              }),
            ]),
          ],
        }),
      ],
    }).declarations;

    expect(state.diagnostics.map((d) => [d.code, d.message])).toEqual([
      ["BD0008", "'App.Vault.secret' is inaccessible here (visibility: private)"],
      ["BD0008", "'Core.Io.raw' is inaccessible here (visibility: internal)"],
    ]);
    expect(state.types.get("Core.Io")?.origin).toEqual({ kind: "reference", reference: "core" });
  });

  it("reports duplicate declarations in source order", () => {
    const first = createSyntax("a.kiln");
    const second = createSyntax("b.kiln");
    const state = SourceSet.create({
      name: "app",
      units: [
        first.unit({
          namespace: "App",
          types: [
            first.type("Main", [
              first.method("run", {
                body: [
                  first.local("x", first.lit(1), undefined, 30),
                  first.local("x", first.lit(2), undefined, 20),
                ],
              }),
            ]),
          ],
        }),
        second.unit({ namespace: "App", types: [second.type("Main", [], { at: 5 })] }),
      ],
    }).declarations;

    expect(state.diagnostics.map((d) => [d.code, d.span.file, d.span.start])).toEqual([
      ["BD0011", "a.kiln", 20],
      ["BD0001", "b.kiln", 5],
    ]);
    expect(state.diagnostics[1]?.message).toBe("type App.Main is already declared");
  });

  it("allows a branch to shadow an outer local", () => {
    const s = createSyntax("main.kiln");
    const state = SourceSet.create({
      name: "app",
      units: [
        s.unit({
          types: [
            s.type("Main", [
              s.method("run", {
                body: [
                  s.local("x", s.lit(1)),
                  s.when(s.lit(true), [s.local("x", s.lit(2))]),
                ],
              }),
            ]),
          ],
        }),
      ],
    }).declarations;

    expect(state.diagnostics).toEqual([]);
    expect(state.bodies.get("Main.run")?.locals.map((local) => local.slot)).toEqual([0, 1]);
  });

  it("requires an entry point for executables", () => {
    const s = createSyntax("main.kiln");
    const unit = s.unit({
      namespace: "App",
      types: [s.type("Main", [s.method("run", { params: [["n", "i32"]] })])],
    });
    const missing = SourceSet.create({
      name: "app",
      units: [unit],
      options: { outputKind: "executable" },
    });
    expect(missing.getDiagnostics().map((d) => d.message)).toEqual([
      "executable output requires an entry point",
    ]);

    const invalid = missing.withOptions({ entryPoint: "App.Main.run" });
    expect(invalid.getDiagnostics().map((d) => d.message)).toEqual([
      "entry point App.Main.run is invalid: an entry point cannot take parameters",
    ]);
  });

  it("produces the same result with and without a concurrent build", () => {
    const build = (file: string, offset: number) => {
      const s = createSyntax(file);
      return s.unit({
        namespace: "App",
        imports: ["Nowhere"],
        types: [
          s.type(`T${offset}`, [
            s.method("run", {
              returns: "i32",
              body: [s.ret(s.bin("+", s.ref("missing"), s.call("nothing")))],
            }),
          ]),
        ],
      });
    };
    const units = [build("a.kiln", 1), build("b.kiln", 2), build("c.kiln", 3)];
    const concurrent = SourceSet.create({ name: "app", units });
    const sequential = concurrent.withOptions({ concurrentBuild: false });

    const left = bindDeclarations(concurrent).diagnostics;
    const right = bindDeclarations(sequential).diagnostics;
    expect(left).toHaveLength(9);
    expect(right).toEqual(left);
    expect(left.map((d) => d.span.file)).toEqual([
      "a.kiln",
      "a.kiln",
      "a.kiln",
      "b.kiln",
      "b.kiln",
      "b.kiln",
      "c.kiln",
      "c.kiln",
      "c.kiln",
    ]);
  });
});
