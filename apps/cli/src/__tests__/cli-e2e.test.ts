import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { resolve } from "node:path";
import type { Analyzer } from "@kiln/compiler";
import { afterEach, describe, expect, it } from "vitest";
import { runCli, type CliIo } from "../exec.js";

type Json = Record<string, unknown>;

let cursor = 0;
const span = () => {
  cursor += 10;
  return { start: cursor, end: cursor + 5 };
};
const name = (value: string): Json => ({ kind: "name", name: value, span: span() });
const ret = (value: Json): Json => ({ kind: "return", value, span: span() });
const method = (
  methodName: string,
  params: string[],
  body: Json[],
  returnType = "i32",
): Json => ({
  kind: "method",
  name: methodName,
  doc: `Runs ${methodName}.`,
  parameters: params.map((param) => ({ name: param, type: "i32", span: span() })),
  returnType,
  body,
  span: span(),
});

const calcUnit = ({ broken = false, methodName = "add" } = {}): Json => ({
  path: "calc.kiln",
  namespace: "App",
  types: [
    {
      name: "Calc",
      doc: "Arithmetic.",
      span: span(),
      members: [
        method(methodName, ["a", "b"], [
          ret({
            kind: "binary",
            operator: "+",
            left: name("a"),
            right: broken ? name("count") : name("b"),
            span: span(),
          }),
        ]),
      ],
    },
  ],
});

const roots: string[] = [];

const createProject = async (unit: Json, project: Json = {}): Promise<string> => {
  const root = await mkdtemp(resolve(tmpdir(), "kiln-cli-e2e-"));
  roots.push(root);
  await writeFile(resolve(root, "calc.unit.json"), JSON.stringify(unit));
  await writeFile(
    resolve(root, "project.json"),
    JSON.stringify({ name: "calc", units: ["calc.unit.json"], ...project }),
  );
  return root;
};

const captureIo = () => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIo = {
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  };
  return { io, stdout, stderr };
};

afterEach(async () => {
  await Promise.all(roots.splice(0).map((root) => rm(root, { recursive: true, force: true })));
});

describe("kiln build", () => {
  it("writes the image and every requested companion file", async () => {
    const root = await createProject(calcUnit());
    const out = resolve(root, "out");
    const { io, stdout, stderr } = captureIo();

    const code = await runCli(
      [
        "build",
        resolve(root, "project.json"),
        "--out",
        out,
        "--ref",
        "--docs",
        "--debug",
        "separate",
        "--no-color",
      ],
      { io },
    );

    expect(stderr).toEqual([]);
    expect(code).toBe(0);
    expect((await readdir(out)).sort()).toEqual([
      "calc.docs.json",
      "calc.kdbg",
      "calc.ref.wasm",
      "calc.wasm",
    ]);
    expect(stdout.at(-1)).toBe("0 errors, 0 warnings, 0 notes");
    expect(stdout.filter((line) => line.startsWith("wrote "))).toHaveLength(4);

    const image = await readFile(resolve(out, "calc.wasm"));
    const { exports } = new WebAssembly.Instance(new WebAssembly.Module(image));
    const add = exports["App.Calc.add"];
    if (typeof add !== "function") throw new Error("add is not exported");
    expect(add(19, 23)).toBe(42);
  });

  it("writes nothing and exits with 1 when the source has errors", async () => {
    const root = await createProject(calcUnit({ broken: true }));
    const out = resolve(root, "out");
    const { io, stdout, stderr } = captureIo();

    const code = await runCli(["build", resolve(root, "project.json"), "--out", out, "--no-color"], {
      io,
    });

    expect(code).toBe(1);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toContain(
      "ERROR [binder] BD0007: the name 'count' does not exist in the current context",
    );
    expect(stdout).toEqual(["1 error, 0 warnings, 0 notes"]);
    await expect(readdir(out)).rejects.toThrow();
  });

  it("reports an invalid project file", async () => {
    const root = await createProject(calcUnit(), { units: [] });
    const { io, stderr } = captureIo();

    const code = await runCli(["build", resolve(root, "project.json")], { io });

    expect(code).toBe(1);
    expect(stderr).toEqual([
      `${resolve(root, "project.json")}: units: Array must contain at least 1 element(s)`,
    ]);
  });
});

describe("kiln check", () => {
  it("reports analyzer warnings without failing", async () => {
    const root = await createProject(calcUnit({ methodName: "Add" }));
    const { io, stdout, stderr } = captureIo();

    const code = await runCli(["check", resolve(root, "project.json"), "--no-color"], { io });

    expect(code).toBe(0);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toContain("WARNING [analyzer] KN0002: method name 'Add' should be camelCase");
    expect(stdout).toEqual(["0 errors, 1 warning, 0 notes"]);
  });

  it("only runs the binder with --no-analyzers", async () => {
    const root = await createProject(calcUnit({ methodName: "Add", broken: true }));
    const { io, stdout } = captureIo();

    const code = await runCli(["check", resolve(root, "project.json"), "--no-analyzers"], { io });

    expect(code).toBe(1);
    expect(stdout).toEqual(["1 error, 0 warnings, 0 notes"]);
  });

  it("exits with 2 when the timeout cancels analysis", async () => {
    const root = await createProject(calcUnit());
    const { io, stderr } = captureIo();
    const stuck: Analyzer = {
      id: "stuck",
      analyzeDeclarations: () => new Promise<never>(() => {}),
    };

    const code = await runCli(["check", resolve(root, "project.json"), "--timeout", "5"], {
      io,
      analyzers: [stuck],
    });

    expect(code).toBe(2);
    expect(stderr).toEqual(["check cancelled after 5 ms"]);
  });
});
