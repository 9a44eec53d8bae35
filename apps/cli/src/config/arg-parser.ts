import { Command, InvalidArgumentError, Option } from "commander";
import { createRequire } from "node:module";
import type { DebugInformationMode } from "@kiln/compiler";
import type { BuildConfig, CheckConfig, KilnConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const DEBUG_MODES = ["none", "embedded", "separate"] as const;

const parseDebugMode = (value: string): DebugInformationMode => {
  const normalized = value.toLowerCase();
  if (normalized === "none" || normalized === "embedded" || normalized === "separate") {
    return normalized;
  }
  throw new InvalidArgumentError(
    `invalid debug mode "${value}" (allowed: ${DEBUG_MODES.join(", ")})`,
  );
};

const parseTimeout = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`timeout must be a non-negative integer, got "${value}"`);
  }
  return parsed;
};

const readBoolean = (value: unknown): boolean => value === true;

const readString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .exitOverride();

/**
 * Parses `kiln build` and `kiln check` arguments (without the node and script
 * entries of `process.argv`). Invalid input throws a `CommanderError`.
 */
export const parseCliArgs = (argv: readonly string[]): KilnConfig => {
  const parsed: { config?: KilnConfig } = {};
  const program = createBaseCommand({
    name: "kiln",
    description: "Compile kiln source sets to WebAssembly modules",
  });

  program
    .command("build")
    .description("bind, compile and serialize a project")
    .argument("<project>", "project JSON file")
    .option("--out <dir>", "output directory", "dist")
    .addOption(
      new Option("--debug <mode>", `debug information (${DEBUG_MODES.join("|")})`)
        .argParser(parseDebugMode)
        .default("none"),
    )
    .option("--metadata-only", "write a metadata-only image")
    .option("--ref", "also write the public metadata image as <name>.ref.wasm")
    .option("--include-private", "keep private members in metadata-only output")
    .option("--coverage", "instrument methods with coverage slots")
    .option("--docs", "write <name>.docs.json")
    .option("--sequential", "disable concurrent work")
    .option("--emit-anyway", "write outputs even when errors are reported")
    .option("--output-name <name>", "override the output name")
    .option("--no-color", "disable ANSI colours")
    .action((project: string, opts: Record<string, unknown>) => {
      const debug = opts.debug;
      const build: BuildConfig = {
        command: "build",
        project,
        outDir: readString(opts.out) ?? "dist",
        debug: typeof debug === "string" ? parseDebugMode(debug) : "none",
        metadataOnly: readBoolean(opts.metadataOnly),
        reference: readBoolean(opts.ref),
        includePrivate: readBoolean(opts.includePrivate),
        coverage: readBoolean(opts.coverage),
        docs: readBoolean(opts.docs),
        sequential: readBoolean(opts.sequential),
        emitAnyway: readBoolean(opts.emitAnyway),
        outputName: readString(opts.outputName),
        color: opts.color !== false,
      };
      parsed.config = build;
    });

  program
    .command("check")
    .description("report binder and analyzer diagnostics")
    .argument("<project>", "project JSON file")
    .option("--timeout <ms>", "cancel analysis after this many milliseconds", parseTimeout)
    .option("--no-analyzers", "skip the built-in analyzers")
    .option("--sequential", "disable concurrent work")
    .option("--no-color", "disable ANSI colours")
    .action((project: string, opts: Record<string, unknown>) => {
      const check: CheckConfig = {
        command: "check",
        project,
        timeoutMs: typeof opts.timeout === "number" ? opts.timeout : undefined,
        analyzers: opts.analyzers !== false,
        sequential: readBoolean(opts.sequential),
        color: opts.color !== false,
      };
      parsed.config = check;
    });

  program.parse(["node", "kiln", ...argv]);
  if (!parsed.config) {
    throw new InvalidArgumentError("a command is required: build or check");
  }
  return parsed.config;
};

