import type { DebugInformationMode } from "@kiln/compiler";

export type BuildConfig = {
  command: "build";
  /** Path of the project JSON file. */
  project: string;
  outDir: string;
  debug: DebugInformationMode;
  metadataOnly: boolean;
  /** Also write the public metadata image as `<name>.ref.wasm`. */
  reference: boolean;
  includePrivate: boolean;
  coverage: boolean;
  docs: boolean;
  sequential: boolean;
  emitAnyway: boolean;
  outputName?: string;
  color: boolean;
};

export type CheckConfig = {
  command: "check";
  project: string;
  timeoutMs?: number;
  analyzers: boolean;
  sequential: boolean;
  color: boolean;
};

export type KilnConfig = BuildConfig | CheckConfig;
