import { mkdir, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import type {
  Diagnostic,
  MemoryOutputStream,
  WrittenStreams,
} from "@kiln/compiler";

export type OutputKind = keyof WrittenStreams;

export type BuildStreams = {
  image: MemoryOutputStream;
  metadata?: MemoryOutputStream;
  debug?: MemoryOutputStream;
  documentation?: MemoryOutputStream;
};

export type WrittenFile = {
  kind: OutputKind;
  path: string;
  bytes: number;
};

const OUTPUT_KINDS: readonly OutputKind[] = ["image", "metadata", "debug", "documentation"];

export const outputFileName = (name: string, kind: OutputKind): string => {
  switch (kind) {
    case "image":
      return `${name}.wasm`;
    case "metadata":
      return `${name}.ref.wasm`;
    case "debug":
      return `${name}.kdbg`;
    case "documentation":
      return `${name}.docs.json`;
  }
};

/** Writes every stream the serializer reported as written. */
export const writeOutputs = async ({
  outDir,
  name,
  streams,
  written,
}: {
  outDir: string;
  name: string;
  streams: BuildStreams;
  written: WrittenStreams;
}): Promise<WrittenFile[]> => {
  const pending = OUTPUT_KINDS.flatMap((kind) => {
    const stream = streams[kind];
    return stream && written[kind] ? [{ kind, bytes: stream.toUint8Array() }] : [];
  });
  if (pending.length === 0) return [];

  await mkdir(outDir, { recursive: true });
  return Promise.all(
    pending.map(async ({ kind, bytes }) => {
      const path = resolve(outDir, outputFileName(name, kind));
      await writeFile(path, bytes);
      return { kind, path, bytes: bytes.length };
    }),
  );
};

const plural = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? "" : "s"}`;

export const summarizeDiagnostics = (diagnostics: readonly Diagnostic[]): string => {
  const count = (severity: Diagnostic["severity"]) =>
    diagnostics.filter((diagnostic) => diagnostic.severity === severity).length;
  return [
    plural(count("error"), "error"),
    plural(count("warning"), "warning"),
    plural(count("note"), "note"),
  ].join(", ");
};
