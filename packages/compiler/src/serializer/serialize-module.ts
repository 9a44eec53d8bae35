import { DiagnosticEmitter, type Diagnostic } from "../diagnostics/index.js";
import { InvalidStateError } from "../errors.js";
import type { ModuleBuilder } from "../module/module-builder.js";
import type { EmitOptions } from "../source-set/options.js";
import {
  DEBUG_LINK_SECTION,
  DEBUG_SECTION,
  METADATA_SECTION,
  buildDebugPayload,
  buildMetadataTable,
  emitMetadataStubImage,
  encodePayload,
  moduleIdSection,
} from "./payloads.js";
import type { OutputStream } from "./streams.js";
import { appendCustomSections, type WasmCustomSection } from "./wasm-sections.js";

export type SerializationStreams = {
  image: OutputStream;
  metadata?: OutputStream;
  debug?: OutputStream;
  documentation?: OutputStream;
};

export type WrittenStreams = {
  image: boolean;
  metadata: boolean;
  debug: boolean;
  documentation: boolean;
};

export type SerializationResult = {
  success: boolean;
  diagnostics: readonly Diagnostic[];
  written: WrittenStreams;
};

export const debugFileName = (module: ModuleBuilder, options: EmitOptions): string =>
  options.debugInformationPath ?? `${module.identity.outputName}.kdbg`;

/**
 * Writes a finalized module. Every call is a complete write starting at each
 * stream's current position; serializing the same module again with the same
 * options produces the same bytes.
 */
export const serializeModule = ({
  module,
  streams,
  options = module.options,
}: {
  module: ModuleBuilder;
  streams: SerializationStreams;
  options?: EmitOptions;
}): SerializationResult => {
  if (module.phase !== "finalized" && module.phase !== "serialized") {
    throw new InvalidStateError("module must be finalized before serialization", module.phase);
  }

  const emitter = new DiagnosticEmitter();
  const { identity } = module;
  const debugPayload =
    options.debugInformation === "none" ? undefined : encodePayload(buildDebugPayload(module));
  const writeDebugSeparately =
    debugPayload !== undefined && options.debugInformation === "separate" && streams.debug !== undefined;

  const sections: WasmCustomSection[] = [
    moduleIdSection(identity),
    {
      name: METADATA_SECTION,
      data: encodePayload(
        buildMetadataTable({ identity, types: module.types, includePrivateMembers: true })
      ),
    },
    ...module.customSections,
  ];
  if (debugPayload && options.debugInformation === "embedded") {
    sections.push({ name: DEBUG_SECTION, data: debugPayload });
  }
  if (writeDebugSeparately) {
    sections.push({
      name: DEBUG_LINK_SECTION,
      data: new TextEncoder().encode(debugFileName(module, options)),
    });
  }

  const written: WrittenStreams = {
    image: writeStream({
      name: "image",
      stream: streams.image,
      bytes: appendCustomSections(module.emitBinary(), sections),
      emitter,
    }),
    metadata: false,
    debug: false,
    documentation: false,
  };

  if (streams.metadata) {
    const metadata = buildMetadataTable({
      identity,
      types: module.types,
      includePrivateMembers: options.includePrivateMembers,
    });
    written.metadata = writeStream({
      name: "metadata",
      stream: streams.metadata,
      bytes: appendCustomSections(emitMetadataStubImage(module), [
        moduleIdSection(identity),
        { name: METADATA_SECTION, data: encodePayload(metadata) },
      ]),
      emitter,
    });
  }

  if (writeDebugSeparately && streams.debug && debugPayload) {
    written.debug = writeStream({
      name: "debug",
      stream: streams.debug,
      bytes: debugPayload,
      emitter,
    });
  }

  if (streams.documentation && module.documentation !== undefined) {
    written.documentation = writeStream({
      name: "documentation",
      stream: streams.documentation,
      bytes: new TextEncoder().encode(module.documentation),
      emitter,
    });
  }

  if (written.image) module.markSerialized();
  return { success: !emitter.hasErrors, diagnostics: emitter.diagnostics, written };
};

const writeStream = ({
  name,
  stream,
  bytes,
  emitter,
}: {
  name: string;
  stream: OutputStream;
  bytes: Uint8Array;
  emitter: DiagnosticEmitter;
}): boolean => {
  try {
    stream.write(bytes);
    return true;
  } catch (error) {
    emitter.reportFromCode({
      code: "SR0001",
      params: {
        kind: "stream-write-failed",
        stream: name,
        message: error instanceof Error ? error.message : String(error),
      },
      span: { file: `<stream:${name}>`, start: 0, end: 0 },
    });
    return false;
  }
};
