export * from "./types.js";
export * from "./registry.js";

import {
  type Diagnostic,
  type DiagnosticHint,
  type DiagnosticInput,
  type DiagnosticPhase,
  type DiagnosticSeverity,
  type SourceSpan,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

const codePhasePrefixes: Record<string, DiagnosticPhase> = {
  OP: "options",
  BD: "binder",
  AN: "analyzer",
  LW: "lowering",
  MF: "finalize",
  SR: "serialize",
};

const inferPhase = (code: string): DiagnosticPhase | undefined => {
  const prefix = code.slice(0, 2).toUpperCase();
  return codePhasePrefixes[prefix];
};

export const createDiagnostic = ({
  severity,
  phase,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
  phase: phase ?? inferPhase(input.code),
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    span: options.span,
    severity: options.severity ?? definition.severity,
    phase: options.phase ?? definition.phase,
    hints: options.hints ?? definition.hints,
  });
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const location = `${diagnostic.span.file}:${diagnostic.span.start}-${diagnostic.span.end}`;
  const severity = diagnostic.severity.toUpperCase();
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  return `${location} ${severity} ${phase}${diagnostic.code}: ${diagnostic.message}`;
};

export class DiagnosticError extends Error {
  diagnostic: Diagnostic;
  diagnostics: readonly Diagnostic[];

  constructor(diagnostic: Diagnostic, diagnostics?: readonly Diagnostic[]) {
    super(formatDiagnostic(diagnostic));
    this.diagnostic = diagnostic;
    this.diagnostics =
      diagnostics && diagnostics.length > 0
        ? [...diagnostics]
        : [diagnostic];
  }
}

/** Append-only collector for a single pass. */
export class DiagnosticEmitter {
  #diagnostics: Diagnostic[] = [];

  report(input: DiagnosticInput): Diagnostic {
    const diagnostic = createDiagnostic(input);
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  reportFromCode<K extends DiagnosticCode>(
    options: RegistryDiagnosticOptions<K>
  ): Diagnostic {
    const diagnostic = diagnosticFromCode(options);
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  addAll(diagnostics: readonly Diagnostic[]): void {
    this.#diagnostics.push(...diagnostics);
  }

  error(input: DiagnosticInput): never {
    const diagnostic = this.report(input);
    throw new DiagnosticError(diagnostic, this.#diagnostics);
  }

  get hasErrors(): boolean {
    return hasErrors(this.#diagnostics);
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }
}

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some((diagnostic) => diagnostic.severity === "error");

export const normalizeSpan = (
  ...candidates: (SourceSpan | undefined)[]
): SourceSpan => {
  for (const span of candidates) {
    if (span) return span;
  }
  return { file: "<unknown>", start: 0, end: 0 };
};

/**
 * Stable sort by location. Files are ranked by `fileOrder` when given (unit
 * order of a source set), then lexically.
 */
export const sortDiagnostics = (
  diagnostics: readonly Diagnostic[],
  fileOrder: readonly string[] = []
): Diagnostic[] => {
  const rank = new Map(fileOrder.map((file, index) => [file, index] as const));
  const fileRank = (file: string): number => rank.get(file) ?? fileOrder.length;

  return diagnostics
    .map((diagnostic, index) => ({ diagnostic, index }))
    .sort((left, right) => {
      const a = left.diagnostic.span;
      const b = right.diagnostic.span;
      return (
        fileRank(a.file) - fileRank(b.file) ||
        (a.file === b.file ? 0 : a.file < b.file ? -1 : 1) ||
        a.start - b.start ||
        a.end - b.end ||
        left.index - right.index
      );
    })
    .map(({ diagnostic }) => diagnostic);
};
