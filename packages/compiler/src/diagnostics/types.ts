export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "options"
  | "binder"
  | "analyzer"
  | "lowering"
  | "finalize"
  | "serialize";

/** Offsets into a unit; synthetic files such as `<options>` use 0-0. */
export interface SourceSpan {
  file: string;
  start: number;
  end: number;
}

export interface DiagnosticHint {
  message: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = {
  code: string;
  message: string;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};
