import type { Diagnostic, DiagnosticSeverity } from "../diagnostics/index.js";
import type { BoundDeclarationState, BoundUnit } from "../binding/types.js";
import type { SourceUnit } from "../syntax/types.js";

export type SeverityOverride = DiagnosticSeverity | "none";

/** Analyzer configuration, the equivalent of command-line analyzer settings. */
export interface AnalyzerConfig {
  readonly options: Readonly<Record<string, string>>;
  readonly severityOverrides: Readonly<Record<string, SeverityOverride>>;
}

export interface AnalyzerContext {
  readonly declarations: BoundDeclarationState;
  readonly config: AnalyzerConfig;
  readonly signal: AbortSignal;
}

export interface UnitAnalyzerContext extends AnalyzerContext {
  readonly unit: BoundUnit;
  readonly source: SourceUnit;
}

export type AnalyzerResult = readonly Diagnostic[] | Promise<readonly Diagnostic[]>;

/**
 * External diagnostic producer. Implementations must treat the context as
 * read-only and be safe to run alongside other analyzers.
 */
export interface Analyzer {
  readonly id: string;
  /** When set, `analyzeUnit` may run for several units at once. */
  readonly concurrentUnits?: boolean;
  analyzeDeclarations?(context: AnalyzerContext): AnalyzerResult;
  analyzeUnit?(context: UnitAnalyzerContext): AnalyzerResult;
}

export type AnalyzerRunOutcome =
  | { status: "completed"; diagnostics: readonly Diagnostic[] }
  | { status: "cancelled" };

export const createAnalyzerConfig = (
  input: Partial<AnalyzerConfig> = {}
): AnalyzerConfig =>
  Object.freeze({
    options: Object.freeze({ ...(input.options ?? {}) }),
    severityOverrides: Object.freeze({ ...(input.severityOverrides ?? {}) }),
  });
