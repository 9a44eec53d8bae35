import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import type { Diagnostic, DiagnosticSeverity, SourceSpan } from "@kiln/compiler";

/**
 * Where a diagnostic points. Spans whose file is written `<kind>` or
 * `<kind:name>` (`<options>`, `<analyzer:id>`, `<resource:name>`,
 * `<stream:name>`) name a compiler input rather than a unit file.
 */
type DiagnosticOrigin =
  | { kind: "synthetic"; label: string }
  | { kind: "offsets"; path: string; start: number; end: number }
  | { kind: "source"; path: string; line: number; column: number; width: number; text: string };

const SYNTHETIC_FILE = /^<([a-z]+)(?::(.+))?>$/;

const SEVERITY_COLOR: Record<DiagnosticSeverity, number> = {
  error: 31,
  warning: 33,
  note: 36,
};

const resolveOrigin = (span: SourceSpan, root: string | undefined): DiagnosticOrigin => {
  if (SYNTHETIC_FILE.test(span.file)) return { kind: "synthetic", label: span.file };

  const path = isAbsolute(span.file) ? span.file : resolve(root ?? ".", span.file);
  let source: string;
  try {
    source = readFileSync(path, "utf8");
  } catch {
    return { kind: "offsets", path, start: span.start, end: span.end };
  }

  const start = Math.min(Math.max(span.start, 0), source.length);
  const before = source.slice(0, start);
  const lineStart = before.lastIndexOf("\n") + 1;
  const line = before.split("\n").length;
  const text = source.split("\n")[line - 1] ?? "";
  const column = start - lineStart;
  const end = Math.min(Math.max(span.end, start), lineStart + text.length);
  return { kind: "source", path, line, column, width: Math.max(1, end - start), text };
};

const formatLocation = (origin: DiagnosticOrigin): string => {
  switch (origin.kind) {
    case "synthetic":
      return origin.label;
    case "offsets":
      return `${origin.path}:${origin.start}-${origin.end}`;
    case "source":
      return `${origin.path}:${origin.line}:${origin.column + 1}`;
  }
};

/**
 * Renders a diagnostic for the terminal. Relative span files resolve against
 * `root` (the project directory) when given. Synthetic origins and unreadable
 * files print without a snippet.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean; root?: string } = {}
): string => {
  const colored = options.color ?? true;
  const paint = (code: number, text: string) =>
    colored ? `\u001B[${code}m${text}\u001B[0m` : text;
  const severityColor = SEVERITY_COLOR[diagnostic.severity];

  const origin = resolveOrigin(diagnostic.span, options.root);
  const severity = paint(1, paint(severityColor, diagnostic.severity.toUpperCase()));
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const lines = [
    `${formatLocation(origin)} ${severity}${phase} ${paint(35, diagnostic.code)}: ${diagnostic.message}`,
  ];

  if (origin.kind === "source" && origin.text.length > 0) {
    const gutter = String(origin.line);
    const padding = " ".repeat(gutter.length);
    const marker = " ".repeat(origin.column) + paint(severityColor, "^".repeat(origin.width));
    lines.push(
      `${padding} |`,
      `${gutter} | ${origin.text}`,
      `${padding} | ${marker} ${paint(2, diagnostic.message)}`
    );
  }

  (diagnostic.hints ?? []).forEach((hint) => lines.push(`${paint(2, "hint:")} ${hint.message}`));
  return lines.join("\n");
};
