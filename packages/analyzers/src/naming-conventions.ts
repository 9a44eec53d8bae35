import {
  createDiagnostic,
  type Analyzer,
  type AnalyzerContext,
  type Diagnostic,
  type SourceSpan,
} from "@kiln/compiler";

export const NAMING_CONVENTIONS_ID = "naming-conventions";

/** Comma separated qualified names that are never reported. */
export const NAMING_EXCLUDE_OPTION = `${NAMING_CONVENTIONS_ID}.exclude`;

const PASCAL_CASE = /^[A-Z][A-Za-z0-9]*$/;
const CAMEL_CASE = /^[a-z][A-Za-z0-9]*$/;
const UPPER_SNAKE_CASE = /^[A-Z][A-Z0-9]*(_[A-Z0-9]+)*$/;

type NamingRule = {
  code: string;
  convention: string;
  pattern: RegExp;
};

const TYPE_RULE: NamingRule = { code: "KN0001", convention: "PascalCase", pattern: PASCAL_CASE };
const METHOD_RULE: NamingRule = { code: "KN0002", convention: "camelCase", pattern: CAMEL_CASE };
const CONSTANT_RULE: NamingRule = {
  code: "KN0003",
  convention: "UPPER_SNAKE_CASE",
  pattern: UPPER_SNAKE_CASE,
};

const parseExcludes = (raw: string | undefined): Set<string> =>
  new Set(
    (raw ?? "")
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

/** Reports source types, methods and constants that break the naming conventions. */
export const createNamingConventionsAnalyzer = (): Analyzer => ({
  id: NAMING_CONVENTIONS_ID,
  analyzeDeclarations: ({ declarations, config }: AnalyzerContext) => {
    const excluded = parseExcludes(config.options[NAMING_EXCLUDE_OPTION]);
    const diagnostics: Diagnostic[] = [];

    const check = ({
      rule,
      kind,
      name,
      qualifiedName,
      span,
    }: {
      rule: NamingRule;
      kind: string;
      name: string;
      qualifiedName: string;
      span: SourceSpan;
    }) => {
      if (rule.pattern.test(name) || excluded.has(qualifiedName)) return;
      diagnostics.push(
        createDiagnostic({
          code: rule.code,
          message: `${kind} name '${name}' should be ${rule.convention}`,
          severity: "warning",
          phase: "analyzer",
          span,
        })
      );
    };

    declarations.units.forEach((unit) => {
      const fallback: SourceSpan = { file: unit.path, start: 0, end: 0 };
      unit.types.forEach((type) => {
        check({
          rule: TYPE_RULE,
          kind: "type",
          name: type.name,
          qualifiedName: type.qualifiedName,
          span: type.span ?? fallback,
        });
        type.constants.forEach((constant) => {
          check({
            rule: CONSTANT_RULE,
            kind: "constant",
            name: constant.name,
            qualifiedName: constant.qualifiedName,
            span: constant.span ?? fallback,
          });
        });
        type.methods.forEach((method) => {
          check({
            rule: METHOD_RULE,
            kind: "method",
            name: method.name,
            qualifiedName: method.qualifiedName,
            span: method.span ?? fallback,
          });
        });
      });
    });

    return diagnostics;
  },
});
