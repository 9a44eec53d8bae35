import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const importHint: DiagnosticHint = {
  message: "Add an import for the namespace that declares the type, or use its fully qualified name.",
};

type DiagnosticParamsMap = {
  AN0001: { kind: "analyzer-exception"; analyzerId: string; message: string };
  BD0001:
    | { kind: "duplicate-type"; name: string }
    | { kind: "conflicts-with-reference"; name: string; reference: string };
  BD0002: { kind: "duplicate-member"; typeName: string; member: string };
  BD0003: { kind: "unknown-signature-type"; typeName: string; context: string };
  BD0004: { kind: "duplicate-parameter"; methodName: string; parameter: string };
  BD0005: { kind: "unresolved-import"; namespace: string };
  BD0006: { kind: "duplicate-import"; namespace: string };
  BD0007: { kind: "undeclared-identifier"; name: string };
  BD0008: {
    kind: "inaccessible-member";
    name: string;
    visibility: string;
  };
  BD0009: { kind: "ambiguous-type"; name: string; candidates: readonly string[] };
  BD0010:
    | { kind: "unknown-method"; name: string; receiver?: string }
    | { kind: "unknown-type"; name: string };
  BD0011: { kind: "duplicate-local"; name: string };
  BD0012: { kind: "unknown-local-type"; name: string; typeName: string };
  BD0013: { kind: "constant-out-of-range"; name: string; typeName: string };
  BD0014:
    | { kind: "missing-entry-point" }
    | { kind: "invalid-entry-point"; name: string; reason: string };
  LW0001:
    | {
        kind: "return-type-mismatch";
        methodName: string;
        expected: string;
        actual: string;
      }
    | { kind: "missing-return-value"; methodName: string; expected: string }
    | { kind: "unexpected-return-value"; methodName: string };
  LW0002: {
    kind: "argument-count";
    callee: string;
    expected: number;
    actual: number;
  };
  LW0003: {
    kind: "argument-type";
    callee: string;
    parameter: string;
    expected: string;
    actual: string;
  };
  LW0004: { kind: "missing-return"; methodName: string };
  LW0005: {
    kind: "operator-type";
    operator: string;
    left: string;
    right: string;
  };
  LW0006: { kind: "condition-type"; actual: string };
  LW0007: { kind: "literal-out-of-range"; value: string; typeName: string };
  LW0008: { kind: "unreachable-code" };
  LW0009: {
    kind: "let-type-mismatch";
    name: string;
    expected: string;
    actual: string;
  };
  LW0010: { kind: "void-value"; callee: string };
  MF0001: { kind: "unused-import"; namespace: string };
  MF0002: { kind: "missing-documentation"; memberKind: "type" | "method"; name: string };
  MF0003: { kind: "duplicate-resource"; name: string };
  OP0001: { kind: "invalid-output-name"; name: string };
  OP0002: { kind: "embedded-debug-metadata-only" };
  SR0001: { kind: "stream-write-failed"; stream: string; message: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  AN0001: {
    code: "AN0001",
    message: (params) =>
      `analyzer '${params.analyzerId}' threw an exception: ${params.message}`,
    severity: "warning",
    phase: "analyzer",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AN0001"]>,
  BD0001: {
    code: "BD0001",
    message: (params) => {
      switch (params.kind) {
        case "duplicate-type":
          return `type ${params.name} is already declared`;
        case "conflicts-with-reference":
          return `type ${params.name} conflicts with a type of the same name in reference ${params.reference}`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0001"]>,
  BD0002: {
    code: "BD0002",
    message: (params) =>
      `type ${params.typeName} already defines a member named ${params.member}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0002"]>,
  BD0003: {
    code: "BD0003",
    message: (params) =>
      `unknown type '${params.typeName}' in ${params.context}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0003"]>,
  BD0004: {
    code: "BD0004",
    message: (params) =>
      `method ${params.methodName} declares parameter ${params.parameter} more than once`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0004"]>,
  BD0005: {
    code: "BD0005",
    message: (params) => `namespace ${params.namespace} could not be found`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0005"]>,
  BD0006: {
    code: "BD0006",
    message: (params) => `namespace ${params.namespace} is imported more than once`,
    severity: "warning",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0006"]>,
  BD0007: {
    code: "BD0007",
    message: (params) => `the name '${params.name}' does not exist in the current context`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0007"]>,
  BD0008: {
    code: "BD0008",
    message: (params) =>
      `'${params.name}' is inaccessible here (visibility: ${params.visibility})`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0008"]>,
  BD0009: {
    code: "BD0009",
    message: (params) =>
      `'${params.name}' is ambiguous between ${params.candidates.join(", ")}`,
    severity: "error",
    hints: [importHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0009"]>,
  BD0010: {
    code: "BD0010",
    message: (params) => {
      switch (params.kind) {
        case "unknown-method":
          return params.receiver
            ? `type ${params.receiver} does not define a method named ${params.name}`
            : `method '${params.name}' is not defined`;
        case "unknown-type":
          return `type '${params.name}' could not be found`;
      }
      return exhaustive(params);
    },
    severity: "error",
    hints: [importHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0010"]>,
  BD0011: {
    code: "BD0011",
    message: (params) => `a local named '${params.name}' is already defined in this scope`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0011"]>,
  BD0012: {
    code: "BD0012",
    message: (params) =>
      `local '${params.name}' is annotated with unknown type '${params.typeName}'`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0012"]>,
  BD0013: {
    code: "BD0013",
    message: (params) =>
      `constant ${params.name} has a value that does not fit type ${params.typeName}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0013"]>,
  BD0014: {
    code: "BD0014",
    message: (params) => {
      switch (params.kind) {
        case "missing-entry-point":
          return "executable output requires an entry point";
        case "invalid-entry-point":
          return `entry point ${params.name} is invalid: ${params.reason}`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0014"]>,
  LW0001: {
    code: "LW0001",
    message: (params) => {
      switch (params.kind) {
        case "return-type-mismatch":
          return `${params.methodName} returns ${params.expected} but the expression has type ${params.actual}`;
        case "missing-return-value":
          return `${params.methodName} must return a value of type ${params.expected}`;
        case "unexpected-return-value":
          return `${params.methodName} returns void and cannot return a value`;
      }
      return exhaustive(params);
    },
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0001"]>,
  LW0002: {
    code: "LW0002",
    message: (params) =>
      `${params.callee} expects ${params.expected} argument(s) but got ${params.actual}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0002"]>,
  LW0003: {
    code: "LW0003",
    message: (params) =>
      `argument ${params.parameter} of ${params.callee} expects ${params.expected}, got ${params.actual}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0003"]>,
  LW0004: {
    code: "LW0004",
    message: (params) => `not all code paths in ${params.methodName} return a value`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0004"]>,
  LW0005: {
    code: "LW0005",
    message: (params) =>
      `operator '${params.operator}' cannot be applied to ${params.left} and ${params.right}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0005"]>,
  LW0006: {
    code: "LW0006",
    message: (params) => `condition must be bool, got ${params.actual}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0006"]>,
  LW0007: {
    code: "LW0007",
    message: (params) => `literal ${params.value} does not fit type ${params.typeName}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0007"]>,
  LW0008: {
    code: "LW0008",
    message: () => "unreachable code detected",
    severity: "warning",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0008"]>,
  LW0009: {
    code: "LW0009",
    message: (params) =>
      `local '${params.name}' is declared as ${params.expected} but initialized with ${params.actual}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0009"]>,
  LW0010: {
    code: "LW0010",
    message: (params) => `${params.callee} returns void and cannot be used as a value`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LW0010"]>,
  MF0001: {
    code: "MF0001",
    message: (params) => `unnecessary import of namespace ${params.namespace}`,
    severity: "note",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MF0001"]>,
  MF0002: {
    code: "MF0002",
    message: (params) =>
      `missing documentation comment for publicly visible ${params.memberKind} ${params.name}`,
    severity: "warning",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MF0002"]>,
  MF0003: {
    code: "MF0003",
    message: (params) => `resource ${params.name} is attached more than once`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MF0003"]>,
  OP0001: {
    code: "OP0001",
    message: (params) => `'${params.name}' is not a valid output name`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["OP0001"]>,
  OP0002: {
    code: "OP0002",
    message: () =>
      "embedded debug information cannot be produced when emitting metadata only",
    severity: "error",
    hints: [{ message: "Use debug mode 'separate' or 'none' for metadata-only output." }],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["OP0002"]>,
  SR0001: {
    code: "SR0001",
    message: (params) => `failed to write ${params.stream} stream: ${params.message}`,
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SR0001"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

export const isDiagnosticCode = (value: string): value is DiagnosticCode =>
  Object.prototype.hasOwnProperty.call(diagnosticsRegistry, value);

const exhaustive = (_value: never): never => _value;
