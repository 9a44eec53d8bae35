import {
  DiagnosticEmitter,
  type Diagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import {
  isValueTypeName,
  type CallExpression,
  type Expression,
  type LetStatement,
  type NameExpression,
  type SourceUnit,
  type Statement,
  type ValueTypeName,
  type Visibility,
} from "../syntax/types.js";
import type { DeclarationTable, MutableTypeSymbol } from "./binder.js";
import type {
  BoundImport,
  BoundLocal,
  BoundMethodBody,
  MethodSymbol,
  NameResolution,
  TypeSymbol,
} from "./types.js";
import { qualifyName, splitQualifiedName } from "./values.js";

export type UnitBodiesResult = {
  imports: BoundImport[];
  bodies: BoundMethodBody[];
  diagnostics: readonly Diagnostic[];
};

type ScopeEntry =
  | { kind: "parameter"; index: number; type: ValueTypeName }
  | { kind: "local"; local: BoundLocal };

class Scope {
  readonly entries = new Map<string, ScopeEntry>();

  constructor(readonly parent?: Scope) {}

  lookup(name: string): ScopeEntry | undefined {
    return this.entries.get(name) ?? this.parent?.lookup(name);
  }
}

type TypeLookup = (name: string, span: SourceSpan, emitter: DiagnosticEmitter) =>
  | TypeSymbol
  | undefined;

type BodyContext = {
  method: MethodSymbol;
  owner: TypeSymbol;
  lookupType: TypeLookup;
  names: Map<NameExpression, NameResolution>;
  calls: Map<CallExpression, MethodSymbol>;
  lets: Map<LetStatement, BoundLocal>;
  locals: BoundLocal[];
  emitter: DiagnosticEmitter;
};

/** Resolves imports and every method body of one unit. */
export const bindUnitBodies = ({
  unit,
  table,
  emitter,
}: {
  unit: SourceUnit;
  table: DeclarationTable;
  emitter: DiagnosticEmitter;
}): UnitBodiesResult => {
  const before = emitter.diagnostics.length;
  const imports = bindImports({ unit, table, emitter });
  const lookupType = createTypeLookup({ unit, table, imports });
  const bodies: BoundMethodBody[] = [];

  unit.types.forEach((decl) => {
    const owner = table.types.get(qualifyName(unit.namespace, decl.name));
    if (!owner || owner.origin.kind !== "source" || owner.origin.unitPath !== unit.path) {
      return;
    }

    decl.members.forEach((member) => {
      if (member.kind !== "method") return;
      const method = owner.methods.get(member.name);
      // Members dropped as duplicates at declaration time have no symbol.
      if (!method || method.declaration !== member) return;
      const body = bindMethodBody({ method, owner, lookupType });
      emitter.addAll(body.diagnostics);
      bodies.push(body);
    });
  });

  return { imports, bodies, diagnostics: emitter.diagnostics.slice(before) };
};

const bindImports = ({
  unit,
  table,
  emitter,
}: {
  unit: SourceUnit;
  table: DeclarationTable;
  emitter: DiagnosticEmitter;
}): BoundImport[] => {
  const seen = new Set<string>();
  const imports: BoundImport[] = [];

  unit.imports.forEach((directive) => {
    if (seen.has(directive.namespace)) {
      emitter.reportFromCode({
        code: "BD0006",
        params: { kind: "duplicate-import", namespace: directive.namespace },
        span: directive.span,
      });
      return;
    }
    seen.add(directive.namespace);

    const resolved = table.namespaces.has(directive.namespace);
    if (!resolved) {
      emitter.reportFromCode({
        code: "BD0005",
        params: { kind: "unresolved-import", namespace: directive.namespace },
        span: directive.span,
      });
    }
    imports.push({
      unitPath: unit.path,
      namespace: directive.namespace,
      span: directive.span,
      resolved,
      used: false,
    });
  });

  return imports;
};

/**
 * Lookup order: the unit's namespace, the name as written (fully qualified or
 * global), then every resolved import. A hit through an import marks it used.
 */
const createTypeLookup = ({
  unit,
  table,
  imports,
}: {
  unit: SourceUnit;
  table: DeclarationTable;
  imports: readonly BoundImport[];
}): TypeLookup => (name, span, emitter) => {
  const found =
    (unit.namespace.length > 0 ? table.types.get(`${unit.namespace}.${name}`) : undefined) ??
    table.types.get(name);

  const type = found ?? lookupThroughImports({ name, span, table, imports, emitter });
  if (!type) return undefined;

  if (!canAccessType(type, unit.path)) {
    emitter.reportFromCode({
      code: "BD0008",
      params: { kind: "inaccessible-member", name: type.qualifiedName, visibility: type.visibility },
      span,
    });
    return undefined;
  }
  return type;
};

const lookupThroughImports = ({
  name,
  span,
  table,
  imports,
  emitter,
}: {
  name: string;
  span: SourceSpan;
  table: DeclarationTable;
  imports: readonly BoundImport[];
  emitter: DiagnosticEmitter;
}): TypeSymbol | undefined => {
  const candidates = imports
    .filter((entry) => entry.resolved)
    .map((entry) => ({ entry, type: table.types.get(`${entry.namespace}.${name}`) }))
    .filter(
      (candidate): candidate is { entry: BoundImport; type: MutableTypeSymbol } =>
        candidate.type !== undefined
    );

  if (candidates.length === 0) {
    emitter.reportFromCode({
      code: "BD0010",
      params: { kind: "unknown-type", name },
      span,
    });
    return undefined;
  }

  if (candidates.length > 1) {
    emitter.reportFromCode({
      code: "BD0009",
      params: {
        kind: "ambiguous-type",
        name,
        candidates: candidates.map((candidate) => candidate.type.qualifiedName),
      },
      span,
    });
    return undefined;
  }

  const match = candidates[0];
  match.entry.used = true;
  return match.type;
};

const canAccessType = (type: TypeSymbol, unitPath: string): boolean => {
  switch (type.visibility) {
    case "public":
      return true;
    case "internal":
      return type.origin.kind === "source";
    case "private":
      return type.origin.kind === "source" && type.origin.unitPath === unitPath;
  }
};

const canAccessMember = (
  visibility: Visibility,
  target: TypeSymbol,
  from: TypeSymbol
): boolean => {
  switch (visibility) {
    case "public":
      return true;
    case "internal":
      return target.origin.kind === "source";
    case "private":
      return target.qualifiedName === from.qualifiedName;
  }
};

const bindMethodBody = ({
  method,
  owner,
  lookupType,
}: {
  method: MethodSymbol;
  owner: TypeSymbol;
  lookupType: TypeLookup;
}): BoundMethodBody => {
  const ctx: BodyContext = {
    method,
    owner,
    lookupType,
    names: new Map(),
    calls: new Map(),
    lets: new Map(),
    locals: [],
    emitter: new DiagnosticEmitter(),
  };

  // A broken signature is already reported; its body is not bound.
  if (method.signatureValid && method.declaration) {
    const scope = new Scope();
    method.parameters.forEach((param, index) => {
      scope.entries.set(param.name, { kind: "parameter", index, type: param.type });
    });
    bindStatements(method.declaration.body, scope, ctx);
  }

  return {
    method,
    names: ctx.names,
    calls: ctx.calls,
    lets: ctx.lets,
    locals: ctx.locals,
    diagnostics: ctx.emitter.diagnostics,
  };
};

const bindStatements = (
  statements: readonly Statement[],
  scope: Scope,
  ctx: BodyContext
): void => statements.forEach((statement) => bindStatement(statement, scope, ctx));

const bindStatement = (statement: Statement, scope: Scope, ctx: BodyContext): void => {
  switch (statement.kind) {
    case "let": {
      bindExpression(statement.value, scope, ctx);
      if (statement.type !== undefined && !isValueTypeName(statement.type)) {
        ctx.emitter.reportFromCode({
          code: "BD0012",
          params: { kind: "unknown-local-type", name: statement.name, typeName: statement.type },
          span: statement.span,
        });
      }
      if (scope.entries.has(statement.name)) {
        ctx.emitter.reportFromCode({
          code: "BD0011",
          params: { kind: "duplicate-local", name: statement.name },
          span: statement.span,
        });
        return;
      }
      const local: BoundLocal = {
        name: statement.name,
        slot: ctx.method.parameters.length + ctx.locals.length,
        type:
          statement.type !== undefined && isValueTypeName(statement.type)
            ? statement.type
            : undefined,
      };
      ctx.locals.push(local);
      ctx.lets.set(statement, local);
      scope.entries.set(statement.name, { kind: "local", local });
      return;
    }
    case "return":
      if (statement.value) bindExpression(statement.value, scope, ctx);
      return;
    case "expression":
      bindExpression(statement.expression, scope, ctx);
      return;
    case "if":
      bindExpression(statement.condition, scope, ctx);
      bindStatements(statement.then, new Scope(scope), ctx);
      if (statement.else) bindStatements(statement.else, new Scope(scope), ctx);
      return;
  }
};

const bindExpression = (expression: Expression, scope: Scope, ctx: BodyContext): void => {
  switch (expression.kind) {
    case "literal":
      return;
    case "name":
      resolveName(expression, scope, ctx);
      return;
    case "binary":
      bindExpression(expression.left, scope, ctx);
      bindExpression(expression.right, scope, ctx);
      return;
    case "call":
      resolveCall(expression, ctx);
      expression.arguments.forEach((argument) => bindExpression(argument, scope, ctx));
      return;
  }
};

const resolveName = (expression: NameExpression, scope: Scope, ctx: BodyContext): void => {
  const { qualifier, member } = splitQualifiedName(expression.name);

  if (!qualifier) {
    const entry = scope.lookup(member);
    if (entry?.kind === "parameter") {
      ctx.names.set(expression, { kind: "parameter", index: entry.index, type: entry.type });
      return;
    }
    if (entry?.kind === "local") {
      ctx.names.set(expression, { kind: "local", slot: entry.local.slot, type: entry.local.type });
      return;
    }
    const constant = ctx.owner.constants.get(member);
    if (constant) {
      ctx.names.set(expression, { kind: "constant", symbol: constant });
      return;
    }
    ctx.emitter.reportFromCode({
      code: "BD0007",
      params: { kind: "undeclared-identifier", name: expression.name },
      span: expression.span,
    });
    return;
  }

  const type = ctx.lookupType(qualifier, expression.span, ctx.emitter);
  if (!type) return;
  const constant = type.constants.get(member);
  if (!constant) {
    ctx.emitter.reportFromCode({
      code: "BD0007",
      params: { kind: "undeclared-identifier", name: expression.name },
      span: expression.span,
    });
    return;
  }
  if (!canAccessMember(constant.visibility, type, ctx.owner)) {
    ctx.emitter.reportFromCode({
      code: "BD0008",
      params: {
        kind: "inaccessible-member",
        name: constant.qualifiedName,
        visibility: constant.visibility,
      },
      span: expression.span,
    });
    return;
  }
  ctx.names.set(expression, { kind: "constant", symbol: constant });
};

const resolveCall = (expression: CallExpression, ctx: BodyContext): void => {
  const { qualifier, member } = splitQualifiedName(expression.callee);
  const type = qualifier
    ? ctx.lookupType(qualifier, expression.span, ctx.emitter)
    : ctx.owner;
  if (!type) return;

  const method = type.methods.get(member);
  if (!method) {
    ctx.emitter.reportFromCode({
      code: "BD0010",
      params: {
        kind: "unknown-method",
        name: member,
        receiver: qualifier ? type.qualifiedName : undefined,
      },
      span: expression.span,
    });
    return;
  }
  if (!canAccessMember(method.visibility, type, ctx.owner)) {
    ctx.emitter.reportFromCode({
      code: "BD0008",
      params: {
        kind: "inaccessible-member",
        name: method.qualifiedName,
        visibility: method.visibility,
      },
      span: expression.span,
    });
    return;
  }
  if (!method.signatureValid && method.origin.kind === "reference") {
    ctx.emitter.reportFromCode({
      code: "BD0003",
      params: {
        kind: "unknown-signature-type",
        typeName: "<unresolved>",
        context: `signature of referenced method ${method.qualifiedName}`,
      },
      span: expression.span,
    });
    return;
  }
  ctx.calls.set(expression, method);
};
