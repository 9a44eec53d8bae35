import {
  DiagnosticEmitter,
  sortDiagnostics,
  type SourceSpan,
} from "../diagnostics/index.js";
import type { SourceSet } from "../source-set/source-set.js";
import type { MetadataReference } from "../source-set/references.js";
import {
  isReturnTypeName,
  isValueTypeName,
  type ReturnTypeName,
  type SourceUnit,
  type TypeDeclaration,
  type ValueTypeName,
} from "../syntax/types.js";
import { bindUnitBodies, type UnitBodiesResult } from "./bodies.js";
import type {
  BoundDeclarationState,
  BoundMethodBody,
  BoundUnit,
  ConstantSymbol,
  MethodSymbol,
  NamespaceSymbol,
  TypeSymbol,
} from "./types.js";
import { qualifyName, valueFitsType } from "./values.js";

export type MutableTypeSymbol = TypeSymbol & {
  methods: Map<string, MethodSymbol>;
  constants: Map<string, ConstantSymbol>;
};

export type DeclarationTable = {
  types: Map<string, MutableTypeSymbol>;
  namespaces: Map<string, Map<string, TypeSymbol>>;
  methods: MethodSymbol[];
};

const OPTIONS_SPAN: SourceSpan = { file: "<options>", start: 0, end: 0 };

/**
 * Binds every declaration of a source set. Pure: the result only depends on
 * the set's units, references and options. Callers normally go through
 * `SourceSet#declarations`, which memoizes this.
 */
export const bindDeclarations = (sourceSet: SourceSet): BoundDeclarationState => {
  const table: DeclarationTable = {
    types: new Map(),
    namespaces: new Map(),
    methods: [],
  };

  sourceSet.references.forEach((reference) => declareReference(reference, table));

  const declarationDiagnostics = sourceSet.units.map((unit) => {
    const emitter = new DiagnosticEmitter();
    declareUnit({ unit, table, emitter });
    return emitter.diagnostics;
  });

  const resolved = sourceSet.options.concurrentBuild
    ? resolvePartitioned(sourceSet.units, table)
    : resolveSequential(sourceSet.units, table);

  const fileOrder = sourceSet.units.map((unit) => unit.path);
  const bodies = new Map<string, BoundMethodBody>();
  const units: BoundUnit[] = sourceSet.units.map((unit, index) => {
    const result = resolved[index];
    result.bodies.forEach((body) => bodies.set(body.method.qualifiedName, body));
    return {
      path: unit.path,
      namespace: unit.namespace,
      types: unit.types
        .map((decl) => table.types.get(qualifyName(unit.namespace, decl.name)))
        .filter(
          (type): type is MutableTypeSymbol =>
            type !== undefined &&
            type.origin.kind === "source" &&
            type.origin.unitPath === unit.path
        ),
      imports: result.imports,
      diagnostics: sortDiagnostics(
        [...declarationDiagnostics[index], ...result.diagnostics],
        fileOrder
      ),
    };
  });

  const globals = new DiagnosticEmitter();
  const entryPoint = bindEntryPoint({ sourceSet, table, emitter: globals });

  return {
    fingerprint: sourceSet.fingerprint,
    namespaces: toNamespaceSymbols(table.namespaces),
    types: table.types,
    methods: table.methods,
    bodies,
    units,
    entryPoint,
    globalDiagnostics: globals.diagnostics,
    diagnostics: [
      ...units.flatMap((unit) => unit.diagnostics),
      ...globals.diagnostics,
    ],
  };
};

/** Each unit resolves against its own emitter; results merge by unit index. */
const resolvePartitioned = (
  units: readonly SourceUnit[],
  table: DeclarationTable
): UnitBodiesResult[] =>
  units.map((unit) => bindUnitBodies({ unit, table, emitter: new DiagnosticEmitter() }));

/** One emitter shared across units, walked strictly in unit order. */
const resolveSequential = (
  units: readonly SourceUnit[],
  table: DeclarationTable
): UnitBodiesResult[] => {
  const emitter = new DiagnosticEmitter();
  const results: UnitBodiesResult[] = [];
  units.forEach((unit) => {
    const before = emitter.diagnostics.length;
    const result = bindUnitBodies({ unit, table, emitter });
    results.push({ ...result, diagnostics: emitter.diagnostics.slice(before) });
  });
  return results;
};

const registerType = (table: DeclarationTable, type: MutableTypeSymbol): void => {
  table.types.set(type.qualifiedName, type);
  const bucket = table.namespaces.get(type.namespace) ?? new Map<string, TypeSymbol>();
  bucket.set(type.name, type);
  table.namespaces.set(type.namespace, bucket);
};

const declareReference = (reference: MetadataReference, table: DeclarationTable): void => {
  const origin = { kind: "reference", reference: reference.name } as const;
  reference.namespaces.forEach((namespace) => {
    namespace.types.forEach((decl) => {
      const qualifiedName = qualifyName(namespace.name, decl.name);
      if (table.types.has(qualifiedName)) return;

      const type: MutableTypeSymbol = {
        name: decl.name,
        namespace: namespace.name,
        qualifiedName,
        visibility: decl.visibility,
        origin,
        methods: new Map(),
        constants: new Map(),
      };

      decl.methods.forEach((method) => {
        const parameters = method.parameters.map((param) => ({
          name: param.name,
          type: resolveValueType(param.type),
        }));
        const returnType = isReturnTypeName(method.returnType) ? method.returnType : undefined;
        type.methods.set(method.name, {
          name: method.name,
          qualifiedName: `${qualifiedName}.${method.name}`,
          owner: qualifiedName,
          visibility: method.visibility,
          origin,
          parameters: parameters.map((param) => ({ name: param.name, type: param.type ?? "i32" })),
          returnType: returnType ?? "void",
          signatureValid:
            returnType !== undefined && parameters.every((param) => param.type !== undefined),
        });
      });

      decl.constants?.forEach((constant) => {
        const constantType = resolveValueType(constant.type);
        type.constants.set(constant.name, {
          name: constant.name,
          qualifiedName: `${qualifiedName}.${constant.name}`,
          owner: qualifiedName,
          visibility: constant.visibility,
          type: constantType ?? "i32",
          value: constant.value,
          valid: constantType !== undefined && valueFitsType(constant.value, constantType),
        });
      });

      registerType(table, type);
    });
  });
};

const declareUnit = ({
  unit,
  table,
  emitter,
}: {
  unit: SourceUnit;
  table: DeclarationTable;
  emitter: DiagnosticEmitter;
}): void => {
  unit.types.forEach((decl) => {
    const qualifiedName = qualifyName(unit.namespace, decl.name);
    const existing = table.types.get(qualifiedName);
    if (existing) {
      emitter.reportFromCode({
        code: "BD0001",
        params:
          existing.origin.kind === "reference"
            ? {
                kind: "conflicts-with-reference",
                name: qualifiedName,
                reference: existing.origin.reference,
              }
            : { kind: "duplicate-type", name: qualifiedName },
        span: decl.span,
      });
      return;
    }
    registerType(table, declareType({ unit, decl, qualifiedName, table, emitter }));
  });
};

const declareType = ({
  unit,
  decl,
  qualifiedName,
  table,
  emitter,
}: {
  unit: SourceUnit;
  decl: TypeDeclaration;
  qualifiedName: string;
  table: DeclarationTable;
  emitter: DiagnosticEmitter;
}): MutableTypeSymbol => {
  const origin = { kind: "source", unitPath: unit.path } as const;
  const type: MutableTypeSymbol = {
    name: decl.name,
    namespace: unit.namespace,
    qualifiedName,
    visibility: decl.visibility,
    origin,
    doc: decl.doc,
    span: decl.span,
    methods: new Map(),
    constants: new Map(),
  };
  const memberNames = new Set<string>();

  decl.members.forEach((member) => {
    if (memberNames.has(member.name)) {
      emitter.reportFromCode({
        code: "BD0002",
        params: { kind: "duplicate-member", typeName: qualifiedName, member: member.name },
        span: member.span,
      });
      return;
    }
    memberNames.add(member.name);
    const memberName = `${qualifiedName}.${member.name}`;

    if (member.kind === "constant") {
      const constantType = resolveValueType(member.type);
      if (!constantType) {
        emitter.reportFromCode({
          code: "BD0003",
          params: {
            kind: "unknown-signature-type",
            typeName: member.type,
            context: `constant ${memberName}`,
          },
          span: member.span,
        });
      } else if (!valueFitsType(member.value, constantType)) {
        emitter.reportFromCode({
          code: "BD0013",
          params: { kind: "constant-out-of-range", name: memberName, typeName: constantType },
          span: member.span,
        });
      }
      type.constants.set(member.name, {
        name: member.name,
        qualifiedName: memberName,
        owner: qualifiedName,
        visibility: member.visibility,
        type: constantType ?? "i32",
        value: member.value,
        valid: constantType !== undefined && valueFitsType(member.value, constantType),
        doc: member.doc,
        span: member.span,
      });
      return;
    }

    let signatureValid = true;
    const parameterNames = new Set<string>();
    const parameters = member.parameters.map((param) => {
      if (parameterNames.has(param.name)) {
        signatureValid = false;
        emitter.reportFromCode({
          code: "BD0004",
          params: { kind: "duplicate-parameter", methodName: memberName, parameter: param.name },
          span: param.span,
        });
      }
      parameterNames.add(param.name);
      const paramType = resolveValueType(param.type);
      if (!paramType) {
        signatureValid = false;
        emitter.reportFromCode({
          code: "BD0003",
          params: {
            kind: "unknown-signature-type",
            typeName: param.type,
            context: `parameter ${param.name} of ${memberName}`,
          },
          span: param.span,
        });
      }
      return { name: param.name, type: paramType ?? "i32" };
    });

    let returnType: ReturnTypeName = "void";
    if (isReturnTypeName(member.returnType)) {
      returnType = member.returnType;
    } else {
      signatureValid = false;
      emitter.reportFromCode({
        code: "BD0003",
        params: {
          kind: "unknown-signature-type",
          typeName: member.returnType,
          context: `return type of ${memberName}`,
        },
        span: member.span,
      });
    }

    const method: MethodSymbol = {
      name: member.name,
      qualifiedName: memberName,
      owner: qualifiedName,
      visibility: member.visibility,
      origin,
      parameters,
      returnType,
      signatureValid,
      doc: member.doc,
      span: member.span,
      declaration: member,
    };
    type.methods.set(member.name, method);
    table.methods.push(method);
  });

  return type;
};

const bindEntryPoint = ({
  sourceSet,
  table,
  emitter,
}: {
  sourceSet: SourceSet;
  table: DeclarationTable;
  emitter: DiagnosticEmitter;
}): MethodSymbol | undefined => {
  const { outputKind, entryPoint } = sourceSet.options;
  if (outputKind !== "executable") return undefined;
  if (!entryPoint) {
    emitter.reportFromCode({
      code: "BD0014",
      params: { kind: "missing-entry-point" },
      span: OPTIONS_SPAN,
    });
    return undefined;
  }

  const method = table.methods.find((candidate) => candidate.qualifiedName === entryPoint);
  const reason = !method
    ? "no source method with this name exists"
    : method.parameters.length > 0
      ? "an entry point cannot take parameters"
      : undefined;
  if (reason) {
    emitter.reportFromCode({
      code: "BD0014",
      params: { kind: "invalid-entry-point", name: entryPoint, reason },
      span: method?.span ?? OPTIONS_SPAN,
    });
    return undefined;
  }
  return method;
};

const resolveValueType = (name: string): ValueTypeName | undefined =>
  isValueTypeName(name) ? name : undefined;

const toNamespaceSymbols = (
  namespaces: ReadonlyMap<string, ReadonlyMap<string, TypeSymbol>>
): ReadonlyMap<string, NamespaceSymbol> =>
  new Map(
    Array.from(namespaces.entries()).map(([name, types]) => [name, { name, types }] as const)
  );

/** Binding of `sourceSet`, computed once per source set instance. */
export const bind = (sourceSet: SourceSet): BoundDeclarationState => sourceSet.declarations;
