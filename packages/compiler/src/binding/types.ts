import type { Diagnostic, SourceSpan } from "../diagnostics/index.js";
import type {
  CallExpression,
  LetStatement,
  MethodDeclaration,
  NameExpression,
  ReturnTypeName,
  ValueTypeName,
  Visibility,
} from "../syntax/types.js";

export type SymbolOrigin =
  | { kind: "source"; unitPath: string }
  | { kind: "reference"; reference: string };

export interface TypeSymbol {
  name: string;
  namespace: string;
  qualifiedName: string;
  visibility: Visibility;
  origin: SymbolOrigin;
  doc?: string;
  span?: SourceSpan;
  methods: ReadonlyMap<string, MethodSymbol>;
  constants: ReadonlyMap<string, ConstantSymbol>;
}

export interface MethodSymbol {
  name: string;
  /** `Namespace.Type.method`; also the function name in the built module. */
  qualifiedName: string;
  owner: string;
  visibility: Visibility;
  origin: SymbolOrigin;
  parameters: readonly { name: string; type: ValueTypeName }[];
  returnType: ReturnTypeName;
  /** False when a parameter or return type failed to resolve. */
  signatureValid: boolean;
  doc?: string;
  span?: SourceSpan;
  declaration?: MethodDeclaration;
}

export interface ConstantSymbol {
  name: string;
  qualifiedName: string;
  owner: string;
  visibility: Visibility;
  type: ValueTypeName;
  value: number | boolean;
  valid: boolean;
  doc?: string;
  span?: SourceSpan;
}

export interface NamespaceSymbol {
  name: string;
  types: ReadonlyMap<string, TypeSymbol>;
}

export type NameResolution =
  | { kind: "parameter"; index: number; type: ValueTypeName }
  | { kind: "local"; slot: number; type: ValueTypeName | undefined }
  | { kind: "constant"; symbol: ConstantSymbol };

export interface BoundLocal {
  name: string;
  slot: number;
  /** Declared annotation; lowering infers the type when absent. */
  type?: ValueTypeName;
}

export interface BoundMethodBody {
  method: MethodSymbol;
  names: ReadonlyMap<NameExpression, NameResolution>;
  calls: ReadonlyMap<CallExpression, MethodSymbol>;
  lets: ReadonlyMap<LetStatement, BoundLocal>;
  /** In slot order. */
  locals: readonly BoundLocal[];
  /** Body-scoped diagnostics; also present in the unit's diagnostics. */
  diagnostics: readonly Diagnostic[];
}

export interface BoundImport {
  unitPath: string;
  namespace: string;
  span: SourceSpan;
  resolved: boolean;
  used: boolean;
}

export interface BoundUnit {
  path: string;
  namespace: string;
  types: readonly TypeSymbol[];
  imports: readonly BoundImport[];
  /** Source-ordered diagnostics of this unit. */
  diagnostics: readonly Diagnostic[];
}

export interface BoundDeclarationState {
  readonly fingerprint: string;
  readonly namespaces: ReadonlyMap<string, NamespaceSymbol>;
  readonly types: ReadonlyMap<string, TypeSymbol>;
  /** Source methods in declaration order. */
  readonly methods: readonly MethodSymbol[];
  readonly bodies: ReadonlyMap<string, BoundMethodBody>;
  readonly units: readonly BoundUnit[];
  readonly entryPoint?: MethodSymbol;
  /** Diagnostics not owned by a unit (entry point, options). */
  readonly globalDiagnostics: readonly Diagnostic[];
  readonly diagnostics: readonly Diagnostic[];
}
