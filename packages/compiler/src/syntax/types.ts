import type { SourceSpan } from "../diagnostics/index.js";

export type ValueTypeName = "i32" | "i64" | "f32" | "f64" | "bool";

export type ReturnTypeName = ValueTypeName | "void";

export type Visibility = "public" | "internal" | "private";

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&&"
  | "||";

export interface SourceUnit {
  /** Unique within a source set; used as the file of every span in the unit. */
  path: string;
  /** Dotted namespace, empty for the global namespace. */
  namespace: string;
  imports: readonly ImportDirective[];
  types: readonly TypeDeclaration[];
}

export interface ImportDirective {
  namespace: string;
  span: SourceSpan;
}

export interface TypeDeclaration {
  name: string;
  visibility: Visibility;
  doc?: string;
  members: readonly MemberDeclaration[];
  span: SourceSpan;
}

export type MemberDeclaration = MethodDeclaration | ConstantDeclaration;

export interface ConstantDeclaration {
  kind: "constant";
  name: string;
  /** Type names are unresolved text until binding. */
  type: string;
  value: number | boolean;
  visibility: Visibility;
  doc?: string;
  span: SourceSpan;
}

export interface ParameterDeclaration {
  name: string;
  type: string;
  span: SourceSpan;
}

export interface MethodDeclaration {
  kind: "method";
  name: string;
  visibility: Visibility;
  parameters: readonly ParameterDeclaration[];
  returnType: string;
  body: readonly Statement[];
  doc?: string;
  span: SourceSpan;
}

export type Statement =
  | LetStatement
  | ReturnStatement
  | ExpressionStatement
  | IfStatement;

export interface LetStatement {
  kind: "let";
  name: string;
  type?: string;
  value: Expression;
  span: SourceSpan;
}

export interface ReturnStatement {
  kind: "return";
  value?: Expression;
  span: SourceSpan;
}

export interface ExpressionStatement {
  kind: "expression";
  expression: Expression;
  span: SourceSpan;
}

export interface IfStatement {
  kind: "if";
  condition: Expression;
  then: readonly Statement[];
  else?: readonly Statement[];
  span: SourceSpan;
}

export type Expression =
  | LiteralExpression
  | NameExpression
  | BinaryExpression
  | CallExpression;

export interface LiteralExpression {
  kind: "literal";
  value: number | boolean;
  /** Explicit suffix type; untyped numeric literals take their type from context. */
  type?: ValueTypeName;
  span: SourceSpan;
}

export interface NameExpression {
  kind: "name";
  /** Simple (`count`) or qualified (`Limits.MAX`). */
  name: string;
  span: SourceSpan;
}

export interface BinaryExpression {
  kind: "binary";
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
  span: SourceSpan;
}

export interface CallExpression {
  kind: "call";
  /** Simple (`helper`) or qualified (`Math.add`, `App.Core.Math.add`). */
  callee: string;
  arguments: readonly Expression[];
  span: SourceSpan;
}

export const VALUE_TYPE_NAMES: readonly ValueTypeName[] = [
  "i32",
  "i64",
  "f32",
  "f64",
  "bool",
];

export const isValueTypeName = (value: string): value is ValueTypeName =>
  VALUE_TYPE_NAMES.some((name) => name === value);

export const isReturnTypeName = (value: string): value is ReturnTypeName =>
  value === "void" || isValueTypeName(value);
