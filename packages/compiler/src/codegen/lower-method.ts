import { DiagnosticEmitter } from "../diagnostics/index.js";
import { InvalidStateError } from "../errors.js";
import type { BoundMethodBody, MethodSymbol } from "../binding/types.js";
import { valueFitsType } from "../binding/values.js";
import type {
  BinaryExpression,
  BinaryOperator,
  CallExpression,
  Expression,
  LiteralExpression,
  NameExpression,
  Statement,
  ValueTypeName,
} from "../syntax/types.js";
import type {
  ArithmeticOp,
  ComparisonOp,
  LoweredExpression,
  LoweredMethod,
  LoweredStatement,
} from "./lowered-ir.js";

type ExpressionType = ValueTypeName | "void" | "error";

type Lowered<T extends ExpressionType = ExpressionType> = {
  expr: LoweredExpression;
  type: T;
};

type LocalInfo = {
  type: ValueTypeName;
  /** The initializer failed to lower; reads produce no further diagnostics. */
  poisoned: boolean;
};

type LowerContext = {
  body: BoundMethodBody;
  method: MethodSymbol;
  locals: Map<number, LocalInfo>;
  emitter: DiagnosticEmitter;
};

type BlockResult = {
  statements: LoweredStatement[];
  returns: boolean;
};

const UNREACHABLE: LoweredExpression = { kind: "unreachable" };

const ARITHMETIC_OPS: Partial<Record<BinaryOperator, ArithmeticOp>> = {
  "+": "add",
  "-": "sub",
  "*": "mul",
  "/": "div",
  "%": "rem",
};

const COMPARISON_OPS: Partial<Record<BinaryOperator, ComparisonOp>> = {
  "==": "eq",
  "!=": "ne",
  "<": "lt",
  "<=": "le",
  ">": "gt",
  ">=": "ge",
};

const errorValue = (): Lowered<"error"> => ({ expr: UNREACHABLE, type: "error" });

/**
 * Lowers one bound method body to typed IR. Pure: reads only the bound body
 * and its symbols, so any number of methods can be lowered independently.
 * Requires a body without binding errors.
 */
export const lowerMethod = (body: BoundMethodBody): LoweredMethod => {
  const { method } = body;
  const declaration = method.declaration;
  if (!declaration) {
    throw new InvalidStateError("only source methods can be lowered", method.qualifiedName);
  }

  const ctx: LowerContext = {
    body,
    method,
    locals: new Map(),
    emitter: new DiagnosticEmitter(),
  };

  const block = lowerBlock(declaration.body, ctx);
  const statements = [...block.statements];
  if (method.returnType !== "void" && !block.returns) {
    ctx.emitter.reportFromCode({
      code: "LW0004",
      params: { kind: "missing-return", methodName: method.qualifiedName },
      span: declaration.span,
    });
    statements.push({ kind: "unreachable" });
  }

  return {
    method,
    returnType: method.returnType,
    locals: body.locals.map((local) => ({
      name: local.name,
      index: local.slot,
      type: ctx.locals.get(local.slot)?.type ?? local.type ?? "i32",
    })),
    body: statements,
    diagnostics: ctx.emitter.diagnostics,
  };
};

/** Statements after one that always returns are reported once and dropped. */
const lowerBlock = (statements: readonly Statement[], ctx: LowerContext): BlockResult => {
  const lowered: LoweredStatement[] = [];
  let returns = false;
  for (const statement of statements) {
    if (returns) {
      ctx.emitter.reportFromCode({
        code: "LW0008",
        params: { kind: "unreachable-code" },
        span: statement.span,
      });
      break;
    }
    const result = lowerStatement(statement, ctx);
    lowered.push(result.statement);
    returns = result.returns;
  }
  return { statements: lowered, returns };
};

const lowerStatement = (
  statement: Statement,
  ctx: LowerContext
): { statement: LoweredStatement; returns: boolean } => {
  switch (statement.kind) {
    case "let": {
      const local = ctx.body.lets.get(statement);
      if (!local) {
        throw new InvalidStateError("locals must be bound before lowering", statement.name);
      }
      const value = lowerValue(statement.value, local.type, ctx);
      let info: LocalInfo;
      if (local.type) {
        info = { type: local.type, poisoned: false };
        if (value.type !== "error" && value.type !== local.type) {
          ctx.emitter.reportFromCode({
            code: "LW0009",
            params: {
              kind: "let-type-mismatch",
              name: statement.name,
              expected: local.type,
              actual: value.type,
            },
            span: statement.value.span,
          });
        }
      } else if (value.type === "error") {
        info = { type: "i32", poisoned: true };
      } else {
        info = { type: value.type, poisoned: false };
      }
      ctx.locals.set(local.slot, info);
      return {
        statement: {
          kind: "local.set",
          index: local.slot,
          value: value.type === info.type ? value.expr : UNREACHABLE,
        },
        returns: false,
      };
    }
    case "return":
      return { statement: lowerReturn(statement.value, ctx), returns: true };
    case "expression": {
      const value = lowerExpression(statement.expression, undefined, ctx);
      return {
        statement:
          value.type === "void"
            ? { kind: "eval", value: value.expr }
            : { kind: "drop", value: value.expr },
        returns: false,
      };
    }
    case "if": {
      const condition = lowerValue(statement.condition, "bool", ctx);
      if (condition.type !== "error" && condition.type !== "bool") {
        ctx.emitter.reportFromCode({
          code: "LW0006",
          params: { kind: "condition-type", actual: condition.type },
          span: statement.condition.span,
        });
      }
      const thenBlock = lowerBlock(statement.then, ctx);
      const elseBlock = lowerBlock(statement.else ?? [], ctx);
      return {
        statement: {
          kind: "if",
          condition: condition.type === "bool" ? condition.expr : UNREACHABLE,
          then: thenBlock.statements,
          else: elseBlock.statements,
        },
        returns: statement.else !== undefined && thenBlock.returns && elseBlock.returns,
      };
    }
  }
};

const lowerReturn = (value: Expression | undefined, ctx: LowerContext): LoweredStatement => {
  const { method } = ctx;
  if (method.returnType === "void") {
    if (value) {
      lowerExpression(value, undefined, ctx);
      ctx.emitter.reportFromCode({
        code: "LW0001",
        params: { kind: "unexpected-return-value", methodName: method.qualifiedName },
        span: value.span,
      });
    }
    return { kind: "return" };
  }

  if (!value) {
    ctx.emitter.reportFromCode({
      code: "LW0001",
      params: {
        kind: "missing-return-value",
        methodName: method.qualifiedName,
        expected: method.returnType,
      },
      span: method.span ?? { file: "<unknown>", start: 0, end: 0 },
    });
    return { kind: "return", value: UNREACHABLE };
  }

  const lowered = lowerValue(value, method.returnType, ctx);
  if (lowered.type !== "error" && lowered.type !== method.returnType) {
    ctx.emitter.reportFromCode({
      code: "LW0001",
      params: {
        kind: "return-type-mismatch",
        methodName: method.qualifiedName,
        expected: method.returnType,
        actual: lowered.type,
      },
      span: value.span,
    });
    return { kind: "return", value: UNREACHABLE };
  }
  return { kind: "return", value: lowered.expr };
};

/** Lowers an expression whose value is consumed; void calls are rejected. */
const lowerValue = (
  expression: Expression,
  expected: ValueTypeName | undefined,
  ctx: LowerContext
): Lowered<ValueTypeName | "error"> => {
  const lowered = lowerExpression(expression, expected, ctx);
  if (lowered.type !== "void") return { expr: lowered.expr, type: lowered.type };
  ctx.emitter.reportFromCode({
    code: "LW0010",
    params: {
      kind: "void-value",
      callee: expression.kind === "call" ? expression.callee : "expression",
    },
    span: expression.span,
  });
  return errorValue();
};

const lowerExpression = (
  expression: Expression,
  expected: ValueTypeName | undefined,
  ctx: LowerContext
): Lowered => {
  switch (expression.kind) {
    case "literal":
      return lowerLiteral(expression, expected, ctx);
    case "name":
      return lowerName(expression, ctx);
    case "binary":
      return lowerBinary(expression, expected, ctx);
    case "call":
      return lowerCall(expression, ctx);
  }
};

const lowerLiteral = (
  literal: LiteralExpression,
  expected: ValueTypeName | undefined,
  ctx: LowerContext
): Lowered => {
  const { value } = literal;
  const type =
    literal.type ?? (typeof value === "boolean" ? "bool" : inferNumericType(value, expected));
  if (!valueFitsType(value, type)) {
    ctx.emitter.reportFromCode({
      code: "LW0007",
      params: { kind: "literal-out-of-range", value: String(value), typeName: type },
      span: literal.span,
    });
    return errorValue();
  }
  return { expr: { kind: "const", type, value }, type };
};

/**
 * Untyped numbers follow the numeric type the context asks for. Without one,
 * integers are i32 (i64 when they do not fit) and everything else is f64.
 */
const inferNumericType = (value: number, expected: ValueTypeName | undefined): ValueTypeName => {
  const integral = Number.isInteger(value);
  if (expected === "f32" || expected === "f64") return expected;
  if ((expected === "i32" || expected === "i64") && integral) return expected;
  if (!integral) return "f64";
  return valueFitsType(value, "i32") ? "i32" : "i64";
};

const lowerName = (expression: NameExpression, ctx: LowerContext): Lowered => {
  const resolution = ctx.body.names.get(expression);
  if (!resolution) {
    throw new InvalidStateError("names must be resolved before lowering", expression.name);
  }
  switch (resolution.kind) {
    case "parameter":
      return {
        expr: { kind: "local.get", index: resolution.index, type: resolution.type },
        type: resolution.type,
      };
    case "local": {
      const info = ctx.locals.get(resolution.slot);
      if (!info) {
        throw new InvalidStateError("locals must be lowered before use", expression.name);
      }
      if (info.poisoned) return errorValue();
      return {
        expr: { kind: "local.get", index: resolution.slot, type: info.type },
        type: info.type,
      };
    }
    case "constant": {
      const { symbol } = resolution;
      // Invalid constants are reported by the binder.
      if (!symbol.valid) return errorValue();
      return {
        expr: { kind: "const", type: symbol.type, value: symbol.value },
        type: symbol.type,
      };
    }
  }
};

const isUntypedNumber = (expression: Expression): boolean =>
  expression.kind === "literal" &&
  expression.type === undefined &&
  typeof expression.value === "number";

const asContext = (type: ValueTypeName | "error"): ValueTypeName | undefined =>
  type === "error" ? undefined : type;

const lowerOperands = (
  expression: BinaryExpression,
  context: ValueTypeName | undefined,
  ctx: LowerContext
): { left: Lowered<ValueTypeName | "error">; right: Lowered<ValueTypeName | "error"> } => {
  // An untyped literal on the left takes its type from the right operand.
  if (isUntypedNumber(expression.left) && !isUntypedNumber(expression.right)) {
    const right = lowerValue(expression.right, context, ctx);
    const left = lowerValue(expression.left, asContext(right.type) ?? context, ctx);
    return { left, right };
  }
  const left = lowerValue(expression.left, context, ctx);
  const right = lowerValue(expression.right, asContext(left.type) ?? context, ctx);
  return { left, right };
};

const operatorAccepts = (operator: BinaryOperator, type: ValueTypeName): boolean => {
  if (operator === "==" || operator === "!=") return true;
  if (type === "bool") return false;
  if (operator === "%") return type === "i32" || type === "i64";
  return true;
};

const lowerBinary = (
  expression: BinaryExpression,
  expected: ValueTypeName | undefined,
  ctx: LowerContext
): Lowered => {
  const { operator } = expression;

  if (operator === "&&" || operator === "||") {
    const left = lowerValue(expression.left, "bool", ctx);
    const right = lowerValue(expression.right, "bool", ctx);
    if (left.type === "error" || right.type === "error") return errorValue();
    if (left.type !== "bool" || right.type !== "bool") {
      reportOperatorType(expression, left.type, right.type, ctx);
      return errorValue();
    }
    return {
      expr: {
        kind: "logical",
        op: operator === "&&" ? "and" : "or",
        left: left.expr,
        right: right.expr,
      },
      type: "bool",
    };
  }

  const arithmetic = ARITHMETIC_OPS[operator];
  const { left, right } = lowerOperands(expression, arithmetic ? expected : undefined, ctx);
  if (left.type === "error" || right.type === "error") return errorValue();
  if (left.type !== right.type || !operatorAccepts(operator, left.type)) {
    reportOperatorType(expression, left.type, right.type, ctx);
    return errorValue();
  }

  if (arithmetic) {
    return {
      expr: { kind: "arithmetic", op: arithmetic, type: left.type, left: left.expr, right: right.expr },
      type: left.type,
    };
  }

  const comparison = COMPARISON_OPS[operator];
  if (!comparison) {
    throw new InvalidStateError("binary operator must be known", operator);
  }
  return {
    expr: {
      kind: "compare",
      op: comparison,
      operandType: left.type,
      left: left.expr,
      right: right.expr,
    },
    type: "bool",
  };
};

const reportOperatorType = (
  expression: BinaryExpression,
  left: ValueTypeName,
  right: ValueTypeName,
  ctx: LowerContext
): void => {
  ctx.emitter.reportFromCode({
    code: "LW0005",
    params: { kind: "operator-type", operator: expression.operator, left, right },
    span: expression.span,
  });
};

const lowerCall = (expression: CallExpression, ctx: LowerContext): Lowered => {
  const target = ctx.body.calls.get(expression);
  if (!target) {
    throw new InvalidStateError("calls must be resolved before lowering", expression.callee);
  }

  const parameters = target.parameters;
  const args = expression.arguments.map((argument, index) =>
    lowerValue(argument, parameters[index]?.type, ctx)
  );
  let failed = false;

  if (args.length !== parameters.length) {
    failed = true;
    ctx.emitter.reportFromCode({
      code: "LW0002",
      params: {
        kind: "argument-count",
        callee: target.qualifiedName,
        expected: parameters.length,
        actual: args.length,
      },
      span: expression.span,
    });
  }

  args.forEach((argument, index) => {
    const parameter = parameters[index];
    if (!parameter) return;
    if (argument.type === "error") {
      failed = true;
      return;
    }
    if (argument.type !== parameter.type) {
      failed = true;
      ctx.emitter.reportFromCode({
        code: "LW0003",
        params: {
          kind: "argument-type",
          callee: target.qualifiedName,
          parameter: parameter.name,
          expected: parameter.type,
          actual: argument.type,
        },
        span: expression.arguments[index]?.span ?? expression.span,
      });
    }
  });

  if (failed) return { expr: UNREACHABLE, type: target.returnType };
  return {
    expr: { kind: "call", target, arguments: args.map((argument) => argument.expr) },
    type: target.returnType,
  };
};
