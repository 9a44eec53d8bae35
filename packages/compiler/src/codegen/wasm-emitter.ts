import binaryen from "binaryen";
import { InvalidStateError } from "../errors.js";
import type { ModuleBuilder } from "../module/module-builder.js";
import { wasmReturnType, wasmValueType } from "../module/wasm-types.js";
import type { ValueTypeName } from "../syntax/types.js";
import type {
  ArithmeticOp,
  ComparisonOp,
  LoweredExpression,
  LoweredMethod,
  LoweredStatement,
} from "./lowered-ir.js";

type Ref = binaryen.ExpressionRef;
type BinaryFactory = (left: Ref, right: Ref) => Ref;

type IntegerOps = Record<
  "add" | "sub" | "mul" | "div_s" | "rem_s" | "eq" | "ne" | "lt_s" | "le_s" | "gt_s" | "ge_s",
  BinaryFactory
>;

type FloatOps = Record<
  "add" | "sub" | "mul" | "div" | "eq" | "ne" | "lt" | "le" | "gt" | "ge",
  BinaryFactory
>;

type EmitContext = {
  module: ModuleBuilder;
  mod: binaryen.Module;
};

/** Builds the function body for a lowered method; calls to references become imports. */
export const emitMethodBody = ({
  module,
  lowered,
  coverageGlobal,
}: {
  module: ModuleBuilder;
  lowered: LoweredMethod;
  coverageGlobal?: string;
}): Ref => {
  const ctx: EmitContext = { module, mod: module.wasm };
  const statements = lowered.body.map((statement) => emitStatement(statement, ctx));
  if (coverageGlobal) {
    statements.unshift(ctx.mod.global.set(coverageGlobal, ctx.mod.i32.const(1)));
  }
  return ctx.mod.block(null, statements, binaryen.auto);
};

export const emitStubBody = (module: ModuleBuilder): Ref => module.wasm.unreachable();

const emitBlock = (statements: readonly LoweredStatement[], ctx: EmitContext): Ref =>
  ctx.mod.block(
    null,
    statements.map((statement) => emitStatement(statement, ctx)),
    binaryen.auto
  );

const emitStatement = (statement: LoweredStatement, ctx: EmitContext): Ref => {
  const { mod } = ctx;
  switch (statement.kind) {
    case "local.set":
      return mod.local.set(statement.index, emitExpression(statement.value, ctx));
    case "return":
      return statement.value
        ? mod.return(emitExpression(statement.value, ctx))
        : mod.return();
    case "drop":
      return mod.drop(emitExpression(statement.value, ctx));
    case "eval":
      return emitExpression(statement.value, ctx);
    case "if":
      return mod.if(
        emitExpression(statement.condition, ctx),
        emitBlock(statement.then, ctx),
        statement.else.length > 0 ? emitBlock(statement.else, ctx) : undefined
      );
    case "unreachable":
      return mod.unreachable();
  }
};

const emitExpression = (expression: LoweredExpression, ctx: EmitContext): Ref => {
  const { mod } = ctx;
  switch (expression.kind) {
    case "const":
      return emitConst(mod, expression.type, expression.value);
    case "local.get":
      return mod.local.get(expression.index, wasmValueType(expression.type));
    case "arithmetic":
      return emitArithmetic(
        mod,
        expression.op,
        expression.type,
        emitExpression(expression.left, ctx),
        emitExpression(expression.right, ctx)
      );
    case "compare":
      return emitComparison(
        mod,
        expression.op,
        expression.operandType,
        emitExpression(expression.left, ctx),
        emitExpression(expression.right, ctx)
      );
    case "logical": {
      const left = emitExpression(expression.left, ctx);
      const right = emitExpression(expression.right, ctx);
      return expression.op === "and"
        ? mod.if(left, right, mod.i32.const(0))
        : mod.if(left, mod.i32.const(1), right);
    }
    case "call": {
      const { target } = expression;
      const name =
        target.origin.kind === "reference"
          ? ctx.module.ensureImport(target)
          : target.qualifiedName;
      return mod.call(
        name,
        expression.arguments.map((argument) => emitExpression(argument, ctx)),
        wasmReturnType(target.returnType)
      );
    }
    case "unreachable":
      return mod.unreachable();
  }
};

const emitConst = (mod: binaryen.Module, type: ValueTypeName, value: number | boolean): Ref => {
  const numeric = typeof value === "boolean" ? (value ? 1 : 0) : value;
  switch (type) {
    case "i32":
    case "bool":
      return mod.i32.const(numeric);
    case "i64": {
      const bits = BigInt.asUintN(64, BigInt(numeric));
      const low = Number(bits & 0xffffffffn) | 0;
      const high = Number(bits >> 32n) | 0;
      return mod.i64.const(low, high);
    }
    case "f32":
      return mod.f32.const(numeric);
    case "f64":
      return mod.f64.const(numeric);
  }
};

const emitArithmetic = (
  mod: binaryen.Module,
  op: ArithmeticOp,
  type: ValueTypeName,
  left: Ref,
  right: Ref
): Ref => {
  switch (type) {
    case "i32":
    case "bool":
      return integerArithmetic(mod.i32, op, left, right);
    case "i64":
      return integerArithmetic(mod.i64, op, left, right);
    case "f32":
      return floatArithmetic(mod.f32, op, left, right);
    case "f64":
      return floatArithmetic(mod.f64, op, left, right);
  }
};

const integerArithmetic = (ops: IntegerOps, op: ArithmeticOp, left: Ref, right: Ref): Ref => {
  switch (op) {
    case "add":
      return ops.add(left, right);
    case "sub":
      return ops.sub(left, right);
    case "mul":
      return ops.mul(left, right);
    case "div":
      return ops.div_s(left, right);
    case "rem":
      return ops.rem_s(left, right);
  }
};

const floatArithmetic = (ops: FloatOps, op: ArithmeticOp, left: Ref, right: Ref): Ref => {
  switch (op) {
    case "add":
      return ops.add(left, right);
    case "sub":
      return ops.sub(left, right);
    case "mul":
      return ops.mul(left, right);
    case "div":
      return ops.div(left, right);
    case "rem":
      throw new InvalidStateError("floating point remainder is rejected during lowering");
  }
};

const emitComparison = (
  mod: binaryen.Module,
  op: ComparisonOp,
  type: ValueTypeName,
  left: Ref,
  right: Ref
): Ref => {
  switch (type) {
    case "i32":
    case "bool":
      return integerComparison(mod.i32, op, left, right);
    case "i64":
      return integerComparison(mod.i64, op, left, right);
    case "f32":
      return floatComparison(mod.f32, op, left, right);
    case "f64":
      return floatComparison(mod.f64, op, left, right);
  }
};

const integerComparison = (ops: IntegerOps, op: ComparisonOp, left: Ref, right: Ref): Ref => {
  switch (op) {
    case "eq":
      return ops.eq(left, right);
    case "ne":
      return ops.ne(left, right);
    case "lt":
      return ops.lt_s(left, right);
    case "le":
      return ops.le_s(left, right);
    case "gt":
      return ops.gt_s(left, right);
    case "ge":
      return ops.ge_s(left, right);
  }
};

const floatComparison = (ops: FloatOps, op: ComparisonOp, left: Ref, right: Ref): Ref => {
  switch (op) {
    case "eq":
      return ops.eq(left, right);
    case "ne":
      return ops.ne(left, right);
    case "lt":
      return ops.lt(left, right);
    case "le":
      return ops.le(left, right);
    case "gt":
      return ops.gt(left, right);
    case "ge":
      return ops.ge(left, right);
  }
};
