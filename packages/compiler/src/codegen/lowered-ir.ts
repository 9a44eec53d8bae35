import type { Diagnostic } from "../diagnostics/index.js";
import type { MethodSymbol } from "../binding/types.js";
import type { ReturnTypeName, ValueTypeName } from "../syntax/types.js";

export type ArithmeticOp = "add" | "sub" | "mul" | "div" | "rem";
export type ComparisonOp = "eq" | "ne" | "lt" | "le" | "gt" | "ge";

/**
 * Typed, module-independent form of a method body. Produced without touching
 * the module so that methods can be lowered in isolation and added later in
 * declaration order.
 */
export type LoweredExpression =
  | { kind: "const"; type: ValueTypeName; value: number | boolean }
  | { kind: "local.get"; index: number; type: ValueTypeName }
  | {
      kind: "arithmetic";
      op: ArithmeticOp;
      type: ValueTypeName;
      left: LoweredExpression;
      right: LoweredExpression;
    }
  | {
      kind: "compare";
      op: ComparisonOp;
      /** Operand type; the result is always bool. */
      operandType: ValueTypeName;
      left: LoweredExpression;
      right: LoweredExpression;
    }
  | { kind: "logical"; op: "and" | "or"; left: LoweredExpression; right: LoweredExpression }
  | {
      kind: "call";
      target: MethodSymbol;
      arguments: readonly LoweredExpression[];
    }
  /** Placeholder for an expression that failed to lower; traps if reached. */
  | { kind: "unreachable" };

export type LoweredStatement =
  | { kind: "local.set"; index: number; value: LoweredExpression }
  | { kind: "return"; value?: LoweredExpression }
  | { kind: "drop"; value: LoweredExpression }
  | { kind: "eval"; value: LoweredExpression }
  | {
      kind: "if";
      condition: LoweredExpression;
      then: readonly LoweredStatement[];
      else: readonly LoweredStatement[];
    }
  | { kind: "unreachable" };

export interface LoweredLocal {
  name: string;
  index: number;
  type: ValueTypeName;
}

export interface LoweredMethod {
  method: MethodSymbol;
  returnType: ReturnTypeName;
  locals: readonly LoweredLocal[];
  body: readonly LoweredStatement[];
  diagnostics: readonly Diagnostic[];
}
