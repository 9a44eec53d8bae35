import type { ValueTypeName } from "../syntax/types.js";

const I32_MIN = -(2 ** 31);
const I32_MAX = 2 ** 31 - 1;

export const valueFitsType = (value: number | boolean, type: ValueTypeName): boolean => {
  if (type === "bool") return typeof value === "boolean";
  if (typeof value !== "number" || !Number.isFinite(value)) return false;
  switch (type) {
    case "i32":
      return Number.isInteger(value) && value >= I32_MIN && value <= I32_MAX;
    case "i64":
      return Number.isSafeInteger(value);
    case "f32":
      return Math.abs(value) <= 3.4028234663852886e38;
    case "f64":
      return true;
  }
};

export const qualifyName = (namespace: string, name: string): string =>
  namespace.length > 0 ? `${namespace}.${name}` : name;

/** Splits `A.B.c` into `["A.B", "c"]`; simple names have no qualifier. */
export const splitQualifiedName = (
  name: string
): { qualifier?: string; member: string } => {
  const index = name.lastIndexOf(".");
  return index < 0
    ? { member: name }
    : { qualifier: name.slice(0, index), member: name.slice(index + 1) };
};
