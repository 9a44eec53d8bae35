import binaryen from "binaryen";
import type { ReturnTypeName, ValueTypeName } from "../syntax/types.js";

export const KILN_BINARYEN_FEATURES =
  binaryen.Features.MutableGlobals | binaryen.Features.SignExt;

export const createKilnModule = (): binaryen.Module => {
  const mod = new binaryen.Module();
  mod.setFeatures(KILN_BINARYEN_FEATURES);
  return mod;
};

/** `bool` is carried as i32. */
export const wasmValueType = (type: ValueTypeName): binaryen.Type => {
  switch (type) {
    case "i32":
    case "bool":
      return binaryen.i32;
    case "i64":
      return binaryen.i64;
    case "f32":
      return binaryen.f32;
    case "f64":
      return binaryen.f64;
  }
};

export const wasmReturnType = (type: ReturnTypeName): binaryen.Type =>
  type === "void" ? binaryen.none : wasmValueType(type);

export const wasmParamsType = (types: readonly ValueTypeName[]): binaryen.Type =>
  binaryen.createType(types.map(wasmValueType));
