import type { Analyzer } from "@kiln/compiler";
import { createNamingConventionsAnalyzer } from "./naming-conventions.js";
import { createUnusedParametersAnalyzer } from "./unused-parameters.js";

export {
  createNamingConventionsAnalyzer,
  NAMING_CONVENTIONS_ID,
  NAMING_EXCLUDE_OPTION,
} from "./naming-conventions.js";
export { createUnusedParametersAnalyzer, UNUSED_PARAMETERS_ID } from "./unused-parameters.js";

/** Fresh instances of every built-in analyzer, in reporting order. */
export const createBuiltinAnalyzers = (): Analyzer[] => [
  createNamingConventionsAnalyzer(),
  createUnusedParametersAnalyzer(),
];
