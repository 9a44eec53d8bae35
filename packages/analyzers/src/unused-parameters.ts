import {
  createDiagnostic,
  type Analyzer,
  type Diagnostic,
  type UnitAnalyzerContext,
} from "@kiln/compiler";

export const UNUSED_PARAMETERS_ID = "unused-parameters";

/**
 * Warns about parameters that no expression in the method body reads.
 * Parameters whose name starts with `_` are intentionally unused.
 */
export const createUnusedParametersAnalyzer = (): Analyzer => ({
  id: UNUSED_PARAMETERS_ID,
  concurrentUnits: true,
  analyzeUnit: ({ declarations, unit }: UnitAnalyzerContext) => {
    const diagnostics: Diagnostic[] = [];

    unit.types.forEach((type) => {
      type.methods.forEach((method) => {
        const body = declarations.bodies.get(method.qualifiedName);
        const declaration = method.declaration;
        if (!body || !declaration) return;

        const read = new Set<number>();
        body.names.forEach((resolution) => {
          if (resolution.kind === "parameter") read.add(resolution.index);
        });

        declaration.parameters.forEach((parameter, index) => {
          if (read.has(index) || parameter.name.startsWith("_")) return;
          diagnostics.push(
            createDiagnostic({
              code: "KU0001",
              message: `parameter '${parameter.name}' of ${method.qualifiedName} is never used`,
              severity: "warning",
              phase: "analyzer",
              span: parameter.span,
            })
          );
        });
      });
    });

    return diagnostics;
  },
});
