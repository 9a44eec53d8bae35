import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import {
  createAnalyzerConfig,
  SourceSet,
  type AnalyzerConfig,
  type Expression,
  type MetadataReference,
  type ModuleResource,
  type SourceSpan,
  type SourceUnit,
  type Statement,
} from "@kiln/compiler";

const visibilitySchema = z.enum(["public", "internal", "private"]);

const valueTypeSchema = z.enum(["i32", "i64", "f32", "f64", "bool"]);

const operatorSchema = z.enum([
  "+",
  "-",
  "*",
  "/",
  "%",
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
  "&&",
  "||",
]);

export const ProjectSchema = z.object({
  name: z.string().min(1),
  /** Unit JSON files, relative to the project file. */
  units: z.array(z.string().min(1)).min(1),
  references: z.array(z.string().min(1)).default([]),
  options: z
    .object({
      outputKind: z.enum(["library", "executable"]).optional(),
      entryPoint: z.string().min(1).optional(),
      maxDegreeOfParallelism: z.number().int().positive().optional(),
      concurrentBuild: z.boolean().optional(),
    })
    .strict()
    .default({}),
  resources: z.array(z.object({ name: z.string().min(1), path: z.string().min(1) })).default([]),
  analyzers: z
    .object({
      options: z.record(z.string()).default({}),
      severityOverrides: z.record(z.enum(["error", "warning", "note", "none"])).default({}),
    })
    .default({}),
});

export type ProjectFile = z.infer<typeof ProjectSchema>;

export const ReferenceSchema = z.object({
  name: z.string().min(1),
  namespaces: z.array(
    z.object({
      name: z.string(),
      types: z.array(
        z.object({
          name: z.string().min(1),
          visibility: visibilitySchema,
          methods: z.array(
            z.object({
              name: z.string().min(1),
              visibility: visibilitySchema,
              parameters: z.array(z.object({ name: z.string().min(1), type: z.string() })),
              returnType: z.string(),
            }),
          ),
          constants: z
            .array(
              z.object({
                name: z.string().min(1),
                visibility: visibilitySchema,
                type: z.string(),
                value: z.union([z.number(), z.boolean()]),
              }),
            )
            .optional(),
        }),
      ),
    }),
  ),
});

/**
 * Schema of one pre-parsed unit. Spans in the file are `{ start, end }`
 * offsets; the unit's `path` becomes their file.
 */
export const createUnitSchema = (file: string) => {
  const span = z
    .object({ start: z.number().int().nonnegative(), end: z.number().int().nonnegative() })
    .refine(({ start, end }) => end >= start, "span end must not precede its start")
    .transform(({ start, end }): SourceSpan => ({ file, start, end }));

  const expression: z.ZodType<Expression, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.discriminatedUnion("kind", [
      z.object({
        kind: z.literal("literal"),
        value: z.union([z.number(), z.boolean()]),
        type: valueTypeSchema.optional(),
        span,
      }),
      z.object({ kind: z.literal("name"), name: z.string().min(1), span }),
      z.object({
        kind: z.literal("binary"),
        operator: operatorSchema,
        left: expression,
        right: expression,
        span,
      }),
      z.object({
        kind: z.literal("call"),
        callee: z.string().min(1),
        arguments: z.array(expression).default([]),
        span,
      }),
    ]),
  );

  const statement: z.ZodType<Statement, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.discriminatedUnion("kind", [
      z.object({
        kind: z.literal("let"),
        name: z.string().min(1),
        type: z.string().optional(),
        value: expression,
        span,
      }),
      z.object({ kind: z.literal("return"), value: expression.optional(), span }),
      z.object({ kind: z.literal("expression"), expression, span }),
      z.object({
        kind: z.literal("if"),
        condition: expression,
        then: z.array(statement),
        else: z.array(statement).optional(),
        span,
      }),
    ]),
  );

  const member = z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("method"),
      name: z.string().min(1),
      visibility: visibilitySchema.default("public"),
      parameters: z
        .array(z.object({ name: z.string().min(1), type: z.string(), span }))
        .default([]),
      returnType: z.string().default("void"),
      body: z.array(statement).default([]),
      doc: z.string().optional(),
      span,
    }),
    z.object({
      kind: z.literal("constant"),
      name: z.string().min(1),
      type: z.string(),
      value: z.union([z.number(), z.boolean()]),
      visibility: visibilitySchema.default("public"),
      doc: z.string().optional(),
      span,
    }),
  ]);

  return z.object({
    path: z.literal(file),
    namespace: z.string().default(""),
    imports: z.array(z.object({ namespace: z.string().min(1), span })).default([]),
    types: z.array(
      z.object({
        name: z.string().min(1),
        visibility: visibilitySchema.default("public"),
        doc: z.string().optional(),
        members: z.array(member).default([]),
        span,
      }),
    ),
  });
};

const UnitPathSchema = z.object({ path: z.string().min(1) });

export class ProjectError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = "ProjectError";
    this.file = file;
  }
}

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");

const readJson = async (file: string): Promise<unknown> => {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    throw new ProjectError(file, error instanceof Error ? error.message : String(error));
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ProjectError(file, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
};

const parseWith = <T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ProjectError(file, formatIssues(result.error));
  }
  return result.data;
};

export const parseUnit = (file: string, value: unknown): SourceUnit => {
  const { path } = parseWith(file, UnitPathSchema, value);
  return parseWith(file, createUnitSchema(path), value);
};

export type LoadedProject = {
  /** Directory of the project file; relative paths resolve against it. */
  root: string;
  sourceSet: SourceSet;
  resources: ModuleResource[];
  analyzerConfig: AnalyzerConfig;
};

export const loadProject = async (projectPath: string): Promise<LoadedProject> => {
  const projectFile = resolve(projectPath);
  const root = dirname(projectFile);
  const project = parseWith(projectFile, ProjectSchema, await readJson(projectFile));

  const units = await Promise.all(
    project.units.map(async (unit) => {
      const file = resolve(root, unit);
      return parseUnit(file, await readJson(file));
    }),
  );
  const references: MetadataReference[] = await Promise.all(
    project.references.map(async (reference) => {
      const file = resolve(root, reference);
      return parseWith(file, ReferenceSchema, await readJson(file));
    }),
  );
  const resources = await Promise.all(
    project.resources.map(async ({ name, path }): Promise<ModuleResource> => {
      const file = resolve(root, path);
      try {
        return { name, data: new Uint8Array(await readFile(file)) };
      } catch (error) {
        throw new ProjectError(file, error instanceof Error ? error.message : String(error));
      }
    }),
  );

  return {
    root,
    sourceSet: SourceSet.create({
      name: project.name,
      units,
      references,
      options: project.options,
    }),
    resources,
    analyzerConfig: createAnalyzerConfig(project.analyzers),
  };
};
