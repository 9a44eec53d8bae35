import type { ConstantSymbol, MethodSymbol, TypeSymbol } from "../binding/types.js";
import type { Visibility } from "../syntax/types.js";

export type DocumentationMember = {
  kind: "method" | "constant";
  name: string;
  fqn: string;
  visibility: Visibility;
  signature: string;
  documentation?: string;
  anchor: string;
};

export type DocumentationType = {
  name: string;
  fqn: string;
  visibility: Visibility;
  documentation?: string;
  anchor: string;
  members: readonly DocumentationMember[];
};

export type DocumentationNamespace = {
  name: string;
  types: readonly DocumentationType[];
};

export type DocumentationModel = {
  module: string;
  namespaces: readonly DocumentationNamespace[];
};

const sanitizeAnchorSegment = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

const createAnchorGenerator = () => {
  const counts = new Map<string, number>();
  return (value: string): string => {
    const base = sanitizeAnchorSegment(value) || "item";
    const seen = counts.get(base) ?? 0;
    counts.set(base, seen + 1);
    return seen === 0 ? base : `${base}-${seen}`;
  };
};

export const methodSignature = (method: MethodSymbol): string =>
  `${method.name}(${method.parameters
    .map((param) => `${param.name}: ${param.type}`)
    .join(", ")}): ${method.returnType}`;

const constantSignature = (constant: ConstantSymbol): string =>
  `${constant.name}: ${constant.type} = ${String(constant.value)}`;

const isIncluded = (visibility: Visibility, includePrivateMembers: boolean): boolean =>
  includePrivateMembers || visibility !== "private";

export const buildDocumentationModel = ({
  moduleName,
  types,
  includePrivateMembers,
}: {
  moduleName: string;
  types: readonly TypeSymbol[];
  includePrivateMembers: boolean;
}): DocumentationModel => {
  const anchorFor = createAnchorGenerator();
  const namespaces = new Map<string, DocumentationType[]>();

  types
    .filter((type) => isIncluded(type.visibility, includePrivateMembers))
    .forEach((type) => {
      const methods = [...type.methods.values()]
        .filter((method) => isIncluded(method.visibility, includePrivateMembers))
        .map(
          (method): DocumentationMember => ({
            kind: "method",
            name: method.name,
            fqn: method.qualifiedName,
            visibility: method.visibility,
            signature: methodSignature(method),
            documentation: method.doc,
            anchor: anchorFor(method.qualifiedName),
          })
        );
      const constants = [...type.constants.values()]
        .filter((constant) => isIncluded(constant.visibility, includePrivateMembers))
        .map(
          (constant): DocumentationMember => ({
            kind: "constant",
            name: constant.name,
            fqn: constant.qualifiedName,
            visibility: constant.visibility,
            signature: constantSignature(constant),
            documentation: constant.doc,
            anchor: anchorFor(constant.qualifiedName),
          })
        );

      const bucket = namespaces.get(type.namespace) ?? [];
      bucket.push({
        name: type.name,
        fqn: type.qualifiedName,
        visibility: type.visibility,
        documentation: type.doc,
        anchor: anchorFor(type.qualifiedName),
        members: [...constants, ...methods],
      });
      namespaces.set(type.namespace, bucket);
    });

  return {
    module: moduleName,
    namespaces: [...namespaces.entries()].map(([name, entries]) => ({
      name,
      types: entries,
    })),
  };
};

export const renderDocumentationJson = ({
  model,
}: {
  model: DocumentationModel;
}): string => `${JSON.stringify(model, null, 2)}\n`;
