import type { Visibility } from "../syntax/types.js";

/**
 * Declarations of an already-compiled module. Calls into a reference become
 * module imports named after the reference.
 */
export interface MetadataReference {
  name: string;
  namespaces: readonly ReferenceNamespace[];
}

export interface ReferenceNamespace {
  name: string;
  types: readonly ReferenceType[];
}

export interface ReferenceType {
  name: string;
  visibility: Visibility;
  methods: readonly ReferenceMethod[];
  constants?: readonly ReferenceConstant[];
}

export interface ReferenceMethod {
  name: string;
  visibility: Visibility;
  parameters: readonly { name: string; type: string }[];
  returnType: string;
}

export interface ReferenceConstant {
  name: string;
  visibility: Visibility;
  type: string;
  value: number | boolean;
}
