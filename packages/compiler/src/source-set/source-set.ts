import { stableHash } from "../hash.js";
import { InvalidStateError } from "../errors.js";
import type { SourceUnit } from "../syntax/types.js";
import type { BoundDeclarationState } from "../binding/types.js";
import { bindDeclarations } from "../binding/binder.js";
import type { Diagnostic } from "../diagnostics/index.js";
import type { MetadataReference } from "./references.js";
import {
  createCompilationOptions,
  type CompilationOptions,
  type CompilationOptionsInput,
} from "./options.js";

export type SourceSetInit = {
  name: string;
  units: readonly SourceUnit[];
  references?: readonly MetadataReference[];
  options?: CompilationOptionsInput;
};

/** Units and references are copied on the way in, so callers keep their own trees. */
const freezeDeep = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach((child) => freezeDeep(child));
    Object.freeze(value);
  }
  return value;
};

/**
 * Immutable compilation input. Binding results are cached per instance, so
 * changing anything means creating a new set through one of the `with*`
 * methods.
 */
export class SourceSet {
  readonly name: string;
  readonly units: readonly SourceUnit[];
  readonly references: readonly MetadataReference[];
  readonly options: CompilationOptions;
  #fingerprint?: string;
  #declarations?: BoundDeclarationState;

  private constructor({ name, units, references, options }: {
    name: string;
    units: readonly SourceUnit[];
    references: readonly MetadataReference[];
    options: CompilationOptions;
  }) {
    this.name = name;
    this.units = units;
    this.references = references;
    this.options = options;
  }

  static create({ name, units, references = [], options }: SourceSetInit): SourceSet {
    if (name.trim().length === 0) {
      throw new InvalidStateError("a source set requires a non-empty name");
    }
    const seen = new Set<string>();
    units.forEach((unit) => {
      if (seen.has(unit.path)) {
        throw new InvalidStateError(`source unit paths must be unique: ${unit.path}`);
      }
      seen.add(unit.path);
    });
    const referenceNames = new Set<string>();
    references.forEach((reference) => {
      if (referenceNames.has(reference.name)) {
        throw new InvalidStateError(`reference names must be unique: ${reference.name}`);
      }
      referenceNames.add(reference.name);
    });

    return new SourceSet({
      name,
      units: freezeDeep(structuredClone(units)),
      references: freezeDeep(structuredClone(references)),
      options: createCompilationOptions(options),
    });
  }

  withOptions(options: CompilationOptionsInput): SourceSet {
    return SourceSet.create({
      name: this.name,
      units: this.units,
      references: this.references,
      options: { ...this.options, ...options },
    });
  }

  withUnits(units: readonly SourceUnit[]): SourceSet {
    return SourceSet.create({
      name: this.name,
      units,
      references: this.references,
      options: this.options,
    });
  }

  withReferences(references: readonly MetadataReference[]): SourceSet {
    return SourceSet.create({
      name: this.name,
      units: this.units,
      references,
      options: this.options,
    });
  }

  get fingerprint(): string {
    this.#fingerprint ??= stableHash({
      name: this.name,
      units: this.units,
      references: this.references,
      options: this.options,
    });
    return this.#fingerprint;
  }

  /** Binds declarations on first access; later accesses reuse the result. */
  get declarations(): BoundDeclarationState {
    this.#declarations ??= bindDeclarations(this);
    return this.#declarations;
  }

  get isDeclarationBindingComplete(): boolean {
    return this.#declarations !== undefined;
  }

  getDiagnostics(): readonly Diagnostic[] {
    return this.declarations.diagnostics;
  }
}
