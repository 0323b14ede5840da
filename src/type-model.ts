/**
 * Type Model
 *
 * The registry produced by a successful load. It never changes after it is
 * built; loading more modules on top of a model yields a new model.
 */

import { ResolutionError } from "./errors.js";
import { DEFAULT_MAX_DEPTH, print } from "./printer.js";
import type { FieldInputs, ResolvedModule, TypeDef, Value } from "./types.js";
import { validate, type ExpectedType, type ValidationResult } from "./validator.js";
import { construct } from "./values.js";

export interface TypeModelOptions {
  /** Depth ceiling used by {@link TypeModel.print}. */
  maxPrintDepth?: number;
}

export class TypeModel {
  readonly modules: readonly ResolvedModule[];
  readonly maxPrintDepth: number;
  private readonly byId = new Map<string, TypeDef>();
  private readonly byName = new Map<string, TypeDef>();

  constructor(modules: readonly ResolvedModule[], options: TypeModelOptions = {}) {
    this.modules = Object.freeze([...modules]);
    this.maxPrintDepth = options.maxPrintDepth ?? DEFAULT_MAX_DEPTH;

    for (const mod of this.modules) {
      for (const type of mod.types) {
        this.byId.set(type.id, type);
        // Earlier modules win for unqualified names.
        if (!this.byName.has(type.name)) {
          this.byName.set(type.name, type);
        }
      }
    }
    Object.freeze(this);
  }

  static empty(options: TypeModelOptions = {}): TypeModel {
    return new TypeModel([], options);
  }

  getModule(name: string): ResolvedModule | undefined {
    return this.modules.find((m) => m.name === name);
  }

  /**
   * Find a type by qualified (`module.type`) or bare name.
   */
  lookup(name: string): TypeDef | undefined {
    return name.includes(".") ? this.byId.get(name) : this.byName.get(name);
  }

  getType(name: string): TypeDef {
    const type = this.lookup(name);
    if (!type) {
      const names = [...this.byName.keys()];
      throw new ResolutionError(
        `Unknown type "${name}"`,
        name,
        undefined,
        names.length > 0 ? `Available types: ${names.join(", ")}` : "No types are loaded"
      );
    }
    return type;
  }

  *types(): IterableIterator<TypeDef> {
    for (const mod of this.modules) {
      yield* mod.types;
    }
  }

  construct(typeName: string, fields: FieldInputs): Value;
  construct(typeName: string, constructorName: string | undefined, fields: FieldInputs): Value;
  construct(
    typeName: string,
    ctorOrFields: string | undefined | FieldInputs,
    fields?: FieldInputs
  ): Value {
    if (typeof ctorOrFields === "string" || ctorOrFields === undefined) {
      return construct(this, typeName, ctorOrFields, fields ?? []);
    }
    return construct(this, typeName, ctorOrFields);
  }

  validate(value: unknown, expected: ExpectedType): ValidationResult {
    return validate(this, value, expected);
  }

  print(value: Value): string {
    return print(value, { maxDepth: this.maxPrintDepth });
  }
}
