/**
 * Value Validator
 *
 * Checks a value against a declared type, recursively. Construction runs the
 * same checks on every field it is given, so this is the one place that
 * decides whether something conforms to the Type Model.
 *
 * Fails fast: the first violation is reported as a TypeMismatchError whose
 * message starts with the field path (`ArithBinary.left.value: ...`).
 */

import { TypeMismatchError } from "./errors.js";
import type { TypeModel } from "./type-model.js";
import {
  absent,
  declaredFields,
  describeField,
  isAbsent,
  isPrimitiveKind,
  isValue,
  valueLabel,
  type Element,
  type FieldDef,
  type FieldValue,
  type TypeDef,
  type TypeRef,
  type Value,
} from "./types.js";

export type ValidationResult =
  | { valid: true }
  | { valid: false; error: TypeMismatchError };

export type ExpectedType = string | TypeRef | TypeDef;

// Values made by construct(); already checked and frozen.
const constructed = new WeakSet<Value>();

export function markConstructed(value: Value): void {
  constructed.add(value);
}

class ValueChecker {
  // Values on the current path, to stop on hand-built values that contain themselves.
  private readonly ancestors = new Set<Value>();

  field(field: FieldDef, raw: unknown, path: string): FieldValue {
    switch (field.multiplicity) {
      case "optional":
        if (raw === undefined || raw === null || isAbsent(raw)) {
          return absent;
        }
        return this.element(field.type, raw, path);

      case "repeated":
        if (!Array.isArray(raw)) {
          throw new TypeMismatchError(
            `expected ${describeField(field)}, got ${describe(raw)}`,
            path
          );
        }
        return Object.freeze(
          raw.map((item: unknown, i) => this.element(field.type, item, `${path}[${i}]`))
        );

      case "single":
        return this.element(field.type, raw, path);
    }
  }

  element(ref: TypeRef, raw: unknown, path: string): Element {
    if (ref.kind === "declared") {
      return this.value(ref.type, raw, path);
    }

    switch (ref.name) {
      case "string":
        if (typeof raw === "string") return raw;
        break;
      case "int":
        if (typeof raw === "number" && Number.isSafeInteger(raw)) return raw;
        break;
      case "bool":
        if (typeof raw === "boolean") return raw;
        break;
    }
    throw new TypeMismatchError(`expected ${ref.name}, got ${describe(raw)}`, path);
  }

  value(expected: TypeDef, raw: unknown, path: string): Value {
    if (!isValue(raw) || raw.type !== expected || raw.kind !== expected.kind) {
      throw new TypeMismatchError(
        `expected ${expected.name}, got ${describe(raw)}`,
        path
      );
    }

    if (raw.kind === "sum") {
      if (!raw.type.constructors.includes(raw.ctor)) {
        throw new TypeMismatchError(
          `constructor is not one of ${raw.type.name}'s constructors`,
          path
        );
      }
      if (raw.tag !== raw.ctor.tag) {
        throw new TypeMismatchError(
          `tag ${raw.tag} does not match constructor ${raw.ctor.name} (tag ${raw.ctor.tag})`,
          path
        );
      }
    }

    if (constructed.has(raw)) {
      return raw;
    }
    if (this.ancestors.has(raw)) {
      throw new TypeMismatchError(`${valueLabel(raw)} value contains itself`, path);
    }

    const fields = declaredFields(raw);
    if (raw.fields.length !== fields.length) {
      throw new TypeMismatchError(
        `${valueLabel(raw)} has ${raw.fields.length} field(s), expected ${fields.length}`,
        path
      );
    }

    this.ancestors.add(raw);
    for (const field of fields) {
      this.field(field, raw.fields[field.index], `${path}.${field.name}`);
    }
    this.ancestors.delete(raw);

    return raw;
  }
}

function describe(raw: unknown): string {
  if (raw === undefined || raw === null) return "nothing";
  if (isAbsent(raw)) return "absent";
  if (isValue(raw)) {
    return raw.kind === raw.type.kind
      ? `${valueLabel(raw)} (${raw.type.name})`
      : `malformed ${raw.kind} value`;
  }
  if (Array.isArray(raw)) return "list";
  if (typeof raw === "number") {
    return Number.isSafeInteger(raw) ? "int" : `non-integer number ${raw}`;
  }
  if (typeof raw === "boolean") return "bool";
  return typeof raw;
}

/**
 * Check and normalise one field's content: absent markers for empty optional
 * fields, frozen copies of repeated fields.
 *
 * @throws TypeMismatchError
 */
export function checkFieldValue(field: FieldDef, raw: unknown, path: string): FieldValue {
  return new ValueChecker().field(field, raw, path);
}

function toTypeRef(model: TypeModel, expected: ExpectedType): TypeRef {
  if (typeof expected === "string") {
    return isPrimitiveKind(expected)
      ? { kind: "primitive", name: expected }
      : { kind: "declared", type: model.getType(expected) };
  }
  if (expected.kind === "primitive" || expected.kind === "declared") {
    return expected;
  }
  return { kind: "declared", type: expected };
}

/**
 * Check `value` against `expected` (a type name, a resolved TypeRef or a type
 * definition). Sum values conform when their constructor belongs to the sum.
 */
export function validate(
  model: TypeModel,
  value: unknown,
  expected: ExpectedType
): ValidationResult {
  const ref = toTypeRef(model, expected);
  const root = isValue(value)
    ? valueLabel(value)
    : ref.kind === "primitive"
      ? ref.name
      : ref.type.name;

  try {
    new ValueChecker().element(ref, value, root);
    return { valid: true };
  } catch (error) {
    if (error instanceof TypeMismatchError) {
      return { valid: false, error };
    }
    throw error;
  }
}

/**
 * Like {@link validate}, but throws the TypeMismatchError.
 */
export function assertValid(model: TypeModel, value: unknown, expected: ExpectedType): void {
  const result = validate(model, value, expected);
  if (!result.valid) {
    throw result.error;
  }
}
