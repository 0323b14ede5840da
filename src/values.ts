/**
 * Values
 *
 * Immutable instances of the types held by a {@link TypeModel}. Values are
 * only created by {@link construct}; every field is checked on the way in and
 * the result is frozen.
 */

import { ArityError, FieldAccessError, ResolutionError, TypeMismatchError } from "./errors.js";
import type { TypeModel } from "./type-model.js";
import {
  absent,
  declaredFields,
  isAbsent,
  isSequence,
  isValue,
  valueLabel,
  type FieldDef,
  type FieldInput,
  type FieldInputs,
  type FieldValue,
  type ProductValue,
  type SumValue,
  type Value,
} from "./types.js";
import { checkFieldValue, markConstructed } from "./validator.js";

function isPositional(inputs: FieldInputs): inputs is readonly FieldInput[] {
  return Array.isArray(inputs);
}

/**
 * Build a value of `typeName`.
 *
 * Sum types take a constructor name; product types take none. Field values
 * are positional (exactly one per declared field) or named (single fields
 * required, optional fields default to absent, repeated fields to `[]`).
 *
 * @throws ArityError when the number or names of the fields do not match
 * @throws TypeMismatchError when a field value has the wrong kind or shape
 * @throws ResolutionError when the type or constructor does not exist
 *
 * @example
 * ```ts
 * const ret = construct(model, "cflow", "Return", [2]);
 * print(ret); // Return(status=2)
 * ```
 */
export function construct(model: TypeModel, typeName: string, fields: FieldInputs): Value;
export function construct(
  model: TypeModel,
  typeName: string,
  constructorName: string | undefined,
  fields: FieldInputs
): Value;
export function construct(
  model: TypeModel,
  typeName: string,
  ctorOrFields: string | undefined | FieldInputs,
  maybeFields?: FieldInputs
): Value {
  const constructorName =
    typeof ctorOrFields === "string" || ctorOrFields === undefined ? ctorOrFields : undefined;
  const inputs: FieldInputs =
    typeof ctorOrFields === "string" || ctorOrFields === undefined
      ? maybeFields ?? []
      : ctorOrFields;

  const type = model.getType(typeName);

  if (type.kind === "product") {
    if (constructorName !== undefined) {
      throw new TypeMismatchError(
        `product type "${type.name}" has no constructors, got "${constructorName}"`,
        type.name
      );
    }
    const value: ProductValue = {
      kind: "product",
      type,
      fields: buildFields(type.fields, inputs, type.name),
    };
    return seal(value);
  }

  if (constructorName === undefined) {
    throw new TypeMismatchError(
      `sum type "${type.name}" needs a constructor name (one of ${type.constructors
        .map((c) => c.name)
        .join(", ")})`,
      type.name
    );
  }

  const ctor = type.constructors.find((c) => c.name === constructorName);
  if (!ctor) {
    throw new ResolutionError(
      `Type "${type.name}" has no constructor "${constructorName}"`,
      `${type.id}.${constructorName}`,
      undefined,
      `Available constructors: ${type.constructors.map((c) => c.name).join(", ")}`
    );
  }

  const value: SumValue = {
    kind: "sum",
    type,
    ctor,
    tag: ctor.tag,
    fields: buildFields(ctor.fields, inputs, ctor.name),
  };
  return seal(value);
}

function buildFields(
  declared: readonly FieldDef[],
  inputs: FieldInputs,
  path: string
): readonly FieldValue[] {
  if (isPositional(inputs)) {
    const positional = inputs;
    if (positional.length !== declared.length) {
      throw new ArityError(
        `${path} takes ${declared.length} field(s), got ${positional.length}`,
        path
      );
    }
    return Object.freeze(
      declared.map((field, i) =>
        checkFieldValue(field, positional[i], `${path}.${field.name}`)
      )
    );
  }

  const named = inputs;
  const known = new Set(declared.map((f) => f.name));
  const unknown = Object.keys(named).filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ArityError(
      `${path} has no field(s) ${unknown.map((n) => `"${n}"`).join(", ")}`,
      `${path}.${unknown[0]}`
    );
  }

  return Object.freeze(
    declared.map((field) => {
      const fieldPath = `${path}.${field.name}`;
      const supplied = Object.prototype.hasOwnProperty.call(named, field.name);
      if (!supplied) {
        if (field.multiplicity === "single") {
          throw new ArityError(`${path} is missing field "${field.name}"`, fieldPath);
        }
        return field.multiplicity === "repeated" ? Object.freeze([]) : absent;
      }
      return checkFieldValue(field, named[field.name], fieldPath);
    })
  );
}

function seal<T extends Value>(value: T): T {
  Object.freeze(value);
  markConstructed(value);
  return value;
}

/**
 * Read a field by name or index.
 *
 * @throws FieldAccessError when the value's constructor does not declare the
 * field, or the index is out of range
 */
export function get(value: Value, field: string | number): FieldValue {
  const fields = declaredFields(value);
  const label = valueLabel(value);

  if (typeof field === "number") {
    if (!Number.isInteger(field) || field < 0 || field >= fields.length) {
      throw new FieldAccessError(
        `Index ${field} is out of range for ${label} (${fields.length} field(s))`,
        `${label}[${field}]`
      );
    }
    return value.fields[field];
  }

  const def = fields.find((f) => f.name === field);
  if (!def) {
    throw new FieldAccessError(
      `${label} has no field "${field}"`,
      `${label}.${field}`,
      fields.length > 0
        ? `Available fields: ${fields.map((f) => f.name).join(", ")}`
        : `${label} has no fields`
    );
  }
  return value.fields[def.index];
}

export type PlainValue = string | number | boolean | null | PlainObject | PlainValue[];

export interface PlainObject {
  [key: string]: PlainValue;
}

/**
 * Plain-object view of a value, in the shape the generated declarations
 * describe: sum values carry their constructor name in `_type`, absent
 * optional fields become `null`.
 */
export function toObject(value: Value): PlainObject {
  const out: PlainObject = value.kind === "sum" ? { _type: value.ctor.name } : {};
  for (const field of declaredFields(value)) {
    out[field.name] = toPlain(value.fields[field.index]);
  }
  return out;
}

function toPlain(content: FieldValue): PlainValue {
  if (isAbsent(content)) return null;
  if (isSequence(content)) return content.map(toPlain);
  if (isValue(content)) return toObject(content);
  return content;
}
