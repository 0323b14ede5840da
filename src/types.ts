/**
 * Declaration tree and resolved model shapes.
 *
 * The parser produces the `*Node` types (names only, positions retained);
 * the resolver turns them into the `*Def` types that the Type Model holds.
 * Values built against those definitions are at the bottom.
 */

import type { SourcePosition } from "./errors.js";

export type Multiplicity = "single" | "optional" | "repeated";

export const PRIMITIVE_KINDS = ["string", "int", "bool"] as const;

export type PrimitiveKind = (typeof PRIMITIVE_KINDS)[number];

const primitiveNames: ReadonlySet<string> = new Set(PRIMITIVE_KINDS);

export function isPrimitiveKind(name: string): name is PrimitiveKind {
  return primitiveNames.has(name);
}

// Unresolved declaration tree

export interface SchemaAST {
  modules: ModuleNode[];
}

export interface ModuleNode {
  name: string;
  position: SourcePosition;
  types: TypeDeclNode[];
}

export type TypeDeclNode = SumTypeNode | ProductTypeNode;

export interface SumTypeNode {
  kind: "sum";
  name: string;
  position: SourcePosition;
  constructors: ConstructorNode[];
  /** Shared trailing fields, appended to every constructor. */
  attributes: FieldNode[];
}

export interface ProductTypeNode {
  kind: "product";
  name: string;
  position: SourcePosition;
  fields: FieldNode[];
}

export interface ConstructorNode {
  name: string;
  position: SourcePosition;
  fields: FieldNode[];
}

export interface FieldNode {
  name: string;
  typeName: string;
  multiplicity: Multiplicity;
  position: SourcePosition;
}

// Resolved model

export type TypeRef = PrimitiveRef | DeclaredRef;

export interface PrimitiveRef {
  readonly kind: "primitive";
  readonly name: PrimitiveKind;
}

export interface DeclaredRef {
  readonly kind: "declared";
  readonly type: TypeDef;
}

export interface FieldDef {
  readonly name: string;
  readonly index: number;
  readonly type: TypeRef;
  readonly multiplicity: Multiplicity;
  /** True for fields that come from the sum type's `attributes` list. */
  readonly shared: boolean;
  readonly position: SourcePosition;
}

export interface ConstructorDef {
  readonly name: string;
  readonly tag: number;
  readonly fields: readonly FieldDef[];
  readonly position: SourcePosition;
}

export interface SumTypeDef {
  readonly kind: "sum";
  /** Qualified name, `module.type`. */
  readonly id: string;
  readonly name: string;
  readonly module: string;
  readonly constructors: readonly ConstructorDef[];
  readonly attributes: readonly FieldDef[];
  /** No constructor has any field: the type is an enumeration. */
  readonly simple: boolean;
  readonly position: SourcePosition;
}

export interface ProductTypeDef {
  readonly kind: "product";
  readonly id: string;
  readonly name: string;
  readonly module: string;
  readonly fields: readonly FieldDef[];
  readonly position: SourcePosition;
}

export type TypeDef = SumTypeDef | ProductTypeDef;

export interface ResolvedModule {
  readonly name: string;
  /** Declaration order. */
  readonly types: readonly TypeDef[];
}

export function describeTypeRef(ref: TypeRef): string {
  return ref.kind === "primitive" ? ref.name : ref.type.name;
}

export function describeField(field: FieldDef): string {
  const suffix =
    field.multiplicity === "repeated" ? "*" : field.multiplicity === "optional" ? "?" : "";
  return `${describeTypeRef(field.type)}${suffix}`;
}

// Values

export interface Absent {
  readonly kind: "absent";
}

/** Content of an optional field that holds nothing. */
export const absent: Absent = Object.freeze({ kind: "absent" as const });

export type Scalar = string | number | boolean;

export type Element = Scalar | Value;

export type FieldValue = Element | Absent | readonly Element[];

/** Accepted when constructing; `null` and `undefined` mean absent. */
export type FieldInput = FieldValue | null | undefined;

export type FieldInputs = readonly FieldInput[] | Readonly<Record<string, FieldInput>>;

export interface SumValue {
  readonly kind: "sum";
  readonly type: SumTypeDef;
  readonly ctor: ConstructorDef;
  readonly tag: number;
  readonly fields: readonly FieldValue[];
}

export interface ProductValue {
  readonly kind: "product";
  readonly type: ProductTypeDef;
  readonly fields: readonly FieldValue[];
}

export type Value = SumValue | ProductValue;

export function isAbsent(x: unknown): x is Absent {
  return typeof x === "object" && x !== null && "kind" in x && x.kind === "absent";
}

export function isValue(x: unknown): x is Value {
  return (
    typeof x === "object" &&
    x !== null &&
    "kind" in x &&
    (x.kind === "sum" || x.kind === "product") &&
    "type" in x &&
    typeof x.type === "object" &&
    x.type !== null &&
    "fields" in x &&
    Array.isArray(x.fields) &&
    (x.kind === "product" || ("ctor" in x && typeof x.ctor === "object" && x.ctor !== null))
  );
}

/** Fields a value actually has, in declaration order. */
export function declaredFields(value: Value): readonly FieldDef[] {
  return value.kind === "sum" ? value.ctor.fields : value.type.fields;
}

/** Constructor name for sum values, type name for product values. */
export function valueLabel(value: Value): string {
  return value.kind === "sum" ? value.ctor.name : value.type.name;
}

export function fieldNames(value: Value): string[] {
  return declaredFields(value).map((f) => f.name);
}

export function isSequence(content: FieldValue): content is readonly Element[] {
  return Array.isArray(content);
}
