/**
 * Value Printer
 *
 * Canonical text form of a value:
 *
 *   Return(status=2)                      sum value
 *   Break                                 constructor without fields
 *   ("key", 1)                            product value
 *   Call(name="f", args=[1, 2], label=_)  repeated field, absent optional field
 *
 * Output depends only on the value and the declared field order.
 */

import { RecursionLimitError } from "./errors.js";
import {
  isAbsent,
  isSequence,
  valueLabel,
  type Element,
  type FieldDef,
  type FieldInput,
  type Value,
} from "./types.js";

export const DEFAULT_MAX_DEPTH = 256;

export const ABSENT_MARKER = "_";

export interface PrintOptions {
  /** Deepest value nesting allowed before RecursionLimitError. */
  maxDepth?: number;
}

export class ValuePrinter {
  private readonly maxDepth: number;

  constructor(options: PrintOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  print(value: Value): string {
    return this.printValue(value, 1, valueLabel(value));
  }

  private printValue(value: Value, depth: number, path: string): string {
    if (depth > this.maxDepth) {
      throw new RecursionLimitError(this.maxDepth, path);
    }

    if (value.kind === "product") {
      const parts = value.type.fields.map((field) =>
        this.printField(field, value.fields[field.index], depth, path)
      );
      return `(${parts.join(", ")})`;
    }

    const fields = value.ctor.fields;
    if (fields.length === 0) {
      return value.ctor.name;
    }
    const parts = fields.map(
      (field) =>
        `${field.name}=${this.printField(field, value.fields[field.index], depth, path)}`
    );
    return `${value.ctor.name}(${parts.join(", ")})`;
  }

  private printField(
    field: FieldDef,
    content: FieldInput,
    depth: number,
    parentPath: string
  ): string {
    const path = `${parentPath}.${field.name}`;
    // Hand-built values may leave an optional field null or undefined.
    if (content === null || content === undefined || isAbsent(content)) {
      return ABSENT_MARKER;
    }
    if (isSequence(content)) {
      const items = content.map((item, i) => this.printElement(item, depth, `${path}[${i}]`));
      return `[${items.join(", ")}]`;
    }
    return this.printElement(content, depth, path);
  }

  private printElement(element: Element, depth: number, path: string): string {
    switch (typeof element) {
      case "string":
        return JSON.stringify(element);
      case "number":
        return String(element);
      case "boolean":
        return element ? "true" : "false";
      default:
        return this.printValue(element, depth + 1, path);
    }
  }
}

/**
 * @throws RecursionLimitError when values nest deeper than `maxDepth`
 */
export function print(value: Value, options: PrintOptions = {}): string {
  return new ValuePrinter(options).print(value);
}
