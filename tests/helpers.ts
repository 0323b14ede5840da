// tests/helpers.ts
import { loadSchema } from "../src/index.js";
import type { TypeModel } from "../src/type-model.js";
import { demoSchema } from "./fixtures.js";

export function demoModel(): TypeModel {
  return loadSchema(demoSchema);
}

/**
 * Run `fn` and return the error it throws, which must be a `type`.
 */
export function captureError<T extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => T
): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
