/**
 * Lexer Tests
 */

import { describe, it, expect } from "vitest";
import { tokenize } from "../src/lexer.js";
import { LexError } from "../src/errors.js";
import { captureError } from "./helpers.js";

describe("Lexer", () => {
  it("should produce tokens with positions and drop comments", () => {
    const tokens = tokenize("module m {\n  t = A | B -- note\n}");

    expect(tokens.map((t) => [t.type, t.value, t.line, t.column])).toEqual([
      ["module", "module", 1, 1],
      ["name", "m", 1, 8],
      ["{", "{", 1, 10],
      ["name", "t", 2, 3],
      ["=", "=", 2, 5],
      ["name", "A", 2, 7],
      ["|", "|", 2, 9],
      ["name", "B", 2, 11],
      ["}", "}", 3, 1],
      ["eof", "", 3, 2],
    ]);
  });

  it("should recognise multiplicity and separator punctuation", () => {
    const types = tokenize("(int* xs, string? s)").map((t) => t.type);

    expect(types).toEqual(["(", "name", "*", "name", ",", "name", "?", "name", ")", "eof"]);
  });

  it("should treat attributes as a keyword", () => {
    expect(tokenize("attributes")[0].type).toBe("attributes");
    expect(tokenize("attribute")[0].type).toBe("name");
  });

  it("should accept identifiers with digits and underscores", () => {
    const [token] = tokenize("arith_expr2");
    expect(token).toEqual({ type: "name", value: "arith_expr2", line: 1, column: 1 });
  });

  it("should return only eof for comment-only input", () => {
    const tokens = tokenize("-- nothing here\n-- or here");
    expect(tokens).toEqual([{ type: "eof", value: "", line: 2, column: 11 }]);
  });

  it("should reject invalid characters with their position", () => {
    const error = captureError(() => tokenize("t = A & B"), LexError);

    expect(error.message).toBe('Unexpected character "&"');
    expect(error.position).toEqual({ line: 1, column: 7 });
    expect(error.code).toBe("LEX");
  });

  it("should reject a single dash", () => {
    expect(() => tokenize("a - b")).toThrow("Unterminated comment marker: expected '--'");
  });
});
