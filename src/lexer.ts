/**
 * Schema Lexer
 *
 * Splits schema text into names, keywords and punctuation. Comments start
 * with `--` and run to the end of the line.
 */

import { LexError, type SourcePosition } from "./errors.js";

export type TokenType =
  | "name"
  | "module"
  | "attributes"
  | "("
  | ")"
  | "{"
  | "}"
  | "|"
  | "*"
  | "?"
  | ","
  | "="
  | "eof";

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

const KEYWORDS: Record<string, TokenType> = {
  module: "module",
  attributes: "attributes",
};

const PUNCTUATION: Record<string, TokenType> = {
  "(": "(",
  ")": ")",
  "{": "{",
  "}": "}",
  "|": "|",
  "*": "*",
  "?": "?",
  ",": ",",
  "=": "=",
};

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;

export class Lexer {
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];

    for (;;) {
      this.skipTrivia();
      if (this.pos >= this.source.length) {
        tokens.push({ type: "eof", value: "", line: this.line, column: this.column });
        return tokens;
      }
      tokens.push(this.next());
    }
  }

  private next(): Token {
    const ch = this.source[this.pos];
    const start = this.position();

    const punct = PUNCTUATION[ch];
    if (punct) {
      this.advance();
      return { type: punct, value: ch, ...start };
    }

    if (NAME_START.test(ch)) {
      let value = "";
      while (this.pos < this.source.length && NAME_PART.test(this.source[this.pos])) {
        value += this.source[this.pos];
        this.advance();
      }
      return { type: KEYWORDS[value] ?? "name", value, ...start };
    }

    if (ch === "-") {
      throw new LexError("Unterminated comment marker: expected '--'", start);
    }

    throw new LexError(`Unexpected character ${JSON.stringify(ch)}`, start);
  }

  private skipTrivia(): void {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.advance();
      } else if (ch === "-" && this.source[this.pos + 1] === "-") {
        while (this.pos < this.source.length && this.source[this.pos] !== "\n") {
          this.advance();
        }
      } else {
        return;
      }
    }
  }

  private advance(): void {
    if (this.source[this.pos] === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.pos++;
  }

  private position(): SourcePosition {
    return { line: this.line, column: this.column };
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
