/**
 * Schema Loader Main Entry Point
 */

export * from "./errors.js";
export * from "./types.js";
export { Lexer, tokenize, type Token, type TokenType } from "./lexer.js";
export { SchemaParser, parseSchema } from "./parser.js";
export { SchemaResolver, type ResolveResult } from "./resolver.js";
export { TypeModel, type TypeModelOptions } from "./type-model.js";
export { construct, get, toObject, type PlainObject, type PlainValue } from "./values.js";
export {
  validate,
  assertValid,
  type ExpectedType,
  type ValidationResult,
} from "./validator.js";
export {
  ValuePrinter,
  print,
  DEFAULT_MAX_DEPTH,
  ABSENT_MARKER,
  type PrintOptions,
} from "./printer.js";
export { TypeGenerator } from "./generators/type-generator.js";

import type { Diagnostic } from "./errors.js";
import { TypeGenerator } from "./generators/type-generator.js";
import { SchemaParser } from "./parser.js";
import { SchemaResolver } from "./resolver.js";
import { TypeModel } from "./type-model.js";
import type { ResolvedModule, SchemaAST } from "./types.js";

export interface LoadOptions {
  /** Modules already loaded; the new modules may refer to their types. */
  base?: TypeModel;
  /** Depth ceiling for printing; defaults to the base model's. */
  maxPrintDepth?: number;
}

export interface LoadResult {
  /** Base modules followed by the new ones. */
  model: TypeModel;
  /** Only the modules declared in the loaded text. */
  modules: ResolvedModule[];
  warnings: Diagnostic[];
}

export interface CompilerOutput extends LoadResult {
  /** Generated declarations, keyed by module name. */
  types: Record<string, string>;
}

/**
 * Runs lexing, parsing and resolution as one step. A failed load throws and
 * produces no model; the base model is never modified.
 */
export class SchemaLoader {
  private parser: SchemaParser;
  private typeGenerator: TypeGenerator;

  constructor() {
    this.parser = new SchemaParser();
    this.typeGenerator = new TypeGenerator();
  }

  load(source: string, options: LoadOptions = {}): LoadResult {
    return this.loadFromAST(this.parser.parse(source), options);
  }

  /**
   * Resolve an already parsed schema
   */
  loadFromAST(ast: SchemaAST, options: LoadOptions = {}): LoadResult {
    const base =
      options.base ?? TypeModel.empty({ maxPrintDepth: options.maxPrintDepth });
    const { modules, warnings } = new SchemaResolver(base.modules).resolve(ast);

    const model = new TypeModel([...base.modules, ...modules], {
      maxPrintDepth: options.maxPrintDepth ?? base.maxPrintDepth,
    });
    return { model, modules, warnings };
  }

  /**
   * Load and generate TypeScript declarations for the new modules
   */
  compile(source: string, options: LoadOptions = {}): CompilerOutput {
    const result = this.load(source, options);
    const types: Record<string, string> = {};
    for (const mod of result.modules) {
      types[mod.name] = this.typeGenerator.generateModule(mod);
    }
    return { ...result, types };
  }

  /**
   * Parse schema text without resolving it
   */
  parseSchema(source: string): SchemaAST {
    return this.parser.parse(source);
  }
}

/**
 * Convenience function to load schema text into a model in one call
 */
export function loadSchema(source: string, options: LoadOptions = {}): TypeModel {
  return new SchemaLoader().load(source, options).model;
}

/**
 * Convenience function to load schema text and generate declarations
 */
export function compile(source: string, options: LoadOptions = {}): CompilerOutput {
  return new SchemaLoader().compile(source, options);
}
