/**
 * Error Types
 *
 * Every failure the loader or the value operations can produce is one of the
 * classes below. Each converts to a {@link Diagnostic} for tooling output.
 */

export type ErrorSeverity = "error" | "warning" | "info";

export interface SourcePosition {
  line: number;
  column: number;
}

export interface Diagnostic {
  severity: ErrorSeverity;
  message: string;
  path: string;
  line?: number;
  column?: number;
  suggestion?: string;
}

export type ErrorCode =
  | "LEX"
  | "PARSE"
  | "RESOLUTION"
  | "CYCLE"
  | "ARITY"
  | "TYPE_MISMATCH"
  | "FIELD_ACCESS"
  | "RECURSION_LIMIT"
  | "CONFIG";

export abstract class SchemaError extends Error {
  abstract readonly code: ErrorCode;

  constructor(
    message: string,
    public readonly path: string = "",
    public readonly position?: SourcePosition,
    public readonly suggestion?: string
  ) {
    super(message);
  }

  toDiagnostic(): Diagnostic {
    return {
      severity: "error",
      message: this.message,
      path: this.path,
      line: this.position?.line,
      column: this.position?.column,
      suggestion: this.suggestion,
    };
  }
}

// Schema loading

export class LexError extends SchemaError {
  readonly code = "LEX";

  constructor(message: string, position: SourcePosition) {
    super(message, "", position);
    this.name = "LexError";
  }
}

export class ParseError extends SchemaError {
  readonly code = "PARSE";

  constructor(message: string, path: string, position: SourcePosition) {
    super(message, path, position);
    this.name = "ParseError";
  }
}

export class ResolutionError extends SchemaError {
  readonly code = "RESOLUTION";

  constructor(
    message: string,
    path: string,
    position?: SourcePosition,
    suggestion?: string
  ) {
    super(message, path, position, suggestion);
    this.name = "ResolutionError";
  }
}

export class CycleError extends SchemaError {
  readonly code = "CYCLE";

  constructor(
    public readonly cycle: readonly string[],
    position?: SourcePosition
  ) {
    super(
      `Unguarded recursive embedding: ${cycle.join(" → ")}`,
      cycle[0] ?? "",
      position,
      "Make one of the fields on the cycle repeated (*) or optional (?)"
    );
    this.name = "CycleError";
  }
}

// Value operations

export class ArityError extends SchemaError {
  readonly code = "ARITY";

  constructor(message: string, path: string) {
    super(message, path);
    this.name = "ArityError";
  }
}

export class TypeMismatchError extends SchemaError {
  readonly code = "TYPE_MISMATCH";

  constructor(message: string, path: string) {
    super(path ? `${path}: ${message}` : message, path);
    this.name = "TypeMismatchError";
  }
}

export class FieldAccessError extends SchemaError {
  readonly code = "FIELD_ACCESS";

  constructor(message: string, path: string, suggestion?: string) {
    super(message, path, undefined, suggestion);
    this.name = "FieldAccessError";
  }
}

export class RecursionLimitError extends SchemaError {
  readonly code = "RECURSION_LIMIT";

  constructor(
    public readonly limit: number,
    path: string
  ) {
    super(`Value nesting exceeds the depth limit of ${limit}`, path);
    this.name = "RecursionLimitError";
  }
}

// Tooling

export class ConfigError extends SchemaError {
  readonly code = "CONFIG";

  constructor(public readonly diagnostics: Diagnostic[]) {
    super(
      `Configuration is invalid with ${diagnostics.length} error(s)`,
      diagnostics[0]?.path ?? ""
    );
    this.name = "ConfigError";
  }
}

/**
 * Render a diagnostic as `where:line:column: message [path] (suggestion)`.
 * `where` is the source file when given, otherwise the diagnostic's path.
 */
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  let location = source ?? diagnostic.path;
  if (diagnostic.line !== undefined) {
    location += `:${diagnostic.line}`;
    if (diagnostic.column !== undefined) {
      location += `:${diagnostic.column}`;
    }
  }

  const prefix = diagnostic.severity === "error" ? "" : `${diagnostic.severity}: `;
  let text = location
    ? `${location}: ${prefix}${diagnostic.message}`
    : `${prefix}${diagnostic.message}`;
  if (source !== undefined && diagnostic.path) {
    text += ` [${diagnostic.path}]`;
  }
  if (diagnostic.suggestion) {
    text += ` (${diagnostic.suggestion})`;
  }
  return text;
}
