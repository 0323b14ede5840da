/**
 * Project Configuration
 *
 * Reads `asdl.config.yaml`:
 *
 *   schemas:
 *     - schemas/arith.asdl
 *   outputDir: generated
 *   printer:
 *     maxDepth: 256
 *   watch:
 *     debounce: 300
 */

import { readFileSync } from "fs";
import { dirname, resolve } from "path";
import { parse as parseYAML, YAMLParseError } from "yaml";
import { ConfigError, type Diagnostic } from "./errors.js";
import { DEFAULT_MAX_DEPTH } from "./printer.js";

export interface ProjectConfig {
  /** Schema files, loaded in order; each may use types of the ones before it. */
  schemas: string[];
  outputDir: string;
  /**
   * Becomes the `maxPrintDepth` of the model returned by `buildSchemas`. The
   * CLIs print no values, so only library callers of the build see it.
   */
  printer: { maxDepth: number };
  watch: { debounce: number };
}

export const DEFAULT_OUTPUT_DIR = "generated";
export const DEFAULT_DEBOUNCE = 300;

const KNOWN_KEYS = new Set(["schemas", "outputDir", "printer", "watch"]);

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/**
 * Parse configuration text. Relative paths are resolved against `baseDir`.
 *
 * @throws ConfigError listing every problem found
 */
export function parseConfig(content: string, baseDir: string = process.cwd()): ProjectConfig {
  let raw: unknown;
  try {
    raw = parseYAML(content);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      throw new ConfigError([
        {
          severity: "error",
          message: `Invalid YAML: ${error.message.split("\n")[0]}`,
          path: "",
          line: pos?.line,
          column: pos?.col,
        },
      ]);
    }
    throw error;
  }

  const errors: Diagnostic[] = [];
  const fail = (path: string, message: string, suggestion?: string): void => {
    errors.push({ severity: "error", message, path, suggestion });
  };

  if (!isRecord(raw)) {
    throw new ConfigError([
      { severity: "error", message: "Configuration must be a mapping", path: "" },
    ]);
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      fail(key, `Unknown configuration key "${key}"`, `Use one of: ${[...KNOWN_KEYS].join(", ")}`);
    }
  }

  const schemas: string[] = [];
  if (!Array.isArray(raw.schemas) || raw.schemas.length === 0) {
    fail("schemas", "At least one schema file is required", 'Add e.g. "schemas: [schema.asdl]"');
  } else {
    raw.schemas.forEach((entry: unknown, i) => {
      if (typeof entry === "string" && entry.length > 0) {
        schemas.push(resolve(baseDir, entry));
      } else {
        fail(`schemas[${i}]`, "Schema entry must be a file path");
      }
    });
  }

  let outputDir = resolve(baseDir, DEFAULT_OUTPUT_DIR);
  if (raw.outputDir !== undefined) {
    if (typeof raw.outputDir === "string" && raw.outputDir.length > 0) {
      outputDir = resolve(baseDir, raw.outputDir);
    } else {
      fail("outputDir", "outputDir must be a directory path");
    }
  }

  const maxDepth = readNumber(raw.printer, "maxDepth", "printer", DEFAULT_MAX_DEPTH, 1, fail);
  const debounce = readNumber(raw.watch, "debounce", "watch", DEFAULT_DEBOUNCE, 0, fail);

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return {
    schemas,
    outputDir,
    printer: { maxDepth },
    watch: { debounce },
  };
}

function readNumber(
  section: unknown,
  key: string,
  sectionName: string,
  fallback: number,
  min: number,
  fail: (path: string, message: string) => void
): number {
  if (section === undefined || section === null) return fallback;
  if (!isRecord(section)) {
    fail(sectionName, `${sectionName} must be a mapping`);
    return fallback;
  }

  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    fail(`${sectionName}.${key}`, `${sectionName}.${key} must be an integer >= ${min}`);
    return fallback;
  }
  return value;
}

/**
 * Read and parse a configuration file
 */
export function loadConfig(file: string): ProjectConfig {
  const content = readFileSync(file, "utf-8");
  return parseConfig(content, dirname(resolve(file)));
}
