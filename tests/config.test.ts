/**
 * Project Configuration Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join, resolve } from "path";
import { DEFAULT_DEBOUNCE, DEFAULT_OUTPUT_DIR, loadConfig, parseConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { DEFAULT_MAX_DEPTH } from "../src/printer.js";
import { captureError } from "./helpers.js";

describe("parseConfig", () => {
  const baseDir = resolve("/project");

  it("should apply defaults", () => {
    const config = parseConfig("schemas:\n  - schemas/arith.asdl\n", baseDir);

    expect(config).toEqual({
      schemas: [resolve(baseDir, "schemas/arith.asdl")],
      outputDir: resolve(baseDir, DEFAULT_OUTPUT_DIR),
      printer: { maxDepth: DEFAULT_MAX_DEPTH },
      watch: { debounce: DEFAULT_DEBOUNCE },
    });
  });

  it("should read every setting", () => {
    const config = parseConfig(
      [
        "schemas:",
        "  - loc.asdl",
        "  - tree.asdl",
        "outputDir: out/types",
        "printer:",
        "  maxDepth: 64",
        "watch:",
        "  debounce: 0",
      ].join("\n"),
      baseDir
    );

    expect(config.schemas).toEqual([resolve(baseDir, "loc.asdl"), resolve(baseDir, "tree.asdl")]);
    expect(config.outputDir).toBe(resolve(baseDir, "out/types"));
    expect(config.printer.maxDepth).toBe(64);
    expect(config.watch.debounce).toBe(0);
  });

  it("should report every problem at once", () => {
    const error = captureError(
      () => parseConfig("schemas: []\nprinter:\n  maxDepth: 0\nextra: 1\n", baseDir),
      ConfigError
    );

    expect(error.message).toBe("Configuration is invalid with 3 error(s)");
    expect(error.diagnostics).toEqual([
      {
        severity: "error",
        message: 'Unknown configuration key "extra"',
        path: "extra",
        suggestion: "Use one of: schemas, outputDir, printer, watch",
      },
      {
        severity: "error",
        message: "At least one schema file is required",
        path: "schemas",
        suggestion: 'Add e.g. "schemas: [schema.asdl]"',
      },
      {
        severity: "error",
        message: "printer.maxDepth must be an integer >= 1",
        path: "printer.maxDepth",
      },
    ]);
  });

  it("should reject entries that are not paths", () => {
    const error = captureError(
      () => parseConfig("schemas:\n  - a.asdl\n  - 3\noutputDir: 5\n", baseDir),
      ConfigError
    );

    expect(error.diagnostics.map((d) => [d.path, d.message])).toEqual([
      ["schemas[1]", "Schema entry must be a file path"],
      ["outputDir", "outputDir must be a directory path"],
    ]);
  });

  it("should reject sections that are not mappings", () => {
    const error = captureError(
      () => parseConfig("schemas: [a.asdl]\nwatch: 5\n", baseDir),
      ConfigError
    );

    expect(error.diagnostics.map((d) => d.message)).toEqual(["watch must be a mapping"]);
  });

  it("should reject a document that is not a mapping", () => {
    const error = captureError(() => parseConfig("- a.asdl\n", baseDir), ConfigError);

    expect(error.diagnostics[0].message).toBe("Configuration must be a mapping");
  });

  it("should report YAML syntax errors", () => {
    const error = captureError(() => parseConfig("schemas: [a.asdl\n", baseDir), ConfigError);

    expect(error.diagnostics).toHaveLength(1);
    expect(error.diagnostics[0].message).toMatch(/^Invalid YAML: /);
  });
});

describe("loadConfig", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("should resolve paths against the configuration file's directory", () => {
    dir = mkdtempSync(join(tmpdir(), "asdl-config-"));
    const file = join(dir, "asdl.config.yaml");
    writeFileSync(file, "schemas:\n  - arith.asdl\noutputDir: gen\n");

    const config = loadConfig(file);

    expect(config.schemas).toEqual([join(dir, "arith.asdl")]);
    expect(config.outputDir).toBe(join(dir, "gen"));
  });
});
