/**
 * Schema Watcher Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { SchemaWatcher, parseWatchArgs } from "../src/watcher.js";
import { ConfigError, ParseError, ResolutionError } from "../src/errors.js";

describe("SchemaWatcher", () => {
  let dir: string;
  let watcher: SchemaWatcher | undefined;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "asdl-watch-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    watcher?.stop();
    watcher = undefined;
    vi.useRealTimers();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("should refuse a missing schema file", () => {
    watcher = new SchemaWatcher({ inputFile: join(dir, "missing.asdl") });

    expect(() => watcher?.start()).toThrow(
      `Schema file not found: ${join(dir, "missing.asdl")}`
    );
  });

  it("should compile once on start", () => {
    const input = join(dir, "loc.asdl");
    writeFileSync(input, "module loc { pos = (int line) }\n");
    const onCompile = vi.fn();

    watcher = new SchemaWatcher({ inputFile: input, outputDir: join(dir, "out"), onCompile });
    watcher.start();

    expect(onCompile).toHaveBeenCalledTimes(1);
    expect(onCompile).toHaveBeenCalledWith(true);
    expect(existsSync(join(dir, "out", "loc.types.ts"))).toBe(true);
  });

  it("should report a failed compilation", () => {
    const input = join(dir, "broken.asdl");
    writeFileSync(input, "module broken { t = }\n");
    const onCompile = vi.fn();

    watcher = new SchemaWatcher({ inputFile: input, outputDir: join(dir, "out"), onCompile });
    watcher.start();

    expect(onCompile).toHaveBeenCalledWith(false, expect.any(ParseError));
    expect(console.error).toHaveBeenCalled();
  });

  it("should collapse changes within the debounce interval", () => {
    vi.useFakeTimers();
    const input = join(dir, "loc.asdl");
    writeFileSync(input, "module loc { pos = (int line) }\n");
    const onCompile = vi.fn();

    watcher = new SchemaWatcher({
      inputFile: input,
      outputDir: join(dir, "out"),
      onCompile,
      debounce: 100,
    });
    watcher.start();
    onCompile.mockClear();

    watcher.scheduleCompile();
    vi.advanceTimersByTime(50);
    watcher.scheduleCompile();
    vi.advanceTimersByTime(99);
    expect(onCompile).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onCompile).toHaveBeenCalledTimes(1);
  });

  it("should not compile after stop", () => {
    vi.useFakeTimers();
    const input = join(dir, "loc.asdl");
    writeFileSync(input, "module loc { pos = (int line) }\n");
    const onCompile = vi.fn();

    watcher = new SchemaWatcher({ inputFile: input, outputDir: join(dir, "out"), onCompile });
    watcher.start();
    onCompile.mockClear();

    watcher.scheduleCompile();
    watcher.stop();
    vi.advanceTimersByTime(1000);

    expect(onCompile).not.toHaveBeenCalled();
  });

  it("should watch schemas added to the configuration", () => {
    vi.useFakeTimers();
    const config = join(dir, "asdl.config.yaml");
    writeFileSync(join(dir, "loc.asdl"), "module loc { pos = (int line) }\n");
    writeFileSync(join(dir, "tree.asdl"), "module tree { node = (pos at) }\n");
    writeFileSync(config, "schemas: [loc.asdl]\nwatch:\n  debounce: 10\n");
    const onCompile = vi.fn();

    watcher = new SchemaWatcher({ inputFile: config, outputDir: join(dir, "out"), onCompile });
    watcher.start();
    expect(watcher.watchedFiles()).toEqual([config, join(dir, "loc.asdl")]);

    writeFileSync(config, "schemas: [loc.asdl, tree.asdl]\nwatch:\n  debounce: 10\n");
    watcher.scheduleCompile();
    vi.advanceTimersByTime(10);

    expect(watcher.watchedFiles()).toEqual([config, join(dir, "loc.asdl"), join(dir, "tree.asdl")]);
    expect(existsSync(join(dir, "out", "tree.types.ts"))).toBe(true);

    writeFileSync(join(dir, "tree.asdl"), "module tree { node = (place at) }\n");
    onCompile.mockClear();
    watcher.scheduleCompile();
    vi.advanceTimersByTime(10);

    expect(onCompile).toHaveBeenCalledWith(false, expect.any(ResolutionError));
  });

  it("should drop schemas removed from the configuration", () => {
    vi.useFakeTimers();
    const config = join(dir, "asdl.config.yaml");
    writeFileSync(join(dir, "loc.asdl"), "module loc { pos = (int line) }\n");
    writeFileSync(join(dir, "ops.asdl"), "module ops { op = Add | Sub }\n");
    writeFileSync(config, "schemas: [loc.asdl, ops.asdl]\n");

    watcher = new SchemaWatcher({ inputFile: config, outputDir: join(dir, "out"), debounce: 5 });
    watcher.start();
    writeFileSync(config, "schemas: [ops.asdl]\n");
    watcher.scheduleCompile();
    vi.advanceTimersByTime(5);

    expect(watcher.watchedFiles()).toEqual([config, join(dir, "ops.asdl")]);
  });

  it("should recover once a missing schema is listed again after a failed start", () => {
    vi.useFakeTimers();
    const config = join(dir, "asdl.config.yaml");
    writeFileSync(config, "schemas: [loc.asdl]\n");
    const onCompile = vi.fn();

    watcher = new SchemaWatcher({
      inputFile: config,
      outputDir: join(dir, "out"),
      onCompile,
      debounce: 5,
    });
    watcher.start();

    expect(onCompile).toHaveBeenCalledWith(false, expect.any(Error));
    expect(watcher.watchedFiles()).toEqual([config]);

    writeFileSync(join(dir, "loc.asdl"), "module loc { pos = (int line) }\n");
    watcher.scheduleCompile();
    vi.advanceTimersByTime(5);

    expect(onCompile).toHaveBeenLastCalledWith(true);
    expect(watcher.watchedFiles()).toEqual([config, join(dir, "loc.asdl")]);
  });

  it("should keep watching a configuration that fails to parse", () => {
    const config = join(dir, "asdl.config.yaml");
    writeFileSync(config, "schemas: []\n");
    const onCompile = vi.fn();

    watcher = new SchemaWatcher({ inputFile: config, outputDir: join(dir, "out"), onCompile });
    watcher.start();

    expect(onCompile).toHaveBeenCalledWith(false, expect.any(ConfigError));
    expect(watcher.watchedFiles()).toEqual([config]);
  });
});

describe("parseWatchArgs", () => {
  it("should read the input, output directory and debounce", () => {
    expect(parseWatchArgs(["asdl.config.yaml", "out", "--debounce", "100"])).toEqual({
      inputFile: "asdl.config.yaml",
      outputDir: "out",
      debounce: 100,
    });
    expect(parseWatchArgs(["--debounce", "0", "arith.asdl"])).toEqual({
      inputFile: "arith.asdl",
      outputDir: undefined,
      debounce: 0,
    });
  });

  it("should reject malformed arguments", () => {
    expect(parseWatchArgs([])).toBeUndefined();
    expect(parseWatchArgs(["a.asdl", "out", "extra"])).toBeUndefined();
    expect(parseWatchArgs(["a.asdl", "--debounce"])).toBeUndefined();
    expect(parseWatchArgs(["a.asdl", "--debounce", "-5"])).toBeUndefined();
  });
});
