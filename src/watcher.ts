/**
 * Schema File Watcher
 *
 * Watches schema files (and the configuration file, when given one) and
 * rebuilds the generated declarations whenever they change.
 */

import { existsSync, watch, type FSWatcher } from "fs";
import { relative, resolve } from "path";
import { buildSchemas, planBuild, type BuildPlan } from "./build.js";
import { DEFAULT_DEBOUNCE } from "./config.js";
import { SchemaError, formatDiagnostic } from "./errors.js";

export interface WatcherOptions {
  inputFile: string;
  outputDir?: string;
  onCompile?: (success: boolean, error?: Error) => void;
  /** Milliseconds; defaults to the configuration's `watch.debounce`. */
  debounce?: number;
}

export class SchemaWatcher {
  private watchers = new Map<string, FSWatcher>();
  private debounceTimer?: NodeJS.Timeout;
  private debounce: number;

  constructor(private options: WatcherOptions) {
    this.debounce = options.debounce ?? DEFAULT_DEBOUNCE;
  }

  start(): void {
    const { inputFile } = this.options;

    if (!existsSync(inputFile)) {
      throw new Error(`Schema file not found: ${inputFile}`);
    }

    console.log(`👀 Watching ${inputFile} for changes...`);

    // Initial compilation
    this.compileSchema();
  }

  /** Absolute paths of the files currently watched. */
  watchedFiles(): string[] {
    return [...this.watchers.keys()];
  }

  stop(): void {
    if (this.watchers.size > 0) {
      this.watchers.forEach((w) => w.close());
      this.watchers.clear();
      console.log("🛑 Stopped watching schema files");
    }
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = undefined;
    }
  }

  /**
   * Watch exactly `files`. The list changes when the configuration adds or
   * drops schemas; files that do not exist yet are picked up once a later
   * build lists them again.
   */
  private syncWatchers(files: string[]): void {
    const wanted = new Set(files.map((f) => resolve(f)).filter((f) => existsSync(f)));

    for (const [file, watcher] of this.watchers) {
      if (!wanted.has(file)) {
        watcher.close();
        this.watchers.delete(file);
      }
    }

    for (const file of wanted) {
      if (this.watchers.has(file)) continue;
      const watcher = watch(file, (eventType) => {
        if (eventType === "change") {
          this.scheduleCompile();
        }
      });
      this.watchers.set(file, watcher);
    }
  }

  /**
   * Recompile after the debounce interval; calls within the interval collapse
   * into one compilation.
   */
  scheduleCompile(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = undefined;
      console.log("📝 Schema changed, recompiling...");
      this.compileSchema();
    }, this.debounce);
  }

  private compileSchema(): void {
    const { inputFile, outputDir, onCompile } = this.options;

    let plan: BuildPlan;
    try {
      plan = planBuild(inputFile, outputDir, "./generated");
    } catch (error) {
      // Keep watching the input so that a fixed configuration is picked up.
      this.syncWatchers([inputFile]);
      this.fail(error, inputFile);
      return;
    }

    this.syncWatchers(plan.watchFiles);
    this.debounce = this.options.debounce ?? plan.debounce;

    try {
      const result = buildSchemas(plan.build);

      for (const { file, diagnostic } of result.warnings) {
        console.warn(`⚠️  ${formatDiagnostic(diagnostic, relative(process.cwd(), file))}`);
      }

      if (!result.ok) {
        console.error(
          "❌ Compilation failed:",
          formatDiagnostic(result.error.toDiagnostic(), relative(process.cwd(), result.file))
        );
        onCompile?.(false, result.error);
        return;
      }

      console.log("✅ Schema compiled successfully");
      for (const file of result.written) {
        console.log(`   → ${relative(process.cwd(), file)}`);
      }
      onCompile?.(true);
    } catch (error) {
      this.fail(error, inputFile);
    }
  }

  private fail(error: unknown, source: string): void {
    const failure = error instanceof Error ? error : new Error(String(error));
    const message =
      failure instanceof SchemaError
        ? formatDiagnostic(failure.toDiagnostic(), source)
        : failure.message;
    console.error("❌ Compilation failed:", message);
    this.options.onCompile?.(false, failure);
  }
}

/**
 * Start watching a schema file
 */
export function watchSchema(options: WatcherOptions): SchemaWatcher {
  const watcher = new SchemaWatcher(options);
  watcher.start();
  return watcher;
}

export interface WatchArgs {
  inputFile: string;
  outputDir?: string;
  debounce?: number;
}

/**
 * Read `<input> [output-dir] [--debounce <ms>]`; undefined when malformed.
 */
export function parseWatchArgs(argv: string[]): WatchArgs | undefined {
  const positional: string[] = [];
  let debounce: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--debounce") {
      const ms = Number(argv[++i]);
      if (!Number.isInteger(ms) || ms < 0) return undefined;
      debounce = ms;
    } else {
      positional.push(argv[i]);
    }
  }

  if (positional.length === 0 || positional.length > 2) return undefined;
  return { inputFile: positional[0], outputDir: positional[1], debounce };
}
