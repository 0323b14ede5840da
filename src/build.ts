/**
 * Schema Build
 *
 * Loads schema files in order and writes one `<module>.types.ts` per module.
 * Shared by the compile CLI and the watcher.
 */

import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import { loadConfig, DEFAULT_DEBOUNCE } from "./config.js";
import { SchemaError, type Diagnostic } from "./errors.js";
import { SchemaLoader } from "./index.js";
import { TypeModel } from "./type-model.js";

export interface BuildOptions {
  /** Schema files; later files may use types declared in earlier ones. */
  inputs: string[];
  outputDir: string;
  /** Depth ceiling for `print` on the returned model. */
  maxPrintDepth?: number;
}

export interface FileDiagnostic {
  file: string;
  diagnostic: Diagnostic;
}

export type BuildResult =
  | { ok: true; model: TypeModel; written: string[]; warnings: FileDiagnostic[] }
  | { ok: false; file: string; error: SchemaError; warnings: FileDiagnostic[] };

/**
 * Load every input, then write the generated files. Nothing is written unless
 * every input loads.
 */
export function buildSchemas(options: BuildOptions): BuildResult {
  const loader = new SchemaLoader();
  let model = TypeModel.empty({ maxPrintDepth: options.maxPrintDepth });
  const warnings: FileDiagnostic[] = [];
  const outputs: Array<{ path: string; content: string }> = [];

  for (const file of options.inputs) {
    const source = readFileSync(file, "utf-8");
    try {
      const output = loader.compile(source, { base: model });
      model = output.model;
      warnings.push(...output.warnings.map((diagnostic) => ({ file, diagnostic })));
      for (const [moduleName, content] of Object.entries(output.types)) {
        outputs.push({ path: join(options.outputDir, `${moduleName}.types.ts`), content });
      }
    } catch (error) {
      if (error instanceof SchemaError) {
        return { ok: false, file, error, warnings };
      }
      throw error;
    }
  }

  mkdirSync(options.outputDir, { recursive: true });
  for (const output of outputs) {
    writeFileSync(output.path, output.content);
  }

  return { ok: true, model, written: outputs.map((o) => o.path), warnings };
}

export interface BuildPlan {
  build: BuildOptions;
  /** Files whose change should trigger a rebuild. */
  watchFiles: string[];
  debounce: number;
}

/**
 * Work out what to build from a command-line input: either a single schema
 * file or a YAML configuration file.
 */
export function planBuild(inputFile: string, outputDir?: string, defaultOutputDir?: string): BuildPlan {
  if (/\.ya?ml$/i.test(inputFile)) {
    const config = loadConfig(inputFile);
    return {
      build: {
        inputs: config.schemas,
        outputDir: outputDir ? resolve(outputDir) : config.outputDir,
        maxPrintDepth: config.printer.maxDepth,
      },
      watchFiles: [resolve(inputFile), ...config.schemas],
      debounce: config.watch.debounce,
    };
  }

  return {
    build: {
      inputs: [resolve(inputFile)],
      outputDir: resolve(outputDir ?? defaultOutputDir ?? dirname(inputFile)),
    },
    watchFiles: [resolve(inputFile)],
    debounce: DEFAULT_DEBOUNCE,
  };
}
