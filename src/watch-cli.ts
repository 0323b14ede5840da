#!/usr/bin/env node
/**
 * Schema Watch CLI
 *
 * Usage:
 *   asdl-watch <input.asdl|asdl.config.yaml> [output-dir] [--debounce <ms>]
 */

import { SchemaError, formatDiagnostic } from "./errors.js";
import { parseWatchArgs, watchSchema } from "./watcher.js";

const USAGE = [
  "Usage: asdl-watch <input.asdl|asdl.config.yaml> [output-dir] [--debounce <ms>]",
  "",
  "Examples:",
  "  asdl-watch arith.asdl",
  "  asdl-watch asdl.config.yaml ./generated --debounce 100",
];

function main() {
  const args = parseWatchArgs(process.argv.slice(2));
  if (!args) {
    USAGE.forEach((line) => console.error(line));
    process.exit(1);
  }

  let builds = 0;
  let failures = 0;

  try {
    const watcher = watchSchema({
      ...args,
      onCompile: (success) => {
        builds++;
        if (!success) failures++;
      },
    });

    const shutdown = (signal: NodeJS.Signals) => {
      watcher.stop();
      console.log(`\n👋 ${signal}: stopped after ${builds} build(s), ${failures} failed`);
      process.exit(0);
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  } catch (error) {
    const message =
      error instanceof SchemaError
        ? formatDiagnostic(error.toDiagnostic(), args.inputFile)
        : error instanceof Error
          ? error.message
          : String(error);
    console.error(`✗ ${message}`);
    process.exit(1);
  }
}

main();
