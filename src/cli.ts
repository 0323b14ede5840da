#!/usr/bin/env node
/**
 * Schema Compiler CLI
 *
 * Usage:
 *   asdl-compile <input.asdl|asdl.config.yaml> [output-dir]
 */

import { relative } from "path";
import { buildSchemas, planBuild } from "./build.js";
import { ConfigError, SchemaError, formatDiagnostic } from "./errors.js";

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.error("Usage: asdl-compile <input.asdl|asdl.config.yaml> [output-dir]");
    console.error("");
    console.error("Examples:");
    console.error("  asdl-compile arith.asdl");
    console.error("  asdl-compile asdl.config.yaml ./generated");
    process.exit(1);
  }

  const inputFile = args[0];
  const outputDir = args[1];

  try {
    const plan = planBuild(inputFile, outputDir);

    console.log(`Compiling ${plan.build.inputs.map((f) => relative(process.cwd(), f)).join(", ")}...`);
    const result = buildSchemas(plan.build);

    for (const { file, diagnostic } of result.warnings) {
      console.warn(`⚠ ${formatDiagnostic(diagnostic, relative(process.cwd(), file))}`);
    }

    if (!result.ok) {
      console.error(
        `✗ ${formatDiagnostic(result.error.toDiagnostic(), relative(process.cwd(), result.file))}`
      );
      process.exit(1);
    }

    for (const file of result.written) {
      console.log(`✓ Generated types: ${relative(process.cwd(), file)}`);
    }

    console.log("");
    console.log("✨ Compilation complete!");
  } catch (error) {
    if (error instanceof SchemaError) {
      console.error(`✗ ${formatDiagnostic(error.toDiagnostic(), inputFile)}`);
      if (error instanceof ConfigError) {
        for (const diagnostic of error.diagnostics) {
          console.error(`  ${formatDiagnostic(diagnostic, inputFile)}`);
        }
      }
    } else {
      console.error("Error:", error instanceof Error ? error.message : String(error));
    }
    process.exit(1);
  }
}

main();
