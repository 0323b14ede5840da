/**
 * TypeScript declaration generator
 *
 * Emits one declaration file per module describing the plain-object view of
 * its values (see `toObject`): an interface per constructor named
 * `<type>__<Constructor>` with a `_type` discriminant, a union per sum type,
 * a `<type>_e` tag table, and an interface per product type.
 */

import type { TypeModel } from "../type-model.js";
import type { FieldDef, ProductTypeDef, ResolvedModule, SumTypeDef } from "../types.js";

export class TypeGenerator {
  /**
   * Declarations for every module of the model, keyed by module name
   */
  generate(model: TypeModel): Record<string, string> {
    const output: Record<string, string> = {};
    for (const mod of model.modules) {
      output[mod.name] = this.generateModule(mod);
    }
    return output;
  }

  generateModule(mod: ResolvedModule): string {
    const lines: string[] = [];

    lines.push(`/**`);
    lines.push(` * Types for schema module "${mod.name}"`);
    lines.push(` * Generated by asdl-compile. Do not edit by hand.`);
    lines.push(` */`);
    lines.push("");

    const imports = this.foreignImports(mod);
    if (imports.length > 0) {
      lines.push(...imports);
      lines.push("");
    }

    for (const type of mod.types) {
      if (type.kind === "sum") {
        lines.push(...this.generateSum(type));
      } else {
        lines.push(...this.generateProduct(type));
      }
      lines.push("");
    }

    return lines.join("\n");
  }

  private generateSum(type: SumTypeDef): string[] {
    const lines: string[] = [];

    for (const ctor of type.constructors) {
      lines.push(`export interface ${type.name}__${ctor.name} {`);
      lines.push(`  readonly _type: "${ctor.name}";`);
      for (const field of ctor.fields) {
        lines.push(this.generateField(field));
      }
      lines.push(`}`);
      lines.push("");
    }

    const members = type.constructors.map((c) => `${type.name}__${c.name}`);
    lines.push(`export type ${type.name} =`);
    lines.push(...members.map((m, i) => `  | ${m}${i === members.length - 1 ? ";" : ""}`));
    lines.push("");

    lines.push(`export const ${type.name}_e = {`);
    for (const ctor of type.constructors) {
      lines.push(`  ${ctor.name}: ${ctor.tag},`);
    }
    lines.push(`} as const;`);

    return lines;
  }

  private generateProduct(type: ProductTypeDef): string[] {
    const lines = [`export interface ${type.name} {`];
    for (const field of type.fields) {
      lines.push(this.generateField(field));
    }
    lines.push(`}`);
    return lines;
  }

  private generateField(field: FieldDef): string {
    const base = this.mapType(field);
    switch (field.multiplicity) {
      case "repeated":
        return `  readonly ${field.name}: ${base}[];`;
      case "optional":
        return `  readonly ${field.name}: ${base} | null;`;
      case "single":
        return `  readonly ${field.name}: ${base};`;
    }
  }

  private mapType(field: FieldDef): string {
    const ref = field.type;
    if (ref.kind === "declared") {
      return ref.type.name;
    }

    switch (ref.name) {
      case "string":
        return "string";
      case "int":
        return "number";
      case "bool":
        return "boolean";
    }
  }

  private foreignImports(mod: ResolvedModule): string[] {
    const byModule = new Map<string, Set<string>>();
    for (const type of mod.types) {
      const fields =
        type.kind === "product" ? type.fields : type.constructors.flatMap((c) => c.fields);
      for (const field of fields) {
        if (field.type.kind !== "declared" || field.type.type.module === mod.name) continue;
        const names = byModule.get(field.type.type.module) ?? new Set<string>();
        names.add(field.type.type.name);
        byModule.set(field.type.type.module, names);
      }
    }

    return [...byModule.entries()].map(
      ([moduleName, names]) =>
        `import type { ${[...names].sort().join(", ")} } from "./${moduleName}.types.js";`
    );
  }
}
