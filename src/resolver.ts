/**
 * Schema Resolver
 *
 * Turns a parsed declaration tree into resolved, frozen modules:
 * - Type references (primitives, local types, earlier and loaded modules)
 * - Constructor tags and field indices
 * - Unguarded recursive embedding
 * - Naming conventions (warnings only)
 */

import {
  CycleError,
  ResolutionError,
  type Diagnostic,
  type SourcePosition,
} from "./errors.js";
import {
  isPrimitiveKind,
  type ConstructorDef,
  type FieldDef,
  type FieldNode,
  type ModuleNode,
  type ProductTypeDef,
  type ResolvedModule,
  type SchemaAST,
  type SumTypeDef,
  type TypeDef,
  type TypeRef,
} from "./types.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export interface ResolveResult {
  modules: ResolvedModule[];
  warnings: Diagnostic[];
}

export class SchemaResolver {
  constructor(private readonly loaded: readonly ResolvedModule[] = []) {}

  resolve(ast: SchemaAST): ResolveResult {
    const warnings: Diagnostic[] = [];
    const loadedNames = new Set(this.loaded.map((m) => m.name));
    const loadedScopes: ReadonlyArray<ReadonlyMap<string, TypeDef>> = this.loaded.map(
      (m) => new Map(m.types.map((t) => [t.name, t]))
    );
    // Modules declared earlier in this text, in text order.
    const textScopes: Array<ReadonlyMap<string, TypeDef>> = [];
    const resolved: ResolvedModule[] = [];
    const fresh: TypeDef[] = [];

    for (const mod of ast.modules) {
      if (loadedNames.has(mod.name)) {
        throw new ResolutionError(
          `Module "${mod.name}" is already loaded`,
          mod.name,
          mod.position
        );
      }

      const earlier = [...textScopes, ...loadedScopes];
      const shells = this.declare(mod, earlier, warnings);
      const scopes = [shells, ...earlier];
      for (const decl of mod.types) {
        const shell = shells.get(decl.name);
        if (!shell) continue;
        const path = `${mod.name}.${decl.name}`;

        if (decl.kind === "product" && shell.kind === "product") {
          shell.fields = decl.fields.map((f, i) =>
            this.resolveField(f, i, false, `${path}.${f.name}`, scopes)
          );
        } else if (decl.kind === "sum" && shell.kind === "sum") {
          shell.attributes = decl.attributes.map((f, i) =>
            this.resolveField(f, i, true, `${path}.${f.name}`, scopes)
          );
          shell.constructors = decl.constructors.map((ctor, tag) => {
            const ctorPath = `${path}.${ctor.name}`;
            const own = ctor.fields.map((f, i) =>
              this.resolveField(f, i, false, `${ctorPath}.${f.name}`, scopes)
            );
            const shared = shell.attributes.map((attr, i) => ({
              ...attr,
              index: own.length + i,
            }));
            const def: ConstructorDef = {
              name: ctor.name,
              tag,
              fields: [...own, ...shared],
              position: ctor.position,
            };
            return def;
          });
          shell.simple = shell.constructors.every((c) => c.fields.length === 0);

          for (const ctor of decl.constructors) {
            if (!/^[A-Z]/.test(ctor.name)) {
              warnings.push({
                severity: "warning",
                message: `Constructor "${ctor.name}" should start with an uppercase letter`,
                path: `${path}.${ctor.name}`,
                line: ctor.position.line,
                column: ctor.position.column,
              });
            }
          }
        }
      }

      const types = mod.types.flatMap((decl) => {
        const shell = shells.get(decl.name);
        return shell ? [shell] : [];
      });
      fresh.push(...types);
      resolved.push({ name: mod.name, types });
      textScopes.push(shells);
    }

    this.checkRepresentable(fresh);

    return { modules: resolved.map(freezeModule), warnings };
  }

  /**
   * Create an empty definition for every declared type so that fields can
   * refer to types declared later in the module.
   */
  private declare(
    mod: ModuleNode,
    earlier: ReadonlyArray<ReadonlyMap<string, TypeDef>>,
    warnings: Diagnostic[]
  ): Map<string, Mutable<SumTypeDef> | Mutable<ProductTypeDef>> {
    const shells = new Map<string, Mutable<SumTypeDef> | Mutable<ProductTypeDef>>();

    for (const decl of mod.types) {
      const path = `${mod.name}.${decl.name}`;
      if (isPrimitiveKind(decl.name)) {
        throw new ResolutionError(
          `Type "${decl.name}" redefines a primitive type`,
          path,
          decl.position,
          `Choose a different name like "${decl.name}_t"`
        );
      }

      const shadowed = earlier.find((scope) => scope.has(decl.name))?.get(decl.name);
      if (shadowed) {
        warnings.push({
          severity: "warning",
          message: `Type "${decl.name}" shadows "${shadowed.id}"`,
          path,
          line: decl.position.line,
          column: decl.position.column,
        });
      }

      const common = {
        id: path,
        name: decl.name,
        module: mod.name,
        position: decl.position,
      };
      shells.set(
        decl.name,
        decl.kind === "sum"
          ? { kind: "sum", ...common, constructors: [], attributes: [], simple: false }
          : { kind: "product", ...common, fields: [] }
      );
    }

    return shells;
  }

  private resolveField(
    field: FieldNode,
    index: number,
    shared: boolean,
    path: string,
    scopes: ReadonlyArray<ReadonlyMap<string, TypeDef>>
  ): FieldDef {
    return {
      name: field.name,
      index,
      type: this.resolveTypeName(field.typeName, path, field.position, scopes),
      multiplicity: field.multiplicity,
      shared,
      position: field.position,
    };
  }

  private resolveTypeName(
    name: string,
    path: string,
    position: SourcePosition,
    scopes: ReadonlyArray<ReadonlyMap<string, TypeDef>>
  ): TypeRef {
    if (isPrimitiveKind(name)) {
      return { kind: "primitive", name };
    }

    for (const scope of scopes) {
      const type = scope.get(name);
      if (type) return { kind: "declared", type };
    }

    throw new ResolutionError(
      `Unknown type "${name}"`,
      path,
      position,
      suggestTypeName(name, scopes)
    );
  }

  /**
   * Reject types that have no finite value.
   *
   * A product needs every single field to be representable; a sum needs at
   * least one constructor whose single fields all are. Repeated and optional
   * fields always are (empty, absent). Loaded modules were checked when they
   * were loaded.
   */
  private checkRepresentable(types: readonly TypeDef[]): void {
    const ok = new Set<TypeDef>();
    const fresh = new Set(types);
    const isOk = (field: FieldDef): boolean =>
      field.multiplicity !== "single" ||
      field.type.kind === "primitive" ||
      !fresh.has(field.type.type) ||
      ok.has(field.type.type);

    let changed = true;
    while (changed) {
      changed = false;
      for (const type of types) {
        if (ok.has(type)) continue;
        const representable =
          type.kind === "product"
            ? type.fields.every(isOk)
            : type.constructors.some((c) => c.fields.every(isOk));
        if (representable) {
          ok.add(type);
          changed = true;
        }
      }
    }

    const start = types.find((t) => !ok.has(t));
    if (!start) return;

    // Follow unrepresentable single edges until a type repeats.
    const path: TypeDef[] = [];
    let current: TypeDef = start;
    while (!path.includes(current)) {
      path.push(current);
      const fields =
        current.kind === "product" ? current.fields : current.constructors[0].fields;
      const next = fields.find((f) => !isOk(f))?.type;
      if (!next || next.kind !== "declared") {
        throw new CycleError([current.name], current.position);
      }
      current = next.type;
    }

    const cycle = path.slice(path.indexOf(current));
    throw new CycleError(
      [...cycle.map((t) => t.name), current.name],
      current.position
    );
  }
}

function suggestTypeName(
  invalidName: string,
  scopes: ReadonlyArray<ReadonlyMap<string, TypeDef>>
): string {
  const names = [
    ...new Set([...scopes.flatMap((s) => [...s.keys()]), "string", "int", "bool"]),
  ];
  const lower = invalidName.toLowerCase();
  const similar = names.filter(
    (name) =>
      name.toLowerCase().startsWith(lower) || lower.startsWith(name.toLowerCase())
  );

  if (similar.length > 0) {
    return `Did you mean "${similar[0]}"?`;
  }

  return `Available types: ${names.join(", ")}`;
}

function freezeModule(mod: ResolvedModule): ResolvedModule {
  for (const type of mod.types) {
    const fields =
      type.kind === "product"
        ? [type.fields]
        : [type.attributes, ...type.constructors.map((c) => c.fields)];
    for (const list of fields) {
      list.forEach((f) => Object.freeze(f));
      Object.freeze(list);
    }
    if (type.kind === "sum") {
      type.constructors.forEach((c) => Object.freeze(c));
      Object.freeze(type.constructors);
    }
    Object.freeze(type);
  }
  return Object.freeze({ name: mod.name, types: Object.freeze([...mod.types]) });
}
