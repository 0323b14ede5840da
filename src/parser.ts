/**
 * Schema Parser
 *
 * Recursive descent over the lexer's tokens:
 *
 *   schema   := module*
 *   module   := 'module' NAME '{' typedecl* '}'
 *   typedecl := NAME '=' ( '(' fields? ')' | sum )
 *   sum      := ctor ('|' ctor)* [ 'attributes' '(' fields? ')' ]
 *   ctor     := NAME [ '(' fields? ')' ]
 *   fields   := field (',' field)*
 *   field    := NAME ['*' | '?'] NAME
 */

import { ParseError, type SourcePosition } from "./errors.js";
import { tokenize, type Token, type TokenType } from "./lexer.js";
import type {
  ConstructorNode,
  FieldNode,
  ModuleNode,
  Multiplicity,
  SchemaAST,
  TypeDeclNode,
} from "./types.js";

export class SchemaParser {
  private tokens: Token[] = [];
  private pos = 0;

  /**
   * Parse schema text into an unresolved declaration tree
   */
  parse(source: string): SchemaAST {
    this.tokens = tokenize(source);
    this.pos = 0;

    const modules: ModuleNode[] = [];
    const seen = new Set<string>();

    while (!this.check("eof")) {
      const mod = this.parseModule();
      if (seen.has(mod.name)) {
        throw new ParseError(
          `Duplicate module "${mod.name}"`,
          mod.name,
          mod.position
        );
      }
      seen.add(mod.name);
      modules.push(mod);
    }

    return { modules };
  }

  private parseModule(): ModuleNode {
    const keyword = this.expect("module", "a module declaration");
    const name = this.expect("name", "a module name").value;
    this.expect("{", `"{" after module name`);

    const types: TypeDeclNode[] = [];
    const typeNames = new Set<string>();

    while (!this.check("}")) {
      const decl = this.parseTypeDecl(name);
      if (typeNames.has(decl.name)) {
        throw new ParseError(
          `Duplicate type "${decl.name}" in module "${name}"`,
          `${name}.${decl.name}`,
          decl.position
        );
      }
      typeNames.add(decl.name);
      types.push(decl);
    }
    this.expect("}", `"}" to close module "${name}"`);

    return { name, position: this.positionOf(keyword), types };
  }

  private parseTypeDecl(moduleName: string): TypeDeclNode {
    const nameToken = this.expect("name", "a type name");
    const name = nameToken.value;
    const position = this.positionOf(nameToken);
    const path = `${moduleName}.${name}`;
    this.expect("=", `"=" after type name "${name}"`);

    if (this.check("(")) {
      const fields = this.parseFieldList(path);
      return { kind: "product", name, position, fields };
    }

    const constructors: ConstructorNode[] = [];
    const ctorNames = new Set<string>();
    do {
      const ctor = this.parseConstructor(path);
      if (ctorNames.has(ctor.name)) {
        throw new ParseError(
          `Duplicate constructor "${ctor.name}" in type "${name}"`,
          `${path}.${ctor.name}`,
          ctor.position
        );
      }
      ctorNames.add(ctor.name);
      constructors.push(ctor);
    } while (this.match("|"));

    let attributes: FieldNode[] = [];
    if (this.match("attributes")) {
      attributes = this.parseFieldList(path);
      for (const ctor of constructors) {
        const own = new Set(ctor.fields.map((f) => f.name));
        const clash = attributes.find((attr) => own.has(attr.name));
        if (clash) {
          throw new ParseError(
            `Attribute "${clash.name}" duplicates a field of constructor "${ctor.name}"`,
            `${path}.${ctor.name}.${clash.name}`,
            clash.position
          );
        }
      }
    }

    return { kind: "sum", name, position, constructors, attributes };
  }

  private parseConstructor(typePath: string): ConstructorNode {
    const nameToken = this.expect("name", "a constructor name");
    const fields = this.check("(")
      ? this.parseFieldList(`${typePath}.${nameToken.value}`)
      : [];
    return {
      name: nameToken.value,
      position: this.positionOf(nameToken),
      fields,
    };
  }

  private parseFieldList(ownerPath: string): FieldNode[] {
    this.expect("(", `"("`);
    const fields: FieldNode[] = [];
    const names = new Set<string>();

    if (!this.check(")")) {
      do {
        const field = this.parseField();
        if (names.has(field.name)) {
          throw new ParseError(
            `Duplicate field "${field.name}"`,
            `${ownerPath}.${field.name}`,
            field.position
          );
        }
        names.add(field.name);
        fields.push(field);
      } while (this.match(","));
    }

    this.expect(")", `"," or ")" in field list`);
    return fields;
  }

  private parseField(): FieldNode {
    const typeToken = this.expect("name", "a field type");

    let multiplicity: Multiplicity = "single";
    if (this.match("*")) {
      multiplicity = "repeated";
    } else if (this.match("?")) {
      multiplicity = "optional";
    }

    const nameToken = this.expect("name", "a field name");
    return {
      name: nameToken.value,
      typeName: typeToken.value,
      multiplicity,
      position: this.positionOf(typeToken),
    };
  }

  // Token helpers

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (!this.check(type)) return false;
    this.pos++;
    return true;
  }

  private expect(type: TokenType, what: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      const found = token.type === "eof" ? "end of input" : `"${token.value}"`;
      throw new ParseError(
        `Expected ${what}, found ${found}`,
        "",
        this.positionOf(token)
      );
    }
    this.pos++;
    return token;
  }

  private positionOf(token: Token): SourcePosition {
    return { line: token.line, column: token.column };
  }
}

export function parseSchema(source: string): SchemaAST {
  return new SchemaParser().parse(source);
}
