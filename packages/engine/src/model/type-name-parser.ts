/**
 * Type name parsing
 *
 * Parses catalog type strings into TypeRefs.
 *
 * Examples:
 * - "System.String"                                  → namedType
 * - "System.Collections.Generic.List`1"              → namedType (open definition)
 * - "System.Collections.Generic.List`1[System.Int32]" → namedType with arguments
 * - "System.Collections.Generic.List`1[[System.Int32, CoreLib]]" → same, assembly-qualified
 * - "List<int>"                                      → "List`1" with one argument
 * - "T" (in scope)                                   → genericParameter
 * - "T[]", "T[,]"                                    → arrayType
 * - "System.Int32&"                                  → byRefType
 */

import type { Result } from "../types/result.js";
import type { GenericParameterRef, TypeRef } from "./type-ref.js";
import { arrayType, byRefType, namedType } from "./type-ref.js";

/**
 * Generic parameters visible while parsing. Method-level parameters
 * shadow type-level parameters of the same name.
 */
export type GenericScope = {
  readonly method: readonly GenericParameterRef[];
  readonly type: readonly GenericParameterRef[];
};

export const emptyScope: GenericScope = { method: [], type: [] };

export type ParseTypeNameOptions = {
  readonly scope?: GenericScope;
  /** Maps a bare name ("int", "List`1") to a full name; undefined keeps it */
  readonly resolveName?: (name: string) => string | undefined;
};

const NAME_CHAR = /[A-Za-z0-9_.+$]/;

class TypeNameParser {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly options: ParseTypeNameOptions
  ) {}

  parse(): Result<TypeRef, string> {
    const result = this.parseType();
    if (!result.ok) return result;
    this.skipSpaces();
    if (this.pos < this.text.length) {
      return this.fail(`unexpected '${this.text[this.pos]}'`);
    }
    return result;
  }

  private parseType(): Result<TypeRef, string> {
    this.skipSpaces();
    const nameStart = this.pos;
    while (this.pos < this.text.length && NAME_CHAR.test(this.peek())) {
      this.pos++;
    }
    let name = this.text.slice(nameStart, this.pos);
    if (name.length === 0) {
      return this.fail("expected a type name");
    }

    let arity: number | undefined;
    if (this.peek() === "`") {
      this.pos++;
      const arityStart = this.pos;
      while (/[0-9]/.test(this.peek())) this.pos++;
      const digits = this.text.slice(arityStart, this.pos);
      if (digits.length === 0) return this.fail("expected generic arity");
      arity = parseInt(digits, 10);
      name = name + "`" + digits;
    }

    let typeArguments: readonly TypeRef[] = [];
    if (this.peek() === "<") {
      const args = this.parseArgumentList("<", ">");
      if (!args.ok) return args;
      typeArguments = args.value;
    } else if (this.peek() === "[" && !this.atArraySuffix()) {
      const args = this.parseArgumentList("[", "]");
      if (!args.ok) return args;
      typeArguments = args.value;
    }

    if (arity !== undefined && typeArguments.length > 0) {
      if (typeArguments.length !== arity) {
        return this.fail(
          `'${name}' expects ${arity} type argument(s), got ${typeArguments.length}`
        );
      }
    } else if (arity === undefined && typeArguments.length > 0) {
      name = `${name}\`${typeArguments.length}`;
    }

    let result: TypeRef;
    const inScope =
      arity === undefined && typeArguments.length === 0
        ? this.lookupGenericParameter(name)
        : undefined;
    if (inScope) {
      result = inScope;
    } else {
      const fullName = this.options.resolveName?.(name) ?? name;
      result = namedType(fullName, typeArguments);
    }

    // Suffixes: [] [,] &
    for (;;) {
      if (this.peek() === "[" && this.atArraySuffix()) {
        this.pos++;
        let rank = 1;
        while (this.peek() === ",") {
          rank++;
          this.pos++;
        }
        this.pos++; // ]
        result = arrayType(result, rank);
        continue;
      }
      if (this.peek() === "&") {
        this.pos++;
        result = byRefType(result);
        continue;
      }
      break;
    }

    return { ok: true, value: result };
  }

  private parseArgumentList(
    open: string,
    close: string
  ): Result<readonly TypeRef[], string> {
    this.pos++; // open
    const args: TypeRef[] = [];

    for (;;) {
      this.skipSpaces();
      let arg: Result<TypeRef, string>;
      if (open === "[" && this.peek() === "[") {
        // Assembly-qualified argument: [Name, Assembly]
        this.pos++;
        arg = this.parseType();
        if (!arg.ok) return arg;
        this.skipUntilClosingBracket();
      } else {
        arg = this.parseType();
        if (!arg.ok) return arg;
      }
      args.push(arg.value);

      this.skipSpaces();
      if (this.peek() === ",") {
        this.pos++;
        continue;
      }
      if (this.peek() === close) {
        this.pos++;
        return { ok: true, value: args };
      }
      return this.fail(`expected ',' or '${close}'`);
    }
  }

  /** At "[" followed only by commas and "]" */
  private atArraySuffix(): boolean {
    let i = this.pos + 1;
    while (this.text[i] === ",") i++;
    return this.text[i] === "]";
  }

  private skipUntilClosingBracket(): void {
    let depth = 0;
    while (this.pos < this.text.length) {
      const ch = this.peek();
      this.pos++;
      if (ch === "[") depth++;
      if (ch === "]") {
        if (depth === 0) return;
        depth--;
      }
    }
  }

  private lookupGenericParameter(
    name: string
  ): GenericParameterRef | undefined {
    const scope = this.options.scope ?? emptyScope;
    return (
      scope.method.find((p) => p.name === name) ??
      scope.type.find((p) => p.name === name)
    );
  }

  private skipSpaces(): void {
    while (this.peek() === " ") this.pos++;
  }

  private peek(): string {
    return this.text[this.pos] ?? "";
  }

  private fail(message: string): {
    readonly ok: false;
    readonly error: string;
  } {
    return {
      ok: false,
      error: `Invalid type name '${this.text}' at ${this.pos}: ${message}`,
    };
  }
}

/**
 * Parse a type string into a TypeRef.
 */
export const parseTypeName = (
  text: string,
  options: ParseTypeNameOptions = {}
): Result<TypeRef, string> => new TypeNameParser(text.trim(), options).parse();

/**
 * Strip the generic arity suffix: "List`1" → "List"
 */
export const stripArity = (name: string): string => {
  const tick = name.indexOf("`");
  return tick === -1 ? name : name.slice(0, tick);
};

/**
 * Split a full name into namespace and simple name.
 * Nested types ("Outer+Inner") keep the outer name in the simple name.
 */
export const splitFullName = (
  fullName: string
): { readonly namespace: string; readonly name: string } => {
  const plus = fullName.indexOf("+");
  const head = plus === -1 ? fullName : fullName.slice(0, plus);
  const dot = head.lastIndexOf(".");
  if (dot === -1) return { namespace: "", name: fullName };
  return { namespace: fullName.slice(0, dot), name: fullName.slice(dot + 1) };
};
