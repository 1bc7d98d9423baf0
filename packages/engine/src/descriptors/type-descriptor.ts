/**
 * Type Descriptors
 *
 * A TypeDescriptor is the resolved, read-only view of a TypeRef against a
 * catalog: identity, base type, interfaces and generic parameters, with the
 * type's own generic arguments substituted through every relationship.
 *
 * Relationships are computed on first access, so catalogs with cycles
 * (System.String : IComparable<System.String>) can be described.
 *
 * INVARIANT: a closed generic has exactly as many generic arguments as its
 * definition has generic parameters. makeGenericType enforces this;
 * resolveTypeName rejects names that break it.
 */

import type { Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { TypeRef, TypeSubstitution } from "../model/type-ref.js";
import {
  arrayType,
  createSubstitution,
  namedType,
  nullType,
  substituteTypeRef,
  typeRefKey,
} from "../model/type-ref.js";
import { parseTypeName, splitFullName } from "../model/type-name-parser.js";
import type { AliasRegistry } from "../catalog/alias-registry.js";
import { createAliasRegistry } from "../catalog/alias-registry.js";
import type {
  AttributeEntry,
  TypeCatalog,
  TypeEntry,
  TypeKind,
} from "../catalog/types.js";

export type DescriptorKind =
  | TypeKind
  | "genericParameter"
  | "array"
  | "byRef"
  | "null"
  | "unknown";

export type TypeDescriptor = {
  readonly descriptorKind: "type";
  readonly ref: TypeRef;
  /** Identity key; equal keys mean the same type */
  readonly key: string;
  /** e.g. "System.Collections.Generic.List`1[System.String]" */
  readonly fullName: string;
  /** e.g. "List`1" */
  readonly name: string;
  readonly namespace: string;
  readonly kind: DescriptorKind;
  /** Catalog entry for named types; undefined for unknown names and non-named types */
  readonly entry: TypeEntry | undefined;
  readonly baseType: TypeDescriptor | undefined;
  /** Declared interfaces with generic arguments substituted */
  readonly interfaces: readonly TypeDescriptor[];
  readonly isGeneric: boolean;
  /** Parameters for a definition, arguments for a closed generic */
  readonly genericParameters: readonly TypeDescriptor[];
  readonly isGenericDefinition: boolean;
  readonly genericDefinition: TypeDescriptor | undefined;
  readonly isGenericParameter: boolean;
  /** Upper bounds of a generic parameter */
  readonly constraints: readonly TypeDescriptor[];
  readonly isArray: boolean;
  readonly isByRef: boolean;
  /** Element of an array or by-ref type */
  readonly elementType: TypeDescriptor | undefined;
  readonly isValueType: boolean;
  readonly attributes: readonly AttributeEntry[];
};

export type WellKnownTypes = {
  readonly object: TypeDescriptor;
  readonly valueType: TypeDescriptor;
  readonly enum: TypeDescriptor;
  readonly array: TypeDescriptor;
  readonly string: TypeDescriptor;
  readonly int32: TypeDescriptor;
  readonly int64: TypeDescriptor;
  readonly double: TypeDescriptor;
  readonly boolean: TypeDescriptor;
  readonly char: TypeDescriptor;
  readonly void: TypeDescriptor;
  readonly null: TypeDescriptor;
};

export type TypeUniverse = {
  readonly catalog: TypeCatalog;
  readonly describe: (ref: TypeRef) => TypeDescriptor;
  /** Named type by exact full name, if the catalog has it */
  readonly getType: (fullName: string) => TypeDescriptor | undefined;
  /** Parse and resolve a type name, aliases and short names included */
  readonly resolveTypeName: (text: string) => Result<TypeDescriptor, Diagnostic>;
  readonly makeGenericType: (
    definition: TypeDescriptor,
    typeArguments: readonly TypeDescriptor[]
  ) => Result<TypeDescriptor, Diagnostic>;
  /** Apply a substitution to a descriptor's reference */
  readonly substitute: (
    type: TypeDescriptor,
    subst: TypeSubstitution
  ) => TypeDescriptor;
  readonly wellKnown: WellKnownTypes;
};

export const isTypeDescriptor = (value: unknown): value is TypeDescriptor =>
  typeof value === "object" &&
  value !== null &&
  "descriptorKind" in value &&
  value.descriptorKind === "type";

// ═══════════════════════════════════════════════════════════════════════════
// UNIVERSE
// ═══════════════════════════════════════════════════════════════════════════

const lazy = <T>(compute: () => T): (() => T) => {
  let cell: { readonly value: T } | undefined;
  return () => {
    if (!cell) cell = { value: compute() };
    return cell.value;
  };
};

const OBJECT = "System.Object";

export const createTypeUniverse = (
  catalog: TypeCatalog,
  aliases: AliasRegistry = createAliasRegistry()
): TypeUniverse => {
  const cache = new Map<string, TypeDescriptor>();

  const describe = (ref: TypeRef): TypeDescriptor => {
    const key = typeRefKey(ref);
    // Same-named parameters of different methods may carry different bounds
    const cacheKey =
      ref.kind === "genericParameter"
        ? `${key}:${ref.constraints.map(typeRefKey).join("|")}`
        : key;
    const cached = cache.get(cacheKey);
    if (cached) return cached;
    const created = createDescriptor(ref, key);
    cache.set(cacheKey, created);
    return created;
  };

  const typeSubstitutionOf = (
    entry: TypeEntry,
    typeArguments: readonly TypeRef[]
  ): TypeSubstitution =>
    createSubstitution(
      "type",
      entry.genericParameters.map((p) => p.name),
      typeArguments
    ) ?? new Map();

  const describeNamedBase = (
    entry: TypeEntry,
    subst: TypeSubstitution
  ): TypeDescriptor | undefined => {
    if (entry.fullName === OBJECT || entry.kind === "interface") {
      return undefined;
    }
    if (entry.baseType) {
      return describe(substituteTypeRef(entry.baseType, subst));
    }
    switch (entry.kind) {
      case "struct":
        return describe(namedType("System.ValueType"));
      case "enum":
        return describe(namedType("System.Enum"));
      default:
        return describe(namedType(OBJECT));
    }
  };

  const createDescriptor = (ref: TypeRef, key: string): TypeDescriptor => {
    switch (ref.kind) {
      case "namedType": {
        const entry = catalog.getType(ref.fullName);
        const isGeneric = (entry?.genericParameters.length ?? 0) > 0;
        const isDefinition = isGeneric && ref.typeArguments.length === 0;
        const subst = entry
          ? typeSubstitutionOf(entry, ref.typeArguments)
          : new Map<string, TypeRef>();
        const split = splitFullName(ref.fullName);

        const baseType = lazy(() =>
          entry ? describeNamedBase(entry, subst) : undefined
        );
        const interfaces = lazy(() =>
          (entry?.interfaces ?? []).map((i) =>
            describe(substituteTypeRef(i, subst))
          )
        );
        const genericParameters = lazy(() => {
          if (!entry || !isGeneric) return [];
          return isDefinition
            ? entry.genericParameters.map((p) => describe(p))
            : ref.typeArguments.map((a) => describe(a));
        });
        const genericDefinition = lazy(() =>
          isGeneric ? describe(namedType(ref.fullName)) : undefined
        );

        return {
          descriptorKind: "type",
          ref,
          key,
          fullName: key,
          name: entry?.name ?? split.name,
          namespace: entry?.namespace ?? split.namespace,
          kind: entry?.kind ?? "unknown",
          entry,
          get baseType() {
            return baseType();
          },
          get interfaces() {
            return interfaces();
          },
          isGeneric,
          get genericParameters() {
            return genericParameters();
          },
          isGenericDefinition: isDefinition,
          get genericDefinition() {
            return genericDefinition();
          },
          isGenericParameter: false,
          constraints: [],
          isArray: false,
          isByRef: false,
          elementType: undefined,
          isValueType: entry?.kind === "struct" || entry?.kind === "enum",
          attributes: entry?.attributes ?? [],
        };
      }

      case "genericParameter": {
        const constraints = lazy(() => ref.constraints.map((c) => describe(c)));
        const baseType = lazy(
          () =>
            constraints().find(
              (c) => c.kind === "class" && c.fullName !== OBJECT
            ) ?? describe(namedType(OBJECT))
        );
        const interfaces = lazy(() =>
          constraints().filter((c) => c.kind === "interface")
        );

        return {
          descriptorKind: "type",
          ref,
          key,
          fullName: ref.name,
          name: ref.name,
          namespace: "",
          kind: "genericParameter",
          entry: undefined,
          get baseType() {
            return baseType();
          },
          get interfaces() {
            return interfaces();
          },
          isGeneric: false,
          genericParameters: [],
          isGenericDefinition: false,
          genericDefinition: undefined,
          isGenericParameter: true,
          get constraints() {
            return constraints();
          },
          isArray: false,
          isByRef: false,
          elementType: undefined,
          isValueType: false,
          attributes: [],
        };
      }

      case "arrayType": {
        const elementType = lazy(() => describe(ref.elementType));
        const interfaces = lazy(() => {
          // Single-dimension arrays implement IList<T>
          const listName = "System.Collections.Generic.IList`1";
          if (ref.rank !== 1 || !catalog.getType(listName)) return [];
          return [describe(namedType(listName, [ref.elementType]))];
        });

        return {
          descriptorKind: "type",
          ref,
          key,
          fullName: key,
          name: `${elementType().name}[${",".repeat(ref.rank - 1)}]`,
          namespace: elementType().namespace,
          kind: "array",
          entry: undefined,
          get baseType() {
            return describe(namedType("System.Array"));
          },
          get interfaces() {
            return interfaces();
          },
          isGeneric: false,
          genericParameters: [],
          isGenericDefinition: false,
          genericDefinition: undefined,
          isGenericParameter: false,
          constraints: [],
          isArray: true,
          isByRef: false,
          get elementType() {
            return elementType();
          },
          isValueType: false,
          attributes: [],
        };
      }

      case "byRefType": {
        const elementType = describe(ref.elementType);
        return {
          descriptorKind: "type",
          ref,
          key,
          fullName: key,
          name: `${elementType.name}&`,
          namespace: elementType.namespace,
          kind: "byRef",
          entry: undefined,
          baseType: undefined,
          interfaces: [],
          isGeneric: false,
          genericParameters: [],
          isGenericDefinition: false,
          genericDefinition: undefined,
          isGenericParameter: false,
          constraints: [],
          isArray: false,
          isByRef: true,
          elementType,
          isValueType: false,
          attributes: [],
        };
      }

      case "nullType":
        return {
          descriptorKind: "type",
          ref,
          key,
          fullName: "null",
          name: "null",
          namespace: "",
          kind: "null",
          entry: undefined,
          baseType: undefined,
          interfaces: [],
          isGeneric: false,
          genericParameters: [],
          isGenericDefinition: false,
          genericDefinition: undefined,
          isGenericParameter: false,
          constraints: [],
          isArray: false,
          isByRef: false,
          elementType: undefined,
          isValueType: false,
          attributes: [],
        };
    }
  };

  // ─────────────────────────────────────────────────────────────────────────
  // Name resolution
  // ─────────────────────────────────────────────────────────────────────────

  const resolveBareName = (name: string): string | undefined => {
    if (catalog.getType(name)) return name;

    const aliased = aliases.resolve(name);
    if (aliased) return aliased;

    const matches = catalog.listTypes({ namePattern: name });
    const [only] = matches;
    return matches.length === 1 && only ? only.fullName : undefined;
  };

  const checkResolved = (
    ref: TypeRef,
    text: string
  ): Diagnostic | undefined => {
    switch (ref.kind) {
      case "namedType": {
        const entry = catalog.getType(ref.fullName);
        if (!entry) {
          return createDiagnostic(
            "CLR5002",
            "error",
            `Type '${ref.fullName}' not found`,
            { typeName: text }
          );
        }
        const arity = entry.genericParameters.length;
        if (ref.typeArguments.length > 0 && ref.typeArguments.length !== arity) {
          return createDiagnostic(
            "CLR3002",
            "error",
            `'${entry.fullName}' takes ${arity} generic argument(s), got ${ref.typeArguments.length}`,
            { typeName: text }
          );
        }
        for (const arg of ref.typeArguments) {
          const problem = checkResolved(arg, text);
          if (problem) return problem;
        }
        return undefined;
      }
      case "arrayType":
      case "byRefType":
        return checkResolved(ref.elementType, text);
      case "genericParameter":
      case "nullType":
        return undefined;
    }
  };

  const resolveTypeName = (text: string): Result<TypeDescriptor, Diagnostic> => {
    const parsed = parseTypeName(text, { resolveName: resolveBareName });
    if (!parsed.ok) {
      return {
        ok: false,
        error: createDiagnostic("CLR5001", "error", parsed.error, {
          typeName: text,
        }),
      };
    }

    const problem = checkResolved(parsed.value, text);
    if (problem) return { ok: false, error: problem };

    return { ok: true, value: describe(parsed.value) };
  };

  const makeGenericType = (
    definition: TypeDescriptor,
    typeArguments: readonly TypeDescriptor[]
  ): Result<TypeDescriptor, Diagnostic> => {
    if (!definition.isGenericDefinition) {
      return {
        ok: false,
        error: createDiagnostic(
          "CLR3002",
          "error",
          `'${definition.fullName}' is not a generic type definition`,
          { typeName: definition.fullName }
        ),
      };
    }

    const arity = definition.genericParameters.length;
    if (typeArguments.length !== arity) {
      return {
        ok: false,
        error: createDiagnostic(
          "CLR3002",
          "error",
          `'${definition.fullName}' takes ${arity} generic argument(s), got ${typeArguments.length}`,
          { typeName: definition.fullName }
        ),
      };
    }

    const ref = definition.ref;
    if (ref.kind !== "namedType") {
      return {
        ok: false,
        error: createDiagnostic(
          "CLR3002",
          "error",
          `'${definition.fullName}' is not a named type`
        ),
      };
    }

    return {
      ok: true,
      value: describe(
        namedType(
          ref.fullName,
          typeArguments.map((a) => a.ref)
        )
      ),
    };
  };

  const named = (fullName: string): TypeDescriptor =>
    describe(namedType(fullName));

  const wellKnown: WellKnownTypes = {
    object: named(OBJECT),
    valueType: named("System.ValueType"),
    enum: named("System.Enum"),
    array: named("System.Array"),
    string: named("System.String"),
    int32: named("System.Int32"),
    int64: named("System.Int64"),
    double: named("System.Double"),
    boolean: named("System.Boolean"),
    char: named("System.Char"),
    void: named("System.Void"),
    null: describe(nullType),
  };

  return {
    catalog,
    describe,
    getType: (fullName) =>
      catalog.getType(fullName) ? named(fullName) : undefined,
    resolveTypeName,
    makeGenericType,
    substitute: (type, subst) => describe(substituteTypeRef(type.ref, subst)),
    wellKnown,
  };
};

/**
 * Array of the given element type.
 */
export const makeArrayType = (
  universe: TypeUniverse,
  elementType: TypeDescriptor,
  rank = 1
): TypeDescriptor => universe.describe(arrayType(elementType.ref, rank));
