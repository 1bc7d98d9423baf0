/**
 * Type References
 *
 * Structural, catalog-independent references to types. Catalog entries store
 * their base types, interfaces and member signatures as TypeRefs; the
 * descriptor layer binds them to a catalog.
 *
 * Examples:
 * - System.String             → { kind: "namedType", fullName: "System.String", typeArguments: [] }
 * - List`1 (definition)       → { kind: "namedType", fullName: "System.Collections.Generic.List`1", typeArguments: [] }
 * - List`1[System.Int32]      → { kind: "namedType", ..., typeArguments: [Int32] }
 * - T (method-level)          → { kind: "genericParameter", name: "T", owner: "method", position: 0 }
 * - T[]                       → { kind: "arrayType", elementType: T, rank: 1 }
 * - System.Int32&             → { kind: "byRefType", elementType: Int32 }
 */

export type NamedTypeRef = {
  readonly kind: "namedType";
  readonly fullName: string;
  /** Empty for non-generic types and for open generic definitions */
  readonly typeArguments: readonly TypeRef[];
};

export type GenericParameterOwner = "type" | "method";

export type GenericParameterRef = {
  readonly kind: "genericParameter";
  readonly name: string;
  readonly position: number;
  readonly owner: GenericParameterOwner;
  /** Upper bounds ("where T : ..."); empty means System.Object */
  readonly constraints: readonly TypeRef[];
};

export type ArrayTypeRef = {
  readonly kind: "arrayType";
  readonly elementType: TypeRef;
  readonly rank: number;
};

export type ByRefTypeRef = {
  readonly kind: "byRefType";
  readonly elementType: TypeRef;
};

/** Type of the null literal */
export type NullTypeRef = {
  readonly kind: "nullType";
};

export type TypeRef =
  | NamedTypeRef
  | GenericParameterRef
  | ArrayTypeRef
  | ByRefTypeRef
  | NullTypeRef;

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTORS
// ═══════════════════════════════════════════════════════════════════════════

export const namedType = (
  fullName: string,
  typeArguments: readonly TypeRef[] = []
): NamedTypeRef => ({ kind: "namedType", fullName, typeArguments });

export const genericParameter = (
  name: string,
  position: number,
  owner: GenericParameterOwner,
  constraints: readonly TypeRef[] = []
): GenericParameterRef => ({
  kind: "genericParameter",
  name,
  position,
  owner,
  constraints,
});

export const arrayType = (elementType: TypeRef, rank = 1): ArrayTypeRef => ({
  kind: "arrayType",
  elementType,
  rank,
});

export const byRefType = (elementType: TypeRef): ByRefTypeRef => ({
  kind: "byRefType",
  elementType,
});

export const nullType: NullTypeRef = { kind: "nullType" };

// ═══════════════════════════════════════════════════════════════════════════
// IDENTITY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Key for a generic parameter within a substitution map.
 * Type-level parameters use "!", method-level parameters "!!".
 */
export const genericParameterKey = (
  owner: GenericParameterOwner,
  name: string
): string => `${owner === "type" ? "!" : "!!"}${name}`;

/**
 * Stable identity key for a type reference.
 *
 * Two references denote the same type iff their keys are equal.
 */
export const typeRefKey = (ref: TypeRef): string => {
  switch (ref.kind) {
    case "namedType":
      return ref.typeArguments.length === 0
        ? ref.fullName
        : `${ref.fullName}[${ref.typeArguments.map(typeRefKey).join(",")}]`;
    case "genericParameter":
      return genericParameterKey(ref.owner, ref.name);
    case "arrayType":
      return `${typeRefKey(ref.elementType)}[${",".repeat(ref.rank - 1)}]`;
    case "byRefType":
      return `${typeRefKey(ref.elementType)}&`;
    case "nullType":
      return "null";
  }
};

export const typeRefsEqual = (a: TypeRef, b: TypeRef): boolean =>
  typeRefKey(a) === typeRefKey(b);

// ═══════════════════════════════════════════════════════════════════════════
// SUBSTITUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Map from generic parameter key (see genericParameterKey) to replacement.
 */
export type TypeSubstitution = ReadonlyMap<string, TypeRef>;

/**
 * Replace generic parameters with their bound types.
 * Parameters missing from the map are left as they are.
 */
export const substituteTypeRef = (
  ref: TypeRef,
  subst: TypeSubstitution
): TypeRef => {
  if (subst.size === 0) return ref;

  switch (ref.kind) {
    case "genericParameter":
      return subst.get(genericParameterKey(ref.owner, ref.name)) ?? ref;
    case "namedType":
      return ref.typeArguments.length === 0
        ? ref
        : namedType(
            ref.fullName,
            ref.typeArguments.map((a) => substituteTypeRef(a, subst))
          );
    case "arrayType":
      return arrayType(substituteTypeRef(ref.elementType, subst), ref.rank);
    case "byRefType":
      return byRefType(substituteTypeRef(ref.elementType, subst));
    case "nullType":
      return ref;
  }
};

/**
 * Build a substitution from parameter declarations to arguments.
 * Returns undefined on arity mismatch.
 */
export const createSubstitution = (
  owner: GenericParameterOwner,
  parameterNames: readonly string[],
  typeArguments: readonly TypeRef[]
): TypeSubstitution | undefined => {
  if (parameterNames.length !== typeArguments.length) return undefined;

  const subst = new Map<string, TypeRef>();
  parameterNames.forEach((name, i) => {
    const arg = typeArguments[i];
    if (arg) subst.set(genericParameterKey(owner, name), arg);
  });
  return subst;
};
