/**
 * Method Descriptors
 *
 * Transient views of catalog method entries bound to a declaring type.
 * Type-level generic parameters are substituted with the declaring type's
 * arguments; method-level generic parameters stay open until the method is
 * closed with closeGenericMethod.
 */

import type { Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { TypeRef, TypeSubstitution } from "../model/type-ref.js";
import { createSubstitution, substituteTypeRef } from "../model/type-ref.js";
import type { AttributeEntry, MethodEntry } from "../catalog/types.js";
import type { TypeDescriptor, TypeUniverse } from "./type-descriptor.js";

export type ParameterDescriptor = {
  readonly name: string;
  readonly position: number;
  readonly type: TypeDescriptor;
  /** Declared as one of the method's own open generic parameters */
  readonly isGenericPlaceholder: boolean;
  readonly isByRef: boolean;
  readonly isArray: boolean;
  readonly isOptional: boolean;
  readonly defaultValue?: unknown;
};

export type MethodDescriptor = {
  readonly descriptorKind: "method";
  readonly name: string;
  readonly declaringType: TypeDescriptor;
  readonly isConstructor: boolean;
  readonly isStatic: boolean;
  readonly isPublic: boolean;
  readonly parameters: readonly ParameterDescriptor[];
  /** Open placeholders, or the bound arguments once closed */
  readonly genericParameters: readonly TypeDescriptor[];
  readonly isGenericMethodDefinition: boolean;
  readonly returnType: TypeDescriptor;
  readonly attributes: readonly AttributeEntry[];
  readonly entry: MethodEntry;
};

export const isMethodDescriptor = (value: unknown): value is MethodDescriptor =>
  typeof value === "object" &&
  value !== null &&
  "descriptorKind" in value &&
  value.descriptorKind === "method";

const declaringTypeSubstitution = (
  declaringType: TypeDescriptor
): TypeSubstitution => {
  const entry = declaringType.entry;
  const ref = declaringType.ref;
  if (!entry || ref.kind !== "namedType" || ref.typeArguments.length === 0) {
    return new Map();
  }
  return (
    createSubstitution(
      "type",
      entry.genericParameters.map((p) => p.name),
      ref.typeArguments
    ) ?? new Map()
  );
};

const isOwnMethodParameter = (ref: TypeRef, entry: MethodEntry): boolean =>
  ref.kind === "genericParameter" &&
  ref.owner === "method" &&
  entry.genericParameters.some((g) => g.name === ref.name);

/**
 * Describe a method entry as seen from a declaring type.
 *
 * With methodTypeArguments the method comes back closed.
 */
export const describeMethod = (
  universe: TypeUniverse,
  declaringType: TypeDescriptor,
  entry: MethodEntry,
  methodTypeArguments?: readonly TypeDescriptor[]
): MethodDescriptor => {
  const subst = new Map(declaringTypeSubstitution(declaringType));
  if (methodTypeArguments) {
    const methodSubst = createSubstitution(
      "method",
      entry.genericParameters.map((g) => g.name),
      methodTypeArguments.map((a) => a.ref)
    );
    for (const [key, value] of methodSubst ?? []) {
      subst.set(key, value);
    }
  }

  const parameters = entry.parameters.map((p, position) => {
    const ref = substituteTypeRef(p.type, subst);
    const inner = ref.kind === "byRefType" ? ref.elementType : ref;
    return {
      name: p.name,
      position,
      type: universe.describe(ref),
      isGenericPlaceholder: isOwnMethodParameter(ref, entry),
      isByRef: ref.kind === "byRefType",
      isArray: inner.kind === "arrayType",
      isOptional: p.isOptional,
      ...(p.defaultValue !== undefined ? { defaultValue: p.defaultValue } : {}),
    };
  });

  const isClosed = methodTypeArguments !== undefined;

  return {
    descriptorKind: "method",
    name: entry.name,
    declaringType,
    isConstructor: entry.isConstructor,
    isStatic: entry.isStatic,
    isPublic: entry.isPublic,
    parameters,
    genericParameters: isClosed
      ? methodTypeArguments
      : entry.genericParameters.map((g) => universe.describe(g)),
    isGenericMethodDefinition: !isClosed && entry.genericParameters.length > 0,
    returnType: universe.describe(substituteTypeRef(entry.returnType, subst)),
    attributes: entry.attributes,
    entry,
  };
};

/**
 * Close a generic method definition with concrete type arguments.
 */
export const closeGenericMethod = (
  universe: TypeUniverse,
  method: MethodDescriptor,
  typeArguments: readonly TypeDescriptor[]
): Result<MethodDescriptor, Diagnostic> => {
  if (!method.isGenericMethodDefinition) {
    return {
      ok: false,
      error: createDiagnostic(
        "CLR3002",
        "error",
        `'${method.name}' is not a generic method definition`,
        { typeName: method.declaringType.fullName, memberName: method.name }
      ),
    };
  }

  const arity = method.entry.genericParameters.length;
  if (typeArguments.length !== arity) {
    return {
      ok: false,
      error: createDiagnostic(
        "CLR3002",
        "error",
        `'${method.name}' takes ${arity} generic argument(s), got ${typeArguments.length}`,
        { typeName: method.declaringType.fullName, memberName: method.name }
      ),
    };
  }

  return {
    ok: true,
    value: describeMethod(
      universe,
      method.declaringType,
      method.entry,
      typeArguments
    ),
  };
};

/**
 * Constructors and methods declared directly on a type.
 */
export const getDeclaredMembers = (
  universe: TypeUniverse,
  type: TypeDescriptor
): {
  readonly constructors: readonly MethodDescriptor[];
  readonly methods: readonly MethodDescriptor[];
} => {
  const entry = type.entry;
  if (!entry) return { constructors: [], methods: [] };

  return {
    constructors: entry.constructors.map((c) =>
      describeMethod(universe, type, c)
    ),
    methods: entry.methods.map((m) => describeMethod(universe, type, m)),
  };
};

/**
 * Identity of a signature for hiding: name, generic arity, parameter types.
 */
export const methodSignatureKey = (method: MethodDescriptor): string => {
  const arity = method.entry.genericParameters.length;
  const params = method.parameters.map((p) => p.type.key).join(",");
  return `${method.name}${arity > 0 ? `\`\`${arity}` : ""}(${params})`;
};
