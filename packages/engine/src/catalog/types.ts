/**
 * Type Catalog Type Definitions
 *
 * The catalog is the read-only store of type entries the engine resolves
 * against. It is an external collaborator: the engine never registers or
 * mutates types, it only queries them.
 *
 * Key Types:
 * - TypeEntry: one type (class, interface, struct, enum, delegate)
 * - MethodEntry: one method or constructor overload
 * - CatalogModule: a named group of types (the unit of loading)
 * - TypeCatalog: the query surface consumed by the engine
 */

import type { GenericParameterRef, TypeRef } from "../model/type-ref.js";
import type { MethodDescriptor } from "../descriptors/method-descriptor.js";

// ═══════════════════════════════════════════════════════════════════════════
// TYPE ENTRY
// ═══════════════════════════════════════════════════════════════════════════

export type TypeKind = "class" | "interface" | "struct" | "enum" | "delegate";

export type TypeEntry = {
  /** e.g. "System.Collections.Generic.List`1" */
  readonly fullName: string;
  /** e.g. "System.Collections.Generic" */
  readonly namespace: string;
  /** e.g. "List`1" */
  readonly name: string;
  readonly kind: TypeKind;
  /** Name of the module that contributed this type */
  readonly moduleName: string;
  readonly genericParameters: readonly GenericParameterRef[];
  /** Explicit base type; classes default to System.Object */
  readonly baseType?: TypeRef;
  /** Declared interfaces, in declaration order */
  readonly interfaces: readonly TypeRef[];
  readonly attributes: readonly AttributeEntry[];
  readonly constructors: readonly MethodEntry[];
  readonly methods: readonly MethodEntry[];
  readonly enumValues: readonly EnumValueEntry[];
  readonly isAbstract: boolean;
  readonly isSealed: boolean;
  readonly runtime?: RuntimeBinding;
};

export type AttributeEntry = {
  /** e.g. "ObsoleteAttribute" */
  readonly name: string;
  /** e.g. "System.ObsoleteAttribute" */
  readonly fullName: string;
};

export type EnumValueEntry = {
  readonly name: string;
  readonly value: number;
};

// ═══════════════════════════════════════════════════════════════════════════
// METHOD ENTRY
// ═══════════════════════════════════════════════════════════════════════════

export type MethodEntry = {
  /** ".ctor" for constructors */
  readonly name: string;
  readonly isConstructor: boolean;
  readonly isStatic: boolean;
  readonly isPublic: boolean;
  readonly genericParameters: readonly GenericParameterRef[];
  readonly parameters: readonly ParameterEntry[];
  readonly returnType: TypeRef;
  readonly attributes: readonly AttributeEntry[];
  readonly implementation?: MethodImplementation;
};

export type ParameterEntry = {
  readonly name: string;
  readonly type: TypeRef;
  readonly isOptional: boolean;
  readonly defaultValue?: unknown;
};

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME BINDING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * What the implementation receives when a method is invoked.
 *
 * `args` are already unwrapped and positionally aligned with the
 * method's parameters.
 */
export type MethodInvocation = {
  readonly target: unknown;
  readonly args: readonly unknown[];
  readonly method: MethodDescriptor;
};

export type MethodImplementation = (invocation: MethodInvocation) => unknown;

/**
 * Connects a catalog type to JavaScript values.
 */
export type RuntimeBinding = {
  /** Instances are recognised by `instanceof` */
  readonly ctor?: abstract new (...args: never[]) => unknown;
  /** Instances are recognised by predicate (used for primitives) */
  readonly isInstance?: (value: unknown) => boolean;
  /** Type arguments of a generic instance, e.g. the element type of a list */
  readonly typeArgumentsOf?: (value: unknown) => readonly TypeRef[];
  /** Builds an instance from a literal object, used when converting input */
  readonly fromObject?: (fields: Readonly<Record<string, unknown>>) => unknown;
};

// ═══════════════════════════════════════════════════════════════════════════
// CATALOG
// ═══════════════════════════════════════════════════════════════════════════

export type CatalogModule = {
  readonly name: string;
  readonly types: readonly TypeEntry[];
};

/**
 * Handle to a loaded module, returned by getAssembliesByPattern.
 */
export type ModuleHandle = {
  readonly name: string;
  readonly typeCount: number;
};

export type TypeFilter = {
  /** Wildcard pattern matched against the simple and the full name */
  readonly namePattern?: string;
  /** Wildcard pattern matched against the namespace */
  readonly namespace?: string;
  /** Wildcard pattern matched against attribute names */
  readonly attribute?: string;
  readonly kind?: TypeKind;
};

export type InstanceMatch = {
  readonly entry: TypeEntry;
  readonly typeArguments: readonly TypeRef[];
};

export type TypeCatalog = {
  readonly listTypes: (filter?: TypeFilter) => readonly TypeEntry[];
  readonly getType: (fullName: string) => TypeEntry | undefined;
  readonly getAssembliesByPattern: (pattern: string) => readonly ModuleHandle[];
  /** Most specific catalog type of a JavaScript object, if any */
  readonly findTypeOfInstance: (value: object) => InstanceMatch | undefined;
};

