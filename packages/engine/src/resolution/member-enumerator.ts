/**
 * Member Enumerator
 *
 * Lists the constructors and methods of a type that answer to a name
 * pattern, filtered by visibility, static/instance and attributes.
 *
 * Order: constructors, then the type's own methods in declaration order,
 * then inherited methods walking up the base chain. A derived method with
 * the same signature hides the base one. Constructors are never inherited.
 */

import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import { hasWildcards, matchAnyWildcard } from "../model/wildcard.js";
import { stripArity } from "../model/type-name-parser.js";
import type { AttributeEntry } from "../catalog/types.js";
import type {
  TypeDescriptor,
  TypeUniverse,
} from "../descriptors/type-descriptor.js";
import type { MethodDescriptor } from "../descriptors/method-descriptor.js";
import {
  getDeclaredMembers,
  methodSignatureKey,
} from "../descriptors/method-descriptor.js";

// ═══════════════════════════════════════════════════════════════════════════
// FLAGS
// ═══════════════════════════════════════════════════════════════════════════

export type VisibilityFlags = {
  readonly public?: boolean;
  readonly nonPublic?: boolean;
  readonly static?: boolean;
  readonly instance?: boolean;
  /** Include accessor-shaped names (get_X, set_X, add_X, remove_X) */
  readonly force?: boolean;
  /** Suppress the missing-constructor warning */
  readonly noWarn?: boolean;
};

export const DEFAULT_VISIBILITY: VisibilityFlags = {
  public: true,
  static: true,
  instance: true,
};

type NormalizedFlags = Required<VisibilityFlags>;

/**
 * Unset visibility means public; unset binding means static and instance.
 */
const normalizeFlags = (flags: VisibilityFlags): NormalizedFlags => {
  const anyVisibility = flags.public === true || flags.nonPublic === true;
  const anyBinding = flags.static === true || flags.instance === true;
  return {
    public: anyVisibility ? flags.public === true : true,
    nonPublic: flags.nonPublic === true,
    static: anyBinding ? flags.static === true : true,
    instance: anyBinding ? flags.instance === true : true,
    force: flags.force === true,
    noWarn: flags.noWarn === true,
  };
};

export type MemberLookup = {
  readonly methods: readonly MethodDescriptor[];
  readonly diagnostics: readonly Diagnostic[];
};

// ═══════════════════════════════════════════════════════════════════════════
// FILTERS
// ═══════════════════════════════════════════════════════════════════════════

const ACCESSOR_NAME = /^(get|set|add|remove)_/;

const CONSTRUCTOR_NAMES = [".ctor", "new"];

const simpleTypeName = (type: TypeDescriptor): string => {
  const name = stripArity(type.name);
  const plus = name.lastIndexOf("+");
  return plus === -1 ? name : name.slice(plus + 1);
};

const constructorNames = (type: TypeDescriptor): readonly string[] => [
  ...CONSTRUCTOR_NAMES,
  simpleTypeName(type),
];

const matchesName = (method: MethodDescriptor, pattern: string): boolean => {
  const qualified = `${simpleTypeName(method.declaringType)}.${method.name}`;
  return matchAnyWildcard(pattern, [method.name, qualified]);
};

const matchesVisibility = (
  method: MethodDescriptor,
  flags: NormalizedFlags
): boolean => (method.isPublic ? flags.public : flags.nonPublic);

const matchesBinding = (
  method: MethodDescriptor,
  flags: NormalizedFlags
): boolean => (method.isStatic ? flags.static : flags.instance);

const attributeNames = (attribute: AttributeEntry): readonly string[] => {
  const names = [attribute.name, attribute.fullName];
  if (attribute.name.endsWith("Attribute")) {
    names.push(attribute.name.slice(0, -"Attribute".length));
  }
  return names;
};

const matchesAttributes = (
  method: MethodDescriptor,
  attributeFilter: readonly string[] | undefined
): boolean => {
  if (!attributeFilter || attributeFilter.length === 0) return true;
  return attributeFilter.some((pattern) =>
    method.attributes.some((a) => matchAnyWildcard(pattern, attributeNames(a)))
  );
};

/**
 * The type followed by its ancestors: base chain for classes and structs,
 * extended interfaces for interfaces.
 */
const hierarchyOf = (type: TypeDescriptor): readonly TypeDescriptor[] => {
  const seen = new Set<string>();
  const result: TypeDescriptor[] = [];
  const queue: TypeDescriptor[] = [type];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current || seen.has(current.key)) continue;
    seen.add(current.key);
    result.push(current);
    if (current.kind === "interface") queue.push(...current.interfaces);
    else if (current.baseType) queue.push(current.baseType);
  }

  return result;
};

// ═══════════════════════════════════════════════════════════════════════════
// ENUMERATION
// ═══════════════════════════════════════════════════════════════════════════

const findConstructors = (
  universe: TypeUniverse,
  type: TypeDescriptor,
  namePattern: string,
  flags: NormalizedFlags,
  attributeFilter: readonly string[] | undefined
): MemberLookup => {
  if (!matchAnyWildcard(namePattern, constructorNames(type))) {
    return { methods: [], diagnostics: [] };
  }

  const constructors = getDeclaredMembers(universe, type).constructors.filter(
    (c) => matchesVisibility(c, flags) && matchesAttributes(c, attributeFilter)
  );

  // Only an explicit constructor request warns; "*" on an interface does not
  const explicitRequest = !hasWildcards(namePattern);
  if (constructors.length > 0 || !explicitRequest || flags.noWarn) {
    return { methods: constructors, diagnostics: [] };
  }

  return {
    methods: [],
    diagnostics: [
      createDiagnostic(
        "CLR1002",
        "warning",
        `Type '${type.fullName}' has no ${flags.nonPublic ? "" : "public "}constructors`,
        { typeName: type.fullName, memberName: namePattern },
        "Use the nonPublic flag to include non-public constructors"
      ),
    ],
  };
};

/**
 * Find the constructors and methods of a type matching a name pattern.
 */
export const findMethods = (
  universe: TypeUniverse,
  type: TypeDescriptor,
  namePattern: string,
  visibility: VisibilityFlags = DEFAULT_VISIBILITY,
  attributeFilter?: readonly string[]
): MemberLookup => {
  const flags = normalizeFlags(visibility);

  const constructors = findConstructors(
    universe,
    type,
    namePattern,
    flags,
    attributeFilter
  );

  const methods: MethodDescriptor[] = [];
  const seenSignatures = new Set<string>();

  for (const level of hierarchyOf(type)) {
    const declared = getDeclaredMembers(universe, level).methods;
    const levelSignatures: string[] = [];

    for (const method of declared) {
      const signature = methodSignatureKey(method);
      levelSignatures.push(signature);
      if (seenSignatures.has(signature)) continue;
      if (!flags.force && ACCESSOR_NAME.test(method.name)) continue;
      if (!matchesName(method, namePattern)) continue;
      if (!matchesVisibility(method, flags)) continue;
      if (!matchesBinding(method, flags)) continue;
      if (!matchesAttributes(method, attributeFilter)) continue;
      methods.push(method);
    }

    // Hiding applies whether or not the derived method passed the filters
    levelSignatures.forEach((s) => seenSignatures.add(s));
  }

  return {
    methods: [...constructors.methods, ...methods],
    diagnostics: constructors.diagnostics,
  };
};
