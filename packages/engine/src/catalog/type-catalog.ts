/**
 * In-memory type catalog
 *
 * Merges catalog modules into one queryable store. When two modules
 * declare the same full name, the module listed first wins.
 */

import { matchAnyWildcard, matchWildcard } from "../model/wildcard.js";
import { stripArity } from "../model/type-name-parser.js";
import type {
  CatalogModule,
  InstanceMatch,
  ModuleHandle,
  TypeCatalog,
  TypeEntry,
  TypeFilter,
} from "./types.js";

const matchesFilter = (entry: TypeEntry, filter: TypeFilter): boolean => {
  if (filter.kind && entry.kind !== filter.kind) return false;

  if (
    filter.namePattern &&
    !matchAnyWildcard(filter.namePattern, [
      entry.name,
      stripArity(entry.name),
      entry.fullName,
    ])
  ) {
    return false;
  }

  if (filter.namespace && !matchWildcard(filter.namespace, entry.namespace)) {
    return false;
  }

  if (filter.attribute) {
    const pattern = filter.attribute;
    const hasAttribute = entry.attributes.some((a) =>
      matchAnyWildcard(pattern, [a.name, a.fullName])
    );
    if (!hasAttribute) return false;
  }

  return true;
};

/**
 * Number of prototype hops from value to ctor.prototype, or undefined.
 */
const prototypeDistance = (
  value: object,
  ctor: abstract new (...args: never[]) => unknown
): number | undefined => {
  let distance = 0;
  let proto: unknown = Object.getPrototypeOf(value);
  while (proto !== null && proto !== undefined) {
    if (proto === ctor.prototype) return distance;
    distance++;
    proto = Object.getPrototypeOf(proto);
  }
  return undefined;
};

export const createTypeCatalog = (
  modules: readonly CatalogModule[]
): TypeCatalog => {
  const entries = new Map<string, TypeEntry>();
  const handles: ModuleHandle[] = [];

  for (const module of modules) {
    let typeCount = 0;
    for (const entry of module.types) {
      if (entries.has(entry.fullName)) continue;
      entries.set(entry.fullName, entry);
      typeCount++;
    }
    handles.push({ name: module.name, typeCount });
  }

  const runtimeEntries = [...entries.values()].filter(
    (e) => e.runtime !== undefined
  );

  const findTypeOfInstance = (value: object): InstanceMatch | undefined => {
    let best: { entry: TypeEntry; distance: number } | undefined;

    for (const entry of runtimeEntries) {
      const runtime = entry.runtime;
      if (!runtime) continue;

      let distance: number | undefined;
      if (runtime.ctor) {
        distance = prototypeDistance(value, runtime.ctor);
      } else if (runtime.isInstance?.(value)) {
        // Predicate matches rank behind any constructor match
        distance = Number.MAX_SAFE_INTEGER;
      }

      if (distance === undefined) continue;
      if (!best || distance < best.distance) {
        best = { entry, distance };
      }
    }

    if (!best) return undefined;
    return {
      entry: best.entry,
      typeArguments: best.entry.runtime?.typeArgumentsOf?.(value) ?? [],
    };
  };

  return {
    listTypes: (filter) => {
      const all = [...entries.values()];
      return filter ? all.filter((e) => matchesFilter(e, filter)) : all;
    },
    getType: (fullName) => entries.get(fullName),
    getAssembliesByPattern: (pattern) =>
      handles.filter((h) => matchWildcard(pattern, h.name)),
    findTypeOfInstance,
  };
};
