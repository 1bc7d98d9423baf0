/**
 * Assignability - can a value of one type be used where another is expected
 *
 * Conservative nominal check over the catalog: identity, System.Object,
 * null to reference types, generic parameter bounds, implicit numeric
 * widening, array covariance, then a walk over base types and interfaces.
 * Generic variance is not modelled; closed generics must match exactly.
 */

import type {
  TypeDescriptor,
  TypeUniverse,
} from "../descriptors/type-descriptor.js";
import { runtimeTypeOf, TypedValue } from "../runtime/runtime-values.js";

/**
 * Implicit numeric conversions: source → targets it widens to.
 */
const NUMERIC_WIDENING: ReadonlyMap<string, readonly string[]> = new Map([
  ["System.Char", ["System.Int32", "System.Int64", "System.Double"]],
  ["System.Int32", ["System.Int64", "System.Double"]],
  ["System.Int64", ["System.Double"]],
]);

const OBJECT = "System.Object";

/**
 * Every type reachable from `type` through base types and interfaces,
 * `type` itself first.
 */
export const collectSupertypes = (
  type: TypeDescriptor
): readonly TypeDescriptor[] => {
  const seen = new Set<string>();
  const result: TypeDescriptor[] = [];
  const queue: TypeDescriptor[] = [type];

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current || seen.has(current.key)) continue;
    seen.add(current.key);
    result.push(current);
    if (current.baseType) queue.push(current.baseType);
    queue.push(...current.interfaces);
  }

  return result;
};

export const isAssignableFrom = (
  target: TypeDescriptor,
  source: TypeDescriptor
): boolean => {
  if (target.key === source.key) return true;

  if (target.isByRef && target.elementType) {
    return isAssignableFrom(target.elementType, source);
  }
  if (source.isByRef && source.elementType) {
    return isAssignableFrom(target, source.elementType);
  }

  if (source.kind === "null") {
    return !target.isValueType;
  }

  if (target.fullName === OBJECT) return true;

  if (target.isGenericParameter) {
    return target.constraints.every((c) => isAssignableFrom(c, source));
  }

  if (NUMERIC_WIDENING.get(source.fullName)?.includes(target.fullName)) {
    return true;
  }

  if (target.isArray && source.isArray) {
    const targetElement = target.elementType;
    const sourceElement = source.elementType;
    if (!targetElement || !sourceElement) return false;
    if (target.ref.kind !== "arrayType" || source.ref.kind !== "arrayType") {
      return false;
    }
    if (target.ref.rank !== source.ref.rank) return false;
    if (targetElement.key === sourceElement.key) return true;
    // Covariance only between reference element types
    return (
      !targetElement.isValueType &&
      !sourceElement.isValueType &&
      isAssignableFrom(targetElement, sourceElement)
    );
  }

  return collectSupertypes(source).some((t) => t.key === target.key);
};

/**
 * Can this runtime value be passed for a parameter of the given type.
 */
export const isValueAssignable = (
  universe: TypeUniverse,
  value: unknown,
  target: TypeDescriptor
): boolean => {
  const raw = value instanceof TypedValue ? value.value : value;
  if (raw === null || raw === undefined) {
    const inner = target.isByRef ? target.elementType : target;
    return inner ? !inner.isValueType : true;
  }
  return isAssignableFrom(target, runtimeTypeOf(universe, value));
};
