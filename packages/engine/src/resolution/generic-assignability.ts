/**
 * Generic Assignability Tester
 *
 * Answers "can a value of this concrete type be used as this generic type",
 * e.g. is Box<String> an IContainer`1, and if so through which closed
 * interface (IContainer<String>).
 *
 * The walk goes up the base-type chain one step per iteration. At each type:
 * 1. the type itself, or its generic definition, equals the target
 * 2. one of its interfaces (transitively) has the target as definition
 * 3. one of its interfaces is the same generic family as a closed target
 *    and every generic argument fits
 * In strict mode a closed target that fails is retried once as its open
 * definition before moving to the base type.
 *
 * The first qualifying interface in declaration order wins; a type that
 * implements the same generic interface twice reports only the first.
 */

import type { Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import type {
  TypeDescriptor,
  TypeUniverse,
} from "../descriptors/type-descriptor.js";
import { isAssignableFrom } from "./assignability.js";

export type GenericAssignability = {
  readonly assignable: boolean;
  /** The closed interface through which the match was found */
  readonly matchedInterface?: TypeDescriptor;
};

/**
 * Upper limit on base-type steps (plus the strict retry) before giving up.
 */
export const MAX_GENERIC_WALK_DEPTH = 64;

const NOT_ASSIGNABLE: GenericAssignability = { assignable: false };

const isClosedGeneric = (type: TypeDescriptor): boolean =>
  type.isGeneric && !type.isGenericDefinition;

/**
 * Interfaces of a type and the interfaces they extend, depth first in
 * declaration order.
 */
const allInterfaces = (type: TypeDescriptor): readonly TypeDescriptor[] => {
  const seen = new Set<string>();
  const result: TypeDescriptor[] = [];

  const visit = (iface: TypeDescriptor): void => {
    if (seen.has(iface.key)) return;
    seen.add(iface.key);
    result.push(iface);
    iface.interfaces.forEach(visit);
  };

  type.interfaces.forEach(visit);
  return result;
};

const argumentFits = (
  targetArg: TypeDescriptor,
  actualArg: TypeDescriptor
): boolean => {
  if (targetArg.isGenericParameter) {
    // Unconstrained placeholders are bounded by System.Object
    return targetArg.constraints.every((bound) =>
      isAssignableFrom(bound, actualArg)
    );
  }
  return isAssignableFrom(targetArg, actualArg);
};

const sameFamilyArgumentsFit = (
  iface: TypeDescriptor,
  target: TypeDescriptor
): boolean => {
  const ifaceDefinition = iface.genericDefinition;
  const targetDefinition = target.genericDefinition;
  if (!ifaceDefinition || !targetDefinition) return false;
  if (ifaceDefinition.key !== targetDefinition.key) return false;

  const actualArgs = iface.genericParameters;
  const targetArgs = target.genericParameters;
  if (actualArgs.length !== targetArgs.length) return false;

  return targetArgs.every((targetArg, i) => {
    const actualArg = actualArgs[i];
    return actualArg !== undefined && argumentFits(targetArg, actualArg);
  });
};

const matchAt = (
  current: TypeDescriptor,
  target: TypeDescriptor
): GenericAssignability | undefined => {
  if (current.key === target.key) return { assignable: true };
  if (
    isClosedGeneric(current) &&
    current.genericDefinition?.key === target.key
  ) {
    return { assignable: true };
  }

  for (const iface of allInterfaces(current)) {
    if (iface.key === target.key || iface.genericDefinition?.key === target.key) {
      return { assignable: true, matchedInterface: iface };
    }
    if (isClosedGeneric(target) && sameFamilyArgumentsFit(iface, target)) {
      return { assignable: true, matchedInterface: iface };
    }
  }

  return undefined;
};

export const isAssignableToGeneric = (
  concreteType: TypeDescriptor,
  genericTarget: TypeDescriptor,
  strict = false
): GenericAssignability => {
  let current: TypeDescriptor | undefined = concreteType;
  let target = genericTarget;
  let retried = false;

  for (let depth = 0; current && depth < MAX_GENERIC_WALK_DEPTH; depth++) {
    const match = matchAt(current, target);
    if (match) return match;

    const openTarget = target.genericDefinition;
    if (strict && !retried && isClosedGeneric(target) && openTarget) {
      retried = true;
      target = openTarget;
      continue;
    }

    current = current.baseType;
  }

  return NOT_ASSIGNABLE;
};

/**
 * Name-based entry point: resolve both names, then test.
 */
export const testGenericAssignability = (
  universe: TypeUniverse,
  concreteTypeName: string,
  genericTypeName: string,
  strict = false
): Result<GenericAssignability, Diagnostic> => {
  const concrete = universe.resolveTypeName(concreteTypeName);
  if (!concrete.ok) return concrete;

  const target = universe.resolveTypeName(genericTypeName);
  if (!target.ok) return target;

  return {
    ok: true,
    value: isAssignableToGeneric(concrete.value, target.value, strict),
  };
};
