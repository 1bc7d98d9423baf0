/**
 * Generic Method Binder/Invoker
 *
 * Picks the method to call from the runtime types of the supplied values,
 * infers the generic arguments of a generic method from its generic slots,
 * closes it and invokes it.
 *
 * A generic slot is a parameter declared as one of the method's own generic
 * parameters: `T`, `ref T`, or an array of it, `T[]`, which binds T to the
 * element type of the supplied array.
 */

import type { Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type {
  TypeDescriptor,
  TypeUniverse,
} from "../descriptors/type-descriptor.js";
import type {
  MethodDescriptor,
  ParameterDescriptor,
} from "../descriptors/method-descriptor.js";
import { closeGenericMethod } from "../descriptors/method-descriptor.js";
import { runtimeTypeOf } from "../runtime/runtime-values.js";
import { findMethods } from "./member-enumerator.js";
import { invokeMethod } from "./invoke.js";
import { renderSignature } from "./signature-renderer.js";

export type GenericInvokeRequest = {
  /** Instance to call on; ignored for static methods */
  readonly target: unknown;
  readonly declaringType: TypeDescriptor;
  readonly methodName: string;
  readonly arguments: readonly unknown[];
  /** Overrides the runtime types of the arguments */
  readonly explicitParameterTypes?: readonly TypeDescriptor[];
  readonly isStatic: boolean;
  /**
   * Methods to choose from, already filtered by the caller. Without it the
   * public members of the requested binding are enumerated.
   */
  readonly candidates?: readonly MethodDescriptor[];
};

// ═══════════════════════════════════════════════════════════════════════════
// GENERIC SLOTS
// ═══════════════════════════════════════════════════════════════════════════

type GenericSlot = {
  /** Key of the method generic parameter the slot declares */
  readonly placeholderKey: string;
  /** "element" slots are T[]: the supplied type must be an array */
  readonly shape: "direct" | "element";
};

const genericSlotOf = (
  method: MethodDescriptor,
  parameter: ParameterDescriptor
): GenericSlot | undefined => {
  const placeholderKeys = new Set(
    method.genericParameters.map((g) => g.key)
  );
  const declared =
    parameter.type.isByRef && parameter.type.elementType
      ? parameter.type.elementType
      : parameter.type;

  if (declared.isGenericParameter && placeholderKeys.has(declared.key)) {
    return { placeholderKey: declared.key, shape: "direct" };
  }

  const element = declared.elementType;
  if (
    declared.isArray &&
    element?.isGenericParameter &&
    placeholderKeys.has(element.key)
  ) {
    return { placeholderKey: element.key, shape: "element" };
  }

  return undefined;
};

/**
 * What a supplied type contributes to a slot, or undefined if it cannot fill it.
 * The null type binds as System.Object.
 */
const slotBinding = (
  universe: TypeUniverse,
  slot: GenericSlot,
  supplied: TypeDescriptor
): TypeDescriptor | undefined => {
  const type = supplied.isByRef && supplied.elementType ? supplied.elementType : supplied;
  if (slot.shape === "direct") {
    return type.kind === "null" ? universe.wellKnown.object : type;
  }
  if (!type.isArray || !type.elementType) return undefined;
  if (type.ref.kind === "arrayType" && type.ref.rank !== 1) return undefined;
  return type.elementType;
};

/**
 * Generic arguments for an open generic method, taken from the supplied
 * types at its generic slots. A generic parameter used by several slots
 * takes the type of its first slot. Fails when a generic parameter has no
 * slot or a slot cannot be filled.
 */
export const inferGenericArguments = (
  universe: TypeUniverse,
  method: MethodDescriptor,
  suppliedTypes: readonly TypeDescriptor[]
): Result<readonly TypeDescriptor[], string> => {
  const bound = new Map<string, TypeDescriptor>();

  for (const parameter of method.parameters) {
    const slot = genericSlotOf(method, parameter);
    if (!slot || bound.has(slot.placeholderKey)) continue;

    const supplied = suppliedTypes[parameter.position];
    if (!supplied) continue;

    const binding = slotBinding(universe, slot, supplied);
    if (!binding) {
      return {
        ok: false,
        error: `Parameter '${parameter.name}' needs an array, got ${supplied.fullName}`,
      };
    }
    bound.set(slot.placeholderKey, binding);
  }

  const typeArguments: TypeDescriptor[] = [];
  for (const placeholder of method.genericParameters) {
    const binding = bound.get(placeholder.key);
    if (!binding) {
      return {
        ok: false,
        error: `Generic parameter '${placeholder.name}' of '${method.name}' does not appear in a parameter slot`,
      };
    }
    typeArguments.push(binding);
  }
  return { ok: true, value: typeArguments };
};

// ═══════════════════════════════════════════════════════════════════════════
// CANDIDATE SELECTION
// ═══════════════════════════════════════════════════════════════════════════

const matchesExactly = (
  method: MethodDescriptor,
  suppliedTypes: readonly TypeDescriptor[]
): boolean =>
  method.parameters.length === suppliedTypes.length &&
  method.parameters.every(
    (p, i) => p.type.key === suppliedTypes[i]?.key
  );

/**
 * Every parameter is either exactly the supplied type or a generic slot,
 * and the generic arguments can be inferred.
 */
const acceptsTypes = (
  universe: TypeUniverse,
  method: MethodDescriptor,
  suppliedTypes: readonly TypeDescriptor[]
): readonly TypeDescriptor[] | undefined => {
  if (method.parameters.length !== suppliedTypes.length) return undefined;

  const shapeOk = method.parameters.every((p, i) => {
    const supplied = suppliedTypes[i];
    if (!supplied) return false;
    return (
      genericSlotOf(method, p) !== undefined || p.type.key === supplied.key
    );
  });
  if (!shapeOk) return undefined;

  const inferred = inferGenericArguments(universe, method, suppliedTypes);
  return inferred.ok ? inferred.value : undefined;
};

/**
 * Best candidate for the supplied types: an exact non-generic signature
 * first, then the accepting generic method with the fewest generic
 * parameters (ties keep declaration order).
 */
export const selectGenericCandidate = (
  universe: TypeUniverse,
  candidates: readonly MethodDescriptor[],
  suppliedTypes: readonly TypeDescriptor[]
): Result<MethodDescriptor, string> => {
  const exact = candidates.find(
    (m) => !m.isGenericMethodDefinition && matchesExactly(m, suppliedTypes)
  );
  if (exact) return { ok: true, value: exact };

  let best:
    | { method: MethodDescriptor; typeArguments: readonly TypeDescriptor[] }
    | undefined;

  for (const method of candidates) {
    if (!method.isGenericMethodDefinition) continue;
    const typeArguments = acceptsTypes(universe, method, suppliedTypes);
    if (!typeArguments) continue;
    if (!best || method.genericParameters.length < best.method.genericParameters.length) {
      best = { method, typeArguments };
    }
  }

  if (!best) return { ok: false, error: "no candidate accepts the argument types" };

  const closed = closeGenericMethod(universe, best.method, best.typeArguments);
  return closed.ok
    ? closed
    : { ok: false, error: closed.error.message };
};

// ═══════════════════════════════════════════════════════════════════════════
// INVOKE
// ═══════════════════════════════════════════════════════════════════════════

export type GenericInvocation = {
  readonly value: unknown;
  /** The closed method that was called */
  readonly method: MethodDescriptor;
};

export const invokeGeneric = async (
  universe: TypeUniverse,
  request: GenericInvokeRequest
): Promise<Result<GenericInvocation, Diagnostic>> => {
  const suppliedTypes =
    request.explicitParameterTypes ??
    request.arguments.map((value) => runtimeTypeOf(universe, value));

  const methods =
    request.candidates ??
    findMethods(universe, request.declaringType, request.methodName, {
      static: request.isStatic,
      instance: !request.isStatic,
      noWarn: true,
    }).methods;

  const selected = selectGenericCandidate(universe, methods, suppliedTypes);
  if (!selected.ok) {
    const argumentTypes = suppliedTypes.map((t) => t.fullName).join(", ");
    return {
      ok: false,
      error: createDiagnostic(
        "CLR3001",
        "error",
        `Cannot find a method '${request.methodName}' on '${request.declaringType.fullName}' for argument types (${argumentTypes})`,
        {
          typeName: request.declaringType.fullName,
          memberName: request.methodName,
          candidates: methods.map((m) => renderSignature(m, "full")),
        }
      ),
    };
  }

  const invoked = await invokeMethod(
    universe,
    selected.value,
    request.target,
    request.arguments
  );
  if (!invoked.ok) return invoked;
  return { ok: true, value: { value: invoked.value, method: selected.value } };
};
