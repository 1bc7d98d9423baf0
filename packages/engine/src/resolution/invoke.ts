/**
 * Method invocation
 *
 * Checks the bound arguments against the method one last time, unwraps
 * TypedValue wrappers and calls the catalog implementation. Everything the
 * implementation throws comes back as a diagnostic with the error as cause.
 */

import type { Result } from "../types/result.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { TypeUniverse } from "../descriptors/type-descriptor.js";
import type { MethodDescriptor } from "../descriptors/method-descriptor.js";
import { InvocationArgumentError } from "../runtime/conversion.js";
import { formatValue, unwrapValue } from "../runtime/runtime-values.js";
import { isValueAssignable } from "./assignability.js";
import { renderSignature, renderTypeName } from "./signature-renderer.js";

const invocationError = (
  method: MethodDescriptor,
  code: DiagnosticCode,
  message: string,
  cause?: unknown
): { readonly ok: false; readonly error: Diagnostic } => {
  const diagnostic = createDiagnostic(code, "error", message, {
    typeName: method.declaringType.fullName,
    memberName: method.name,
    candidates: [renderSignature(method, "full")],
  });
  return {
    ok: false,
    error: cause === undefined ? diagnostic : { ...diagnostic, cause },
  };
};

const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

/**
 * Argument list padded with defaults for omitted optional parameters.
 */
const completeArguments = (
  method: MethodDescriptor,
  args: readonly unknown[]
): Result<readonly unknown[], string> => {
  const params = method.parameters;
  const required = params.filter((p) => !p.isOptional).length;

  if (args.length > params.length || args.length < required) {
    const expected =
      required === params.length
        ? `${params.length}`
        : `${required} to ${params.length}`;
    return {
      ok: false,
      error: `'${method.name}' takes ${expected} argument(s), got ${args.length}`,
    };
  }

  return {
    ok: true,
    value: params.map((p, i) =>
      i < args.length ? args[i] : (p.defaultValue ?? null)
    ),
  };
};

/**
 * Invoke a closed method.
 *
 * `target` is ignored for constructors and static methods.
 */
export const invokeMethod = async (
  universe: TypeUniverse,
  method: MethodDescriptor,
  target: unknown,
  args: readonly unknown[]
): Promise<Result<unknown, Diagnostic>> => {
  if (method.isGenericMethodDefinition) {
    return invocationError(
      method,
      "CLR3001",
      `Generic method '${method.name}' must be closed before it is invoked`
    );
  }

  const completed = completeArguments(method, args);
  if (!completed.ok) {
    return invocationError(method, "CLR4002", completed.error);
  }
  const fullArgs = completed.value;

  for (const parameter of method.parameters) {
    const arg = fullArgs[parameter.position];
    if (!isValueAssignable(universe, arg, parameter.type)) {
      return invocationError(
        method,
        "CLR4002",
        `Argument ${parameter.position + 1} ('${formatValue(arg)}') does not match parameter '${renderTypeName(parameter.type)} ${parameter.name}'`
      );
    }
  }

  const needsTarget = !method.isConstructor && !method.isStatic;
  const receiver = unwrapValue(target);
  if (needsTarget && (receiver === null || receiver === undefined)) {
    return invocationError(
      method,
      "CLR4002",
      `Instance method '${method.name}' needs a target instance`
    );
  }

  const implementation = method.entry.implementation;
  if (!implementation) {
    return invocationError(
      method,
      "CLR4003",
      `'${renderSignature(method, "full")}' has no implementation in the catalog`
    );
  }

  try {
    const value: unknown = await implementation({
      target: needsTarget ? receiver : undefined,
      args: fullArgs.map(unwrapValue),
      method,
    });
    return { ok: true, value };
  } catch (e) {
    if (e instanceof InvocationArgumentError || e instanceof TypeError) {
      return invocationError(
        method,
        "CLR4002",
        `Argument mismatch calling '${method.name}': ${errorMessage(e)}`,
        e
      );
    }
    return invocationError(
      method,
      "CLR4001",
      `'${method.name}' failed: ${errorMessage(e)}`,
      e
    );
  }
};
