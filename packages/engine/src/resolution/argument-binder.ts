/**
 * Argument Binder
 *
 * Matches supplied values to a method's parameters, left to right:
 * 1. the first unused supplied value assignable to the parameter is taken
 * 2. otherwise the user is asked for a value; braces or brackets are read
 *    as a literal expression, anything else as text, and the result is
 *    converted to the parameter type
 *
 * A value that cannot be converted binds as null with a warning. The
 * invocation step decides whether that is fatal.
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
import type { Prompt } from "../prompt/types.js";
import {
  createOverloadChoiceSet,
  presentChoiceSet,
} from "../prompt/choice-set.js";
import { convertValue } from "../runtime/conversion.js";
import {
  evaluateLiteralExpression,
  isLiteralExpressionText,
} from "../runtime/literal-expression.js";
import { runtimeTypeOf } from "../runtime/runtime-values.js";
import { isValueAssignable } from "./assignability.js";
import { inferGenericArguments } from "./generic-binder.js";
import { renderSignature, renderTypeName } from "./signature-renderer.js";

export type BindingContext = {
  readonly universe: TypeUniverse;
  readonly prompt: Prompt;
  readonly log?: (message: string) => void;
};

export type BindingResult = {
  /** Closed when generic arguments could be inferred from the bound values */
  readonly method: MethodDescriptor;
  /** One value per parameter */
  readonly boundArguments: readonly unknown[];
  readonly closedGenericParameters: readonly TypeDescriptor[];
  /** Parameters whose value was read from the prompt */
  readonly promptedPositions: readonly number[];
  /** Parameters bound to null because conversion failed */
  readonly failedPositions: readonly number[];
  /** Supplied values no parameter took */
  readonly unusedArguments: readonly number[];
  readonly diagnostics: readonly Diagnostic[];
};

type PooledValue = {
  readonly value: unknown;
  readonly index: number;
};

const promptMessage = (
  method: MethodDescriptor,
  parameter: ParameterDescriptor
): string =>
  `${method.name}: ${renderTypeName(parameter.type)} ${parameter.name}`;

const readParameterValue = async (
  context: BindingContext,
  method: MethodDescriptor,
  parameter: ParameterDescriptor
): Promise<Result<unknown, string>> => {
  const line = await context.prompt.readLine(promptMessage(method, parameter));

  if (isLiteralExpressionText(line)) {
    const literal = evaluateLiteralExpression(line);
    if (!literal.ok) return literal;
    return convertValue(context.universe, literal.value, parameter.type);
  }
  return convertValue(context.universe, line, parameter.type);
};

/**
 * Close an open generic method from the bound values, if possible.
 */
const closeFromBoundValues = (
  universe: TypeUniverse,
  method: MethodDescriptor,
  boundArguments: readonly unknown[]
): { method: MethodDescriptor; closed: readonly TypeDescriptor[] } => {
  if (!method.isGenericMethodDefinition) {
    return { method, closed: [] };
  }
  const types = boundArguments.map((v) => runtimeTypeOf(universe, v));
  const inferred = inferGenericArguments(universe, method, types);
  if (!inferred.ok) return { method, closed: [] };

  const closed = closeGenericMethod(universe, method, inferred.value);
  return closed.ok
    ? { method: closed.value, closed: inferred.value }
    : { method, closed: [] };
};

/**
 * Bind supplied values to the parameters of one method.
 */
export const bindArguments = async (
  method: MethodDescriptor,
  suppliedArgs: readonly unknown[],
  context: BindingContext
): Promise<BindingResult> => {
  const { universe } = context;
  const pool: PooledValue[] = suppliedArgs.map((value, index) => ({
    value,
    index,
  }));

  const boundArguments: unknown[] = [];
  const promptedPositions: number[] = [];
  const failedPositions: number[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const parameter of method.parameters) {
    const taken = pool.findIndex((entry) =>
      isValueAssignable(universe, entry.value, parameter.type)
    );
    const entry = taken === -1 ? undefined : pool[taken];
    if (entry) {
      pool.splice(taken, 1);
      boundArguments.push(entry.value);
      continue;
    }

    if (parameter.isOptional && pool.length === 0) {
      boundArguments.push(parameter.defaultValue ?? null);
      continue;
    }

    promptedPositions.push(parameter.position);
    const read = await readParameterValue(context, method, parameter);
    if (read.ok) {
      boundArguments.push(read.value);
      continue;
    }

    boundArguments.push(null);
    failedPositions.push(parameter.position);
    diagnostics.push(
      createDiagnostic(
        "CLR2001",
        "warning",
        `Parameter '${parameter.name}' of '${method.name}' bound to null: ${read.error}`,
        {
          typeName: method.declaringType.fullName,
          memberName: method.name,
        }
      )
    );
  }

  const closed = closeFromBoundValues(universe, method, boundArguments);
  context.log?.(
    `bound ${renderSignature(closed.method, "simple")}` +
      (promptedPositions.length > 0
        ? ` (prompted for ${promptedPositions.length})`
        : "")
  );

  return {
    method: closed.method,
    boundArguments,
    closedGenericParameters: closed.closed,
    promptedPositions,
    failedPositions,
    unusedArguments: pool.map((p) => p.index),
    diagnostics,
  };
};

/**
 * Pick one of several overloads through the prompt. A single candidate is
 * returned without asking.
 */
export const selectOverload = async (
  candidates: readonly MethodDescriptor[],
  context: BindingContext
): Promise<Result<MethodDescriptor, Diagnostic>> => {
  const [first] = candidates;
  if (!first) {
    return {
      ok: false,
      error: createDiagnostic("CLR1001", "error", "No overloads to choose from"),
    };
  }
  if (candidates.length === 1) return { ok: true, value: first };

  const details = {
    typeName: first.declaringType.fullName,
    memberName: first.name,
    candidates: candidates.map((m) => renderSignature(m, "simple")),
  };

  context.log?.(
    `${candidates.length} overloads of '${first.name}' match; asking`
  );

  const [selected] = await presentChoiceSet(
    context.prompt,
    createOverloadChoiceSet(candidates)
  );
  if (!selected) {
    return {
      ok: false,
      error: createDiagnostic(
        "CLR1004",
        "error",
        `No overload of '${first.name}' was chosen`,
        details
      ),
    };
  }
  return { ok: true, value: selected };
};
