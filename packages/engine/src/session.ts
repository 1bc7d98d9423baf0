/**
 * Resolution session and the resolveAndInvoke entry point
 *
 * A session ties together what one caller resolves against: the catalog,
 * the alias registry, the prompt and the rebind limit. Sessions hold no
 * per-call state, so one session serves any number of sequential calls.
 */

import type { Result } from "./types/result.js";
import type { Diagnostic } from "./types/diagnostic.js";
import { createDiagnostic } from "./types/diagnostic.js";
import type { AliasRegistry } from "./catalog/alias-registry.js";
import { createAliasRegistry } from "./catalog/alias-registry.js";
import type { TypeCatalog } from "./catalog/types.js";
import type {
  TypeDescriptor,
  TypeUniverse,
} from "./descriptors/type-descriptor.js";
import { createTypeUniverse, isTypeDescriptor } from "./descriptors/type-descriptor.js";
import type { MethodDescriptor } from "./descriptors/method-descriptor.js";
import { isMethodDescriptor } from "./descriptors/method-descriptor.js";
import type { Prompt } from "./prompt/types.js";
import { runtimeTypeOf } from "./runtime/runtime-values.js";
import { isValueAssignable } from "./resolution/assignability.js";
import type { BindingContext, BindingResult } from "./resolution/argument-binder.js";
import { bindArguments, selectOverload } from "./resolution/argument-binder.js";
import { invokeGeneric } from "./resolution/generic-binder.js";
import { invokeMethod } from "./resolution/invoke.js";
import type { VisibilityFlags } from "./resolution/member-enumerator.js";
import { findMethods } from "./resolution/member-enumerator.js";
import { renderSignature } from "./resolution/signature-renderer.js";

export const DEFAULT_MAX_REBIND_ATTEMPTS = 3;

export type SessionOptions = {
  readonly catalog: TypeCatalog;
  readonly prompt: Prompt;
  readonly aliases?: AliasRegistry;
  readonly maxRebindAttempts?: number;
  /** Verbose trace of the resolution steps */
  readonly log?: (message: string) => void;
};

export type ResolutionSession = {
  readonly universe: TypeUniverse;
  readonly aliases: AliasRegistry;
  readonly prompt: Prompt;
  readonly maxRebindAttempts: number;
  readonly log: (message: string) => void;
};

export const createResolutionSession = (
  options: SessionOptions
): ResolutionSession => {
  const aliases = options.aliases ?? createAliasRegistry();
  const maxRebindAttempts = options.maxRebindAttempts ?? DEFAULT_MAX_REBIND_ATTEMPTS;
  if (!Number.isInteger(maxRebindAttempts) || maxRebindAttempts < 1) {
    throw new RangeError(
      `maxRebindAttempts must be a positive integer, got ${maxRebindAttempts}`
    );
  }

  return {
    universe: createTypeUniverse(options.catalog, aliases),
    aliases,
    prompt: options.prompt,
    maxRebindAttempts,
    log: options.log ?? (() => undefined),
  };
};

// ═══════════════════════════════════════════════════════════════════════════
// REQUEST / OUTCOME
// ═══════════════════════════════════════════════════════════════════════════

export type InvokeRequest = {
  /** Instance for instance members; ignored for static members and constructors */
  readonly target?: unknown;
  /** A member name (wildcards allowed) or a method descriptor to call directly */
  readonly member: string | MethodDescriptor;
  readonly arguments: readonly unknown[];
  readonly isStatic: boolean;
  /**
   * Type to search. Defaults to the runtime type of the target.
   * Type names are resolved through the session's aliases.
   */
  readonly declaringType?: TypeDescriptor | string;
  readonly visibility?: VisibilityFlags;
  readonly attributeFilter?: readonly string[];
};

export type InvokeOutcome = {
  readonly value: unknown;
  readonly method: MethodDescriptor;
  /** Warnings and notes collected on the way */
  readonly diagnostics: readonly Diagnostic[];
};

type Failure = { readonly ok: false; readonly error: Diagnostic };

const fail = (error: Diagnostic): Failure => ({ ok: false, error });

const bindingContext = (session: ResolutionSession): BindingContext => ({
  universe: session.universe,
  prompt: session.prompt,
  log: session.log,
});

// ═══════════════════════════════════════════════════════════════════════════
// STEPS
// ═══════════════════════════════════════════════════════════════════════════

const resolveDeclaringType = (
  session: ResolutionSession,
  request: InvokeRequest
): Result<TypeDescriptor, Diagnostic> => {
  const declared = request.declaringType;
  if (isTypeDescriptor(declared)) return { ok: true, value: declared };
  if (typeof declared === "string") {
    return session.universe.resolveTypeName(declared);
  }
  if (request.target === undefined || request.target === null) {
    return fail(
      createDiagnostic(
        "CLR1001",
        "error",
        "A declaring type or a target instance is required"
      )
    );
  }
  return { ok: true, value: runtimeTypeOf(session.universe, request.target) };
};

const acceptsAll = (
  universe: TypeUniverse,
  method: MethodDescriptor,
  args: readonly unknown[]
): boolean =>
  method.parameters.length === args.length &&
  method.parameters.every((p, i) => isValueAssignable(universe, args[i], p.type));

const matchesExactly = (
  universe: TypeUniverse,
  method: MethodDescriptor,
  args: readonly unknown[]
): boolean =>
  !method.isGenericMethodDefinition &&
  method.parameters.length === args.length &&
  method.parameters.every(
    (p, i) => p.type.key === runtimeTypeOf(universe, args[i]).key
  );

/**
 * Candidates offered when more than one overload remains: the ones that
 * take every argument as given, or all of them when none does.
 */
const narrowCandidates = (
  universe: TypeUniverse,
  candidates: readonly MethodDescriptor[],
  args: readonly unknown[]
): readonly MethodDescriptor[] => {
  const full = candidates.filter((m) => acceptsAll(universe, m, args));
  return full.length > 0 ? full : candidates;
};

/**
 * Bind to a chosen overload; while slots fail and there is a choice to
 * make, ask again.
 */
const chooseAndBind = async (
  session: ResolutionSession,
  candidates: readonly MethodDescriptor[],
  args: readonly unknown[],
  diagnostics: Diagnostic[]
): Promise<Result<BindingResult, Diagnostic>> => {
  const context = bindingContext(session);
  let lastFailure: BindingResult | undefined;

  for (let attempt = 1; attempt <= session.maxRebindAttempts; attempt++) {
    const chosen = await selectOverload(candidates, context);
    if (!chosen.ok) return chosen;

    const binding = await bindArguments(chosen.value, args, context);
    diagnostics.push(...binding.diagnostics);
    if (binding.failedPositions.length === 0 || candidates.length === 1) {
      return { ok: true, value: binding };
    }

    lastFailure = binding;
    session.log(
      `binding '${renderSignature(binding.method, "simple")}' failed at position(s) ${binding.failedPositions.join(", ")}; choosing again (${attempt}/${session.maxRebindAttempts})`
    );
  }

  const [first] = candidates;
  return fail(
    createDiagnostic(
      "CLR2002",
      "error",
      `Could not bind arguments after ${session.maxRebindAttempts} attempt(s)`,
      {
        typeName: first?.declaringType.fullName,
        memberName: lastFailure?.method.name ?? first?.name,
        candidates: candidates.map((m) => renderSignature(m, "simple")),
      }
    )
  );
};

const invokeBinding = async (
  session: ResolutionSession,
  binding: BindingResult,
  target: unknown,
  diagnostics: readonly Diagnostic[]
): Promise<Result<InvokeOutcome, Diagnostic>> => {
  session.log(`invoking ${renderSignature(binding.method, "full")}`);
  const result = await invokeMethod(
    session.universe,
    binding.method,
    target,
    binding.boundArguments
  );
  if (!result.ok) return result;
  return {
    ok: true,
    value: { value: result.value, method: binding.method, diagnostics },
  };
};

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Resolve a call site and invoke it.
 *
 * 1. A method descriptor is bound and invoked directly.
 * 2. Otherwise the members matching the name are enumerated.
 * 3. A single exact signature match is taken as is.
 * 4. Generic candidates go through generic inference first.
 * 5. A single overload that takes every argument is bound without asking;
 *    otherwise the user picks, and picks again while binding fails.
 */
export const resolveAndInvoke = async (
  session: ResolutionSession,
  request: InvokeRequest
): Promise<Result<InvokeOutcome, Diagnostic>> => {
  const { universe } = session;
  const context = bindingContext(session);
  const args = request.arguments;
  const diagnostics: Diagnostic[] = [];

  if (isMethodDescriptor(request.member)) {
    const binding = await bindArguments(request.member, args, context);
    diagnostics.push(...binding.diagnostics);
    return invokeBinding(session, binding, request.target, diagnostics);
  }

  const declaringType = resolveDeclaringType(session, request);
  if (!declaringType.ok) return declaringType;
  const type = declaringType.value;
  const memberName = request.member;

  const visibility: VisibilityFlags = request.visibility ?? {
    static: request.isStatic,
    instance: !request.isStatic,
  };
  const lookup = findMethods(
    universe,
    type,
    memberName,
    visibility,
    request.attributeFilter
  );
  diagnostics.push(...lookup.diagnostics);
  const candidates = lookup.methods;
  session.log(
    `${candidates.length} candidate(s) for '${memberName}' on ${type.fullName}`
  );

  if (candidates.length === 0) {
    return fail(
      createDiagnostic(
        "CLR1001",
        "error",
        `No member '${memberName}' found on '${type.fullName}'`,
        { typeName: type.fullName, memberName },
        request.isStatic
          ? "Instance members need a target instance"
          : undefined
      )
    );
  }

  const exact = candidates.filter((m) => matchesExactly(universe, m, args));
  const [onlyExact] = exact;
  if (onlyExact && exact.length === 1) {
    session.log(`exact match ${renderSignature(onlyExact, "simple")}`);
    const binding = await bindArguments(onlyExact, args, context);
    diagnostics.push(...binding.diagnostics);
    return invokeBinding(session, binding, request.target, diagnostics);
  }

  if (candidates.some((m) => m.isGenericMethodDefinition)) {
    const generic = await invokeGeneric(universe, {
      target: request.target,
      declaringType: type,
      methodName: memberName,
      arguments: args,
      isStatic: request.isStatic,
      candidates,
    });
    if (generic.ok) {
      return { ok: true, value: { ...generic.value, diagnostics } };
    }
    if (generic.error.code !== "CLR3001") return generic;
    session.log(`generic inference failed: ${generic.error.message}`);
  }

  const offered = narrowCandidates(universe, candidates, args);
  if (offered.length > 1) {
    diagnostics.push(
      createDiagnostic(
        "CLR1003",
        "info",
        `${offered.length} overloads of '${memberName}' match`,
        {
          typeName: type.fullName,
          memberName,
          candidates: offered.map((m) => renderSignature(m, "simple")),
        }
      )
    );
  }

  const bound = await chooseAndBind(session, offered, args, diagnostics);
  if (!bound.ok) return bound;
  return invokeBinding(session, bound.value, request.target, diagnostics);
};
