/**
 * clrcall call - resolve and invoke a member
 *
 * Usage:
 *   clrcall call <type> <member> [args...] [--new <arg>]...
 *                [--answer <n[,n]>]... [--input <text>]...
 *
 * Without --new the member is called statically (constructors included).
 * With --new an instance is constructed from the given arguments first and
 * the member is called on it. Answers and inputs replay the prompts in
 * order; without any, questions are asked on the console.
 */

import {
  createResolutionSession,
  createScriptedPrompt,
  formatDiagnostic,
  formatValue,
  parseInputValue,
  renderSignature,
  resolveAndInvoke,
  type InvokeRequest,
  type LiteralValue,
  type MethodDescriptor,
  type Prompt,
  type ResolutionSession,
  type VisibilityFlags,
} from "@clrcall/engine";
import type { CliOptions, Result } from "../types.js";
import { formatWarnings } from "./context.js";
import type { CommandContext, CommandOutput } from "./context.js";
import { visibilityFromOptions } from "./members.js";

/**
 * Scripted replay when the command line carries answers, else undefined
 */
export const replayPrompt = (options: CliOptions): Prompt | undefined =>
  options.answers || options.inputs
    ? createScriptedPrompt({
        choices: options.answers ?? [],
        lines: options.inputs ?? [],
      })
    : undefined;

export const parseArgumentTexts = (
  texts: readonly string[]
): Result<readonly LiteralValue[], string> => {
  const values: LiteralValue[] = [];
  for (const text of texts) {
    const parsed = parseInputValue(text);
    if (!parsed.ok) return parsed;
    values.push(parsed.value);
  }
  return { ok: true, value: values };
};

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

type Invoked = {
  readonly value: unknown;
  readonly method: MethodDescriptor;
  readonly warnings: readonly string[];
};

const resolveAndInvokeRequest = async (
  session: ResolutionSession,
  request: InvokeRequest
): Promise<Result<Invoked, string>> => {
  const result = await resolveAndInvoke(session, request);
  if (!result.ok) {
    return { ok: false, error: formatDiagnostic(result.error) };
  }
  return {
    ok: true,
    value: {
      value: result.value.value,
      method: result.value.method,
      warnings: formatWarnings(result.value.diagnostics),
    },
  };
};

export const callCommand = async (
  context: CommandContext,
  typeName: string,
  memberName: string,
  argumentTexts: readonly string[],
  options: CliOptions,
  prompt: Prompt
): Promise<Result<CommandOutput, string>> => {
  const args = parseArgumentTexts(argumentTexts);
  if (!args.ok) return args;

  const session = createResolutionSession({
    catalog: context.catalog,
    prompt,
    aliases: context.aliases,
    maxRebindAttempts: context.config.maxRebindAttempts,
    log: context.log,
  });

  const warnings: string[] = [];
  let target: unknown;
  const isStatic = options.newArgs === undefined;

  if (options.newArgs !== undefined) {
    const newArgs = parseArgumentTexts(options.newArgs);
    if (!newArgs.ok) return newArgs;

    const created = await resolveAndInvokeRequest(session, {
      member: "new",
      declaringType: typeName,
      arguments: newArgs.value,
      isStatic: false,
    });
    if (!created.ok) return created;
    warnings.push(...created.value.warnings);
    target = created.value.value;
  }

  const visibility: VisibilityFlags = {
    static: isStatic,
    instance: !isStatic,
    ...visibilityFromOptions(options),
  };
  const request: InvokeRequest = {
    target,
    member: memberName,
    arguments: args.value,
    isStatic,
    declaringType: typeName,
    visibility,
    ...(options.attribute ? { attributeFilter: [options.attribute] } : {}),
  };

  const result = await resolveAndInvokeRequest(session, request);
  if (!result.ok) return result;

  context.log(`called ${renderSignature(result.value.method, "full")}`);
  return {
    ok: true,
    value: {
      lines: [formatValue(result.value.value)],
      warnings: [...warnings, ...result.value.warnings],
    },
  };
};
