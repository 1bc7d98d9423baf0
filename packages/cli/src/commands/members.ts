/**
 * clrcall members - list the methods of a type
 *
 * Usage:
 *   clrcall members <type> [pattern] [--style full|simple|paramBlock]
 *                   [--generic-args <type>]... [--attribute <name>]
 *                   [--force] [--non-public] [--static] [--instance] [--no-warn]
 */

import {
  findMethods,
  formatDiagnostic,
  renderSignature,
  type TypeDescriptor,
  type VisibilityFlags,
} from "@clrcall/engine";
import type { CliOptions, Result } from "../types.js";
import { formatWarnings } from "./context.js";
import type { CommandContext, CommandOutput } from "./context.js";

export const visibilityFromOptions = (options: CliOptions): VisibilityFlags => ({
  ...(options.nonPublic ? { public: true, nonPublic: true } : {}),
  ...(options.static ? { static: true } : {}),
  ...(options.instance ? { instance: true } : {}),
  ...(options.force ? { force: true } : {}),
  ...(options.noWarn ? { noWarn: true } : {}),
});

const resolveGenericArgs = (
  context: CommandContext,
  names: readonly string[]
): Result<readonly TypeDescriptor[], string> => {
  const resolved: TypeDescriptor[] = [];
  for (const name of names) {
    const type = context.universe.resolveTypeName(name);
    if (!type.ok) return { ok: false, error: formatDiagnostic(type.error) };
    resolved.push(type.value);
  }
  return { ok: true, value: resolved };
};

export const membersCommand = (
  context: CommandContext,
  typeName: string,
  pattern: string | undefined,
  options: CliOptions
): Result<CommandOutput, string> => {
  const type = context.universe.resolveTypeName(typeName);
  if (!type.ok) {
    return { ok: false, error: formatDiagnostic(type.error) };
  }

  const genericArgs = resolveGenericArgs(context, options.genericArgs ?? []);
  if (!genericArgs.ok) return genericArgs;

  const lookup = findMethods(
    context.universe,
    type.value,
    pattern ?? "*",
    visibilityFromOptions(options),
    options.attribute ? [options.attribute] : undefined
  );
  context.log(`${lookup.methods.length} member(s) of ${type.value.fullName}`);

  const style = options.style ?? "simple";
  const args = genericArgs.value.length > 0 ? genericArgs.value : undefined;
  const rendered = lookup.methods.map((m) => renderSignature(m, style, args));
  // paramBlock output spans lines, so members are separated by a blank one
  const lines =
    style === "paramBlock"
      ? rendered.flatMap((r, i) => (i === 0 ? [r] : ["", r]))
      : rendered;

  return {
    ok: true,
    value: {
      lines,
      warnings: formatWarnings(lookup.diagnostics),
    },
  };
};
