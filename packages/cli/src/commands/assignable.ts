/**
 * clrcall assignable - test a concrete type against a generic type
 *
 * Usage:
 *   clrcall assignable <concrete> <generic> [--strict]
 */

import { formatDiagnostic, testGenericAssignability } from "@clrcall/engine";
import type { CliOptions, Result } from "../types.js";
import type { CommandContext, CommandOutput } from "./context.js";

export const assignableCommand = (
  context: CommandContext,
  concreteName: string,
  genericName: string,
  options: CliOptions
): Result<CommandOutput, string> => {
  const result = testGenericAssignability(
    context.universe,
    concreteName,
    genericName,
    options.strict ?? false
  );
  if (!result.ok) {
    return { ok: false, error: formatDiagnostic(result.error) };
  }

  const { assignable, matchedInterface } = result.value;
  const lines = [String(assignable)];
  if (matchedInterface) {
    lines.push(`via ${matchedInterface.fullName}`);
  }
  return { ok: true, value: { lines, warnings: [] } };
};
