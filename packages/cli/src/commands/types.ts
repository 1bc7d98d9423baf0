/**
 * clrcall types - list catalog types
 *
 * Usage:
 *   clrcall types [pattern] [--namespace <ns>] [--attribute <name>]
 */

import type { TypeFilter } from "@clrcall/engine";
import type { CliOptions, Result } from "../types.js";
import type { CommandContext, CommandOutput } from "./context.js";

export const typesCommand = (
  context: CommandContext,
  pattern: string | undefined,
  options: CliOptions
): Result<CommandOutput, string> => {
  const filter: TypeFilter = {
    ...(pattern ? { namePattern: pattern } : {}),
    ...(options.namespace ? { namespace: options.namespace } : {}),
    ...(options.attribute ? { attribute: options.attribute } : {}),
  };

  const types = context.catalog.listTypes(filter);
  context.log(`${types.length} type(s) match`);

  if (types.length === 0) {
    return {
      ok: false,
      error: `No types match '${pattern ?? "*"}'`,
    };
  }

  return {
    ok: true,
    value: {
      lines: types.map((t) => `${t.kind.padEnd(9)} ${t.fullName}`),
      warnings: [],
    },
  };
};
