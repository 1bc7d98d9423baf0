/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { createCommandContext, type CommandOutput } from "../commands/context.js";
import { typesCommand } from "../commands/types.js";
import { membersCommand } from "../commands/members.js";
import { assignableCommand } from "../commands/assignable.js";
import { callCommand, replayPrompt } from "../commands/call.js";
import { createConsolePrompt } from "../prompt/console-prompt.js";
import type { ClrcallConfig, Result } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const USAGE: Readonly<Record<string, string>> = {
  members: "clrcall members <type> [pattern]",
  assignable: "clrcall assignable <concrete> <generic>",
  call: "clrcall call <type> <member> [args...]",
};

const usageError = (command: string): number => {
  console.error(`Error: missing arguments`);
  console.error(`Usage: ${USAGE[command] ?? "clrcall --help"}`);
  return 2;
};

const printOutput = (
  result: Result<CommandOutput, string>,
  quiet: boolean
): number => {
  if (!result.ok) {
    console.error(`Error: ${result.error}`);
    return 4;
  }
  if (!quiet) {
    for (const warning of result.value.warnings) console.error(warning);
  }
  for (const line of result.value.lines) console.log(line);
  return 0;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`clrcall v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (!["types", "members", "assignable", "call"].includes(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'clrcall --help' for usage information");
    return 2;
  }

  if (parsed.errors.length > 0) {
    for (const error of parsed.errors) console.error(`Error: ${error}`);
    return 2;
  }

  // The config file is optional; catalogs may come from --catalog alone
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: ClrcallConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return 1;
    }
    fileConfig = configResult.value;
  }

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    configPath ? dirname(configPath) : cwd,
    cwd
  );

  const log = config.verbose
    ? (message: string) => console.error(`[clrcall] ${message}`)
    : undefined;
  if (configPath) log?.(`config ${configPath}`);

  const context = await createCommandContext(config, log);
  if (!context.ok) {
    console.error(`Error: ${context.error}`);
    return 3;
  }

  const [first, second, ...rest] = parsed.positionals;

  // Dispatch to command handlers
  switch (parsed.command) {
    case "types":
      return printOutput(
        typesCommand(context.value, first, parsed.options),
        config.quiet
      );

    case "members":
      if (!first) return usageError("members");
      return printOutput(
        membersCommand(context.value, first, second, parsed.options),
        config.quiet
      );

    case "assignable":
      if (!first || !second) return usageError("assignable");
      return printOutput(
        assignableCommand(context.value, first, second, parsed.options),
        config.quiet
      );

    case "call": {
      if (!first || !second) return usageError("call");
      const replay = replayPrompt(parsed.options);
      if (replay) {
        return printOutput(
          await callCommand(context.value, first, second, rest, parsed.options, replay),
          config.quiet
        );
      }

      const consolePrompt = createConsolePrompt();
      try {
        return printOutput(
          await callCommand(context.value, first, second, rest, parsed.options, consolePrompt),
          config.quiet
        );
      } finally {
        consolePrompt.close();
      }
    }

    default:
      return usageError(parsed.command);
  }
};
