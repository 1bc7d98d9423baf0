/**
 * CLI argument parser
 */

import { SIGNATURE_STYLES, isSignatureStyle } from "@clrcall/engine";
import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  /** Positional arguments after the command */
  positionals: string[];
  options: CliOptions;
  /** Problems with option values, reported by the dispatcher */
  errors: string[];
};

const NEGATIVE_NUMBER = /^-\d/;

/**
 * "2" or "1,3" (one-based, as shown by the console prompt) to zero-based
 * indices. An empty value means "choose nothing".
 */
const parseAnswer = (value: string): number[] | undefined => {
  const parts = value.split(",").map((p) => p.trim()).filter((p) => p !== "");
  const indices: number[] = [];
  for (const part of parts) {
    if (!/^\d+$/.test(part) || Number(part) < 1) return undefined;
    indices.push(Number(part) - 1);
  }
  return indices;
};

const push = <T>(list: T[] | undefined, value: T): T[] => [...(list ?? []), value];

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  const errors: string[] = [];
  const positionals: string[] = [];
  let command = "";
  let onlyPositionals = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Everything after "--" is positional, so values may start with "-"
    if (arg === "--" && !onlyPositionals) {
      onlyPositionals = true;
      continue;
    }

    const positional =
      onlyPositionals || !arg.startsWith("-") || NEGATIVE_NUMBER.test(arg);

    if (positional) {
      if (!command) {
        command = arg;
      } else {
        positionals.push(arg);
      }
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", positionals: [], options: {}, errors: [] };
      case "-v":
      case "--version":
        return { command: "version", positionals: [], options: {}, errors: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "--catalog":
        {
          const catalogPath = args[++i] ?? "";
          if (catalogPath) {
            options.catalogs = push(options.catalogs, catalogPath);
          }
        }
        break;
      case "-n":
      case "--namespace":
        options.namespace = args[++i] ?? "";
        break;
      case "-s":
      case "--style":
        {
          const style = args[++i] ?? "";
          if (isSignatureStyle(style)) {
            options.style = style;
          } else {
            errors.push(
              `Invalid style '${style}': expected one of ${SIGNATURE_STYLES.join(", ")}`
            );
          }
        }
        break;
      case "-g":
      case "--generic-args":
        options.genericArgs = push(options.genericArgs, args[++i] ?? "");
        break;
      case "-a":
      case "--attribute":
        options.attribute = args[++i] ?? "";
        break;
      case "-f":
      case "--force":
        options.force = true;
        break;
      case "--non-public":
        options.nonPublic = true;
        break;
      case "--static":
        options.static = true;
        break;
      case "--instance":
        options.instance = true;
        break;
      case "--no-warn":
        options.noWarn = true;
        break;
      case "--strict":
        options.strict = true;
        break;
      case "--new":
        {
          // A bare --new constructs with no arguments
          const next = args[i + 1];
          const takesValue =
            next !== undefined && (!next.startsWith("-") || NEGATIVE_NUMBER.test(next));
          options.newArgs = takesValue
            ? push(options.newArgs, args[++i] ?? "")
            : (options.newArgs ?? []);
        }
        break;
      case "--answer":
        {
          const value = args[++i] ?? "";
          const answer = parseAnswer(value);
          if (answer) {
            options.answers = push(options.answers, answer);
          } else {
            errors.push(`Invalid answer '${value}': expected option numbers such as 2 or 1,3`);
          }
        }
        break;
      case "--input":
        options.inputs = push(options.inputs, args[++i] ?? "");
        break;
      default:
        errors.push(`Unknown option '${arg}'`);
    }
  }

  return { command, positionals, options, errors };
};
