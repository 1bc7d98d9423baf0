/**
 * Type definitions for CLI
 */

import type { SignatureStyle } from "@clrcall/engine";

export type { Result } from "@clrcall/engine";

/**
 * Configuration file (clrcall.json)
 */
export type ClrcallConfig = {
  readonly $schema?: string;
  /** Catalog files, relative to the config file */
  readonly catalogs?: readonly string[];
  /** Extra type aliases, e.g. { "shapes": "Demo.Circle" } */
  readonly aliases?: Readonly<Record<string, string>>;
  readonly maxRebindAttempts?: number;
};

/**
 * CLI options
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  catalogs?: string[];
  // types
  namespace?: string;
  // members
  style?: SignatureStyle;
  genericArgs?: string[];
  attribute?: string;
  force?: boolean;
  nonPublic?: boolean;
  static?: boolean;
  instance?: boolean;
  noWarn?: boolean;
  // assignable
  strict?: boolean;
  // call
  newArgs?: string[];
  answers?: number[][];
  inputs?: string[];
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  /** Directory containing clrcall.json, or the working directory */
  readonly projectRoot: string;
  /** Absolute catalog paths, file entries first */
  readonly catalogs: readonly string[];
  readonly aliases: Readonly<Record<string, string>>;
  readonly maxRebindAttempts: number | undefined;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
