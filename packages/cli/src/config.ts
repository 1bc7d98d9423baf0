/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname, isAbsolute } from "node:path";
import type { Result } from "@clrcall/engine";
import type { ClrcallConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "clrcall.json";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((v) => typeof v === "string");

const isStringRecord = (
  value: unknown
): value is Readonly<Record<string, string>> =>
  isRecord(value) && Object.values(value).every((v) => typeof v === "string");

/**
 * Check the shape of a parsed clrcall.json
 */
export const validateConfig = (raw: unknown): Result<ClrcallConfig, string> => {
  if (!isRecord(raw)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  const { $schema, catalogs, aliases, maxRebindAttempts } = raw;
  let config: ClrcallConfig = typeof $schema === "string" ? { $schema } : {};

  if (catalogs !== undefined) {
    if (!isStringArray(catalogs)) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: 'catalogs' must be an array of strings`,
      };
    }
    config = { ...config, catalogs };
  }

  if (aliases !== undefined) {
    if (!isStringRecord(aliases)) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: 'aliases' must map names to type names`,
      };
    }
    config = { ...config, aliases };
  }

  if (maxRebindAttempts !== undefined) {
    if (
      typeof maxRebindAttempts !== "number" ||
      !Number.isInteger(maxRebindAttempts) ||
      maxRebindAttempts < 1
    ) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: 'maxRebindAttempts' must be a positive integer`,
      };
    }
    config = { ...config, maxRebindAttempts };
  }

  return { ok: true, value: config };
};

/**
 * Load clrcall.json
 */
export const loadConfig = (
  configPath: string
): Result<ClrcallConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return validateConfig(parsed);
};

/**
 * Find clrcall.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const absoluteFrom = (base: string, path: string): string =>
  isAbsolute(path) ? path : resolve(base, path);

/**
 * Resolve final configuration from file + CLI args.
 *
 * Catalog paths in the file are relative to the project root; --catalog
 * paths are relative to the working directory.
 */
export const resolveConfig = (
  config: ClrcallConfig,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd(),
  workingDirectory: string = process.cwd()
): ResolvedConfig => {
  const fileCatalogs = (config.catalogs ?? []).map((p) =>
    absoluteFrom(projectRoot, p)
  );
  const cliCatalogs = (cliOptions.catalogs ?? []).map((p) =>
    absoluteFrom(workingDirectory, p)
  );

  return {
    projectRoot,
    catalogs: [...new Set([...fileCatalogs, ...cliCatalogs])],
    aliases: config.aliases ?? {},
    maxRebindAttempts: config.maxRebindAttempts,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
