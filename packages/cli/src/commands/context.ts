/**
 * Shared setup for catalog commands
 */

import {
  coreModule,
  createAliasRegistry,
  createTypeCatalog,
  createTypeUniverse,
  formatDiagnostic,
  type AliasRegistry,
  type Diagnostic,
  type Result,
  type TypeCatalog,
  type TypeUniverse,
} from "@clrcall/engine";
import { loadCatalogs } from "../catalogs.js";
import type { ResolvedConfig } from "../types.js";

export type CommandContext = {
  readonly config: ResolvedConfig;
  readonly catalog: TypeCatalog;
  readonly aliases: AliasRegistry;
  readonly universe: TypeUniverse;
  /** Verbose trace; a no-op unless --verbose */
  readonly log: (message: string) => void;
};

/**
 * What a command prints: result lines to stdout, warnings to stderr
 */
export type CommandOutput = {
  readonly lines: readonly string[];
  readonly warnings: readonly string[];
};

export const formatWarnings = (
  diagnostics: readonly Diagnostic[]
): readonly string[] => diagnostics.map(formatDiagnostic);

/**
 * Load the configured catalogs after the core module and register aliases
 */
export const createCommandContext = async (
  config: ResolvedConfig,
  log: (message: string) => void = () => undefined
): Promise<Result<CommandContext, string>> => {
  const loaded = await loadCatalogs(config.catalogs);
  if (!loaded.ok) {
    return { ok: false, error: loaded.error.join("\n") };
  }

  for (const module of loaded.value) {
    log(`loaded catalog ${module.name} (${module.types.length} type(s))`);
  }

  const aliases = createAliasRegistry();
  for (const [alias, fullName] of Object.entries(config.aliases)) {
    const added = aliases.add(alias, fullName);
    if (!added.ok) {
      return { ok: false, error: `Invalid alias: ${added.error}` };
    }
  }

  const catalog = createTypeCatalog([coreModule, ...loaded.value]);
  return {
    ok: true,
    value: {
      config,
      catalog,
      aliases,
      universe: createTypeUniverse(catalog, aliases),
      log,
    },
  };
};
