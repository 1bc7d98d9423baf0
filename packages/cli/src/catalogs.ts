/**
 * Catalog loading for the CLI
 *
 * YAML and JSON catalogs go through the engine's file loader. JavaScript and
 * TypeScript catalogs are imported and must export `catalogModule` (a built
 * module) or `catalogDocument` (a document with inline implementations).
 */

import { existsSync } from "node:fs";
import { extname } from "node:path";
import { pathToFileURL } from "node:url";
import {
  buildCatalogModule,
  formatDiagnostic,
  loadCatalogFile,
  type CatalogDocument,
  type CatalogModule,
  type Result,
} from "@clrcall/engine";

const DATA_EXTENSIONS = new Set([".yaml", ".yml", ".json"]);
const MODULE_EXTENSIONS = new Set([".js", ".mjs", ".ts", ".mts"]);

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const hasStringField = (value: unknown, field: string): boolean =>
  isRecord(value) && typeof value[field] === "string";

const isCatalogModule = (value: unknown): value is CatalogModule => {
  if (!isRecord(value)) return false;
  const { name, types } = value;
  return (
    typeof name === "string" &&
    Array.isArray(types) &&
    types.every((t: unknown) => hasStringField(t, "fullName") && hasStringField(t, "kind"))
  );
};

const isCatalogDocument = (value: unknown): value is CatalogDocument => {
  if (!isRecord(value)) return false;
  const { module, types } = value;
  return (
    typeof module === "string" &&
    Array.isArray(types) &&
    types.every((t: unknown) => hasStringField(t, "name"))
  );
};

const loadModuleCatalog = async (
  path: string
): Promise<Result<CatalogModule, readonly string[]>> => {
  let exports: unknown;
  try {
    exports = await import(pathToFileURL(path).href);
  } catch (error) {
    return {
      ok: false,
      error: [
        `Failed to import catalog ${path}: ${error instanceof Error ? error.message : String(error)}`,
      ],
    };
  }

  if (isRecord(exports)) {
    const { catalogModule, catalogDocument } = exports;
    if (isCatalogModule(catalogModule)) {
      return { ok: true, value: catalogModule };
    }
    if (isCatalogDocument(catalogDocument)) {
      const built = buildCatalogModule(catalogDocument, path);
      return built.ok
        ? built
        : { ok: false, error: built.error.map(formatDiagnostic) };
    }
  }

  return {
    ok: false,
    error: [`Catalog ${path} exports neither 'catalogModule' nor 'catalogDocument'`],
  };
};

/**
 * Load one catalog file of any supported kind
 */
export const loadCatalog = async (
  path: string
): Promise<Result<CatalogModule, readonly string[]>> => {
  const extension = extname(path).toLowerCase();

  if (DATA_EXTENSIONS.has(extension)) {
    const result = loadCatalogFile(path);
    return result.ok
      ? result
      : { ok: false, error: result.error.map(formatDiagnostic) };
  }

  if (MODULE_EXTENSIONS.has(extension)) {
    if (!existsSync(path)) {
      return { ok: false, error: [`Catalog file not found: ${path}`] };
    }
    return loadModuleCatalog(path);
  }

  return {
    ok: false,
    error: [`Unsupported catalog file '${path}': expected .yaml, .yml, .json, .js or .ts`],
  };
};

/**
 * Load catalogs in order. Every failure is reported, not just the first.
 */
export const loadCatalogs = async (
  paths: readonly string[]
): Promise<Result<readonly CatalogModule[], readonly string[]>> => {
  const modules: CatalogModule[] = [];
  const errors: string[] = [];

  for (const path of paths) {
    const result = await loadCatalog(path);
    if (result.ok) {
      modules.push(result.value);
    } else {
      errors.push(...result.error);
    }
  }

  return errors.length > 0
    ? { ok: false, error: errors }
    : { ok: true, value: modules };
};
