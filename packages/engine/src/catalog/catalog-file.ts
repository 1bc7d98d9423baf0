/**
 * Catalog file loader - Reads and validates YAML/JSON catalog documents.
 *
 * JSON is a subset of YAML, so one parser reads both. Validation reports
 * every problem it finds rather than stopping at the first.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import YAML from "yaml";
import type { Result } from "../types/result.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type {
  CatalogDocument,
  ConstructorDocument,
  GenericParameterDocument,
  MethodDocument,
  ParameterDocument,
  TypeDocument,
} from "./catalog-document.js";
import { buildCatalogModule } from "./catalog-builder.js";
import type { CatalogModule, TypeKind } from "./types.js";

type Fields = Readonly<Record<string, unknown>>;

const TYPE_KINDS: readonly TypeKind[] = [
  "class",
  "interface",
  "struct",
  "enum",
  "delegate",
];

const isFields = (value: unknown): value is Fields =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item: unknown) => typeof item === "string");

const isTypeKind = (value: unknown): value is TypeKind =>
  TYPE_KINDS.some((kind) => kind === value);

/**
 * Collects diagnostics while a document is validated.
 */
class DocumentValidator {
  readonly diagnostics: Diagnostic[] = [];

  constructor(private readonly source: string) {}

  report(code: DiagnosticCode, message: string): void {
    this.diagnostics.push(
      createDiagnostic(code, "error", `${message} in ${path.basename(this.source)}`, {
        source: this.source,
      })
    );
  }

  optionalBoolean(fields: Fields, key: string, context: string): boolean | undefined {
    const value = fields[key];
    if (value === undefined || typeof value === "boolean") return value;
    this.report("CLR9008", `Invalid ${context}: '${key}' must be a boolean`);
    return undefined;
  }

  optionalString(fields: Fields, key: string, context: string): string | undefined {
    const value = fields[key];
    if (value === undefined || typeof value === "string") return value;
    this.report("CLR9008", `Invalid ${context}: '${key}' must be a string`);
    return undefined;
  }

  optionalStringArray(
    fields: Fields,
    key: string,
    context: string
  ): readonly string[] | undefined {
    const value = fields[key];
    if (value === undefined || isStringArray(value)) return value;
    this.report("CLR9008", `Invalid ${context}: '${key}' must be a list of strings`);
    return undefined;
  }

  list(fields: Fields, key: string, context: string): readonly unknown[] {
    const value = fields[key];
    if (value === undefined) return [];
    if (Array.isArray(value)) return value;
    this.report("CLR9008", `Invalid ${context}: '${key}' must be a list`);
    return [];
  }

  genericParameters(
    fields: Fields,
    context: string
  ): readonly GenericParameterDocument[] {
    return this.list(fields, "genericParameters", context).flatMap(
      (item): GenericParameterDocument[] => {
        if (typeof item === "string") return [item];
        if (isFields(item) && typeof item.name === "string") {
          const constraints = this.optionalStringArray(
            item,
            "constraints",
            `${context}, generic parameter '${item.name}'`
          );
          return [{ name: item.name, ...(constraints ? { constraints } : {}) }];
        }
        this.report(
          "CLR9010",
          `Invalid ${context}: generic parameters must be names or { name, constraints }`
        );
        return [];
      }
    );
  }

  parameters(fields: Fields, context: string): readonly ParameterDocument[] {
    return this.list(fields, "parameters", context).flatMap(
      (item, index): ParameterDocument[] => {
        if (
          !isFields(item) ||
          typeof item.name !== "string" ||
          typeof item.type !== "string"
        ) {
          this.report(
            "CLR9010",
            `Invalid ${context}: parameter ${index} needs 'name' and 'type'`
          );
          return [];
        }
        const where = `${context}, parameter '${item.name}'`;
        const optional = this.optionalBoolean(item, "optional", where);
        return [
          {
            name: item.name,
            type: item.type,
            ...(optional !== undefined ? { optional } : {}),
            ...(item.default !== undefined ? { default: item.default } : {}),
          },
        ];
      }
    );
  }

  constructorDocument(item: unknown, context: string): ConstructorDocument | undefined {
    if (!isFields(item)) {
      this.report("CLR9010", `Invalid ${context}: must be an object`);
      return undefined;
    }
    const isPublic = this.optionalBoolean(item, "public", context);
    const attributes = this.optionalStringArray(item, "attributes", context);
    return {
      parameters: this.parameters(item, context),
      ...(isPublic !== undefined ? { public: isPublic } : {}),
      ...(attributes ? { attributes } : {}),
    };
  }

  methodDocument(item: unknown, context: string): MethodDocument | undefined {
    const name = isFields(item) ? item.name : undefined;
    if (!isFields(item) || typeof name !== "string") {
      this.report("CLR9010", `Invalid ${context}: needs a 'name'`);
      return undefined;
    }
    const where = `${context} '${name}'`;
    const isStatic = this.optionalBoolean(item, "static", where);
    const isPublic = this.optionalBoolean(item, "public", where);
    const returns = this.optionalString(item, "returns", where);
    const template = this.optionalString(item, "template", where);
    const attributes = this.optionalStringArray(item, "attributes", where);
    return {
      name,
      genericParameters: this.genericParameters(item, where),
      parameters: this.parameters(item, where),
      ...(isStatic !== undefined ? { static: isStatic } : {}),
      ...(isPublic !== undefined ? { public: isPublic } : {}),
      ...(returns !== undefined ? { returns } : {}),
      ...(template !== undefined ? { template } : {}),
      ...(item.returnValue !== undefined ? { returnValue: item.returnValue } : {}),
      ...(attributes ? { attributes } : {}),
    };
  }

  enumValues(
    fields: Fields,
    context: string
  ): Readonly<Record<string, number>> | undefined {
    const value = fields.enumValues;
    if (value === undefined) return undefined;
    if (!isFields(value)) {
      this.report("CLR9008", `Invalid ${context}: 'enumValues' must be a map of names to numbers`);
      return undefined;
    }
    const entries: [string, number][] = [];
    for (const [name, raw] of Object.entries(value)) {
      if (typeof raw === "number" && Number.isInteger(raw)) entries.push([name, raw]);
      else this.report("CLR9008", `Invalid ${context}: enum value '${name}' must be an integer`);
    }
    return Object.fromEntries(entries);
  }

  typeDocument(item: unknown, index: number): TypeDocument | undefined {
    const context = `type ${index}`;
    if (!isFields(item)) {
      this.report("CLR9007", `Invalid ${context}: must be an object`);
      return undefined;
    }
    const name = item.name;
    if (typeof name !== "string" || name.trim() === "") {
      this.report("CLR9008", `Invalid ${context}: missing or invalid 'name'`);
      return undefined;
    }

    const where = `type '${name}'`;
    const kind = item.kind;
    if (kind !== undefined && !isTypeKind(kind)) {
      this.report(
        "CLR9009",
        `Invalid ${where}: 'kind' must be one of ${TYPE_KINDS.join(", ")}`
      );
      return undefined;
    }

    const baseType = this.optionalString(item, "baseType", where);
    const interfaces = this.optionalStringArray(item, "interfaces", where);
    const attributes = this.optionalStringArray(item, "attributes", where);
    const isAbstract = this.optionalBoolean(item, "abstract", where);
    const isSealed = this.optionalBoolean(item, "sealed", where);
    const enumValues = this.enumValues(item, where);

    const constructors = this.list(item, "constructors", where).flatMap((c, i) => {
      const doc = this.constructorDocument(c, `${where}, constructor ${i}`);
      return doc ? [doc] : [];
    });
    const methods = this.list(item, "methods", where).flatMap((m, i) => {
      const doc = this.methodDocument(m, `${where}, method ${i}`);
      return doc ? [doc] : [];
    });

    return {
      name,
      ...(kind !== undefined ? { kind } : {}),
      genericParameters: this.genericParameters(item, where),
      ...(baseType !== undefined ? { baseType } : {}),
      ...(interfaces ? { interfaces } : {}),
      ...(attributes ? { attributes } : {}),
      ...(isAbstract !== undefined ? { abstract: isAbstract } : {}),
      ...(isSealed !== undefined ? { sealed: isSealed } : {}),
      ...(enumValues ? { enumValues } : {}),
      constructors,
      methods,
    };
  }
}

/**
 * Validate parsed YAML/JSON against the catalog document shape.
 */
export const parseCatalogDocument = (
  data: unknown,
  source: string
): Result<CatalogDocument, readonly Diagnostic[]> => {
  const validator = new DocumentValidator(source);

  if (!isFields(data)) {
    validator.report(
      "CLR9004",
      `Catalog document must be an object, got ${Array.isArray(data) ? "array" : typeof data}`
    );
    return { ok: false, error: validator.diagnostics };
  }

  const moduleName = data.module;
  if (typeof moduleName !== "string" || moduleName.trim() === "") {
    validator.report("CLR9005", "Missing or invalid 'module' field");
  }

  const types: TypeDocument[] = [];
  if (!Array.isArray(data.types)) {
    validator.report("CLR9006", "Missing or invalid 'types' field");
  } else {
    data.types.forEach((item: unknown, index: number) => {
      const doc = validator.typeDocument(item, index);
      if (doc) types.push(doc);
    });
  }

  if (validator.diagnostics.length > 0 || typeof moduleName !== "string") {
    return { ok: false, error: validator.diagnostics };
  }
  return { ok: true, value: { module: moduleName, types } };
};

/**
 * Parse catalog text (YAML or JSON) and build the module.
 */
export const parseCatalogText = (
  content: string,
  source: string
): Result<CatalogModule, readonly Diagnostic[]> => {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "CLR9003",
          "error",
          `Invalid YAML/JSON in catalog file: ${error instanceof Error ? error.message : String(error)}`,
          { source }
        ),
      ],
    };
  }

  const document = parseCatalogDocument(parsed, source);
  if (!document.ok) return document;

  return buildCatalogModule(document.value, source);
};

/**
 * Load a catalog module from a .yaml, .yml or .json file.
 */
export const loadCatalogFile = (
  filePath: string
): Result<CatalogModule, readonly Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        createDiagnostic("CLR9001", "error", `Catalog file not found: ${filePath}`, {
          source: filePath,
        }),
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "CLR9002",
          "error",
          `Failed to read catalog file: ${error instanceof Error ? error.message : String(error)}`,
          { source: filePath }
        ),
      ],
    };
  }

  return parseCatalogText(content, filePath);
};
