/**
 * Instances of types declared in catalog documents
 *
 * Types loaded from YAML/JSON have no JavaScript class behind them. Their
 * constructors produce CatalogInstance records: the type name, the closed
 * generic arguments and one field per constructor parameter.
 */

import type { TypeRef } from "../model/type-ref.js";
import { stripArity } from "../model/type-name-parser.js";
import { formatValue } from "./runtime-values.js";

export class CatalogInstance {
  constructor(
    readonly typeName: string,
    readonly typeArguments: readonly TypeRef[],
    readonly fields: Readonly<Record<string, unknown>>
  ) {}

  toString(): string {
    const dot = this.typeName.lastIndexOf(".");
    const name = stripArity(this.typeName.slice(dot + 1));
    const fields = Object.entries(this.fields)
      .map(([key, value]) => `${key}=${formatValue(value)}`)
      .join(", ");
    return `${name}(${fields})`;
  }
}

export const isCatalogInstanceOf = (
  value: unknown,
  typeName: string
): value is CatalogInstance =>
  value instanceof CatalogInstance && value.typeName === typeName;
