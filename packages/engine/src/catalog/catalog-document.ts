/**
 * Catalog documents - the authored form of a catalog module
 *
 * A document lists types with their members using textual type names. The
 * same shape is written in YAML/JSON files (validated by parseCatalogDocument)
 * and in TypeScript (the core module), where methods may carry their
 * implementation directly.
 *
 * Example (YAML):
 *
 *   module: Demo
 *   types:
 *     - name: Demo.Box`1
 *       genericParameters: [T]
 *       interfaces: ["Demo.IContainer`1[T]"]
 *       constructors:
 *         - parameters: [{ name: value, type: T }]
 *       methods:
 *         - name: Describe
 *           returns: string
 *           template: "Box of {this.value}"
 */

import type {
  MethodImplementation,
  RuntimeBinding,
  TypeKind,
} from "./types.js";

export type GenericParameterDocument =
  | string
  | {
      readonly name: string;
      /** Type names; may mention the generic parameters in scope */
      readonly constraints?: readonly string[];
    };

export type ParameterDocument = {
  readonly name: string;
  readonly type: string;
  readonly optional?: boolean;
  readonly default?: unknown;
};

export type ConstructorDocument = {
  readonly public?: boolean;
  readonly parameters?: readonly ParameterDocument[];
  readonly attributes?: readonly string[];
  readonly implementation?: MethodImplementation;
};

export type MethodDocument = {
  readonly name: string;
  readonly static?: boolean;
  readonly public?: boolean;
  readonly genericParameters?: readonly GenericParameterDocument[];
  readonly parameters?: readonly ParameterDocument[];
  /** Return type name; defaults to void */
  readonly returns?: string;
  readonly attributes?: readonly string[];
  /** Result text; {0}, {name} and {this.field} are replaced */
  readonly template?: string;
  /** Constant result */
  readonly returnValue?: unknown;
  readonly implementation?: MethodImplementation;
};

export type TypeDocument = {
  /** Full name, e.g. "Demo.Box`1"; the arity suffix is added when missing */
  readonly name: string;
  readonly kind?: TypeKind;
  readonly genericParameters?: readonly GenericParameterDocument[];
  readonly baseType?: string;
  readonly interfaces?: readonly string[];
  readonly attributes?: readonly string[];
  readonly abstract?: boolean;
  readonly sealed?: boolean;
  readonly enumValues?: Readonly<Record<string, number>>;
  readonly constructors?: readonly ConstructorDocument[];
  readonly methods?: readonly MethodDocument[];
  readonly runtime?: RuntimeBinding;
};

export type CatalogDocument = {
  readonly module: string;
  readonly types: readonly TypeDocument[];
};
