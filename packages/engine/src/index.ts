/**
 * clrcall engine - runtime method resolution and invocation over a type catalog
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type DiagnosticDetails,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";
export * from "./types/result.js";

export * from "./model/type-ref.js";
export {
  type GenericScope,
  type ParseTypeNameOptions,
  parseTypeName,
  splitFullName,
  stripArity,
} from "./model/type-name-parser.js";
export { hasWildcards, matchWildcard } from "./model/wildcard.js";

export * from "./catalog/types.js";
export * from "./catalog/catalog-document.js";
export { createTypeCatalog } from "./catalog/type-catalog.js";
export { buildCatalogModule } from "./catalog/catalog-builder.js";
export {
  loadCatalogFile,
  parseCatalogDocument,
  parseCatalogText,
} from "./catalog/catalog-file.js";
export { coreModule, CoreList, CoreTuple } from "./catalog/core-module.js";
export {
  type AliasRegistry,
  PRIMITIVE_ALIASES,
  createAliasRegistry,
} from "./catalog/alias-registry.js";

export * from "./descriptors/type-descriptor.js";
export * from "./descriptors/method-descriptor.js";

export {
  TypedValue,
  formatValue,
  runtimeTypeOf,
  unwrapValue,
} from "./runtime/runtime-values.js";
export { CatalogInstance } from "./runtime/catalog-instance.js";
export { InvocationArgumentError, convertValue } from "./runtime/conversion.js";
export {
  type LiteralValue,
  evaluateLiteralExpression,
  isLiteralExpressionText,
  parseInputValue,
} from "./runtime/literal-expression.js";

export { isAssignableFrom, isValueAssignable } from "./resolution/assignability.js";
export * from "./resolution/generic-assignability.js";
export * from "./resolution/member-enumerator.js";
export * from "./resolution/signature-renderer.js";
export * from "./resolution/argument-binder.js";
export * from "./resolution/generic-binder.js";
export { invokeMethod } from "./resolution/invoke.js";

export * from "./prompt/types.js";
export * from "./prompt/choice-set.js";
export * from "./prompt/scripted-prompt.js";

export * from "./session.js";
