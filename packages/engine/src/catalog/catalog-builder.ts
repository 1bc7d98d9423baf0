/**
 * Catalog builder - turns a CatalogDocument into a CatalogModule
 *
 * Resolves every textual type name to a TypeRef (generic parameters in
 * scope, primitive aliases allowed) and attaches default runtime
 * behaviour to types that declare none:
 * - constructors create CatalogInstance records
 * - methods with `template` format their arguments, with `returnValue`
 *   return a constant
 */

import type { Result } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { GenericParameterRef, TypeRef } from "../model/type-ref.js";
import { genericParameter, namedType } from "../model/type-ref.js";
import type { GenericScope } from "../model/type-name-parser.js";
import {
  emptyScope,
  parseTypeName,
  splitFullName,
} from "../model/type-name-parser.js";
import { PRIMITIVE_ALIASES } from "./alias-registry.js";
import { CatalogInstance, isCatalogInstanceOf } from "../runtime/catalog-instance.js";
import { formatValue } from "../runtime/runtime-values.js";
import type {
  CatalogDocument,
  ConstructorDocument,
  GenericParameterDocument,
  MethodDocument,
  ParameterDocument,
  TypeDocument,
} from "./catalog-document.js";
import type {
  AttributeEntry,
  CatalogModule,
  MethodEntry,
  MethodImplementation,
  ParameterEntry,
  RuntimeBinding,
  TypeEntry,
} from "./types.js";

const VOID = namedType("System.Void");

type BuildContext = {
  readonly source: string;
  readonly diagnostics: Diagnostic[];
};

const report = (context: BuildContext, code: "CLR9011" | "CLR9012", message: string): void => {
  context.diagnostics.push(
    createDiagnostic(code, "error", message, { source: context.source })
  );
};

const resolvePrimitive = (name: string): string | undefined =>
  PRIMITIVE_ALIASES.get(name.toLowerCase());

const parseRef = (
  context: BuildContext,
  text: string,
  scope: GenericScope,
  where: string
): TypeRef | undefined => {
  const parsed = parseTypeName(text, { scope, resolveName: resolvePrimitive });
  if (!parsed.ok) {
    report(context, "CLR9011", `${where}: ${parsed.error}`);
    return undefined;
  }
  return parsed.value;
};

// ═══════════════════════════════════════════════════════════════════════════
// GENERIC PARAMETERS
// ═══════════════════════════════════════════════════════════════════════════

const genericName = (doc: GenericParameterDocument): string =>
  typeof doc === "string" ? doc : doc.name;

/**
 * Generic parameters with their constraints. Constraints are parsed against
 * the unconstrained parameters, so `T : IComparable<T>` is allowed.
 */
const buildGenericParameters = (
  context: BuildContext,
  docs: readonly GenericParameterDocument[],
  owner: "type" | "method",
  outer: GenericScope,
  where: string
): readonly GenericParameterRef[] => {
  const bare = docs.map((d, i) => genericParameter(genericName(d), i, owner));
  const bareScope: GenericScope =
    owner === "type" ? { method: [], type: bare } : { ...outer, method: bare };

  return docs.map((doc, i) => {
    const constraintTexts = typeof doc === "string" ? [] : (doc.constraints ?? []);
    const constraints = constraintTexts.flatMap((text) => {
      const ref = parseRef(context, text, bareScope, `${where}, constraint of ${genericName(doc)}`);
      return ref ? [ref] : [];
    });
    return genericParameter(genericName(doc), i, owner, constraints);
  });
};

// ═══════════════════════════════════════════════════════════════════════════
// MEMBERS
// ═══════════════════════════════════════════════════════════════════════════

const toAttributes = (names: readonly string[] | undefined): readonly AttributeEntry[] =>
  (names ?? []).map((fullName) => ({
    fullName,
    name: splitFullName(fullName).name,
  }));

const buildParameters = (
  context: BuildContext,
  docs: readonly ParameterDocument[] | undefined,
  scope: GenericScope,
  where: string
): readonly ParameterEntry[] =>
  (docs ?? []).map((doc) => ({
    name: doc.name,
    type:
      parseRef(context, doc.type, scope, `${where}, parameter '${doc.name}'`) ??
      namedType("System.Object"),
    isOptional: doc.optional === true || doc.default !== undefined,
    ...(doc.default !== undefined ? { defaultValue: doc.default } : {}),
  }));

const TEMPLATE_HOLE = /\{(this\.)?([A-Za-z_$][\w$]*|\d+)\}/g;

/**
 * Implementation that fills a text template from the call.
 */
const templateImplementation =
  (template: string, parameterNames: readonly string[]): MethodImplementation =>
  ({ target, args }) =>
    template.replace(TEMPLATE_HOLE, (hole: string, self: string | undefined, key: string) => {
      if (self) {
        return target instanceof CatalogInstance && key in target.fields
          ? formatValue(target.fields[key])
          : hole;
      }
      const index = /^\d+$/.test(key) ? Number(key) : parameterNames.indexOf(key);
      return index >= 0 && index < args.length ? formatValue(args[index]) : hole;
    });

const defaultMethodImplementation = (
  doc: MethodDocument
): MethodImplementation | undefined => {
  if (doc.implementation) return doc.implementation;
  if (doc.template !== undefined) {
    return templateImplementation(
      doc.template,
      (doc.parameters ?? []).map((p) => p.name)
    );
  }
  const returnValue = doc.returnValue;
  if (returnValue !== undefined) return () => returnValue;
  return undefined;
};

const instanceConstructor =
  (typeName: string, parameterNames: readonly string[]): MethodImplementation =>
  ({ args, method }) => {
    const ref = method.declaringType.ref;
    const typeArguments = ref.kind === "namedType" ? ref.typeArguments : [];
    return new CatalogInstance(
      typeName,
      typeArguments,
      Object.fromEntries(parameterNames.map((name, i) => [name, args[i]]))
    );
  };

const buildConstructor = (
  context: BuildContext,
  typeName: string,
  doc: ConstructorDocument,
  scope: GenericScope,
  createsInstances: boolean
): MethodEntry => {
  const parameters = buildParameters(
    context,
    doc.parameters,
    scope,
    `constructor of ${typeName}`
  );
  const implementation =
    doc.implementation ??
    (createsInstances
      ? instanceConstructor(
          typeName,
          parameters.map((p) => p.name)
        )
      : undefined);

  return {
    name: ".ctor",
    isConstructor: true,
    isStatic: false,
    isPublic: doc.public ?? true,
    genericParameters: [],
    parameters,
    returnType: VOID,
    attributes: toAttributes(doc.attributes),
    ...(implementation ? { implementation } : {}),
  };
};

const buildMethod = (
  context: BuildContext,
  typeName: string,
  doc: MethodDocument,
  typeScope: GenericScope
): MethodEntry => {
  const where = `${typeName}.${doc.name}`;
  const genericParameters = buildGenericParameters(
    context,
    doc.genericParameters ?? [],
    "method",
    typeScope,
    where
  );
  const scope: GenericScope = { ...typeScope, method: genericParameters };
  const implementation = defaultMethodImplementation(doc);

  return {
    name: doc.name,
    isConstructor: false,
    isStatic: doc.static === true,
    isPublic: doc.public ?? true,
    genericParameters,
    parameters: buildParameters(context, doc.parameters, scope, where),
    returnType: doc.returns
      ? (parseRef(context, doc.returns, scope, `${where}, return type`) ?? VOID)
      : VOID,
    attributes: toAttributes(doc.attributes),
    ...(implementation ? { implementation } : {}),
  };
};

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * "Demo.Box" with one generic parameter becomes "Demo.Box`1".
 */
const withArity = (name: string, arity: number): string =>
  arity === 0 || name.includes("`") ? name : `${name}\`${arity}`;

const instanceRuntime = (typeName: string): RuntimeBinding => ({
  isInstance: (value) => isCatalogInstanceOf(value, typeName),
  typeArgumentsOf: (value) =>
    isCatalogInstanceOf(value, typeName) ? value.typeArguments : [],
  fromObject: (fields) => new CatalogInstance(typeName, [], fields),
});

const buildType = (
  context: BuildContext,
  moduleName: string,
  doc: TypeDocument
): TypeEntry => {
  const kind = doc.kind ?? "class";
  const genericDocs = doc.genericParameters ?? [];
  const fullName = withArity(doc.name, genericDocs.length);
  const { namespace, name } = splitFullName(fullName);

  const genericParameters = buildGenericParameters(
    context,
    genericDocs,
    "type",
    emptyScope,
    fullName
  );
  const scope: GenericScope = { method: [], type: genericParameters };

  const createsInstances =
    (kind === "class" || kind === "struct") && doc.abstract !== true;
  const runtime = doc.runtime ?? (createsInstances ? instanceRuntime(fullName) : undefined);

  const baseType = doc.baseType
    ? parseRef(context, doc.baseType, scope, `base type of ${fullName}`)
    : undefined;

  return {
    fullName,
    namespace,
    name,
    kind,
    moduleName,
    genericParameters,
    ...(baseType ? { baseType } : {}),
    interfaces: (doc.interfaces ?? []).flatMap((text) => {
      const ref = parseRef(context, text, scope, `interface of ${fullName}`);
      return ref ? [ref] : [];
    }),
    attributes: toAttributes(doc.attributes),
    constructors: (doc.constructors ?? []).map((c) =>
      buildConstructor(context, fullName, c, scope, createsInstances)
    ),
    methods: (doc.methods ?? []).map((m) =>
      buildMethod(context, fullName, m, scope)
    ),
    enumValues: Object.entries(doc.enumValues ?? {}).map(([valueName, value]) => ({
      name: valueName,
      value,
    })),
    isAbstract: doc.abstract === true || kind === "interface",
    isSealed: doc.sealed === true || kind === "struct" || kind === "enum",
    ...(runtime ? { runtime } : {}),
  };
};

/**
 * Build a module from a document. All problems are reported together.
 */
export const buildCatalogModule = (
  document: CatalogDocument,
  source = document.module
): Result<CatalogModule, readonly Diagnostic[]> => {
  const context: BuildContext = { source, diagnostics: [] };
  const seen = new Set<string>();
  const types: TypeEntry[] = [];

  for (const doc of document.types) {
    const entry = buildType(context, document.module, doc);
    if (seen.has(entry.fullName)) {
      report(context, "CLR9012", `Duplicate type name '${entry.fullName}'`);
      continue;
    }
    seen.add(entry.fullName);
    types.push(entry);
  }

  if (context.diagnostics.length > 0) {
    return { ok: false, error: context.diagnostics };
  }
  return { ok: true, value: { name: document.module, types } };
};
