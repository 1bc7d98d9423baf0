/**
 * Signature Renderer
 *
 * Textual method signatures for menus, messages and listings.
 *
 * Styles:
 * - full:       new Box<int>(int capacity) / Math.Max(int a, int b) / list.Add(T item)
 * - simple:     int Max(int a, int b)
 * - paramBlock: one "[Mandatory] int a" line per parameter, joined with ",\n"
 *
 * Parameters are separated by ", " and generic arguments by "," alone, so
 * a parameter list splits on ", " into exactly one entry per parameter.
 */

import { SHORT_TYPE_NAMES } from "../catalog/alias-registry.js";
import { stripArity } from "../model/type-name-parser.js";
import type { TypeDescriptor } from "../descriptors/type-descriptor.js";
import type {
  MethodDescriptor,
  ParameterDescriptor,
} from "../descriptors/method-descriptor.js";
import { formatValue } from "../runtime/runtime-values.js";

export type SignatureStyle = "full" | "simple" | "paramBlock";

export const SIGNATURE_STYLES: readonly SignatureStyle[] = [
  "full",
  "simple",
  "paramBlock",
];

/**
 * Generic parameter key → type rendered in its place.
 */
export type RenderSubstitution = ReadonlyMap<string, TypeDescriptor>;

const noSubstitution: RenderSubstitution = new Map();

const simpleName = (type: TypeDescriptor): string => {
  const name = stripArity(type.name);
  const plus = name.lastIndexOf("+");
  return plus === -1 ? name : name.slice(plus + 1);
};

/**
 * Render a type the way it is written in source.
 */
export const renderTypeName = (
  type: TypeDescriptor,
  subst: RenderSubstitution = noSubstitution
): string => {
  if (type.isGenericParameter) {
    const bound = subst.get(type.key);
    return bound ? renderTypeName(bound) : type.name;
  }

  if (type.isByRef && type.elementType) {
    return `ref ${renderTypeName(type.elementType, subst)}`;
  }

  if (type.isArray && type.elementType) {
    const rank = type.ref.kind === "arrayType" ? type.ref.rank : 1;
    return `${renderTypeName(type.elementType, subst)}[${",".repeat(rank - 1)}]`;
  }

  if (type.kind === "null") return "null";

  const alias = SHORT_TYPE_NAMES.get(type.fullName);
  if (alias) return alias;

  const name = stripArity(type.name).replace(/\+/g, ".");
  if (type.genericParameters.length === 0) return name;

  const args = type.genericParameters.map((a) => renderTypeName(a, subst));
  return `${name}<${args.join(",")}>`;
};

/**
 * Substitution for rendering with explicit generic arguments.
 *
 * Generic methods take the arguments for their own parameters; other
 * methods apply them to the declaring type's parameters. An arity mismatch
 * yields no substitution.
 */
const genericSubstitution = (
  method: MethodDescriptor,
  genericArgs: readonly TypeDescriptor[] | undefined
): RenderSubstitution => {
  if (!genericArgs || genericArgs.length === 0) return noSubstitution;

  const placeholders = method.isGenericMethodDefinition
    ? method.genericParameters
    : method.declaringType.isGenericDefinition
      ? method.declaringType.genericParameters
      : [];

  if (placeholders.length !== genericArgs.length) return noSubstitution;

  const subst = new Map<string, TypeDescriptor>();
  placeholders.forEach((placeholder, i) => {
    const arg = genericArgs[i];
    if (arg) subst.set(placeholder.key, arg);
  });
  return subst;
};

const renderParameter = (
  parameter: ParameterDescriptor,
  subst: RenderSubstitution
): string => {
  const text = `${renderTypeName(parameter.type, subst)} ${parameter.name}`;
  return parameter.defaultValue !== undefined
    ? `${text} = ${formatValue(parameter.defaultValue)}`
    : text;
};

const renderParameterList = (
  method: MethodDescriptor,
  subst: RenderSubstitution
): string => method.parameters.map((p) => renderParameter(p, subst)).join(", ");

const renderGenericSuffix = (
  method: MethodDescriptor,
  subst: RenderSubstitution
): string => {
  if (method.genericParameters.length === 0) return "";
  const args = method.genericParameters.map((g) => renderTypeName(g, subst));
  return `<${args.join(",")}>`;
};

const camelCase = (name: string): string =>
  name.charAt(0).toLowerCase() + name.slice(1);

const renderFull = (
  method: MethodDescriptor,
  subst: RenderSubstitution
): string => {
  const params = renderParameterList(method, subst);
  const typeName = renderTypeName(method.declaringType, subst);

  if (method.isConstructor) return `new ${typeName}(${params})`;

  const receiver = method.isStatic
    ? typeName
    : camelCase(simpleName(method.declaringType));
  return `${receiver}.${method.name}${renderGenericSuffix(method, subst)}(${params})`;
};

const renderSimple = (
  method: MethodDescriptor,
  subst: RenderSubstitution
): string => {
  const returnType = renderTypeName(method.returnType, subst);
  const params = renderParameterList(method, subst);
  return `${returnType} ${method.name}${renderGenericSuffix(method, subst)}(${params})`;
};

const renderParamBlock = (
  method: MethodDescriptor,
  subst: RenderSubstitution
): string =>
  method.parameters
    .map((p) => `[Mandatory] ${renderParameter(p, subst)}`)
    .join(",\n");

export const renderSignature = (
  method: MethodDescriptor,
  style: SignatureStyle,
  genericArgs?: readonly TypeDescriptor[]
): string => {
  const subst = genericSubstitution(method, genericArgs);
  switch (style) {
    case "full":
      return renderFull(method, subst);
    case "simple":
      return renderSimple(method, subst);
    case "paramBlock":
      return renderParamBlock(method, subst);
  }
};

export const isSignatureStyle = (value: string): value is SignatureStyle =>
  SIGNATURE_STYLES.some((s) => s === value);
