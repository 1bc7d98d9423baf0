/**
 * Value conversion
 *
 * Converts console text and literal values to the type a parameter expects.
 * Values whose JavaScript representation is ambiguous (char, enum members,
 * typed arrays) come back as TypedValue so they keep the target type until
 * invocation unwraps them.
 */

import type { Result } from "../types/result.js";
import type {
  TypeDescriptor,
  TypeUniverse,
} from "../descriptors/type-descriptor.js";
import { isValueAssignable, isAssignableFrom } from "../resolution/assignability.js";
import { renderTypeName } from "../resolution/signature-renderer.js";
import { formatValue, isInt32, TypedValue, unwrapValue } from "./runtime-values.js";

/**
 * Raised by implementations (and by invocation checks) when the arguments
 * they were given do not fit the method.
 */
export class InvocationArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvocationArgumentError";
  }
}

const INTEGER_TEXT = /^[+-]?\d+$/;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const fail = (value: unknown, type: TypeDescriptor, reason?: string) => ({
  ok: false as const,
  error: `Cannot convert '${formatValue(value)}' to ${renderTypeName(type)}${reason ? `: ${reason}` : ""}`,
});

const isPlainObject = (
  value: unknown
): value is Readonly<Record<string, unknown>> => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const toInt32 = (
  value: unknown,
  type: TypeDescriptor
): Result<unknown, string> => {
  if (typeof value === "number") {
    return isInt32(value) ? { ok: true, value } : fail(value, type, "out of range or not integral");
  }
  if (typeof value === "bigint") {
    const n = Number(value);
    return isInt32(n) ? { ok: true, value: n } : fail(value, type, "out of range");
  }
  if (typeof value === "string" && INTEGER_TEXT.test(value.trim())) {
    const n = Number(value.trim());
    return isInt32(n) ? { ok: true, value: n } : fail(value, type, "out of range");
  }
  return fail(value, type);
};

const toInt64 = (
  value: unknown,
  type: TypeDescriptor
): Result<unknown, string> => {
  let n: bigint | undefined;
  if (typeof value === "bigint") n = value;
  else if (typeof value === "number" && Number.isSafeInteger(value)) n = BigInt(value);
  else if (typeof value === "string" && INTEGER_TEXT.test(value.trim())) {
    n = BigInt(value.trim());
  }
  if (n === undefined) return fail(value, type);
  return n >= INT64_MIN && n <= INT64_MAX
    ? { ok: true, value: n }
    : fail(value, type, "out of range");
};

const toDouble = (
  value: unknown,
  type: TypeDescriptor
): Result<unknown, string> => {
  if (typeof value === "number") return { ok: true, value };
  if (typeof value === "bigint") return { ok: true, value: Number(value) };
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    if (!Number.isNaN(n)) return { ok: true, value: n };
  }
  return fail(value, type);
};

const toBoolean = (
  value: unknown,
  type: TypeDescriptor
): Result<unknown, string> => {
  if (typeof value === "boolean") return { ok: true, value };
  if (typeof value === "string") {
    const text = value.trim().toLowerCase();
    if (text === "true") return { ok: true, value: true };
    if (text === "false") return { ok: true, value: false };
  }
  return fail(value, type);
};

const toChar = (
  value: unknown,
  type: TypeDescriptor
): Result<unknown, string> => {
  if (typeof value === "string" && [...value].length === 1) {
    return { ok: true, value: new TypedValue(value, type) };
  }
  if (typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 0xffff) {
    return { ok: true, value: new TypedValue(String.fromCharCode(value), type) };
  }
  return fail(value, type, "expected a single character");
};

const toString = (
  value: unknown,
  type: TypeDescriptor
): Result<unknown, string> => {
  switch (typeof value) {
    case "string":
      return { ok: true, value };
    case "number":
    case "bigint":
    case "boolean":
      return { ok: true, value: String(value) };
    default:
      return fail(value, type);
  }
};

const toEnum = (
  value: unknown,
  type: TypeDescriptor
): Result<unknown, string> => {
  const members = type.entry?.enumValues ?? [];

  if (typeof value === "number" && Number.isInteger(value)) {
    return { ok: true, value: new TypedValue(value, type) };
  }
  if (typeof value === "string") {
    const text = value.trim();
    if (INTEGER_TEXT.test(text)) {
      return { ok: true, value: new TypedValue(Number(text), type) };
    }
    const member = members.find(
      (m) => m.name.toLowerCase() === text.toLowerCase()
    );
    if (member) return { ok: true, value: new TypedValue(member.value, type) };
  }

  const names = members.map((m) => m.name).join(", ");
  return fail(value, type, names ? `expected one of ${names}` : undefined);
};

const toArray = (
  universe: TypeUniverse,
  value: unknown,
  type: TypeDescriptor,
  elementType: TypeDescriptor
): Result<unknown, string> => {
  const items: readonly unknown[] = Array.isArray(value)
    ? value
    : typeof value === "string"
      ? value.trim() === ""
        ? []
        : value.split(",").map((s) => s.trim())
      : [value];

  const converted: unknown[] = [];
  for (const item of items) {
    const result = convertValue(universe, item, elementType);
    if (!result.ok) return result;
    converted.push(unwrapValue(result.value));
  }
  return { ok: true, value: new TypedValue(converted, type) };
};

const PRIMITIVE_CONVERTERS: ReadonlyMap<
  string,
  (value: unknown, type: TypeDescriptor) => Result<unknown, string>
> = new Map([
  ["System.String", toString],
  ["System.Int32", toInt32],
  ["System.Int64", toInt64],
  ["System.Double", toDouble],
  ["System.Boolean", toBoolean],
  ["System.Char", toChar],
]);

/**
 * Convert a value (text, literal or runtime value) to the given type.
 */
export const convertValue = (
  universe: TypeUniverse,
  value: unknown,
  type: TypeDescriptor
): Result<unknown, string> => {
  if (type.isByRef && type.elementType) {
    return convertValue(universe, value, type.elementType);
  }

  if (value instanceof TypedValue) {
    if (isAssignableFrom(type, value.type)) return { ok: true, value };
    return convertValue(universe, value.value, type);
  }

  if (value === null || value === undefined) {
    return type.isValueType
      ? fail(value, type, "value types cannot be null")
      : { ok: true, value: null };
  }

  if (type.fullName === "System.Object") return { ok: true, value };

  const primitive = PRIMITIVE_CONVERTERS.get(type.fullName);
  if (primitive) return primitive(value, type);

  if (type.kind === "enum") return toEnum(value, type);

  if (type.isArray && type.elementType) {
    return toArray(universe, value, type, type.elementType);
  }

  if (isValueAssignable(universe, value, type)) return { ok: true, value };

  const fromObject = type.entry?.runtime?.fromObject;
  if (fromObject && isPlainObject(value)) {
    try {
      return { ok: true, value: fromObject(value) };
    } catch (e) {
      return fail(value, type, e instanceof Error ? e.message : String(e));
    }
  }

  return fail(value, type);
};
