/**
 * Runtime values and their catalog types
 */

import { arrayType, namedType } from "../model/type-ref.js";
import type {
  TypeDescriptor,
  TypeUniverse,
} from "../descriptors/type-descriptor.js";

/**
 * A value carrying an explicit catalog type.
 *
 * Used where the JavaScript value alone is ambiguous ("a" as char, 1 as long).
 * The wrapper never reaches an implementation; arguments are unwrapped first.
 */
export class TypedValue {
  constructor(
    readonly value: unknown,
    readonly type: TypeDescriptor
  ) {}
}

export const unwrapValue = (value: unknown): unknown =>
  value instanceof TypedValue ? value.value : value;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export const isInt32 = (value: number): boolean =>
  Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;

/**
 * The catalog type of a runtime value.
 *
 * - null / undefined  → null type
 * - integral number in Int32 range → System.Int32, other numbers → System.Double
 * - bigint → System.Int64, string → System.String, boolean → System.Boolean
 * - arrays → element type when every element agrees, else System.Object[]
 * - objects → catalog lookup, else System.Object
 */
export const runtimeTypeOf = (
  universe: TypeUniverse,
  value: unknown
): TypeDescriptor => {
  const known = universe.wellKnown;

  if (value instanceof TypedValue) return value.type;
  if (value === null || value === undefined) return known.null;

  switch (typeof value) {
    case "number":
      return isInt32(value) ? known.int32 : known.double;
    case "bigint":
      return known.int64;
    case "string":
      return known.string;
    case "boolean":
      return known.boolean;
    case "object":
      break;
    default:
      return known.object;
  }

  if (Array.isArray(value)) {
    const elementTypes = value.map((v: unknown) => runtimeTypeOf(universe, v));
    const [first] = elementTypes;
    const uniform =
      first !== undefined &&
      first.kind !== "null" &&
      elementTypes.every((t) => t.key === first.key);
    return universe.describe(
      arrayType(uniform ? first.ref : known.object.ref)
    );
  }

  const match = universe.catalog.findTypeOfInstance(value);
  if (!match) return known.object;

  return universe.describe(
    namedType(match.entry.fullName, match.typeArguments)
  );
};

/**
 * Human-readable rendering of a value for messages and CLI output.
 */
export const formatValue = (value: unknown): string => {
  const raw = unwrapValue(value);
  if (raw === null) return "null";
  if (raw === undefined) return "void";
  if (typeof raw === "string") return raw;
  if (typeof raw === "bigint") return raw.toString();
  if (typeof raw === "object") {
    const text = String(raw);
    if (text !== "[object Object]") return text;
    return JSON.stringify(raw, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
  }
  return String(raw);
};
