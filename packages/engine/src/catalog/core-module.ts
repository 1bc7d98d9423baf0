/**
 * Core module - the base types every catalog builds on
 *
 * System.Object and the primitives, System.Math, tuples and the generic
 * collection interfaces with List`1. Primitive values are plain JavaScript
 * values (see runtimeTypeOf); lists and tuples are CoreList and CoreTuple.
 */

import type { TypeRef } from "../model/type-ref.js";
import { InvocationArgumentError } from "../runtime/conversion.js";
import { formatValue, unwrapValue } from "../runtime/runtime-values.js";
import type {
  CatalogDocument,
  MethodDocument,
  TypeDocument,
} from "./catalog-document.js";
import { buildCatalogModule } from "./catalog-builder.js";
import type { CatalogModule, MethodInvocation } from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME VALUES
// ═══════════════════════════════════════════════════════════════════════════

export class CoreList {
  readonly items: unknown[];

  constructor(
    readonly elementType: TypeRef,
    items: readonly unknown[] = []
  ) {
    this.items = [...items];
  }

  toString(): string {
    return `[${this.items.map(formatValue).join(", ")}]`;
  }
}

export class CoreTuple {
  constructor(
    readonly typeArguments: readonly TypeRef[],
    readonly item1: unknown,
    readonly item2: unknown
  ) {}

  toString(): string {
    return `(${formatValue(this.item1)}, ${formatValue(this.item2)})`;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// ARGUMENT HELPERS
// ═══════════════════════════════════════════════════════════════════════════

const arg = (call: MethodInvocation, index: number): unknown =>
  unwrapValue(call.args[index]);

const numberArg = (call: MethodInvocation, index: number): number => {
  const value = arg(call, index);
  if (typeof value !== "number") {
    throw new InvocationArgumentError(`argument ${index + 1} must be a number`);
  }
  return value;
};

const bigintArg = (call: MethodInvocation, index: number): bigint => {
  const value = arg(call, index);
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  throw new InvocationArgumentError(`argument ${index + 1} must be an integer`);
};

const stringArg = (call: MethodInvocation, index: number): string => {
  const value = arg(call, index);
  if (typeof value !== "string") {
    throw new InvocationArgumentError(`argument ${index + 1} must be a string`);
  }
  return value;
};

const arrayArg = (call: MethodInvocation, index: number): readonly unknown[] => {
  const value = arg(call, index);
  if (Array.isArray(value)) return value;
  if (value instanceof CoreList) return value.items;
  throw new InvocationArgumentError(`argument ${index + 1} must be a sequence`);
};

const stringTarget = (call: MethodInvocation): string => {
  if (typeof call.target !== "string") {
    throw new InvocationArgumentError("target must be a string");
  }
  return call.target;
};

const listTarget = (call: MethodInvocation): CoreList => {
  if (!(call.target instanceof CoreList)) {
    throw new InvocationArgumentError("target must be a List");
  }
  return call.target;
};

const tupleTarget = (call: MethodInvocation): CoreTuple => {
  if (!(call.target instanceof CoreTuple)) {
    throw new InvocationArgumentError("target must be a Tuple");
  }
  return call.target;
};

const declaringTypeArguments = (call: MethodInvocation): readonly TypeRef[] => {
  const ref = call.method.declaringType.ref;
  return ref.kind === "namedType" ? ref.typeArguments : [];
};

const compare = <T extends number | bigint | string>(a: T, b: T): number =>
  a < b ? -1 : a > b ? 1 : 0;

const parseInteger = (text: string, kind: string): number => {
  const trimmed = text.trim();
  const value = Number(trimmed);
  if (!/^[+-]?\d+$/.test(trimmed) || !Number.isSafeInteger(value)) {
    throw new Error(`'${text}' is not a valid ${kind}`);
  }
  return value;
};

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

const comparableMethods = (self: string): readonly MethodDocument[] => [
  {
    name: "CompareTo",
    parameters: [{ name: "other", type: self }],
    returns: "int",
    implementation: (call) => {
      const target = unwrapValue(call.target);
      const other = arg(call, 0);
      if (typeof target === "number" && typeof other === "number") return compare(target, other);
      if (typeof target === "bigint" && typeof other === "bigint") return compare(target, other);
      if (typeof target === "string" && typeof other === "string") return compare(target, other);
      throw new InvocationArgumentError("values are not comparable");
    },
  },
];

const primitiveInterfaces = (self: string): readonly string[] => [
  `System.IComparable\`1[${self}]`,
  `System.IEquatable\`1[${self}]`,
];

const objectType: TypeDocument = {
  name: "System.Object",
  constructors: [{ implementation: () => ({}) }],
  methods: [
    {
      name: "ToString",
      returns: "string",
      implementation: (call) => formatValue(call.target),
    },
    {
      name: "Equals",
      parameters: [{ name: "obj", type: "object" }],
      returns: "bool",
      implementation: (call) => Object.is(unwrapValue(call.target), arg(call, 0)),
    },
    {
      name: "ReferenceEquals",
      static: true,
      parameters: [
        { name: "objA", type: "object" },
        { name: "objB", type: "object" },
      ],
      returns: "bool",
      implementation: (call) => Object.is(arg(call, 0), arg(call, 1)),
    },
  ],
};

const stringType: TypeDocument = {
  name: "System.String",
  sealed: true,
  interfaces: [
    ...primitiveInterfaces("System.String"),
    "System.Collections.Generic.IEnumerable`1[System.Char]",
  ],
  methods: [
    {
      name: "get_Length",
      returns: "int",
      implementation: (call) => stringTarget(call).length,
    },
    {
      name: "ToUpper",
      returns: "string",
      implementation: (call) => stringTarget(call).toUpperCase(),
    },
    {
      name: "Substring",
      parameters: [
        { name: "startIndex", type: "int" },
        { name: "length", type: "int" },
      ],
      returns: "string",
      implementation: (call) => {
        const text = stringTarget(call);
        const start = numberArg(call, 0);
        const length = numberArg(call, 1);
        if (start < 0 || length < 0 || start + length > text.length) {
          throw new RangeError(`Substring(${start}, ${length}) is outside '${text}'`);
        }
        return text.slice(start, start + length);
      },
    },
    {
      name: "Contains",
      parameters: [{ name: "value", type: "string" }],
      returns: "bool",
      implementation: (call) => stringTarget(call).includes(stringArg(call, 0)),
    },
    ...comparableMethods("string"),
    {
      name: "Concat",
      static: true,
      parameters: [
        { name: "str0", type: "string" },
        { name: "str1", type: "string" },
      ],
      returns: "string",
      implementation: (call) => `${formatValue(arg(call, 0))}${formatValue(arg(call, 1))}`,
    },
    {
      name: "Join",
      static: true,
      parameters: [
        { name: "separator", type: "string" },
        { name: "values", type: "string[]" },
      ],
      returns: "string",
      implementation: (call) =>
        arrayArg(call, 1).map(formatValue).join(stringArg(call, 0)),
    },
    {
      name: "IsNullOrEmpty",
      static: true,
      parameters: [{ name: "value", type: "string" }],
      returns: "bool",
      implementation: (call) => {
        const value = arg(call, 0);
        return value === null || value === "";
      },
    },
  ],
};

const int32Type: TypeDocument = {
  name: "System.Int32",
  kind: "struct",
  interfaces: primitiveInterfaces("System.Int32"),
  methods: [
    ...comparableMethods("int"),
    {
      name: "Parse",
      static: true,
      parameters: [{ name: "s", type: "string" }],
      returns: "int",
      implementation: (call) => parseInteger(stringArg(call, 0), "Int32"),
    },
  ],
};

const int64Type: TypeDocument = {
  name: "System.Int64",
  kind: "struct",
  interfaces: primitiveInterfaces("System.Int64"),
  methods: [
    ...comparableMethods("long"),
    {
      name: "Parse",
      static: true,
      parameters: [{ name: "s", type: "string" }],
      returns: "long",
      implementation: (call) => {
        const text = stringArg(call, 0).trim();
        if (!/^[+-]?\d+$/.test(text)) {
          throw new Error(`'${text}' is not a valid Int64`);
        }
        return BigInt(text);
      },
    },
  ],
};

const doubleType: TypeDocument = {
  name: "System.Double",
  kind: "struct",
  interfaces: primitiveInterfaces("System.Double"),
  methods: [
    ...comparableMethods("double"),
    {
      name: "Parse",
      static: true,
      parameters: [{ name: "s", type: "string" }],
      returns: "double",
      implementation: (call) => {
        const text = stringArg(call, 0).trim();
        const value = Number(text);
        if (text === "" || Number.isNaN(value)) {
          throw new Error(`'${text}' is not a valid Double`);
        }
        return value;
      },
    },
  ],
};

const booleanType: TypeDocument = {
  name: "System.Boolean",
  kind: "struct",
  interfaces: primitiveInterfaces("System.Boolean"),
  methods: [
    {
      name: "Parse",
      static: true,
      parameters: [{ name: "value", type: "string" }],
      returns: "bool",
      implementation: (call) => {
        const text = stringArg(call, 0).trim().toLowerCase();
        if (text !== "true" && text !== "false") {
          throw new Error(`'${text}' is not a valid Boolean`);
        }
        return text === "true";
      },
    },
  ],
};

const charType: TypeDocument = {
  name: "System.Char",
  kind: "struct",
  interfaces: primitiveInterfaces("System.Char"),
  methods: [
    {
      name: "IsDigit",
      static: true,
      parameters: [{ name: "c", type: "char" }],
      returns: "bool",
      implementation: (call) => /^\d$/.test(stringArg(call, 0)),
    },
  ],
};

const arrayType: TypeDocument = {
  name: "System.Array",
  abstract: true,
  interfaces: ["System.Collections.IEnumerable"],
  methods: [
    {
      name: "IndexOf",
      static: true,
      genericParameters: ["T"],
      parameters: [
        { name: "array", type: "T[]" },
        { name: "value", type: "T" },
      ],
      returns: "int",
      implementation: (call) => arrayArg(call, 0).indexOf(arg(call, 1)),
    },
    {
      name: "Empty",
      static: true,
      genericParameters: ["T"],
      returns: "T[]",
      implementation: () => [],
    },
  ],
};

const mathOverloads = (
  name: string,
  types: readonly string[],
  arity: 1 | 2,
  apply: (call: MethodInvocation, type: string) => unknown
): readonly MethodDocument[] =>
  types.map((type) => ({
    name,
    static: true,
    parameters:
      arity === 1
        ? [{ name: "value", type }]
        : [
            { name: "val1", type },
            { name: "val2", type },
          ],
    returns: type,
    implementation: (call: MethodInvocation) => apply(call, type),
  }));

const mathType: TypeDocument = {
  name: "System.Math",
  abstract: true,
  sealed: true,
  methods: [
    ...mathOverloads("Max", ["int", "long", "double"], 2, (call, type) =>
      type === "long"
        ? (() => {
            const a = bigintArg(call, 0);
            const b = bigintArg(call, 1);
            return a > b ? a : b;
          })()
        : Math.max(numberArg(call, 0), numberArg(call, 1))
    ),
    ...mathOverloads("Min", ["int", "long", "double"], 2, (call, type) =>
      type === "long"
        ? (() => {
            const a = bigintArg(call, 0);
            const b = bigintArg(call, 1);
            return a < b ? a : b;
          })()
        : Math.min(numberArg(call, 0), numberArg(call, 1))
    ),
    ...mathOverloads("Abs", ["int", "double"], 1, (call) =>
      Math.abs(numberArg(call, 0))
    ),
    {
      name: "Round",
      static: true,
      parameters: [{ name: "a", type: "double" }],
      returns: "double",
      implementation: (call) => Math.round(numberArg(call, 0)),
    },
  ],
};

const tupleFactoryType: TypeDocument = {
  name: "System.Tuple",
  abstract: true,
  sealed: true,
  methods: [
    {
      name: "Create",
      static: true,
      genericParameters: ["T1", "T2"],
      parameters: [
        { name: "item1", type: "T1" },
        { name: "item2", type: "T2" },
      ],
      returns: "System.Tuple`2[T1,T2]",
      implementation: (call) =>
        new CoreTuple(
          call.method.genericParameters.map((g) => g.ref),
          arg(call, 0),
          arg(call, 1)
        ),
    },
  ],
};

const tupleType: TypeDocument = {
  name: "System.Tuple`2",
  genericParameters: ["T1", "T2"],
  constructors: [
    {
      parameters: [
        { name: "item1", type: "T1" },
        { name: "item2", type: "T2" },
      ],
      implementation: (call) =>
        new CoreTuple(declaringTypeArguments(call), arg(call, 0), arg(call, 1)),
    },
  ],
  methods: [
    {
      name: "get_Item1",
      returns: "T1",
      implementation: (call) => tupleTarget(call).item1,
    },
    {
      name: "get_Item2",
      returns: "T2",
      implementation: (call) => tupleTarget(call).item2,
    },
  ],
  runtime: {
    ctor: CoreTuple,
    typeArgumentsOf: (value) =>
      value instanceof CoreTuple ? value.typeArguments : [],
  },
};

const interfaceTypes: readonly TypeDocument[] = [
  {
    name: "System.IComparable`1",
    kind: "interface",
    genericParameters: ["T"],
    methods: [
      { name: "CompareTo", parameters: [{ name: "other", type: "T" }], returns: "int" },
    ],
  },
  {
    name: "System.IEquatable`1",
    kind: "interface",
    genericParameters: ["T"],
    methods: [
      { name: "Equals", parameters: [{ name: "other", type: "T" }], returns: "bool" },
    ],
  },
  { name: "System.Collections.IEnumerable", kind: "interface" },
  {
    name: "System.Collections.Generic.IEnumerable`1",
    kind: "interface",
    genericParameters: ["T"],
    interfaces: ["System.Collections.IEnumerable"],
  },
  {
    name: "System.Collections.Generic.ICollection`1",
    kind: "interface",
    genericParameters: ["T"],
    interfaces: ["System.Collections.Generic.IEnumerable`1[T]"],
    methods: [
      { name: "Add", parameters: [{ name: "item", type: "T" }] },
      { name: "Contains", parameters: [{ name: "item", type: "T" }], returns: "bool" },
      { name: "get_Count", returns: "int" },
    ],
  },
  {
    name: "System.Collections.Generic.IList`1",
    kind: "interface",
    genericParameters: ["T"],
    interfaces: ["System.Collections.Generic.ICollection`1[T]"],
    methods: [
      { name: "IndexOf", parameters: [{ name: "item", type: "T" }], returns: "int" },
      {
        name: "Insert",
        parameters: [
          { name: "index", type: "int" },
          { name: "item", type: "T" },
        ],
      },
    ],
  },
];

const listType: TypeDocument = {
  name: "System.Collections.Generic.List`1",
  genericParameters: ["T"],
  interfaces: ["System.Collections.Generic.IList`1[T]"],
  constructors: [
    {
      implementation: (call) => {
        const [elementType] = declaringTypeArguments(call);
        if (!elementType) {
          throw new InvocationArgumentError("List needs an element type");
        }
        return new CoreList(elementType);
      },
    },
    {
      parameters: [
        {
          name: "collection",
          type: "System.Collections.Generic.IEnumerable`1[T]",
        },
      ],
      implementation: (call) => {
        const [elementType] = declaringTypeArguments(call);
        if (!elementType) {
          throw new InvocationArgumentError("List needs an element type");
        }
        return new CoreList(elementType, arrayArg(call, 0).map(unwrapValue));
      },
    },
  ],
  methods: [
    {
      name: "Add",
      parameters: [{ name: "item", type: "T" }],
      implementation: (call) => {
        listTarget(call).items.push(arg(call, 0));
        return undefined;
      },
    },
    {
      name: "AddRange",
      parameters: [
        {
          name: "collection",
          type: "System.Collections.Generic.IEnumerable`1[T]",
        },
      ],
      implementation: (call) => {
        listTarget(call).items.push(...arrayArg(call, 0).map(unwrapValue));
        return undefined;
      },
    },
    {
      name: "Contains",
      parameters: [{ name: "item", type: "T" }],
      returns: "bool",
      implementation: (call) => listTarget(call).items.includes(arg(call, 0)),
    },
    {
      name: "IndexOf",
      parameters: [{ name: "item", type: "T" }],
      returns: "int",
      implementation: (call) => listTarget(call).items.indexOf(arg(call, 0)),
    },
    {
      name: "Insert",
      parameters: [
        { name: "index", type: "int" },
        { name: "item", type: "T" },
      ],
      implementation: (call) => {
        const list = listTarget(call);
        const index = numberArg(call, 0);
        if (index < 0 || index > list.items.length) {
          throw new RangeError(`Index ${index} is outside the list`);
        }
        list.items.splice(index, 0, arg(call, 1));
        return undefined;
      },
    },
    {
      name: "get_Count",
      returns: "int",
      implementation: (call) => listTarget(call).items.length,
    },
    {
      name: "ToArray",
      returns: "T[]",
      implementation: (call) => [...listTarget(call).items],
    },
  ],
  runtime: {
    ctor: CoreList,
    typeArgumentsOf: (value) =>
      value instanceof CoreList ? [value.elementType] : [],
  },
};

export const coreDocument: CatalogDocument = {
  module: "System.Runtime",
  types: [
    objectType,
    { name: "System.ValueType", abstract: true },
    { name: "System.Enum", abstract: true, baseType: "System.ValueType" },
    stringType,
    int32Type,
    int64Type,
    doubleType,
    booleanType,
    charType,
    { name: "System.Void", kind: "struct" },
    arrayType,
    mathType,
    tupleFactoryType,
    tupleType,
    ...interfaceTypes,
    listType,
  ],
};

const built = buildCatalogModule(coreDocument);
if (!built.ok) {
  // The core document is fixed; a failure here is a programming error
  throw new Error(
    `Core catalog is invalid: ${built.error.map((d) => d.message).join("; ")}`
  );
}

export const coreModule: CatalogModule = built.value;
