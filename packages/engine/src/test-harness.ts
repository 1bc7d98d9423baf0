/**
 * Shared fixtures for engine tests: a small demo catalog on top of the
 * core module, and helpers to build a universe or a session over it.
 */

import type { CatalogDocument } from "./catalog/catalog-document.js";
import { buildCatalogModule } from "./catalog/catalog-builder.js";
import { coreModule } from "./catalog/core-module.js";
import { createTypeCatalog } from "./catalog/type-catalog.js";
import type { TypeCatalog } from "./catalog/types.js";
import type {
  TypeDescriptor,
  TypeUniverse,
} from "./descriptors/type-descriptor.js";
import { createTypeUniverse } from "./descriptors/type-descriptor.js";
import { CatalogInstance } from "./runtime/catalog-instance.js";
import type { PromptScript, ScriptedPrompt } from "./prompt/scripted-prompt.js";
import { createScriptedPrompt } from "./prompt/scripted-prompt.js";
import type { ResolutionSession } from "./session.js";
import { createResolutionSession } from "./session.js";

export const demoDocument: CatalogDocument = {
  module: "Demo",
  types: [
    {
      name: "Demo.IContainer`1",
      kind: "interface",
      genericParameters: ["T"],
      methods: [{ name: "Get", returns: "T" }],
    },
    {
      name: "Demo.Box`1",
      genericParameters: ["T"],
      interfaces: ["Demo.IContainer`1[T]"],
      constructors: [{ parameters: [{ name: "value", type: "T" }] }],
      methods: [
        {
          name: "Get",
          returns: "T",
          implementation: ({ target }) =>
            target instanceof CatalogInstance ? target.fields.value : null,
        },
      ],
    },
    {
      name: "Demo.Shape",
      abstract: true,
      methods: [
        { name: "Area", returns: "double" },
        { name: "Describe", returns: "string", template: "a shape" },
      ],
    },
    {
      name: "Demo.Circle",
      baseType: "Demo.Shape",
      constructors: [{ parameters: [{ name: "radius", type: "double" }] }],
      methods: [
        {
          name: "Area",
          returns: "double",
          implementation: ({ target }) => {
            const radius =
              target instanceof CatalogInstance ? target.fields.radius : 0;
            return typeof radius === "number" ? 3 * radius * radius : 0;
          },
        },
        { name: "Describe", returns: "string", template: "circle of {this.radius}" },
      ],
    },
    {
      name: "Demo.Processor",
      constructors: [{}],
      methods: [
        {
          name: "Process",
          static: true,
          parameters: [{ name: "value", type: "int" }],
          returns: "string",
          template: "int:{value}",
        },
        {
          name: "Process",
          static: true,
          parameters: [{ name: "value", type: "string" }],
          returns: "string",
          template: "string:{value}",
        },
        {
          name: "Pair",
          static: true,
          genericParameters: ["T"],
          parameters: [
            { name: "first", type: "T" },
            { name: "second", type: "string" },
          ],
          returns: "string",
          template: "{0}/{1}",
        },
        {
          name: "Combine",
          static: true,
          genericParameters: ["T", "U"],
          parameters: [
            { name: "a", type: "T" },
            { name: "b", type: "U" },
          ],
          returns: "string",
          template: "two:{a},{b}",
        },
        {
          name: "Combine",
          static: true,
          genericParameters: ["T"],
          parameters: [
            { name: "a", type: "T" },
            { name: "b", type: "T" },
          ],
          returns: "string",
          template: "one:{a},{b}",
        },
        {
          name: "Scale",
          parameters: [{ name: "factor", type: "int" }],
          returns: "string",
          template: "scaled by {factor}",
        },
        {
          name: "OldProcess",
          static: true,
          parameters: [{ name: "value", type: "int" }],
          attributes: ["System.ObsoleteAttribute"],
          returnValue: "old",
        },
        { name: "get_Name", returns: "string", returnValue: "processor" },
        { name: "Secret", public: false, returns: "string", returnValue: "hidden" },
        {
          name: "Fail",
          static: true,
          implementation: () => {
            throw new Error("boom");
          },
        },
        { name: "Missing", static: true },
        {
          name: "Paint",
          static: true,
          parameters: [{ name: "color", type: "Demo.Color" }],
          returns: "string",
          template: "paint {color}",
        },
      ],
    },
    {
      name: "Demo.Color",
      kind: "enum",
      enumValues: { Red: 0, Green: 1, Blue: 2 },
    },
    {
      name: "Demo.Widget",
      constructors: [{ public: false }],
    },
  ],
};

const demoModule = buildCatalogModule(demoDocument);
if (!demoModule.ok) {
  throw new Error(demoModule.error.map((d) => d.message).join("; "));
}

export const createDemoCatalog = (): TypeCatalog =>
  createTypeCatalog([coreModule, demoModule.value]);

export const createDemoUniverse = (): TypeUniverse =>
  createTypeUniverse(createDemoCatalog());

/**
 * Resolve a type name, failing the test on error.
 */
export const typeOf = (universe: TypeUniverse, name: string): TypeDescriptor => {
  const result = universe.resolveTypeName(name);
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
};

export const createDemoSession = (
  script: PromptScript = {},
  maxRebindAttempts?: number
): { readonly session: ResolutionSession; readonly prompt: ScriptedPrompt } => {
  const prompt = createScriptedPrompt(script);
  const session = createResolutionSession({
    catalog: createDemoCatalog(),
    prompt,
    ...(maxRebindAttempts !== undefined ? { maxRebindAttempts } : {}),
  });
  return { session, prompt };
};
