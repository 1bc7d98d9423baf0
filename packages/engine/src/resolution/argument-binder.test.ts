/**
 * Tests for the argument binder and overload selection
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createDemoUniverse, typeOf } from "../test-harness.js";
import { buildCatalogModule } from "../catalog/catalog-builder.js";
import { coreModule } from "../catalog/core-module.js";
import { createTypeCatalog } from "../catalog/type-catalog.js";
import type { TypeDescriptor, TypeUniverse } from "../descriptors/type-descriptor.js";
import { createTypeUniverse } from "../descriptors/type-descriptor.js";
import type { MethodDescriptor } from "../descriptors/method-descriptor.js";
import { getDeclaredMembers } from "../descriptors/method-descriptor.js";
import type { PromptScript } from "../prompt/scripted-prompt.js";
import { createScriptedPrompt } from "../prompt/scripted-prompt.js";
import { TypedValue } from "../runtime/runtime-values.js";
import { bindArguments, selectOverload } from "./argument-binder.js";

const methodsNamed = (
  universe: TypeUniverse,
  type: TypeDescriptor,
  name: string
): readonly MethodDescriptor[] =>
  getDeclaredMembers(universe, type).methods.filter((m) => m.name === name);

const first = (methods: readonly MethodDescriptor[]): MethodDescriptor => {
  const [method] = methods;
  if (!method) throw new Error("no method");
  return method;
};

describe("bindArguments", () => {
  const universe = createDemoUniverse();
  const processor = typeOf(universe, "Demo.Processor");
  const processInt = first(methodsNamed(universe, processor, "Process"));

  const contextWith = (script: PromptScript = {}) => {
    const prompt = createScriptedPrompt(script);
    return { context: { universe, prompt }, prompt };
  };

  it("should bind matching values without prompting", async () => {
    const { context, prompt } = contextWith();
    const result = await bindArguments(processInt, [5], context);
    expect(result.boundArguments).to.deep.equal([5]);
    expect(result.promptedPositions).to.deep.equal([]);
    expect(result.failedPositions).to.deep.equal([]);
    expect(result.unusedArguments).to.deep.equal([]);
    expect(prompt.transcript()).to.deep.equal([]);
  });

  it("should give the same binding when run twice", async () => {
    const { context } = contextWith();
    const once = await bindArguments(processInt, [5], context);
    const twice = await bindArguments(processInt, [5], context);
    expect(twice.boundArguments).to.deep.equal(once.boundArguments);
    expect(twice.method).to.equal(once.method);
  });

  it("should take the first assignable value regardless of position", async () => {
    const { context } = contextWith();
    const result = await bindArguments(processInt, ["text", 7], context);
    expect(result.boundArguments).to.deep.equal([7]);
    expect(result.unusedArguments).to.deep.equal([0]);
  });

  it("should prompt for missing values and convert the answer", async () => {
    const { context, prompt } = contextWith({ lines: ["12"] });
    const result = await bindArguments(processInt, [], context);
    expect(result.boundArguments).to.deep.equal([12]);
    expect(result.promptedPositions).to.deep.equal([0]);
    expect(prompt.transcript()).to.deep.equal([
      { kind: "readLine", message: "Process: int value", answer: "12" },
    ]);
  });

  it("should bind null with a warning when the answer does not convert", async () => {
    const { context } = contextWith({ lines: ["abc"] });
    const result = await bindArguments(processInt, [], context);
    expect(result.boundArguments).to.deep.equal([null]);
    expect(result.failedPositions).to.deep.equal([0]);
    expect(result.diagnostics.map((d) => [d.code, d.message])).to.deep.equal([
      [
        "CLR2001",
        "Parameter 'value' of 'Process' bound to null: Cannot convert 'abc' to int",
      ],
    ]);
  });

  it("should evaluate literal expressions typed at the prompt", async () => {
    const { context } = contextWith({ lines: ['["a", "b"]'] });
    const join = first(methodsNamed(universe, universe.wellKnown.string, "Join"));
    const result = await bindArguments(join, [","], context);
    expect(result.boundArguments[0]).to.equal(",");
    const values = result.boundArguments[1];
    expect(values).to.be.instanceOf(TypedValue);
    if (values instanceof TypedValue) {
      expect(values.value).to.deep.equal(["a", "b"]);
      expect(values.type.fullName).to.equal("System.String[]");
    }
  });

  it("should convert enum names typed at the prompt", async () => {
    const { context } = contextWith({ lines: ["blue"] });
    const paint = first(methodsNamed(universe, processor, "Paint"));
    const result = await bindArguments(paint, [], context);
    const [color] = result.boundArguments;
    expect(color instanceof TypedValue && color.value).to.equal(2);
  });

  it("should close a generic method from the bound values", async () => {
    const { context } = contextWith();
    const pair = first(methodsNamed(universe, processor, "Pair"));
    const result = await bindArguments(pair, [42, "x"], context);
    expect(result.method.isGenericMethodDefinition).to.equal(false);
    expect(result.closedGenericParameters.map((t) => t.fullName)).to.deep.equal([
      "System.Int32",
    ]);
    expect(result.method.parameters[0]?.type.fullName).to.equal("System.Int32");
  });

  it("should fill omitted optional parameters with their defaults", async () => {
    const module = buildCatalogModule({
      module: "Greetings",
      types: [
        {
          name: "Greetings.Greeter",
          methods: [
            {
              name: "Greet",
              parameters: [
                { name: "name", type: "string" },
                { name: "times", type: "int", default: 1 },
                { name: "loud", type: "bool", optional: true },
              ],
            },
          ],
        },
      ],
    });
    if (!module.ok) throw new Error("module did not build");
    const greetings = createTypeUniverse(createTypeCatalog([coreModule, module.value]));
    const greet = first(
      methodsNamed(greetings, typeOf(greetings, "Greetings.Greeter"), "Greet")
    );
    const prompt = createScriptedPrompt();

    const result = await bindArguments(greet, ["Ann"], { universe: greetings, prompt });
    expect(result.boundArguments).to.deep.equal(["Ann", 1, null]);
    expect(prompt.transcript()).to.deep.equal([]);
  });

  it("should report the binding through the log", async () => {
    const lines: string[] = [];
    const prompt = createScriptedPrompt({ lines: ["3"] });
    await bindArguments(processInt, [], {
      universe,
      prompt,
      log: (message) => lines.push(message),
    });
    expect(lines).to.deep.equal(["bound string Process(int value) (prompted for 1)"]);
  });
});

describe("selectOverload", () => {
  const universe = createDemoUniverse();
  const processor = typeOf(universe, "Demo.Processor");
  const overloads = methodsNamed(universe, processor, "Process");

  it("should fail without candidates", async () => {
    const result = await selectOverload([], {
      universe,
      prompt: createScriptedPrompt(),
    });
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.code).to.equal("CLR1001");
    }
  });

  it("should return a single candidate without asking", async () => {
    const prompt = createScriptedPrompt();
    const only = first(overloads);
    const result = await selectOverload([only], { universe, prompt });
    expect(result).to.deep.equal({ ok: true, value: only });
    expect(prompt.transcript()).to.deep.equal([]);
  });

  it("should ask with simple signatures and the last overload as default", async () => {
    const prompt = createScriptedPrompt({ choices: [0] });
    const result = await selectOverload(overloads, { universe, prompt });
    expect(result.ok && result.value).to.equal(overloads[0]);

    const [event] = prompt.transcript();
    expect(event?.kind).to.equal("choose");
    if (event?.kind === "choose") {
      expect(event.options.map((o) => o.label)).to.deep.equal([
        "string Process(int value)",
        "string Process(string value)",
      ]);
      expect(event.options[0]?.helpText).to.equal("Processor.Process(int value)");
      expect(event.defaultIndices).to.deep.equal([1]);
      expect(event.answer).to.deep.equal([0]);
    }
  });

  it("should report an empty answer as aborted", async () => {
    const prompt = createScriptedPrompt({ choices: [[]] });
    const result = await selectOverload(overloads, { universe, prompt });
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.code).to.equal("CLR1004");
      expect(result.error.message).to.equal("No overload of 'Process' was chosen");
      expect(result.error.details?.candidates).to.deep.equal([
        "string Process(int value)",
        "string Process(string value)",
      ]);
    }
  });
});
