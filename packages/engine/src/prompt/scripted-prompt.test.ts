import { describe, it } from "mocha";
import { expect } from "chai";
import { createScriptedPrompt } from "./scripted-prompt.js";
import { presentChoiceSet } from "./choice-set.js";
import type { ChoiceSet } from "./choice-set.js";

const options = [
  { label: "first", helpText: "the first" },
  { label: "second", helpText: "the second" },
  { label: "third", helpText: "the third" },
];

describe("createScriptedPrompt", () => {
  it("should answer choices in order, then fall back to defaults", async () => {
    const prompt = createScriptedPrompt({ choices: [2] });
    expect(await prompt.choose("c", "m", options, [0], false)).to.deep.equal([2]);
    expect(await prompt.choose("c", "m", options, [1], false)).to.deep.equal([1]);
  });

  it("should drop out-of-range indices and keep one unless multiple are allowed", async () => {
    const prompt = createScriptedPrompt({ choices: [[5, 1, 2], [5, 1, 2]] });
    expect(await prompt.choose("c", "m", options, [], false)).to.deep.equal([1]);
    expect(await prompt.choose("c", "m", options, [], true)).to.deep.equal([1, 2]);
  });

  it("should answer lines in order, then with empty text", async () => {
    const prompt = createScriptedPrompt({ lines: ["one"] });
    expect(await prompt.readLine("a")).to.equal("one");
    expect(await prompt.readLine("b")).to.equal("");
    expect(prompt.transcript()).to.deep.equal([
      { kind: "readLine", message: "a", answer: "one" },
      { kind: "readLine", message: "b", answer: "" },
    ]);
  });
});

describe("presentChoiceSet", () => {
  const set: ChoiceSet<string> = {
    caption: "Pick",
    message: "Pick some",
    entries: options.map((o, i) => ({ ...o, value: `value-${i}` })),
    defaultIndices: [0],
    allowMultiple: true,
  };

  it("should map selected indices back to values", async () => {
    const prompt = createScriptedPrompt({ choices: [[2, 0]] });
    expect(await presentChoiceSet(prompt, set)).to.deep.equal(["value-2", "value-0"]);
  });

  it("should pass caption, message and defaults through", async () => {
    const prompt = createScriptedPrompt();
    expect(await presentChoiceSet(prompt, set)).to.deep.equal(["value-0"]);
    const [event] = prompt.transcript();
    expect(event).to.deep.include({
      kind: "choose",
      caption: "Pick",
      message: "Pick some",
      defaultIndices: [0],
    });
  });
});
