/**
 * Tests for resolveAndInvoke
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createDemoCatalog, createDemoSession } from "./test-harness.js";
import { CatalogInstance } from "./runtime/catalog-instance.js";
import { buildCatalogModule } from "./catalog/catalog-builder.js";
import { CoreList, coreModule } from "./catalog/core-module.js";
import { createTypeCatalog } from "./catalog/type-catalog.js";
import { getDeclaredMembers } from "./descriptors/method-descriptor.js";
import { createScriptedPrompt } from "./prompt/scripted-prompt.js";
import { createResolutionSession, resolveAndInvoke } from "./session.js";

const createRunnerSession = () => {
  const runner = buildCatalogModule({
    module: "Jobs",
    types: [
      {
        name: "Jobs.Runner",
        methods: [
          {
            name: "Run",
            static: true,
            genericParameters: ["T", "U"],
            parameters: [
              { name: "a", type: "T" },
              { name: "b", type: "U" },
            ],
            attributes: ["System.ObsoleteAttribute"],
            returnValue: "attributed",
          },
          {
            name: "Run",
            static: true,
            genericParameters: ["T"],
            parameters: [
              { name: "a", type: "T" },
              { name: "b", type: "T" },
            ],
            returnValue: "unattributed",
          },
          {
            name: "Peek",
            static: true,
            public: false,
            genericParameters: ["T"],
            parameters: [{ name: "value", type: "T" }],
            returnValue: "hidden",
          },
        ],
      },
    ],
  });
  if (!runner.ok) throw new Error(runner.error.map((d) => d.message).join("; "));
  return createResolutionSession({
    catalog: createTypeCatalog([coreModule, runner.value]),
    prompt: createScriptedPrompt(),
  });
};

describe("resolveAndInvoke", () => {
  describe("overload resolution", () => {
    it("should call a single exact match without asking", async () => {
      const { session, prompt } = createDemoSession();
      const result = await resolveAndInvoke(session, {
        member: "Max",
        declaringType: "System.Math",
        arguments: [3, 5],
        isStatic: true,
      });
      expect(result.ok && result.value.value).to.equal(5);
      expect(prompt.transcript()).to.deep.equal([]);
    });

    it("should narrow to the only overload taking every argument", async () => {
      const { session, prompt } = createDemoSession();
      const result = await resolveAndInvoke(session, {
        member: "Max",
        declaringType: "Math",
        arguments: [3, 2.5],
        isStatic: true,
      });
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.value).to.equal(3);
        expect(result.value.method.parameters[0]?.type.fullName).to.equal(
          "System.Double"
        );
        expect(result.value.diagnostics).to.deep.equal([]);
      }
      expect(prompt.transcript()).to.deep.equal([]);
    });

    it("should ask for an overload, then for the value, when nothing fits", async () => {
      const { session, prompt } = createDemoSession();
      const result = await resolveAndInvoke(session, {
        member: "Process",
        declaringType: "Demo.Processor",
        arguments: [{}],
        isStatic: true,
      });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.value).to.equal("string:");
        expect(result.value.diagnostics.map((d) => d.code)).to.deep.equal(["CLR1003"]);
      }

      const events = prompt.transcript();
      expect(events.map((e) => e.kind)).to.deep.equal(["choose", "readLine"]);
      const [choice, line] = events;
      if (choice?.kind === "choose") {
        expect(choice.options).to.have.length(2);
        expect(choice.defaultIndices).to.deep.equal([1]);
      }
      expect(line?.message).to.equal("Process: string value");
    });

    it("should use the overload the user picks", async () => {
      const { session } = createDemoSession({ choices: [0], lines: ["41"] });
      const result = await resolveAndInvoke(session, {
        member: "Process",
        declaringType: "Demo.Processor",
        arguments: [],
        isStatic: true,
      });
      expect(result.ok && result.value.value).to.equal("int:41");
    });

    it("should fail when the choice is aborted", async () => {
      const { session } = createDemoSession({ choices: [[]] });
      const result = await resolveAndInvoke(session, {
        member: "Process",
        declaringType: "Demo.Processor",
        arguments: [],
        isStatic: true,
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("CLR1004");
      }
    });
  });

  describe("rebinding", () => {
    it("should ask again when the chosen overload cannot bind", async () => {
      const { session, prompt } = createDemoSession({
        choices: [0, 1],
        lines: ["x", "hello"],
      });
      const result = await resolveAndInvoke(session, {
        member: "Process",
        declaringType: "Demo.Processor",
        arguments: [],
        isStatic: true,
      });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.value).to.equal("string:hello");
        expect(result.value.diagnostics.map((d) => d.code)).to.deep.equal([
          "CLR1003",
          "CLR2001",
        ]);
      }
      expect(prompt.transcript().map((e) => e.kind)).to.deep.equal([
        "choose",
        "readLine",
        "choose",
        "readLine",
      ]);
    });

    it("should give up after the configured number of attempts", async () => {
      const { session, prompt } = createDemoSession(
        { choices: [0, 0, 0], lines: ["x", "y", "z"] },
        2
      );
      const result = await resolveAndInvoke(session, {
        member: "Process",
        declaringType: "Demo.Processor",
        arguments: [],
        isStatic: true,
      });

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("CLR2002");
        expect(result.error.message).to.equal(
          "Could not bind arguments after 2 attempt(s)"
        );
        expect(result.error.details?.candidates).to.deep.equal([
          "string Process(int value)",
          "string Process(string value)",
        ]);
      }
      expect(prompt.transcript()).to.have.length(4);
    });
  });

  describe("generic methods", () => {
    it("should infer generic arguments from the values", async () => {
      const { session } = createDemoSession();
      const result = await resolveAndInvoke(session, {
        member: "Pair",
        declaringType: "Demo.Processor",
        arguments: [42, "x"],
        isStatic: true,
      });
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.value).to.equal("42/x");
        expect(result.value.method.genericParameters.map((t) => t.fullName)).to.deep.equal([
          "System.Int32",
        ]);
      }
    });

    it("should prefer the overload with fewer generic parameters", async () => {
      const { session } = createDemoSession();
      const result = await resolveAndInvoke(session, {
        member: "Combine",
        declaringType: "Demo.Processor",
        arguments: [1, 2],
        isStatic: true,
      });
      expect(result.ok && result.value.value).to.equal("one:1,2");
    });

    it("should pick generic overloads only among attribute-filtered members", async () => {
      const session = createRunnerSession();
      const unfiltered = await resolveAndInvoke(session, {
        member: "Run",
        declaringType: "Jobs.Runner",
        arguments: [1, 2],
        isStatic: true,
      });
      expect(unfiltered.ok && unfiltered.value.value).to.equal("unattributed");

      const filtered = await resolveAndInvoke(session, {
        member: "Run",
        declaringType: "Jobs.Runner",
        arguments: [1, 2],
        isStatic: true,
        attributeFilter: ["Obsolete"],
      });
      expect(filtered.ok && filtered.value.value).to.equal("attributed");
    });

    it("should infer non-public generic methods when asked for them", async () => {
      const session = createRunnerSession();
      const result = await resolveAndInvoke(session, {
        member: "Peek",
        declaringType: "Jobs.Runner",
        arguments: [7],
        isStatic: true,
        visibility: { static: true, nonPublic: true },
      });
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.value).to.equal("hidden");
        expect(result.value.method.genericParameters.map((t) => t.fullName)).to.deep.equal([
          "System.Int32",
        ]);
      }
    });
  });

  describe("instances", () => {
    it("should construct an instance and call inherited and own members on it", async () => {
      const { session } = createDemoSession();
      const created = await resolveAndInvoke(session, {
        member: "new",
        declaringType: "Circle",
        arguments: [2],
        isStatic: false,
      });
      expect(created.ok).to.equal(true);
      if (!created.ok) return;

      const circle = created.value.value;
      expect(circle).to.be.instanceOf(CatalogInstance);
      expect(String(circle)).to.equal("Circle(radius=2)");

      const area = await resolveAndInvoke(session, {
        target: circle,
        member: "Area",
        arguments: [],
        isStatic: false,
      });
      expect(area.ok && area.value.value).to.equal(12);

      const description = await resolveAndInvoke(session, {
        target: circle,
        member: "Describe",
        arguments: [],
        isStatic: false,
      });
      expect(description.ok && description.value.value).to.equal("circle of 2");
    });

    it("should work with closed generic collections", async () => {
      const { session } = createDemoSession();
      const created = await resolveAndInvoke(session, {
        member: "new",
        declaringType: "List<int>",
        arguments: [],
        isStatic: false,
      });
      if (!created.ok) throw new Error(created.error.message);
      const list = created.value.value;
      expect(list).to.be.instanceOf(CoreList);

      const added = await resolveAndInvoke(session, {
        target: list,
        member: "Add",
        arguments: [5],
        isStatic: false,
      });
      expect(added.ok).to.equal(true);

      const count = await resolveAndInvoke(session, {
        target: list,
        member: "get_Count",
        arguments: [],
        isStatic: false,
        visibility: { instance: true, force: true },
      });
      expect(count.ok && count.value.value).to.equal(1);
    });

    it("should invoke a method descriptor directly", async () => {
      const { session } = createDemoSession();
      const processor = session.universe.getType("Demo.Processor");
      const scale = processor
        ? getDeclaredMembers(session.universe, processor).methods.find(
            (m) => m.name === "Scale"
          )
        : undefined;
      if (!scale) throw new Error("Scale not found");

      const result = await resolveAndInvoke(session, {
        target: new CatalogInstance("Demo.Processor", [], {}),
        member: scale,
        arguments: [3],
        isStatic: false,
      });
      expect(result.ok && result.value.value).to.equal("scaled by 3");
    });

    it("should convert enum names typed at the prompt", async () => {
      const { session } = createDemoSession({ lines: ["Green"] });
      const result = await resolveAndInvoke(session, {
        member: "Paint",
        declaringType: "Demo.Processor",
        arguments: [],
        isStatic: true,
      });
      expect(result.ok && result.value.value).to.equal("paint 1");
    });
  });

  describe("failures", () => {
    it("should report unknown members", async () => {
      const { session } = createDemoSession();
      const result = await resolveAndInvoke(session, {
        member: "Nope",
        declaringType: "Demo.Processor",
        arguments: [],
        isStatic: true,
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("CLR1001");
        expect(result.error.message).to.equal(
          "No member 'Nope' found on 'Demo.Processor'"
        );
        expect(result.error.hint).to.equal("Instance members need a target instance");
      }
    });

    it("should need a declaring type or a target", async () => {
      const { session } = createDemoSession();
      const result = await resolveAndInvoke(session, {
        member: "ToString",
        arguments: [],
        isStatic: false,
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.message).to.equal(
          "A declaring type or a target instance is required"
        );
      }
    });

    it("should report an implementation that throws", async () => {
      const { session } = createDemoSession();
      const result = await resolveAndInvoke(session, {
        member: "Fail",
        declaringType: "Demo.Processor",
        arguments: [],
        isStatic: true,
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("CLR4001");
        expect(result.error.message).to.equal("'Fail' failed: boom");
        expect(result.error.cause).to.be.instanceOf(Error);
      }
    });

    it("should report a method without implementation", async () => {
      const { session } = createDemoSession();
      const result = await resolveAndInvoke(session, {
        member: "Missing",
        declaringType: "Demo.Processor",
        arguments: [],
        isStatic: true,
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("CLR4003");
        expect(result.error.message).to.equal(
          "'Processor.Missing()' has no implementation in the catalog"
        );
      }
    });

    it("should refuse a value type bound to null at invocation", async () => {
      const { session } = createDemoSession({ lines: ["Purple"] });
      const result = await resolveAndInvoke(session, {
        member: "Paint",
        declaringType: "Demo.Processor",
        arguments: [],
        isStatic: true,
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("CLR4002");
        expect(result.error.message).to.equal(
          "Argument 1 ('null') does not match parameter 'Color color'"
        );
      }
    });

    it("should report an unknown declaring type", async () => {
      const { session } = createDemoSession();
      const result = await resolveAndInvoke(session, {
        member: "Anything",
        declaringType: "Demo.Nowhere",
        arguments: [],
        isStatic: true,
      });
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.code).to.equal("CLR5002");
      }
    });
  });

  describe("createResolutionSession", () => {
    it("should reject a non-positive rebind limit", () => {
      expect(() =>
        createResolutionSession({
          catalog: createDemoCatalog(),
          prompt: createScriptedPrompt(),
          maxRebindAttempts: 0,
        })
      ).to.throw(RangeError, "maxRebindAttempts must be a positive integer, got 0");
    });

    it("should trace the resolution steps through the log", async () => {
      const lines: string[] = [];
      const session = createResolutionSession({
        catalog: createDemoCatalog(),
        prompt: createScriptedPrompt(),
        log: (message) => lines.push(message),
      });
      await resolveAndInvoke(session, {
        member: "Fail",
        declaringType: "Demo.Processor",
        arguments: [],
        isStatic: true,
      });
      expect(lines).to.deep.equal([
        "1 candidate(s) for 'Fail' on Demo.Processor",
        "exact match void Fail()",
        "bound void Fail()",
        "invoking Processor.Fail()",
      ]);
    });

    it("should resolve names through registered aliases", async () => {
      const { session } = createDemoSession();
      const added = session.aliases.add("shapes", "Demo.Circle");
      expect(added.ok).to.equal(true);
      const result = await resolveAndInvoke(session, {
        member: "new",
        declaringType: "shapes",
        arguments: [1.5],
        isStatic: false,
      });
      expect(result.ok && String(result.value.value)).to.equal("Circle(radius=1.5)");
    });
  });
});
