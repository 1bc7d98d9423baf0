/**
 * Tests for the types, members and assignable commands
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createShopContext } from "../test-context.js";
import { typesCommand } from "./types.js";
import { membersCommand } from "./members.js";
import { assignableCommand } from "./assignable.js";

describe("types command", () => {
  it("should list matching types with their kind", async () => {
    const context = await createShopContext();
    const result = typesCommand(context, "Shop.*", {});
    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.lines).to.deep.equal([
        "class     Shop.Item",
        "class     Shop.Pricing",
      ]);
    }
  });

  it("should filter by namespace alone", async () => {
    const context = await createShopContext();
    const result = typesCommand(context, undefined, { namespace: "Shop" });
    expect(result.ok && result.value.lines.length).to.equal(2);
  });

  it("should fail when nothing matches", async () => {
    const context = await createShopContext();
    const result = typesCommand(context, "Nope*", {});
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error).to.equal("No types match 'Nope*'");
    }
  });
});

describe("members command", () => {
  it("should render simple signatures by default", async () => {
    const context = await createShopContext();
    const result = membersCommand(context, "Shop.Pricing", "Disc*", {});
    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.lines).to.deep.equal([
        "string Discount(double price)",
        "string Discount(string code)",
      ]);
      expect(result.value.warnings).to.deep.equal([]);
    }
  });

  it("should render constructors in full style", async () => {
    const context = await createShopContext();
    const result = membersCommand(context, "Shop.Item", "new", { style: "full" });
    expect(result.ok && result.value.lines).to.deep.equal([
      "new Item(string name, double price)",
    ]);
  });

  it("should render parameter blocks", async () => {
    const context = await createShopContext();
    const result = membersCommand(context, "Shop.Item", "Rename", {
      style: "paramBlock",
    });
    expect(result.ok && result.value.lines).to.deep.equal(["[Mandatory] string name"]);
  });

  it("should filter by attribute", async () => {
    const context = await createShopContext();
    const result = membersCommand(context, "Shop.Pricing", undefined, {
      attribute: "Obsolete",
    });
    expect(result.ok && result.value.lines).to.deep.equal(["string Label(int id)"]);
  });

  it("should warn about a missing constructor unless told not to", async () => {
    const context = await createShopContext();
    const warned = membersCommand(context, "Shop.Pricing", "new", {});
    expect(warned.ok).to.equal(true);
    if (warned.ok) {
      expect(warned.value.lines).to.deep.equal([]);
      expect(warned.value.warnings).to.deep.equal([
        "warning CLR1002: Type 'Shop.Pricing' has no public constructors Hint: Use the nonPublic flag to include non-public constructors",
      ]);
    }

    const quiet = membersCommand(context, "Shop.Pricing", "new", { noWarn: true });
    expect(quiet.ok && quiet.value.warnings).to.deep.equal([]);
  });

  it("should resolve configured aliases", async () => {
    const context = await createShopContext({ aliases: { item: "Shop.Item" } });
    const result = membersCommand(context, "item", "Describe", {});
    expect(result.ok && result.value.lines).to.deep.equal(["string Describe()"]);
  });

  it("should report unknown types", async () => {
    const context = await createShopContext();
    const result = membersCommand(context, "Shop.Nowhere", undefined, {});
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error).to.equal("error CLR5002: Type 'Shop.Nowhere' not found");
    }
  });
});

describe("assignable command", () => {
  it("should report the matched interface", async () => {
    const context = await createShopContext();
    const result = assignableCommand(
      context,
      "List<int>",
      "System.Collections.Generic.IEnumerable`1",
      {}
    );
    expect(result.ok && result.value.lines).to.deep.equal([
      "true",
      "via System.Collections.Generic.IEnumerable`1[System.Int32]",
    ]);
  });

  it("should print false when the type does not implement the target", async () => {
    const context = await createShopContext();
    const result = assignableCommand(
      context,
      "int",
      "System.Collections.Generic.IList`1",
      {}
    );
    expect(result.ok && result.value.lines).to.deep.equal(["false"]);
  });
});
