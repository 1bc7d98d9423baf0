import { describe, it } from "mocha";
import { expect } from "chai";
import { createDemoCatalog } from "../test-harness.js";
import { CatalogInstance } from "../runtime/catalog-instance.js";
import { namedType } from "../model/type-ref.js";
import { buildCatalogModule } from "./catalog-builder.js";
import { CoreList, coreModule } from "./core-module.js";
import { createTypeCatalog } from "./type-catalog.js";

describe("TypeCatalog", () => {
  const catalog = createDemoCatalog();

  describe("listTypes", () => {
    it("should filter by name pattern, with or without arity", () => {
      expect(catalog.listTypes({ namePattern: "Box" }).map((t) => t.fullName)).to.deep.equal([
        "Demo.Box`1",
      ]);
      expect(
        catalog.listTypes({ namePattern: "I*`1", namespace: "System" }).map((t) => t.fullName)
      ).to.deep.equal(["System.IComparable`1", "System.IEquatable`1"]);
    });

    it("should filter by kind and namespace", () => {
      expect(
        catalog.listTypes({ kind: "enum", namespace: "Demo" }).map((t) => t.fullName)
      ).to.deep.equal(["Demo.Color"]);
    });

    it("should filter by attribute", () => {
      const module = buildCatalogModule({
        module: "Tagged",
        types: [
          { name: "Tagged.Old", attributes: ["System.ObsoleteAttribute"] },
          { name: "Tagged.New" },
        ],
      });
      if (!module.ok) throw new Error("module did not build");
      const tagged = createTypeCatalog([module.value]);
      expect(
        tagged.listTypes({ attribute: "ObsoleteAttribute" }).map((t) => t.fullName)
      ).to.deep.equal(["Tagged.Old"]);
    });
  });

  describe("modules", () => {
    it("should keep the first declaration of a duplicated name", () => {
      const shadow = buildCatalogModule({
        module: "Shadow",
        types: [{ name: "System.String", kind: "struct" }, { name: "Shadow.Extra" }],
      });
      if (!shadow.ok) throw new Error("module did not build");
      const merged = createTypeCatalog([coreModule, shadow.value]);
      expect(merged.getType("System.String")?.moduleName).to.equal("System.Runtime");
      expect(merged.getAssembliesByPattern("Sha*")).to.deep.equal([
        { name: "Shadow", typeCount: 1 },
      ]);
    });
  });

  describe("findTypeOfInstance", () => {
    it("should find class-backed values with their type arguments", () => {
      const match = catalog.findTypeOfInstance(new CoreList(namedType("System.Int32")));
      expect(match?.entry.fullName).to.equal("System.Collections.Generic.List`1");
      expect(match?.typeArguments).to.deep.equal([namedType("System.Int32")]);
    });

    it("should find catalog instances by type name", () => {
      const match = catalog.findTypeOfInstance(
        new CatalogInstance("Demo.Circle", [], { radius: 1 })
      );
      expect(match?.entry.fullName).to.equal("Demo.Circle");
    });

    it("should return undefined for unknown objects", () => {
      expect(catalog.findTypeOfInstance(new Date(0))).to.equal(undefined);
    });
  });
});
