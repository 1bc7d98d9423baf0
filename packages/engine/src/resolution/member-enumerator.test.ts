/**
 * Tests for the member enumerator
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createDemoUniverse, typeOf } from "../test-harness.js";
import type { MethodDescriptor } from "../descriptors/method-descriptor.js";
import { findMethods } from "./member-enumerator.js";

const names = (methods: readonly MethodDescriptor[]): readonly string[] =>
  methods.map((m) => m.name);

describe("findMethods", () => {
  const universe = createDemoUniverse();
  const processor = typeOf(universe, "Demo.Processor");
  const circle = typeOf(universe, "Demo.Circle");
  const widget = typeOf(universe, "Demo.Widget");

  it("should list overloads in declaration order", () => {
    const { methods, diagnostics } = findMethods(universe, processor, "Process");
    expect(names(methods)).to.deep.equal(["Process", "Process"]);
    expect(methods.map((m) => m.parameters[0]?.type.fullName)).to.deep.equal([
      "System.Int32",
      "System.String",
    ]);
    expect(diagnostics).to.deep.equal([]);
  });

  it("should put constructors first, then own and inherited methods", () => {
    const { methods } = findMethods(universe, processor, "*");
    expect(names(methods)).to.deep.equal([
      ".ctor",
      "Process",
      "Process",
      "Pair",
      "Combine",
      "Combine",
      "Scale",
      "OldProcess",
      "Fail",
      "Missing",
      "Paint",
      "ToString",
      "Equals",
      "ReferenceEquals",
    ]);
  });

  it("should match wildcards case-insensitively", () => {
    const { methods } = findMethods(universe, processor, "comb*");
    expect(names(methods)).to.deep.equal(["Combine", "Combine"]);
  });

  it("should skip accessor names unless forced", () => {
    expect(names(findMethods(universe, processor, "get_*").methods)).to.deep.equal([]);
    expect(
      names(findMethods(universe, processor, "get_*", { force: true }).methods)
    ).to.deep.equal(["get_Name"]);
  });

  it("should filter by visibility", () => {
    expect(findMethods(universe, processor, "Secret").methods).to.have.length(0);
    const { methods } = findMethods(universe, processor, "*", { nonPublic: true });
    expect(names(methods)).to.deep.equal(["Secret"]);
  });

  it("should filter by static and instance binding", () => {
    expect(
      findMethods(universe, processor, "Scale", { static: true }).methods
    ).to.have.length(0);
    expect(
      names(findMethods(universe, processor, "Scale", { instance: true }).methods)
    ).to.deep.equal(["Scale"]);
  });

  it("should filter by attribute, with or without the Attribute suffix", () => {
    const { methods } = findMethods(universe, processor, "*", {}, ["Obsolete"]);
    expect(names(methods)).to.deep.equal(["OldProcess"]);
    const full = findMethods(universe, processor, "*", {}, [
      "System.ObsoleteAttribute",
    ]);
    expect(names(full.methods)).to.deep.equal(["OldProcess"]);
  });

  it("should hide base methods with the same signature", () => {
    const { methods } = findMethods(universe, circle, "Describe");
    expect(methods).to.have.length(1);
    expect(methods[0]?.declaringType.fullName).to.equal("Demo.Circle");
  });

  it("should match qualified names against the declaring type", () => {
    const { methods } = findMethods(universe, circle, "Object.ToString");
    expect(methods.map((m) => m.declaringType.fullName)).to.deep.equal([
      "System.Object",
    ]);
    expect(findMethods(universe, circle, "Circle.Area").methods).to.have.length(1);
  });

  it("should answer constructor requests by .ctor, new and the type name", () => {
    for (const name of [".ctor", "new", "Circle"]) {
      const { methods } = findMethods(universe, circle, name);
      expect(names(methods)).to.deep.equal([".ctor"]);
    }
  });

  it("should warn when an explicit constructor request finds none", () => {
    const { methods, diagnostics } = findMethods(universe, widget, "new");
    expect(methods).to.have.length(0);
    expect(diagnostics).to.have.length(1);
    expect(diagnostics[0]?.code).to.equal("CLR1002");
    expect(diagnostics[0]?.severity).to.equal("warning");
    expect(diagnostics[0]?.message).to.equal(
      "Type 'Demo.Widget' has no public constructors"
    );
  });

  it("should not warn for wildcards, noWarn or when non-public constructors are included", () => {
    expect(findMethods(universe, widget, "*").diagnostics).to.deep.equal([]);
    expect(
      findMethods(universe, widget, "new", { noWarn: true }).diagnostics
    ).to.deep.equal([]);
    const nonPublic = findMethods(universe, widget, "new", { nonPublic: true });
    expect(names(nonPublic.methods)).to.deep.equal([".ctor"]);
    expect(nonPublic.diagnostics).to.deep.equal([]);
  });

  it("should walk extended interfaces for interface types", () => {
    const list = typeOf(universe, "System.Collections.Generic.IList`1[System.Int32]");
    const { methods, diagnostics } = findMethods(universe, list, "*");
    expect(names(methods)).to.deep.equal(["IndexOf", "Insert", "Add", "Contains"]);
    expect(methods[0]?.parameters[0]?.type.fullName).to.equal("System.Int32");
    expect(diagnostics).to.deep.equal([]);
  });
});
