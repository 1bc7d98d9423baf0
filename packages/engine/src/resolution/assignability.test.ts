import { describe, it } from "mocha";
import { expect } from "chai";
import { createDemoUniverse, typeOf } from "../test-harness.js";
import { makeArrayType } from "../descriptors/type-descriptor.js";
import { TypedValue } from "../runtime/runtime-values.js";
import { CatalogInstance } from "../runtime/catalog-instance.js";
import { isAssignableFrom, isValueAssignable } from "./assignability.js";

describe("isAssignableFrom", () => {
  const universe = createDemoUniverse();
  const { object, string, int32, int64, double, char, boolean } = universe.wellKnown;

  it("should accept identity and System.Object", () => {
    expect(isAssignableFrom(string, string)).to.equal(true);
    expect(isAssignableFrom(object, int32)).to.equal(true);
    expect(isAssignableFrom(int32, object)).to.equal(false);
  });

  it("should apply implicit numeric widening only upwards", () => {
    expect(isAssignableFrom(int64, int32)).to.equal(true);
    expect(isAssignableFrom(double, int64)).to.equal(true);
    expect(isAssignableFrom(int32, char)).to.equal(true);
    expect(isAssignableFrom(int32, int64)).to.equal(false);
    expect(isAssignableFrom(int32, boolean)).to.equal(false);
  });

  it("should walk base types and interfaces", () => {
    const shape = typeOf(universe, "Demo.Shape");
    const circle = typeOf(universe, "Demo.Circle");
    const container = typeOf(universe, "Demo.IContainer`1[System.String]");
    const box = typeOf(universe, "Demo.Box`1[System.String]");
    expect(isAssignableFrom(shape, circle)).to.equal(true);
    expect(isAssignableFrom(circle, shape)).to.equal(false);
    expect(isAssignableFrom(container, box)).to.equal(true);
    expect(
      isAssignableFrom(typeOf(universe, "Demo.IContainer`1[System.Object]"), box)
    ).to.equal(false);
  });

  it("should treat arrays covariantly for reference elements only", () => {
    const shapes = makeArrayType(universe, typeOf(universe, "Demo.Shape"));
    const circles = makeArrayType(universe, typeOf(universe, "Demo.Circle"));
    const ints = makeArrayType(universe, int32);
    const longs = makeArrayType(universe, int64);
    expect(isAssignableFrom(shapes, circles)).to.equal(true);
    expect(isAssignableFrom(longs, ints)).to.equal(false);
    expect(isAssignableFrom(makeArrayType(universe, int32, 2), ints)).to.equal(false);
  });

  it("should let null into reference types but not value types", () => {
    const nullType = universe.wellKnown.null;
    expect(isAssignableFrom(string, nullType)).to.equal(true);
    expect(isAssignableFrom(int32, nullType)).to.equal(false);
  });
});

describe("isValueAssignable", () => {
  const universe = createDemoUniverse();
  const { string, int32, int64, double, char } = universe.wellKnown;

  it("should type JavaScript values", () => {
    expect(isValueAssignable(universe, 3, int32)).to.equal(true);
    expect(isValueAssignable(universe, 3.5, int32)).to.equal(false);
    expect(isValueAssignable(universe, 3.5, double)).to.equal(true);
    expect(isValueAssignable(universe, 3n, int64)).to.equal(true);
    expect(isValueAssignable(universe, "3", int32)).to.equal(false);
  });

  it("should use the type carried by a TypedValue", () => {
    expect(isValueAssignable(universe, new TypedValue("a", char), char)).to.equal(true);
    expect(isValueAssignable(universe, "a", char)).to.equal(false);
  });

  it("should accept null for reference parameters", () => {
    expect(isValueAssignable(universe, null, string)).to.equal(true);
    expect(isValueAssignable(universe, undefined, int32)).to.equal(false);
  });

  it("should find catalog instances by their type name", () => {
    const circle = new CatalogInstance("Demo.Circle", [], { radius: 1 });
    expect(
      isValueAssignable(universe, circle, typeOf(universe, "Demo.Shape"))
    ).to.equal(true);
  });
});
