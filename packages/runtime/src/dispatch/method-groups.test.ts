/**
 * Tests for method groups and overload dispatch
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { CORLIB } from "../corlib/lookup.js";
import { makeStaticClass } from "../definitions/make-type.js";
import { construct } from "../instances/construct.js";
import { invokeStatic } from "../instances/members.js";
import { isRuntimeFunction } from "../model/member-table.js";
import { isTypeDescriptor } from "../model/guards.js";
import { resolveType } from "../registry/name-registry.js";
import {
  captureError,
  createTestRuntime,
  declareAnimals,
  type TestRuntime,
} from "../testing/fixtures.js";

const declareKeeper = ({ runtime, zoo }: TestRuntime) =>
  makeStaticClass(runtime, zoo, {
    name: "Zoo.Keeper",
    isPublic: true,
    initializer: (builder) => {
      const shared = { isStatic: true, isPublic: true };
      const string = builder.corlibRef(CORLIB.string);
      builder.method(shared, "Feed", builder.signature(string, [builder.typeRef("Zoo.Animal")]), () => "animal");
      builder.method(shared, "Feed", builder.signature(string, [builder.typeRef("Zoo.Dog")]), () => "dog");
      builder.method(shared, "Feed", builder.signature(string, [builder.corlibRef(CORLIB.object)]), () => "object");

      builder.method(shared, "Describe", builder.signature(string, [builder.corlibRef(CORLIB.int32)]), () => "int");
      builder.method(shared, "Describe", builder.signature(string, [string]), () => "string");

      builder.method(shared, "Pick", builder.signature(string, [builder.corlibRef(CORLIB.object)]), () => "object");
      builder.method(shared, "Pick", builder.signature(string, [string]), () => "string");

      builder.method(shared, "Greet", builder.signature(string, [string]), (_self, name) => `Hello ${String(name)}`);

      builder.method(shared, "Make", builder.signature("!!0", [], ["T"]), (_self, typeArgument) =>
        isTypeDescriptor(typeArgument) ? typeArgument.fullName : null
      );
    },
  });

describe("method groups", () => {
  it("should pick the first declared overload that matches", () => {
    const context = createTestRuntime();
    const { animal, dog } = declareAnimals(context);
    const keeper = declareKeeper(context).get();
    const { runtime } = context;

    const rex = construct(runtime, dog.get().descriptor, ["Rex"]);
    const generic = construct(runtime, animal.get().descriptor, ["Generic"]);

    expect(invokeStatic(runtime, keeper, "Feed", rex)).to.equal("animal");
    expect(invokeStatic(runtime, keeper, "Feed", generic)).to.equal("animal");
    expect(invokeStatic(runtime, keeper, "Feed", "carrot")).to.equal("object");
  });

  it("should not reorder a more specific overload ahead of an earlier one", () => {
    const context = createTestRuntime();
    const keeper = declareKeeper(context).get();

    expect(invokeStatic(context.runtime, keeper, "Pick", "x")).to.equal("object");
  });

  it("should pick a reference-type parameter for null", () => {
    const context = createTestRuntime();
    const keeper = declareKeeper(context).get();

    expect(invokeStatic(context.runtime, keeper, "Describe", 5)).to.equal("int");
    expect(invokeStatic(context.runtime, keeper, "Describe", "five")).to.equal("string");
    expect(invokeStatic(context.runtime, keeper, "Describe", null)).to.equal("string");
  });

  it("should list the candidates when nothing applies", () => {
    const context = createTestRuntime();
    declareAnimals(context);
    const keeper = declareKeeper(context).get();

    const failure = captureError(() => invokeStatic(context.runtime, keeper, "Describe", 2.5));
    expect(failure.code).to.equal("TFG2004");
    expect(failure.name).to.equal("NoApplicableOverloadError");
    expect(failure.candidates).to.deep.equal([
      "System.String Describe(System.Int32)",
      "System.String Describe(System.String)",
    ]);
  });

  it("should fail on an argument count no overload takes", () => {
    const context = createTestRuntime();
    declareAnimals(context);
    const keeper = declareKeeper(context).get();

    const failure = captureError(() => invokeStatic(context.runtime, keeper, "Feed", 1, 2));
    expect(failure.code).to.equal("TFG2004");
    expect(failure.candidates).to.have.length(3);
  });

  it("should bind a lone overload directly", () => {
    const context = createTestRuntime();
    const keeper = declareKeeper(context).get();

    const entry = keeper.staticTable.entries.get("Greet");
    expect(entry?.kind === "function" && entry.fn.displayName).to.equal(
      "System.String Zoo.Keeper.Greet(System.String)"
    );
    expect(invokeStatic(context.runtime, keeper, "Greet", "Rex")).to.equal("Hello Rex");
  });

  it("should bind generic methods to their type arguments first", () => {
    const context = createTestRuntime();
    const keeper = declareKeeper(context).get();
    const int32 = resolveType(context.runtime, CORLIB.int32).get();

    const bound = invokeStatic(context.runtime, keeper, "Make", int32);
    expect(isRuntimeFunction(bound) && bound.displayName).to.equal("Make<System.Int32>");
    expect(isRuntimeFunction(bound) && bound.invoke(keeper, [])).to.equal(CORLIB.int32);
  });

  it("should reject a generic argument that is not a type", () => {
    const context = createTestRuntime();
    const keeper = declareKeeper(context).get();

    const failure = captureError(() => invokeStatic(context.runtime, keeper, "Make", "Int32"));
    expect(failure.code).to.equal("TFG2002");
    expect(failure.message).to.equal("Generic argument #0 of 'Make' is not a type.");
  });

  it("should build groups on first use when lazy", () => {
    const context = createTestRuntime({ lazyMethodGroups: true });
    declareAnimals(context);
    const keeper = declareKeeper(context).get();

    expect(keeper.staticTable.entries.get("Describe")?.kind).to.equal("lazy");
    expect(invokeStatic(context.runtime, keeper, "Describe", 5)).to.equal("int");
    expect(keeper.staticTable.entries.get("Describe")?.kind).to.equal("function");
  });
});
