/**
 * Tests for assignable sets
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { CORLIB } from "../corlib/lookup.js";
import { createTestRuntime, declareAnimals } from "../testing/fixtures.js";
import { assignableTypesOf, buildAssignableSet, isAssignable } from "./assignable-set.js";

describe("assignable sets", () => {
  it("should list the type, its bases and their interfaces once each", () => {
    const context = createTestRuntime();
    const { dog } = declareAnimals(context);
    const type = dog.get().descriptor;

    expect(assignableTypesOf(context.runtime, type).map((each) => each.fullName)).to.deep.equal([
      "Zoo.Dog",
      "Zoo.Animal",
      "Zoo.INamed",
      CORLIB.object,
    ]);
  });

  it("should store the identities of the same types on the descriptor", () => {
    const context = createTestRuntime();
    const { dog } = declareAnimals(context);
    const type = dog.get().descriptor;

    const set = buildAssignableSet(context.runtime, type);
    expect(type.assignableTypes).to.equal(set);
    expect([...set]).to.deep.equal(
      assignableTypesOf(context.runtime, type).map((each) => each.typeId)
    );
  });

  it("should answer is-a from the source's set", () => {
    const context = createTestRuntime();
    const { named, animal, dog } = declareAnimals(context);

    expect(isAssignable(context.runtime, dog.get().descriptor, named.get().descriptor)).to.equal(true);
    expect(isAssignable(context.runtime, animal.get().descriptor, dog.get().descriptor)).to.equal(false);
  });
});
