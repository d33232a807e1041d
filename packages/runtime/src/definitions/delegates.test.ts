/**
 * Tests for delegates
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { checkType, getType } from "../assignability/type-checks.js";
import { CORLIB } from "../corlib/lookup.js";
import { construct } from "../instances/construct.js";
import { getMember } from "../instances/members.js";
import { createTestRuntime, declareAnimals } from "../testing/fixtures.js";
import { invokeDelegate, makeDelegate, newDelegate } from "./delegates.js";

describe("delegates", () => {
  it("should derive from MulticastDelegate", () => {
    const { runtime, zoo } = createTestRuntime();
    const callback = makeDelegate(runtime, zoo, { name: "Zoo.Callback", isPublic: true });

    expect(callback.get().descriptor.baseType?.fullName).to.equal(CORLIB.multicastDelegate);
  });

  it("should pass the delegate type as receiver when unbound", () => {
    const { runtime, zoo } = createTestRuntime();
    const callback = makeDelegate(runtime, zoo, { name: "Zoo.Callback", isPublic: true });
    const type = callback.get().descriptor;

    const double = newDelegate(type, null, (self, value) =>
      self === type.publicInterface ? Number(value) * 2 : null
    );
    expect(invokeDelegate(double, 4)).to.equal(8);
  });

  it("should pass the target as receiver when bound", () => {
    const context = createTestRuntime();
    const { animal } = declareAnimals(context);
    const callback = makeDelegate(context.runtime, context.zoo, {
      name: "Zoo.Callback",
      isPublic: true,
    });
    const rex = construct(context.runtime, animal.get().descriptor, ["Rex"]);

    const nameOf = newDelegate(callback.get().descriptor, rex, (self) =>
      getMember(context.runtime, self, "Name")
    );
    expect(invokeDelegate(nameOf)).to.equal("Rex");
  });

  it("should check delegate values by their type", () => {
    const { runtime, zoo } = createTestRuntime();
    const callback = makeDelegate(runtime, zoo, { name: "Zoo.Callback", isPublic: true });
    const other = makeDelegate(runtime, zoo, { name: "Zoo.Other", isPublic: true });
    const type = callback.get().descriptor;
    const value = newDelegate(type, null, () => undefined);

    expect(getType(runtime, value)).to.equal(type);
    expect(checkType(runtime, value, type)).to.equal(true);
    expect(checkType(runtime, value, other.get().descriptor)).to.equal(false);
    expect(checkType(runtime, () => undefined, type)).to.equal(false);
  });
});
