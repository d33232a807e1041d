/**
 * Tests for array types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { isAssignable } from "../assignability/assignable-set.js";
import { checkType } from "../assignability/type-checks.js";
import { CORLIB } from "../corlib/lookup.js";
import { resolveType } from "../registry/name-registry.js";
import { createTestRuntime } from "../testing/fixtures.js";
import { arrayTypeOf, newArray } from "./arrays.js";

describe("array types", () => {
  it("should create one array type per element type", () => {
    const { runtime } = createTestRuntime();
    const int32 = resolveType(runtime, CORLIB.int32).get().descriptor;

    const arrayType = arrayTypeOf(runtime, int32);
    expect(arrayType.fullName).to.equal("System.Int32[]");
    expect(arrayType.typeId).to.equal(`${int32.typeId}[]`);
    expect(arrayType.elementType).to.equal(int32);
    expect(arrayTypeOf(runtime, int32)).to.equal(arrayType);
  });

  it("should treat array types as System.Array", () => {
    const { runtime } = createTestRuntime();
    const string = resolveType(runtime, CORLIB.string).get().descriptor;
    const array = resolveType(runtime, CORLIB.array).get().descriptor;

    const arrayType = arrayTypeOf(runtime, string);
    expect(arrayType.baseType).to.equal(array);
    expect(isAssignable(runtime, arrayType, array)).to.equal(true);
    expect(checkType(runtime, ["a"], arrayType)).to.equal(true);
    expect(checkType(runtime, "a", arrayType)).to.equal(false);
  });

  it("should fill new arrays with the element default", () => {
    const { runtime } = createTestRuntime();
    const int32 = resolveType(runtime, CORLIB.int32).get().descriptor;
    const boolean = resolveType(runtime, CORLIB.boolean).get().descriptor;
    const string = resolveType(runtime, CORLIB.string).get().descriptor;

    expect(newArray(runtime, int32, 3)).to.deep.equal([0, 0, 0]);
    expect(newArray(runtime, boolean, 2)).to.deep.equal([false, false]);
    expect(newArray(runtime, string, 2)).to.deep.equal([null, null]);
  });
});
