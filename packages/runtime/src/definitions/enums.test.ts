/**
 * Tests for enumerations
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { cast, checkType } from "../assignability/type-checks.js";
import { defaultValue } from "../instances/default-values.js";
import { enumValueToString } from "../instances/enum-values.js";
import { isEnumValue } from "../model/guards.js";
import { captureError, createTestRuntime, type TestRuntime } from "../testing/fixtures.js";
import { enumFlags, enumValue, makeEnum } from "./enums.js";

const declareColor = ({ runtime, zoo }: TestRuntime) =>
  makeEnum(runtime, zoo, {
    name: "Zoo.Color",
    isPublic: true,
    members: [
      { name: "Red", value: 0 },
      { name: "Green", value: 1 },
      { name: "Blue", value: 2 },
      { name: "Azure", value: 2 },
    ],
  }).get().descriptor;

const declareAccess = ({ runtime, zoo }: TestRuntime) =>
  makeEnum(runtime, zoo, {
    name: "Zoo.Access",
    isPublic: true,
    isFlags: true,
    members: [
      { name: "None", value: 0 },
      { name: "Read", value: 1 },
      { name: "Write", value: 2 },
      { name: "Execute", value: 4 },
    ],
  }).get().descriptor;

describe("enumerations", () => {
  it("should expose one canonical value per member", () => {
    const context = createTestRuntime();
    const color = declareColor(context);

    const green = enumValue(context.runtime, color, "Green");
    expect(green.value).to.equal(1);
    expect(enumValue(context.runtime, color, "Green")).to.equal(green);
    expect(cast(context.runtime, 1, color)).to.equal(green);
  });

  it("should print an aliased value by its first name", () => {
    const context = createTestRuntime();
    const color = declareColor(context);

    expect(enumValueToString(enumValue(context.runtime, color, "Azure"))).to.equal("Blue");
  });

  it("should keep unnamed values as numbers", () => {
    const context = createTestRuntime();
    const color = declareColor(context);

    const seven = cast(context.runtime, 7, color);
    expect(isEnumValue(seven) && seven.name).to.equal(null);
    expect(isEnumValue(seven) && enumValueToString(seven)).to.equal("7");
  });

  it("should default to the zero member", () => {
    const context = createTestRuntime();
    const color = declareColor(context);

    expect(defaultValue(context.runtime, color)).to.equal(
      enumValue(context.runtime, color, "Red")
    );
  });

  it("should combine and print flags", () => {
    const context = createTestRuntime();
    const access = declareAccess(context);

    const readWrite = enumFlags(context.runtime, access, "Read", "Write");
    expect(readWrite.value).to.equal(3);
    expect(enumValueToString(readWrite)).to.equal("Read, Write");
    expect(enumValueToString(enumFlags(context.runtime, access))).to.equal("None");
  });

  it("should refuse to combine members of a plain enum", () => {
    const context = createTestRuntime();
    const color = declareColor(context);

    const failure = captureError(() => enumFlags(context.runtime, color, "Red", "Green"));
    expect(failure.code).to.equal("TFG2002");
  });

  it("should fail on an unknown member", () => {
    const context = createTestRuntime();
    const color = declareColor(context);

    const failure = captureError(() => enumValue(context.runtime, color, "Purple"));
    expect(failure.code).to.equal("TFG2007");
    expect(failure.message).to.equal("Enum 'Zoo.Color' has no member named 'Purple'.");
  });

  it("should accept only values of the same enum", () => {
    const context = createTestRuntime();
    const color = declareColor(context);
    const access = declareAccess(context);

    expect(checkType(context.runtime, enumValue(context.runtime, color, "Red"), color)).to.equal(
      true
    );
    expect(checkType(context.runtime, 0, color)).to.equal(false);
    expect(
      checkType(context.runtime, enumValue(context.runtime, access, "None"), color)
    ).to.equal(false);
  });
});
