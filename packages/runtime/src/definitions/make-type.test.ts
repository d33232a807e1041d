/**
 * Tests for type declarations
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { CORLIB } from "../corlib/lookup.js";
import { construct, memberwiseClone } from "../instances/construct.js";
import { getMember, invokeMember, setMember } from "../instances/members.js";
import { isRuntimeObject } from "../model/guards.js";
import {
  captureError,
  createTestRuntime,
  declareAnimals,
  type TestRuntime,
} from "../testing/fixtures.js";
import { makeClass, makeInterface, makeStaticClass, makeStruct } from "./make-type.js";

const declarePoint = ({ runtime, zoo }: TestRuntime) =>
  makeStruct(runtime, zoo, {
    name: "Zoo.Point",
    isPublic: true,
    initializer: (builder) => {
      const int32 = builder.corlibRef(CORLIB.int32);
      builder.field({ isPublic: true }, "X", int32);
      builder.field({ isPublic: true }, "Y", int32);
    },
  });

describe("type declarations", () => {
  it("should build a class with its default base", () => {
    const context = createTestRuntime();
    const { animal, dog } = declareAnimals(context);

    const animalType = animal.get().descriptor;
    expect(animalType.typeKind).to.equal("class");
    expect(animalType.baseType?.fullName).to.equal(CORLIB.object);
    expect(dog.get().descriptor.baseType).to.equal(animalType);
    expect(dog.get().descriptor.inheritanceDepth).to.equal(animalType.inheritanceDepth + 1);
  });

  it("should construct through an inherited constructor", () => {
    const context = createTestRuntime();
    const { dog } = declareAnimals(context);

    const rex = construct(context.runtime, dog.get().descriptor, ["Rex"]);
    expect(getMember(context.runtime, rex, "Name")).to.equal("Rex");
    expect(invokeMember(context.runtime, rex, "ToString")).to.equal("Animal Rex");
  });

  it("should give struct fields their default values", () => {
    const context = createTestRuntime();
    const point = declarePoint(context).get().descriptor;

    expect(point.typeKind).to.equal("struct");
    expect(point.isReferenceType).to.equal(false);
    expect(point.baseType?.fullName).to.equal(CORLIB.valueType);

    const origin = construct(context.runtime, point);
    expect(getMember(context.runtime, origin, "X")).to.equal(0);
    expect(getMember(context.runtime, origin, "Y")).to.equal(0);
  });

  it("should give every instance its own struct-valued fields", () => {
    const context = createTestRuntime();
    declarePoint(context);
    const line = makeClass(context.runtime, context.zoo, {
      name: "Zoo.Line",
      isPublic: true,
      initializer: (builder) => {
        builder.field({ isPublic: true }, "Start", builder.typeRef("Zoo.Point"));
      },
    }).get().descriptor;

    const first = construct(context.runtime, line);
    const second = construct(context.runtime, line);
    const start = getMember(context.runtime, first, "Start");

    expect(isRuntimeObject(start) && start.type.fullName).to.equal("Zoo.Point");
    expect(start).to.not.equal(getMember(context.runtime, second, "Start"));
  });

  it("should copy struct-valued fields when cloning", () => {
    const context = createTestRuntime();
    declarePoint(context);
    const line = makeClass(context.runtime, context.zoo, {
      name: "Zoo.Line",
      isPublic: true,
      initializer: (builder) => {
        builder.field({ isPublic: true }, "Start", builder.typeRef("Zoo.Point"));
        builder.field({ isPublic: true }, "Label", builder.corlibRef(CORLIB.string));
      },
    }).get().descriptor;

    const original = construct(context.runtime, line);
    setMember(context.runtime, original, "Label", "diagonal");
    const copy = memberwiseClone(original);

    expect(getMember(context.runtime, copy, "Label")).to.equal("diagonal");
    expect(getMember(context.runtime, copy, "Start")).to.not.equal(
      getMember(context.runtime, original, "Start")
    );
  });

  it("should refuse to construct interfaces and static classes", () => {
    const context = createTestRuntime();
    const { named } = declareAnimals(context);
    const helpers = makeStaticClass(context.runtime, context.zoo, {
      name: "Zoo.Helpers",
      isPublic: true,
    });

    const fromInterface = captureError(() => construct(context.runtime, named.get().descriptor));
    expect(fromInterface.code).to.equal("TFG2005");
    expect(fromInterface.message).to.equal(
      "Cannot create an instance of 'Zoo.INamed' because it is an interface."
    );

    const fromStatic = captureError(() => construct(context.runtime, helpers.get().descriptor));
    expect(fromStatic.message).to.equal(
      "Cannot create an instance of 'Zoo.Helpers' because it has no instances."
    );
  });

  it("should reject an instance member on a static class", () => {
    const { runtime, zoo } = createTestRuntime();
    const helpers = makeStaticClass(runtime, zoo, {
      name: "Zoo.Helpers",
      isPublic: true,
      initializer: (builder) => {
        builder.method({ isPublic: true }, "Describe", builder.signature(null), () => undefined);
      },
    });

    const failure = captureError(() => helpers.get());
    expect(failure.code).to.equal("TFG1003");
    expect(failure.message).to.equal(
      "Type 'Zoo.Helpers' has no instances; the instance member 'Describe' cannot be declared."
    );
  });

  it("should require a body for class methods but not for interface methods", () => {
    const { runtime, zoo } = createTestRuntime();
    const contract = makeInterface(runtime, zoo, {
      name: "Zoo.IRunner",
      isPublic: true,
      initializer: (builder) => {
        builder.method({ isPublic: true }, "Run", builder.signature(null));
      },
    });
    const broken = makeClass(runtime, zoo, {
      name: "Zoo.Runner",
      isPublic: true,
      initializer: (builder) => {
        builder.method({ isPublic: true }, "Run", builder.signature(null));
      },
    });

    expect(contract.get().descriptor.interfaceMembers.get("Run")).to.equal("method");
    const failure = captureError(() => broken.get());
    expect(failure.code).to.equal("TFG1003");
    expect(failure.message).to.equal("Method 'Run' of type 'Zoo.Runner' needs an implementation.");
  });

  it("should run static constructors once, on initialization", () => {
    const { runtime, zoo } = createTestRuntime();
    let runs = 0;
    const settings = makeClass(runtime, zoo, {
      name: "Zoo.Settings",
      isPublic: true,
      initializer: (builder) => {
        builder.field({ isPublic: true, isStatic: true }, "Limit", builder.corlibRef(CORLIB.int32));
        builder.method({ isStatic: true }, ".cctor", builder.signature(null), (self) => {
          runs++;
          setMember(runtime, self, "Limit", 10);
        });
      },
    });

    const publicInterface = settings.get();
    settings.get();
    expect(runs).to.equal(1);
    expect(getMember(runtime, publicInterface, "Limit")).to.equal(10);
  });

  it("should wrap a failing static constructor", () => {
    const { runtime, zoo } = createTestRuntime();
    const faulty = makeClass(runtime, zoo, {
      name: "Zoo.Faulty",
      isPublic: true,
      initializer: (builder) => {
        builder.method({ isStatic: true }, ".cctor", builder.signature(null), () => {
          throw new Error("no config");
        });
      },
    });

    const failure = captureError(() => faulty.get());
    expect(failure.code).to.equal("TFG3007");
    expect(failure.message).to.equal(
      "The type initializer for 'Zoo.Faulty' threw an exception: no config"
    );
  });
});
