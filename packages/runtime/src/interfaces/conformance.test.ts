/**
 * Tests for interface conformance fixup
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { isAssignable } from "../assignability/assignable-set.js";
import { CORLIB } from "../corlib/lookup.js";
import { makeClass } from "../definitions/make-type.js";
import { construct } from "../instances/construct.js";
import { invokeMember } from "../instances/members.js";
import { createTestRuntime, declareAnimals, diagnosticCodes } from "../testing/fixtures.js";

describe("interface conformance", () => {
  it("should alias interface-qualified names to the bare members", () => {
    const context = createTestRuntime();
    const { named, animal } = declareAnimals(context);
    const rex = construct(context.runtime, animal.get().descriptor, ["Rex"]);

    expect(rex.template.entries.get("INamed_GetName")?.kind).to.equal("alias");
    expect(invokeMember(context.runtime, rex, "INamed_GetName")).to.equal("Rex");
    expect(isAssignable(context.runtime, animal.get().descriptor, named.get().descriptor)).to.equal(
      true
    );
    expect(diagnosticCodes(context.runtime, "warning")).to.deep.equal([]);
  });

  it("should warn about members an implementing type lacks", () => {
    const context = createTestRuntime();
    declareAnimals(context);
    const rock = makeClass(context.runtime, context.zoo, {
      name: "Zoo.Rock",
      isPublic: true,
      interfaces: ["Zoo.INamed"],
    });

    rock.get();
    const warning = context.runtime.diagnostics.find((diagnostic) => diagnostic.code === "TFG3001");
    expect(warning?.message).to.contain("Type 'Zoo.Rock' is missing implementation of interface member(s): INamed_GetName");
  });

  it("should stay quiet about missing members when told to", () => {
    const context = createTestRuntime({ suppressInterfaceWarnings: true });
    declareAnimals(context);
    makeClass(context.runtime, context.zoo, {
      name: "Zoo.Rock",
      isPublic: true,
      interfaces: ["Zoo.INamed"],
    }).get();

    expect(diagnosticCodes(context.runtime, "warning")).to.deep.equal([]);
  });

  it("should count an unimplemented external member as present", () => {
    const context = createTestRuntime();
    declareAnimals(context);
    makeClass(context.runtime, context.zoo, {
      name: "Zoo.Statue",
      isPublic: true,
      interfaces: ["Zoo.INamed"],
      initializer: (builder) => {
        builder.externalMethod(
          { isPublic: true },
          "GetName",
          builder.signature(builder.corlibRef(CORLIB.string))
        );
      },
    }).get();

    expect(diagnosticCodes(context.runtime, "warning")).to.deep.equal([]);
  });

  it("should warn about undefined interfaces and non-interfaces", () => {
    const context = createTestRuntime();
    declareAnimals(context);
    const odd = makeClass(context.runtime, context.zoo, {
      name: "Zoo.Odd",
      isPublic: true,
      interfaces: ["Zoo.IGhost", "Zoo.Animal"],
    }).get().descriptor;

    const messages = context.runtime.diagnostics
      .filter((diagnostic) => diagnostic.severity === "warning")
      .map((diagnostic) => diagnostic.message);
    expect(messages).to.deep.equal([
      "Type 'Zoo.Odd' implements an undefined interface named 'Zoo.IGhost'.",
      "Type 'Zoo.Animal' is not an interface.",
    ]);
    expect(odd.interfaces.map((ref) => typeof ref !== "string" && ref.kind === "type" && ref.fullName)).to.deep.equal([
      "Zoo.Animal",
    ]);
  });
});
