/**
 * Tests for member hiding
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { CORLIB } from "../corlib/lookup.js";
import { makeClass } from "../definitions/make-type.js";
import { construct } from "../instances/construct.js";
import { invokeMember } from "../instances/members.js";
import { BindingFlags, getMembers, getMethods } from "../reflection/reflection-cache.js";
import { createTestRuntime, diagnosticCodes, type TestRuntime } from "../testing/fixtures.js";
import { applyMemberHiding } from "./member-hiding.js";

const declareBirds = ({ runtime, zoo }: TestRuntime) => {
  const bird = makeClass(runtime, zoo, {
    name: "Zoo.Bird",
    isPublic: true,
    initializer: (builder) => {
      builder.method({ isPublic: true }, "Speak", builder.signature(builder.corlibRef(CORLIB.string)), () => "tweet");
    },
  });
  const parrot = makeClass(runtime, zoo, {
    name: "Zoo.Parrot",
    isPublic: true,
    baseType: "Zoo.Bird",
    initializer: (builder) => {
      builder.method({ isPublic: true }, "Speak", builder.signature(builder.corlibRef(CORLIB.string)), () => "hello");
    },
  });
  const mime = makeClass(runtime, zoo, {
    name: "Zoo.Mime",
    isPublic: true,
    baseType: "Zoo.Bird",
    initializer: (builder) => {
      builder.externalMethod({ isPublic: true }, "Speak", builder.signature(builder.corlibRef(CORLIB.string)));
    },
  });
  return { bird, parrot, mime };
};

describe("member hiding", () => {
  it("should keep the most derived of two methods with one signature", () => {
    const context = createTestRuntime();
    const { parrot } = declareBirds(context);
    const type = parrot.get().descriptor;

    const speaks = getMethods(context.runtime, type).filter((member) => member.name === "Speak");
    expect(speaks).to.have.length(1);
    expect(speaks[0]?.declaringType).to.equal(type);
  });

  it("should not hide a method with another name and the same signature", () => {
    const context = createTestRuntime();
    const { parrot } = declareBirds(context);
    const type = parrot.get().descriptor;

    const names = getMethods(context.runtime, type).map((member) => member.name);
    expect(names).to.include("ToString");
    expect(names.filter((name) => name === "Speak")).to.have.length(1);
  });

  it("should dispatch to the override", () => {
    const context = createTestRuntime();
    const { bird, parrot } = declareBirds(context);

    const polly = construct(context.runtime, parrot.get().descriptor);
    const robin = construct(context.runtime, bird.get().descriptor);
    expect(invokeMember(context.runtime, polly, "Speak")).to.equal("hello");
    expect(invokeMember(context.runtime, robin, "Speak")).to.equal("tweet");
  });

  it("should prefer a real implementation over an external placeholder", () => {
    const context = createTestRuntime();
    const { bird, mime } = declareBirds(context);
    const type = mime.get().descriptor;

    const speaks = getMethods(context.runtime, type).filter((member) => member.name === "Speak");
    expect(speaks).to.have.length(1);
    expect(speaks[0]?.declaringType).to.equal(bird.get().descriptor);

    const marcel = construct(context.runtime, type);
    expect(invokeMember(context.runtime, marcel, "Speak")).to.equal("tweet");
    expect(diagnosticCodes(context.runtime, "warning")).to.deep.equal(["TFG3005"]);
  });

  it("should pass members that are not methods through", () => {
    const context = createTestRuntime();
    const { runtime, zoo } = context;
    const tagged = makeClass(runtime, zoo, {
      name: "Zoo.Tagged",
      isPublic: true,
      initializer: (builder) => {
        builder.field({ isPublic: true }, "Tag", builder.corlibRef(CORLIB.string));
      },
    }).get().descriptor;

    const declared = getMembers(
      tagged,
      BindingFlags.DeclaredOnly | BindingFlags.Instance | BindingFlags.Public
    );
    expect(declared.map((member) => member.name)).to.deep.equal(["Tag"]);
    expect(applyMemberHiding(runtime, tagged, declared)).to.have.ordered.members(declared);
  });
});
