/**
 * Tests for runtime option defaults
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createRecordingHost } from "../host/host.js";
import { resolveRuntimeOptions } from "./options.js";

describe("resolveRuntimeOptions", () => {
  it("should fill every default", () => {
    const host = createRecordingHost();
    const resolved = resolveRuntimeOptions({ host }, {});

    expect(resolved.coreLoadUnitName).to.equal("Typeforge.Core");
    expect(resolved.standardLibraryName).to.equal("mscorlib");
    expect(resolved.bootstrapCorlib).to.equal(true);
    expect(resolved.lazyMethodGroups).to.equal(false);
    expect(resolved.suppressInterfaceWarnings).to.equal(false);
    expect(resolved.strictDuplicateDefinitions).to.equal(false);
    expect(resolved.logLevel).to.equal("warning");
    expect(resolved.host).to.equal(host);
  });

  it("should take the log level from the environment", () => {
    const resolved = resolveRuntimeOptions(
      { host: createRecordingHost() },
      { TYPEFORGE_LOG_LEVEL: "debug" }
    );
    expect(resolved.logLevel).to.equal("debug");
  });

  it("should ignore an unknown environment log level", () => {
    const resolved = resolveRuntimeOptions(
      { host: createRecordingHost() },
      { TYPEFORGE_LOG_LEVEL: "loud" }
    );
    expect(resolved.logLevel).to.equal("warning");
  });

  it("should prefer an explicit log level", () => {
    const resolved = resolveRuntimeOptions(
      { logLevel: "silent", host: createRecordingHost() },
      { TYPEFORGE_LOG_LEVEL: "debug" }
    );
    expect(resolved.logLevel).to.equal("silent");
  });
});
