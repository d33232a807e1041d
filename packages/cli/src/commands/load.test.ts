/**
 * Tests for loading manifests into a runtime
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import { join } from "node:path";
import { createRecordingHost } from "@typeforge/runtime";
import { createTempProject, testConfig, ZOO_MANIFEST, type TempProject } from "../testing/fixtures.js";
import { loadProject } from "./load.js";

describe("loadProject", () => {
  let project: TempProject;

  before(() => {
    project = createTempProject();
  });

  after(() => {
    project.dispose();
  });

  it("should declare every manifest type and seal the runtime", () => {
    const zoo = project.write("zoo.json", ZOO_MANIFEST);
    const result = loadProject(testConfig([zoo]), createRecordingHost());

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.handles.map((handle) => handle.name)).to.deep.equal([
      "Zoo.INamed",
      "Zoo.Animal",
      "Zoo.Box`1",
    ]);
    expect(result.value.runtime.sealed).to.equal(true);
  });

  it("should pass the configured runtime options through", () => {
    const zoo = project.write("zoo-options.json", ZOO_MANIFEST);
    const result = loadProject(
      testConfig([zoo], { runtimeOptions: { coreLoadUnitName: "Zoo.Core" } }),
      createRecordingHost()
    );

    expect(result.ok && result.value.runtime.options.coreLoadUnitName).to.equal("Zoo.Core");
  });

  it("should collect the diagnostics of every failed manifest", () => {
    const broken = project.write("broken.json", "{ nope");
    const missing = join(project.root, "missing.json");
    const result = loadProject(testConfig([broken, missing]), createRecordingHost());

    expect(!result.ok && result.error.map((diagnostic) => diagnostic.code)).to.deep.equal([
      "TFG9003",
      "TFG9001",
    ]);
  });

  it("should report declaration errors as diagnostics", () => {
    const arrays = project.write("arrays.json", {
      loadUnit: "Zoo",
      types: [{ kind: "class", name: "Zoo.Flock", public: true, interfaces: ["Zoo.INamed[]"] }],
    });
    const result = loadProject(testConfig([arrays]), createRecordingHost());

    expect(!result.ok && result.error.map((diagnostic) => diagnostic.message)).to.deep.equal([
      "Array type 'Zoo.INamed[]' cannot be referenced from a manifest.",
    ]);
  });

  it("should refuse to run without manifests", () => {
    const result = loadProject(testConfig([]), createRecordingHost());
    expect(!result.ok && result.error[0]?.message).to.equal("No manifests to load");
  });
});
