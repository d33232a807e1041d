/**
 * Tests for manifest file loading
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { loadManifestFile } from "./loader.js";

describe("loadManifestFile", () => {
  let tmpDir = "";

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "typeforge-manifest-"));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should load a valid manifest", () => {
    const file = path.join(tmpDir, "zoo.json");
    fs.writeFileSync(
      file,
      JSON.stringify({ loadUnit: "Zoo", types: [{ kind: "interface", name: "Zoo.INamed" }] })
    );

    const result = loadManifestFile(file);
    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.loadUnit).to.equal("Zoo");
    expect(result.value.types.map((type) => type.kind)).to.deep.equal(["interface"]);
  });

  it("should report a missing file", () => {
    const file = path.join(tmpDir, "missing.json");
    const result = loadManifestFile(file);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.code).to.equal("TFG9001");
    expect(result.error[0]?.message).to.equal(`Manifest file not found: ${file}`);
  });

  it("should report a path that cannot be read", () => {
    const result = loadManifestFile(tmpDir);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.code).to.equal("TFG9002");
  });

  it("should report invalid JSON", () => {
    const file = path.join(tmpDir, "broken.json");
    fs.writeFileSync(file, "{ loadUnit: ");

    const result = loadManifestFile(file);
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.code).to.equal("TFG9003");
    expect(result.error[0]?.subject).to.equal(file);
  });

  it("should pass validation problems through with the file name", () => {
    const file = path.join(tmpDir, "invalid.json");
    fs.writeFileSync(file, JSON.stringify({ loadUnit: "Zoo", types: {} }));

    const result = loadManifestFile(file);
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error[0]?.code).to.equal("TFG9006");
    expect(result.error[0]?.subject).to.equal(file);
  });
});
