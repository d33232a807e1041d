/**
 * Tests for the CLI command dispatcher
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { createRecordingHost } from "@typeforge/runtime";
import {
  createTempProject,
  STRAY_MANIFEST,
  ZOO_MANIFEST,
  type TempProject,
} from "../testing/fixtures.js";
import { VERSION } from "./constants.js";
import { EXIT_CODES, runCli, type CliContext } from "./dispatcher.js";

type Captured = CliContext & {
  readonly out: string[];
  readonly err: string[];
};

const capture = (cwd: string): Captured => {
  const out: string[] = [];
  const err: string[] = [];
  return {
    cwd,
    env: {},
    host: createRecordingHost(),
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
  };
};

describe("runCli", () => {
  let temp: TempProject;

  before(() => {
    temp = createTempProject();
    mkdirSync(join(temp.root, "manifests"));
    temp.write(join("manifests", "zoo.json"), ZOO_MANIFEST);
    temp.write(join("manifests", "strays.json"), STRAY_MANIFEST);
    temp.write("typeforge.json", { manifests: ["manifests/zoo.json"] });
    mkdirSync(join(temp.root, "broken"));
    temp.write(join("broken", "typeforge.json"), { manifests: "zoo.json" });
  });

  after(() => {
    temp.dispose();
  });

  it("should print the version", async () => {
    const context = capture(temp.root);
    expect(await runCli(["--version"], context)).to.equal(EXIT_CODES.ok);
    expect(context.out).to.deep.equal([`typeforge v${VERSION}`]);
  });

  it("should reject an unknown command", async () => {
    const context = capture(temp.root);
    expect(await runCli(["emit"], context)).to.equal(EXIT_CODES.usage);
    expect(context.err[0]).to.equal("Error: Unknown command 'emit'");
  });

  it("should reject an unknown option", async () => {
    const context = capture(temp.root);
    expect(await runCli(["check", "--fast"], context)).to.equal(EXIT_CODES.usage);
    expect(context.err).to.deep.equal(["Error: Unknown option '--fast'"]);
  });

  it("should check the manifests listed in typeforge.json", async () => {
    const context = capture(temp.root);
    expect(await runCli(["check"], context)).to.equal(EXIT_CODES.ok);
    expect(context.out[0]?.startsWith("✓ 3 type(s) checked")).to.equal(true);
  });

  it("should find typeforge.json from a subdirectory", async () => {
    const context = capture(join(temp.root, "manifests"));
    expect(await runCli(["check", "--quiet"], context)).to.equal(EXIT_CODES.ok);
    expect(context.out).to.deep.equal([]);
  });

  it("should fail the check when a type cannot be built", async () => {
    const context = capture(temp.root);
    expect(await runCli(["check", "manifests/strays.json"], context)).to.equal(EXIT_CODES.check);
    expect(context.err).to.have.lengthOf(1);
    expect(context.err[0]?.startsWith("✗ 1 of 1 type(s) failed")).to.equal(true);
  });

  it("should inspect a single type", async () => {
    const context = capture(temp.root);
    expect(await runCli(["inspect", "--type", "Zoo.INamed, Zoo"], context)).to.equal(
      EXIT_CODES.ok
    );
    expect(context.out[0]?.split("\n")[0]).to.equal("interface Zoo.INamed");
  });

  it("should report an invalid config file", async () => {
    const context = capture(temp.root);
    expect(await runCli(["check", "--config", "broken/typeforge.json"], context)).to.equal(
      EXIT_CODES.config
    );
    expect(context.err).to.deep.equal([
      "Error: typeforge.json: 'manifests' must be an array of strings",
    ]);
  });

  it("should report manifests that cannot be loaded", async () => {
    const context = capture(temp.root);
    const missing = join(temp.root, "nowhere.json");
    expect(await runCli(["check", "nowhere.json"], context)).to.equal(EXIT_CODES.manifest);
    expect(context.err).to.deep.equal([
      `${missing}: error TFG9001: Manifest file not found: ${missing}`,
    ]);
  });
});
