/**
 * Tests for configuration loading and resolution
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { findConfig, loadConfig, resolveConfig, validateConfig } from "./config.js";
import type { TypeforgeConfig } from "./types.js";

describe("Config", () => {
  describe("validateConfig", () => {
    it("should accept a full document", () => {
      const result = validateConfig({
        $schema: "./typeforge.schema.json",
        manifests: ["zoo.json"],
        options: { lazyMethodGroups: true, coreLoadUnitName: "Core", logLevel: "debug" },
      });

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.$schema).to.equal("./typeforge.schema.json");
      expect(result.value.manifests).to.deep.equal(["zoo.json"]);
      expect(result.value.options?.lazyMethodGroups).to.equal(true);
      expect(result.value.options?.coreLoadUnitName).to.equal("Core");
      expect(result.value.options?.logLevel).to.equal("debug");
      expect(result.value.options?.strictDuplicateDefinitions).to.equal(undefined);
    });

    it("should default to no manifests", () => {
      const result = validateConfig({});
      expect(result.ok && result.value.manifests).to.deep.equal([]);
    });

    it("should reject a non-object document", () => {
      const result = validateConfig([]);
      expect(!result.ok && result.error).to.equal("typeforge.json: expected a JSON object");
    });

    it("should reject manifests that are not strings", () => {
      const result = validateConfig({ manifests: ["zoo.json", 3] });
      expect(!result.ok && result.error).to.equal(
        "typeforge.json: 'manifests' must be an array of strings"
      );
    });

    it("should reject mistyped options", () => {
      const flag = validateConfig({ options: { lazyMethodGroups: "yes" } });
      expect(!flag.ok && flag.error).to.equal(
        "typeforge.json: 'options.lazyMethodGroups' must be a boolean"
      );

      const level = validateConfig({ options: { logLevel: "loud" } });
      expect(!level.ok && level.error).to.equal(
        "typeforge.json: 'options.logLevel' must be one of silent, error, warning, info, debug"
      );
    });
  });

  describe("loadConfig and findConfig", () => {
    let root = "";

    before(() => {
      root = mkdtempSync(join(tmpdir(), "typeforge-config-"));
      mkdirSync(join(root, "nested", "deeper"), { recursive: true });
      writeFileSync(join(root, "typeforge.json"), JSON.stringify({ manifests: ["zoo.json"] }));
      writeFileSync(join(root, "nested", "broken.json"), "{ not json");
    });

    after(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it("should load a config file", () => {
      const result = loadConfig(join(root, "typeforge.json"));
      expect(result.ok && result.value.manifests).to.deep.equal(["zoo.json"]);
    });

    it("should report a missing file", () => {
      const path = join(root, "missing.json");
      const result = loadConfig(path);
      expect(!result.ok && result.error).to.equal(`Config file not found: ${path}`);
    });

    it("should report invalid JSON", () => {
      const result = loadConfig(join(root, "nested", "broken.json"));
      expect(!result.ok && result.error.startsWith("Failed to parse typeforge.json: ")).to.equal(
        true
      );
    });

    it("should find the config in a parent directory", () => {
      expect(findConfig(join(root, "nested", "deeper"))).to.equal(join(root, "typeforge.json"));
    });
  });

  describe("resolveConfig", () => {
    const config: TypeforgeConfig = {
      manifests: ["manifests/zoo.json"],
      options: { strictDuplicateDefinitions: true },
    };

    it("should resolve configured manifests against the project root", () => {
      const result = resolveConfig(config, {}, "/project", [], "/project", {});
      expect(result.manifests).to.deep.equal([resolve("/project", "manifests/zoo.json")]);
      expect(result.runtimeOptions).to.deep.equal({ strictDuplicateDefinitions: true });
      expect(result.logLevel).to.equal("warning");
      expect(result.json).to.equal(false);
      expect(result.typeName).to.equal(undefined);
    });

    it("should replace configured manifests with command line ones", () => {
      const result = resolveConfig(config, {}, "/project", ["extra.json"], "/work", {});
      expect(result.manifests).to.deep.equal([resolve("/work", "extra.json")]);
    });

    it("should let quiet and verbose decide the log level", () => {
      expect(resolveConfig(config, { quiet: true }, "/project", [], "/project", {}).logLevel).to.equal(
        "error"
      );
      expect(
        resolveConfig(config, { verbose: true }, "/project", [], "/project", {}).logLevel
      ).to.equal("info");
    });

    it("should prefer the configured log level over the environment", () => {
      const env = { TYPEFORGE_LOG_LEVEL: "debug" };
      expect(resolveConfig({}, {}, "/project", [], "/project", env).logLevel).to.equal("debug");
      expect(
        resolveConfig({ options: { logLevel: "silent" } }, {}, "/project", [], "/project", env)
          .logLevel
      ).to.equal("silent");
    });

    it("should ignore an unknown level in the environment", () => {
      const env = { TYPEFORGE_LOG_LEVEL: "chatty" };
      expect(resolveConfig({}, {}, "/project", [], "/project", env).logLevel).to.equal("warning");
    });

    it("should carry the inspect options through", () => {
      const result = resolveConfig({}, { type: "Zoo.Animal", json: true }, "/project", [], "/project", {});
      expect(result.typeName).to.equal("Zoo.Animal");
      expect(result.json).to.equal(true);
    });
  });
});
