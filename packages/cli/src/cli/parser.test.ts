/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse inspect command", () => {
        const result = parseArgs(["inspect"]);
        expect(result.command).to.equal("inspect");
        expect(result.positionals).to.deep.equal([]);
      });

      it("should collect manifest paths after the command", () => {
        const result = parseArgs(["check", "a.json", "b.json"]);
        expect(result.command).to.equal("check");
        expect(result.positionals).to.deep.equal(["a.json", "b.json"]);
      });

      it("should parse help command from --help", () => {
        expect(parseArgs(["inspect", "--help"]).command).to.equal("help");
      });

      it("should parse version command from -v", () => {
        const result = parseArgs(["-v"]);
        expect(result.command).to.equal("version");
        expect(result.options).to.deep.equal({});
      });

      it("should leave the command empty when none is given", () => {
        expect(parseArgs([]).command).to.equal("");
      });
    });

    describe("Options", () => {
      it("should parse verbose and quiet flags", () => {
        expect(parseArgs(["check", "-V"]).options.verbose).to.equal(true);
        expect(parseArgs(["check", "--quiet"]).options.quiet).to.equal(true);
      });

      it("should take the value after --config", () => {
        const result = parseArgs(["check", "--config", "conf/typeforge.json", "zoo.json"]);
        expect(result.options.config).to.equal("conf/typeforge.json");
        expect(result.positionals).to.deep.equal(["zoo.json"]);
      });

      it("should parse the type filter and json flag", () => {
        const result = parseArgs(["inspect", "-t", "Zoo.Animal", "--json"]);
        expect(result.options.type).to.equal("Zoo.Animal");
        expect(result.options.json).to.equal(true);
        expect(result.positionals).to.deep.equal([]);
      });

      it("should use an empty value when an option value is missing", () => {
        expect(parseArgs(["inspect", "--type"]).options.type).to.equal("");
      });

      it("should record unknown flags", () => {
        const result = parseArgs(["check", "--fast", "-x"]);
        expect(result.options.unknown).to.deep.equal(["--fast", "-x"]);
      });
    });
  });
});
