/**
 * Tests for diagnostic records
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  isError,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("formatDiagnostic", () => {
    it("should format a diagnostic with subject and hint", () => {
      const diagnostic = createDiagnostic(
        "TFG3001",
        "warning",
        "missing member",
        "Zoo.Dog",
        "implement it"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "Zoo.Dog: warning TFG3001: missing member Hint: implement it"
      );
    });

    it("should format a bare diagnostic", () => {
      const diagnostic = createDiagnostic("TFG2001", "error", "not found");

      expect(formatDiagnostic(diagnostic)).to.equal(
        "error TFG2001: not found"
      );
      expect(diagnostic.subject).to.equal(undefined);
    });
  });

  describe("collector", () => {
    it("should track whether an error was added", () => {
      const warning = createDiagnostic("TFG3002", "warning", "w");
      const failure = createDiagnostic("TFG1001", "error", "e");

      const first = addDiagnostic(createDiagnosticsCollector(), warning);
      expect(first.hasErrors).to.equal(false);

      const second = addDiagnostic(createDiagnosticsCollector(), failure);
      const merged = mergeDiagnostics(first, second);
      expect(merged.hasErrors).to.equal(true);
      expect(merged.diagnostics.map((d) => d.code)).to.deep.equal([
        "TFG3002",
        "TFG1001",
      ]);
      expect(isError(failure)).to.equal(true);
    });
  });
});
