/**
 * Check command - builds every declared type and counts what went wrong
 */

import {
  isDiagnosticError,
  isTypeModelError,
  type Diagnostic,
} from "@typeforge/runtime";
import type { LoadedProject } from "./load.js";

export type CheckSummary = {
  readonly checked: number;
  /** Types whose construction or initialization threw. */
  readonly failed: readonly string[];
  readonly errors: readonly Diagnostic[];
  readonly warnings: readonly Diagnostic[];
};

/**
 * Dereference each handle so its members, method groups, interface
 * conformance and assignability are all computed.
 */
export const checkCommand = (project: LoadedProject): CheckSummary => {
  const failed: string[] = [];

  for (const handle of project.handles) {
    try {
      handle.get();
    } catch (failure) {
      if (!isTypeModelError(failure)) throw failure;
      failed.push(handle.name);
    }
  }

  const diagnostics = project.runtime.diagnostics;
  return {
    checked: project.handles.length,
    failed,
    errors: diagnostics.filter(isDiagnosticError),
    warnings: diagnostics.filter((diagnostic) => diagnostic.severity === "warning"),
  };
};

export const formatCheckSummary = (summary: CheckSummary): string => {
  const problems = summary.errors.length + summary.failed.length;
  if (problems === 0) {
    const warnings =
      summary.warnings.length > 0 ? ` (${summary.warnings.length} warning(s))` : "";
    return `✓ ${summary.checked} type(s) checked${warnings}`;
  }
  return `✗ ${summary.failed.length} of ${summary.checked} type(s) failed, ${summary.errors.length} error(s)`;
};
