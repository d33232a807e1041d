/**
 * Reporting helpers shared by every runtime module.
 *
 * Fatal conditions are reported to the host before the caller throws the
 * returned error; warnings are reported and recorded, and execution goes on.
 */

import {
  createDiagnostic,
  type DiagnosticCode,
  type DiagnosticSeverity,
} from "../types/diagnostic.js";
import type { TypeRuntime } from "../model/types.js";
import { TypeModelError } from "./errors.js";

const record = (
  runtime: TypeRuntime,
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  subject?: string,
  hint?: string
) => {
  const diagnostic = createDiagnostic(code, severity, message, subject, hint);
  runtime.diagnostics.push(diagnostic);
  runtime.options.host.report(diagnostic);
  return diagnostic;
};

/**
 * Report an error and return it for the caller to throw.
 */
export const fail = (
  runtime: TypeRuntime,
  code: DiagnosticCode,
  message: string,
  details: {
    readonly subject?: string;
    readonly hint?: string;
    readonly candidates?: readonly string[];
    readonly cause?: unknown;
  } = {}
): TypeModelError =>
  new TypeModelError(
    record(runtime, code, "error", message, details.subject, details.hint),
    details.candidates,
    details.cause
  );

export const warn = (
  runtime: TypeRuntime,
  code: DiagnosticCode,
  message: string,
  subject?: string
): void => {
  record(runtime, code, "warning", message, subject);
};
