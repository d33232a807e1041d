/**
 * The single error class thrown by the runtime.
 *
 * The diagnostic code decides the error's name so callers can tell a
 * recursive construction apart from a failed overload without a class per
 * case.
 */

import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";

const ERROR_NAMES: Partial<Record<DiagnosticCode, string>> = {
  TFG1001: "RecursiveConstructionError",
  TFG1002: "DuplicateDefinitionError",
  TFG1003: "InvalidRegistrationError",
  TFG1004: "AmbiguousTypeError",
  TFG1005: "TypeLoadError",
  TFG1006: "InvalidRegistrationError",
  TFG2001: "NameResolutionError",
  TFG2002: "InvalidArgumentError",
  TFG2003: "InvalidArgumentError",
  TFG2004: "NoApplicableOverloadError",
  TFG2005: "OpenTypeConstructionError",
  TFG2006: "InvalidCastError",
  TFG2007: "MissingMemberError",
  TFG2008: "AmbiguousMatchError",
  TFG3004: "ExternalNotImplementedError",
  TFG3007: "TypeInitializationError",
};

export class TypeModelError extends Error {
  readonly diagnostic: Diagnostic;
  readonly code: DiagnosticCode;
  /** Candidate signatures, filled for overload failures. */
  readonly candidates: readonly string[];

  constructor(
    diagnostic: Diagnostic,
    candidates: readonly string[] = [],
    cause?: unknown
  ) {
    super(diagnostic.message, cause === undefined ? undefined : { cause });
    this.name = ERROR_NAMES[diagnostic.code] ?? "TypeModelError";
    this.diagnostic = diagnostic;
    this.code = diagnostic.code;
    this.candidates = candidates;
  }
}

export const isTypeModelError = (value: unknown): value is TypeModelError =>
  value instanceof TypeModelError;

export const describeError = (value: unknown): string =>
  value instanceof Error ? value.message : String(value);
