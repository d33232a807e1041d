/**
 * Diagnostic records reported by the type runtime
 *
 * Every fatal error raised by the runtime carries one of these, and every
 * warning is recorded as one, so a host can log, collect or assert on them
 * the same way.
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Registration and construction (TFG1001-TFG1099)
  | "TFG1001" // Recursive construction of a binding
  | "TFG1002" // Duplicate definition of a name
  | "TFG1003" // Malformed registration call
  | "TFG1004" // Ambiguous public type name
  | "TFG1005" // Type constructor or initializer failed
  | "TFG1006" // Externals registered after initialization
  // Resolution and dispatch (TFG2001-TFG2099)
  | "TFG2001" // Name could not be resolved
  | "TFG2002" // Undefined or null type argument
  | "TFG2003" // Wrong number of generic arguments
  | "TFG2004" // No applicable overload
  | "TFG2005" // Open generic type cannot be constructed
  | "TFG2006" // Invalid cast
  | "TFG2007" // Member missing or not callable
  | "TFG2008" // Ambiguous reflection match
  // Degraded-mode conditions (TFG3001-TFG3099)
  | "TFG3001" // Interface member not implemented
  | "TFG3002" // Implemented type is not an interface
  | "TFG3003" // Implemented interface is undefined
  | "TFG3004" // External member not implemented
  | "TFG3005" // External placeholder falls back to inherited member
  | "TFG3006" // Method group entry has no implementation
  | "TFG3007" // Static constructor failed
  | "TFG3008" // Construction of type with placeholder constructor
  // Manifest loading (TFG9001-TFG9099)
  | "TFG9001" // Manifest file not found
  | "TFG9002" // Failed to read manifest file
  | "TFG9003" // Invalid JSON in manifest file
  | "TFG9004" // Manifest must be an object
  | "TFG9005" // Missing or invalid 'loadUnit' field
  | "TFG9006" // Missing or invalid 'types' field
  | "TFG9007" // Invalid type declaration: must be an object
  | "TFG9008" // Invalid type declaration: missing or invalid field
  | "TFG9009" // Invalid type declaration: unknown 'kind'
  | "TFG9010" // Invalid member declaration
  | "TFG9011"; // Invalid enum member value

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly subject?: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  subject?: string,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  subject,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.subject) {
    parts.push(`${diagnostic.subject}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const mergeDiagnostics = (
  first: DiagnosticsCollector,
  second: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...first.diagnostics, ...second.diagnostics],
  hasErrors: first.hasErrors || second.hasErrors,
});
