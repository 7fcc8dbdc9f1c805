/**
 * Diagnostic types for mapweave
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Resolution errors (MWV1001-MWV1099)
  | "MWV1001" // No conversion path for a property
  | "MWV1002" // Ambiguous mapping method
  | "MWV1003" // Iterable element cannot be mapped
  | "MWV1004" // Map key cannot be mapped
  | "MWV1005" // Map value cannot be mapped
  | "MWV1006" // Container type contains itself (cyclic forge attempt)
  | "MWV1007" // Ambiguous factory method
  | "MWV1008" // Unmapped target property
  | "MWV1009" // Abstract target type without factory or implementation type
  | "MWV1010" // Several source properties match a target property
  | "MWV1011" // Unknown source property in an explicit mapping
  | "MWV1012" // Unsupported mapping method shape
  // Discovery errors (MWV2001-MWV2099)
  | "MWV2001" // Unsupported type syntax
  | "MWV2002" // Unknown type reference
  | "MWV2003" // Malformed JSDoc tag
  | "MWV2004" // No mapper declaration found
  // Internal errors
  | "MWV6001"; // Internal error

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  /** Names of the competing candidates for ambiguity diagnostics */
  readonly candidates?: readonly string[];
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string,
  candidates?: readonly string[]
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
  candidates,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.candidates && diagnostic.candidates.length > 0) {
    parts.push(`Candidates: ${diagnostic.candidates.join(", ")}.`);
  }

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
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});
