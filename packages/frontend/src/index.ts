/**
 * mapweave frontend - type model, diagnostics and mapper discovery
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./model/type-descriptor.js";
export * from "./model/default-value.js";
export * from "./model/well-known.js";
export * from "./model/method.js";
export * from "./model/mapper.js";

export * from "./discovery/index.js";
