export * from "./syntax-objects/index.js";
export * from "./semantics/index.js";
export * from "./config/index.js";
export {
  DiagnosticsContext,
  diagnosticFromCode,
  formatDiagnostic,
  formatSpan,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticParams,
  type DiagnosticSeverity,
  type BackendLanguageName,
  type WarningKind,
  warningKinds,
} from "./diagnostics/index.js";
export { isCheckPerfEnabled, type CheckProfileSummary } from "./perf.js";
