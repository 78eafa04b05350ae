export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "resolution"
  | "annotation"
  | "typing"
  | "declaration"
  | "interface"
  | "constant";

/** Advisory (non-fatal) diagnostic kinds that can be disabled or promoted */
export type WarningKind = "enum-zero" | "interface-name" | "inout-parameter";

export const warningKinds: readonly WarningKind[] = [
  "enum-zero",
  "interface-name",
  "inout-parameter",
];

export interface SourcePoint {
  line: number;
  column: number;
}

export type SourceProvenance = "parsed" | "synthesized";

export interface SourceSpan {
  file: string;
  begin: SourcePoint;
  end: SourcePoint;
  source?: SourceProvenance;
}

export interface DiagnosticHint {
  message: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  warning?: WarningKind;
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = {
  code: string;
  message: string;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  warning?: WarningKind;
  hints?: readonly DiagnosticHint[];
};
