export * from "./types.js";
export * from "./registry.js";

import {
  type Diagnostic,
  type DiagnosticHint,
  type DiagnosticInput,
  type DiagnosticPhase,
  type SourceSpan,
  type WarningKind,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

const codePhasePrefixes: Record<string, DiagnosticPhase> = {
  RS: "resolution",
  AN: "annotation",
  TY: "typing",
  CV: "constant",
  DC: "declaration",
  IF: "interface",
};

const inferPhase = (code: string): DiagnosticPhase | undefined => {
  const prefix = code.slice(0, 2).toUpperCase();
  return codePhasePrefixes[prefix];
};

export const createDiagnostic = ({
  severity,
  phase,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
  phase: phase ?? inferPhase(input.code),
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
  related?: readonly Diagnostic[];
  hints?: readonly DiagnosticHint[];
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    span: options.span,
    related: options.related,
    severity: definition.severity,
    phase: definition.phase,
    warning: definition.warning,
    hints: options.hints ?? definition.hints,
  });
};

export const formatSpan = (span: SourceSpan): string => {
  if (span.source === "synthesized") return span.file;
  const end =
    span.begin.line !== span.end.line
      ? `${span.end.line}.${span.end.column}`
      : `${span.end.column}`;
  return `${span.file}:${span.begin.line}.${span.begin.column}-${end}`;
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const severity = diagnostic.severity.toUpperCase();
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  const warning = diagnostic.warning ? ` [-W${diagnostic.warning}]` : "";
  return `${formatSpan(diagnostic.span)} ${severity} ${phase}${diagnostic.code}: ${diagnostic.message}${warning}`;
};

export type DiagnosticsOptions = {
  /** Report every enabled advisory as an error */
  warningsAsErrors?: boolean;
  /** Advisory kinds that are dropped instead of reported */
  disabledWarnings?: readonly WarningKind[];
};

/**
 * Collects every diagnostic raised while checking a tree. Validators keep
 * going after a failure, so a single pass surfaces the whole problem set.
 */
export class DiagnosticsContext {
  #diagnostics: Diagnostic[] = [];
  readonly #warningsAsErrors: boolean;
  readonly #disabledWarnings: ReadonlySet<WarningKind>;

  constructor(options: DiagnosticsOptions = {}) {
    this.#warningsAsErrors = options.warningsAsErrors ?? false;
    this.#disabledWarnings = new Set(options.disabledWarnings ?? []);
  }

  /** Returns the recorded diagnostic, or undefined when its advisory kind is disabled */
  report<K extends DiagnosticCode>(
    options: RegistryDiagnosticOptions<K>
  ): Diagnostic | undefined {
    const diagnostic = diagnosticFromCode(options);
    if (diagnostic.warning && this.#disabledWarnings.has(diagnostic.warning)) {
      return undefined;
    }

    const adjusted: Diagnostic =
      diagnostic.warning && this.#warningsAsErrors
        ? { ...diagnostic, severity: "error" }
        : diagnostic;
    this.#diagnostics.push(adjusted);
    return adjusted;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }

  get errors(): readonly Diagnostic[] {
    return this.#diagnostics.filter((d) => d.severity === "error");
  }

  get warnings(): readonly Diagnostic[] {
    return this.#diagnostics.filter((d) => d.severity === "warning");
  }

  get hasErrors(): boolean {
    return this.#diagnostics.some((d) => d.severity === "error");
  }

  /** Number of diagnostics recorded so far, used to tell whether a check added any */
  get size(): number {
    return this.#diagnostics.length;
  }

  clear(): void {
    this.#diagnostics = [];
  }
}
