import type { BackendLanguageName } from "../diagnostics/registry.js";
import type { WarningKind } from "../diagnostics/types.js";

export type CheckerConfig = {
  /** Also run the restrictions of this backend */
  language?: BackendLanguageName;
  /** Report advisories as errors */
  warningsAsErrors?: boolean;
  /** Advisories that are never reported */
  disabledWarnings?: readonly WarningKind[];
};

export const backendLanguages: readonly BackendLanguageName[] = [
  "java",
  "cpp",
  "ndk",
  "rust",
];
