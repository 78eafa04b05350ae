import { parseArgs } from "node:util";
import type { BackendLanguageName } from "../diagnostics/registry.js";
import { warningKinds, type WarningKind } from "../diagnostics/types.js";
import { backendLanguages, type CheckerConfig } from "./types.js";

const isBackendLanguage = (value: string): value is BackendLanguageName =>
  backendLanguages.some((language) => language === value);

const isWarningKind = (value: string): value is WarningKind =>
  warningKinds.some((kind) => kind === value);

const parseWarningKind = (value: string): WarningKind => {
  if (isWarningKind(value)) return value;
  throw new Error(
    `Unknown warning '${value}'. Expected one of: ${warningKinds.join(", ")}`
  );
};

/**
 * Reads checker options from command line arguments:
 *
 * - `--lang <java|cpp|ndk|rust>` runs that backend's restrictions
 * - `-Werror` promotes advisories to errors
 * - `-Wno-<kind>` disables an advisory, `-W<kind>` enables it again
 *
 * Later flags win over earlier ones.
 */
export const getConfigFromArgs = (args: string[]): CheckerConfig => {
  const { values } = parseArgs({
    args,
    options: {
      lang: {
        type: "string",
      },
      warning: {
        type: "string",
        short: "W",
        multiple: true,
      },
    },
    allowPositionals: true,
  });

  const config: CheckerConfig = {};

  const language = values.lang;
  if (language !== undefined) {
    if (!isBackendLanguage(language)) {
      throw new Error(
        `Unknown language '${language}'. Expected one of: ${backendLanguages.join(", ")}`
      );
    }
    config.language = language;
  }

  const disabled = new Set<WarningKind>();
  for (const flag of values.warning ?? []) {
    if (flag === "error") {
      config.warningsAsErrors = true;
    } else if (flag.startsWith("no-")) {
      disabled.add(parseWarningKind(flag.slice("no-".length)));
    } else {
      disabled.delete(parseWarningKind(flag));
    }
  }
  if (disabled.size) config.disabledWarnings = [...disabled];

  return config;
};
