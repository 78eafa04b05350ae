import type { CheckerConfig } from "../config/types.js";
import {
  diagnosticFromCode,
  DiagnosticsContext,
  type Diagnostic,
} from "../diagnostics/index.js";
import { logCheckProfile, startCheckProfile, timeCheckPhase } from "../perf.js";
import type { Document } from "../syntax-objects/document.js";
import { bindDocumentReferences } from "./bind-references.js";
import { resolveDocumentTypes } from "./resolve-types.js";
import type { TypeNames } from "./typenames.js";

export type CheckResult = {
  /** No error-severity diagnostic was recorded */
  ok: boolean;
  diagnostics: readonly Diagnostic[];
};

const registerDefinedTypes = (
  document: Document,
  typenames: TypeNames,
  diagnostics: DiagnosticsContext
): boolean => {
  let success = true;
  for (const type of document.definedTypes) {
    if (typenames.addDefinedType(type)) continue;
    const previous = typenames.tryGetDefinedType(type.canonicalName);
    diagnostics.report({
      code: "RS0003",
      params: { kind: "duplicate-type", name: type.canonicalName },
      span: type.location,
      related: previous
        ? [
            diagnosticFromCode({
              code: "RS0003",
              params: { kind: "previous-type", name: type.canonicalName },
              span: previous.location,
            }),
          ]
        : undefined,
    });
    success = false;
  }
  return success;
};

/**
 * Runs every semantic check over a document: registration, type
 * resolution, reference binding, enum backing types, validation and, when a
 * language is configured, that backend's restrictions.
 *
 * Validation needs resolved types and bound references, so it is skipped
 * when either phase fails. Checking an already checked document again gives
 * the same diagnostics.
 */
export const checkDocument = (
  document: Document,
  typenames: TypeNames,
  config: CheckerConfig = {}
): CheckResult => {
  const diagnostics = new DiagnosticsContext({
    warningsAsErrors: config.warningsAsErrors,
    disabledWarnings: config.disabledWarnings,
  });
  const profile = startCheckProfile(document.location.file);

  timeCheckPhase(profile, "register", () =>
    registerDefinedTypes(document, typenames, diagnostics)
  );

  const resolved = timeCheckPhase(profile, "resolve", () =>
    resolveDocumentTypes(document, typenames, diagnostics, profile)
  );

  const bound = timeCheckPhase(profile, "bind", () =>
    bindDocumentReferences(document, typenames, diagnostics, profile)
  );

  timeCheckPhase(profile, "autofill", () => {
    for (const type of document.definedTypes) {
      if (type.isEnumDeclaration()) type.autofill(typenames, diagnostics);
    }
  });

  const valid =
    resolved &&
    bound &&
    timeCheckPhase(profile, "validate", () => {
      document.definedTypes.forEach((type) => profile?.countDeclaration(type.kind));
      return document.checkValid(typenames, diagnostics);
    });

  const language = config.language;
  if (valid && language) {
    timeCheckPhase(profile, `language:${language}`, () =>
      document.languageSpecificCheckValid(typenames, language, diagnostics)
    );
  }

  const result: CheckResult = {
    ok: !diagnostics.hasErrors,
    diagnostics: diagnostics.diagnostics,
  };
  logCheckProfile(profile, result);
  return result;
};
