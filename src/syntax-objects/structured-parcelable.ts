import type { DiagnosticsContext } from "../diagnostics/index.js";
import type { BackendLanguageName } from "../diagnostics/registry.js";
import type { TypeNames } from "../semantics/typenames.js";
import type { AnnotationKind } from "./annotation.js";
import type { CodeWriter } from "./lib/code-writer.js";
import { ParcelableDeclaration } from "./parcelable.js";

export class StructuredParcelableDeclaration extends ParcelableDeclaration {
  readonly kind = "structured-parcelable";

  supportedAnnotations(): readonly AnnotationKind[] {
    return [
      "vintfStability",
      "unsupportedAppUsage",
      "hide",
      "javaPassthrough",
      "javaDerive",
      "javaOnlyImmutable",
      "fixedSize",
      "rustDerive",
    ];
  }

  checkValid(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    let valid = super.checkValid(typenames, diagnostics);

    if (this.isFixedSize()) {
      for (const field of this.fields) {
        if (!field.type.isResolved) continue;
        const { capable, aspect } = typenames.canBeFixedSize(field.type);
        if (capable) continue;
        diagnostics.report({
          code: "DC0006",
          params: {
            kind: "non-fixed-size-field",
            typeName: this.name,
            field: field.name,
            aspect: aspect ?? field.type.signature(),
          },
          span: field.location,
        });
        valid = false;
      }
    }

    // Immutable parcelables expose getters
    if (this.isJavaOnlyImmutable() && !this.checkValidForGetterNames(diagnostics)) {
      valid = false;
    }

    return valid;
  }

  languageSpecificCheckValid(
    typenames: TypeNames,
    language: BackendLanguageName,
    diagnostics: DiagnosticsContext
  ): boolean {
    let valid = super.languageSpecificCheckValid(typenames, language, diagnostics);
    for (const field of this.fields) {
      if (!field.type.languageSpecificCheckValid(typenames, language, diagnostics)) {
        valid = false;
      }
    }
    return valid;
  }

  dump(writer: CodeWriter) {
    this.dumpHeader(writer);
    writer.write(`parcelable ${this.name}${this.typeParametersString()} {\n`);
    writer.indent();
    this.dumpFieldsAndConstants(writer);
    writer.dedent();
    writer.write("}\n");
  }
}
