import type { DiagnosticsContext } from "../diagnostics/index.js";
import type { BackendLanguageName } from "../diagnostics/registry.js";
import type { TypeNames } from "../semantics/typenames.js";
import type { AnnotationKind } from "./annotation.js";
import type { CodeWriter } from "./lib/code-writer.js";
import { ParcelableDeclaration } from "./parcelable.js";

export class UnionDeclaration extends ParcelableDeclaration {
  readonly kind = "union";

  supportedAnnotations(): readonly AnnotationKind[] {
    return [
      "vintfStability",
      "hide",
      "javaPassthrough",
      "javaDerive",
      "javaOnlyImmutable",
      "rustDerive",
    ];
  }

  checkValid(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    let valid = super.checkValid(typenames, diagnostics);

    // Unions always expose getters
    if (!this.checkValidForGetterNames(diagnostics)) valid = false;

    for (const field of this.fields) {
      if (field.type.name !== "ParcelableHolder") continue;
      diagnostics.report({
        code: "DC0009",
        params: { kind: "union-holder-member", field: field.name },
        span: field.location,
      });
      valid = false;
    }

    const [first] = this.fields;
    if (!first) {
      diagnostics.report({
        code: "DC0009",
        params: { kind: "union-no-fields", typeName: this.name },
        span: this.location,
      });
      return false;
    }

    // A default-constructed union holds its first member
    if (!first.hasUsefulDefaultValue()) {
      if (!first.type.isArray && typenames.getEnumDeclaration(first.type)) {
        diagnostics.report({
          code: "DC0009",
          params: { kind: "union-enum-default" },
          span: first.location,
        });
        valid = false;
      } else if (first.type.isArray) {
        diagnostics.report({
          code: "DC0009",
          params: { kind: "union-array-default" },
          span: first.location,
        });
        valid = false;
      }
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
    writer.write(`union ${this.name}${this.typeParametersString()} {\n`);
    writer.indent();
    this.dumpFieldsAndConstants(writer);
    writer.dedent();
    writer.write("}\n");
  }
}
