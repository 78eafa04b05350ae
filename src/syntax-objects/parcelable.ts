import type { DiagnosticsContext } from "../diagnostics/index.js";
import type { BackendLanguageName } from "../diagnostics/registry.js";
import type { TypeNames } from "../semantics/typenames.js";
import type { AnnotationKind } from "./annotation.js";
import { DefinedType, DefinedTypeMetadata } from "./defined-type.js";
import type { CodeWriter } from "./lib/code-writer.js";

export type ParcelableMetadata = DefinedTypeMetadata & {
  typeParameters?: string[];
};

const stripQuotes = (header: string): string =>
  header.length >= 2 && header.startsWith('"') && header.endsWith('"')
    ? header.slice(1, -1)
    : header;

/**
 * A parcelable whose layout is defined by hand in each backend. Structured
 * parcelables and unions build on it.
 */
export class ParcelableDeclaration extends DefinedType {
  readonly kind: "parcelable" | "structured-parcelable" | "union" = "parcelable";
  /** Native header providing the type, quotes stripped */
  readonly cppHeader: string;
  readonly #typeParameters: readonly string[];

  constructor(opts: ParcelableMetadata & { cppHeader?: string }) {
    super(opts);
    this.cppHeader = stripQuotes(opts.cppHeader ?? "");
    this.#typeParameters = [...(opts.typeParameters ?? [])];
  }

  get typeParameters(): readonly string[] {
    return this.#typeParameters;
  }

  get isGeneric(): boolean {
    return this.#typeParameters.length > 0;
  }

  supportedAnnotations(): readonly AnnotationKind[] {
    return [
      "vintfStability",
      "unsupportedAppUsage",
      "javaStableParcelable",
      "hide",
      "javaPassthrough",
      "javaOnlyImmutable",
    ];
  }

  checkValid(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    const valid = super.checkValid(typenames, diagnostics);
    const paramsValid = this.checkTypeParameters(diagnostics);
    return valid && paramsValid;
  }

  private checkTypeParameters(diagnostics: DiagnosticsContext): boolean {
    if (new Set(this.#typeParameters).size === this.#typeParameters.length) return true;
    diagnostics.report({
      code: "DC0007",
      params: { kind: "duplicate-type-parameter", typeName: this.name },
      span: this.location,
    });
    return false;
  }

  languageSpecificCheckValid(
    _typenames: TypeNames,
    language: BackendLanguageName,
    diagnostics: DiagnosticsContext
  ): boolean {
    const isNative = language === "cpp" || language === "ndk";
    if (this.kind !== "parcelable" || !isNative || this.cppHeader) return true;
    diagnostics.report({
      code: "DC0008",
      params: { kind: "missing-native-header", typeName: this.name },
      span: this.location,
    });
    return false;
  }

  protected typeParametersString(): string {
    return this.isGeneric ? `<${this.#typeParameters.join(", ")}>` : "";
  }

  dump(writer: CodeWriter) {
    this.dumpHeader(writer);
    writer.write(`parcelable ${this.name}${this.typeParametersString()} ;\n`);
  }
}
