import type { DiagnosticsContext } from "../diagnostics/index.js";
import type { BackendLanguageName } from "../diagnostics/registry.js";
import { Annotation, AnnotationKind, annotationName } from "./annotation.js";
import type { CodeWriter } from "./lib/code-writer.js";
import { Syntax, SyntaxMetadata } from "./syntax.js";

export type AnnotatableMetadata = SyntaxMetadata & {
  annotations?: Annotation[];
};

export type RustDeriveTrait =
  | "Copy"
  | "Clone"
  | "PartialOrd"
  | "Ord"
  | "PartialEq"
  | "Eq"
  | "Hash";

const rustDeriveTraits: readonly RustDeriveTrait[] = [
  "Copy",
  "Clone",
  "PartialOrd",
  "Ord",
  "PartialEq",
  "Eq",
  "Hash",
];

/** A node that can carry annotations: type specifiers and defined types */
export abstract class Annotatable extends Syntax {
  #annotations: Annotation[];

  constructor(opts: AnnotatableMetadata) {
    super(opts);
    this.#annotations = [...(opts.annotations ?? [])];
  }

  get annotations(): readonly Annotation[] {
    return this.#annotations;
  }

  /** The annotation kinds this node accepts */
  abstract supportedAnnotations(): readonly AnnotationKind[];

  /**
   * Reports annotations this node doesn't accept, invalid parameters and
   * repeated non-repeatable annotations. Everything is reported in one pass.
   */
  checkAnnotations(diagnostics: DiagnosticsContext): boolean {
    const supported = this.supportedAnnotations();
    let valid = true;

    for (const annotation of this.#annotations) {
      if (!supported.includes(annotation.kind)) {
        diagnostics.report({
          code: "AN0006",
          params: {
            kind: "annotation-not-supported-here",
            annotation: annotation.name,
            supported: supported.map(annotationName),
          },
          span: this.location,
        });
        valid = false;
        continue;
      }

      if (!annotation.checkValid(diagnostics)) valid = false;
    }

    const declared = new Map<AnnotationKind, Annotation>();
    for (const annotation of this.#annotations) {
      const previous = declared.get(annotation.kind);
      if (!previous) {
        declared.set(annotation.kind, annotation);
        continue;
      }

      if (annotation.repeatable) continue;
      diagnostics.report({
        code: "AN0007",
        params: {
          kind: "duplicate-annotation",
          annotation: annotation.name,
          previous: previous.location.toString(),
        },
        span: this.location,
      });
      valid = false;
    }

    return valid;
  }

  /** Finds the only annotation of a non-repeatable kind */
  protected getAnnotation(kind: AnnotationKind): Annotation | undefined {
    const annotation = this.#annotations.find((a) => a.kind === kind);
    if (annotation?.repeatable) {
      throw new Error(
        `Trying to get a single @${annotation.name} when it is repeatable`
      );
    }
    return annotation;
  }

  /** Every annotation of a given kind, repeatable or not */
  getAnnotations(kind: AnnotationKind): Annotation[] {
    return this.#annotations.filter((a) => a.kind === kind);
  }

  isNullable(): boolean {
    return !!this.getAnnotation("nullable");
  }

  isUtf8InCpp(): boolean {
    return !!this.getAnnotation("utf8InCpp");
  }

  isSensitiveData(): boolean {
    return !!this.getAnnotation("sensitiveData");
  }

  isVintfStability(): boolean {
    return !!this.getAnnotation("vintfStability");
  }

  isJavaOnlyImmutable(): boolean {
    return !!this.getAnnotation("javaOnlyImmutable");
  }

  isFixedSize(): boolean {
    return !!this.getAnnotation("fixedSize");
  }

  isHide(): boolean {
    return !!this.getAnnotation("hide");
  }

  isStableApiParcelable(language: BackendLanguageName): boolean {
    return language === "java" && !!this.getAnnotation("javaStableParcelable");
  }

  unsupportedAppUsage(): Annotation | undefined {
    return this.getAnnotation("unsupportedAppUsage");
  }

  backingAnnotation(): Annotation | undefined {
    return this.getAnnotation("backing");
  }

  /** The `type` written in `@Backing`, if any */
  backingTypeName(): string | undefined {
    return this.backingAnnotation()?.paramValue("type", "string");
  }

  /** Traits switched on in `@RustDerive` */
  rustDerive(): RustDeriveTrait[] {
    const annotation = this.getAnnotation("rustDerive");
    if (!annotation) return [];
    return rustDeriveTraits.filter(
      (trait) => annotation.paramValue(trait, "boolean") === true
    );
  }

  javaDerive(method: "toString" | "equals"): boolean {
    return this.getAnnotation("javaDerive")?.paramValue(method, "boolean") ?? false;
  }

  /** The `@Descriptor` value, or an empty string */
  annotatedDescriptor(): string {
    return this.getAnnotation("descriptor")?.paramValue("value", "string") ?? "";
  }

  /** Annotations rendered and sorted, joined by spaces */
  annotationsString(): string {
    return this.#annotations
      .map((a) => a.toString())
      .sort()
      .join(" ");
  }

  dumpAnnotations(writer: CodeWriter) {
    if (!this.#annotations.length) return;
    writer.write(`${this.annotationsString()}\n`);
  }
}
