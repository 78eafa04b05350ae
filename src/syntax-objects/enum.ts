import { DiagnosticsContext } from "../diagnostics/index.js";
import type { TypeNames } from "../semantics/typenames.js";
import type { AnnotationKind } from "./annotation.js";
import { ConstantValue, type ConstantValueDecorator } from "./const-expr.js";
import { DefinedType, DefinedTypeMetadata } from "./defined-type.js";
import type { CodeWriter } from "./lib/code-writer.js";
import { SourceLocation, Syntax, SyntaxMetadata } from "./syntax.js";
import { constantValueDecorator, TypeSpecifier } from "./type-specifier.js";

const backingTypes = new Set(["byte", "int", "long"]);

export class Enumerator extends Syntax {
  readonly syntaxType = "enumerator";
  readonly name: string;
  readonly comments: string;
  /** False when the value was filled in as `previous + 1` */
  readonly valueUserSpecified: boolean;
  #value?: ConstantValue;
  #parent?: EnumDeclaration;

  constructor(
    opts: SyntaxMetadata & { name: string; value?: ConstantValue; comments?: string }
  ) {
    super(opts);
    this.name = opts.name;
    this.comments = opts.comments ?? "";
    this.#value = opts.value;
    this.valueUserSpecified = opts.value !== undefined;
  }

  get value(): ConstantValue | undefined {
    return this.#value;
  }

  get parent(): EnumDeclaration | undefined {
    return this.#parent;
  }

  /** Canonical name of the enum this enumerator belongs to */
  get enumCanonicalName(): string | undefined {
    return this.#parent?.canonicalName;
  }

  /** @internal Called by the owning enum */
  adopt(parent: EnumDeclaration, fallback: () => ConstantValue) {
    if (this.#parent) throw new Error(`Enumerator ${this.name} already belongs to an enum`);
    this.#parent = parent;
    this.#value ??= fallback();
  }

  checkValid(backingType: TypeSpecifier, diagnostics: DiagnosticsContext): boolean {
    if (!this.#value) return false;
    if (!this.#value.checkValid(diagnostics)) return false;
    if (this.#value.valueString(backingType, constantValueDecorator, diagnostics) !== "") {
      return true;
    }
    diagnostics.report({
      code: "DC0010",
      params: { kind: "enumerator-type-mismatch", enumerator: this.name },
      span: this.location,
    });
    return false;
  }

  valueString(
    backingType: TypeSpecifier,
    decorator: ConstantValueDecorator,
    diagnostics: DiagnosticsContext = new DiagnosticsContext()
  ): string {
    return this.#value?.valueString(backingType, decorator, diagnostics) ?? "";
  }

  toString() {
    if (!this.#value || !this.valueUserSpecified) return this.name;
    return `${this.name} = ${this.#value.toString()}`;
  }
}

export class EnumDeclaration extends DefinedType {
  readonly kind = "enum";
  readonly enumerators: readonly Enumerator[];
  #backingType?: TypeSpecifier;
  #autofilled = false;

  constructor(opts: DefinedTypeMetadata & { enumerators: Enumerator[] }) {
    super(opts);
    this.enumerators = [...opts.enumerators];

    // Missing values become `previous + 1` now, so later enumerators can
    // refer to earlier ones before anything is resolved
    let previous: Enumerator | undefined;
    for (const enumerator of this.enumerators) {
      const prev = previous;
      const location = enumerator.location;
      enumerator.adopt(this, () =>
        prev
          ? ConstantValue.binary(
              location,
              ConstantValue.reference(location, prev.name),
              "+",
              ConstantValue.integral(location, "1")
            )
          : ConstantValue.integral(location, "0")
      );
      previous = enumerator;
    }
  }

  get backingType(): TypeSpecifier | undefined {
    return this.#backingType;
  }

  get isAutofilled(): boolean {
    return this.#autofilled;
  }

  supportedAnnotations(): readonly AnnotationKind[] {
    return ["vintfStability", "backing", "hide", "javaPassthrough"];
  }

  /**
   * Sets the backing type from `@Backing(type=...)`, or `byte` without one.
   * Runs after type resolution and before `checkValid`.
   */
  autofill(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    if (this.#autofilled) return this.#backingType !== undefined;
    this.#autofilled = true;

    const annotation = this.backingAnnotation();
    if (annotation && !annotation.checkValid(diagnostics)) return false;

    const typeName = annotation?.paramValue("type", "string", diagnostics) ?? "byte";
    const backingType = new TypeSpecifier({
      location: annotation?.location ?? SourceLocation.synthesized(this.location.file),
      name: typeName,
    });

    if (!backingType.resolve(typenames) || !backingTypes.has(backingType.name)) {
      diagnostics.report({
        code: "DC0010",
        params: { kind: "enum-invalid-backing-type", type: typeName },
        span: backingType.location,
      });
      return false;
    }

    this.#backingType = backingType;
    return true;
  }

  checkValid(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    let valid = super.checkValid(typenames, diagnostics);

    if (this.members.length) {
      diagnostics.report({
        code: "DC0010",
        params: { kind: "enum-has-members" },
        span: this.location,
      });
      valid = false;
    }

    const backingType = this.#backingType;
    if (!backingType) {
      // A failed autofill has already said why
      if (!this.#autofilled) {
        diagnostics.report({
          code: "DC0010",
          params: { kind: "enum-missing-backing-type" },
          span: this.location,
        });
      }
      return false;
    }

    let enumeratorsValid = true;
    for (const enumerator of this.enumerators) {
      if (!enumerator.checkValid(backingType, diagnostics)) enumeratorsValid = false;
    }
    // Rendering the first value below needs valid enumerators
    if (!enumeratorsValid) return false;

    const [first] = this.enumerators;
    if (!first) throw new Error(`The enum '${this.name}' has no enumerators`);

    const firstValue = first.valueString(backingType, constantValueDecorator, diagnostics);
    if (firstValue !== "0") {
      diagnostics.report({
        code: "WN0001",
        params: { kind: "enum-zero", enumerator: first.name, value: firstValue },
        span: first.location,
      });
    }

    return valid;
  }

  dump(writer: CodeWriter) {
    this.dumpHeader(writer);
    writer.write(`enum ${this.name} {\n`);
    writer.indent();
    const backingType = this.#backingType;
    for (const enumerator of this.enumerators) {
      const value = backingType
        ? enumerator.valueString(backingType, constantValueDecorator)
        : enumerator.value?.toString() ?? "";
      writer.write(`${enumerator.name} = ${value},\n`);
    }
    writer.dedent();
    writer.write("}\n");
  }
}
