import { DiagnosticsContext } from "../diagnostics/index.js";
import type { TypeNames } from "../semantics/typenames.js";
import { ConstantValue, type ConstantValueDecorator } from "./const-expr.js";
import { Syntax, SyntaxMetadata } from "./syntax.js";
import { constantValueDecorator, TypeSpecifier } from "./type-specifier.js";

export type VariableMetadata = SyntaxMetadata & {
  type: TypeSpecifier;
  name: string;
  /** Written default. When omitted, one is derived from the type. */
  defaultValue?: ConstantValue;
};

/** A field of a parcelable or union, and the base of method arguments */
export class VariableDeclaration extends Syntax {
  readonly syntaxType: "variable" | "argument" = "variable";
  readonly type: TypeSpecifier;
  readonly name: string;
  readonly defaultValue?: ConstantValue;
  /** False when the default was derived from the type rather than written */
  readonly defaultUserSpecified: boolean;

  constructor(opts: VariableMetadata) {
    super(opts);
    this.type = opts.type;
    this.name = opts.name;
    this.defaultUserSpecified = opts.defaultValue !== undefined;
    this.defaultValue = opts.defaultValue ?? ConstantValue.defaultFor(opts.type);
  }

  /** Whether the variable starts out with a value every backend can produce */
  hasUsefulDefaultValue(): boolean {
    if (this.defaultValue) return true;
    // null is a valid default in every backend
    return this.type.isNullable();
  }

  get capitalizedName(): string {
    if (!this.name) throw new Error(`Variable at ${this.location} has no name`);
    return this.name[0].toUpperCase() + this.name.slice(1);
  }

  checkValid(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    let valid = this.type.checkValid(typenames, diagnostics);

    if (this.type.name === "void") {
      diagnostics.report({
        code: "DC0001",
        params: { kind: "void-declaration", name: this.name },
        span: this.location,
      });
      valid = false;
    }

    if (!this.defaultValue) return valid;
    if (!this.defaultValue.checkValid(diagnostics)) return false;
    if (!valid) return false;
    return this.valueString(constantValueDecorator, diagnostics) !== "";
  }

  valueString(
    decorator: ConstantValueDecorator,
    diagnostics: DiagnosticsContext = new DiagnosticsContext()
  ): string {
    return this.defaultValue?.valueString(this.type, decorator, diagnostics) ?? "";
  }

  signature(): string {
    return `${this.type.signature()} ${this.name}`;
  }

  toString() {
    const declaration = `${this.type.toString()} ${this.name}`;
    if (!this.defaultValue || !this.defaultUserSpecified) return declaration;
    return `${declaration} = ${this.valueString(constantValueDecorator)}`;
  }
}
