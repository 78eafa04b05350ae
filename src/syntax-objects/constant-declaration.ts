import { DiagnosticsContext } from "../diagnostics/index.js";
import type { TypeNames } from "../semantics/typenames.js";
import type { ConstantValue, ConstantValueDecorator } from "./const-expr.js";
import { Syntax, SyntaxMetadata } from "./syntax.js";
import { constantValueDecorator, TypeSpecifier } from "./type-specifier.js";

const supportedConstantTypes = new Set(["String", "byte", "int", "long"]);

export class ConstantDeclaration extends Syntax {
  readonly syntaxType = "constant-declaration";
  readonly type: TypeSpecifier;
  readonly name: string;
  readonly value: ConstantValue;

  constructor(
    opts: SyntaxMetadata & { type: TypeSpecifier; name: string; value: ConstantValue }
  ) {
    super(opts);
    this.type = opts.type;
    this.name = opts.name;
    this.value = opts.value;
  }

  checkValid(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    const typeValid = this.type.checkValid(typenames, diagnostics);
    const valueValid = this.value.checkValid(diagnostics);
    if (!typeValid || !valueValid) return false;

    const signature = this.type.signature();
    if (!supportedConstantTypes.has(signature)) {
      diagnostics.report({
        code: "DC0002",
        params: { kind: "unsupported-constant-type", type: signature },
        span: this.location,
      });
      return false;
    }

    return this.valueString(constantValueDecorator, diagnostics) !== "";
  }

  valueString(
    decorator: ConstantValueDecorator,
    diagnostics: DiagnosticsContext = new DiagnosticsContext()
  ): string {
    return this.value.valueString(this.type, decorator, diagnostics);
  }

  signature(): string {
    return `${this.type.signature()} ${this.name}`;
  }

  toString() {
    return `const ${this.type.toString()} ${this.name} = ${this.valueString(constantValueDecorator)}`;
  }
}
