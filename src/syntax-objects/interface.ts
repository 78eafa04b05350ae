import { diagnosticFromCode, type DiagnosticsContext } from "../diagnostics/index.js";
import type { BackendLanguageName } from "../diagnostics/registry.js";
import { isJavaKeyword, RESERVED_ARGUMENT_PREFIX } from "../semantics/keywords.js";
import type { TypeNames } from "../semantics/typenames.js";
import type { AnnotationKind } from "./annotation.js";
import type { Argument } from "./argument.js";
import { DefinedType, DefinedTypeMetadata, writeHideComment } from "./defined-type.js";
import type { CodeWriter } from "./lib/code-writer.js";
import type { Method } from "./method.js";

const reservedMethods = new Set([
  "asBinder()",
  "getInterfaceHash()",
  "getInterfaceVersion()",
  "getTransactionName(int)",
]);

export class InterfaceDeclaration extends DefinedType {
  readonly kind = "interface";
  /** Every method of a oneway interface is oneway */
  readonly oneway: boolean;

  constructor(opts: DefinedTypeMetadata & { oneway?: boolean }) {
    super(opts);
    this.oneway = opts.oneway ?? false;
    this.methods.forEach((method) => method.applyInterfaceOneway(this.oneway));
  }

  /** The `@Descriptor` value, or the canonical name */
  get descriptor(): string {
    return this.annotatedDescriptor() || this.canonicalName;
  }

  supportedAnnotations(): readonly AnnotationKind[] {
    return [
      "sensitiveData",
      "vintfStability",
      "unsupportedAppUsage",
      "hide",
      "javaPassthrough",
      "descriptor",
    ];
  }

  checkValid(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    let valid = super.checkValid(typenames, diagnostics);

    const signatures = new Map<string, Method>();
    for (const method of this.methods) {
      if (!this.checkMethod(method, typenames, diagnostics)) valid = false;

      const signature = method.signature();
      const previous = signatures.get(signature);
      if (previous) {
        diagnostics.report({
          code: "IF0007",
          params: { kind: "duplicate-method", signature },
          span: method.location,
          related: [
            diagnosticFromCode({
              code: "IF0007",
              params: { kind: "previous-method", signature },
              span: previous.location,
            }),
          ],
        });
        valid = false;
      } else {
        signatures.set(signature, method);
      }

      if (reservedMethods.has(signature)) {
        diagnostics.report({
          code: "IF0008",
          params: { kind: "reserved-method", signature },
          span: method.location,
        });
        valid = false;
      }
    }

    if (!this.name.startsWith("I")) {
      diagnostics.report({
        code: "WN0002",
        params: { kind: "interface-name", name: this.name },
        span: this.location,
      });
    }

    return valid;
  }

  private checkMethod(
    method: Method,
    typenames: TypeNames,
    diagnostics: DiagnosticsContext
  ): boolean {
    let valid = method.type.checkValid(typenames, diagnostics);

    if (method.type.name === "ParcelableHolder") {
      diagnostics.report({
        code: "IF0001",
        params: { kind: "holder-return" },
        span: method.location,
      });
      valid = false;
    }

    if (method.oneway && method.type.name !== "void") {
      diagnostics.report({
        code: "IF0002",
        params: { kind: "oneway-return", method: method.name },
        span: method.location,
      });
      valid = false;
    }

    const argumentNames = new Set<string>();
    for (const arg of method.arguments) {
      if (argumentNames.has(arg.name)) {
        diagnostics.report({
          code: "IF0003",
          params: { kind: "duplicate-argument", method: method.name, argument: arg.name },
          span: method.location,
        });
        valid = false;
      }
      argumentNames.add(arg.name);

      if (!this.checkArgument(method, arg, typenames, diagnostics)) valid = false;
    }

    return valid;
  }

  private checkArgument(
    method: Method,
    arg: Argument,
    typenames: TypeNames,
    diagnostics: DiagnosticsContext
  ): boolean {
    // Direction rules ask the table about the type, which needs a valid type
    if (!arg.type.checkValid(typenames, diagnostics)) return false;

    if (arg.type.name === "ParcelableHolder") {
      diagnostics.report({
        code: "IF0001",
        params: { kind: "holder-argument" },
        span: arg.location,
      });
      return false;
    }

    let valid = true;
    if (method.oneway && arg.isOut()) {
      diagnostics.report({
        code: "IF0002",
        params: { kind: "oneway-out", method: method.name },
        span: method.location,
      });
      valid = false;
    }

    const { capable, aspect } = typenames.canBeOutParameter(arg.type);
    if (!arg.directionSpecified && capable) {
      diagnostics.report({
        code: "IF0004",
        params: { kind: "direction-required", signature: arg.type.signature() },
        span: arg.location,
      });
      valid = false;
    }

    if (arg.direction !== "in" && !capable) {
      diagnostics.report({
        code: "IF0005",
        params: {
          kind: "direction-not-allowed",
          argument: arg.name,
          direction: arg.directionSpecifier(),
          aspect: aspect ?? arg.type.signature(),
        },
        span: arg.location,
      });
      valid = false;
    }

    if (isJavaKeyword(arg.name)) {
      diagnostics.report({
        code: "IF0006",
        params: { kind: "keyword-argument", argument: arg.name },
        span: arg.location,
      });
      valid = false;
    }

    if (arg.name.startsWith(RESERVED_ARGUMENT_PREFIX)) {
      diagnostics.report({
        code: "IF0006",
        params: {
          kind: "reserved-prefix-argument",
          argument: arg.name,
          prefix: RESERVED_ARGUMENT_PREFIX,
        },
        span: arg.location,
      });
      valid = false;
    }

    if (arg.direction === "inout") {
      diagnostics.report({
        code: "WN0003",
        params: { kind: "inout-parameter", argument: arg.name },
        span: arg.location,
      });
    }

    return valid;
  }

  languageSpecificCheckValid(
    typenames: TypeNames,
    language: BackendLanguageName,
    diagnostics: DiagnosticsContext
  ): boolean {
    let valid = true;
    for (const method of this.methods) {
      const types = [method.type, ...method.arguments.map((arg) => arg.type)];
      for (const type of types) {
        if (!type.languageSpecificCheckValid(typenames, language, diagnostics)) {
          valid = false;
        }
      }
    }
    return valid;
  }

  dump(writer: CodeWriter) {
    this.dumpHeader(writer);
    // Oneway-ness is carried by each method
    writer.write(`interface ${this.name} {\n`);
    writer.indent();
    for (const method of this.methods) {
      if (method.isHidden()) writeHideComment(writer);
      writer.write(`${method.toString()};\n`);
    }
    this.dumpConstants(writer);
    writer.dedent();
    writer.write("}\n");
  }
}
