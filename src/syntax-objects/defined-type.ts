import type { DiagnosticsContext } from "../diagnostics/index.js";
import type { BackendLanguageName } from "../diagnostics/registry.js";
import type { TypeNames } from "../semantics/typenames.js";
import { Annotatable, AnnotatableMetadata } from "./annotatable.js";
import type { ConstantDeclaration } from "./constant-declaration.js";
import { CodeWriter } from "./lib/code-writer.js";
import type { Method } from "./method.js";
import type { DefinedTypeHandle } from "./type-specifier.js";
import type { VariableDeclaration } from "./variable.js";

export type DefinedTypeKind =
  | "parcelable"
  | "structured-parcelable"
  | "union"
  | "enum"
  | "interface";

export type Member = VariableDeclaration | ConstantDeclaration | Method;

export type DefinedTypeMetadata = AnnotatableMetadata & {
  name: string;
  package?: string;
  comments?: string;
  members?: Member[];
};

export const writeHideComment = (writer: CodeWriter) => writer.write("/* @hide */\n");

/**
 * Base of every top-level declaration. Members are split once, on
 * construction, into constants, fields and methods.
 */
export abstract class DefinedType extends Annotatable {
  readonly syntaxType = "defined-type";
  abstract readonly kind: DefinedTypeKind;
  readonly name: string;
  readonly package: string;
  readonly comments: string;
  readonly members: readonly Member[];
  readonly constants: readonly ConstantDeclaration[];
  readonly fields: readonly VariableDeclaration[];
  readonly methods: readonly Method[];

  constructor(opts: DefinedTypeMetadata) {
    super(opts);
    this.name = opts.name;
    this.package = opts.package ?? "";
    this.comments = opts.comments ?? "";
    this.members = [...(opts.members ?? [])];

    const constants: ConstantDeclaration[] = [];
    const fields: VariableDeclaration[] = [];
    const methods: Method[] = [];
    for (const member of this.members) {
      if (member.isConstantDeclaration()) constants.push(member);
      else if (member.isMethod()) methods.push(member);
      else fields.push(member);
    }
    this.constants = constants;
    this.fields = fields;
    this.methods = methods;
  }

  /** `package.Name`, or just the name outside a package */
  get canonicalName(): string {
    return this.package ? `${this.package}.${this.name}` : this.name;
  }

  get handle(): DefinedTypeHandle {
    return { canonicalName: this.canonicalName, kind: this.kind };
  }

  /** Names of the declared type parameters. Only parcelables can be generic. */
  get typeParameters(): readonly string[] {
    return [];
  }

  isHidden(): boolean {
    return /@hide\b/.test(this.comments);
  }

  checkValid(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    const annotationsValid = this.checkAnnotations(diagnostics);
    const membersValid = this.checkValidWithMembers(typenames, diagnostics);
    return annotationsValid && membersValid;
  }

  /** Backend restrictions. Each declaration kind narrows what it needs. */
  languageSpecificCheckValid(
    _typenames: TypeNames,
    _language: BackendLanguageName,
    _diagnostics: DiagnosticsContext
  ): boolean {
    return true;
  }

  protected checkValidWithMembers(
    typenames: TypeNames,
    diagnostics: DiagnosticsContext
  ): boolean {
    let valid = true;

    for (const field of this.fields) {
      if (!field.checkValid(typenames, diagnostics)) valid = false;
    }

    const fieldNames = new Set<string>();
    for (const field of this.fields) {
      if (fieldNames.has(field.name)) {
        diagnostics.report({
          code: "DC0003",
          params: { kind: "duplicate-field", typeName: this.name, field: field.name },
          span: field.location,
        });
        valid = false;
      }
      fieldNames.add(field.name);
    }

    if (this.isJavaOnlyImmutable()) {
      for (const field of this.fields) {
        // Unresolved types were already reported above
        if (!field.type.isResolved) continue;
        const { capable, aspect } = typenames.canBeJavaOnlyImmutable(field.type);
        if (capable) continue;
        diagnostics.report({
          code: "DC0005",
          params: {
            kind: "non-immutable-field",
            typeName: this.name,
            field: field.name,
            aspect: aspect ?? field.type.signature(),
          },
          span: field.location,
        });
        valid = false;
      }
    }

    const constantNames = new Set<string>();
    for (const constant of this.constants) {
      if (constantNames.has(constant.name)) {
        diagnostics.report({
          code: "DC0004",
          params: { kind: "duplicate-constant", name: constant.name },
          span: constant.location,
        });
        valid = false;
      }
      constantNames.add(constant.name);
      if (!constant.checkValid(typenames, diagnostics)) valid = false;
    }

    return valid;
  }

  /** Getters capitalize the first letter, so `foo` and `Foo` collide */
  protected checkValidForGetterNames(diagnostics: DiagnosticsContext): boolean {
    let valid = true;
    const getters = new Set<string>();
    for (const field of this.fields) {
      if (getters.has(field.capitalizedName)) {
        diagnostics.report({
          code: "DC0003",
          params: { kind: "duplicate-getter", typeName: this.name, field: field.name },
          span: field.location,
        });
        valid = false;
      }
      getters.add(field.capitalizedName);
    }
    return valid;
  }

  dumpHeader(writer: CodeWriter) {
    if (this.isHidden()) writeHideComment(writer);
    this.dumpAnnotations(writer);
  }

  /** Fields then constants, one per line */
  protected dumpFieldsAndConstants(writer: CodeWriter) {
    for (const field of this.fields) {
      if (field.type.isHidden()) writeHideComment(writer);
      writer.write(`${field.toString()};\n`);
    }
    this.dumpConstants(writer);
  }

  protected dumpConstants(writer: CodeWriter) {
    for (const constant of this.constants) {
      if (constant.type.isHidden()) writeHideComment(writer);
      writer.write(`${constant.toString()};\n`);
    }
  }

  /** Writes the declaration back as IDL source */
  abstract dump(writer: CodeWriter): void;

  toString() {
    const writer = new CodeWriter();
    this.dump(writer);
    return writer.toString();
  }
}
