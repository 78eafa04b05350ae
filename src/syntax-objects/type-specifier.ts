import type { DiagnosticsContext } from "../diagnostics/index.js";
import type { BackendLanguageName, DiagnosticParams } from "../diagnostics/registry.js";
import type { TypeNames } from "../semantics/typenames.js";
import { Annotatable, AnnotatableMetadata } from "./annotatable.js";
import type { AnnotationKind } from "./annotation.js";
import type { ConstantTargetType, ConstantValueDecorator } from "./const-expr.js";
import type { DefinedTypeKind } from "./defined-type.js";

/**
 * A read-only link from a resolved type specifier to the declaration it
 * names. The declaration itself is looked up through the type-name table.
 */
export interface DefinedTypeHandle {
  readonly canonicalName: string;
  readonly kind: DefinedTypeKind;
}

type Resolution = {
  canonicalName: string;
  definedType?: DefinedTypeHandle;
  /** Resolved to a type parameter of the enclosing generic declaration */
  isTypeParameter: boolean;
};

export type ResolveOptions = {
  /** Name to look up instead of the written one, e.g. after import qualification */
  name?: string;
  /** Type parameters in scope, which resolve to themselves */
  typeParameters?: readonly string[];
};

const listElementBuiltins = new Set(["String", "IBinder", "ParcelFileDescriptor"]);
const parcelableKinds = new Set<DefinedTypeKind>(["parcelable", "structured-parcelable", "union"]);

export class TypeSpecifier extends Annotatable implements ConstantTargetType {
  readonly syntaxType = "type-specifier";
  /** The name as written, possibly unqualified */
  readonly unresolvedName: string;
  readonly isArray: boolean;
  /** Undefined when the type isn't generic */
  readonly typeParameters?: readonly TypeSpecifier[];
  readonly comments: string;
  #resolution?: Resolution;

  constructor(
    opts: AnnotatableMetadata & {
      name: string;
      isArray?: boolean;
      typeParameters?: TypeSpecifier[];
      comments?: string;
    }
  ) {
    super(opts);
    this.unresolvedName = opts.name;
    this.isArray = opts.isArray ?? false;
    this.typeParameters = opts.typeParameters ? [...opts.typeParameters] : undefined;
    this.comments = opts.comments ?? "";
  }

  /** Canonical name once resolved, the written name before */
  get name(): string {
    return this.#resolution?.canonicalName ?? this.unresolvedName;
  }

  get isResolved(): boolean {
    return this.#resolution !== undefined;
  }

  get isGeneric(): boolean {
    return this.typeParameters !== undefined;
  }

  get isTypeParameter(): boolean {
    return this.#resolution?.isTypeParameter ?? false;
  }

  /** Undefined for built-ins, type parameters and unresolved specifiers */
  get definedType(): DefinedTypeHandle | undefined {
    return this.#resolution?.definedType;
  }

  supportedAnnotations(): readonly AnnotationKind[] {
    return ["nullable", "utf8InCpp", "unsupportedAppUsage", "hide", "javaPassthrough"];
  }

  /** Looks the name up in the table. A specifier can only be resolved once. */
  resolve(typenames: TypeNames, options: ResolveOptions = {}): boolean {
    if (this.#resolution) {
      throw new Error(`Type ${this.name} at ${this.location} is already resolved`);
    }

    const name = options.name ?? this.unresolvedName;
    if (options.typeParameters?.includes(name)) {
      this.#resolution = { canonicalName: name, isTypeParameter: true };
      return true;
    }

    const result = typenames.resolveTypename(name);
    if (!result.resolved) return false;
    this.#resolution = {
      canonicalName: result.canonicalName,
      definedType: result.definedType?.handle,
      isTypeParameter: false,
    };
    return true;
  }

  /** The same type without the array marker */
  arrayBase(): TypeSpecifier {
    if (!this.isArray) throw new Error(`${this.signature()} is not an array`);
    if (this.isGeneric) throw new Error(`Arrays of generic types are not supported`);

    const base = new TypeSpecifier({
      location: this.location,
      name: this.unresolvedName,
      annotations: [...this.annotations],
      comments: this.comments,
    });
    base.#resolution = this.#resolution;
    return base;
  }

  isHidden(): boolean {
    return /@hide\b/.test(this.comments);
  }

  signature(): string {
    const params = this.typeParameters
      ? `<${this.typeParameters.map((p) => p.signature()).join(",")}>`
      : "";
    return `${this.name}${params}${this.isArray ? "[]" : ""}`;
  }

  checkValid(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    let valid = this.checkAnnotations(diagnostics);
    if (this.typeParameters) {
      if (!this.checkGenerics(this.typeParameters, typenames, diagnostics)) valid = false;
      for (const param of this.typeParameters) {
        if (!param.checkValid(typenames, diagnostics)) valid = false;
      }
    }

    const name = this.name;
    const isStringList =
      name === "List" &&
      this.typeParameters?.length === 1 &&
      this.typeParameters.every((p) => p.name === "String");
    if (this.isUtf8InCpp() && name !== "String" && !isStringList) {
      this.report("TY0002", { kind: "utf8-in-cpp-misuse" }, diagnostics);
      valid = false;
    }

    if (name === "void" && (this.isArray || this.isNullable() || this.isUtf8InCpp())) {
      this.report("TY0003", { kind: "invalid-void" }, diagnostics);
      valid = false;
    }

    if (this.isArray) {
      if (this.definedType?.kind === "interface") {
        this.report("TY0004", { kind: "interface-array" }, diagnostics);
        valid = false;
      }
      if (name === "ParcelableHolder") {
        this.report("TY0004", { kind: "holder-array" }, diagnostics);
        valid = false;
      }
    }

    if (this.isNullable()) {
      if (!this.isArray && typenames.isPrimitiveTypename(name)) {
        this.report("TY0005", { kind: "nullable-primitive" }, diagnostics);
        valid = false;
      }
      if (!this.isArray && this.definedType?.kind === "enum") {
        this.report("TY0005", { kind: "nullable-enum" }, diagnostics);
        valid = false;
      }
      if (name === "ParcelableHolder") {
        this.report("TY0005", { kind: "nullable-holder" }, diagnostics);
        valid = false;
      }
    }

    return valid;
  }

  private checkGenerics(
    params: readonly TypeSpecifier[],
    typenames: TypeNames,
    diagnostics: DiagnosticsContext
  ): boolean {
    const name = this.name;
    const fail = (problem: DiagnosticParams<"TY0001">) => {
      this.report("TY0001", problem, diagnostics);
      return false;
    };

    if (
      (name === "List" || name === "Map") &&
      params.some(
        (p) => typenames.isPrimitiveTypename(p.name) || typenames.getEnumDeclaration(p)
      )
    ) {
      return fail({ kind: "primitive-type-parameter" });
    }

    if (name === "List") {
      if (params.length !== 1) {
        return fail({ kind: "list-arity", signature: this.signature() });
      }
      const [contained] = params;
      const unsupported = typenames.isBuiltinTypename(contained.name)
        ? !listElementBuiltins.has(contained.name)
        : typenames.getInterface(contained) !== undefined;
      if (unsupported) {
        return fail({ kind: "unsupported-list-element", element: contained.name });
      }
      return true;
    }

    if (name === "Map") {
      if (params.length !== 0 && params.length !== 2) {
        return fail({ kind: "map-arity", signature: this.signature() });
      }
      const [key] = params;
      if (key && key.name !== "String") {
        return fail({ kind: "map-key", keyType: key.name });
      }
      return true;
    }

    const declared = this.definedType
      ? typenames.definedType(this.definedType).typeParameters
      : [];
    if (!declared.length) return fail({ kind: "not-generic", name });
    if (params.length !== declared.length) {
      return fail({
        kind: "generic-arity",
        name,
        expected: declared.length,
        actual: params.length,
      });
    }
    return true;
  }

  /**
   * Rules that only some backends impose. These are kept apart from
   * `checkValid` because they are expected to shrink as backends catch up.
   */
  languageSpecificCheckValid(
    typenames: TypeNames,
    language: BackendLanguageName,
    diagnostics: DiagnosticsContext
  ): boolean {
    const name = this.name;
    const nativeOnly = language === "ndk" || language === "rust";
    let valid = true;
    const fail = (problem: DiagnosticParams<"TY0006">) => {
      this.report("TY0006", problem, diagnostics);
      valid = false;
    };

    if (nativeOnly && this.isArray && name === "IBinder") {
      fail({ kind: "binder-array", language });
    }

    if (language === "rust" && name === "ParcelableHolder") {
      fail({ kind: "holder-unsupported", language });
    }

    if (nativeOnly && this.isArray && this.isNullable()) {
      if (name === "ParcelFileDescriptor") {
        fail({ kind: "nullable-fd-array", language });
      }
      const kind = this.definedType?.kind;
      if (kind && parcelableKinds.has(kind)) {
        fail({ kind: "nullable-parcelable-array", language });
      }
    }

    if (nativeOnly && name === "FileDescriptor") {
      fail({ kind: "file-descriptor", language });
    }

    if (language === "ndk" && name === "List" && this.typeParameters?.length === 1) {
      const [contained] = this.typeParameters;
      if (typenames.getInterface(contained)) {
        fail({ kind: "ndk-list-element", element: contained.name, reason: "interface" });
      }
      if (contained.name === "IBinder") {
        fail({ kind: "ndk-list-element", element: contained.name, reason: "IBinder" });
      }
    }

    if (this.isArray && (name === "List" || name === "Map" || name === "CharSequence")) {
      fail({ kind: "unsupported-array", name });
    }

    if (language !== "java") {
      if (name === "List" && !this.isGeneric) fail({ kind: "raw-list" });
      if (name === "Map" || name === "CharSequence") {
        fail({ kind: "java-only-type", name });
      }
    }

    return valid;
  }

  private report<K extends "TY0001" | "TY0002" | "TY0003" | "TY0004" | "TY0005" | "TY0006">(
    code: K,
    params: DiagnosticParams<K>,
    diagnostics: DiagnosticsContext
  ) {
    diagnostics.report({ code, params, span: this.location });
  }

  toString() {
    const annotations = this.annotationsString();
    return annotations ? `${annotations} ${this.signature()}` : this.signature();
  }
}

/** Renders enum-typed constants as `Enum.MEMBER`, everything else as is */
export const constantValueDecorator: ConstantValueDecorator = (type, raw) => {
  if (type.isArray) return raw;
  const definedType = type.definedType;
  if (!definedType) return raw;
  if (definedType.kind !== "enum") {
    throw new Error(`Invalid type ${type.name} for constant "${raw}"`);
  }
  return `${type.name}.${raw.slice(raw.lastIndexOf(".") + 1)}`;
};
