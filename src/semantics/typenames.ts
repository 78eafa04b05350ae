import type { DefinedType } from "../syntax-objects/defined-type.js";
import type { EnumDeclaration } from "../syntax-objects/enum.js";
import type { InterfaceDeclaration } from "../syntax-objects/interface.js";
import type {
  DefinedTypeHandle,
  TypeSpecifier,
} from "../syntax-objects/type-specifier.js";

export type TypenameResolution =
  | { resolved: true; canonicalName: string; definedType?: DefinedType }
  | { resolved: false };

/** Whether a type has some capability and, when it doesn't, the reason */
export type Capability = { capable: boolean; aspect?: string };

const primitiveTypenames: ReadonlySet<string> = new Set([
  "void",
  "boolean",
  "byte",
  "char",
  "int",
  "long",
  "float",
  "double",
]);

const builtinTypenames: ReadonlySet<string> = new Set([
  ...primitiveTypenames,
  "String",
  "List",
  "Map",
  "IBinder",
  "FileDescriptor",
  "CharSequence",
  "ParcelFileDescriptor",
  "ParcelableHolder",
]);

/** Qualified spellings accepted for some built-ins */
const builtinAliases: ReadonlyMap<string, string> = new Map([
  ["java.util.List", "List"],
  ["java.util.Map", "Map"],
  ["android.os.ParcelFileDescriptor", "ParcelFileDescriptor"],
]);

const capable: Capability = { capable: true };
const incapable = (aspect: string): Capability => ({ capable: false, aspect });

/**
 * The table of every type a compilation can see: the built-ins plus each
 * registered declaration, keyed by canonical name.
 */
export class TypeNames {
  readonly #definedTypes = new Map<string, DefinedType>();

  /** False when another declaration already has the canonical name */
  addDefinedType(type: DefinedType): boolean {
    const existing = this.#definedTypes.get(type.canonicalName);
    if (existing) return existing === type;
    this.#definedTypes.set(type.canonicalName, type);
    return true;
  }

  definedTypes(): readonly DefinedType[] {
    return [...this.#definedTypes.values()];
  }

  tryGetDefinedType(name: string): DefinedType | undefined {
    return this.#definedTypes.get(name);
  }

  /** The declaration behind a resolved specifier's handle */
  definedType(handle: DefinedTypeHandle): DefinedType {
    const type = this.#definedTypes.get(handle.canonicalName);
    if (!type) throw new Error(`Unknown type ${handle.canonicalName}`);
    return type;
  }

  isPrimitiveTypename(name: string): boolean {
    return primitiveTypenames.has(name);
  }

  isBuiltinTypename(name: string): boolean {
    return builtinTypenames.has(name);
  }

  resolveTypename(name: string): TypenameResolution {
    const builtin = builtinAliases.get(name) ?? name;
    if (builtinTypenames.has(builtin)) return { resolved: true, canonicalName: builtin };

    const definedType = this.#definedTypes.get(name);
    if (!definedType) return { resolved: false };
    return { resolved: true, canonicalName: definedType.canonicalName, definedType };
  }

  getInterface(type: TypeSpecifier): InterfaceDeclaration | undefined {
    const declaration = this.lookup(type);
    return declaration && declaration.isInterface() ? declaration : undefined;
  }

  getEnumDeclaration(type: TypeSpecifier): EnumDeclaration | undefined {
    const declaration = this.lookup(type);
    return declaration && declaration.isEnumDeclaration() ? declaration : undefined;
  }

  /** Fields of a @JavaOnlyImmutable parcelable must themselves be immutable */
  canBeJavaOnlyImmutable(type: TypeSpecifier): Capability {
    if (type.isTypeParameter) return incapable("type parameter");

    if (type.typeParameters) {
      if (type.name !== "List" && type.name !== "Map") return incapable("generic type");
      for (const param of type.typeParameters) {
        const result = this.canBeJavaOnlyImmutable(param);
        if (!result.capable) return result;
      }
      return capable;
    }

    if (this.isBuiltinTypename(type.name)) return capable;

    const handle = type.definedType;
    if (!handle) return incapable(type.signature());
    const declaration = this.definedType(handle);
    if (declaration.isEnumDeclaration() || declaration.isJavaOnlyImmutable()) return capable;
    return incapable("not @JavaOnlyImmutable");
  }

  /** Fields of a @FixedSize parcelable must have a size known up front */
  canBeFixedSize(type: TypeSpecifier): Capability {
    if (type.isGeneric) return incapable("generic type");
    if (type.isArray) return incapable("array");
    if (type.isTypeParameter) return incapable("type parameter");

    const name = type.name;
    if (this.isPrimitiveTypename(name)) return capable;
    if (this.isBuiltinTypename(name)) return incapable(name);

    const handle = type.definedType;
    if (!handle) return incapable(type.signature());
    const declaration = this.definedType(handle);
    if (declaration.isEnumDeclaration() || declaration.isFixedSize()) return capable;
    return incapable("not @FixedSize");
  }

  /** Whether an argument of this type may be `out` or `inout` */
  canBeOutParameter(type: TypeSpecifier): Capability {
    if (type.isArray) return capable;

    const name = type.name;
    if (name === "List" || name === "Map" || name === "ParcelFileDescriptor") return capable;
    if (this.isPrimitiveTypename(name)) return incapable("primitive type");
    if (this.isBuiltinTypename(name)) return incapable(name);
    if (type.isTypeParameter) return incapable("type parameter");

    const handle = type.definedType;
    if (!handle) throw new Error(`Unresolved type ${name} at ${type.location}`);
    const declaration = this.definedType(handle);
    switch (declaration.kind) {
      case "enum":
        return incapable("enum");
      case "interface":
        return incapable("interface");
      case "parcelable":
      case "structured-parcelable":
      case "union":
        return declaration.isJavaOnlyImmutable() ? incapable("@JavaOnlyImmutable") : capable;
    }
  }

  private lookup(type: TypeSpecifier): DefinedType | undefined {
    if (type.isArray) return undefined;
    const handle = type.definedType;
    return handle ? this.#definedTypes.get(handle.canonicalName) : undefined;
  }
}
