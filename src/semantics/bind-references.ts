import type { DiagnosticsContext } from "../diagnostics/index.js";
import type { CheckProfile } from "../perf.js";
import {
  ConstantReference,
  type ConstantValue,
  type ConstantValueVisitor,
  type ReferenceTarget,
} from "../syntax-objects/const-expr.js";
import type { DefinedType } from "../syntax-objects/defined-type.js";
import type { Document } from "../syntax-objects/document.js";
import type { TypeNames } from "./typenames.js";

class ReferenceCollector implements ConstantValueVisitor {
  readonly references: ConstantReference[] = [];

  visit(value: ConstantValue): void {
    if (value instanceof ConstantReference) this.references.push(value);
  }
}

/** Every constant expression written in a declaration, annotation parameters aside */
const constantExpressions = (owner: DefinedType): ConstantValue[] => {
  const values: ConstantValue[] = [];
  owner.fields.forEach((field) => {
    if (field.defaultUserSpecified && field.defaultValue) values.push(field.defaultValue);
  });
  owner.constants.forEach((constant) => values.push(constant.value));
  if (owner.isEnumDeclaration()) {
    owner.enumerators.forEach((enumerator) => {
      if (enumerator.value) values.push(enumerator.value);
    });
  }
  return values;
};

const findMember = (type: DefinedType, name: string): ReferenceTarget | undefined => {
  if (type.isEnumDeclaration()) {
    return type.enumerators.find((enumerator) => enumerator.name === name);
  }
  return type.constants.find((constant) => constant.name === name);
};

const findReferencedType = (
  refType: string,
  owner: DefinedType,
  document: Document,
  typenames: TypeNames,
  diagnostics: DiagnosticsContext
): DefinedType | undefined => {
  const name = document.resolveName(refType, diagnostics);
  if (name === undefined) return undefined;
  return (
    typenames.tryGetDefinedType(name) ??
    (owner.package ? typenames.tryGetDefinedType(`${owner.package}.${name}`) : undefined)
  );
};

/**
 * Binds each symbolic reference to the constant or enumerator it names.
 * `NAME` looks in the enclosing declaration. `Type.NAME` looks in `Type`.
 */
export const bindDocumentReferences = (
  document: Document,
  typenames: TypeNames,
  diagnostics: DiagnosticsContext,
  profile?: CheckProfile
): boolean => {
  let success = true;

  for (const owner of document.definedTypes) {
    const collector = new ReferenceCollector();
    constantExpressions(owner).forEach((value) => value.accept(collector));

    for (const reference of collector.references) {
      if (reference.isBound) continue;
      profile?.count("references-bound");

      const refType = reference.refType;
      const scope = refType
        ? findReferencedType(refType, owner, document, typenames, diagnostics)
        : owner;
      const target = scope && findMember(scope, reference.fieldName);
      if (target) {
        reference.bind(target);
        continue;
      }

      diagnostics.report({
        code: "RS0004",
        params: { kind: "unresolved-reference", reference: reference.text },
        span: reference.location,
      });
      success = false;
    }
  }

  return success;
};
