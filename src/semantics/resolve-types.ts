import type { DiagnosticsContext } from "../diagnostics/index.js";
import type { CheckProfile } from "../perf.js";
import type { DefinedType } from "../syntax-objects/defined-type.js";
import type { Document } from "../syntax-objects/document.js";
import type { TypeSpecifier } from "../syntax-objects/type-specifier.js";
import type { TypeNames } from "./typenames.js";

type ResolveContext = {
  document: Document;
  typenames: TypeNames;
  diagnostics: DiagnosticsContext;
  owner: DefinedType;
  profile?: CheckProfile;
};

/**
 * Resolves every type specifier the document's declarations mention. Names
 * are qualified through the imports first, then looked up in the table, then
 * retried inside the declaring type's package. Already resolved specifiers
 * are left alone, so the pass can run again over a checked tree.
 */
export const resolveDocumentTypes = (
  document: Document,
  typenames: TypeNames,
  diagnostics: DiagnosticsContext,
  profile?: CheckProfile
): boolean => {
  let success = true;
  for (const owner of document.definedTypes) {
    const ctx = { document, typenames, diagnostics, owner, profile };
    for (const type of referencedTypes(owner)) {
      if (!resolveTypeSpecifier(type, ctx)) success = false;
    }
  }
  return success;
};

/** Type specifiers written in a declaration's members */
export const referencedTypes = (owner: DefinedType): TypeSpecifier[] => [
  ...owner.fields.map((field) => field.type),
  ...owner.constants.map((constant) => constant.type),
  ...owner.methods.flatMap((method) => [
    method.type,
    ...method.arguments.map((arg) => arg.type),
  ]),
];

const resolveTypeSpecifier = (type: TypeSpecifier, ctx: ResolveContext): boolean => {
  let success = true;
  for (const param of type.typeParameters ?? []) {
    if (!resolveTypeSpecifier(param, ctx)) success = false;
  }

  if (type.isResolved) return success;

  ctx.profile?.count("type-specifiers-resolved");
  const { document, typenames, diagnostics, owner } = ctx;
  const name = document.resolveName(type.unresolvedName, diagnostics);
  // Ambiguous imports are reported by the document
  if (name === undefined) return false;

  const typeParameters = owner.typeParameters;
  if (type.resolve(typenames, { name, typeParameters })) return success;

  if (owner.package && typenames.tryGetDefinedType(`${owner.package}.${name}`)) {
    if (type.resolve(typenames, { name: `${owner.package}.${name}` })) return success;
  }

  diagnostics.report({
    code: "RS0001",
    params: { kind: "unresolved-type", name: type.unresolvedName },
    span: type.location,
  });
  return false;
};
