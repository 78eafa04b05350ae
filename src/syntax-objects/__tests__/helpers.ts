import { checkDocument } from "../../semantics/check-document.js";
import { TypeNames } from "../../semantics/typenames.js";
import type { CheckerConfig } from "../../config/types.js";
import { DiagnosticsContext } from "../../diagnostics/index.js";
import { Annotation } from "../annotation.js";
import { ConstantValue } from "../const-expr.js";
import type { DefinedType } from "../defined-type.js";
import { Document, Import } from "../document.js";
import { SourceLocation } from "../syntax.js";
import { TypeSpecifier } from "../type-specifier.js";
import { VariableDeclaration } from "../variable.js";

export const loc = (line = 1, column = 1, file = "test.aidl") =>
  new SourceLocation({
    file,
    begin: { line, column },
    end: { line, column: column + 1 },
  });

export const annotation = (
  name: string,
  params?: Record<string, ConstantValue>,
  location = loc()
): Annotation => {
  const parsed = Annotation.parse(location, name, params, new DiagnosticsContext());
  if (!parsed) throw new Error(`Unknown annotation ${name}`);
  return parsed;
};

export const typeSpec = (
  name: string,
  opts: {
    isArray?: boolean;
    typeParameters?: TypeSpecifier[];
    annotations?: Annotation[];
    location?: SourceLocation;
  } = {}
): TypeSpecifier =>
  new TypeSpecifier({
    location: opts.location ?? loc(),
    name,
    isArray: opts.isArray,
    typeParameters: opts.typeParameters,
    annotations: opts.annotations,
  });

/** A type specifier resolved against the built-ins and the given table */
export const resolvedType = (
  name: string,
  opts: Parameters<typeof typeSpec>[1] = {},
  typenames = new TypeNames()
): TypeSpecifier => {
  const type = typeSpec(name, opts);
  opts.typeParameters?.forEach((param) => {
    if (!param.isResolved) param.resolve(typenames);
  });
  if (!type.resolve(typenames)) throw new Error(`Can't resolve ${name}`);
  return type;
};

export const int = (text: string, location = loc()) => ConstantValue.integral(location, text);
export const str = (value: string, location = loc()) => ConstantValue.string(location, value);
export const bool = (value: boolean, location = loc()) => ConstantValue.boolean(location, value);
export const ref = (text: string, location = loc()) => ConstantValue.reference(location, text);

export const field = (
  type: TypeSpecifier,
  name: string,
  defaultValue?: ConstantValue,
  location = loc()
) => new VariableDeclaration({ location, type, name, defaultValue });

export const importOf = (neededClass: string, location = loc()) =>
  new Import({ location, neededClass });

/** Runs the whole checker over one document */
export const check = (
  definedTypes: DefinedType[],
  opts: { config?: CheckerConfig; imports?: Import[]; typenames?: TypeNames } = {}
) => {
  const document = new Document({ location: loc(), definedTypes, imports: opts.imports });
  const typenames = opts.typenames ?? new TypeNames();
  const result = checkDocument(document, typenames, opts.config);
  return {
    ...result,
    codes: result.diagnostics.map((d) => d.code),
    messages: result.diagnostics.map((d) => d.message),
    document,
    typenames,
  };
};
