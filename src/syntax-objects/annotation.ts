import { DiagnosticsContext } from "../diagnostics/index.js";
import {
  ConstReferenceFinder,
  type ConstantTargetType,
  type ConstantValue,
  type ConstantValueDecorator,
} from "./const-expr.js";
import { SourceLocation, Syntax, SyntaxMetadata } from "./syntax.js";

export type AnnotationKind =
  | "nullable"
  | "utf8InCpp"
  | "sensitiveData"
  | "vintfStability"
  | "unsupportedAppUsage"
  | "javaStableParcelable"
  | "hide"
  | "backing"
  | "javaPassthrough"
  | "javaDerive"
  | "javaOnlyImmutable"
  | "fixedSize"
  | "descriptor"
  | "rustDerive";

export type AnnotationParamType = "String" | "int" | "long" | "boolean";

export interface AnnotationSchema {
  readonly kind: AnnotationKind;
  /** As written in source, e.g. `JavaPassthrough` */
  readonly name: string;
  readonly parameters: ReadonlyMap<string, AnnotationParamType>;
  readonly repeatable: boolean;
  readonly requiredParameters: readonly string[];
}

const schema = (
  kind: AnnotationKind,
  name: string,
  opts: {
    parameters?: Record<string, AnnotationParamType>;
    repeatable?: boolean;
    required?: string[];
  } = {}
): AnnotationSchema =>
  Object.freeze({
    kind,
    name,
    parameters: new Map(Object.entries(opts.parameters ?? {})),
    repeatable: opts.repeatable ?? false,
    requiredParameters: Object.freeze([...(opts.required ?? [])]),
  });

export const annotationSchemas: readonly AnnotationSchema[] = Object.freeze([
  schema("nullable", "nullable"),
  schema("utf8InCpp", "utf8InCpp"),
  schema("sensitiveData", "SensitiveData"),
  schema("vintfStability", "VintfStability"),
  schema("unsupportedAppUsage", "UnsupportedAppUsage", {
    parameters: {
      expectedSignature: "String",
      implicitMember: "String",
      maxTargetSdk: "int",
      publicAlternatives: "String",
      trackingBug: "long",
    },
  }),
  schema("javaStableParcelable", "JavaOnlyStableParcelable"),
  schema("hide", "Hide"),
  schema("backing", "Backing", {
    parameters: { type: "String" },
    required: ["type"],
  }),
  schema("javaPassthrough", "JavaPassthrough", {
    parameters: { annotation: "String" },
    repeatable: true,
    required: ["annotation"],
  }),
  schema("javaDerive", "JavaDerive", {
    parameters: { toString: "boolean", equals: "boolean" },
  }),
  schema("javaOnlyImmutable", "JavaOnlyImmutable"),
  schema("fixedSize", "FixedSize"),
  schema("descriptor", "Descriptor", {
    parameters: { value: "String" },
    required: ["value"],
  }),
  schema("rustDerive", "RustDerive", {
    parameters: {
      Copy: "boolean",
      Clone: "boolean",
      PartialOrd: "boolean",
      Ord: "boolean",
      PartialEq: "boolean",
      Eq: "boolean",
      Hash: "boolean",
    },
  }),
]);

export const annotationName = (kind: AnnotationKind): string => {
  const found = annotationSchemas.find((s) => s.kind === kind);
  if (!found) throw new Error(`Unrecognized annotation kind: ${kind}`);
  return found.name;
};

const paramTargets = new Map<AnnotationParamType, ConstantTargetType>();
const paramTarget = (name: AnnotationParamType): ConstantTargetType => {
  const cached = paramTargets.get(name);
  if (cached) return cached;
  const target: ConstantTargetType = {
    name,
    isArray: false,
    definedType: undefined,
    signature: () => name,
    arrayBase: () => {
      throw new Error(`${name} is not an array`);
    },
  };
  paramTargets.set(name, target);
  return target;
};

const identity: ConstantValueDecorator = (_type, raw) => raw;

type ParamValueKind = "string" | "boolean" | "integral";

export class Annotation extends Syntax {
  readonly syntaxType = "annotation";
  readonly schema: AnnotationSchema;
  /** Parameter values keyed by name, in name order */
  readonly params: ReadonlyMap<string, ConstantValue>;

  constructor(
    opts: SyntaxMetadata & {
      schema: AnnotationSchema;
      params?: Record<string, ConstantValue>;
    }
  ) {
    super(opts);
    this.schema = opts.schema;
    const entries = Object.entries(opts.params ?? {}).sort(([a], [b]) =>
      a < b ? -1 : a > b ? 1 : 0
    );
    this.params = new Map(entries);
  }

  /** Binds a written annotation to its schema. Values are not evaluated yet. */
  static parse(
    location: SourceLocation,
    name: string,
    params: Record<string, ConstantValue> | undefined,
    diagnostics: DiagnosticsContext
  ): Annotation | undefined {
    const found = annotationSchemas.find((s) => s.name === name);
    if (!found) {
      diagnostics.report({
        code: "AN0001",
        params: {
          kind: "unrecognized-annotation",
          name,
          validNames: annotationSchemas.map((s) => s.name),
        },
        span: location,
      });
      return undefined;
    }
    return new Annotation({ location, schema: found, params });
  }

  get kind(): AnnotationKind {
    return this.schema.kind;
  }

  get name(): string {
    return this.schema.name;
  }

  get repeatable(): boolean {
    return this.schema.repeatable;
  }

  checkValid(diagnostics: DiagnosticsContext): boolean {
    let valid = true;

    for (const [paramName, value] of this.params) {
      const paramType = this.schema.parameters.get(paramName);
      if (!paramType) {
        this.reportUnsupported(paramName, diagnostics);
        valid = false;
        continue;
      }

      const finder = new ConstReferenceFinder();
      value.accept(finder);
      if (finder.found) {
        diagnostics.report({
          code: "AN0003",
          params: { kind: "reference-not-allowed", reference: finder.found.fieldName },
          span: finder.found.location,
        });
        valid = false;
        continue;
      }

      if (
        !value.checkValid(diagnostics) ||
        value.valueString(paramTarget(paramType), identity, diagnostics) === ""
      ) {
        this.reportInvalidValue(paramName, diagnostics);
        valid = false;
      }
    }

    for (const required of this.schema.requiredParameters) {
      if (this.params.has(required)) continue;
      diagnostics.report({
        code: "AN0005",
        params: {
          kind: "missing-required-parameter",
          parameter: required,
          annotation: this.name,
        },
        span: this.location,
      });
      valid = false;
    }

    return valid;
  }

  /**
   * Renders every usable parameter for display. Unsupported or invalid
   * parameters are reported and left out.
   */
  annotationParams(
    decorator: ConstantValueDecorator,
    diagnostics: DiagnosticsContext
  ): Map<string, string> {
    const rendered = new Map<string, string>();
    for (const [paramName, value] of this.params) {
      const paramType = this.schema.parameters.get(paramName);
      if (!paramType) {
        this.reportUnsupported(paramName, diagnostics);
        continue;
      }

      if (!value.checkValid(diagnostics)) {
        this.reportInvalidValue(paramName, diagnostics);
        continue;
      }

      const str = value.valueString(paramTarget(paramType), decorator, diagnostics);
      if (str === "") {
        this.reportInvalidValue(paramName, diagnostics);
        continue;
      }
      rendered.set(paramName, str);
    }
    return rendered;
  }

  /** Evaluates a parameter to a plain value. Undefined when absent or of another kind. */
  paramValue(name: string, kind: "string", diagnostics?: DiagnosticsContext): string | undefined;
  paramValue(name: string, kind: "boolean", diagnostics?: DiagnosticsContext): boolean | undefined;
  paramValue(name: string, kind: "integral", diagnostics?: DiagnosticsContext): bigint | undefined;
  paramValue(
    name: string,
    kind: ParamValueKind,
    diagnostics: DiagnosticsContext = new DiagnosticsContext()
  ): string | boolean | bigint | undefined {
    const value = this.params.get(name)?.evaluate(diagnostics);
    if (!value) return undefined;
    if (kind === "string" && value.type === "string") return value.value;
    if (kind === "boolean" && value.type === "boolean") return value.value;
    if (kind === "integral" && value.type === "integral") return value.value;
    return undefined;
  }

  private reportUnsupported(paramName: string, diagnostics: DiagnosticsContext) {
    diagnostics.report({
      code: "AN0002",
      params: {
        kind: "unsupported-parameter",
        parameter: paramName,
        annotation: this.name,
        supported: [...this.schema.parameters.keys()].sort(),
      },
      span: this.location,
    });
  }

  private reportInvalidValue(paramName: string, diagnostics: DiagnosticsContext) {
    diagnostics.report({
      code: "AN0004",
      params: { kind: "invalid-parameter-value", parameter: paramName, annotation: this.name },
      span: this.location,
    });
  }

  toString() {
    if (!this.params.size) return `@${this.name}`;
    const params = [...this.params].map(([name, value]) => `${name}=${value.toString()}`);
    return `@${this.name}(${params.join(", ")})`;
  }
}
