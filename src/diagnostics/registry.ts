import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
  WarningKind,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  warning?: WarningKind;
  hints?: readonly DiagnosticHint[];
};

export type BackendLanguageName = "java" | "cpp" | "ndk" | "rust";

const languageLabels: Record<BackendLanguageName, string> = {
  java: "Java",
  cpp: "C++",
  ndk: "NDK",
  rust: "Rust",
};

type DiagnosticParamsMap = {
  RS0001: { kind: "unresolved-type"; name: string };
  RS0002: { kind: "ambiguous-import"; first: string; second: string };
  RS0003:
    | { kind: "duplicate-type"; name: string }
    | { kind: "previous-type"; name: string };
  RS0004:
    | { kind: "unresolved-reference"; reference: string }
    | { kind: "not-an-enum-reference"; reference: string; enumName: string };
  AN0001: { kind: "unrecognized-annotation"; name: string; validNames: readonly string[] };
  AN0002: {
    kind: "unsupported-parameter";
    parameter: string;
    annotation: string;
    supported: readonly string[];
  };
  AN0003: { kind: "reference-not-allowed"; reference: string };
  AN0004: { kind: "invalid-parameter-value"; parameter: string; annotation: string };
  AN0005: { kind: "missing-required-parameter"; parameter: string; annotation: string };
  AN0006: {
    kind: "annotation-not-supported-here";
    annotation: string;
    supported: readonly string[];
  };
  AN0007: { kind: "duplicate-annotation"; annotation: string; previous: string };
  TY0001:
    | { kind: "primitive-type-parameter" }
    | { kind: "list-arity"; signature: string }
    | { kind: "unsupported-list-element"; element: string }
    | { kind: "map-arity"; signature: string }
    | { kind: "map-key"; keyType: string }
    | { kind: "generic-arity"; name: string; expected: number; actual: number }
    | { kind: "not-generic"; name: string };
  TY0002: { kind: "utf8-in-cpp-misuse" };
  TY0003: { kind: "invalid-void" };
  TY0004: { kind: "interface-array" } | { kind: "holder-array" };
  TY0005:
    | { kind: "nullable-primitive" }
    | { kind: "nullable-enum" }
    | { kind: "nullable-holder" };
  TY0006:
    | { kind: "binder-array"; language: BackendLanguageName }
    | { kind: "holder-unsupported"; language: BackendLanguageName }
    | { kind: "nullable-fd-array"; language: BackendLanguageName }
    | { kind: "nullable-parcelable-array"; language: BackendLanguageName }
    | { kind: "file-descriptor"; language: BackendLanguageName }
    | { kind: "ndk-list-element"; element: string; reason: "interface" | "IBinder" }
    | { kind: "unsupported-array"; name: string }
    | { kind: "raw-list" }
    | { kind: "java-only-type"; name: string };
  CV0001:
    | { kind: "invalid-literal"; literal: string; reason: string }
    | { kind: "type-mismatch"; value: string; type: string }
    | { kind: "invalid-operation"; operator: string; operands: string }
    | { kind: "division-by-zero"; expression: string }
    | { kind: "shift-out-of-range"; expression: string; amount: string }
    | { kind: "cyclic-reference"; reference: string }
    | { kind: "unbound-reference"; reference: string };
  DC0001: { kind: "void-declaration"; name: string };
  DC0002: { kind: "unsupported-constant-type"; type: string };
  DC0003:
    | { kind: "duplicate-field"; typeName: string; field: string }
    | { kind: "duplicate-getter"; typeName: string; field: string };
  DC0004: { kind: "duplicate-constant"; name: string };
  DC0005: { kind: "non-immutable-field"; typeName: string; field: string; aspect: string };
  DC0006: { kind: "non-fixed-size-field"; typeName: string; field: string; aspect: string };
  DC0007: { kind: "duplicate-type-parameter"; typeName: string };
  DC0008: { kind: "missing-native-header"; typeName: string };
  DC0009:
    | { kind: "union-no-fields"; typeName: string }
    | { kind: "union-holder-member"; field: string }
    | { kind: "union-enum-default" }
    | { kind: "union-array-default" };
  DC0010:
    | { kind: "enum-has-members" }
    | { kind: "enum-missing-backing-type" }
    | { kind: "enum-invalid-backing-type"; type: string }
    | { kind: "enumerator-type-mismatch"; enumerator: string };
  IF0001: { kind: "holder-return" } | { kind: "holder-argument" };
  IF0002:
    | { kind: "oneway-return"; method: string }
    | { kind: "oneway-out"; method: string };
  IF0003: { kind: "duplicate-argument"; method: string; argument: string };
  IF0004: { kind: "direction-required"; signature: string };
  IF0005: {
    kind: "direction-not-allowed";
    argument: string;
    direction: string;
    aspect: string;
  };
  IF0006:
    | { kind: "keyword-argument"; argument: string }
    | { kind: "reserved-prefix-argument"; argument: string; prefix: string };
  IF0007:
    | { kind: "duplicate-method"; signature: string }
    | { kind: "previous-method"; signature: string };
  IF0008: { kind: "reserved-method"; signature: string };
  WN0001: { kind: "enum-zero"; enumerator: string; value: string };
  WN0002: { kind: "interface-name"; name: string };
  WN0003: { kind: "inout-parameter"; argument: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const listSupported = "List<T> supports parcelable/union, String, IBinder, and ParcelFileDescriptor.";

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  RS0001: {
    code: "RS0001",
    message: (params) => `Failed to resolve '${params.name}'`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0001"]>,
  RS0002: {
    code: "RS0002",
    message: (params) => `Ambiguous type: ${params.first} vs. ${params.second}`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0002"]>,
  RS0003: {
    code: "RS0003",
    message: (params) => {
      switch (params.kind) {
        case "duplicate-type":
          return `Redefinition of type '${params.name}'`;
        case "previous-type":
          return `'${params.name}' previously defined here`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0003"]>,
  RS0004: {
    code: "RS0004",
    message: (params) => {
      switch (params.kind) {
        case "unresolved-reference":
          return `Can't find ${params.reference}`;
        case "not-an-enum-reference":
          return `'${params.reference}' is not an enumerator of ${params.enumName}`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0004"]>,
  AN0001: {
    code: "AN0001",
    message: (params) =>
      `'${params.name}' is not a recognized annotation. It must be one of: ${params.validNames.join(" ")}.`,
    severity: "error",
    phase: "annotation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AN0001"]>,
  AN0002: {
    code: "AN0002",
    message: (params) =>
      `Parameter ${params.parameter} not supported for annotation ${params.annotation}. It must be one of: ${params.supported.join(" ")}`,
    severity: "error",
    phase: "annotation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AN0002"]>,
  AN0003: {
    code: "AN0003",
    message: (params) =>
      `Value must be a constant expression but contains reference to ${params.reference}.`,
    severity: "error",
    phase: "annotation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AN0003"]>,
  AN0004: {
    code: "AN0004",
    message: (params) =>
      `Invalid value for parameter ${params.parameter} on annotation ${params.annotation}.`,
    severity: "error",
    phase: "annotation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AN0004"]>,
  AN0005: {
    code: "AN0005",
    message: (params) => `Missing '${params.parameter}' on @${params.annotation}.`,
    severity: "error",
    phase: "annotation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AN0005"]>,
  AN0006: {
    code: "AN0006",
    message: (params) =>
      `'${params.annotation}' is not a supported annotation for this node. It must be one of: ${params.supported.join(", ")}`,
    severity: "error",
    phase: "annotation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AN0006"]>,
  AN0007: {
    code: "AN0007",
    message: (params) =>
      `'${params.annotation}' is repeated, but not allowed. Previous location: ${params.previous}`,
    severity: "error",
    phase: "annotation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AN0007"]>,
  TY0001: {
    code: "TY0001",
    message: (params) => {
      switch (params.kind) {
        case "primitive-type-parameter":
          return "A generic type cannot have any primitive type parameters.";
        case "list-arity":
          return `List can only have one type parameter, but got: '${params.signature}'`;
        case "unsupported-list-element":
          return `List<${params.element}> is not supported. ${listSupported}`;
        case "map-arity":
          return `Map must have 0 or 2 type parameters, but got '${params.signature}'`;
        case "map-key":
          return `The type of key in map must be String, but it is '${params.keyType}'`;
        case "generic-arity":
          return `${params.name} must have ${params.expected} type parameters, but got ${params.actual}`;
        case "not-generic":
          return `${params.name} is not a generic type.`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0001"]>,
  TY0002: {
    code: "TY0002",
    message: () => "@utf8InCpp can only be used on String, String[], and List<String>.",
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0002"]>,
  TY0003: {
    code: "TY0003",
    message: () => "void type cannot be an array or nullable or utf8 string",
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0003"]>,
  TY0004: {
    code: "TY0004",
    message: (params) => {
      switch (params.kind) {
        case "interface-array":
          return "Binder type cannot be an array";
        case "holder-array":
          return "Arrays of ParcelableHolder are not supported.";
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0004"]>,
  TY0005: {
    code: "TY0005",
    message: (params) => {
      switch (params.kind) {
        case "nullable-primitive":
          return "Primitive type cannot get nullable annotation";
        case "nullable-enum":
          return "Enum type cannot get nullable annotation";
        case "nullable-holder":
          return "ParcelableHolder cannot be nullable.";
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0005"]>,
  TY0006: {
    code: "TY0006",
    message: (params) => {
      switch (params.kind) {
        case "binder-array":
          return `The ${languageLabels[params.language]} backend does not support array of IBinder`;
        case "holder-unsupported":
          return `The ${languageLabels[params.language]} backend does not support ParcelableHolder yet.`;
        case "nullable-fd-array":
          return `The ${languageLabels[params.language]} backend does not support nullable array of ParcelFileDescriptor`;
        case "nullable-parcelable-array":
          return `The ${languageLabels[params.language]} backend does not support nullable array of parcelable`;
        case "file-descriptor":
          return `FileDescriptor isn't supported by the ${languageLabels[params.language]} backend.`;
        case "ndk-list-element":
          return `List<${params.element}> is not supported. List in NDK doesn't support ${params.reason}.`;
        case "unsupported-array":
          return `${params.name}[] is not supported.`;
        case "raw-list":
          return "Currently, only the Java backend supports non-generic List.";
        case "java-only-type":
          return `Currently, only Java backend supports ${params.name}.`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0006"]>,
  CV0001: {
    code: "CV0001",
    message: (params) => {
      switch (params.kind) {
        case "invalid-literal":
          return `Invalid literal ${params.literal}: ${params.reason}`;
        case "type-mismatch":
          return `Invalid type specifier for ${params.value}: ${params.type}`;
        case "invalid-operation":
          return `Cannot apply '${params.operator}' to ${params.operands}`;
        case "division-by-zero":
          return `Cannot divide by 0: ${params.expression}`;
        case "shift-out-of-range":
          return `Shift amount ${params.amount} is out of range in ${params.expression}`;
        case "cyclic-reference":
          return `Found a cycle when evaluating ${params.reference}`;
        case "unbound-reference":
          return `Reference ${params.reference} was never resolved`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "constant",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CV0001"]>,
  DC0001: {
    code: "DC0001",
    message: (params) =>
      `Declaration ${params.name} is void, but declarations cannot be of void type.`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0001"]>,
  DC0002: {
    code: "DC0002",
    message: (params) => `Constant of type ${params.type} is not supported.`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0002"]>,
  DC0003: {
    code: "DC0003",
    message: (params) => {
      switch (params.kind) {
        case "duplicate-field":
          return `'${params.typeName}' has duplicate field name '${params.field}'`;
        case "duplicate-getter":
          return `'${params.typeName}' has duplicate field name '${params.field}' after capitalizing the first letter`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0003"]>,
  DC0004: {
    code: "DC0004",
    message: (params) => `Found duplicate constant name '${params.name}'`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0004"]>,
  DC0005: {
    code: "DC0005",
    message: (params) =>
      `The @JavaOnlyImmutable '${params.typeName}' has a non-immutable field named '${params.field}' (${params.aspect}).`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0005"]>,
  DC0006: {
    code: "DC0006",
    message: (params) =>
      `The @FixedSize parcelable '${params.typeName}' has a non-fixed size field named ${params.field} (${params.aspect}).`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0006"]>,
  DC0007: {
    code: "DC0007",
    message: () => "Every type parameter should be unique.",
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0007"]>,
  DC0008: {
    code: "DC0008",
    message: () => "Unstructured parcelable must have C++ header defined.",
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0008"]>,
  DC0009: {
    code: "DC0009",
    message: (params) => {
      switch (params.kind) {
        case "union-no-fields":
          return `The union '${params.typeName}' has no fields.`;
        case "union-holder-member":
          return `A union can't have a member of ParcelableHolder '${params.field}'`;
        case "union-enum-default":
          return "The union's first member should have a useful default value. Enum types can be initialized with a reference. (e.g. ... = MyEnum.FOO;)";
        case "union-array-default":
          return "The union's first member should have a useful default value. Arrays can be initialized with values(e.g. ... = { values... };) or marked as @nullable.";
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0009"]>,
  DC0010: {
    code: "DC0010",
    message: (params) => {
      switch (params.kind) {
        case "enum-has-members":
          return "Enum doesn't support fields/constants/methods.";
        case "enum-missing-backing-type":
          return "Enum declaration missing backing type.";
        case "enum-invalid-backing-type":
          return `Invalid backing type: ${params.type}`;
        case "enumerator-type-mismatch":
          return `Enumerator type differs from enum backing type: ${params.enumerator}`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0010"]>,
  IF0001: {
    code: "IF0001",
    message: (params) =>
      params.kind === "holder-return"
        ? "ParcelableHolder cannot be a return type"
        : "ParcelableHolder cannot be an argument type",
    severity: "error",
    phase: "interface",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IF0001"]>,
  IF0002: {
    code: "IF0002",
    message: (params) =>
      params.kind === "oneway-return"
        ? `oneway method '${params.method}' cannot return a value`
        : `oneway method '${params.method}' cannot have out parameters`,
    severity: "error",
    phase: "interface",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IF0002"]>,
  IF0003: {
    code: "IF0003",
    message: (params) =>
      `method '${params.method}' has duplicate argument name '${params.argument}'`,
    severity: "error",
    phase: "interface",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IF0003"]>,
  IF0004: {
    code: "IF0004",
    message: (params) =>
      `'${params.signature}' can be an out type, so you must declare it as in, out, or inout.`,
    severity: "error",
    phase: "interface",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IF0004"]>,
  IF0005: {
    code: "IF0005",
    message: (params) =>
      `'${params.argument}' can't be an ${params.direction} parameter because ${params.aspect} can only be an in parameter.`,
    severity: "error",
    phase: "interface",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IF0005"]>,
  IF0006: {
    code: "IF0006",
    message: (params) => {
      switch (params.kind) {
        case "keyword-argument":
          return `Argument name '${params.argument}' is a Java or aidl keyword`;
        case "reserved-prefix-argument":
          return `Argument name cannot begin with '${params.prefix}'`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "interface",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IF0006"]>,
  IF0007: {
    code: "IF0007",
    message: (params) =>
      params.kind === "duplicate-method"
        ? `attempt to redefine method ${params.signature}`
        : `${params.signature} previously defined here`,
    severity: "error",
    phase: "interface",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IF0007"]>,
  IF0008: {
    code: "IF0008",
    message: (params) => `method ${params.signature} is reserved for internal use.`,
    severity: "error",
    phase: "interface",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IF0008"]>,
  WN0001: {
    code: "WN0001",
    message: (params) =>
      `The first enumerator '${params.enumerator}' should be 0, but it is ${params.value}.`,
    severity: "warning",
    phase: "declaration",
    warning: "enum-zero",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["WN0001"]>,
  WN0002: {
    code: "WN0002",
    message: (params) => `Interface names should start with I: ${params.name}`,
    severity: "warning",
    phase: "interface",
    warning: "interface-name",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["WN0002"]>,
  WN0003: {
    code: "WN0003",
    message: (params) =>
      `${params.argument} is 'inout'. Avoid inout parameters.`,
    severity: "warning",
    phase: "interface",
    warning: "inout-parameter",
    hints: [
      {
        message:
          "Although inout parameters are 'in', they look like 'out' parameters to clients. Prefer separate in and out arguments.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["WN0003"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

const exhaustive = (_value: never): never => _value;
