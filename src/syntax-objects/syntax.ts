import { formatSpan } from "../diagnostics/index.js";
import type {
  SourcePoint,
  SourceProvenance,
  SourceSpan,
} from "../diagnostics/types.js";
import type { Annotation } from "./annotation.js";
import type { Argument } from "./argument.js";
import type { ConstantDeclaration } from "./constant-declaration.js";
import type { ConstantValue } from "./const-expr.js";
import type { DefinedType } from "./defined-type.js";
import type { Document, Import } from "./document.js";
import type { EnumDeclaration, Enumerator } from "./enum.js";
import type { InterfaceDeclaration } from "./interface.js";
import type { Method } from "./method.js";
import type { TypeSpecifier } from "./type-specifier.js";
import type { VariableDeclaration } from "./variable.js";

export type SyntaxType =
  | "annotation"
  | "type-specifier"
  | "constant-value"
  | "variable"
  | "argument"
  | "constant-declaration"
  | "method"
  | "enumerator"
  | "defined-type"
  | "import"
  | "document";

export type SyntaxMetadata = {
  location: SourceLocation;
};

export abstract class Syntax {
  /** For tagged unions */
  abstract readonly syntaxType: SyntaxType;
  readonly syntaxId = getSyntaxId();
  readonly location: SourceLocation;

  constructor(metadata: SyntaxMetadata) {
    this.location = metadata.location;
  }

  /** "file:line" */
  printLine(): string {
    return `${this.location.file}:${this.location.begin.line}`;
  }

  /** "file:line:col:endLine:endCol" */
  printLocation(): string {
    const { file, begin, end } = this.location;
    return `${file}:${begin.line}:${begin.column}:${end.line}:${end.column}`;
  }

  abstract toString(): string;

  isAnnotation(): this is Annotation {
    return this.syntaxType === "annotation";
  }

  isTypeSpecifier(): this is TypeSpecifier {
    return this.syntaxType === "type-specifier";
  }

  isConstantValue(): this is ConstantValue {
    return this.syntaxType === "constant-value";
  }

  isVariable(): this is VariableDeclaration {
    return this.syntaxType === "variable" || this.syntaxType === "argument";
  }

  isArgument(): this is Argument {
    return this.syntaxType === "argument";
  }

  isConstantDeclaration(): this is ConstantDeclaration {
    return this.syntaxType === "constant-declaration";
  }

  isMethod(): this is Method {
    return this.syntaxType === "method";
  }

  isEnumerator(): this is Enumerator {
    return this.syntaxType === "enumerator";
  }

  isDefinedType(): this is DefinedType {
    return this.syntaxType === "defined-type";
  }

  isEnumDeclaration(): this is EnumDeclaration {
    return this.isDefinedType() && this.kind === "enum";
  }

  isInterface(): this is InterfaceDeclaration {
    return this.isDefinedType() && this.kind === "interface";
  }

  isImport(): this is Import {
    return this.syntaxType === "import";
  }

  isDocument(): this is Document {
    return this.syntaxType === "document";
  }
}

let currentSyntaxId = 0;
export const getSyntaxId = () => {
  const current = currentSyntaxId;
  currentSyntaxId += 1;
  return current;
};

export class SourceLocation implements SourceSpan {
  readonly file: string;
  readonly begin: Readonly<SourcePoint>;
  readonly end: Readonly<SourcePoint>;
  /** Whether the location points into a parsed file or was made up by the compiler */
  readonly source: SourceProvenance;

  constructor(opts: {
    file: string;
    begin: SourcePoint;
    end: SourcePoint;
    source?: SourceProvenance;
  }) {
    this.file = opts.file;
    this.begin = Object.freeze({ ...opts.begin });
    this.end = Object.freeze({ ...opts.end });
    this.source = opts.source ?? "parsed";
  }

  /** A location for nodes the compiler creates on its own */
  static synthesized(file = "<builtin>"): SourceLocation {
    return new SourceLocation({
      file,
      begin: { line: 0, column: 0 },
      end: { line: 0, column: 0 },
      source: "synthesized",
    });
  }

  get isKnown(): boolean {
    return this.source === "parsed";
  }

  toString() {
    return formatSpan(this);
  }

  toJSON() {
    return {
      file: this.file,
      begin: { ...this.begin },
      end: { ...this.end },
      source: this.source,
    };
  }
}
