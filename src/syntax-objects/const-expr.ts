import type { DiagnosticsContext } from "../diagnostics/index.js";
import type { ConstantDeclaration } from "./constant-declaration.js";
import type { Enumerator } from "./enum.js";
import { SourceLocation, Syntax, SyntaxMetadata } from "./syntax.js";
import type { DefinedTypeHandle, TypeSpecifier } from "./type-specifier.js";

export type ConstantValueKind =
  | "boolean"
  | "character"
  | "floating"
  | "integral"
  | "string"
  | "array"
  | "reference"
  | "unary"
  | "binary";

export type UnaryOperator = "+" | "-" | "~" | "!";

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "&"
  | "|"
  | "^"
  | "<<"
  | ">>"
  | "=="
  | "!="
  | "<"
  | ">"
  | "<="
  | ">="
  | "&&"
  | "||";

/** The parts of a type specifier a constant needs in order to render itself */
export interface ConstantTargetType {
  readonly name: string;
  readonly isArray: boolean;
  readonly definedType?: DefinedTypeHandle;
  signature(): string;
  arrayBase(): ConstantTargetType;
}

/** Renders a raw value string for a given type, e.g. to qualify enumerators */
export type ConstantValueDecorator = (
  type: ConstantTargetType,
  rawValue: string
) => string;

export type EvaluatedValue =
  | { type: "boolean"; value: boolean }
  | { type: "char"; text: string }
  | { type: "integral"; value: bigint }
  | { type: "floating"; value: number }
  | { type: "string"; value: string }
  | { type: "array"; elements: EvaluatedValue[] };

export type ReferenceTarget = ConstantDeclaration | Enumerator;

export interface ConstantValueVisitor {
  visit(value: ConstantValue): void;
}

const INT8 = { min: -128n, max: 127n };
const INT32 = { min: -2147483648n, max: 2147483647n };
const INT64 = { min: -9223372036854775808n, max: 9223372036854775807n };

const integralRanges: Record<string, { min: bigint; max: bigint } | undefined> = {
  byte: INT8,
  int: INT32,
  long: INT64,
};

const describe = (value: EvaluatedValue): string => {
  switch (value.type) {
    case "boolean":
      return "boolean";
    case "char":
      return "char";
    case "integral":
      return "integral";
    case "floating":
      return "floating point";
    case "string":
      return "string";
    case "array":
      return "array";
  }
};

const formatFloating = (value: number): string =>
  Number.isInteger(value) ? value.toFixed(1) : `${value}`;

const quote = (value: string): string =>
  `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

/**
 * An unevaluated constant expression. Evaluation happens on demand, so a tree
 * can be built before the references inside it are bound.
 */
export abstract class ConstantValue extends Syntax {
  readonly syntaxType = "constant-value";
  abstract readonly kind: ConstantValueKind;

  static boolean(location: SourceLocation, value: boolean): BooleanLiteral {
    return new BooleanLiteral({ location, value });
  }

  static character(location: SourceLocation, text: string): CharacterLiteral {
    return new CharacterLiteral({ location, text });
  }

  static floating(location: SourceLocation, text: string): FloatingLiteral {
    return new FloatingLiteral({ location, text });
  }

  static integral(location: SourceLocation, text: string): IntegralLiteral {
    return new IntegralLiteral({ location, text });
  }

  static string(location: SourceLocation, value: string): StringLiteral {
    return new StringLiteral({ location, value });
  }

  static array(location: SourceLocation, elements: ConstantValue[]): ArrayLiteral {
    return new ArrayLiteral({ location, elements });
  }

  static reference(location: SourceLocation, text: string): ConstantReference {
    return new ConstantReference({ location, text });
  }

  static unary(
    location: SourceLocation,
    operator: UnaryOperator,
    operand: ConstantValue
  ): UnaryExpression {
    return new UnaryExpression({ location, operator, operand });
  }

  static binary(
    location: SourceLocation,
    left: ConstantValue,
    operator: BinaryOperator,
    right: ConstantValue
  ): BinaryExpression {
    return new BinaryExpression({ location, left, operator, right });
  }

  /** The value a field of the given (unresolved) type takes when none is written */
  static defaultFor(type: TypeSpecifier): ConstantValue | undefined {
    if (type.isArray) return undefined;
    const location = type.location;
    switch (type.name) {
      case "boolean":
        return ConstantValue.boolean(location, false);
      case "char":
        return ConstantValue.character(location, "'\\0'");
      case "byte":
      case "int":
      case "long":
        return ConstantValue.integral(location, "0");
      case "float":
        return ConstantValue.floating(location, "0.0f");
      case "double":
        return ConstantValue.floating(location, "0.0");
      default:
        return undefined;
    }
  }

  /** Visits this value and every sub-expression, parents first */
  abstract accept(visitor: ConstantValueVisitor): void;

  protected abstract compute(diagnostics: DiagnosticsContext): EvaluatedValue | undefined;

  /** First result per diagnostics sink, so a failure is reported once per check */
  readonly #evaluated = new WeakMap<DiagnosticsContext, EvaluatedValue | undefined>();

  evaluate(diagnostics: DiagnosticsContext): EvaluatedValue | undefined {
    if (this.#evaluated.has(diagnostics)) return this.#evaluated.get(diagnostics);
    const value = this.compute(diagnostics);
    this.#evaluated.set(diagnostics, value);
    return value;
  }

  checkValid(diagnostics: DiagnosticsContext): boolean {
    return this.evaluate(diagnostics) !== undefined;
  }

  /**
   * Renders the value as the given type. An empty string means the value
   * can't be represented as that type; the reason has been reported.
   */
  valueString(
    type: ConstantTargetType,
    decorator: ConstantValueDecorator,
    diagnostics: DiagnosticsContext
  ): string {
    if (type.isArray) {
      if (!(this instanceof ArrayLiteral)) {
        this.reportMismatch(type, diagnostics);
        return "";
      }
      const base = type.arrayBase();
      const rendered: string[] = [];
      for (const element of this.elements) {
        const str = element.valueString(base, decorator, diagnostics);
        if (str === "") return "";
        rendered.push(str);
      }
      return decorator(type, `{${rendered.join(", ")}}`);
    }

    const definedType = type.definedType;
    if (definedType?.kind === "enum") {
      if (!(this instanceof ConstantReference)) {
        this.reportMismatch(type, diagnostics);
        return "";
      }
      return this.enumeratorString(type, decorator, diagnostics);
    }

    const value = this.evaluate(diagnostics);
    if (!value) return "";
    const rendered = renderAs(value, type.name);
    if (rendered === undefined) {
      this.reportMismatch(type, diagnostics);
      return "";
    }
    return decorator(type, rendered);
  }

  protected reportMismatch(type: ConstantTargetType, diagnostics: DiagnosticsContext) {
    diagnostics.report({
      code: "CV0001",
      params: { kind: "type-mismatch", value: this.toString(), type: type.signature() },
      span: this.location,
    });
  }
}

const renderAs = (value: EvaluatedValue, typeName: string): string | undefined => {
  switch (typeName) {
    case "boolean":
      return value.type === "boolean" ? `${value.value}` : undefined;
    case "char":
      return value.type === "char" ? value.text : undefined;
    case "byte":
    case "int":
    case "long": {
      const range = integralRanges[typeName];
      if (value.type !== "integral" || !range) return undefined;
      if (value.value < range.min || value.value > range.max) return undefined;
      return value.value.toString();
    }
    case "float":
    case "double": {
      const suffix = typeName === "float" ? "f" : "";
      if (value.type === "floating") return `${formatFloating(value.value)}${suffix}`;
      if (value.type === "integral") return `${value.value}.0${suffix}`;
      return undefined;
    }
    case "String":
    case "CharSequence":
      return value.type === "string" ? quote(value.value) : undefined;
    default:
      return undefined;
  }
};

export class BooleanLiteral extends ConstantValue {
  readonly kind = "boolean";
  readonly value: boolean;

  constructor(opts: SyntaxMetadata & { value: boolean }) {
    super(opts);
    this.value = opts.value;
  }

  accept(visitor: ConstantValueVisitor): void {
    visitor.visit(this);
  }

  protected compute(): EvaluatedValue {
    return { type: "boolean", value: this.value };
  }

  toString() {
    return `${this.value}`;
  }
}

export class CharacterLiteral extends ConstantValue {
  readonly kind = "character";
  /** Source text including the quotes, e.g. 'a' */
  readonly text: string;

  constructor(opts: SyntaxMetadata & { text: string }) {
    super(opts);
    this.text = opts.text;
  }

  accept(visitor: ConstantValueVisitor): void {
    visitor.visit(this);
  }

  protected compute(diagnostics: DiagnosticsContext): EvaluatedValue | undefined {
    if (!/^'(\\.|[^'\\])'$/.test(this.text)) {
      diagnostics.report({
        code: "CV0001",
        params: { kind: "invalid-literal", literal: this.text, reason: "not a character" },
        span: this.location,
      });
      return undefined;
    }
    return { type: "char", text: this.text };
  }

  toString() {
    return this.text;
  }
}

export class FloatingLiteral extends ConstantValue {
  readonly kind = "floating";
  readonly text: string;

  constructor(opts: SyntaxMetadata & { text: string }) {
    super(opts);
    this.text = opts.text;
  }

  accept(visitor: ConstantValueVisitor): void {
    visitor.visit(this);
  }

  protected compute(diagnostics: DiagnosticsContext): EvaluatedValue | undefined {
    const body = this.text.replace(/[fFdD]$/, "");
    const value = Number(body);
    if (body === "" || !/^[0-9.eE+-]+$/.test(body) || Number.isNaN(value)) {
      diagnostics.report({
        code: "CV0001",
        params: { kind: "invalid-literal", literal: this.text, reason: "not a number" },
        span: this.location,
      });
      return undefined;
    }
    return { type: "floating", value };
  }

  toString() {
    return this.text;
  }
}

export class IntegralLiteral extends ConstantValue {
  readonly kind = "integral";
  readonly text: string;

  constructor(opts: SyntaxMetadata & { text: string }) {
    super(opts);
    this.text = opts.text;
  }

  accept(visitor: ConstantValueVisitor): void {
    visitor.visit(this);
  }

  protected compute(diagnostics: DiagnosticsContext): EvaluatedValue | undefined {
    const isLong = /[lL]$/.test(this.text);
    const body = isLong ? this.text.slice(0, -1) : this.text;
    const isHex = /^0[xX][0-9a-fA-F]+$/.test(body);

    if (!isHex && !/^[0-9]+$/.test(body)) {
      return this.invalid("not an integer", diagnostics);
    }

    const raw = BigInt(body);
    if (isHex) {
      // Hex literals spell out a bit pattern of the narrowest fitting width
      if (!isLong && raw <= 0xffffffffn) {
        return { type: "integral", value: BigInt.asIntN(32, raw) };
      }
      if (raw <= 0xffffffffffffffffn) {
        return { type: "integral", value: BigInt.asIntN(64, raw) };
      }
      return this.invalid("out of range", diagnostics);
    }

    // The magnitude may exceed the maximum by one so that negation reaches the minimum
    if (raw > INT64.max + 1n) return this.invalid("out of range", diagnostics);
    return { type: "integral", value: raw };
  }

  private invalid(reason: string, diagnostics: DiagnosticsContext): undefined {
    diagnostics.report({
      code: "CV0001",
      params: { kind: "invalid-literal", literal: this.text, reason },
      span: this.location,
    });
    return undefined;
  }

  toString() {
    return this.text;
  }
}

export class StringLiteral extends ConstantValue {
  readonly kind = "string";
  /** Unquoted contents */
  readonly value: string;

  constructor(opts: SyntaxMetadata & { value: string }) {
    super(opts);
    this.value = opts.value;
  }

  accept(visitor: ConstantValueVisitor): void {
    visitor.visit(this);
  }

  protected compute(): EvaluatedValue {
    return { type: "string", value: this.value };
  }

  toString() {
    return quote(this.value);
  }
}

export class ArrayLiteral extends ConstantValue {
  readonly kind = "array";
  readonly elements: readonly ConstantValue[];

  constructor(opts: SyntaxMetadata & { elements: ConstantValue[] }) {
    super(opts);
    this.elements = [...opts.elements];
  }

  accept(visitor: ConstantValueVisitor): void {
    visitor.visit(this);
    this.elements.forEach((element) => element.accept(visitor));
  }

  protected compute(diagnostics: DiagnosticsContext): EvaluatedValue | undefined {
    const elements: EvaluatedValue[] = [];
    let valid = true;
    for (const element of this.elements) {
      const value = element.evaluate(diagnostics);
      if (!value) {
        valid = false;
        continue;
      }
      elements.push(value);
    }
    return valid ? { type: "array", elements } : undefined;
  }

  toString() {
    return `{${this.elements.map((e) => e.toString()).join(", ")}}`;
  }
}

/** A symbolic reference to a constant or an enumerator, `NAME` or `Type.NAME` */
export class ConstantReference extends ConstantValue {
  readonly kind = "reference";
  readonly text: string;
  #target?: ReferenceTarget;
  #evaluating = false;

  constructor(opts: SyntaxMetadata & { text: string }) {
    super(opts);
    this.text = opts.text;
  }

  /** The type part of a qualified reference, if any */
  get refType(): string | undefined {
    const lastDot = this.text.lastIndexOf(".");
    return lastDot === -1 ? undefined : this.text.slice(0, lastDot);
  }

  get fieldName(): string {
    return this.text.slice(this.text.lastIndexOf(".") + 1);
  }

  get target(): ReferenceTarget | undefined {
    return this.#target;
  }

  get isBound(): boolean {
    return this.#target !== undefined;
  }

  bind(target: ReferenceTarget) {
    if (this.#target && this.#target !== target) {
      throw new Error(`Reference ${this.text} is already bound`);
    }
    this.#target = target;
  }

  accept(visitor: ConstantValueVisitor): void {
    visitor.visit(this);
  }

  protected compute(diagnostics: DiagnosticsContext): EvaluatedValue | undefined {
    const target = this.#target;
    if (!target) {
      diagnostics.report({
        code: "CV0001",
        params: { kind: "unbound-reference", reference: this.text },
        span: this.location,
      });
      return undefined;
    }

    if (this.#evaluating) {
      diagnostics.report({
        code: "CV0001",
        params: { kind: "cyclic-reference", reference: this.text },
        span: this.location,
      });
      return undefined;
    }

    const value = target.value;
    if (!value) return undefined;

    this.#evaluating = true;
    try {
      return value.evaluate(diagnostics);
    } finally {
      this.#evaluating = false;
    }
  }

  /** Renders this reference as a member of the enum type it is assigned to */
  enumeratorString(
    type: ConstantTargetType,
    decorator: ConstantValueDecorator,
    diagnostics: DiagnosticsContext
  ): string {
    const target = this.#target;
    const enumName = type.definedType?.canonicalName ?? type.name;
    if (!target) {
      diagnostics.report({
        code: "CV0001",
        params: { kind: "unbound-reference", reference: this.text },
        span: this.location,
      });
      return "";
    }

    if (!target.isEnumerator() || target.enumCanonicalName !== enumName) {
      diagnostics.report({
        code: "RS0004",
        params: { kind: "not-an-enum-reference", reference: this.text, enumName },
        span: this.location,
      });
      return "";
    }

    return decorator(type, this.text);
  }

  toString() {
    return this.text;
  }
}

export class UnaryExpression extends ConstantValue {
  readonly kind = "unary";
  readonly operator: UnaryOperator;
  readonly operand: ConstantValue;

  constructor(
    opts: SyntaxMetadata & { operator: UnaryOperator; operand: ConstantValue }
  ) {
    super(opts);
    this.operator = opts.operator;
    this.operand = opts.operand;
  }

  accept(visitor: ConstantValueVisitor): void {
    visitor.visit(this);
    this.operand.accept(visitor);
  }

  protected compute(diagnostics: DiagnosticsContext): EvaluatedValue | undefined {
    const operand = this.operand.evaluate(diagnostics);
    if (!operand) return undefined;

    switch (this.operator) {
      case "+":
        if (operand.type === "integral" || operand.type === "floating") return operand;
        break;
      case "-":
        if (operand.type === "integral") {
          return { type: "integral", value: BigInt.asIntN(64, -operand.value) };
        }
        if (operand.type === "floating") return { type: "floating", value: -operand.value };
        break;
      case "~":
        if (operand.type === "integral") return { type: "integral", value: ~operand.value };
        break;
      case "!":
        if (operand.type === "boolean") return { type: "boolean", value: !operand.value };
        if (operand.type === "integral") return { type: "boolean", value: operand.value === 0n };
        break;
    }

    diagnostics.report({
      code: "CV0001",
      params: { kind: "invalid-operation", operator: this.operator, operands: describe(operand) },
      span: this.location,
    });
    return undefined;
  }

  toString() {
    return `${this.operator}${this.operand.toString()}`;
  }
}

export class BinaryExpression extends ConstantValue {
  readonly kind = "binary";
  readonly left: ConstantValue;
  readonly operator: BinaryOperator;
  readonly right: ConstantValue;

  constructor(
    opts: SyntaxMetadata & {
      left: ConstantValue;
      operator: BinaryOperator;
      right: ConstantValue;
    }
  ) {
    super(opts);
    this.left = opts.left;
    this.operator = opts.operator;
    this.right = opts.right;
  }

  accept(visitor: ConstantValueVisitor): void {
    visitor.visit(this);
    this.left.accept(visitor);
    this.right.accept(visitor);
  }

  protected compute(diagnostics: DiagnosticsContext): EvaluatedValue | undefined {
    const left = this.left.evaluate(diagnostics);
    const right = this.right.evaluate(diagnostics);
    if (!left || !right) return undefined;

    const result = this.apply(left, right, diagnostics);
    if (result === null) {
      diagnostics.report({
        code: "CV0001",
        params: {
          kind: "invalid-operation",
          operator: this.operator,
          operands: `${describe(left)} and ${describe(right)}`,
        },
        span: this.location,
      });
      return undefined;
    }
    return result;
  }

  /** null means the operator doesn't apply to the operand types */
  private apply(
    left: EvaluatedValue,
    right: EvaluatedValue,
    diagnostics: DiagnosticsContext
  ): EvaluatedValue | undefined | null {
    const op = this.operator;

    if (op === "&&" || op === "||") {
      const l = truthiness(left);
      const r = truthiness(right);
      if (l === undefined || r === undefined) return null;
      return { type: "boolean", value: op === "&&" ? l && r : l || r };
    }

    if (left.type === "string" && right.type === "string") {
      if (op === "+") return { type: "string", value: left.value + right.value };
      if (op === "==") return { type: "boolean", value: left.value === right.value };
      if (op === "!=") return { type: "boolean", value: left.value !== right.value };
      return null;
    }

    if (left.type === "boolean" && right.type === "boolean") {
      if (op === "==") return { type: "boolean", value: left.value === right.value };
      if (op === "!=") return { type: "boolean", value: left.value !== right.value };
      return null;
    }

    if (left.type === "integral" && right.type === "integral") {
      return this.applyIntegral(left.value, right.value, diagnostics);
    }

    const l = numeric(left);
    const r = numeric(right);
    if (l === undefined || r === undefined) return null;
    switch (op) {
      case "+":
        return { type: "floating", value: l + r };
      case "-":
        return { type: "floating", value: l - r };
      case "*":
        return { type: "floating", value: l * r };
      case "/":
        return { type: "floating", value: l / r };
      case "==":
        return { type: "boolean", value: l === r };
      case "!=":
        return { type: "boolean", value: l !== r };
      case "<":
        return { type: "boolean", value: l < r };
      case ">":
        return { type: "boolean", value: l > r };
      case "<=":
        return { type: "boolean", value: l <= r };
      case ">=":
        return { type: "boolean", value: l >= r };
      default:
        return null;
    }
  }

  private applyIntegral(
    l: bigint,
    r: bigint,
    diagnostics: DiagnosticsContext
  ): EvaluatedValue | undefined | null {
    const int = (value: bigint): EvaluatedValue => ({
      type: "integral",
      value: BigInt.asIntN(64, value),
    });
    const bool = (value: boolean): EvaluatedValue => ({ type: "boolean", value });

    switch (this.operator) {
      case "+":
        return int(l + r);
      case "-":
        return int(l - r);
      case "*":
        return int(l * r);
      case "/":
      case "%":
        if (r === 0n) {
          diagnostics.report({
            code: "CV0001",
            params: { kind: "division-by-zero", expression: this.toString() },
            span: this.location,
          });
          return undefined;
        }
        return int(this.operator === "/" ? l / r : l % r);
      case "&":
        return int(l & r);
      case "|":
        return int(l | r);
      case "^":
        return int(l ^ r);
      case "<<":
      case ">>":
        if (r < 0n || r >= 64n) {
          diagnostics.report({
            code: "CV0001",
            params: { kind: "shift-out-of-range", expression: this.toString(), amount: `${r}` },
            span: this.location,
          });
          return undefined;
        }
        return int(this.operator === "<<" ? l << r : l >> r);
      case "==":
        return bool(l === r);
      case "!=":
        return bool(l !== r);
      case "<":
        return bool(l < r);
      case ">":
        return bool(l > r);
      case "<=":
        return bool(l <= r);
      case ">=":
        return bool(l >= r);
      default:
        return null;
    }
  }

  toString() {
    return `${this.left.toString()} ${this.operator} ${this.right.toString()}`;
  }
}

const truthiness = (value: EvaluatedValue): boolean | undefined => {
  if (value.type === "boolean") return value.value;
  if (value.type === "integral") return value.value !== 0n;
  return undefined;
};

const numeric = (value: EvaluatedValue): number | undefined => {
  if (value.type === "floating") return value.value;
  if (value.type === "integral") return Number(value.value);
  return undefined;
};

/** Finds the first symbolic reference inside an expression */
export class ConstReferenceFinder implements ConstantValueVisitor {
  found?: ConstantReference;

  visit(value: ConstantValue): void {
    if (!this.found && value instanceof ConstantReference) this.found = value;
  }
}
