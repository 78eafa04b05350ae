import type { Argument } from "./argument.js";
import { Syntax, SyntaxMetadata } from "./syntax.js";
import type { TypeSpecifier } from "./type-specifier.js";

export class Method extends Syntax {
  readonly syntaxType = "method";
  /** Return type */
  readonly type: TypeSpecifier;
  readonly name: string;
  readonly arguments: readonly Argument[];
  readonly inArguments: readonly Argument[];
  readonly outArguments: readonly Argument[];
  /** Explicit transaction id. Absent ids are assigned by declaration order downstream. */
  readonly id?: number;
  readonly comments: string;
  #oneway: boolean;

  constructor(
    opts: SyntaxMetadata & {
      type: TypeSpecifier;
      name: string;
      arguments?: Argument[];
      oneway?: boolean;
      id?: number;
      comments?: string;
    }
  ) {
    super(opts);
    this.type = opts.type;
    this.name = opts.name;
    this.arguments = [...(opts.arguments ?? [])];
    this.inArguments = this.arguments.filter((arg) => arg.isIn());
    this.outArguments = this.arguments.filter((arg) => arg.isOut());
    this.id = opts.id;
    this.comments = opts.comments ?? "";
    this.#oneway = opts.oneway ?? false;
  }

  get oneway(): boolean {
    return this.#oneway;
  }

  get hasId(): boolean {
    return this.id !== undefined;
  }

  /** A oneway interface makes every one of its methods oneway */
  applyInterfaceOneway(oneway: boolean) {
    this.#oneway = this.#oneway || oneway;
  }

  isHidden(): boolean {
    return /@hide\b/.test(this.comments);
  }

  /** Name and argument types, e.g. `foo(int, String)` */
  signature(): string {
    const args = this.arguments.map((arg) => arg.type.signature());
    return `${this.name}(${args.join(", ")})`;
  }

  toString() {
    const args = this.arguments.map((arg) => arg.toString()).join(", ");
    const id = this.id !== undefined ? ` = ${this.id}` : "";
    return `${this.#oneway ? "oneway " : ""}${this.type.toString()} ${this.name}(${args})${id}`;
  }
}
