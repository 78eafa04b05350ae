import { SyntaxMetadata } from "./syntax.js";
import type { TypeSpecifier } from "./type-specifier.js";
import { VariableDeclaration } from "./variable.js";

export type Direction = "in" | "out" | "inout";

export class Argument extends VariableDeclaration {
  readonly syntaxType = "argument";
  readonly direction: Direction;
  /** Whether the direction was written out. Unwritten directions read as `in`. */
  readonly directionSpecified: boolean;

  constructor(
    opts: SyntaxMetadata & {
      type: TypeSpecifier;
      name: string;
      direction?: Direction;
    }
  ) {
    super({ location: opts.location, type: opts.type, name: opts.name });
    this.direction = opts.direction ?? "in";
    this.directionSpecified = opts.direction !== undefined;
  }

  isIn(): boolean {
    return this.direction === "in" || this.direction === "inout";
  }

  isOut(): boolean {
    return this.direction === "out" || this.direction === "inout";
  }

  /** The direction as written, or an empty string */
  directionSpecifier(): string {
    return this.directionSpecified ? this.direction : "";
  }

  toString() {
    const declaration = super.toString();
    return this.directionSpecified ? `${this.direction} ${declaration}` : declaration;
  }
}
