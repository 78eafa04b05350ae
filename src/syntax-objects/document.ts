import type { DiagnosticsContext } from "../diagnostics/index.js";
import type { BackendLanguageName } from "../diagnostics/registry.js";
import type { TypeNames } from "../semantics/typenames.js";
import type { DefinedType } from "./defined-type.js";
import { CodeWriter } from "./lib/code-writer.js";
import { Syntax, SyntaxMetadata } from "./syntax.js";

export class Import extends Syntax {
  readonly syntaxType = "import";
  /** Fully qualified name of the imported type */
  readonly neededClass: string;

  constructor(opts: SyntaxMetadata & { neededClass: string }) {
    super(opts);
    this.neededClass = opts.neededClass;
  }

  /** Last segment of the qualified name */
  get simpleName(): string {
    return this.neededClass.slice(this.neededClass.lastIndexOf(".") + 1);
  }

  toString() {
    return `import ${this.neededClass};`;
  }
}

/** One compilation unit: its imports and the types it defines */
export class Document extends Syntax {
  readonly syntaxType = "document";
  readonly definedTypes: readonly DefinedType[];
  readonly imports: readonly Import[];
  /** Simple names already reported as ambiguous, per diagnostics sink */
  readonly #reportedAmbiguities = new WeakMap<DiagnosticsContext, Set<string>>();

  constructor(
    opts: SyntaxMetadata & { definedTypes?: DefinedType[]; imports?: Import[] }
  ) {
    super(opts);
    this.definedTypes = [...(opts.definedTypes ?? [])];
    this.imports = [...(opts.imports ?? [])];
  }

  /**
   * Qualifies a name through the imports. `Foo` and `Foo.Inner` both match
   * `import p.Foo`. Names no import matches come back unchanged. Undefined
   * means two imports claim the same simple name.
   */
  resolveName(unresolved: string, diagnostics: DiagnosticsContext): string | undefined {
    const firstDot = unresolved.indexOf(".");
    const simpleName = firstDot === -1 ? unresolved : unresolved.slice(0, firstDot);
    const rest = firstDot === -1 ? "" : unresolved.slice(firstDot);

    let match: Import | undefined;
    for (const imported of this.imports) {
      if (imported.simpleName !== simpleName) continue;
      if (match && match.neededClass !== imported.neededClass) {
        const reported = this.#reportedAmbiguities.get(diagnostics) ?? new Set<string>();
        this.#reportedAmbiguities.set(diagnostics, reported);
        if (!reported.has(simpleName)) {
          reported.add(simpleName);
          diagnostics.report({
            code: "RS0002",
            params: {
              kind: "ambiguous-import",
              first: match.neededClass,
              second: imported.neededClass,
            },
            span: imported.location,
          });
        }
        return undefined;
      }
      match = imported;
    }

    return match ? `${match.neededClass}${rest}` : unresolved;
  }

  /** Validates every type. One failing type doesn't stop the others. */
  checkValid(typenames: TypeNames, diagnostics: DiagnosticsContext): boolean {
    let valid = true;
    for (const type of this.definedTypes) {
      if (!type.checkValid(typenames, diagnostics)) valid = false;
    }
    return valid;
  }

  languageSpecificCheckValid(
    typenames: TypeNames,
    language: BackendLanguageName,
    diagnostics: DiagnosticsContext
  ): boolean {
    let valid = true;
    for (const type of this.definedTypes) {
      if (!type.languageSpecificCheckValid(typenames, language, diagnostics)) valid = false;
    }
    return valid;
  }

  toString() {
    const writer = new CodeWriter();
    this.imports.forEach((imported) => writer.write(`${imported.toString()}\n`));
    this.definedTypes.forEach((type) => type.dump(writer));
    return writer.toString();
  }
}
