/** Line-oriented text sink used when dumping declarations back to IDL */
export class CodeWriter {
  private chunks: string[] = [];
  private depth = 0;
  private atLineStart = true;

  constructor(private readonly indentUnit = "  ") {}

  indent() {
    this.depth += 1;
  }

  dedent() {
    if (this.depth === 0) throw new Error("CodeWriter: dedent without indent");
    this.depth -= 1;
  }

  /** Writes text, prefixing each new line with the current indentation */
  write(text: string) {
    for (const piece of text.split(/(\n)/)) {
      if (piece === "") continue;
      if (piece === "\n") {
        this.chunks.push(piece);
        this.atLineStart = true;
        continue;
      }
      if (this.atLineStart) {
        this.chunks.push(this.indentUnit.repeat(this.depth));
        this.atLineStart = false;
      }
      this.chunks.push(piece);
    }
  }

  toString() {
    return this.chunks.join("");
  }
}
