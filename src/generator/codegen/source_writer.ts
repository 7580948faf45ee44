/**
 * Indentation-aware text builder for generated C# units
 */

export class SourceWriter {
  private lines: string[] = [];
  private depth = 0;

  constructor(private indentUnit = "    ") {}

  get indentLevel(): number {
    return this.depth;
  }

  /**
   * Append text at the current indentation. Multi-line text is split and
   * each line indented; empty lines carry no indentation.
   */
  writeLine(text = ""): this {
    for (const line of text.split("\n")) {
      this.lines.push(
        line.length > 0 ? this.indentUnit.repeat(this.depth) + line : "",
      );
    }
    return this;
  }

  writeEmptyLines(count = 1): this {
    for (let i = 0; i < count; i++) this.lines.push("");
    return this;
  }

  /** Optional header line, then `{`, then one level deeper. */
  openBlock(header?: string): this {
    if (header !== undefined) this.writeLine(header);
    this.writeLine("{");
    this.depth++;
    return this;
  }

  closeBlock(suffix = ""): this {
    if (this.depth === 0) {
      throw new Error("closeBlock called with no open block");
    }
    this.depth--;
    return this.writeLine(`}${suffix}`);
  }

  closeAllBlocks(): this {
    while (this.depth > 0) this.closeBlock();
    return this;
  }

  /** Final text with a trailing newline. */
  toString(): string {
    return `${this.lines.join("\n")}\n`;
  }
}
