interface PrinterResultOptions {
  trimTrailingWhitespace: boolean;
  insertFinalNewline: boolean;
}

/** Collects indented output lines. */
export class Printer {
  private lines: string[] = [];
  private indentLevel = 0;

  constructor(private readonly indentSize: number) {}

  reset(): void {
    this.lines = [];
    this.indentLevel = 0;
  }

  writeLine(text: string = ''): void {
    this.lines.push(' '.repeat(this.indentLevel * this.indentSize) + text);
  }

  increaseIndent(): void {
    this.indentLevel += 1;
  }

  decreaseIndent(): void {
    this.indentLevel = Math.max(0, this.indentLevel - 1);
  }

  indented(write: () => void): void {
    this.increaseIndent();
    write();
    this.decreaseIndent();
  }

  isEmpty(): boolean {
    return this.lines.length === 0;
  }

  getResult(options: PrinterResultOptions): string {
    let result = this.lines.join('\n');

    if (options.trimTrailingWhitespace) {
      result = result.replace(/[ \t]+$/gm, '');
    }

    if (options.insertFinalNewline && result.length > 0 && !result.endsWith('\n')) {
      result += '\n';
    }

    return result;
  }
}
