// src/core/io/lineReader.ts
// Line-at-a-time reader over text, counting lines as it goes

export class LineReader {
  private pos = 0;
  private count = 0;

  constructor(private readonly text: string) {}

  /**
   * Next line including its "\n", or "" at end of input.
   */
  readLine(): string {
    if (this.pos >= this.text.length) return "";
    const nl = this.text.indexOf("\n", this.pos);
    const end = nl === -1 ? this.text.length : nl + 1;
    const line = this.text.slice(this.pos, end);
    this.pos = end;
    this.count++;
    return line;
  }

  /** 1-based number of the line last returned. */
  get lineNumber(): number {
    return this.count;
  }
}
