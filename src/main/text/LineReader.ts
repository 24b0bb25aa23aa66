const UTF8_BOM = '\uFEFF';

/**
 * Line reader with cursor management for text measurement files.
 * Accepts a string or raw bytes (decoded as UTF-8), strips a leading BOM
 * and normalizes CRLF / CR line endings. Line numbers are 1-based.
 */
export class LineReader {
  private lines: string[];
  private _index: number;

  constructor(content: string | Uint8Array) {
    this.lines = LineReader.decode(content).split(/\r\n|\r|\n/);
    // A trailing newline produces one empty element that is not a line
    if (this.lines.length > 0 && this.lines[this.lines.length - 1] === '') {
      this.lines.pop();
    }
    this._index = 0;
  }

  /** UTF-8 text of the content without a leading BOM */
  static decode(content: string | Uint8Array): string {
    const text = typeof content === 'string' ? content : Buffer.from(content).toString('utf-8');
    return text.startsWith(UTF8_BOM) ? text.substring(UTF8_BOM.length) : text;
  }

  /** Whether every line has been consumed */
  get eof(): boolean {
    return this._index >= this.lines.length;
  }

  /** Number of the line the next readLine() returns */
  get lineNumber(): number {
    return this._index + 1;
  }

  get lineCount(): number {
    return this.lines.length;
  }

  /**
   * Read the next line and advance the cursor.
   * Returns null at EOF.
   */
  readLine(): string | null {
    if (this._index >= this.lines.length) return null;
    return this.lines[this._index++];
  }

  /** Look at the next line without advancing. Returns null at EOF. */
  peekLine(): string | null {
    if (this._index >= this.lines.length) return null;
    return this.lines[this._index];
  }
}
