// src/server/line-framer.ts

export interface LineFramerOptions {
  /** Treat a lone `\r` as a line terminator as well */
  acceptBareCarriageReturn: boolean;
  maxLineLength: number;
}

export interface FramedLines {
  lines: string[];
  /** Lines dropped for exceeding the maximum length */
  discarded: number;
}

/**
 * Splits a byte stream (decoded one character per byte) into command lines.
 * Partial lines are kept across pushes. Blank lines are dropped, and a line
 * that grows past the limit is dropped up to its terminator.
 */
export class LineFramer {
  private buffer = '';
  private overflowing = false;
  private readonly terminator: RegExp;

  constructor(private readonly options: LineFramerOptions) {
    this.terminator = options.acceptBareCarriageReturn ? /\r\n|\r|\n/ : /\n/;
  }

  get pending(): number {
    return this.buffer.length;
  }

  push(chunk: string): FramedLines {
    const lines: string[] = [];
    let discarded = 0;
    this.buffer += chunk;

    let match = this.terminator.exec(this.buffer);
    while (match) {
      let line = this.buffer.slice(0, match.index);
      this.buffer = this.buffer.slice(match.index + match[0].length);

      if (this.overflowing) {
        this.overflowing = false;
      } else {
        if (line.endsWith('\r')) line = line.slice(0, -1);
        if (line.length > this.options.maxLineLength) {
          discarded += 1;
        } else if (line.trim() !== '') {
          lines.push(line);
        }
      }
      match = this.terminator.exec(this.buffer);
    }

    // a trailing CR may be the first half of a CRLF split across reads
    const pendingLength = this.buffer.length - (this.buffer.endsWith('\r') ? 1 : 0);
    if (pendingLength > this.options.maxLineLength) {
      this.buffer = '';
      if (!this.overflowing) discarded += 1;
      this.overflowing = true;
    }

    return { lines, discarded };
  }

  reset(): void {
    this.buffer = '';
    this.overflowing = false;
  }
}
