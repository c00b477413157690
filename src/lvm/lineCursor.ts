const LINE_RE = /[^\r\n]*(?:\r\n|\n|\r)|[^\r\n]+$/g;

/** Splits text into lines that keep their terminators. */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(LINE_RE) ?? [];
}

export function stripLineEnd(line: string): string {
  return line.replace(/[\r\n]+$/, '');
}

/** True for '', '\n', '\r\n' and '\r'. */
export function isBlankLine(line: string): boolean {
  return stripLineEnd(line) === '';
}

/**
 * Forward-only cursor over a buffer of raw lines. Lines handed out by
 * `next()` are never revisited; `peek()` looks ahead without consuming.
 */
export class LineCursor {
  private index = 0;

  constructor(private readonly lines: readonly string[]) {}

  static fromText(text: string): LineCursor {
    return new LineCursor(splitLinesKeepEnds(text));
  }

  get done(): boolean {
    return this.index >= this.lines.length;
  }

  /** 1-based number of the line the next `next()` call returns. */
  get lineNumber(): number {
    return this.index + 1;
  }

  next(): string | undefined {
    const line = this.lines[this.index];
    if (line !== undefined) this.index += 1;
    return line;
  }

  peek(offset = 0): string | undefined {
    return this.lines[this.index + offset];
  }
}
