import {
  OutOfBoundsError,
  type SourcePosition,
  type StyleParseError,
} from "../types/index.js";

export function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}

export function isAsciiLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

export function isAsciiDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export function isAsciiAlphanumeric(ch: string): boolean {
  return isAsciiLetter(ch) || isAsciiDigit(ch);
}

/**
 * Forward-only cursor over a source string, shared by the markup and
 * stylesheet parsers. Positions are UTF-16 code units.
 */
export class Scanner {
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly input: string) {}

  position(): SourcePosition {
    return { offset: this.pos, line: this.line, column: this.column };
  }

  atEnd(): boolean {
    return this.pos >= this.input.length;
  }

  peek(): string {
    if (this.atEnd()) {
      throw new OutOfBoundsError("Unexpected end of input", this.position());
    }
    return this.input.charAt(this.pos);
  }

  startsWith(s: string): boolean {
    return this.input.startsWith(s, this.pos);
  }

  advance(): string {
    const ch = this.peek();
    this.pos++;
    if (ch === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  consumeWhile(predicate: (ch: string) => boolean): string {
    const start = this.pos;
    while (!this.atEnd() && predicate(this.input.charAt(this.pos))) {
      this.advance();
    }
    return this.input.slice(start, this.pos);
  }

  skipWhitespace(): void {
    this.consumeWhile(isWhitespace);
  }

  /**
   * Consumes `expected`, or throws the error `fail` builds for a mismatch or
   * for end of input.
   */
  expect(expected: string, fail: (position: SourcePosition) => StyleParseError): void {
    const position = this.position();
    if (this.atEnd() || this.input.charAt(this.pos) !== expected) {
      throw fail(position);
    }
    this.advance();
  }
}
