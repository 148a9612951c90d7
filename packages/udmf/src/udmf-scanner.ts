/**
 * Character-level scanner for UDMF sources.
 *
 * Same shape as the brush-map scanner: one token of lookahead over a
 * borrowed string, tokens are spans into it. Quoted strings keep their
 * escapes; the parser unescapes a string when it materializes the value.
 */

import { UdmfTokenKind } from './udmf-token.js';
import type { UdmfToken } from './udmf-token.js';

const END = -1;

const CH_LF = 0x0a;
const CH_CR = 0x0d;
const CH_TAB = 0x09;
const CH_SPACE = 0x20;
const CH_QUOTE = 0x22;
const CH_STAR = 0x2a;
const CH_PLUS = 0x2b;
const CH_MINUS = 0x2d;
const CH_DOT = 0x2e;
const CH_SLASH = 0x2f;
const CH_ZERO = 0x30;
const CH_SEMICOLON = 0x3b;
const CH_EQUALS = 0x3d;
const CH_BACKSLASH = 0x5c;
const CH_UNDERSCORE = 0x5f;
const CH_LOWER_E = 0x65;
const CH_UPPER_E = 0x45;
const CH_LOWER_X = 0x78;
const CH_UPPER_X = 0x58;
const CH_BRACE_OPEN = 0x7b;
const CH_BRACE_CLOSE = 0x7d;

function isWhitespace(c: number): boolean {
  return c === CH_LF || c === CH_CR || c === CH_SPACE || c === CH_TAB;
}

function isDigit(c: number): boolean {
  return c >= 0x30 && c <= 0x39;
}

function isOctalDigit(c: number): boolean {
  return c >= 0x30 && c <= 0x37;
}

function isHexDigit(c: number): boolean {
  return isDigit(c) || (c >= 0x61 && c <= 0x66) || (c >= 0x41 && c <= 0x46);
}

function isLetter(c: number): boolean {
  return (c >= 0x61 && c <= 0x7a) || (c >= 0x41 && c <= 0x5a);
}

function isIdentifierChar(c: number): boolean {
  return isLetter(c) || isDigit(c) || c === CH_UNDERSCORE;
}

export class UdmfScanner {
  private source = '';
  private position = 0;
  private line = 1;
  private lineStart = 0;
  private lookahead: UdmfToken | null = null;

  constructor(source = '') {
    this.init(source);
  }

  init(source: string): void {
    this.source = source;
    this.reset();
  }

  reset(): void {
    this.position = 0;
    this.line = 1;
    this.lineStart = 0;
    this.lookahead = null;
  }

  get currentLine(): number {
    return this.line;
  }

  get currentColumn(): number {
    return 1 + this.position - this.lineStart;
  }

  get currentPosition(): number {
    return this.position;
  }

  textOf(token: UdmfToken): string {
    return this.source.slice(token.start, token.end);
  }

  read(): UdmfToken {
    const token = this.peek();
    this.lookahead = null;
    return token;
  }

  peek(): UdmfToken {
    if (this.lookahead) return this.lookahead;

    for (;;) {
      this.skipWhitespace();

      const start = this.position;
      const line = this.line;
      const column = this.currentColumn;
      const kind = this.scanToken();

      if (kind !== null) {
        this.lookahead = { kind, start, end: this.position, line, column };
        return this.lookahead;
      }
    }
  }

  /** Scan one token; `null` means a comment was consumed. */
  private scanToken(): UdmfTokenKind | null {
    const c = this.readChar();

    switch (c) {
      case END:
        return UdmfTokenKind.EOF;

      case CH_QUOTE:
        return this.scanQuotedString();

      case CH_BRACE_OPEN:
        return UdmfTokenKind.BraceOpen;
      case CH_BRACE_CLOSE:
        return UdmfTokenKind.BraceClose;
      case CH_EQUALS:
        return UdmfTokenKind.Equals;
      case CH_SEMICOLON:
        return UdmfTokenKind.Semicolon;

      case CH_SLASH: {
        const next = this.peekChar();
        if (next === CH_SLASH) {
          while (this.peekChar() !== CH_LF && this.peekChar() !== END) {
            this.readChar();
          }
          return null;
        }
        if (next === CH_STAR) {
          this.readChar();
          this.skipBlockComment();
          return null;
        }
        return UdmfTokenKind.Undetermined;
      }

      case CH_PLUS:
      case CH_MINUS:
        if (!isDigit(this.peekChar())) return UdmfTokenKind.Undetermined;
        return this.scanNumber(this.readChar());
    }

    if (isDigit(c)) {
      return this.scanNumber(c);
    }

    if (isLetter(c) || c === CH_UNDERSCORE) {
      while (isIdentifierChar(this.peekChar())) {
        this.readChar();
      }
      return UdmfTokenKind.Identifier;
    }

    return UdmfTokenKind.Undetermined;
  }

  /** `\"` and `\\` do not end the string. Running into end of input does. */
  private scanQuotedString(): UdmfTokenKind {
    for (;;) {
      const c = this.readChar();
      if (c === END) return UdmfTokenKind.Undetermined;
      if (c === CH_QUOTE) return UdmfTokenKind.QuotedString;

      if (c === CH_BACKSLASH) {
        const next = this.peekChar();
        if (next === CH_QUOTE || next === CH_BACKSLASH) {
          this.readChar();
        }
      }
    }
  }

  private skipBlockComment(): void {
    for (;;) {
      const c = this.readChar();
      if (c === END) return;
      if (c === CH_STAR && this.peekChar() === CH_SLASH) {
        this.readChar();
        return;
      }
    }
  }

  /** `first` is the first digit, already consumed. */
  private scanNumber(first: number): UdmfTokenKind {
    if (first === CH_ZERO) {
      const next = this.peekChar();

      if (next === CH_LOWER_X || next === CH_UPPER_X) {
        this.readChar();
        while (isHexDigit(this.peekChar())) {
          this.readChar();
        }
        return UdmfTokenKind.Integer;
      }

      if (isDigit(next)) {
        // The digit after the leading zero is taken as is; an 8 or 9 there
        // makes the literal invalid, which the parser reports.
        this.readChar();
        while (isOctalDigit(this.peekChar())) {
          this.readChar();
        }
        return UdmfTokenKind.Integer;
      }
    }

    return this.scanDecimal();
  }

  private scanDecimal(): UdmfTokenKind {
    let foundFraction = false;

    for (;;) {
      const c = this.peekChar();

      if (isDigit(c)) {
        this.readChar();
      } else if (!foundFraction && c === CH_DOT) {
        foundFraction = true;
        this.readChar();
      } else if (foundFraction && (c === CH_LOWER_E || c === CH_UPPER_E)) {
        this.readChar();

        const sign = this.peekChar();
        if (sign === CH_PLUS || sign === CH_MINUS) {
          this.readChar();
        }
        if (!isDigit(this.peekChar())) {
          return UdmfTokenKind.Undetermined;
        }
        while (isDigit(this.peekChar())) {
          this.readChar();
        }
        return UdmfTokenKind.Float;
      } else {
        break;
      }
    }

    return foundFraction ? UdmfTokenKind.Float : UdmfTokenKind.Integer;
  }

  private peekChar(): number {
    if (this.position >= this.source.length) return END;
    return this.source.charCodeAt(this.position);
  }

  private readChar(): number {
    if (this.position >= this.source.length) return END;

    const c = this.source.charCodeAt(this.position);
    this.position++;

    if (c === CH_LF) {
      this.line++;
      this.lineStart = this.position;
    }

    return c;
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.peekChar())) {
      this.readChar();
    }
  }
}
