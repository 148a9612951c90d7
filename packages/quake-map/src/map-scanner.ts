/**
 * Character-level scanner for brush-map sources.
 *
 * Produces one token of lookahead over a borrowed string. Whitespace and
 * `//` comments are skipped. Every call to `readChar` either advances or
 * is already at end of input, so scanning always terminates.
 */

import { QuakeTokenKind } from './map-token.js';
import type { QuakeToken } from './map-token.js';

const END = -1;

const CH_LF = 0x0a;
const CH_CR = 0x0d;
const CH_TAB = 0x09;
const CH_SPACE = 0x20;
const CH_QUOTE = 0x22;
const CH_PLUS = 0x2b;
const CH_MINUS = 0x2d;
const CH_DOT = 0x2e;
const CH_SLASH = 0x2f;
const CH_BACKSLASH = 0x5c;
const CH_STAR = 0x2a;
const CH_EQUALS = 0x3d;
const CH_UNDERSCORE = 0x5f;
const CH_LOWER_E = 0x65;
const CH_UPPER_E = 0x45;
const CH_BRACE_OPEN = 0x7b;
const CH_BRACE_CLOSE = 0x7d;
const CH_PARENS_OPEN = 0x28;
const CH_PARENS_CLOSE = 0x29;
const CH_BRACKET_OPEN = 0x5b;
const CH_BRACKET_CLOSE = 0x5d;

function isWhitespace(c: number): boolean {
  return c === CH_LF || c === CH_CR || c === CH_SPACE || c === CH_TAB;
}

function isDigit(c: number): boolean {
  return c >= 0x30 && c <= 0x39;
}

function isLetterOrDigit(c: number): boolean {
  return isDigit(c) || (c >= 0x61 && c <= 0x7a) || (c >= 0x41 && c <= 0x5a);
}

/**
 * Text tokens (texture names, mostly) start with a letter, digit or one of
 * `_ * = / \`. Once started they may also contain `+ - { } ( )`.
 */
function isTextChar(c: number, first: boolean): boolean {
  if (!first) {
    if (
      c === CH_PLUS || c === CH_MINUS ||
      c === CH_BRACE_OPEN || c === CH_BRACE_CLOSE ||
      c === CH_PARENS_OPEN || c === CH_PARENS_CLOSE
    ) {
      return true;
    }
  }

  return (
    isLetterOrDigit(c) ||
    c === CH_UNDERSCORE ||
    c === CH_STAR ||
    c === CH_EQUALS ||
    c === CH_SLASH ||
    c === CH_BACKSLASH
  );
}

export class QuakeMapScanner {
  private source = '';
  private position = 0;
  private line = 1;
  private lineStart = 0;
  private lookahead: QuakeToken | null = null;

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

  /** Source text a token spans. */
  textOf(token: QuakeToken): string {
    return this.source.slice(token.start, token.end);
  }

  /** Return the lookahead token and advance past it. */
  read(): QuakeToken {
    const token = this.peek();
    this.lookahead = null;
    return token;
  }

  /** Return the next token without consuming it. */
  peek(): QuakeToken {
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

  /** Scan one token; `null` means a comment was consumed and scanning should restart. */
  private scanToken(): QuakeTokenKind | null {
    const c = this.readChar();

    switch (c) {
      case END:
        return QuakeTokenKind.EOF;

      case CH_QUOTE: {
        // No escapes in this format: the next quote closes the string.
        // An unterminated string runs to end of input.
        let ch = this.readChar();
        while (ch !== CH_QUOTE && ch !== END) {
          ch = this.readChar();
        }
        return QuakeTokenKind.QuotedString;
      }

      case CH_BRACE_OPEN:
        return QuakeTokenKind.BraceOpen;
      case CH_BRACE_CLOSE:
        return QuakeTokenKind.BraceClose;
      case CH_PARENS_OPEN:
        return QuakeTokenKind.ParensOpen;
      case CH_PARENS_CLOSE:
        return QuakeTokenKind.ParensClose;
      case CH_BRACKET_OPEN:
        return QuakeTokenKind.BracketOpen;
      case CH_BRACKET_CLOSE:
        return QuakeTokenKind.BracketClose;

      case CH_SLASH:
        if (this.peekChar() === CH_SLASH) {
          this.readChar();
          while (this.peekChar() !== CH_LF && this.peekChar() !== END) {
            this.readChar();
          }
          return null;
        }
        break;

      case CH_MINUS:
        return this.scanNumber();
    }

    if (isDigit(c)) {
      return this.scanNumber();
    }

    if (isTextChar(c, true)) {
      while (isTextChar(this.peekChar(), false)) {
        this.readChar();
      }
      return QuakeTokenKind.Text;
    }

    return QuakeTokenKind.Undetermined;
  }

  private scanNumber(): QuakeTokenKind {
    let foundFraction = false;
    let foundExponent = false;

    for (;;) {
      const c = this.peekChar();

      if (isDigit(c)) {
        this.readChar();
      } else if (!foundFraction && c === CH_DOT) {
        foundFraction = true;
        this.readChar();
      } else if (!foundExponent && (c === CH_LOWER_E || c === CH_UPPER_E)) {
        foundExponent = true;
        this.readChar();

        const sign = this.peekChar();
        if (sign === CH_PLUS || sign === CH_MINUS) {
          this.readChar();
        }
      } else {
        break;
      }
    }

    return foundFraction || foundExponent ? QuakeTokenKind.Float : QuakeTokenKind.Integer;
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
