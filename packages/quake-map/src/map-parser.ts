/**
 * Recursive-descent parser for brush-map sources.
 *
 *   Map        := Entity*
 *   Entity     := '{' (KeyValue | Brush)* '}'
 *   KeyValue   := String String
 *   Brush      := '{' Plane* '}'
 *   Plane      := Point Point Point Text TexMapping Number Number Number
 *   Point      := '(' Number Number Number ')'
 *   TexMapping := Number Number | Axis Axis
 *   Axis       := '[' Number Number Number Number ']'
 *
 * A `[` right after the texture name selects the Valve-220 dialect.
 *
 * Errors are collected, never thrown. When an entity fails, its remaining
 * tokens are skipped up to the matching close brace and parsing resumes
 * with the next entity, so one call reports problems in every entity.
 * The map itself is only returned when no error was recorded.
 */

import { ListPool, Vector2, Vector3, Vector4, assertSourceText, usePooled } from '@levelscan/core';
import type { BufferPool } from '@levelscan/core';
import { QuakeMapScanner } from './map-scanner.js';
import { QuakeTokenKind, tokenLength } from './map-token.js';
import type { QuakeToken } from './map-token.js';
import type {
  QuakeBrush,
  QuakeEntity,
  QuakeMap,
  QuakeMapParseError,
  QuakeMapParseResult,
  QuakeMapParserOptions,
  QuakePlane,
} from './types.js';

const sharedBrushPool = new ListPool<QuakeBrush>();
const sharedPlanePool = new ListPool<QuakePlane>();

export class QuakeMapParser {
  private readonly scanner = new QuakeMapScanner();
  private readonly brushPool: BufferPool<QuakeBrush[]>;
  private readonly planePool: BufferPool<QuakePlane[]>;
  private errorList: QuakeMapParseError[] = [];
  /** Open braces consumed so far; used to resynchronize after an error. */
  private depth = 0;

  constructor(options: QuakeMapParserOptions = {}) {
    this.brushPool = options.brushPool ?? sharedBrushPool;
    this.planePool = options.planePool ?? sharedPlanePool;
  }

  /** Errors from the most recent `parse` call. */
  get errors(): readonly QuakeMapParseError[] {
    return this.errorList;
  }

  parse(source: string): QuakeMap | null {
    assertSourceText(source);

    this.errorList = [];
    this.depth = 0;
    this.scanner.init(source);

    const entities: QuakeEntity[] = [];
    try {
      while (this.scanner.peek().kind !== QuakeTokenKind.EOF) {
        const entity = this.parseEntity();
        if (entity) {
          entities.push(entity);
        } else {
          this.skipToNextEntity();
        }
      }
    } finally {
      this.scanner.init('');
    }

    if (this.errorList.length > 0) return null;
    return { entities };
  }

  // --------------------------------------------------------------------------
  // Productions
  // --------------------------------------------------------------------------

  private parseEntity(): QuakeEntity | null {
    const open = this.scanner.read();
    if (open.kind !== QuakeTokenKind.BraceOpen) {
      this.addError(`Expected '{', got ${this.describe(open)}.`, open);
      return null;
    }
    this.depth++;

    const keyValues = new Map<string, string>();

    return usePooled(this.brushPool, 0, (brushes) => {
      let token = this.scanner.peek();
      while (token.kind !== QuakeTokenKind.BraceClose) {
        if (token.kind === QuakeTokenKind.EOF) {
          this.addError("Unexpected end-of-file. Expected a key-value pair, a brush or '}'.", token);
          return null;
        }

        if (token.kind === QuakeTokenKind.QuotedString) {
          const pair = this.parseKeyValue();
          if (!pair) return null;
          keyValues.set(pair[0], pair[1]);
        } else if (token.kind === QuakeTokenKind.BraceOpen) {
          const brush = this.parseBrush();
          if (!brush) return null;
          brushes.push(brush);
        } else {
          this.addError(`Expected a key-value pair, a brush or '}', got ${this.describe(token)}.`, token);
          return null;
        }

        token = this.scanner.peek();
      }
      this.scanner.read();
      this.depth--;

      return { keyValues, brushes: brushes.slice() };
    });
  }

  private parseKeyValue(): [string, string] | null {
    const key = this.scanner.read();
    if (!this.checkTerminated(key)) return null;

    const value = this.scanner.peek();
    if (value.kind !== QuakeTokenKind.QuotedString) {
      this.addError(`Expected a quoted string value, got ${this.describe(value)}.`, value);
      return null;
    }
    this.scanner.read();
    if (!this.checkTerminated(value)) return null;

    return [this.unquote(key), this.unquote(value)];
  }

  private parseBrush(): QuakeBrush | null {
    this.scanner.read();
    this.depth++;

    return usePooled(this.planePool, 0, (planes) => {
      let token = this.scanner.peek();
      while (token.kind !== QuakeTokenKind.BraceClose) {
        if (token.kind === QuakeTokenKind.EOF) {
          this.addError("Unexpected end-of-file. Expected a plane or '}'.", token);
          return null;
        }

        if (token.kind !== QuakeTokenKind.ParensOpen) {
          this.addError(`Expected a plane or '}', got ${this.describe(token)}.`, token);
          return null;
        }

        const plane = this.parsePlane();
        if (!plane) return null;
        planes.push(plane);

        token = this.scanner.peek();
      }
      this.scanner.read();
      this.depth--;

      return { planes: planes.slice() };
    });
  }

  private parsePlane(): QuakePlane | null {
    const point1 = this.parsePoint();
    if (!point1) return null;
    const point2 = this.parsePoint();
    if (!point2) return null;
    const point3 = this.parsePoint();
    if (!point3) return null;

    const textureName = this.scanner.peek();
    if (textureName.kind !== QuakeTokenKind.Text) {
      this.addError(`Expected a texture name, got ${this.describe(textureName)}.`, textureName);
      return null;
    }
    this.scanner.read();

    let isValve220: boolean;
    let axis1: Vector3;
    let axis2: Vector3;
    let offsets: Vector2;

    if (this.scanner.peek().kind === QuakeTokenKind.BracketOpen) {
      const first = this.parseTextureAxis();
      if (!first) return null;
      const second = this.parseTextureAxis();
      if (!second) return null;

      isValve220 = true;
      axis1 = first.xyz();
      axis2 = second.xyz();
      offsets = new Vector2(first.w, second.w);
    } else {
      const offsetX = this.parseNumber();
      if (offsetX === null) return null;
      const offsetY = this.parseNumber();
      if (offsetY === null) return null;

      isValve220 = false;
      axis1 = new Vector3();
      axis2 = new Vector3();
      offsets = new Vector2(offsetX, offsetY);
    }

    const rotation = this.parseNumber();
    if (rotation === null) return null;
    const scaleX = this.parseNumber();
    if (scaleX === null) return null;
    const scaleY = this.parseNumber();
    if (scaleY === null) return null;

    return {
      point1,
      point2,
      point3,
      texture: this.scanner.textOf(textureName),
      isValve220,
      axis1,
      axis2,
      offsets,
      rotation,
      scale: new Vector2(scaleX, scaleY),
    };
  }

  private parsePoint(): Vector3 | null {
    if (!this.expect(QuakeTokenKind.ParensOpen, "'('")) return null;

    const x = this.parseNumber();
    if (x === null) return null;
    const y = this.parseNumber();
    if (y === null) return null;
    const z = this.parseNumber();
    if (z === null) return null;

    if (!this.expect(QuakeTokenKind.ParensClose, "')'")) return null;
    return new Vector3(x, y, z);
  }

  private parseTextureAxis(): Vector4 | null {
    if (!this.expect(QuakeTokenKind.BracketOpen, "'['")) return null;

    const x = this.parseNumber();
    if (x === null) return null;
    const y = this.parseNumber();
    if (y === null) return null;
    const z = this.parseNumber();
    if (z === null) return null;
    const offset = this.parseNumber();
    if (offset === null) return null;

    if (!this.expect(QuakeTokenKind.BracketClose, "']'")) return null;
    return new Vector4(x, y, z, offset);
  }

  /** Integers and floats are both accepted wherever a number is expected. */
  private parseNumber(): number | null {
    const token = this.scanner.peek();
    if (token.kind !== QuakeTokenKind.Integer && token.kind !== QuakeTokenKind.Float) {
      this.addError(`Expected a float or int, got ${this.describe(token)}.`, token);
      return null;
    }
    this.scanner.read();

    const text = this.scanner.textOf(token);
    const value = Number(text);
    if (!Number.isFinite(value)) {
      this.addError(`Invalid numeric literal '${text}'.`, token);
      return null;
    }
    return value;
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private expect(kind: QuakeTokenKind, expected: string): boolean {
    const token = this.scanner.peek();
    if (token.kind !== kind) {
      this.addError(`Expected ${expected}, got ${this.describe(token)}.`, token);
      return false;
    }
    this.scanner.read();
    return true;
  }

  private checkTerminated(token: QuakeToken): boolean {
    const text = this.scanner.textOf(token);
    if (text.length < 2 || !text.endsWith('"')) {
      this.addError('Unterminated quoted string.', token);
      return false;
    }
    return true;
  }

  private unquote(token: QuakeToken): string {
    return this.scanner.textOf({ ...token, start: token.start + 1, end: token.end - 1 });
  }

  private describe(token: QuakeToken): string {
    if (token.kind === QuakeTokenKind.EOF) return 'end-of-file';
    return `'${this.scanner.textOf(token).replace(/[\r\n]/g, '')}'`;
  }

  private addError(message: string, token: QuakeToken): void {
    this.errorList.push({
      message,
      line: token.line,
      column: token.column,
      position: token.start,
      length: tokenLength(token),
    });
  }

  /**
   * Skip what is left of a failed entity. Inside an entity this consumes
   * tokens until the brace depth is back at the top level; at the top level
   * it drops stray tokens up to the next `{`.
   */
  private skipToNextEntity(): void {
    while (this.depth > 0) {
      const token = this.scanner.read();
      if (token.kind === QuakeTokenKind.EOF) break;
      if (token.kind === QuakeTokenKind.BraceOpen) this.depth++;
      else if (token.kind === QuakeTokenKind.BraceClose) this.depth--;
    }
    this.depth = 0;

    for (
      let token = this.scanner.peek();
      token.kind !== QuakeTokenKind.EOF && token.kind !== QuakeTokenKind.BraceOpen;
      token = this.scanner.peek()
    ) {
      this.scanner.read();
    }
  }
}

/** Parse a brush-map source in one call. */
export function parseQuakeMap(source: string, options: QuakeMapParserOptions = {}): QuakeMapParseResult {
  const parser = new QuakeMapParser(options);
  const map = parser.parse(source);
  return { map, errors: [...parser.errors] };
}

/** `file:line:column: message`, or `line:column: message` without a file name. */
export function formatQuakeMapParseError(error: QuakeMapParseError, fileName?: string): string {
  const location = `${error.line}:${error.column}`;
  return `${fileName ? `${fileName}:` : ''}${location}: ${error.message}`;
}
