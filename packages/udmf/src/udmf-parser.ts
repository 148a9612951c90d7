/**
 * Schema-driven descent parser for UDMF sources.
 *
 *   Document   := GlobalExpr*
 *   GlobalExpr := Identifier '{' Assignment* '}'
 *               | Identifier '=' Value ';'
 *   Assignment := Identifier '=' Value ';'
 *   Value      := Identifier | Integer | Float | QuotedString
 *
 * Declared keys are written to the document through the schema; anything
 * else lands in the unknown-assignment and unknown-block tables. Errors are
 * collected and the document is always returned. The post-process hook
 * only runs when the parse produced no errors.
 */

import { assertSourceText, sharedCharBufferPool, usePooled } from '@levelscan/core';
import type { BufferPool } from '@levelscan/core';
import type { CaseInsensitiveMap } from './case-insensitive-map.js';
import { isInIntegerRange, parseFloatLiteral, parseIntegerLiteral } from './numeric-literal.js';
import { defaultSchemaCache } from './schema-cache.js';
import type { SchemaCache } from './schema-cache.js';
import type { DocumentSchema, FieldBinding, UdmfDocumentType } from './schema.js';
import { UdmfErrorCode, UdmfUnknownBlock } from './types.js';
import type { UdmfBlock, UdmfParseError, UdmfParseResult, UdmfParsedMapData, UdmfParserOptions } from './types.js';
import type { UdmfUnknownAssignment, UdmfUnknownAssignments } from './unknown-assignment.js';
import { UdmfScanner } from './udmf-scanner.js';
import { UdmfTokenKind, isValueToken, udmfTokenKindName } from './udmf-token.js';
import type { UdmfToken } from './udmf-token.js';

const CH_BACKSLASH = 0x5c;
const CH_QUOTE = 0x22;

/** Code units per `String.fromCharCode` call when materializing strings. */
const DECODE_CHUNK = 4096;

export class UdmfParser {
  private readonly scanner = new UdmfScanner();
  private readonly schemaCache: SchemaCache;
  private readonly charPool: BufferPool<Uint16Array>;
  private errorList: UdmfParseError[] = [];

  constructor(options: UdmfParserOptions = {}) {
    this.schemaCache = options.schemaCache ?? defaultSchemaCache;
    this.charPool = options.charPool ?? sharedCharBufferPool;
  }

  /** Errors from the most recent `parse` call. */
  get errors(): readonly UdmfParseError[] {
    return this.errorList;
  }

  parse<D extends UdmfParsedMapData>(source: string, type: UdmfDocumentType<D>): D {
    assertSourceText(source);
    const schema = this.schemaCache.documentSchema(type);

    this.errorList = [];
    this.scanner.init(source);

    const document = type.create();
    try {
      this.parseGlobalExprList(document, schema);
    } finally {
      this.scanner.init('');
    }

    if (this.errorList.length === 0) {
      document.postProcess();
    }
    return document;
  }

  // --------------------------------------------------------------------------
  // Productions
  // --------------------------------------------------------------------------

  private parseGlobalExprList<D extends UdmfParsedMapData>(document: D, schema: DocumentSchema<D>): void {
    for (let token = this.scanner.peek(); token.kind !== UdmfTokenKind.EOF; token = this.scanner.peek()) {
      if (token.kind === UdmfTokenKind.Identifier) {
        this.parseGlobalExpr(document, schema);
      } else {
        // Skip one token at a time so the loop always reaches EOF.
        this.scanner.read();
        this.addError(`${this.unexpected(token)} Expected ${udmfTokenKindName(UdmfTokenKind.Identifier)}.`, UdmfErrorCode.UnexpectedToken, token);
      }
    }
  }

  private parseGlobalExpr<D extends UdmfParsedMapData>(document: D, schema: DocumentSchema<D>): void {
    const identifier = this.scanner.read();
    const name = this.scanner.textOf(identifier);

    const next = this.scanner.peek();
    switch (next.kind) {
      case UdmfTokenKind.BraceOpen: {
        const binding = schema.blocks.get(name);
        if (binding) {
          binding.append(document, (block, blockSchema) => this.parseBlock(block, blockSchema.fields));
        } else {
          const block = new UdmfUnknownBlock();
          let list = document.unknownBlocks.get(name);
          if (!list) {
            list = [];
            document.unknownBlocks.set(name, list);
          }
          list.push(block);
          this.parseBlock(block, null);
        }
        break;
      }

      case UdmfTokenKind.Equals:
        this.parseAssignment(document, identifier, schema.fields.get(name), document.unknownGlobalAssignments);
        break;

      default:
        this.scanner.read();
        this.addError(this.unexpected(next), UdmfErrorCode.UnexpectedGlobalToken, next);
        break;
    }
  }

  private parseBlock<B extends UdmfBlock>(block: B, fields: CaseInsensitiveMap<FieldBinding<B>> | null): void {
    this.scanner.read();

    while (this.scanner.peek().kind === UdmfTokenKind.Identifier) {
      const key = this.scanner.read();
      const field = fields?.get(this.scanner.textOf(key));
      this.parseAssignment(block, key, field, block.unknownAssignments);
    }

    const close = this.scanner.read();
    if (close.kind !== UdmfTokenKind.BraceClose) {
      this.addError(`${this.unexpected(close)} Expected ${udmfTokenKindName(UdmfTokenKind.BraceClose)}.`, UdmfErrorCode.UnexpectedToken, close);
    }
  }

  /**
   * `key` has been consumed. A missing `=`, value or `;` is reported
   * without consuming the offending token, so the enclosing block can
   * still find its closing brace.
   */
  private parseAssignment<T>(
    target: T,
    key: UdmfToken,
    field: FieldBinding<T> | undefined,
    unknown: UdmfUnknownAssignments,
  ): void {
    if (!this.expect(UdmfTokenKind.Equals)) return;

    const value = this.scanner.peek();
    if (!isValueToken(value.kind)) {
      this.addError(`${this.unexpected(value)} Expected a value.`, UdmfErrorCode.UnexpectedToken, value);
      return;
    }
    this.scanner.read();

    if (!this.expect(UdmfTokenKind.Semicolon)) return;

    if (field) {
      this.assignField(target, field, value);
      return;
    }

    const name = this.scanner.textOf(key);
    if (unknown.has(name)) {
      this.addError(`Duplicate assignment '${name}'.`, UdmfErrorCode.DuplicateAssignment, key);
      return;
    }

    const assignment = this.toUnknownAssignment(value);
    if (assignment) {
      unknown.set(name, assignment);
    }
  }

  // --------------------------------------------------------------------------
  // Values
  // --------------------------------------------------------------------------

  private assignField<T>(target: T, field: FieldBinding<T>, token: UdmfToken): void {
    const text = this.scanner.textOf(token);

    switch (field.type) {
      case 'bool': {
        const value = token.kind === UdmfTokenKind.Identifier ? parseBool(text) : undefined;
        if (value === undefined) {
          this.addError(`Expected bool, got ${udmfTokenKindName(token.kind)}.`, UdmfErrorCode.TypeMismatch, token);
          return;
        }
        field.assign(target, value);
        return;
      }

      case 'int32':
      case 'uint32': {
        const value = this.integerValue(field.type, token);
        if (value !== null) field.assign(target, Number(value));
        return;
      }

      case 'int64':
      case 'uint64': {
        const value = this.integerValue(field.type, token);
        if (value !== null) field.assign(target, value);
        return;
      }

      case 'float32':
      case 'float64': {
        if (token.kind !== UdmfTokenKind.Float && token.kind !== UdmfTokenKind.Integer) {
          this.typeMismatch(UdmfTokenKind.Float, token);
          return;
        }
        const value = parseFloatLiteral(text, token.kind === UdmfTokenKind.Integer);
        if (value === null) {
          this.addError(`Invalid numeric literal '${text}'.`, UdmfErrorCode.InvalidNumber, token);
          return;
        }
        field.assign(target, field.type === 'float32' ? Math.fround(value) : value);
        return;
      }

      case 'string':
        if (token.kind !== UdmfTokenKind.QuotedString) {
          this.typeMismatch(UdmfTokenKind.QuotedString, token);
          return;
        }
        field.assign(target, this.unquote(token));
        return;
    }
  }

  private integerValue(width: 'int32' | 'uint32' | 'int64' | 'uint64', token: UdmfToken): bigint | null {
    if (token.kind !== UdmfTokenKind.Integer) {
      this.typeMismatch(UdmfTokenKind.Integer, token);
      return null;
    }

    const text = this.scanner.textOf(token);
    const value = parseIntegerLiteral(text);
    if (value === null) {
      this.addError(`Invalid numeric literal '${text}'.`, UdmfErrorCode.InvalidNumber, token);
      return null;
    }
    if (!isInIntegerRange(value, width)) {
      this.addError(`Integer literal '${text}' is out of range for ${width}.`, UdmfErrorCode.InvalidNumber, token);
      return null;
    }
    return value;
  }

  private toUnknownAssignment(token: UdmfToken): UdmfUnknownAssignment | null {
    const text = this.scanner.textOf(token);

    switch (token.kind) {
      case UdmfTokenKind.Integer: {
        const value = parseIntegerLiteral(text);
        if (value === null || !isInIntegerRange(value, 'int64')) {
          this.addError(`Invalid numeric literal '${text}'.`, UdmfErrorCode.InvalidNumber, token);
          return null;
        }
        return { kind: 'int', value };
      }

      case UdmfTokenKind.Float: {
        const value = parseFloatLiteral(text, false);
        if (value === null) {
          this.addError(`Invalid numeric literal '${text}'.`, UdmfErrorCode.InvalidNumber, token);
          return null;
        }
        return { kind: 'float', value };
      }

      case UdmfTokenKind.Identifier: {
        const value = parseBool(text);
        return value === undefined ? { kind: 'identifier', value: text } : { kind: 'bool', value };
      }

      default:
        return { kind: 'string', value: this.unquote(token) };
    }
  }

  /** Strip the quotes and resolve `\"` and `\\`. Any other backslash is kept. */
  private unquote(token: UdmfToken): string {
    const text = this.scanner.textOf(token);
    const last = text.length - 1;
    if (!text.includes('\\')) return text.slice(1, last);

    return usePooled(this.charPool, last, (buffer) => {
      let length = 0;
      for (let i = 1; i < last; i++) {
        let c = text.charCodeAt(i);
        if (c === CH_BACKSLASH && i + 1 < last) {
          const next = text.charCodeAt(i + 1);
          if (next === CH_QUOTE || next === CH_BACKSLASH) {
            c = next;
            i++;
          }
        }
        buffer[length++] = c;
      }
      return decodeChars(buffer, length);
    });
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private expect(kind: UdmfTokenKind): boolean {
    const token = this.scanner.peek();
    if (token.kind !== kind) {
      this.addError(`${this.unexpected(token)} Expected ${udmfTokenKindName(kind)}.`, UdmfErrorCode.UnexpectedToken, token);
      return false;
    }
    this.scanner.read();
    return true;
  }

  private typeMismatch(expected: UdmfTokenKind, token: UdmfToken): void {
    this.addError(
      `Expected ${udmfTokenKindName(expected)}, got ${udmfTokenKindName(token.kind)}.`,
      UdmfErrorCode.TypeMismatch,
      token,
    );
  }

  private unexpected(token: UdmfToken): string {
    if (token.kind === UdmfTokenKind.EOF) return 'Unexpected end-of-file.';
    return `Unexpected token '${this.scanner.textOf(token).replace(/[\r\n]/g, '')}' found.`;
  }

  private addError(message: string, code: UdmfErrorCode, token: UdmfToken): void {
    this.errorList.push({
      message,
      code,
      line: token.line,
      column: token.column,
      position: token.start,
      length: token.end - token.start,
    });
  }
}

function parseBool(text: string): boolean | undefined {
  const lower = text.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  return undefined;
}

function decodeChars(buffer: Uint16Array, length: number): string {
  let result = '';
  for (let offset = 0; offset < length; offset += DECODE_CHUNK) {
    result += String.fromCharCode(...buffer.subarray(offset, Math.min(offset + DECODE_CHUNK, length)));
  }
  return result;
}

/** Parse a UDMF source into a fresh document of `type`. */
export function parseUdmf<D extends UdmfParsedMapData>(
  source: string,
  type: UdmfDocumentType<D>,
  options: UdmfParserOptions = {},
): UdmfParseResult<D> {
  const parser = new UdmfParser(options);
  const document = parser.parse(source, type);
  return { document, errors: [...parser.errors] };
}

/** `file:line:column: message`, or `line:column: message` without a file name. */
export function formatUdmfParseError(error: UdmfParseError, fileName?: string): string {
  const location = `${error.line}:${error.column}`;
  return `${fileName ? `${fileName}:` : ''}${location}: ${error.message}`;
}
