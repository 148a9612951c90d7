import { describe, it, expect } from 'vitest';
import { QuakeMapScanner } from './map-scanner.js';
import { QuakeTokenKind, quakeTokenKindName } from './map-token.js';

function kinds(source: string): QuakeTokenKind[] {
  const scanner = new QuakeMapScanner(source);
  const result: QuakeTokenKind[] = [];
  for (let token = scanner.read(); token.kind !== QuakeTokenKind.EOF; token = scanner.read()) {
    result.push(token.kind);
  }
  return result;
}

function texts(source: string): string[] {
  const scanner = new QuakeMapScanner(source);
  const result: string[] = [];
  for (let token = scanner.read(); token.kind !== QuakeTokenKind.EOF; token = scanner.read()) {
    result.push(scanner.textOf(token));
  }
  return result;
}

describe('QuakeMapScanner', () => {
  it('returns EOF for empty input, repeatedly', () => {
    const scanner = new QuakeMapScanner('');
    expect(scanner.read().kind).toBe(QuakeTokenKind.EOF);
    expect(scanner.read().kind).toBe(QuakeTokenKind.EOF);
  });

  it('scans punctuation', () => {
    expect(kinds('{ } ( ) [ ]')).toEqual([
      QuakeTokenKind.BraceOpen,
      QuakeTokenKind.BraceClose,
      QuakeTokenKind.ParensOpen,
      QuakeTokenKind.ParensClose,
      QuakeTokenKind.BracketOpen,
      QuakeTokenKind.BracketClose,
    ]);
  });

  it('distinguishes integers from floats', () => {
    expect(kinds('16 -64 0.5 -1.25 1e3 2E-2')).toEqual([
      QuakeTokenKind.Integer,
      QuakeTokenKind.Integer,
      QuakeTokenKind.Float,
      QuakeTokenKind.Float,
      QuakeTokenKind.Float,
      QuakeTokenKind.Float,
    ]);
    expect(texts('16 -64 0.5 -1.25 1e3 2E-2')).toEqual(['16', '-64', '0.5', '-1.25', '1e3', '2E-2']);
  });

  it('scans texture names as text, including continuation characters', () => {
    expect(texts('base/wall_01 *water __TB_empty sky+0 a-b{c}(d)')).toEqual([
      'base/wall_01',
      '*water',
      '__TB_empty',
      'sky+0',
      'a-b{c}(d)',
    ]);
    expect(kinds('a-b{c}(d)')).toEqual([QuakeTokenKind.Text]);
  });

  it('keeps quotes in the token text', () => {
    expect(texts('"classname" "info_player_start"')).toEqual(['"classname"', '"info_player_start"']);
    expect(kinds('"a" "b"')).toEqual([QuakeTokenKind.QuotedString, QuakeTokenKind.QuotedString]);
  });

  it('runs an unterminated string to end of input', () => {
    const scanner = new QuakeMapScanner('"open\n}');
    const token = scanner.read();
    expect(token.kind).toBe(QuakeTokenKind.QuotedString);
    expect(scanner.textOf(token)).toBe('"open\n}');
    expect(scanner.read().kind).toBe(QuakeTokenKind.EOF);
  });

  it('skips line comments', () => {
    expect(texts('// Game: test\n{ // trailing\n}')).toEqual(['{', '}']);
    expect(kinds('// only a comment')).toEqual([]);
  });

  it('reports characters outside every class as undetermined', () => {
    expect(kinds('# +1 \u0000')).toEqual([
      QuakeTokenKind.Undetermined,
      QuakeTokenKind.Undetermined,
      QuakeTokenKind.Integer,
      QuakeTokenKind.Undetermined,
    ]);
  });

  it('tracks 1-based lines and columns', () => {
    const scanner = new QuakeMapScanner('{\n  "a" "b"\n}');
    const open = scanner.read();
    const key = scanner.read();
    const value = scanner.read();
    const close = scanner.read();

    expect([open.line, open.column, open.start]).toEqual([1, 1, 0]);
    expect([key.line, key.column, key.start, key.end]).toEqual([2, 3, 4, 7]);
    expect([value.line, value.column]).toEqual([2, 7]);
    expect([close.line, close.column]).toEqual([3, 1]);
  });

  it('returns the same token from repeated peeks', () => {
    const scanner = new QuakeMapScanner('# {');
    const first = scanner.peek();
    expect(scanner.peek()).toBe(first);
    expect(scanner.read()).toBe(first);
    expect(first.kind).toBe(QuakeTokenKind.Undetermined);
    expect(scanner.read().kind).toBe(QuakeTokenKind.BraceOpen);
  });

  it('can be re-initialized and reset', () => {
    const scanner = new QuakeMapScanner('{');
    scanner.read();
    scanner.reset();
    expect(scanner.read().kind).toBe(QuakeTokenKind.BraceOpen);

    scanner.init('\n\n)');
    const token = scanner.read();
    expect(token.kind).toBe(QuakeTokenKind.ParensClose);
    expect(token.line).toBe(3);
    expect(scanner.currentLine).toBe(3);
    expect(scanner.currentColumn).toBe(2);
    expect(scanner.currentPosition).toBe(3);
  });
});

describe('quakeTokenKindName', () => {
  it('names kinds for diagnostics', () => {
    expect(quakeTokenKindName(QuakeTokenKind.BraceOpen)).toBe("'{'");
    expect(quakeTokenKindName(QuakeTokenKind.QuotedString)).toBe('String');
    expect(quakeTokenKindName(QuakeTokenKind.Undetermined)).toBe('Undetermined token');
  });
});
