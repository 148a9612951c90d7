import { describe, it, expect } from 'vitest';
import { CharBufferPool, ContractViolationError } from '@levelscan/core';
import { CaseInsensitiveMap } from './case-insensitive-map.js';
import { SchemaCache } from './schema-cache.js';
import type { UdmfBlockType, UdmfDocumentType } from './schema.js';
import { UdmfErrorCode, UdmfParsedMapData } from './types.js';
import type { UdmfBlock } from './types.js';
import { UdmfParser, formatUdmfParseError, parseUdmf } from './udmf-parser.js';
import { getUnknownBool, getUnknownFloat, getUnknownIdentifier, getUnknownInt, getUnknownString } from './unknown-assignment.js';
import type { UdmfUnknownAssignment } from './unknown-assignment.js';

class Marker implements UdmfBlock {
  readonly unknownAssignments = new CaseInsensitiveMap<UdmfUnknownAssignment>();
  label = '';
  count = 0;
  unsigned = 0;
  big = 0n;
  ubig = 0n;
  weight = 0;
  precise = 0;
  visible = false;
}

class TestDocument extends UdmfParsedMapData {
  title = '';
  version = 0;
  markers: Marker[] = [];
  postProcessCalls = 0;

  override postProcess(): void {
    this.postProcessCalls++;
  }
}

const markerBlock: UdmfBlockType<Marker> = {
  name: 'marker',
  create: () => new Marker(),
  describe: (schema) =>
    schema
      .string('label', (m, value) => { m.label = value; })
      .int32('count', (m, value) => { m.count = value; })
      .uint32('unsigned', (m, value) => { m.unsigned = value; })
      .int64('big', (m, value) => { m.big = value; })
      .uint64('ubig', (m, value) => { m.ubig = value; })
      .float32('weight', (m, value) => { m.weight = value; })
      .float64('precise', (m, value) => { m.precise = value; })
      .bool('visible', (m, value) => { m.visible = value; }),
};

const testDocument: UdmfDocumentType<TestDocument> = {
  name: 'test',
  create: () => new TestDocument(),
  describe: (schema) =>
    schema
      .string('title', (d, value) => { d.title = value; })
      .int32('version', (d, value) => { d.version = value; })
      .blocks('marker', markerBlock, (d) => d.markers),
};

function parse(source: string) {
  return parseUdmf(source, testDocument);
}

function onlyMarker(source: string): Marker {
  const { document, errors } = parse(source);
  expect(errors).toEqual([]);
  expect(document.markers).toHaveLength(1);
  return document.markers[0]!;
}

describe('parseUdmf', () => {
  it('binds global assignments and blocks', () => {
    const { document, errors } = parse('title = "Test map";\nversion = 3;\nmarker { label = "a"; }\nmarker { label = "b"; }');
    expect(errors).toEqual([]);
    expect(document.title).toBe('Test map');
    expect(document.version).toBe(3);
    expect(document.markers.map((m) => m.label)).toEqual(['a', 'b']);
  });

  it('leaves declared block lists empty when no block is written', () => {
    const { document } = parse('title = "x";');
    expect(document.markers).toEqual([]);
    expect(document.unknownBlocks.size).toBe(0);
    expect(document.unknownGlobalAssignments.size).toBe(0);
  });

  it('matches keys and block tags case-insensitively', () => {
    const { document, errors } = parse('TITLE = "upper";\nMarker { LABEL = "a"; Visible = TRUE; }');
    expect(errors).toEqual([]);
    expect(document.title).toBe('upper');
    expect(document.markers[0]!.label).toBe('a');
    expect(document.markers[0]!.visible).toBe(true);
  });

  it('keeps undeclared keys with the variant of their token', () => {
    const marker = onlyMarker(
      'marker { label = "a"; Greeting = "hello"; flag = true; answer = 42; mode = bareword; ratio = 0.5; }',
    );

    expect(marker.label).toBe('a');
    expect(getUnknownString(marker, 'greeting')).toBe('hello');
    expect(getUnknownBool(marker, 'FLAG')).toBe(true);
    expect(getUnknownInt(marker, 'answer')).toBe(42n);
    expect(getUnknownIdentifier(marker, 'mode')).toBe('bareword');
    expect(getUnknownFloat(marker, 'ratio')).toBe(0.5);
    expect([...marker.unknownAssignments.keys()]).toEqual(['Greeting', 'flag', 'answer', 'mode', 'ratio']);
    expect(marker.unknownAssignments.has('label')).toBe(false);
  });

  it('keeps undeclared global assignments', () => {
    const { document, errors } = parse('title = "x"; editor_version = 0x10; author = "someone";');
    expect(errors).toEqual([]);
    expect([...document.unknownGlobalAssignments]).toEqual([
      ['editor_version', { kind: 'int', value: 16n }],
      ['author', { kind: 'string', value: 'someone' }],
    ]);
  });

  it('collects undeclared blocks per tag in source order', () => {
    const { document, errors } = parse('light { x = 1; }\nsound { }\nLIGHT { x = 2; }');
    expect(errors).toEqual([]);
    expect([...document.unknownBlocks.keys()]).toEqual(['light', 'sound']);

    const lights = document.unknownBlocks.get('Light')!;
    expect(lights.map((block) => getUnknownInt(block, 'x'))).toEqual([1n, 2n]);
    expect(document.unknownBlocks.get('sound')![0]!.unknownAssignments.size).toBe(0);
  });

  it('lets a repeated declared key overwrite without an error', () => {
    const marker = onlyMarker('marker { count = 1; COUNT = 2; }');
    expect(marker.count).toBe(2);
  });

  it('reports a repeated undeclared key once and keeps the first value', () => {
    const { document, errors } = parse('marker { count = 1; count = 2; extra = 1; extra = 2; }');
    expect(errors).toEqual([
      {
        message: "Duplicate assignment 'extra'.",
        code: UdmfErrorCode.DuplicateAssignment,
        line: 1,
        column: 43,
        position: 42,
        length: 5,
      },
    ]);
    expect(document.markers[0]!.count).toBe(2);
    expect(getUnknownInt(document.markers[0]!, 'extra')).toBe(1n);
  });

  it('treats keys differing only in case as duplicates', () => {
    const { document, errors } = parse('Editor = 1; EDITOR = 2;');
    expect(errors.map((e) => e.code)).toEqual([UdmfErrorCode.DuplicateAssignment]);
    expect([...document.unknownGlobalAssignments.keys()]).toEqual(['Editor']);
  });
});

describe('parseUdmf numeric values', () => {
  it('decodes hexadecimal, octal and negative integers', () => {
    expect(onlyMarker('marker { count = 0x1A; }').count).toBe(26);
    expect(onlyMarker('marker { count = 017; }').count).toBe(15);
    expect(onlyMarker('marker { count = -5; }').count).toBe(-5);
    expect(onlyMarker('marker { big = -0x10; }').big).toBe(-16n);
  });

  it('decodes floats at their declared width', () => {
    const marker = onlyMarker('marker { weight = 1.5; precise = -1.5e-3; }');
    expect(marker.weight).toBe(1.5);
    expect(marker.precise).toBeCloseTo(-0.0015, 12);

    expect(onlyMarker('marker { weight = 0.1; }').weight).toBe(Math.fround(0.1));
    expect(onlyMarker('marker { precise = 0.1; }').precise).toBe(0.1);
  });

  it('accepts integer tokens for float fields', () => {
    expect(onlyMarker('marker { weight = 16; }').weight).toBe(16);
    expect(onlyMarker('marker { precise = 0x20; }').precise).toBe(32);
  });

  it('keeps 64-bit values exact', () => {
    expect(onlyMarker('marker { ubig = 18446744073709551615; }').ubig).toBe(18446744073709551615n);
    expect(onlyMarker('marker { big = -9223372036854775808; }').big).toBe(-9223372036854775808n);
    expect(onlyMarker('marker { unsigned = 4294967295; }').unsigned).toBe(4294967295);
  });

  it('reports integers outside the declared width', () => {
    const { document, errors } = parse('marker { count = 2147483648; unsigned = -1; }');
    expect(errors.map((e) => [e.code, e.message])).toEqual([
      [UdmfErrorCode.InvalidNumber, "Integer literal '2147483648' is out of range for int32."],
      [UdmfErrorCode.InvalidNumber, "Integer literal '-1' is out of range for uint32."],
    ]);
    expect(document.markers[0]!.count).toBe(0);
  });

  it('reports an invalid octal literal', () => {
    const { errors } = parse('marker { count = 09; }');
    expect(errors.map((e) => e.message)).toEqual(["Invalid numeric literal '09'."]);
  });

  it('reports an undeclared integer outside the 64-bit range', () => {
    const { errors } = parse('huge = 9223372036854775808;');
    expect(errors.map((e) => [e.code, e.message])).toEqual([
      [UdmfErrorCode.InvalidNumber, "Invalid numeric literal '9223372036854775808'."],
    ]);
  });
});

describe('parseUdmf type checks', () => {
  it('reports a value of the wrong kind and keeps parsing the block', () => {
    const source = [
      'marker {',
      '  count = "x";',
      '  visible = 1;',
      '  label = bare;',
      '  weight = true;',
      '  precise = 2.5;',
      '}',
    ].join('\n');
    const { document, errors } = parse(source);

    expect(errors.map((e) => [e.code, e.message, e.line, e.column])).toEqual([
      [UdmfErrorCode.TypeMismatch, 'Expected Integer, got String.', 2, 11],
      [UdmfErrorCode.TypeMismatch, 'Expected bool, got Integer.', 3, 13],
      [UdmfErrorCode.TypeMismatch, 'Expected String, got Identifier.', 4, 11],
      [UdmfErrorCode.TypeMismatch, 'Expected Float, got Identifier.', 5, 12],
    ]);
    expect(document.markers[0]!.precise).toBe(2.5);
  });

  it('rejects identifiers other than true and false for bools', () => {
    const { errors } = parse('marker { visible = yes; }');
    expect(errors.map((e) => e.message)).toEqual(['Expected bool, got Identifier.']);
  });
});

describe('parseUdmf strings', () => {
  it('unescapes quotes and backslashes', () => {
    expect(onlyMarker('marker { label = "say \\"hi\\" \\\\ done"; }').label).toBe('say "hi" \\ done');
  });

  it('keeps other backslash sequences as written', () => {
    expect(onlyMarker('marker { label = "a\\nb"; }').label).toBe('a\\nb');
  });

  it('keeps empty strings', () => {
    expect(onlyMarker('marker { label = ""; }').label).toBe('');
  });

  it('returns scratch buffers to the pool it was given', () => {
    const charPool = new CharBufferPool();
    const { document, errors } = parseUdmf('title = "\\"quoted\\"";', testDocument, { charPool });
    expect(errors).toEqual([]);
    expect(document.title).toBe('"quoted"');
    expect(charPool.retainedCount).toBe(1);
  });
});

describe('parseUdmf syntax errors', () => {
  it('surfaces an unterminated string instead of hanging', () => {
    const { document, errors } = parse('title = "never closed;\nversion = 2;');
    expect(errors.length).toBeGreaterThan(0);
    expect(errors[0]).toMatchObject({
      code: UdmfErrorCode.UnexpectedToken,
      message: 'Unexpected token \'"never closed;version = 2;\' found. Expected a value.',
      line: 1,
      column: 9,
    });
    expect(document.postProcessCalls).toBe(0);
  });

  it('ignores an unterminated block comment', () => {
    const { document, errors } = parse('title = "a"; /* never closed');
    expect(errors).toEqual([]);
    expect(document.title).toBe('a');
  });

  it('reports a missing semicolon and resumes at the next key', () => {
    const { document, errors } = parse('marker { label = "a" count = 2; }');
    expect(errors.map((e) => [e.code, e.message])).toEqual([
      [UdmfErrorCode.UnexpectedToken, "Unexpected token 'count' found. Expected ';'."],
    ]);
    expect(document.markers[0]!.label).toBe('');
    expect(document.markers[0]!.count).toBe(2);
  });

  it('reports a missing equals sign', () => {
    const { errors } = parse('marker { label "a"; }');
    expect(errors[0]).toMatchObject({
      code: UdmfErrorCode.UnexpectedToken,
      message: 'Unexpected token \'"a"\' found. Expected \'=\'.',
    });
  });

  it('reports a global identifier followed by neither a block nor an assignment', () => {
    const { errors } = parse('title "x";\nversion = 1;');
    expect(errors.map((e) => [e.code, e.message])).toEqual([
      [UdmfErrorCode.UnexpectedGlobalToken, 'Unexpected token \'"x"\' found.'],
      [UdmfErrorCode.UnexpectedToken, "Unexpected token ';' found. Expected Identifier."],
    ]);
  });

  it('skips stray global tokens and keeps parsing', () => {
    const { document, errors } = parse('} 42 title = "ok";');
    expect(errors.map((e) => e.message)).toEqual([
      "Unexpected token '}' found. Expected Identifier.",
      "Unexpected token '42' found. Expected Identifier.",
    ]);
    expect(document.title).toBe('ok');
  });

  it('reports a block left open at end of input', () => {
    const { document, errors } = parse('marker { label = "a";');
    expect(errors.map((e) => e.message)).toEqual(["Unexpected end-of-file. Expected '}'."]);
    expect(document.markers[0]!.label).toBe('a');
  });

  it('reports a nested block as an unexpected token', () => {
    const { errors } = parse('marker { inner { } }');
    expect(errors[0]).toMatchObject({
      code: UdmfErrorCode.UnexpectedToken,
      message: "Unexpected token '{' found. Expected '='.",
    });
  });
});

describe('post-processing', () => {
  it('runs once after an error-free parse', () => {
    const { document } = parse('title = "x";');
    expect(document.postProcessCalls).toBe(1);
  });

  it('is skipped when any error was reported', () => {
    const { document, errors } = parse('title = 1;');
    expect(errors).toHaveLength(1);
    expect(document.postProcessCalls).toBe(0);
  });
});

describe('UdmfParser', () => {
  it('resets its errors between parses', () => {
    const parser = new UdmfParser();
    parser.parse('title = 1;', testDocument);
    expect(parser.errors).toHaveLength(1);

    const document = parser.parse('title = "ok";', testDocument);
    expect(parser.errors).toEqual([]);
    expect(document.title).toBe('ok');
  });

  it('uses the schema cache it was given', () => {
    const schemaCache = new SchemaCache();
    const parser = new UdmfParser({ schemaCache });
    parser.parse('', testDocument);
    parser.parse('', testDocument);
    expect(schemaCache.size).toBe(2);
  });

  it('rejects a source that is not a string', () => {
    const parser = new UdmfParser();
    expect(() => parser.parse(undefined as unknown as string, testDocument)).toThrow(ContractViolationError);
  });
});

describe('formatUdmfParseError', () => {
  it('prefixes the location', () => {
    const error = {
      message: "Duplicate assignment 'x'.",
      code: UdmfErrorCode.DuplicateAssignment,
      line: 4,
      column: 2,
      position: 30,
      length: 1,
    };
    expect(formatUdmfParseError(error, 'TEXTMAP')).toBe("TEXTMAP:4:2: Duplicate assignment 'x'.");
    expect(formatUdmfParseError(error)).toBe("4:2: Duplicate assignment 'x'.");
  });
});
