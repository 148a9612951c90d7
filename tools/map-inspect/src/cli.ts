/**
 * Map Inspect CLI: parse a level text file and dump it as JSON
 *
 * Usage:
 *   map-inspect --input <file.map> [--output <file.json>] [--stats]
 *   map-inspect --input <TEXTMAP.udmf> --namespace zdoom [--output <file.json>]
 *
 * Options:
 *   --input      Path to a .map or UDMF text file
 *   --output     Output JSON file (prints to stdout when omitted)
 *   --format     map | udmf (detected from the extension when omitted)
 *   --namespace  UDMF document schema: standard | zdoom (default: standard)
 *   --stats      Print summary statistics
 *   --help       Show this help message
 */

import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { basename, dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { LevelscanError } from '@levelscan/core';
import { formatQuakeMapParseError, parseQuakeMap } from '@levelscan/quake-map';
import type { QuakeMap } from '@levelscan/quake-map';
import { formatUdmfParseError, parseUdmf, standardMapDocument, zdoomMapDocument } from '@levelscan/udmf';
import type { UdmfVertex, NamespacedMapData } from '@levelscan/udmf';

export type InputFormat = 'map' | 'udmf';
export type UdmfNamespace = 'standard' | 'zdoom';

/** Where the CLI writes its messages. Tests pass a recorder. */
export interface CliIo {
  log(message: string): void;
  error(message: string): void;
}

interface CliArgs {
  input: string | undefined;
  output: string | undefined;
  format: InputFormat | undefined;
  namespace: UdmfNamespace;
  stats: boolean;
  help: boolean;
}

interface InspectResult {
  payload: unknown;
  warnings: string[];
  summary: [string, number][];
}

/** Bad command line. `runCli` reports it with the usage text. */
export class CliUsageError extends LevelscanError {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const consoleIo: CliIo = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

const MAP_EXTENSIONS = new Set(['.map']);
const UDMF_EXTENSIONS = new Set(['.udmf', '.textmap', '.txt']);

// ============================================================================
// Argument parsing
// ============================================================================

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    input: undefined,
    output: undefined,
    format: undefined,
    namespace: 'standard',
    stats: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--input':
      case '-i':
        args.input = readArgValue(argv, ++i, '--input');
        break;
      case '--output':
      case '-o':
        args.output = readArgValue(argv, ++i, '--output');
        break;
      case '--format':
      case '-f':
        args.format = readFormat(readArgValue(argv, ++i, '--format'));
        break;
      case '--namespace':
      case '-n':
        args.namespace = readNamespace(readArgValue(argv, ++i, '--namespace'));
        break;
      case '--stats':
        args.stats = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

function readArgValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index];
  if (!value) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

function readFormat(value: string): InputFormat {
  if (value === 'map' || value === 'udmf') return value;
  throw new CliUsageError(`--format must be map or udmf, got "${value}"`);
}

function readNamespace(value: string): UdmfNamespace {
  if (value === 'standard' || value === 'zdoom') return value;
  throw new CliUsageError(`--namespace must be standard or zdoom, got "${value}"`);
}

function usage(): string {
  return `
Map Inspect — @levelscan/tool-map-inspect

Usage:
  map-inspect --input <file.map> [--output <file.json>] [--stats]
  map-inspect --input <TEXTMAP.udmf> [--namespace standard|zdoom] [--output <file.json>] [--stats]

Options:
  --input,     -i   Path to a .map or UDMF text file (required)
  --output,    -o   Output JSON file (prints to stdout when omitted)
  --format,    -f   map | udmf (detected from the extension when omitted)
  --namespace, -n   UDMF document schema: standard | zdoom
  --stats           Print summary statistics
  --help,      -h   Show this help message
  `.trim();
}

/** Format implied by the file name: `.map` is MAP; `.udmf`, `.textmap`, `.txt` and `TEXTMAP` are UDMF. */
export function detectFormat(path: string): InputFormat | undefined {
  const extension = extname(path).toLowerCase();
  if (MAP_EXTENSIONS.has(extension)) return 'map';
  if (UDMF_EXTENSIONS.has(extension)) return 'udmf';
  if (basename(path).toUpperCase() === 'TEXTMAP') return 'udmf';
  return undefined;
}

// ---------------------------------------------------------------------------
// Deterministic JSON serialization
// ---------------------------------------------------------------------------

function compareKeys([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** JSON with sorted object keys. Maps become objects and bigints become strings. */
export function toSortedJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, fieldValue: unknown) => {
      if (typeof fieldValue === 'bigint') return fieldValue.toString();
      if (fieldValue instanceof Map) {
        const entries: [string, unknown][] = [];
        for (const [key, entry] of fieldValue) entries.push([String(key), entry]);
        return Object.fromEntries(entries.sort(compareKeys));
      }
      if (fieldValue !== null && typeof fieldValue === 'object' && !Array.isArray(fieldValue)) {
        const entries: [string, unknown][] = Object.entries(fieldValue);
        return Object.fromEntries(entries.sort(compareKeys));
      }
      return fieldValue;
    },
    2,
  );
}

// ---------------------------------------------------------------------------
// Inspection
// ---------------------------------------------------------------------------

function inspectQuakeMap(source: string, displayName: string): InspectResult {
  const result = parseQuakeMap(source);
  return {
    payload: { format: 'map', errors: result.errors, map: result.map },
    warnings: result.errors.map((error) => formatQuakeMapParseError(error, displayName)),
    summary: [...quakeMapSummary(result.map), ['Errors', result.errors.length]],
  };
}

function quakeMapSummary(map: QuakeMap | null): [string, number][] {
  if (!map) return [];
  let brushes = 0;
  let planes = 0;
  let valvePlanes = 0;
  for (const entity of map.entities) {
    brushes += entity.brushes.length;
    for (const brush of entity.brushes) {
      planes += brush.planes.length;
      valvePlanes += brush.planes.filter((plane) => plane.isValve220).length;
    }
  }
  return [
    ['Entities', map.entities.length],
    ['Brushes', brushes],
    ['Planes', planes],
    ['Valve 220 planes', valvePlanes],
  ];
}

function inspectUdmf(source: string, displayName: string, namespace: UdmfNamespace): InspectResult {
  const result =
    namespace === 'zdoom' ? parseUdmf(source, zdoomMapDocument) : parseUdmf(source, standardMapDocument);
  return {
    payload: { format: 'udmf', schema: namespace, errors: result.errors, document: result.document },
    warnings: result.errors.map((error) => formatUdmfParseError(error, displayName)),
    summary: [...udmfSummary(result.document), ['Errors', result.errors.length]],
  };
}

function udmfSummary(document: NamespacedMapData<UdmfVertex>): [string, number][] {
  let unknownBlocks = 0;
  for (const blocks of document.unknownBlocks.values()) unknownBlocks += blocks.length;
  return [
    ['Vertices', document.vertices.length],
    ['Linedefs', document.linedefs.length],
    ['Sidedefs', document.sidedefs.length],
    ['Sectors', document.sectors.length],
    ['Things', document.things.length],
    ['Unknown blocks', unknownBlocks],
  ];
}

// ============================================================================
// Main
// ============================================================================

/** Run the CLI with `argv` (without the node and script entries). Returns the exit code. */
export function runCli(argv: readonly string[], io: CliIo = consoleIo): number {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    io.error(`Error: ${err.message}`);
    io.error(usage());
    return 1;
  }

  if (args.help) {
    io.log(usage());
    return 0;
  }
  if (!args.input) {
    io.error('Error: --input is required');
    io.error(usage());
    return 1;
  }

  const format = args.format ?? detectFormat(args.input);
  if (!format) {
    io.error(`Error: cannot detect the format of ${args.input}; pass --format map or --format udmf`);
    return 1;
  }

  let source: string;
  try {
    source = readFileSync(resolve(args.input), 'utf-8');
  } catch (err) {
    io.error(`[ERROR] Failed to read ${args.input}: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  io.log(`Parsing: ${args.input}`);
  const result =
    format === 'map' ? inspectQuakeMap(source, args.input) : inspectUdmf(source, args.input, args.namespace);

  for (const warning of result.warnings) {
    io.error(`  [WARN] ${warning}`);
  }

  const json = toSortedJson(result.payload);
  if (args.output) {
    const outputPath = resolve(args.output);
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, json + '\n');
    io.log(`  → ${args.output}`);
  } else {
    io.log(json);
  }

  if (args.stats) {
    io.log('\n=== Summary ===');
    for (const [label, count] of result.summary) {
      io.log(`${label}: ${count}`);
    }
  }

  return result.warnings.length > 0 ? 1 : 0;
}

const entryPoint = process.argv[1];
if (entryPoint !== undefined && resolve(entryPoint) === fileURLToPath(import.meta.url)) {
  process.exitCode = runCli(process.argv.slice(2));
}
