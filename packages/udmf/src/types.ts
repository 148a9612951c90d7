import type { BufferPool } from '@levelscan/core';
import { CaseInsensitiveMap } from './case-insensitive-map.js';
import type { UdmfUnknownAssignment, UdmfUnknownAssignments } from './unknown-assignment.js';
import type { SchemaCache } from './schema-cache.js';

/** A `tag { ... }` block instance. */
export interface UdmfBlock {
  readonly unknownAssignments: UdmfUnknownAssignments;
}

/** A block whose tag the document schema does not declare. */
export class UdmfUnknownBlock implements UdmfBlock {
  readonly unknownAssignments = new CaseInsensitiveMap<UdmfUnknownAssignment>();
}

/**
 * Base class of every parsed document. Subclasses add the fields their
 * schema binds.
 */
export abstract class UdmfParsedMapData {
  /** Top-level assignments the schema does not declare. */
  readonly unknownGlobalAssignments = new CaseInsensitiveMap<UdmfUnknownAssignment>();
  /** Undeclared blocks, per tag, in source order. */
  readonly unknownBlocks = new CaseInsensitiveMap<UdmfUnknownBlock[]>();

  /** Runs once after a parse that produced no errors. */
  postProcess(): void {}
}

export enum UdmfErrorCode {
  /** A specific token was required and something else was found. */
  UnexpectedToken = 0x1001,
  /** A global identifier was followed by neither `{` nor `=`. */
  UnexpectedGlobalToken = 0x0002,
  /** The value token does not fit the declared field type. */
  TypeMismatch = 0x1002,
  /** An undeclared key was assigned twice in one scope. */
  DuplicateAssignment = 0x1003,
  /** A numeric literal is malformed or out of range for its field. */
  InvalidNumber = 0x1004,
}

export interface UdmfParseError {
  message: string;
  code: UdmfErrorCode;
  line: number;
  column: number;
  position: number;
  length: number;
}

export interface UdmfParserOptions {
  /** Defaults to the process-wide cache. */
  schemaCache?: SchemaCache;
  /** Scratch buffers for unescaping quoted strings. */
  charPool?: BufferPool<Uint16Array>;
}

export interface UdmfParseResult<D extends UdmfParsedMapData> {
  /** Always populated; treat it as unreliable when `errors` is non-empty. */
  document: D;
  errors: UdmfParseError[];
}
