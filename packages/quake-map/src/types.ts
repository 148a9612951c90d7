import type { BufferPool, Vector2, Vector3 } from '@levelscan/core';

/** A parsed brush-map file. */
export interface QuakeMap {
  entities: QuakeEntity[];
}

export interface QuakeEntity {
  /** Quoted key/value pairs, quotes stripped. A repeated key keeps the last value. */
  keyValues: Map<string, string>;
  brushes: QuakeBrush[];
}

/** A convex solid bounded by its planes. */
export interface QuakeBrush {
  planes: QuakePlane[];
}

export interface QuakePlane {
  point1: Vector3;
  point2: Vector3;
  point3: Vector3;

  texture: string;

  /** True when the plane was written with bracketed `[ x y z offset ]` texture axes. */
  isValve220: boolean;
  /** Zero for the legacy dialect. */
  axis1: Vector3;
  /** Zero for the legacy dialect. */
  axis2: Vector3;

  offsets: Vector2;
  rotation: number;
  scale: Vector2;
}

export interface QuakeMapParseError {
  message: string;
  line: number;
  column: number;
  /** Offset of the offending token in the source. */
  position: number;
  /** Length of the offending token. */
  length: number;
}

export interface QuakeMapParseResult {
  /** `null` whenever `errors` is non-empty. */
  map: QuakeMap | null;
  errors: QuakeMapParseError[];
}

export interface QuakeMapParserOptions {
  /** Scratch lists for an entity's brushes while it is being parsed. */
  brushPool?: BufferPool<QuakeBrush[]>;
  /** Scratch lists for a brush's planes while it is being parsed. */
  planePool?: BufferPool<QuakePlane[]>;
}
