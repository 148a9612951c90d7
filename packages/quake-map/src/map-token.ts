/**
 * Token model for the brush-map text format.
 *
 * Tokens never copy text out of the source; `start`/`end` index into the
 * buffer the scanner was initialized with.
 */

export enum QuakeTokenKind {
  Undetermined,
  EOF,

  Text,
  Integer,
  Float,
  QuotedString,
  BraceOpen,
  BraceClose,
  ParensOpen,
  ParensClose,
  BracketOpen,
  BracketClose,
}

export interface QuakeToken {
  readonly kind: QuakeTokenKind;
  /** Offset of the first character. */
  readonly start: number;
  /** Offset one past the last character. */
  readonly end: number;
  /** 1-based. */
  readonly line: number;
  /** 1-based. */
  readonly column: number;
}

const KIND_NAMES: Record<QuakeTokenKind, string> = {
  [QuakeTokenKind.Undetermined]: 'Undetermined token',
  [QuakeTokenKind.EOF]: 'EOF',
  [QuakeTokenKind.Text]: 'Text',
  [QuakeTokenKind.Integer]: 'Integer',
  [QuakeTokenKind.Float]: 'Float',
  [QuakeTokenKind.QuotedString]: 'String',
  [QuakeTokenKind.BraceOpen]: "'{'",
  [QuakeTokenKind.BraceClose]: "'}'",
  [QuakeTokenKind.ParensOpen]: "'('",
  [QuakeTokenKind.ParensClose]: "')'",
  [QuakeTokenKind.BracketOpen]: "'['",
  [QuakeTokenKind.BracketClose]: "']'",
};

/** Human-readable token kind for diagnostics. */
export function quakeTokenKindName(kind: QuakeTokenKind): string {
  return KIND_NAMES[kind];
}

export function tokenLength(token: QuakeToken): number {
  return token.end - token.start;
}
