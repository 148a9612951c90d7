/**
 * Token model for the UDMF text format.
 */

export enum UdmfTokenKind {
  Undetermined,
  EOF,

  Identifier,
  Integer,
  Float,
  QuotedString,
  BraceOpen,
  BraceClose,
  Equals,
  Semicolon,
}

export interface UdmfToken {
  readonly kind: UdmfTokenKind;
  readonly start: number;
  readonly end: number;
  readonly line: number;
  readonly column: number;
}

const KIND_NAMES: Record<UdmfTokenKind, string> = {
  [UdmfTokenKind.Undetermined]: 'Undetermined token',
  [UdmfTokenKind.EOF]: 'EOF',
  [UdmfTokenKind.Identifier]: 'Identifier',
  [UdmfTokenKind.Integer]: 'Integer',
  [UdmfTokenKind.Float]: 'Float',
  [UdmfTokenKind.QuotedString]: 'String',
  [UdmfTokenKind.BraceOpen]: "'{'",
  [UdmfTokenKind.BraceClose]: "'}'",
  [UdmfTokenKind.Equals]: "'='",
  [UdmfTokenKind.Semicolon]: "';'",
};

export function udmfTokenKindName(kind: UdmfTokenKind): string {
  return KIND_NAMES[kind];
}

/** Token kinds that may appear on the right-hand side of an assignment. */
export function isValueToken(kind: UdmfTokenKind): boolean {
  return (
    kind === UdmfTokenKind.Identifier ||
    kind === UdmfTokenKind.Integer ||
    kind === UdmfTokenKind.Float ||
    kind === UdmfTokenKind.QuotedString
  );
}
