/**
 * Values of assignments the schema does not recognize. The variant is
 * chosen from the token that was written, not from any declared type.
 */

import type { CaseInsensitiveMap } from './case-insensitive-map.js';
import type { UdmfBlock } from './types.js';

export type UdmfUnknownAssignment =
  | { kind: 'bool'; value: boolean }
  | { kind: 'int'; value: bigint }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'identifier'; value: string };

export type UdmfUnknownAssignmentKind = UdmfUnknownAssignment['kind'];

export type UdmfUnknownAssignments = CaseInsensitiveMap<UdmfUnknownAssignment>;

// Each accessor returns undefined when the name is absent or holds another variant.
// Pass `{ unknownAssignments: document.unknownGlobalAssignments }` to read globals.

export function getUnknownBool(block: UdmfBlock, name: string): boolean | undefined {
  const assignment = block.unknownAssignments.get(name);
  return assignment?.kind === 'bool' ? assignment.value : undefined;
}

export function getUnknownInt(block: UdmfBlock, name: string): bigint | undefined {
  const assignment = block.unknownAssignments.get(name);
  return assignment?.kind === 'int' ? assignment.value : undefined;
}

export function getUnknownFloat(block: UdmfBlock, name: string): number | undefined {
  const assignment = block.unknownAssignments.get(name);
  return assignment?.kind === 'float' ? assignment.value : undefined;
}

export function getUnknownString(block: UdmfBlock, name: string): string | undefined {
  const assignment = block.unknownAssignments.get(name);
  return assignment?.kind === 'string' ? assignment.value : undefined;
}

export function getUnknownIdentifier(block: UdmfBlock, name: string): string | undefined {
  const assignment = block.unknownAssignments.get(name);
  return assignment?.kind === 'identifier' ? assignment.value : undefined;
}

/** Render a value the way it would be written in a UDMF source. */
export function describeUnknownAssignment(assignment: UdmfUnknownAssignment): string {
  switch (assignment.kind) {
    case 'bool':
      return assignment.value ? 'true' : 'false';
    case 'int':
      return assignment.value.toString();
    case 'float':
      return formatFloat(assignment.value);
    case 'string':
      return `"${assignment.value.replace(/[\\"]/g, (c) => `\\${c}`)}"`;
    case 'identifier':
      return assignment.value;
  }
}

/** Floats need a fraction to scan back as floats: `2` becomes `2.0`, `1e+21` becomes `1.0e+21`. */
function formatFloat(value: number): string {
  const text = String(value);
  if (text.includes('.') || !Number.isFinite(value)) return text;

  const exponent = text.search(/[eE]/);
  if (exponent < 0) return `${text}.0`;
  return `${text.slice(0, exponent)}.0${text.slice(exponent)}`;
}
