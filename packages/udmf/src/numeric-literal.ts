/**
 * Numeric literal decoding for UDMF values.
 *
 * Integers: `0x1A` is hexadecimal, `017` octal, anything else decimal. A
 * leading sign applies to every form.
 */

const HEX_LITERAL = /^([+-]?)0[xX]([0-9a-fA-F]+)$/;
const OCTAL_LITERAL = /^([+-]?)0([0-7]+)$/;
const DECIMAL_LITERAL = /^[+-]?(?:0|[1-9]\d*)$/;

export type IntegerWidth = 'int32' | 'uint32' | 'int64';

const INTEGER_RANGES: Record<IntegerWidth | 'uint64', readonly [bigint, bigint]> = {
  int32: [-(2n ** 31n), 2n ** 31n - 1n],
  uint32: [0n, 2n ** 32n - 1n],
  int64: [-(2n ** 63n), 2n ** 63n - 1n],
  uint64: [0n, 2n ** 64n - 1n],
};

/** Decode an integer literal, or `null` when the text is not one. */
export function parseIntegerLiteral(text: string): bigint | null {
  const hex = HEX_LITERAL.exec(text);
  if (hex) {
    const magnitude = BigInt(`0x${hex[2]}`);
    return hex[1] === '-' ? -magnitude : magnitude;
  }

  const octal = OCTAL_LITERAL.exec(text);
  if (octal) {
    const magnitude = BigInt(`0o${octal[2]}`);
    return octal[1] === '-' ? -magnitude : magnitude;
  }

  if (DECIMAL_LITERAL.test(text)) {
    return BigInt(text);
  }

  return null;
}

export function isInIntegerRange(value: bigint, width: keyof typeof INTEGER_RANGES): boolean {
  const [min, max] = INTEGER_RANGES[width];
  return value >= min && value <= max;
}

/**
 * Decode a float literal. Integer literals are accepted too (a float field
 * may be written `16`), in any of their three bases.
 */
export function parseFloatLiteral(text: string, isInteger: boolean): number | null {
  if (isInteger) {
    const value = parseIntegerLiteral(text);
    return value === null ? null : Number(value);
  }

  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}
