import { describe, it, expect } from 'vitest';
import { isInIntegerRange, parseFloatLiteral, parseIntegerLiteral } from './numeric-literal.js';

describe('parseIntegerLiteral', () => {
  it('decodes decimal, hexadecimal and octal forms', () => {
    expect(parseIntegerLiteral('42')).toBe(42n);
    expect(parseIntegerLiteral('0x1A')).toBe(26n);
    expect(parseIntegerLiteral('0XFF')).toBe(255n);
    expect(parseIntegerLiteral('017')).toBe(15n);
    expect(parseIntegerLiteral('0')).toBe(0n);
    expect(parseIntegerLiteral('00')).toBe(0n);
  });

  it('applies a sign to every form', () => {
    expect(parseIntegerLiteral('-5')).toBe(-5n);
    expect(parseIntegerLiteral('+7')).toBe(7n);
    expect(parseIntegerLiteral('-0x10')).toBe(-16n);
    expect(parseIntegerLiteral('-017')).toBe(-15n);
  });

  it('keeps precision beyond 53 bits', () => {
    expect(parseIntegerLiteral('18446744073709551615')).toBe(18446744073709551615n);
    expect(parseIntegerLiteral('0xFFFFFFFFFFFFFFFF')).toBe(18446744073709551615n);
  });

  it('rejects text that is not an integer literal', () => {
    expect(parseIntegerLiteral('08')).toBeNull();
    expect(parseIntegerLiteral('0x')).toBeNull();
    expect(parseIntegerLiteral('1.5')).toBeNull();
    expect(parseIntegerLiteral('')).toBeNull();
    expect(parseIntegerLiteral('ten')).toBeNull();
  });
});

describe('isInIntegerRange', () => {
  it('checks each declared width', () => {
    expect(isInIntegerRange(2147483647n, 'int32')).toBe(true);
    expect(isInIntegerRange(2147483648n, 'int32')).toBe(false);
    expect(isInIntegerRange(-2147483648n, 'int32')).toBe(true);
    expect(isInIntegerRange(-1n, 'uint32')).toBe(false);
    expect(isInIntegerRange(4294967295n, 'uint32')).toBe(true);
    expect(isInIntegerRange(9223372036854775808n, 'int64')).toBe(false);
    expect(isInIntegerRange(18446744073709551615n, 'uint64')).toBe(true);
    expect(isInIntegerRange(18446744073709551616n, 'uint64')).toBe(false);
  });
});

describe('parseFloatLiteral', () => {
  it('decodes float tokens', () => {
    expect(parseFloatLiteral('1.5', false)).toBe(1.5);
    expect(parseFloatLiteral('-1.5e-3', false)).toBeCloseTo(-0.0015, 12);
    expect(parseFloatLiteral('2.', false)).toBe(2);
  });

  it('decodes integer tokens in any base', () => {
    expect(parseFloatLiteral('16', true)).toBe(16);
    expect(parseFloatLiteral('0x10', true)).toBe(16);
    expect(parseFloatLiteral('010', true)).toBe(8);
    expect(parseFloatLiteral('09', true)).toBeNull();
  });
});
