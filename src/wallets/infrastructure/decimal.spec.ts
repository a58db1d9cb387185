import { Types } from 'mongoose';
import { fromDecimal128, toDecimal128 } from './decimal';

describe('decimal', () => {
  it('stores amounts beyond the safe integer range', () => {
    expect(toDecimal128(123_456_789_012_345_678_901n).toString()).toBe('123456789012345678901');
  });

  it.each([
    ['5000000000000000000000', 5_000_000_000_000_000_000_000n],
    ['5E+21', 5_000_000_000_000_000_000_000n],
    ['1.5E+3', 1500n],
    ['-42', -42n],
    ['0', 0n],
  ])('reads %s', (text, expected) => {
    expect(fromDecimal128(Types.Decimal128.fromString(text))).toBe(expected);
  });

  it('treats a missing value as zero', () => {
    expect(fromDecimal128(undefined)).toBe(0n);
  });

  it('refuses fractional amounts', () => {
    expect(() => fromDecimal128(Types.Decimal128.fromString('1.5'))).toThrow('Stored amount 1.5 is not integral');
  });
});
