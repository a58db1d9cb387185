import { Types } from 'mongoose';

export function toDecimal128(value: bigint): Types.Decimal128 {
  return Types.Decimal128.fromString(value.toString());
}

/**
 * Decimal128 values come back from the server either as plain integers or in
 * exponent form ("5E+21") after arithmetic; both map to the same bigint.
 */
export function fromDecimal128(value: Types.Decimal128 | null | undefined): bigint {
  if (!value) return 0n;
  const text = value.toString();
  const match = /^(-?)(\d+)(?:\.(\d+))?(?:E([+-]?\d+))?$/i.exec(text);
  if (!match) {
    throw new Error(`Stored amount ${text} is not a decimal number`);
  }
  const [, sign, integer, fraction = '', exponentText = '0'] = match;
  let digits = integer + fraction;
  const exponent = parseInt(exponentText, 10) - fraction.length;

  if (exponent >= 0) {
    digits += '0'.repeat(exponent);
  } else {
    digits = digits.padStart(1 - exponent, '0');
    const dropped = digits.slice(digits.length + exponent);
    if (/[^0]/.test(dropped)) {
      throw new Error(`Stored amount ${text} is not integral`);
    }
    digits = digits.slice(0, digits.length + exponent);
  }
  return BigInt(sign + digits);
}
