/**
 * Parsing of operator-typed sample values.
 */

import { ParseError } from '../common/errors.js';

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const HEX = /^([+-]?)0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?[pP]([+-]?\d+)$/;
const INFINITY = /^([+-]?)(?:inf|infinity)$/i;
const NAN = /^nan$/i;

/**
 * Value of a hexadecimal float such as `0x1.8p3`. The binary exponent is required.
 */
function parseHexFloat(match: RegExpExecArray): number | undefined {
  const [, sign, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  if (digits === '') return undefined;

  let mantissa = 0;
  for (const digit of digits) {
    mantissa = mantissa * 16 + parseInt(digit, 16);
  }
  if (mantissa === 0) return sign === '-' ? -0 : 0;
  const value = mantissa * 2 ** (Number(exponent) - 4 * fraction.length);
  return sign === '-' ? -value : value;
}

/**
 * Parse a line of text as a float.
 *
 * Accepts decimal notation with optional sign and exponent, hexadecimal floats
 * with a binary exponent (`0x1p-2`), optionally signed `inf` or `infinity`, and
 * `nan`, all case-insensitive. Surrounding whitespace is ignored.
 *
 * @throws ParseError when the text is not a number or overflows
 */
export function parseSample(raw: string): number {
  const text = raw.trim();

  if (NAN.test(text)) return NaN;

  const infinity = INFINITY.exec(text);
  if (infinity) {
    return infinity[1] === '-' ? -Infinity : Infinity;
  }

  let value: number | undefined;
  const hex = HEX.exec(text);
  if (hex) {
    value = parseHexFloat(hex);
  } else if (DECIMAL.test(text)) {
    value = Number(text);
  }
  if (value === undefined) {
    throw new ParseError(`not a number: ${JSON.stringify(raw)}`, raw);
  }

  if (!Number.isFinite(value)) {
    throw new ParseError(`value out of range: ${JSON.stringify(raw)}`, raw);
  }
  return value;
}

/**
 * Split gauge input into its mode and the numeric text.
 * A leading '+' means "add"; anything else sets.
 */
export function splitGaugeInput(raw: string): { mode: 'set' | 'add'; text: string } {
  const text = raw.trim();
  if (text.startsWith('+')) {
    return { mode: 'add', text: text.slice(1) };
  }
  return { mode: 'set', text };
}
