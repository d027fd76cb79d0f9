/**
 * Conversion of numeric literal text into values.
 *
 * @packageDocumentation
 */

import {
  floatValue,
  int64Value,
  intValue,
  INT64_MAX,
  INT64_MIN,
  isInt32,
  type FloatValue,
  type Int64Value,
  type IntValue,
} from '../value/index.js';

/**
 * Result of converting a literal.
 */
export type LiteralResult<T> =
  | {
      readonly success: true;
      readonly value: T;
    }
  | {
      readonly success: false;
      readonly reason: string;
    };

interface Radix {
  readonly base: 2 | 8 | 10 | 16;
  /** Lower-cased prefix as written in libconfig text. */
  readonly prefix: string;
  /** Prefix understood by `BigInt()`. */
  readonly bigintPrefix: string;
  readonly digits: RegExp;
}

const RADIXES: readonly Radix[] = [
  { base: 16, prefix: '0x', bigintPrefix: '0x', digits: /^[0-9a-f]+$/i },
  { base: 2, prefix: '0b', bigintPrefix: '0b', digits: /^[01]+$/ },
  { base: 8, prefix: '0o', bigintPrefix: '0o', digits: /^[0-7]+$/ },
  { base: 8, prefix: '0q', bigintPrefix: '0o', digits: /^[0-7]+$/ },
];

const DECIMAL: Radix = { base: 10, prefix: '', bigintPrefix: '', digits: /^[0-9]+$/ };

const FLOAT_PATTERN = /^-?[0-9]+(\.[0-9]+)?([eE][+-]?[0-9]+)?$/;

function detectRadix(text: string): Radix {
  const head = text.slice(0, 2).toLowerCase();
  return RADIXES.find((radix) => radix.prefix === head) ?? DECIMAL;
}

/**
 * Converts integer literal text to an `int` or `int64` value.
 *
 * The `L`/`l` suffix forces `int64`; a value outside the signed 32-bit range
 * is `int64` as well. A leading `-` may precede a base prefix.
 *
 * @param text - Literal text as produced by the lexer, e.g. `0xFF`, `-42`, `7L`.
 * @returns The converted value, or the reason it is not a valid integer.
 *
 * @example
 * ```typescript
 * parseIntegerLiteral('0o755'); // { success: true, value: { kind: 'int', value: 493 } }
 * parseIntegerLiteral('42L'); // { success: true, value: { kind: 'int64', value: 42n } }
 * ```
 */
export function parseIntegerLiteral(text: string): LiteralResult<IntValue | Int64Value> {
  let body = text.trim();

  const forceLong = body.endsWith('L') || body.endsWith('l');
  if (forceLong) {
    body = body.slice(0, -1);
  }

  const negative = body.startsWith('-');
  if (negative) {
    body = body.slice(1);
  }

  const radix = detectRadix(body);
  const digits = body.slice(radix.prefix.length);

  if (!radix.digits.test(digits)) {
    return {
      success: false,
      reason: `invalid integer literal '${text}': expected base-${String(radix.base)} digits`,
    };
  }

  const magnitude = BigInt(radix.bigintPrefix + digits);
  const parsed = negative ? -magnitude : magnitude;

  if (parsed < INT64_MIN || parsed > INT64_MAX) {
    return {
      success: false,
      reason: `invalid integer literal '${text}': value out of 64-bit range`,
    };
  }

  if (forceLong || !isInt32(parsed)) {
    return { success: true, value: int64Value(parsed) };
  }
  return { success: true, value: intValue(Number(parsed)) };
}

/**
 * Converts float literal text to a `float` value.
 *
 * @param text - Literal text such as `3.14`, `-2.5E+3` or `1e10`.
 */
export function parseFloatLiteral(text: string): LiteralResult<FloatValue> {
  if (!FLOAT_PATTERN.test(text)) {
    return { success: false, reason: `invalid float literal '${text}'` };
  }
  return { success: true, value: floatValue(Number(text)) };
}
