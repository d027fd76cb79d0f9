/**
 * Constructors and range helpers for {@link Value}.
 *
 * Constructors do no validation: the parser decides between `int` and `int64`
 * before calling them.
 *
 * @packageDocumentation
 */

import type {
  ArrayValue,
  BoolValue,
  FloatValue,
  GroupValue,
  Int64Value,
  IntValue,
  ListValue,
  StringValue,
  Value,
} from './types.js';

/** Smallest signed 32-bit integer. */
export const INT32_MIN = -2147483648;

/** Largest signed 32-bit integer. */
export const INT32_MAX = 2147483647;

/** Smallest signed 64-bit integer. */
export const INT64_MIN = -(2n ** 63n);

/** Largest signed 64-bit integer. */
export const INT64_MAX = 2n ** 63n - 1n;

/**
 * Checks whether an integer fits the signed 32-bit range.
 */
export function isInt32(n: number | bigint): boolean {
  if (typeof n === 'bigint') {
    return n >= BigInt(INT32_MIN) && n <= BigInt(INT32_MAX);
  }
  return Number.isInteger(n) && n >= INT32_MIN && n <= INT32_MAX;
}

export function intValue(value: number): IntValue {
  return { kind: 'int', value };
}

export function int64Value(value: bigint): Int64Value {
  return { kind: 'int64', value };
}

export function floatValue(value: number): FloatValue {
  return { kind: 'float', value };
}

export function boolValue(value: boolean): BoolValue {
  return { kind: 'bool', value };
}

export function stringValue(value: string): StringValue {
  return { kind: 'string', value };
}

export function arrayValue(elements: readonly Value[] = []): ArrayValue {
  return { kind: 'array', elements: [...elements] };
}

export function listValue(elements: readonly Value[] = []): ListValue {
  return { kind: 'list', elements: [...elements] };
}

function isEntryIterable(
  source: Iterable<readonly [string, Value]> | Readonly<Record<string, Value>>
): source is Iterable<readonly [string, Value]> {
  return Symbol.iterator in source;
}

/**
 * Creates a group from a map, an iterable of entries or a plain record.
 * Later entries overwrite earlier ones with the same name.
 *
 * @example
 * ```typescript
 * const database = groupValue({ host: stringValue('localhost'), port: intValue(5432) });
 * database.entries.get('port'); // { kind: 'int', value: 5432 }
 * ```
 */
export function groupValue(
  source: Iterable<readonly [string, Value]> | Readonly<Record<string, Value>> = []
): GroupValue {
  const entries = new Map<string, Value>();
  const pairs = isEntryIterable(source) ? source : Object.entries(source);
  for (const [name, value] of pairs) {
    entries.set(name, value);
  }
  return { kind: 'group', entries };
}

/**
 * Narrows a value to a group.
 */
export function isGroup(value: Value): value is GroupValue {
  return value.kind === 'group';
}
