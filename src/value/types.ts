/**
 * In-memory value model for libconfig settings.
 *
 * @packageDocumentation
 */

/**
 * The eight libconfig value kinds.
 */
export type ValueKind = 'int' | 'int64' | 'float' | 'bool' | 'string' | 'array' | 'group' | 'list';

/** All value kinds, in declaration order. */
export const VALUE_KINDS: readonly ValueKind[] = [
  'int',
  'int64',
  'float',
  'bool',
  'string',
  'array',
  'group',
  'list',
];

/** 32-bit signed integer. */
export interface IntValue {
  readonly kind: 'int';
  readonly value: number;
}

/** 64-bit signed integer, either suffixed `L` or too large for 32 bits. */
export interface Int64Value {
  readonly kind: 'int64';
  readonly value: bigint;
}

/** 64-bit IEEE floating point number. */
export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

/**
 * Ordered sequence whose elements all share one kind.
 * An empty array has no element kind yet.
 */
export interface ArrayValue {
  readonly kind: 'array';
  readonly elements: readonly Value[];
}

/**
 * Named settings. Keys are unique; iteration follows insertion order.
 */
export interface GroupValue {
  readonly kind: 'group';
  readonly entries: Map<string, Value>;
}

/** Ordered sequence of values of any kinds. */
export interface ListValue {
  readonly kind: 'list';
  readonly elements: readonly Value[];
}

/**
 * A libconfig value. Exactly one representation is active, selected by `kind`.
 */
export type Value =
  | IntValue
  | Int64Value
  | FloatValue
  | BoolValue
  | StringValue
  | ArrayValue
  | GroupValue
  | ListValue;

