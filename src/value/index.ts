/**
 * Value model module.
 *
 * @packageDocumentation
 */

export {
  arrayValue,
  boolValue,
  floatValue,
  groupValue,
  int64Value,
  intValue,
  INT32_MAX,
  INT32_MIN,
  INT64_MAX,
  INT64_MIN,
  isGroup,
  isInt32,
  listValue,
  stringValue,
} from './constructors.js';
export { VALUE_KINDS } from './types.js';
export type {
  ArrayValue,
  BoolValue,
  FloatValue,
  GroupValue,
  Int64Value,
  IntValue,
  ListValue,
  StringValue,
  Value,
  ValueKind,
} from './types.js';
