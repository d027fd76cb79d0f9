import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
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
  VALUE_KINDS,
} from './index.js';

describe('Value constructors', () => {
  it('should tag each scalar with its kind', () => {
    expect(intValue(42)).toEqual({ kind: 'int', value: 42 });
    expect(int64Value(42n)).toEqual({ kind: 'int64', value: 42n });
    expect(floatValue(3.14)).toEqual({ kind: 'float', value: 3.14 });
    expect(boolValue(true)).toEqual({ kind: 'bool', value: true });
    expect(stringValue('hello')).toEqual({ kind: 'string', value: 'hello' });
  });

  it('should create empty containers by default', () => {
    expect(arrayValue().elements).toEqual([]);
    expect(listValue().elements).toEqual([]);
    expect(groupValue().entries.size).toBe(0);
  });

  it('should copy the element list it is given', () => {
    const elements = [intValue(1)];
    const array = arrayValue(elements);
    elements.push(intValue(2));

    expect(array.elements).toHaveLength(1);
  });

  it('should keep list elements of mixed kinds in order', () => {
    const list = listValue([stringValue('s'), intValue(1), boolValue(false)]);

    expect(list.elements.map((element) => element.kind)).toEqual(['string', 'int', 'bool']);
  });

  describe('groupValue', () => {
    it('should accept a plain record', () => {
      const group = groupValue({ host: stringValue('localhost'), port: intValue(5432) });

      expect([...group.entries.keys()]).toEqual(['host', 'port']);
      expect(group.entries.get('port')).toEqual(intValue(5432));
    });

    it('should accept an iterable of entries', () => {
      const group = groupValue([
        ['a', intValue(1)],
        ['b', intValue(2)],
      ]);

      expect([...group.entries.keys()]).toEqual(['a', 'b']);
    });

    it('should let a later entry overwrite an earlier one', () => {
      const group = groupValue([
        ['a', intValue(1)],
        ['a', intValue(2)],
      ]);

      expect(group.entries.size).toBe(1);
      expect(group.entries.get('a')).toEqual(intValue(2));
    });

    it('should not share its map with a source map', () => {
      const source = new Map([['a', intValue(1)]]);
      const group = groupValue(source);
      source.set('b', intValue(2));

      expect(group.entries.has('b')).toBe(false);
    });
  });

  describe('isGroup', () => {
    it('should narrow only group values', () => {
      expect(isGroup(groupValue())).toBe(true);
      expect(isGroup(listValue())).toBe(false);
    });
  });

  describe('isInt32', () => {
    it('should accept the 32-bit boundaries', () => {
      expect(isInt32(INT32_MAX)).toBe(true);
      expect(isInt32(INT32_MIN)).toBe(true);
      expect(isInt32(2147483648n)).toBe(false);
      expect(isInt32(-2147483649n)).toBe(false);
    });

    it('should reject non-integral numbers', () => {
      expect(isInt32(1.5)).toBe(false);
    });

    it('should agree for numbers and bigints', () => {
      fc.assert(
        fc.property(fc.bigInt({ min: INT64_MIN, max: INT64_MAX }), (n) => {
          return isInt32(n) === (n >= -2147483648n && n <= 2147483647n);
        })
      );
    });
  });

  it('should list the eight value kinds', () => {
    expect(VALUE_KINDS).toEqual(['int', 'int64', 'float', 'bool', 'string', 'array', 'group', 'list']);
  });
});
