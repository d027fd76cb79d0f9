/**
 * The parsed configuration and its dot-path lookup API.
 *
 * @packageDocumentation
 */

import { groupValue, isInt32, type GroupValue, type Value, type ValueKind } from '../value/index.js';
import { LookupError, type LookupErrorCode, type LookupResult } from './errors.js';

function ok<T>(value: T): LookupResult<T> {
  return { success: true, value };
}

function kindMismatch<T>(
  path: string,
  found: Value,
  code: LookupErrorCode,
  expected: ValueKind,
  description: string
): LookupResult<T> {
  return {
    success: false,
    error: new LookupError(`value at '${path}': value is not ${description}`, code, {
      path,
      expected,
      actual: found.kind,
    }),
  };
}

/**
 * A libconfig configuration: one root group plus typed lookups.
 *
 * Paths are dot-separated setting names (`database.credentials.user`). Empty
 * segments are ignored, so `''` and `'.'` address the root itself.
 *
 * @example
 * ```typescript
 * const result = parseString('database = { host = "localhost"; port = 5432; };');
 * if (result.success) {
 *   const port = result.config.lookupInt('database.port');
 *   if (port.success) {
 *     console.log(port.value); // 5432
 *   }
 * }
 * ```
 */
export class Config {
  /** The root group. */
  public readonly root: GroupValue;

  /**
   * Creates a configuration around a root group.
   *
   * @param root - The root group; an empty group when omitted.
   */
  constructor(root: GroupValue = groupValue()) {
    this.root = root;
  }

  /**
   * Finds the value at a path.
   *
   * @param path - Dot-separated setting names.
   * @returns The value, or a `NOT_A_GROUP` / `SETTING_NOT_FOUND` error naming the failing segment.
   */
  lookup(path: string): LookupResult<Value> {
    let current: Value = this.root;

    for (const segment of path.split('.')) {
      if (segment === '') {
        continue;
      }

      if (current.kind !== 'group') {
        return {
          success: false,
          error: new LookupError(
            `cannot lookup '${segment}': cannot lookup in non-group value`,
            'NOT_A_GROUP',
            { path, segment, actual: current.kind }
          ),
        };
      }

      const next = current.entries.get(segment);
      if (next === undefined) {
        return {
          success: false,
          error: new LookupError(`setting '${segment}': setting not found`, 'SETTING_NOT_FOUND', {
            path,
            segment,
          }),
        };
      }

      current = next;
    }

    return ok(current);
  }

  /**
   * Looks up a 32-bit integer. An `int64` value is accepted when it fits the
   * 32-bit range and reported as `INTEGER_OUT_OF_RANGE` otherwise.
   */
  lookupInt(path: string): LookupResult<number> {
    const found = this.lookup(path);
    if (!found.success) {
      return found;
    }

    const value = found.value;
    switch (value.kind) {
      case 'int':
        return ok(value.value);
      case 'int64':
        if (!isInt32(value.value)) {
          return {
            success: false,
            error: new LookupError(
              `int64 value ${value.value.toString()}: integer value out of range`,
              'INTEGER_OUT_OF_RANGE',
              { path, expected: 'int', actual: 'int64' }
            ),
          };
        }
        return ok(Number(value.value));
      default:
        return kindMismatch(path, value, 'NOT_AN_INTEGER', 'int', 'an integer');
    }
  }

  /**
   * Looks up a 64-bit integer. An `int` value is widened.
   */
  lookupInt64(path: string): LookupResult<bigint> {
    const found = this.lookup(path);
    if (!found.success) {
      return found;
    }

    const value = found.value;
    switch (value.kind) {
      case 'int':
        return ok(BigInt(value.value));
      case 'int64':
        return ok(value.value);
      default:
        return kindMismatch(path, value, 'NOT_AN_INTEGER', 'int64', 'an integer');
    }
  }

  lookupFloat(path: string): LookupResult<number> {
    const found = this.lookup(path);
    if (!found.success) {
      return found;
    }
    return found.value.kind === 'float'
      ? ok(found.value.value)
      : kindMismatch(path, found.value, 'NOT_A_FLOAT', 'float', 'a float');
  }

  lookupBool(path: string): LookupResult<boolean> {
    const found = this.lookup(path);
    if (!found.success) {
      return found;
    }
    return found.value.kind === 'bool'
      ? ok(found.value.value)
      : kindMismatch(path, found.value, 'NOT_A_BOOLEAN', 'bool', 'a boolean');
  }

  lookupString(path: string): LookupResult<string> {
    const found = this.lookup(path);
    if (!found.success) {
      return found;
    }
    return found.value.kind === 'string'
      ? ok(found.value.value)
      : kindMismatch(path, found.value, 'NOT_A_STRING', 'string', 'a string');
  }
}
