/**
 * Errors returned by path lookups on a {@link Config}.
 *
 * @packageDocumentation
 */

import type { ValueKind } from '../value/index.js';

/**
 * Error codes for lookup failures.
 *
 * `NOT_A_GROUP` and `SETTING_NOT_FOUND` describe the path; the remaining codes
 * describe the value found at the end of it.
 */
export type LookupErrorCode =
  | 'NOT_A_GROUP'
  | 'SETTING_NOT_FOUND'
  | 'NOT_AN_INTEGER'
  | 'NOT_A_FLOAT'
  | 'NOT_A_BOOLEAN'
  | 'NOT_A_STRING'
  | 'INTEGER_OUT_OF_RANGE';

/**
 * Error class for failed lookups. Lookups never modify the configuration.
 */
export class LookupError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: LookupErrorCode;
  /** The full path passed to the lookup. */
  public readonly path: string;
  /** The path segment at which traversal stopped, for path errors. */
  public readonly segment: string | undefined;
  /** Kind the typed lookup asked for. */
  public readonly expected: ValueKind | undefined;
  /** Kind of the value actually found. */
  public readonly actual: ValueKind | undefined;

  /**
   * Creates a new LookupError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param details - The path and, where relevant, the segment and kinds involved.
   */
  constructor(
    message: string,
    code: LookupErrorCode,
    details: {
      path: string;
      segment?: string;
      expected?: ValueKind;
      actual?: ValueKind;
    }
  ) {
    super(message);
    this.name = 'LookupError';
    this.code = code;
    this.path = details.path;
    this.segment = details.segment;
    this.expected = details.expected;
    this.actual = details.actual;
  }
}

/**
 * Result of a lookup.
 */
export type LookupResult<T> =
  | {
      readonly success: true;
      readonly value: T;
    }
  | {
      readonly success: false;
      readonly error: LookupError;
    };
