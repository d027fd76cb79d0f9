/**
 * Errors raised while parsing libconfig documents.
 *
 * @packageDocumentation
 */

import type { TokenKind } from '../lexer/index.js';
import type { ValueKind } from '../value/index.js';

/**
 * Error codes for parse failures.
 */
export type ParseErrorCode =
  | 'UNEXPECTED_TOKEN' // No value can start with the current token
  | 'EXPECTED_TOKEN' // A specific token kind was required
  | 'EXPECTED_IDENTIFIER' // A setting must start with a name
  | 'EXPECTED_ASSIGNMENT' // A setting name must be followed by '=' or ':'
  | 'EXPECTED_STRING_AFTER_INCLUDE'
  | 'LEXICAL_ERROR' // The lexer produced an ERROR token
  | 'INVALID_INTEGER'
  | 'INVALID_FLOAT'
  | 'ARRAY_TYPE_MISMATCH'
  | 'INCLUDE_FILE_NOT_FOUND'
  | 'INCLUDE_DEPTH_EXCEEDED'
  | 'FILE_READ_FAILED';

/**
 * Structured details attached to a {@link ParseError}.
 */
export interface ParseErrorDetails {
  /** 1-based line of the offending token. */
  readonly line?: number;
  /** 1-based column of the offending token. */
  readonly column?: number;
  /** File being parsed, when the input came from a file. */
  readonly file?: string;
  /** Token kind or value kind the grammar required. */
  readonly expected?: TokenKind | ValueKind;
  /** Token kind or value kind actually found. */
  readonly actual?: TokenKind | ValueKind;
  /** Include path as written in the document. */
  readonly includePath?: string;
  /** Candidate paths tried while resolving an include. */
  readonly attemptedPaths?: readonly string[];
  /** Include depth at which the error occurred. */
  readonly depth?: number;
  readonly cause?: Error;
}

/**
 * Error class for libconfig parse failures.
 *
 * Every failure aborts the whole parse; no partial configuration is produced.
 */
export class ParseError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: ParseErrorCode;
  public readonly line: number | undefined;
  public readonly column: number | undefined;
  public readonly file: string | undefined;
  public readonly expected: TokenKind | ValueKind | undefined;
  public readonly actual: TokenKind | ValueKind | undefined;
  public readonly includePath: string | undefined;
  public readonly attemptedPaths: readonly string[];
  public readonly depth: number | undefined;
  /** The underlying error, e.g. the failure inside an included file. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ParseError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param details - Position and context of the failure.
   */
  constructor(message: string, code: ParseErrorCode, details: ParseErrorDetails = {}) {
    super(message);
    this.name = 'ParseError';
    this.code = code;
    this.line = details.line;
    this.column = details.column;
    this.file = details.file;
    this.expected = details.expected;
    this.actual = details.actual;
    this.includePath = details.includePath;
    this.attemptedPaths = details.attemptedPaths ?? [];
    this.depth = details.depth;
    this.cause = details.cause;
  }
}
