/**
 * libconfig-ts
 *
 * Parser and typed lookup API for libconfig configuration files.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

// Entry points
export { parseBytes, parseFile, parseReadable, parseString, type ParseResult } from './parser/index.js';

// Parser internals and include handling
export {
  ParseError,
  Parser,
  parseDocument,
  parseFloatLiteral,
  parseIntegerLiteral,
  resolveInclude,
  nodeFileSystem,
  INCLUDE_EXTENSIONS,
  MAX_INCLUDE_DEPTH,
  type ParseErrorCode,
  type ParseErrorDetails,
  type ParseContext,
  type IncludeFileSystem,
  type IncludeResolution,
  type LiteralResult,
} from './parser/index.js';

// Configuration and lookups
export { Config, LookupError, type LookupErrorCode, type LookupResult } from './config/index.js';

// Value model
export {
  arrayValue,
  boolValue,
  floatValue,
  groupValue,
  int64Value,
  intValue,
  listValue,
  stringValue,
  isGroup,
  isInt32,
  INT32_MAX,
  INT32_MIN,
  INT64_MAX,
  INT64_MIN,
  VALUE_KINDS,
  type Value,
  type ValueKind,
  type IntValue,
  type Int64Value,
  type FloatValue,
  type BoolValue,
  type StringValue,
  type ArrayValue,
  type GroupValue,
  type ListValue,
} from './value/index.js';

// Lexer
export {
  Lexer,
  tokenize,
  formatToken,
  PUNCTUATION,
  UNTERMINATED_COMMENT,
  UNTERMINATED_STRING,
  type Token,
  type TokenKind,
} from './lexer/index.js';

// Options
export {
  resolveParseOptions,
  readEnvOverrides,
  getEnvVarDocumentation,
  EnvCoercionError,
  DEFAULT_PARSE_OPTIONS,
  type ParseOptions,
  type ParseOptionsInput,
  type EnvOptions,
  type EnvRecord,
  type EnvOverrideResult,
} from './options/index.js';

// Utilities
export { Logger, type LogLevel, type LogEntry, type LoggerOptions } from './utils/logger.js';
export { PathValidationError, validatePath } from './utils/safe-fs.js';
