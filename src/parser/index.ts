/**
 * Parser module: libconfig documents to configurations.
 *
 * @packageDocumentation
 */

export { ParseError } from './errors.js';
export type { ParseErrorCode, ParseErrorDetails } from './errors.js';
export {
  INCLUDE_EXTENSIONS,
  MAX_INCLUDE_DEPTH,
  nodeFileSystem,
  resolveInclude,
} from './include-resolver.js';
export type { IncludeFileSystem, IncludeResolution } from './include-resolver.js';
export { parseFloatLiteral, parseIntegerLiteral } from './literals.js';
export type { LiteralResult } from './literals.js';
export { parseBytes, parseFile, parseReadable, parseString } from './parse.js';
export type { ParseResult } from './parse.js';
export { Parser, parseDocument } from './parser.js';
export type { ParseContext } from './parser.js';
