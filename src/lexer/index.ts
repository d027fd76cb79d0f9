/**
 * Lexer module: tokenization of libconfig text.
 *
 * @packageDocumentation
 */

export { Lexer, tokenize, UNTERMINATED_COMMENT, UNTERMINATED_STRING } from './lexer.js';
export { formatToken, PUNCTUATION } from './types.js';
export type { Token, TokenKind } from './types.js';
