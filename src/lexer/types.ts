/**
 * Token types produced by the libconfig lexer.
 *
 * @packageDocumentation
 */

/**
 * Kind of a lexical token.
 *
 * `ASSIGN` covers both `=` and `:`. `ERROR` tokens carry the offending text and
 * are left for the parser to reject.
 */
export type TokenKind =
  | 'EOF'
  | 'IDENTIFIER'
  | 'STRING'
  | 'INTEGER'
  | 'FLOAT'
  | 'BOOLEAN'
  | 'ASSIGN'
  | 'SEMICOLON'
  | 'COMMA'
  | 'LEFT_BRACE'
  | 'RIGHT_BRACE'
  | 'LEFT_BRACKET'
  | 'RIGHT_BRACKET'
  | 'LEFT_PAREN'
  | 'RIGHT_PAREN'
  | 'INCLUDE'
  | 'ERROR';

/**
 * A single lexical unit with its 1-based source position.
 */
export interface Token {
  /** Token text. Decoded contents for strings, lower-cased text for booleans. */
  readonly value: string;
  readonly kind: TokenKind;
  readonly line: number;
  readonly column: number;
}

/** Punctuation characters and the token kind each one maps to. */
export const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['=', 'ASSIGN'],
  [':', 'ASSIGN'],
  [';', 'SEMICOLON'],
  [',', 'COMMA'],
  ['{', 'LEFT_BRACE'],
  ['}', 'RIGHT_BRACE'],
  ['[', 'LEFT_BRACKET'],
  [']', 'RIGHT_BRACKET'],
  ['(', 'LEFT_PAREN'],
  [')', 'RIGHT_PAREN'],
]);

/**
 * Renders a token for diagnostics.
 *
 * @example
 * ```typescript
 * formatToken({ value: 'port', kind: 'IDENTIFIER', line: 2, column: 5 });
 * // '{IDENTIFIER: "port" at 2:5}'
 * ```
 */
export function formatToken(token: Token): string {
  return `{${token.kind}: ${JSON.stringify(token.value)} at ${String(token.line)}:${String(token.column)}}`;
}
