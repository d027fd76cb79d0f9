/**
 * Lexer for libconfig text.
 *
 * The whole input is tokenized up front; {@link Lexer} is a cursor over the
 * resulting list. Malformed input never stops tokenization: it becomes an
 * `ERROR` token and the parser reports it with its position.
 *
 * @packageDocumentation
 */

import { PUNCTUATION, type Token, type TokenKind } from './types.js';

/** ERROR token text for a string still open at end of input. */
export const UNTERMINATED_STRING = 'unterminated string';

/** ERROR token text for a block comment still open at end of input. */
export const UNTERMINATED_COMMENT = 'unterminated comment';

const WHITESPACE = /\s/u;
const LETTER = /\p{L}/u;
const UNICODE_DIGIT = /\p{Nd}/u;
const HEX_DIGIT = /[0-9a-fA-F]/;

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
  ['b', '\b'],
  ['f', '\f'],
  ['a', '\x07'],
  ['v', '\v'],
  ['\\', '\\'],
  ['"', '"'],
]);

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
  return ch === '_' || ch === '*' || (ch !== '' && LETTER.test(ch));
}

function isIdentifierPart(ch: string): boolean {
  return isIdentifierStart(ch) || ch === '-' || (ch !== '' && UNICODE_DIGIT.test(ch));
}

/**
 * Character reader tracking line and column by code point.
 * The empty string stands for end of input.
 */
class Scanner {
  private readonly chars: string[];
  private pos = 0;
  line = 1;
  column = 1;

  constructor(input: string) {
    this.chars = Array.from(input);
  }

  current(): string {
    return this.chars[this.pos] ?? '';
  }

  peek(): string {
    return this.chars[this.pos + 1] ?? '';
  }

  atEnd(): boolean {
    return this.pos >= this.chars.length;
  }

  advance(): void {
    if (this.atEnd()) {
      return;
    }
    if (this.current() === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.pos++;
  }

  /** Appends the current character to `out` and advances. */
  take(out: string[]): void {
    out.push(this.current());
    this.advance();
  }
}

function skipWhitespace(scanner: Scanner): void {
  while (!scanner.atEnd() && WHITESPACE.test(scanner.current())) {
    scanner.advance();
  }
}

function skipToEndOfLine(scanner: Scanner): void {
  while (!scanner.atEnd() && scanner.current() !== '\n') {
    scanner.advance();
  }
}

type CommentScan = 'none' | 'skipped' | 'unterminated';

function skipComment(scanner: Scanner): CommentScan {
  if (scanner.current() === '#') {
    skipToEndOfLine(scanner);
    return 'skipped';
  }
  if (scanner.current() !== '/') {
    return 'none';
  }

  const next = scanner.peek();
  if (next === '/') {
    skipToEndOfLine(scanner);
    return 'skipped';
  }
  if (next !== '*') {
    return 'none';
  }

  scanner.advance();
  scanner.advance();
  while (!scanner.atEnd()) {
    if (scanner.current() === '*' && scanner.peek() === '/') {
      scanner.advance();
      scanner.advance();
      return 'skipped';
    }
    scanner.advance();
  }
  return 'unterminated';
}

/**
 * Reads a double-quoted string, decoding escapes.
 *
 * @returns The decoded contents, or `undefined` when the closing quote is missing.
 */
function readString(scanner: Scanner): string | undefined {
  const out: string[] = [];
  scanner.advance();

  while (!scanner.atEnd() && scanner.current() !== '"') {
    if (scanner.current() !== '\\') {
      scanner.take(out);
      continue;
    }

    scanner.advance();
    if (scanner.atEnd()) {
      break;
    }

    const escaped = scanner.current();
    if (escaped === 'x') {
      scanner.advance();
      let hex = '';
      while (hex.length < 2 && HEX_DIGIT.test(scanner.current())) {
        hex += scanner.current();
        scanner.advance();
      }
      // Fewer than two digits: the escape and its digits are dropped.
      if (hex.length === 2) {
        out.push(String.fromCharCode(parseInt(hex, 16)));
      }
      continue;
    }

    out.push(SIMPLE_ESCAPES.get(escaped) ?? escaped);
    scanner.advance();
  }

  if (scanner.current() !== '"') {
    return undefined;
  }
  scanner.advance();
  return out.join('');
}

function readIdentifier(scanner: Scanner): string {
  const out: string[] = [];
  while (isIdentifierPart(scanner.current())) {
    scanner.take(out);
  }
  return out.join('');
}

function readDigits(scanner: Scanner, out: string[], accept: (ch: string) => boolean): void {
  while (scanner.current() !== '' && accept(scanner.current())) {
    scanner.take(out);
  }
}

/**
 * Reads an integer or float literal, base prefix and `L` suffix included.
 * Only digits valid for the prefix's base are consumed after it.
 */
function readNumber(scanner: Scanner): { kind: TokenKind; text: string } {
  const out: string[] = [];
  let kind: TokenKind = 'INTEGER';

  if (scanner.current() === '0') {
    scanner.take(out);
    switch (scanner.current()) {
      case 'x':
      case 'X':
        scanner.take(out);
        readDigits(scanner, out, (ch) => HEX_DIGIT.test(ch));
        break;
      case 'b':
      case 'B':
        scanner.take(out);
        readDigits(scanner, out, (ch) => ch === '0' || ch === '1');
        break;
      case 'o':
      case 'O':
      case 'q':
      case 'Q':
        scanner.take(out);
        readDigits(scanner, out, (ch) => ch >= '0' && ch <= '7');
        break;
      default:
        readDigits(scanner, out, isDigit);
    }
  } else {
    readDigits(scanner, out, isDigit);
  }

  if (scanner.current() === '.' && isDigit(scanner.peek())) {
    kind = 'FLOAT';
    scanner.take(out);
    readDigits(scanner, out, isDigit);
  }

  if (scanner.current() === 'e' || scanner.current() === 'E') {
    kind = 'FLOAT';
    scanner.take(out);
    if (scanner.current() === '+' || scanner.current() === '-') {
      scanner.take(out);
    }
    readDigits(scanner, out, isDigit);
  }

  if (scanner.current() === 'L' || scanner.current() === 'l') {
    scanner.take(out);
  }

  return { kind, text: out.join('') };
}

/**
 * Converts a complete libconfig document into tokens.
 *
 * The returned list always ends with exactly one `EOF` token.
 *
 * @param input - Full document text.
 * @returns Tokens in source order.
 */
export function tokenize(input: string): Token[] {
  const scanner = new Scanner(input);
  const tokens: Token[] = [];

  for (;;) {
    skipWhitespace(scanner);
    if (scanner.atEnd()) {
      break;
    }

    const line = scanner.line;
    const column = scanner.column;
    const emit = (kind: TokenKind, value: string): void => {
      tokens.push({ value, kind, line, column });
    };

    const comment = skipComment(scanner);
    if (comment === 'unterminated') {
      emit('ERROR', UNTERMINATED_COMMENT);
      continue;
    }
    if (comment === 'skipped') {
      continue;
    }

    const ch = scanner.current();
    const punctuation = PUNCTUATION.get(ch);

    if (punctuation !== undefined) {
      emit(punctuation, ch);
      scanner.advance();
    } else if (ch === '"') {
      const text = readString(scanner);
      if (text === undefined) {
        emit('ERROR', UNTERMINATED_STRING);
      } else {
        emit('STRING', text);
      }
    } else if (ch === '@') {
      scanner.advance();
      const directive = readIdentifier(scanner);
      if (directive === 'include') {
        emit('INCLUDE', '@include');
      } else {
        emit('ERROR', `@${directive}`);
      }
    } else if (isDigit(ch) || (ch === '-' && isDigit(scanner.peek()))) {
      let sign = '';
      if (ch === '-') {
        sign = '-';
        scanner.advance();
      }
      const { kind, text } = readNumber(scanner);
      emit(kind, sign + text);
    } else if (isIdentifierStart(ch)) {
      const identifier = readIdentifier(scanner);
      const lower = identifier.toLowerCase();
      if (lower === 'true' || lower === 'false') {
        emit('BOOLEAN', lower);
      } else {
        emit('IDENTIFIER', identifier);
      }
    } else {
      emit('ERROR', ch);
      scanner.advance();
    }
  }

  tokens.push({ value: '', kind: 'EOF', line: scanner.line, column: scanner.column });
  return tokens;
}

/**
 * Cursor over the pre-built token list of one document.
 *
 * @example
 * ```typescript
 * const lexer = new Lexer('port = 8080;');
 * lexer.peekToken().kind; // 'IDENTIFIER'
 * lexer.nextToken().value; // 'port'
 * ```
 */
export class Lexer {
  private readonly tokens: readonly Token[];
  private position = 0;

  constructor(input: string) {
    this.tokens = tokenize(input);
  }

  /** All tokens of the document, `EOF` last. */
  get allTokens(): readonly Token[] {
    return this.tokens;
  }

  /**
   * Returns the next token and advances. Once the list is exhausted the
   * `EOF` token is returned on every call.
   */
  nextToken(): Token {
    const token = this.peekToken();
    if (this.position < this.tokens.length - 1) {
      this.position++;
    }
    return token;
  }

  /** Returns the next token without consuming it. */
  peekToken(): Token {
    const token = this.tokens[this.position];
    if (token === undefined) {
      throw new Error('Lexer token list is empty');
    }
    return token;
  }
}
