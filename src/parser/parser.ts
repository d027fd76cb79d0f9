/**
 * Recursive-descent parser for libconfig documents.
 *
 * Grammar (top level and group bodies share the same rules):
 *
 * ```
 * config   := (setting | include)*
 * setting  := IDENTIFIER ASSIGN value [';']
 * include  := INCLUDE STRING [';']
 * value    := STRING+ | INTEGER | FLOAT | BOOLEAN | group | array | list
 * group    := '{' (setting | include)* '}'
 * array    := '[' (value (',' value)* [','])? ']'
 * list     := '(' (value (',' value)* [','])? ')'
 * ```
 *
 * The first error aborts the parse. Group, array and list nesting is limited
 * only by the call stack; include nesting by {@link MAX_INCLUDE_DEPTH}.
 *
 * @packageDocumentation
 */

import { Config } from '../config/index.js';
import { Lexer, type Token, type TokenKind } from '../lexer/index.js';
import type { Logger } from '../utils/logger.js';
import {
  arrayValue,
  boolValue,
  groupValue,
  listValue,
  stringValue,
  type Value,
} from '../value/index.js';
import { ParseError, type ParseErrorCode, type ParseErrorDetails } from './errors.js';
import { MAX_INCLUDE_DEPTH, resolveInclude, type IncludeFileSystem } from './include-resolver.js';
import { parseFloatLiteral, parseIntegerLiteral } from './literals.js';

/**
 * State threaded through one document parse and into its includes.
 */
export interface ParseContext {
  /** Include nesting depth; 0 for the root document. */
  readonly depth: number;
  /** Directory include paths are resolved against. */
  readonly baseDir: string | undefined;
  /** Path of the document being parsed, when it came from a file. */
  readonly file: string | undefined;
  readonly fileSystem: IncludeFileSystem;
  readonly logger: Logger;
}

function describePosition(token: Token): string {
  return `line ${String(token.line)}, column ${String(token.column)}`;
}

/**
 * Re-raises an error from an included file with the including file's context,
 * keeping its code and location.
 */
function wrapIncludeError(inner: ParseError, filePath: string): ParseError {
  return new ParseError(`error parsing included file '${filePath}': ${inner.message}`, inner.code, {
    line: inner.line,
    column: inner.column,
    file: inner.file,
    expected: inner.expected,
    actual: inner.actual,
    includePath: inner.includePath,
    attemptedPaths: inner.attemptedPaths,
    depth: inner.depth,
    cause: inner,
  });
}

/**
 * Parses one document from a token cursor.
 *
 * @example
 * ```typescript
 * const parser = new Parser(new Lexer('port = 8080;'), context);
 * const config = parser.parse();
 * ```
 */
export class Parser {
  private readonly lexer: Lexer;
  private readonly context: ParseContext;
  private currentToken: Token;

  constructor(lexer: Lexer, context: ParseContext) {
    this.lexer = lexer;
    this.context = context;
    this.currentToken = lexer.nextToken();
  }

  /**
   * Parses the whole document.
   *
   * @returns The configuration whose root group holds the top-level settings.
   * @throws ParseError on the first syntax, semantic or include error.
   */
  parse(): Config {
    const root = new Map<string, Value>();
    this.parseSettings(root, 'EOF');
    return new Config(groupValue(root));
  }

  private current(): Token {
    return this.currentToken;
  }

  private advance(): void {
    this.currentToken = this.lexer.nextToken();
  }

  private error(
    message: string,
    code: ParseErrorCode,
    token: Token,
    details: ParseErrorDetails = {}
  ): ParseError {
    return new ParseError(message, code, {
      line: token.line,
      column: token.column,
      file: this.context.file,
      depth: this.context.depth,
      ...details,
    });
  }

  /**
   * Builds the error for a current token the grammar does not allow here.
   * ERROR tokens are always reported as lexical errors.
   */
  private unexpected(code: ParseErrorCode, wanted: string, expected?: TokenKind): ParseError {
    const token = this.current();
    if (token.kind === 'ERROR') {
      return this.error(
        `invalid input '${token.value}' at ${describePosition(token)}`,
        'LEXICAL_ERROR',
        token,
        { actual: 'ERROR' }
      );
    }
    return this.error(
      `expected ${wanted}, got ${token.kind} at ${describePosition(token)}`,
      code,
      token,
      { expected, actual: token.kind }
    );
  }

  private expect(kind: TokenKind): void {
    if (this.current().kind !== kind) {
      throw this.unexpected('EXPECTED_TOKEN', kind, kind);
    }
    this.advance();
  }

  /**
   * Parses settings and includes into `target` until `closing` (or EOF).
   * The closing token itself is left for the caller.
   */
  private parseSettings(target: Map<string, Value>, closing: 'EOF' | 'RIGHT_BRACE'): void {
    while (this.current().kind !== closing && this.current().kind !== 'EOF') {
      if (this.current().kind === 'INCLUDE') {
        this.parseInclude(target);
        continue;
      }

      const [name, value] = this.parseSetting();
      target.set(name, value);

      if (this.current().kind === 'SEMICOLON') {
        this.advance();
      }
    }
  }

  private parseSetting(): [string, Value] {
    if (this.current().kind !== 'IDENTIFIER') {
      throw this.unexpected('EXPECTED_IDENTIFIER', 'identifier', 'IDENTIFIER');
    }
    const name = this.current().value;
    this.advance();

    if (this.current().kind !== 'ASSIGN') {
      throw this.unexpected('EXPECTED_ASSIGNMENT', 'assignment operator', 'ASSIGN');
    }
    this.advance();

    return [name, this.parseValue()];
  }

  private parseValue(): Value {
    const token = this.current();

    switch (token.kind) {
      case 'STRING': {
        // Adjacent string literals concatenate.
        const parts: string[] = [];
        while (this.current().kind === 'STRING') {
          parts.push(this.current().value);
          this.advance();
        }
        return stringValue(parts.join(''));
      }

      case 'INTEGER': {
        const result = parseIntegerLiteral(token.value);
        if (!result.success) {
          throw this.error(`${result.reason} at ${describePosition(token)}`, 'INVALID_INTEGER', token);
        }
        this.advance();
        return result.value;
      }

      case 'FLOAT': {
        const result = parseFloatLiteral(token.value);
        if (!result.success) {
          throw this.error(`${result.reason} at ${describePosition(token)}`, 'INVALID_FLOAT', token);
        }
        this.advance();
        return result.value;
      }

      case 'BOOLEAN':
        this.advance();
        return boolValue(token.value.toLowerCase() === 'true');

      case 'LEFT_BRACE':
        return this.parseGroup();

      case 'LEFT_BRACKET':
        return arrayValue(this.parseSequence('LEFT_BRACKET', 'RIGHT_BRACKET', true));

      case 'LEFT_PAREN':
        return listValue(this.parseSequence('LEFT_PAREN', 'RIGHT_PAREN', false));

      default:
        throw this.unexpected('UNEXPECTED_TOKEN', 'a value');
    }
  }

  private parseGroup(): Value {
    this.expect('LEFT_BRACE');
    const entries = new Map<string, Value>();
    this.parseSettings(entries, 'RIGHT_BRACE');
    this.expect('RIGHT_BRACE');
    return groupValue(entries);
  }

  /**
   * Parses a comma-separated value sequence. A trailing comma is allowed.
   * With `homogeneous`, every element must share the first element's kind.
   */
  private parseSequence(open: TokenKind, close: TokenKind, homogeneous: boolean): Value[] {
    this.expect(open);
    const elements: Value[] = [];

    if (this.current().kind === close) {
      this.advance();
      return elements;
    }

    for (;;) {
      const start = this.current();
      const element = this.parseValue();
      const first = elements[0];

      if (homogeneous && first !== undefined && element.kind !== first.kind) {
        throw this.error(
          `array elements must have the same type, got ${first.kind} and ${element.kind} at line ${String(start.line)}`,
          'ARRAY_TYPE_MISMATCH',
          start,
          { expected: first.kind, actual: element.kind }
        );
      }
      elements.push(element);

      if (this.current().kind !== 'COMMA') {
        break;
      }
      this.advance();
      if (this.current().kind === close) {
        break;
      }
    }

    this.expect(close);
    return elements;
  }

  /**
   * Handles `@include "path"` by parsing the file and merging its top-level
   * settings into `target`, overwriting settings of the same name.
   */
  private parseInclude(target: Map<string, Value>): void {
    const directive = this.current();
    const { depth, baseDir, fileSystem, logger } = this.context;

    if (depth >= MAX_INCLUDE_DEPTH) {
      throw this.error(
        `include depth limit exceeded (${String(MAX_INCLUDE_DEPTH)}) at line ${String(directive.line)}`,
        'INCLUDE_DEPTH_EXCEEDED',
        directive
      );
    }
    this.advance();

    if (this.current().kind !== 'STRING') {
      throw this.unexpected('EXPECTED_STRING_AFTER_INCLUDE', 'string after @include', 'STRING');
    }
    const includePath = this.current().value;
    this.advance();

    if (this.current().kind === 'SEMICOLON') {
      this.advance();
    }

    const resolution = resolveInclude(fileSystem, baseDir, includePath);
    if (!resolution.success) {
      logger.debug('include_failed', {
        includePath,
        attemptedPaths: resolution.attemptedPaths,
        depth,
      });
      throw this.error(
        `include file '${includePath}' not found (tried: ${resolution.attemptedPaths.join(', ')})`,
        'INCLUDE_FILE_NOT_FOUND',
        directive,
        { includePath, attemptedPaths: resolution.attemptedPaths }
      );
    }

    logger.debug('include_resolved', { includePath, path: resolution.path, depth: depth + 1 });

    const included = this.parseIncludedFile(resolution.path, directive);
    for (const [name, value] of included.root.entries) {
      target.set(name, value);
    }
  }

  private parseIncludedFile(filePath: string, directive: Token): Config {
    const { depth, fileSystem } = this.context;

    let text: string;
    try {
      text = fileSystem.readFile(filePath);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw this.error(
        `failed to read included file '${filePath}': ${cause.message}`,
        'FILE_READ_FAILED',
        directive,
        { includePath: filePath, cause }
      );
    }

    try {
      return parseDocument(text, {
        ...this.context,
        depth: depth + 1,
        baseDir: fileSystem.dirname(filePath),
        file: filePath,
      });
    } catch (error) {
      if (error instanceof ParseError) {
        throw wrapIncludeError(error, filePath);
      }
      throw error;
    }
  }
}

/**
 * Parses a complete document in the given context.
 *
 * @param input - Document text.
 * @param context - Depth, base directory and collaborators for this document.
 * @throws ParseError on the first error.
 */
export function parseDocument(input: string, context: ParseContext): Config {
  return new Parser(new Lexer(input), context).parse();
}
