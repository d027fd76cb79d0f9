/**
 * Public entry points: parse libconfig text from a string, bytes, a file or a
 * readable stream.
 *
 * Every entry point returns a {@link ParseResult}; parse failures are never
 * thrown.
 *
 * @packageDocumentation
 */

import { performance } from 'node:perf_hooks';
import type { Config } from '../config/index.js';
import { resolveParseOptions, type ParseOptions, type ParseOptionsInput } from '../options/index.js';
import { ParseError } from './errors.js';
import { parseDocument } from './parser.js';

/**
 * Result of parsing a document.
 */
export type ParseResult =
  | { readonly success: true; readonly config: Config }
  | { readonly success: false; readonly error: ParseError };

/** Converts a thrown ParseError into a failed result; anything else propagates. */
function toFailure(error: unknown): ParseResult {
  if (error instanceof ParseError) {
    return { success: false, error };
  }
  throw error;
}

function run(
  input: string,
  options: ParseOptions,
  baseDir: string | undefined,
  file: string | undefined
): ParseResult {
  const startTime = performance.now();

  let config: Config;
  try {
    config = parseDocument(input, {
      depth: 0,
      baseDir,
      file,
      fileSystem: options.fileSystem,
      logger: options.logger,
    });
  } catch (error) {
    return toFailure(error);
  }

  options.logger.debug('parse_completed', {
    ...(file !== undefined ? { file } : {}),
    settings: config.root.entries.size,
    durationMs: Math.round((performance.now() - startTime) * 100) / 100,
  });

  return { success: true, config };
}

/**
 * Parses a document held in memory.
 *
 * Includes are resolved against `options.includeDir` (or `LIBCONFIG_INCLUDE_DIR`);
 * without one, include paths are used as written.
 *
 * @example
 * ```typescript
 * const result = parseString('name = "MyApp"; version = 1;');
 * if (result.success) {
 *   result.config.lookupString('name'); // { success: true, value: 'MyApp' }
 * } else {
 *   console.error(result.error.code, result.error.message);
 * }
 * ```
 */
export function parseString(input: string, options: ParseOptionsInput = {}): ParseResult {
  const resolved = resolveParseOptions(options);
  return run(input, resolved, resolved.includeDir, undefined);
}

/**
 * Parses UTF-8 encoded bytes. Behaves like {@link parseString}.
 */
export function parseBytes(bytes: Uint8Array, options: ParseOptionsInput = {}): ParseResult {
  return parseString(new TextDecoder('utf-8').decode(bytes), options);
}

/**
 * Parses a file. Includes are resolved against the file's own directory.
 *
 * @param filePath - Path of the document.
 * @param options - Parse options; `includeDir` is not used.
 * @returns The configuration, or a `FILE_READ_FAILED` error when the file cannot be read.
 */
export function parseFile(filePath: string, options: ParseOptionsInput = {}): ParseResult {
  const resolved = resolveParseOptions(options);
  const { fileSystem } = resolved;

  let text: string;
  try {
    text = fileSystem.readFile(filePath);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return {
      success: false,
      error: new ParseError(`failed to read file '${filePath}': ${cause.message}`, 'FILE_READ_FAILED', {
        file: filePath,
        cause,
      }),
    };
  }

  return run(text, resolved, fileSystem.dirname(filePath), filePath);
}

/**
 * Buffers a stream to its end, then parses it like {@link parseString}.
 *
 * A stream that fails is treated as empty input: the chunks read before the
 * failure are discarded and the failure is logged as `input_read_failed` at
 * warn level.
 *
 * @param source - Any async iterable of chunks, such as a `Readable`.
 */
export async function parseReadable(
  source: AsyncIterable<Uint8Array | string>,
  options: ParseOptionsInput = {}
): Promise<ParseResult> {
  const resolved = resolveParseOptions(options);
  let chunks: Buffer[] = [];

  try {
    for await (const chunk of source) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
    }
  } catch (error) {
    resolved.logger.warn('input_read_failed', {
      reason: error instanceof Error ? error.message : String(error),
      bytesDiscarded: chunks.reduce((total, chunk) => total + chunk.length, 0),
    });
    chunks = [];
  }

  return run(Buffer.concat(chunks).toString('utf-8'), resolved, resolved.includeDir, undefined);
}
