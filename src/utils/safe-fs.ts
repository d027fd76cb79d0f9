/**
 * Validated synchronous file system access for document and include loading.
 *
 * Every path is checked and resolved to an absolute path before it reaches
 * `node:fs`, so an include path taken from a document can never be empty or
 * smuggle a NUL byte into a system call.
 *
 * @packageDocumentation
 */

import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates a file system path and resolves it against the working directory.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains a NUL byte.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Synchronously checks whether a path exists.
 *
 * Invalid paths are reported as missing rather than thrown, since a document
 * may name any include path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists, false otherwise.
 */
export function safeExistsSync(filePath: string): boolean {
  let validatedPath: string;
  try {
    validatedPath = validatePath(filePath);
  } catch (error) {
    if (error instanceof PathValidationError) {
      return false;
    }
    throw error;
  }
  return fsSync.existsSync(validatedPath);
}

/**
 * Synchronously reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., file not found, permission denied).
 */
export function safeReadFileSync(filePath: string): string {
  const validatedPath = validatePath(filePath);
  return fsSync.readFileSync(validatedPath, 'utf8');
}
