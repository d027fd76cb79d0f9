/**
 * Resolution of `@include` paths against the file system.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { safeExistsSync, safeReadFileSync } from '../utils/safe-fs.js';

/** Deepest include nesting allowed; the root document is depth 0. */
export const MAX_INCLUDE_DEPTH = 10;

/** Suffixes tried, in order, when an include path does not exist as written. */
export const INCLUDE_EXTENSIONS: readonly string[] = ['.cnf', '.cfg'];

/**
 * File access needed to resolve and load included documents.
 */
export interface IncludeFileSystem {
  /**
   * Resolves an include path against the including document's directory.
   * `baseDir` is undefined for in-memory documents without an include directory.
   */
  resolve(baseDir: string | undefined, includePath: string): string;
  exists(filePath: string): boolean;
  /** Reads a whole file as text. Throws when the file cannot be read. */
  readFile(filePath: string): string;
  dirname(filePath: string): string;
}

/**
 * {@link IncludeFileSystem} backed by `node:fs` through the validated safe-fs helpers.
 */
export const nodeFileSystem: IncludeFileSystem = {
  resolve(baseDir, includePath) {
    if (baseDir === undefined || path.isAbsolute(includePath)) {
      return includePath;
    }
    return path.join(baseDir, includePath);
  },
  exists: safeExistsSync,
  readFile: safeReadFileSync,
  dirname: (filePath) => path.dirname(filePath),
};

/**
 * Result of resolving an include path.
 */
export type IncludeResolution =
  | {
      readonly success: true;
      /** First candidate that exists. */
      readonly path: string;
      readonly attemptedPaths: readonly string[];
    }
  | {
      readonly success: false;
      readonly attemptedPaths: readonly string[];
    };

/**
 * Finds the file an include directive refers to.
 *
 * Tries the resolved path as written, then with each of {@link INCLUDE_EXTENSIONS}
 * appended.
 *
 * @param fileSystem - File access to use.
 * @param baseDir - Directory of the including document, if any.
 * @param includePath - Path as written after `@include`.
 */
export function resolveInclude(
  fileSystem: IncludeFileSystem,
  baseDir: string | undefined,
  includePath: string
): IncludeResolution {
  const fullPath = fileSystem.resolve(baseDir, includePath);
  const candidates = [fullPath, ...INCLUDE_EXTENSIONS.map((extension) => fullPath + extension)];
  const attemptedPaths: string[] = [];

  for (const candidate of candidates) {
    attemptedPaths.push(candidate);
    if (fileSystem.exists(candidate)) {
      return { success: true, path: candidate, attemptedPaths };
    }
  }

  return { success: false, attemptedPaths };
}
