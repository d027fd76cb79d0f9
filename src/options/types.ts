/**
 * Parse option types.
 *
 * @packageDocumentation
 */

import type { IncludeFileSystem } from '../parser/include-resolver.js';
import type { Logger } from '../utils/logger.js';

/**
 * Fully resolved options for one parse.
 */
export interface ParseOptions {
  /**
   * Directory that includes in in-memory documents are resolved against.
   * Files parsed with `parseFile` always use their own directory. When unset,
   * include paths in in-memory documents are used as written.
   */
  readonly includeDir: string | undefined;
  /** Whether debug-level log entries are written. */
  readonly debug: boolean;
  /** File access used to resolve and read includes and files. */
  readonly fileSystem: IncludeFileSystem;
  /** Logger receiving parse events. */
  readonly logger: Logger;
}

/**
 * Options accepted by the parse entry points. Missing fields fall back to
 * environment overrides, then to defaults.
 */
export type ParseOptionsInput = Partial<ParseOptions>;

/**
 * Overridable option values as read from the environment.
 */
export interface EnvOptions {
  includeDir?: string;
  debug?: boolean;
}
