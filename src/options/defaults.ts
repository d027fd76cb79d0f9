/**
 * Default parse options.
 *
 * @packageDocumentation
 */

import { nodeFileSystem } from '../parser/include-resolver.js';
import type { IncludeFileSystem } from '../parser/include-resolver.js';

/**
 * Default values for the overridable parse options. The logger has no default
 * instance: one is created per parse so that `debug` takes effect.
 */
export const DEFAULT_PARSE_OPTIONS: {
  readonly includeDir: string | undefined;
  readonly debug: boolean;
  readonly fileSystem: IncludeFileSystem;
} = {
  includeDir: undefined,
  debug: false,
  fileSystem: nodeFileSystem,
};

/** Component name used by loggers created for a parse. */
export const LOGGER_COMPONENT = 'parser';
