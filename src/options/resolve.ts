/**
 * Resolution of parse options from caller input, environment and defaults.
 *
 * @packageDocumentation
 */

import { Logger } from '../utils/logger.js';
import { DEFAULT_PARSE_OPTIONS, LOGGER_COMPONENT } from './defaults.js';
import { getDefaultEnv, readEnvOverrides, type EnvRecord } from './env.js';
import type { ParseOptions, ParseOptionsInput } from './types.js';

/**
 * Resolves the options for one parse.
 *
 * Caller options win over `LIBCONFIG_*` environment variables, which win over
 * defaults. An environment value that cannot be coerced is skipped and
 * reported as a warning on the resolved logger.
 *
 * @param input - Options given by the caller.
 * @param env - The environment to read (defaults to process.env).
 * @returns Complete options, with a logger whose debug mode follows `debug`.
 */
export function resolveParseOptions(
  input: ParseOptionsInput = {},
  env: EnvRecord = getDefaultEnv()
): ParseOptions {
  const { overrides, errors } = readEnvOverrides(env, { collectErrors: true });

  const debug = input.debug ?? overrides.debug ?? DEFAULT_PARSE_OPTIONS.debug;
  const logger = input.logger ?? new Logger({ component: LOGGER_COMPONENT, debugMode: debug });

  for (const error of errors) {
    logger.warn('env_override_invalid', {
      envVar: error.envVar,
      rawValue: error.rawValue,
      expectedType: error.expectedType,
    });
  }

  return {
    includeDir:
      'includeDir' in input
        ? input.includeDir
        : (overrides.includeDir ?? DEFAULT_PARSE_OPTIONS.includeDir),
    debug,
    fileSystem: input.fileSystem ?? DEFAULT_PARSE_OPTIONS.fileSystem,
    logger,
  };
}
