/**
 * Parse options: defaults and `LIBCONFIG_*` environment overrides.
 *
 * Override precedence: caller options > env > defaults
 *
 * @packageDocumentation
 */

export { DEFAULT_PARSE_OPTIONS, LOGGER_COMPONENT } from './defaults.js';
export {
  EnvCoercionError,
  getDefaultEnv,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { resolveParseOptions } from './resolve.js';
export type { EnvOptions, ParseOptions, ParseOptionsInput } from './types.js';
