/**
 * Config module: the parsed configuration and typed path lookups.
 *
 * @packageDocumentation
 */

export { Config } from './config.js';
export { LookupError } from './errors.js';
export type { LookupErrorCode, LookupResult } from './errors.js';
