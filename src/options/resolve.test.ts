import { describe, expect, it, vi } from 'vitest';
import type { IncludeFileSystem } from '../parser/include-resolver.js';
import { Logger } from '../utils/logger.js';
import { DEFAULT_PARSE_OPTIONS } from './defaults.js';
import { resolveParseOptions } from './resolve.js';

describe('resolveParseOptions', () => {
  it('should fall back to defaults', () => {
    const options = resolveParseOptions({}, {});

    expect(options.includeDir).toBeUndefined();
    expect(options.debug).toBe(false);
    expect(options.fileSystem).toBe(DEFAULT_PARSE_OPTIONS.fileSystem);
    expect(options.logger.isDebugEnabled).toBe(false);
  });

  it('should apply environment overrides', () => {
    const options = resolveParseOptions(
      {},
      { LIBCONFIG_INCLUDE_DIR: '/etc/app', LIBCONFIG_DEBUG: 'yes' }
    );

    expect(options.includeDir).toBe('/etc/app');
    expect(options.debug).toBe(true);
    expect(options.logger.isDebugEnabled).toBe(true);
  });

  it('should prefer caller options over the environment', () => {
    const options = resolveParseOptions(
      { includeDir: '/srv/conf', debug: false },
      { LIBCONFIG_INCLUDE_DIR: '/etc/app', LIBCONFIG_DEBUG: 'yes' }
    );

    expect(options.includeDir).toBe('/srv/conf');
    expect(options.debug).toBe(false);
  });

  it('should let an explicit undefined include directory override the environment', () => {
    const options = resolveParseOptions(
      { includeDir: undefined },
      { LIBCONFIG_INCLUDE_DIR: '/etc/app' }
    );

    expect(options.includeDir).toBeUndefined();
  });

  it('should keep the caller logger and file system', () => {
    const logger = new Logger({ component: 'custom' });
    const fileSystem: IncludeFileSystem = {
      resolve: (_baseDir, includePath) => includePath,
      exists: () => false,
      readFile: () => '',
      dirname: () => '/',
    };

    const options = resolveParseOptions({ logger, fileSystem }, {});

    expect(options.logger).toBe(logger);
    expect(options.fileSystem).toBe(fileSystem);
  });

  it('should warn about invalid environment values and keep going', () => {
    const logger = new Logger({ component: 'custom' });
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);

    const options = resolveParseOptions({ logger }, { LIBCONFIG_DEBUG: 'sometimes' });

    expect(options.debug).toBe(false);
    expect(warn).toHaveBeenCalledWith('env_override_invalid', {
      envVar: 'LIBCONFIG_DEBUG',
      rawValue: 'sometimes',
      expectedType: 'boolean',
    });
  });
});
