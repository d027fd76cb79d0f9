import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { Config, parseString, VERSION, VALUE_KINDS } from './index.js';

describe('libconfig-ts', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  it('should expose the whole parse-and-lookup flow', () => {
    const result = parseString(
      [
        '# application settings',
        'application = {',
        '  name = "demo";',
        '  window = { width = 640; height = 480; };',
        '  ratios = [0.5, 1.5];',
        '  limits = ( "low", 10, false );',
        '};',
      ].join('\n')
    );

    expect(result.success).toBe(true);
    if (!result.success) {
      return;
    }
    expect(result.config).toBeInstanceOf(Config);
    expect(result.config.lookupString('application.name')).toEqual({
      success: true,
      value: 'demo',
    });
    expect(result.config.lookupInt('application.window.height')).toEqual({
      success: true,
      value: 480,
    });
    expect(result.config.lookup('application.limits')).toMatchObject({
      success: true,
      value: { kind: 'list' },
    });
  });

  it('should list all eight value kinds', () => {
    expect(VALUE_KINDS).toEqual(['int', 'int64', 'float', 'bool', 'string', 'array', 'group', 'list']);
  });

  describe('property-based tests', () => {
    it('should round-trip any quoted printable string without escapes', () => {
      fc.assert(
        fc.property(
          fc.stringMatching(/^[a-zA-Z0-9 ,.:;!?_-]*$/),
          (text) => {
            const result = parseString(`value = "${text}";`);
            if (!result.success) {
              return false;
            }
            const lookup = result.config.lookupString('value');
            return lookup.success && lookup.value === text;
          }
        )
      );
    });
  });
});
