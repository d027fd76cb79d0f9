import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  PathValidationError,
  safeExistsSync,
  safeReadFileSync,
  validatePath,
} from './safe-fs.js';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'safe-fs-test-'));
    await writeFile(join(tempDir, 'app.cfg'), 'name = "demo";\n');
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should keep absolute paths', () => {
      expect(validatePath('/tmp/app.cfg')).toBe('/tmp/app.cfg');
    });

    it('should resolve relative paths to absolute', () => {
      const result = validatePath('./app.cfg');
      expect(path.isAbsolute(result)).toBe(true);
      expect(result).toBe(path.resolve('app.cfg'));
    });

    it('should reject empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('should reject paths with null bytes', () => {
      expect(() => validatePath('/tmp/app\0.cfg')).toThrow('null bytes');
    });

    it('should record the offending path', () => {
      try {
        validatePath('');
        expect.unreachable('validatePath should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(PathValidationError);
        expect((error as PathValidationError).invalidPath).toBe('');
      }
    });

    it('should accept non-empty strings without null bytes', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((s) => !s.includes('\0')),
          (input) => {
            expect(() => validatePath(input)).not.toThrow();
          }
        )
      );
    });
  });

  describe('safeExistsSync', () => {
    it('should return true for existing files', () => {
      expect(safeExistsSync(join(tempDir, 'app.cfg'))).toBe(true);
    });

    it('should return false for missing files', () => {
      expect(safeExistsSync(join(tempDir, 'missing.cfg'))).toBe(false);
    });

    it('should report invalid paths as missing', () => {
      expect(safeExistsSync('')).toBe(false);
      expect(safeExistsSync(`${tempDir}/bad\0.cfg`)).toBe(false);
    });
  });

  describe('safeReadFileSync', () => {
    it('should read a file as UTF-8 text', () => {
      expect(safeReadFileSync(join(tempDir, 'app.cfg'))).toBe('name = "demo";\n');
    });

    it('should throw a validation error for an empty path', () => {
      expect(() => safeReadFileSync('')).toThrow(PathValidationError);
    });

    it('should throw when the file does not exist', () => {
      expect(() => safeReadFileSync(join(tempDir, 'missing.cfg'))).toThrow(/ENOENT/);
    });
  });
});
