import { describe, it, expect } from 'vitest';

import { StorageInvalidKeyError } from '@/storage/errors.js';
import {
  ROOT_PATH,
  assertNamespace,
  joinRelative,
  normalizeEntryPath,
  normalizeRelativePath,
} from '@/storage/keys.js';

describe('storage keys', () => {
  describe('normalizeRelativePath()', () => {
    it('should map empty and dot paths to the root', () => {
      expect(normalizeRelativePath('')).toBe(ROOT_PATH);
      expect(normalizeRelativePath('.')).toBe(ROOT_PATH);
      expect(normalizeRelativePath('./')).toBe(ROOT_PATH);
    });

    it('should strip trailing slashes and collapse segments', () => {
      expect(normalizeRelativePath('models/')).toBe('models');
      expect(normalizeRelativePath('./models//weights.bin')).toBe('models/weights.bin');
      expect(normalizeRelativePath('models/../data/x.csv')).toBe('data/x.csv');
    });

    it('should convert backslashes to forward slashes', () => {
      expect(normalizeRelativePath('models\\sub\\a.txt')).toBe('models/sub/a.txt');
    });

    it('should reject absolute paths', () => {
      expect(() => normalizeRelativePath('/etc/passwd')).toThrow(StorageInvalidKeyError);
      expect(() => normalizeRelativePath('C:\\data\\a.txt')).toThrow(StorageInvalidKeyError);
    });

    it('should reject paths escaping the drive root (path traversal protection)', () => {
      expect(() => normalizeRelativePath('..')).toThrow(StorageInvalidKeyError);
      expect(() => normalizeRelativePath('../secret')).toThrow(StorageInvalidKeyError);
      expect(() => normalizeRelativePath('models/../../secret')).toThrow(
        'Invalid storage key: path escapes the drive root (models/../../secret)'
      );
    });

    it('should accept names that only start with two dots', () => {
      expect(normalizeRelativePath('..cache/a.txt')).toBe('..cache/a.txt');
    });
  });

  describe('normalizeEntryPath()', () => {
    it('should reject the drive root itself', () => {
      expect(() => normalizeEntryPath('.')).toThrow(StorageInvalidKeyError);
      expect(() => normalizeEntryPath('models/..')).toThrow(StorageInvalidKeyError);
    });

    it('should return normalized entry paths', () => {
      expect(normalizeEntryPath('models/a.txt')).toBe('models/a.txt');
    });
  });

  describe('assertNamespace()', () => {
    it('should accept flat component names', () => {
      expect(assertNamespace('trainer')).toBe('trainer');
      expect(assertNamespace('work-1.a')).toBe('work-1.a');
    });

    it.each(['', '.', '..', 'a/b', 'a\\b'])('should reject %j', (namespace) => {
      expect(() => assertNamespace(namespace)).toThrow(StorageInvalidKeyError);
    });
  });

  describe('joinRelative()', () => {
    it('should keep root-level children bare', () => {
      expect(joinRelative(ROOT_PATH, 'a.txt')).toBe('a.txt');
    });

    it('should join children below a prefix', () => {
      expect(joinRelative('models', 'a.txt')).toBe('models/a.txt');
    });
  });
});
