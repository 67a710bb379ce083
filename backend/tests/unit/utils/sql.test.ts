import { describe, it, expect } from '@jest/globals';
import { UUID_PATTERN, escapeLike, isUuid, toNumber } from '../../../src/utils/sql.js';

describe('sql helpers', () => {
  describe('isUuid', () => {
    it('accepts canonical UUIDs in either case', () => {
      expect(isUuid('3f2b8c1e-9d4a-4e7b-8a1c-2d3e4f5a6b7c')).toBe(true);
      expect(isUuid('3F2B8C1E-9D4A-4E7B-8A1C-2D3E4F5A6B7C')).toBe(true);
    });

    it('rejects anything else', () => {
      expect(isUuid('42')).toBe(false);
      expect(isUuid('3f2b8c1e9d4a4e7b8a1c2d3e4f5a6b7c')).toBe(false);
      expect(isUuid('')).toBe(false);
    });

    it('agrees with the route schema pattern', () => {
      const re = new RegExp(UUID_PATTERN);
      expect(re.test('3f2b8c1e-9d4a-4e7b-8a1c-2d3e4f5a6b7c')).toBe(true);
      expect(re.test('not-a-uuid')).toBe(false);
    });
  });

  describe('toNumber', () => {
    it('parses numeric strings from pg', () => {
      expect(toNumber('1550.50')).toBe(1550.5);
      expect(toNumber('12')).toBe(12);
    });

    it('passes numbers through', () => {
      expect(toNumber(350)).toBe(350);
    });

    it('maps null, undefined and garbage to 0', () => {
      expect(toNumber(null)).toBe(0);
      expect(toNumber(undefined)).toBe(0);
      expect(toNumber('n/a')).toBe(0);
    });
  });

  describe('escapeLike', () => {
    it('escapes wildcards and backslashes', () => {
      expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
    });

    it('leaves plain text alone', () => {
      expect(escapeLike('KDA 123A')).toBe('KDA 123A');
    });
  });
});
