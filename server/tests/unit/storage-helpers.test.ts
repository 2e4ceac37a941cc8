import { describe, it, expect } from '@jest/globals';
import { appendNote, clampPageSize, containsPattern, definedFields } from '../../storage';

describe('Storage helpers - Unit Tests', () => {
  describe('containsPattern', () => {
    it('should wrap the term for a substring match', () => {
      expect(containsPattern('corolla')).toBe('%corolla%');
    });

    it('should escape LIKE wildcards and the escape character', () => {
      expect(containsPattern('50%_off')).toBe('%50\\%\\_off%');
      expect(containsPattern('a\\b')).toBe('%a\\\\b%');
    });
  });

  describe('clampPageSize', () => {
    it('should default missing or invalid limits to 20', () => {
      expect(clampPageSize(undefined)).toBe(20);
      expect(clampPageSize(0)).toBe(20);
      expect(clampPageSize(Number.NaN)).toBe(20);
    });

    it('should cap large limits at 100', () => {
      expect(clampPageSize(12.7)).toBe(12);
      expect(clampPageSize(500)).toBe(100);
    });
  });

  describe('definedFields', () => {
    it('should keep null but drop undefined values', () => {
      const fields = definedFields({ color: undefined, mileage: null, year: 2021 });

      expect(Object.keys(fields)).toEqual(['mileage', 'year']);
      expect(fields).toEqual({ mileage: null, year: 2021 });
    });
  });

  describe('appendNote', () => {
    it('should append on a new line and ignore empty notes', () => {
      expect(appendNote(null, 'Cancelled: Breakdown')).toBe('Cancelled: Breakdown');
      expect(appendNote('Paid deposit', 'Cancelled: Breakdown')).toBe('Paid deposit\nCancelled: Breakdown');
      expect(appendNote('Paid deposit', undefined)).toBe('Paid deposit');
    });
  });
});
