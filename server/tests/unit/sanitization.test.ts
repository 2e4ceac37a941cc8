import { describe, it, expect } from '@jest/globals';
import {
  sanitizeEmail,
  sanitizeFields,
  sanitizeMessage,
  sanitizeRichText,
  sanitizeText,
  sanitizeUrl,
} from '../../sanitization';

describe('Sanitization - Unit Tests', () => {
  describe('sanitizeText', () => {
    it('should strip markup but keep ampersands as plain text', () => {
      expect(sanitizeText('Rolls & Royce')).toBe('Rolls & Royce');
      expect(sanitizeText('<b>Land</b> &amp; Sea')).toBe('Land & Sea');
    });

    it('should reduce markup-only input to an empty string', () => {
      expect(sanitizeText('<img src=x>')).toBe('');
      expect(sanitizeText('<script>alert(1)</script>')).toBe('');
    });
  });

  describe('HTML fields', () => {
    it('should keep allowed tags and escape the text around them', () => {
      expect(sanitizeMessage('<p>Tom & Jerry</p><img src=x>')).toBe('<p>Tom &amp; Jerry</p>');
      expect(sanitizeRichText('<h2>Tips</h2><script>alert(1)</script>')).toBe('<h2>Tips</h2>');
    });
  });

  describe('sanitizeUrl and sanitizeEmail', () => {
    it('should keep query strings intact and refuse other schemes', () => {
      expect(sanitizeUrl('https://images.test/a.jpg?w=1&h=2')).toBe('https://images.test/a.jpg?w=1&h=2');
      expect(sanitizeUrl('javascript:alert(1)')).toBe('');
    });

    it('should lower-case addresses and blank invalid ones', () => {
      expect(sanitizeEmail(' Ada@Example.com ')).toBe('ada@example.com');
      expect(sanitizeEmail('not-an-address')).toBe('');
    });
  });

  describe('sanitizeFields', () => {
    it('should clean only the listed string fields', () => {
      const body = { name: '<i>Toyota</i>', description: null, year: 2022, notes: '<b>x</b>' };

      expect(sanitizeFields(body, { name: sanitizeText, description: sanitizeText })).toEqual({
        name: 'Toyota',
        description: null,
        year: 2022,
        notes: '<b>x</b>',
      });
      expect(body.name).toBe('<i>Toyota</i>');
    });

    it('should pass through bodies that are not objects', () => {
      expect(sanitizeFields(undefined, { name: sanitizeText })).toBeUndefined();
      expect(sanitizeFields(['<b>x</b>'], { name: sanitizeText })).toEqual(['<b>x</b>']);
    });
  });
});
