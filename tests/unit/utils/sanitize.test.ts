import { describe, it, expect } from 'vitest';
import { sanitizeErrorMessage, sanitizeString } from '../../../src/utils/sanitize.js';

describe('sanitize utilities', () => {
  describe('sanitizeString', () => {
    it('returns null for null input', () => {
      expect(sanitizeString(null)).toBeNull();
    });

    it('returns null for undefined input', () => {
      expect(sanitizeString(undefined)).toBeNull();
    });

    it('trims whitespace', () => {
      expect(sanitizeString('  hello world  ')).toBe('hello world');
    });

    it('removes control characters', () => {
      expect(sanitizeString('hello\x00world')).toBe('helloworld');
      expect(sanitizeString('test\x1Fvalue')).toBe('testvalue');
      expect(sanitizeString('foo\x7Fbar')).toBe('foobar');
    });

    it('removes zero-width characters and line separators', () => {
      expect(sanitizeString('hello\u2028world')).toBe('helloworld');
      expect(sanitizeString('test\u2029value')).toBe('testvalue');
      expect(sanitizeString('zero\u200Bwidth')).toBe('zerowidth');
      expect(sanitizeString('\uFEFFbom')).toBe('bom');
    });

    it('preserves tabs, newlines, and carriage returns', () => {
      expect(sanitizeString('hello\tworld')).toBe('hello\tworld');
      expect(sanitizeString('hello\nworld')).toBe('hello\nworld');
      expect(sanitizeString('hello\rworld')).toBe('hello\rworld');
    });

    it('truncates long strings within maxLength', () => {
      const result = sanitizeString('a'.repeat(600));
      // 497 characters plus '...'
      expect(result).toBe('a'.repeat(497) + '...');
      expect(result?.length).toBe(500);
    });

    it('respects custom maxLength including ellipsis', () => {
      expect(sanitizeString('hello world', 5)).toBe('he...');
    });

    it('handles empty string', () => {
      expect(sanitizeString('')).toBe('');
    });

    it('removes control characters before measuring length', () => {
      const result = sanitizeString('a'.repeat(495) + '\x00\x01\x02\x03\x04');
      expect(result).toBe('a'.repeat(495));
    });
  });

  describe('sanitizeErrorMessage', () => {
    it('reads the message of an Error', () => {
      expect(sanitizeErrorMessage(new Error('Something broke'))).toBe('Something broke');
    });

    it('accepts plain strings', () => {
      expect(sanitizeErrorMessage('plain failure')).toBe('plain failure');
    });

    it('uses a generic message for other values', () => {
      expect(sanitizeErrorMessage({ code: 1 })).toBe('An error occurred');
      expect(sanitizeErrorMessage(undefined)).toBe('An error occurred');
    });

    it('redacts bearer tokens', () => {
      expect(sanitizeErrorMessage('Header was Bearer test-token-123')).toBe(
        'Header was Bearer [REDACTED]'
      );
    });

    it('redacts token query parameters', () => {
      expect(sanitizeErrorMessage('GET /budgets?access_token=test-secret failed')).toBe(
        'GET /budgets?access_token=[REDACTED] failed'
      );
    });

    it('redacts file paths', () => {
      expect(sanitizeErrorMessage('Cannot read /home/someone/.env')).toBe(
        'Cannot read [PATH_REDACTED]'
      );
    });

    it('redacts stack frames', () => {
      expect(sanitizeErrorMessage('failed at fetchBudget (client.js:10:5)')).toBe(
        'failed at [STACK_REDACTED]'
      );
    });

    it('caps the length', () => {
      expect(sanitizeErrorMessage('x'.repeat(100), 10)).toBe('xxxxxxx...');
    });
  });
});
