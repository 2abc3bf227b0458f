import { describe, it, expect } from 'vitest';
import {
  isValidIsoDate,
  isWithinRange,
  monthKey,
  monthsBetween,
  yearOf,
} from '../../../src/utils/dates.js';

describe('date utilities', () => {
  describe('isValidIsoDate', () => {
    it('accepts real calendar dates', () => {
      expect(isValidIsoDate('2024-01-15')).toBe(true);
      expect(isValidIsoDate('2024-02-29')).toBe(true);
      expect(isValidIsoDate('2023-12-31')).toBe(true);
    });

    it('rejects days past the end of the month', () => {
      expect(isValidIsoDate('2023-02-29')).toBe(false);
      expect(isValidIsoDate('2024-04-31')).toBe(false);
    });

    it('rejects invalid months and days', () => {
      expect(isValidIsoDate('2024-13-01')).toBe(false);
      expect(isValidIsoDate('2024-00-10')).toBe(false);
      expect(isValidIsoDate('2024-05-00')).toBe(false);
    });

    it('rejects other formats', () => {
      expect(isValidIsoDate('2024-1-15')).toBe(false);
      expect(isValidIsoDate('01/15/2024')).toBe(false);
      expect(isValidIsoDate('2024-01-15T00:00:00Z')).toBe(false);
      expect(isValidIsoDate('')).toBe(false);
    });
  });

  describe('monthKey and yearOf', () => {
    it('extract parts of an ISO date', () => {
      expect(monthKey('2024-03-17')).toBe('2024-03');
      expect(yearOf('2024-03-17')).toBe(2024);
    });
  });

  describe('monthsBetween', () => {
    it('lists every month inclusively across a year boundary', () => {
      expect(monthsBetween('2023-11-15', '2024-02-01')).toEqual([
        '2023-11',
        '2023-12',
        '2024-01',
        '2024-02',
      ]);
    });

    it('returns a single month when both dates share it', () => {
      expect(monthsBetween('2024-05-01', '2024-05-31')).toEqual(['2024-05']);
    });

    it('returns nothing when the end precedes the start', () => {
      expect(monthsBetween('2024-03-01', '2024-02-01')).toEqual([]);
    });
  });

  describe('isWithinRange', () => {
    it('treats both bounds as inclusive', () => {
      expect(isWithinRange('2024-01-01', '2024-01-01', '2024-01-31')).toBe(true);
      expect(isWithinRange('2024-01-31', '2024-01-01', '2024-01-31')).toBe(true);
    });

    it('excludes dates outside the bounds', () => {
      expect(isWithinRange('2023-12-31', '2024-01-01', '2024-01-31')).toBe(false);
      expect(isWithinRange('2024-02-01', '2024-01-01', '2024-01-31')).toBe(false);
    });

    it('ignores missing bounds', () => {
      expect(isWithinRange('1999-01-01')).toBe(true);
      expect(isWithinRange('2030-01-01', '2024-01-01')).toBe(true);
      expect(isWithinRange('2020-01-01', undefined, '2024-01-01')).toBe(true);
    });
  });
});
