import { describe, it, expect } from 'vitest';
import {
  buildStatementPeriod,
  daysRemainingInPeriod,
  isValidStatementPeriod,
  parseStatementPeriod,
  statementPeriodFor,
} from './statementPeriod';
import { formatDate, parseDate } from './date';

describe('Statement periods', () => {
  describe('buildStatementPeriod', () => {
    it('should join the first and last day', () => {
      expect(buildStatementPeriod(parseDate('2025-10-13'), parseDate('2025-11-12'))).toBe('2025-10-13_to_2025-11-12');
    });

    it('should throw when the period runs backwards', () => {
      expect(() => buildStatementPeriod(parseDate('2025-11-12'), parseDate('2025-10-13'))).toThrow(
        'Statement period must not end before it starts',
      );
    });

    it('should throw for invalid dates', () => {
      expect(() => buildStatementPeriod(new Date('nope'), parseDate('2025-10-13'))).toThrow(
        'Statement period dates must be valid',
      );
    });
  });

  describe('parseStatementPeriod', () => {
    it('should return the range', () => {
      const range = parseStatementPeriod('2025-10-13_to_2025-11-12');

      expect(range && [formatDate(range.start), formatDate(range.end)]).toEqual(['2025-10-13', '2025-11-12']);
    });

    it('should reject malformed or backwards labels', () => {
      expect(parseStatementPeriod('SEPTEMBER2025')).toBeNull();
      expect(parseStatementPeriod('2025-13-01_to_2025-14-01')).toBeNull();
      expect(parseStatementPeriod('2025-11-12_to_2025-10-13')).toBeNull();
      expect(parseStatementPeriod(null)).toBeNull();
    });

    it('should report validity', () => {
      expect(isValidStatementPeriod('2025-10-13_to_2025-11-12')).toBe(true);
      expect(isValidStatementPeriod('')).toBe(false);
    });
  });

  describe('statementPeriodFor', () => {
    it('should find the period starting this month', () => {
      expect(statementPeriodFor(parseDate('2025-10-20'), 13)).toBe('2025-10-13_to_2025-11-12');
    });

    it('should find the period starting last month before the statement day', () => {
      expect(statementPeriodFor(parseDate('2025-10-05'), 13)).toBe('2025-09-13_to_2025-10-12');
    });

    it('should include the statement day itself', () => {
      expect(statementPeriodFor(parseDate('2025-10-13'), 13)).toBe('2025-10-13_to_2025-11-12');
    });

    it('should clamp the statement day to short months', () => {
      expect(statementPeriodFor(parseDate('2025-02-15'), 31)).toBe('2025-01-31_to_2025-02-27');
    });

    it('should reject statement days outside the month', () => {
      expect(() => statementPeriodFor(parseDate('2025-10-05'), 0)).toThrow('Statement day must be between 1 and 31');
    });
  });

  describe('daysRemainingInPeriod', () => {
    it('should count today and the last day', () => {
      expect(daysRemainingInPeriod('2025-10-13_to_2025-11-12', parseDate('2025-11-03'))).toBe(10);
      expect(daysRemainingInPeriod('2025-10-13_to_2025-11-12', parseDate('2025-11-12'))).toBe(1);
    });

    it('should not go below zero after the period', () => {
      expect(daysRemainingInPeriod('2025-10-13_to_2025-11-12', parseDate('2025-11-20'))).toBe(0);
    });

    it('should return null for an invalid label', () => {
      expect(daysRemainingInPeriod('next month', parseDate('2025-11-20'))).toBeNull();
    });
  });
});
