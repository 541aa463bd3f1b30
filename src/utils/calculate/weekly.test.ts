import { describe, it, expect } from 'vitest';
import { buildWeeklyBreakdown, getWeekRanges } from './weekly';
import { formatDate, parseDate } from '../date/date';
import { createTransaction } from '../test/mockData';

describe('Weekly breakdown', () => {
  const start = parseDate('2025-10-13');
  const end = parseDate('2025-10-22');

  describe('getWeekRanges', () => {
    it('should cut a 10-day period into two weeks, the second clipped', () => {
      const ranges = getWeekRanges(start, end).map((range) => [range.week, formatDate(range.start), formatDate(range.end)]);

      expect(ranges).toEqual([
        [1, '2025-10-13', '2025-10-19'],
        [2, '2025-10-20', '2025-10-22'],
      ]);
    });

    it('should return one week for a single day', () => {
      expect(getWeekRanges(start, start)).toHaveLength(1);
    });

    it('should throw when the end is before the start', () => {
      expect(() => getWeekRanges(end, start)).toThrow('The period end must not be before its start');
    });
  });

  describe('buildWeeklyBreakdown', () => {
    const first = createTransaction({ amount: 50, transactionDate: 'October 14, 2025' });
    const second = createTransaction({ amount: 20, transactionDate: 'Oct 21, 2025' });
    const lastDay = createTransaction({ amount: 5, transactionDate: '2025-10-22' });
    const outside = createTransaction({ amount: 99, transactionDate: 'October 30, 2025' });
    const undated = createTransaction({ amount: 7, transactionDate: 'sometime' });

    it('should total each week and label it', () => {
      const weeks = buildWeeklyBreakdown([first, second, lastDay, outside, undated], start, end);

      expect(weeks.map((week) => [week.label, week.total])).toEqual([
        ['Week 1 (Oct 13–Oct 19)', 50],
        ['Week 2 (Oct 20–Oct 22)', 25],
      ]);
      expect(weeks[1].transactions).toEqual([second, lastDay]);
    });

    it('should report empty weeks with a zero total', () => {
      const weeks = buildWeeklyBreakdown([], start, end);

      expect(weeks.map((week) => week.total)).toEqual([0, 0]);
    });
  });
});
