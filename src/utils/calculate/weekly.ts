import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { Transaction } from '../../data/transaction/transaction';

dayjs.extend(utc);

export type WeekRange = {
  week: number;
  start: Date;
  end: Date;
};

export type WeeklyTotal = WeekRange & {
  label: string;
  total: number;
  transactions: Transaction[];
};

/**
 * Cuts a statement period into consecutive 7-day weeks starting on `start`.
 * The last week ends on `end` and may be shorter.
 */
export function getWeekRanges(start: Date, end: Date): WeekRange[] {
  const last = dayjs.utc(end).startOf('day');
  let weekStart = dayjs.utc(start).startOf('day');
  if (last.isBefore(weekStart, 'day')) {
    throw new Error('The period end must not be before its start');
  }

  const ranges: WeekRange[] = [];
  let week = 1;
  while (!weekStart.isAfter(last, 'day')) {
    const weekEnd = weekStart.add(6, 'day').isAfter(last, 'day') ? last : weekStart.add(6, 'day');
    ranges.push({ week, start: weekStart.toDate(), end: weekEnd.toDate() });
    weekStart = weekEnd.add(1, 'day');
    week++;
  }
  return ranges;
}

/**
 * Totals transactions per statement-relative week (days 0-6 are week 1, 7-13 week 2, ...).
 * Transactions with an unreadable date or outside the period are left out.
 *
 * @example
 * ```typescript
 * buildWeeklyBreakdown(groceries, new Date('2025-10-13'), new Date('2025-10-22'));
 * // Returns two weeks labelled 'Week 1 (Oct 13–Oct 19)' and 'Week 2 (Oct 20–Oct 22)'
 * ```
 */
export function buildWeeklyBreakdown(transactions: readonly Transaction[], start: Date, end: Date): WeeklyTotal[] {
  const weeks: WeeklyTotal[] = getWeekRanges(start, end).map((range) => ({
    ...range,
    label: `Week ${range.week} (${dayjs.utc(range.start).format('MMM D')}–${dayjs.utc(range.end).format('MMM D')})`,
    total: 0,
    transactions: [],
  }));
  const periodStart = dayjs.utc(start).startOf('day');
  const periodEnd = dayjs.utc(end).startOf('day');

  for (const tx of transactions) {
    const date = tx.date;
    if (!date) {
      continue;
    }
    const day = dayjs.utc(date).startOf('day');
    if (day.isBefore(periodStart, 'day') || day.isAfter(periodEnd, 'day')) {
      continue;
    }
    const week = weeks[Math.floor(day.diff(periodStart, 'day') / 7)];
    week.total += tx.amount;
    week.transactions.push(tx);
  }
  return weeks;
}
