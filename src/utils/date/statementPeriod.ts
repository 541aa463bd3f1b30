import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { formatDate } from './date';
import type { StatementPeriodLabel, StatementPeriodRange } from './types';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

const LABEL_PATTERN = /^(\d{4}-\d{2}-\d{2})_to_(\d{4}-\d{2}-\d{2})$/;

/**
 * Builds a statement period label from its first and last day.
 *
 * @example
 * ```typescript
 * buildStatementPeriod(new Date('2025-10-13'), new Date('2025-11-12'));
 * // Returns: '2025-10-13_to_2025-11-12'
 * ```
 */
export function buildStatementPeriod(start: Date, end: Date): StatementPeriodLabel {
  if (isNaN(start.getTime()) || isNaN(end.getTime())) {
    throw new Error('Statement period dates must be valid');
  }
  if (dayjs.utc(end).isBefore(dayjs.utc(start), 'day')) {
    throw new Error('Statement period must not end before it starts');
  }
  return `${formatDate(start)}_to_${formatDate(end)}`;
}

/**
 * Parses a `YYYY-MM-DD_to_YYYY-MM-DD` label.
 * @returns The inclusive range, or null when the label is malformed or runs backwards
 */
export function parseStatementPeriod(label: string | null | undefined): StatementPeriodRange | null {
  if (!label) {
    return null;
  }
  const match = LABEL_PATTERN.exec(label.trim());
  if (!match) {
    return null;
  }
  const start = dayjs.utc(match[1], 'YYYY-MM-DD', true);
  const end = dayjs.utc(match[2], 'YYYY-MM-DD', true);
  if (!start.isValid() || !end.isValid() || end.isBefore(start, 'day')) {
    return null;
  }
  return { start: start.toDate(), end: end.toDate() };
}

export function isValidStatementPeriod(label: string | null | undefined): boolean {
  return parseStatementPeriod(label) !== null;
}

/**
 * Finds the statement period containing `date` for a card whose statement starts on
 * `statementDay` each month. The period ends the day before the next statement day.
 * Days past the end of a short month are clamped to its last day.
 */
export function statementPeriodFor(date: Date, statementDay: number): StatementPeriodLabel {
  if (!Number.isInteger(statementDay) || statementDay < 1 || statementDay > 31) {
    throw new Error('Statement day must be between 1 and 31');
  }
  const day = dayjs.utc(date).startOf('day');
  const startIn = (month: dayjs.Dayjs) => month.date(Math.min(statementDay, month.daysInMonth()));

  let start = startIn(day.startOf('month'));
  if (day.isBefore(start, 'day')) {
    start = startIn(day.startOf('month').subtract(1, 'month'));
  }
  const nextStart = startIn(start.startOf('month').add(1, 'month'));
  return buildStatementPeriod(start.toDate(), nextStart.subtract(1, 'day').toDate());
}

/**
 * Days left in a statement period counting `today` and the last day, floored at 0.
 * @returns null when the label cannot be parsed
 */
export function daysRemainingInPeriod(label: string, today: Date): number | null {
  const range = parseStatementPeriod(label);
  if (!range) {
    return null;
  }
  const remaining = dayjs.utc(range.end).diff(dayjs.utc(today).startOf('day'), 'day') + 1;
  return Math.max(0, remaining);
}
