import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import type { DateString } from './types';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

/**
 * Formats accepted for the free-text transaction date column, tried in order.
 */
export const TRANSACTION_DATE_FORMATS = ['MMMM D, YYYY', 'MMM D, YYYY', 'YYYY-MM-DD', 'M/D/YYYY'];

export function formatDate(date: Date): DateString {
  return dayjs.utc(date).format('YYYY-MM-DD') as DateString;
}

export function parseDate(date: DateString): Date {
  const d = dayjs.utc(date, 'YYYY-MM-DD', true);
  if (!d.isValid()) {
    throw new Error(`Invalid date '${date}'`);
  }
  return d.toDate();
}

/**
 * Parses a human-readable transaction date such as "September 12, 2025".
 * @returns The date at UTC midnight, or null when no known format matches
 */
export function parseTransactionDate(text: string | null | undefined): Date | null {
  if (!text || text.trim() === '') {
    return null;
  }
  const trimmed = text.trim();
  for (const format of TRANSACTION_DATE_FORMATS) {
    const d = dayjs.utc(trimmed, format, true);
    if (d.isValid()) {
      return d.toDate();
    }
  }
  return null;
}
