/**
 * Time utilities for consistent date handling
 */

import { format, isValid, parseISO } from 'date-fns';

const ISO_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function parseDate(dateStr: string): Date {
  return parseISO(dateStr);
}

/**
 * True for a real calendar day written as YYYY-MM-DD (rejects 2025-02-30).
 */
export function isIsoDay(value: string): boolean {
  if (!ISO_DAY_PATTERN.test(value)) return false;
  const parsed = parseDate(value);
  return isValid(parsed) && formatDate(parsed) === value;
}
