import { isIsoDay } from '@/core/time';
import {
  InvalidBreakdownError,
  InvalidDateError,
  InvalidRangeError,
} from '@/fx/errors';
import type { BreakdownMode, SummaryRequest } from '@/fx/types';

export type QueryParams = Record<string, string | null | undefined>;

const BREAKDOWN_MODES: readonly BreakdownMode[] = ['day', 'none'];

export function validateIsoDay(field: string, value: string | null | undefined): string {
  const trimmed = value?.trim();
  if (!trimmed) throw new InvalidDateError(field, null);
  if (!isIsoDay(trimmed)) throw new InvalidDateError(field, trimmed);
  return trimmed;
}

export function validateBreakdown(value: string | null | undefined): BreakdownMode {
  if (value === null || value === undefined || value === '') return 'day';
  const mode = BREAKDOWN_MODES.find((m) => m === value);
  if (!mode) throw new InvalidBreakdownError(value);
  return mode;
}

/**
 * Both ends must be YYYY-MM-DD, so string order is calendar order.
 */
export function validateRange(
  start: string | null | undefined,
  end: string | null | undefined
): { start: string; end: string } {
  const from = validateIsoDay('start', start);
  const to = validateIsoDay('end', end);
  if (from > to) {
    throw new InvalidRangeError(from, to);
  }
  return { start: from, end: to };
}

export function parseSummaryQuery(params: QueryParams): SummaryRequest {
  const { start, end } = validateRange(params.start, params.end);
  const breakdown = validateBreakdown(params.breakdown);
  return { start, end, breakdown };
}
