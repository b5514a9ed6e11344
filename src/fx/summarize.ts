/**
 * Day-by-day breakdown and totals for a EUR/USD series.
 * Single pass over the sorted dates; the input payload is never mutated.
 */

import { roundTo, safePctChange } from '@/lib/percent';
import { NoDataError } from './errors';
import type {
  BreakdownMode,
  DayRate,
  Provenance,
  RateSeries,
  RatesPayload,
  SummaryResult,
  Totals,
} from './types';

const QUOTE_CURRENCY = 'USD';

export function toRateSeries(payload: RatesPayload): RateSeries {
  const series: RateSeries = {};
  for (const [date, quotes] of Object.entries(payload.rates)) {
    // missing quote counts as 0
    series[date] = quotes[QUOTE_CURRENCY] ?? 0;
  }
  return series;
}

export function buildBreakdown(series: RateSeries): DayRate[] {
  const dates = Object.keys(series).sort();
  const days: DayRate[] = [];
  let previous: number | null = null;

  for (const date of dates) {
    const rate = series[date];
    days.push({
      date,
      rate,
      pct_change: previous === null ? null : safePctChange(rate, previous),
    });
    previous = rate;
  }

  return days;
}

export function computeTotals(days: DayRate[]): Totals {
  const first = days[0];
  const last = days[days.length - 1];
  if (!first || !last) {
    throw new NoDataError();
  }

  const sum = days.reduce((acc, day) => acc + day.rate, 0);

  return {
    start_rate: first.rate,
    end_rate: last.rate,
    total_pct_change: safePctChange(last.rate, first.rate),
    mean_rate: roundTo(sum / days.length),
  };
}

export function summarizeSeries(
  series: RateSeries,
  breakdown: BreakdownMode,
  source: Provenance
): SummaryResult {
  const days = buildBreakdown(series);
  if (days.length === 0) {
    throw new NoDataError();
  }

  const totals = computeTotals(days);
  return breakdown === 'none' ? { totals, source } : { breakdown: days, totals, source };
}

export function summarizePayload(
  payload: RatesPayload,
  breakdown: BreakdownMode,
  source: Provenance
): SummaryResult {
  return summarizeSeries(toRateSeries(payload), breakdown, source);
}
