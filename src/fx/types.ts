/**
 * Shared types for the EUR/USD summary pipeline.
 *
 * The provider payload and the fallback snapshot share one shape
 * (`RatesPayload`); everything downstream works on the date -> rate
 * mapping extracted from it.
 */

export type Provenance = 'api' | 'fallback';

export type BreakdownMode = 'day' | 'none';

/** One provider quote set for a day, e.g. `{ USD: 1.0842 }`. */
export type DailyQuotes = Record<string, number>;

export interface RatesPayload {
  amount?: number;
  base?: string;
  start_date?: string;
  end_date?: string;
  rates: Record<string, DailyQuotes>;
}

/** ISO date -> EUR/USD rate. */
export type RateSeries = Record<string, number>;

export interface DayRate {
  date: string;
  rate: number;
  /** null for the first day of the range */
  pct_change: number | null;
}

export interface Totals {
  start_rate: number;
  end_rate: number;
  total_pct_change: number;
  mean_rate: number;
}

export interface SummaryResult {
  breakdown?: DayRate[];
  totals: Totals;
  source: Provenance;
}

export interface SummaryRequest {
  start: string;
  end: string;
  breakdown: BreakdownMode;
}

export type FetchResult =
  | { kind: 'series'; payload: RatesPayload; attempts: number }
  | { kind: 'unavailable'; attempts: number; lastError: string };

export interface RateFetcher {
  fetchRange(start: string, end: string): Promise<FetchResult>;
}

export interface HealthReport {
  status: 'ok';
  api_reachable: boolean;
}
