const DEFAULT_DECIMALS = 4;

export function roundTo(value: number, decimals: number = DEFAULT_DECIMALS): number {
  return Number(value.toFixed(decimals));
}

/**
 * Percent change from `previous` to `current`, rounded to 4 decimals.
 *
 * A zero `previous` yields 0 instead of Infinity/NaN. This is an
 * approximation kept for output compatibility, not a meaningful return.
 */
export function safePctChange(current: number, previous: number): number {
  if (previous === 0) return 0;
  return roundTo(((current - previous) / previous) * 100);
}
