import { DEFAULT_SMOOTHING_SPAN, DEFAULT_TREND_WINDOW_DAYS, DETREND_OFFSET } from '../constants/index.js';
import type { DailyRow, IndexRow } from '../types.js';
import { ewmMean, rollingMean, type NumericSeries } from './rolling.js';

export interface SmoothingOptions {
  smoothingSpan: number;
  trendWindow: number;
}

const DEFAULTS: SmoothingOptions = {
  smoothingSpan: DEFAULT_SMOOTHING_SPAN,
  trendWindow: DEFAULT_TREND_WINDOW_DAYS,
};

/**
 * Smoothed and detrended index: EMA(span) - SMA(trendWindow) + 0.5.
 * Null until the trend window is full.
 */
export function computeSmoothedIndex(values: NumericSeries, opts: SmoothingOptions = DEFAULTS): (number | null)[] {
  const smoothed = ewmMean(values, opts.smoothingSpan);
  const trend = rollingMean(values, opts.trendWindow);

  return smoothed.map((s, i) => {
    const t = trend[i];
    return s === null || t === null ? null : s - t + DETREND_OFFSET;
  });
}

/**
 * Recompute the smoothed column over the whole series. Always a full pass:
 * both averages depend on the complete causal history.
 */
export function applySmoothing(rows: readonly DailyRow[], opts: SmoothingOptions = DEFAULTS): IndexRow[] {
  const smoothed = computeSmoothedIndex(
    rows.map((row) => row.indexValue),
    opts,
  );
  return rows.map((row, i) => ({
    date: row.date,
    negative: row.negative,
    neutral: row.neutral,
    positive: row.positive,
    total: row.total,
    indexValue: row.indexValue,
    smoothedIndexValue: smoothed[i],
  }));
}
