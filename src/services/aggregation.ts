import type { DailyAggregate, DailyRow, DayKey, HeadlineRecord } from '../types.js';
import { dayOfTimestamp } from '../utils/date.js';

/**
 * Count Negative / Neutral / Positive labels per calendar day.
 * Every label is reported (0 when absent). Output is ascending by date.
 * Records whose timestamp has no date portion are ignored.
 */
export function aggregateDaily(records: readonly HeadlineRecord[]): DailyAggregate[] {
  const byDay = new Map<DayKey, DailyAggregate>();

  for (const record of records) {
    const date = dayOfTimestamp(record.timestamp);
    if (!date) continue;

    let agg = byDay.get(date);
    if (!agg) {
      agg = { date, negative: 0, neutral: 0, positive: 0 };
      byDay.set(date, agg);
    }

    switch (record.sentimentLabel) {
      case 'Negative':
        agg.negative += 1;
        break;
      case 'Neutral':
        agg.neutral += 1;
        break;
      case 'Positive':
        agg.positive += 1;
        break;
    }
  }

  return Array.from(byDay.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * (positive - negative) / (positive + negative), or null when the day has
 * neither positive nor negative headlines.
 */
export function computeIndexValue(positive: number, negative: number): number | null {
  const polar = positive + negative;
  if (polar === 0) return null;
  return (positive - negative) / polar;
}

export function toDailyRows(aggregates: readonly DailyAggregate[]): DailyRow[] {
  return aggregates.map((agg) => ({
    date: agg.date,
    negative: agg.negative,
    neutral: agg.neutral,
    positive: agg.positive,
    total: agg.negative + agg.neutral + agg.positive,
    indexValue: computeIndexValue(agg.positive, agg.negative),
  }));
}
