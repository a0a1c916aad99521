import { OverlapDetectedError } from '../errors.js';
import type { DailyRow } from '../types.js';
import { addDays, daysBetween } from '../utils/date.js';

/**
 * Mean of the non-null index values among the last `fillWindow` rows of the
 * dense series (earlier fills and bridge rows included), or 0 when there are none.
 */
function trailingIndexMean(series: readonly DailyRow[], fillWindow: number): number {
  const tail = series.slice(-fillWindow);
  let sum = 0;
  let count = 0;
  for (const row of tail) {
    if (row.indexValue !== null) {
      sum += row.indexValue;
      count += 1;
    }
  }
  return count ? sum / count : 0;
}

/**
 * Append a dense slice after the end of a dense series.
 *
 * Rows already in `series` are returned untouched. Calendar days between the
 * series and the slice (a period with no batch) are bridged with zero-count
 * rows carrying the mean index value of the series' last `fillWindow` rows.
 * A slice that starts on or before the series' last day is an overlap.
 */
export function appendSlice(
  series: readonly DailyRow[],
  slice: readonly DailyRow[],
  fillWindow: number,
  label = 'slice',
): DailyRow[] {
  if (!slice.length) return [...series];
  if (!series.length) return [...slice];

  const last = series[series.length - 1].date;
  const first = slice[0].date;
  const gap = daysBetween(last, first);

  if (gap <= 0) {
    throw new OverlapDetectedError(
      `${label} starts on ${first} but the series already covers up to ${last}`,
      { seriesEnd: last, sliceStart: first, label },
    );
  }

  const bridge: DailyRow[] = [];
  if (gap > 1) {
    const fill = trailingIndexMean(series, fillWindow);
    for (let offset = 1; offset < gap; offset++) {
      bridge.push({
        date: addDays(last, offset),
        negative: 0,
        neutral: 0,
        positive: 0,
        total: 0,
        indexValue: fill,
      });
    }
  }

  return [...series, ...bridge, ...slice];
}
