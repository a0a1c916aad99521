import { DEFAULT_FILL_WINDOW } from '../constants/index.js';
import type { DailyRow } from '../types.js';
import { addDays, daysBetween } from '../utils/date.js';
import { rollingMean } from './rolling.js';

/**
 * Expand a sparse, ascending daily series to one row per calendar day between
 * its first and last date.
 *
 * Missing days get zero counts. A missing or null index value is replaced by the
 * trailing mean of the last `fillWindow` observations, taken from the latest
 * observed day at or before it. Anything still unresolved becomes 0.
 */
export function resampleDaily(rows: readonly DailyRow[], fillWindow = DEFAULT_FILL_WINDOW): DailyRow[] {
  if (!rows.length) return [];

  const trailing = rollingMean(
    rows.map((row) => row.indexValue),
    fillWindow,
    1,
  );

  const first = rows[0].date;
  const span = daysBetween(first, rows[rows.length - 1].date);
  const dense: DailyRow[] = [];
  let cursor = 0;
  let fill: number | null = null;

  for (let offset = 0; offset <= span; offset++) {
    const date = addDays(first, offset);
    const observed = cursor < rows.length && rows[cursor].date === date ? rows[cursor] : undefined;

    if (observed) {
      fill = trailing[cursor];
      cursor += 1;
      dense.push({
        date,
        negative: observed.negative,
        neutral: observed.neutral,
        positive: observed.positive,
        total: observed.total,
        indexValue: observed.indexValue ?? fill ?? 0,
      });
    } else {
      dense.push({
        date,
        negative: 0,
        neutral: 0,
        positive: 0,
        total: 0,
        indexValue: fill ?? 0,
      });
    }
  }

  return dense;
}
