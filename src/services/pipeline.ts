import type { IndexSettings } from '../config.js';
import { errorMessage, IndexError } from '../errors.js';
import { logger } from '../logger.js';
import type { Batch, DailyRow, DayKey, HeadlineRecord, PeriodKey } from '../types.js';
import { aggregateDaily, toDailyRows } from './aggregation.js';
import { filterHeadlines } from './filter.js';
import { resampleDaily } from './resample.js';

export interface SliceOptions {
  settings: IndexSettings;
  /** Processing date. A slice ending on this day is still incomplete. */
  today: DayKey;
}

/**
 * Drop the last row when it is the processing date: that day's headlines are
 * still coming in and its counts would be biased low.
 */
export function dropIncompleteDay<T extends { date: DayKey }>(rows: readonly T[], today: DayKey): T[] {
  if (rows.length && rows[rows.length - 1].date === today) {
    return rows.slice(0, -1);
  }
  return [...rows];
}

/**
 * Turn one classified batch into a dense daily slice.
 * Returns null when nothing in the batch survives filtering (a normal outcome
 * for sparse periods, not an error).
 */
export function buildDailySlice(records: readonly HeadlineRecord[], opts: SliceOptions): DailyRow[] | null {
  const { settings, today } = opts;
  const filtered = filterHeadlines(records, settings);
  if (!filtered.length) return null;

  const daily = toDailyRows(aggregateDaily(filtered));
  const dense = resampleDaily(daily, settings.fillWindow);
  const complete = dropIncompleteDay(dense, today);
  return complete.length ? complete : null;
}

export type BatchOutcome =
  | { period: PeriodKey; status: 'ok'; rows: DailyRow[] }
  | { period: PeriodKey; status: 'empty' }
  | { period: PeriodKey; status: 'skipped'; reason: string };

export interface RunBatchesOptions extends SliceOptions {
  concurrency: number;
}

async function runBatch(batch: Batch, opts: SliceOptions): Promise<BatchOutcome> {
  try {
    const records = await batch.load();
    const rows = buildDailySlice(records, opts);
    if (!rows) {
      logger.info({ period: batch.period, records: records.length }, 'Batch has no in-scope headlines');
      return { period: batch.period, status: 'empty' };
    }
    return { period: batch.period, status: 'ok', rows };
  } catch (err) {
    const code = err instanceof IndexError ? err.code : undefined;
    logger.warn({ period: batch.period, code, err }, 'Skipping batch that could not be processed');
    return { period: batch.period, status: 'skipped', reason: errorMessage(err) };
  }
}

/**
 * Run the per-batch pipeline over many batches, `concurrency` at a time.
 * Outcomes keep the order of `batches`; a failing batch never aborts the run.
 */
export async function runBatches(batches: readonly Batch[], opts: RunBatchesOptions): Promise<BatchOutcome[]> {
  const size = Math.max(1, opts.concurrency);
  const outcomes: BatchOutcome[] = [];

  for (let i = 0; i < batches.length; i += size) {
    const chunk = batches.slice(i, i + size);
    const chunkOutcomes = await Promise.all(chunk.map((batch) => runBatch(batch, opts)));
    outcomes.push(...chunkOutcomes);
  }

  return outcomes;
}
