import { StoreCorruptError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { DailyRow, IndexRow } from '../types.js';
import { addDays, periodOf } from '../utils/date.js';
import { batchesFrom } from './batches.js';
import { runBatches } from './pipeline.js';
import {
  mergeOutcomes,
  rebuildIndex,
  resolveRunSettings,
  summarizeOutcomes,
  type IndexRunOptions,
  type IndexRunResult,
} from './rebuild.js';
import { applySmoothing } from './smoothing.js';

export interface AppendResult extends IndexRunResult {
  /** First day that could be added; null when the store was empty. */
  appendStart: string | null;
}

async function loadBaseline(opts: IndexRunOptions): Promise<IndexRow[]> {
  try {
    return await opts.store.load();
  } catch (err) {
    if (err instanceof StoreCorruptError) throw err;
    throw new StoreCorruptError(`Could not load index from ${opts.store.location}: ${errorMessage(err)}`);
  }
}

function withoutSmoothing(row: IndexRow): DailyRow {
  return {
    date: row.date,
    negative: row.negative,
    neutral: row.neutral,
    positive: row.positive,
    total: row.total,
    indexValue: row.indexValue,
  };
}

/**
 * Extend the stored index with the days after its last row.
 *
 * Only batches whose month is not before the first missing day are processed,
 * and their slices are cut to start at that day. Stored counts and index values
 * are kept as they are; the smoothed column is recomputed over the whole series.
 * An unreadable store is fatal; an empty one is rebuilt from every batch.
 */
export async function appendIndex(opts: IndexRunOptions): Promise<AppendResult> {
  const { settings, concurrency } = resolveRunSettings(opts);
  const persisted = await loadBaseline(opts);

  if (!persisted.length) {
    logger.info({ location: opts.store.location }, 'Index is empty, rebuilding from all batches');
    const rebuilt = await rebuildIndex({ ...opts, settings, concurrency });
    return { ...rebuilt, appendStart: null };
  }

  const appendStart = addDays(persisted[persisted.length - 1].date, 1);
  const batches = batchesFrom(await opts.source.listBatches(), periodOf(appendStart));
  logger.info({ appendStart, batches: batches.map((b) => b.period), today: opts.today }, 'Appending to index');

  const outcomes = await runBatches(batches, { settings, today: opts.today, concurrency });
  const series = mergeOutcomes(persisted.map(withoutSmoothing), outcomes, settings.fillWindow, appendStart);
  const rows = applySmoothing(series, settings);

  await opts.store.save(rows);

  const result: AppendResult = {
    rows,
    rowsAdded: rows.length - persisted.length,
    batches: summarizeOutcomes(outcomes),
    appendStart,
  };
  logger.info(
    { rowsAdded: result.rowsAdded, rows: rows.length, location: opts.store.location, ...result.batches },
    'Index appended',
  );
  return result;
}
