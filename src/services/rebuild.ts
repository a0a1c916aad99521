import { getConfig, type IndexSettings } from '../config.js';
import { logger } from '../logger.js';
import type { BatchSource, DailyRow, DayKey, IndexRow, PeriodKey } from '../types.js';
import { batchesFrom } from './batches.js';
import type { IndexStore } from './indexStore.js';
import { runBatches, type BatchOutcome } from './pipeline.js';
import { appendSlice } from './series.js';
import { applySmoothing } from './smoothing.js';

export interface IndexRunOptions {
  source: BatchSource;
  store: IndexStore;
  /** Processing date, YYYY-MM-DD. */
  today: DayKey;
  settings?: IndexSettings;
  concurrency?: number;
}

export interface RebuildOptions extends IndexRunOptions {
  /** Only batches from this period (YYYY-MM) onwards. */
  fromPeriod?: PeriodKey;
}

export interface IndexRunResult {
  rows: IndexRow[];
  rowsAdded: number;
  batches: {
    processed: number;
    empty: number;
    skipped: PeriodKey[];
  };
}

export function resolveRunSettings(opts: IndexRunOptions): { settings: IndexSettings; concurrency: number } {
  const cfg = getConfig();
  return {
    settings: opts.settings ?? cfg.index,
    concurrency: opts.concurrency ?? cfg.batchConcurrency,
  };
}

export function summarizeOutcomes(outcomes: readonly BatchOutcome[]): IndexRunResult['batches'] {
  return {
    processed: outcomes.filter((o) => o.status === 'ok').length,
    empty: outcomes.filter((o) => o.status === 'empty').length,
    skipped: outcomes.filter((o) => o.status === 'skipped').map((o) => o.period),
  };
}

/**
 * Concatenate batch slices in batch order. Overlapping slices raise
 * OverlapDetectedError; gaps between slices are bridged.
 */
export function mergeOutcomes(
  base: readonly DailyRow[],
  outcomes: readonly BatchOutcome[],
  fillWindow: number,
  fromDate?: DayKey,
): DailyRow[] {
  let series: DailyRow[] = [...base];
  for (const outcome of outcomes) {
    if (outcome.status !== 'ok') continue;
    const rows = fromDate ? outcome.rows.filter((row) => row.date >= fromDate) : outcome.rows;
    if (!rows.length) continue;
    series = appendSlice(series, rows, fillWindow, `batch ${outcome.period}`);
  }
  return series;
}

/**
 * Build the index from nothing over every available batch, smooth it and
 * replace the store. Nothing is written if a merge fails.
 */
export async function rebuildIndex(opts: RebuildOptions): Promise<IndexRunResult> {
  const { settings, concurrency } = resolveRunSettings(opts);

  const available = await opts.source.listBatches();
  const batches = opts.fromPeriod ? batchesFrom(available, opts.fromPeriod) : available;
  logger.info({ batches: batches.length, fromPeriod: opts.fromPeriod, today: opts.today }, 'Rebuilding index');

  const outcomes = await runBatches(batches, { settings, today: opts.today, concurrency });
  const series = mergeOutcomes([], outcomes, settings.fillWindow);
  const rows = applySmoothing(series, settings);

  await opts.store.save(rows);

  const result: IndexRunResult = {
    rows,
    rowsAdded: rows.length,
    batches: summarizeOutcomes(outcomes),
  };
  logger.info(
    { rows: rows.length, location: opts.store.location, ...result.batches },
    'Index rebuilt',
  );
  return result;
}
