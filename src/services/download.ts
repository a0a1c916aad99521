import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { getConfig } from '../config.js';
import { FeedError } from '../errors.js';
import { logger } from '../logger.js';
import type { PeriodKey, SourceFeed } from '../types.js';
import { monthRange, periodOfDate } from '../utils/date.js';
import { fileExists, writeFileAtomic } from '../utils/fs.js';
import { formatRawBatch, listBatchFiles } from './batches.js';

export interface DownloadOptions {
  feed: SourceFeed;
  outputDir?: string;
  /** Clock for "current month"; defaults to now. */
  now?: Date;
}

export interface DownloadSummary {
  written: PeriodKey[];
  existing: PeriodKey[];
  /** Set when the feed refused further requests (e.g. daily cap). */
  stoppedAt?: PeriodKey;
}

/**
 * Download each period in order, writing one raw batch file per month.
 * A feed failure stops the run; files already written stay.
 */
async function downloadPeriods(
  periods: readonly PeriodKey[],
  opts: DownloadOptions & { overwrite: boolean },
): Promise<DownloadSummary> {
  const outputDir = opts.outputDir ?? getConfig().rawDataDir;
  const summary: DownloadSummary = { written: [], existing: [] };

  for (const period of periods) {
    const filePath = path.join(outputDir, `${period}.csv`);
    if (!opts.overwrite && (await fileExists(filePath))) {
      summary.existing.push(period);
      continue;
    }

    try {
      const headlines = await opts.feed.fetchMonth(period);
      await writeFileAtomic(filePath, formatRawBatch(headlines));
      summary.written.push(period);
      logger.info({ period, headlines: headlines.length }, 'Downloaded archive month');
    } catch (err) {
      if (!(err instanceof FeedError)) throw err;
      logger.warn({ period, err }, 'Archive feed stopped the download');
      summary.stoppedAt = period;
      break;
    }
  }

  return summary;
}

/**
 * Download every month from January of `startYear` up to the current month.
 * Months already on disk are kept unless `overwrite` is set.
 */
export async function downloadHistory(
  startYear: number,
  opts: DownloadOptions & { overwrite?: boolean },
): Promise<DownloadSummary> {
  const current = periodOfDate(opts.now ?? new Date());
  const periods = monthRange(`${String(startYear).padStart(4, '0')}-01`, current).map((r) => r.period);
  return downloadPeriods(periods, { ...opts, overwrite: opts.overwrite ?? false });
}

/**
 * Re-download from the newest raw month on disk up to the current month.
 * The newest month is fetched again because it was likely incomplete when first downloaded.
 */
export async function downloadLatest(opts: DownloadOptions): Promise<DownloadSummary> {
  const outputDir = opts.outputDir ?? getConfig().rawDataDir;
  const current = periodOfDate(opts.now ?? new Date());
  await mkdir(outputDir, { recursive: true });
  const files = await listBatchFiles(outputDir);
  const newest = files.length ? files[files.length - 1].period : current;
  const periods = monthRange(newest, current).map((r) => r.period);
  return downloadPeriods(periods, { ...opts, outputDir, overwrite: true });
}
