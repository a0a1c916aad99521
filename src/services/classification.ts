import { mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import type { HeadlineClassifier, PeriodKey } from '../types.js';
import { writeFileAtomic } from '../utils/fs.js';
import { formatClassifiedBatch, listBatchFiles, parseRawBatch } from './batches.js';

export interface ClassifyOptions {
  classifier: HeadlineClassifier;
  inputDir?: string;
  outputDir?: string;
}

function resolveDirs(opts: ClassifyOptions): { inputDir: string; outputDir: string } {
  const cfg = getConfig();
  return {
    inputDir: opts.inputDir ?? cfg.rawDataDir,
    outputDir: opts.outputDir ?? cfg.classifiedDataDir,
  };
}

/**
 * Classify one raw batch file into a classified batch file.
 * Rows with an empty headline are dropped. Returns the number of rows written.
 */
export async function classifyFile(
  classifier: HeadlineClassifier,
  inputPath: string,
  outputPath: string,
): Promise<number> {
  const text = await readFile(inputPath, 'utf-8');
  const headlines = parseRawBatch(text, path.basename(inputPath)).filter((h) => h.headline.trim() !== '');
  const labels = await classifier.classify(headlines.map((h) => h.headline));
  await writeFileAtomic(outputPath, formatClassifiedBatch(headlines, labels));
  return headlines.length;
}

/**
 * Raw periods with no classified counterpart, or every raw period when overwriting.
 */
export async function periodsToClassify(
  inputDir: string,
  outputDir: string,
  overwrite: boolean,
): Promise<PeriodKey[]> {
  const raw = (await listBatchFiles(inputDir)).map((f) => f.period);
  if (overwrite) return raw;
  const done = new Set((await listBatchFiles(outputDir)).map((f) => f.period));
  return raw.filter((period) => !done.has(period));
}

async function classifyPeriods(periods: readonly PeriodKey[], opts: ClassifyOptions): Promise<PeriodKey[]> {
  const { inputDir, outputDir } = resolveDirs(opts);
  for (const period of periods) {
    const rows = await classifyFile(
      opts.classifier,
      path.join(inputDir, `${period}.csv`),
      path.join(outputDir, `${period}.csv`),
    );
    logger.info({ period, rows }, 'Classified batch');
  }
  return [...periods];
}

/** Classify every raw batch not yet classified (all of them when overwriting). */
export async function classifyHistory(opts: ClassifyOptions & { overwrite?: boolean }): Promise<PeriodKey[]> {
  const { inputDir, outputDir } = resolveDirs(opts);
  await mkdir(outputDir, { recursive: true });
  const periods = await periodsToClassify(inputDir, outputDir, opts.overwrite ?? false);
  return classifyPeriods(periods, opts);
}

/**
 * Classify new raw batches, plus the newest classified one again: its raw file
 * may have been re-downloaded with more headlines since.
 */
export async function classifyLatest(opts: ClassifyOptions): Promise<PeriodKey[]> {
  const { inputDir, outputDir } = resolveDirs(opts);
  await mkdir(outputDir, { recursive: true });
  const pending = await periodsToClassify(inputDir, outputDir, false);
  const classified = await listBatchFiles(outputDir);
  const rawPeriods = new Set((await listBatchFiles(inputDir)).map((f) => f.period));

  const newest = classified.length ? classified[classified.length - 1].period : undefined;
  const periods = newest && rawPeriods.has(newest) && !pending.includes(newest) ? [newest, ...pending] : pending;
  return classifyPeriods(periods, opts);
}
