import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { MalformedBatchError, errorMessage } from '../errors.js';
import { CLASSIFIED_BATCH_COLUMNS, RAW_BATCH_COLUMNS } from '../constants/index.js';
import { logger } from '../logger.js';
import { ClassifiedHeadlineRowSchema, CsvRecordsSchema, RawHeadlineRowSchema } from '../schemas/records.js';
import type { Batch, BatchSource, Classification, HeadlineRecord, PeriodKey, RawHeadline } from '../types.js';
import { isPeriodKey } from '../utils/date.js';

const BATCH_FILE_RE = /^(\d{4}-\d{2})\.csv$/;
const REQUIRED_COLUMNS = ['date', 'headline', 'topic', 'sentiment'] as const;

/** Period key of a batch file name such as 2022-01.csv, or null. */
export function periodFromFileName(fileName: string): PeriodKey | null {
  const match = BATCH_FILE_RE.exec(fileName);
  return match && isPeriodKey(match[1]) ? match[1] : null;
}

/** Batch files in `dir`, ascending by period. */
export async function listBatchFiles(dir: string): Promise<{ period: PeriodKey; file: string }[]> {
  const entries = await readdir(dir);
  return entries
    .map((file) => ({ file, period: periodFromFileName(file) }))
    .filter((entry): entry is { file: string; period: PeriodKey } => entry.period !== null)
    .sort((a, b) => (a.period < b.period ? -1 : a.period > b.period ? 1 : 0));
}

/**
 * Read a batch file into header-keyed records. Throws MalformedBatchError when
 * the text is not CSV or a `required` column is missing; a file without a
 * header gives no records.
 */
function readBatchRecords(text: string, required: readonly string[], label: string): Record<string, string>[] {
  let header: string[] = [];
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      columns: (names: string[]) => {
        header = names.map((name) => name.trim());
        return header;
      },
    });
  } catch (err) {
    throw new MalformedBatchError(`${label} is not valid CSV: ${errorMessage(err)}`);
  }
  if (!header.length) return [];

  const missing = required.filter((col) => !header.includes(col));
  if (missing.length) {
    throw new MalformedBatchError(`${label} is missing column(s): ${missing.join(', ')}`, { missing });
  }

  const records = CsvRecordsSchema.safeParse(parsed);
  if (!records.success) {
    throw new MalformedBatchError(`${label} could not be read as records`, records.error.issues);
  }
  return records.data;
}

/**
 * Validate each record, keeping the ones that pass. Rows that fail (an unknown
 * sentiment label, an unreadable date) are dropped with one warning per batch.
 */
function validRows<T>(
  records: readonly Record<string, string>[],
  label: string,
  toRow: (raw: Record<string, string>) => T | null,
): T[] {
  const rows: T[] = [];
  const invalid: number[] = [];
  records.forEach((raw, idx) => {
    const row = toRow(raw);
    if (row === null) {
      invalid.push(idx + 1);
    } else {
      rows.push(row);
    }
  });
  if (invalid.length) {
    logger.warn({ batch: label, dropped: invalid.length, rows: invalid.slice(0, 20) }, 'Dropped invalid batch rows');
  }
  return rows;
}

/**
 * Parse a classified batch file (date, headline, section, topic, sentiment).
 * Missing columns make the whole batch malformed.
 */
export function parseClassifiedBatch(text: string, label = 'batch'): HeadlineRecord[] {
  const records = readBatchRecords(text, REQUIRED_COLUMNS, label);
  return validRows(records, label, (raw) => {
    const parsed = ClassifiedHeadlineRowSchema.safeParse(raw);
    if (!parsed.success) return null;
    return {
      timestamp: parsed.data.date,
      headline: parsed.data.headline,
      topicLabel: parsed.data.topic,
      sentimentLabel: parsed.data.sentiment,
    };
  });
}

/**
 * Parse a raw (unclassified) batch file: date, headline, section.
 */
export function parseRawBatch(text: string, label = 'batch'): RawHeadline[] {
  const records = readBatchRecords(text, ['date', 'headline'], label);
  return validRows(records, label, (raw) => {
    const parsed = RawHeadlineRowSchema.safeParse(raw);
    if (!parsed.success) return null;
    return { timestamp: parsed.data.date, headline: parsed.data.headline, section: parsed.data.section };
  });
}

export function formatRawBatch(headlines: readonly RawHeadline[]): string {
  return stringify(
    headlines.map((h) => [h.timestamp, h.headline, h.section]),
    { header: true, columns: [...RAW_BATCH_COLUMNS] },
  );
}

export function formatClassifiedBatch(headlines: readonly RawHeadline[], labels: readonly Classification[]): string {
  if (headlines.length !== labels.length) {
    throw new Error(`Expected ${headlines.length} classifications, got ${labels.length}`);
  }
  return stringify(
    headlines.map((h, idx) => [h.timestamp, h.headline, h.section, labels[idx].topic, labels[idx].sentiment]),
    { header: true, columns: [...CLASSIFIED_BATCH_COLUMNS] },
  );
}

/** Classified batches stored as YYYY-MM.csv files in one directory. */
export class DirectoryBatchSource implements BatchSource {
  constructor(private readonly dir: string) {}

  async listBatches(): Promise<Batch[]> {
    const files = await listBatchFiles(this.dir);
    return files.map(({ period, file }) => ({
      period,
      load: () => this.load(file),
    }));
  }

  private async load(file: string): Promise<HeadlineRecord[]> {
    let text: string;
    try {
      text = await readFile(path.join(this.dir, file), 'utf-8');
    } catch (err) {
      throw new MalformedBatchError(`Could not read ${file}: ${errorMessage(err)}`);
    }
    return parseClassifiedBatch(text, file);
  }
}

/** Batches whose period is not before `period`. */
export function batchesFrom<T extends { period: PeriodKey }>(batches: readonly T[], period: PeriodKey): T[] {
  return batches.filter((batch) => batch.period >= period);
}
