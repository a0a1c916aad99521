import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { Float64, Int32, Table, Utf8, tableFromIPC, tableToIPC, vectorFromArray } from 'apache-arrow';
import { INDEX_COLUMNS } from '../constants/index.js';
import { StoreCorruptError, UnsupportedFormatError, errorMessage } from '../errors.js';
import {
  CsvRecordsSchema,
  IndexColumnarRowSchema,
  IndexCsvRowSchema,
  type IndexColumnarRow,
} from '../schemas/records.js';
import type { IndexRow } from '../types.js';
import { writeFileAtomic } from '../utils/fs.js';

export type IndexFormat = 'csv' | 'arrow';

/**
 * Durable, ordered, date-keyed table of index rows.
 */
export interface IndexStore {
  readonly location: string;
  load(): Promise<IndexRow[]>;
  /** Replace the whole store. Readers see either the old or the new rows. */
  save(rows: readonly IndexRow[]): Promise<void>;
}

export function formatFromPath(filePath: string): IndexFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.arrow' || ext === '.feather') return 'arrow';
  throw new UnsupportedFormatError(filePath);
}

function formatNumber(value: number | null): string {
  return value === null ? '' : String(value);
}

function encodeCsv(rows: readonly IndexRow[]): string {
  return stringify(
    rows.map((row) => [
      row.date,
      String(row.negative),
      String(row.neutral),
      String(row.positive),
      String(row.total),
      formatNumber(row.indexValue),
      formatNumber(row.smoothedIndexValue),
    ]),
    { header: true, columns: [...INDEX_COLUMNS] },
  );
}

function decodeCsv(text: string, location: string): IndexRow[] {
  let header: string[] = [];
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      skip_empty_lines: true,
      columns: (names: string[]) => {
        header = names.map((name) => name.trim());
        return header;
      },
    });
  } catch (err) {
    throw new StoreCorruptError(`${location} is not valid CSV: ${errorMessage(err)}`);
  }

  const missing = INDEX_COLUMNS.filter((col) => !header.includes(col));
  if (missing.length) {
    throw new StoreCorruptError(`${location} is missing column(s): ${missing.join(', ')}`, { missing });
  }

  const records = CsvRecordsSchema.safeParse(parsed);
  if (!records.success) {
    throw new StoreCorruptError(`${location} could not be read as records`, records.error.issues);
  }
  return records.data.map((raw, idx) => {
    const row = IndexCsvRowSchema.safeParse(raw);
    if (!row.success) {
      throw new StoreCorruptError(`${location} row ${idx + 1} is invalid`, row.error.issues);
    }
    return fromStoredRow(row.data);
  });
}

function encodeArrow(rows: readonly IndexRow[]): Uint8Array {
  const table = new Table({
    date: vectorFromArray(
      rows.map((r) => r.date),
      new Utf8(),
    ),
    negative: vectorFromArray(
      rows.map((r) => r.negative),
      new Int32(),
    ),
    neutral: vectorFromArray(
      rows.map((r) => r.neutral),
      new Int32(),
    ),
    positive: vectorFromArray(
      rows.map((r) => r.positive),
      new Int32(),
    ),
    total: vectorFromArray(
      rows.map((r) => r.total),
      new Int32(),
    ),
    index_value: vectorFromArray(
      rows.map((r) => r.indexValue),
      new Float64(),
    ),
    smoothed_index_value: vectorFromArray(
      rows.map((r) => r.smoothedIndexValue),
      new Float64(),
    ),
  });
  return tableToIPC(table, 'file');
}

function decodeArrow(bytes: Uint8Array, location: string): IndexRow[] {
  let table: Table;
  try {
    table = tableFromIPC(bytes);
  } catch (err) {
    throw new StoreCorruptError(`${location} is not a readable Arrow file: ${errorMessage(err)}`);
  }

  const missing = INDEX_COLUMNS.filter((col) => table.getChild(col) === null);
  if (missing.length) {
    throw new StoreCorruptError(`${location} is missing column(s): ${missing.join(', ')}`, { missing });
  }

  const rows: IndexRow[] = [];
  for (let i = 0; i < table.numRows; i++) {
    const raw: Record<string, unknown> = {};
    for (const col of INDEX_COLUMNS) {
      raw[col] = table.getChild(col)?.get(i) ?? null;
    }
    const parsed = IndexColumnarRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StoreCorruptError(`${location} row ${i + 1} is invalid`, parsed.error.issues);
    }
    rows.push(fromStoredRow(parsed.data));
  }
  return rows;
}

function fromStoredRow(row: IndexColumnarRow): IndexRow {
  return {
    date: row.date,
    negative: row.negative,
    neutral: row.neutral,
    positive: row.positive,
    total: row.total,
    indexValue: row.index_value,
    smoothedIndexValue: row.smoothed_index_value,
  };
}

function assertAscending(rows: readonly IndexRow[], location: string): void {
  for (let i = 1; i < rows.length; i++) {
    if (rows[i].date <= rows[i - 1].date) {
      throw new StoreCorruptError(`${location} dates are not strictly increasing at ${rows[i].date}`);
    }
  }
}

/**
 * Load the index stored at `filePath`. The encoding follows the extension.
 */
export async function loadIndex(filePath: string): Promise<IndexRow[]> {
  const format = formatFromPath(filePath);
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (err) {
    throw new StoreCorruptError(`Could not read index ${filePath}: ${errorMessage(err)}`);
  }

  const rows = format === 'csv' ? decodeCsv(bytes.toString('utf-8'), filePath) : decodeArrow(bytes, filePath);
  assertAscending(rows, filePath);
  return rows;
}

/**
 * Write the index to `filePath`, replacing any previous version atomically.
 */
export async function storeIndex(rows: readonly IndexRow[], filePath: string): Promise<void> {
  const format = formatFromPath(filePath);
  const payload = format === 'csv' ? encodeCsv(rows) : encodeArrow(rows);
  await writeFileAtomic(filePath, payload);
}

export class FileIndexStore implements IndexStore {
  constructor(public readonly location: string) {
    formatFromPath(location);
  }

  load(): Promise<IndexRow[]> {
    return loadIndex(this.location);
  }

  save(rows: readonly IndexRow[]): Promise<void> {
    return storeIndex(rows, this.location);
  }
}

/** In-process store, used for dry runs and tests. */
export class MemoryIndexStore implements IndexStore {
  readonly location = 'memory';
  private rows: IndexRow[] | null;

  constructor(rows?: readonly IndexRow[]) {
    this.rows = rows ? rows.map((row) => ({ ...row })) : null;
  }

  async load(): Promise<IndexRow[]> {
    if (this.rows === null) {
      throw new StoreCorruptError('No index has been stored yet');
    }
    return this.rows.map((row) => ({ ...row }));
  }

  async save(rows: readonly IndexRow[]): Promise<void> {
    this.rows = rows.map((row) => ({ ...row }));
  }
}
