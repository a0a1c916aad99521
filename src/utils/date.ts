import * as chrono from 'chrono-node';
import type { DayKey, PeriodKey } from '../types.js';

const DAY_RE = /^\d{4}-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\d|3[01])$/;
const PERIOD_RE = /^\d{4}-(?:0[1-9]|1[0-2])$/;
const TIMESTAMP_RE = /^(\d{4}-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\d|3[01]))(?:[ T].*)?$/;
const MS_IN_DAY = 24 * 60 * 60 * 1000;

/**
 * Normalize a Date or date-like string to YYYY-MM-DD in UTC.
 */
export function normalizeDate(input: Date | string): DayKey {
  const d = input instanceof Date ? input : new Date(input);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid date: ${input}`);
  }
  // Convert to YYYY-MM-DD in UTC
  const year = d.getUTCFullYear();
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a natural language input into YYYY-MM-DD (UTC) using chrono-node.
 * Examples: "today", "yesterday", "2025-02-11"
 */
export function parseDateNL(input: string, now: Date = new Date()): DayKey {
  // First, if it's already YYYY-MM-DD, return as-is
  if (DAY_RE.test(input)) {
    return input;
  }
  const parsed = chrono.parseDate(input, now, { forwardDate: false });
  if (!parsed) {
    throw new Error(
      'Could not understand the date input. Try "today", "yesterday", or a specific date like 2025-02-11.'
    );
  }
  return normalizeDate(parsed);
}

export function isDayKey(value: string): boolean {
  if (!DAY_RE.test(value)) return false;
  // Reject calendar overflow such as 2023-02-30
  return normalizeDate(`${value}T00:00:00.000Z`) === value;
}

export function isPeriodKey(value: string): boolean {
  return PERIOD_RE.test(value);
}

/**
 * Calendar day of a timestamp, taken from its date portion without any
 * timezone conversion. Returns null when the timestamp has no valid date prefix.
 */
export function dayOfTimestamp(timestamp: string): DayKey | null {
  const match = TIMESTAMP_RE.exec(timestamp.trim());
  if (!match) return null;
  return isDayKey(match[1]) ? match[1] : null;
}

export function addDays(day: DayKey, days: number): DayKey {
  const d = new Date(`${day}T00:00:00.000Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return normalizeDate(d);
}

/** Whole days from `start` to `end` (negative when end is earlier). */
export function daysBetween(start: DayKey, end: DayKey): number {
  const a = Date.parse(`${start}T00:00:00.000Z`);
  const b = Date.parse(`${end}T00:00:00.000Z`);
  return Math.round((b - a) / MS_IN_DAY);
}

/** The period (YYYY-MM) a day belongs to. */
export function periodOf(day: DayKey): PeriodKey {
  return day.slice(0, 7);
}

export function periodOfDate(date: Date): PeriodKey {
  return normalizeDate(date).slice(0, 7);
}

/**
 * Render a timestamp in UTC without an offset: YYYY-MM-DD HH:MM:SS.
 * Offsets written as +0000 are accepted as well as +00:00.
 */
export function toNaiveUtcTimestamp(input: string): string {
  const withColon = input.trim().replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
  const d = new Date(withColon);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid timestamp: ${input}`);
  }
  return d.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Generate a list of month ranges between startMonth and endMonth inclusive.
 * Inputs are YYYY-MM strings. Output ranges are in YYYY-MM-DD (UTC) strings.
 */
export function monthRange(
  startMonth: PeriodKey,
  endMonth: PeriodKey,
): { period: PeriodKey; start: DayKey; end: DayKey }[] {
  if (!isPeriodKey(startMonth)) {
    throw new Error(`Invalid startMonth format: ${startMonth}`);
  }
  if (!isPeriodKey(endMonth)) {
    throw new Error(`Invalid endMonth format: ${endMonth}`);
  }

  const start = new Date(`${startMonth}-01T00:00:00.000Z`);
  const end = new Date(`${endMonth}-01T00:00:00.000Z`);
  const ranges: { period: PeriodKey; start: DayKey; end: DayKey }[] = [];

  if (start.getTime() > end.getTime()) {
    return ranges;
  }

  const cur = new Date(start.getTime());
  while (cur.getTime() <= end.getTime()) {
    const y = cur.getUTCFullYear();
    const m = cur.getUTCMonth(); // 0-based
    // last day of month: day 0 of next month in UTC
    const lastDay = new Date(Date.UTC(y, m + 1, 0)).getUTCDate();
    const monthStr = String(m + 1).padStart(2, '0');

    ranges.push({
      period: `${y}-${monthStr}`,
      start: `${y}-${monthStr}-01`,
      end: `${y}-${monthStr}-${String(lastDay).padStart(2, '0')}`,
    });

    // advance one month
    cur.setUTCMonth(cur.getUTCMonth() + 1);
    // normalize to first of month to avoid date overflow
    cur.setUTCDate(1);
  }

  return ranges;
}
