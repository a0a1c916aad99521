import { describe, expect, it } from 'vitest';
import {
  addDays,
  dayOfTimestamp,
  daysBetween,
  isDayKey,
  monthRange,
  parseDateNL,
  periodOf,
  toNaiveUtcTimestamp,
} from '../src/utils/date.js';

describe('day arithmetic', () => {
  it('crosses month and leap-year boundaries', () => {
    expect(addDays('2022-02-28', 1)).toBe('2022-03-01');
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2022-01-01', -1)).toBe('2021-12-31');
    expect(daysBetween('2022-01-30', '2022-03-01')).toBe(30);
  });

  it('validates calendar days', () => {
    expect(isDayKey('2024-02-29')).toBe(true);
    expect(isDayKey('2023-02-29')).toBe(false);
    expect(isDayKey('2023-2-01')).toBe(false);
  });

  it('takes the period of a day', () => {
    expect(periodOf('2022-01-31')).toBe('2022-01');
  });
});

describe('dayOfTimestamp', () => {
  it('keeps the written date portion', () => {
    expect(dayOfTimestamp('2022-01-05 23:59:59')).toBe('2022-01-05');
    expect(dayOfTimestamp('2022-01-05T23:00:00-0500')).toBe('2022-01-05');
    expect(dayOfTimestamp('2022-01-05')).toBe('2022-01-05');
  });

  it('rejects timestamps without a valid date prefix', () => {
    expect(dayOfTimestamp('05/01/2022')).toBeNull();
    expect(dayOfTimestamp('2022-02-30 10:00:00')).toBeNull();
    expect(dayOfTimestamp('2022-01-051')).toBeNull();
  });
});

describe('toNaiveUtcTimestamp', () => {
  it('converts offsets to UTC and drops them', () => {
    expect(toNaiveUtcTimestamp('2022-01-01T23:30:00-0500')).toBe('2022-01-02 04:30:00');
    expect(toNaiveUtcTimestamp('2022-01-02T05:00:00+0000')).toBe('2022-01-02 05:00:00');
    expect(toNaiveUtcTimestamp('2022-01-02T05:00:00Z')).toBe('2022-01-02 05:00:00');
  });

  it('throws on unreadable input', () => {
    expect(() => toNaiveUtcTimestamp('yesterday-ish')).toThrow('Invalid timestamp: yesterday-ish');
  });
});

describe('monthRange', () => {
  it('lists months inclusively across years', () => {
    expect(monthRange('2021-11', '2022-02').map((r) => r.period)).toEqual(['2021-11', '2021-12', '2022-01', '2022-02']);
    expect(monthRange('2024-02', '2024-02')).toEqual([{ period: '2024-02', start: '2024-02-01', end: '2024-02-29' }]);
    expect(monthRange('2022-03', '2022-01')).toEqual([]);
  });
});

describe('parseDateNL', () => {
  it('passes through ISO days', () => {
    expect(parseDateNL('2022-06-01')).toBe('2022-06-01');
  });

  it('rejects input it cannot understand', () => {
    expect(() => parseDateNL('not a date at all')).toThrow('Could not understand the date input');
  });
});
