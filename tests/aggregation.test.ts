import { describe, expect, it } from 'vitest';
import { aggregateDaily, computeIndexValue, toDailyRows } from '../src/services/aggregation.js';
import { headline } from './helpers.js';

describe('aggregateDaily', () => {
  it('counts labels per calendar day in ascending order', () => {
    const records = [
      headline('2022-01-02 10:00:00', 'Positive'),
      headline('2022-01-01 09:00:00', 'Negative'),
      headline('2022-01-02 23:59:59', 'Positive'),
      headline('2022-01-01T22:00:00+0000', 'Neutral'),
    ];
    expect(aggregateDaily(records)).toEqual([
      { date: '2022-01-01', negative: 1, neutral: 1, positive: 0 },
      { date: '2022-01-02', negative: 0, neutral: 0, positive: 2 },
    ]);
  });

  it('uses the date portion without timezone conversion', () => {
    const [day] = aggregateDaily([headline('2022-03-01T23:30:00-0500', 'Positive')]);
    expect(day.date).toBe('2022-03-01');
  });
});

describe('computeIndexValue', () => {
  it('is the net share of polar headlines', () => {
    expect(computeIndexValue(2, 0)).toBe(1);
    expect(computeIndexValue(1, 3)).toBe(-0.5);
  });

  it('is null, not zero, without polar headlines', () => {
    expect(computeIndexValue(0, 0)).toBeNull();
  });
});

describe('toDailyRows', () => {
  it('adds totals and index values', () => {
    expect(
      toDailyRows([
        { date: '2022-01-01', negative: 1, neutral: 2, positive: 3 },
        { date: '2022-01-02', negative: 0, neutral: 4, positive: 0 },
      ]),
    ).toEqual([
      { date: '2022-01-01', negative: 1, neutral: 2, positive: 3, total: 6, indexValue: 0.5 },
      { date: '2022-01-02', negative: 0, neutral: 4, positive: 0, total: 4, indexValue: null },
    ]);
  });
});
