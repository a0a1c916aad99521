import { describe, expect, it, vi } from 'vitest';
import { MalformedBatchError } from '../src/errors.js';
import { buildDailySlice, dropIncompleteDay, runBatches } from '../src/services/pipeline.js';
import { TEST_SETTINGS, headline, memoryBatch } from './helpers.js';

const SCENARIO = [
  headline('2022-01-01 08:00:00', 'Positive'),
  headline('2022-01-01 12:00:00', 'Positive'),
  headline('2022-01-01 18:00:00', 'Neutral'),
  headline('2022-01-03 09:00:00', 'Negative'),
];

describe('buildDailySlice', () => {
  it('turns a sparse batch into a dense daily slice', () => {
    expect(buildDailySlice(SCENARIO, { settings: TEST_SETTINGS, today: '2022-06-01' })).toEqual([
      { date: '2022-01-01', negative: 0, neutral: 1, positive: 2, total: 3, indexValue: 1 },
      { date: '2022-01-02', negative: 0, neutral: 0, positive: 0, total: 0, indexValue: 1 },
      { date: '2022-01-03', negative: 1, neutral: 0, positive: 0, total: 1, indexValue: -1 },
    ]);
  });

  it('drops the processing date because it is incomplete', () => {
    const rows = buildDailySlice(SCENARIO, { settings: TEST_SETTINGS, today: '2022-01-03' });
    expect(rows?.map((r) => r.date)).toEqual(['2022-01-01', '2022-01-02']);
  });

  it('returns null when nothing is in scope', () => {
    const records = SCENARIO.map((r) => ({ ...r, topicLabel: 'Other' }));
    expect(buildDailySlice(records, { settings: TEST_SETTINGS, today: '2022-06-01' })).toBeNull();
    expect(buildDailySlice([], { settings: TEST_SETTINGS, today: '2022-06-01' })).toBeNull();
  });

  it('returns null when only the incomplete day remains', () => {
    const records = [headline('2022-01-03 09:00:00', 'Negative')];
    expect(buildDailySlice(records, { settings: TEST_SETTINGS, today: '2022-01-03' })).toBeNull();
  });
});

describe('dropIncompleteDay', () => {
  it('keeps rows when the last day is not today', () => {
    const rows = [{ date: '2022-01-01' }, { date: '2022-01-02' }];
    expect(dropIncompleteDay(rows, '2022-01-03')).toEqual(rows);
  });
});

describe('runBatches', () => {
  it('keeps batch order and skips failing batches', async () => {
    const broken = {
      period: '2022-02',
      load: vi.fn(async () => {
        throw new MalformedBatchError('2022-02.csv is missing column(s): sentiment');
      }),
    };
    const outcomes = await runBatches(
      [
        memoryBatch('2022-01', SCENARIO),
        broken,
        memoryBatch('2022-03', []),
      ],
      { settings: TEST_SETTINGS, today: '2022-06-01', concurrency: 2 },
    );

    expect(outcomes.map((o) => [o.period, o.status])).toEqual([
      ['2022-01', 'ok'],
      ['2022-02', 'skipped'],
      ['2022-03', 'empty'],
    ]);
    expect(outcomes[1]).toEqual({
      period: '2022-02',
      status: 'skipped',
      reason: '2022-02.csv is missing column(s): sentiment',
    });
    expect(broken.load).toHaveBeenCalledTimes(1);
  });
});
