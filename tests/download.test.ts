import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FeedError } from '../src/errors.js';
import { downloadHistory, downloadLatest } from '../src/services/download.js';
import type { PeriodKey, RawHeadline, SourceFeed } from '../src/types.js';

class FakeFeed implements SourceFeed {
  readonly requested: PeriodKey[] = [];

  constructor(private readonly failAt?: PeriodKey) {}

  async fetchMonth(period: PeriodKey): Promise<RawHeadline[]> {
    this.requested.push(period);
    if (period === this.failAt) throw new FeedError('Daily archive request cap reached');
    return [{ timestamp: `${period}-01 08:00:00`, headline: `Markets open, ${period}`, section: 'Business' }];
  }
}

describe('download', () => {
  let dir: string;
  const now = new Date('2022-03-15T12:00:00Z');

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'raw-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one raw batch per month up to the current month', async () => {
    const feed = new FakeFeed();
    const summary = await downloadHistory(2021, { feed, outputDir: dir, now: new Date('2021-02-10T00:00:00Z') });

    expect(summary).toEqual({ written: ['2021-01', '2021-02'], existing: [] });
    expect((await readdir(dir)).sort()).toEqual(['2021-01.csv', '2021-02.csv']);
    expect(await readFile(path.join(dir, '2021-02.csv'), 'utf-8')).toBe(
      'date,headline,section\n2021-02-01 08:00:00,"Markets open, 2021-02",Business\n',
    );
  });

  it('keeps months already on disk unless overwriting', async () => {
    await writeFile(path.join(dir, '2022-01.csv'), 'date,headline,section\n');
    const feed = new FakeFeed();

    const summary = await downloadHistory(2022, { feed, outputDir: dir, now });
    expect(summary).toEqual({ written: ['2022-02', '2022-03'], existing: ['2022-01'] });
    expect(feed.requested).toEqual(['2022-02', '2022-03']);

    const again = await downloadHistory(2022, { feed: new FakeFeed(), outputDir: dir, now, overwrite: true });
    expect(again.written).toEqual(['2022-01', '2022-02', '2022-03']);
  });

  it('stops at the first feed failure and keeps earlier files', async () => {
    const feed = new FakeFeed('2022-02');
    const summary = await downloadHistory(2022, { feed, outputDir: dir, now });

    expect(summary).toEqual({ written: ['2022-01'], existing: [], stoppedAt: '2022-02' });
    expect(feed.requested).toEqual(['2022-01', '2022-02']);
    expect(await readdir(dir)).toEqual(['2022-01.csv']);
  });

  it('refetches from the newest month on disk', async () => {
    await writeFile(path.join(dir, '2021-12.csv'), 'date,headline,section\n');
    await writeFile(path.join(dir, '2022-02.csv'), 'date,headline,section\n');
    const feed = new FakeFeed();

    const summary = await downloadLatest({ feed, outputDir: dir, now });
    expect(feed.requested).toEqual(['2022-02', '2022-03']);
    expect(summary.written).toEqual(['2022-02', '2022-03']);
  });

  it('fetches only the current month into an empty directory', async () => {
    const target = path.join(dir, 'nested');
    const feed = new FakeFeed();
    await downloadLatest({ feed, outputDir: target, now });
    expect(feed.requested).toEqual(['2022-03']);
    expect(await readdir(target)).toEqual(['2022-03.csv']);
  });
});
