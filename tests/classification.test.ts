import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { classifyFile, classifyHistory, classifyLatest, periodsToClassify } from '../src/services/classification.js';
import type { Classification, HeadlineClassifier } from '../src/types.js';

class KeywordClassifier implements HeadlineClassifier {
  readonly calls: string[][] = [];

  async classify(headlines: string[]): Promise<Classification[]> {
    this.calls.push(headlines);
    return headlines.map((h) => ({
      topic: h.includes('Stocks') ? 'Economics' : 'Other',
      sentiment: h.includes('rally') ? 'Positive' : 'Neutral',
    }));
  }
}

const RAW = [
  'date,headline,section',
  '2022-01-03 09:15:00,Stocks rally on jobs data,Business',
  '2022-01-04 10:00:00,,Metro',
  '2022-01-05 11:00:00,"Weather, mostly sunny",Weather',
  '',
].join('\n');

describe('classification', () => {
  let root: string;
  let rawDir: string;
  let outDir: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'classify-'));
    rawDir = path.join(root, 'raw');
    outDir = path.join(root, 'classified');
    await mkdir(rawDir);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes a classified batch and drops empty headlines', async () => {
    await writeFile(path.join(rawDir, '2022-01.csv'), RAW);
    const classifier = new KeywordClassifier();

    const rows = await classifyFile(classifier, path.join(rawDir, '2022-01.csv'), path.join(outDir, '2022-01.csv'));

    expect(rows).toBe(2);
    expect(classifier.calls).toEqual([['Stocks rally on jobs data', 'Weather, mostly sunny']]);
    expect(await readFile(path.join(outDir, '2022-01.csv'), 'utf-8')).toBe(
      [
        'date,headline,section,topic,sentiment',
        '2022-01-03 09:15:00,Stocks rally on jobs data,Business,Economics,Positive',
        '2022-01-05 11:00:00,"Weather, mostly sunny",Weather,Other,Neutral',
        '',
      ].join('\n'),
    );
  });

  it('classifies only periods without output unless overwriting', async () => {
    await writeFile(path.join(rawDir, '2022-01.csv'), RAW);
    await writeFile(path.join(rawDir, '2022-02.csv'), RAW);
    await mkdir(outDir);
    await writeFile(path.join(outDir, '2022-01.csv'), 'date,headline,section,topic,sentiment\n');

    expect(await periodsToClassify(rawDir, outDir, false)).toEqual(['2022-02']);
    expect(await periodsToClassify(rawDir, outDir, true)).toEqual(['2022-01', '2022-02']);

    const done = await classifyHistory({ classifier: new KeywordClassifier(), inputDir: rawDir, outputDir: outDir });
    expect(done).toEqual(['2022-02']);
    expect((await readdir(outDir)).sort()).toEqual(['2022-01.csv', '2022-02.csv']);
  });

  it('reclassifies the newest classified period on latest', async () => {
    await writeFile(path.join(rawDir, '2022-01.csv'), RAW);
    await writeFile(path.join(rawDir, '2022-02.csv'), RAW);
    await writeFile(path.join(rawDir, '2022-03.csv'), RAW);
    await mkdir(outDir);
    await writeFile(path.join(outDir, '2022-01.csv'), 'date,headline,section,topic,sentiment\n');
    await writeFile(path.join(outDir, '2022-02.csv'), 'date,headline,section,topic,sentiment\n');

    const done = await classifyLatest({ classifier: new KeywordClassifier(), inputDir: rawDir, outputDir: outDir });
    expect(done).toEqual(['2022-02', '2022-03']);
    const feb = await readFile(path.join(outDir, '2022-02.csv'), 'utf-8');
    expect(feb.split('\n')).toHaveLength(4);
  });
});
