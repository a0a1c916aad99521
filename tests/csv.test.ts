import { describe, expect, it } from 'vitest';
import { MalformedBatchError } from '../src/errors.js';
import { formatRawBatch, parseClassifiedBatch, parseRawBatch } from '../src/services/batches.js';

describe('batch CSV reading', () => {
  it('reads quoted fields with commas, quotes and line breaks', () => {
    const text = [
      '\uFEFFdate,headline,section,topic,sentiment',
      '2022-01-01 05:00:00,"Oil, gas ""surge""",Business,Economics,Negative',
      '',
      '2022-01-02 06:00:00,"Two\nline headline",,Economics,Positive',
      '',
    ].join('\r\n');
    expect(parseClassifiedBatch(text).map((r) => r.headline)).toEqual(['Oil, gas "surge"', 'Two\nline headline']);
  });

  it('treats the section column as optional', () => {
    expect(parseClassifiedBatch('date,headline,topic,sentiment\n2022-01-01,Stocks slide again,Economics,Neutral')).toEqual([
      { timestamp: '2022-01-01', headline: 'Stocks slide again', topicLabel: 'Economics', sentimentLabel: 'Neutral' },
    ]);
  });

  it('rejects text that is not CSV', () => {
    const text = 'date,headline,section\n2022-01-01,"never closed,Business\n';
    expect(() => parseRawBatch(text, '2022-01.csv')).toThrow(MalformedBatchError);
    expect(() => parseRawBatch(text, '2022-01.csv')).toThrow('2022-01.csv is not valid CSV');
  });
});

describe('batch CSV writing', () => {
  it('quotes only fields that need it', () => {
    expect(
      formatRawBatch([{ timestamp: '2022-01-01 05:00:00', headline: 'Says "no", again', section: '' }]),
    ).toBe('date,headline,section\n2022-01-01 05:00:00,"Says ""no"", again",\n');
  });

  it('writes the header for an empty batch', () => {
    expect(formatRawBatch([])).toBe('date,headline,section\n');
  });
});
