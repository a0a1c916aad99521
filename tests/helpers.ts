import type { IndexSettings } from '../src/config.js';
import type { Batch, HeadlineRecord, SentimentLabel } from '../src/types.js';

export const TEST_SETTINGS: IndexSettings = {
  topic: 'Economics',
  minHeadlineWords: 3,
  fillWindow: 365,
  smoothingSpan: 5,
  trendWindow: 10,
};

export function headline(
  timestamp: string,
  sentimentLabel: SentimentLabel,
  overrides: Partial<HeadlineRecord> = {},
): HeadlineRecord {
  return {
    timestamp,
    headline: 'Markets react to jobs report',
    topicLabel: 'Economics',
    sentimentLabel,
    ...overrides,
  };
}

export function memoryBatch(period: string, records: HeadlineRecord[]): Batch {
  return { period, load: async () => records };
}

const LABELS: SentimentLabel[] = ['Positive', 'Negative', 'Neutral', 'Positive'];

/**
 * One economics headline per listed day (label cycling from `seed`), plus an
 * out-of-scope headline that the filter must drop.
 */
export function monthRecords(period: string, days: number[], seed = 0): HeadlineRecord[] {
  const records = days.map((day, i) =>
    headline(`${period}-${String(day).padStart(2, '0')} 10:00:00`, LABELS[(i + seed) % LABELS.length]),
  );
  records.push(headline(`${period}-0${1 + (seed % 9)} 12:00:00`, 'Negative', { topicLabel: 'Sports' }));
  return records;
}
