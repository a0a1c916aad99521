import type { HeadlineRecord } from '../types.js';
import { countWords } from '../utils/normalize.js';

export interface FilterOptions {
  topic: string;
  minHeadlineWords: number;
}

/**
 * Keep headlines labelled with the in-scope topic that have at least
 * `minHeadlineWords` whitespace-separated tokens.
 */
export function filterHeadlines(records: readonly HeadlineRecord[], opts: FilterOptions): HeadlineRecord[] {
  return records.filter(
    (record) => record.topicLabel === opts.topic && countWords(record.headline) >= opts.minHeadlineWords,
  );
}
