/**
 * Shared types for the news sentiment index.
 */

import type { SENTIMENT_LABELS } from './constants/index.js';

export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

/** A calendar day as YYYY-MM-DD, timezone-naive. */
export type DayKey = string;

/** A batch period as YYYY-MM. */
export type PeriodKey = string;

/** A headline as delivered by the source feed, before classification. */
export interface RawHeadline {
  timestamp: string; // YYYY-MM-DD HH:MM:SS, timezone-naive
  headline: string;
  section: string;
}

/** A classified headline. Read-only to the index engine. */
export interface HeadlineRecord {
  timestamp: string;
  headline: string;
  topicLabel: string;
  sentimentLabel: SentimentLabel;
}

export interface DailyAggregate {
  date: DayKey;
  negative: number;
  neutral: number;
  positive: number;
}

/**
 * One day of a batch slice. `indexValue` is null when the day had no
 * positive or negative headline and has not been gap-filled yet.
 */
export interface DailyRow extends DailyAggregate {
  total: number;
  indexValue: number | null;
}

/** The persisted unit: one row per calendar day. */
export interface IndexRow extends DailyRow {
  smoothedIndexValue: number | null;
}

/** Classified headlines of one period, loaded on demand. */
export interface Batch {
  period: PeriodKey;
  load(): Promise<HeadlineRecord[]>;
}

export interface BatchSource {
  /** Available batches, ascending by period. */
  listBatches(): Promise<Batch[]>;
}

export interface Classification {
  topic: string;
  sentiment: SentimentLabel;
}

/**
 * Assigns a topic and a sentiment label to each headline.
 * Output has the same length and order as the input.
 */
export interface HeadlineClassifier {
  classify(headlines: string[]): Promise<Classification[]>;
}

/** Supplies the raw headlines of one period. */
export interface SourceFeed {
  fetchMonth(period: PeriodKey): Promise<RawHeadline[]>;
}
