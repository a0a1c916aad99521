/**
 * Index construction defaults. Every value can be overridden through config.ts.
 */

/** Topic label a headline must carry to count towards the index. */
export const DEFAULT_TOPIC = 'Economics';

/** Headlines shorter than this many whitespace-separated tokens are ignored. */
export const DEFAULT_MIN_HEADLINE_WORDS = 3;

/** Trailing observations averaged when filling days without a net sentiment signal. */
export const DEFAULT_FILL_WINDOW = 365;

/** EMA span of the smoothed index (alpha = 2 / (span + 1)). */
export const DEFAULT_SMOOTHING_SPAN = 100;

/**
 * Trend window (days) subtracted from the smoothed index.
 * Seven years; earlier history of this index used ten (365 * 10).
 */
export const DEFAULT_TREND_WINDOW_DAYS = 365 * 7;

/** Added back after detrending so the oscillation centres on 0.5. */
export const DETREND_OFFSET = 0.5;

export const SENTIMENT_LABELS = ['Negative', 'Neutral', 'Positive'] as const;

/** Column order of the persisted index. `date` is the key. */
export const INDEX_COLUMNS = [
  'date',
  'negative',
  'neutral',
  'positive',
  'total',
  'index_value',
  'smoothed_index_value',
] as const;

/** Column order of raw (unclassified) batch files. */
export const RAW_BATCH_COLUMNS = ['date', 'headline', 'section'] as const;

/** Column order of classified batch files. */
export const CLASSIFIED_BATCH_COLUMNS = ['date', 'headline', 'section', 'topic', 'sentiment'] as const;
