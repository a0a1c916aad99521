export type IndexErrorCode =
  | 'MALFORMED_BATCH'
  | 'STORE_CORRUPT'
  | 'OVERLAP_DETECTED'
  | 'UNSUPPORTED_FORMAT'
  | 'FEED_ERROR';

export class IndexError extends Error {
  constructor(
    message: string,
    public readonly code: IndexErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'IndexError';
  }
}

/** A batch could not be parsed into records. The run skips it. */
export class MalformedBatchError extends IndexError {
  constructor(message: string, details?: unknown) {
    super(message, 'MALFORMED_BATCH', details);
    this.name = 'MalformedBatchError';
  }
}

/** The persisted index cannot serve as a baseline. Fatal for append. */
export class StoreCorruptError extends IndexError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORE_CORRUPT', details);
    this.name = 'StoreCorruptError';
  }
}

/** Two slices claim the same calendar day. */
export class OverlapDetectedError extends IndexError {
  constructor(message: string, details?: unknown) {
    super(message, 'OVERLAP_DETECTED', details);
    this.name = 'OverlapDetectedError';
  }
}

export class UnsupportedFormatError extends IndexError {
  constructor(path: string) {
    super(`Index file must be .csv, .arrow or .feather: ${path}`, 'UNSUPPORTED_FORMAT', { path });
    this.name = 'UnsupportedFormatError';
  }
}

export class FeedError extends IndexError {
  constructor(message: string, details?: unknown) {
    super(message, 'FEED_ERROR', details);
    this.name = 'FeedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
