import { z } from 'zod';
import { SENTIMENT_LABELS } from '../constants/index.js';
import { dayOfTimestamp, isDayKey } from '../utils/date.js';

const TimestampSchema = z
  .string()
  .trim()
  .refine((value) => dayOfTimestamp(value) !== null, { message: 'Expected a timestamp starting with YYYY-MM-DD' });

/** Records as produced by csv-parse with a header row. */
export const CsvRecordsSchema = z.array(z.record(z.string()));

export const RawHeadlineRowSchema = z.object({
  date: TimestampSchema,
  headline: z.string(),
  section: z.string().default(''),
});

export const ClassifiedHeadlineRowSchema = z.object({
  date: TimestampSchema,
  headline: z.string(),
  section: z.string().default(''),
  topic: z.string().trim(),
  sentiment: z.enum(SENTIMENT_LABELS),
});

const CountCell = z
  .string()
  .trim()
  .regex(/^\d+(?:\.0+)?$/, 'Expected a non-negative integer count')
  .transform((value) => Number(value));

const NullableNumberCell = z
  .string()
  .trim()
  .transform((value, ctx) => {
    if (value === '' || value.toLowerCase() === 'nan') return null;
    const n = Number(value);
    if (!Number.isFinite(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a number, got "${value}"` });
      return z.NEVER;
    }
    return n;
  });

/** One stored index row as read from CSV cells. */
export const IndexCsvRowSchema = z
  .object({
    date: z.string().trim().refine(isDayKey, { message: 'Expected YYYY-MM-DD' }),
    negative: CountCell,
    neutral: CountCell,
    positive: CountCell,
    total: CountCell,
    index_value: NullableNumberCell,
    smoothed_index_value: NullableNumberCell,
  })
  .refine((row) => row.total === row.negative + row.neutral + row.positive, {
    message: 'total must equal negative + neutral + positive',
  });

/** One stored index row as read from Arrow columns. */
export const IndexColumnarRowSchema = z
  .object({
    date: z.string().refine(isDayKey, { message: 'Expected YYYY-MM-DD' }),
    negative: z.number().int().nonnegative(),
    neutral: z.number().int().nonnegative(),
    positive: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
    index_value: z.number().nullable(),
    smoothed_index_value: z.number().nullable(),
  })
  .refine((row) => row.total === row.negative + row.neutral + row.positive, {
    message: 'total must equal negative + neutral + positive',
  });

export type IndexColumnarRow = z.infer<typeof IndexColumnarRowSchema>;

/** The subset of an Archive API response the feed reads. */
export const ArchiveResponseSchema = z.object({
  response: z.object({
    docs: z.array(
      z.object({
        pub_date: z.string(),
        headline: z
          .object({
            main: z.string().nullable().optional(),
          })
          .nullable()
          .optional(),
        news_desk: z.string().nullable().optional(),
      }),
    ),
  }),
});

export type ArchiveResponse = z.infer<typeof ArchiveResponseSchema>;
