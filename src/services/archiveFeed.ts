import axios, { type AxiosInstance } from 'axios';
import { getConfig } from '../config.js';
import { FeedError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { ArchiveResponseSchema, type ArchiveResponse } from '../schemas/records.js';
import type { PeriodKey, RawHeadline, SourceFeed } from '../types.js';
import { isPeriodKey, toNaiveUtcTimestamp } from '../utils/date.js';
import { RequestBudget } from './requestBudget.js';

export interface ArchiveFeedOptions {
  apiKey?: string;
  baseUrl?: string;
  http?: AxiosInstance;
  budget?: RequestBudget;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Client for the New York Times Archive API: every article's headline for one month.
 */
export class ArchiveFeedClient implements SourceFeed {
  private readonly http: AxiosInstance;
  private readonly apiKey: string;
  private readonly budget: RequestBudget;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: ArchiveFeedOptions = {}) {
    const cfg = getConfig();
    this.apiKey = opts.apiKey ?? cfg.nytApiKey;
    if (!this.apiKey) {
      throw new Error('NYT_API_KEY is required to initialize ArchiveFeedClient');
    }
    this.http =
      opts.http ??
      axios.create({
        baseURL: opts.baseUrl ?? cfg.nytApiBaseUrl,
        timeout: 60000,
      });
    this.budget = opts.budget ?? new RequestBudget();
    this.sleep = opts.sleep ?? defaultSleep;
  }

  /**
   * Headlines published in `period` (YYYY-MM), ascending by timestamp.
   */
  async fetchMonth(period: PeriodKey): Promise<RawHeadline[]> {
    if (!isPeriodKey(period)) {
      throw new FeedError(`Invalid period: ${period}`);
    }
    await this.waitForSlot();

    const [year, month] = period.split('-');
    const reqPath = `archive/v1/${year}/${Number(month)}.json`;
    logger.debug({ period, path: reqPath }, 'Fetching archive month');

    let body: unknown;
    try {
      const { data } = await this.http.get<unknown>(reqPath, { params: { 'api-key': this.apiKey } });
      body = data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new FeedError(`Archive request for ${period} failed: ${errorMessage(error)}`, { period, status });
    } finally {
      this.budget.recordRequest();
    }

    const parsed = ArchiveResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FeedError(`Unexpected archive response for ${period}`, parsed.error.issues);
    }
    return this.mapDocs(parsed.data, period);
  }

  private async waitForSlot(): Promise<void> {
    if (this.budget.isDailyCapReached()) {
      throw new FeedError('Daily archive request cap reached', this.budget.getState());
    }
    let wait = this.budget.msUntilNextSlot();
    while (wait > 0) {
      logger.info({ waitMs: wait }, 'Archive rate limit reached, waiting');
      await this.sleep(wait);
      wait = this.budget.msUntilNextSlot();
    }
  }

  /**
   * Map archive docs to raw headlines. Docs with an unreadable pub_date are dropped.
   */
  private mapDocs(data: ArchiveResponse, period: PeriodKey): RawHeadline[] {
    const headlines: RawHeadline[] = [];
    let dropped = 0;
    for (const doc of data.response.docs) {
      let timestamp: string;
      try {
        timestamp = toNaiveUtcTimestamp(doc.pub_date);
      } catch {
        dropped++;
        continue;
      }
      headlines.push({
        timestamp,
        headline: doc.headline?.main ?? '',
        section: doc.news_desk ?? '',
      });
    }
    if (dropped) {
      logger.warn({ period, dropped }, 'Dropped archive docs without a readable pub_date');
    }
    return headlines.sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
  }
}
