/**
 * Centralized configuration loader for the news sentiment index.
 * Reads environment variables, parses types, and exposes a typed config object.
 *
 * Environment variables (see .env.example):
 * - INDEX_PATH (default: data/nyt-index.csv; .csv, .arrow or .feather)
 * - RAW_DATA_DIR (default: data/raw-nyt-data)
 * - CLASSIFIED_DATA_DIR (default: data/classified-nyt-data)
 * - INDEX_TOPIC (default: Economics)
 * - MIN_HEADLINE_WORDS (default: 3)
 * - FILL_WINDOW (default: 365)
 * - SMOOTHING_SPAN (default: 100)
 * - TREND_WINDOW_DAYS (default: 2555, seven years)
 * - BATCH_CONCURRENCY (default: 4)
 * - NYT_API_KEY (required for download commands only)
 * - NYT_API_BASE_URL (default: https://api.nytimes.com/svc/)
 * - RATE_LIMIT_DAILY_REQUESTS (default: 500)
 * - RATE_LIMIT_PER_MINUTE (default: 5)
 * - LOG_LEVEL (default: info)
 */

import { config } from 'dotenv';
import {
  DEFAULT_FILL_WINDOW,
  DEFAULT_MIN_HEADLINE_WORDS,
  DEFAULT_SMOOTHING_SPAN,
  DEFAULT_TOPIC,
  DEFAULT_TREND_WINDOW_DAYS,
} from './constants/index.js';

// Load environment variables from .env file
config();

export interface IndexSettings {
  topic: string;
  minHeadlineWords: number;
  fillWindow: number;
  smoothingSpan: number;
  trendWindow: number;
}

export interface AppConfig {
  indexPath: string;
  rawDataDir: string;
  classifiedDataDir: string;
  index: IndexSettings;
  batchConcurrency: number;
  nytApiKey: string;
  nytApiBaseUrl: string;
  rateLimits: {
    dailyRequestsCap?: number;
    perMinuteCap?: number;
  };
  logLevel: string;
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const n = parseNumber(value);
  return n !== undefined && Number.isInteger(n) && n > 0 ? n : fallback;
}

export function getConfig(): AppConfig {
  const indexPath = process.env.INDEX_PATH?.trim() || 'data/nyt-index.csv';
  const rawDataDir = process.env.RAW_DATA_DIR?.trim() || 'data/raw-nyt-data';
  const classifiedDataDir = process.env.CLASSIFIED_DATA_DIR?.trim() || 'data/classified-nyt-data';

  const index: IndexSettings = {
    topic: process.env.INDEX_TOPIC?.trim() || DEFAULT_TOPIC,
    minHeadlineWords: parsePositiveInt(process.env.MIN_HEADLINE_WORDS, DEFAULT_MIN_HEADLINE_WORDS),
    fillWindow: parsePositiveInt(process.env.FILL_WINDOW, DEFAULT_FILL_WINDOW),
    smoothingSpan: parsePositiveInt(process.env.SMOOTHING_SPAN, DEFAULT_SMOOTHING_SPAN),
    trendWindow: parsePositiveInt(process.env.TREND_WINDOW_DAYS, DEFAULT_TREND_WINDOW_DAYS),
  };

  const batchConcurrency = parsePositiveInt(process.env.BATCH_CONCURRENCY, 4);

  const nytApiKey = process.env.NYT_API_KEY || '';
  const nytApiBaseUrl = process.env.NYT_API_BASE_URL?.trim() || 'https://api.nytimes.com/svc/';

  const rateLimits = {
    dailyRequestsCap: parseNumber(process.env.RATE_LIMIT_DAILY_REQUESTS) ?? 500,
    perMinuteCap: parseNumber(process.env.RATE_LIMIT_PER_MINUTE) ?? 5,
  };

  const logLevel = process.env.LOG_LEVEL?.trim() || 'info';

  return {
    indexPath,
    rawDataDir,
    classifiedDataDir,
    index,
    batchConcurrency,
    nytApiKey,
    nytApiBaseUrl,
    rateLimits,
    logLevel,
  };
}

/**
 * Guard for commands that talk to the archive feed.
 * Index construction itself never needs the key.
 */
export function assertFeedConfig(cfg: AppConfig) {
  if (!cfg.nytApiKey) {
    throw new Error(
      'NYT_API_KEY environment variable is required. You can get an API key from https://developer.nytimes.com.',
    );
  }
}
