import { getConfig } from '../config.js';

/**
 * Request budget for the archive feed.
 * Tracks request counts in-memory (per-process) against a per-minute window
 * and a daily cap. The Archive API allows 500 requests per day, 5 per minute.
 */

export interface RequestBudgetOptions {
  // caps are hints; if omitted, we don't block but still count
  dailyRequestsCap?: number;
  perMinuteCap?: number;
  // time provider for testing
  now?: () => number; // ms epoch
}

const MINUTE_MS = 60 * 1000;

export class RequestBudget {
  private dailyRequestsCap?: number;
  private perMinuteCap?: number;

  private now: () => number;

  // in-memory counters
  private dayKey?: string;
  private dayCount = 0;

  private windowStart = 0;
  private windowCount = 0;

  constructor(opts?: RequestBudgetOptions) {
    const cfg = getConfig();
    this.dailyRequestsCap = opts?.dailyRequestsCap ?? cfg.rateLimits.dailyRequestsCap;
    this.perMinuteCap = opts?.perMinuteCap ?? cfg.rateLimits.perMinuteCap;
    this.now = opts?.now ?? (() => Date.now());
  }

  /**
   * Whether today's cap has been used up. Waiting will not help until tomorrow (UTC).
   */
  isDailyCapReached(): boolean {
    if (this.dailyRequestsCap == null) return false;
    const todayCount = this.dayKey === this.formatDayKey(this.now()) ? this.dayCount : 0;
    return todayCount >= this.dailyRequestsCap;
  }

  /**
   * Milliseconds until the per-minute window admits another request (0 when it does now).
   */
  msUntilNextSlot(): number {
    if (this.perMinuteCap == null) return 0;
    const elapsed = this.now() - this.windowStart;
    if (elapsed >= MINUTE_MS || this.windowCount < this.perMinuteCap) return 0;
    return MINUTE_MS - elapsed;
  }

  /**
   * Record N requests just made (default 1). Updates per-minute and daily windows.
   */
  recordRequest(count = 1): void {
    const now = this.now();

    if (now - this.windowStart >= MINUTE_MS) {
      this.windowStart = now;
      this.windowCount = 0;
    }
    this.windowCount += count;

    const todayKey = this.formatDayKey(now);
    if (this.dayKey !== todayKey) {
      this.dayKey = todayKey;
      this.dayCount = 0;
    }
    this.dayCount += count;
  }

  getState() {
    return {
      perMinute: {
        cap: this.perMinuteCap,
        windowStart: this.windowStart,
        windowCount: this.windowCount,
      },
      daily: {
        cap: this.dailyRequestsCap,
        dayKey: this.dayKey,
        dayCount: this.dayCount,
      },
    };
  }

  private formatDayKey(ms: number): string {
    return new Date(ms).toISOString().slice(0, 10);
  }
}
