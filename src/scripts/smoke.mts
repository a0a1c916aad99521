#!/usr/bin/env node
import { ArchiveFeedClient } from '../services/archiveFeed.js';
import { periodOfDate } from '../utils/date.js';

async function main() {
  const arg = process.argv[2];
  let period: string;

  if (arg) {
    period = arg;
  } else {
    const d = new Date();
    d.setUTCMonth(d.getUTCMonth() - 1, 1); // last month UTC
    period = periodOfDate(d);
  }

  const client = new ArchiveFeedClient();
  console.log('[SMOKE] Fetching archive month:', period);

  try {
    const headlines = await client.fetchMonth(period);
    console.log('[SMOKE] Headlines fetched:', headlines.length);
    console.log('[SMOKE] Sample:', headlines.slice(0, 3));
    process.exit(0);
  } catch (err) {
    console.error('[SMOKE] Error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

main().catch((e: unknown) => {
  console.error('[SMOKE] Uncaught error:', e instanceof Error ? e.message : String(e));
  process.exit(1);
});
