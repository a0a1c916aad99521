import { assertFeedConfig, getConfig } from './config.js';
import { logger } from './logger.js';
import { appendIndex } from './services/append.js';
import { ArchiveFeedClient } from './services/archiveFeed.js';
import { DirectoryBatchSource } from './services/batches.js';
import { classifyHistory, classifyLatest } from './services/classification.js';
import { LexiconClassifier } from './services/classifier.js';
import { downloadHistory, downloadLatest } from './services/download.js';
import { FileIndexStore } from './services/indexStore.js';
import { rebuildIndex, type IndexRunResult } from './services/rebuild.js';
import type { DayKey, HeadlineClassifier, PeriodKey, SourceFeed } from './types.js';
import { isPeriodKey, normalizeDate, parseDateNL } from './utils/date.js';

export type CommandName = 'rebuild' | 'append' | 'download' | 'classify' | 'history' | 'latest';

export interface CliCommand {
  name: CommandName;
  today: DayKey;
  indexPath: string;
  fromPeriod?: PeriodKey;
  startYear: number;
  latest: boolean;
  overwrite: boolean;
}

const COMMANDS: readonly CommandName[] = ['rebuild', 'append', 'download', 'classify', 'history', 'latest'];
const OVERWRITING_COMMANDS: readonly CommandName[] = ['download', 'classify', 'history'];
const DEFAULT_START_YEAR = 1852;

export const USAGE = `Usage: news-sentiment-index <command> [options]

Commands:
  rebuild [YYYY-MM]      Build the index from classified batches (optionally from a month)
  append                 Add days after the last stored day
  download [YEAR]        Download archive months from YEAR (default ${DEFAULT_START_YEAR}); --latest for new months only
  classify               Classify downloaded months; --all to reclassify everything
  history [YEAR]         download + classify + rebuild
  latest                 download --latest + classify + append

Options:
  --today <date>         Processing date (natural language or YYYY-MM-DD, default: today UTC)
  --index <path>         Index file (.csv, .arrow or .feather)
  --latest               Only months from the newest one on disk (download)
  --overwrite, --all     Replace files that already exist (download, classify, history)`;

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse CLI arguments (without the node binary and script path).
 */
export function parseCliArgs(argv: readonly string[], now: Date = new Date()): CliCommand {
  const cfg = getConfig();
  const positional: string[] = [];
  let today = normalizeDate(now);
  let indexPath = cfg.indexPath;
  let latest = false;
  let overwrite = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--today': {
        const value = argv[++i];
        if (!value) throw new Error('--today needs a date');
        today = parseDateNL(value, now);
        break;
      }
      case '--index': {
        const value = argv[++i];
        if (!value) throw new Error('--index needs a path');
        indexPath = value;
        break;
      }
      case '--latest':
        latest = true;
        break;
      case '--overwrite':
      case '--all':
        overwrite = true;
        break;
      default:
        if (arg.startsWith('--')) throw new Error(`Unknown option: ${arg}`);
        positional.push(arg);
    }
  }

  const [name, param] = positional;
  if (!name || !isCommandName(name)) {
    throw new Error(name ? `Unknown command: ${name}` : 'No command given');
  }

  let fromPeriod: PeriodKey | undefined;
  let startYear = DEFAULT_START_YEAR;
  if (param !== undefined) {
    if (name === 'rebuild') {
      if (!isPeriodKey(param)) throw new Error(`Expected a YYYY-MM period, got ${param}`);
      fromPeriod = param;
    } else if (name === 'download' || name === 'history') {
      if (!/^\d{4}$/.test(param)) throw new Error(`Expected a four-digit year, got ${param}`);
      startYear = Number(param);
    } else {
      throw new Error(`${name} takes no argument`);
    }
  }

  if (latest && name !== 'download') {
    throw new Error(`--latest does not apply to ${name}`);
  }
  if (latest && (overwrite || param !== undefined)) {
    throw new Error('--latest takes no year and always refetches the newest month');
  }
  if (overwrite && !OVERWRITING_COMMANDS.includes(name)) {
    throw new Error(`--overwrite does not apply to ${name}`);
  }

  return { name, today, indexPath, fromPeriod, startYear, latest, overwrite };
}

function logRun(action: string, result: IndexRunResult) {
  const last = result.rows[result.rows.length - 1];
  logger.info(
    {
      rows: result.rows.length,
      rowsAdded: result.rowsAdded,
      lastDate: last?.date,
      lastIndexValue: last?.indexValue,
      lastSmoothedIndexValue: last?.smoothedIndexValue,
      skipped: result.batches.skipped,
    },
    `${action} finished`,
  );
}

/** Collaborators a command talks to; the defaults are the archive feed and the lexicon classifier. */
export interface CommandDeps {
  feed: () => SourceFeed;
  classifier: HeadlineClassifier;
}

export async function runCommand(cmd: CliCommand, deps: Partial<CommandDeps> = {}): Promise<void> {
  const cfg = getConfig();
  const source = new DirectoryBatchSource(cfg.classifiedDataDir);
  const store = new FileIndexStore(cmd.indexPath);
  const classifier = deps.classifier ?? new LexiconClassifier();
  // Months are counted up to the processing date
  const now = new Date(`${cmd.today}T00:00:00.000Z`);

  const rebuild = async () => logRun('Rebuild', await rebuildIndex({ source, store, today: cmd.today, fromPeriod: cmd.fromPeriod }));
  const append = async () => logRun('Append', await appendIndex({ source, store, today: cmd.today }));
  const feed =
    deps.feed ??
    (() => {
      assertFeedConfig(cfg);
      return new ArchiveFeedClient();
    });

  switch (cmd.name) {
    case 'rebuild':
      await rebuild();
      return;
    case 'append':
      await append();
      return;
    case 'download': {
      const summary = cmd.latest
        ? await downloadLatest({ feed: feed(), now })
        : await downloadHistory(cmd.startYear, { feed: feed(), now, overwrite: cmd.overwrite });
      logger.info(summary, 'Download finished');
      return;
    }
    case 'classify': {
      const periods = cmd.overwrite
        ? await classifyHistory({ classifier, overwrite: true })
        : await classifyLatest({ classifier });
      logger.info({ periods }, 'Classification finished');
      return;
    }
    case 'history':
      await downloadHistory(cmd.startYear, { feed: feed(), now, overwrite: cmd.overwrite });
      await classifyHistory({ classifier, overwrite: cmd.overwrite });
      await rebuild();
      return;
    case 'latest':
      await downloadLatest({ feed: feed(), now });
      await classifyLatest({ classifier });
      await append();
      return;
  }
}
