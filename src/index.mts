#!/usr/bin/env node
import { parseCliArgs, runCommand, USAGE, type CliCommand } from './commands.js';
import { IndexError } from './errors.js';
import { logger } from './logger.js';

async function main() {
  const args = process.argv.slice(2);
  if (!args.length || args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return;
  }

  let command: CliCommand;
  try {
    command = parseCliArgs(args);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  logger.info({ command: command.name, today: command.today, index: command.indexPath }, 'Starting');
  await runCommand(command);
}

main().catch((error: unknown) => {
  if (error instanceof IndexError) {
    logger.error({ code: error.code, details: error.details }, error.message);
    if (error.code === 'STORE_CORRUPT') {
      logger.error('The stored index cannot be appended to; run `rebuild` to recreate it.');
    }
  } else {
    logger.error({ err: error }, 'Run failed');
  }
  process.exit(1);
});
