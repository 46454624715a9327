#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { runDedupe } from './commands/dedupe.js';
import { runDownload } from './commands/download.js';
import { runFindSnapshots } from './commands/find-snapshots.js';
import { config } from './config.js';
import { SnapshotError } from './errors.js';
import { STRATEGY_NAMES, type StrategyName } from './resolver/types.js';
import { logger } from './utils/logger.js';

function positiveInt(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return value;
}

function nonNegativeInt(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return value;
}

function isStrategy(value: string): value is StrategyName {
  return (STRATEGY_NAMES as readonly string[]).includes(value);
}

const program = new Command();

program
  .name('wayback-snapshots')
  .description('Find and download the archived captures closest to a target date')
  .version('1.0.0');

program
  .command('find')
  .description('Resolve each master-list URL to its capture nearest the target date')
  .argument('<domain>', 'Domain whose master list is resolved, e.g. example.org')
  .argument('<date>', 'Target date (YYYYMMDD)')
  .option('-p, --parallel <n>', 'Number of parallel batches', positiveInt, config.PARALLELISM)
  .addOption(
    new Option('-s, --strategy <name>', 'Resolution strategy').choices(STRATEGY_NAMES).default('auto'),
  )
  .option('-d, --data-dir <dir>', 'Directory holding master lists and results', config.DATA_DIR)
  .option('-m, --master-list <path>', 'Master list file (default: <data-dir>/<domain>_master_list.json)')
  .action(async (domain: string, date: string, opts: {
    parallel: number;
    strategy: string;
    dataDir: string;
    masterList?: string;
  }) => {
    await runFindSnapshots({
      domain,
      targetDate: date,
      dataDir: opts.dataDir,
      masterList: opts.masterList,
      strategy: isStrategy(opts.strategy) ? opts.strategy : 'auto',
      parallelism: opts.parallel,
    });
  });

program
  .command('download')
  .description('Download the HTML of snapshots found by "find"')
  .argument('<domain>', 'Domain, e.g. example.org')
  .argument('<date>', 'Target date (YYYYMMDD)')
  .option('-c, --concurrency <n>', 'Parallel downloads', positiveInt, config.DOWNLOAD_CONCURRENCY)
  .option('--delay <ms>', 'Minimum delay between requests', nonNegativeInt, config.DOWNLOAD_DELAY_MS)
  .option('--no-resume', 'Download pages again even if already saved')
  .option('-d, --data-dir <dir>', 'Directory holding results', config.DATA_DIR)
  .action(async (domain: string, date: string, opts: {
    concurrency: number;
    delay: number;
    resume: boolean;
    dataDir: string;
  }) => {
    await runDownload({
      domain,
      targetDate: date,
      dataDir: opts.dataDir,
      concurrency: opts.concurrency,
      resume: opts.resume,
      delayMs: opts.delay,
    });
  });

program
  .command('dedupe')
  .description('Build a master list from captured URLs (protocol and content dedupe)')
  .argument('<input>', 'JSON array of { original, size } entries')
  .argument('<output>', 'Master list to write')
  .option('--min-size <bytes>', 'Drop entries smaller than this', nonNegativeInt, 0)
  .action(async (input: string, output: string, opts: { minSize: number }) => {
    await runDedupe({ inputPath: input, outputPath: output, minSize: opts.minSize });
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof SnapshotError) {
    console.error(`Error: ${err.message}`);
    if (err.hint) console.error(`  ${err.hint}`);
  } else {
    logger.fatal(err, 'Command failed');
  }
  process.exitCode = 1;
});
