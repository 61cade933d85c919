import { Command, InvalidArgumentError } from 'commander';
import { loadSettings, loadStatePaths, type SettingKey } from '../config/settings.js';
import { LedgerWriteError } from '../control-plane/errors.js';
import { PipelineOrchestrator } from '../control-plane/orchestrator.js';
import { HistoryJournal } from '../ledger/history.js';
import { Ledger } from '../ledger/ledger.js';
import { loadTransform } from '../transform/loader.js';
import { createConsoleLogger } from '../utils/logger.js';

interface CommonFlags {
  config?: string;
  stateDir?: string;
  ledger?: string;
  history?: string;
}

interface StartFlags extends CommonFlags {
  source?: string;
  dest?: string;
  workers?: number;
  retries?: number;
  overwrite?: boolean;
  flat?: boolean;
  extensions?: string;
  outputExt?: string;
  transform?: string;
  deleteSource?: boolean;
  polling?: boolean;
  logLevel?: string;
}

interface StatusFlags extends CommonFlags {
  limit: number;
}

export const EXIT_STARTUP_FAILURE = 1;
export const EXIT_RUNTIME_FAILURE = 2;

export function exitCodeFor(err: unknown): number {
  return err instanceof LedgerWriteError ? EXIT_RUNTIME_FAILURE : EXIT_STARTUP_FAILURE;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function commonOverrides(opts: CommonFlags): Partial<Record<SettingKey, unknown>> {
  return {
    stateDir: opts.stateDir,
    ledgerPath: opts.ledger,
    historyPath: opts.history,
  };
}

export function startOverrides(opts: StartFlags): Partial<Record<SettingKey, unknown>> {
  return {
    ...commonOverrides(opts),
    sourceDir: opts.source,
    destDir: opts.dest,
    workerCount: opts.workers,
    maxRetries: opts.retries,
    overwriteExisting: opts.overwrite ? true : undefined,
    recursive: opts.flat ? false : undefined,
    extensions: opts.extensions,
    outputExtension: opts.outputExt,
    transform: opts.transform,
    deleteSourceOnSuccess: opts.deleteSource ? true : undefined,
    usePolling: opts.polling ? true : undefined,
    logLevel: opts.logLevel,
  };
}

function withStateOptions(command: Command): Command {
  return command
    .option('--config <file>', 'JSON config file')
    .option('--state-dir <dir>', 'Directory holding the ledger and history journal')
    .option('--ledger <file>', 'Ledger file (JSONL)')
    .option('--history <file>', 'History journal file (JSONL)');
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('hires-relay')
    .description(
      'Watch-folder pipeline: promotes files from a source tier (12) to a destination tier (70).\n\n' +
      'Waits for each file to stop changing, runs the configured transform, and delivers the\n' +
      'result atomically. Delivered files are recorded in an append-only ledger so restarts\n' +
      'never deliver the same file twice. Options may also come from RELAY_* environment variables.'
    )
    .version('0.1.0');

  withStateOptions(
    program
      .command('start')
      .description('Watch the source directory until SIGINT/SIGTERM')
      .option('--source <dir>', 'Source directory to watch')
      .option('--dest <dir>', 'Destination directory')
      .option('--workers <n>', 'Concurrent workers', positiveInt)
      .option('--retries <n>', 'Transform attempts for transient failures', positiveInt)
      .option('--overwrite', 'Replace existing destination files')
      .option('--flat', 'Only watch the top level of the source directory')
      .option('--extensions <list>', 'Accepted extensions (comma-separated, e.g. .mxf,.mov)')
      .option('--output-ext <ext>', 'Extension for delivered files')
      .option('--transform <module>', 'Built-in transform name or path to a transform module')
      .option('--delete-source', 'Remove source files once delivered and recorded')
      .option('--polling', 'Poll the source directory instead of using change notifications')
      .option('--log-level <level>', 'debug, info, warn or error')
  ).action(async (opts: StartFlags) => {
    const settings = await loadSettings({ configPath: opts.config, overrides: startOverrides(opts) });
    const logger = createConsoleLogger(settings.logLevel);
    const transform = await loadTransform(settings.transform);
    const ledger = await Ledger.open(settings.ledgerPath, logger);
    const history = new HistoryJournal(settings.historyPath, logger);

    logger.info(`ledger=${settings.ledgerPath} entries=${ledger.size}`);

    const pipeline = new PipelineOrchestrator({ settings, transform, ledger, history, logger });

    const onSignal = (signal: NodeJS.Signals) => {
      logger.info(`received ${signal}`);
      pipeline.stop().catch((err: unknown) => {
        logger.error(`shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    try {
      await pipeline.run();
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
  });

  withStateOptions(
    program
      .command('status')
      .description('Summarize the ledger and recent failures')
      .option('--limit <n>', 'Entries to show per section', positiveInt, 10)
  ).action(async (opts: StatusFlags) => {
    const paths = await loadStatePaths({ configPath: opts.config, overrides: commonOverrides(opts) });
    const ledger = await Ledger.open(paths.ledgerPath);
    const history = new HistoryJournal(paths.historyPath);
    const failures = await history.recent(opts.limit, 'failed');

    console.log(`[hires-relay] ledger=${paths.ledgerPath} entries=${ledger.size}`);

    console.log('\nRecent deliveries:');
    const delivered = ledger.latest(opts.limit);
    if (delivered.length === 0) console.log('  (none)');
    for (const entry of delivered) {
      console.log(`  ${entry.completedAt}  ${entry.sourcePath} -> ${entry.destinationPath}`);
    }

    console.log('\nRecent failures:');
    if (failures.length === 0) console.log('  (none)');
    for (const record of failures) {
      console.log(`  ${record.timestamp}  ${record.sourcePath}  [${record.errorKind ?? 'unknown'}] ${record.message ?? ''}`);
    }
  });

  return program;
}
