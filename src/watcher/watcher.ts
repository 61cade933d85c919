import { constants, type Stats } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { basename, extname, relative, sep } from 'node:path';
import chokidar, { type FSWatcher } from 'chokidar';
import { SourceUnavailableError, errnoCode, errorMessage } from '../control-plane/errors.js';
import { createJob, type Job } from '../control-plane/types.js';
import { PARTIAL_SUFFIX } from '../delivery/atomic.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface WatcherOptions {
  sourceDir: string;
  recursive: boolean;
  /** Lower-case extensions with a leading dot; empty accepts every file. */
  extensions: readonly string[];
  usePolling: boolean;
  pollingIntervalMs: number;
  retryIntervalMs: number;
  /** 0 waits forever for the source directory to appear. */
  waitTimeoutMs: number;
}

export interface JobSink {
  enqueue(job: Job, signal?: AbortSignal): Promise<boolean>;
}

export interface KnownSources {
  /** True when the path was delivered at exactly this size and mtime. */
  isUnchanged(sourcePath: string, size: number, mtimeMs: number): boolean;
}

const RETRYABLE_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EBUSY', 'EAGAIN', 'ETIMEDOUT', 'EHOSTDOWN']);

export class Watcher {
  private fsWatcher?: FSWatcher;
  private offers: Promise<void> = Promise.resolve();
  private signal?: AbortSignal;
  private stopped = false;

  constructor(
    private readonly options: WatcherOptions,
    private readonly sink: JobSink,
    private readonly known: KnownSources,
    private readonly onQueued: (job: Job) => void = () => {},
    private readonly logger: Logger = silentLogger,
    private readonly clock: Clock = systemClock
  ) {}

  /** Resolves once the source directory is being watched and the initial scan has been emitted. */
  async start(signal?: AbortSignal): Promise<void> {
    this.signal = signal;
    await this.waitForSource(signal);
    if (this.stopped) return;

    const { sourceDir, recursive, usePolling, pollingIntervalMs } = this.options;
    const watcher = chokidar.watch(sourceDir, {
      persistent: true,
      ignoreInitial: false,
      alwaysStat: true,
      depth: recursive ? undefined : 0,
      usePolling,
      interval: pollingIntervalMs,
      ignored: (path: string) => path !== sourceDir && this.isIgnoredName(basename(path)),
    });
    this.fsWatcher = watcher;

    watcher.on('add', (path, stats) => this.offer(path, stats));
    // A file that failed earlier, or was replaced after delivery, is offered again once it changes.
    watcher.on('change', (path, stats) => this.offer(path, stats));
    watcher.on('error', (err) => {
      this.logger.error('watcher: filesystem error', { path: sourceDir, error: errorMessage(err) });
    });

    await new Promise<void>((resolve) => watcher.once('ready', () => resolve()));
    this.logger.info('watcher: watching', {
      path: sourceDir,
      recursive,
      polling: usePolling,
    });
  }

  async stop(): Promise<void> {
    this.stopped = true;
    const watcher = this.fsWatcher;
    this.fsWatcher = undefined;
    if (watcher) await watcher.close();
  }

  /** Resolves when every event seen so far has been offered to the queue. */
  idle(): Promise<void> {
    return this.offers;
  }

  accepts(path: string): boolean {
    const name = basename(path);
    if (this.isIgnoredName(name)) return false;
    const { extensions } = this.options;
    return extensions.length === 0 || extensions.includes(extname(name).toLowerCase());
  }

  private isIgnoredName(name: string): boolean {
    return name.startsWith('.') || name.endsWith(PARTIAL_SUFFIX);
  }

  private offer(path: string, stats?: Stats): void {
    if (this.stopped || !this.accepts(path)) return;
    const size = stats?.size ?? 0;
    if (stats && this.known.isUnchanged(path, stats.size, stats.mtimeMs)) {
      this.logger.debug('watcher: unchanged since delivery', { path });
      return;
    }

    const relativePath = relative(this.options.sourceDir, path).split(sep).join('/');
    const job = createJob(path, relativePath, size);

    // Offers are chained so arrival order is kept while the queue is full.
    this.offers = this.offers.then(async () => {
      const queued = await this.sink.enqueue(job, this.signal);
      if (queued) {
        this.logger.debug('watcher: discovered', { path, size });
        this.onQueued(job);
      }
    });
  }

  private async waitForSource(signal?: AbortSignal): Promise<void> {
    const { sourceDir, retryIntervalMs, waitTimeoutMs } = this.options;
    const startedAt = this.clock.now();

    for (;;) {
      try {
        const info = await stat(sourceDir);
        if (!info.isDirectory()) {
          throw new SourceUnavailableError(`source path is not a directory: ${sourceDir}`);
        }
        await access(sourceDir, constants.R_OK);
        return;
      } catch (err) {
        if (err instanceof SourceUnavailableError) throw err;
        const code = errnoCode(err);
        if (!code || !RETRYABLE_CODES.has(code)) {
          throw new SourceUnavailableError(`source directory unusable: ${sourceDir}: ${errorMessage(err)}`, {
            cause: err,
          });
        }
        this.logger.warn('watcher: source directory unavailable, retrying', {
          path: sourceDir,
          code,
          retryInMs: retryIntervalMs,
        });
      }

      const waited = this.clock.now() - startedAt;
      if (waitTimeoutMs > 0 && waited >= waitTimeoutMs) {
        throw new SourceUnavailableError(`source directory still unavailable after ${waited}ms: ${sourceDir}`);
      }
      await this.clock.sleep(retryIntervalMs, signal);
    }
  }
}
