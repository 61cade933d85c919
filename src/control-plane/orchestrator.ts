import { EventEmitter, once } from 'node:events';
import { constants } from 'node:fs';
import { access, mkdir, unlink } from 'node:fs/promises';
import type { Settings } from '../config/settings.js';
import { AtomicDelivery, verifyDelivery } from '../delivery/atomic.js';
import type { HistoryJournal } from '../ledger/history.js';
import type { Ledger } from '../ledger/ledger.js';
import { WorkQueue } from '../queue/work-queue.js';
import { StabilityDetector, fsProbe, type FileProbe } from '../stability/detector.js';
import { classifyTransformError, resolveOutputName, type TransformAdapter } from '../transform/adapter.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { fingerprintFile } from '../utils/fingerprint.js';
import { generateRunId } from '../utils/id.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { StepTimer } from '../utils/timer.js';
import { Watcher } from '../watcher/watcher.js';
import {
  DeliveryError,
  DestinationUnavailableError,
  PipelineError,
  SourceUnavailableError,
  SourceVanishedError,
  errnoCode,
  errorMessage,
  isAbortError,
} from './errors.js';
import { backoffDelay } from './retry.js';
import type { Job, JobSettlement, JobState, PipelineCounts, SettledOutcome } from './types.js';

export type PipelineSettings = Pick<
  Settings,
  | 'sourceDir'
  | 'destDir'
  | 'stabilityPollIntervalMs'
  | 'stabilityRequiredSamples'
  | 'stabilityTimeoutMs'
  | 'workerCount'
  | 'maxRetries'
  | 'retryBaseDelayMs'
  | 'retryMaxDelayMs'
  | 'overwriteExisting'
  | 'queueCapacity'
  | 'recursive'
  | 'extensions'
  | 'outputExtension'
  | 'deleteSourceOnSuccess'
  | 'usePolling'
  | 'pollingIntervalMs'
  | 'sourceRetryIntervalMs'
  | 'sourceWaitTimeoutMs'
>;

export interface PipelineDeps {
  settings: PipelineSettings;
  transform: TransformAdapter;
  ledger: Ledger;
  history?: HistoryJournal;
  logger?: Logger;
  probe?: FileProbe;
  clock?: Clock;
  runId?: string;
  delivery?: AtomicDelivery;
}

/**
 * Drives every discovered file through
 * Discovered -> Stabilizing -> Queued -> Processing -> Delivered | Failed.
 *
 * Events: `job:state` (job), `job:retry` (job, error, delayMs),
 * `job:settled` (JobSettlement), `fatal` (PipelineError), `stopped`.
 */
export class PipelineOrchestrator extends EventEmitter {
  readonly runId: string;
  readonly queue: WorkQueue;
  readonly watcher: Watcher;

  private readonly settings: PipelineSettings;
  private readonly transform: TransformAdapter;
  private readonly ledger: Ledger;
  private readonly history?: HistoryJournal;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly detector: StabilityDetector;
  private readonly delivery: AtomicDelivery;
  private readonly controller = new AbortController();
  private readonly counts: PipelineCounts = {
    discovered: 0,
    delivered: 0,
    duplicates: 0,
    failed: 0,
    abandoned: 0,
  };

  private workers: Promise<void>[] = [];
  private started = false;
  private stopped = false;
  private stopping?: Promise<void>;
  private fatalError?: PipelineError;

  constructor(deps: PipelineDeps) {
    super();
    const { settings } = deps;
    this.settings = settings;
    this.transform = deps.transform;
    this.ledger = deps.ledger;
    this.history = deps.history;
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? systemClock;
    this.runId = deps.runId ?? generateRunId();

    this.queue = new WorkQueue(settings.queueCapacity);
    this.detector = new StabilityDetector(
      {
        pollIntervalMs: settings.stabilityPollIntervalMs,
        requiredSamples: settings.stabilityRequiredSamples,
        timeoutMs: settings.stabilityTimeoutMs,
      },
      deps.probe ?? fsProbe,
      this.clock
    );
    this.delivery =
      deps.delivery ??
      new AtomicDelivery(
        { destDir: settings.destDir, overwriteExisting: settings.overwriteExisting, runId: this.runId },
        this.logger
      );
    this.watcher = new Watcher(
      {
        sourceDir: settings.sourceDir,
        recursive: settings.recursive,
        extensions: settings.extensions,
        usePolling: settings.usePolling,
        pollingIntervalMs: settings.pollingIntervalMs,
        retryIntervalMs: settings.sourceRetryIntervalMs,
        waitTimeoutMs: settings.sourceWaitTimeoutMs,
      },
      this.queue,
      this.ledger,
      (job) => {
        this.counts.discovered += 1;
        this.emit('job:state', job);
      },
      this.logger
    );
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  stats(): PipelineCounts {
    return { ...this.counts };
  }

  /**
   * Checks the destination, starts the workers and resolves once the watcher
   * has emitted the files already present in the source directory.
   */
  async start(): Promise<void> {
    if (this.started) throw new Error('pipeline already started');
    this.started = true;

    const { sourceDir, destDir, workerCount } = this.settings;
    this.logger.info(
      `run=${this.runId} transform=${this.transform.name} workers=${workerCount} source=${sourceDir} dest=${destDir}`
    );

    try {
      await this.prepareDestination();
    } catch (err) {
      await this.abortStartup(err);
    }

    this.workers = Array.from({ length: workerCount }, (_, i) => this.workerLoop(i + 1));

    try {
      await this.watcher.start(this.signal);
    } catch (err) {
      if (isAbortError(err)) return;
      await this.abortStartup(err);
    }
  }

  /** Starts the pipeline and resolves when it stops; rejects with the fatal error if one halted it. */
  async run(): Promise<void> {
    await this.start();
    await this.waitUntilStopped();
  }

  async waitUntilStopped(): Promise<void> {
    if (!this.stopped) await once(this, 'stopped');
    if (this.fatalError) throw this.fatalError;
  }

  /**
   * Stops discovery, abandons queued jobs, lets in-flight jobs reach their
   * next checkpoint and waits for pending ledger writes.
   */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.logger.info('shutting down');
    this.controller.abort();
    try {
      await this.watcher.stop();
    } catch (err) {
      this.logger.warn('watcher did not close cleanly', { error: errorMessage(err) });
    }
    this.queue.close();
    await Promise.all(this.workers);

    for (const job of this.queue.drain()) {
      await this.settle(job, 'abandoned', 0);
    }
    await this.ledger.flush();

    const { discovered, delivered, duplicates, failed, abandoned } = this.counts;
    this.logger.info(
      `stopped discovered=${discovered} delivered=${delivered} duplicates=${duplicates} failed=${failed} abandoned=${abandoned}`
    );
    this.stopped = true;
    this.emit('stopped');
  }

  private async abortStartup(err: unknown): Promise<never> {
    const fatal =
      err instanceof PipelineError ? err : new SourceUnavailableError(errorMessage(err), { cause: err });
    this.fatalError = fatal;
    await this.stop();
    throw fatal;
  }

  private halt(err: PipelineError): void {
    if (this.fatalError) return;
    this.fatalError = err;
    this.logger.error(`FATAL: ${err.message}`, { kind: err.kind });
    this.emit('fatal', err);
    this.stop().catch((stopErr: unknown) => {
      this.logger.error('shutdown after fatal error failed', { error: errorMessage(stopErr) });
    });
  }

  private async prepareDestination(): Promise<void> {
    const { destDir } = this.settings;
    try {
      await mkdir(destDir, { recursive: true });
      await access(destDir, constants.W_OK);
    } catch (err) {
      throw new DestinationUnavailableError(`destination directory not writable: ${destDir}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private async workerLoop(workerId: number): Promise<void> {
    for (;;) {
      const job = await this.queue.dequeue(this.signal);
      if (!job) return;

      try {
        await this.processJob(job, workerId);
      } catch (err) {
        this.halt(err instanceof PipelineError ? err : new DeliveryError(errorMessage(err), { cause: err }));
        return;
      } finally {
        this.queue.complete(job.sourcePath);
      }
    }
  }

  /** Settles the job; only fatal errors escape. */
  private async processJob(job: Job, workerId: number): Promise<void> {
    const timer = new StepTimer(this.clock);
    const { signal } = this;

    try {
      this.transition(job, 'Stabilizing');
      const sample = await this.detector.waitUntilStable(job.sourcePath, signal);
      job.sizeSnapshot = sample.size;
      this.transition(job, 'Queued');

      job.fingerprint = await this.fingerprint(job.sourcePath);
      await this.refreshLedger();
      if (this.ledger.hasFingerprint(job.sourcePath, job.fingerprint)) {
        job.duplicate = true;
        this.transition(job, 'Delivered');
        this.logger.info(`[dup]  ${job.relativePath} already in ledger`, { worker: workerId });
        await this.removeSource(job);
        await this.settle(job, 'duplicate', timer.elapsed());
        return;
      }

      this.transition(job, 'Processing');
      const output = await this.transformWithRetry(job, workerId);

      // From here on the job runs to completion: delivery is never interrupted.
      const relativeOutput = resolveOutputName(this.transform, job.relativePath, this.settings.outputExtension);
      const outcome = await this.delivery.deliver(relativeOutput, output);
      job.destinationPath = outcome.path;
      if (outcome.kind === 'conflict') {
        throw new DeliveryError(`destination already holds different content, not overwriting: ${outcome.path}`);
      }
      await verifyDelivery(outcome.path, output.byteLength);

      await this.ledger.append({
        sourcePath: job.sourcePath,
        fingerprint: job.fingerprint,
        destinationPath: outcome.path,
        completedAt: new Date().toISOString(),
        sourceSize: sample.size,
        sourceMtimeMs: sample.mtimeMs,
      });

      job.duplicate = outcome.kind === 'duplicate';
      this.transition(job, 'Delivered');
      if (job.duplicate) {
        this.logger.info(`[dup]  ${job.relativePath} -> ${outcome.path} (identical output already present)`, {
          worker: workerId,
        });
      } else {
        this.logger.info(`[done] ${job.relativePath} -> ${outcome.path} (${timer.elapsed()}ms)`, {
          worker: workerId,
          attempts: job.attemptCount,
        });
      }
      await this.removeSource(job);
      await this.settle(job, job.duplicate ? 'duplicate' : 'delivered', timer.elapsed());
    } catch (err) {
      if (err instanceof PipelineError && err.fatal) throw err;

      if (isAbortError(err)) {
        this.logger.info(`[stop] ${job.relativePath} abandoned in state ${job.state}`, { worker: workerId });
        await this.settle(job, 'abandoned', timer.elapsed());
        return;
      }

      const failure = err instanceof PipelineError ? err : classifyTransformError(err, job.sourcePath);
      job.failure = { kind: failure.kind, message: failure.message };
      this.transition(job, 'Failed');
      this.logger.error(`[FAIL] ${job.relativePath}: ${failure.message}`, {
        worker: workerId,
        kind: failure.kind,
        attempts: job.attemptCount,
        source: job.sourcePath,
      });
      await this.settle(job, 'failed', timer.elapsed());
    }
  }

  private async transformWithRetry(job: Job, workerId: number): Promise<Uint8Array> {
    const { maxRetries, retryBaseDelayMs, retryMaxDelayMs } = this.settings;

    for (;;) {
      this.signal.throwIfAborted();
      job.attemptCount += 1;
      try {
        return await this.transform.transform(job.sourcePath);
      } catch (err) {
        const failure = classifyTransformError(err, job.sourcePath);
        if (failure.permanent || job.attemptCount >= maxRetries) throw failure;

        const delayMs = backoffDelay(job.attemptCount, retryBaseDelayMs, retryMaxDelayMs);
        this.logger.warn(`[retry] ${job.relativePath}: ${failure.message}`, {
          worker: workerId,
          attempt: job.attemptCount,
          of: maxRetries,
          delayMs,
        });
        this.emit('job:retry', job, failure, delayMs);
        await this.clock.sleep(delayMs, this.signal);
      }
    }
  }

  private async fingerprint(path: string): Promise<string> {
    try {
      return await fingerprintFile(path);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') throw new SourceVanishedError(path);
      throw classifyTransformError(err, path);
    }
  }

  private async refreshLedger(): Promise<void> {
    try {
      await this.ledger.refresh();
    } catch (err) {
      this.logger.warn('ledger refresh failed, using in-memory view', { error: errorMessage(err) });
    }
  }

  private async removeSource(job: Job): Promise<void> {
    if (!this.settings.deleteSourceOnSuccess) return;
    try {
      await unlink(job.sourcePath);
      this.logger.debug('source removed', { path: job.sourcePath });
    } catch (err) {
      this.logger.warn('could not remove delivered source', { path: job.sourcePath, error: errorMessage(err) });
    }
  }

  private transition(job: Job, state: JobState): void {
    job.state = state;
    this.logger.debug(`${job.relativePath} -> ${state}`);
    this.emit('job:state', job);
  }

  private async settle(job: Job, outcome: SettledOutcome, durationMs: number): Promise<void> {
    switch (outcome) {
      case 'delivered':
        this.counts.delivered += 1;
        break;
      case 'duplicate':
        this.counts.duplicates += 1;
        break;
      case 'failed':
        this.counts.failed += 1;
        break;
      case 'abandoned':
        this.counts.abandoned += 1;
        break;
    }

    if (this.history) {
      await this.history.record({
        timestamp: new Date().toISOString(),
        sourcePath: job.sourcePath,
        outcome,
        attempts: job.attemptCount,
        durationMs,
        destinationPath: job.destinationPath,
        errorKind: job.failure?.kind,
        message: job.failure?.message,
      });
    }

    const settlement: JobSettlement = { job, outcome, durationMs };
    this.emit('job:settled', settlement);
  }
}
