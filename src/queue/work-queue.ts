import type { Job } from '../control-plane/types.js';

interface Producer {
  job: Job;
  settle(admitted: boolean): void;
}

interface Consumer {
  settle(job: Job | undefined): void;
}

export interface QueueStats {
  queued: number;
  inFlight: number;
  waitingProducers: number;
  capacity: number;
}

/**
 * Bounded FIFO of jobs keyed by source path. A path counts as present from the
 * moment its enqueue starts (even while waiting for capacity) until
 * `complete()` is called for it after dequeue.
 */
export class WorkQueue {
  private readonly items: Job[] = [];
  private readonly producers: Producer[] = [];
  private readonly consumers: Consumer[] = [];
  private readonly pending = new Set<string>();
  private readonly inFlight = new Map<string, Job>();
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  has(sourcePath: string): boolean {
    return this.pending.has(sourcePath) || this.inFlight.has(sourcePath);
  }

  /**
   * Resolves `true` once the job is queued, `false` when a job for the same
   * path is already present, the queue is closed, or the signal aborts while
   * waiting for capacity.
   */
  enqueue(job: Job, signal?: AbortSignal): Promise<boolean> {
    if (this.closed || signal?.aborted || this.has(job.sourcePath)) {
      return Promise.resolve(false);
    }
    this.pending.add(job.sourcePath);

    if (this.producers.length === 0 && this.items.length < this.capacity) {
      this.items.push(job);
      this.pump();
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const onAbort = () => {
        const index = this.producers.indexOf(producer);
        if (index >= 0) this.producers.splice(index, 1);
        this.pending.delete(job.sourcePath);
        resolve(false);
      };
      const producer: Producer = {
        job,
        settle: (admitted) => {
          signal?.removeEventListener('abort', onAbort);
          if (!admitted) this.pending.delete(job.sourcePath);
          resolve(admitted);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.producers.push(producer);
    });
  }

  /**
   * Resolves the oldest queued job and marks it in flight. Resolves
   * `undefined` when the queue is closed and empty or the signal aborts.
   */
  dequeue(signal?: AbortSignal): Promise<Job | undefined> {
    if (signal?.aborted) return Promise.resolve(undefined);

    const job = this.take();
    if (job) {
      this.pump();
      return Promise.resolve(job);
    }
    if (this.closed) return Promise.resolve(undefined);

    return new Promise<Job | undefined>((resolve) => {
      const onAbort = () => {
        const index = this.consumers.indexOf(consumer);
        if (index >= 0) this.consumers.splice(index, 1);
        resolve(undefined);
      };
      const consumer: Consumer = {
        settle: (next) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(next);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.consumers.push(consumer);
    });
  }

  complete(sourcePath: string): void {
    this.inFlight.delete(sourcePath);
  }

  /** Stops accepting work and releases every waiting producer and consumer. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const producer of this.producers.splice(0)) producer.settle(false);
    for (const consumer of this.consumers.splice(0)) consumer.settle(undefined);
  }

  /** Removes and returns every job still waiting to be dequeued. */
  drain(): Job[] {
    const drained = this.items.splice(0);
    for (const job of drained) this.pending.delete(job.sourcePath);
    return drained;
  }

  stats(): QueueStats {
    return {
      queued: this.items.length,
      inFlight: this.inFlight.size,
      waitingProducers: this.producers.length,
      capacity: this.capacity,
    };
  }

  private take(): Job | undefined {
    const job = this.items.shift();
    if (!job) return undefined;
    this.pending.delete(job.sourcePath);
    this.inFlight.set(job.sourcePath, job);
    return job;
  }

  private pump(): void {
    for (;;) {
      if (this.items.length > 0 && this.consumers.length > 0) {
        const consumer = this.consumers.shift();
        const job = this.take();
        if (consumer && job) consumer.settle(job);
        continue;
      }
      if (this.items.length < this.capacity && this.producers.length > 0) {
        const producer = this.producers.shift();
        if (producer) {
          this.items.push(producer.job);
          producer.settle(true);
        }
        continue;
      }
      break;
    }
  }
}
