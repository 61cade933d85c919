import { open, stat } from 'node:fs/promises';
import { SourceVanishedError, StabilityTimeoutError, errnoCode } from '../control-plane/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';

export interface FileSample {
  size: number;
  mtimeMs: number;
}

export interface FileProbe {
  stat(path: string): Promise<FileSample>;
  /** True when the file can be opened for reading right now. */
  canOpen(path: string): Promise<boolean>;
}

export interface StabilityOptions {
  pollIntervalMs: number;
  requiredSamples: number;
  timeoutMs: number;
}

export const fsProbe: FileProbe = {
  async stat(path) {
    const info = await stat(path);
    return { size: info.size, mtimeMs: info.mtimeMs };
  },
  async canOpen(path) {
    try {
      const handle = await open(path, 'r');
      await handle.close();
      return true;
    } catch {
      return false;
    }
  },
};

/**
 * A run of samples is stable when its last `required` entries agree on both
 * size and modification time.
 */
export function isStable(samples: readonly FileSample[], required: number): boolean {
  if (required < 1 || samples.length < required) return false;
  const tail = samples.slice(-required);
  const [first] = tail;
  return tail.every((s) => s.size === first.size && s.mtimeMs === first.mtimeMs);
}

export class StabilityDetector {
  constructor(
    private readonly options: StabilityOptions,
    private readonly probe: FileProbe = fsProbe,
    private readonly clock: Clock = systemClock
  ) {}

  async waitUntilStable(path: string, signal?: AbortSignal): Promise<FileSample> {
    const { pollIntervalMs, requiredSamples, timeoutMs } = this.options;
    const startedAt = this.clock.now();
    const samples: FileSample[] = [];

    for (;;) {
      signal?.throwIfAborted();

      let sample: FileSample | undefined;
      try {
        sample = await this.probe.stat(path);
      } catch (err) {
        if (errnoCode(err) === 'ENOENT') {
          throw new SourceVanishedError(path);
        }
        // An unreadable sample breaks the run.
        samples.length = 0;
      }

      if (sample) {
        samples.push(sample);
        if (samples.length > requiredSamples) samples.shift();
        if (isStable(samples, requiredSamples) && (await this.probe.canOpen(path))) {
          return sample;
        }
      }

      const waited = this.clock.now() - startedAt;
      if (waited >= timeoutMs) {
        throw new StabilityTimeoutError(path, waited);
      }
      await this.clock.sleep(Math.min(pollIntervalMs, timeoutMs - waited), signal);
    }
  }
}
