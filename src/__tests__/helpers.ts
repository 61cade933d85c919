import { mkdir, mkdtemp, readdir, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseSettings, type Settings } from '../config/settings.js';
import type { PipelineOrchestrator } from '../control-plane/orchestrator.js';
import type { JobSettlement } from '../control-plane/types.js';
import type { Clock } from '../utils/clock.js';

export async function makeWorkspace(): Promise<{ root: string; source: string; dest: string; state: string }> {
  const root = await mkdtemp(join(tmpdir(), 'hires-relay-'));
  const source = join(root, '12');
  const dest = join(root, '70');
  const state = join(root, 'state');
  await mkdir(source, { recursive: true });
  return { root, source, dest, state };
}

export function testSettings(root: string, overrides: Record<string, unknown> = {}): Settings {
  return parseSettings(
    {
      sourceDir: join(root, '12'),
      destDir: join(root, '70'),
      stateDir: join(root, 'state'),
      stabilityPollIntervalMs: 20,
      stabilityRequiredSamples: 2,
      stabilityTimeoutMs: 5000,
      workerCount: 2,
      maxRetries: 5,
      retryBaseDelayMs: 1,
      retryMaxDelayMs: 4,
      sourceRetryIntervalMs: 20,
      ...overrides,
    },
    root
  );
}

export function recordSettlements(pipeline: PipelineOrchestrator): JobSettlement[] {
  const settled: JobSettlement[] = [];
  pipeline.on('job:settled', (settlement: JobSettlement) => settled.push(settlement));
  return settled;
}

export function patternBytes(size: number, seed = 7): Buffer {
  const data = Buffer.alloc(size);
  for (let i = 0; i < size; i++) data[i] = (i * 31 + seed) % 251;
  return data;
}

/** Sorted directory listing, temp files included. */
export async function listDest(dest: string): Promise<string[]> {
  const names = await readdir(dest);
  return names.sort();
}

export async function readLedgerLines(path: string): Promise<unknown[]> {
  const raw = await readFile(path, 'utf-8');
  return raw
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line): unknown => JSON.parse(line));
}

export class FakeClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code });
}
