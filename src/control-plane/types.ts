import type { ErrorKind } from './errors.js';

export type JobState =
  | 'Discovered'
  | 'Stabilizing'
  | 'Queued'
  | 'Processing'
  | 'Delivered'
  | 'Failed';

export interface JobFailure {
  kind: ErrorKind;
  message: string;
}

export interface Job {
  sourcePath: string;
  /** Path relative to the source directory, with forward slashes. */
  relativePath: string;
  discoveredAt: string;
  sizeSnapshot: number;
  attemptCount: number;
  state: JobState;
  fingerprint?: string;
  destinationPath?: string;
  duplicate?: boolean;
  failure?: JobFailure;
}

export const SETTLED_OUTCOMES = ['delivered', 'duplicate', 'failed', 'abandoned'] as const;

export type SettledOutcome = (typeof SETTLED_OUTCOMES)[number];

export interface JobSettlement {
  job: Job;
  outcome: SettledOutcome;
  durationMs: number;
}

export interface PipelineCounts {
  discovered: number;
  delivered: number;
  duplicates: number;
  failed: number;
  abandoned: number;
}

export function createJob(sourcePath: string, relativePath: string, sizeSnapshot: number): Job {
  return {
    sourcePath,
    relativePath,
    discoveredAt: new Date().toISOString(),
    sizeSnapshot,
    attemptCount: 0,
    state: 'Discovered',
  };
}
