import { randomBytes } from 'node:crypto';

/**
 * Tags one pipeline process, e.g. `4812-a3f09c`. Temp file names carry it, so
 * two processes sharing a destination never pick the same temp name.
 */
export function generateRunId(pid: number = process.pid): string {
  return `${pid}-${randomBytes(3).toString('hex')}`;
}
