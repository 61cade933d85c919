import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { errnoCode, errorMessage } from '../control-plane/errors.js';
import type { SettledOutcome } from '../control-plane/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { historyRecordSchema, type HistoryRecord } from './types.js';

/**
 * Informational journal of every settled job. Unlike the ledger, a failed
 * write here is logged and otherwise ignored.
 */
export class HistoryJournal {
  private chain: Promise<void> = Promise.resolve();

  constructor(
    readonly path: string,
    private readonly logger: Logger = silentLogger
  ) {}

  record(entry: HistoryRecord): Promise<void> {
    this.chain = this.chain.then(() => this.write(entry));
    return this.chain;
  }

  async recent(limit: number, outcome?: SettledOutcome): Promise<HistoryRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw err;
    }

    const records: HistoryRecord[] = [];
    for (const line of raw.split('\n')) {
      if (line.trim().length === 0) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        continue;
      }
      const result = historyRecordSchema.safeParse(parsed);
      if (result.success && (!outcome || result.data.outcome === outcome)) {
        records.push(result.data);
      }
    }
    return records.slice(-limit).reverse();
  }

  private async write(entry: HistoryRecord): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, `${JSON.stringify(entry)}\n`, 'utf-8');
    } catch (err) {
      this.logger.warn('history: append failed', { path: this.path, error: errorMessage(err) });
    }
  }
}
