import { mkdir, open, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { LedgerWriteError, errnoCode, errorMessage } from '../control-plane/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { ledgerEntrySchema, type LedgerEntry } from './types.js';

function entryKey(sourcePath: string, fingerprint: string): string {
  return `${sourcePath}\u0000${fingerprint}`;
}

/**
 * Append-only JSONL record of delivered files. Lines are only ever added;
 * a malformed line is skipped on load and left in place.
 */
export class Ledger {
  private readonly entries: LedgerEntry[] = [];
  private readonly keys = new Set<string>();
  private readonly latestByPath = new Map<string, LedgerEntry>();
  private offset = 0;
  private loaded = false;
  private linesSeen = 0;
  private writeChain: Promise<void> = Promise.resolve();

  private constructor(
    readonly path: string,
    private readonly logger: Logger
  ) {}

  static async open(path: string, logger: Logger = silentLogger): Promise<Ledger> {
    await mkdir(dirname(path), { recursive: true });
    const ledger = new Ledger(path, logger);
    await ledger.refresh();
    return ledger;
  }

  get size(): number {
    return this.entries.length;
  }

  has(sourcePath: string): boolean {
    return this.latestByPath.has(sourcePath);
  }

  /** True when the newest entry for the path was recorded at this exact size and mtime. */
  isUnchanged(sourcePath: string, size: number, mtimeMs: number): boolean {
    const latest = this.latestByPath.get(sourcePath);
    return latest?.sourceSize === size && latest.sourceMtimeMs === mtimeMs;
  }

  hasFingerprint(sourcePath: string, fingerprint: string): boolean {
    return this.keys.has(entryKey(sourcePath, fingerprint));
  }

  latest(limit: number): LedgerEntry[] {
    return this.entries.slice(-limit).reverse();
  }

  /** Picks up lines appended since the last read, including other processes' appends. */
  async refresh(): Promise<void> {
    let handle: FileHandle;
    try {
      handle = await open(this.path, 'r');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        this.loaded = true;
        return;
      }
      throw err;
    }

    try {
      const { size } = await handle.stat();
      if (size > this.offset) {
        const chunk = Buffer.alloc(size - this.offset);
        const { bytesRead } = await handle.read(chunk, 0, chunk.length, this.offset);
        this.consume(chunk.subarray(0, bytesRead));
      }
    } finally {
      await handle.close();
    }

    this.loaded = true;
  }

  /**
   * Durably appends one entry. Appends are serialized; a failure rejects with
   * LedgerWriteError and leaves the in-memory view unchanged.
   */
  append(entry: LedgerEntry): Promise<void> {
    const run = this.writeChain.then(() => this.write(entry));
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  /** Resolves once every append issued so far has settled. */
  flush(): Promise<void> {
    return this.writeChain;
  }

  private async write(entry: LedgerEntry): Promise<void> {
    try {
      const handle = await open(this.path, 'a+');
      try {
        // A writer that died mid-line leaves no trailing newline; start ours on a fresh line.
        const prefix = (await endsWithNewline(handle)) ? '' : '\n';
        await handle.write(`${prefix}${JSON.stringify(entry)}\n`);
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (err) {
      throw new LedgerWriteError(`ledger append failed for ${entry.sourcePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    this.record(entry);
  }

  private consume(chunk: Buffer): void {
    const end = this.offset + chunk.length;
    const lastNewline = chunk.lastIndexOf(0x0a);
    if (lastNewline >= 0) {
      for (const line of chunk.subarray(0, lastNewline).toString('utf-8').split('\n')) {
        this.ingest(line);
      }
      this.offset += lastNewline + 1;
    }

    // On first load a partial final line is a crash leftover; later it may be an append in progress.
    if (!this.loaded && this.offset < end) {
      this.linesSeen += 1;
      this.logger.warn('ledger: ignoring incomplete final line', {
        path: this.path,
        line: this.linesSeen,
      });
      this.offset = end;
    }
  }

  private ingest(line: string): void {
    this.linesSeen += 1;
    const trimmed = line.trim();
    if (trimmed.length === 0) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (err) {
      this.logger.warn('ledger: skipping unparseable line', {
        path: this.path,
        line: this.linesSeen,
        error: errorMessage(err),
      });
      return;
    }

    const result = ledgerEntrySchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('ledger: skipping invalid entry', { path: this.path, line: this.linesSeen });
      return;
    }
    this.record(result.data);
  }

  private record(entry: LedgerEntry): void {
    this.latestByPath.set(entry.sourcePath, entry);
    const key = entryKey(entry.sourcePath, entry.fingerprint);
    if (this.keys.has(key)) return;
    this.keys.add(key);
    this.entries.push(entry);
  }
}

async function endsWithNewline(handle: FileHandle): Promise<boolean> {
  const { size } = await handle.stat();
  if (size === 0) return true;
  const last = Buffer.alloc(1);
  await handle.read(last, 0, 1, size - 1);
  return last[0] === 0x0a;
}
