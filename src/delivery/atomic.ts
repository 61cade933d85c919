import { link, mkdir, open, readFile, rename, rm, stat } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve } from 'node:path';
import { DeliveryError, PipelineError, errnoCode, errorMessage } from '../control-plane/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const PARTIAL_SUFFIX = '.partial';

export type DeliveryKind = 'delivered' | 'duplicate' | 'conflict';

export interface DeliveryOutcome {
  kind: DeliveryKind;
  path: string;
}

export interface DeliveryOptions {
  destDir: string;
  overwriteExisting: boolean;
  /** Distinguishes this process's temp files from another process's. */
  runId: string;
}

// Filesystems that cannot hard-link fall back to check-then-rename.
const NO_LINK_CODES = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'ENOSYS', 'EMLINK']);

export class AtomicDelivery {
  private sequence = 0;

  constructor(
    private readonly options: DeliveryOptions,
    private readonly logger: Logger = silentLogger
  ) {}

  resolveTarget(relativeOutput: string): string {
    const target = resolve(this.options.destDir, relativeOutput);
    const rel = relative(this.options.destDir, target);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new DeliveryError(`output path escapes destination directory: ${relativeOutput}`);
    }
    return target;
  }

  /**
   * Places `data` at the destination so the final path only ever holds the
   * complete output. Without overwrite an existing file is left untouched and
   * reported as a duplicate (same bytes) or a conflict (different bytes).
   */
  async deliver(relativeOutput: string, data: Uint8Array): Promise<DeliveryOutcome> {
    const target = this.resolveTarget(relativeOutput);
    const dir = dirname(target);

    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new DeliveryError(`cannot create ${dir}: ${errorMessage(err)}`, { cause: err });
    }

    if (!this.options.overwriteExisting) {
      const existing = await this.compareExisting(target, data);
      if (existing) return existing;
    }

    const temp = join(dir, `.${basename(target)}.${this.options.runId}-${++this.sequence}${PARTIAL_SUFFIX}`);
    let outcome: DeliveryOutcome;
    try {
      await writeDurably(temp, data);
      outcome = this.options.overwriteExisting
        ? await this.replace(temp, target)
        : await this.publishExclusive(temp, target, data);
    } catch (err) {
      await this.discard(temp);
      if (err instanceof PipelineError) throw err;
      throw new DeliveryError(`delivery to ${target} failed: ${errorMessage(err)}`, { cause: err });
    }

    await this.syncDirectory(dir);
    return outcome;
  }

  private async replace(temp: string, target: string): Promise<DeliveryOutcome> {
    await rename(temp, target);
    return { kind: 'delivered', path: target };
  }

  private async publishExclusive(temp: string, target: string, data: Uint8Array): Promise<DeliveryOutcome> {
    try {
      await link(temp, target);
    } catch (err) {
      const code = errnoCode(err);
      if (code === 'EEXIST') {
        await this.discard(temp);
        return (await this.compareExisting(target, data)) ?? { kind: 'conflict', path: target };
      }
      if (code && NO_LINK_CODES.has(code)) {
        return this.renameIfAbsent(temp, target, data);
      }
      throw err;
    }
    // Published once linked; a leftover temp name is only logged.
    await this.discard(temp);
    return { kind: 'delivered', path: target };
  }

  private async renameIfAbsent(temp: string, target: string, data: Uint8Array): Promise<DeliveryOutcome> {
    const existing = await this.compareExisting(target, data);
    if (existing) {
      await this.discard(temp);
      return existing;
    }
    await rename(temp, target);
    return { kind: 'delivered', path: target };
  }

  private async compareExisting(target: string, data: Uint8Array): Promise<DeliveryOutcome | undefined> {
    try {
      const info = await stat(target);
      if (info.size !== data.byteLength) return { kind: 'conflict', path: target };
      const current = await readFile(target);
      return current.equals(data) ? { kind: 'duplicate', path: target } : { kind: 'conflict', path: target };
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return undefined;
      throw new DeliveryError(`cannot inspect existing ${target}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async discard(temp: string): Promise<void> {
    try {
      await rm(temp, { force: true });
    } catch (err) {
      this.logger.warn('delivery: could not remove temp file', { path: temp, error: errorMessage(err) });
    }
  }

  private async syncDirectory(dir: string): Promise<void> {
    try {
      const handle = await open(dir, 'r');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (err) {
      // Not every platform can fsync a directory handle.
      this.logger.debug('delivery: directory sync skipped', { path: dir, error: errorMessage(err) });
    }
  }
}

async function writeDurably(path: string, data: Uint8Array): Promise<void> {
  const handle = await open(path, 'wx');
  try {
    await handle.writeFile(data);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/** Confirms the published file exists at the expected size. */
export async function verifyDelivery(path: string, expectedBytes: number): Promise<void> {
  let size: number;
  try {
    ({ size } = await stat(path));
  } catch (err) {
    throw new DeliveryError(`delivered file missing after publish: ${path}: ${errorMessage(err)}`, { cause: err });
  }
  if (size !== expectedBytes) {
    throw new DeliveryError(`delivered file size mismatch: ${path} has ${size} bytes, expected ${expectedBytes}`);
  }
}
