import { mkdir, mkdtemp, readFile, readdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { beforeEach, describe, it, expect } from 'vitest';
import { DeliveryError, errnoCode } from '../control-plane/errors.js';
import { AtomicDelivery, verifyDelivery } from '../delivery/atomic.js';
import { patternBytes } from './helpers.js';

describe('AtomicDelivery', () => {
  let destDir: string;

  beforeEach(async () => {
    const root = await mkdtemp(join(tmpdir(), 'hires-relay-delivery-'));
    destDir = join(root, '70');
  });

  function delivery(overwriteExisting = false, runId = '101-aaaaaa'): AtomicDelivery {
    return new AtomicDelivery({ destDir, overwriteExisting, runId });
  }

  it('writes the output at the final path and leaves no temp files', async () => {
    const data = patternBytes(64 * 1024);
    const outcome = await delivery().deliver('shoot/day1/clip_12.mxf', data);

    const target = join(destDir, 'shoot', 'day1', 'clip_12.mxf');
    expect(outcome).toEqual({ kind: 'delivered', path: target });
    expect((await readFile(target)).equals(data)).toBe(true);
    expect(await readdir(join(destDir, 'shoot', 'day1'))).toEqual(['clip_12.mxf']);
  });

  it('reports identical existing output as a duplicate', async () => {
    const data = Buffer.from('frame data');
    await delivery().deliver('a.raw', data);

    const outcome = await delivery(false, '202-bbbbbb').deliver('a.raw', data);
    expect(outcome.kind).toBe('duplicate');
    expect(await readdir(destDir)).toEqual(['a.raw']);
  });

  it('never replaces different existing output without overwrite', async () => {
    await mkdir(destDir, { recursive: true });
    await writeFile(join(destDir, 'a.raw'), 'older render');

    const outcome = await delivery().deliver('a.raw', Buffer.from('newer render'));
    expect(outcome).toEqual({ kind: 'conflict', path: join(destDir, 'a.raw') });
    expect(await readFile(join(destDir, 'a.raw'), 'utf-8')).toBe('older render');
    expect(await readdir(destDir)).toEqual(['a.raw']);
  });

  it('replaces existing output with overwrite', async () => {
    await mkdir(destDir, { recursive: true });
    await writeFile(join(destDir, 'a.raw'), 'older render');

    const outcome = await delivery(true).deliver('a.raw', Buffer.from('newer render'));
    expect(outcome.kind).toBe('delivered');
    expect(await readFile(join(destDir, 'a.raw'), 'utf-8')).toBe('newer render');
    expect(await readdir(destDir)).toEqual(['a.raw']);
  });

  it('rejects output paths outside the destination', async () => {
    await expect(delivery().deliver('../escape.raw', Buffer.from('x'))).rejects.toBeInstanceOf(DeliveryError);
    expect(() => delivery().resolveTarget('')).toThrow(DeliveryError);
  });

  it('lets exactly one of two racing deliveries create the file', async () => {
    const data = patternBytes(256 * 1024);
    const outcomes = await Promise.all([
      delivery(false, '101-aaaaaa').deliver('a.raw', data),
      delivery(false, '202-bbbbbb').deliver('a.raw', data),
    ]);

    expect(outcomes.map((o) => o.kind).sort()).toEqual(['delivered', 'duplicate']);
    expect(await readdir(destDir)).toEqual(['a.raw']);
  });

  it('never exposes a partial file at the final path', async () => {
    const data = patternBytes(8 * 1024 * 1024);
    const target = join(destDir, 'big.raw');
    const seen: number[] = [];
    let watching = true;

    const observer = (async () => {
      while (watching) {
        try {
          seen.push((await readFile(target)).length);
        } catch (err) {
          if (errnoCode(err) !== 'ENOENT') throw err;
        }
        await new Promise((resolve) => setImmediate(resolve));
      }
    })();

    await delivery().deliver('big.raw', data);
    watching = false;
    await observer;
    seen.push((await readFile(target)).length);

    expect(seen.every((size) => size === data.length)).toBe(true);
  });
});

describe('verifyDelivery', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hires-relay-verify-'));
  });

  it('accepts a published file of the expected size', async () => {
    await writeFile(join(dir, 'a.raw'), 'frame');
    await expect(verifyDelivery(join(dir, 'a.raw'), 5)).resolves.toBeUndefined();
  });

  it('rejects a published file of another size', async () => {
    await writeFile(join(dir, 'a.raw'), 'fram');
    await expect(verifyDelivery(join(dir, 'a.raw'), 5)).rejects.toThrow(
      `delivered file size mismatch: ${join(dir, 'a.raw')} has 4 bytes, expected 5`
    );
  });

  it('rejects a published file that is gone', async () => {
    await expect(verifyDelivery(join(dir, 'missing.raw'), 5)).rejects.toBeInstanceOf(DeliveryError);
  });
});
