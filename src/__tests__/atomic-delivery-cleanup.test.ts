import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { AtomicDelivery } from '../delivery/atomic.js';
import { silentLogger } from '../utils/logger.js';

const removal = vi.hoisted(() => ({ failing: false }));

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    rm: async (...args: Parameters<typeof actual.rm>) => {
      if (removal.failing) throw Object.assign(new Error('EBUSY: simulated'), { code: 'EBUSY' });
      return actual.rm(...args);
    },
  };
});

describe('AtomicDelivery temp cleanup', () => {
  afterEach(() => {
    removal.failing = false;
  });

  it('reports a linked file as delivered when its temp name cannot be removed', async () => {
    const destDir = join(await mkdtemp(join(tmpdir(), 'hires-relay-cleanup-')), '70');
    const warn = vi.fn();
    const delivery = new AtomicDelivery(
      { destDir, overwriteExisting: false, runId: '101-aaaaaa' },
      { ...silentLogger, warn }
    );
    removal.failing = true;

    const outcome = await delivery.deliver('a.raw', Buffer.from('frame'));

    expect(outcome).toEqual({ kind: 'delivered', path: join(destDir, 'a.raw') });
    expect(await readFile(join(destDir, 'a.raw'), 'utf-8')).toBe('frame');
    expect(warn).toHaveBeenCalledWith('delivery: could not remove temp file', {
      path: join(destDir, '.a.raw.101-aaaaaa-1.partial'),
      error: 'EBUSY: simulated',
    });
  });
});
