import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { HistoryJournal } from '../ledger/history.js';
import type { HistoryRecord } from '../ledger/types.js';

function record(name: string, outcome: HistoryRecord['outcome']): HistoryRecord {
  return {
    timestamp: '2026-01-05T10:00:00.000Z',
    sourcePath: `/in/${name}`,
    outcome,
    attempts: 1,
    durationMs: 12,
  };
}

async function journalPath(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'hires-relay-history-'));
  return join(dir, 'state', 'history.jsonl');
}

describe('HistoryJournal', () => {
  it('returns nothing before the first record', async () => {
    const journal = new HistoryJournal(await journalPath());
    expect(await journal.recent(10)).toEqual([]);
  });

  it('appends records and lists the newest first', async () => {
    const journal = new HistoryJournal(await journalPath());
    await journal.record(record('a.raw', 'delivered'));
    await journal.record(record('b.raw', 'failed'));
    await journal.record(record('c.raw', 'delivered'));

    const recent = await journal.recent(2);
    expect(recent.map((r) => r.sourcePath)).toEqual(['/in/c.raw', '/in/b.raw']);
  });

  it('filters by outcome', async () => {
    const journal = new HistoryJournal(await journalPath());
    await journal.record(record('a.raw', 'delivered'));
    await journal.record({ ...record('b.raw', 'failed'), errorKind: 'InvalidInput', message: 'corrupt header' });

    const failures = await journal.recent(10, 'failed');
    expect(failures).toEqual([
      { ...record('b.raw', 'failed'), errorKind: 'InvalidInput', message: 'corrupt header' },
    ]);
  });

  it('skips malformed lines', async () => {
    const path = await journalPath();
    const journal = new HistoryJournal(path);
    await journal.record(record('a.raw', 'delivered'));
    const existing = await readFile(path, 'utf-8');
    await writeFile(path, `${existing}garbage\n{"outcome":"exploded"}\n`);

    const recent = await journal.recent(10);
    expect(recent.map((r) => r.sourcePath)).toEqual(['/in/a.raw']);
  });
});
