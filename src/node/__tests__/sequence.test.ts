import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SequenceManager } from '../sequence.js';

const NODE = 'node_111111111111';

describe('SequenceManager', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'evidence-sequence-'));
    path = join(dir, 'sequence.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function cachedSeq(): Promise<number> {
    return JSON.parse(await readFile(path, 'utf-8')).seq;
  }

  it('starts a fresh node at 1', async () => {
    const sequence = new SequenceManager({ nodeId: NODE, path });
    const report = await sequence.recover(0);

    expect(report).toEqual({ journalSeq: 0, cachedSeq: undefined, cacheCorrupt: false, repaired: true });
    expect(sequence.next()).toBe(1);
  });

  it('persists only on commit', async () => {
    const sequence = new SequenceManager({ nodeId: NODE, path });
    await sequence.recover(0);

    const seq = sequence.next();
    expect(await cachedSeq()).toBe(0);
    await sequence.commit(seq);
    expect(await cachedSeq()).toBe(1);
    expect(sequence.current()).toBe(1);
  });

  it('hands a rolled-back value out again', async () => {
    const sequence = new SequenceManager({ nodeId: NODE, path });
    await sequence.recover(4);

    const seq = sequence.next();
    sequence.rollback(seq);
    expect(sequence.next()).toBe(5);
  });

  it('allows one reservation at a time', async () => {
    const sequence = new SequenceManager({ nodeId: NODE, path });
    await sequence.recover(0);
    sequence.next();
    expect(() => sequence.next()).toThrow('still reserved');
  });

  it('requires recover() before next()', () => {
    const sequence = new SequenceManager({ nodeId: NODE, path });
    expect(() => sequence.next()).toThrow('recover()');
  });

  it('repairs a stale cache from the journal tail', async () => {
    await writeFile(path, JSON.stringify({ node_id: NODE, seq: 2, updated_at: '2026-01-01T00:00:00.000Z' }));

    const sequence = new SequenceManager({ nodeId: NODE, path });
    const report = await sequence.recover(3);

    expect(report).toEqual({ journalSeq: 3, cachedSeq: 2, cacheCorrupt: false, repaired: true });
    expect(await cachedSeq()).toBe(3);
    expect(sequence.next()).toBe(4);
  });

  it('trusts the journal over a cache that ran ahead', async () => {
    await writeFile(path, JSON.stringify({ node_id: NODE, seq: 9, updated_at: '2026-01-01T00:00:00.000Z' }));

    const sequence = new SequenceManager({ nodeId: NODE, path });
    await sequence.recover(7);
    expect(sequence.next()).toBe(8);
  });

  it('replaces a corrupt cache', async () => {
    await writeFile(path, 'not json');

    const sequence = new SequenceManager({ nodeId: NODE, path });
    const report = await sequence.recover(2);

    expect(report.cacheCorrupt).toBe(true);
    expect(report.repaired).toBe(true);
    expect(await cachedSeq()).toBe(2);
  });

  it('leaves a matching cache alone', async () => {
    await writeFile(path, JSON.stringify({ node_id: NODE, seq: 5, updated_at: '2026-01-01T00:00:00.000Z' }));

    const report = await new SequenceManager({ nodeId: NODE, path }).recover(5);
    expect(report.repaired).toBe(false);
  });
});
