/**
 * Sequence Manager
 *
 * Per-node monotonic counter. The counter file is a cache of the journal
 * tail: the journal decides, and `recover()` rewrites the cache whenever the
 * two disagree. A value is persisted only after the envelope that carries it
 * is durable (`commit`), so a crash can leave the cache behind the journal but
 * never ahead of it in a way that matters.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { CorruptStateError } from '../errors.js';
import { readJsonState, writeJsonAtomic } from '../storage/durable.js';

export const SequenceStateSchema = z.object({
  node_id: z.string(),
  seq: z.number().int().nonnegative(),
  updated_at: z.string(),
});

export type SequenceState = z.infer<typeof SequenceStateSchema>;

export interface SequenceManagerOptions {
  nodeId: string;
  /** Path of the counter cache file */
  path: string;
}

export interface RecoveryReport {
  /** Last seq found in the journal */
  journalSeq: number;
  /** Value the cache held before recovery (undefined if missing or unreadable) */
  cachedSeq?: number;
  /** The cache file existed but could not be parsed */
  cacheCorrupt: boolean;
  /** Whether the cache file was rewritten */
  repaired: boolean;
}

export class SequenceManager {
  private readonly nodeId: string;
  private readonly path: string;
  private committed = 0;
  private reserved?: number;
  private recovered = false;

  constructor(options: SequenceManagerOptions) {
    this.nodeId = options.nodeId;
    this.path = options.path;
  }

  /**
   * Align with the journal. Must run before the first `next()`.
   */
  async recover(journalSeq: number): Promise<RecoveryReport> {
    let cachedSeq: number | undefined;
    let cacheCorrupt = false;
    try {
      const state = await readJsonState(this.path, SequenceStateSchema);
      cachedSeq = state?.node_id === this.nodeId ? state.seq : undefined;
    } catch (err) {
      // A corrupt cache is replaced from the journal below
      if (!(err instanceof CorruptStateError)) {
        throw err;
      }
      cacheCorrupt = true;
    }

    this.committed = journalSeq;
    this.reserved = undefined;
    this.recovered = true;

    const repaired = cachedSeq !== journalSeq;
    if (repaired) {
      await this.persist();
    }
    return { journalSeq, cachedSeq, cacheCorrupt, repaired };
  }

  /**
   * Reserve the next value. Only one reservation may be outstanding.
   */
  next(): number {
    if (!this.recovered) {
      throw new Error('SequenceManager.recover() must be called before next()');
    }
    if (this.reserved !== undefined) {
      throw new Error(`Sequence ${this.reserved} is still reserved for node ${this.nodeId}`);
    }
    this.reserved = this.committed + 1;
    return this.reserved;
  }

  /**
   * Record that `seq` is durably written, then update the cache file.
   */
  async commit(seq: number): Promise<void> {
    this.assertReserved(seq);
    this.committed = seq;
    this.reserved = undefined;
    await this.persist();
  }

  /**
   * Release a reservation whose write failed; the value will be handed out again.
   */
  rollback(seq: number): void {
    this.assertReserved(seq);
    this.reserved = undefined;
  }

  /** Last committed value (0 for a fresh node). */
  current(): number {
    return this.committed;
  }

  private assertReserved(seq: number): void {
    if (this.reserved !== seq) {
      throw new Error(`Sequence ${seq} was not reserved (reserved: ${this.reserved ?? 'none'})`);
    }
  }

  private async persist(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const state: SequenceState = {
      node_id: this.nodeId,
      seq: this.committed,
      updated_at: new Date().toISOString(),
    };
    await writeJsonAtomic(this.path, state);
  }
}
