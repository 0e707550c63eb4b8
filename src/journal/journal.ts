/**
 * Evidence Journal
 *
 * Append-only, hash-chained JSONL log for one node. This class is the only
 * writer of the journal file. State needed to append (last seq and hash) is
 * recovered from the file itself on first use, never from a side file.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ChainError, LedgerError, WriteFailureError, describeError } from '../errors.js';
import {
  GENESIS_HASH,
  anchorInput,
  createEnvelope,
  safeParseEnvelope,
  serializeEnvelope,
  type AnchorOptions,
  type AppendInput,
  type EvidenceEnvelope,
} from '../envelope/index.js';
import type { RecoveryReport, SequenceManager } from '../node/sequence.js';
import {
  appendLineDurable,
  readJsonlLines,
  readTail,
  truncateDurable,
} from '../storage/durable.js';
import { verifyChainLines, type ChainVerification } from './verify.js';

export interface EvidenceJournalOptions {
  nodeId: string;
  /** Path of the node's JSONL journal */
  path: string;
  sequence: SequenceManager;
  /** Clock used for envelope timestamps */
  now?: () => Date;
}

export interface JournalRecord {
  envelope: EvidenceEnvelope;
  /** The exact journal line, without its newline */
  line: string;
  lineNumber: number;
}

export interface JournalRecovery {
  /** Last seq found in the journal at startup */
  lastSeq: number;
  lastHash: string;
  /** Bytes of an unterminated trailing fragment that were cut off */
  truncatedBytes: number;
  sequence: RecoveryReport;
}

export class EvidenceJournal {
  readonly nodeId: string;
  readonly path: string;
  private readonly sequence: SequenceManager;
  private readonly now: () => Date;
  private ready?: Promise<JournalRecovery>;
  private lastHash = GENESIS_HASH;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: EvidenceJournalOptions) {
    this.nodeId = options.nodeId;
    this.path = options.path;
    this.sequence = options.sequence;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Recover append state from the journal tail. Runs once; later calls
   * return the same report.
   */
  async open(): Promise<JournalRecovery> {
    if (!this.ready) {
      const attempt = this.recover();
      this.ready = attempt;
      attempt.catch(() => {
        // Let the next call try again; this call's caller sees the error
        if (this.ready === attempt) {
          this.ready = undefined;
        }
      });
    }
    return this.ready;
  }

  /**
   * Append one envelope. Resolves only after the line is fsync'ed.
   */
  append(input: AppendInput): Promise<EvidenceEnvelope> {
    return this.enqueue(() => input);
  }

  /**
   * Append a `chain_anchor` envelope: genesis on an empty journal, a
   * checkpoint otherwise.
   */
  appendAnchor(options: AnchorOptions = {}): Promise<EvidenceEnvelope> {
    return this.enqueue((seq) => anchorInput(seq, options));
  }

  private enqueue(build: (seq: number) => AppendInput): Promise<EvidenceEnvelope> {
    const run = this.queue.then(() => this.appendNow(build));
    // Failures reach the caller through `run`; the queue only orders writes
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * Stream envelopes with their raw lines in seq order, bounded by the
   * journal length at call time. A malformed line raises ChainError.
   */
  async *readRecords(): AsyncGenerator<JournalRecord> {
    for await (const line of readJsonlLines(this.path)) {
      const parsed = safeParseEnvelope(line.text);
      if (!parsed.success) {
        throw new ChainError('malformed', { line: line.lineNumber, nodeId: this.nodeId }, parsed.reason);
      }
      yield { envelope: parsed.envelope, line: line.text, lineNumber: line.lineNumber };
    }
  }

  async *readAll(): AsyncGenerator<EvidenceEnvelope> {
    for await (const record of this.readRecords()) {
      yield record.envelope;
    }
  }

  /**
   * Records with seq > afterSeq, at most `limit` of them.
   */
  async *readSince(afterSeq: number, limit?: number): AsyncGenerator<JournalRecord> {
    let yielded = 0;
    for await (const record of this.readRecords()) {
      if (limit !== undefined && yielded >= limit) {
        return;
      }
      if (record.envelope.seq > afterSeq) {
        yielded += 1;
        yield record;
      }
    }
  }

  /**
   * Walk the journal from genesis and report the first violated invariant.
   * Never modifies the journal.
   */
  async verifyChain(): Promise<ChainVerification> {
    return verifyChainLines(readJsonlLines(this.path), { nodeId: this.nodeId });
  }

  async count(): Promise<number> {
    let lines = 0;
    for await (const _line of readJsonlLines(this.path)) {
      lines += 1;
    }
    return lines;
  }

  /**
   * The last complete envelope, read from the tail of the file.
   */
  async lastEnvelope(): Promise<EvidenceEnvelope | undefined> {
    const tail = await readTail(this.path);
    if (tail.lastLine === undefined) {
      return undefined;
    }
    const parsed = safeParseEnvelope(tail.lastLine);
    if (!parsed.success) {
      throw new ChainError('malformed', { line: await this.count(), nodeId: this.nodeId }, parsed.reason);
    }
    return parsed.envelope;
  }

  private async appendNow(build: (seq: number) => AppendInput): Promise<EvidenceEnvelope> {
    try {
      await this.open();
    } catch (err) {
      throw new WriteFailureError(
        this.nodeId,
        `Journal ${this.path} cannot be appended to: ${describeError(err)}`,
        { cause: err },
      );
    }

    const seq = this.sequence.next();
    let envelope: EvidenceEnvelope;
    try {
      const input = build(seq);
      envelope = createEnvelope({
        nodeId: this.nodeId,
        seq,
        evidenceType: input.evidenceType,
        payload: input.payload,
        prevHash: this.lastHash,
        tags: input.tags,
        source: input.source,
        timestamp: this.now().toISOString(),
      });
    } catch (err) {
      this.sequence.rollback(seq);
      throw err;
    }

    try {
      await appendLineDurable(this.path, serializeEnvelope(envelope));
    } catch (err) {
      this.sequence.rollback(seq);
      // The line may be torn or may be complete; re-derive state from disk next time
      this.ready = undefined;
      throw new WriteFailureError(
        this.nodeId,
        `Failed to append seq ${seq} to ${this.path}: ${describeError(err)}`,
        { seq, cause: err },
      );
    }

    this.lastHash = envelope.envelope_hash;

    try {
      await this.sequence.commit(seq);
    } catch (err) {
      throw new WriteFailureError(
        this.nodeId,
        `Envelope seq ${seq} was written to ${this.path} but the sequence cache could not be updated: ${describeError(err)}`,
        { seq, written: envelope, cause: err },
      );
    }

    return envelope;
  }

  private async recover(): Promise<JournalRecovery> {
    await mkdir(dirname(this.path), { recursive: true });

    const tail = await readTail(this.path);
    const truncatedBytes = tail.size - tail.completeLength;
    if (truncatedBytes > 0) {
      // An unterminated fragment is an append that never returned success
      await truncateDurable(this.path, tail.completeLength);
    }

    let lastSeq = 0;
    let lastHash = GENESIS_HASH;
    if (tail.lastLine !== undefined) {
      const parsed = safeParseEnvelope(tail.lastLine);
      if (!parsed.success || parsed.envelope.node_id !== this.nodeId) {
        throw await this.locateTailError();
      }
      lastSeq = parsed.envelope.seq;
      lastHash = parsed.envelope.envelope_hash;
    }

    const sequence = await this.sequence.recover(lastSeq);
    this.lastHash = lastHash;
    return { lastSeq, lastHash, truncatedBytes, sequence };
  }

  private async locateTailError(): Promise<LedgerError> {
    const verification = await this.verifyChain();
    if (verification.error) {
      return verification.error;
    }
    return new ChainError(
      'malformed',
      { line: verification.envelopeCount, nodeId: this.nodeId },
      'last journal line is not a valid envelope of this node',
    );
  }
}

/**
 * Collect an async generator into an array.
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
