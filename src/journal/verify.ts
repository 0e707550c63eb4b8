/**
 * Hash-chain verification.
 *
 * Shared by the journal, the export manager (before a batch is cut), the
 * import manager (inside a batch) and the federated store (across batches).
 * Verification is read-only: it reports the first violation and stops.
 */

import { ChainError } from '../errors.js';
import {
  GENESIS_HASH,
  safeParseEnvelope,
  verifyEnvelopeHash,
  type EvidenceEnvelope,
} from '../envelope/index.js';
import type { JsonlLine } from '../storage/durable.js';

export interface ChainVerifierOptions {
  /** Node every envelope must belong to. Defaults to the first envelope's node. */
  nodeId?: string;
  /** Seq of the first envelope. Defaults to 1. */
  startSeq?: number;
  /**
   * prev_hash the first envelope must carry. Defaults to GENESIS_HASH when
   * startSeq is 1; otherwise the first link is not checked.
   */
  startPrevHash?: string;
}

export interface ChainVerification {
  valid: boolean;
  error?: ChainError;
  /** Envelopes that passed before the first error */
  envelopeCount: number;
  /** Seq of the last valid envelope (startSeq - 1 if none) */
  lastSeq: number;
  /** Hash of the last valid envelope */
  lastHash?: string;
}

export class ChainVerifier {
  private nodeId?: string;
  private expectedSeq: number;
  private expectedPrevHash?: string;
  private count = 0;
  private lastValidHash?: string;

  constructor(options: ChainVerifierOptions = {}) {
    this.nodeId = options.nodeId;
    this.expectedSeq = options.startSeq ?? 1;
    this.expectedPrevHash = options.startPrevHash ?? (this.expectedSeq === 1 ? GENESIS_HASH : undefined);
  }

  get envelopeCount(): number {
    return this.count;
  }

  get lastSeq(): number {
    return this.expectedSeq - 1;
  }

  get lastHash(): string | undefined {
    return this.lastValidHash;
  }

  /**
   * Parse and check one line. Returns the envelope, or the violation found.
   */
  checkLine(line: JsonlLine): { envelope: EvidenceEnvelope } | { error: ChainError } {
    const parsed = safeParseEnvelope(line.text);
    if (!parsed.success) {
      return {
        error: new ChainError('malformed', { line: line.lineNumber, nodeId: this.nodeId }, parsed.reason),
      };
    }
    const error = this.checkEnvelope(parsed.envelope, line.lineNumber);
    return error ? { error } : { envelope: parsed.envelope };
  }

  checkEnvelope(envelope: EvidenceEnvelope, lineNumber: number): ChainError | undefined {
    const position = { line: lineNumber, seq: envelope.seq, nodeId: this.nodeId ?? envelope.node_id };

    if (this.nodeId !== undefined && envelope.node_id !== this.nodeId) {
      return new ChainError(
        'node_mismatch',
        position,
        `envelope belongs to node ${envelope.node_id}, expected ${this.nodeId}`,
      );
    }

    if (envelope.seq < this.expectedSeq) {
      return new ChainError(
        'duplicate_seq',
        position,
        `seq ${envelope.seq} was already used (expected ${this.expectedSeq})`,
      );
    }
    if (envelope.seq > this.expectedSeq) {
      return new ChainError(
        'sequence_gap',
        position,
        `expected seq ${this.expectedSeq}, found ${envelope.seq}`,
      );
    }

    if (!verifyEnvelopeHash(envelope)) {
      return new ChainError(
        'hash_mismatch',
        position,
        `stored envelope_hash ${envelope.envelope_hash} does not match its content`,
      );
    }

    if (this.expectedPrevHash !== undefined && envelope.prev_hash !== this.expectedPrevHash) {
      return new ChainError(
        'broken_link',
        position,
        `prev_hash ${envelope.prev_hash} does not match previous envelope_hash ${this.expectedPrevHash}`,
      );
    }

    this.nodeId = envelope.node_id;
    this.expectedSeq = envelope.seq + 1;
    this.expectedPrevHash = envelope.envelope_hash;
    this.lastValidHash = envelope.envelope_hash;
    this.count += 1;
    return undefined;
  }

  result(error?: ChainError): ChainVerification {
    return {
      valid: error === undefined,
      error,
      envelopeCount: this.count,
      lastSeq: this.lastSeq,
      lastHash: this.lastValidHash,
    };
  }
}

/**
 * Verify a whole stream of journal lines.
 */
export async function verifyChainLines(
  lines: AsyncIterable<JsonlLine>,
  options: ChainVerifierOptions = {},
): Promise<ChainVerification> {
  const verifier = new ChainVerifier(options);
  for await (const line of lines) {
    const checked = verifier.checkLine(line);
    if ('error' in checked) {
      return verifier.result(checked.error);
    }
  }
  return verifier.result();
}
