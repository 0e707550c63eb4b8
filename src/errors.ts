/**
 * Evidence Ledger error taxonomy.
 *
 * Every failure the ledger surfaces is one of these classes. Callers can
 * branch on `code` without importing the concrete class.
 */

import type { EvidenceEnvelope } from './envelope/types.js';

export enum LedgerErrorCode {
  CORRUPT_IDENTITY = 'CORRUPT_IDENTITY',
  WRITE_FAILURE = 'WRITE_FAILURE',
  CHAIN_ERROR = 'CHAIN_ERROR',
  INTEGRITY_FAILURE = 'INTEGRITY_FAILURE',
  CORRUPT_STATE = 'CORRUPT_STATE',
}

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
    this.code = code;
  }
}

/**
 * The node identity file exists but cannot be read or parsed.
 * Requires operator intervention; the identity is never regenerated.
 */
export class CorruptIdentityError extends LedgerError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(LedgerErrorCode.CORRUPT_IDENTITY, `Node identity at ${path} is corrupt: ${reason}`, options);
    this.name = 'CorruptIdentityError';
    this.path = path;
  }
}

/**
 * An append could not complete. No partial envelope is ever valid, so the
 * caller may simply retry.
 */
export class WriteFailureError extends LedgerError {
  readonly nodeId: string;
  readonly seq?: number;
  /**
   * Set when the envelope reached the journal but a follow-up step failed
   * (the sequence cache). The envelope is part of the chain.
   */
  readonly written?: EvidenceEnvelope;

  constructor(
    nodeId: string,
    message: string,
    options?: { seq?: number; written?: EvidenceEnvelope; cause?: unknown },
  ) {
    super(LedgerErrorCode.WRITE_FAILURE, message, { cause: options?.cause });
    this.name = 'WriteFailureError';
    this.nodeId = nodeId;
    this.seq = options?.seq;
    this.written = options?.written;
  }
}

export type ChainErrorKind =
  | 'malformed'
  | 'sequence_gap'
  | 'duplicate_seq'
  | 'broken_link'
  | 'hash_mismatch'
  | 'node_mismatch';

export interface ChainErrorPosition {
  /** 1-based line number within the file (or stream) being verified */
  line: number;
  /** Sequence number of the offending envelope, when it could be parsed */
  seq?: number;
  /** Node the chain belongs to */
  nodeId?: string;
}

/**
 * A chain invariant is violated. Reported with its position, never repaired.
 */
export class ChainError extends LedgerError {
  readonly kind: ChainErrorKind;
  readonly position: ChainErrorPosition;

  constructor(kind: ChainErrorKind, position: ChainErrorPosition, detail: string) {
    const where = [
      position.nodeId ? `node ${position.nodeId}` : undefined,
      position.seq !== undefined ? `seq ${position.seq}` : undefined,
      `line ${position.line}`,
    ].filter((part): part is string => part !== undefined).join(', ');
    super(LedgerErrorCode.CHAIN_ERROR, `Chain error (${kind}) at ${where}: ${detail}`);
    this.name = 'ChainError';
    this.kind = kind;
    this.position = position;
  }
}

/**
 * An export batch failed verification on import. The whole batch is rejected.
 */
export class IntegrityFailureError extends LedgerError {
  readonly batchDir: string;
  readonly chunk?: string;

  constructor(batchDir: string, message: string, options?: { chunk?: string; cause?: unknown }) {
    const subject = options?.chunk ? `chunk ${options.chunk} of ${batchDir}` : batchDir;
    super(LedgerErrorCode.INTEGRITY_FAILURE, `Integrity failure in ${subject}: ${message}`, {
      cause: options?.cause,
    });
    this.name = 'IntegrityFailureError';
    this.batchDir = batchDir;
    this.chunk = options?.chunk;
  }
}

/**
 * A state file owned by the ledger (export marker, import index, config)
 * could not be parsed.
 */
export class CorruptStateError extends LedgerError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(LedgerErrorCode.CORRUPT_STATE, `State file ${path} is corrupt: ${reason}`, options);
    this.name = 'CorruptStateError';
    this.path = path;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
