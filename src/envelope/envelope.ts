/**
 * Envelope construction, parsing and per-envelope verification.
 */

import { computeEnvelopeHash } from './canonical.js';
import {
  ENVELOPE_VERSION,
  EvidenceEnvelopeSchema,
  JsonValueSchema,
  type AnchorOptions,
  type AnchorType,
  type AppendInput,
  type CreateEnvelopeInput,
  type EvidenceEnvelope,
  type UnsealedEnvelope,
} from './types.js';

export type EnvelopeParseResult =
  | { success: true; envelope: EvidenceEnvelope }
  | { success: false; reason: string };

/**
 * Build a sealed envelope: fields are fixed and `envelope_hash` computed.
 */
export function createEnvelope(input: CreateEnvelopeInput): EvidenceEnvelope {
  const payload = JsonValueSchema.safeParse(input.payload);
  if (!payload.success) {
    throw new TypeError(`Payload is not JSON-serializable: ${payload.error.issues[0]?.message ?? 'invalid value'}`);
  }

  const unsealed: UnsealedEnvelope = {
    node_id: input.nodeId,
    seq: input.seq,
    timestamp: input.timestamp ?? new Date().toISOString(),
    evidence_type: input.evidenceType,
    payload: payload.data,
    prev_hash: input.prevHash,
    tags: normalizeTags(input.tags),
    source: input.source?.trim() || 'unknown',
    version: ENVELOPE_VERSION,
  };

  return {
    ...unsealed,
    envelope_hash: computeEnvelopeHash(unsealed),
  };
}

export const ANCHOR_TAGS = ['anchor', 'chain'];

/**
 * Input for a `chain_anchor` envelope at `seq`. The first envelope of a chain
 * anchors its genesis; any later one is a checkpoint.
 */
export function anchorInput(seq: number, options: AnchorOptions = {}): AppendInput {
  const anchorType: AnchorType = seq === 1 ? 'genesis' : 'checkpoint';
  return {
    evidenceType: 'chain_anchor',
    payload: {
      message: options.message ?? `Chain anchor - ${anchorType} envelope`,
      anchor_type: anchorType,
    },
    tags: ANCHOR_TAGS,
    source: options.source,
  };
}

/**
 * Recompute the hash of an envelope and compare it with the stored one.
 */
export function verifyEnvelopeHash(envelope: EvidenceEnvelope): boolean {
  return computeEnvelopeHash(stripHash(envelope)) === envelope.envelope_hash;
}

export function stripHash(envelope: EvidenceEnvelope): UnsealedEnvelope {
  const { envelope_hash: _omitted, ...rest } = envelope;
  return rest;
}

/**
 * Parse one journal line. Never throws.
 */
export function safeParseEnvelope(line: string): EnvelopeParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { success: false, reason: `invalid JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  const result = EvidenceEnvelopeSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { success: false, reason: `invalid envelope (${path}${issue?.message ?? 'unknown issue'})` };
  }
  return { success: true, envelope: result.data };
}

function normalizeTags(tags?: string[]): string[] {
  if (!tags) {
    return [];
  }
  const seen = new Set<string>();
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed) {
      seen.add(trimmed);
    }
  }
  return [...seen];
}
