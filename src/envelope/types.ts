/**
 * Evidence envelope types (schema v1).
 */

import { z } from 'zod';

/** Current envelope schema version. Pinned: changing it breaks historical chains. */
export const ENVELOPE_VERSION = 'v1';

/** `prev_hash` of the first envelope in every node's chain. */
export const GENESIS_HASH = '0'.repeat(64);

/** JSON-serializable value. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const EVIDENCE_TYPES = [
  'telemetry_snapshot',
  'agent_heartbeat',
  'system_event',
  'audit_log',
  'task_completion',
  'metric_sample',
  'error_trace',
  'directive',
  'chain_anchor',
] as const;

export type EvidenceType = (typeof EVIDENCE_TYPES)[number];

export interface EvidenceEnvelope {
  node_id: string;
  seq: number;
  timestamp: string;
  evidence_type: EvidenceType;
  payload: JsonValue;
  prev_hash: string;
  envelope_hash: string;
  tags: string[];
  source: string;
  version: typeof ENVELOPE_VERSION;
}

/** An envelope before its hash has been computed. */
export type UnsealedEnvelope = Omit<EvidenceEnvelope, 'envelope_hash'>;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

const HashSchema = z.string().regex(/^[0-9a-f]{64}$/, 'expected 64 lowercase hex characters');

export const EvidenceEnvelopeSchema: z.ZodType<EvidenceEnvelope> = z
  .object({
    node_id: z.string().min(1),
    seq: z.number().int().positive(),
    timestamp: z.string().min(1),
    evidence_type: z.enum(EVIDENCE_TYPES),
    payload: JsonValueSchema,
    prev_hash: HashSchema,
    envelope_hash: HashSchema,
    tags: z.array(z.string()),
    source: z.string(),
    version: z.literal(ENVELOPE_VERSION),
  })
  .strict();

export interface CreateEnvelopeInput {
  nodeId: string;
  seq: number;
  evidenceType: EvidenceType;
  payload: JsonValue;
  prevHash: string;
  tags?: string[];
  source?: string;
  /** Defaults to now (UTC) */
  timestamp?: string;
}

/** Options accepted by `EvidenceJournal.append()`. */
export interface AppendInput {
  evidenceType: EvidenceType;
  payload: JsonValue;
  tags?: string[];
  source?: string;
}

export function isEvidenceType(value: string): value is EvidenceType {
  return EVIDENCE_TYPES.some((type) => type === value);
}

export type AnchorType = 'genesis' | 'checkpoint';

export interface AnchorOptions {
  message?: string;
  source?: string;
}
