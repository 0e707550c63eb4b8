/**
 * Canonical JSON for envelope hashing.
 *
 * Rules (pinned at envelope v1):
 * - Object keys sorted lexicographically by UTF-16 code unit (RFC 8785 ordering)
 * - No whitespace between tokens
 * - Numbers in ECMAScript shortest round-trip form; non-finite numbers rejected
 * - Strings escaped as JSON.stringify escapes them
 *
 * The envelope itself is the one exception to key sorting: its top-level
 * fields are written in the fixed order of ENVELOPE_FIELD_ORDER.
 */

import { createHash } from 'node:crypto';
import type { EvidenceEnvelope, JsonValue, UnsealedEnvelope } from './types.js';

/** Field order of a serialized envelope line. */
export const ENVELOPE_FIELD_ORDER = [
  'node_id',
  'seq',
  'timestamp',
  'evidence_type',
  'payload',
  'prev_hash',
  'envelope_hash',
  'tags',
  'source',
  'version',
] as const;

/** Field order of the canonical bytes that are hashed (no envelope_hash). */
export const HASHED_FIELD_ORDER = ENVELOPE_FIELD_ORDER.filter(
  (field): field is Exclude<(typeof ENVELOPE_FIELD_ORDER)[number], 'envelope_hash'> =>
    field !== 'envelope_hash',
);

export function canonicalJson(value: JsonValue): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return serializeNumber(value);
    case 'string':
      return JSON.stringify(value);
    default:
      break;
  }

  if (Array.isArray(value)) {
    return '[' + value.map((item) => canonicalJson(item)).join(',') + ']';
  }

  const keys = Object.keys(value).sort();
  const pairs: string[] = [];
  for (const key of keys) {
    const child = value[key];
    // Absent at runtime despite the type (e.g. an optional property set to undefined)
    if (child === undefined) {
      continue;
    }
    pairs.push(JSON.stringify(key) + ':' + canonicalJson(child));
  }
  return '{' + pairs.join(',') + '}';
}

function serializeNumber(num: number): string {
  if (!Number.isFinite(num)) {
    throw new TypeError(`Cannot canonicalize non-finite number: ${num}`);
  }
  // -0 serializes as 0, matching JSON.stringify
  return JSON.stringify(num);
}

function orderedObject(entries: Array<[string, JsonValue]>): string {
  return '{' + entries.map(([key, value]) => JSON.stringify(key) + ':' + canonicalJson(value)).join(',') + '}';
}

/**
 * The exact string whose SHA-256 is an envelope's `envelope_hash`.
 */
export function canonicalEnvelopeString(envelope: UnsealedEnvelope): string {
  return orderedObject(HASHED_FIELD_ORDER.map((field) => [field, envelope[field]]));
}

export function canonicalEnvelopeBytes(envelope: UnsealedEnvelope): Buffer {
  return Buffer.from(canonicalEnvelopeString(envelope), 'utf-8');
}

/** Lowercase hex SHA-256. */
export function sha256Hex(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

export function computeEnvelopeHash(envelope: UnsealedEnvelope): string {
  return sha256Hex(canonicalEnvelopeBytes(envelope));
}

/**
 * Serialize an envelope to its single journal line (without the newline).
 */
export function serializeEnvelope(envelope: EvidenceEnvelope): string {
  return orderedObject(ENVELOPE_FIELD_ORDER.map((field) => [field, envelope[field]]));
}
