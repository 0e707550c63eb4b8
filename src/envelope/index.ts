export {
  ENVELOPE_VERSION,
  GENESIS_HASH,
  EVIDENCE_TYPES,
  EvidenceEnvelopeSchema,
  JsonValueSchema,
  isEvidenceType,
  type JsonValue,
  type EvidenceType,
  type EvidenceEnvelope,
  type UnsealedEnvelope,
  type CreateEnvelopeInput,
  type AppendInput,
  type AnchorType,
  type AnchorOptions,
} from './types.js';

export {
  ENVELOPE_FIELD_ORDER,
  HASHED_FIELD_ORDER,
  canonicalJson,
  canonicalEnvelopeString,
  canonicalEnvelopeBytes,
  computeEnvelopeHash,
  serializeEnvelope,
  sha256Hex,
} from './canonical.js';

export {
  createEnvelope,
  anchorInput,
  ANCHOR_TAGS,
  verifyEnvelopeHash,
  stripHash,
  safeParseEnvelope,
  type EnvelopeParseResult,
} from './envelope.js';
