/**
 * Export batch manifest and naming conventions.
 */

import { z } from 'zod';

export const MANIFEST_FILENAME = 'manifest.json';
export const MANIFEST_VERSION = 'v1';

const BATCH_DIR_PREFIX = 'evidence_';
const BATCH_DIR_PATTERN = /^evidence_(.+)_(\d{8}T\d{9}Z)$/;
const BATCH_ID_PATTERN = /^\d{8}T\d{9}Z$/;

export const ChunkEntrySchema = z.object({
  filename: z.string().min(1),
  content_hash: z.string().regex(/^[0-9a-f]{64}$/, 'expected a hex SHA-256'),
  envelope_count: z.number().int().positive().optional(),
  first_seq: z.number().int().positive().optional(),
  last_seq: z.number().int().positive().optional(),
});

export type ChunkEntry = z.infer<typeof ChunkEntrySchema>;

/**
 * `node_id` and `timestamp` are optional on read: a hand-assembled batch may
 * rely on its directory name instead.
 */
export const ExportManifestSchema = z.object({
  manifest_version: z.string().default(MANIFEST_VERSION),
  node_id: z.string().min(1).optional(),
  exported_at: z.string().optional(),
  timestamp: z.string().regex(BATCH_ID_PATTERN, 'expected YYYYMMDDTHHMMSSmmmZ').optional(),
  first_seq: z.number().int().positive().optional(),
  last_seq: z.number().int().positive().optional(),
  envelope_count: z.number().int().nonnegative().optional(),
  chunks: z.array(ChunkEntrySchema).min(1),
});

export type ExportManifest = z.infer<typeof ExportManifestSchema>;

/**
 * Compact UTC batch identifier: 2026-10-19T10:15:00.123Z → 20261019T101500123Z
 */
export function formatBatchId(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

export function batchDirName(nodeId: string, batchId: string): string {
  return `${BATCH_DIR_PREFIX}${nodeId}_${batchId}`;
}

export function parseBatchDirName(name: string): { nodeId: string; batchId: string } | undefined {
  const match = BATCH_DIR_PATTERN.exec(name);
  if (!match) {
    return undefined;
  }
  const [, nodeId, batchId] = match;
  if (!nodeId || !batchId) {
    return undefined;
  }
  return { nodeId, batchId };
}

export function chunkFilename(index: number): string {
  return `chunk_${String(index + 1).padStart(4, '0')}.jsonl`;
}

/**
 * A chunk name must stay inside its batch directory.
 */
export function isSafeChunkName(name: string): boolean {
  return /^[A-Za-z0-9][A-Za-z0-9._-]*$/.test(name) && !name.includes('..') && name !== MANIFEST_FILENAME;
}
