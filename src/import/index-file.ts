/**
 * Import index: which (source node, batch) pairs a destination has merged.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { readJsonState, writeJsonAtomic } from '../storage/durable.js';

export const IMPORT_INDEX_VERSION = 1;

export const ImportIndexEntrySchema = z.object({
  source_node_id: z.string(),
  batch_id: z.string(),
  imported_at: z.string(),
  envelope_count: z.number().int().nonnegative(),
  first_seq: z.number().int().positive(),
  last_seq: z.number().int().positive(),
  /** Batch location relative to the federated store */
  path: z.string(),
});

export const ImportIndexSchema = z.object({
  version: z.number().int().default(IMPORT_INDEX_VERSION),
  entries: z.array(ImportIndexEntrySchema).default([]),
});

export type ImportIndexEntry = z.infer<typeof ImportIndexEntrySchema>;
export type ImportIndex = z.infer<typeof ImportIndexSchema>;

export async function loadImportIndex(indexFile: string): Promise<ImportIndex> {
  const index = await readJsonState(indexFile, ImportIndexSchema);
  return index ?? { version: IMPORT_INDEX_VERSION, entries: [] };
}

export async function saveImportIndex(indexFile: string, index: ImportIndex): Promise<void> {
  await mkdir(dirname(indexFile), { recursive: true });
  await writeJsonAtomic(indexFile, index);
}

export function findImport(
  index: ImportIndex,
  sourceNodeId: string,
  batchId: string,
): ImportIndexEntry | undefined {
  return index.entries.find(
    (entry) => entry.source_node_id === sourceNodeId && entry.batch_id === batchId,
  );
}
