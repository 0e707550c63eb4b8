/**
 * Export Manager
 *
 * Cuts the envelopes a node has not exported yet into a self-contained batch
 * directory. Write order is fixed: chunk files (fsync'ed), then the manifest
 * that references them, then the high-water mark. A batch the mark does not
 * cover is never considered exported.
 */

import { mkdir, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { CorruptStateError, WriteFailureError, describeError } from '../errors.js';
import { GENESIS_HASH, sha256Hex } from '../envelope/index.js';
import type { EvidenceJournal, JournalRecord } from '../journal/journal.js';
import { ChainVerifier } from '../journal/verify.js';
import {
  isAlreadyExists,
  readJsonState,
  writeFileAtomic,
  writeFileExclusive,
  writeJsonAtomic,
} from '../storage/durable.js';
import {
  MANIFEST_FILENAME,
  MANIFEST_VERSION,
  batchDirName,
  chunkFilename,
  formatBatchId,
  type ChunkEntry,
  type ExportManifest,
} from './manifest.js';

/** Export history entries kept in the state file */
const HISTORY_LIMIT = 50;

export const ExportHistoryEntrySchema = z.object({
  batch_id: z.string(),
  directory: z.string(),
  first_seq: z.number().int().positive(),
  last_seq: z.number().int().positive(),
  exported_at: z.string(),
});

export const ExportStateSchema = z.object({
  node_id: z.string(),
  last_exported_seq: z.number().int().nonnegative(),
  last_exported_hash: z.string().optional(),
  updated_at: z.string().optional(),
  total_exports: z.number().int().nonnegative().default(0),
  history: z.array(ExportHistoryEntrySchema).default([]),
});

export type ExportState = z.infer<typeof ExportStateSchema>;
export type ExportHistoryEntry = z.infer<typeof ExportHistoryEntrySchema>;

export interface ExportManagerOptions {
  nodeId: string;
  journal: EvidenceJournal;
  /** Path of the node's high-water-mark file */
  stateFile: string;
  /** Directory that receives batch directories */
  exportsDir: string;
  /** Envelopes per chunk file */
  chunkSize?: number;
  now?: () => Date;
}

export interface ExportOptions {
  /** Export at most this many envelopes */
  limit?: number;
}

export interface ExportBatch {
  batchId: string;
  nodeId: string;
  directory: string;
  manifest: ExportManifest;
  envelopeCount: number;
  firstSeq: number;
  lastSeq: number;
}

export interface ExportPreview {
  nodeId: string;
  /** Current high-water mark */
  lastExportedSeq: number;
  envelopeCount: number;
  firstSeq?: number;
  lastSeq?: number;
}

export class ExportManager {
  private readonly nodeId: string;
  private readonly journal: EvidenceJournal;
  private readonly stateFile: string;
  private readonly exportsDir: string;
  private readonly chunkSize: number;
  private readonly now: () => Date;

  constructor(options: ExportManagerOptions) {
    if (options.chunkSize !== undefined && (!Number.isInteger(options.chunkSize) || options.chunkSize < 1)) {
      throw new RangeError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }
    this.nodeId = options.nodeId;
    this.journal = options.journal;
    this.stateFile = options.stateFile;
    this.exportsDir = options.exportsDir;
    this.chunkSize = options.chunkSize ?? 500;
    this.now = options.now ?? (() => new Date());
  }

  async loadState(): Promise<ExportState> {
    const state = await readJsonState(this.stateFile, ExportStateSchema);
    if (!state) {
      return { node_id: this.nodeId, last_exported_seq: 0, total_exports: 0, history: [] };
    }
    if (state.node_id !== this.nodeId) {
      throw new CorruptStateError(
        this.stateFile,
        `belongs to node ${state.node_id}, expected ${this.nodeId}`,
      );
    }
    return state;
  }

  /**
   * What `exportNew()` would export right now. Writes nothing.
   */
  async previewNew(options: ExportOptions = {}): Promise<ExportPreview> {
    const state = await this.loadState();
    const records = await this.pendingRecords(state, options.limit);
    return {
      nodeId: this.nodeId,
      lastExportedSeq: state.last_exported_seq,
      envelopeCount: records.length,
      firstSeq: records[0]?.envelope.seq,
      lastSeq: records[records.length - 1]?.envelope.seq,
    };
  }

  /**
   * Export every envelope past the high-water mark. Returns undefined, and
   * touches nothing on disk, when there is nothing new.
   */
  async exportNew(options: ExportOptions = {}): Promise<ExportBatch | undefined> {
    const state = await this.loadState();
    const records = await this.pendingRecords(state, options.limit);
    const first = records[0];
    const last = records[records.length - 1];
    if (!first || !last) {
      return undefined;
    }

    const exportedAt = this.now();
    const batchId = formatBatchId(exportedAt);
    const directory = join(this.exportsDir, batchDirName(this.nodeId, batchId));

    await mkdir(this.exportsDir, { recursive: true });
    try {
      await mkdir(directory);
    } catch (err) {
      throw new WriteFailureError(
        this.nodeId,
        isAlreadyExists(err)
          ? `Export batch directory ${directory} already exists`
          : `Cannot create export batch directory ${directory}: ${describeError(err)}`,
        { cause: err },
      );
    }

    let manifest: ExportManifest;
    try {
      const chunks = await this.writeChunks(directory, records);
      manifest = {
        manifest_version: MANIFEST_VERSION,
        node_id: this.nodeId,
        exported_at: exportedAt.toISOString(),
        timestamp: batchId,
        first_seq: first.envelope.seq,
        last_seq: last.envelope.seq,
        envelope_count: records.length,
        chunks,
      };
      // The manifest only ever references chunks that are already durable
      await writeFileAtomic(join(directory, MANIFEST_FILENAME), `${JSON.stringify(manifest, null, 2)}\n`);

      await this.saveState({
        ...state,
        last_exported_seq: last.envelope.seq,
        last_exported_hash: last.envelope.envelope_hash,
        updated_at: exportedAt.toISOString(),
        total_exports: state.total_exports + 1,
        history: [
          ...state.history,
          {
            batch_id: batchId,
            directory,
            first_seq: first.envelope.seq,
            last_seq: last.envelope.seq,
            exported_at: exportedAt.toISOString(),
          },
        ].slice(-HISTORY_LIMIT),
      });
    } catch (err) {
      // Not covered by the high-water mark, so not exported: discard it
      await rm(directory, { recursive: true, force: true });
      throw new WriteFailureError(
        this.nodeId,
        `Export batch ${batchId} failed: ${describeError(err)}`,
        { cause: err },
      );
    }

    return {
      batchId,
      nodeId: this.nodeId,
      directory,
      manifest,
      envelopeCount: records.length,
      firstSeq: first.envelope.seq,
      lastSeq: last.envelope.seq,
    };
  }

  /**
   * Records past the mark, checked to continue the chain the mark ends.
   */
  private async pendingRecords(state: ExportState, limit?: number): Promise<JournalRecord[]> {
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }

    const verifier = new ChainVerifier({
      nodeId: this.nodeId,
      startSeq: state.last_exported_seq + 1,
      startPrevHash: state.last_exported_seq === 0 ? GENESIS_HASH : state.last_exported_hash,
    });

    const records: JournalRecord[] = [];
    for await (const record of this.journal.readSince(state.last_exported_seq, limit)) {
      const error = verifier.checkEnvelope(record.envelope, record.lineNumber);
      if (error) {
        throw error;
      }
      records.push(record);
    }
    return records;
  }

  private async writeChunks(directory: string, records: JournalRecord[]): Promise<ChunkEntry[]> {
    const chunks: ChunkEntry[] = [];
    for (let start = 0; start < records.length; start += this.chunkSize) {
      const slice = records.slice(start, start + this.chunkSize);
      const firstRecord = slice[0];
      const lastRecord = slice[slice.length - 1];
      if (!firstRecord || !lastRecord) {
        break;
      }

      const filename = chunkFilename(chunks.length);
      const content = `${slice.map((record) => record.line).join('\n')}\n`;
      await writeFileExclusive(join(directory, filename), content);
      chunks.push({
        filename,
        content_hash: sha256Hex(content),
        envelope_count: slice.length,
        first_seq: firstRecord.envelope.seq,
        last_seq: lastRecord.envelope.seq,
      });
    }
    return chunks;
  }

  private async saveState(state: ExportState): Promise<void> {
    await mkdir(dirname(this.stateFile), { recursive: true });
    await writeJsonAtomic(this.stateFile, state);
  }
}
