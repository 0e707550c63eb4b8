/**
 * Federated store: read-side view of the batches imports have merged.
 *
 * Batches of one source node are ordered by first seq. Re-exports can make
 * two batches overlap; an overlapping envelope must be identical to the one
 * already seen, otherwise the node's history has forked.
 */

import { join } from 'node:path';
import { ChainError } from '../errors.js';
import { safeParseEnvelope, type EvidenceEnvelope } from '../envelope/index.js';
import { ChainVerifier, type ChainVerification } from '../journal/verify.js';
import { MANIFEST_FILENAME, ExportManifestSchema } from '../export/manifest.js';
import { readJsonState, readJsonlLines } from '../storage/durable.js';
import { loadImportIndex, type ImportIndexEntry } from './index-file.js';

export interface FederatedStoreOptions {
  storeDir: string;
  indexFile: string;
}

export interface FederatedNodeSummary {
  nodeId: string;
  batchCount: number;
  /** Envelopes across batches, overlaps counted once per batch */
  envelopeCount: number;
  firstSeq: number;
  lastSeq: number;
  lastImportedAt: string;
}

export interface FederatedVerification extends ChainVerification {
  nodeId: string;
  batchCount: number;
}

export class FederatedStore {
  private readonly storeDir: string;
  private readonly indexFile: string;

  constructor(options: FederatedStoreOptions) {
    this.storeDir = options.storeDir;
    this.indexFile = options.indexFile;
  }

  async listNodes(): Promise<FederatedNodeSummary[]> {
    const index = await loadImportIndex(this.indexFile);
    const nodes = new Map<string, FederatedNodeSummary>();

    for (const entry of index.entries) {
      const summary = nodes.get(entry.source_node_id);
      if (!summary) {
        nodes.set(entry.source_node_id, {
          nodeId: entry.source_node_id,
          batchCount: 1,
          envelopeCount: entry.envelope_count,
          firstSeq: entry.first_seq,
          lastSeq: entry.last_seq,
          lastImportedAt: entry.imported_at,
        });
        continue;
      }
      summary.batchCount += 1;
      summary.envelopeCount += entry.envelope_count;
      summary.firstSeq = Math.min(summary.firstSeq, entry.first_seq);
      summary.lastSeq = Math.max(summary.lastSeq, entry.last_seq);
      if (entry.imported_at > summary.lastImportedAt) {
        summary.lastImportedAt = entry.imported_at;
      }
    }

    return [...nodes.values()].sort((a, b) => a.nodeId.localeCompare(b.nodeId));
  }

  async listBatches(nodeId: string): Promise<ImportIndexEntry[]> {
    const index = await loadImportIndex(this.indexFile);
    return index.entries
      .filter((entry) => entry.source_node_id === nodeId)
      .sort((a, b) => a.first_seq - b.first_seq || a.batch_id.localeCompare(b.batch_id));
  }

  /**
   * Stream a node's envelopes in seq order across its batches, each seq
   * once. Throws ChainError on a malformed line or a conflicting overlap.
   */
  async *readNode(nodeId: string): AsyncGenerator<EvidenceEnvelope> {
    const seen = new Map<number, string>();
    let lastSeq = 0;

    for (const batch of await this.listBatches(nodeId)) {
      const batchDir = join(this.storeDir, batch.path);
      const manifest = await readJsonState(join(batchDir, MANIFEST_FILENAME), ExportManifestSchema);
      if (!manifest) {
        throw new ChainError('malformed', { line: 0, nodeId }, `batch ${batch.batch_id} has no manifest in ${batchDir}`);
      }

      for (const chunk of manifest.chunks) {
        for await (const line of readJsonlLines(join(batchDir, chunk.filename))) {
          const parsed = safeParseEnvelope(line.text);
          if (!parsed.success) {
            throw new ChainError(
              'malformed',
              { line: line.lineNumber, nodeId },
              `${batch.batch_id}/${chunk.filename}: ${parsed.reason}`,
            );
          }

          const envelope = parsed.envelope;
          if (envelope.seq <= lastSeq) {
            const known = seen.get(envelope.seq);
            if (known !== undefined && known !== envelope.envelope_hash) {
              throw new ChainError(
                'duplicate_seq',
                { line: line.lineNumber, seq: envelope.seq, nodeId },
                `${batch.batch_id}/${chunk.filename} holds a different envelope for seq ${envelope.seq}`,
              );
            }
            continue;
          }

          seen.set(envelope.seq, envelope.envelope_hash);
          lastSeq = envelope.seq;
          yield envelope;
        }
      }
    }
  }

  /**
   * Envelopes of a node with seq > afterSeq, at most `limit` of them.
   */
  async *readNodeSince(nodeId: string, afterSeq: number, limit?: number): AsyncGenerator<EvidenceEnvelope> {
    let yielded = 0;
    for await (const envelope of this.readNode(nodeId)) {
      if (limit !== undefined && yielded >= limit) {
        return;
      }
      if (envelope.seq > afterSeq) {
        yielded += 1;
        yield envelope;
      }
    }
  }

  /**
   * Every federated node's envelopes in one timeline.
   */
  async readMerged(limit?: number): Promise<EvidenceEnvelope[]> {
    const nodes = await this.listNodes();
    return mergeTimelines(
      nodes.map((node) => this.readNode(node.nodeId)),
      limit,
    );
  }

  /**
   * Verify a node's chain across every merged batch. Starts from genesis
   * when the earliest batch begins at seq 1.
   */
  async verifyNode(nodeId: string): Promise<FederatedVerification> {
    const batches = await this.listBatches(nodeId);
    const verifier = new ChainVerifier({ nodeId, startSeq: batches[0]?.first_seq ?? 1 });
    const report = (error?: ChainError): FederatedVerification => ({
      ...verifier.result(error),
      nodeId,
      batchCount: batches.length,
    });

    let position = 0;
    try {
      for await (const envelope of this.readNode(nodeId)) {
        position += 1;
        const error = verifier.checkEnvelope(envelope, position);
        if (error) {
          return report(error);
        }
      }
    } catch (err) {
      if (err instanceof ChainError) {
        return report(err);
      }
      throw err;
    }
    return report();
  }
}

/**
 * Merge envelope streams of several nodes ordered by timestamp, then node id
 * and seq. Keeps the first `limit` envelopes of the merged order.
 */
export async function mergeTimelines(
  sources: AsyncIterable<EvidenceEnvelope>[],
  limit?: number,
): Promise<EvidenceEnvelope[]> {
  const merged: EvidenceEnvelope[] = [];
  for (const source of sources) {
    for await (const envelope of source) {
      merged.push(envelope);
    }
  }
  merged.sort(
    (a, b) =>
      compareText(a.timestamp, b.timestamp) || compareText(a.node_id, b.node_id) || a.seq - b.seq,
  );
  return limit === undefined ? merged : merged.slice(0, limit);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
