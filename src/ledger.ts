/**
 * EvidenceLedger: one ledger root wired from its configuration.
 *
 * Owns the node identity, the node's journal and sequence cache, its export
 * manager, and the import manager and federated store of the destination
 * side. Each component keeps sole ownership of its files.
 */

import { loadConfigFrom, localConfigDir, resolveLedgerPaths, resolveNodePaths } from './config.js';
import type { AnchorOptions, AppendInput, EvidenceEnvelope } from './envelope/index.js';
import { EvidenceJournal } from './journal/index.js';
import { NodeIdentityStore, SequenceManager, type NodeIdentity } from './node/index.js';
import { ExportManager, type ExportHistoryEntry } from './export/index.js';
import { FederatedStore, ImportManager, mergeTimelines } from './import/index.js';
import type { LedgerConfig, LedgerPaths, NodePaths } from './types.js';

export interface OpenLedgerOptions {
  /** Project directory holding .evidence/ (defaults to process.cwd()) */
  cwd?: string;
  /** Explicit ledger root; overrides cwd */
  root?: string;
  /** Use this configuration instead of loading it */
  config?: LedgerConfig;
  /** Clock for envelope timestamps and batch ids */
  now?: () => Date;
}

export interface LedgerStatus {
  nodeId: string;
  root: string;
  journal: {
    path: string;
    envelopeCount: number;
    lastSeq: number;
    lastHash?: string;
    lastTimestamp?: string;
  };
  export: {
    lastExportedSeq: number;
    pending: number;
    totalExports: number;
    lastBatch?: ExportHistoryEntry;
  };
  federated: {
    nodes: number;
    batches: number;
  };
}

export class EvidenceLedger {
  readonly identity: NodeIdentity;
  readonly config: LedgerConfig;
  readonly paths: LedgerPaths;
  readonly nodePaths: NodePaths;
  readonly journal: EvidenceJournal;
  readonly exports: ExportManager;
  readonly imports: ImportManager;
  readonly federated: FederatedStore;

  private constructor(
    identity: NodeIdentity,
    config: LedgerConfig,
    paths: LedgerPaths,
    now: (() => Date) | undefined,
  ) {
    this.identity = identity;
    this.config = config;
    this.paths = paths;
    this.nodePaths = resolveNodePaths(paths, identity.node_id);

    const sequence = new SequenceManager({ nodeId: identity.node_id, path: paths.sequenceFile });
    this.journal = new EvidenceJournal({
      nodeId: identity.node_id,
      path: this.nodePaths.journalFile,
      sequence,
      now,
    });
    this.exports = new ExportManager({
      nodeId: identity.node_id,
      journal: this.journal,
      stateFile: this.nodePaths.exportStateFile,
      exportsDir: paths.exportsDir,
      chunkSize: config.export.chunkSize,
      now,
    });
    this.imports = new ImportManager({
      storeDir: paths.federatedDir,
      indexFile: paths.importIndexFile,
      now,
    });
    this.federated = new FederatedStore({
      storeDir: paths.federatedDir,
      indexFile: paths.importIndexFile,
    });
  }

  /**
   * Load configuration and identity (creating the identity on first use).
   * The journal recovers lazily on the first append.
   */
  static async open(options: OpenLedgerOptions = {}): Promise<EvidenceLedger> {
    const root = options.root ?? localConfigDir(options.cwd);
    const config = options.config ?? (await loadConfigFrom(root));
    const paths = resolveLedgerPaths(root, config);
    const identity = await new NodeIdentityStore({ path: paths.identityFile }).getOrCreateIdentity();
    return new EvidenceLedger(identity, config, paths, options.now);
  }

  get nodeId(): string {
    return this.identity.node_id;
  }

  /**
   * Append to this node's journal. `source` defaults to the configured one.
   */
  append(input: AppendInput): Promise<EvidenceEnvelope> {
    return this.journal.append({ ...input, source: input.source ?? this.config.source });
  }

  /**
   * Append a chain anchor stamped with the configured source.
   */
  appendAnchor(options: AnchorOptions = {}): Promise<EvidenceEnvelope> {
    return this.journal.appendAnchor({ ...options, source: options.source ?? this.config.source });
  }

  /**
   * This node's journal and every federated node in one timeline.
   */
  async timeline(limit?: number): Promise<EvidenceEnvelope[]> {
    const nodes = await this.federated.listNodes();
    const federated = nodes
      .filter((node) => node.nodeId !== this.nodeId)
      .map((node) => this.federated.readNode(node.nodeId));
    return mergeTimelines([this.journal.readAll(), ...federated], limit);
  }

  async status(): Promise<LedgerStatus> {
    const last = await this.journal.lastEnvelope();
    const envelopeCount = await this.journal.count();
    const exportState = await this.exports.loadState();
    const nodes = await this.federated.listNodes();
    const lastSeq = last?.seq ?? 0;

    return {
      nodeId: this.nodeId,
      root: this.paths.root,
      journal: {
        path: this.nodePaths.journalFile,
        envelopeCount,
        lastSeq,
        lastHash: last?.envelope_hash,
        lastTimestamp: last?.timestamp,
      },
      export: {
        lastExportedSeq: exportState.last_exported_seq,
        pending: Math.max(0, lastSeq - exportState.last_exported_seq),
        totalExports: exportState.total_exports,
        lastBatch: exportState.history[exportState.history.length - 1],
      },
      federated: {
        nodes: nodes.length,
        batches: nodes.reduce((sum, node) => sum + node.batchCount, 0),
      },
    };
  }
}
