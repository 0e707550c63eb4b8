/**
 * Evidence Ledger configuration and layout types.
 */

export interface LedgerConfig {
  /** Config format version */
  version: string;
  /** Source recorded on envelopes appended from the CLI */
  source: string;
  export: ExportConfig;
  import: ImportConfig;
}

export interface ExportConfig {
  /** Envelopes per chunk file */
  chunkSize: number;
  /** Where export batches are written (relative to the ledger root) */
  outputDir: string;
}

export interface ImportConfig {
  /** Federated store for imported batches (relative to the ledger root) */
  storeDir: string;
}

/**
 * Resolved on-disk layout of one ledger root.
 */
export interface LedgerPaths {
  root: string;
  configFile: string;
  identityFile: string;
  sequenceFile: string;
  journalDir: string;
  exportsDir: string;
  federatedDir: string;
  importIndexFile: string;
}

/**
 * Files owned by one node inside the ledger root.
 */
export interface NodePaths {
  journalFile: string;
  exportStateFile: string;
}
