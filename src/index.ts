/**
 * Evidence Ledger
 *
 * Public API for programmatic usage.
 */

// Configuration and layout types
export type {
  LedgerConfig,
  ExportConfig,
  ImportConfig,
  LedgerPaths,
  NodePaths,
} from './types.js';

// Configuration
export {
  LEDGER_DIR,
  CONFIG_FILE,
  DEFAULT_CHUNK_SIZE,
  LedgerConfigSchema,
  defaultConfig,
  loadConfig,
  loadConfigFrom,
  saveConfig,
  initializeProject,
  isInitialized,
  localConfigDir,
  resolveLedgerPaths,
  resolveNodePaths,
} from './config.js';

// Errors
export {
  LedgerErrorCode,
  LedgerError,
  CorruptIdentityError,
  WriteFailureError,
  ChainError,
  IntegrityFailureError,
  CorruptStateError,
  type ChainErrorKind,
  type ChainErrorPosition,
} from './errors.js';

// Envelope schema and canonical hashing
export * from './envelope/index.js';

// Node identity and sequence
export * from './node/index.js';

// Journal and chain verification
export * from './journal/index.js';

// Export batches
export * from './export/index.js';

// Import and federated store
export * from './import/index.js';

// Facade
export { EvidenceLedger, type OpenLedgerOptions, type LedgerStatus } from './ledger.js';
