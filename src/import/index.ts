export {
  ImportManager,
  type ImportManagerOptions,
  type ImportOptions,
  type ImportResult,
  type ImportedBatch,
  type AlreadyImported,
  type VerifiedBatch,
} from './manager.js';

export {
  FederatedStore,
  mergeTimelines,
  type FederatedStoreOptions,
  type FederatedNodeSummary,
  type FederatedVerification,
} from './federated.js';

export {
  IMPORT_INDEX_VERSION,
  ImportIndexSchema,
  ImportIndexEntrySchema,
  loadImportIndex,
  findImport,
  type ImportIndex,
  type ImportIndexEntry,
} from './index-file.js';
