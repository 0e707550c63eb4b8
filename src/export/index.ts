export {
  ExportManager,
  ExportStateSchema,
  ExportHistoryEntrySchema,
  type ExportState,
  type ExportHistoryEntry,
  type ExportManagerOptions,
  type ExportOptions,
  type ExportBatch,
  type ExportPreview,
} from './manager.js';

export {
  MANIFEST_FILENAME,
  MANIFEST_VERSION,
  ExportManifestSchema,
  ChunkEntrySchema,
  formatBatchId,
  batchDirName,
  parseBatchDirName,
  chunkFilename,
  isSafeChunkName,
  type ExportManifest,
  type ChunkEntry,
} from './manifest.js';
