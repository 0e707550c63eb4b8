/**
 * Import Manager
 *
 * Merges an export batch produced on another node into this destination's
 * federated store. A batch moves unseen → verified → merged:
 *
 * - verified: every chunk listed by the manifest exists, hashes to the
 *   recorded content_hash and holds a contiguous chain of the source node
 * - merged: chunks copied under <store>/<source>/<batch>/ and the pair
 *   recorded in the import index, which is always the last write
 *
 * Anything that fails before the index write leaves the batch unseen, so
 * re-running the import is safe. A copy being replaced is moved aside, not
 * deleted, until the index write has landed.
 */

import { copyFile, mkdir, readFile, readdir, rename, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { basename, join, resolve } from 'node:path';
import { randomBytes } from 'node:crypto';
import { IntegrityFailureError, WriteFailureError, describeError } from '../errors.js';
import { safeParseEnvelope } from '../envelope/index.js';
import { ChainVerifier } from '../journal/verify.js';
import { NODE_ID_PATTERN } from '../node/identity.js';
import { isNotFound, readJsonlLines, sha256File, syncFile, writeFileExclusive } from '../storage/durable.js';
import {
  MANIFEST_FILENAME,
  ExportManifestSchema,
  isSafeChunkName,
  parseBatchDirName,
  type ExportManifest,
} from '../export/manifest.js';
import { findImport, loadImportIndex, saveImportIndex, type ImportIndex } from './index-file.js';

export interface ImportManagerOptions {
  /** Root of the federated store */
  storeDir: string;
  /** Path of the import index */
  indexFile: string;
  now?: () => Date;
}

export interface ImportOptions {
  /** Re-import a batch the index already lists, replacing the stored copy */
  force?: boolean;
}

export interface ImportedBatch {
  status: 'imported';
  sourceNodeId: string;
  batchId: string;
  /** Where the verified chunks now live */
  destination: string;
  chunkCount: number;
  envelopeCount: number;
  firstSeq: number;
  lastSeq: number;
  /** True when an earlier stored copy was replaced */
  replaced: boolean;
}

export interface AlreadyImported {
  status: 'already_imported';
  sourceNodeId: string;
  batchId: string;
  destination: string;
  importedAt: string;
}

export type ImportResult = ImportedBatch | AlreadyImported;

export interface VerifiedBatch {
  batchDir: string;
  manifest: ExportManifest;
  /** The manifest exactly as it was read and verified */
  manifestText: string;
  sourceNodeId: string;
  batchId: string;
  envelopeCount: number;
  firstSeq: number;
  lastSeq: number;
}

export class ImportManager {
  private readonly storeDir: string;
  private readonly indexFile: string;
  private readonly now: () => Date;

  constructor(options: ImportManagerOptions) {
    this.storeDir = options.storeDir;
    this.indexFile = options.indexFile;
    this.now = options.now ?? (() => new Date());
  }

  async loadIndex(): Promise<ImportIndex> {
    return loadImportIndex(this.indexFile);
  }

  async importBatch(exportDir: string, options: ImportOptions = {}): Promise<ImportResult> {
    const verified = await this.verifyBatch(exportDir);
    const { sourceNodeId, batchId } = verified;

    const index = await loadImportIndex(this.indexFile);
    const existing = findImport(index, sourceNodeId, batchId);
    // An entry whose batch directory has no manifest was cut short; import it again
    if (existing && !options.force && existsSync(join(this.storeDir, existing.path, MANIFEST_FILENAME))) {
      return {
        status: 'already_imported',
        sourceNodeId,
        batchId,
        destination: join(this.storeDir, existing.path),
        importedAt: existing.imported_at,
      };
    }

    const relativePath = join(sourceNodeId, batchId);
    const destination = join(this.storeDir, relativePath);
    const setAside = await this.merge(verified, destination);

    // Until this write lands the batch counts as not imported
    await saveImportIndex(this.indexFile, {
      ...index,
      entries: [
        ...index.entries.filter((entry) => entry !== existing),
        {
          source_node_id: sourceNodeId,
          batch_id: batchId,
          imported_at: this.now().toISOString(),
          envelope_count: verified.envelopeCount,
          first_seq: verified.firstSeq,
          last_seq: verified.lastSeq,
          path: relativePath,
        },
      ],
    });
    if (setAside) {
      await rm(setAside, { recursive: true, force: true });
    }

    return {
      status: 'imported',
      sourceNodeId,
      batchId,
      destination,
      chunkCount: verified.manifest.chunks.length,
      envelopeCount: verified.envelopeCount,
      firstSeq: verified.firstSeq,
      lastSeq: verified.lastSeq,
      replaced: setAside !== undefined,
    };
  }

  /**
   * Check a batch without importing it. Throws IntegrityFailureError on the
   * first problem found.
   */
  async verifyBatch(exportDir: string): Promise<VerifiedBatch> {
    const batchDir = resolve(exportDir);
    const { manifest, manifestText } = await this.readManifest(batchDir);

    const naming = parseBatchDirName(basename(batchDir));
    const sourceNodeId = manifest.node_id ?? naming?.nodeId;
    const batchId = manifest.timestamp ?? naming?.batchId;
    if (!sourceNodeId) {
      throw new IntegrityFailureError(batchDir, 'source node id is missing from the manifest and the directory name');
    }
    if (!NODE_ID_PATTERN.test(sourceNodeId)) {
      throw new IntegrityFailureError(batchDir, `source node id "${sourceNodeId}" is not a valid node id`);
    }
    if (!batchId) {
      throw new IntegrityFailureError(batchDir, 'batch timestamp is missing from the manifest and the directory name');
    }

    const seen = new Set<string>();
    let verifier: ChainVerifier | undefined;

    for (const chunk of manifest.chunks) {
      const fail = (message: string, cause?: unknown): IntegrityFailureError =>
        new IntegrityFailureError(batchDir, message, { chunk: chunk.filename, cause });

      if (!isSafeChunkName(chunk.filename)) {
        throw fail('chunk file name is not allowed');
      }
      if (seen.has(chunk.filename)) {
        throw fail('chunk is listed twice in the manifest');
      }
      seen.add(chunk.filename);

      const chunkPath = join(batchDir, chunk.filename);
      let actualHash: string;
      try {
        actualHash = await sha256File(chunkPath);
      } catch (err) {
        throw fail(isNotFound(err) ? 'chunk file is missing' : `chunk file is unreadable (${describeError(err)})`, err);
      }
      if (actualHash !== chunk.content_hash) {
        throw fail(`content hash mismatch: manifest ${chunk.content_hash}, actual ${actualHash}`);
      }

      let chunkCount = 0;
      for await (const line of readJsonlLines(chunkPath)) {
        const parsed = safeParseEnvelope(line.text);
        if (!parsed.success) {
          throw fail(`line ${line.lineNumber}: ${parsed.reason}`);
        }
        verifier ??= new ChainVerifier({
          nodeId: sourceNodeId,
          startSeq: manifest.first_seq ?? parsed.envelope.seq,
        });
        const error = verifier.checkEnvelope(parsed.envelope, line.lineNumber);
        if (error) {
          throw fail(error.message, error);
        }
        chunkCount += 1;
      }

      if (chunkCount === 0) {
        throw fail('chunk holds no envelopes');
      }
      if (chunk.envelope_count !== undefined && chunk.envelope_count !== chunkCount) {
        throw fail(`manifest lists ${chunk.envelope_count} envelopes, chunk holds ${chunkCount}`);
      }
    }

    const envelopeCount = verifier?.envelopeCount ?? 0;
    const lastSeq = verifier?.lastSeq ?? 0;
    const firstSeq = lastSeq - envelopeCount + 1;
    if (manifest.envelope_count !== undefined && manifest.envelope_count !== envelopeCount) {
      throw new IntegrityFailureError(
        batchDir,
        `manifest lists ${manifest.envelope_count} envelopes, chunks hold ${envelopeCount}`,
      );
    }
    if (manifest.last_seq !== undefined && manifest.last_seq !== lastSeq) {
      throw new IntegrityFailureError(batchDir, `manifest ends at seq ${manifest.last_seq}, chunks end at ${lastSeq}`);
    }

    return { batchDir, manifest, manifestText, sourceNodeId, batchId, envelopeCount, firstSeq, lastSeq };
  }

  private async readManifest(batchDir: string): Promise<{ manifest: ExportManifest; manifestText: string }> {
    const manifestPath = join(batchDir, MANIFEST_FILENAME);
    let raw: string;
    try {
      raw = await readFile(manifestPath, 'utf-8');
    } catch (err) {
      throw new IntegrityFailureError(
        batchDir,
        isNotFound(err) ? 'manifest.json is missing' : `manifest.json is unreadable (${describeError(err)})`,
        { cause: err },
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new IntegrityFailureError(batchDir, `manifest.json is not valid JSON (${describeError(err)})`, { cause: err });
    }

    const result = ExportManifestSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new IntegrityFailureError(batchDir, `manifest.json is invalid (${path}${issue?.message ?? 'unknown issue'})`);
    }
    return { manifest: result.data, manifestText: raw };
  }

  /**
   * Copy the verified chunks into a staging directory, then rename it into
   * place. An existing copy at the destination is renamed aside; its path is
   * returned so the caller can delete it once the index no longer points at it.
   */
  private async merge(batch: VerifiedBatch, destination: string): Promise<string | undefined> {
    const nodeDir = join(this.storeDir, batch.sourceNodeId);
    const suffix = `${batch.batchId}-${randomBytes(4).toString('hex')}`;
    const staging = join(nodeDir, `.staging-${suffix}`);

    try {
      await this.removeLeftovers(nodeDir, batch.batchId);
      await mkdir(staging, { recursive: true });
      for (const chunk of batch.manifest.chunks) {
        const target = join(staging, chunk.filename);
        await copyFile(join(batch.batchDir, chunk.filename), target);
        await syncFile(target);
        const copiedHash = await sha256File(target);
        if (copiedHash !== chunk.content_hash) {
          throw new IntegrityFailureError(
            batch.batchDir,
            `chunk changed after verification: manifest ${chunk.content_hash}, copied ${copiedHash}`,
            { chunk: chunk.filename },
          );
        }
      }
      await writeFileExclusive(join(staging, MANIFEST_FILENAME), batch.manifestText);
    } catch (err) {
      await rm(staging, { recursive: true, force: true });
      if (err instanceof IntegrityFailureError) {
        throw err;
      }
      throw new WriteFailureError(
        batch.sourceNodeId,
        `Failed to stage batch ${batch.batchId} for ${destination}: ${describeError(err)}`,
        { cause: err },
      );
    }

    const setAside = existsSync(destination) ? join(nodeDir, `.replaced-${suffix}`) : undefined;
    try {
      if (setAside) {
        await rename(destination, setAside);
      }
      await rename(staging, destination);
    } catch (err) {
      await rm(staging, { recursive: true, force: true });
      if (setAside && existsSync(setAside) && !existsSync(destination)) {
        await rename(setAside, destination);
      }
      throw new WriteFailureError(
        batch.sourceNodeId,
        `Failed to move batch ${batch.batchId} into ${destination}: ${describeError(err)}`,
        { cause: err },
      );
    }
    return setAside;
  }

  /**
   * Remove staging and set-aside directories an interrupted import of this
   * batch left behind.
   */
  private async removeLeftovers(nodeDir: string, batchId: string): Promise<void> {
    let names: string[];
    try {
      names = await readdir(nodeDir);
    } catch (err) {
      if (isNotFound(err)) {
        return;
      }
      throw err;
    }
    for (const name of names) {
      if (name.startsWith(`.staging-${batchId}-`) || name.startsWith(`.replaced-${batchId}-`)) {
        await rm(join(nodeDir, name), { recursive: true, force: true });
      }
    }
  }
}
