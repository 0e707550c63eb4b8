import { cp, mkdtemp, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { IntegrityFailureError, WriteFailureError } from '../../errors.js';
import { GENESIS_HASH, createEnvelope, sha256Hex, type EvidenceEnvelope } from '../../envelope/index.js';
import { ExportManager, type ExportBatch } from '../../export/index.js';
import { EvidenceJournal, collect } from '../../journal/index.js';
import { SequenceManager } from '../../node/sequence.js';
import { sha256File } from '../../storage/durable.js';
import { FederatedStore, mergeTimelines } from '../federated.js';
import { ImportManager } from '../manager.js';

const SOURCE = 'node_a0a0a0a0a0a0';
const OTHER = 'node_b1b1b1b1b1b1';

function tickingClock(start: string): () => Date {
  let tick = 0;
  const base = Date.parse(start);
  return () => new Date(base + 1000 * tick++);
}

describe('ImportManager', () => {
  let sourceDir: string;
  let destDir: string;
  let storeDir: string;
  let indexFile: string;
  let journal: EvidenceJournal;
  let exporter: ExportManager;
  let importer: ImportManager;
  let federated: FederatedStore;

  beforeEach(async () => {
    sourceDir = await mkdtemp(join(tmpdir(), 'evidence-import-src-'));
    destDir = await mkdtemp(join(tmpdir(), 'evidence-import-dest-'));
    storeDir = join(destDir, 'federated');
    indexFile = join(storeDir, 'import_index.json');

    journal = new EvidenceJournal({
      nodeId: SOURCE,
      path: join(sourceDir, 'journal', SOURCE, 'evidence.jsonl'),
      sequence: new SequenceManager({ nodeId: SOURCE, path: join(sourceDir, 'node', 'sequence.json') }),
    });
    exporter = new ExportManager({
      nodeId: SOURCE,
      journal,
      stateFile: join(sourceDir, 'journal', SOURCE, 'export_state.json'),
      exportsDir: join(sourceDir, 'exports'),
      now: tickingClock('2026-04-01T08:00:00.000Z'),
    });
    importer = new ImportManager({ storeDir, indexFile, now: tickingClock('2026-04-02T09:00:00.000Z') });
    federated = new FederatedStore({ storeDir, indexFile });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(sourceDir, { recursive: true, force: true });
    await rm(destDir, { recursive: true, force: true });
  });

  /**
   * Run `afterVerify` between verification and the copy into the store.
   */
  function interruptAfterVerify(afterVerify: () => Promise<void>): void {
    const verify = importer.verifyBatch.bind(importer);
    vi.spyOn(importer, 'verifyBatch').mockImplementation(async (dir: string) => {
      const verified = await verify(dir);
      await afterVerify();
      return verified;
    });
  }

  async function appendAndExport(count: number): Promise<ExportBatch> {
    for (let i = 0; i < count; i++) {
      await journal.append({ evidenceType: 'audit_log', payload: { entry: i }, source: 'auditor' });
    }
    const batch = await exporter.exportNew();
    if (!batch) {
      throw new Error('expected an export batch');
    }
    return batch;
  }

  async function rewriteManifest(batchDir: string, edit: (manifest: Record<string, unknown>) => void): Promise<void> {
    const path = join(batchDir, 'manifest.json');
    const manifest = JSON.parse(await readFile(path, 'utf-8'));
    edit(manifest);
    await writeFile(path, JSON.stringify(manifest, null, 2));
  }

  async function rejection(promise: Promise<unknown>): Promise<IntegrityFailureError> {
    const error = await promise.catch((err: unknown) => err);
    if (!(error instanceof IntegrityFailureError)) {
      throw new Error(`expected IntegrityFailureError, got ${String(error)}`);
    }
    return error;
  }

  it('imports three envelopes from node A into an empty destination', async () => {
    const batch = await appendAndExport(3);

    const result = await importer.importBatch(batch.directory);

    expect(result).toEqual({
      status: 'imported',
      sourceNodeId: SOURCE,
      batchId: '20260401T080000000Z',
      destination: join(storeDir, SOURCE, '20260401T080000000Z'),
      chunkCount: 1,
      envelopeCount: 3,
      firstSeq: 1,
      lastSeq: 3,
      replaced: false,
    });

    const copied = join(storeDir, SOURCE, batch.batchId, 'chunk_0001.jsonl');
    expect(await readFile(copied, 'utf-8')).toBe(await readFile(journal.path, 'utf-8'));
    expect(batch.manifest.chunks[0]?.content_hash).toBe(await sha256File(copied));

    const envelopes = await collect(federated.readNode(SOURCE));
    expect(envelopes.map((envelope) => [envelope.node_id, envelope.seq])).toEqual([
      [SOURCE, 1],
      [SOURCE, 2],
      [SOURCE, 3],
    ]);
    expect(await collect(journal.readAll())).toEqual(envelopes);

    const verification = await federated.verifyNode(SOURCE);
    expect(verification).toMatchObject({ valid: true, envelopeCount: 3, lastSeq: 3, batchCount: 1 });

    const index = await importer.loadIndex();
    expect(index.entries).toEqual([
      {
        source_node_id: SOURCE,
        batch_id: batch.batchId,
        imported_at: '2026-04-02T09:00:00.000Z',
        envelope_count: 3,
        first_seq: 1,
        last_seq: 3,
        path: join(SOURCE, batch.batchId),
      },
    ]);
  });

  it('is a no-op the second time', async () => {
    const batch = await appendAndExport(2);
    await importer.importBatch(batch.directory);
    const indexBefore = await readFile(indexFile, 'utf-8');
    const storeBefore = await readdir(join(storeDir, SOURCE));

    const again = await importer.importBatch(batch.directory);

    expect(again).toEqual({
      status: 'already_imported',
      sourceNodeId: SOURCE,
      batchId: batch.batchId,
      destination: join(storeDir, SOURCE, batch.batchId),
      importedAt: '2026-04-02T09:00:00.000Z',
    });
    expect(await readFile(indexFile, 'utf-8')).toBe(indexBefore);
    expect(await readdir(join(storeDir, SOURCE))).toEqual(storeBefore);
  });

  it('re-imports with force and keeps one index entry', async () => {
    const batch = await appendAndExport(2);
    await importer.importBatch(batch.directory);

    const forced = await importer.importBatch(batch.directory, { force: true });

    expect(forced).toMatchObject({ status: 'imported', replaced: true, envelopeCount: 2 });
    const index = await importer.loadIndex();
    expect(index.entries).toHaveLength(1);
    expect(index.entries[0]?.imported_at).toBe('2026-04-02T09:00:01.000Z');
    expect(await readdir(join(storeDir, SOURCE))).toEqual([batch.batchId]);
  });

  it('imports again when the indexed copy is missing from the store', async () => {
    const batch = await appendAndExport(3);
    await importer.importBatch(batch.directory);
    await rm(join(storeDir, SOURCE, batch.batchId), { recursive: true, force: true });

    const again = await importer.importBatch(batch.directory);

    expect(again).toMatchObject({ status: 'imported', replaced: false, envelopeCount: 3 });
    expect((await importer.loadIndex()).entries).toHaveLength(1);
    expect(await federated.verifyNode(SOURCE)).toMatchObject({ valid: true, envelopeCount: 3, batchCount: 1 });
  });

  it('recovers a forced import that stopped after moving the old copy aside', async () => {
    const batch = await appendAndExport(2);
    await importer.importBatch(batch.directory);
    const nodeDir = join(storeDir, SOURCE);
    await rename(join(nodeDir, batch.batchId), join(nodeDir, `.replaced-${batch.batchId}-0badc0de`));

    const again = await importer.importBatch(batch.directory);

    expect(again.status).toBe('imported');
    expect(await readdir(nodeDir)).toEqual([batch.batchId]);
    expect((await collect(federated.readNode(SOURCE))).map((envelope) => envelope.seq)).toEqual([1, 2]);
  });

  it('refuses to store a chunk that changes after it was verified', async () => {
    const batch = await appendAndExport(3);
    const chunkPath = join(batch.directory, 'chunk_0001.jsonl');
    interruptAfterVerify(async () => {
      const content = await readFile(chunkPath, 'utf-8');
      await writeFile(chunkPath, content.replace('"entry":1', '"entry":8'));
    });

    const error = await rejection(importer.importBatch(batch.directory));

    expect(error.chunk).toBe('chunk_0001.jsonl');
    expect(error.message).toContain('chunk changed after verification');
    expect(existsSync(indexFile)).toBe(false);
    expect(await readdir(join(storeDir, SOURCE))).toEqual([]);
  });

  it('leaves the index untouched when the copy fails part way, and a retry succeeds', async () => {
    for (let i = 0; i < 2; i++) {
      await journal.append({ evidenceType: 'audit_log', payload: { entry: i }, source: 'auditor' });
    }
    const chunked = new ExportManager({
      nodeId: SOURCE,
      journal,
      stateFile: join(sourceDir, 'journal', SOURCE, 'export_state.json'),
      exportsDir: join(sourceDir, 'exports'),
      chunkSize: 1,
      now: tickingClock('2026-04-01T08:00:00.000Z'),
    });
    const batch = await chunked.exportNew();
    if (!batch) {
      throw new Error('expected an export batch');
    }
    const secondChunk = join(batch.directory, 'chunk_0002.jsonl');
    const secondContent = await readFile(secondChunk, 'utf-8');
    interruptAfterVerify(() => rm(secondChunk));

    await expect(importer.importBatch(batch.directory)).rejects.toBeInstanceOf(WriteFailureError);
    expect(existsSync(indexFile)).toBe(false);
    expect(await readdir(join(storeDir, SOURCE))).toEqual([]);

    vi.restoreAllMocks();
    await writeFile(secondChunk, secondContent);
    const retried = await importer.importBatch(batch.directory);

    expect(retried).toMatchObject({ status: 'imported', chunkCount: 2, envelopeCount: 2 });
    expect(await federated.verifyNode(SOURCE)).toMatchObject({ valid: true, envelopeCount: 2 });
  });

  it('keeps an earlier batch and the index byte-identical when a later batch is rejected', async () => {
    const first = await appendAndExport(2);
    await importer.importBatch(first.directory);
    const storedDir = join(storeDir, SOURCE, first.batchId);
    const indexBefore = await readFile(indexFile, 'utf-8');
    const chunkBefore = await readFile(join(storedDir, 'chunk_0001.jsonl'), 'utf-8');
    const manifestBefore = await readFile(join(storedDir, 'manifest.json'), 'utf-8');

    const second = await appendAndExport(2);
    const chunkPath = join(second.directory, 'chunk_0001.jsonl');
    await writeFile(chunkPath, (await readFile(chunkPath, 'utf-8')).replace('"entry":1', '"entry":9'));

    await rejection(importer.importBatch(second.directory));

    expect(await readFile(indexFile, 'utf-8')).toBe(indexBefore);
    expect((await readdir(storeDir)).sort()).toEqual(['import_index.json', SOURCE]);
    expect(await readdir(join(storeDir, SOURCE))).toEqual([first.batchId]);
    expect(await readFile(join(storedDir, 'chunk_0001.jsonl'), 'utf-8')).toBe(chunkBefore);
    expect(await readFile(join(storedDir, 'manifest.json'), 'utf-8')).toBe(manifestBefore);
  });

  it('rejects a tampered chunk and leaves the destination untouched', async () => {
    const batch = await appendAndExport(3);
    const chunkPath = join(batch.directory, 'chunk_0001.jsonl');
    const content = await readFile(chunkPath, 'utf-8');
    await writeFile(chunkPath, content.replace('"entry":1', '"entry":8'));

    const error = await rejection(importer.importBatch(batch.directory));

    expect(error.chunk).toBe('chunk_0001.jsonl');
    expect(error.message).toContain('content hash mismatch');
    expect(existsSync(storeDir)).toBe(false);
    expect(existsSync(indexFile)).toBe(false);
  });

  it('rejects a chunk whose envelopes were edited even if the manifest hash was updated', async () => {
    const batch = await appendAndExport(3);
    const chunkPath = join(batch.directory, 'chunk_0001.jsonl');
    const tampered = (await readFile(chunkPath, 'utf-8')).replace('"entry":1', '"entry":8');
    await writeFile(chunkPath, tampered);
    await rewriteManifest(batch.directory, (manifest) => {
      manifest.chunks = [{ filename: 'chunk_0001.jsonl', content_hash: sha256Hex(tampered) }];
    });

    const error = await rejection(importer.importBatch(batch.directory));

    expect(error.chunk).toBe('chunk_0001.jsonl');
    expect(error.message).toContain('hash_mismatch');
    expect(error.message).toContain('seq 2');
    expect(existsSync(indexFile)).toBe(false);
  });

  it('rejects envelopes attributed to a different node than the manifest', async () => {
    const batch = await appendAndExport(1);
    await rewriteManifest(batch.directory, (manifest) => {
      manifest.node_id = 'node_b0b0b0b0b0b0';
    });

    const error = await rejection(importer.importBatch(batch.directory));
    expect(error.message).toContain('node_mismatch');
  });

  it('derives node and batch from the directory name when the manifest omits them', async () => {
    const batch = await appendAndExport(2);
    await rewriteManifest(batch.directory, (manifest) => {
      delete manifest.node_id;
      delete manifest.timestamp;
    });

    const result = await importer.importBatch(batch.directory);
    expect(result).toMatchObject({ status: 'imported', sourceNodeId: SOURCE, batchId: batch.batchId });
  });

  it('fails when the manifest is missing', async () => {
    const batch = await appendAndExport(1);
    await rm(join(batch.directory, 'manifest.json'));

    const error = await rejection(importer.importBatch(batch.directory));
    expect(error.message).toContain('manifest.json is missing');
    expect(error.chunk).toBeUndefined();
  });

  it('fails when a listed chunk is missing', async () => {
    const batch = await appendAndExport(1);
    await rm(join(batch.directory, 'chunk_0001.jsonl'));

    const error = await rejection(importer.importBatch(batch.directory));
    expect(error.chunk).toBe('chunk_0001.jsonl');
    expect(error.message).toContain('chunk file is missing');
  });

  it('refuses chunk names that leave the batch directory', async () => {
    const batch = await appendAndExport(1);
    await rewriteManifest(batch.directory, (manifest) => {
      manifest.chunks = [{ filename: '../evidence.jsonl', content_hash: 'a'.repeat(64) }];
    });

    const error = await rejection(importer.importBatch(batch.directory));
    expect(error.chunk).toBe('../evidence.jsonl');
    expect(error.message).toContain('not allowed');
  });
});

describe('FederatedStore', () => {
  let sourceDir: string;
  let destDir: string;
  let storeDir: string;
  let indexFile: string;
  let journal: EvidenceJournal;
  let exporter: ExportManager;
  let importer: ImportManager;
  let federated: FederatedStore;

  beforeEach(async () => {
    sourceDir = await mkdtemp(join(tmpdir(), 'evidence-federated-src-'));
    destDir = await mkdtemp(join(tmpdir(), 'evidence-federated-dest-'));
    storeDir = join(destDir, 'federated');
    indexFile = join(storeDir, 'import_index.json');

    journal = new EvidenceJournal({
      nodeId: SOURCE,
      path: join(sourceDir, 'evidence.jsonl'),
      sequence: new SequenceManager({ nodeId: SOURCE, path: join(sourceDir, 'sequence.json') }),
    });
    exporter = new ExportManager({
      nodeId: SOURCE,
      journal,
      stateFile: join(sourceDir, 'export_state.json'),
      exportsDir: join(sourceDir, 'exports'),
      now: tickingClock('2026-05-01T00:00:00.000Z'),
    });
    importer = new ImportManager({ storeDir, indexFile, now: tickingClock('2026-05-02T00:00:00.000Z') });
    federated = new FederatedStore({ storeDir, indexFile });
  });

  afterEach(async () => {
    await rm(sourceDir, { recursive: true, force: true });
    await rm(destDir, { recursive: true, force: true });
  });

  async function exportBatch(count: number): Promise<ExportBatch> {
    for (let i = 0; i < count; i++) {
      await journal.append({ evidenceType: 'task_completion', payload: { task: i } });
    }
    const batch = await exporter.exportNew();
    if (!batch) {
      throw new Error('expected an export batch');
    }
    return batch;
  }

  it('reads a node across batches in seq order', async () => {
    const first = await exportBatch(3);
    const second = await exportBatch(2);
    // Import out of order on purpose
    await importer.importBatch(second.directory);
    await importer.importBatch(first.directory);

    const seqs = (await collect(federated.readNode(SOURCE))).map((envelope) => envelope.seq);
    expect(seqs).toEqual([1, 2, 3, 4, 5]);
    expect(await federated.verifyNode(SOURCE)).toMatchObject({ valid: true, envelopeCount: 5, batchCount: 2 });

    expect(await federated.listNodes()).toEqual([
      {
        nodeId: SOURCE,
        batchCount: 2,
        envelopeCount: 5,
        firstSeq: 1,
        lastSeq: 5,
        lastImportedAt: '2026-05-02T00:00:01.000Z',
      },
    ]);
    expect((await federated.listBatches(SOURCE)).map((entry) => entry.batch_id)).toEqual([
      first.batchId,
      second.batchId,
    ]);
  });

  it('reports a gap when a batch in the middle was never imported', async () => {
    const first = await exportBatch(2);
    await exportBatch(2);
    const third = await exportBatch(2);
    await importer.importBatch(first.directory);
    await importer.importBatch(third.directory);

    const verification = await federated.verifyNode(SOURCE);
    expect(verification.valid).toBe(false);
    expect(verification.error?.kind).toBe('sequence_gap');
    expect(verification.error?.position.seq).toBe(5);
    expect(verification.envelopeCount).toBe(2);
  });

  it('yields overlapping identical envelopes once', async () => {
    const batch = await exportBatch(3);
    const copyDir = join(sourceDir, 'exports', `evidence_${SOURCE}_20260501T000009000Z`);
    await cp(batch.directory, copyDir, { recursive: true });
    const manifestPath = join(copyDir, 'manifest.json');
    const manifest = JSON.parse(await readFile(manifestPath, 'utf-8'));
    await writeFile(manifestPath, JSON.stringify({ ...manifest, timestamp: '20260501T000009000Z' }));

    await importer.importBatch(batch.directory);
    await importer.importBatch(copyDir);

    expect((await collect(federated.readNode(SOURCE))).map((envelope) => envelope.seq)).toEqual([1, 2, 3]);
    expect(await federated.verifyNode(SOURCE)).toMatchObject({ valid: true, batchCount: 2 });
  });

  it('lists a node after a seq, at most limit envelopes', async () => {
    const first = await exportBatch(3);
    const second = await exportBatch(2);
    await importer.importBatch(first.directory);
    await importer.importBatch(second.directory);

    const listed = await collect(federated.readNodeSince(SOURCE, 2, 2));
    expect(listed.map((envelope) => envelope.seq)).toEqual([3, 4]);
  });

  it('merges every node into one timeline ordered by timestamp', async () => {
    async function exportFrom(nodeId: string, start: string, count: number): Promise<ExportBatch> {
      const base = join(sourceDir, nodeId);
      const nodeJournal = new EvidenceJournal({
        nodeId,
        path: join(base, 'evidence.jsonl'),
        sequence: new SequenceManager({ nodeId, path: join(base, 'sequence.json') }),
        now: tickingClock(start),
      });
      for (let i = 0; i < count; i++) {
        await nodeJournal.append({ evidenceType: 'agent_heartbeat', payload: { beat: i } });
      }
      const batch = await new ExportManager({
        nodeId,
        journal: nodeJournal,
        stateFile: join(base, 'export_state.json'),
        exportsDir: join(base, 'exports'),
        now: tickingClock('2026-05-03T00:00:00.000Z'),
      }).exportNew();
      if (!batch) {
        throw new Error('expected an export batch');
      }
      return batch;
    }

    await importer.importBatch((await exportFrom(SOURCE, '2026-05-01T00:00:00.000Z', 3)).directory);
    await importer.importBatch((await exportFrom(OTHER, '2026-05-01T00:00:00.500Z', 2)).directory);

    const merged = await federated.readMerged();
    expect(merged.map((envelope) => [envelope.node_id, envelope.seq])).toEqual([
      [SOURCE, 1],
      [OTHER, 1],
      [SOURCE, 2],
      [OTHER, 2],
      [SOURCE, 3],
    ]);
    expect((await federated.readMerged(2)).map((envelope) => envelope.node_id)).toEqual([SOURCE, OTHER]);
  });

  it('breaks timestamp ties by node id, then seq', async () => {
    async function* stream(nodeId: string, seqs: number[]): AsyncGenerator<EvidenceEnvelope> {
      for (const seq of seqs) {
        yield createEnvelope({
          nodeId,
          seq,
          evidenceType: 'system_event',
          payload: {},
          prevHash: GENESIS_HASH,
          timestamp: '2026-05-01T00:00:00.000Z',
        });
      }
    }

    const merged = await mergeTimelines([stream(OTHER, [2, 1]), stream(SOURCE, [1])]);
    expect(merged.map((envelope) => [envelope.node_id, envelope.seq])).toEqual([
      [SOURCE, 1],
      [OTHER, 1],
      [OTHER, 2],
    ]);
  });

  it('returns nothing for an unknown node', async () => {
    expect(await collect(federated.readNode('node_ffffffffffff'))).toEqual([]);
    expect(await federated.listNodes()).toEqual([]);
  });
});
