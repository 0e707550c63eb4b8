import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { EvidenceEnvelopeSchema, type EvidenceEnvelope } from '../../envelope/index.js';
import { EvidenceLedger } from '../../ledger.js';
import { anchorCommand } from '../anchor.js';
import { appendCommand } from '../append.js';
import { exportCommand } from '../export.js';
import { importCommand } from '../import.js';
import { initCommand } from '../init.js';
import { logCommand } from '../log.js';
import { nodesCommand } from '../nodes.js';
import { statusCommand } from '../status.js';
import { verifyCommand } from '../verify.js';

function jsonOutput(spy: MockInstance): unknown {
  const raw = spy.mock.calls
    .map((call) => call[0])
    .filter((entry): entry is string => typeof entry === 'string' && (entry === 'null' || /^\s*[[{]/.test(entry)))
    .pop();
  if (raw === undefined) {
    throw new Error('no JSON output captured');
  }
  return JSON.parse(raw);
}

function envelopes(spy: MockInstance): EvidenceEnvelope[] {
  const output = jsonOutput(spy);
  const parsed = EvidenceEnvelopeSchema.array().safeParse(output);
  if (!parsed.success) {
    throw new Error('expected a JSON array of envelopes');
  }
  return parsed.data;
}

function seqOf(envelope: EvidenceEnvelope): [string, number] {
  return [envelope.node_id, envelope.seq];
}

function mockExit(): MockInstance {
  return vi.spyOn(process, 'exit').mockImplementation(((code?: number) => {
    throw new Error(`process.exit:${code ?? 0}`);
  }) as never);
}

describe.sequential('ledger commands', () => {
  let nodeA: string;
  let nodeB: string;
  let originalCwd: string;
  let logSpy: MockInstance;

  beforeEach(async () => {
    nodeA = await mkdtemp(join(tmpdir(), 'evidence-cmd-a-'));
    nodeB = await mkdtemp(join(tmpdir(), 'evidence-cmd-b-'));
    originalCwd = process.cwd();
    process.chdir(nodeA);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    vi.restoreAllMocks();
    await rm(nodeA, { recursive: true, force: true });
    await rm(nodeB, { recursive: true, force: true });
  });

  it('init creates the ledger root and a node identity', async () => {
    await initCommand();

    expect(existsSync(join(nodeA, '.evidence', 'config.json'))).toBe(true);
    expect(existsSync(join(nodeA, '.evidence', 'node', 'identity.json'))).toBe(true);
  });

  it('commands exit when the ledger is not initialized', async () => {
    const exitSpy = mockExit();

    await expect(logCommand({ json: true })).rejects.toThrow('process.exit:1');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('append --json prints the sealed envelope', async () => {
    await initCommand();
    logSpy.mockClear();

    await appendCommand('system_event', { payload: '{"event":"boot"}', tags: 'ops, boot,ops', json: true });

    const envelope = jsonOutput(logSpy);
    expect(envelope).toMatchObject({
      seq: 1,
      evidence_type: 'system_event',
      payload: { event: 'boot' },
      tags: ['ops', 'boot'],
      source: 'cli',
    });
  });

  it('append rejects an unknown evidence type', async () => {
    await initCommand();
    const exitSpy = mockExit();

    await expect(appendCommand('gossip', {})).rejects.toThrow('process.exit:1');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('append rejects a payload that is not JSON', async () => {
    await initCommand();
    mockExit();

    await expect(appendCommand('system_event', { payload: '{oops' })).rejects.toThrow('process.exit:1');
  });

  it('log --json lists envelopes after --since', async () => {
    await initCommand();
    for (const payload of ['{"n":1}', '{"n":2}', '{"n":3}']) {
      await appendCommand('metric_sample', { payload });
    }
    logSpy.mockClear();

    await logCommand({ since: '1', json: true });

    const envelopes = jsonOutput(logSpy);
    expect(Array.isArray(envelopes) && envelopes.map((envelope: { seq: number }) => envelope.seq)).toEqual([2, 3]);
  });

  it('anchor records a genesis anchor, then checkpoints', async () => {
    await initCommand();
    logSpy.mockClear();

    await anchorCommand({ json: true });
    expect(jsonOutput(logSpy)).toMatchObject({
      seq: 1,
      evidence_type: 'chain_anchor',
      payload: { message: 'Chain anchor - genesis envelope', anchor_type: 'genesis' },
      tags: ['anchor', 'chain'],
      source: 'cli',
    });

    await appendCommand('system_event', {});
    logSpy.mockClear();
    await anchorCommand({ message: 'shift end', json: true });
    expect(jsonOutput(logSpy)).toMatchObject({ seq: 3, payload: { message: 'shift end', anchor_type: 'checkpoint' } });
  });

  it('log rejects --all together with --since', async () => {
    await initCommand();
    const exitSpy = mockExit();

    await expect(logCommand({ all: true, since: '2', json: true })).rejects.toThrow('process.exit:1');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('verify --json reports a valid chain', async () => {
    await initCommand();
    await appendCommand('agent_heartbeat', {});
    await appendCommand('agent_heartbeat', {});
    logSpy.mockClear();

    await verifyCommand({ json: true });

    expect(jsonOutput(logSpy)).toMatchObject({ scope: 'journal', valid: true, envelope_count: 2, last_seq: 2, error: null });
  });

  it('verify exits 1 and names the position of a tampered envelope', async () => {
    await initCommand();
    await appendCommand('audit_log', { payload: '{"user":"alice"}' });
    await appendCommand('audit_log', { payload: '{"user":"bob"}' });
    const ledger = await EvidenceLedger.open();
    const content = await readFile(ledger.journal.path, 'utf-8');
    await writeFile(ledger.journal.path, content.replace('"user":"bob"', '"user":"eve"'));
    logSpy.mockClear();
    mockExit();

    await expect(verifyCommand({ json: true })).rejects.toThrow('process.exit:1');

    expect(jsonOutput(logSpy)).toMatchObject({
      valid: false,
      envelope_count: 1,
      error: { kind: 'hash_mismatch', line: 2, seq: 2 },
    });
  });

  it('export --dry-run writes nothing', async () => {
    await initCommand();
    await appendCommand('task_completion', {});
    logSpy.mockClear();

    await exportCommand({ dryRun: true, json: true });

    expect(jsonOutput(logSpy)).toMatchObject({ envelopeCount: 1, firstSeq: 1, lastSeq: 1, lastExportedSeq: 0 });
    expect(existsSync(join(nodeA, '.evidence', 'exports'))).toBe(false);
  });

  it('export, import, nodes and federated verify across two nodes', async () => {
    await initCommand();
    for (let i = 0; i < 3; i++) {
      await appendCommand('telemetry_snapshot', { payload: `{"cpu":${i}}` });
    }
    const sourceId = (await EvidenceLedger.open()).nodeId;

    logSpy.mockClear();
    await exportCommand({ json: true });
    const batch = jsonOutput(logSpy);
    if (typeof batch !== 'object' || batch === null || !('directory' in batch) || typeof batch.directory !== 'string') {
      throw new Error('export did not print a batch');
    }

    logSpy.mockClear();
    await exportCommand({ json: true });
    expect(jsonOutput(logSpy)).toBeNull();

    process.chdir(nodeB);
    await initCommand();

    logSpy.mockClear();
    await importCommand(batch.directory, { json: true });
    expect(jsonOutput(logSpy)).toMatchObject({ status: 'imported', sourceNodeId: sourceId, envelopeCount: 3 });

    logSpy.mockClear();
    await importCommand(batch.directory, { json: true });
    expect(jsonOutput(logSpy)).toMatchObject({ status: 'already_imported', sourceNodeId: sourceId });

    logSpy.mockClear();
    await nodesCommand({ json: true });
    expect(jsonOutput(logSpy)).toMatchObject([{ nodeId: sourceId, batchCount: 1, envelopeCount: 3 }]);

    logSpy.mockClear();
    await verifyCommand({ node: sourceId, json: true });
    expect(jsonOutput(logSpy)).toMatchObject({ node_id: sourceId, scope: 'federated', valid: true, envelope_count: 3 });

    logSpy.mockClear();
    await logCommand({ node: sourceId, since: '1', limit: '1', json: true });
    expect(envelopes(logSpy).map(seqOf)).toEqual([[sourceId, 2]]);

    await appendCommand('system_event', { payload: '{"event":"received"}' });
    const localId = (await EvidenceLedger.open()).nodeId;
    logSpy.mockClear();
    await logCommand({ all: true, json: true });
    expect(envelopes(logSpy).map(seqOf)).toEqual([
      [sourceId, 1],
      [sourceId, 2],
      [sourceId, 3],
      [localId, 1],
    ]);

    logSpy.mockClear();
    await statusCommand({ json: true });
    expect(jsonOutput(logSpy)).toMatchObject({
      journal: { envelopeCount: 1, lastSeq: 1 },
      federated: { nodes: 1, batches: 1 },
    });
  });

  it('import exits 1 for a directory that is not a batch', async () => {
    await initCommand();
    const exitSpy = mockExit();

    await expect(importCommand(join(nodeA, 'missing'), { json: true })).rejects.toThrow('process.exit:1');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
