/**
 * evidence-ledger log - List envelopes from this node's journal, an imported
 * node, or every node at once
 */

import chalk from 'chalk';
import type { EvidenceEnvelope } from '../envelope/index.js';
import { collect } from '../journal/index.js';
import type { EvidenceLedger } from '../ledger.js';
import { exitWithError, formatDate, openLedger, parseIntegerOption, plural, shortHash } from './shared.js';

interface LogOptions {
  since?: string;
  limit?: string;
  node?: string;
  all?: boolean;
  json?: boolean;
}

export async function logCommand(options: LogOptions): Promise<void> {
  const since = parseIntegerOption(options.since, 'since', 0) ?? 0;
  const limit = parseIntegerOption(options.limit, 'limit', 1);
  if (options.all && (options.node !== undefined || since > 0)) {
    exitWithError(new Error('--all cannot be combined with --node or --since'));
  }
  const ledger = await openLedger();

  let envelopes: EvidenceEnvelope[];
  try {
    envelopes = await readEnvelopes(ledger, options, since, limit);
  } catch (err) {
    exitWithError(err);
  }

  if (options.json) {
    console.log(JSON.stringify(envelopes, null, 2));
    return;
  }

  const title = options.all ? 'all nodes' : (options.node ?? ledger.nodeId);
  console.log();
  console.log(chalk.bold(`🧾 Evidence: ${chalk.cyan(title)}`));
  console.log(chalk.dim(`   ${plural(envelopes.length, 'envelope')}${since > 0 ? ` after seq ${since}` : ''}`));
  console.log();

  if (envelopes.length === 0) {
    if (options.node !== undefined || options.all) {
      console.log(chalk.dim('  Nothing imported for this view yet.'));
    } else {
      console.log(chalk.dim('  No envelopes yet. Record one with:'));
      console.log();
      console.log(`    ${chalk.cyan('evidence-ledger append system_event --payload \'{"event":"boot"}\'')}`);
    }
    console.log();
    return;
  }

  const showNode = options.all === true;
  const nodeWidth = Math.max(4, ...envelopes.map((envelope) => envelope.node_id.length));
  const seqWidth = Math.max(3, ...envelopes.map((envelope) => String(envelope.seq).length));
  const typeWidth = Math.max(4, ...envelopes.map((envelope) => envelope.evidence_type.length));
  const sourceWidth = Math.max(6, ...envelopes.map((envelope) => envelope.source.length));

  const header = [
    ...(showNode ? ['Node'.padEnd(nodeWidth)] : []),
    'Seq'.padStart(seqWidth),
    'Date'.padEnd(14),
    'Type'.padEnd(typeWidth),
    'Source'.padEnd(sourceWidth),
    'Hash'.padEnd(12),
    'Tags',
  ].join('  ');

  console.log(chalk.dim(`  ${header}`));
  console.log(chalk.dim(`  ${'─'.repeat(header.length)}`));

  for (const envelope of envelopes) {
    const row = [
      ...(showNode ? [envelope.node_id.padEnd(nodeWidth)] : []),
      chalk.cyan(String(envelope.seq).padStart(seqWidth)),
      formatDate(envelope.timestamp).padEnd(14),
      chalk.yellow(envelope.evidence_type.padEnd(typeWidth)),
      envelope.source.padEnd(sourceWidth),
      chalk.dim(shortHash(envelope.envelope_hash)),
      envelope.tags.length > 0 ? chalk.dim(envelope.tags.join(', ')) : '',
    ].join('  ');
    console.log(`  ${row}`);
  }

  console.log();
}

async function readEnvelopes(
  ledger: EvidenceLedger,
  options: LogOptions,
  since: number,
  limit: number | undefined,
): Promise<EvidenceEnvelope[]> {
  if (options.all) {
    return ledger.timeline(limit);
  }
  if (options.node !== undefined && options.node !== ledger.nodeId) {
    return collect(ledger.federated.readNodeSince(options.node, since, limit));
  }
  const records = await collect(ledger.journal.readSince(since, limit));
  return records.map((record) => record.envelope);
}
