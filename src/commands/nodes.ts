/**
 * evidence-ledger nodes - List source nodes in the federated store
 */

import chalk from 'chalk';
import type { FederatedNodeSummary } from '../import/index.js';
import { exitWithError, formatDate, openLedger } from './shared.js';

interface NodesOptions {
  json?: boolean;
}

export async function nodesCommand(options: NodesOptions): Promise<void> {
  const ledger = await openLedger();

  let nodes: FederatedNodeSummary[];
  try {
    nodes = await ledger.federated.listNodes();
  } catch (err) {
    exitWithError(err);
  }

  if (options.json) {
    console.log(JSON.stringify(nodes, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold('🌐 Federated Nodes'));
  console.log();

  if (nodes.length === 0) {
    console.log(chalk.dim('  No batches imported yet. Import one with:'));
    console.log();
    console.log(`    ${chalk.cyan('evidence-ledger import <batch-dir>')}`);
    console.log();
    return;
  }

  const nodeWidth = Math.max(4, ...nodes.map((node) => node.nodeId.length));
  const header = [
    'Node'.padEnd(nodeWidth),
    'Batches'.padStart(7),
    'Envelopes'.padStart(9),
    'Seq range'.padEnd(12),
    'Last import',
  ].join('  ');

  console.log(chalk.dim(`  ${header}`));
  console.log(chalk.dim(`  ${'─'.repeat(header.length)}`));

  for (const node of nodes) {
    const row = [
      chalk.cyan(node.nodeId.padEnd(nodeWidth)),
      String(node.batchCount).padStart(7),
      String(node.envelopeCount).padStart(9),
      `${node.firstSeq}..${node.lastSeq}`.padEnd(12),
      formatDate(node.lastImportedAt),
    ].join('  ');
    console.log(`  ${row}`);
  }

  console.log();
}
