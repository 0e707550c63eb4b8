/**
 * evidence-ledger status - Summarize journal, export and federated state
 */

import chalk from 'chalk';
import type { LedgerStatus } from '../ledger.js';
import { exitWithError, formatDate, openLedger, plural, shortHash } from './shared.js';

interface StatusOptions {
  json?: boolean;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const ledger = await openLedger();

  let status: LedgerStatus;
  try {
    status = await ledger.status();
  } catch (err) {
    exitWithError(err);
  }

  if (options.json) {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  const { journal, export: exported, federated } = status;

  console.log();
  console.log(chalk.bold('📒 Evidence Ledger'));
  console.log(chalk.dim(`   Node: ${status.nodeId}`));
  console.log(chalk.dim(`   Root: ${status.root}`));
  console.log();

  console.log(chalk.white.bold('  Journal'));
  console.log(`    ${plural(journal.envelopeCount, 'envelope')}, last seq ${journal.lastSeq}`);
  if (journal.lastHash && journal.lastTimestamp) {
    console.log(chalk.dim(`    Head ${shortHash(journal.lastHash)} at ${formatDate(journal.lastTimestamp)}`));
  }
  console.log();

  console.log(chalk.white.bold('  Export'));
  console.log(`    Exported through seq ${exported.lastExportedSeq} in ${plural(exported.totalExports, 'batch')}`);
  if (exported.pending > 0) {
    console.log(`    ${chalk.yellow(`${exported.pending} pending`)}`);
  }
  if (exported.lastBatch) {
    console.log(chalk.dim(`    Last batch ${exported.lastBatch.batch_id}`));
  }
  console.log();

  console.log(chalk.white.bold('  Federated'));
  console.log(`    ${plural(federated.nodes, 'node')}, ${plural(federated.batches, 'batch')}`);
  console.log();
}
