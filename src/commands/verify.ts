/**
 * evidence-ledger verify - Check the hash chain of this node or a federated node
 */

import chalk from 'chalk';
import type { ChainVerification } from '../journal/index.js';
import { exitWithError, openLedger, plural, shortHash } from './shared.js';

interface VerifyOptions {
  node?: string;
  json?: boolean;
}

export async function verifyCommand(options: VerifyOptions): Promise<void> {
  const ledger = await openLedger();
  const nodeId = options.node ?? ledger.nodeId;
  const scope = nodeId === ledger.nodeId ? 'journal' : 'federated';

  let verification: ChainVerification;
  try {
    verification = scope === 'journal'
      ? await ledger.journal.verifyChain()
      : await ledger.federated.verifyNode(nodeId);
  } catch (err) {
    exitWithError(err);
  }

  if (scope === 'federated' && verification.envelopeCount === 0 && verification.valid) {
    exitWithError(new Error(`No imported batches for node ${nodeId}`));
  }

  if (options.json) {
    const { error } = verification;
    console.log(JSON.stringify({
      node_id: nodeId,
      scope,
      valid: verification.valid,
      envelope_count: verification.envelopeCount,
      last_seq: verification.lastSeq,
      last_hash: verification.lastHash ?? null,
      error: error
        ? { kind: error.kind, message: error.message, line: error.position.line, seq: error.position.seq ?? null }
        : null,
    }, null, 2));
  } else {
    console.log();
    console.log(chalk.bold(`🔗 Chain: ${chalk.cyan(nodeId)}`) + chalk.dim(` (${scope})`));
    console.log();

    if (verification.error) {
      console.log(chalk.red(`✗ ${verification.error.message}`));
      console.log(chalk.dim(`  ${plural(verification.envelopeCount, 'envelope')} verified before the break`));
    } else if (verification.envelopeCount === 0) {
      console.log(chalk.dim('  Journal is empty.'));
    } else {
      console.log(
        `${chalk.green('✓')} Chain valid: ${plural(verification.envelopeCount, 'envelope')}, last seq ${verification.lastSeq}`,
      );
      if (verification.lastHash) {
        console.log(chalk.dim(`  Head: ${shortHash(verification.lastHash)}`));
      }
    }
    console.log();
  }

  if (!verification.valid) {
    process.exit(1);
  }
}
