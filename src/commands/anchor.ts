/**
 * evidence-ledger anchor - Record a chain anchor (genesis or checkpoint)
 */

import chalk from 'chalk';
import { exitWithError, openLedger, shortHash } from './shared.js';

interface AnchorOptions {
  message?: string;
  json?: boolean;
}

export async function anchorCommand(options: AnchorOptions): Promise<void> {
  const ledger = await openLedger();

  try {
    const envelope = await ledger.appendAnchor({ message: options.message });

    if (options.json) {
      console.log(JSON.stringify(envelope, null, 2));
      return;
    }

    const anchorType = envelope.seq === 1 ? 'genesis' : 'checkpoint';
    console.log(
      `${chalk.green('✓')} Anchored ${chalk.yellow(anchorType)} at ${chalk.cyan(`seq ${envelope.seq}`)} ${chalk.dim(shortHash(envelope.envelope_hash))}`,
    );
  } catch (err) {
    exitWithError(err);
  }
}
