/**
 * evidence-ledger import - Verify a batch from another node and merge it
 */

import chalk from 'chalk';
import ora from 'ora';
import { IntegrityFailureError, describeError } from '../errors.js';
import { exitWithError, formatDate, openLedger, plural } from './shared.js';

interface ImportOptions {
  force?: boolean;
  json?: boolean;
}

export async function importCommand(dir: string, options: ImportOptions): Promise<void> {
  const ledger = await openLedger();
  const spinner = options.json ? undefined : ora(`Verifying ${dir}...`).start();

  try {
    const result = await ledger.imports.importBatch(dir, { force: options.force });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    if (result.status === 'already_imported') {
      spinner?.info(
        `Batch ${result.batchId} from ${chalk.cyan(result.sourceNodeId)} was already imported (${formatDate(result.importedAt)})`,
      );
      console.log(chalk.dim('  Use --force to import it again.'));
      return;
    }

    spinner?.succeed(
      `Imported ${plural(result.envelopeCount, 'envelope')} (seq ${result.firstSeq}..${result.lastSeq}) from ${chalk.cyan(result.sourceNodeId)}${result.replaced ? ' (replaced)' : ''}`,
    );
    console.log(chalk.dim(`  Batch: ${result.batchId}, ${plural(result.chunkCount, 'chunk')}`));
    console.log(chalk.dim(`  Stored in: ${result.destination}`));
  } catch (err) {
    spinner?.fail(err instanceof IntegrityFailureError ? 'Batch rejected' : `Import failed: ${describeError(err)}`);
    exitWithError(err);
  }
}
