/**
 * evidence-ledger export - Cut a batch of not-yet-exported envelopes
 */

import chalk from 'chalk';
import ora from 'ora';
import { describeError } from '../errors.js';
import type { ExportPreview } from '../export/index.js';
import { exitWithError, openLedger, parseIntegerOption, plural } from './shared.js';

interface ExportOptions {
  limit?: string;
  dryRun?: boolean;
  json?: boolean;
}

export async function exportCommand(options: ExportOptions): Promise<void> {
  const limit = parseIntegerOption(options.limit, 'limit', 1);
  const ledger = await openLedger();

  if (options.dryRun) {
    let preview: ExportPreview;
    try {
      preview = await ledger.exports.previewNew({ limit });
    } catch (err) {
      exitWithError(err);
    }

    if (options.json) {
      console.log(JSON.stringify(preview, null, 2));
      return;
    }
    if (preview.envelopeCount === 0) {
      console.log(chalk.dim(`Nothing new to export (exported through seq ${preview.lastExportedSeq}).`));
      return;
    }
    console.log(
      `Would export ${plural(preview.envelopeCount, 'envelope')} (seq ${preview.firstSeq}..${preview.lastSeq})`,
    );
    return;
  }

  const spinner = options.json ? undefined : ora('Exporting evidence...').start();

  try {
    const batch = await ledger.exports.exportNew({ limit });

    if (options.json) {
      console.log(JSON.stringify(batch ?? null, null, 2));
      return;
    }

    if (!batch) {
      spinner?.info('Nothing new to export');
      return;
    }

    spinner?.succeed(
      `Exported ${plural(batch.envelopeCount, 'envelope')} (seq ${batch.firstSeq}..${batch.lastSeq}) in ${plural(batch.manifest.chunks.length, 'chunk')}`,
    );
    console.log(chalk.dim(`  Batch: ${batch.batchId}`));
    console.log(chalk.dim(`  Directory: ${batch.directory}`));
  } catch (err) {
    spinner?.fail(`Export failed: ${describeError(err)}`);
    exitWithError(err);
  }
}
