/**
 * evidence-ledger init - Initialize an evidence ledger in the current directory
 */

import chalk from 'chalk';
import ora from 'ora';
import { isInitialized, initializeProject, localConfigDir } from '../config.js';
import { describeError } from '../errors.js';
import { EvidenceLedger } from '../ledger.js';

export async function initCommand(): Promise<void> {
  console.log();
  console.log(chalk.bold('⛓  Evidence Ledger'));
  console.log();

  if (isInitialized()) {
    console.log(chalk.yellow('⚠  Evidence ledger is already initialized in this directory.'));
    console.log(chalk.dim(`   Config: ${localConfigDir()}/config.json`));
    return;
  }

  const spinner = ora('Initializing evidence ledger...').start();

  try {
    await initializeProject();
    spinner.succeed('Created .evidence/ directory');

    const identitySpinner = ora('Creating node identity...').start();
    const ledger = await EvidenceLedger.open();
    identitySpinner.succeed(`Node identity: ${chalk.cyan(ledger.nodeId)}`);

    console.log();
    console.log(chalk.green('✓ Evidence ledger initialized!'));
    console.log();
    console.log(chalk.dim('  Next steps:'));
    console.log(chalk.dim(`  ${chalk.white('evidence-ledger append <type>')}   Record your first envelope`));
    console.log(chalk.dim(`  ${chalk.white('evidence-ledger verify')}          Check the hash chain`));
    console.log(chalk.dim(`  ${chalk.white('evidence-ledger export')}          Cut a batch for another node`));
    console.log();
  } catch (err) {
    spinner.fail('Failed to initialize evidence ledger');
    console.error(chalk.red(describeError(err)));
    process.exit(1);
  }
}
