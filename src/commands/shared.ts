/**
 * Helpers shared by the evidence-ledger commands.
 */

import chalk from 'chalk';
import { isInitialized } from '../config.js';
import { LedgerError, describeError } from '../errors.js';
import { EvidenceLedger } from '../ledger.js';

/**
 * Open the ledger of the current directory, or exit if there is none.
 */
export async function openLedger(): Promise<EvidenceLedger> {
  if (!isInitialized()) {
    console.error(chalk.red('✗ Evidence ledger not initialized. Run `evidence-ledger init` first.'));
    process.exit(1);
  }
  return EvidenceLedger.open();
}

export function exitWithError(err: unknown): never {
  console.error(chalk.red(`✗ ${describeError(err)}`));
  if (err instanceof LedgerError) {
    console.error(chalk.dim(`  code: ${err.code}`));
  }
  process.exit(1);
}

/**
 * Parse an integer flag. Exits on anything that is not an integer >= min.
 */
export function parseIntegerOption(value: string | undefined, flag: string, min: number): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    exitWithError(new Error(`--${flag} must be an integer >= ${min}, got "${value}"`));
  }
  return parsed;
}

export function formatDate(iso: string): string {
  const d = new Date(iso);
  return d.toLocaleString('en-US', {
    month: 'short',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hour12: false,
  });
}

export function shortHash(hash: string): string {
  return hash.slice(0, 12);
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
