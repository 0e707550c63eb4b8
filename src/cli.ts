#!/usr/bin/env node

/**
 * Evidence Ledger CLI
 *
 * Tamper-evident, hash-chained evidence journal with file-based batch
 * exchange between nodes.
 *
 * Usage:
 *   evidence-ledger init                 Create .evidence/ and a node identity
 *   evidence-ledger append <type>        Record an envelope
 *   evidence-ledger anchor               Record a chain anchor
 *   evidence-ledger log                  List envelopes
 *   evidence-ledger verify               Check the hash chain
 *   evidence-ledger export               Cut a batch of new envelopes
 *   evidence-ledger import <dir>         Verify and merge a batch from another node
 *   evidence-ledger status               Journal, export and federated summary
 *   evidence-ledger nodes                List imported source nodes
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  initCommand,
  appendCommand,
  anchorCommand,
  logCommand,
  verifyCommand,
  exportCommand,
  importCommand,
  statusCommand,
  nodesCommand,
} from './commands/index.js';
import { exitWithError } from './commands/shared.js';
import { EVIDENCE_TYPES } from './envelope/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('evidence-ledger')
  .description('Tamper-evident evidence journal with batch export/import between nodes.')
  .version(version);

// ─── evidence-ledger init ────────────────────────────────────

program
  .command('init')
  .description('Initialize an evidence ledger in the current directory')
  .action(initCommand);

// ─── evidence-ledger append ──────────────────────────────────

program
  .command('append <type>')
  .description(`Append an envelope (${EVIDENCE_TYPES.join(', ')})`)
  .option('-p, --payload <json>', 'Payload as JSON', '{}')
  .option('-t, --tags <tags>', 'Comma-separated tags')
  .option('-s, --source <source>', 'Producing component (default: config source)')
  .option('--json', 'Output the envelope as JSON')
  .action(appendCommand);

// ─── evidence-ledger anchor ──────────────────────────────────

program
  .command('anchor')
  .description('Append a chain anchor (genesis on an empty journal, checkpoint otherwise)')
  .option('-m, --message <text>', 'Anchor message')
  .option('--json', 'Output the envelope as JSON')
  .action(anchorCommand);

// ─── evidence-ledger log ─────────────────────────────────────

program
  .command('log')
  .description('List envelopes in this node\'s journal (or of an imported node)')
  .option('--since <seq>', 'Only envelopes after this seq')
  .option('--limit <n>', 'Maximum number of envelopes')
  .option('-n, --node <id>', 'List an imported node from the federated store')
  .option('--all', 'Merge this node and every imported node into one timeline')
  .option('--json', 'Output as JSON')
  .action(logCommand);

// ─── evidence-ledger verify ──────────────────────────────────

program
  .command('verify')
  .description('Verify the hash chain of this node (or of an imported node)')
  .option('-n, --node <id>', 'Verify an imported node from the federated store')
  .option('--json', 'Output as JSON')
  .action(verifyCommand);

// ─── evidence-ledger export ──────────────────────────────────

program
  .command('export')
  .description('Export envelopes not yet exported into a new batch')
  .option('--limit <n>', 'Export at most this many envelopes')
  .option('--dry-run', 'Show what would be exported without writing anything')
  .option('--json', 'Output as JSON')
  .action(exportCommand);

// ─── evidence-ledger import ──────────────────────────────────

program
  .command('import <dir>')
  .description('Verify an export batch and merge it into the federated store')
  .option('-f, --force', 'Re-import a batch that was already imported')
  .option('--json', 'Output as JSON')
  .action(importCommand);

// ─── evidence-ledger status ──────────────────────────────────

program
  .command('status')
  .description('Show journal, export and federated state')
  .option('--json', 'Output as JSON')
  .action(statusCommand);

// ─── evidence-ledger nodes ───────────────────────────────────

program
  .command('nodes')
  .description('List source nodes in the federated store')
  .option('--json', 'Output as JSON')
  .action(nodesCommand);

program.parseAsync().catch(exitWithError);
