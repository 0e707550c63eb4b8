/**
 * evidence-ledger append - Record one envelope in this node's journal
 */

import chalk from 'chalk';
import { EVIDENCE_TYPES, JsonValueSchema, isEvidenceType, type JsonValue } from '../envelope/index.js';
import { describeError } from '../errors.js';
import { exitWithError, openLedger, shortHash } from './shared.js';

interface AppendOptions {
  payload?: string;
  tags?: string;
  source?: string;
  json?: boolean;
}

export async function appendCommand(type: string, options: AppendOptions): Promise<void> {
  if (!isEvidenceType(type)) {
    exitWithError(new Error(`Unknown evidence type "${type}". Expected one of: ${EVIDENCE_TYPES.join(', ')}`));
  }

  const payload = parsePayload(options.payload);
  const tags = options.tags
    ?.split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);

  const ledger = await openLedger();

  try {
    const envelope = await ledger.append({
      evidenceType: type,
      payload,
      tags,
      source: options.source,
    });

    if (options.json) {
      console.log(JSON.stringify(envelope, null, 2));
      return;
    }

    console.log(
      `${chalk.green('✓')} Appended ${chalk.cyan(`seq ${envelope.seq}`)} ${chalk.yellow(envelope.evidence_type)} ${chalk.dim(shortHash(envelope.envelope_hash))}`,
    );
  } catch (err) {
    exitWithError(err);
  }
}

function parsePayload(raw: string | undefined): JsonValue {
  if (raw === undefined) {
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    exitWithError(new Error(`--payload is not valid JSON: ${describeError(err)}`));
  }

  const result = JsonValueSchema.safeParse(data);
  if (!result.success) {
    exitWithError(new Error('--payload must be a JSON value with finite numbers'));
  }
  return result.data;
}
