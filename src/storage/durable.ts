/**
 * Durable local file primitives.
 *
 * Every write that the ledger acknowledges goes through one of these helpers:
 * the bytes are fsync'ed before the promise resolves, and whole-file
 * replacements use temp file + rename so readers see either the old or the
 * new content.
 */

import { link, open, rename, rm, stat, readFile } from 'node:fs/promises';
import { createReadStream } from 'node:fs';
import { createHash, randomBytes } from 'node:crypto';
import type { z } from 'zod';
import { CorruptStateError, describeError } from '../errors.js';

const NEWLINE = 0x0a;
const TAIL_READ_SIZE = 64 * 1024;

export interface JsonlLine {
  /** 1-based line number */
  lineNumber: number;
  /** Line content without the trailing newline */
  text: string;
  /** Byte offset of the first byte of the line */
  offset: number;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

/**
 * Replace a file atomically: write a temp sibling, fsync it, rename over the target.
 */
export async function writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
  const tempPath = `${filePath}.tmp.${randomBytes(4).toString('hex')}`;
  try {
    const handle = await open(tempPath, 'w');
    try {
      await handle.writeFile(data);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filePath);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Create a new file and fsync it. Fails with EEXIST if the file is already there.
 */
export async function writeFileExclusive(filePath: string, data: string | Uint8Array): Promise<void> {
  const handle = await open(filePath, 'wx');
  try {
    await handle.writeFile(data);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Publish a complete file under a name nobody holds yet: write and fsync a
 * temp sibling, then hard-link it into place. Fails with EEXIST when the
 * target exists; readers never see a partial file.
 */
export async function publishFileExclusive(filePath: string, data: string | Uint8Array): Promise<void> {
  const tempPath = `${filePath}.tmp.${randomBytes(4).toString('hex')}`;
  try {
    await writeFileExclusive(tempPath, data);
    await link(tempPath, filePath);
  } finally {
    await rm(tempPath, { force: true });
  }
}

/**
 * Append one complete line and fsync before resolving.
 */
export async function appendLineDurable(filePath: string, line: string): Promise<void> {
  const handle = await open(filePath, 'a');
  try {
    await handle.write(`${line}\n`);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * fsync a file that was written by other means (e.g. copyFile).
 */
export async function syncFile(filePath: string): Promise<void> {
  const handle = await open(filePath, 'r+');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

export async function fileSize(filePath: string): Promise<number> {
  try {
    return (await stat(filePath)).size;
  } catch (err) {
    if (isNotFound(err)) {
      return 0;
    }
    throw err;
  }
}

/**
 * Stream the newline-terminated lines of a file.
 *
 * Bounded by the file size at call time. A trailing fragment without a
 * newline is an unfinished (or torn) write and is not yielded.
 */
export async function* readJsonlLines(filePath: string): AsyncGenerator<JsonlLine> {
  const size = await fileSize(filePath);
  if (size === 0) {
    return;
  }

  const stream = createReadStream(filePath, { start: 0, end: size - 1 });
  let pending = Buffer.alloc(0);
  let pendingOffset = 0;
  let lineNumber = 0;

  for await (const chunk of stream) {
    const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf-8');
    let buffer = pending.length > 0 ? Buffer.concat([pending, data]) : data;
    let newline = buffer.indexOf(NEWLINE);
    while (newline !== -1) {
      lineNumber += 1;
      yield {
        lineNumber,
        text: buffer.subarray(0, newline).toString('utf-8'),
        offset: pendingOffset,
      };
      pendingOffset += newline + 1;
      buffer = buffer.subarray(newline + 1);
      newline = buffer.indexOf(NEWLINE);
    }
    pending = Buffer.from(buffer);
  }
}

export interface TailInfo {
  /** Current file size in bytes */
  size: number;
  /** Length of the prefix that ends with the last newline (0 if none) */
  completeLength: number;
  /** The last complete line, if any */
  lastLine?: string;
}

/**
 * Inspect the end of a JSONL file without reading all of it.
 */
export async function readTail(filePath: string): Promise<TailInfo> {
  const size = await fileSize(filePath);
  if (size === 0) {
    return { size: 0, completeLength: 0 };
  }

  const handle = await open(filePath, 'r');
  try {
    let end = size;
    let collected = Buffer.alloc(0);
    let completeLength: number | undefined;

    while (end > 0) {
      const start = Math.max(0, end - TAIL_READ_SIZE);
      const block = Buffer.alloc(end - start);
      await handle.read(block, 0, block.length, start);
      collected = Buffer.concat([block, collected]);
      end = start;

      // Offsets below are relative to `end` (the start of `collected`)
      if (completeLength === undefined) {
        const lastNewline = collected.lastIndexOf(NEWLINE);
        if (lastNewline === -1) {
          continue;
        }
        completeLength = end + lastNewline + 1;
      }

      const lineEnd = completeLength - 1 - end;
      const previousNewline = lineEnd > 0 ? collected.lastIndexOf(NEWLINE, lineEnd - 1) : -1;
      if (previousNewline !== -1 || end === 0) {
        const lineStart = previousNewline === -1 ? 0 : previousNewline + 1;
        return {
          size,
          completeLength,
          lastLine: collected.subarray(lineStart, lineEnd).toString('utf-8'),
        };
      }
    }

    return { size, completeLength: completeLength ?? 0 };
  } finally {
    await handle.close();
  }
}

/**
 * Cut a file back to `length` bytes and fsync.
 */
export async function truncateDurable(filePath: string, length: number): Promise<void> {
  const handle = await open(filePath, 'r+');
  try {
    await handle.truncate(length);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf-8'));
  }
  return hash.digest('hex');
}

/**
 * Read and validate a JSON state file. Missing file → undefined.
 * Anything unreadable or invalid → CorruptStateError.
 */
export async function readJsonState<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
): Promise<z.output<S> | undefined> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) {
      return undefined;
    }
    throw new CorruptStateError(filePath, describeError(err), { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CorruptStateError(filePath, `invalid JSON (${describeError(err)})`, { cause: err });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new CorruptStateError(filePath, `${path}${issue?.message ?? 'invalid content'}`);
  }
  return result.data;
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}
