/**
 * Node Identity
 *
 * One stable identifier per installation, generated on first use and read
 * back from disk ever after. A damaged identity file is an operator problem:
 * regenerating it would silently fork the origin of this node's chain.
 */

import { mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { arch, hostname, networkInterfaces, platform, release } from 'node:os';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { CorruptIdentityError, describeError } from '../errors.js';
import { sha256Hex } from '../envelope/index.js';
import { isAlreadyExists, isNotFound, publishFileExclusive } from '../storage/durable.js';

export const NODE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/;

export const NodeIdentitySchema = z.object({
  node_id: z.string().regex(NODE_ID_PATTERN, 'node_id may only contain letters, digits, "-" and "_"'),
  hostname: z.string(),
  platform: z.string(),
  created_at: z.string(),
  fingerprint: z.string(),
});

export type NodeIdentity = z.infer<typeof NodeIdentitySchema>;

export interface NodeIdentityStoreOptions {
  /** Path of the identity file */
  path: string;
}

export class NodeIdentityStore {
  private readonly path: string;
  private cached?: NodeIdentity;

  constructor(options: NodeIdentityStoreOptions) {
    this.path = options.path;
  }

  get identityPath(): string {
    return this.path;
  }

  async getOrCreateNodeId(): Promise<string> {
    const identity = await this.getOrCreateIdentity();
    return identity.node_id;
  }

  async getOrCreateIdentity(): Promise<NodeIdentity> {
    if (this.cached) {
      return this.cached;
    }

    const existing = await this.loadIdentity();
    if (existing) {
      this.cached = existing;
      return existing;
    }

    const created = generateIdentity();
    await mkdir(dirname(this.path), { recursive: true });
    try {
      await publishFileExclusive(this.path, `${JSON.stringify(created, null, 2)}\n`);
    } catch (err) {
      if (!isAlreadyExists(err)) {
        throw err;
      }
      // Another process created the identity first; its node id wins
      const winner = await this.loadIdentity();
      if (!winner) {
        throw new CorruptIdentityError(this.path, 'disappeared while it was being created', { cause: err });
      }
      this.cached = winner;
      return winner;
    }
    this.cached = created;
    return created;
  }

  /**
   * Read the identity file. Returns undefined only when the file does not exist.
   */
  async loadIdentity(): Promise<NodeIdentity | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return undefined;
      }
      throw new CorruptIdentityError(this.path, `unreadable (${describeError(err)})`, { cause: err });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new CorruptIdentityError(this.path, `invalid JSON (${describeError(err)})`, { cause: err });
    }

    const result = NodeIdentitySchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new CorruptIdentityError(
        this.path,
        `${issue?.path.join('.') || 'identity'}: ${issue?.message ?? 'invalid'}`,
      );
    }
    return result.data;
  }
}

/**
 * Fingerprint the host, salted so that cloned machines still diverge.
 */
export function generateIdentity(now: Date = new Date()): NodeIdentity {
  const host = hostname();
  const platformInfo = `${platform()}-${release()}`;
  const components = [host, platformInfo, arch(), primaryMacAddress(), randomBytes(8).toString('hex')];
  const fingerprint = sha256Hex(components.join(':')).slice(0, 16);

  return {
    node_id: `node_${fingerprint.slice(0, 12)}`,
    hostname: host,
    platform: platformInfo,
    created_at: now.toISOString(),
    fingerprint,
  };
}

function primaryMacAddress(): string {
  for (const addresses of Object.values(networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (!address.internal && address.mac !== '00:00:00:00:00:00') {
        return address.mac;
      }
    }
  }
  return 'no-mac';
}
