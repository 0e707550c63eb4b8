/**
 * Evidence Ledger Configuration
 *
 * Manages .evidence/config.json in the current project directory.
 * Also supports global config at ~/.evidence-ledger/config.json.
 */

import { mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { readJsonState, writeJsonAtomic } from './storage/durable.js';
import type { LedgerConfig, LedgerPaths, NodePaths } from './types.js';

/** Directory name for the local ledger root */
export const LEDGER_DIR = '.evidence';

/** Config filename */
export const CONFIG_FILE = 'config.json';

/** Global ledger home directory */
export const GLOBAL_LEDGER_DIR = join(homedir(), '.evidence-ledger');

export const DEFAULT_CHUNK_SIZE = 500;

export const LedgerConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  source: z.string().min(1).default('cli'),
  export: z
    .object({
      chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
      outputDir: z.string().min(1).default('exports'),
    })
    .default({}),
  import: z
    .object({
      storeDir: z.string().min(1).default('federated'),
    })
    .default({}),
});

/**
 * Default configuration for new projects.
 */
export function defaultConfig(): LedgerConfig {
  return LedgerConfigSchema.parse({});
}

/**
 * Resolve the local ledger root for the current project.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), LEDGER_DIR);
}

/**
 * Resolve the path to the local config file.
 */
export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

/**
 * Check if the ledger is initialized in the given directory.
 */
export function isInitialized(cwd?: string): boolean {
  return existsSync(localConfigPath(cwd));
}

/**
 * Load the config from the local .evidence/ directory.
 * Falls back to global config if local doesn't exist.
 */
export async function loadConfig(cwd?: string): Promise<LedgerConfig> {
  return loadConfigFrom(localConfigDir(cwd));
}

/**
 * Load the config of an explicit ledger root, with the same fallbacks.
 */
export async function loadConfigFrom(root: string): Promise<LedgerConfig> {
  const localPath = join(root, CONFIG_FILE);
  const globalPath = join(GLOBAL_LEDGER_DIR, CONFIG_FILE);

  for (const configPath of [localPath, globalPath]) {
    const config = await readJsonState(configPath, LedgerConfigSchema);
    if (config) {
      return config;
    }
  }

  return defaultConfig();
}

/**
 * Save the config to the local .evidence/ directory.
 */
export async function saveConfig(config: LedgerConfig, cwd?: string): Promise<void> {
  const dir = localConfigDir(cwd);
  await mkdir(dir, { recursive: true });
  await writeJsonAtomic(join(dir, CONFIG_FILE), config);
}

/**
 * Initialize the ledger in the given directory.
 * Creates .evidence/ and writes default config.
 */
export async function initializeProject(cwd?: string): Promise<LedgerConfig> {
  const config = defaultConfig();
  await saveConfig(config, cwd);
  return config;
}

/**
 * Lay out every file of a ledger root.
 */
export function resolveLedgerPaths(root: string, config: LedgerConfig = defaultConfig()): LedgerPaths {
  const within = (dir: string): string => (isAbsolute(dir) ? dir : join(root, dir));
  const federatedDir = within(config.import.storeDir);

  return {
    root,
    configFile: join(root, CONFIG_FILE),
    identityFile: join(root, 'node', 'identity.json'),
    sequenceFile: join(root, 'node', 'sequence.json'),
    journalDir: join(root, 'journal'),
    exportsDir: within(config.export.outputDir),
    federatedDir,
    importIndexFile: join(federatedDir, 'import_index.json'),
  };
}

export function resolveNodePaths(paths: LedgerPaths, nodeId: string): NodePaths {
  const nodeDir = join(paths.journalDir, nodeId);
  return {
    journalFile: join(nodeDir, 'evidence.jsonl'),
    exportStateFile: join(nodeDir, 'export_state.json'),
  };
}
