import path from 'node:path';
import os from 'node:os';
import { getConfig, type Config } from './config.js';

/**
 * Normalize a path to forward slashes, resolve to absolute, remove trailing slash.
 */
export function normalizePath(inputPath: string): string {
  let resolved = inputPath;
  if (resolved.startsWith('~')) {
    resolved = path.join(os.homedir(), resolved.slice(1));
  }
  resolved = path.resolve(resolved);
  resolved = resolved.replace(/\\/g, '/');
  if (resolved.length > 1 && resolved.endsWith('/')) {
    resolved = resolved.slice(0, -1);
  }
  return resolved;
}

export function getDataDir(config: Config = getConfig()): string {
  return normalizePath(config.auditorDataDir);
}

export function getLedgerDbPath(config: Config = getConfig()): string {
  return `${getDataDir(config)}/ledger.db`;
}
