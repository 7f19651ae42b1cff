import { describe, it, expect, vi, beforeEach } from 'vitest';
import { normalizePath } from '../paths.js';

describe('normalizePath', () => {
  it('converts backslashes to forward slashes', () => {
    const result = normalizePath('C:\\Users\\test\\project');
    expect(result).not.toContain('\\');
    expect(result).toContain('/');
  });

  it('removes trailing slash', () => {
    expect(normalizePath('/home/user/project/')).toBe('/home/user/project');
  });

  it('expands tilde to home directory', () => {
    const result = normalizePath('~/reports');
    expect(result).not.toContain('~');
    expect(result.endsWith('/reports')).toBe(true);
  });

  it('preserves root path without removing slash', () => {
    expect(normalizePath('/')).toBe('/');
  });
});

describe('getLedgerDbPath', () => {
  beforeEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('places the ledger database in the data dir', async () => {
    vi.stubEnv('AUDITOR_DATA_DIR', '/var/lib/auditor/');
    const { getLedgerDbPath } = await import('../paths.js');
    expect(getLedgerDbPath()).toBe('/var/lib/auditor/ledger.db');
  });
});
