export interface MemoryRecord {
  /** Canonical `owner/filename` key. */
  path: string;
  owner: string;
  lastFingerprint: string | null;
  lastSummary: string | null;
  /** ISO timestamp of the last successful write. */
  updatedAt: string;
}

export interface PriorState {
  fingerprint: string | null;
  summary: string | null;
}

/**
 * Durable backend for memory records. Implementations throw `LedgerError`
 * on any failure; the fail-soft policy lives in `MemoryLedger`.
 */
export interface LedgerStore {
  readonly name: string;
  find(path: string): Promise<MemoryRecord | null>;
  upsert(record: MemoryRecord): Promise<void>;
}
