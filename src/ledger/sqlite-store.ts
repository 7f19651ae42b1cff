import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { LedgerError } from '../errors.js';
import type { LedgerStore, MemoryRecord } from './types.js';

interface LedgerRow {
  file_path: string;
  salesperson: string;
  last_hash: string | null;
  last_summary: string | null;
  updated_at: string;
}

export class SqliteLedgerStore implements LedgerStore {
  readonly name = 'sqlite';
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sales_memory (
        file_path TEXT PRIMARY KEY,
        salesperson TEXT NOT NULL,
        last_hash TEXT,
        last_summary TEXT,
        updated_at TEXT NOT NULL
      )
    `);
  }

  async find(path: string): Promise<MemoryRecord | null> {
    let row: LedgerRow | undefined;
    try {
      row = this.db
        .prepare('SELECT * FROM sales_memory WHERE file_path = ?')
        .get(path) as LedgerRow | undefined;
    } catch (err) {
      throw new LedgerError(`Failed to read ledger record "${path}"`, err);
    }
    if (!row) return null;
    return {
      path: row.file_path,
      owner: row.salesperson,
      lastFingerprint: row.last_hash,
      lastSummary: row.last_summary,
      updatedAt: row.updated_at,
    };
  }

  async upsert(record: MemoryRecord): Promise<void> {
    try {
      this.db
        .prepare(
          `
        INSERT INTO sales_memory (file_path, salesperson, last_hash, last_summary, updated_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(file_path) DO UPDATE SET
          salesperson = excluded.salesperson,
          last_hash = excluded.last_hash,
          last_summary = excluded.last_summary,
          updated_at = excluded.updated_at
      `,
        )
        .run(record.path, record.owner, record.lastFingerprint, record.lastSummary, record.updatedAt);
    } catch (err) {
      throw new LedgerError(`Failed to write ledger record "${record.path}"`, err);
    }
  }

  close(): void {
    this.db.close();
  }
}
