import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { LedgerError } from '../errors.js';
import type { LedgerStore, MemoryRecord } from './types.js';

const rowSchema = z.object({
  file_path: z.string(),
  salesperson: z.string(),
  last_hash: z.string().nullable(),
  last_summary: z.string().nullable(),
  updated_at: z.string(),
});

// Table columns: file_path (unique), salesperson, last_hash, last_summary, updated_at
export class SupabaseLedgerStore implements LedgerStore {
  readonly name = 'supabase';

  constructor(
    private client: SupabaseClient,
    private table = 'sales_memory',
  ) {}

  async find(path: string): Promise<MemoryRecord | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select('file_path, salesperson, last_hash, last_summary, updated_at')
      .eq('file_path', path)
      .maybeSingle();

    if (error) {
      throw new LedgerError(`Supabase lookup failed for "${path}": ${error.message}`, error);
    }
    if (data === null) return null;

    const parsed = rowSchema.safeParse(data);
    if (!parsed.success) {
      throw new LedgerError(`Malformed ledger record for "${path}"`, parsed.error);
    }
    const row = parsed.data;
    return {
      path: row.file_path,
      owner: row.salesperson,
      lastFingerprint: row.last_hash,
      lastSummary: row.last_summary,
      updatedAt: row.updated_at,
    };
  }

  async upsert(record: MemoryRecord): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .upsert(
        {
          file_path: record.path,
          salesperson: record.owner,
          last_hash: record.lastFingerprint,
          last_summary: record.lastSummary,
          updated_at: record.updatedAt,
        },
        { onConflict: 'file_path' },
      );

    if (error) {
      throw new LedgerError(`Supabase upsert failed for "${record.path}": ${error.message}`, error);
    }
  }
}
