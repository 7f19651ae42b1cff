import { describeError } from '../errors.js';
import { formatEvent, type Logger } from '../log.js';
import type { LedgerStore, PriorState } from './types.js';

/**
 * The dispatcher's view of the ledger.
 *
 * Reads fail soft: a backend error degrades to "no prior state", so an outage
 * leads to re-analysis instead of a stalled loop. Writes are last-writer-wins
 * by path and report failure through the return value; they never throw.
 */
export class MemoryLedger {
  constructor(
    private store: LedgerStore,
    private now: () => Date = () => new Date(),
    private logger: Logger = console,
  ) {}

  async get(path: string): Promise<PriorState | null> {
    try {
      const record = await this.store.find(path);
      if (!record) return null;
      return { fingerprint: record.lastFingerprint, summary: record.lastSummary };
    } catch (err) {
      this.logger.warn(formatEvent('ledger.read_failed', {
        key: path,
        store: this.store.name,
        error: describeError(err),
      }));
      return null;
    }
  }

  async upsert(path: string, owner: string, fingerprint: string, summary: string): Promise<boolean> {
    try {
      await this.store.upsert({
        path,
        owner,
        lastFingerprint: fingerprint,
        lastSummary: summary,
        updatedAt: this.now().toISOString(),
      });
      return true;
    } catch (err) {
      this.logger.error(formatEvent('ledger.write_failed', {
        key: path,
        store: this.store.name,
        error: describeError(err),
      }));
      return false;
    }
  }
}
