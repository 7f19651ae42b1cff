import { fingerprint, hasChanged } from '../core/fingerprint.js';
import { EnumerationError, ItemProcessingError, describeError } from '../errors.js';
import type { Analyzer } from '../analyzer/analyzer.js';
import type { MemoryLedger } from '../ledger/ledger.js';
import { formatEvent, type Logger } from '../log.js';
import type { ReportSink } from '../sink/types.js';
import type { ItemDescriptor, WorkSource } from '../source/types.js';
import { interruptibleSleep } from './sleep.js';

export type CycleStatus = 'completed' | 'enumeration-failed' | 'interrupted';
export type ItemOutcome = 'processed' | 'skipped' | 'degraded' | 'failed';

export interface CycleResult {
  status: CycleStatus;
  processed: number;
  skipped: number;
  degraded: number;
  failed: number;
}

export interface DispatcherOptions {
  source: WorkSource;
  ledger: MemoryLedger;
  analyzer: Analyzer;
  sink: ReportSink;
  pollIntervalMs: number;
  /** Delay after a failed enumeration, instead of the poll interval. */
  backoffMs: number;
  logger?: Logger;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Single-flight poll loop: enumerate, filter to new work, analyze, write the
 * report, update the ledger and, for consumable sources, remove the input.
 *
 * Items are processed one at a time in listing order. Only one dispatcher may
 * run against a given input; nothing here coordinates between processes.
 */
export class Dispatcher {
  private source: WorkSource;
  private ledger: MemoryLedger;
  private analyzer: Analyzer;
  private sink: ReportSink;
  private logger: Logger;
  private sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  readonly pollIntervalMs: number;
  readonly backoffMs: number;

  constructor(options: DispatcherOptions) {
    this.source = options.source;
    this.ledger = options.ledger;
    this.analyzer = options.analyzer;
    this.sink = options.sink;
    this.pollIntervalMs = options.pollIntervalMs;
    this.backoffMs = options.backoffMs;
    this.logger = options.logger ?? console;
    this.sleep = options.sleep ?? interruptibleSleep;
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.log(formatEvent('worker.start', {
      source: this.source.description,
      sink: this.sink.description,
      strategy: this.source.strategy,
      interval_ms: this.pollIntervalMs,
    }));

    while (!signal.aborted) {
      const result = await this.runCycle(signal);
      if (signal.aborted) break;
      await this.sleep(this.nextDelay(result), signal);
    }

    this.logger.log(formatEvent('worker.stop'));
  }

  nextDelay(result: CycleResult): number {
    return result.status === 'enumeration-failed' ? this.backoffMs : this.pollIntervalMs;
  }

  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    const started = Date.now();
    const result: CycleResult = { status: 'completed', processed: 0, skipped: 0, degraded: 0, failed: 0 };
    this.logger.log(formatEvent('cycle.start', { source: this.source.description }));

    try {
      const namespaces = await this.enumerate(() => this.source.listNamespaces(), 'namespaces');

      for (const namespace of namespaces) {
        const items = await this.enumerate(() => this.source.list(namespace), namespace);

        for (const item of items) {
          if (signal?.aborted) {
            result.status = 'interrupted';
            return this.finish(result, started);
          }
          const outcome = await this.processItem(item);
          result[outcome]++;
        }
      }
    } catch (err) {
      if (!(err instanceof EnumerationError)) throw err;
      this.logger.error(formatEvent('enumeration.failed', {
        source: this.source.description,
        error: describeError(err),
        cause: describeError(err.cause),
        backoff_ms: this.backoffMs,
      }));
      result.status = 'enumeration-failed';
    }

    return this.finish(result, started);
  }

  private finish(result: CycleResult, started: number): CycleResult {
    this.logger.log(formatEvent('cycle.end', {
      status: result.status,
      processed: result.processed,
      skipped: result.skipped,
      degraded: result.degraded,
      failed: result.failed,
      ms: Date.now() - started,
    }));
    return result;
  }

  private async enumerate<T>(fn: () => Promise<T>, what: string): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new EnumerationError(`Listing ${what} failed`, err);
    }
  }

  /**
   * Never throws: every failure for one item is logged and reported as an
   * outcome. The ledger is written only after the report is stored.
   */
  async processItem(item: ItemDescriptor): Promise<ItemOutcome> {
    const started = Date.now();
    const source = this.source;
    this.logger.log(formatEvent('item.discovered', { key: item.key, owner: item.owner, size: item.size }));

    try {
      const bytes = await source.read(item.key);
      const digest = fingerprint(bytes);
      const prior = await this.ledger.get(item.key);

      if (source.strategy === 'content-hash' && !hasChanged(prior?.fingerprint, digest)) {
        this.logger.log(formatEvent('item.skipped', { key: item.key, reason: 'unchanged' }));
        return 'skipped';
      }

      this.logger.log(formatEvent('analysis.start', {
        key: item.key,
        kind: prior ? 'update' : 'new',
        has_summary: Boolean(prior?.summary),
      }));

      const analysis = await this.analyzer.analyze({
        owner: item.owner,
        filename: item.name,
        text: bytes.toString('utf-8'),
        previousSummary: prior?.summary ?? null,
      });

      if (analysis.degraded) {
        this.logger.warn(formatEvent('item.degraded', { key: item.key, action: 'retry-next-cycle' }));
        return 'degraded';
      }

      const location = await this.sink.write(item.owner, item.name, analysis.report);
      const recorded = await this.ledger.upsert(item.key, item.owner, digest, analysis.summary);

      if (source.strategy === 'presence') {
        await source.remove(item.key);
      }

      this.logger.log(formatEvent('item.success', {
        key: item.key,
        report: location,
        ledger: recorded ? 'updated' : 'stale',
        parse_fallback: analysis.parseFallback || undefined,
        ms: Date.now() - started,
      }));
      return 'processed';
    } catch (err) {
      const wrapped = new ItemProcessingError(`Processing "${item.key}" failed`, err);
      this.logger.error(formatEvent('item.failed', {
        key: item.key,
        error: describeError(wrapped),
        cause: describeError(err),
      }));
      return 'failed';
    }
  }
}
