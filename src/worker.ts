import type { SupabaseClient } from '@supabase/supabase-js';
import type { Config } from './config.js';
import { Analyzer } from './analyzer/analyzer.js';
import { createChatModel, type ChatModel } from './analyzer/llm.js';
import { Dispatcher } from './dispatcher/dispatcher.js';
import { MemoryLedger } from './ledger/ledger.js';
import { SqliteLedgerStore } from './ledger/sqlite-store.js';
import { SupabaseLedgerStore } from './ledger/supabase-store.js';
import type { LedgerStore } from './ledger/types.js';
import type { Logger } from './log.js';
import { getLedgerDbPath } from './paths.js';
import { BucketReportSink } from './sink/bucket.js';
import { LocalReportSink } from './sink/local.js';
import type { ReportSink } from './sink/types.js';
import { LocalWorkSource } from './source/local.js';
import { RemoteWorkSource } from './source/remote.js';
import type { WorkSource } from './source/types.js';
import { SupabaseBucket, createSupabaseClient } from './storage/supabase.js';
import type { Bucket } from './storage/types.js';
import { ConfigError } from './errors.js';

/** Collaborators that can be swapped for fakes. Anything missing is built from config. */
export interface WorkerDeps {
  chatModel?: ChatModel;
  ledgerStore?: LedgerStore;
  inputBucket?: Bucket;
  outputBucket?: Bucket;
  supabase?: SupabaseClient;
  logger?: Logger;
  now?: () => Date;
}

export interface Worker {
  dispatcher: Dispatcher;
  source: WorkSource;
  sink: ReportSink;
  ledger: MemoryLedger;
}

export function buildWorker(config: Config, deps: WorkerDeps = {}): Worker {
  const logger = deps.logger ?? console;
  const now = deps.now ?? (() => new Date());

  let supabase = deps.supabase;
  const getSupabase = (): SupabaseClient => {
    if (!supabase) {
      if (!config.supabaseUrl || !config.supabaseKey) {
        throw new ConfigError('SUPABASE_URL and SUPABASE_KEY are required for Supabase storage or ledger.');
      }
      supabase = createSupabaseClient(config.supabaseUrl, config.supabaseKey);
    }
    return supabase;
  };

  let source: WorkSource;
  let sink: ReportSink;
  if (config.sourceMode === 'remote') {
    const input = deps.inputBucket ?? new SupabaseBucket(getSupabase(), config.inputBucket);
    const output = deps.outputBucket ?? new SupabaseBucket(getSupabase(), config.outputBucket);
    source = new RemoteWorkSource(input, {
      extension: config.transcriptExtension,
      ownerPrefix: config.ownerPrefix,
    });
    sink = new BucketReportSink(output, now);
  } else {
    source = new LocalWorkSource(config.inputRoot, config.transcriptExtension);
    sink = new LocalReportSink(config.outputRoot, now);
  }

  const ledgerStore = deps.ledgerStore
    ?? (config.ledgerProvider === 'supabase'
      ? new SupabaseLedgerStore(getSupabase(), config.ledgerTable)
      : new SqliteLedgerStore(getLedgerDbPath(config)));
  const ledger = new MemoryLedger(ledgerStore, now, logger);

  const chatModel = deps.chatModel ?? createChatModel({
    provider: config.llmProvider,
    apiKey: config.llmApiKey,
    model: config.llmModel,
    baseUrl: config.llmBaseUrl,
    temperature: config.llmTemperature,
    timeoutMs: config.llmTimeoutSeconds * 1000,
    logger,
  });
  const analyzer = new Analyzer(chatModel, logger);

  const dispatcher = new Dispatcher({
    source,
    ledger,
    analyzer,
    sink,
    pollIntervalMs: config.pollIntervalSeconds * 1000,
    backoffMs: config.backoffSeconds * 1000,
    logger,
  });

  return { dispatcher, source, sink, ledger };
}
