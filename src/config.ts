import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const stripQuotes = (val: unknown) =>
  typeof val === 'string' ? val.replace(/^(['"])(.*)\1$/, '$2') : val;

const configSchema = z.object({
  sourceMode: z.enum(['local', 'remote']).default('local'),
  inputRoot: z.string().default('inputs'),
  outputRoot: z.string().default('outputs'),
  transcriptExtension: z.string().regex(/^\.[A-Za-z0-9]+$/, 'must look like ".txt"').default('.txt'),
  ownerPrefix: z.string().default(''),
  pollIntervalSeconds: z.coerce.number().positive().default(10),
  backoffSeconds: z.coerce.number().positive().default(30),
  llmProvider: z.enum(['openai', 'anthropic']).default('openai'),
  llmApiKey: z.preprocess(stripQuotes, z.string().default('')),
  llmBaseUrl: z.string().url().optional(),
  llmModel: z.string().optional(),
  llmTemperature: z.coerce.number().min(0).max(2).default(0.2),
  llmTimeoutSeconds: z.coerce.number().positive().default(60),
  ledgerProvider: z.enum(['sqlite', 'supabase']).default('sqlite'),
  auditorDataDir: z.string().default(path.join(os.homedir(), '.transcript-auditor')),
  supabaseUrl: z.string().url().optional(),
  supabaseKey: z.preprocess(stripQuotes, z.string().optional()),
  ledgerTable: z.string().default('sales_memory'),
  inputBucket: z.string().default('sales-logs'),
  outputBucket: z.string().default('sales-reports'),
}).transform((cfg) => ({
  ...cfg,
  // Default model depends on provider
  llmModel: cfg.llmModel
    ?? (cfg.llmProvider === 'anthropic' ? 'claude-3-5-haiku-latest' : 'gpt-4o-mini'),
}));

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  const raw = {
    sourceMode: process.env.SOURCE_MODE || undefined,
    inputRoot: process.env.INPUT_ROOT || undefined,
    outputRoot: process.env.OUTPUT_ROOT || undefined,
    transcriptExtension: process.env.TRANSCRIPT_EXTENSION || undefined,
    ownerPrefix: process.env.OWNER_PREFIX,
    pollIntervalSeconds: process.env.POLL_INTERVAL_SECONDS || undefined,
    backoffSeconds: process.env.BACKOFF_SECONDS || undefined,
    llmProvider: process.env.LLM_PROVIDER || undefined,
    llmApiKey: process.env.LLM_API_KEY ?? '',
    llmBaseUrl: process.env.LLM_BASE_URL || undefined,
    llmModel: process.env.LLM_MODEL || undefined,
    llmTemperature: process.env.LLM_TEMPERATURE || undefined,
    llmTimeoutSeconds: process.env.LLM_TIMEOUT_SECONDS || undefined,
    ledgerProvider: process.env.LEDGER_PROVIDER || undefined,
    auditorDataDir: process.env.AUDITOR_DATA_DIR || undefined,
    supabaseUrl: process.env.SUPABASE_URL || undefined,
    supabaseKey: process.env.SUPABASE_KEY || undefined,
    ledgerTable: process.env.LEDGER_TABLE || undefined,
    inputBucket: process.env.INPUT_BUCKET || undefined,
    outputBucket: process.env.OUTPUT_BUCKET || undefined,
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `  ${i.path.join('.')}: ${i.message}`).join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  const config = result.data;

  if (!config.llmApiKey) {
    throw new ConfigError(
      'LLM_API_KEY is required. Set it to the key of the provider named by LLM_PROVIDER ' +
      '(OpenAI-compatible providers also need LLM_BASE_URL).',
    );
  }

  const needsSupabase = config.sourceMode === 'remote' || config.ledgerProvider === 'supabase';
  if (needsSupabase && (!config.supabaseUrl || !config.supabaseKey)) {
    throw new ConfigError(
      'SUPABASE_URL and SUPABASE_KEY are required when SOURCE_MODE=remote or LEDGER_PROVIDER=supabase.',
    );
  }

  cachedConfig = config;
  return cachedConfig;
}

export function getConfig(): Config {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}
