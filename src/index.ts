#!/usr/bin/env node

import fs from 'node:fs';
import { loadConfig } from './config.js';
import { buildWorker } from './worker.js';

async function main() {
  const config = loadConfig();
  console.log(
    `Config loaded. Mode: ${config.sourceMode}, Ledger: ${config.ledgerProvider}, ` +
    `Model: ${config.llmProvider}/${config.llmModel}`,
  );

  if (config.sourceMode === 'local') {
    fs.mkdirSync(config.inputRoot, { recursive: true });
    fs.mkdirSync(config.outputRoot, { recursive: true });
    console.log(`Watching "${config.inputRoot}", reports go to "${config.outputRoot}".`);
  } else {
    console.log(`Watching bucket "${config.inputBucket}", reports go to bucket "${config.outputBucket}".`);
  }

  const { dispatcher } = buildWorker(config);
  const controller = new AbortController();

  // The item in flight finishes; the loop stops at the next item or sleep.
  const stop = (signal: string) => {
    console.error(`Received ${signal}, shutting down...`);
    controller.abort();
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));

  await dispatcher.run(controller.signal);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
