#!/usr/bin/env node
/**
 * Portal uploader entry point
 * Uploads the archives named on the command line and prints the run report
 */

import 'dotenv/config';
import { getConfig } from './config.js';
import { HELP_TEXT, formatRows, parseArgs } from './cli.js';
import { RunLedger } from './ledger/run-ledger.js';
import { BatchRunner } from './processing/batch.js';
import { createUploadPipeline } from './portal/pipeline.js';
import { info, error as logError } from './utils/logger.js';

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));
  if (options.help || options.items.length === 0) {
    console.info(HELP_TEXT);
    return options.help ? 0 : 1;
  }

  const config = getConfig();
  const ledger = new RunLedger(() => new Date(), config.reportUtcOffsetHours);
  const runner = new BatchRunner(() => createUploadPipeline(config), ledger, {
    concurrency: config.uploadConcurrency,
    uploadTimeoutMs: config.uploadTimeoutMs,
    maxItemsPerRun: config.maxItemsPerRun,
  });

  info('Starting invoice upload run', { module: 'main', phase: 'start', items: options.items.length });
  const summary = await runner.run(options.items);

  const rows = ledger.snapshotAsRows();
  console.info(options.json ? JSON.stringify(rows, null, 2) : formatRows(rows));

  info('Invoice upload run finished', { module: 'main', phase: 'complete', ...summary });
  return summary.failed > 0 ? 2 : 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logError('Upload run aborted', {
      module: 'main',
      phase: 'fatal',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exitCode = 1;
  });
